import { afterEach, vi } from "vitest";

import {
  createInputState,
  pressedButton,
  type ButtonName,
  type FlickName,
  type InputState,
} from "../src/core/input";
import type { StateMachine } from "../src/core/state-machine";
import type { WorldStateChange } from "../src/core/types";
import type { World } from "../src/core/world";
import { loadBundledMaps } from "../src/maps/catalog";

afterEach(() => {
  vi.restoreAllMocks();
});

/** Ticks the world `count` times and returns every outcome in order. */
export const runTicks = (world: World, count: number): WorldStateChange[] => {
  const changes: WorldStateChange[] = [];
  for (let index = 0; index < count; index += 1) {
    changes.push(world.tick());
  }
  return changes;
};

/** Ticks until the world reports a win or loss, or `limit` ticks pass. */
export const tickUntilChange = (world: World, limit: number): { change: WorldStateChange; ticks: number } => {
  for (let ticks = 1; ticks <= limit; ticks += 1) {
    const change = world.tick();
    if (change !== "no-change") {
      return { change, ticks };
    }
  }
  return { change: "no-change", ticks: limit };
};

/** Input for a single frame with the given buttons or flicks freshly pressed. */
export const press = (...names: Array<ButtonName | FlickName>): InputState => {
  const input = createInputState();
  for (const name of names) {
    input[name] = pressedButton();
  }
  return input;
};

export const idle = (): InputState => createInputState();

export const tickMachine = (machine: StateMachine, input: InputState, frames = 1): void => {
  for (let frame = 0; frame < frames; frame += 1) {
    machine.tick(frame === 0 ? input : idle());
  }
};

export const bundledMap = (slug: string): Uint8Array => {
  const found = loadBundledMaps().find((entry) => entry.slug === slug);
  if (found === undefined) {
    throw new Error(`Expected bundled map ${slug}`);
  }
  return found.map;
};

const repeatCells = (cell: string, separator: string): string => Array(12).fill(cell).join(separator);

/** The 19 rows of an empty, fully enclosed puzzle. */
export const blankPuzzleRows = (): string[] => {
  const rows = [`┌${repeatCells("────", "┬")}┐`];
  for (let y = 0; y < 9; y += 1) {
    rows.push(`│${" ".repeat(59)}│`);
    rows.push(y === 8 ? `└${repeatCells("────", "┴")}┘` : `├${repeatCells("    ", "┼")}┤`);
  }
  return rows;
};

export const replaceGlyphs = (row: string, index: number, glyphs: string): string => {
  const chars = Array.from(row);
  chars.splice(index, Array.from(glyphs).length, ...Array.from(glyphs));
  return chars.join("");
};
