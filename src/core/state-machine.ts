import { createArrowStock, returnArrow, stockFromSolution, takeArrow, type ArrowStock } from "./arrow-stock";
import { DEFAULT_ENGINE_CONFIG, normalizeEngineConfig, type EngineConfig } from "./config";
import type { InputState } from "./input";
import {
  DIRECTION_SEQUENCE,
  WORLD_HEIGHT,
  WORLD_WIDTH,
  type Direction,
  type GridCoord,
} from "./types";
import { World } from "./world";

export type IntroState = {
  kind: "intro";
  frame: number;
  transitionStarted: boolean;
};

export type MenuState = {
  kind: "menu";
  mapIndex: number;
  mapCount: number;
};

export type GamePhase = "stopped" | "running" | "running-fast" | "success" | "defeat";

export type ArrowPlacement = GridCoord & {
  direction: Direction;
};

export type GameState = {
  kind: "game";
  mapIndex: number;
  phase: GamePhase;
  cursor: GridCoord;
  stock: ArrowStock;
  placements: ArrowPlacement[];
};

export type AppState = IntroState | MenuState | GameState;

export type AppStateKind = AppState["kind"];

type TickContext = {
  world: World;
  config: EngineConfig;
  mapCount: number;
};

export const createIntroState = (): IntroState => ({ kind: "intro", frame: 0, transitionStarted: false });

export const createMenuState = (mapIndex: number, mapCount: number): MenuState => ({
  kind: "menu",
  mapIndex,
  mapCount,
});

export const createGameState = (mapIndex: number): GameState => ({
  kind: "game",
  mapIndex,
  phase: "stopped",
  cursor: { x: 0, y: 0 },
  stock: createArrowStock(),
  placements: [],
});

const tickIntro = (state: IntroState, input: InputState, { config, mapCount }: TickContext): AppState | null => {
  state.frame += 1;

  if (state.transitionStarted) {
    return null;
  }

  if (
    input.btnStart.pressed ||
    input.btnA.pressed ||
    input.btnB.pressed ||
    state.frame === config.introTimeoutFrames
  ) {
    state.transitionStarted = true;
    return createMenuState(0, mapCount);
  }

  return null;
};

const tickMenu = (state: MenuState, input: InputState): AppState | null => {
  if (state.mapCount === 0) {
    return null;
  }

  if (input.jsUp.pressed) {
    state.mapIndex = state.mapIndex === 0 ? state.mapCount - 1 : state.mapIndex - 1;
  }

  if (input.jsDown.pressed) {
    state.mapIndex = state.mapIndex === state.mapCount - 1 ? 0 : state.mapIndex + 1;
  }

  if (input.btnA.pressed) {
    return createGameState(state.mapIndex);
  }

  return null;
};

const wrap = (value: number, size: number): number => ((value % size) + size) % size;

const moveCursor = (state: GameState, input: InputState): void => {
  const { cursor } = state;
  if (input.jsUp.pressed) {
    cursor.y = wrap(cursor.y - 1, WORLD_HEIGHT);
  }
  if (input.jsDown.pressed) {
    cursor.y = wrap(cursor.y + 1, WORLD_HEIGHT);
  }
  if (input.jsLeft.pressed) {
    cursor.x = wrap(cursor.x - 1, WORLD_WIDTH);
  }
  if (input.jsRight.pressed) {
    cursor.x = wrap(cursor.x + 1, WORLD_WIDTH);
  }
};

/**
 * Cycles the player's arrow under the cursor through the directions that
 * still have stock, then back to no arrow. Map tiles are never edited.
 */
const cycleArrow = (state: GameState, world: World): void => {
  const { x, y } = state.cursor;
  const placementIndex = state.placements.findIndex((placement) => placement.x === x && placement.y === y);
  const placement = placementIndex === -1 ? null : state.placements[placementIndex];

  if (placement === null && world.getTile(x, y) !== "empty") {
    return;
  }

  let start = 0;
  if (placement !== null) {
    start = DIRECTION_SEQUENCE.indexOf(placement.direction) + 1;
    returnArrow(state.stock, placement.direction);
    state.placements.splice(placementIndex, 1);
    world.setArrow(x, y, "empty");
  }

  for (let index = start; index < DIRECTION_SEQUENCE.length; index += 1) {
    const direction = DIRECTION_SEQUENCE[index];
    if (takeArrow(state.stock, direction)) {
      state.placements.push({ x, y, direction });
      world.setArrow(x, y, direction);
      return;
    }
  }
};

const restartWorld = (state: GameState, world: World): void => {
  world.reset();
  for (const placement of state.placements) {
    world.setArrow(placement.x, placement.y, placement.direction);
  }
};

const runWorld = (state: GameState, world: World, ticks: number): void => {
  for (let index = 0; index < ticks; index += 1) {
    const change = world.tick();
    if (change === "win") {
      state.phase = "success";
      return;
    }
    if (change === "lose") {
      state.phase = "defeat";
      return;
    }
  }
};

const tickGame = (state: GameState, input: InputState, { world, config, mapCount }: TickContext): AppState | null => {
  switch (state.phase) {
    case "stopped": {
      moveCursor(state, input);
      if (input.btnA.pressed) {
        cycleArrow(state, world);
      }
      if (input.btnStart.pressed) {
        restartWorld(state, world);
        state.phase = "running";
        return null;
      }
      return input.btnB.pressed ? createMenuState(state.mapIndex, mapCount) : null;
    }
    case "running":
    case "running-fast": {
      if (input.btnStart.pressed) {
        restartWorld(state, world);
        state.phase = "stopped";
        return null;
      }
      if (input.btnSelect.pressed) {
        state.phase = state.phase === "running" ? "running-fast" : "running";
      }
      runWorld(state, world, state.phase === "running-fast" ? config.fastForwardTicks : 1);
      return null;
    }
    case "success":
    case "defeat": {
      if (input.btnA.pressed || input.btnStart.pressed) {
        restartWorld(state, world);
        state.phase = "stopped";
        return null;
      }
      return input.btnB.pressed ? createMenuState(state.mapIndex, mapCount) : null;
    }
  }
};

/** Runs one frame of the current state and returns the state it asks to move to, if any. */
export const tickAppState = (state: AppState, input: InputState, context: TickContext): AppState | null => {
  switch (state.kind) {
    case "intro":
      return tickIntro(state, input, context);
    case "menu":
      return tickMenu(state, input);
    case "game":
      return tickGame(state, input, context);
  }
};

export type StateMachineOptions = {
  /** Packed maps selectable from the menu. */
  maps?: ReadonlyArray<Uint8Array>;
  config?: unknown;
};

/**
 * Top level flow: intro, map menu and the game itself. State changes are
 * requested by the current state and take effect after a grace period,
 * during which the outgoing state keeps ticking.
 */
export class StateMachine {
  private state: AppState = createIntroState();
  private target: AppState | null = null;
  private transitionTimer = 0;
  private world = new World();
  private readonly maps: ReadonlyArray<Uint8Array>;
  private readonly config: EngineConfig;

  constructor({ maps = [], config = DEFAULT_ENGINE_CONFIG }: StateMachineOptions = {}) {
    this.maps = maps;
    this.config = normalizeEngineConfig(config);
  }

  tick(input: InputState): void {
    if (this.target !== null) {
      if (this.transitionTimer > 0) {
        this.transitionTimer -= 1;
      } else {
        const next = this.target;
        this.target = null;
        this.enter(next);
      }
    }

    const requested = tickAppState(this.state, input, {
      world: this.world,
      config: this.config,
      mapCount: this.maps.length,
    });

    if (requested !== null) {
      if (this.config.logTransitions) {
        console.debug(
          `[state-machine] ${this.state.kind} -> ${requested.kind} in ${this.config.transitionFrames} frames`,
        );
      }
      this.target = requested;
      this.transitionTimer = this.config.transitionFrames;
    }
  }

  getState(): Readonly<AppState> {
    return this.state;
  }

  getTargetState(): Readonly<AppState> | null {
    return this.target;
  }

  getTransitionTimer(): number {
    return this.transitionTimer;
  }

  getWorld(): World {
    return this.world;
  }

  getConfig(): Readonly<EngineConfig> {
    return this.config;
  }

  get mapCount(): number {
    return this.maps.length;
  }

  private enter(next: AppState): void {
    if (next.kind === "game") {
      const map = this.maps[next.mapIndex];
      if (map === undefined) {
        throw new RangeError(`Map index ${next.mapIndex} is outside the ${this.maps.length} loaded maps`);
      }
      this.world = World.load(map);
      next.stock = stockFromSolution(this.world.solutionArrows);
      next.placements = [];
    }

    if (this.config.logTransitions) {
      console.debug(`[state-machine] entered ${next.kind}`);
    }
    this.state = next;
  }
}
