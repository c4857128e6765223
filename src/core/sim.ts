import type { InputState } from "./input";
import type { StateMachine } from "./state-machine";
import { SIM_TICK_CADENCE_MS } from "./types";

type CreateRunnerConfig = {
  machine: StateMachine;
  /** Called once per tick for the frame's input. */
  readInput: () => InputState;
};

const STEP_EPSILON = 1e-7;

/**
 * Drives a state machine from wall-clock time. `step` accumulates elapsed
 * milliseconds and runs as many whole ticks as fit; the remainder carries
 * over to the next call.
 */
export const createRunner = ({ machine, readInput }: CreateRunnerConfig) => {
  let accumulatorMs = 0;
  let paused = false;
  let tickCount = 0;
  let elapsedMs = 0;

  const runTick = (): void => {
    machine.tick(readInput());
    tickCount += 1;
    elapsedMs += SIM_TICK_CADENCE_MS;
  };

  const step = (dtMs: number): void => {
    if (paused) {
      return;
    }

    if (!Number.isFinite(dtMs) || dtMs <= 0) {
      return;
    }

    accumulatorMs += dtMs;
    const stepsToRun = Math.floor((accumulatorMs + STEP_EPSILON) / SIM_TICK_CADENCE_MS);
    if (stepsToRun <= 0) {
      return;
    }

    accumulatorMs -= stepsToRun * SIM_TICK_CADENCE_MS;

    for (let stepIndex = 0; stepIndex < stepsToRun; stepIndex += 1) {
      runTick();
    }

    if (accumulatorMs < 0 && accumulatorMs > -STEP_EPSILON) {
      accumulatorMs = 0;
    }
  };

  return {
    machine,
    step,
    /** Runs exactly one tick, ignoring pause and the accumulator. */
    advance(): void {
      runTick();
    },
    pause(): void {
      paused = true;
    },
    resume(): void {
      paused = false;
    },
    togglePause(): void {
      paused = !paused;
    },
    get paused(): boolean {
      return paused;
    },
    get tickCount(): number {
      return tickCount;
    },
    get elapsedMs(): number {
      return elapsedMs;
    },
  };
};

export type Runner = ReturnType<typeof createRunner>;
