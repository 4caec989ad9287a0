// src/engine/dial.ts

import type { DialOptions, DialResult, DialState, StepCommand, StepOutcome } from "../types";
import { DIAL_MODULUS, DIAL_START } from "./constants";
import { floorDiv, mod } from "./modular";

type ResolvedDialOptions = {
  initial: number;
  modulus: number;
};

function resolveOptions(options: DialOptions = {}): ResolvedDialOptions {
  const initial = options.initial ?? DIAL_START;
  const modulus = options.modulus ?? DIAL_MODULUS;

  if (!Number.isSafeInteger(modulus) || modulus < 1) {
    throw new RangeError(`Dial modulus must be a positive integer, got ${modulus}`);
  }
  if (!Number.isSafeInteger(initial)) {
    throw new RangeError(`Dial initial position must be an integer, got ${initial}`);
  }
  return { initial, modulus };
}

export function createDial(options?: DialOptions): DialState {
  const { initial } = resolveOptions(options);
  return { position: initial, landingCount: 0, crossingCount: 0 };
}

/**
 * Number of multiples of `modulus` the dial touches moving from `pre` to `post`.
 * The end position counts, the start position never does.
 */
export function countCrossings(pre: number, post: number, modulus: number): number {
  if (post >= pre) {
    // multiples in (pre, post]
    return floorDiv(post, modulus) - floorDiv(pre, modulus);
  }
  // multiples in [post, pre)
  return floorDiv(pre - 1, modulus) - floorDiv(post - 1, modulus);
}

/**
 * Apply one command. Returns the next state (the input is not mutated)
 * and what happened during the step.
 */
export function stepDial(
  state: DialState,
  command: StepCommand,
  modulus: number = DIAL_MODULUS
): { state: DialState; outcome: StepOutcome } {
  const { direction, magnitude } = command;

  if (!Number.isSafeInteger(magnitude) || magnitude < 0) {
    throw new RangeError(`Step magnitude must be a non-negative integer, got ${magnitude}`);
  }

  const pre = state.position;
  let post: number;
  switch (direction) {
    case "higher":
      post = pre + magnitude;
      break;
    case "lower":
      post = pre - magnitude;
      break;
    default: {
      const unknownDirection: never = direction;
      throw new TypeError(`Unknown step direction: ${String(unknownDirection)}`);
    }
  }

  if (!Number.isSafeInteger(post)) {
    throw new RangeError(`Dial position left the safe integer range after ${direction} ${magnitude}`);
  }

  const crossings = countCrossings(pre, post, modulus);
  const landing = mod(post, modulus);

  return {
    state: {
      position: post,
      landingCount: state.landingCount + (landing === 0 ? 1 : 0),
      crossingCount: state.crossingCount + crossings,
    },
    outcome: { pre, post, crossings, landing },
  };
}

/**
 * Per-step view of a run, in command order.
 */
export function traceDial(commands: Iterable<StepCommand>, options?: DialOptions): StepOutcome[] {
  const { modulus } = resolveOptions(options);
  let state = createDial(options);
  const out: StepOutcome[] = [];

  for (const command of commands) {
    const step = stepDial(state, command, modulus);
    state = step.state;
    out.push(step.outcome);
  }

  return out;
}

export function processDial(commands: Iterable<StepCommand>, options?: DialOptions): DialResult {
  const { modulus } = resolveOptions(options);
  let state = createDial(options);

  for (const command of commands) {
    state = stepDial(state, command, modulus).state;
  }

  return {
    landingCount: state.landingCount,
    crossingCount: state.crossingCount,
    position: state.position,
    landing: mod(state.position, modulus),
  };
}
