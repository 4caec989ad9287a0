// Public engine surface

export { DIAL_MODULUS, DIAL_START, DEFAULT_REPETITION_RULE, REPETITION_RULES, isRepetitionRule } from "./constants";

export { mod, floorDiv } from "./modular";

// Cyclic motion counter
export { createDial, countCrossings, stepDial, traceDial, processDial } from "./dial";

// Repetition classifier
export { minimalPeriod, isRepeated, sumInvalid, sumInvalidIds } from "./repetition";

// Input adapters
export { parseCommand, parseCommands, parseRange, parseRanges } from "./parse";
export { PuzzleInputError } from "./errors";
export type { InputErrorCode } from "./errors";

// Envelopes
export type { SolveResponse, SolveError, SolveErrorCode } from "./envelope";
export type { IdsResult } from "./trySolve";
export { trySolveDial, trySolveIds } from "./trySolve";

export type {
  Direction,
  StepCommand,
  DialOptions,
  DialState,
  StepOutcome,
  DialResult,
  IdRange,
  RepetitionRule,
} from "../types";
