// src/types.ts

export type Direction = "lower" | "higher";

export interface StepCommand {
  direction: Direction;
  magnitude: number;
}

export interface DialOptions {
  initial?: number;
  modulus?: number;
}

export interface DialState {
  // Raw accumulated position. Never wrapped between steps.
  position: number;
  landingCount: number;
  crossingCount: number;
}

export interface StepOutcome {
  pre: number;
  post: number;
  crossings: number;

  // post wrapped into [0, modulus)
  landing: number;
}

export interface DialResult {
  landingCount: number;
  crossingCount: number;
  position: number;
  landing: number;
}

/** Inclusive on both ends. */
export interface IdRange {
  start: number;
  end: number;
}

/**
 * "atLeastTwice": some shorter pattern repeated two or more times.
 * "twice": the digits split into two identical halves.
 */
export type RepetitionRule = "atLeastTwice" | "twice";
