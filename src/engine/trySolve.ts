// src/engine/trySolve.ts

import type { DialResult, RepetitionRule } from "../types";
import { DEFAULT_REPETITION_RULE } from "./constants";
import { processDial } from "./dial";
import type { SolveResponse } from "./envelope";
import { PuzzleInputError } from "./errors";
import { parseCommands, parseRanges } from "./parse";
import { sumInvalidIds } from "./repetition";

export type IdsResult = {
  rule: RepetitionRule;
  total: bigint;
};

/**
 * Run `solve` and turn input errors into an error envelope.
 * Anything that is not an input problem is rethrown.
 */
function toResponse<T>(solve: () => T): SolveResponse<T> {
  try {
    return { ok: true, result: solve() };
  } catch (err) {
    if (err instanceof PuzzleInputError) {
      return { ok: false, error: { code: err.code, message: err.message } };
    }
    if (err instanceof RangeError) {
      return { ok: false, error: { code: "OUT_OF_RANGE", message: err.message } };
    }
    throw err;
  }
}

/**
 * Parse newline-separated commands and run them from the default start.
 */
export function trySolveDial(input: string): SolveResponse<DialResult> {
  return toResponse(() => processDial(parseCommands(input)));
}

export function trySolveIds(
  input: string,
  rule: RepetitionRule = DEFAULT_REPETITION_RULE
): SolveResponse<IdsResult> {
  return toResponse(() => ({ rule, total: sumInvalidIds(parseRanges(input), rule) }));
}
