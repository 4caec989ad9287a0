// src/engine/constants.ts

import type { RepetitionRule } from "../types";

export const DIAL_MODULUS = 100;

export const DIAL_START = 50;

export const REPETITION_RULES: readonly RepetitionRule[] = ["atLeastTwice", "twice"];

export const DEFAULT_REPETITION_RULE: RepetitionRule = "atLeastTwice";

export function isRepetitionRule(x: unknown): x is RepetitionRule {
  return REPETITION_RULES.some((rule) => rule === x);
}
