// src/engine/repetition.ts

import type { IdRange, RepetitionRule } from "../types";
import { DEFAULT_REPETITION_RULE } from "./constants";

function assertCandidate(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Candidate must be a non-negative integer, got ${value}`);
  }
}

function tilesWith(s: string, d: number): boolean {
  const pattern = s.slice(0, d);
  for (let i = d; i < s.length; i += d) {
    if (s.slice(i, i + d) !== pattern) return false;
  }
  return true;
}

/**
 * Length of the shortest prefix whose repetition rebuilds the decimal digits
 * of `value`, or null when no prefix of at most half the length does.
 */
export function minimalPeriod(value: number): number | null {
  assertCandidate(value);

  const s = String(value);
  const len = s.length;

  for (let d = 1; d <= len / 2; d++) {
    if (len % d === 0 && tilesWith(s, d)) return d;
  }
  return null;
}

export function isRepeated(value: number, rule: RepetitionRule = DEFAULT_REPETITION_RULE): boolean {
  const period = minimalPeriod(value);
  if (period === null) return false;

  if (rule === "atLeastTwice") return true;

  // Two identical halves <=> the minimal period fits an even number of times.
  const copies = String(value).length / period;
  return copies % 2 === 0;
}

/** Sum of every invalid ID in [start, end]. */
export function sumInvalid(
  start: number,
  end: number,
  rule: RepetitionRule = DEFAULT_REPETITION_RULE
): bigint {
  assertCandidate(start);
  assertCandidate(end);
  if (start > end) {
    throw new RangeError(`Range start ${start} is greater than end ${end}`);
  }

  let total = 0n;
  for (let v = start; v <= end; v++) {
    if (isRepeated(v, rule)) total += BigInt(v);
  }
  return total;
}

export function sumInvalidIds(
  ranges: Iterable<IdRange>,
  rule: RepetitionRule = DEFAULT_REPETITION_RULE
): bigint {
  let total = 0n;
  for (const r of ranges) {
    total += sumInvalid(r.start, r.end, rule);
  }
  return total;
}
