// src/engine/parse.ts

import type { Direction, IdRange, StepCommand } from "../types";
import { PuzzleInputError } from "./errors";

const DIRECTION_CODES: Readonly<Record<string, Direction>> = {
  L: "lower",
  R: "higher",
};

const DIGITS = /^\d+$/;

function parseDecimal(s: string): number | null {
  if (!DIGITS.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Parse one command such as "L68" or "R1000".
 */
export function parseCommand(line: string, lineNo = 1): StepCommand {
  const trimmed = line.trim();
  const code = trimmed.charAt(0);
  const direction = DIRECTION_CODES[code];

  if (direction === undefined) {
    throw new PuzzleInputError(
      "MALFORMED_COMMAND",
      lineNo,
      `Line ${lineNo}: unexpected direction ${JSON.stringify(code)}`
    );
  }

  const magnitude = parseDecimal(trimmed.slice(1));
  if (magnitude === null) {
    throw new PuzzleInputError(
      "MALFORMED_COMMAND",
      lineNo,
      `Line ${lineNo}: invalid magnitude ${JSON.stringify(trimmed.slice(1))}`
    );
  }

  return { direction, magnitude };
}

/** One command per line; blank lines are skipped. */
export function parseCommands(text: string): StepCommand[] {
  const out: StepCommand[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() === "") continue;
    out.push(parseCommand(lines[i], i + 1));
  }
  return out;
}

/**
 * Parse "start-end" (inclusive). A reversed range is malformed.
 */
export function parseRange(token: string, tokenNo = 1): IdRange {
  const parts = token.trim().split("-");

  if (parts.length !== 2) {
    throw new PuzzleInputError(
      "MALFORMED_RANGE",
      tokenNo,
      `Range ${tokenNo}: expected start-end, got ${JSON.stringify(token.trim())}`
    );
  }

  const start = parseDecimal(parts[0]);
  const end = parseDecimal(parts[1]);
  if (start === null || end === null) {
    throw new PuzzleInputError(
      "MALFORMED_RANGE",
      tokenNo,
      `Range ${tokenNo}: bounds must be decimal integers, got ${JSON.stringify(token.trim())}`
    );
  }
  if (start > end) {
    throw new PuzzleInputError(
      "MALFORMED_RANGE",
      tokenNo,
      `Range ${tokenNo}: start ${start} is greater than end ${end}`
    );
  }

  return { start, end };
}

/**
 * Comma-separated ranges, possibly wrapped over several lines.
 * Empty tokens (trailing comma, line breaks) are skipped.
 */
export function parseRanges(text: string): IdRange[] {
  const tokens = text
    .split(/[,\r\n]/)
    .map((t) => t.trim())
    .filter((t) => t !== "");

  return tokens.map((t, i) => parseRange(t, i + 1));
}
