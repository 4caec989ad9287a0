import { describe, it, expect } from "vitest";
import {
  PuzzleInputError,
  parseCommand,
  parseCommands,
  parseRange,
  parseRanges,
} from "../src/engine";

function catchInputError(fn: () => unknown): PuzzleInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PuzzleInputError) return err;
    throw err;
  }
  throw new Error("Expected function to throw.");
}

describe("parse: commands", () => {
  it("maps L and R to directions", () => {
    expect(parseCommand("L68")).toEqual({ direction: "lower", magnitude: 68 });
    expect(parseCommand("  R1000 ")).toEqual({ direction: "higher", magnitude: 1000 });
    expect(parseCommand("R0")).toEqual({ direction: "higher", magnitude: 0 });
  });

  it("skips blank lines and accepts CRLF", () => {
    expect(parseCommands("L68\n\nR5\r\n")).toEqual([
      { direction: "lower", magnitude: 68 },
      { direction: "higher", magnitude: 5 },
    ]);
  });

  it("reports an unknown direction with its line number", () => {
    const err = catchInputError(() => parseCommands("L1\n\nQ2"));
    expect(err.code).toBe("MALFORMED_COMMAND");
    expect(err.location).toBe(3);
    expect(err.message).toBe('Line 3: unexpected direction "Q"');
  });

  it("rejects missing, signed or non-numeric magnitudes", () => {
    expect(() => parseCommand("L")).toThrow(/invalid magnitude/);
    expect(() => parseCommand("L-5")).toThrow(/invalid magnitude/);
    expect(() => parseCommand("R1x")).toThrow(/invalid magnitude/);
  });
});

describe("parse: ranges", () => {
  it("splits on commas and ignores trailing separators", () => {
    expect(parseRanges("11-22,95-115,\n")).toEqual([
      { start: 11, end: 22 },
      { start: 95, end: 115 },
    ]);
  });

  it("accepts ranges wrapped over several lines", () => {
    expect(parseRanges("1-2,\n3-4")).toEqual([
      { start: 1, end: 2 },
      { start: 3, end: 4 },
    ]);
  });

  it("accepts a single-value range", () => {
    expect(parseRange("7-7")).toEqual({ start: 7, end: 7 });
  });

  it("reports the failing token", () => {
    const err = catchInputError(() => parseRanges("11-22,1-2-3"));
    expect(err.code).toBe("MALFORMED_RANGE");
    expect(err.location).toBe(2);
    expect(err.message).toBe('Range 2: expected start-end, got "1-2-3"');
  });

  it("rejects a missing delimiter, non-numeric bounds and reversed ranges", () => {
    expect(() => parseRange("11")).toThrow(/expected start-end/);
    expect(() => parseRange("a-5")).toThrow(/decimal integers/);
    expect(() => parseRange("22-11")).toThrow("Range 1: start 22 is greater than end 11");
  });
});
