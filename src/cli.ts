// src/cli.ts
//
// Usage:
//   dial-repeat dial <file>
//   dial-repeat ids <file> [--rule atLeastTwice|twice]
//
// Env:
//   SOLVER_REPETITION_RULE=atLeastTwice  (default rule for `ids`)
//   SOLVER_TRACE=1                       (print every dial step)

import type { RepetitionRule } from "./types";
import type { SolverConfig } from "./config";
import {
  REPETITION_RULES,
  isRepetitionRule,
  parseCommands,
  traceDial,
  trySolveDial,
  trySolveIds,
} from "./engine";

export type CliIO = {
  readFile: (filePath: string) => string;
  log: (line: string) => void;
  error: (line: string) => void;
};

const USAGE = [
  "Usage:",
  "  dial-repeat dial <file>",
  `  dial-repeat ids <file> [--rule ${REPETITION_RULES.join("|")}]`,
].join("\n");

function readInput(io: CliIO, filePath: string): string | null {
  try {
    return io.readFile(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    io.error(`Cannot read ${filePath}: ${reason}`);
    return null;
  }
}

function runDial(input: string, io: CliIO, config: SolverConfig): number {
  const res = trySolveDial(input);
  if (!res.ok) {
    io.error(`${res.error.code}: ${res.error.message}`);
    return 1;
  }

  if (config.trace) {
    traceDial(parseCommands(input)).forEach((s, i) => {
      io.log(`step ${i + 1}: ${s.pre} -> ${s.post} landing=${s.landing} crossings=${s.crossings}`);
    });
  }

  io.log(`Password: ${res.result.landingCount}`);
  io.log(`Password (every click): ${res.result.crossingCount}`);
  return 0;
}

function runIds(input: string, rule: RepetitionRule, io: CliIO): number {
  const res = trySolveIds(input, rule);
  if (!res.ok) {
    io.error(`${res.error.code}: ${res.error.message}`);
    return 1;
  }

  io.log(`Sum of invalid IDs: ${res.result.total}`);
  return 0;
}

/**
 * Returns the process exit code.
 */
export function run(argv: readonly string[], io: CliIO, config: SolverConfig): number {
  const [command, filePath, ...rest] = argv;

  if ((command !== "dial" && command !== "ids") || !filePath) {
    io.error(USAGE);
    return 1;
  }

  let rule = config.repetitionRule;
  if (command === "ids" && rest.length > 0) {
    const [flag, value] = rest;
    if (flag !== "--rule" || !isRepetitionRule(value) || rest.length > 2) {
      io.error(USAGE);
      return 1;
    }
    rule = value;
  } else if (rest.length > 0) {
    io.error(USAGE);
    return 1;
  }

  const input = readInput(io, filePath);
  if (input === null) return 1;

  return command === "dial" ? runDial(input, io, config) : runIds(input, rule, io);
}
