// src/config.ts

import type { RepetitionRule } from "./types";
import { DEFAULT_REPETITION_RULE, isRepetitionRule } from "./engine";

export type Env = Record<string, string | undefined>;

export type SolverConfig = {
  wsPort: number;
  repetitionRule: RepetitionRule;
  trace: boolean;
};

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function envRule(env: Env, name: string, defaultValue: RepetitionRule): RepetitionRule {
  const v = env[name]?.trim();
  return isRepetitionRule(v) ? v : defaultValue;
}

export function loadConfig(env: Env = process.env): SolverConfig {
  return {
    wsPort: envInt(env, "SOLVER_WS_PORT", 8787),
    repetitionRule: envRule(env, "SOLVER_REPETITION_RULE", DEFAULT_REPETITION_RULE),
    trace: envFlag(env, "SOLVER_TRACE"),
  };
}
