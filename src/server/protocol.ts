// src/server/protocol.ts

import type { RepetitionRule } from "../types";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | SolveDialMessage | SolveIdsMessage;

export interface HelloMessage {
  type: "hello";
  reqId?: string;
}

/**
 * `input` is the raw command list, one command per line ("L68", "R14", ...).
 */
export interface SolveDialMessage {
  type: "solveDial";
  input: string;
  reqId?: string;
}

/**
 * `input` is a comma-separated list of inclusive ranges ("11-22,95-115").
 * `rule` falls back to the server default when omitted.
 */
export interface SolveIdsMessage {
  type: "solveIds";
  input: string;
  rule?: RepetitionRule;
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage = WelcomeMessage | DialResultMessage | IdsResultMessage | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  reqId?: string;
}

export interface DialResultMessage {
  type: "dialResult";
  landingCount: number;
  crossingCount: number;
  landing: number;
  reqId?: string;
}

export interface IdsResultMessage {
  type: "idsResult";
  rule: RepetitionRule;

  // Decimal string: the sum is a bigint and JSON has no bigint.
  total: string;
  reqId?: string;
}

export interface ErrorMessage {
  type: "error";
  code: string;
  message: string;
  reqId?: string;
}
