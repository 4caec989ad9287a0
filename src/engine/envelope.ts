// src/engine/envelope.ts

import type { InputErrorCode } from "./errors";

export type SolveErrorCode = InputErrorCode | "OUT_OF_RANGE";

export type SolveError = {
  code: SolveErrorCode;
  message: string;
};

export type SolveOk<T> = {
  ok: true;
  result: T;
};

export type SolveErr = {
  ok: false;
  error: SolveError;
};

export type SolveResponse<T> = SolveOk<T> | SolveErr;
