// src/engine/errors.ts

export type InputErrorCode = "MALFORMED_COMMAND" | "MALFORMED_RANGE";

/**
 * Fatal puzzle-input error. `location` is the 1-based line (commands)
 * or token (ranges) the error was found at.
 */
export class PuzzleInputError extends Error {
  readonly code: InputErrorCode;
  readonly location: number;

  constructor(code: InputErrorCode, location: number, message: string) {
    super(message);
    this.name = "PuzzleInputError";
    this.code = code;
    this.location = location;
  }
}
