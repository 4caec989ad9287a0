import { describe, it, expect } from "vitest";
import { handleClientMessage, SERVER_VERSION } from "../src/server/handleMessage";

const defaults = { repetitionRule: "atLeastTwice" as const };

describe("server handleClientMessage (pure)", () => {
  it("answers hello with welcome and echoes reqId", () => {
    expect(handleClientMessage({ type: "hello", reqId: "r1" }, defaults)).toEqual({
      type: "welcome",
      serverVersion: SERVER_VERSION,
      reqId: "r1",
    });
  });

  it("solves a dial input", () => {
    expect(handleClientMessage({ type: "solveDial", input: "L68\nL82" }, defaults)).toEqual({
      type: "dialResult",
      landingCount: 1,
      crossingCount: 2,
      landing: 0,
    });
  });

  it("solves ids with the server default rule and sends the total as a string", () => {
    expect(handleClientMessage({ type: "solveIds", input: "11-22" }, defaults)).toEqual({
      type: "idsResult",
      rule: "atLeastTwice",
      total: "33",
    });
  });

  it("prefers the rule sent by the client", () => {
    expect(
      handleClientMessage({ type: "solveIds", input: "95-115", rule: "twice", reqId: "r2" }, defaults)
    ).toEqual({ type: "idsResult", rule: "twice", total: "99", reqId: "r2" });
  });

  it("maps input errors to error messages", () => {
    expect(handleClientMessage({ type: "solveIds", input: "11", reqId: "r3" }, defaults)).toEqual({
      type: "error",
      code: "MALFORMED_RANGE",
      message: 'Range 1: expected start-end, got "11"',
      reqId: "r3",
    });
  });
});
