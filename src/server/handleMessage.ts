import type { RepetitionRule } from "../types";
import type { ClientMessage, ServerMessage } from "./protocol";
import { trySolveDial, trySolveIds, type SolveError } from "../engine";

export const SERVER_VERSION = "1.0.0";

export type HandlerDefaults = {
  repetitionRule: RepetitionRule;
};

function withReqId(msg: ServerMessage, reqId?: string): ServerMessage {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

function mkError(error: SolveError, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code: error.code, message: error.message }, reqId);
}

/**
 * Pure request handler: one client message in, one server message out.
 */
export function handleClientMessage(msg: ClientMessage, defaults: HandlerDefaults): ServerMessage {
  switch (msg.type) {
    case "hello":
      return withReqId({ type: "welcome", serverVersion: SERVER_VERSION }, msg.reqId);

    case "solveDial": {
      const res = trySolveDial(msg.input);
      if (!res.ok) return mkError(res.error, msg.reqId);
      const { landingCount, crossingCount, landing } = res.result;
      return withReqId({ type: "dialResult", landingCount, crossingCount, landing }, msg.reqId);
    }

    case "solveIds": {
      const res = trySolveIds(msg.input, msg.rule ?? defaults.repetitionRule);
      if (!res.ok) return mkError(res.error, msg.reqId);
      return withReqId(
        { type: "idsResult", rule: res.result.rule, total: res.result.total.toString() },
        msg.reqId
      );
    }
  }
}
