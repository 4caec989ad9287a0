import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { RepetitionRule } from "../types";
import type { ClientMessage, ServerMessage } from "./protocol";
import { handleClientMessage } from "./handleMessage";
import { DEFAULT_REPETITION_RULE, isRepetitionRule } from "../engine";

export type WsServerOptions = {
  port: number;
  defaultRule?: RepetitionRule;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x.reqId;
  return typeof v === "string" ? v : undefined;
}

/**
 * Validate an untrusted payload and narrow it to a ClientMessage.
 */
function toClientMessage(x: unknown): ClientMessage | null {
  if (!isPlainObject(x)) return null;
  if ("reqId" in x && typeof x.reqId !== "string") return null;
  const reqId = getReqId(x);

  switch (x.type) {
    case "hello":
      return { type: "hello", reqId };

    case "solveDial": {
      const input = x.input;
      if (typeof input !== "string") return null;
      return { type: "solveDial", input, reqId };
    }

    case "solveIds": {
      const input = x.input;
      const rawRule = x.rule;
      if (typeof input !== "string") return null;

      let rule: RepetitionRule | undefined;
      if (rawRule !== undefined) {
        if (!isRepetitionRule(rawRule)) return null;
        rule = rawRule;
      }
      return { type: "solveIds", input, rule, reqId };
    }

    default:
      return null;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

export function startWsServer(opts: WsServerOptions): WsServerHandle {
  const defaults = { repetitionRule: opts.defaultRule ?? DEFAULT_REPETITION_RULE };
  const wss = new WebSocketServer({ port: opts.port });
  const sockets = new Set<WebSocket>();

  wss.on("connection", (ws) => {
    sockets.add(ws);

    ws.on("message", (data) => {
      const parsed = safeParseJson(rawToString(data));
      const reqId = getReqId(parsed);
      const msg = toClientMessage(parsed);

      if (!msg) {
        const bad: ServerMessage = { type: "error", code: "BAD_MESSAGE", message: "Invalid message." };
        send(ws, reqId ? { ...bad, reqId } : bad);
        return;
      }

      send(ws, handleClientMessage(msg, defaults));
    });

    ws.on("close", () => {
      sockets.delete(ws);
    });

    ws.on("error", (err) => {
      console.error("WS connection error", err);
    });
  });

  const address = wss.address();
  const port = typeof address === "string" ? opts.port : address.port;

  return {
    port,
    close: async () => {
      for (const ws of sockets) ws.close();
      await new Promise<void>((resolve, reject) =>
        wss.close((err) => (err ? reject(err) : resolve()))
      );
    },
  };
}
