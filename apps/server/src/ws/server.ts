import type http from "node:http";
import WebSocket, { WebSocketServer } from "ws";
import { safeParseClientMessage, type ErrorCode } from "@parley/shared";
import type { ProcessingDispatcher } from "../processing/dispatcher.js";
import type { SessionOptions } from "../session/streamingSession.js";
import { createLogger, type Logger } from "../util/log.js";
import { createSessionRegistry } from "./sessionRegistry.js";
import type { InboundItem } from "./types.js";

function safeJsonParse(input: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(input) as unknown };
  } catch {
    return { ok: false };
  }
}

function toText(data: WebSocket.RawData): string | null {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return null;
}

function rejected(code: ErrorCode, detail: string): InboundItem {
  return { kind: "rejected", error: { type: "error", code, detail } };
}

export type WsServerApi = {
  sessionCount: () => number;
  /**
   * Stop every session and the WebSocket server. The HTTP server is left to
   * the caller.
   */
  close: () => Promise<void>;
};

export function createWsServer(args: {
  server: http.Server;
  dispatcher: ProcessingDispatcher;
  options: SessionOptions;
  path?: string;
  logger?: Logger;
}): WsServerApi {
  const log = args.logger ?? createLogger("ws");
  // Frames up to four times the encoded chunk limit still get parsed, so an
  // oversize chunk is answered with `malformed_input` instead of a 1009 close.
  const maxPayload = 4 * Math.ceil((args.options.maxChunkBytes * 4) / 3) + 64 * 1024;
  const wss = new WebSocketServer({ server: args.server, path: args.path, maxPayload });

  const registry = createSessionRegistry({
    dispatcher: args.dispatcher,
    options: args.options,
    logger: log.child("sessions"),
  });

  wss.on("connection", (socket) => {
    const handle = registry.createSession(socket);

    socket.on("message", (data) => {
      const text = toText(data);
      if (text === null) {
        handle.enqueue(rejected("invalid_message", "Unsupported WebSocket message encoding."));
        return;
      }

      const parsedJson = safeJsonParse(text);
      if (!parsedJson.ok) {
        handle.enqueue(rejected("invalid_json", "Message must be valid JSON."));
        return;
      }

      const parsedMsg = safeParseClientMessage(parsedJson.value);
      if (!parsedMsg.success) {
        handle.enqueue(rejected("invalid_message", "Message does not match protocol schema."));
        return;
      }

      handle.enqueue({ kind: "message", msg: parsedMsg.data });
    });

    socket.on("close", () => {
      registry.stopAndDelete(handle.id, "disconnected");
    });

    socket.on("error", (err) => {
      log.warn("Socket error", { sessionId: handle.id, error: err.message });
      registry.stopAndDelete(handle.id, "socket_error");
    });
  });

  return {
    sessionCount: () => registry.size(),
    close() {
      registry.stopAll("server_shutdown");
      return new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
