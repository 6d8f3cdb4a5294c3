import type { ClientToServerMessage, ServerError } from "@parley/shared";
import type WebSocket from "ws";
import type { StreamingSession } from "../session/streamingSession.js";
import type { ResultEmitter } from "./resultEmitter.js";

/**
 * Frames that failed to parse still take their turn in the inbound queue, so
 * their error is answered in arrival order.
 */
export type InboundItem =
  | { kind: "message"; msg: ClientToServerMessage }
  | { kind: "rejected"; error: ServerError };

export type SessionHandle = {
  id: string;
  session: StreamingSession;
  socket: WebSocket | null;
  /**
   * All output for this connection, including message-layer errors raised
   * before a message reaches the session.
   */
  emitter: ResultEmitter;
  enqueue: (item: InboundItem) => void;
  stop: (reason?: string) => void;
};
