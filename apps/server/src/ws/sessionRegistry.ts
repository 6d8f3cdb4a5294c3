import WebSocket from "ws";
import { errorMessage } from "../errors.js";
import type { ProcessingDispatcher } from "../processing/dispatcher.js";
import { StreamingSession, type SessionOptions } from "../session/streamingSession.js";
import { newSessionId } from "../util/id.js";
import { createLogger, type Logger } from "../util/log.js";
import { createResultEmitter } from "./resultEmitter.js";
import type { InboundItem, SessionHandle } from "./types.js";

type SessionInternal = SessionHandle & {
  _queue: InboundItem[];
  _draining: boolean;
};

export type SessionRegistry = {
  createSession: (socket: WebSocket) => SessionHandle;
  stopAndDelete: (sessionId: string, reason?: string) => void;
  stopAll: (reason?: string) => void;
  size: () => number;
};

export function createSessionRegistry(args: {
  dispatcher: ProcessingDispatcher;
  options: SessionOptions;
  logger?: Logger;
}): SessionRegistry {
  const log = args.logger ?? createLogger("sessions");
  const sessions = new Map<string, SessionInternal>();

  // One consumer per session: messages are handled strictly in arrival order.
  async function drain(entry: SessionInternal) {
    if (entry._draining) return;
    entry._draining = true;
    try {
      while (entry._queue.length > 0 && entry.session.status !== "closed") {
        const item = entry._queue.shift();
        if (!item) continue;
        if (item.kind === "rejected") {
          entry.emitter.emit(item.error);
          continue;
        }
        try {
          await entry.session.handle(item.msg);
        } catch (err) {
          log.error("Message handler failed", { sessionId: entry.id, type: item.msg.type, error: errorMessage(err) });
        }
      }
    } finally {
      entry._draining = false;
    }

    if (entry.session.status === "closed") {
      stopAndDelete(entry.id, "client_close");
    }
  }

  function send(entry: SessionInternal, payload: string) {
    const socket = entry.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return;
    socket.send(payload, (err) => {
      if (err) log.warn("Socket send failed", { sessionId: entry.id, error: err.message });
    });
  }

  function createSession(socket: WebSocket): SessionHandle {
    const id = newSessionId();
    const emitter = createResultEmitter({
      sessionId: id,
      send: (msg) => send(entry, JSON.stringify(msg)),
      logger: log.child("emitter"),
    });
    const session = new StreamingSession({
      id,
      dispatcher: args.dispatcher,
      emitter,
      options: args.options,
      logger: log.child("session"),
    });

    const entry: SessionInternal = {
      id,
      session,
      socket,
      emitter,
      _queue: [],
      _draining: false,
      enqueue(item: InboundItem) {
        if (session.status === "closed") return;
        entry._queue.push(item);
        void drain(entry);
      },
      stop(reason?: string) {
        session.close();
        entry._queue.length = 0;

        const current = entry.socket;
        entry.socket = null;
        if (current && current.readyState === WebSocket.OPEN) {
          current.close(1000, reason);
        }
      },
    };

    sessions.set(id, entry);
    log.info("Session opened", { sessionId: id, activeSessions: sessions.size });
    return entry;
  }

  function stopAndDelete(sessionId: string, reason?: string) {
    const entry = sessions.get(sessionId);
    if (!entry) return;
    entry.stop(reason);
    sessions.delete(sessionId);
    log.info("Session removed", { sessionId, reason, activeSessions: sessions.size });
  }

  function stopAll(reason?: string) {
    for (const id of [...sessions.keys()]) stopAndDelete(id, reason);
  }

  return {
    createSession,
    stopAndDelete,
    stopAll,
    size: () => sessions.size,
  };
}
