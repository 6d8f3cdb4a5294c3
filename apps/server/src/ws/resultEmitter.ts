import { safeParseServerMessage, type ServerToClientMessage } from "@parley/shared";
import { createLogger, type Logger } from "../util/log.js";

export type SendFn = (msg: ServerToClientMessage) => void;

/**
 * A place in the session's output order. Filling it with `null` means the
 * triggering input produced nothing to send.
 */
export type EmitSlot = {
  fill: (msg: ServerToClientMessage | null) => void;
};

export type ResultEmitter = {
  reserve: () => EmitSlot;
  emit: (msg: ServerToClientMessage) => void;
  /**
   * Drop pending and future output. Used once the client is gone.
   */
  detach: () => void;
  readonly pending: number;
};

type SlotState = { filled: boolean; msg: ServerToClientMessage | null };

/**
 * Per-session ordered channel. Workers never write to the socket directly:
 * a slot is reserved when its input arrives (or its job is submitted) and a
 * filled slot goes out only after every earlier slot has gone out.
 */
export function createResultEmitter(args: { sessionId: string; send: SendFn; logger?: Logger }): ResultEmitter {
  const log = args.logger ?? createLogger("emitter");
  const queue: SlotState[] = [];
  let detached = false;

  function flushReady() {
    while (queue.length > 0 && queue[0]?.filled) {
      const head = queue.shift();
      if (!head?.msg || detached) continue;
      const parsed = safeParseServerMessage(head.msg);
      if (!parsed.success) {
        log.error("Dropping message that does not match the protocol", {
          sessionId: args.sessionId,
          type: head.msg.type,
        });
        continue;
      }
      try {
        args.send(parsed.data);
      } catch (err) {
        log.warn("Send failed", {
          sessionId: args.sessionId,
          type: head.msg.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  function reserve(): EmitSlot {
    const state: SlotState = { filled: false, msg: null };
    if (!detached) queue.push(state);
    return {
      fill(msg) {
        if (state.filled) return;
        state.filled = true;
        state.msg = msg;
        flushReady();
      },
    };
  }

  return {
    reserve,
    emit(msg) {
      reserve().fill(msg);
    },
    detach() {
      detached = true;
      queue.length = 0;
    },
    get pending() {
      return queue.length;
    },
  };
}
