import {
  isKnownLanguage,
  type ClientToServerMessage,
  type ErrorCode,
  type Final,
  type LangCode,
  type ServerError,
  type StreamFraming,
} from "@parley/shared";
import { MalformedInputError, errorMessage } from "../errors.js";
import type { ProcessingDispatcher, ProcessingOutcome, SessionConfig } from "../processing/dispatcher.js";
import { base64ToUint8Array } from "../util/base64.js";
import { createLogger, type Logger } from "../util/log.js";
import type { EmitSlot, ResultEmitter } from "../ws/resultEmitter.js";
import { AudioBuffer } from "./audioBuffer.js";

export type SessionState = "unconfigured" | "configured" | "closed";

export type SessionOptions = {
  interimThresholdBytes: number;
  maxChunkBytes: number;
  supportedTargetLanguages: readonly LangCode[];
};

/**
 * Most recent transcript with text, kept for re-emission when a flush finds
 * nothing new to process.
 */
export type LastResult = {
  text: string;
  detectedLanguage: LangCode;
  translatedText: string;
  translationSkipped: boolean;
  /**
   * Target `translatedText` was produced for.
   */
  targetLanguage: LangCode;
};

/**
 * Per-connection state machine: unconfigured → configured → closed, with
 * `processing` marking the single job this session may have in flight.
 *
 * Messages must be fed through `handle` one at a time (the registry's inbound
 * queue does this); only `flush` suspends.
 */
export class StreamingSession {
  readonly id: string;

  private state: SessionState = "unconfigured";
  private config: SessionConfig | null = null;
  private readonly buffer = new AudioBuffer();
  private processing = false;
  private inFlight: Promise<void> | null = null;
  /**
   * Buffer size at the last too-short attempt; those bytes are not resubmitted
   * until more audio arrives.
   */
  private heldBytes = 0;
  private last: LastResult | null = null;
  /**
   * Set once the stream turns out to be a container (WAV); cleared by flush.
   */
  private framing: StreamFraming | null = null;
  /**
   * True once bytes from the start of the current stream have been drained.
   */
  private streamStarted = false;

  private readonly dispatcher: ProcessingDispatcher;
  private readonly emitter: ResultEmitter;
  private readonly options: SessionOptions;
  private readonly log: Logger;

  constructor(args: {
    id: string;
    dispatcher: ProcessingDispatcher;
    emitter: ResultEmitter;
    options: SessionOptions;
    logger?: Logger;
  }) {
    this.id = args.id;
    this.dispatcher = args.dispatcher;
    this.emitter = args.emitter;
    this.options = args.options;
    this.log = args.logger ?? createLogger("session");
  }

  get status(): SessionState {
    return this.state;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  get configuration(): SessionConfig | null {
    return this.config;
  }

  async handle(msg: ClientToServerMessage): Promise<void> {
    if (this.state === "closed") {
      this.log.debug("Ignoring message for closed session", { sessionId: this.id, type: msg.type });
      return;
    }

    switch (msg.type) {
      case "config":
        this.configure({ sourceLanguage: msg.source_language ?? null, targetLanguage: msg.target_language });
        return;
      case "chunk":
        this.appendChunk(msg.encoding, msg.data);
        return;
      case "flush":
        await this.flush();
        return;
      case "close":
        this.close();
        return;
    }
  }

  configure(next: SessionConfig): void {
    if (this.state === "closed") return;

    if (!this.options.supportedTargetLanguages.includes(next.targetLanguage)) {
      this.sendError(
        "unsupported_language",
        `Unsupported target language "${next.targetLanguage}". Supported: ${this.options.supportedTargetLanguages.join(", ")}.`,
      );
      return;
    }
    if (next.sourceLanguage !== null && !isKnownLanguage(next.sourceLanguage)) {
      this.sendError("unsupported_language", `Unsupported source language "${next.sourceLanguage}".`);
      return;
    }

    const replaced = this.config !== null;
    this.config = { sourceLanguage: next.sourceLanguage, targetLanguage: next.targetLanguage };
    this.state = "configured";
    this.log.info(replaced ? "Session reconfigured" : "Session configured", {
      sessionId: this.id,
      sourceLanguage: next.sourceLanguage,
      targetLanguage: next.targetLanguage,
    });
    this.emitter.emit({
      type: "config_ack",
      config: { source_language: next.sourceLanguage, target_language: next.targetLanguage },
    });
  }

  appendChunk(encoding: string, data: string): void {
    if (this.state === "closed") return;
    if (!this.config) {
      this.sendError("not_configured", "Send a config message before streaming audio.");
      return;
    }

    let bytes: Uint8Array;
    try {
      if (encoding !== "base64") {
        throw new MalformedInputError(`Unsupported chunk encoding "${encoding}"; expected "base64".`);
      }
      bytes = base64ToUint8Array(data);
      if (bytes.length > this.options.maxChunkBytes) {
        throw new MalformedInputError(
          `Chunk of ${bytes.length} bytes exceeds the ${this.options.maxChunkBytes} byte limit.`,
        );
      }
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err;
      this.sendError("malformed_input", err.message);
      return;
    }

    this.buffer.append(bytes);
    this.maybeSubmitInterim();
  }

  /**
   * Waits out any in-flight job, then runs one final pass over whatever is
   * buffered, bypassing the interim threshold. Always ends in a `final`.
   * The flushed utterance ends the stream: later audio may open a new one.
   */
  async flush(): Promise<void> {
    if (this.state === "closed") return;
    if (!this.config) {
      this.sendError("not_configured", "Send a config message before flushing.");
      return;
    }

    while (this.inFlight) await this.inFlight;
    const config = this.config;
    if (this.isClosed()) return;

    this.processing = true;
    const slot = this.emitter.reserve();
    try {
      const buffered = this.buffer.length;
      if (buffered === 0) {
        slot.fill(await this.finalFromLast(config));
        return;
      }

      const { audio } = this.prepareAudio();
      const outcome = await this.dispatcher.submit({ sessionId: this.id, kind: "final", audio, config });
      this.buffer.drain(buffered);
      if (this.isClosed()) {
        slot.fill(null);
        return;
      }

      if (outcome.kind === "transcribed" && outcome.text.trim().length > 0) {
        this.last = {
          text: outcome.text,
          detectedLanguage: outcome.detectedLanguage,
          translatedText: outcome.translatedText,
          translationSkipped: outcome.translationSkipped,
          targetLanguage: config.targetLanguage,
        };
        slot.fill(toFinal(this.last));
        return;
      }

      if (outcome.kind === "failed") {
        const finalSlot = this.emitter.reserve();
        slot.fill(processingError(outcome.reason));
        finalSlot.fill(await this.finalFromLast(config));
        return;
      }

      slot.fill(await this.finalFromLast(config));
    } finally {
      this.resetStream();
      this.processing = false;
      this.maybeSubmitInterim();
    }
  }

  /**
   * Buffered audio is discarded, not flushed. An in-flight job is left to
   * finish; its result goes nowhere.
   */
  close(): void {
    if (this.state === "closed") return;
    this.state = "closed";
    this.log.info("Session closed", {
      sessionId: this.id,
      discardedBytes: this.buffer.length,
      processing: this.processing,
    });
    this.buffer.clear();
    this.resetStream();
    this.emitter.detach();
  }

  private isClosed() {
    return this.state === "closed";
  }

  private maybeSubmitInterim() {
    if (this.state !== "configured" || !this.config || this.processing) return;
    const size = this.buffer.length;
    if (size < this.options.interimThresholdBytes || size <= this.heldBytes) return;

    this.processing = true;
    const { audio, consumed } = this.prepareAudio();
    const config = this.config;
    const slot = this.emitter.reserve();
    this.log.debug("Submitting interim pass", { sessionId: this.id, bytes: audio.length, buffered: size });

    this.inFlight = this.dispatcher
      .submit({ sessionId: this.id, kind: "interim", audio, config })
      .then((outcome) => this.completeInterim({ outcome, consumed, buffered: size, config, slot }))
      .catch((err: unknown) => {
        // completeInterim only touches local state; reaching this is a bug.
        this.processing = false;
        this.inFlight = null;
        slot.fill(null);
        this.log.error("Interim completion failed", { sessionId: this.id, error: errorMessage(err) });
      });
  }

  private completeInterim(args: {
    outcome: ProcessingOutcome;
    /**
     * Buffered bytes the submitted audio accounts for.
     */
    consumed: number;
    /**
     * Buffer size at submission.
     */
    buffered: number;
    config: SessionConfig;
    slot: EmitSlot;
  }) {
    const { outcome, consumed, buffered, config, slot } = args;
    this.processing = false;
    this.inFlight = null;

    if (this.isClosed()) {
      slot.fill(null);
      return;
    }

    switch (outcome.kind) {
      case "too_short":
        this.heldBytes = buffered;
        slot.fill(null);
        break;
      case "no_audio":
        this.drainSubmitted(consumed);
        slot.fill(null);
        break;
      case "failed":
        this.drainSubmitted(consumed);
        slot.fill(processingError(outcome.reason));
        break;
      case "transcribed":
        this.drainSubmitted(consumed);
        if (outcome.text.trim().length === 0) {
          slot.fill(null);
          break;
        }
        this.last = {
          text: outcome.text,
          detectedLanguage: outcome.detectedLanguage,
          translatedText: outcome.translatedText,
          translationSkipped: outcome.translationSkipped,
          targetLanguage: config.targetLanguage,
        };
        slot.fill({
          type: "interim",
          text: outcome.text,
          detected_language: outcome.detectedLanguage,
          translated_text: outcome.translatedText,
        });
        break;
    }

    this.maybeSubmitInterim();
  }

  /**
   * The buffered audio as the decoder should see it. Until the start of a
   * framed stream is drained the bytes go as they are; after that the stream's
   * header is put back in front and the fragment is cut to whole frames, the
   * remainder staying buffered for the next pass.
   */
  private prepareAudio(): { audio: Uint8Array; consumed: number } {
    const bytes = this.buffer.snapshot();
    if (!this.streamStarted && !this.framing) {
      this.framing = this.dispatcher.probeStream(bytes);
    }

    const framing = this.framing;
    if (!framing) return { audio: bytes, consumed: bytes.length };

    if (!this.streamStarted) {
      const body = bytes.length - framing.header.length;
      const consumed = bytes.length - (body % framing.frameBytes);
      return { audio: bytes.subarray(0, consumed), consumed };
    }

    const consumed = bytes.length - (bytes.length % framing.frameBytes);
    const audio = new Uint8Array(framing.header.length + consumed);
    audio.set(framing.header, 0);
    audio.set(bytes.subarray(0, consumed), framing.header.length);
    return { audio, consumed };
  }

  private drainSubmitted(byteCount: number) {
    this.buffer.drain(byteCount);
    this.heldBytes = 0;
    if (byteCount > 0) this.streamStarted = true;
  }

  private resetStream() {
    this.heldBytes = 0;
    this.framing = null;
    this.streamStarted = false;
  }

  /**
   * Final built from the last transcript, re-translated only when the target
   * language changed since it was produced.
   */
  private async finalFromLast(config: SessionConfig): Promise<Final> {
    const last = this.last;
    if (!last) {
      return {
        type: "final",
        original_text: "",
        translated_text: "",
        detected_language: config.sourceLanguage ?? "unknown",
        target_language: config.targetLanguage,
      };
    }
    if (last.targetLanguage === config.targetLanguage) return toFinal(last);

    const outcome = await this.dispatcher.translate({
      sessionId: this.id,
      text: last.text,
      from: last.detectedLanguage,
      to: config.targetLanguage,
    });
    if (outcome.kind === "failed") {
      return { ...toFinal(last), translated_text: last.text, target_language: config.targetLanguage, translation_skipped: true };
    }
    this.last = {
      ...last,
      translatedText: outcome.translatedText,
      translationSkipped: outcome.translationSkipped,
      targetLanguage: config.targetLanguage,
    };
    return toFinal(this.last);
  }

  private sendError(code: ErrorCode, detail: string) {
    this.log.debug("Rejected message", { sessionId: this.id, code, detail });
    this.emitter.emit({ type: "error", code, detail });
  }
}

function toFinal(last: LastResult): Final {
  return {
    type: "final",
    original_text: last.text,
    translated_text: last.translatedText,
    detected_language: last.detectedLanguage,
    target_language: last.targetLanguage,
    translation_skipped: last.translationSkipped,
  };
}

function processingError(reason: string): ServerError {
  return { type: "error", code: "processing_failed", detail: `Processing failed: ${reason}` };
}
