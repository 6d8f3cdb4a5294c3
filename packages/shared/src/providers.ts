import type { LangCode } from "./protocol.js";

/**
 * Collaborators consumed by the streaming session engine. Implementations are
 * created once per process and shared by every session, so they must not keep
 * per-request state outside their arguments.
 */

export interface ChunkDecoder {
  /**
   * Decode an opaque audio fragment into mono samples normalised to [-1, 1] at
   * the decoder's fixed sample rate. Resolves to an empty array when nothing
   * usable could be recovered.
   */
  decode(bytes: Uint8Array): Promise<Float32Array>;

  /**
   * Inspect the first bytes of a stream. Returns its framing when they open a
   * container whose header later fragments need; null for headerless audio or
   * when the header is not complete yet.
   */
  probeStream(head: Uint8Array): StreamFraming | null;
}

/**
 * A container header to put in front of fragments cut from later in the same
 * stream, and the byte size of one sample frame (all channels).
 */
export type StreamFraming = {
  header: Uint8Array;
  frameBytes: number;
};

export type Transcription = {
  /**
   * May be empty for silence.
   */
  text: string;
  detectedLanguage: LangCode;
};

export interface Transcriber {
  transcribe(samples: Float32Array, opts: { languageHint?: LangCode }): Promise<Transcription>;
}

export interface Translator {
  /**
   * @throws UnsupportedPairError when no model exists for `from` → `to`.
   */
  translate(args: { text: string; from: LangCode; to: LangCode }): Promise<string>;
}

export class UnsupportedPairError extends Error {
  readonly from: LangCode;
  readonly to: LangCode;

  constructor(from: LangCode, to: LangCode) {
    super(`No translation model for ${from} -> ${to}`);
    this.name = "UnsupportedPairError";
    this.from = from;
    this.to = to;
  }
}

export type ProcessingServices = {
  readonly decoder: ChunkDecoder;
  readonly transcriber: Transcriber;
  readonly translator: Translator;
};
