import {
  UnsupportedPairError,
  type ChunkDecoder,
  type LangCode,
  type ServerToClientMessage,
  type StreamFraming,
  type Transcriber,
  type Transcription,
  type Translator,
} from "@parley/shared";
import { PcmChunkDecoder } from "../src/audio/chunkDecoder.js";
import { ProcessingDispatcher } from "../src/processing/dispatcher.js";
import { WorkerPool } from "../src/processing/workerPool.js";
import { StreamingSession } from "../src/session/streamingSession.js";
import { createResultEmitter } from "../src/ws/resultEmitter.js";

export type Deferred<T = void> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Raw PCM16 little-endian, alternating +/- amplitude.
 */
export function speechBytes(sampleCount: number, amplitude = 8000): Uint8Array {
  const out = new Uint8Array(sampleCount * 2);
  const view = new DataView(out.buffer);
  for (let i = 0; i < sampleCount; i++) {
    view.setInt16(i * 2, i % 2 === 0 ? amplitude : -amplitude, true);
  }
  return out;
}

/**
 * 16-bit stereo WAV with every frame set to the same left/right values.
 */
export function stereoWavBytes(frames: number, left: number, right: number, sampleRateHz = 48_000): Uint8Array {
  const dataSize = frames * 4;
  const out = new Uint8Array(44 + dataSize);
  const view = new DataView(out.buffer);
  const ascii = (at: number, text: string) => {
    for (let i = 0; i < text.length; i++) view.setUint8(at + i, text.charCodeAt(i));
  };
  ascii(0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  ascii(8, "WAVE");
  ascii(12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);
  view.setUint16(22, 2, true);
  view.setUint32(24, sampleRateHz, true);
  view.setUint32(28, sampleRateHz * 4, true);
  view.setUint16(32, 4, true);
  view.setUint16(34, 16, true);
  ascii(36, "data");
  view.setUint32(40, dataSize, true);
  for (let f = 0; f < frames; f++) {
    view.setInt16(44 + f * 4, left, true);
    view.setInt16(46 + f * 4, right, true);
  }
  return out;
}

export function silenceBytes(byteCount: number): Uint8Array {
  return new Uint8Array(byteCount);
}

export function b64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

export function chunk(bytes: Uint8Array) {
  return { type: "chunk", encoding: "base64", data: b64(bytes) } as const;
}

export class CountingDecoder implements ChunkDecoder {
  calls = 0;
  private readonly inner = new PcmChunkDecoder({ sampleRateHz: 16_000, rawSampleRateHz: 16_000 });

  decode(bytes: Uint8Array): Promise<Float32Array> {
    this.calls += 1;
    return this.inner.decode(bytes);
  }

  probeStream(head: Uint8Array): StreamFraming | null {
    return this.inner.probeStream(head);
  }
}

export class FakeTranscriber implements Transcriber {
  readonly calls: Array<{ sampleCount: number; languageHint?: LangCode }> = [];
  active = 0;
  maxActive = 0;
  /**
   * While set, every call waits for it.
   */
  gate: Promise<void> | null = null;

  constructor(
    private readonly respond: (samples: Float32Array) => Transcription = () => ({
      text: "hello world",
      detectedLanguage: "en",
    }),
  ) {}

  async transcribe(samples: Float32Array, opts: { languageHint?: LangCode }): Promise<Transcription> {
    this.calls.push({ sampleCount: samples.length, languageHint: opts.languageHint });
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.gate) await this.gate;
      return this.respond(samples);
    } finally {
      this.active -= 1;
    }
  }
}

export class FakeTranslator implements Translator {
  readonly calls: Array<{ text: string; from: LangCode; to: LangCode }> = [];

  constructor(private readonly pairs: readonly string[] = ["en-ar", "ar-en"]) {}

  async translate(args: { text: string; from: LangCode; to: LangCode }): Promise<string> {
    this.calls.push(args);
    if (!this.pairs.includes(`${args.from}-${args.to}`)) {
      throw new UnsupportedPairError(args.from, args.to);
    }
    return `[${args.to}] ${args.text}`;
  }
}

export type HarnessOptions = {
  interimThresholdBytes?: number;
  minAudioMs?: number;
  concurrency?: number;
  jobTimeoutMs?: number;
  transcriber?: FakeTranscriber;
  translator?: FakeTranslator;
};

/**
 * Defaults: threshold 6400 bytes (3200 samples), minimum 100 ms (1600 samples)
 * at 16 kHz raw PCM16.
 */
export function createDispatcherHarness(opts: HarnessOptions = {}) {
  const decoder = new CountingDecoder();
  const transcriber = opts.transcriber ?? new FakeTranscriber();
  const translator = opts.translator ?? new FakeTranslator();
  const pool = new WorkerPool(opts.concurrency ?? 2);
  const dispatcher = new ProcessingDispatcher({
    services: { decoder, transcriber, translator },
    pool,
    tuning: { minAudioMs: opts.minAudioMs ?? 100, sampleRateHz: 16_000 },
    jobTimeoutMs: opts.jobTimeoutMs ?? 5_000,
  });
  return { decoder, transcriber, translator, pool, dispatcher };
}

export function createSessionHarness(opts: HarnessOptions = {}, id = "sess_test") {
  const deps = createDispatcherHarness(opts);
  return { ...deps, ...attachSession(deps.dispatcher, opts, id) };
}

export function attachSession(dispatcher: ProcessingDispatcher, opts: HarnessOptions = {}, id = "sess_test") {
  const sent: ServerToClientMessage[] = [];
  const emitter = createResultEmitter({ sessionId: id, send: (msg) => sent.push(msg) });
  const session = new StreamingSession({
    id,
    dispatcher,
    emitter,
    options: {
      interimThresholdBytes: opts.interimThresholdBytes ?? 6400,
      maxChunkBytes: 64 * 1024,
      supportedTargetLanguages: ["en", "ar"],
    },
  });
  return { session, sent, emitter };
}

export function ofType<T extends ServerToClientMessage["type"]>(sent: ServerToClientMessage[], type: T) {
  return sent.filter((m): m is Extract<ServerToClientMessage, { type: T }> => m.type === type);
}
