import {
  UnsupportedPairError,
  minSampleCount,
  type LangCode,
  type ProcessingServices,
  type StreamFraming,
  type StreamingTuning,
} from "@parley/shared";
import { errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../util/log.js";
import type { WorkerPool } from "./workerPool.js";

export type JobKind = "interim" | "final";

export type SessionConfig = {
  sourceLanguage: LangCode | null;
  targetLanguage: LangCode;
};

export type ProcessingJob = {
  sessionId: string;
  kind: JobKind;
  audio: Uint8Array;
  config: SessionConfig;
};

export type TranslationResult = {
  translatedText: string;
  /**
   * True when no model exists for the pair and `translatedText` is the original.
   */
  translationSkipped: boolean;
};

export type ProcessingOutcome =
  | { kind: "no_audio" }
  | { kind: "too_short"; sampleCount: number }
  | ({ kind: "transcribed"; text: string; detectedLanguage: LangCode } & TranslationResult)
  | { kind: "failed"; reason: string };

export type TranslateOutcome =
  | ({ kind: "translated" } & TranslationResult)
  | { kind: "failed"; reason: string };

/**
 * Runs decode → transcribe → translate on the shared worker pool.
 *
 * Collaborator exceptions are converted to outcomes here; the promises this
 * class returns never reject. A job that outlives `jobTimeoutMs` fails and
 * gives its pool slot back; whatever it was waiting on is abandoned.
 */
export class ProcessingDispatcher {
  private readonly services: ProcessingServices;
  private readonly pool: WorkerPool;
  private readonly minSamples: number;
  private readonly jobTimeoutMs: number;
  private readonly log: Logger;

  constructor(args: {
    services: ProcessingServices;
    pool: WorkerPool;
    tuning: Pick<StreamingTuning, "minAudioMs" | "sampleRateHz">;
    jobTimeoutMs: number;
    logger?: Logger;
  }) {
    this.services = args.services;
    this.pool = args.pool;
    this.minSamples = minSampleCount(args.tuning);
    this.jobTimeoutMs = args.jobTimeoutMs;
    this.log = args.logger ?? createLogger("dispatcher");
  }

  submit(job: ProcessingJob): Promise<ProcessingOutcome> {
    return this.pool
      .run(() => withDeadline(this.process(job), this.jobTimeoutMs))
      .catch((err: unknown): ProcessingOutcome => {
        this.log.warn("Processing job failed", {
          sessionId: job.sessionId,
          kind: job.kind,
          bytes: job.audio.length,
          error: errorMessage(err),
        });
        return { kind: "failed", reason: errorMessage(err) };
      });
  }

  /**
   * Translation alone, for re-targeting an earlier transcript.
   */
  translate(args: { sessionId: string; text: string; from: LangCode; to: LangCode }): Promise<TranslateOutcome> {
    return this.pool
      .run(async (): Promise<TranslateOutcome> => ({
        kind: "translated",
        ...(await withDeadline(this.translateText(args), this.jobTimeoutMs)),
      }))
      .catch((err: unknown): TranslateOutcome => {
        this.log.warn("Translation failed", { sessionId: args.sessionId, error: errorMessage(err) });
        return { kind: "failed", reason: errorMessage(err) };
      });
  }

  probeStream(head: Uint8Array): StreamFraming | null {
    return this.services.decoder.probeStream(head);
  }

  private async process(job: ProcessingJob): Promise<ProcessingOutcome> {
    const samples = await this.services.decoder.decode(job.audio);
    if (samples.length === 0 || isDigitalSilence(samples)) {
      this.log.debug("No usable audio", { sessionId: job.sessionId, kind: job.kind, bytes: job.audio.length });
      return { kind: "no_audio" };
    }

    if (samples.length < this.minSamples) {
      this.log.debug("Audio below minimum duration", {
        sessionId: job.sessionId,
        kind: job.kind,
        samples: samples.length,
        minSamples: this.minSamples,
      });
      return { kind: "too_short", sampleCount: samples.length };
    }

    const { text, detectedLanguage } = await this.services.transcriber.transcribe(samples, {
      languageHint: job.config.sourceLanguage ?? undefined,
    });

    const translation = await this.translateText({
      sessionId: job.sessionId,
      text,
      from: detectedLanguage,
      to: job.config.targetLanguage,
    });

    return { kind: "transcribed", text, detectedLanguage, ...translation };
  }

  private async translateText(args: {
    sessionId: string;
    text: string;
    from: LangCode;
    to: LangCode;
  }): Promise<TranslationResult> {
    if (args.from === args.to || args.text.trim().length === 0) {
      return { translatedText: args.text, translationSkipped: false };
    }
    try {
      const translatedText = await this.services.translator.translate({
        text: args.text,
        from: args.from,
        to: args.to,
      });
      return { translatedText, translationSkipped: false };
    } catch (err) {
      if (err instanceof UnsupportedPairError) {
        this.log.info("Translation pair unsupported; returning original text", {
          sessionId: args.sessionId,
          from: err.from,
          to: err.to,
        });
        return { translatedText: args.text, translationSkipped: true };
      }
      throw err;
    }
  }
}

function withDeadline<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Processing timed out after ${ms} ms.`)), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

function isDigitalSilence(samples: Float32Array) {
  for (let i = 0; i < samples.length; i++) {
    if (samples[i] !== 0) return false;
  }
  return true;
}
