import {
  DEFAULT_INTERIM_THRESHOLD_BYTES,
  DEFAULT_MIN_AUDIO_MS,
  DEFAULT_SAMPLE_RATE_HZ,
  DEFAULT_TARGET_LANGUAGES,
  DEFAULT_TRANSLATION_PAIRS,
  type StreamingTuning,
} from "@parley/shared";
import { ConfigError } from "./errors.js";

export type OpenAiConfig = {
  apiKey: string;
  baseUrl: string;
  transcriptionModel: string;
  translateModel: string;
  /**
   * Per request, including reading a streamed response.
   */
  timeoutMs: number;
};

export type ServerConfig = {
  port: number;
  openai: OpenAiConfig;
  supportedTargetLanguages: string[];
  translationPairs: string[];
  tuning: StreamingTuning;
  /**
   * Rate assumed for headerless PCM16 chunks.
   */
  rawPcmSampleRateHz: number;
  maxChunkBytes: number;
  workerConcurrency: number;
  /**
   * Upper bound on one decode/transcribe/translate job before it counts as failed.
   */
  processingTimeoutMs: number;
};

const DEFAULT_PORT = 8765;
const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";
const DEFAULT_TRANSLATE_MODEL = "gpt-4o-mini";
const DEFAULT_MAX_CHUNK_BYTES = 1024 * 1024;
const DEFAULT_WORKER_CONCURRENCY = 4;
const DEFAULT_OPENAI_TIMEOUT_MS = 30_000;
const DEFAULT_PROCESSING_TIMEOUT_MS = 60_000;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError("Missing OpenAI config. Set OPENAI_API_KEY.");
  }

  const sampleRateHz = positiveInt(env, "SAMPLE_RATE_HZ", DEFAULT_SAMPLE_RATE_HZ);

  return {
    port: positiveInt(env, "PORT", DEFAULT_PORT),
    openai: {
      apiKey,
      baseUrl: (env.OPENAI_BASE_URL?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, ""),
      transcriptionModel: env.OPENAI_TRANSCRIPTION_MODEL?.trim() || DEFAULT_TRANSCRIPTION_MODEL,
      translateModel: env.OPENAI_TRANSLATE_MODEL?.trim() || DEFAULT_TRANSLATE_MODEL,
      timeoutMs: positiveInt(env, "OPENAI_TIMEOUT_MS", DEFAULT_OPENAI_TIMEOUT_MS),
    },
    supportedTargetLanguages: withFallback(
      splitList(env.SUPPORTED_TARGET_LANGUAGES).map((l) => l.toLowerCase()),
      [...DEFAULT_TARGET_LANGUAGES],
    ),
    translationPairs: withFallback(
      splitList(env.TRANSLATION_PAIRS).map((p) => parsePair(p)),
      [...DEFAULT_TRANSLATION_PAIRS],
    ),
    tuning: {
      interimThresholdBytes: positiveInt(env, "INTERIM_THRESHOLD_BYTES", DEFAULT_INTERIM_THRESHOLD_BYTES),
      minAudioMs: positiveInt(env, "MIN_AUDIO_MS", DEFAULT_MIN_AUDIO_MS),
      sampleRateHz,
    },
    rawPcmSampleRateHz: positiveInt(env, "RAW_PCM_SAMPLE_RATE_HZ", sampleRateHz),
    maxChunkBytes: positiveInt(env, "MAX_CHUNK_BYTES", DEFAULT_MAX_CHUNK_BYTES),
    workerConcurrency: positiveInt(env, "WORKER_CONCURRENCY", DEFAULT_WORKER_CONCURRENCY),
    processingTimeoutMs: positiveInt(env, "PROCESSING_TIMEOUT_MS", DEFAULT_PROCESSING_TIMEOUT_MS),
  };
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer (got "${raw}").`);
  }
  return value;
}

function parsePair(raw: string): string {
  const match = /^([a-z]{2,8})-([a-z]{2,8})$/.exec(raw.toLowerCase());
  if (!match) {
    throw new ConfigError(`TRANSLATION_PAIRS entries look like "en-ar" (got "${raw}").`);
  }
  return `${match[1]}-${match[2]}`;
}

function splitList(raw?: string): string[] {
  if (!raw) return [];
  return raw
    .split(/[,\s]+/g)
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function withFallback(list: string[], fallback: string[]) {
  return list.length > 0 ? list : fallback;
}
