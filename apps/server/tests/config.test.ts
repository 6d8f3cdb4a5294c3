import { describe, expect, it } from "vitest";
import { loadServerConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadServerConfig", () => {
  it("requires an API key", () => {
    expect(() => loadServerConfig({})).toThrow(new ConfigError("Missing OpenAI config. Set OPENAI_API_KEY."));
  });

  it("fills in defaults", () => {
    expect(loadServerConfig({ OPENAI_API_KEY: "test-secret" })).toEqual({
      port: 8765,
      openai: {
        apiKey: "test-secret",
        baseUrl: "https://api.openai.com/v1",
        transcriptionModel: "whisper-1",
        translateModel: "gpt-4o-mini",
        timeoutMs: 30_000,
      },
      supportedTargetLanguages: ["en", "ar"],
      translationPairs: ["en-ar", "ar-en"],
      tuning: { interimThresholdBytes: 32_768, minAudioMs: 500, sampleRateHz: 16_000 },
      rawPcmSampleRateHz: 16_000,
      maxChunkBytes: 1_048_576,
      workerConcurrency: 4,
      processingTimeoutMs: 60_000,
    });
  });

  it("reads overrides", () => {
    const config = loadServerConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:9000/v1/",
      SUPPORTED_TARGET_LANGUAGES: "EN, ar fr",
      TRANSLATION_PAIRS: "en-fr,FR-EN",
      SAMPLE_RATE_HZ: "8000",
      WORKER_CONCURRENCY: "8",
      OPENAI_TIMEOUT_MS: "1500",
      PROCESSING_TIMEOUT_MS: "4000",
    });

    expect(config.openai.baseUrl).toBe("http://localhost:9000/v1");
    expect(config.supportedTargetLanguages).toEqual(["en", "ar", "fr"]);
    expect(config.translationPairs).toEqual(["en-fr", "fr-en"]);
    expect(config.tuning.sampleRateHz).toBe(8000);
    expect(config.rawPcmSampleRateHz).toBe(8000);
    expect(config.workerConcurrency).toBe(8);
    expect(config.openai.timeoutMs).toBe(1500);
    expect(config.processingTimeoutMs).toBe(4000);
  });

  it("rejects bad numbers and pairs", () => {
    expect(() => loadServerConfig({ OPENAI_API_KEY: "test-secret", WORKER_CONCURRENCY: "0" })).toThrow(
      'WORKER_CONCURRENCY must be a positive integer (got "0").',
    );
    expect(() => loadServerConfig({ OPENAI_API_KEY: "test-secret", TRANSLATION_PAIRS: "english" })).toThrow(
      'TRANSLATION_PAIRS entries look like "en-ar" (got "english").',
    );
  });
});
