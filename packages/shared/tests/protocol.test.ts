import { describe, expect, it } from "vitest";
import {
  languageName,
  minSampleCount,
  pairKey,
  safeParseClientMessage,
  safeParseServerMessage,
  DEFAULT_STREAMING_TUNING,
} from "../src/index.js";

describe("client messages", () => {
  it("normalises language codes in config", () => {
    const parsed = safeParseClientMessage({ type: "config", source_language: " EN ", target_language: "AR" });
    expect(parsed.success && parsed.data).toEqual({ type: "config", source_language: "en", target_language: "ar" });
  });

  it("allows the source language to be omitted or null", () => {
    expect(safeParseClientMessage({ type: "config", target_language: "ar" }).success).toBe(true);
    expect(safeParseClientMessage({ type: "config", source_language: null, target_language: "ar" }).success).toBe(true);
  });

  it("accepts any chunk encoding string but requires data", () => {
    expect(safeParseClientMessage({ type: "chunk", encoding: "hex", data: "00" }).success).toBe(true);
    expect(safeParseClientMessage({ type: "chunk", encoding: "base64" }).success).toBe(false);
  });

  it("rejects unknown types and malformed language codes", () => {
    expect(safeParseClientMessage({ type: "pause" }).success).toBe(false);
    expect(safeParseClientMessage({ type: "config", target_language: "a" }).success).toBe(false);
  });
});

describe("server messages", () => {
  it("accepts a final with and without translation_skipped", () => {
    const base = {
      type: "final",
      original_text: "hi",
      translated_text: "hi",
      detected_language: "en",
      target_language: "en",
    };
    expect(safeParseServerMessage(base).success).toBe(true);
    expect(safeParseServerMessage({ ...base, translation_skipped: true }).success).toBe(true);
  });

  it("rejects unknown error codes", () => {
    expect(safeParseServerMessage({ type: "error", detail: "x", code: "teapot" }).success).toBe(false);
  });
});

describe("streaming helpers", () => {
  it("derives the minimum sample count from duration and rate", () => {
    expect(minSampleCount(DEFAULT_STREAMING_TUNING)).toBe(8000);
    expect(minSampleCount({ minAudioMs: 250, sampleRateHz: 22_050 })).toBe(5513);
  });

  it("names languages and pairs", () => {
    expect(languageName("ar")).toBe("Arabic");
    expect(languageName("xx")).toBe("xx");
    expect(pairKey("en", "ar")).toBe("en-ar");
  });
});
