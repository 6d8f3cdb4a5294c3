import { describe, expect, it } from "vitest";
import { cleanTranscription, normalizeDetectedLanguage } from "../src/stt/transcriptText.js";

describe("cleanTranscription", () => {
  it("collapses separator runs and spacing before punctuation", () => {
    expect(cleanTranscription("hello / / world  ,  there !")).toBe("hello world, there!");
  });

  it("keeps a single slash", () => {
    expect(cleanTranscription(" and/or ")).toBe("and/or");
  });

  it("leaves empty text alone", () => {
    expect(cleanTranscription("")).toBe("");
  });
});

describe("normalizeDetectedLanguage", () => {
  it("reduces region tags to the primary code", () => {
    expect(normalizeDetectedLanguage("en-US")).toBe("en");
  });

  it("maps English language names", () => {
    expect(normalizeDetectedLanguage("Arabic")).toBe("ar");
  });

  it("falls back to a known hint, then to English", () => {
    expect(normalizeDetectedLanguage("klingon", "ar")).toBe("ar");
    expect(normalizeDetectedLanguage(undefined)).toBe("en");
    expect(normalizeDetectedLanguage("zz", "xx")).toBe("en");
  });
});
