import type { LangCode } from "./protocol.js";

/**
 * Languages the transcriber may report. Anything else is normalised away.
 */
export const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: "English",
  ar: "Arabic",
  es: "Spanish",
  fr: "French",
  de: "German",
  it: "Italian",
  pt: "Portuguese",
  ru: "Russian",
  ja: "Japanese",
  ko: "Korean",
  zh: "Chinese",
  hi: "Hindi",
};

export const DEFAULT_TARGET_LANGUAGES: readonly LangCode[] = ["en", "ar"];
export const DEFAULT_TRANSLATION_PAIRS: readonly string[] = ["en-ar", "ar-en"];

export function isKnownLanguage(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_NAMES, code);
}

export function languageName(code: LangCode): string {
  return LANGUAGE_NAMES[code] ?? code;
}

export function pairKey(from: LangCode, to: LangCode) {
  return `${from}-${to}`;
}
