import { LANGUAGE_NAMES, isKnownLanguage, type LangCode } from "@parley/shared";

const FALLBACK_LANGUAGE: LangCode = "en";

const CODE_BY_NAME = new Map<string, LangCode>(
  Object.entries(LANGUAGE_NAMES).map(([code, name]) => [name.toLowerCase(), code]),
);

/**
 * Whisper-style output sometimes carries runs of "/" separators and stray
 * spacing before punctuation.
 */
export function cleanTranscription(text: string): string {
  if (!text) return text;
  return text
    .replace(/(\s*\/\s*){2,}/g, " ")
    .replace(/\s+/g, " ")
    .replace(/\s+([.,!?;:])/g, "$1")
    .trim();
}

/**
 * Map whatever the engine reported (ISO code, BCP-47 tag or English name) to
 * one of the recognised ISO-639-1 codes.
 */
export function normalizeDetectedLanguage(reported: string | undefined, hint?: LangCode): LangCode {
  const raw = reported?.trim().toLowerCase();
  if (raw) {
    const primary = raw.split(/[-_]/)[0] ?? raw;
    if (isKnownLanguage(primary)) return primary;
    const byName = CODE_BY_NAME.get(raw);
    if (byName) return byName;
  }
  if (hint && isKnownLanguage(hint)) return hint;
  return FALLBACK_LANGUAGE;
}
