import type { LangCode, Transcriber, Transcription } from "@parley/shared";
import type { OpenAiConfig } from "../config.js";
import { float32ToPcm16, pcm16MonoToWavBytes } from "../audio/wav.js";
import { isTimeoutError } from "../errors.js";
import { cleanTranscription, normalizeDetectedLanguage } from "./transcriptText.js";

type TranscribeResult = { text: string; language?: string };

type TranscriptionResponse = { text?: unknown; language?: unknown };

export class OpenAiTranscriber implements Transcriber {
  // Some transcription models reject `response_format: "verbose_json"`.
  // We optimistically request verbose metadata, then fall back per model.
  private readonly verboseJsonSupportByModel = new Map<string, boolean>();

  constructor(
    private readonly config: OpenAiConfig,
    private readonly sampleRateHz: number,
  ) {}

  async transcribe(samples: Float32Array, opts: { languageHint?: LangCode }): Promise<Transcription> {
    const wavBytes = pcm16MonoToWavBytes({ pcm16: float32ToPcm16(samples), sampleRateHz: this.sampleRateHz });
    let result: TranscribeResult;
    try {
      result = await this.transcribeWav({ wavBytes, language: opts.languageHint });
    } catch (err) {
      if (isTimeoutError(err)) {
        throw new Error(`OpenAI audio transcription timed out after ${this.config.timeoutMs} ms.`);
      }
      throw err;
    }
    return {
      text: cleanTranscription(result.text),
      detectedLanguage: normalizeDetectedLanguage(result.language, opts.languageHint),
    };
  }

  private async transcribeWav(args: { wavBytes: Uint8Array; language?: string }): Promise<TranscribeResult> {
    const model = this.config.transcriptionModel;
    const canTryVerbose = this.verboseJsonSupportByModel.get(model) ?? true;

    // 1) Prefer verbose_json (text + language) when supported.
    if (canTryVerbose) {
      const res = await this.doRequest({ ...args, responseFormat: "verbose_json" });
      if (res.ok) {
        const json = (await res.json()) as TranscriptionResponse;
        this.verboseJsonSupportByModel.set(model, true);
        return {
          text: typeof json.text === "string" ? json.text : "",
          language: typeof json.language === "string" && json.language.length > 0 ? json.language : undefined,
        };
      }

      const body = await safeReadText(res);
      if (
        res.status === 400 &&
        (body.includes("response_format 'verbose_json'") ||
          body.includes("not compatible with model") ||
          body.includes("\"param\": \"response_format\""))
      ) {
        this.verboseJsonSupportByModel.set(model, false);
      } else {
        throw new Error(`OpenAI audio transcription failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`);
      }
    }

    // 2) Fallback: plain `json`, which carries no language.
    const res = await this.doRequest({ ...args, responseFormat: "json" });
    if (!res.ok) {
      const body = await safeReadText(res);
      throw new Error(`OpenAI audio transcription failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`);
    }
    const contentType = res.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      const json = (await res.json()) as TranscriptionResponse;
      return { text: typeof json.text === "string" ? json.text : "" };
    }
    return { text: await res.text() };
  }

  private async doRequest(args: { wavBytes: Uint8Array; language?: string; responseFormat: string }) {
    const form = new FormData();
    form.append("file", new Blob([args.wavBytes], { type: "audio/wav" }), "audio.wav");
    form.append("model", this.config.transcriptionModel);
    form.append("response_format", args.responseFormat);
    if (args.language) form.append("language", args.language);

    return fetch(`${this.config.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      body: form,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
  }
}

async function safeReadText(res: Response) {
  try {
    return await res.text();
  } catch {
    return "";
  }
}
