import { UnsupportedPairError, languageName, pairKey, type LangCode, type Translator } from "@parley/shared";
import type { OpenAiConfig } from "../config.js";
import { isTimeoutError } from "../errors.js";

type ChatCompletionChunk = {
  choices?: Array<{
    delta?: { content?: string | null } | null;
    finish_reason?: string | null;
  }>;
};

function buildTranslateMessages(args: { from: LangCode; to: LangCode; text: string }) {
  return [
    {
      role: "system",
      content:
        `You are a translation engine. Translate from ${languageName(args.from)} to ${languageName(args.to)}. ` +
        "Return only the translated text (no quotes, no commentary). Preserve meaning and tone.",
    },
    { role: "user", content: args.text },
  ] as const;
}

async function safeReadText(res: Response) {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

async function* iterateSseData(res: Response): AsyncGenerator<string, void, void> {
  const body = res.body;
  if (!body) return;

  const reader = body.getReader();
  const decoder = new TextDecoder("utf-8");
  let buf = "";

  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    buf += decoder.decode(value, { stream: true });

    // SSE is line-based. We only need `data:` lines.
    while (true) {
      const nl = buf.indexOf("\n");
      if (nl === -1) break;
      const rawLine = buf.slice(0, nl);
      buf = buf.slice(nl + 1);

      const line = rawLine.trim();
      if (!line.startsWith("data:")) continue;
      const data = line.slice("data:".length).trim();
      if (data.length === 0) continue;
      yield data;
    }
  }
}

/**
 * Chat-completions translator restricted to configured language pairs. Other
 * pairs raise `UnsupportedPairError` without a network call.
 */
export class OpenAiTranslator implements Translator {
  private readonly pairs: ReadonlySet<string>;

  constructor(
    private readonly config: OpenAiConfig,
    translationPairs: readonly string[],
  ) {
    this.pairs = new Set(translationPairs);
  }

  supports(from: LangCode, to: LangCode): boolean {
    return this.pairs.has(pairKey(from, to));
  }

  async translate(args: { text: string; from: LangCode; to: LangCode }): Promise<string> {
    if (!this.supports(args.from, args.to)) {
      throw new UnsupportedPairError(args.from, args.to);
    }
    if (args.text.trim().length === 0 || args.from === args.to) return args.text;

    try {
      return await this.requestTranslation(args);
    } catch (err) {
      if (isTimeoutError(err)) {
        throw new Error(`OpenAI translation timed out after ${this.config.timeoutMs} ms.`);
      }
      throw err;
    }
  }

  private async requestTranslation(args: { text: string; from: LangCode; to: LangCode }): Promise<string> {
    // The signal also bounds reading the event stream.
    const res = await fetch(`${this.config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.config.translateModel,
        stream: true,
        temperature: 0.2,
        messages: buildTranslateMessages(args),
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) {
      const body = await safeReadText(res);
      throw new Error(`OpenAI translation failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`);
    }

    let full = "";
    for await (const data of iterateSseData(res)) {
      if (data === "[DONE]") break;
      let json: ChatCompletionChunk | null = null;
      try {
        json = JSON.parse(data) as ChatCompletionChunk;
      } catch {
        continue;
      }

      const delta = json?.choices?.[0]?.delta?.content;
      if (typeof delta === "string" && delta.length > 0) full += delta;
    }

    // An empty completion is not a translation; keep the source text.
    const translated = full.trim();
    return translated.length > 0 ? translated : args.text;
  }
}
