import { afterEach, describe, expect, it, vi } from "vitest";
import { UnsupportedPairError } from "@parley/shared";
import type { OpenAiConfig } from "../src/config.js";
import { OpenAiTranslator } from "../src/translate/openaiTranslate.js";

const config: OpenAiConfig = {
  apiKey: "test-secret",
  baseUrl: "http://openai.test/v1",
  transcriptionModel: "whisper-1",
  translateModel: "gpt-4o-mini",
  timeoutMs: 1_000,
};

function sse(...deltas: string[]) {
  const lines = deltas.map((d) => `data: ${JSON.stringify({ choices: [{ delta: { content: d } }] })}\n\n`);
  return new Response(`${lines.join("")}data: [DONE]\n\n`, { status: 200 });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn<(...args: Parameters<typeof fetch>) => Promise<Response>>();
  fetchMock.mockResolvedValue(response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function stubHangingFetch() {
  const fetchMock = vi.fn<(...args: Parameters<typeof fetch>) => Promise<Response>>();
  fetchMock.mockImplementation(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (signal) signal.addEventListener("abort", () => reject(signal.reason));
      }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAiTranslator", () => {
  const translator = new OpenAiTranslator(config, ["en-ar", "ar-en"]);

  it("streams a chat completion and joins the deltas", async () => {
    const fetchMock = stubFetch(sse("مر", "حبا", " "));

    await expect(translator.translate({ text: "hello", from: "en", to: "ar" })).resolves.toBe("مرحبا");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://openai.test/v1/chat/completions");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-secret", "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "gpt-4o-mini",
      stream: true,
      messages: [
        { role: "system", content: expect.stringContaining("Translate from English to Arabic.") },
        { role: "user", content: "hello" },
      ],
    });
  });

  it("keeps the source text when the completion is empty", async () => {
    stubFetch(sse());
    await expect(translator.translate({ text: "hello", from: "en", to: "ar" })).resolves.toBe("hello");
  });

  it("throws UnsupportedPairError without calling the API", async () => {
    const fetchMock = stubFetch(sse("x"));

    await expect(translator.translate({ text: "bonjour", from: "fr", to: "ar" })).rejects.toBeInstanceOf(
      UnsupportedPairError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("gives up on a request that does not answer in time", async () => {
    stubHangingFetch();
    const impatient = new OpenAiTranslator({ ...config, timeoutMs: 30 }, ["en-ar"]);

    await expect(impatient.translate({ text: "hello", from: "en", to: "ar" })).rejects.toThrow(
      "OpenAI translation timed out after 30 ms.",
    );
  });

  it("reports HTTP failures with the response body", async () => {
    stubFetch(new Response("quota exceeded", { status: 429, statusText: "Too Many Requests" }));

    await expect(translator.translate({ text: "hello", from: "en", to: "ar" })).rejects.toThrow(
      "OpenAI translation failed: 429 Too Many Requests - quota exceeded",
    );
  });
});
