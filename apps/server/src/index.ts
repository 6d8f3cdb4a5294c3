import dotenv from "dotenv";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

import { createApp } from "./app.js";
import { PcmChunkDecoder } from "./audio/chunkDecoder.js";
import { loadServerConfig } from "./config.js";
import { OpenAiTranscriber } from "./stt/openaiAudioTranscribe.js";
import { OpenAiTranslator } from "./translate/openaiTranslate.js";
import { errorMessage } from "./errors.js";
import { logger } from "./util/log.js";

// Load environment variables from `.env` files if present.
// Order matters: `apps/server/.env` first, then repo root `.env`.
// Already-set variables are never overridden.
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const serverEnvPath = resolve(__dirname, "../.env");
const repoRootEnvPath = resolve(__dirname, "../../../.env");
if (existsSync(serverEnvPath)) {
  dotenv.config({ path: serverEnvPath });
}
if (existsSync(repoRootEnvPath)) {
  dotenv.config({ path: repoRootEnvPath });
}

const config = loadServerConfig();

// Collaborators are built once and shared read-only by every session.
const app = createApp({
  config,
  services: {
    decoder: new PcmChunkDecoder({
      sampleRateHz: config.tuning.sampleRateHz,
      rawSampleRateHz: config.rawPcmSampleRateHz,
    }),
    transcriber: new OpenAiTranscriber(config.openai, config.tuning.sampleRateHz),
    translator: new OpenAiTranslator(config.openai, config.translationPairs),
  },
});

app.server.listen(config.port, () => {
  logger.info(`Server listening on http://localhost:${config.port} (WS + /health + /languages)`, {
    targets: config.supportedTargetLanguages,
    pairs: config.translationPairs,
    interimThresholdBytes: config.tuning.interimThresholdBytes,
    workerConcurrency: config.workerConcurrency,
  });
});

function shutdown(signal: string) {
  logger.info("Shutting down", { signal });
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error("Shutdown failed", { error: errorMessage(err) });
      process.exit(1);
    },
  );
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
