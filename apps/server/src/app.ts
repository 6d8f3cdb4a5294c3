import http from "node:http";
import { languageName, type ProcessingServices } from "@parley/shared";
import type { ServerConfig } from "./config.js";
import { ProcessingDispatcher } from "./processing/dispatcher.js";
import { WorkerPool } from "./processing/workerPool.js";
import { createLogger } from "./util/log.js";
import { createWsServer, type WsServerApi } from "./ws/server.js";

export type AppConfig = Pick<
  ServerConfig,
  "supportedTargetLanguages" | "tuning" | "maxChunkBytes" | "workerConcurrency" | "processingTimeoutMs"
>;

export type App = {
  server: http.Server;
  ws: WsServerApi;
  pool: WorkerPool;
  close: () => Promise<void>;
};

function json(res: http.ServerResponse, status: number, body: unknown) {
  const payload = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(payload));
  res.end(payload);
}

/**
 * HTTP server carrying the streaming WebSocket endpoint plus `/health` and
 * `/languages`. Not listening yet; the caller picks the port.
 */
export function createApp(args: { config: AppConfig; services: ProcessingServices }): App {
  const log = createLogger("app");
  const { config } = args;

  const pool = new WorkerPool(config.workerConcurrency);
  const dispatcher = new ProcessingDispatcher({
    services: args.services,
    pool,
    tuning: config.tuning,
    jobTimeoutMs: config.processingTimeoutMs,
    logger: log.child("dispatcher"),
  });

  const server = http.createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];

    if (req.method === "GET" && path === "/health") {
      json(res, 200, {
        status: "healthy",
        service: "parley-streaming",
        sessions: ws.sessionCount(),
        pool: pool.stats(),
      });
      return;
    }

    if (req.method === "GET" && path === "/languages") {
      json(res, 200, {
        supported_languages: Object.fromEntries(config.supportedTargetLanguages.map((code) => [code, languageName(code)])),
      });
      return;
    }

    res.statusCode = 404;
    res.setHeader("Content-Type", "text/plain; charset=utf-8");
    res.end("Not found");
  });

  const ws = createWsServer({
    server,
    dispatcher,
    options: {
      interimThresholdBytes: config.tuning.interimThresholdBytes,
      maxChunkBytes: config.maxChunkBytes,
      supportedTargetLanguages: config.supportedTargetLanguages,
    },
    logger: log.child("ws"),
  });

  return {
    server,
    ws,
    pool,
    async close() {
      await ws.close();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        // Keep-alive HTTP connections would otherwise hold the close open.
        server.closeAllConnections();
      });
    },
  };
}
