import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { timingSafeEqual } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import { config } from "../config.js";
import { logRest, requestLogger } from "../logging.js";
import type { MarketDataManager } from "../market-data/manager.js";
import { closeWebSocket, initWebSocket, wsBroadcast } from "../ws/server.js";
import { createRouter, errorHandler } from "./routes.js";

function apiKeyAuth(req: Request, res: Response, next: NextFunction): void {
  const key = config.rest.apiKey;
  if (!key) {
    next();
    return;
  }
  const header = req.headers["x-api-key"];
  const provided =
    (typeof header === "string" ? header : undefined) ??
    req.headers.authorization?.replace(/^Bearer\s+/i, "");
  const providedBuffer = Buffer.from(provided ?? "");
  const keyBuffer = Buffer.from(key);

  if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
    next();
  } else {
    res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
  }
}

// Keyed by API key so every caller behind one proxy does not share a bucket
const globalLimiter = rateLimit({
  windowMs: 60_000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request): string => {
    const header = req.headers["x-api-key"];
    return typeof header === "string" ? header : "anonymous";
  },
  message: { error: "Rate limit exceeded — 300 requests/minute" },
  validate: { ip: false },
});

export function createApp(manager: MarketDataManager): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", mode: manager.mode, streaming: manager.isStreaming });
  });

  app.use("/api", globalLimiter, apiKeyAuth, createRouter(manager));
  app.use(errorHandler);
  return app;
}

/**
 * Listen on the configured port, attach the WebSocket fan-out and forward
 * every stored quote to the `quotes` channel.
 */
export function startRestServer(manager: MarketDataManager, port = config.rest.port): HttpServer {
  const app = createApp(manager);
  const server = app.listen(port, () => {
    logRest.info({ port }, `REST server listening on http://localhost:${port}`);
  });

  initWebSocket(server);
  const unsubscribe = manager.streamIngestor.onQuote((quote) => wsBroadcast("quotes", quote));
  server.on("close", () => {
    unsubscribe();
    closeWebSocket();
  });
  return server;
}
