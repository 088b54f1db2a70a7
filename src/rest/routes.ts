import { Router, type NextFunction, type Request, type Response } from "express";
import { z, ZodError } from "zod";
import { ConfigurationError, StorageError } from "../errors.js";
import { logRest } from "../logging.js";
import type { MarketDataManager } from "../market-data/manager.js";
import { wsBroadcast } from "../ws/server.js";

const SymbolBody = z.object({
  symbol: z.string().trim().min(1, "symbol is required"),
});

const IntervalBody = z.object({
  seconds: z.number().positive("seconds must be positive"),
});

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export function createRouter(manager: MarketDataManager): Router {
  const router = Router();

  // Push lifecycle changes to WebSocket clients on the status channel
  const publishStatus = (): void => {
    const { mode, streaming, feed } = manager.getStatus();
    wsBroadcast("status", { mode, streaming, symbols: feed.symbols, intervalSec: feed.intervalSec });
  };

  router.get("/watchlist", (_req, res) => {
    res.json({ symbols: manager.getWatchlist() });
  });

  router.post("/watchlist", (req, res) => {
    const { symbol } = SymbolBody.parse(req.body);
    const added = manager.addSymbol(symbol);
    res.status(201).json({ symbol: symbol.toUpperCase(), added });
  });

  router.delete("/watchlist/:symbol", (req, res) => {
    const removed = manager.removeSymbol(req.params.symbol);
    res.json({ symbol: req.params.symbol.toUpperCase(), removed });
  });

  router.get("/quotes/:symbol", (req, res) => {
    const { limit } = HistoryQuery.parse(req.query);
    const symbol = req.params.symbol.toUpperCase();
    res.json({ symbol, quotes: manager.getQuoteHistory(symbol, limit) });
  });

  router.get("/quotes/:symbol/latest", (req, res) => {
    const quote = manager.getLatestQuote(req.params.symbol);
    if (!quote) {
      res.status(404).json({ error: `No quotes stored for ${req.params.symbol.toUpperCase()}` });
      return;
    }
    res.json(quote);
  });

  router.get("/quotes/:symbol/snapshot", (req, res) => {
    res.json(manager.getSnapshot([req.params.symbol]));
  });

  router.get("/stream/status", (_req, res) => {
    res.json(manager.getStatus());
  });

  router.post("/stream/start", (_req, res) => {
    const started = manager.startStreaming();
    if (started) publishStatus();
    res.json({ started });
  });

  router.post("/stream/stop", (_req, res, next) => {
    manager
      .stopStreaming()
      .then(() => {
        publishStatus();
        res.json({ stopped: true });
      })
      .catch(next);
  });

  router.put("/stream/interval", (req, res) => {
    const { seconds } = IntervalBody.parse(req.body);
    manager.setUpdateInterval(seconds);
    publishStatus();
    res.json({ seconds });
  });

  return router;
}

/** Maps domain errors onto HTTP status codes. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: err.issues.map((i) => i.message).join("; ") });
    return;
  }
  if (err instanceof ConfigurationError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof StorageError) {
    logRest.error({ err }, "Storage failure while serving request");
    res.status(500).json({ error: err.message });
    return;
  }
  logRest.error({ err }, "Unhandled REST error");
  res.status(500).json({ error: "Internal server error" });
}
