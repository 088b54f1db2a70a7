import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger } from "./logging.js";
import { MarketDataManager } from "./market-data/manager.js";
import { MockQuoteGenerator } from "./mock/generator.js";
import { startRestServer } from "./rest/server.js";
import { closeWebSocket } from "./ws/server.js";

async function main(): Promise<void> {
  logger.info({ pid: process.pid }, "Quote stream simulator starting");

  // Validate configuration early
  const validation = validateConfig(config);
  for (const warning of validation.warnings) logger.warn(warning);
  if (validation.errors.length > 0) {
    for (const error of validation.errors) logger.error(error);
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // No live feed ships with this package; fall back to mock like an unauthenticated session would
  if (!config.market.mockMode) {
    logger.warn("Live feed unavailable — using MOCK data mode");
  }

  const manager = new MarketDataManager(config.market.dataDir, {
    mode: "mock",
    generator: new MockQuoteGenerator({
      seed: config.mock.seed,
      volatility: config.mock.volatility,
      spread: config.mock.spread,
    }),
    updateIntervalSec: config.market.updateIntervalSec,
    defaultWatchlist: config.market.defaultWatchlist,
    retentionDays: config.market.retentionDays,
  });

  manager.getDbConnection();
  manager.startStreaming();
  logger.info({ watchlist: manager.getWatchlist(), mockMode: manager.isMockMode }, "Market data initialized");

  const server = startRestServer(manager);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    await manager.stopStreaming();
    closeWebSocket();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await manager.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Fatal startup error");
  process.exit(1);
});
