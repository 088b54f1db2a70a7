import dotenv from "dotenv";

dotenv.config();

function parseSymbolList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

// Mock mode is the default: the live feed needs credentials this project never holds.
export const config = {
  market: {
    mockMode: (process.env.USE_MOCK_DATA ?? "true").toLowerCase() !== "false",
    dataDir: process.env.DATA_DIR ?? "./data",
    updateIntervalSec: parseFloat(process.env.STREAM_UPDATE_INTERVAL_SEC ?? "1"),
    defaultWatchlist: parseSymbolList(process.env.DEFAULT_WATCHLIST ?? "AAPL,MSFT,GOOGL,TSLA,NVDA"),
    /** Rows older than this are pruned when streaming starts */
    retentionDays: parseInt(process.env.QUOTE_RETENTION_DAYS ?? "7", 10),
  },
  mock: {
    /** Unset means a fresh random seed per process */
    seed: parseOptionalInt(process.env.MOCK_SEED),
    /** Max fractional move of the last price per tick */
    volatility: parseFloat(process.env.MOCK_VOLATILITY ?? "0.002"),
    /** Absolute bid/ask spread in dollars */
    spread: parseFloat(process.env.MOCK_SPREAD ?? "0.1"),
  },
  rest: {
    port: parseInt(process.env.REST_PORT ?? "8000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
  },
};

export type AppConfig = typeof config;
