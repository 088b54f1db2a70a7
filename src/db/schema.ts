export const SCHEMA_VERSION = "1";

export const QUOTE_SCHEMA_SQL = `
  -- One row per observation; append-only
  CREATE TABLE IF NOT EXISTS equity_quotes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    symbol TEXT NOT NULL,
    timestamp INTEGER NOT NULL,    -- epoch ms
    last REAL NOT NULL,
    bid REAL NOT NULL,
    ask REAL NOT NULL,
    volume INTEGER NOT NULL,
    high REAL NOT NULL,
    low REAL NOT NULL,
    net_change REAL NOT NULL,
    net_change_percent REAL NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(symbol, timestamp)
  );
  CREATE INDEX IF NOT EXISTS idx_equity_quotes_symbol_ts ON equity_quotes(symbol, timestamp);

  CREATE TABLE IF NOT EXISTS data_metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS watchlist (
    symbol TEXT PRIMARY KEY,
    added_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

/** Keys written to data_metadata */
export const META_KEYS = {
  schemaVersion: "schema_version",
  createdAt: "created_at",
  lastIngestTime: "last_ingest_time",
  streamingStartedAt: "streaming_started_at",
  streamingStoppedAt: "streaming_stopped_at",
  mode: "mode",
} as const;
