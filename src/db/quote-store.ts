import Database, { type Database as DatabaseType, type Statement } from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { errorMessage, StorageError } from "../errors.js";
import { logDb } from "../logging.js";
import { createQuote, type Quote } from "../mock/quote.js";
import { META_KEYS, QUOTE_SCHEMA_SQL, SCHEMA_VERSION } from "./schema.js";

export const DB_FILENAME = "market_data.db";

export interface QuoteRow {
  id: number;
  symbol: string;
  timestamp: number;
  last: number;
  bid: number;
  ask: number;
  volume: number;
  high: number;
  low: number;
  net_change: number;
  net_change_percent: number;
  created_at: string;
}

export interface InsertResult {
  inserted: number;
  duplicates: number;
  /** The quotes actually written, in input order */
  stored: Quote[];
}

export interface QuoteQuery {
  symbol?: string;
  /** Inclusive lower bound, epoch ms */
  since?: number;
  limit?: number;
}

interface MetadataRow {
  key: string;
  value: string;
}

type InsertParams = [string, number, number, number, number, number, number, number, number, number];

function rowToQuote(row: QuoteRow): Quote {
  return createQuote({
    symbol: row.symbol,
    timestamp: row.timestamp,
    last: row.last,
    bid: row.bid,
    ask: row.ask,
    volume: row.volume,
    high: row.high,
    low: row.low,
    netChange: row.net_change,
    netChangePercent: row.net_change_percent,
  });
}

/**
 * SQLite-backed quote history, metadata and watchlist. better-sqlite3 is
 * synchronous, so every write on one handle is serialized; multi-row writes
 * run inside a single transaction.
 */
export class QuoteStore {
  private readonly insertStmt: Statement<InsertParams>;
  private readonly insertMany: (quotes: readonly Quote[], ingestedAt: string | undefined) => InsertResult;

  constructor(
    readonly db: DatabaseType,
    readonly location: string,
  ) {
    // WAL mode — readers never block the ingest writer
    if (location !== ":memory:") db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.exec(QUOTE_SCHEMA_SQL);

    db.prepare(
      "INSERT OR IGNORE INTO data_metadata (key, value) VALUES (?, datetime('now'))",
    ).run(META_KEYS.createdAt);
    this.upsertMetadata(META_KEYS.schemaVersion, SCHEMA_VERSION);

    this.insertStmt = db.prepare<InsertParams>(`
      INSERT OR IGNORE INTO equity_quotes
        (symbol, timestamp, last, bid, ask, volume, high, low, net_change, net_change_percent)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.insertMany = db.transaction((quotes: readonly Quote[], ingestedAt: string | undefined): InsertResult => {
      const stored: Quote[] = [];
      for (const q of quotes) {
        const res = this.insertStmt.run(
          q.symbol, q.timestamp, q.last, q.bid, q.ask, q.volume, q.high, q.low, q.netChange, q.netChangePercent,
        );
        if (res.changes === 1) stored.push(q);
      }
      if (ingestedAt !== undefined) this.upsertMetadata(META_KEYS.lastIngestTime, ingestedAt);
      return { inserted: stored.length, duplicates: quotes.length - stored.length, stored };
    });
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Append quotes atomically. A (symbol, timestamp) pair already stored is
   * kept as-is and counted as a duplicate. `ingestedAt` updates
   * last_ingest_time inside the same transaction.
   */
  insertQuotes(quotes: readonly Quote[], opts: { ingestedAt?: string } = {}): InsertResult {
    if (quotes.length === 0) return { inserted: 0, duplicates: 0, stored: [] };
    return this.guard("insert quotes", () => this.insertMany(quotes, opts.ingestedAt));
  }

  queryQuotes(opts: QuoteQuery = {}): Quote[] {
    const where: string[] = [];
    const params: Array<string | number> = [];
    if (opts.symbol) {
      where.push("symbol = ?");
      params.push(opts.symbol.trim().toUpperCase());
    }
    if (opts.since !== undefined) {
      where.push("timestamp >= ?");
      params.push(opts.since);
    }
    const limit = Math.max(1, Math.min(opts.limit ?? 100, 10_000));
    const sql =
      `SELECT * FROM equity_quotes ${where.length ? `WHERE ${where.join(" AND ")}` : ""} ` +
      "ORDER BY timestamp DESC, id DESC LIMIT ?";

    return this.guard("query quotes", () =>
      this.db.prepare<Array<string | number>, QuoteRow>(sql).all(...params, limit).map(rowToQuote),
    );
  }

  getLatestQuote(symbol: string): Quote | null {
    const [latest] = this.queryQuotes({ symbol, limit: 1 });
    return latest ?? null;
  }

  countQuotes(symbol?: string): number {
    return this.guard("count quotes", () => {
      const row = symbol
        ? this.db
            .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM equity_quotes WHERE symbol = ?")
            .get(symbol.trim().toUpperCase())
        : this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM equity_quotes").get();
      return row?.n ?? 0;
    });
  }

  /** Retention: drop observations older than the cutoff. Returns rows removed. */
  pruneQuotesBefore(timestampMs: number): number {
    return this.guard("prune quotes", () =>
      this.db.prepare<[number]>("DELETE FROM equity_quotes WHERE timestamp < ?").run(timestampMs).changes,
    );
  }

  listTables(): string[] {
    return this.guard("list tables", () =>
      this.db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all()
        .map((r) => r.name),
    );
  }

  // ── Metadata ───────────────────────────────────────────────────────────

  getMetadata(key: string): string | null {
    return this.guard("read metadata", () => {
      const row = this.db
        .prepare<[string], MetadataRow>("SELECT key, value FROM data_metadata WHERE key = ?")
        .get(key);
      return row?.value ?? null;
    });
  }

  setMetadata(key: string, value: string): void {
    this.guard("write metadata", () => this.upsertMetadata(key, value));
  }

  getAllMetadata(): Record<string, string> {
    return this.guard("read metadata", () => {
      const rows = this.db.prepare<[], MetadataRow>("SELECT key, value FROM data_metadata ORDER BY key").all();
      return Object.fromEntries(rows.map((r) => [r.key, r.value]));
    });
  }

  // ── Watchlist ──────────────────────────────────────────────────────────

  /** Returns true when the symbol was not already on the list. */
  addWatchlistSymbol(symbol: string): boolean {
    return this.guard("add watchlist symbol", () =>
      this.db.prepare<[string]>("INSERT OR IGNORE INTO watchlist (symbol) VALUES (?)").run(symbol).changes === 1,
    );
  }

  removeWatchlistSymbol(symbol: string): boolean {
    return this.guard("remove watchlist symbol", () =>
      this.db.prepare<[string]>("DELETE FROM watchlist WHERE symbol = ?").run(symbol).changes === 1,
    );
  }

  listWatchlist(): string[] {
    return this.guard("list watchlist", () =>
      this.db
        .prepare<[], { symbol: string }>("SELECT symbol FROM watchlist ORDER BY rowid")
        .all()
        .map((r) => r.symbol),
    );
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logDb.info({ location: this.location }, "Quote store closed");
    }
  }

  private upsertMetadata(key: string, value: string): void {
    this.db
      .prepare<[string, string]>(`
        INSERT INTO data_metadata (key, value, updated_at) VALUES (?, ?, datetime('now'))
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `)
      .run(key, value);
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      logDb.error({ err, location: this.location }, `Failed to ${action}`);
      throw new StorageError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * Open (creating if needed) the quote store under `dataDir`. Schema creation
 * is idempotent, so reopening an existing directory keeps its rows.
 * `":memory:"` opens a throwaway in-process database.
 */
export function openQuoteStore(dataDir: string): QuoteStore {
  const location = dataDir === ":memory:" ? ":memory:" : path.join(dataDir, DB_FILENAME);
  let db: DatabaseType | null = null;
  try {
    if (location !== ":memory:") fs.mkdirSync(dataDir, { recursive: true });
    db = new Database(location);
    const store = new QuoteStore(db, location);
    logDb.info({ location }, "Quote store opened");
    return store;
  } catch (err) {
    if (db?.open) db.close();
    logDb.error({ err, location }, "Failed to open quote store");
    throw new StorageError(`Failed to open quote store at ${location}: ${errorMessage(err)}`, { cause: err });
  }
}
