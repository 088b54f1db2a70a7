import type { Database as DatabaseType } from "better-sqlite3";
import { openQuoteStore, type QuoteStore } from "../db/quote-store.js";
import { META_KEYS } from "../db/schema.js";
import { ConfigurationError } from "../errors.js";
import { logMarket } from "../logging.js";
import { MockQuoteClient, type SnapshotResponse } from "../mock/client.js";
import { MockQuoteGenerator } from "../mock/generator.js";
import { toWireFormat, type Quote } from "../mock/quote.js";
import { MockStreamer } from "../mock/streamer.js";
import { EquityStreamIngestor, type IngestResult, type IngestStats } from "../stream/ingest.js";
import { requireSymbol, type FeedStatus, type QuoteFeed } from "./feed.js";

export type MarketDataMode = "mock" | "live";

export interface MarketDataManagerOptions {
  mode: MarketDataMode;
  /** Required in live mode; ignored in mock mode */
  feed?: QuoteFeed;
  /** Shared by the mock streamer and snapshot client */
  generator?: MockQuoteGenerator;
  updateIntervalSec?: number;
  /** Seeded into an empty watchlist when streaming starts */
  defaultWatchlist?: readonly string[];
  /** Rows older than this many days are pruned when streaming starts */
  retentionDays?: number;
}

export interface MarketDataStatus {
  mode: MarketDataMode;
  streaming: boolean;
  watchlist: string[];
  feed: FeedStatus;
  ingest: IngestStats;
  quoteCount: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Façade over the quote store, the watchlist and the streaming feed. The
 * mode is fixed at construction so it can never change under a running loop.
 */
export class MarketDataManager {
  readonly mode: MarketDataMode;
  readonly streamIngestor: EquityStreamIngestor;
  private readonly feed: QuoteFeed;
  private readonly snapshotClient: MockQuoteClient | null;
  private readonly defaultWatchlist: readonly string[];
  private readonly retentionDays: number | undefined;
  private store: QuoteStore | null = null;

  constructor(
    readonly dataDir: string,
    options: MarketDataManagerOptions,
  ) {
    this.mode = options.mode;
    this.defaultWatchlist = options.defaultWatchlist ?? [];
    this.retentionDays = options.retentionDays;

    if (options.mode === "live") {
      if (!options.feed) {
        throw new ConfigurationError("live mode requires a QuoteFeed implementation");
      }
      this.feed = options.feed;
      this.snapshotClient = null;
    } else {
      const generator = options.generator ?? new MockQuoteGenerator();
      this.feed = new MockStreamer({ generator, updateIntervalSec: options.updateIntervalSec });
      this.snapshotClient = new MockQuoteClient(generator);
    }

    if (options.updateIntervalSec !== undefined && options.mode === "live") {
      this.feed.setUpdateInterval(options.updateIntervalSec);
    }

    this.streamIngestor = new EquityStreamIngestor(() => this.getStore());
    logMarket.info({ mode: this.mode, dataDir }, "Market data manager created");
  }

  get isMockMode(): boolean {
    return this.mode === "mock";
  }

  get isStreaming(): boolean {
    return this.feed.isRunning;
  }

  /**
   * The SQLite handle for this manager's store. The schema is created on
   * first use; later calls return the same open handle.
   */
  getDbConnection(): DatabaseType {
    return this.getStore().db;
  }

  getStore(): QuoteStore {
    if (!this.store || !this.store.isOpen) {
      this.store = openQuoteStore(this.dataDir);
    }
    return this.store;
  }

  // ── Watchlist ──────────────────────────────────────────────────────────

  /** Idempotent. Subscribes the feed too when streaming. Returns true if newly added. */
  addSymbol(symbol: string): boolean {
    const key = requireSymbol(symbol);
    const added = this.getStore().addWatchlistSymbol(key);
    if (this.isStreaming) this.feed.addSymbol(key);
    if (added) logMarket.info({ symbol: key }, "Added symbol to watchlist");
    return added;
  }

  removeSymbol(symbol: string): boolean {
    const key = requireSymbol(symbol);
    const removed = this.getStore().removeWatchlistSymbol(key);
    this.feed.removeSymbol(key);
    if (removed) logMarket.info({ symbol: key }, "Removed symbol from watchlist");
    return removed;
  }

  getWatchlist(): string[] {
    return this.getStore().listWatchlist();
  }

  // ── Streaming lifecycle ────────────────────────────────────────────────

  /** Returns false when already streaming. */
  startStreaming(): boolean {
    if (this.isStreaming) {
      logMarket.warn("Streaming already active");
      return false;
    }

    const store = this.getStore();
    this.pruneExpired(store);

    if (store.listWatchlist().length === 0) {
      for (const symbol of this.defaultWatchlist) this.addSymbol(symbol);
    }
    const symbols = store.listWatchlist();
    for (const symbol of symbols) this.feed.addSymbol(symbol);

    const started = this.feed.start((message) => {
      this.handleStreamMessage(message);
    });
    if (!started) return false;

    store.setMetadata(META_KEYS.streamingStartedAt, new Date().toISOString());
    store.setMetadata(META_KEYS.mode, this.mode);
    logMarket.info({ mode: this.mode, symbols }, "Streaming started");
    return true;
  }

  /** Resolves once the feed loop has exited. Safe when not streaming. */
  async stopStreaming(): Promise<void> {
    if (!this.isStreaming) return;
    await this.feed.stop();
    if (this.store?.isOpen) {
      this.store.setMetadata(META_KEYS.streamingStoppedAt, new Date().toISOString());
    }
    logMarket.info("Streaming stopped");
  }

  setUpdateInterval(seconds: number): void {
    this.feed.setUpdateInterval(seconds);
  }

  processRawMessage(raw: string): IngestResult {
    return this.streamIngestor.processRawMessage(raw);
  }

  // ── Queries ────────────────────────────────────────────────────────────

  getLatestQuote(symbol: string): Quote | null {
    return this.getStore().getLatestQuote(requireSymbol(symbol));
  }

  getQuoteHistory(symbol: string, limit = 100): Quote[] {
    return this.getStore().queryQuotes({ symbol: requireSymbol(symbol), limit });
  }

  /**
   * Point-in-time quotes in the brokerage REST shape. Mock mode draws fresh
   * quotes; live mode answers from the newest stored rows.
   */
  getSnapshot(symbols: readonly string[]): SnapshotResponse {
    if (this.snapshotClient) return this.snapshotClient.getQuotes(symbols);

    const response: SnapshotResponse = {};
    for (const raw of symbols) {
      const symbol = requireSymbol(raw);
      const quote = this.getStore().getLatestQuote(symbol);
      if (!quote) continue;
      response[symbol] = { symbol, quote: { ...toWireFormat(quote), quoteTime: quote.timestamp } };
    }
    return response;
  }

  getStatus(): MarketDataStatus {
    const store = this.getStore();
    return {
      mode: this.mode,
      streaming: this.isStreaming,
      watchlist: store.listWatchlist(),
      feed: this.feed.getStatus(),
      ingest: this.streamIngestor.getStats(),
      quoteCount: store.countQuotes(),
    };
  }

  /** Stop streaming and release the store. Idempotent. */
  async close(): Promise<void> {
    await this.stopStreaming();
    this.store?.close();
    this.store = null;
  }

  private handleStreamMessage(message: string): void {
    const result = this.streamIngestor.processRawMessage(message);
    if (result.status === "storage_error") {
      logMarket.error({ error: result.error }, "Quote store rejected streamed quotes");
    }
  }

  private pruneExpired(store: QuoteStore): void {
    if (this.retentionDays === undefined) return;
    const removed = store.pruneQuotesBefore(Date.now() - this.retentionDays * DAY_MS);
    if (removed > 0) logMarket.info({ removed, retentionDays: this.retentionDays }, "Pruned expired quotes");
  }
}
