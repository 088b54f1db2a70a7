import type { InsertResult, QuoteStore } from "../db/quote-store.js";
import { errorMessage } from "../errors.js";
import { logIngest } from "../logging.js";
import { fromWireFormat, missingFieldCodes, QuoteSchema, type Quote } from "../mock/quote.js";
import { LEVELONE_EQUITIES, StreamMessageSchema } from "./protocol.js";

/**
 * Outcome of one raw stream message:
 * - parse_error: not JSON or not envelope-shaped; nothing written
 * - empty: well-formed but carried no equity content; nothing written
 * - stored: every record committed in one transaction
 * - storage_error: the transaction rolled back; nothing written
 */
export type IngestResult =
  | { status: "parse_error"; error: string }
  | { status: "empty" }
  | { status: "stored"; inserted: number; duplicates: number }
  | { status: "storage_error"; error: string };

export interface IngestStats {
  received: number;
  stored: number;
  duplicates: number;
  parseErrors: number;
  empty: number;
  storageErrors: number;
}

export type QuoteListener = (quote: Quote) => void;

interface WireRecord {
  symbol: string;
  fields: Record<string, unknown>;
  timestamp: number;
}

type ParseOutcome =
  | { ok: true; records: WireRecord[] }
  | { ok: false; error: string };

type ResolveOutcome =
  | { ok: true; quotes: Quote[] }
  | { ok: false; kind: "parse_error" | "storage_error"; error: string };

const MAX_LOGGED_RAW = 200;

function parseMessage(raw: string): ParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${errorMessage(err)}` };
  }

  const parsed = StreamMessageSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ") };
  }

  const records: WireRecord[] = [];
  for (const item of parsed.data.data ?? []) {
    if (item.service !== LEVELONE_EQUITIES) continue;
    const timestamp = item.timestamp ?? Date.now();
    for (const record of item.content ?? []) {
      records.push({ symbol: record.key.trim().toUpperCase(), fields: record, timestamp });
    }
  }
  return { ok: true, records };
}

/**
 * Turns raw LEVELONE_EQUITIES frames into quote rows. Malformed frames are
 * logged and dropped so one bad message cannot stall the stream.
 *
 * Records may carry only the codes that changed. Missing codes are filled
 * from the symbol's previous record in the same message, else its latest
 * stored quote; a partial record with neither rejects the message. Every
 * rebuilt quote must pass QuoteSchema.
 */
export class EquityStreamIngestor {
  private readonly listeners: QuoteListener[] = [];
  private readonly stats: IngestStats = {
    received: 0,
    stored: 0,
    duplicates: 0,
    parseErrors: 0,
    empty: 0,
    storageErrors: 0,
  };

  constructor(private readonly getStore: () => QuoteStore) {}

  /** Never throws. */
  processRawMessage(raw: string): IngestResult {
    this.stats.received++;

    const parsed = parseMessage(raw);
    if (!parsed.ok) {
      this.stats.parseErrors++;
      logIngest.warn({ error: parsed.error, raw: raw.slice(0, MAX_LOGGED_RAW) }, "Dropped malformed stream message");
      return { status: "parse_error", error: parsed.error };
    }

    if (parsed.records.length === 0) {
      this.stats.empty++;
      logIngest.debug("Stream message carried no equity content");
      return { status: "empty" };
    }

    const resolved = this.resolve(parsed.records);
    if (!resolved.ok) {
      if (resolved.kind === "storage_error") {
        this.stats.storageErrors++;
        return { status: "storage_error", error: resolved.error };
      }
      this.stats.parseErrors++;
      logIngest.warn({ error: resolved.error, raw: raw.slice(0, MAX_LOGGED_RAW) }, "Dropped invalid stream quotes");
      return { status: "parse_error", error: resolved.error };
    }

    const persisted = this.persist(resolved.quotes);
    if (!persisted.ok) {
      this.stats.storageErrors++;
      return { status: "storage_error", error: persisted.error };
    }

    const { inserted, duplicates, stored } = persisted.result;
    this.stats.stored += inserted;
    this.stats.duplicates += duplicates;
    if (duplicates > 0) {
      logIngest.debug({ duplicates }, "Skipped quotes already stored for the same timestamp");
    }
    this.notify(stored);
    return { status: "stored", inserted, duplicates };
  }

  /** Register a listener for every quote written to the store. Duplicates are not replayed. */
  onQuote(listener: QuoteListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  getStats(): IngestStats {
    return { ...this.stats };
  }

  private resolve(records: readonly WireRecord[]): ResolveOutcome {
    const latest = new Map<string, Quote>();
    const quotes: Quote[] = [];

    for (const record of records) {
      const missing = missingFieldCodes(record.fields);
      let base = latest.get(record.symbol);
      if (!base && missing.length > 0) {
        try {
          base = this.getStore().getLatestQuote(record.symbol) ?? undefined;
        } catch (err) {
          logIngest.error({ err, symbol: record.symbol }, "Failed to load base quote for partial update");
          return { ok: false, kind: "storage_error", error: errorMessage(err) };
        }
        if (!base) {
          return {
            ok: false,
            kind: "parse_error",
            error: `${record.symbol}: partial record without a prior quote (missing ${missing.join(", ")})`,
          };
        }
      }

      const quote = fromWireFormat(record.symbol, record.fields, record.timestamp, base);
      const checked = QuoteSchema.safeParse(quote);
      if (!checked.success) {
        const issues = checked.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        return { ok: false, kind: "parse_error", error: `${record.symbol}: ${issues}` };
      }
      latest.set(record.symbol, quote);
      quotes.push(quote);
    }
    return { ok: true, quotes };
  }

  private persist(quotes: readonly Quote[]): { ok: true; result: InsertResult } | { ok: false; error: string } {
    try {
      const result = this.getStore().insertQuotes(quotes, { ingestedAt: new Date().toISOString() });
      return { ok: true, result };
    } catch (err) {
      logIngest.error({ err, count: quotes.length }, "Failed to persist stream quotes");
      return { ok: false, error: errorMessage(err) };
    }
  }

  private notify(quotes: readonly Quote[]): void {
    for (const quote of quotes) {
      for (const listener of this.listeners) {
        try {
          listener(quote);
        } catch (err) {
          logIngest.error({ err, symbol: quote.symbol }, "Quote listener failed");
        }
      }
    }
  }
}
