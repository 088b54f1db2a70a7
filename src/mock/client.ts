import { requireSymbol } from "../market-data/feed.js";
import { MockQuoteGenerator } from "./generator.js";
import { toWireFormat, type WireQuoteFields } from "./quote.js";

export interface SnapshotQuote {
  symbol: string;
  quote: WireQuoteFields & { quoteTime: number };
}

export type SnapshotResponse = Record<string, SnapshotQuote>;

/**
 * Stand-in for the brokerage REST quote call. Shares the generator with the
 * streamer so snapshots and streamed ticks walk the same price path.
 */
export class MockQuoteClient {
  constructor(private readonly generator: MockQuoteGenerator = new MockQuoteGenerator()) {}

  getQuotes(symbols: readonly string[]): SnapshotResponse {
    const response: SnapshotResponse = {};
    for (const raw of symbols) {
      const symbol = requireSymbol(raw);
      if (response[symbol]) continue;
      const quote = this.generator.generateQuote(symbol);
      response[symbol] = {
        symbol,
        quote: { ...toWireFormat(quote), quoteTime: quote.timestamp },
      };
    }
    return response;
  }
}
