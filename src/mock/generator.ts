import { ConfigurationError } from "../errors.js";
import { requireSymbol } from "../market-data/feed.js";
import { createQuote, type Quote } from "./quote.js";

export interface GeneratorOptions {
  /** Mixed into every per-symbol seed; unset picks a random one */
  seed?: number;
  /** Max fractional move of the last price per call */
  volatility?: number;
  /** Absolute bid/ask spread in dollars */
  spread?: number;
  /** Opening prices for known symbols; others derive one from the symbol hash */
  baselinePrices?: Readonly<Record<string, number>>;
  now?: () => number;
}

interface SymbolState {
  rng: () => number;
  open: number;
  last: number;
  high: number;
  low: number;
  volume: number;
  lastTimestamp: number;
}

export const DEFAULT_BASELINE_PRICES: Readonly<Record<string, number>> = {
  AAPL: 175,
  MSFT: 380,
  GOOGL: 140,
  AMZN: 150,
  META: 330,
  TSLA: 240,
  NVDA: 480,
  SPY: 450,
  QQQ: 380,
};

const MIN_PRICE = 0.01;
const MAX_VOLUME_STEP = 5_000;

/**
 * Seeded pseudo-random (Mulberry32).
 */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function hashSymbol(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i += 1) {
    hash = (hash * 31 + value.charCodeAt(i)) >>> 0;
  }
  return hash;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Random-walk quote source. Each symbol gets its own PRNG stream, so the
 * sequence for one symbol does not depend on which other symbols are drawn.
 */
export class MockQuoteGenerator {
  private readonly states = new Map<string, SymbolState>();
  private readonly seed: number;
  private readonly volatility: number;
  private readonly spread: number;
  private readonly baselinePrices: Readonly<Record<string, number>>;
  private readonly now: () => number;

  constructor(options: GeneratorOptions = {}) {
    this.seed = options.seed ?? Math.floor(Math.random() * 0xffffffff);
    this.volatility = options.volatility ?? 0.002;
    this.spread = options.spread ?? 0.1;
    this.baselinePrices = options.baselinePrices ?? DEFAULT_BASELINE_PRICES;
    for (const [symbol, price] of Object.entries(this.baselinePrices)) {
      if (!Number.isFinite(price) || price <= 0) {
        throw new ConfigurationError(`baseline price for ${symbol} must be a positive number, got ${price}`);
      }
    }
    this.now = options.now ?? Date.now;
  }

  generateQuote(symbol: string): Quote {
    const key = requireSymbol(symbol);
    const state = this.stateFor(key);

    const move = state.last * this.volatility * (2 * state.rng() - 1);
    const last = roundCents(Math.max(MIN_PRICE, state.last + move));
    state.last = last;
    state.high = Math.max(state.high, last);
    state.low = Math.min(state.low, last);
    state.volume += Math.floor(state.rng() * MAX_VOLUME_STEP);

    // Timestamps stay strictly increasing per symbol even when the clock has not moved
    const timestamp = Math.max(this.now(), state.lastTimestamp + 1);
    state.lastTimestamp = timestamp;

    const halfSpread = this.spread / 2;
    const netChange = roundCents(last - state.open);

    return createQuote({
      symbol: key,
      last,
      bid: roundCents(Math.max(MIN_PRICE, last - halfSpread)),
      ask: roundCents(last + halfSpread),
      volume: state.volume,
      high: state.high,
      low: state.low,
      netChange,
      netChangePercent: roundCents((netChange / state.open) * 100),
      timestamp,
    });
  }

  getBaselinePrice(symbol: string): number {
    const key = requireSymbol(symbol);
    return this.baselinePrices[key] ?? 20 + (hashSymbol(key) % 500);
  }

  getTrackedSymbols(): string[] {
    return [...this.states.keys()];
  }

  /** Forget random-walk state for one symbol, or all of them. */
  reset(symbol?: string): void {
    if (symbol === undefined) {
      this.states.clear();
      return;
    }
    this.states.delete(requireSymbol(symbol));
  }

  private stateFor(symbol: string): SymbolState {
    const existing = this.states.get(symbol);
    if (existing) return existing;

    const open = this.getBaselinePrice(symbol);
    const state: SymbolState = {
      rng: mulberry32((hashSymbol(symbol) ^ this.seed) >>> 0),
      open,
      last: open,
      high: open,
      low: open,
      volume: 0,
      lastTimestamp: 0,
    };
    this.states.set(symbol, state);
    return state;
  }
}
