import { ConfigurationError } from "../errors.js";

/** Receives one serialized LEVELONE envelope per call. */
export type StreamHandler = (message: string) => void | Promise<void>;

export interface FeedStatus {
  running: boolean;
  symbols: string[];
  intervalSec: number;
  ticks: number;
  messagesSent: number;
  handlerErrors: number;
}

/**
 * A source of streaming quote envelopes. The mock streamer implements it;
 * a live adapter injected into the manager must honour the same lifecycle.
 */
export interface QuoteFeed {
  readonly isRunning: boolean;
  /** Returns false (and starts nothing) when already running. */
  start(handler: StreamHandler): boolean;
  /** Resolves once the production loop has exited. No-op when idle. */
  stop(): Promise<void>;
  addSymbol(symbol: string): void;
  removeSymbol(symbol: string): void;
  setUpdateInterval(seconds: number): void;
  getStatus(): FeedStatus;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function requireSymbol(symbol: string): string {
  const normalized = normalizeSymbol(symbol);
  if (!normalized) {
    throw new ConfigurationError("symbol must be a non-empty string");
  }
  return normalized;
}

export function intervalToMs(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`update interval must be a positive number of seconds, got ${seconds}`);
  }
  return Math.round(seconds * 1000);
}
