import { logStream } from "../logging.js";
import {
  intervalToMs,
  requireSymbol,
  type FeedStatus,
  type QuoteFeed,
  type StreamHandler,
} from "../market-data/feed.js";
import { buildEnvelope, serializeEnvelope } from "../stream/protocol.js";
import { MockQuoteGenerator } from "./generator.js";

export interface MockStreamerOptions {
  generator?: MockQuoteGenerator;
  updateIntervalSec?: number;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Emulates the LEVELONE_EQUITIES streaming service. One background loop per
 * instance wakes every interval and delivers one envelope per subscribed
 * symbol, in subscription order.
 */
export class MockStreamer implements QuoteFeed {
  private readonly generator: MockQuoteGenerator;
  private readonly symbols = new Set<string>();
  private intervalMs: number;
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private ticks = 0;
  private messagesSent = 0;
  private handlerErrors = 0;

  constructor(options: MockStreamerOptions = {}) {
    this.generator = options.generator ?? new MockQuoteGenerator();
    this.intervalMs = intervalToMs(options.updateIntervalSec ?? 1);
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(handler: StreamHandler): boolean {
    if (this.loop) {
      logStream.warn("Mock streamer already running — ignoring start()");
      return false;
    }

    const controller = new AbortController();
    const loop: Promise<void> = this.run(handler, controller.signal).finally(() => {
      if (this.loop === loop) {
        this.loop = null;
        this.controller = null;
      }
    });
    this.controller = controller;
    this.loop = loop;

    logStream.info({ symbols: [...this.symbols], intervalMs: this.intervalMs }, "Mock streamer started");
    return true;
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    await loop;
    logStream.info({ ticks: this.ticks, messagesSent: this.messagesSent }, "Mock streamer stopped");
  }

  addSymbol(symbol: string): void {
    const key = requireSymbol(symbol);
    if (this.symbols.has(key)) return;
    this.symbols.add(key);
    logStream.debug({ symbol: key }, "Subscribed");
  }

  removeSymbol(symbol: string): void {
    const key = requireSymbol(symbol);
    if (this.symbols.delete(key)) {
      logStream.debug({ symbol: key }, "Unsubscribed");
    }
  }

  setUpdateInterval(seconds: number): void {
    this.intervalMs = intervalToMs(seconds);
    logStream.debug({ intervalMs: this.intervalMs }, "Update interval changed");
  }

  getSymbols(): string[] {
    return [...this.symbols];
  }

  getStatus(): FeedStatus {
    return {
      running: this.isRunning,
      symbols: this.getSymbols(),
      intervalSec: this.intervalMs / 1000,
      ticks: this.ticks,
      messagesSent: this.messagesSent,
      handlerErrors: this.handlerErrors,
    };
  }

  private async run(handler: StreamHandler, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;
      await this.tick(handler, signal);
    }
  }

  private async tick(handler: StreamHandler, signal: AbortSignal): Promise<void> {
    this.ticks++;
    // Snapshot so add/remove during delivery only affects the next tick
    for (const symbol of [...this.symbols]) {
      if (signal.aborted) return;
      try {
        const quote = this.generator.generateQuote(symbol);
        await handler(serializeEnvelope(buildEnvelope([quote])));
        this.messagesSent++;
      } catch (err) {
        this.handlerErrors++;
        logStream.error({ err, symbol }, "Stream handler failed — continuing");
      }
    }
  }
}
