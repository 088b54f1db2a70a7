import { describe, it, expect } from "vitest";
import type { AppConfig } from "../config.js";
import { validateConfig } from "../config-validator.js";

function makeConfig(overrides: {
  market?: Partial<AppConfig["market"]>;
  mock?: Partial<AppConfig["mock"]>;
  rest?: Partial<AppConfig["rest"]>;
} = {}): AppConfig {
  return {
    market: {
      mockMode: true,
      dataDir: "./data",
      updateIntervalSec: 1,
      defaultWatchlist: ["AAPL", "MSFT"],
      retentionDays: 7,
      ...overrides.market,
    },
    mock: { seed: 1, volatility: 0.002, spread: 0.1, ...overrides.mock },
    rest: { port: 8000, apiKey: "this-is-a-secure-api-key", ...overrides.rest },
  };
}

describe("validateConfig", () => {
  it("should pass validation for a valid config", () => {
    expect(validateConfig(makeConfig())).toEqual({ errors: [], warnings: [] });
  });

  it("should reject a non-positive update interval", () => {
    expect(validateConfig(makeConfig({ market: { updateIntervalSec: 0 } })).errors).toEqual([
      "market.updateIntervalSec must be positive, got 0",
    ]);
    expect(validateConfig(makeConfig({ market: { updateIntervalSec: Number.NaN } })).errors).toEqual([
      "market.updateIntervalSec must be positive, got NaN",
    ]);
  });

  it("should warn about very short update intervals", () => {
    const result = validateConfig(makeConfig({ market: { updateIntervalSec: 0.05 } }));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["market.updateIntervalSec of 0.05s is below 0.1s and may flood the store"]);
  });

  it("should require a default watchlist", () => {
    expect(validateConfig(makeConfig({ market: { defaultWatchlist: [] } })).errors).toEqual([
      "market.defaultWatchlist must contain at least one symbol",
    ]);
  });

  it("should require at least one day of retention", () => {
    expect(validateConfig(makeConfig({ market: { retentionDays: 0 } })).errors).toEqual([
      "market.retentionDays must be at least 1, got 0",
    ]);
  });

  it("should bound mock volatility and spread", () => {
    const result = validateConfig(makeConfig({ mock: { volatility: 0.5, spread: -1 } }));
    expect(result.errors).toEqual([
      "mock.volatility must be between 0 (exclusive) and 0.1, got 0.5",
      "mock.spread must be non-negative, got -1",
    ]);
  });

  it("should return error for invalid REST port", () => {
    expect(validateConfig(makeConfig({ rest: { port: 0 } })).errors).toEqual([
      "REST port must be between 1 and 65535, got 0",
    ]);
    expect(validateConfig(makeConfig({ rest: { port: 70000 } })).errors).toEqual([
      "REST port must be between 1 and 65535, got 70000",
    ]);
  });

  it("should warn about a short API key but accept an empty one", () => {
    expect(validateConfig(makeConfig({ rest: { apiKey: "short" } })).warnings).toEqual([
      "REST API key is only 5 characters (recommended: at least 16)",
    ]);
    expect(validateConfig(makeConfig({ rest: { apiKey: "" } })).warnings).toEqual([]);
  });

  it("should warn that live mode falls back to mock", () => {
    expect(validateConfig(makeConfig({ market: { mockMode: false } })).warnings).toEqual([
      "USE_MOCK_DATA=false but no live feed is bundled — streaming will fall back to mock mode",
    ]);
  });
});
