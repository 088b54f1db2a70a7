import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

const MIN_RECOMMENDED_INTERVAL_SEC = 0.1;
const MAX_VOLATILITY = 0.1;

/**
 * Validates configuration values.
 *
 * Checks:
 * - Stream update interval is positive (warning below 0.1s)
 * - Default watchlist is not empty
 * - Quote retention is at least one day
 * - Mock volatility is in (0, 0.1] and spread is non-negative
 * - REST port is in valid range (1-65535)
 * - API key is at least 16 characters (warning if shorter)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const interval = cfg.market.updateIntervalSec;
  if (!Number.isFinite(interval) || interval <= 0) {
    errors.push(`market.updateIntervalSec must be positive, got ${interval}`);
  } else if (interval < MIN_RECOMMENDED_INTERVAL_SEC) {
    warnings.push(`market.updateIntervalSec of ${interval}s is below ${MIN_RECOMMENDED_INTERVAL_SEC}s and may flood the store`);
  }

  if (cfg.market.defaultWatchlist.length === 0) {
    errors.push("market.defaultWatchlist must contain at least one symbol");
  }

  if (!Number.isInteger(cfg.market.retentionDays) || cfg.market.retentionDays < 1) {
    errors.push(`market.retentionDays must be at least 1, got ${cfg.market.retentionDays}`);
  }

  if (!Number.isFinite(cfg.mock.volatility) || cfg.mock.volatility <= 0 || cfg.mock.volatility > MAX_VOLATILITY) {
    errors.push(`mock.volatility must be between 0 (exclusive) and ${MAX_VOLATILITY}, got ${cfg.mock.volatility}`);
  }

  if (!Number.isFinite(cfg.mock.spread) || cfg.mock.spread < 0) {
    errors.push(`mock.spread must be non-negative, got ${cfg.mock.spread}`);
  }

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  // Non-fatal, but insecure
  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  if (!cfg.market.mockMode) {
    warnings.push("USE_MOCK_DATA=false but no live feed is bundled — streaming will fall back to mock mode");
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
