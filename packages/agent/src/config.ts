import "dotenv/config";
import { parseWad } from "./fixed-point.js";

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string, fallback: string): string {
  const value = env[name];
  return value === undefined || value === "" ? fallback : value;
}

function requireNumber(env: Env, name: string, fallback: number, opts?: { min?: number; max?: number }): number {
  const raw = readEnv(env, name, String(fallback));
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid number for ${name}: ${raw}`);
  }
  if (opts?.min !== undefined && value < opts.min) {
    throw new Error(`${name} must be >= ${opts.min}, got ${value}`);
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new Error(`${name} must be <= ${opts.max}, got ${value}`);
  }
  return value;
}

function requireWad(env: Env, name: string, fallback: string): bigint {
  const raw = readEnv(env, name, fallback);
  if (!/^\d+(\.\d+)?$/.test(raw.trim())) {
    throw new Error(`Invalid decimal amount for ${name}: ${raw}`);
  }
  return parseWad(raw);
}

function requireList(env: Env, name: string, fallback: string): string[] {
  return readEnv(env, name, fallback)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** "kalshi=5000,polymarket=8000" → Map */
function parseTimeoutOverrides(env: Env, name: string): Map<string, number> {
  const out = new Map<string, number>();
  for (const entry of requireList(env, name, "")) {
    const [venue, ms] = entry.split("=").map((s) => s.trim());
    const value = Number(ms);
    if (!venue || !Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid ${name} entry: ${entry}`);
    }
    out.set(venue, value);
  }
  return out;
}

export interface Config {
  venueA: string;
  venueB: string;
  /** Venues scanned by the single-platform hedge strategy */
  hedgeVenues: string[];
  capitalCeiling: bigint;
  similarityThreshold: number;
  expiryToleranceMs: number;
  profitBuffer: bigint;
  quoteStalenessMs: number;
  catalogStalenessMs: number;
  legTimeoutMs: number;
  legTimeoutOverrides: Map<string, number>;
  fillPollIntervalMs: number;
  venueCallTimeoutMs: number;
  maxContractsPerTrade: number;
  minLiquidity: number;
  minTimeToExpiryMs: number;
  maxTimeToExpiryMs: number;
  marketKeywords: string[];
  catalogRefreshMs: number;
  quotePollMs: number;
  crossScanMs: number;
  hedgeScanMs: number;
  settlementCheckMs: number;
  settlementGraceMs: number;
  paperMarketsFile: string;
  paperBalance: bigint;
  logLevel: string;
}

export function loadConfig(env: Env = process.env): Config {
  const minTimeToExpiryMs = requireNumber(env, "MIN_TIME_TO_EXPIRY_MS", 0, { min: 0 });
  const maxTimeToExpiryMs = requireNumber(env, "MAX_TIME_TO_EXPIRY_MS", 30 * 24 * 60 * 60 * 1000, { min: 1 });
  if (maxTimeToExpiryMs <= minTimeToExpiryMs) {
    throw new Error("MAX_TIME_TO_EXPIRY_MS must exceed MIN_TIME_TO_EXPIRY_MS");
  }

  const venueA = readEnv(env, "VENUE_A", "polymarket");
  const venueB = readEnv(env, "VENUE_B", "kalshi");
  if (venueA === venueB) {
    throw new Error("VENUE_A and VENUE_B must differ");
  }

  const profitBuffer = requireWad(env, "PROFIT_BUFFER", "0.02");
  if (profitBuffer >= parseWad("1")) {
    throw new Error("PROFIT_BUFFER must be below 1.0");
  }

  return {
    venueA,
    venueB,
    hedgeVenues: requireList(env, "HEDGE_VENUES", venueA),
    capitalCeiling: requireWad(env, "CAPITAL_CEILING", "1000"),
    similarityThreshold: requireNumber(env, "SIMILARITY_THRESHOLD", 0.8, { min: 0, max: 1 }),
    expiryToleranceMs: requireNumber(env, "EXPIRY_TOLERANCE_MS", 60 * 60 * 1000, { min: 1 }),
    profitBuffer,
    quoteStalenessMs: requireNumber(env, "QUOTE_STALENESS_MS", 5_000, { min: 1 }),
    catalogStalenessMs: requireNumber(env, "CATALOG_STALENESS_MS", 10 * 60 * 1000, { min: 1 }),
    legTimeoutMs: requireNumber(env, "LEG_TIMEOUT_MS", 10_000, { min: 1 }),
    legTimeoutOverrides: parseTimeoutOverrides(env, "LEG_TIMEOUT_OVERRIDES"),
    fillPollIntervalMs: requireNumber(env, "FILL_POLL_INTERVAL_MS", 500, { min: 1 }),
    venueCallTimeoutMs: requireNumber(env, "VENUE_CALL_TIMEOUT_MS", 5_000, { min: 1 }),
    maxContractsPerTrade: requireNumber(env, "MAX_CONTRACTS_PER_TRADE", 100, { min: 1 }),
    minLiquidity: requireNumber(env, "MIN_LIQUIDITY", 1, { min: 0 }),
    minTimeToExpiryMs,
    maxTimeToExpiryMs,
    marketKeywords: requireList(env, "MARKET_KEYWORDS", "all"),
    catalogRefreshMs: requireNumber(env, "CATALOG_REFRESH_MS", 60_000, { min: 1 }),
    quotePollMs: requireNumber(env, "QUOTE_POLL_MS", 2_000, { min: 1 }),
    crossScanMs: requireNumber(env, "CROSS_SCAN_MS", 1_000, { min: 1 }),
    hedgeScanMs: requireNumber(env, "HEDGE_SCAN_MS", 1_000, { min: 1 }),
    settlementCheckMs: requireNumber(env, "SETTLEMENT_CHECK_MS", 5 * 60 * 1000, { min: 1 }),
    settlementGraceMs: requireNumber(env, "SETTLEMENT_GRACE_MS", 60 * 60 * 1000, { min: 0 }),
    paperMarketsFile: readEnv(env, "PAPER_MARKETS_FILE", "paper-markets.json"),
    paperBalance: requireWad(env, "PAPER_BALANCE", "500"),
    logLevel: readEnv(env, "LOG_LEVEL", "info"),
  };
}

export function legTimeoutFor(config: Pick<Config, "legTimeoutMs" | "legTimeoutOverrides">, venue: string): number {
  return config.legTimeoutOverrides.get(venue) ?? config.legTimeoutMs;
}
