import type { Config } from "./config.js";
import type { VenueAdapter } from "./venues/types.js";
import { MarketCatalog } from "./catalog/market-catalog.js";
import { QuoteStore } from "./scanner/quote-store.js";
import { ArbitrageDetector } from "./arbitrage/detector.js";
import { MarketLocks } from "./execution/market-locks.js";
import { HedgeExecutor, TradeExecutor, type ExecutorOptions } from "./execution/executor.js";
import { PositionTracker } from "./positions/position-tracker.js";
import { SettlementChecker } from "./settlement/settlement-checker.js";
import { StrategyScheduler } from "./scheduler/strategy-scheduler.js";

/** Wire every component around the given venue adapters. */
export function createAgent(config: Config, venues: VenueAdapter[]): StrategyScheduler {
  const adapters = new Map(venues.map((v) => [v.name, v]));
  for (const name of [config.venueA, config.venueB, ...config.hedgeVenues]) {
    if (!adapters.has(name)) throw new Error(`No adapter configured for venue "${name}"`);
  }

  const catalog = new MarketCatalog(venues, {
    minTimeToExpiryMs: config.minTimeToExpiryMs,
    maxTimeToExpiryMs: config.maxTimeToExpiryMs,
    marketKeywords: config.marketKeywords,
    catalogStalenessMs: config.catalogStalenessMs,
    venueCallTimeoutMs: config.venueCallTimeoutMs,
  });
  const quotes = new QuoteStore(config.quoteStalenessMs);
  const detector = new ArbitrageDetector(catalog, quotes, {
    buffer: config.profitBuffer,
    maxContractsPerTrade: config.maxContractsPerTrade,
    minLiquidity: config.minLiquidity,
  });
  const tracker = new PositionTracker(config.capitalCeiling);
  const locks = new MarketLocks();

  const deps = { adapters, catalog, quotes, tracker, locks };
  const options: ExecutorOptions = {
    buffer: config.profitBuffer,
    legTimeoutMs: config.legTimeoutMs,
    legTimeoutOverrides: config.legTimeoutOverrides,
    fillPollIntervalMs: config.fillPollIntervalMs,
    venueCallTimeoutMs: config.venueCallTimeoutMs,
  };

  return new StrategyScheduler(config, {
    adapters,
    catalog,
    quotes,
    detector,
    crossExecutor: new TradeExecutor(deps, options),
    hedgeExecutor: new HedgeExecutor(deps, options),
    tracker,
    settlement: new SettlementChecker(tracker, catalog, adapters, {
      venueCallTimeoutMs: config.venueCallTimeoutMs,
      settlementGraceMs: config.settlementGraceMs,
    }),
  });
}
