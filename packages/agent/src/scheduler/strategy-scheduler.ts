import type { AgentStatus, Market, MarketRef, MatchedPair, Side, StrategyKind } from "../types.js";
import type { VenueAdapter } from "../venues/types.js";
import type { Config } from "../config.js";
import type { MarketCatalog } from "../catalog/market-catalog.js";
import { marketKey } from "../catalog/market-catalog.js";
import type { QuoteStore } from "../scanner/quote-store.js";
import type { ArbitrageDetector } from "../arbitrage/detector.js";
import type { BaseExecutor } from "../execution/executor.js";
import type { PositionTracker } from "../positions/position-tracker.js";
import type { SettlementChecker } from "../settlement/settlement-checker.js";
import { matchMarkets } from "../matching-engine/event-matcher.js";
import { getErrorMessage } from "../errors.js";
import { withTimeout } from "../retry.js";
import { log } from "../logger.js";

export type SchedulerConfig = Pick<
  Config,
  | "venueA"
  | "venueB"
  | "hedgeVenues"
  | "similarityThreshold"
  | "expiryToleranceMs"
  | "venueCallTimeoutMs"
  | "catalogRefreshMs"
  | "quotePollMs"
  | "crossScanMs"
  | "hedgeScanMs"
  | "settlementCheckMs"
>;

export interface SchedulerDeps {
  adapters: Map<string, VenueAdapter>;
  catalog: MarketCatalog;
  quotes: QuoteStore;
  detector: ArbitrageDetector;
  crossExecutor: BaseExecutor;
  hedgeExecutor: BaseExecutor;
  tracker: PositionTracker;
  settlement: SettlementChecker;
}

type LoopName = "catalog" | "quotes" | "cross" | "hedge" | "settlement";

interface Loop {
  name: LoopName;
  intervalMs: number;
  task: () => Promise<void>;
  timer?: ReturnType<typeof setTimeout>;
  running?: Promise<void>;
  rerun: boolean;
}

const SIDES: Side[] = ["YES", "NO"];

/**
 * Runs catalog refresh, quote ingestion, both strategy cycles and settlement
 * as independent loops. They share only the stores, the capital ceiling and
 * the market locks; a failure in one loop is logged and the loop carries on.
 */
export class StrategyScheduler {
  private loops = new Map<LoopName, Loop>();
  private pairs: MatchedPair[] = [];
  private unsubscribers: Array<() => void> = [];
  private running = false;
  private startedAt = 0;
  private lastCatalogRefresh = 0;
  private crossCycles = 0;
  private hedgeCycles = 0;

  constructor(
    private readonly config: SchedulerConfig,
    private readonly deps: SchedulerDeps,
  ) {
    this.define("catalog", config.catalogRefreshMs, () => this.refreshCatalog());
    this.define("quotes", config.quotePollMs, () => this.pollQuotes());
    this.define("cross", config.crossScanMs, () => this.runStrategy("CrossPlatform"));
    this.define("hedge", config.hedgeScanMs, () => this.runStrategy("SinglePlatformHedge"));
    this.define("settlement", config.settlementCheckMs, () => this.runSettlement());
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = Date.now();

    this.deps.quotes.on("quote", this.onQuote);
    for (const adapter of this.deps.adapters.values()) {
      if (adapter.subscribeQuotes) {
        this.unsubscribers.push(adapter.subscribeQuotes((quote) => this.deps.quotes.apply(quote)));
      }
    }

    log.info("Scheduler started", {
      venues: [...this.deps.adapters.keys()].join(","),
      hedgeVenues: this.config.hedgeVenues.join(","),
    });
    // catalog first so the other loops have markets to work with
    this.schedule("catalog", 0);
    for (const name of ["quotes", "cross", "hedge", "settlement"] as const) {
      this.schedule(name, this.loop(name).intervalMs);
    }
  }

  /** Stop all loops and wait for in-flight cycles and executions, unwinds included. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    for (const loop of this.loops.values()) {
      if (loop.timer) clearTimeout(loop.timer);
      loop.timer = undefined;
      loop.rerun = false;
    }
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.deps.quotes.off("quote", this.onQuote);

    await Promise.allSettled([...this.loops.values()].map((l) => l.running ?? Promise.resolve()));
    await Promise.all([this.deps.crossExecutor.drain(), this.deps.hedgeExecutor.drain()]);
    log.info("Scheduler stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): AgentStatus {
    return {
      running: this.running,
      startedAt: this.startedAt,
      lastCatalogRefresh: this.lastCatalogRefresh,
      activePairs: this.pairs.filter((p) => p.confirmed).length,
      quotesTracked: this.deps.quotes.getCount(),
      crossCycles: this.crossCycles,
      hedgeCycles: this.hedgeCycles,
      tradesExecuted: this.deps.crossExecutor.getExecutedCount() + this.deps.hedgeExecutor.getExecutedCount(),
      crossPaused: this.deps.crossExecutor.isPaused(),
      hedgePaused: this.deps.hedgeExecutor.isPaused(),
      crossPauseReason: this.deps.crossExecutor.getPauseReason(),
      hedgePauseReason: this.deps.hedgeExecutor.getPauseReason(),
      statistics: this.deps.tracker.getStatistics(),
    };
  }

  getPairs(): MatchedPair[] {
    return [...this.pairs];
  }

  /** Run a loop now instead of waiting for its next tick. */
  wake(name: LoopName): void {
    if (!this.running) return;
    const loop = this.loop(name);
    if (loop.running) {
      loop.rerun = true;
      return;
    }
    this.schedule(name, 0);
  }

  // ---------------------------------------------------------------------------
  // Cycles
  // ---------------------------------------------------------------------------

  async refreshCatalog(now = Date.now()): Promise<void> {
    const { catalog, detector } = this.deps;
    await Promise.all(catalog.venues().map((venue) => catalog.refresh(venue, now)));
    this.lastCatalogRefresh = now;

    const matchable = (venue: string): Market[] => {
      const tradable = new Set(catalog.tradableMarkets(venue, now).map((m) => m.marketId));
      return catalog.markets(venue).filter((m) => m.status.kind !== "Open" || tradable.has(m.marketId));
    };
    const result = matchMarkets(
      matchable(this.config.venueA),
      matchable(this.config.venueB),
      this.pairs,
      { similarityThreshold: this.config.similarityThreshold, expiryToleranceMs: this.config.expiryToleranceMs },
      now,
    );
    this.pairs = result.pairs;
    for (const pair of result.retracted) {
      log.info("Pair retracted", { pairId: pair.id, reason: pair.retractedReason });
    }
    detector.setPairs(result.confirmed);
    detector.setHedgeMarkets(
      this.config.hedgeVenues.flatMap((venue) =>
        catalog.tradableMarkets(venue, now).map((m) => ({ venue: m.venue, marketId: m.marketId })),
      ),
    );
    log.info("Pairs updated", { confirmed: result.confirmed.length, retracted: result.retracted.length });
  }

  /** Poll both sides of every tracked market; push feeds only deliver changes between polls. */
  async pollQuotes(): Promise<void> {
    const refs = new Map<string, MarketRef>();
    for (const pair of this.deps.detector.getPairs()) {
      refs.set(marketKey(pair.marketA), pair.marketA);
      refs.set(marketKey(pair.marketB), pair.marketB);
    }
    for (const ref of this.deps.detector.getHedgeMarkets()) refs.set(marketKey(ref), ref);

    let failures = 0;
    await Promise.all(
      [...refs.values()].flatMap((ref) => {
        const adapter = this.deps.adapters.get(ref.venue);
        if (!adapter) return [];
        return SIDES.map(async (side) => {
          try {
            const quote = await withTimeout(
              adapter.getQuote(ref.marketId, side),
              this.config.venueCallTimeoutMs,
              `${ref.venue} getQuote`,
              ref.venue,
            );
            this.deps.quotes.apply(quote);
          } catch (err) {
            failures++;
            log.debug("Quote poll failed", { venue: ref.venue, marketId: ref.marketId, side, error: getErrorMessage(err) });
          }
        });
      }),
    );
    if (failures > 0) log.warn("Quote poll had failures", { failures, markets: refs.size });
  }

  async runStrategy(strategy: StrategyKind): Promise<void> {
    const { detector } = this.deps;
    const executor = this.executorFor(strategy);
    if (strategy === "CrossPlatform") this.crossCycles++;
    else this.hedgeCycles++;

    detector.scan(strategy);
    if (executor.isPaused()) return;

    // best margin first; each key is released back to the detector when done
    for (const opportunity of detector.take(strategy)) {
      try {
        const outcome = await executor.execute(opportunity);
        if (outcome.kind === "skipped") {
          log.debug("Opportunity skipped", { key: opportunity.key, reason: outcome.reason, detail: outcome.detail });
        }
      } finally {
        detector.complete(opportunity.key);
      }
      if (!this.running) break;
    }
  }

  /**
   * Retry unwinds of flagged positions while their market still trades,
   * settle whatever has resolved (flagged positions included), then let a
   * paused strategy resume once none of its positions is flagged.
   */
  async runSettlement(now = Date.now()): Promise<void> {
    const { tracker, catalog } = this.deps;
    for (const position of tracker.getFlaggedPositions()) {
      const exposure = position.exposure;
      if (!exposure || catalog.get(exposure)?.status.kind !== "Open") continue;
      const executor = this.executorFor(position.strategy);
      try {
        await executor.retryUnwind(position.id);
      } catch (err) {
        log.error("Retry unwind failed", { positionId: position.id, error: getErrorMessage(err) });
      }
    }

    await this.deps.settlement.checkSettlements(now);
    this.deps.crossExecutor.resumeIfClear();
    this.deps.hedgeExecutor.resumeIfClear();
    await this.deps.settlement.checkBalances(now);
  }

  // ---------------------------------------------------------------------------
  // Loop plumbing
  // ---------------------------------------------------------------------------

  private onQuote = (quote: { venue: string; marketId: string }): void => {
    const found = this.deps.detector.onQuote(quote);
    if (found.some((o) => o.strategy === "CrossPlatform")) this.wake("cross");
    if (found.some((o) => o.strategy === "SinglePlatformHedge")) this.wake("hedge");
  };

  private executorFor(strategy: StrategyKind): BaseExecutor {
    return strategy === "CrossPlatform" ? this.deps.crossExecutor : this.deps.hedgeExecutor;
  }

  private define(name: LoopName, intervalMs: number, task: () => Promise<void>): void {
    this.loops.set(name, { name, intervalMs, task, rerun: false });
  }

  private loop(name: LoopName): Loop {
    const loop = this.loops.get(name);
    if (!loop) throw new Error(`Unknown loop ${name}`);
    return loop;
  }

  private schedule(name: LoopName, delayMs: number): void {
    const loop = this.loop(name);
    if (loop.timer) clearTimeout(loop.timer);
    loop.timer = setTimeout(() => {
      loop.timer = undefined;
      loop.running = this.tick(loop);
    }, delayMs);
  }

  private async tick(loop: Loop): Promise<void> {
    try {
      await loop.task();
    } catch (err) {
      log.error("Scheduler loop failed", { loop: loop.name, error: getErrorMessage(err) });
    } finally {
      loop.running = undefined;
      if (this.running) {
        const rerun = loop.rerun;
        loop.rerun = false;
        this.schedule(loop.name, rerun ? 0 : loop.intervalMs);
      }
    }
  }
}
