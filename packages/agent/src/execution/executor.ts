import type {
  ExecutionOutcome,
  Leg,
  Opportunity,
  PriceQuote,
  SkipReason,
  StrategyKind,
  UnhedgedExposure,
} from "../types.js";
import type { VenueAdapter } from "../venues/types.js";
import type { MarketCatalog } from "../catalog/market-catalog.js";
import { marketKey } from "../catalog/market-catalog.js";
import type { QuoteStore } from "../scanner/quote-store.js";
import type { PositionTracker, Reservation } from "../positions/position-tracker.js";
import type { MarketLocks } from "./market-locks.js";
import { createLeg, isFullyFilled, transitionLeg } from "./legs.js";
import { runLeg, submitLeg, awaitLeg, unwindLeg, type LegTiming } from "./leg-saga.js";
import { costOf } from "../fixed-point.js";
import { marginOf } from "../arbitrage/pricing.js";
import { legTimeoutFor } from "../config.js";
import { CapacityExceededError, StaleDataError, UnhedgedExposureError, getErrorMessage } from "../errors.js";
import { withTimeout } from "../retry.js";
import { log } from "../logger.js";

export interface ExecutorDeps {
  adapters: Map<string, VenueAdapter>;
  catalog: MarketCatalog;
  quotes: QuoteStore;
  tracker: PositionTracker;
  locks: MarketLocks;
}

export interface ExecutorOptions {
  buffer: bigint;
  legTimeoutMs: number;
  legTimeoutOverrides: Map<string, number>;
  fillPollIntervalMs: number;
  venueCallTimeoutMs: number;
}

interface Revalidated {
  quotes: PriceQuote[];
  size: number;
}

function skipped(reason: SkipReason, detail?: string): ExecutionOutcome {
  return { kind: "skipped", reason, detail };
}

/**
 * Shared execution saga: lock → re-validate → reserve → submit → await →
 * compensate. Subclasses only decide how the legs are submitted.
 */
export abstract class BaseExecutor {
  abstract readonly strategy: StrategyKind;

  private paused = false;
  private pauseReason: string | undefined;
  private inFlight = new Set<Promise<ExecutionOutcome>>();
  private seq = 0;
  private executed = 0;

  constructor(
    protected readonly deps: ExecutorDeps,
    protected readonly options: ExecutorOptions,
  ) {}

  // ---------------------------------------------------------------------------
  // Control
  // ---------------------------------------------------------------------------

  isPaused(): boolean {
    return this.paused;
  }

  getPauseReason(): string | undefined {
    return this.pauseReason;
  }

  pause(reason: string): void {
    if (!this.paused) log.warn("Executor paused", { strategy: this.strategy, reason });
    this.paused = true;
    this.pauseReason = reason;
  }

  resume(): void {
    if (this.paused) log.info("Executor resumed", { strategy: this.strategy });
    this.paused = false;
    this.pauseReason = undefined;
  }

  getExecutedCount(): number {
    return this.executed;
  }

  /** Wait for every execution in flight, including their unwinds. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  execute(opportunity: Opportunity): Promise<ExecutionOutcome> {
    const run = this.run(opportunity);
    this.inFlight.add(run);
    return run.finally(() => {
      this.inFlight.delete(run);
    });
  }

  /**
   * Re-attempt the compensating SELL for a flagged position. Clears the
   * flag and resumes the executor once nothing of its strategy is flagged.
   */
  async retryUnwind(positionId: string): Promise<boolean> {
    const position = this.deps.tracker.get(positionId);
    const exposure = position?.exposure;
    if (!position || !exposure) return false;

    const adapter = this.deps.adapters.get(exposure.venue);
    if (!adapter) return false;

    const release = this.deps.locks.tryAcquire([marketKey(exposure)], `retry-${positionId}`);
    if (!release) {
      log.debug("Retry unwind deferred, market locked", { positionId, market: marketKey(exposure) });
      return false;
    }
    try {
      return await this.sellExposure(positionId, position.opportunityId, exposure, adapter);
    } finally {
      release();
    }
  }

  /** Resume once no position of this strategy carries unhedged exposure. */
  resumeIfClear(): boolean {
    if (!this.paused) return false;
    const stillFlagged = this.deps.tracker
      .getFlaggedPositions()
      .some((p) => p.strategy === this.strategy);
    if (stillFlagged) return false;
    this.resume();
    return true;
  }

  private async sellExposure(
    positionId: string,
    opportunityId: string,
    exposure: UnhedgedExposure,
    adapter: VenueAdapter,
  ): Promise<boolean> {
    const unwind = await unwindLeg(
      adapter,
      exposure,
      this.deps.catalog.get(exposure),
      this.nextLegId(opportunityId, "retry"),
      this.timing(exposure.venue),
    );

    if (!isFullyFilled(unwind)) {
      log.error("Retry unwind incomplete", {
        positionId,
        venue: exposure.venue,
        requested: exposure.size,
        filled: unwind.filledSize,
      });
      if (unwind.filledSize > 0) {
        this.deps.tracker.clearExposure(positionId, unwind);
        this.deps.tracker.flagExposure(positionId, { ...exposure, size: exposure.size - unwind.filledSize });
      }
      return false;
    }

    this.deps.tracker.clearExposure(positionId, unwind);
    log.info("Unhedged exposure cleared", { positionId, venue: exposure.venue, size: exposure.size });
    this.resumeIfClear();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Saga
  // ---------------------------------------------------------------------------

  protected abstract submitLegs(legs: Leg[]): Promise<Leg[]>;

  private async run(opp: Opportunity): Promise<ExecutionOutcome> {
    if (this.paused) return skipped("paused", this.pauseReason);
    if (Date.now() >= opp.expiresAt) return skipped("expired");

    const release = this.deps.locks.tryAcquire(
      opp.legs.map((l) => marketKey(l)),
      opp.id,
    );
    if (!release) return skipped("locked", opp.key);

    let reservation: Reservation | undefined;
    try {
      const checked = await this.revalidate(opp);
      if ("kind" in checked) return checked;

      const cost = checked.quotes.reduce((sum, q) => sum + costOf(q.bestAsk, checked.size), 0n);
      try {
        reservation = this.deps.tracker.reserveCapital(cost);
      } catch (err) {
        if (err instanceof CapacityExceededError) {
          log.info("Execution refused at capital ceiling", {
            opportunityId: opp.id,
            requested: err.requested,
            committed: err.committed,
            ceiling: err.ceiling,
          });
          return skipped("capacity", err.message);
        }
        throw err;
      }

      log.info("Executing opportunity", {
        opportunityId: opp.id,
        strategy: this.strategy,
        key: opp.key,
        size: checked.size,
        cost,
      });

      const legs = checked.quotes.map((q, i) =>
        createLeg(this.nextLegId(opp.id, String(i)), {
          venue: q.venue,
          marketId: q.marketId,
          side: q.side,
          action: "BUY",
          price: q.bestAsk,
          size: checked.size,
        }),
      );
      const settled = await this.submitLegs(legs);
      return await this.resolveOutcome(opp, settled, reservation);
    } catch (err) {
      log.error("Execution failed", { opportunityId: opp.id, error: getErrorMessage(err) });
      return { kind: "failed", legs: [], error: getErrorMessage(err) };
    } finally {
      if (reservation) this.deps.tracker.releaseReservation(reservation.id);
      release();
    }
  }

  /** Fresh quotes for every leg; the margin must still clear the buffer. */
  private async revalidate(opp: Opportunity): Promise<Revalidated | ExecutionOutcome> {
    const fetched: PriceQuote[] = [];
    for (const leg of opp.legs) {
      if (!this.deps.catalog.isTradable(leg)) return skipped("expired", `${leg.venue}:${leg.marketId} not tradable`);
      const adapter = this.deps.adapters.get(leg.venue);
      if (!adapter) return skipped("venue_unavailable", leg.venue);
      try {
        const quote = await withTimeout(
          adapter.getQuote(leg.marketId, leg.side),
          this.options.venueCallTimeoutMs,
          `${leg.venue} getQuote`,
          leg.venue,
        );
        this.deps.quotes.apply(quote);
      } catch (err) {
        log.warn("Re-validation quote failed", { venue: leg.venue, marketId: leg.marketId, error: getErrorMessage(err) });
        return skipped("venue_unavailable", getErrorMessage(err));
      }
      try {
        fetched.push(this.deps.quotes.requireFresh(leg, leg.side));
      } catch (err) {
        if (!(err instanceof StaleDataError)) throw err;
        log.info("Stale quote at re-validation", { opportunityId: opp.id, ...err.context });
        return skipped("stale_quotes", err.key);
      }
    }

    const total = fetched.reduce((sum, q) => sum + q.bestAsk, 0n);
    const margin = marginOf(fetched.map((q) => q.bestAsk), this.options.buffer);
    if (margin <= 0n || fetched.some((q) => q.bestAsk <= 0n)) {
      log.info("Margin collapsed before submission", { opportunityId: opp.id, totalCost: total });
      return skipped("margin_collapsed", `total cost ${total}`);
    }

    const target = Math.min(...opp.legs.map((l) => l.targetSize));
    const size = Math.floor(Math.min(target, ...fetched.map((q) => q.askSize)));
    if (size < 1) return skipped("size_too_small");
    return { quotes: fetched, size };
  }

  /**
   * Outcome matrix: all filled → Open; nothing filled → failed; anything
   * else unwinds the excess over the hedged quantity.
   */
  private async resolveOutcome(opp: Opportunity, legs: Leg[], reservation: Reservation): Promise<ExecutionOutcome> {
    const { tracker } = this.deps;

    if (legs.every(isFullyFilled)) {
      const position = tracker.recordPosition(
        { opportunityId: opp.id, strategy: this.strategy, legs },
        reservation.id,
      );
      this.executed++;
      log.info("All legs filled", { opportunityId: opp.id, positionId: position.id, costBasis: position.costBasis });
      return { kind: "executed", position };
    }

    if (legs.every((l) => l.filledSize === 0)) {
      const error = legs.map((l) => `${l.venue}:${l.state.kind}`).join(", ");
      log.warn("No leg filled", { opportunityId: opp.id, legs: error });
      return { kind: "failed", legs, error };
    }

    const hedged = Math.min(...legs.map((l) => l.filledSize));
    log.error("Partial execution, unwinding excess", {
      opportunityId: opp.id,
      hedged,
      fills: legs.map((l) => `${l.venue}:${l.side}=${l.filledSize}`).join(", "),
    });

    const unwinds: Leg[] = [];
    let exposure: UnhedgedExposure | undefined;
    for (const leg of legs) {
      const excess = leg.filledSize - hedged;
      if (excess <= 0) continue;
      const adapter = this.deps.adapters.get(leg.venue);
      const target = { venue: leg.venue, marketId: leg.marketId, side: leg.side, size: excess };
      const unwind = adapter
        ? await unwindLeg(adapter, target, this.deps.catalog.get(leg), this.nextLegId(opp.id, "u"), this.timing(leg.venue))
        : undefined;
      if (unwind) unwinds.push(unwind);
      const residual = excess - (unwind?.filledSize ?? 0);
      if (residual > 0 && !exposure) {
        exposure = {
          venue: leg.venue,
          marketId: leg.marketId,
          side: leg.side,
          size: residual,
          reason: unwind ? `unwind ${unwind.state.kind}` : "venue unavailable",
          flaggedAt: Date.now(),
        };
      }
    }

    const position = tracker.recordPosition(
      { opportunityId: opp.id, strategy: this.strategy, legs, unwinds, exposure, abandonReason: "unwound" },
      reservation.id,
    );

    if (exposure) {
      const error = new UnhedgedExposureError(position.id, exposure.venue, exposure.marketId, exposure.size);
      log.error(error.message, error.context);
      this.pause(`unhedged exposure in ${position.id}`);
      return { kind: "unhedged", position };
    }

    if (position.hedgedSize > 0) this.executed++;
    return { kind: "unwound", position };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  protected timing(venue: string): LegTiming {
    return {
      legTimeoutMs: legTimeoutFor(this.options, venue),
      fillPollIntervalMs: this.options.fillPollIntervalMs,
      venueCallTimeoutMs: this.options.venueCallTimeoutMs,
    };
  }

  protected adapterFor(leg: Leg): VenueAdapter {
    const adapter = this.deps.adapters.get(leg.venue);
    if (!adapter) throw new Error(`No adapter for venue ${leg.venue}`);
    return adapter;
  }

  private nextLegId(opportunityId: string, tag: string): string {
    return `${opportunityId}-${tag}-${++this.seq}`;
  }
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

/** Cross-platform: legs on different venues, always submitted together. */
export class TradeExecutor extends BaseExecutor {
  readonly strategy = "CrossPlatform" as const;

  protected async submitLegs(legs: Leg[]): Promise<Leg[]> {
    return Promise.all(legs.map((leg) => runLeg(this.adapterFor(leg), leg, this.timing(leg.venue))));
  }
}

/**
 * Single-venue hedge: both sides on one venue. Orders go out together when
 * the venue allows concurrent orders, otherwise one at a time; a rejected
 * first leg stops the second from being sent.
 */
export class HedgeExecutor extends BaseExecutor {
  readonly strategy = "SinglePlatformHedge" as const;

  protected async submitLegs(legs: Leg[]): Promise<Leg[]> {
    const first = legs[0];
    if (!first) return [];
    const adapter = this.adapterFor(first);
    const timing = this.timing(adapter.name);

    if (adapter.concurrentOrders) {
      const submitted = await Promise.all(legs.map((leg) => submitLeg(adapter, leg, timing)));
      return Promise.all(submitted.map((leg) => awaitLeg(adapter, leg, timing)));
    }

    const out: Leg[] = [];
    for (const leg of legs) {
      const anyFilled = out.some((l) => l.filledSize > 0);
      if (out.length > 0 && !anyFilled) {
        out.push(transitionLeg(leg, { type: "rejected", reason: "previous leg did not fill" }));
        continue;
      }
      out.push(await runLeg(adapter, leg, timing));
    }
    return out;
  }
}
