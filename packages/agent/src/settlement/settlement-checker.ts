import type { MarketRef, Position, Side } from "../types.js";
import type { VenueAdapter } from "../venues/types.js";
import type { MarketCatalog } from "../catalog/market-catalog.js";
import { marketKey } from "../catalog/market-catalog.js";
import type { PositionTracker } from "../positions/position-tracker.js";
import { heldSize } from "../positions/position-tracker.js";
import { ONE } from "../fixed-point.js";
import { getErrorMessage } from "../errors.js";
import { withRetry, withTimeout } from "../retry.js";
import { log } from "../logger.js";

export interface SettlementOptions {
  venueCallTimeoutMs: number;
  /** Past this wait a position still awaiting settlement is reported every cycle */
  settlementGraceMs: number;
}

export interface SettlementReport {
  checked: number;
  awaiting: number;
  settled: number;
  delayed: number;
  /** Flagged positions whose unhedged contracts were paid out at resolution */
  exposuresSettled: number;
}

/** Σ held contracts on legs whose side matches the outcome of their market */
export function computePayout(position: Position, outcomes: Map<string, Side>): bigint {
  let payout = 0n;
  for (const leg of position.legs) {
    const outcome = outcomes.get(marketKey(leg));
    if (outcome === leg.side) payout += BigInt(heldSize(leg, position.unwinds)) * ONE;
  }
  return payout;
}

function legMarkets(position: Position): MarketRef[] {
  const seen = new Map<string, MarketRef>();
  for (const leg of position.legs) {
    seen.set(marketKey(leg), { venue: leg.venue, marketId: leg.marketId });
  }
  return [...seen.values()];
}

/**
 * Reconciles positions whose markets have expired. Outcomes are taken only
 * from the venue; an unresolved market leaves the position waiting.
 */
export class SettlementChecker {
  constructor(
    private readonly tracker: PositionTracker,
    private readonly catalog: MarketCatalog,
    private readonly adapters: Map<string, VenueAdapter>,
    private readonly options: SettlementOptions,
  ) {}

  async checkSettlements(now = Date.now()): Promise<SettlementReport> {
    const report: SettlementReport = { checked: 0, awaiting: 0, settled: 0, delayed: 0, exposuresSettled: 0 };

    for (const position of this.tracker.getActivePositions()) {
      const refs = legMarkets(position);
      if (!refs.every((ref) => this.hasExpired(ref, now))) continue;
      report.checked++;

      const waiting = this.tracker.markAwaitingSettlement(position.id, now);
      const outcomes = new Map<string, Side>();
      for (const ref of refs) {
        const outcome = await this.resolve(ref);
        if (outcome) outcomes.set(marketKey(ref), outcome);
      }

      if (outcomes.size === refs.length) {
        // held contracts include any unhedged residual, so resolution pays it out too
        this.tracker.settle(position.id, computePayout(position, outcomes), now);
        report.settled++;
        if (position.exposure) {
          this.tracker.clearExposure(position.id);
          report.exposuresSettled++;
          log.warn("Unhedged exposure settled at resolution", {
            positionId: position.id,
            venue: position.exposure.venue,
            marketId: position.exposure.marketId,
            size: position.exposure.size,
          });
        }
        continue;
      }

      report.awaiting++;
      const since = waiting.settlement.kind === "AwaitingSettlement" ? waiting.settlement.since : now;
      if (now - since > this.options.settlementGraceMs) {
        report.delayed++;
        log.warn("Settlement delayed beyond grace period", {
          positionId: position.id,
          waitingMs: now - since,
          markets: refs.map(marketKey).join(", "),
        });
      }
    }

    if (report.settled > 0 || report.awaiting > 0) {
      log.info("Settlement check complete", { ...report });
    }
    return report;
  }

  /** Record every venue's balance with the tracker. */
  async checkBalances(now = Date.now()): Promise<number> {
    let recorded = 0;
    for (const adapter of this.adapters.values()) {
      try {
        const balance = await withTimeout(
          adapter.getBalance(),
          this.options.venueCallTimeoutMs,
          `${adapter.name} getBalance`,
          adapter.name,
        );
        this.tracker.recordBalance(adapter.name, balance, now);
        recorded++;
      } catch (err) {
        log.warn("Balance check failed", { venue: adapter.name, error: getErrorMessage(err) });
      }
    }
    return recorded;
  }

  private hasExpired(ref: MarketRef, now: number): boolean {
    const market = this.catalog.get(ref);
    if (!market) return false;
    return market.status.kind !== "Open" || market.expiresAt <= now;
  }

  private async resolve(ref: MarketRef): Promise<Side | null> {
    const market = this.catalog.get(ref);
    if (market?.status.kind === "Resolved") return market.status.outcome;

    const adapter = this.adapters.get(ref.venue);
    if (!adapter) return null;
    try {
      const outcome = await withRetry(
        () => withTimeout(
          adapter.getResolution(ref.marketId),
          this.options.venueCallTimeoutMs,
          `${ref.venue} getResolution`,
          ref.venue,
        ),
        { label: `${ref.venue} getResolution`, maxAttempts: 2 },
      );
      if (outcome) this.catalog.markResolved(ref, outcome);
      return outcome;
    } catch (err) {
      log.warn("Resolution query failed", { venue: ref.venue, marketId: ref.marketId, error: getErrorMessage(err) });
      return null;
    }
  }
}
