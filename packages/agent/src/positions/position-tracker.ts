import type {
  ExposureSummary,
  Leg,
  Position,
  PositionStatistics,
  StrategyKind,
  UnhedgedExposure,
} from "../types.js";
import { ONE, costOf } from "../fixed-point.js";
import { ArbitrageEngineError, CapacityExceededError } from "../errors.js";
import { log } from "../logger.js";

export interface Reservation {
  id: string;
  amount: bigint;
  createdAt: number;
}

export interface NewPosition {
  opportunityId: string;
  strategy: StrategyKind;
  legs: Leg[];
  unwinds?: Leg[];
  exposure?: UnhedgedExposure;
  /** Used when nothing stayed hedged and no exposure remains */
  abandonReason?: string;
}

export interface VenueBalance {
  venue: string;
  balance: bigint;
  recordedAt: number;
}

// ---------------------------------------------------------------------------
// Derived accounting
// ---------------------------------------------------------------------------

function sameMarket(a: Leg, b: Leg): boolean {
  return a.venue === b.venue && a.marketId === b.marketId && a.side === b.side;
}

/** Contracts still held on a leg after its unwinds */
export function heldSize(leg: Leg, unwinds: Leg[]): number {
  const sold = unwinds.filter((u) => sameMarket(u, leg)).reduce((sum, u) => sum + u.filledSize, 0);
  return Math.max(0, leg.filledSize - sold);
}

interface Derived {
  costBasis: bigint;
  hedgedSize: number;
  /** Proceeds of unwinds minus the purchase cost of what they sold */
  unwindPnl: bigint;
}

export function derive(legs: Leg[], unwinds: Leg[]): Derived {
  let costBasis = 0n;
  let unwindPnl = 0n;
  let hedgedSize = legs.length > 0 ? Number.POSITIVE_INFINITY : 0;
  for (const leg of legs) {
    const held = heldSize(leg, unwinds);
    costBasis += costOf(leg.avgFillPrice, held);
    hedgedSize = Math.min(hedgedSize, held);
  }
  for (const unwind of unwinds) {
    const source = legs.find((l) => sameMarket(l, unwind));
    const boughtAt = source?.avgFillPrice ?? 0n;
    unwindPnl += costOf(unwind.avgFillPrice, unwind.filledSize) - costOf(boughtAt, unwind.filledSize);
  }
  return { costBasis, hedgedSize, unwindPnl };
}

function isActive(p: Position): boolean {
  return p.settlement.kind === "Open" || p.settlement.kind === "AwaitingSettlement";
}

function venueKey(p: Position): string {
  return [...new Set(p.legs.map((l) => l.venue))].join("+");
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

/**
 * Single source of truth for what is held. Positions and legs are owned
 * here; callers get copies and report changes through the methods below.
 * Committed capital (active cost basis plus reservations) never exceeds the
 * ceiling.
 */
export class PositionTracker {
  private positions = new Map<string, Position>();
  private reservations = new Map<string, Reservation>();
  private balances = new Map<string, VenueBalance>();
  private seq = 0;

  constructor(
    private readonly capitalCeiling: bigint,
    private readonly now: () => number = () => Date.now(),
  ) {}

  // --- capital -------------------------------------------------------------

  committedCapital(): bigint {
    let total = 0n;
    for (const p of this.positions.values()) {
      if (isActive(p)) total += p.costBasis;
    }
    for (const r of this.reservations.values()) total += r.amount;
    return total;
  }

  availableCapital(): bigint {
    return this.capitalCeiling - this.committedCapital();
  }

  /** Throws CapacityExceededError when the ceiling would be crossed. */
  reserveCapital(amount: bigint): Reservation {
    if (amount <= 0n) {
      throw new ArbitrageEngineError("Reservation amount must be positive", "INVALID_RESERVATION", {
        amount: amount.toString(),
      });
    }
    const committed = this.committedCapital();
    if (committed + amount > this.capitalCeiling) {
      throw new CapacityExceededError(amount, committed, this.capitalCeiling);
    }
    const reservation: Reservation = { id: `res-${++this.seq}`, amount, createdAt: this.now() };
    this.reservations.set(reservation.id, reservation);
    return { ...reservation };
  }

  releaseReservation(id: string): void {
    this.reservations.delete(id);
  }

  // --- positions -----------------------------------------------------------

  /**
   * Record the result of an execution. When a reservation is given it is
   * converted into the position's cost basis in the same step.
   */
  recordPosition(input: NewPosition, reservationId?: string): Position {
    const legs = input.legs.map((l) => ({ ...l }));
    const unwinds = (input.unwinds ?? []).map((l) => ({ ...l }));
    const { costBasis, hedgedSize, unwindPnl } = derive(legs, unwinds);
    const openedAt = this.now();
    const abandoned = hedgedSize === 0 && !input.exposure;

    const position: Position = {
      id: `pos-${++this.seq}`,
      opportunityId: input.opportunityId,
      strategy: input.strategy,
      legs,
      unwinds,
      costBasis,
      hedgedSize,
      realizedPnl: unwindPnl,
      unrealizedPnl: 0n,
      exposure: input.exposure ? { ...input.exposure } : undefined,
      settlement: abandoned
        ? { kind: "Abandoned", reason: input.abandonReason ?? "no hedged quantity", abandonedAt: openedAt }
        : { kind: "Open" },
      openedAt,
    };
    if (abandoned) {
      // anything still held unhedged without a flag is written off
      position.realizedPnl -= costBasis;
    } else {
      position.unrealizedPnl = BigInt(hedgedSize) * ONE - costBasis;
    }

    if (reservationId) this.reservations.delete(reservationId);
    this.positions.set(position.id, position);

    if (this.committedCapital() > this.capitalCeiling) {
      log.error("Committed capital above ceiling after fill", {
        positionId: position.id,
        committed: this.committedCapital(),
        ceiling: this.capitalCeiling,
      });
    }
    log.info("Position recorded", {
      positionId: position.id,
      strategy: position.strategy,
      state: position.settlement.kind,
      costBasis,
      hedgedSize,
      flagged: Boolean(position.exposure),
    });
    return this.copy(position);
  }

  updateLegFill(positionId: string, legId: string, filledSize: number, avgFillPrice: bigint): Position {
    const position = this.require(positionId);
    if (!isActive(position)) {
      throw new ArbitrageEngineError(`Position ${positionId} is closed`, "POSITION_CLOSED", { positionId });
    }
    const index = position.legs.findIndex((l) => l.id === legId);
    if (index === -1) {
      throw new ArbitrageEngineError(`Unknown leg ${legId}`, "UNKNOWN_LEG", { positionId, legId });
    }
    const leg = position.legs[index];
    position.legs[index] = { ...leg, filledSize, avgFillPrice };
    this.recompute(position);
    return this.copy(position);
  }

  get(positionId: string): Position | undefined {
    const p = this.positions.get(positionId);
    return p ? this.copy(p) : undefined;
  }

  all(): Position[] {
    return [...this.positions.values()].map((p) => this.copy(p));
  }

  getOpenPositions(): Position[] {
    return this.all().filter((p) => p.settlement.kind === "Open");
  }

  /** Open and AwaitingSettlement */
  getActivePositions(): Position[] {
    return this.all().filter(isActive);
  }

  getFlaggedPositions(): Position[] {
    return this.all().filter((p) => p.exposure !== undefined);
  }

  getExposureByVenue(): ExposureSummary[] {
    const byVenue = new Map<string, ExposureSummary & { ids: Set<string> }>();
    for (const p of this.positions.values()) {
      if (!isActive(p)) continue;
      for (const leg of p.legs) {
        const held = heldSize(leg, p.unwinds);
        if (held === 0) continue;
        const entry = byVenue.get(leg.venue) ?? {
          venue: leg.venue,
          committed: 0n,
          contracts: 0,
          openPositions: 0,
          unhedgedContracts: 0,
          ids: new Set<string>(),
        };
        entry.committed += costOf(leg.avgFillPrice, held);
        entry.contracts += held;
        entry.ids.add(p.id);
        entry.openPositions = entry.ids.size;
        byVenue.set(leg.venue, entry);
      }
      if (p.exposure) {
        const entry = byVenue.get(p.exposure.venue);
        if (entry) entry.unhedgedContracts += p.exposure.size;
      }
    }
    return [...byVenue.values()]
      .map(({ ids: _ids, ...summary }) => summary)
      .sort((a, b) => a.venue.localeCompare(b.venue));
  }

  // --- lifecycle -----------------------------------------------------------

  markAwaitingSettlement(positionId: string, since = this.now()): Position {
    const position = this.require(positionId);
    if (position.settlement.kind === "Open") {
      position.settlement = { kind: "AwaitingSettlement", since };
    }
    return this.copy(position);
  }

  /** Idempotent: a settled position keeps its first payout. */
  settle(positionId: string, payout: bigint, settledAt = this.now()): Position {
    const position = this.require(positionId);
    if (position.settlement.kind === "Settled" || position.settlement.kind === "Abandoned") {
      return this.copy(position);
    }
    position.realizedPnl += payout - position.costBasis;
    position.unrealizedPnl = 0n;
    position.settlement = { kind: "Settled", payout, settledAt };
    log.info("Position settled", {
      positionId,
      payout,
      costBasis: position.costBasis,
      realizedPnl: position.realizedPnl,
    });
    return this.copy(position);
  }

  /** Write off the remaining cost basis as a realized loss. */
  abandon(positionId: string, reason: string, abandonedAt = this.now()): Position {
    const position = this.require(positionId);
    if (!isActive(position)) return this.copy(position);
    position.realizedPnl -= position.costBasis;
    position.unrealizedPnl = 0n;
    position.settlement = { kind: "Abandoned", reason, abandonedAt };
    log.warn("Position abandoned", { positionId, reason, realizedPnl: position.realizedPnl });
    return this.copy(position);
  }

  flagExposure(positionId: string, exposure: UnhedgedExposure): Position {
    const position = this.require(positionId);
    position.exposure = { ...exposure };
    return this.copy(position);
  }

  /** Attach a completed compensating SELL and drop the exposure flag. */
  clearExposure(positionId: string, unwind?: Leg): Position {
    const position = this.require(positionId);
    position.exposure = undefined;
    if (!isActive(position)) return this.copy(position);
    if (unwind) position.unwinds.push({ ...unwind });
    this.recompute(position);
    if (position.hedgedSize === 0 && position.costBasis === 0n && isActive(position)) {
      position.settlement = { kind: "Abandoned", reason: "unwound", abandonedAt: this.now() };
      position.unrealizedPnl = 0n;
    }
    return this.copy(position);
  }

  // --- balances ------------------------------------------------------------

  recordBalance(venue: string, balance: bigint, recordedAt = this.now()): void {
    this.balances.set(venue, { venue, balance, recordedAt });
  }

  getBalances(): VenueBalance[] {
    return [...this.balances.values()].map((b) => ({ ...b }));
  }

  // --- statistics ----------------------------------------------------------

  getStatistics(): PositionStatistics {
    const stats: PositionStatistics = {
      totalPositions: this.positions.size,
      openPositions: 0,
      awaitingSettlement: 0,
      settledPositions: 0,
      wonPositions: 0,
      lostPositions: 0,
      abandonedPositions: 0,
      flaggedPositions: 0,
      committedCapital: this.committedCapital(),
      realizedPnl: 0n,
      unrealizedPnl: 0n,
      realizedPnlByVenue: {},
    };

    for (const p of this.positions.values()) {
      const kind = p.settlement.kind;
      switch (kind) {
        case "Open":
          stats.openPositions++;
          break;
        case "AwaitingSettlement":
          stats.awaitingSettlement++;
          break;
        case "Settled":
          stats.settledPositions++;
          if (p.settlement.payout > p.costBasis) stats.wonPositions++;
          else if (p.settlement.payout < p.costBasis) stats.lostPositions++;
          break;
        case "Abandoned":
          stats.abandonedPositions++;
          break;
      }
      if (p.exposure) stats.flaggedPositions++;
      stats.realizedPnl += p.realizedPnl;
      stats.unrealizedPnl += p.unrealizedPnl;
      const key = venueKey(p);
      stats.realizedPnlByVenue[key] = (stats.realizedPnlByVenue[key] ?? 0n) + p.realizedPnl;
    }
    return stats;
  }

  private recompute(position: Position): void {
    const { costBasis, hedgedSize, unwindPnl } = derive(position.legs, position.unwinds);
    position.costBasis = costBasis;
    position.hedgedSize = hedgedSize;
    position.realizedPnl = unwindPnl;
    position.unrealizedPnl = isActive(position) ? BigInt(hedgedSize) * ONE - costBasis : 0n;
  }

  private require(positionId: string): Position {
    const position = this.positions.get(positionId);
    if (!position) {
      throw new ArbitrageEngineError(`Unknown position ${positionId}`, "UNKNOWN_POSITION", { positionId });
    }
    return position;
  }

  private copy(position: Position): Position {
    return structuredClone(position);
  }
}
