import { describe, it, expect, vi } from "vitest";
import type { Leg, Side } from "../types.js";
import { PositionTracker } from "../positions/position-tracker.js";
import { createLeg } from "../execution/legs.js";
import { CapacityExceededError } from "../errors.js";
import { parseWad } from "../fixed-point.js";

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const NOW = 1_700_000_000_000;

function filled(id: string, venue: string, marketId: string, side: Side, price: string, size: number): Leg {
  const avgFillPrice = parseWad(price);
  return {
    ...createLeg(id, { venue, marketId, side, action: "BUY", price: avgFillPrice, size }),
    orderId: `o-${id}`,
    filledSize: size,
    avgFillPrice,
    state: { kind: "Filled", orderId: `o-${id}`, filledSize: size, avgFillPrice },
  };
}

function crossLegs(size = 10): Leg[] {
  return [
    filled("a", "polymarket", "pm-1", "YES", "0.40", size),
    filled("b", "kalshi", "k-1", "NO", "0.55", size),
  ];
}

function tracker(ceiling = "100"): PositionTracker {
  return new PositionTracker(parseWad(ceiling), () => NOW);
}

describe("PositionTracker capital", () => {
  it("reserves capital up to the ceiling", () => {
    const t = tracker("10");
    t.reserveCapital(parseWad("6"));

    expect(t.committedCapital()).toBe(parseWad("6"));
    expect(t.availableCapital()).toBe(parseWad("4"));
    expect(() => t.reserveCapital(parseWad("4.01"))).toThrow(CapacityExceededError);
    expect(t.reserveCapital(parseWad("4")).amount).toBe(parseWad("4"));
  });

  it("rejects a non-positive reservation", () => {
    expect(() => tracker().reserveCapital(0n)).toThrow("Reservation amount must be positive");
  });

  it("converts a reservation into cost basis without double counting", () => {
    const t = tracker();
    const reservation = t.reserveCapital(parseWad("9.5"));

    t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() }, reservation.id);

    expect(t.committedCapital()).toBe(parseWad("9.5"));
  });

  it("frees a released reservation", () => {
    const t = tracker();
    const reservation = t.reserveCapital(parseWad("9.5"));
    t.releaseReservation(reservation.id);
    expect(t.committedCapital()).toBe(0n);
  });
});

describe("PositionTracker positions", () => {
  it("records a hedged position with its locked-in profit", () => {
    const t = tracker();
    const position = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });

    expect(position.id).toBe("pos-1");
    expect(position.costBasis).toBe(parseWad("9.5"));
    expect(position.hedgedSize).toBe(10);
    expect(position.unrealizedPnl).toBe(parseWad("0.5"));
    expect(position.settlement).toEqual({ kind: "Open" });
    expect(position.openedAt).toBe(NOW);
  });

  it("hands out copies", () => {
    const t = tracker();
    const position = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });
    position.legs[0].filledSize = 0;
    expect(t.get(position.id)?.legs[0].filledSize).toBe(10);
  });

  it("settles once and keeps the first payout", () => {
    const t = tracker();
    const { id } = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });

    const settled = t.settle(id, parseWad("10"), NOW + 1);
    const again = t.settle(id, 0n, NOW + 2);

    expect(settled.realizedPnl).toBe(parseWad("0.5"));
    expect(settled.settlement).toEqual({ kind: "Settled", payout: parseWad("10"), settledAt: NOW + 1 });
    expect(again).toEqual(settled);
    expect(t.committedCapital()).toBe(0n);
  });

  it("writes off the cost basis when abandoned", () => {
    const t = tracker();
    const { id } = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });
    const abandoned = t.abandon(id, "venue delisted");
    expect(abandoned.realizedPnl).toBe(-parseWad("9.5"));
    expect(abandoned.settlement).toEqual({ kind: "Abandoned", reason: "venue delisted", abandonedAt: NOW });
  });

  it("refuses fill updates on a closed position", () => {
    const t = tracker();
    const { id } = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });
    t.settle(id, parseWad("10"));
    expect(() => t.updateLegFill(id, "a", 5, parseWad("0.40"))).toThrow(`Position ${id} is closed`);
  });

  it("recomputes cost basis on a fill update", () => {
    const t = tracker();
    const { id } = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });
    const updated = t.updateLegFill(id, "a", 5, parseWad("0.40"));
    expect(updated.costBasis).toBe(parseWad("7.5"));
    expect(updated.hedgedSize).toBe(5);
  });

  it("summarizes exposure per venue", () => {
    const t = tracker();
    t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });
    t.recordPosition({
      opportunityId: "h-1",
      strategy: "SinglePlatformHedge",
      legs: [
        filled("c", "polymarket", "pm-2", "YES", "0.46", 5),
        filled("d", "polymarket", "pm-2", "NO", "0.49", 5),
      ],
    });

    expect(t.getExposureByVenue()).toEqual([
      { venue: "kalshi", committed: parseWad("5.5"), contracts: 10, openPositions: 1, unhedgedContracts: 0 },
      { venue: "polymarket", committed: parseWad("8.75"), contracts: 20, openPositions: 2, unhedgedContracts: 0 },
    ]);
  });

  it("counts won and lost positions and keys P&L by venue", () => {
    const t = tracker();
    const won = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs: crossLegs() });
    const lost = t.recordPosition({ opportunityId: "x-2", strategy: "CrossPlatform", legs: crossLegs() });
    t.settle(won.id, parseWad("10"));
    t.settle(lost.id, 0n);

    const stats = t.getStatistics();

    expect(stats.settledPositions).toBe(2);
    expect(stats.wonPositions).toBe(1);
    expect(stats.lostPositions).toBe(1);
    expect(stats.realizedPnl).toBe(parseWad("0.5") - parseWad("9.5"));
    expect(stats.realizedPnlByVenue).toEqual({ "polymarket+kalshi": -parseWad("9") });
  });

  it("keeps a flagged position open until its exposure is cleared", () => {
    const t = tracker();
    const legs = [filled("a", "polymarket", "pm-1", "YES", "0.40", 10), { ...crossLegs()[1], filledSize: 0 }];
    const exposure = {
      venue: "polymarket",
      marketId: "pm-1",
      side: "YES" as const,
      size: 10,
      reason: "unwind TimedOut",
      flaggedAt: NOW,
    };

    const position = t.recordPosition({ opportunityId: "x-1", strategy: "CrossPlatform", legs, exposure });

    expect(position.settlement).toEqual({ kind: "Open" });
    expect(t.getStatistics().flaggedPositions).toBe(1);
    expect(t.getExposureByVenue()[0]).toMatchObject({ venue: "polymarket", contracts: 10, unhedgedContracts: 10 });

    const cleared = t.clearExposure(position.id);
    expect(cleared.exposure).toBeUndefined();
    expect(t.getFlaggedPositions()).toEqual([]);
  });

  it("records venue balances", () => {
    const t = tracker();
    t.recordBalance("kalshi", parseWad("480"));
    expect(t.getBalances()).toEqual([{ venue: "kalshi", balance: parseWad("480"), recordedAt: NOW }]);
  });
});
