import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Leg, Market, Side } from "../types.js";
import type { VenueAdapter } from "../venues/types.js";
import { MarketCatalog } from "../catalog/market-catalog.js";
import { PositionTracker } from "../positions/position-tracker.js";
import { SettlementChecker, computePayout } from "../settlement/settlement-checker.js";
import { PaperVenue } from "../venues/paper-venue.js";
import { createLeg } from "../execution/legs.js";
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
const HOUR = 60 * 60 * 1000;
const GRACE = 30 * 60 * 1000;

function market(venue: string, marketId: string): Market {
  return {
    venue,
    marketId,
    question: `${marketId} question`,
    outcomeLabels: ["Yes", "No"],
    tickSize: parseWad("0.01"),
    expiresAt: NOW + HOUR,
    status: { kind: "Open" },
  };
}

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

function setup() {
  const polymarket = new PaperVenue({ name: "polymarket", balance: parseWad("500") });
  const kalshi = new PaperVenue({ name: "kalshi", balance: parseWad("480") });
  const catalog = new MarketCatalog([polymarket, kalshi], {
    minTimeToExpiryMs: 0,
    maxTimeToExpiryMs: 24 * HOUR,
    marketKeywords: ["all"],
    catalogStalenessMs: 60_000,
    venueCallTimeoutMs: 200,
  });
  catalog.applyListing("polymarket", [market("polymarket", "pm-1")], NOW);
  catalog.applyListing("kalshi", [market("kalshi", "k-1")], NOW);

  const tracker = new PositionTracker(parseWad("100"), () => NOW);
  const adapters = new Map<string, VenueAdapter>([
    ["polymarket", polymarket],
    ["kalshi", kalshi],
  ]);
  const checker = new SettlementChecker(tracker, catalog, adapters, {
    venueCallTimeoutMs: 200,
    settlementGraceMs: GRACE,
  });
  const position = tracker.recordPosition({
    opportunityId: "x-1",
    strategy: "CrossPlatform",
    legs: [filled("a", "polymarket", "pm-1", "YES", "0.40", 10), filled("b", "kalshi", "k-1", "NO", "0.55", 10)],
  });
  return { polymarket, kalshi, catalog, tracker, checker, positionId: position.id };
}

describe("computePayout", () => {
  it("pays one unit per held contract on the winning side", () => {
    const { tracker, positionId } = setup();
    const position = tracker.get(positionId);
    if (!position) throw new Error("missing position");

    const outcomes = new Map<string, Side>([
      ["polymarket:pm-1", "NO"],
      ["kalshi:k-1", "NO"],
    ]);
    expect(computePayout(position, outcomes)).toBe(parseWad("10"));
  });
});

describe("SettlementChecker", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it("leaves positions alone before their markets expire", async () => {
    const report = await ctx.checker.checkSettlements(NOW + HOUR - 1);
    expect(report).toEqual({ checked: 0, awaiting: 0, settled: 0, delayed: 0, exposuresSettled: 0 });
    expect(ctx.tracker.get(ctx.positionId)?.settlement).toEqual({ kind: "Open" });
  });

  it("settles once every market has resolved", async () => {
    ctx.polymarket.resolve("pm-1", "YES");
    ctx.kalshi.resolve("k-1", "YES");

    const report = await ctx.checker.checkSettlements(NOW + 2 * HOUR);

    expect(report).toEqual({ checked: 1, awaiting: 0, settled: 1, delayed: 0, exposuresSettled: 0 });
    const position = ctx.tracker.get(ctx.positionId);
    expect(position?.settlement).toEqual({ kind: "Settled", payout: parseWad("10"), settledAt: NOW + 2 * HOUR });
    expect(position?.realizedPnl).toBe(parseWad("0.5"));
    expect(ctx.catalog.get({ venue: "kalshi", marketId: "k-1" })?.status).toEqual({ kind: "Resolved", outcome: "YES" });
  });

  it("does not settle twice", async () => {
    ctx.polymarket.resolve("pm-1", "NO");
    ctx.kalshi.resolve("k-1", "NO");
    await ctx.checker.checkSettlements(NOW + 2 * HOUR);

    const report = await ctx.checker.checkSettlements(NOW + 3 * HOUR);

    expect(report.checked).toBe(0);
    expect(ctx.tracker.getStatistics().realizedPnl).toBe(parseWad("0.5"));
  });

  it("waits for an unresolved market and reports the delay past grace", async () => {
    ctx.polymarket.resolve("pm-1", "YES");

    const first = await ctx.checker.checkSettlements(NOW + 2 * HOUR);
    expect(first).toEqual({ checked: 1, awaiting: 1, settled: 0, delayed: 0, exposuresSettled: 0 });
    expect(ctx.tracker.get(ctx.positionId)?.settlement).toEqual({ kind: "AwaitingSettlement", since: NOW + 2 * HOUR });

    const later = await ctx.checker.checkSettlements(NOW + 2 * HOUR + GRACE + 1);
    expect(later).toEqual({ checked: 1, awaiting: 1, settled: 0, delayed: 1, exposuresSettled: 0 });
  });

  it("pays out the unhedged residual of a flagged position at resolution", async () => {
    const flagged = ctx.tracker.recordPosition({
      opportunityId: "x-2",
      strategy: "CrossPlatform",
      legs: [filled("c", "polymarket", "pm-1", "YES", "0.40", 10), filled("d", "kalshi", "k-1", "NO", "0.55", 6)],
      exposure: {
        venue: "polymarket",
        marketId: "pm-1",
        side: "YES",
        size: 4,
        reason: "unwind TimedOut",
        flaggedAt: NOW,
      },
    });
    ctx.polymarket.resolve("pm-1", "YES");
    ctx.kalshi.resolve("k-1", "YES");

    const report = await ctx.checker.checkSettlements(NOW + 2 * HOUR);

    expect(report).toEqual({ checked: 2, awaiting: 0, settled: 2, delayed: 0, exposuresSettled: 1 });
    const position = ctx.tracker.get(flagged.id);
    expect(position?.settlement).toEqual({ kind: "Settled", payout: parseWad("10"), settledAt: NOW + 2 * HOUR });
    expect(position?.realizedPnl).toBe(parseWad("2.7"));
    expect(position?.exposure).toBeUndefined();
    expect(ctx.tracker.getFlaggedPositions()).toEqual([]);
    expect(ctx.tracker.committedCapital()).toBe(0n);
  });

  it("keeps the flag while a market of a flagged position is unresolved", async () => {
    ctx.polymarket.resolve("pm-1", "YES");
    ctx.tracker.flagExposure(ctx.positionId, {
      venue: "polymarket",
      marketId: "pm-1",
      side: "YES",
      size: 2,
      reason: "unwind TimedOut",
      flaggedAt: NOW,
    });

    const report = await ctx.checker.checkSettlements(NOW + 2 * HOUR);

    expect(report).toEqual({ checked: 1, awaiting: 1, settled: 0, delayed: 0, exposuresSettled: 0 });
    expect(ctx.tracker.get(ctx.positionId)?.exposure?.size).toBe(2);
  });

  it("records every venue balance", async () => {
    expect(await ctx.checker.checkBalances(NOW)).toBe(2);
    expect(ctx.tracker.getBalances().map((b) => [b.venue, b.balance])).toEqual([
      ["polymarket", parseWad("500")],
      ["kalshi", parseWad("480")],
    ]);
  });
});
