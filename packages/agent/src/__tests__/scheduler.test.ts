import { describe, it, expect, vi, afterEach } from "vitest";
import { fileURLToPath } from "node:url";
import { readFileSync } from "node:fs";
import { loadConfig, type Config } from "../config.js";
import { buildPaperVenues } from "../venues/paper-markets.js";
import { createAgent } from "../agent.js";
import type { StrategyScheduler } from "../scheduler/strategy-scheduler.js";
import { parseWad } from "../fixed-point.js";
import type { Market } from "../types.js";
import { PaperVenue, type PaperBook } from "../venues/paper-venue.js";

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  setLogLevel: vi.fn(),
}));

const MARKETS: unknown = JSON.parse(
  readFileSync(fileURLToPath(new URL("../../../../paper-markets.json", import.meta.url)), "utf8"),
);

function config(env: Record<string, string> = {}): Config {
  return loadConfig({
    VENUE_A: "polymarket",
    VENUE_B: "kalshi",
    HEDGE_VENUES: "polymarket",
    CATALOG_REFRESH_MS: "60000",
    SETTLEMENT_CHECK_MS: "60000",
    ...env,
  });
}

function agent(env?: Record<string, string>): StrategyScheduler {
  return createAgent(config(env), buildPaperVenues(MARKETS, parseWad("500")));
}

describe("StrategyScheduler", () => {
  let scheduler: StrategyScheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
  });

  it("matches the paper markets into confirmed pairs", async () => {
    scheduler = agent();
    await scheduler.refreshCatalog();

    expect(scheduler.getPairs().map((p) => [p.id, p.polarity])).toEqual([
      ["polymarket:pm-fed-cut-march|kalshi:KXFED-MAR-HOLD", "inverted"],
      ["polymarket:pm-btc-100k-dec31|kalshi:KXBTC-DEC31-100K", "aligned"],
    ]);
    expect(scheduler.getStatus().activePairs).toBe(2);
  });

  it("runs one cross-platform cycle end to end", async () => {
    scheduler = agent();
    await scheduler.refreshCatalog();
    await scheduler.pollQuotes();

    await scheduler.runStrategy("CrossPlatform");

    const status = scheduler.getStatus();
    expect(status.crossCycles).toBe(1);
    expect(status.tradesExecuted).toBe(1);
    expect(status.statistics.openPositions).toBe(1);
    // 50 contracts at 0.40 + 0.55
    expect(status.statistics.committedCapital).toBe(parseWad("47.5"));
  });

  it("runs one single-venue hedge cycle end to end", async () => {
    scheduler = agent();
    await scheduler.refreshCatalog();
    await scheduler.pollQuotes();

    await scheduler.runStrategy("SinglePlatformHedge");

    const status = scheduler.getStatus();
    expect(status.hedgeCycles).toBe(1);
    expect(status.tradesExecuted).toBe(1);
    // 40 contracts at 0.46 + 0.49
    expect(status.statistics.committedCapital).toBe(parseWad("38"));
  });

  it("does nothing before the catalog has been loaded", async () => {
    scheduler = agent();
    await scheduler.pollQuotes();
    await scheduler.runStrategy("CrossPlatform");
    expect(scheduler.getStatus().tradesExecuted).toBe(0);
  });

  it("trades both strategies from its own loops and stops cleanly", async () => {
    scheduler = agent({ QUOTE_POLL_MS: "20", CROSS_SCAN_MS: "20", HEDGE_SCAN_MS: "20" });
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    const running = scheduler;
    await vi.waitFor(() => expect(running.getStatus().tradesExecuted).toBe(2), { timeout: 3_000, interval: 20 });

    await scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getStatus().statistics.openPositions).toBe(2);
  });

  it("refuses a configuration without an adapter for a configured venue", () => {
    expect(() => createAgent(config({ VENUE_B: "limitless" }), buildPaperVenues(MARKETS, parseWad("500")))).toThrow(
      'No adapter configured for venue "limitless"',
    );
  });
});

// ---------------------------------------------------------------------------
// Unhedged exposure recovery
// ---------------------------------------------------------------------------

describe("StrategyScheduler settlement cycle", () => {
  const DAY = 24 * 60 * 60 * 1000;
  const QUESTION = "Will Bitcoin be above $100,000 on December 31?";
  let scheduler: StrategyScheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
  });

  function market(venue: string, marketId: string, expiresAt: number, status: Market["status"] = { kind: "Open" }): Market {
    return {
      venue,
      marketId,
      question: QUESTION,
      outcomeLabels: ["Yes", "No"],
      tickSize: parseWad("0.01"),
      expiresAt,
      status,
    };
  }

  function book(bid: string, ask: string, overrides?: Partial<PaperBook>): PaperBook {
    return { bestBid: parseWad(bid), bestAsk: parseWad(ask), bidSize: 10, askSize: 10, ...overrides };
  }

  /** One cross-platform trade whose second leg is rejected and whose unwind cannot fill. */
  async function strandedTrade() {
    const expiresAt = Date.now() + 2 * DAY;
    const polymarket = new PaperVenue({ name: "polymarket", balance: parseWad("500") });
    const kalshi = new PaperVenue({ name: "kalshi", balance: parseWad("500") });
    polymarket.setMarkets([market("polymarket", "pm-1", expiresAt)]);
    kalshi.setMarkets([market("kalshi", "k-1", expiresAt)]);
    polymarket.setBook("pm-1", "YES", book("0.38", "0.40", { bidSize: 0 }));
    kalshi.setBook("k-1", "NO", book("0.53", "0.55"));

    const running = createAgent(
      config({ HEDGE_VENUES: "kalshi", LEG_TIMEOUT_MS: "50", FILL_POLL_INTERVAL_MS: "5" }),
      [polymarket, kalshi],
    );
    scheduler = running;
    await running.refreshCatalog();
    await running.pollQuotes();
    // closed at the venue before the catalog notices
    kalshi.setMarkets([market("kalshi", "k-1", expiresAt, { kind: "Closed" })]);
    await running.runStrategy("CrossPlatform");
    return { scheduler: running, polymarket, kalshi, expiresAt };
  }

  it("pauses the strategy while a position carries unhedged exposure", async () => {
    const { scheduler: running } = await strandedTrade();

    const status = running.getStatus();
    expect(status.crossPaused).toBe(true);
    expect(status.crossPauseReason).toMatch(/^unhedged exposure in pos-/);
    expect(status.hedgePaused).toBe(false);
    expect(status.statistics.flaggedPositions).toBe(1);
    expect(status.statistics.committedCapital).toBe(parseWad("4"));
  });

  it("retries the unwind while the market still trades and resumes the strategy", async () => {
    const { scheduler: running, polymarket } = await strandedTrade();
    polymarket.setBook("pm-1", "YES", book("0.38", "0.40"));

    await running.runSettlement();

    const status = running.getStatus();
    expect(status.crossPaused).toBe(false);
    expect(status.crossPauseReason).toBeUndefined();
    expect(status.statistics.flaggedPositions).toBe(0);
    expect(status.statistics.abandonedPositions).toBe(1);
    expect(status.statistics.committedCapital).toBe(0n);
    expect(status.statistics.realizedPnl).toBe(-parseWad("0.2"));
  });

  it("settles the stranded contracts once both markets resolve and resumes the strategy", async () => {
    const { scheduler: running, polymarket, kalshi, expiresAt } = await strandedTrade();
    polymarket.resolve("pm-1", "YES");
    kalshi.resolve("k-1", "YES");

    await running.runSettlement(expiresAt + DAY);

    const status = running.getStatus();
    expect(status.crossPaused).toBe(false);
    expect(status.statistics.flaggedPositions).toBe(0);
    expect(status.statistics.settledPositions).toBe(1);
    expect(status.statistics.wonPositions).toBe(1);
    expect(status.statistics.committedCapital).toBe(0n);
    // 10 contracts bought at 0.40 pay out 1.0 each
    expect(status.statistics.realizedPnl).toBe(parseWad("6"));
  });
});
