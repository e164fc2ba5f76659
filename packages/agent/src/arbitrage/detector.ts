import type {
  MarketRef,
  MatchedPair,
  Opportunity,
  PriceQuote,
  Side,
  StrategyKind,
} from "../types.js";
import type { MarketCatalog } from "../catalog/market-catalog.js";
import { marketKey } from "../catalog/market-catalog.js";
import type { QuoteStore } from "../scanner/quote-store.js";
import { complementOnB, priceLegs, type PricedLegs, type PricingOptions } from "./pricing.js";
import { log } from "../logger.js";

const SIDES: Side[] = ["YES", "NO"];

export function hedgeKey(ref: MarketRef): string {
  return marketKey(ref);
}

export function rankOpportunities(opportunities: Opportunity[]): Opportunity[] {
  return [...opportunities].sort((a, b) => {
    if (a.margin !== b.margin) return a.margin > b.margin ? -1 : 1;
    return a.key.localeCompare(b.key);
  });
}

/**
 * Evaluates confirmed pairs (cross-platform) and single markets (hedge)
 * against the freshest quotes and keeps at most one outstanding,
 * unexecuted opportunity per pair or market.
 */
export class ArbitrageDetector {
  private pairs = new Map<string, MatchedPair>();
  private pairsByMarket = new Map<string, Set<string>>();
  private hedgeMarkets = new Map<string, MarketRef>();
  private outstanding = new Map<string, Opportunity>();
  private claimed = new Set<string>();
  private seq = 0;

  constructor(
    private readonly catalog: MarketCatalog,
    private readonly quotes: QuoteStore,
    private readonly pricing: PricingOptions,
  ) {}

  // ---------------------------------------------------------------------------
  // Inputs
  // ---------------------------------------------------------------------------

  setPairs(pairs: MatchedPair[]): void {
    this.pairs.clear();
    this.pairsByMarket.clear();
    for (const pair of pairs) {
      if (!pair.confirmed) continue;
      this.pairs.set(pair.id, pair);
      for (const ref of [pair.marketA, pair.marketB]) {
        const ids = this.pairsByMarket.get(marketKey(ref)) ?? new Set<string>();
        ids.add(pair.id);
        this.pairsByMarket.set(marketKey(ref), ids);
      }
    }
    // retracted pairs must not keep an outstanding opportunity
    for (const [key, opp] of this.outstanding) {
      if (opp.strategy === "CrossPlatform" && !this.pairs.has(key)) {
        this.outstanding.delete(key);
      }
    }
  }

  setHedgeMarkets(refs: MarketRef[]): void {
    this.hedgeMarkets = new Map(refs.map((r) => [hedgeKey(r), r]));
    for (const [key, opp] of this.outstanding) {
      if (opp.strategy === "SinglePlatformHedge" && !this.hedgeMarkets.has(key)) {
        this.outstanding.delete(key);
      }
    }
  }

  getPairs(): MatchedPair[] {
    return [...this.pairs.values()];
  }

  getHedgeMarkets(): MarketRef[] {
    return [...this.hedgeMarkets.values()];
  }

  // ---------------------------------------------------------------------------
  // Evaluation
  // ---------------------------------------------------------------------------

  /** Best complementary combination across the pair, or null. */
  evaluatePair(pair: MatchedPair, now = Date.now()): Opportunity | null {
    if (!this.catalog.isTradable(pair.marketA, now) || !this.catalog.isTradable(pair.marketB, now)) {
      return null;
    }

    let best: PricedLegs | null = null;
    for (const sideA of SIDES) {
      const quoteA = this.quotes.fresh(pair.marketA, sideA, now);
      const quoteB = this.quotes.fresh(pair.marketB, complementOnB(sideA, pair.polarity), now);
      if (!quoteA || !quoteB) continue;
      const priced = priceLegs([quoteA, quoteB], this.pricing);
      if (priced && (!best || priced.margin > best.margin)) best = priced;
    }
    return best ? this.build(pair.id, "CrossPlatform", best, now) : null;
  }

  evaluateMarket(ref: MarketRef, now = Date.now()): Opportunity | null {
    if (!this.catalog.isTradable(ref, now)) return null;
    const yes = this.quotes.fresh(ref, "YES", now);
    const no = this.quotes.fresh(ref, "NO", now);
    if (!yes || !no) return null;
    const priced = priceLegs([yes, no], this.pricing);
    return priced ? this.build(hedgeKey(ref), "SinglePlatformHedge", priced, now) : null;
  }

  /** Re-evaluate everything touching the quoted market. */
  onQuote(quote: Pick<PriceQuote, "venue" | "marketId">, now = Date.now()): Opportunity[] {
    const ref: MarketRef = { venue: quote.venue, marketId: quote.marketId };
    const found: Opportunity[] = [];

    for (const pairId of this.pairsByMarket.get(marketKey(ref)) ?? []) {
      const pair = this.pairs.get(pairId);
      if (!pair) continue;
      const opp = this.record(pair.id, this.evaluatePair(pair, now));
      if (opp) found.push(opp);
    }

    const key = hedgeKey(ref);
    if (this.hedgeMarkets.has(key)) {
      const opp = this.record(key, this.evaluateMarket(ref, now));
      if (opp) found.push(opp);
    }
    return found;
  }

  /** Full sweep over every pair and hedge market. */
  scan(strategy: StrategyKind, now = Date.now()): Opportunity[] {
    const found: Opportunity[] = [];
    if (strategy === "CrossPlatform") {
      for (const pair of this.pairs.values()) {
        const opp = this.record(pair.id, this.evaluatePair(pair, now));
        if (opp) found.push(opp);
      }
    } else {
      for (const [key, ref] of this.hedgeMarkets) {
        const opp = this.record(key, this.evaluateMarket(ref, now));
        if (opp) found.push(opp);
      }
    }
    return rankOpportunities(found);
  }

  // ---------------------------------------------------------------------------
  // Outstanding stream
  // ---------------------------------------------------------------------------

  /** Outstanding opportunities for a strategy, best margin first, without claiming them. */
  pending(strategy: StrategyKind, now = Date.now()): Opportunity[] {
    return rankOpportunities(
      [...this.outstanding.values()].filter((o) => o.strategy === strategy && o.expiresAt > now),
    );
  }

  /**
   * Claim every live outstanding opportunity of a strategy for execution.
   * A claimed key is not re-emitted until complete(key).
   */
  take(strategy: StrategyKind, now = Date.now()): Opportunity[] {
    const taken: Opportunity[] = [];
    for (const [key, opp] of this.outstanding) {
      if (opp.strategy !== strategy) continue;
      this.outstanding.delete(key);
      if (opp.expiresAt <= now) continue;
      this.claimed.add(key);
      taken.push(opp);
    }
    return rankOpportunities(taken);
  }

  complete(key: string): void {
    this.claimed.delete(key);
  }

  private record(key: string, opp: Opportunity | null): Opportunity | null {
    if (this.claimed.has(key)) return null;
    if (!opp) {
      this.outstanding.delete(key);
      return null;
    }
    const previous = this.outstanding.get(key);
    this.outstanding.set(key, opp);
    if (!previous || previous.margin !== opp.margin) {
      log.debug("Opportunity detected", {
        key,
        strategy: opp.strategy,
        margin: opp.margin,
        totalCost: opp.totalCost,
        size: opp.legs[0]?.targetSize,
      });
    }
    return opp;
  }

  private build(key: string, strategy: StrategyKind, priced: PricedLegs, now: number): Opportunity {
    return {
      id: `${strategy === "CrossPlatform" ? "x" : "h"}-${++this.seq}-${now}`,
      key,
      strategy,
      legs: priced.legs,
      totalCost: priced.totalCost,
      buffer: this.pricing.buffer,
      margin: priced.margin,
      expectedProfit: priced.margin * BigInt(priced.size),
      detectedAt: now,
      expiresAt: priced.oldestQuoteAt + this.quotes.getStalenessMs(),
    };
  }
}
