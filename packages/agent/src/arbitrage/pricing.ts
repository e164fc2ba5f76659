import type { OpportunityLeg, PairPolarity, PriceQuote, Side } from "../types.js";
import { ONE } from "../fixed-point.js";

export interface PricingOptions {
  buffer: bigint;
  maxContractsPerTrade: number;
  /** Minimum top-of-book ask size on every leg */
  minLiquidity: number;
}

export interface PricedLegs {
  legs: OpportunityLeg[];
  totalCost: bigint;
  margin: bigint;
  size: number;
  oldestQuoteAt: number;
}

export function opposite(side: Side): Side {
  return side === "YES" ? "NO" : "YES";
}

/**
 * Side on venue B that pays out exactly when `side` on venue A does not.
 * Aligned pairs complement with the opposite side, inverted pairs with the same side.
 */
export function complementOnB(side: Side, polarity: PairPolarity): Side {
  return polarity === "aligned" ? opposite(side) : side;
}

/** ONE - Σ asks - buffer; positive means the combination pays out more than it costs */
export function marginOf(asks: bigint[], buffer: bigint): bigint {
  const total = asks.reduce((sum, ask) => sum + ask, 0n);
  return ONE - total - buffer;
}

/**
 * Price a set of complementary BUY legs against their quotes. Returns null
 * unless Σ asks + buffer < ONE and every leg has enough size.
 */
export function priceLegs(quotes: PriceQuote[], opts: PricingOptions): PricedLegs | null {
  if (quotes.length === 0) return null;
  if (quotes.some((q) => q.bestAsk <= 0n || q.bestAsk >= ONE)) return null;

  const totalCost = quotes.reduce((sum, q) => sum + q.bestAsk, 0n);
  const margin = marginOf(quotes.map((q) => q.bestAsk), opts.buffer);
  if (margin <= 0n) return null;

  const minAskSize = Math.min(...quotes.map((q) => q.askSize));
  if (minAskSize < opts.minLiquidity) return null;

  const size = Math.floor(Math.min(minAskSize, opts.maxContractsPerTrade));
  if (size < 1) return null;

  return {
    legs: quotes.map((q) => ({
      venue: q.venue,
      marketId: q.marketId,
      side: q.side,
      targetPrice: q.bestAsk,
      targetSize: size,
    })),
    totalCost,
    margin,
    size,
    oldestQuoteAt: Math.min(...quotes.map((q) => q.timestamp)),
  };
}
