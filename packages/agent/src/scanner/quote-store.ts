import { EventEmitter } from "eventemitter3";
import type { MarketRef, PriceQuote, Side } from "../types.js";
import { StaleDataError } from "../errors.js";

export interface QuoteStoreEvents {
  quote: (quote: PriceQuote) => void;
}

function quoteKey(venue: string, marketId: string, side: Side): string {
  return `${venue}:${marketId}:${side}`;
}

/**
 * Latest quote per (venue, market, side). Quotes are frozen and replaced,
 * never edited; a quote older than the stored one is discarded.
 */
export class QuoteStore extends EventEmitter<QuoteStoreEvents> {
  private quotes = new Map<string, PriceQuote>();
  private discarded = 0;

  constructor(private readonly stalenessMs: number) {
    super();
  }

  /** Returns false when the quote was out of order and dropped. */
  apply(quote: PriceQuote): boolean {
    const key = quoteKey(quote.venue, quote.marketId, quote.side);
    const current = this.quotes.get(key);
    if (current && quote.timestamp < current.timestamp) {
      this.discarded++;
      return false;
    }
    const frozen = Object.isFrozen(quote) ? quote : Object.freeze({ ...quote });
    this.quotes.set(key, frozen);
    this.emit("quote", frozen);
    return true;
  }

  update(quotes: PriceQuote[]): number {
    let applied = 0;
    for (const q of quotes) {
      if (this.apply(q)) applied++;
    }
    return applied;
  }

  /** Latest quote regardless of age */
  latest(ref: MarketRef, side: Side): PriceQuote | undefined {
    return this.quotes.get(quoteKey(ref.venue, ref.marketId, side));
  }

  /** Latest quote if no older than the staleness bound; stale quotes count as absent */
  fresh(ref: MarketRef, side: Side, now = Date.now()): PriceQuote | undefined {
    const quote = this.latest(ref, side);
    if (!quote || now - quote.timestamp > this.stalenessMs) return undefined;
    return quote;
  }

  /** Like `fresh`, but a missing or stale quote throws StaleDataError. */
  requireFresh(ref: MarketRef, side: Side, now = Date.now()): PriceQuote {
    const quote = this.fresh(ref, side, now);
    if (quote) return quote;
    const key = quoteKey(ref.venue, ref.marketId, side);
    const latest = this.latest(ref, side);
    throw new StaleDataError(key, latest ? now - latest.timestamp : undefined);
  }

  getStalenessMs(): number {
    return this.stalenessMs;
  }

  getCount(): number {
    return this.quotes.size;
  }

  getDiscardedCount(): number {
    return this.discarded;
  }
}
