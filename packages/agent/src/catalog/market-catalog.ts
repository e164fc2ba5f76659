import type { Market, MarketRef, MarketStatus, Side } from "../types.js";
import type { VenueAdapter } from "../venues/types.js";
import { FatalVenueError, getErrorMessage } from "../errors.js";
import { withRetry, withTimeout } from "../retry.js";
import { log } from "../logger.js";

export interface CatalogFilters {
  minTimeToExpiryMs: number;
  maxTimeToExpiryMs: number;
  /** Lowercase keywords matched against question, slug and category; "all" disables */
  marketKeywords: string[];
  catalogStalenessMs: number;
  venueCallTimeoutMs: number;
}

const STATUS_RANK: Record<MarketStatus["kind"], number> = {
  Open: 0,
  Closed: 1,
  Resolved: 2,
};

export function marketKey(ref: MarketRef): string {
  return `${ref.venue}:${ref.marketId}`;
}

/**
 * Normalized view of every venue's binary markets. Market records are
 * replaced, never edited; only status changes and it only moves forward.
 */
export class MarketCatalog {
  private adapters: Map<string, VenueAdapter>;
  private filters: CatalogFilters;
  private byVenue = new Map<string, Map<string, Market>>();
  private refreshedAt = new Map<string, number>();

  constructor(adapters: VenueAdapter[], filters: CatalogFilters) {
    this.adapters = new Map(adapters.map((a) => [a.name, a]));
    this.filters = filters;
  }

  venues(): string[] {
    return [...this.adapters.keys()];
  }

  async refresh(venue: string, now = Date.now()): Promise<number> {
    const adapter = this.adapters.get(venue);
    if (!adapter) throw new Error(`Unknown venue: ${venue}`);

    try {
      const listing = await withRetry(
        () => withTimeout(adapter.listMarkets(), this.filters.venueCallTimeoutMs, `${venue} listMarkets`, venue),
        { label: `${venue} listMarkets` },
      );
      const changed = this.applyListing(venue, listing, now);
      log.info("Catalog refreshed", { venue, markets: listing.length, changed });
      return changed;
    } catch (err) {
      const fatal = err instanceof FatalVenueError;
      log.error(fatal ? "Catalog refresh failed (fatal)" : "Catalog refresh failed", {
        venue,
        error: getErrorMessage(err),
      });
      return 0;
    }
  }

  /**
   * Merge a full listing for one venue. Markets missing from the listing are
   * treated as closed. Returns the number of inserted or status-changed markets.
   */
  applyListing(venue: string, listing: Market[], now: number): number {
    const current = this.byVenue.get(venue) ?? new Map<string, Market>();
    const next = new Map<string, Market>();
    let changed = 0;

    for (const incoming of listing) {
      if (incoming.venue !== venue) continue;
      const existing = current.get(incoming.marketId);
      if (!existing) {
        next.set(incoming.marketId, Object.freeze({ ...incoming }));
        changed++;
        continue;
      }
      const merged = this.advanceStatus(existing, incoming.status);
      if (merged !== existing) changed++;
      next.set(incoming.marketId, merged);
    }

    for (const [marketId, existing] of current) {
      if (next.has(marketId)) continue;
      const closed = this.advanceStatus(existing, { kind: "Closed" });
      if (closed !== existing) changed++;
      next.set(marketId, closed);
    }

    this.byVenue.set(venue, next);
    this.refreshedAt.set(venue, now);
    return changed;
  }

  get(ref: MarketRef): Market | undefined {
    return this.byVenue.get(ref.venue)?.get(ref.marketId);
  }

  markets(venue: string): Market[] {
    return [...(this.byVenue.get(venue)?.values() ?? [])];
  }

  lastRefresh(venue: string): number {
    return this.refreshedAt.get(venue) ?? 0;
  }

  markResolved(ref: MarketRef, outcome: Side): void {
    const venueMarkets = this.byVenue.get(ref.venue);
    const existing = venueMarkets?.get(ref.marketId);
    if (!venueMarkets || !existing) return;
    venueMarkets.set(ref.marketId, this.advanceStatus(existing, { kind: "Resolved", outcome }));
  }

  /** Open markets that pass the expiry window and keyword filters. Empty when the venue's data is stale. */
  tradableMarkets(venue: string, now = Date.now()): Market[] {
    const refreshed = this.lastRefresh(venue);
    if (refreshed === 0 || now - refreshed > this.filters.catalogStalenessMs) {
      return [];
    }
    return this.markets(venue).filter((m) => m.status.kind === "Open" && this.passesFilters(m, now));
  }

  isTradable(ref: MarketRef, now = Date.now()): boolean {
    const market = this.get(ref);
    return market !== undefined && market.status.kind === "Open" && now < market.expiresAt;
  }

  private passesFilters(market: Market, now: number): boolean {
    const timeToExpiry = market.expiresAt - now;
    if (timeToExpiry < this.filters.minTimeToExpiryMs || timeToExpiry > this.filters.maxTimeToExpiryMs) {
      return false;
    }
    const keywords = this.filters.marketKeywords.map((k) => k.toLowerCase());
    if (keywords.length === 0 || keywords.includes("all")) return true;
    const haystack = [market.question, market.slug ?? "", market.category ?? ""].join(" ").toLowerCase();
    return keywords.some((k) => haystack.includes(k));
  }

  private advanceStatus(market: Market, status: MarketStatus): Market {
    if (STATUS_RANK[status.kind] <= STATUS_RANK[market.status.kind]) {
      return market;
    }
    return Object.freeze({ ...market, status });
  }
}
