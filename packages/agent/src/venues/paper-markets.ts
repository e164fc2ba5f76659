import { readFileSync } from "node:fs";
import type { Market, Side } from "../types.js";
import { PaperVenue, type PaperBook } from "./paper-venue.js";
import { parseWad } from "../fixed-point.js";

// Loader for the dry-run market file:
// { "venues": [{ "name", "balance"?, "concurrentOrders"?, "markets": [...] }] }

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(obj: Json, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value === "") throw new Error(`${where}: "${key}" must be a non-empty string`);
  return value;
}

function num(obj: Json, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new Error(`${where}: "${key}" must be a non-negative number`);
  }
  return value;
}

function parseBook(raw: unknown, where: string): PaperBook {
  if (!isRecord(raw)) throw new Error(`${where}: book must be an object`);
  return {
    bestBid: parseWad(str(raw, "bestBid", where)),
    bestAsk: parseWad(str(raw, "bestAsk", where)),
    bidSize: num(raw, "bidSize", where),
    askSize: num(raw, "askSize", where),
  };
}

export interface PaperMarketSpec {
  market: Market;
  books: Partial<Record<Side, PaperBook>>;
}

function parseMarket(venue: string, raw: unknown, now: number, index: number): PaperMarketSpec {
  const where = `${venue}.markets[${index}]`;
  if (!isRecord(raw)) throw new Error(`${where} must be an object`);

  const labels = raw.outcomeLabels;
  const outcomeLabels: [string, string] =
    Array.isArray(labels) && labels.length === 2 && typeof labels[0] === "string" && typeof labels[1] === "string"
      ? [labels[0], labels[1]]
      : ["Yes", "No"];

  const market: Market = {
    venue,
    marketId: str(raw, "marketId", where),
    question: str(raw, "question", where),
    outcomeLabels,
    tickSize: parseWad(typeof raw.tickSize === "string" ? raw.tickSize : "0.01"),
    expiresAt: now + num(raw, "expiresInMinutes", where) * 60_000,
    status: { kind: "Open" },
    slug: typeof raw.slug === "string" ? raw.slug : undefined,
    category: typeof raw.category === "string" ? raw.category : undefined,
  };

  const books: Partial<Record<Side, PaperBook>> = {};
  if (isRecord(raw.books)) {
    if (raw.books.YES !== undefined) books.YES = parseBook(raw.books.YES, `${where}.books.YES`);
    if (raw.books.NO !== undefined) books.NO = parseBook(raw.books.NO, `${where}.books.NO`);
  }
  return { market, books };
}

/** Build one PaperVenue per entry; expiries are relative to `now`. */
export function buildPaperVenues(raw: unknown, defaultBalance: bigint, now = Date.now()): PaperVenue[] {
  if (!isRecord(raw) || !Array.isArray(raw.venues)) {
    throw new Error('Paper market file must contain a "venues" array');
  }
  return raw.venues.map((entry: unknown, i: number) => {
    if (!isRecord(entry)) throw new Error(`venues[${i}] must be an object`);
    const name = str(entry, "name", `venues[${i}]`);
    const venue = new PaperVenue({
      name,
      balance: typeof entry.balance === "string" ? parseWad(entry.balance) : defaultBalance,
      concurrentOrders: typeof entry.concurrentOrders === "boolean" ? entry.concurrentOrders : true,
    });
    const markets = Array.isArray(entry.markets) ? entry.markets : [];
    const specs = markets.map((m: unknown, j: number) => parseMarket(name, m, now, j));
    venue.setMarkets(specs.map((s) => s.market));
    for (const spec of specs) {
      for (const side of ["YES", "NO"] as const) {
        const book = spec.books[side];
        if (book) venue.setBook(spec.market.marketId, side, book);
      }
    }
    return venue;
  });
}

export function loadPaperVenues(path: string, defaultBalance: bigint): PaperVenue[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return buildPaperVenues(raw, defaultBalance);
}
