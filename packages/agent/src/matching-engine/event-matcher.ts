import type { Market, MarketRef, MatchedPair, PairPolarity, RetractReason } from "../types.js";
import { extractFeatures, type QuestionFeatures } from "./normalizer.js";
import { combinedScore, expiryProximity, resolvePolarity, textSimilarity } from "./similarity.js";

export interface MatchOptions {
  similarityThreshold: number;
  expiryToleranceMs: number;
}

export interface MatchCandidate {
  marketA: MarketRef;
  marketB: MarketRef;
  score: number;
  textSimilarity: number;
  polarity: PairPolarity;
}

export interface MatchResult {
  /** Every pair record: confirmed, newly retracted and previously retracted */
  pairs: MatchedPair[];
  confirmed: MatchedPair[];
  retracted: MatchedPair[];
}

interface Indexed {
  market: Market;
  features: QuestionFeatures;
}

export function pairId(a: MarketRef, b: MarketRef): string {
  return `${a.venue}:${a.marketId}|${b.venue}:${b.marketId}`;
}

function refOf(market: Market): MarketRef {
  return { venue: market.venue, marketId: market.marketId };
}

function index(markets: Market[], currentYear: number): Indexed[] {
  return markets
    .filter((m) => m.status.kind === "Open")
    .map((market) => ({ market, features: extractFeatures(market.question, { currentYear }) }));
}

/** Score one cross-venue combination; null when expiries are too far apart. */
export function scorePair(
  a: Market,
  featuresA: QuestionFeatures,
  b: Market,
  featuresB: QuestionFeatures,
  opts: MatchOptions,
): MatchCandidate | null {
  const proximity = expiryProximity(a.expiresAt, b.expiresAt, opts.expiryToleranceMs);
  if (proximity === null) return null;
  const text = textSimilarity(featuresA, featuresB);
  return {
    marketA: refOf(a),
    marketB: refOf(b),
    score: combinedScore(text, proximity),
    textSimilarity: text,
    polarity: resolvePolarity(a, featuresA, b, featuresB),
  };
}

/**
 * Blocking: only compare markets that share at least one content token.
 */
function candidatePairs(sideA: Indexed[], sideB: Indexed[]): [Indexed, Indexed][] {
  const byToken = new Map<string, Indexed[]>();
  for (const entry of sideB) {
    for (const token of new Set(entry.features.tokens)) {
      const bucket = byToken.get(token) ?? [];
      bucket.push(entry);
      byToken.set(token, bucket);
    }
  }

  const out: [Indexed, Indexed][] = [];
  for (const a of sideA) {
    const seen = new Set<string>();
    for (const token of new Set(a.features.tokens)) {
      for (const b of byToken.get(token) ?? []) {
        if (seen.has(b.market.marketId)) continue;
        seen.add(b.market.marketId);
        out.push([a, b]);
      }
    }
  }
  return out;
}

function compareCandidates(x: MatchCandidate, y: MatchCandidate): number {
  if (y.score !== x.score) return y.score - x.score;
  if (y.textSimilarity !== x.textSimilarity) return y.textSimilarity - x.textSimilarity;
  return pairId(x.marketA, x.marketB).localeCompare(pairId(y.marketA, y.marketB));
}

function retractReason(
  pair: MatchedPair,
  marketsA: Map<string, Market>,
  marketsB: Map<string, Market>,
  qualified: Set<string>,
): RetractReason {
  const a = marketsA.get(pair.marketA.marketId);
  const b = marketsB.get(pair.marketB.marketId);
  if (!a || !b) return "market_missing";
  if (a.status.kind === "Resolved" || b.status.kind === "Resolved") return "market_resolved";
  if (a.status.kind === "Closed" || b.status.kind === "Closed") return "market_closed";
  return qualified.has(pair.id) ? "superseded" : "below_threshold";
}

/**
 * Pair markets from two venues that describe the same proposition.
 *
 * Pure function of its inputs: every call re-scores all open markets, confirms
 * a one-to-one assignment greedily by score (text similarity breaks ties) and
 * retracts previously confirmed pairs that did not survive.
 */
export function matchMarkets(
  marketsA: Market[],
  marketsB: Market[],
  previous: MatchedPair[],
  opts: MatchOptions,
  now: number,
): MatchResult {
  const currentYear = new Date(now).getUTCFullYear();
  const sideA = index(marketsA, currentYear);
  const sideB = index(marketsB, currentYear);

  const candidates: MatchCandidate[] = [];
  for (const [a, b] of candidatePairs(sideA, sideB)) {
    const candidate = scorePair(a.market, a.features, b.market, b.features, opts);
    if (candidate && candidate.score >= opts.similarityThreshold) {
      candidates.push(candidate);
    }
  }
  candidates.sort(compareCandidates);

  const usedA = new Set<string>();
  const usedB = new Set<string>();
  const confirmed: MatchedPair[] = [];
  for (const c of candidates) {
    if (usedA.has(c.marketA.marketId) || usedB.has(c.marketB.marketId)) continue;
    usedA.add(c.marketA.marketId);
    usedB.add(c.marketB.marketId);
    confirmed.push({
      id: pairId(c.marketA, c.marketB),
      marketA: c.marketA,
      marketB: c.marketB,
      score: c.score,
      textSimilarity: c.textSimilarity,
      polarity: c.polarity,
      confirmed: true,
      updatedAt: now,
    });
  }

  const confirmedIds = new Set(confirmed.map((p) => p.id));
  const qualified = new Set(candidates.map((c) => pairId(c.marketA, c.marketB)));
  const byIdA = new Map(marketsA.map((m) => [m.marketId, m]));
  const byIdB = new Map(marketsB.map((m) => [m.marketId, m]));

  // a retracted pair is reported on the refresh that retracts it, then dropped
  const retracted: MatchedPair[] = [];
  for (const pair of previous) {
    if (confirmedIds.has(pair.id) || !pair.confirmed) continue;
    retracted.push({
      ...pair,
      confirmed: false,
      retractedReason: retractReason(pair, byIdA, byIdB, qualified),
      updatedAt: now,
    });
  }

  return { pairs: [...confirmed, ...retracted], confirmed, retracted };
}
