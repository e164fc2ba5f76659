import type { Market, PairPolarity } from "../types.js";
import { normalizeLabel, type QuestionFeatures } from "./normalizer.js";

const TOKEN_WEIGHT = 0.7;
const BIGRAM_WEIGHT = 0.3;

export const TEXT_WEIGHT = 0.85;
export const EXPIRY_WEIGHT = 0.15;

/**
 * Jaccard = |A ∩ B| / |A ∪ B|
 */
export function jaccardSimilarity<T>(setA: Set<T>, setB: Set<T>): number {
  if (setA.size === 0 && setB.size === 0) return 1;
  if (setA.size === 0 || setB.size === 0) return 0;

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }

  const union = setA.size + setB.size - intersection;
  return intersection / union;
}

export function bigrams(tokens: string[]): Set<string> {
  const out = new Set<string>();
  for (let i = 0; i < tokens.length - 1; i++) {
    out.add(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return out;
}

/**
 * Token Jaccard blended with bigram overlap. Word order only counts when
 * both questions are long enough to have bigrams.
 */
export function textSimilarity(a: QuestionFeatures, b: QuestionFeatures): number {
  const tokenScore = jaccardSimilarity(new Set(a.tokens), new Set(b.tokens));
  const bigramsA = bigrams(a.tokens);
  const bigramsB = bigrams(b.tokens);
  if (bigramsA.size === 0 || bigramsB.size === 0) return tokenScore;
  return TOKEN_WEIGHT * tokenScore + BIGRAM_WEIGHT * jaccardSimilarity(bigramsA, bigramsB);
}

/** 1 when expiries coincide, falling linearly to 0 at the tolerance; null beyond it. */
export function expiryProximity(expiresA: number, expiresB: number, toleranceMs: number): number | null {
  const diff = Math.abs(expiresA - expiresB);
  if (diff > toleranceMs) return null;
  return 1 - diff / toleranceMs;
}

/** True when venue B lists the outcome labels in the opposite order (e.g. Up/Down vs Down/Up). */
export function labelsSwapped(a: Market, b: Market): boolean {
  const [yesA, noA] = a.outcomeLabels.map(normalizeLabel);
  const [yesB, noB] = b.outcomeLabels.map(normalizeLabel);
  return yesA !== noA && yesA === noB && noA === yesB;
}

export function resolvePolarity(
  a: Market,
  featuresA: QuestionFeatures,
  b: Market,
  featuresB: QuestionFeatures,
): PairPolarity {
  const textFlip = featuresA.polarity !== featuresB.polarity;
  const labelFlip = labelsSwapped(a, b);
  return textFlip !== labelFlip ? "inverted" : "aligned";
}

export function combinedScore(text: number, proximity: number): number {
  return TEXT_WEIGHT * text + EXPIRY_WEIGHT * proximity;
}
