import { readFileSync } from "node:fs";

// ---------------------------------------------------------------------------
// Lexicon (confusables, stopwords, negations, antonyms, synonyms)
// ---------------------------------------------------------------------------

export interface Lexicon {
  confusables: Record<string, string>;
  stopwords: Set<string>;
  negations: Set<string>;
  /** token → canonical form of its antonym pair (e.g. "below" → "above") */
  antonyms: Map<string, string>;
  /** token → canonical synonym */
  synonyms: Map<string, string>;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "string");
}

function isPairList(value: unknown): value is [string, string][] {
  return Array.isArray(value) && value.every((p) => isStringArray(p) && p.length === 2);
}

function isGroupList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((g) => isStringArray(g) && g.length > 0);
}

export function parseLexicon(raw: unknown): Lexicon {
  if (!isRecord(raw)) {
    throw new Error("Lexicon must be an object");
  }
  const { confusables, stopwords, negations, antonyms, synonyms } = raw;
  if (!isStringRecord(confusables)) throw new Error("Lexicon.confusables must map strings to strings");
  if (!isStringArray(stopwords)) throw new Error("Lexicon.stopwords must be a string array");
  if (!isStringArray(negations)) throw new Error("Lexicon.negations must be a string array");
  if (!isPairList(antonyms)) {
    throw new Error("Lexicon.antonyms must be string pairs");
  }
  if (!isGroupList(synonyms)) {
    throw new Error("Lexicon.synonyms must be non-empty string groups");
  }

  const antonymMap = new Map<string, string>();
  for (const [canonical, opposite] of antonyms) {
    antonymMap.set(opposite, canonical);
  }
  const synonymMap = new Map<string, string>();
  for (const group of synonyms) {
    for (const word of group) synonymMap.set(word, group[0]);
  }

  return {
    confusables,
    stopwords: new Set(stopwords),
    negations: new Set(negations),
    antonyms: antonymMap,
    synonyms: synonymMap,
  };
}

export const LEXICON: Lexicon = parseLexicon(
  JSON.parse(readFileSync(new URL("./lexicon.json", import.meta.url), "utf8")),
);

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Replace Unicode confusables with ASCII equivalents. O(n).
 */
export function replaceConfusables(input: string, lexicon: Lexicon = LEXICON): string {
  let result = "";
  for (const ch of input) {
    result += lexicon.confusables[ch] ?? ch;
  }
  return result;
}

/**
 * Full normalization pipeline for market questions.
 *
 * 1. Replace confusables → ASCII
 * 2. NFKD decomposition + strip combining marks (café → cafe)
 * 3. Expand "n't" contractions so negations survive punctuation stripping
 * 4. Collapse digit separators: "100,000" → "100000" (before punct strip)
 * 5. Lowercase, strip non-word/non-space
 * 6. Remove standalone current-year tokens
 * 7. Collapse whitespace + trim
 */
export function normalizeTitle(
  title: string,
  opts?: { currentYear?: number },
): string {
  const year = opts?.currentYear ?? new Date().getFullYear();

  let s = replaceConfusables(title);

  s = s.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");

  s = s.toLowerCase();
  s = s.replace(/\bwon['’]t\b/g, "will not").replace(/\bcan['’]t\b/g, "can not");
  s = s.replace(/n['’]t\b/g, " not");

  s = s.replace(/(\d),(\d)/g, "$1$2");

  s = s.replace(/[^\w\s.]/g, " ");
  // keep decimal points inside numbers only
  s = s.replace(/(?<!\d)\.|\.(?!\d)/g, " ");

  s = s.replace(new RegExp(`\\b${year}\\b`, "g"), " ");

  return s.replace(/\s+/g, " ").trim();
}

export interface QuestionFeatures {
  normalized: string;
  /** Content tokens: stopwords and negations dropped, synonyms and antonyms canonicalized */
  tokens: string[];
  /** Parity of negations plus antonym flips; equal parity means the same assertion */
  polarity: 0 | 1;
}

export function extractFeatures(
  question: string,
  opts?: { currentYear?: number; lexicon?: Lexicon },
): QuestionFeatures {
  const lexicon = opts?.lexicon ?? LEXICON;
  const normalized = normalizeTitle(question, opts);
  const tokens: string[] = [];
  let flips = 0;

  for (const raw of normalized.split(" ")) {
    if (!raw) continue;
    if (lexicon.negations.has(raw)) {
      flips++;
      continue;
    }
    if (lexicon.stopwords.has(raw)) continue;
    const canonical = lexicon.synonyms.get(raw) ?? raw;
    const opposite = lexicon.antonyms.get(canonical);
    if (opposite !== undefined) {
      flips++;
      tokens.push(opposite);
      continue;
    }
    tokens.push(canonical);
  }

  return { normalized, tokens, polarity: flips % 2 === 0 ? 0 : 1 };
}

export function normalizeLabel(label: string): string {
  return replaceConfusables(label).toLowerCase().replace(/[^\w]/g, "");
}
