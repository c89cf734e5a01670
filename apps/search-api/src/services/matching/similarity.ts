import { cosineSimilarity } from "../embeddingService.js";
import type { ListingFeatures } from "./titleNormalizer.js";

export type StrategyName = "embedding" | "fuzzy" | "exact";

/**
 * Scores a pair of listings. `undefined` means the strategy cannot judge this pair
 * and the next strategy in the chain is tried.
 */
export interface SimilarityStrategy {
  readonly name: StrategyName;
  readonly threshold: number;
  score(a: ListingFeatures, b: ListingFeatures): number | undefined;
}

export interface PairVerdict {
  strategy: StrategyName;
  score: number;
  matched: boolean;
}

/**
 * First strategy able to score the pair decides; a match needs a score strictly above its threshold.
 */
export function evaluatePair(
  chain: readonly SimilarityStrategy[],
  a: ListingFeatures,
  b: ListingFeatures
): PairVerdict | undefined {
  for (const strategy of chain) {
    const score = strategy.score(a, b);
    if (score === undefined) continue;
    return { strategy: strategy.name, score, matched: score > strategy.threshold };
  }
  return undefined;
}

export class ExactTitleSimilarity implements SimilarityStrategy {
  readonly name = "exact";
  readonly threshold = 0;

  score(a: ListingFeatures, b: ListingFeatures): number {
    return a.normalizedTitle.length > 0 && a.normalizedTitle === b.normalizedTitle ? 1 : 0;
  }
}

export class EmbeddingSimilarity implements SimilarityStrategy {
  readonly name = "embedding";

  constructor(
    private readonly vectors: ReadonlyMap<string, readonly number[]>,
    readonly threshold: number
  ) {}

  score(a: ListingFeatures, b: ListingFeatures): number | undefined {
    const left = this.vectors.get(a.normalizedTitle);
    const right = this.vectors.get(b.normalizedTitle);
    if (!left || !right) return undefined;
    return cosineSimilarity(left, right);
  }
}

function bigrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/** Sørensen–Dice coefficient over character bigrams (multiset). */
export function diceCoefficient(a: string, b: string): number {
  if (a === b) return a.length > 0 ? 1 : 0;
  if (a.length < 2 || b.length < 2) return 0;
  const left = bigrams(a);
  const right = bigrams(b);
  let overlap = 0;
  for (const [gram, count] of left) {
    overlap += Math.min(count, right.get(gram) ?? 0);
  }
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

/** |A∩B| / min(|A|, |B|). */
export function tokenContainment(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const token of small) {
    if (large.has(token)) shared += 1;
  }
  return shared / small.size;
}

function hasTokenMissingFrom(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const token of a) {
    if (!b.has(token)) return true;
  }
  return false;
}

/**
 * Half character-level, half token-level. The score is halved when each title
 * carries a model token the other lacks ("iphone 13" against "iphone 14").
 */
export class FuzzyTitleSimilarity implements SimilarityStrategy {
  readonly name = "fuzzy";

  constructor(readonly threshold: number) {}

  score(a: ListingFeatures, b: ListingFeatures): number {
    const combined =
      0.5 * diceCoefficient(a.normalizedTitle, b.normalizedTitle) + 0.5 * tokenContainment(a.tokens, b.tokens);
    const modelMismatch =
      hasTokenMissingFrom(a.modelTokens, b.modelTokens) && hasTokenMissingFrom(b.modelTokens, a.modelTokens);
    return modelMismatch ? combined / 2 : combined;
  }
}
