import type { Logger } from "pino";
import type { MergedProduct, RawListing } from "@dealfinder/shared";
import type { EmbeddingService } from "../embeddingService.js";
import { mergeGroup, type SourcePriority } from "./mergeListings.js";
import {
  EmbeddingSimilarity,
  ExactTitleSimilarity,
  FuzzyTitleSimilarity,
  evaluatePair,
  type SimilarityStrategy,
  type StrategyName,
} from "./similarity.js";
import { describeListing, hasAttributeConflict, type ListingFeatures } from "./titleNormalizer.js";
import { UnionFind } from "./unionFind.js";

export interface MatcherConfig {
  embeddingThreshold: number;
  fuzzyThreshold: number;
  transitive: boolean;
}

export interface MatchOptions {
  advanced: boolean;
  useEmbeddings: boolean;
}

export interface MatchStats {
  listings: number;
  groups: number;
  embeddingComparisons: number;
  fuzzyComparisons: number;
  exactComparisons: number;
}

export interface MatchResult {
  products: MergedProduct[];
  stats: MatchStats;
}

interface MatchedPair {
  i: number;
  j: number;
  score: number;
}

function compareListings(a: RawListing, b: RawListing, titleA: string, titleB: string): number {
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  if (titleA !== titleB) return titleA < titleB ? -1 : 1;
  if (a.price !== b.price) return a.price - b.price;
  return a.url < b.url ? -1 : a.url > b.url ? 1 : 0;
}

/**
 * Groups listings that describe the same product and merges each group.
 * Output depends only on the set of listings, not on their arrival order.
 */
export class ProductMatcher {
  constructor(
    private readonly config: MatcherConfig,
    private readonly priorityOf: SourcePriority,
    private readonly embeddings: EmbeddingService | undefined,
    private readonly logger: Logger
  ) {}

  async match(listings: readonly RawListing[], options: MatchOptions): Promise<MatchResult> {
    const features = listings
      .map((listing, index) => describeListing(listing, index))
      .sort((a, b) => compareListings(a.listing, b.listing, a.normalizedTitle, b.normalizedTitle))
      .map((feature, index) => ({ ...feature, index }));

    const stats: MatchStats = {
      listings: features.length,
      groups: 0,
      embeddingComparisons: 0,
      fuzzyComparisons: 0,
      exactComparisons: 0,
    };
    if (features.length === 0) {
      return { products: [], stats };
    }

    const chain = await this.buildChain(features, options);
    const pairs = this.matchPairs(features, chain, stats);
    const groups = this.config.transitive
      ? this.transitiveGroups(features.length, pairs)
      : this.completeLinkGroups(features.length, pairs);

    const products = groups.map((members) =>
      mergeGroup(
        members.flatMap((index) => {
          const feature = features[index];
          return feature ? [feature] : [];
        }),
        this.priorityOf
      )
    );
    stats.groups = products.length;
    return { products, stats };
  }

  private async buildChain(features: ListingFeatures[], options: MatchOptions): Promise<SimilarityStrategy[]> {
    if (!options.advanced) {
      return [new ExactTitleSimilarity()];
    }

    const chain: SimilarityStrategy[] = [];
    if (options.useEmbeddings && this.embeddings) {
      const vectors = await this.embedTitles(this.embeddings, features);
      if (vectors) chain.push(new EmbeddingSimilarity(vectors, this.config.embeddingThreshold));
    }
    chain.push(new FuzzyTitleSimilarity(this.config.fuzzyThreshold));
    return chain;
  }

  private async embedTitles(
    service: EmbeddingService,
    features: ListingFeatures[]
  ): Promise<Map<string, number[]> | undefined> {
    const titles = Array.from(new Set(features.map((f) => f.normalizedTitle).filter(Boolean)));
    try {
      const vectors = await service.generateBatchEmbeddings(titles);
      const byTitle = new Map<string, number[]>();
      titles.forEach((title, i) => {
        const vector = vectors[i];
        if (vector) byTitle.set(title, vector);
      });
      return byTitle;
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error), titles: titles.length },
        "Embedding similarity unavailable; falling back to fuzzy matching"
      );
      return undefined;
    }
  }

  private matchPairs(features: ListingFeatures[], chain: SimilarityStrategy[], stats: MatchStats): MatchedPair[] {
    const counters: Record<StrategyName, keyof MatchStats> = {
      embedding: "embeddingComparisons",
      fuzzy: "fuzzyComparisons",
      exact: "exactComparisons",
    };
    const pairs: MatchedPair[] = [];

    for (let i = 0; i < features.length; i++) {
      const a = features[i];
      if (!a) continue;
      for (let j = i + 1; j < features.length; j++) {
        const b = features[j];
        if (!b || hasAttributeConflict(a, b)) continue;

        const verdict = evaluatePair(chain, a, b);
        if (!verdict) continue;
        stats[counters[verdict.strategy]] += 1;
        if (verdict.matched) pairs.push({ i, j, score: verdict.score });
      }
    }
    return pairs;
  }

  private transitiveGroups(count: number, pairs: MatchedPair[]): number[][] {
    const sets = new UnionFind(count);
    for (const { i, j } of pairs) sets.union(i, j);
    return sets.groups();
  }

  /**
   * Strongest pairs first; two groups join only when every cross pair matched.
   */
  private completeLinkGroups(count: number, pairs: MatchedPair[]): number[][] {
    const matched = new Set(pairs.map(({ i, j }) => i * count + j));
    const linked = (x: number, y: number) => matched.has(Math.min(x, y) * count + Math.max(x, y));

    const groupOf = Array.from({ length: count }, (_, i) => i);
    const members = new Map<number, number[]>(groupOf.map((g) => [g, [g]]));

    const ordered = [...pairs].sort((a, b) => b.score - a.score || a.i - b.i || a.j - b.j);
    for (const { i, j } of ordered) {
      const left = groupOf[i] ?? i;
      const right = groupOf[j] ?? j;
      if (left === right) continue;

      const leftMembers = members.get(left) ?? [];
      const rightMembers = members.get(right) ?? [];
      const complete = leftMembers.every((x) => rightMembers.every((y) => linked(x, y)));
      if (!complete) continue;

      const [keep, drop] = left < right ? [left, right] : [right, left];
      const combined = [...leftMembers, ...rightMembers].sort((a, b) => a - b);
      members.set(keep, combined);
      members.delete(drop);
      for (const member of combined) groupOf[member] = keep;
    }

    return Array.from(members.values()).sort((a, b) => (a[0] ?? 0) - (b[0] ?? 0));
  }
}
