import type { MergedProduct, SortKey } from "@dealfinder/shared";
import type { SearchIntent } from "../types/index.js";
import { containsWords, normalizeLabel, normalizeTitle } from "./matching/titleNormalizer.js";

interface RankingWeights {
  termOverlap: number;
  completeness: number;
  sourceBoost: number;
}

const DEFAULT_WEIGHTS: RankingWeights = {
  termOverlap: 0.6, // 60% from query terms found in the title
  completeness: 0.25, // 25% from how much the listing tells us
  sourceBoost: 0.15, // 15% for being sold in several stores
};

const MAX_SOURCE_BOOST = 3;
const MAX_DISCOUNT_POINTS = 50;
const RATING_POINTS = 30;
const MAX_REVIEW_POINTS = 20;

// Added to relevance when the query names the product's brand.
const BRAND_BOOST = 15;
// Ceiling for each qualitative hint ("budget", "premium", "deal", "best").
const HINT_POINTS = 10;

const round1 = (value: number) => Math.round(value * 10) / 10;
const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export interface RankResult {
  products: MergedProduct[];
  excluded: number;
}

interface IntentSignals {
  brand?: string;
  hints: ReadonlySet<string>;
  lowestPrice: number;
  highestPrice: number;
}

type Comparator = (a: MergedProduct, b: MergedProduct) => number;

const byId: Comparator = (a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
const byRelevance: Comparator = (a, b) => b.relevanceScore - a.relevanceScore;

const COMPARATORS: Record<SortKey, Comparator> = {
  relevance: (a, b) => byRelevance(a, b) || b.dealScore - a.dealScore || a.price - b.price || byId(a, b),
  price_asc: (a, b) => a.price - b.price || byRelevance(a, b) || byId(a, b),
  price_desc: (a, b) => b.price - a.price || byRelevance(a, b) || byId(a, b),
  rating: (a, b) => {
    if (a.rating === undefined || b.rating === undefined) {
      if (a.rating !== b.rating) return a.rating === undefined ? 1 : -1;
    } else if (a.rating !== b.rating) {
      return b.rating - a.rating;
    }
    return b.reviewCount - a.reviewCount || byRelevance(a, b) || byId(a, b);
  },
  discount: (a, b) => {
    const da = a.discountPercentage ?? 0;
    const db = b.discountPercentage ?? 0;
    if ((da > 0) !== (db > 0)) return da > 0 ? -1 : 1;
    return db - da || byRelevance(a, b) || byId(a, b);
  },
};

/**
 * Rule-based scoring for merged products.
 * Relevance combines query match with listing quality; deal score rewards discount, rating and review volume.
 */
export class Ranker {
  private weights: RankingWeights;

  constructor(weights: RankingWeights = DEFAULT_WEIGHTS) {
    this.weights = weights;
  }

  /**
   * Score every product with a usable price; the rest are dropped and counted.
   * Brand and qualitative hints from the query adjust relevance on top of the base score.
   */
  score(products: MergedProduct[], intent: SearchIntent): RankResult {
    const terms = this.queryTerms(intent);
    const priced = products.filter((product) => Number.isFinite(product.price) && product.price > 0);
    const prices = priced.map((product) => product.price);
    const signals: IntentSignals = {
      brand: normalizeLabel(intent.brand),
      hints: new Set(intent.hints),
      lowestPrice: Math.min(...prices),
      highestPrice: Math.max(...prices),
    };

    const ranked = priced.map((product) => {
      const scored = { ...product, dealScore: this.dealScore(product) };
      const relevance = this.relevanceScore(scored, terms) + this.intentBoost(scored, signals);
      return { ...scored, relevanceScore: round1(clamp(relevance, 0, 100)) };
    });

    return { products: ranked, excluded: products.length - priced.length };
  }

  sort(products: MergedProduct[], sortBy: SortKey): MergedProduct[] {
    return [...products].sort(COMPARATORS[sortBy]);
  }

  relevanceScore(product: MergedProduct, terms: readonly string[]): number {
    const composite =
      this.termOverlap(product, terms) * this.weights.termOverlap +
      this.completeness(product) * this.weights.completeness +
      (Math.min(product.sourceCount - 1, MAX_SOURCE_BOOST) / MAX_SOURCE_BOOST) * this.weights.sourceBoost;
    return round1(composite * 100);
  }

  dealScore(product: MergedProduct): number {
    const discountPoints = Math.min(product.discountPercentage ?? 0, MAX_DISCOUNT_POINTS);
    const ratingPoints = ((product.rating ?? 0) / 5) * RATING_POINTS;
    const reviewPoints = Math.min(MAX_REVIEW_POINTS, 4 * Math.log10(product.reviewCount + 1));
    return round1(clamp(discountPoints + ratingPoints + reviewPoints, 0, 100));
  }

  private intentBoost(product: MergedProduct, signals: IntentSignals): number {
    let boost = 0;
    if (signals.brand && this.matchesBrand(product, signals.brand)) boost += BRAND_BOOST;
    if (signals.hints.has("budget")) boost += (signals.lowestPrice / product.price) * HINT_POINTS;
    if (signals.hints.has("premium")) boost += (product.price / signals.highestPrice) * HINT_POINTS;
    if (signals.hints.has("deal")) boost += (product.dealScore / 100) * HINT_POINTS;
    if (signals.hints.has("best")) boost += ((product.rating ?? 0) / 5) * HINT_POINTS;
    return boost;
  }

  private matchesBrand(product: MergedProduct, brand: string): boolean {
    const listed = normalizeLabel(product.brand);
    if (listed && containsWords(listed, brand)) return true;
    const titleBrand = normalizeTitle(brand);
    return titleBrand.length > 0 && containsWords(product.normalizedTitle, titleBrand);
  }

  private queryTerms(intent: SearchIntent): string[] {
    const normalized = normalizeTitle(intent.terms.join(" "));
    return Array.from(new Set(normalized.split(" ").filter(Boolean)));
  }

  private termOverlap(product: MergedProduct, terms: readonly string[]): number {
    if (terms.length === 0) return 1;
    const tokens = product.normalizedTitle.split(" ").filter(Boolean);
    const found = terms.filter((term) => tokens.some((token) => token.startsWith(term))).length;
    return found / terms.length;
  }

  private completeness(product: MergedProduct): number {
    const present = [
      product.originalPrice !== undefined,
      product.rating !== undefined,
      product.reviewCount > 0,
      Boolean(product.imageUrl),
      Boolean(product.brand),
      Boolean(product.category),
      product.availability !== "unknown",
      product.shippingCost !== undefined,
    ];
    return present.filter(Boolean).length / present.length;
  }
}
