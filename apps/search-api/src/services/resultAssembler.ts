import type { Facets, MergedProduct, SortKey } from "@dealfinder/shared";
import type { SearchFilters, SearchIntent } from "../types/index.js";
import { computeFacets } from "./facets.js";
import type { Ranker } from "./ranker.js";

export interface AssemblerOptions {
  bestDealsCount: number;
  maxPageLimit: number;
}

export interface AssembleInput {
  products: MergedProduct[];
  intent: SearchIntent;
  filters: SearchFilters;
  sortBy: SortKey;
  page: number;
  limit: number;
}

export interface AssembledResults {
  products: MergedProduct[];
  bestDeals: MergedProduct[];
  totalResults: number;
  page: number;
  limit: number;
  facets: Facets;
}

export interface EffectiveBounds {
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
}

/**
 * Explicit filters win over bounds read from the query text.
 */
export function effectiveBounds(filters: SearchFilters, intent: SearchIntent): EffectiveBounds {
  return {
    minPrice: filters.minPrice ?? filters.priceRange?.min ?? intent.minPrice,
    maxPrice: filters.maxPrice ?? filters.priceRange?.max ?? intent.maxPrice,
    minRating: filters.minRating ?? intent.minRating,
  };
}

const lowerSet = (values: string[] | undefined) =>
  values && values.length > 0 ? new Set(values.map((v) => v.toLowerCase())) : undefined;

/**
 * Filters, facets, sorts and paginates ranked products.
 */
export class ResultAssembler {
  constructor(
    private readonly ranker: Ranker,
    private readonly options: AssemblerOptions
  ) {}

  get maxPageLimit(): number {
    return this.options.maxPageLimit;
  }

  assemble(input: AssembleInput): AssembledResults {
    const limit = Math.min(input.limit, this.maxPageLimit);
    const filtered = this.applyFilters(input.products, input.filters, input.intent);
    const facets = computeFacets(filtered);
    const sorted = this.ranker.sort(filtered, input.sortBy);

    const bestDeals = [...filtered]
      .sort((a, b) => b.dealScore - a.dealScore || a.price - b.price || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, this.options.bestDealsCount);

    const offset = (input.page - 1) * limit;
    return {
      products: sorted.slice(offset, offset + limit),
      bestDeals,
      totalResults: filtered.length,
      page: input.page,
      limit,
      facets,
    };
  }

  applyFilters(products: MergedProduct[], filters: SearchFilters, intent: SearchIntent): MergedProduct[] {
    const { minPrice, maxPrice, minRating } = effectiveBounds(filters, intent);
    const brands = lowerSet(filters.brands);
    const categories = lowerSet(filters.categories);
    const sources = lowerSet(filters.sources);

    return products.filter((product) => {
      if (minPrice !== undefined && product.price < minPrice) return false;
      if (maxPrice !== undefined && product.price > maxPrice) return false;
      if (minRating !== undefined && (product.rating === undefined || product.rating < minRating)) return false;
      if (brands && !(product.brand && brands.has(product.brand.toLowerCase()))) return false;
      if (categories && !(product.category && categories.has(product.category.toLowerCase()))) return false;
      if (sources && !sources.has(product.source.toLowerCase())) return false;
      if (filters.freeShipping && !product.freeShipping) return false;
      if (filters.minDealScore !== undefined && product.dealScore < filters.minDealScore) return false;
      return true;
    });
  }
}
