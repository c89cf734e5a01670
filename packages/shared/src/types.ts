export type SortKey = "relevance" | "price_asc" | "price_desc" | "rating" | "discount";

export type Availability = "in_stock" | "out_of_stock" | "limited" | "unknown";

export type ListingMetadata = Record<string, string | number | boolean>;

/**
 * One listing as produced by a single store adapter.
 */
export interface RawListing {
  source: string;
  title: string;
  price: number;
  currency: string;
  originalPrice?: number;
  rating?: number;
  reviewCount?: number;
  url: string;
  imageUrl?: string;
  brand?: string;
  category?: string;
  availability: Availability;
  shippingCost?: number;
  freeShipping: boolean;
  metadata: ListingMetadata;
}

/**
 * Canonical product after cross-store matching.
 * `price`, `url`, `source` describe the selected (cheapest) offer.
 */
export interface MergedProduct {
  id: string;
  title: string;
  normalizedTitle: string;
  price: number;
  currency: string;
  originalPrice?: number;
  discountPercentage?: number;
  url: string;
  imageUrl?: string;
  source: string;
  sources: string[];
  sourceCount: number;
  listings: RawListing[];
  similarListings: number;
  priceSpread: number;
  rating?: number;
  reviewCount: number;
  brand?: string;
  category?: string;
  availability: Availability;
  shippingCost?: number;
  freeShipping: boolean;
  relevanceScore: number;
  dealScore: number;
}

export interface NamedCount {
  name: string;
  count: number;
}

export interface Facets {
  brands: NamedCount[];
  categories: NamedCount[];
  sources: NamedCount[];
  priceRanges: Array<{ range: string; count: number }>;
  ratings: Array<{ label: string; count: number }>;
}

export type SourceStatus = "ok" | "empty" | "failed" | "timeout" | "abandoned";

export interface SourceDiagnostic {
  source: string;
  status: SourceStatus;
  listings: number;
  latencyMs: number;
  errorKind?: string;
  error?: string;
}

export interface SearchDiagnostics {
  interpretedBy: "raw" | "rules" | "llm";
  sources: SourceDiagnostic[];
  excludedProducts: number;
  matching: {
    listings: number;
    groups: number;
    embeddingComparisons: number;
    fuzzyComparisons: number;
    exactComparisons: number;
  };
  timings: {
    interpretation: number;
    retrieval: number;
    matching: number;
    ranking: number;
    total: number;
  };
}

export interface SearchResponse {
  success: boolean;
  error?: string;
  query: string;
  processedQuery?: string;
  region: string;
  products: MergedProduct[];
  bestDeals: MergedProduct[];
  totalResults: number;
  page: number;
  limit: number;
  facets: Facets;
  executionTime: number;
  diagnostics?: SearchDiagnostics;
}

export interface RegionInfo {
  code: string;
  name: string;
}

export interface StoreInfo {
  code: string;
  name: string;
  homeUrl: string;
  regions: string[];
}
