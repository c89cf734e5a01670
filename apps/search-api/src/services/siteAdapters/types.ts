import type { Availability, ListingMetadata, RawListing } from "@dealfinder/shared";
import type { SearchIntent } from "../../types/index.js";

export interface AdapterContext {
  region: string;
  page: number;
  signal: AbortSignal;
  maxListings: number;
}

/**
 * One e-commerce source. `fetch` yields normalized listings lazily, once per call.
 * Any failure surfaces as an `AdapterError`.
 */
export interface SiteAdapter {
  readonly id: string;
  readonly name: string;
  readonly homeUrl: string;
  readonly regions: readonly string[];
  fetch(intent: SearchIntent, context: AdapterContext): AsyncIterable<RawListing>;
}

export interface StoreDefinition {
  id: string;
  name: string;
  /** Origin used to build search URLs and resolve relative links. */
  homeUrl: string;
  /** Proxy geo-targeting code. */
  countryCode: string;
  currency: string;
  regions: readonly string[];
}

/**
 * Loosely-typed listing as scraped, before validation.
 */
export interface ListingDraft {
  title?: string;
  price?: number;
  priceText?: string;
  currency?: string;
  originalPrice?: number;
  rating?: number;
  reviewCount?: number;
  url?: string;
  imageUrl?: string;
  brand?: string;
  category?: string;
  availability?: Availability;
  shippingCost?: number;
  freeShipping?: boolean;
  metadata?: ListingMetadata;
}

export interface HtmlFetchOptions {
  countryCode?: string;
  signal: AbortSignal;
}

export interface HtmlFetcher {
  fetchHtml(source: string, url: string, options: HtmlFetchOptions): Promise<string>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
