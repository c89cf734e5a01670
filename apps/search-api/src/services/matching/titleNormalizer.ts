import type { RawListing } from "@dealfinder/shared";
import { STOPWORDS, findKnownBrand } from "../vocabulary.js";

export interface ListingFeatures {
  index: number;
  listing: RawListing;
  normalizedTitle: string;
  tokens: ReadonlySet<string>;
  modelTokens: ReadonlySet<string>;
  brand?: string;
  category?: string;
}

/**
 * Lowercase title with model numbers joined ("WH-1000XM4" → "wh1000xm4"), punctuation and stopwords removed.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize("NFKC")
    .toLowerCase()
    .replace(/([\p{L}\p{N}])[-_.](?=[\p{L}\p{N}])/gu, "$1")
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token))
    .join(" ");
}

/** Tokens that look like model numbers or sizes: contain a digit, at least two characters. */
export function extractModelTokens(tokens: Iterable<string>): Set<string> {
  const models = new Set<string>();
  for (const token of tokens) {
    if (token.length >= 2 && /\d/.test(token)) models.add(token);
  }
  return models;
}

export function normalizeLabel(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const normalized = value.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
  return normalized || undefined;
}

export function describeListing(listing: RawListing, index: number): ListingFeatures {
  const normalizedTitle = normalizeTitle(listing.title);
  const tokens = new Set(normalizedTitle.split(" ").filter(Boolean));
  return {
    index,
    listing,
    normalizedTitle,
    tokens,
    modelTokens: extractModelTokens(tokens),
    brand: normalizeLabel(listing.brand) ?? findKnownBrand(listing.title),
    category: normalizeLabel(listing.category),
  };
}

/**
 * True when every word of `needle` appears, in order and whole, inside `haystack`.
 */
export function containsWords(haystack: string, needle: string): boolean {
  return ` ${haystack} `.includes(` ${needle} `);
}

/**
 * Currency, brand or category differences that rule out a match even when titles look alike.
 * Prices in different currencies are never merged or compared.
 */
export function hasAttributeConflict(a: ListingFeatures, b: ListingFeatures): boolean {
  if (a.listing.currency.toUpperCase() !== b.listing.currency.toUpperCase()) return true;
  if (a.brand && b.brand && !containsWords(a.brand, b.brand) && !containsWords(b.brand, a.brand)) return true;
  if (a.category && b.category && !a.category.includes(b.category) && !b.category.includes(a.category)) {
    return true;
  }
  return false;
}
