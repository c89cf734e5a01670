import { createHash } from "node:crypto";
import type { MergedProduct, RawListing } from "@dealfinder/shared";
import type { ListingFeatures } from "./titleNormalizer.js";

export type SourcePriority = (source: string) => number;

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export function hasValidPrice(listing: RawListing): boolean {
  return Number.isFinite(listing.price) && listing.price > 0;
}

/**
 * Short acronyms stay upper case ("LG", "JBL"), other detected brands are capitalized.
 */
export function formatBrand(brand: string): string {
  if (brand.length <= 3 && !brand.includes(" ")) return brand.toUpperCase();
  return brand.replace(/(^|[\s-])(\p{L})/gu, (_, sep: string, letter: string) => sep + letter.toUpperCase());
}

export function discountPercentage(price: number, originalPrice: number | undefined): number | undefined {
  if (originalPrice === undefined || !(originalPrice > 0) || !Number.isFinite(price)) return undefined;
  const percent = round(((originalPrice - price) / originalPrice) * 100, 1);
  return Math.min(100, Math.max(0, percent));
}

/**
 * Review-count-weighted mean of rated listings; simple mean when nobody reports review counts.
 */
export function aggregateRating(listings: readonly RawListing[]): number | undefined {
  const rated = listings.filter((l) => l.rating !== undefined && Number.isFinite(l.rating));
  if (rated.length === 0) return undefined;

  const totalWeight = rated.reduce((sum, l) => sum + (l.reviewCount ?? 0), 0);
  const mean =
    totalWeight > 0
      ? rated.reduce((sum, l) => sum + (l.rating ?? 0) * (l.reviewCount ?? 0), 0) / totalWeight
      : rated.reduce((sum, l) => sum + (l.rating ?? 0), 0) / rated.length;
  return round(mean, 2);
}

export function productId(normalizedTitle: string, source: string): string {
  return createHash("sha1").update(`${normalizedTitle}|${source}`).digest("hex").slice(0, 16);
}

/**
 * Cheapest valid price first, then better rating, store priority and URL.
 */
export function compareOffers(a: ListingFeatures, b: ListingFeatures, priorityOf: SourcePriority): number {
  const aValid = hasValidPrice(a.listing);
  const bValid = hasValidPrice(b.listing);
  if (aValid !== bValid) return aValid ? -1 : 1;
  if (aValid && a.listing.price !== b.listing.price) return a.listing.price - b.listing.price;

  const ratingDiff = (b.listing.rating ?? -1) - (a.listing.rating ?? -1);
  if (ratingDiff !== 0) return ratingDiff;

  const priorityDiff = priorityOf(a.listing.source) - priorityOf(b.listing.source);
  if (priorityDiff !== 0) return priorityDiff;

  return a.listing.url < b.listing.url ? -1 : a.listing.url > b.listing.url ? 1 : 0;
}

/**
 * Collapse one match group into a product. Scores are filled in by the ranker.
 */
export function mergeGroup(members: readonly ListingFeatures[], priorityOf: SourcePriority): MergedProduct {
  if (members.length === 0) {
    throw new Error("Cannot merge an empty group");
  }

  const offers = [...members].sort((a, b) => compareOffers(a, b, priorityOf));
  const [selected] = offers;
  if (!selected) {
    throw new Error("Cannot merge an empty group");
  }
  const best = selected.listing;

  // Selected listing first, the rest in store priority order.
  const byPriority = [
    selected,
    ...offers
      .slice(1)
      .sort((a, b) => priorityOf(a.listing.source) - priorityOf(b.listing.source) || a.index - b.index),
  ];
  const firstDefined = <T>(pick: (f: ListingFeatures) => T | undefined): T | undefined => {
    for (const member of byPriority) {
      const value = pick(member);
      if (value !== undefined) return value;
    }
    return undefined;
  };

  const listings = offers.map((o) => o.listing);
  const sources = Array.from(new Set(byPriority.map((m) => m.listing.source)));
  const prices = listings.filter(hasValidPrice).map((l) => l.price);
  const priceSpread = prices.length > 0 ? round(Math.max(...prices) - Math.min(...prices), 2) : 0;

  const listedBrand = firstDefined((m) => m.listing.brand?.trim() || undefined);
  const detectedBrand = firstDefined((m) => m.brand);

  return {
    id: productId(selected.normalizedTitle, best.source),
    title: best.title,
    normalizedTitle: selected.normalizedTitle,
    price: best.price,
    currency: best.currency,
    originalPrice: best.originalPrice,
    discountPercentage: discountPercentage(best.price, best.originalPrice),
    url: best.url,
    imageUrl: firstDefined((m) => m.listing.imageUrl),
    source: best.source,
    sources,
    sourceCount: sources.length,
    listings,
    similarListings: listings.length - 1,
    priceSpread,
    rating: aggregateRating(listings),
    reviewCount: listings.reduce((sum, l) => sum + (l.reviewCount ?? 0), 0),
    brand: listedBrand ?? (detectedBrand ? formatBrand(detectedBrand) : undefined),
    category: firstDefined((m) => m.listing.category?.trim() || undefined),
    availability: best.availability,
    shippingCost: best.shippingCost,
    freeShipping: best.freeShipping,
    relevanceScore: 0,
    dealScore: 0,
  };
}
