import type { Facets, MergedProduct, NamedCount } from "@dealfinder/shared";

const PRICE_BUCKETS: ReadonlyArray<{ range: string; min: number; max: number }> = [
  { range: "0-50", min: 0, max: 50 },
  { range: "50-100", min: 50, max: 100 },
  { range: "100-200", min: 100, max: 200 },
  { range: "200-500", min: 200, max: 500 },
  { range: "500-1000", min: 500, max: 1000 },
  { range: "1000+", min: 1000, max: Number.POSITIVE_INFINITY },
];

const RATING_BUCKETS: ReadonlyArray<{ label: string; accepts: (rating: number | undefined) => boolean }> = [
  { label: "4.5+", accepts: (r) => r !== undefined && r >= 4.5 },
  { label: "4-4.5", accepts: (r) => r !== undefined && r >= 4 && r < 4.5 },
  { label: "3-4", accepts: (r) => r !== undefined && r >= 3 && r < 4 },
  { label: "under 3", accepts: (r) => r !== undefined && r < 3 },
  { label: "unrated", accepts: (r) => r === undefined },
];

export function emptyFacets(): Facets {
  return { brands: [], categories: [], sources: [], priceRanges: [], ratings: [] };
}

function countBy(products: readonly MergedProduct[], pick: (p: MergedProduct) => string | undefined): NamedCount[] {
  const counts = new Map<string, number>();
  for (const product of products) {
    const name = pick(product);
    if (name) counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return Array.from(counts, ([name, count]) => ({ name, count })).sort(
    (a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
  );
}

/**
 * Counts over the filtered result set, before pagination.
 */
export function computeFacets(products: readonly MergedProduct[]): Facets {
  return {
    brands: countBy(products, (p) => p.brand),
    categories: countBy(products, (p) => p.category),
    sources: countBy(products, (p) => p.source),
    priceRanges: PRICE_BUCKETS.map(({ range, min, max }) => ({
      range,
      count: products.filter((p) => p.price >= min && p.price < max).length,
    })).filter((bucket) => bucket.count > 0),
    ratings: RATING_BUCKETS.map(({ label, accepts }) => ({
      label,
      count: products.filter((p) => accepts(p.rating)).length,
    })).filter((bucket) => bucket.count > 0),
  };
}
