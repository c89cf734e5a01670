import stopwordList from "../data/stopwords.json" with { type: "json" };
import brandList from "../data/brands.json" with { type: "json" };

export const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

// Longest first so "western digital" wins over shorter overlaps.
const KNOWN_BRANDS: readonly string[] = [...brandList].sort((a, b) => b.length - a.length);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const BRAND_PATTERNS = KNOWN_BRANDS.map((brand) => ({
  brand,
  pattern: new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(brand)}(?=$|[^\\p{L}\\p{N}])`, "u"),
}));

/**
 * Longest known brand mentioned in the text, if any.
 */
export function findKnownBrand(text: string): string | undefined {
  const lowered = text.toLowerCase();
  return BRAND_PATTERNS.find(({ pattern }) => pattern.test(lowered))?.brand;
}
