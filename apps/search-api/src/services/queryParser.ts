import type { SearchIntent } from "../types/index.js";
import { STOPWORDS, findKnownBrand } from "./vocabulary.js";

const NUM = String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\s*(k\b)?`;
const CUR = String.raw`(?:[$€£]|usd\s*|eur\s*|gbp\s*)?`;
const UNIT = String.raw`(?:\s*(?:dollars?|euros?|pounds?|bucks|usd|eur|gbp)\b)?`;

/**
 * Shopping-query patterns for natural language parsing
 */
const PATTERNS = {
  price: {
    between: new RegExp(String.raw`\bbetween\s+${CUR}${NUM}${UNIT}\s*(?:and|-|–|to)\s*${CUR}${NUM}${UNIT}`, "i"),
    range: new RegExp(String.raw`[$€£]\s*${NUM}\s*(?:-|–|to)\s*[$€£]?\s*${NUM}${UNIT}`, "i"),
    under: new RegExp(
      String.raw`\b(?:under|below|less\s+than|cheaper\s+than|max(?:imum)?|up\s+to|no\s+more\s+than|within)\s+${CUR}${NUM}${UNIT}`,
      "i"
    ),
    orLess: new RegExp(String.raw`${CUR}${NUM}${UNIT}\s+(?:or\s+less|max|and\s+under|or\s+cheaper)\b`, "i"),
    over: new RegExp(
      String.raw`\b(?:over|above|more\s+than|at\s+least|starting\s+at|min(?:imum)?)\s+${CUR}${NUM}${UNIT}`,
      "i"
    ),
  },

  rating: {
    stars: /\b([1-5](?:\.\d)?)\s*\+?\s*stars?(?:\s*(?:and\s+up|or\s+(?:more|better|higher)|\+))?/i,
    top: /\b(?:top|best|highest)[\s-]+rated\b/i,
    good: /\b(?:good|great|excellent|positive)\s+(?:reviews?|ratings?)\b|\b(?:well|highly)[\s-]+(?:reviewed|rated)\b/i,
  },

  hints: {
    best: /\bbest\b/i,
    budget: /\b(?:cheap(?:est)?|budget|affordable|inexpensive|low[\s-]cost)\b/i,
    premium: /\b(?:premium|luxury|high[\s-]end|flagship)\b/i,
    deal: /\b(?:deals?|discount(?:ed)?|on\s+sale|sale)\b/i,
  },
};

const TOP_RATED_THRESHOLD = 4.5;
const GOOD_REVIEWS_THRESHOLD = 4;

// Conversational words that carry no product meaning.
const FILLER = new Set([
  "best", "good", "great", "cheap", "cheapest", "budget", "affordable", "inexpensive", "premium", "luxury",
  "deal", "deals", "buy", "find", "show", "looking", "want", "need", "please", "recommend", "recommended",
  "something", "price", "priced", "around", "rated", "reviews", "review", "top",
]);

function toNumber(digits: string | undefined, thousands: string | undefined): number | undefined {
  if (!digits) return undefined;
  const value = Number(digits.replace(/,/g, ""));
  if (!Number.isFinite(value)) return undefined;
  return thousands ? value * 1000 : value;
}

/**
 * Fast rule-based query parser for product search
 * Extracts price bounds, rating hints and brand from natural language queries
 */
export class QueryParser {
  parse(query: string): SearchIntent {
    const rawQuery = query.trim();
    let remaining = rawQuery;
    const intent: SearchIntent = {
      rawQuery,
      terms: [],
      searchText: rawQuery,
      hints: [],
      interpretedBy: "rules",
    };

    // Extract price bounds
    const between = remaining.match(PATTERNS.price.between) ?? remaining.match(PATTERNS.price.range);
    if (between) {
      const low = toNumber(between[1], between[2]);
      const high = toNumber(between[3], between[4]);
      if (low !== undefined && high !== undefined) {
        intent.minPrice = Math.min(low, high);
        intent.maxPrice = Math.max(low, high);
      }
      remaining = remaining.replace(between[0], " ");
    } else {
      const ceiling = remaining.match(PATTERNS.price.under) ?? remaining.match(PATTERNS.price.orLess);
      if (ceiling) {
        intent.maxPrice = toNumber(ceiling[1], ceiling[2]);
        remaining = remaining.replace(ceiling[0], " ");
      }
      const floor = remaining.match(PATTERNS.price.over);
      if (floor) {
        intent.minPrice = toNumber(floor[1], floor[2]);
        remaining = remaining.replace(floor[0], " ");
      }
    }

    // Extract rating hints
    const stars = remaining.match(PATTERNS.rating.stars);
    if (stars) {
      intent.minRating = Math.min(5, Number(stars[1]));
      remaining = remaining.replace(stars[0], " ");
    } else if (PATTERNS.rating.top.test(remaining)) {
      intent.minRating = TOP_RATED_THRESHOLD;
      remaining = remaining.replace(PATTERNS.rating.top, " ");
    } else if (PATTERNS.rating.good.test(remaining)) {
      intent.minRating = GOOD_REVIEWS_THRESHOLD;
      remaining = remaining.replace(PATTERNS.rating.good, " ");
    }

    intent.hints = Object.entries(PATTERNS.hints)
      .filter(([_, pattern]) => pattern.test(remaining))
      .map(([hint]) => hint);

    intent.brand = findKnownBrand(remaining);
    intent.terms = this.tokenize(remaining).filter((term) => !FILLER.has(term));
    if (intent.terms.length > 0) {
      intent.searchText = intent.terms.join(" ");
    }

    return intent;
  }

  /**
   * Lowercase search terms without punctuation or stopwords.
   */
  tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .normalize("NFKC")
      .split(/\s+/)
      .map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
      .filter((token) => token.length > 0 && !STOPWORDS.has(token));
  }
}
