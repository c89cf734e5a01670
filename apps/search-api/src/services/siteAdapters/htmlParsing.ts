import type { CheerioAPI } from "cheerio";
import type { Availability } from "@dealfinder/shared";
import type { ListingDraft } from "./types.js";

export function cleanText(value: string | undefined | null): string {
  return String(value ?? "")
    .replace(/&nbsp;|&#160;|\u00a0/gi, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Parse a price out of free text: "$1,299.99", "1.299,99 €", "£12,5", "¥12,800".
 */
export function parsePriceLoose(value: string | number | undefined | null): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? value : undefined;
  }
  const raw = cleanText(value);
  if (!raw) return undefined;

  const normalized = raw
    .replace(/[^\d.,\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  if (!normalized) return undefined;

  const match = normalized.match(/\d{1,3}(?:[.,\s]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d{1,2})?/);
  if (!match?.[0]) return undefined;
  const token = match[0].trim();

  const hasDot = token.includes(".");
  const hasComma = token.includes(",");
  let canonical: string;
  if (hasDot && hasComma) {
    canonical =
      token.lastIndexOf(".") > token.lastIndexOf(",")
        ? token.replace(/[,\s]/g, "")
        : token.replace(/[.\s]/g, "").replace(",", ".");
  } else if (hasComma) {
    const parts = token.split(",");
    canonical =
      parts.length === 2 && (parts[1]?.length ?? 0) <= 2
        ? token.replace(/\s/g, "").replace(",", ".")
        : token.replace(/[,\s]/g, "");
  } else if (hasDot) {
    const parts = token.split(".");
    // "1.299" and "1.299.000" are thousands groups, "12.99" is a decimal.
    canonical =
      parts.length > 2 || (parts[1]?.length ?? 0) === 3
        ? token.replace(/[.\s]/g, "")
        : token.replace(/\s/g, "");
  } else {
    canonical = token.replace(/\s/g, "");
  }

  const num = Number(canonical);
  if (!Number.isFinite(num) || num <= 0) return undefined;
  return num;
}

/** "4.5 out of 5 stars" → 4.5, "4,3" → 4.3; clamped to 0..5. */
export function parseRating(value: string | number | undefined | null): number | undefined {
  const num =
    typeof value === "number"
      ? value
      : Number((cleanText(value).match(/\d+(?:[.,]\d+)?/)?.[0] ?? "").replace(",", "."));
  if (!Number.isFinite(num) || num <= 0) return undefined;
  return Math.min(5, num);
}

/** "(1,234)" → 1234, "2.5K" → 2500. */
export function parseCount(value: string | number | undefined | null): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.round(value) : undefined;
  }
  const raw = cleanText(value).toLowerCase();
  const short = raw.match(/(\d+(?:[.,]\d+)?)\s*k\b/);
  if (short?.[1]) {
    return Math.round(Number(short[1].replace(",", ".")) * 1000);
  }
  const digits = raw.match(/\d[\d,.\s]*/)?.[0]?.replace(/[^\d]/g, "");
  if (!digits) return undefined;
  const num = Number(digits);
  return Number.isFinite(num) ? num : undefined;
}

export function detectCurrency(value: string | undefined): string | undefined {
  if (!value) return undefined;
  if (value.includes("£")) return "GBP";
  if (value.includes("€")) return "EUR";
  if (/(?:^|[^A-Za-z])(?:US\s?)?\$/.test(value)) return "USD";
  return undefined;
}

export function parseAvailability(value: string | undefined): Availability {
  const text = cleanText(value).toLowerCase();
  if (!text) return "unknown";
  if (/(out of stock|sold out|unavailable|outofstock|nicht verfügbar|εξαντλήθηκε)/.test(text)) return "out_of_stock";
  if (/(only \d+ left|limited stock|few left|limitedavailability)/.test(text)) return "limited";
  if (/(in stock|instock|available|auf lager|διαθέσιμο)/.test(text)) return "in_stock";
  return "unknown";
}

export function isFreeShippingText(value: string | undefined): boolean {
  return /(free (?:shipping|delivery)|kostenlose lieferung|livraison gratuite|送料無料|包邮|δωρεάν μεταφορικά)/i.test(
    cleanText(value)
  );
}

export function toAbsoluteUrl(value: string | undefined, origin: string): string | undefined {
  const raw = cleanText(value);
  if (!raw) return undefined;
  try {
    return new URL(raw.startsWith("//") ? `https:${raw}` : raw, origin).toString();
  } catch {
    return undefined;
  }
}

// ============================================================================
// schema.org JSON-LD
// ============================================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function flattenJsonLdNodes(value: unknown): JsonRecord[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => flattenJsonLdNodes(item));
  }
  if (!isRecord(value)) return [];

  const graph = value["@graph"];
  if (Array.isArray(graph)) {
    return graph.flatMap((item) => flattenJsonLdNodes(item));
  }

  return [value];
}

function hasType(node: JsonRecord, type: string): boolean {
  const declared = node["@type"];
  if (Array.isArray(declared)) return declared.some((t) => String(t).toLowerCase() === type);
  return String(declared ?? "").toLowerCase() === type;
}

function firstString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return firstString(value[0]);
  if (isRecord(value)) return firstString(value.url ?? value.name);
  return undefined;
}

function productFromJsonLd(node: JsonRecord, origin: string): ListingDraft | undefined {
  const title = cleanText(firstString(node.name));
  if (!title) return undefined;

  const offersRaw = node.offers;
  const offer = Array.isArray(offersRaw) ? offersRaw.find(isRecord) : isRecord(offersRaw) ? offersRaw : undefined;
  const priceSource = offer ? (offer.price ?? offer.lowPrice) : undefined;
  const rating = isRecord(node.aggregateRating) ? node.aggregateRating : undefined;
  const brand = node.brand;

  return {
    title,
    price: parsePriceLoose(firstString(priceSource)),
    currency: offer ? firstString(offer.priceCurrency) : undefined,
    url: toAbsoluteUrl(firstString(node.url ?? offer?.url), origin),
    imageUrl: toAbsoluteUrl(firstString(node.image), origin),
    brand: isRecord(brand) ? firstString(brand.name) : firstString(brand),
    category: firstString(node.category),
    rating: rating ? parseRating(firstString(rating.ratingValue)) : undefined,
    reviewCount: rating ? parseCount(firstString(rating.reviewCount ?? rating.ratingCount)) : undefined,
    availability: offer ? parseAvailability(firstString(offer.availability)) : undefined,
  };
}

/**
 * Product and ItemList nodes from every `application/ld+json` block on the page.
 */
export function extractJsonLdListings($: CheerioAPI, origin: string): ListingDraft[] {
  const drafts: ListingDraft[] = [];

  $("script[type='application/ld+json']").each((_, node) => {
    const text = $(node).text().trim();
    if (!text) return;
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      // Some stores ship invalid JSON-LD next to valid blocks.
      return;
    }

    for (const entry of flattenJsonLdNodes(payload)) {
      if (hasType(entry, "product")) {
        const draft = productFromJsonLd(entry, origin);
        if (draft) drafts.push(draft);
        continue;
      }
      if (hasType(entry, "itemlist") && Array.isArray(entry.itemListElement)) {
        for (const element of entry.itemListElement) {
          if (!isRecord(element)) continue;
          const item = isRecord(element.item) ? element.item : element;
          const draft = productFromJsonLd(item, origin);
          if (draft) drafts.push(draft);
        }
      }
    }
  });

  return drafts;
}
