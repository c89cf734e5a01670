import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const HOMEDEPOT_STORE: StoreDefinition = {
  id: "homedepot",
  name: "The Home Depot",
  homeUrl: "https://www.homedepot.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us"],
};

/** Price blocks render "$279" and "00" in separate spans. */
function parseSplitPrice(dollars: string, cents: string): number | undefined {
  const whole = parsePriceLoose(dollars);
  const fraction = cleanText(cents).replace(/\D/g, "");
  if (whole === undefined) return undefined;
  return fraction ? whole + Number(fraction.slice(0, 2).padEnd(2, "0")) / 100 : whole;
}

export class HomeDepotAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    return this.searchUrl(`/s/${encodeURIComponent(intent.searchText)}`, { page }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("[data-testid='product-pod']").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find("a[data-testid='product-header'], [data-testid='product-header'] a").first();
        const priceBlock = card.find(".price-format__main-price").first();
        const spans = priceBlock.find("span");
        const dollarsText = spans.length >= 2 ? `${spans.eq(0).text()}${spans.eq(1).text()}` : priceBlock.text();
        const centsText = spans.length >= 3 ? spans.eq(2).text() : "";

        return {
          title: link.find("span").last().text() || link.text(),
          priceText: dollarsText,
          price: parseSplitPrice(dollarsText, centsText),
          originalPrice: parsePriceLoose(card.find(".price-detailed__was-price .u__strike").first().text()),
          rating: parseRating(card.find("[name='simple-rating']").attr("aria-label")),
          reviewCount: parseCount(card.find(".product-ratings__count").first().text()),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("img").first().attr("src"),
          brand: card.find("[data-testid='attribute-product-brand']").first().text(),
          freeShipping: isFreeShippingText(card.find(".fulfillment").text()),
        };
      });
    });

    return drafts;
  }
}
