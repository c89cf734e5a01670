import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { isFreeShippingText, parseAvailability, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const WALMART_STORE: StoreDefinition = {
  id: "walmart",
  name: "Walmart",
  homeUrl: "https://www.walmart.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us"],
};

export class WalmartAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl("/search", { q: intent.searchText, page });
    return this.applyPriceHints(url, intent, "min_price", "max_price").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("div[data-item-id]").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, (): ListingDraft => {
        const priceBlock = card.find("[data-automation-id='product-price']").first();
        const priceText = priceBlock.find("span.w_iUH7").first().text() || priceBlock.text();
        const itemId = card.attr("data-item-id");

        return {
          title: card.find("[data-automation-id='product-title']").first().text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(priceBlock.find(".strike").first().text()),
          rating: parseRating(card.find("[data-testid='product-ratings']").attr("data-value")),
          reviewCount: parseCount(card.find("[data-testid='product-reviews']").attr("data-value")),
          url: this.absolute(card.find("a[link-identifier], a").first().attr("href")),
          imageUrl: card.find("img[data-testid='productTileImage']").attr("src"),
          availability: parseAvailability(card.find("[data-automation-id='fulfillment-badge']").text()),
          freeShipping: isFreeShippingText(card.find("[data-automation-id='fulfillment-badge']").text()),
          metadata: itemId ? { itemId } : {},
        };
      });
    });

    return drafts;
  }
}
