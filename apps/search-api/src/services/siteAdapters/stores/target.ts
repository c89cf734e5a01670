import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const TARGET_STORE: StoreDefinition = {
  id: "target",
  name: "Target",
  homeUrl: "https://www.target.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us"],
};

export class TargetAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl("/s", { searchTerm: intent.searchText, pageNumber: page });
    return this.applyPriceHints(url, intent, "minPrice", "maxPrice").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("[data-test='@web/site-top-of-funnel/ProductCardWrapper']").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find("a[data-test='product-title']").first();
        const priceText = card.find("[data-test='current-price']").first().text();
        // "4.6 out of 5 stars with 1234 ratings"
        const ratingText = cleanText(card.find("[data-test='ratings']").first().text());

        return {
          title: link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find("[data-test='comparison-price']").first().text()),
          rating: parseRating(ratingText),
          reviewCount: parseCount(ratingText.match(/with\s+([\d,.]+k?)\s+ratings?/i)?.[1]),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("picture img").first().attr("src"),
          brand: card.find("[data-test='@web/ProductCard/ProductCardBrandAndRibbonMessage/brand']").first().text(),
          freeShipping: isFreeShippingText(card.find("[data-test='LPFulfillmentSectionShippingFA_standardShippingMessage']").text()),
        };
      });
    });

    return drafts;
  }
}
