import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { isFreeShippingText, parseAvailability, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const BHPHOTO_STORE: StoreDefinition = {
  id: "bhphoto",
  name: "B&H Photo",
  homeUrl: "https://www.bhphotovideo.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us", "global"],
};

export class BhPhotoAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    return this.searchUrl("/c/search", { q: intent.searchText, page }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("[data-selenium='miniProductPage']").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, (): ListingDraft => {
        const link = card.find("a[data-selenium='miniProductPageProductNameLink']").first();
        const priceText = card.find("[data-selenium='uppedDecimalPriceFirst'], [data-selenium='pricingPrice']").first().text();
        const rating = card.find("[data-selenium='miniProductPageProductRating']").first();
        const skuText = card.find("[data-selenium='miniProductPageProductSkuInfo']").first().text();

        return {
          title: card.find("[data-selenium='miniProductPageProductName']").first().text() || link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find("[data-selenium='strikeThroughPrice']").first().text()),
          rating: parseRating(rating.attr("aria-label") ?? rating.attr("data-rating")),
          reviewCount: parseCount(card.find("[data-selenium='miniProductPageProductReviews']").first().text()),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("img[data-selenium='miniProductPageImg'], img").first().attr("src"),
          availability: parseAvailability(card.find("[data-selenium='stockStatus']").first().text()),
          freeShipping: isFreeShippingText(card.find("[data-selenium='shippingInfo']").text()),
          metadata: skuText ? { sku: skuText.replace(/^.*#\s*/, "").trim() } : {},
        };
      });
    });

    return drafts;
  }
}
