import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parseAvailability, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const BESTBUY_STORE: StoreDefinition = {
  id: "bestbuy",
  name: "Best Buy",
  homeUrl: "https://www.bestbuy.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us"],
};

export class BestBuyAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    return this.searchUrl("/site/searchpage.jsp", { st: intent.searchText, cp: page }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("li.sku-item").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find("h4.sku-title a, h4.sku-header a").first();
        const priceText = card.find(".priceView-customer-price span").first().text();
        const ratingText = card.find(".c-ratings-reviews .visually-hidden, .c-ratings-reviews .sr-only").first().text();
        const fulfillment = card.find(".fulfillment-fulfillment-summary").text();
        const sku = card.attr("data-sku-id");
        const model = cleanText(card.find(".sku-model .sku-value").first().text());

        return {
          title: link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find(".pricing-price__regular-price, .priceView-was-price").first().text()),
          rating: ratingText ? parseRating(ratingText.replace(/^\D+/, "")) : undefined,
          reviewCount: parseCount(card.find(".c-reviews").first().text()),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("img.product-image").attr("src"),
          availability: /sold out/i.test(card.find(".fulfillment-add-to-cart-button").text())
            ? "out_of_stock"
            : parseAvailability(fulfillment),
          freeShipping: isFreeShippingText(fulfillment),
          metadata: { ...(sku ? { sku } : {}), ...(model ? { model } : {}) },
        };
      });
    });

    return drafts;
  }
}
