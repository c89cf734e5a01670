import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { isFreeShippingText, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const NEWEGG_STORE: StoreDefinition = {
  id: "newegg",
  name: "Newegg",
  homeUrl: "https://www.newegg.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us"],
};

export class NeweggAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    return this.searchUrl("/p/pl", { d: intent.searchText, Page: page }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $(".item-cell .item-container, div.item-container").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find("a.item-title").first();
        const priceText = card.find("li.price-current").first().text();
        const shippingText = card.find("li.price-ship").first().text();
        const freeShipping = isFreeShippingText(shippingText);

        return {
          title: link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find("li.price-was .price-was-data").first().text()),
          // aria-label="rated 4 out of 5"
          rating: parseRating(card.find("i.rating").attr("aria-label")),
          reviewCount: parseCount(card.find(".item-rating-num").first().text()),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("a.item-img img").first().attr("src"),
          brand: card.find("a.item-brand img").attr("title"),
          shippingCost: freeShipping ? 0 : parsePriceLoose(shippingText),
          freeShipping,
        };
      });
    });

    return drafts;
  }
}
