import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { isFreeShippingText, parseAvailability, parsePriceLoose } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const KOTSOVOLOS_STORE: StoreDefinition = {
  id: "kotsovolos",
  name: "Kotsovolos",
  homeUrl: "https://www.kotsovolos.gr",
  countryCode: "gr",
  currency: "EUR",
  regions: ["gr"],
};

export class KotsovolosAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    return this.searchUrl("/SearchDisplay", { searchTerm: intent.searchText, pageNumber: page }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $(".product_listing_container .product, div.product").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find(".title a, .product-name a").first();
        const priceText = card.find(".price .current, .current-price").first().text();

        return {
          title: link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find(".old-price, .price .old").first().text()),
          url: this.absolute(link.attr("href")),
          imageUrl: this.absolute(card.find("img").first().attr("src")),
          availability: parseAvailability(card.find(".availability").first().text()),
          freeShipping: isFreeShippingText(card.text()),
        };
      });
    });

    return drafts;
  }
}
