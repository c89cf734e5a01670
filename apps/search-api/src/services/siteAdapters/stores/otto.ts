import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { isFreeShippingText, parseAvailability, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const OTTO_STORE: StoreDefinition = {
  id: "otto",
  name: "OTTO",
  homeUrl: "https://www.otto.de",
  countryCode: "de",
  currency: "EUR",
  regions: ["de"],
};

export class OttoAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl(`/suche/${encodeURIComponent(intent.searchText)}/`, { page });
    return this.applyPriceHints(url, intent, "pricemin", "pricemax").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("article.find_tile, article.product").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const priceText = card.find(".find_tile__retailPrice, .find_tile__priceValue").first().text();
        const ratingLabel = card.find("[class*='rating']").first().attr("aria-label");

        return {
          title: card.find(".find_tile__name").first().text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find(".find_tile__originalPrice").first().text()),
          // "4,5 von 5 Sternen"
          rating: parseRating(ratingLabel),
          reviewCount: parseCount(card.find(".find_tile__ratingCount").first().text()),
          url: this.absolute(card.find("a.find_tile__productLink, a").first().attr("href")),
          imageUrl: card.find("img.find_tile__productImage, img").first().attr("src"),
          brand: card.find(".find_tile__brand").first().text(),
          availability: parseAvailability(card.find(".find_tile__deliveryTime").first().text()),
          freeShipping: isFreeShippingText(card.text()),
        };
      });
    });

    return drafts;
  }
}
