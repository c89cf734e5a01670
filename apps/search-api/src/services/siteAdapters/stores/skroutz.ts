import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const SKROUTZ_STORE: StoreDefinition = {
  id: "skroutz",
  name: "Skroutz",
  homeUrl: "https://www.skroutz.gr",
  countryCode: "gr",
  currency: "EUR",
  regions: ["gr"],
};

export class SkroutzAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl("/search", { keyphrase: intent.searchText, page });
    return this.applyPriceHints(url, intent, "price_min", "price_max").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("#sku-list li.cf.card, li.cf.card").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find("a.js-sku-link").first();
        const priceText = card.find(".price").first().text();

        return {
          title: link.attr("title") ?? card.find("h2").first().text(),
          priceText,
          price: parsePriceLoose(priceText),
          rating: parseRating(card.find(".actual-rating").first().text()),
          reviewCount: parseCount(card.find(".reviews-count, .rating-with-count span").first().text()),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("img").first().attr("src"),
        };
      });
    });

    return drafts;
  }
}
