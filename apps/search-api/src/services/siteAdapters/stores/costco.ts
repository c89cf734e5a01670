import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const COSTCO_STORE: StoreDefinition = {
  id: "costco",
  name: "Costco",
  homeUrl: "https://www.costco.com",
  countryCode: "us",
  currency: "USD",
  regions: ["us"],
};

export class CostcoAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    return this.searchUrl("/CatalogSearch", {
      dept: "All",
      keyword: intent.searchText,
      pageSize: 24,
      page,
    }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $(".product-tile-set .product, div.product").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const link = card.find(".description a, span.description a").first();
        const priceText = card.find(".price").first().text();

        return {
          title: link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          rating: parseRating(card.find("[itemprop='ratingValue']").attr("content")),
          reviewCount: parseCount(card.find("[itemprop='reviewCount']").attr("content")),
          url: this.absolute(link.attr("href")),
          imageUrl: card.find("img.img-responsive, img").first().attr("src"),
          // Member prices include delivery on most online items.
          freeShipping: /delivery included|free shipping/i.test(card.find(".product-features").text()),
        };
      });
    });

    return drafts;
  }
}
