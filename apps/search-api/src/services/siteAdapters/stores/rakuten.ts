import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const RAKUTEN_STORE: StoreDefinition = {
  id: "rakuten",
  name: "Rakuten Ichiba",
  homeUrl: "https://search.rakuten.co.jp",
  countryCode: "jp",
  currency: "JPY",
  regions: ["jp"],
};

export class RakutenAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl(`/search/mall/${encodeURIComponent(intent.searchText)}/`, { p: page });
    return this.applyPriceHints(url, intent, "min", "max").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $(".searchresultitem").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, (): ListingDraft => {
        const link = card.find("h2 a, .title a").first();
        // "12,800円"
        const priceText = card.find("[class*='price--'], .important").first().text();
        const shop = cleanText(card.find(".merchant a, [class*='merchant'] a").first().text());

        return {
          title: link.text(),
          priceText,
          price: parsePriceLoose(priceText),
          currency: "JPY",
          rating: parseRating(card.find(".score").first().text()),
          reviewCount: parseCount(card.find(".legend").first().text()),
          url: link.attr("href"),
          imageUrl: card.find(".image img, img").first().attr("src"),
          freeShipping: isFreeShippingText(card.text()),
          metadata: shop ? { shop } : {},
        };
      });
    });

    return drafts;
  }
}
