import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const ALIEXPRESS_STORE: StoreDefinition = {
  id: "aliexpress",
  name: "AliExpress",
  homeUrl: "https://www.aliexpress.com",
  countryCode: "us",
  currency: "USD",
  regions: ["global", "cn"],
};

export class AliExpressAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl("/wholesale", { SearchText: intent.searchText, page });
    return this.applyPriceHints(url, intent, "minPrice", "maxPrice").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("a[class*='search-card-item'], div[class*='search-item-card-wrapper']").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, (): ListingDraft => {
        const href = card.is("a") ? card.attr("href") : card.find("a").first().attr("href");
        const priceText = card.find("[class*='price-sale--'], [class*='price--current']").first().text();
        const sold = cleanText(card.find("[class*='trade--']").first().text());

        return {
          title: card.find("h3, [class*='title--']").first().text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find("[class*='price-original--']").first().text()),
          rating: parseRating(card.find("[class*='evaluation--']").first().text()),
          url: this.absolute(href?.split("?")[0]),
          imageUrl: this.absolute(card.find("img[class*='product-img'], img").first().attr("src")),
          freeShipping: isFreeShippingText(card.text()),
          metadata: sold ? { sold } : {},
        };
      });
    });

    return drafts;
  }
}
