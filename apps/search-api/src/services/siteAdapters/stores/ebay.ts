import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const EBAY_STORES: readonly StoreDefinition[] = [
  { id: "ebay", name: "eBay", homeUrl: "https://www.ebay.com", countryCode: "us", currency: "USD", regions: ["global", "us"] },
  { id: "ebay_uk", name: "eBay UK", homeUrl: "https://www.ebay.co.uk", countryCode: "gb", currency: "GBP", regions: ["uk", "eu"] },
  { id: "ebay_de", name: "eBay.de", homeUrl: "https://www.ebay.de", countryCode: "de", currency: "EUR", regions: ["de", "eu"] },
];

export class EbayAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl("/sch/i.html", { _nkw: intent.searchText, _pgn: page });
    return this.applyPriceHints(url, intent, "_udlo", "_udhi").toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("li.s-item").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const title = cleanText(card.find(".s-item__title").first().text()).replace(/^new listing\s*/i, "");
        // First card is an eBay placeholder.
        if (!title || /^shop on ebay$/i.test(title)) return undefined;

        const priceText = card.find(".s-item__price").first().text();
        const shippingText = card.find(".s-item__shipping, .s-item__logisticsCost").first().text();
        const url = card.find("a.s-item__link").attr("href");
        const itemId = url?.match(/\/itm\/(?:[^/]+\/)?(\d+)/)?.[1];
        const image = card.find("img").first();
        const freeShipping = isFreeShippingText(shippingText);

        return {
          title,
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(
            card.find(".s-item__price--strike, .s-item__trending-price .STRIKETHROUGH, .STRIKETHROUGH").first().text()
          ),
          rating: parseRating(card.find(".x-star-rating .clipped").first().text()),
          reviewCount: parseCount(card.find(".s-item__reviews-count span").first().text()),
          url: url?.split("?")[0],
          imageUrl: image.attr("src") ?? image.attr("data-src"),
          shippingCost: freeShipping ? 0 : parsePriceLoose(shippingText),
          freeShipping,
          metadata: {
            ...(itemId ? { itemId } : {}),
            condition: cleanText(card.find(".SECONDARY_INFO").first().text()),
          },
        };
      });
    });

    return drafts;
  }
}
