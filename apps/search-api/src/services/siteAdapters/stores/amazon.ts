import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, isFreeShippingText, parseCount, parsePriceLoose, parseRating } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const AMAZON_STORES: readonly StoreDefinition[] = [
  { id: "amazon", name: "Amazon", homeUrl: "https://www.amazon.com", countryCode: "us", currency: "USD", regions: ["global", "us"] },
  { id: "amazon_uk", name: "Amazon UK", homeUrl: "https://www.amazon.co.uk", countryCode: "gb", currency: "GBP", regions: ["uk", "eu"] },
  { id: "amazon_de", name: "Amazon.de", homeUrl: "https://www.amazon.de", countryCode: "de", currency: "EUR", regions: ["de", "eu"] },
  { id: "amazon_fr", name: "Amazon.fr", homeUrl: "https://www.amazon.fr", countryCode: "fr", currency: "EUR", regions: ["fr", "eu"] },
  { id: "amazon_jp", name: "Amazon.co.jp", homeUrl: "https://www.amazon.co.jp", countryCode: "jp", currency: "JPY", regions: ["jp"] },
];

export class AmazonAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    const url = this.searchUrl("/s", { k: intent.searchText, page });
    if (intent.minPrice !== undefined || intent.maxPrice !== undefined) {
      // p_36 takes cents.
      const min = intent.minPrice !== undefined ? String(Math.floor(intent.minPrice * 100)) : "";
      const max = intent.maxPrice !== undefined ? String(Math.ceil(intent.maxPrice * 100)) : "";
      url.searchParams.set("rh", `p_36:${min}-${max}`);
    }
    return url.toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("[data-component-type='s-search-result']").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const heading = card.find("h2").first();
        const href = heading.find("a").attr("href") ?? heading.closest("a").attr("href") ?? card.find("a.a-link-normal").first().attr("href");
        const priceText = card.find(".a-price:not(.a-text-price) .a-offscreen").first().text();
        const ratingLabel =
          card.find("i[class*='a-icon-star'] .a-icon-alt").first().text() ||
          card.find("span[aria-label*='out of 5']").first().attr("aria-label");
        const reviewsText =
          card.find("span[aria-label$='ratings']").first().attr("aria-label") ??
          card.find("span.s-underline-text").first().text();
        const asin = card.attr("data-asin");

        return {
          title: heading.text(),
          priceText,
          price: parsePriceLoose(priceText),
          originalPrice: parsePriceLoose(card.find(".a-price.a-text-price .a-offscreen").first().text()),
          rating: parseRating(ratingLabel),
          reviewCount: parseCount(reviewsText),
          url: this.absolute(href),
          imageUrl: card.find("img.s-image").attr("src"),
          freeShipping: isFreeShippingText(card.find("[data-cy='delivery-recipe']").text()),
          metadata: {
            ...(asin ? { asin } : {}),
            sponsored: cleanText(card.find(".puis-sponsored-label-text").text()).length > 0,
          },
        };
      });
    });

    return drafts;
  }
}
