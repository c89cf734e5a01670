import type { CheerioAPI } from "cheerio";
import type { SearchIntent } from "../../../types/index.js";
import { HtmlSiteAdapter } from "../htmlSiteAdapter.js";
import { cleanText, parseCount, parsePriceLoose } from "../htmlParsing.js";
import type { ListingDraft, StoreDefinition } from "../types.js";

export const JD_STORE: StoreDefinition = {
  id: "jd",
  name: "JD.com",
  homeUrl: "https://search.jd.com",
  countryCode: "cn",
  currency: "CNY",
  regions: ["cn"],
};

/** "2万+" → 20000, "500+" → 500. */
export function parseJdCommentCount(value: string): number | undefined {
  const text = cleanText(value);
  const tenThousands = text.match(/(\d+(?:\.\d+)?)\s*万/);
  if (tenThousands?.[1]) return Math.round(Number(tenThousands[1]) * 10_000);
  return parseCount(text);
}

export class JdAdapter extends HtmlSiteAdapter {
  buildSearchUrl(intent: SearchIntent, page: number): string {
    // JD counts half-pages.
    return this.searchUrl("/Search", { keyword: intent.searchText, enc: "utf-8", page: 2 * page - 1 }).toString();
  }

  protected parseListings($: CheerioAPI): ListingDraft[] {
    const drafts: ListingDraft[] = [];

    $("li.gl-item").each((_, node) => {
      const card = $(node);
      this.tryParse(drafts, () => {
        const image = card.find(".p-img img").first();
        const sku = card.attr("data-sku");
        const shop = cleanText(card.find(".p-shop a").first().text());

        return {
          title: card.find(".p-name em").first().text(),
          priceText: card.find(".p-price i").first().text(),
          price: parsePriceLoose(card.find(".p-price i").first().text()),
          currency: "CNY",
          reviewCount: parseJdCommentCount(card.find(".p-commit a").first().text()),
          url: this.absolute(card.find(".p-name a").first().attr("href")),
          imageUrl: this.absolute(image.attr("data-lazy-img") ?? image.attr("src")),
          metadata: { ...(sku ? { sku } : {}), ...(shop ? { shop } : {}) },
        };
      });
    });

    return drafts;
  }
}
