import { load, type CheerioAPI } from "cheerio";
import type { Logger } from "pino";
import type { RawListing } from "@dealfinder/shared";
import { AdapterError } from "../../errors.js";
import type { SearchIntent } from "../../types/index.js";
import { cleanText, detectCurrency, extractJsonLdListings, toAbsoluteUrl } from "./htmlParsing.js";
import type { AdapterContext, HtmlFetcher, ListingDraft, SiteAdapter, StoreDefinition } from "./types.js";

/**
 * Base for stores scraped from their HTML search results page.
 * Subclasses supply the search URL and the result-card selectors.
 */
export abstract class HtmlSiteAdapter implements SiteAdapter {
  protected readonly logger: Logger;

  constructor(
    protected readonly store: StoreDefinition,
    private readonly fetcher: HtmlFetcher,
    logger: Logger
  ) {
    this.logger = logger.child({ source: store.id });
  }

  get id(): string {
    return this.store.id;
  }

  get name(): string {
    return this.store.name;
  }

  get homeUrl(): string {
    return this.store.homeUrl;
  }

  get regions(): readonly string[] {
    return this.store.regions;
  }

  abstract buildSearchUrl(intent: SearchIntent, page: number): string;

  protected abstract parseListings($: CheerioAPI): ListingDraft[];

  async *fetch(intent: SearchIntent, context: AdapterContext): AsyncGenerator<RawListing> {
    const url = this.buildSearchUrl(intent, context.page);
    const html = await this.fetcher.fetchHtml(this.id, url, {
      countryCode: this.store.countryCode,
      signal: context.signal,
    });

    let drafts: ListingDraft[];
    try {
      const $ = load(html);
      drafts = this.parseListings($);
      if (drafts.length === 0) {
        drafts = extractJsonLdListings($, this.store.homeUrl);
      }
    } catch (error) {
      throw AdapterError.from(this.id, error);
    }

    let emitted = 0;
    for (const draft of drafts) {
      if (emitted >= context.maxListings) return;
      if (context.signal.aborted) {
        throw new AdapterError(this.id, "aborted", "Cancelled while emitting listings");
      }
      const listing = this.toListing(draft);
      if (!listing) continue;
      emitted += 1;
      yield listing;
    }
  }

  /**
   * Runs one result-card parser; a card that throws is skipped, not fatal.
   */
  protected tryParse(drafts: ListingDraft[], parse: () => ListingDraft | undefined): void {
    try {
      const draft = parse();
      if (draft) drafts.push(draft);
    } catch (error) {
      this.logger.debug({ error }, "Skipping unparseable result card");
    }
  }

  protected absolute(value: string | undefined): string | undefined {
    return toAbsoluteUrl(value, this.store.homeUrl);
  }

  protected searchUrl(path: string, params: Record<string, string | number>): URL {
    const url = new URL(path, this.store.homeUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  /**
   * Forwards the intent's price bounds as query parameters. Stores only use them to trim the payload;
   * bounds are enforced again after matching.
   */
  protected applyPriceHints(url: URL, intent: SearchIntent, minKey: string, maxKey: string): URL {
    if (intent.minPrice !== undefined) url.searchParams.set(minKey, String(Math.floor(intent.minPrice)));
    if (intent.maxPrice !== undefined) url.searchParams.set(maxKey, String(Math.ceil(intent.maxPrice)));
    return url;
  }

  /**
   * Validates a draft into a listing: title, positive price and URL are required.
   */
  protected toListing(draft: ListingDraft): RawListing | undefined {
    const title = cleanText(draft.title);
    const price = draft.price;
    const url = draft.url;
    if (!title || !url || price === undefined || !Number.isFinite(price) || price <= 0) {
      return undefined;
    }

    const originalPrice =
      draft.originalPrice !== undefined && Number.isFinite(draft.originalPrice) && draft.originalPrice > 0
        ? draft.originalPrice
        : undefined;
    const rating =
      draft.rating !== undefined && Number.isFinite(draft.rating)
        ? Math.min(5, Math.max(0, draft.rating))
        : undefined;
    const shippingCost =
      draft.shippingCost !== undefined && Number.isFinite(draft.shippingCost) && draft.shippingCost >= 0
        ? draft.shippingCost
        : undefined;

    return {
      source: this.id,
      title,
      price,
      currency: draft.currency || detectCurrency(draft.priceText) || this.store.currency,
      originalPrice,
      rating,
      reviewCount: draft.reviewCount,
      url,
      imageUrl: draft.imageUrl,
      brand: cleanText(draft.brand) || undefined,
      category: cleanText(draft.category) || undefined,
      availability: draft.availability ?? "unknown",
      shippingCost,
      freeShipping: draft.freeShipping === true || shippingCost === 0,
      metadata: draft.metadata ?? {},
    };
  }
}
