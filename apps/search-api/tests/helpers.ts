import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { MergedProduct, RawListing } from "@dealfinder/shared";
import { parseEnv } from "../src/env.js";
import type { Env, SearchIntent } from "../src/types/index.js";
import type { AdapterContext, HtmlFetcher, SiteAdapter } from "../src/services/siteAdapters/types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "fixtures", name), "utf8");
}

export function testEnv(overrides: Record<string, string> = {}): Env {
  return parseEnv({ NODE_ENV: "test", LOG_LEVEL: "silent", ...overrides });
}

export function makeIntent(overrides: Partial<SearchIntent> = {}): SearchIntent {
  return {
    rawQuery: "headphones",
    terms: ["headphones"],
    searchText: "headphones",
    hints: [],
    interpretedBy: "raw",
    ...overrides,
  };
}

export function makeListing(overrides: Partial<RawListing> = {}): RawListing {
  return {
    source: "amazon",
    title: "Sony WH-1000XM4",
    price: 278,
    currency: "USD",
    url: "https://store.example/sony-wh1000xm4",
    availability: "unknown",
    freeShipping: false,
    metadata: {},
    ...overrides,
  };
}

export function makeProduct(overrides: Partial<MergedProduct> = {}): MergedProduct {
  return {
    id: "p1",
    title: "Sony WH-1000XM4",
    normalizedTitle: "sony wh1000xm4",
    price: 278,
    currency: "USD",
    url: "https://store.example/sony-wh1000xm4",
    source: "amazon",
    sources: ["amazon"],
    sourceCount: 1,
    listings: [],
    similarListings: 0,
    priceSpread: 0,
    reviewCount: 0,
    availability: "unknown",
    freeShipping: false,
    relevanceScore: 0,
    dealScore: 0,
    ...overrides,
  };
}

export function makeContext(overrides: Partial<AdapterContext> = {}): AdapterContext {
  return {
    region: "us",
    page: 1,
    signal: new AbortController().signal,
    maxListings: 20,
    ...overrides,
  };
}

/** Serves the same HTML for every URL and records what was requested. */
export class StaticFetcher implements HtmlFetcher {
  readonly requests: string[] = [];

  constructor(private readonly html: string) {}

  async fetchHtml(_source: string, url: string): Promise<string> {
    this.requests.push(url);
    return this.html;
  }
}

export async function drain(iterable: AsyncIterable<RawListing>): Promise<RawListing[]> {
  const out: RawListing[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Rejects once the signal aborts; never settles otherwise. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

/**
 * In-process adapter driven by a callback.
 */
export function fakeAdapter(
  id: string,
  run: (context: AdapterContext) => Promise<RawListing[]>,
  regions: readonly string[] = ["global", "us"]
): SiteAdapter {
  return {
    id,
    name: id,
    homeUrl: `https://${id}.example`,
    regions,
    async *fetch(_intent, context) {
      const listings = await run(context);
      for (const listing of listings) yield listing;
    },
  };
}

export function staticAdapter(id: string, listings: RawListing[], regions?: readonly string[]): SiteAdapter {
  return fakeAdapter(id, async () => listings, regions);
}
