import { describe, expect, it, vi } from "vitest";
import { AdapterError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { AdapterRegistry, createDefaultAdapters } from "../src/services/siteAdapters/registry.js";
import { ScraperClient } from "../src/services/siteAdapters/scraperClient.js";
import { AMAZON_STORES, AmazonAdapter } from "../src/services/siteAdapters/stores/amazon.js";
import { BESTBUY_STORE, BestBuyAdapter } from "../src/services/siteAdapters/stores/bestbuy.js";
import { EBAY_STORES, EbayAdapter } from "../src/services/siteAdapters/stores/ebay.js";
import { JD_STORE, JdAdapter } from "../src/services/siteAdapters/stores/jd.js";
import type { FetchLike } from "../src/services/siteAdapters/types.js";
import { StaticFetcher, drain, makeContext, makeIntent, readFixture } from "./helpers.js";

const [AMAZON_US] = AMAZON_STORES;
const [EBAY_US] = EBAY_STORES;
if (!AMAZON_US || !EBAY_US) throw new Error("store definitions missing");

describe("store adapters", () => {
  it("parses Amazon result cards and skips cards without a price", async () => {
    const adapter = new AmazonAdapter(AMAZON_US, new StaticFetcher(readFixture("amazon-search.html")), silentLogger());
    const listings = await drain(adapter.fetch(makeIntent(), makeContext()));

    expect(listings).toEqual([
      {
        source: "amazon",
        title: "Sony WH-1000XM4 Wireless Noise Canceling Headphones",
        price: 278,
        currency: "USD",
        originalPrice: 349.99,
        rating: 4.6,
        reviewCount: 52310,
        url: "https://www.amazon.com/Sony-WH-1000XM4/dp/B0863TXGM3",
        imageUrl: "https://images.example/sony.jpg",
        availability: "unknown",
        freeShipping: true,
        metadata: { asin: "B0863TXGM3", sponsored: false },
      },
    ]);
  });

  it("parses eBay results, drops the placeholder card and reads shipping", async () => {
    const adapter = new EbayAdapter(EBAY_US, new StaticFetcher(readFixture("ebay-search.html")), silentLogger());
    const listings = await drain(adapter.fetch(makeIntent(), makeContext()));

    expect(listings.map((l) => l.title)).toEqual(["Sony WH1000XM4 Headphones Black", "Anker USB-C Cable 6ft"]);
    expect(listings[0]).toMatchObject({
      price: 259,
      url: "https://www.ebay.com/itm/285678901234",
      shippingCost: 0,
      freeShipping: true,
      metadata: { itemId: "285678901234", condition: "Pre-Owned" },
    });
    expect(listings[1]).toMatchObject({
      price: 12.99,
      shippingCost: 4.5,
      freeShipping: false,
      metadata: { itemId: "987654" },
    });
  });

  it("falls back to JSON-LD when the store selectors find nothing", async () => {
    const adapter = new BestBuyAdapter(BESTBUY_STORE, new StaticFetcher(readFixture("jsonld-search.html")), silentLogger());
    const listings = await drain(adapter.fetch(makeIntent(), makeContext()));

    expect(listings).toHaveLength(1);
    expect(listings[0]).toMatchObject({
      source: "bestbuy",
      title: "Apple AirPods Pro (2nd Generation)",
      price: 189.99,
      currency: "USD",
      url: "https://www.bestbuy.com/site/apple-airpods-pro/6447382.p",
      brand: "Apple",
      rating: 4.8,
      reviewCount: 10234,
      availability: "in_stock",
    });
  });

  it("stops after maxListings", async () => {
    const adapter = new EbayAdapter(EBAY_US, new StaticFetcher(readFixture("ebay-search.html")), silentLogger());
    const listings = await drain(adapter.fetch(makeIntent(), makeContext({ maxListings: 1 })));
    expect(listings).toHaveLength(1);
  });

  it("fails with an aborted AdapterError once the signal fires", async () => {
    const controller = new AbortController();
    controller.abort();
    const adapter = new EbayAdapter(EBAY_US, new StaticFetcher(readFixture("ebay-search.html")), silentLogger());

    await expect(drain(adapter.fetch(makeIntent(), makeContext({ signal: controller.signal })))).rejects.toMatchObject({
      kind: "aborted",
      source: "ebay",
    });
  });

  it("builds search URLs with price hints", () => {
    const fetcher = new StaticFetcher("");
    const intent = makeIntent({ searchText: "sony headphones", minPrice: 100, maxPrice: 300.5 });

    expect(new AmazonAdapter(AMAZON_US, fetcher, silentLogger()).buildSearchUrl(intent, 1)).toBe(
      "https://www.amazon.com/s?k=sony+headphones&page=1&rh=p_36%3A10000-30050"
    );
    expect(new EbayAdapter(EBAY_US, fetcher, silentLogger()).buildSearchUrl(intent, 2)).toBe(
      "https://www.ebay.com/sch/i.html?_nkw=sony+headphones&_pgn=2&_udlo=100&_udhi=301"
    );
    expect(new JdAdapter(JD_STORE, fetcher, silentLogger()).buildSearchUrl(intent, 2)).toBe(
      "https://search.jd.com/Search?keyword=sony+headphones&enc=utf-8&page=3"
    );
  });
});

describe("AdapterRegistry", () => {
  const registry = new AdapterRegistry(createDefaultAdapters(new StaticFetcher(""), silentLogger()));

  it("selects local stores for a region", () => {
    expect(registry.forRegion("gr").map((a) => a.id)).toEqual(["skroutz", "kotsovolos"]);
    expect(registry.forRegion("uk").map((a) => a.id)).toEqual(["amazon_uk", "ebay_uk"]);
  });

  it("falls back to global marketplaces for regions without a local store", () => {
    expect(registry.forRegion("au").map((a) => a.id)).toEqual(["amazon", "ebay", "bhphoto", "aliexpress"]);
  });

  it("ranks sources by declaration order", () => {
    expect(registry.priorityOf("amazon")).toBe(0);
    expect(registry.priorityOf("bestbuy")).toBeLessThan(registry.priorityOf("aliexpress"));
    expect(registry.priorityOf("unknown")).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("rejects duplicate adapter ids", () => {
    const fetcher = new StaticFetcher("");
    expect(
      () =>
        new AdapterRegistry([
          new EbayAdapter(EBAY_US, fetcher, silentLogger()),
          new EbayAdapter(EBAY_US, fetcher, silentLogger()),
        ])
    ).toThrow("Duplicate adapter id: ebay");
  });
});

describe("ScraperClient", () => {
  const options = { apiUrl: "https://api.scraperapi.com", renderJs: true, maxRetries: 2, retryBaseMs: 0 };
  const html = "<!doctype html><html><body><div>ok</div></body></html>";
  const fetchOptions = () => ({ signal: new AbortController().signal, countryCode: "us" });

  it("routes through the proxy when a key is configured", () => {
    const client = new ScraperClient({ ...options, apiKey: "test-secret" }, silentLogger());
    expect(client.buildRequestUrl("https://www.amazon.com/s?k=tv", "us")).toBe(
      "https://api.scraperapi.com/?api_key=test-secret&url=https%3A%2F%2Fwww.amazon.com%2Fs%3Fk%3Dtv&country_code=us&render=true"
    );
    expect(new ScraperClient(options, silentLogger()).buildRequestUrl("https://www.amazon.com/s?k=tv")).toBe(
      "https://www.amazon.com/s?k=tv"
    );
  });

  it("retries server errors and returns the page", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("unavailable", { status: 503 }))
      .mockResolvedValueOnce(new Response(html, { status: 200 }));
    const client = new ScraperClient(options, silentLogger(), fetchImpl);

    await expect(client.fetchHtml("amazon", "https://www.amazon.com/s?k=tv", fetchOptions())).resolves.toBe(html);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("gives up on rate limiting after the configured retries", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("slow down", { status: 429 }));
    const client = new ScraperClient(options, silentLogger(), fetchImpl);

    await expect(client.fetchHtml("amazon", "https://www.amazon.com/s?k=tv", fetchOptions())).rejects.toMatchObject({
      kind: "rate_limited",
      status: 429,
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("retries network failures", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new ScraperClient(options, silentLogger(), fetchImpl);

    const error = await client.fetchHtml("ebay", "https://www.ebay.com", fetchOptions()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AdapterError);
    expect(error).toMatchObject({ kind: "network", message: "[ebay] Network error: fetch failed" });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it.each([
    [new Response("denied", { status: 403 }), "blocked"],
    [new Response("missing", { status: 404 }), "http"],
    [new Response("<html><title>Robot Check</title></html>", { status: 200 }), "blocked"],
    [new Response('{"items":[]}', { status: 200 }), "parse"],
  ])("maps a non-retryable response to %#", async (response, kind) => {
    const fetchImpl = vi.fn<FetchLike>(async () => response);
    const client = new ScraperClient(options, silentLogger(), fetchImpl);

    await expect(client.fetchHtml("walmart", "https://www.walmart.com", fetchOptions())).rejects.toMatchObject({
      kind,
      retryable: false,
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
