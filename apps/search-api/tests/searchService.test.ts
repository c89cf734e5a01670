import { describe, expect, it } from "vitest";
import { AdapterError, SearchValidationError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { SearchService } from "../src/services/searchService.js";
import type { SiteAdapter } from "../src/services/siteAdapters/types.js";
import { fakeAdapter, makeListing, staticAdapter, testEnv } from "./helpers.js";

const sonyAmazon = makeListing({ source: "amazon", title: "Sony WH-1000XM4", price: 278, url: "https://amazon.example/sony" });
const sonyBestBuy = makeListing({
  source: "bestbuy",
  title: "Sony WH1000XM4 Headphones",
  price: 259,
  url: "https://bestbuy.example/sony",
});

const laptops = [
  makeListing({ source: "amazon", title: "Acer Aspire 5 Laptop", price: 649, originalPrice: 500, url: "https://amazon.example/acer" }),
  makeListing({ source: "amazon", title: "Dell XPS 15 Laptop", price: 1899, originalPrice: 2199, url: "https://amazon.example/dell" }),
  makeListing({ source: "bestbuy", title: "Lenovo IdeaPad 3 Laptop", price: 999, url: "https://bestbuy.example/lenovo" }),
];

function service(adapters: SiteAdapter[]) {
  return new SearchService(testEnv(), silentLogger(), { adapters });
}

function failing(id: string, regions?: readonly string[]) {
  return fakeAdapter(
    id,
    async () => {
      throw new AdapterError(id, "network", "Network error: fetch failed");
    },
    regions
  );
}

describe("SearchService.search", () => {
  const twoStores = () =>
    service([
      staticAdapter("amazon", [sonyAmazon, ...laptops.filter((l) => l.source === "amazon")]),
      staticAdapter("bestbuy", [sonyBestBuy, ...laptops.filter((l) => l.source === "bestbuy")], ["us"]),
    ]);

  it("merges the same product found in two stores", async () => {
    const response = await twoStores().search({ query: "sony headphones", region: "us" });

    expect(response.success).toBe(true);
    expect(response.error).toBeUndefined();
    expect(response.processedQuery).toBeUndefined();
    const sony = response.products.find((p) => p.brand === "Sony");
    expect(sony).toMatchObject({ sourceCount: 2, price: 259, source: "bestbuy" });
    expect(response.diagnostics?.sources.map((s) => s.status)).toEqual(["ok", "ok"]);
    expect(response.diagnostics?.interpretedBy).toBe("raw");
  });

  it("keeps offers in different currencies out of one product", async () => {
    const search = service([
      staticAdapter(
        "amazon_uk",
        [makeListing({ source: "amazon_uk", title: "Sony WH-1000XM4", price: 260, currency: "GBP", url: "https://amazon.example/uk" })],
        ["uk", "eu"]
      ),
      staticAdapter(
        "amazon_de",
        [makeListing({ source: "amazon_de", title: "Sony WH-1000XM4", price: 255, currency: "EUR", url: "https://amazon.example/de" })],
        ["de", "eu"]
      ),
    ]);

    const response = await search.search({ query: "sony", region: "eu", filters: { maxPrice: 258 } });

    expect(response.totalResults).toBe(1);
    expect(response.products).toHaveLength(1);
    expect(response.products[0]).toMatchObject({
      price: 255,
      currency: "EUR",
      sources: ["amazon_de"],
      sourceCount: 1,
      priceSpread: 0,
    });
  });

  it("applies the price ceiling read from a natural-language query", async () => {
    const response = await twoStores().search({
      query: "best laptop under $1000",
      region: "us",
      naturalLanguage: true,
    });

    expect(response.processedQuery).toBe("laptop");
    expect(response.diagnostics?.interpretedBy).toBe("rules");
    expect(response.products.map((p) => p.price).sort((a, b) => a - b)).toEqual([259, 649, 999]);
  });

  it("lets an explicit max price override the interpreted ceiling", async () => {
    const response = await twoStores().search({
      query: "best laptop under $1000",
      region: "us",
      naturalLanguage: true,
      filters: { maxPrice: 2000 },
    });
    expect(response.products.some((p) => p.price === 1899)).toBe(true);
  });

  it("sorts by ascending price across the whole filtered set", async () => {
    const response = await twoStores().search({ query: "laptop", region: "us", sortBy: "price_asc", limit: 100 });
    expect(response.products.map((p) => p.price)).toEqual([259, 649, 999, 1899]);
    expect(response.totalResults).toBe(4);
  });

  it("never reports a negative discount", async () => {
    const response = await twoStores().search({ query: "laptop", region: "us", limit: 100 });
    const acer = response.products.find((p) => p.title === "Acer Aspire 5 Laptop");
    expect(acer?.discountPercentage).toBe(0);
    for (const product of response.products) {
      if (product.discountPercentage !== undefined) {
        expect(product.discountPercentage).toBeGreaterThanOrEqual(0);
        expect(product.discountPercentage).toBeLessThanOrEqual(100);
      }
    }
  });

  it("returns an empty page beyond the last one with the same total", async () => {
    const first = await twoStores().search({ query: "laptop", region: "us" });
    const beyond = await twoStores().search({ query: "laptop", region: "us", page: 9 });
    expect(beyond.success).toBe(true);
    expect(beyond.products).toEqual([]);
    expect(beyond.totalResults).toBe(first.totalResults);
  });

  it("clamps oversized page limits", async () => {
    const response = await twoStores().search({ query: "laptop", region: "us", limit: 1000 });
    expect(response.limit).toBe(100);
  });

  it("reports total source failure as success=false", async () => {
    const response = await service([failing("amazon"), failing("ebay")]).search({ query: "laptop" });

    expect(response.success).toBe(false);
    expect(response.products).toEqual([]);
    expect(response.bestDeals).toEqual([]);
    expect(response.totalResults).toBe(0);
    expect(response.error).toBe(
      'No sources available: all 2 sources failed for region "global" [amazon: failed (network), ebay: failed (network)]'
    );
    expect(response.facets).toEqual({ brands: [], categories: [], sources: [], priceRanges: [], ratings: [] });
  });

  it("distinguishes zero matches from source failure", async () => {
    const response = await service([staticAdapter("amazon", []), failing("ebay")]).search({ query: "laptop" });

    expect(response.success).toBe(true);
    expect(response.error).toBeUndefined();
    expect(response.products).toEqual([]);
    expect(response.diagnostics?.sources.map((s) => s.status)).toEqual(["empty", "failed"]);
  });

  it.each([
    [{ query: "   " }],
    [{ query: "laptop", page: 0 }],
    [{ query: "laptop", limit: 0 }],
    [{ query: "laptop", sortBy: "popularity" }],
    [{ query: "laptop", region: "mars" }],
    [{}],
  ])("rejects invalid request %j before retrieval", async (request) => {
    let called = false;
    const adapter = fakeAdapter("amazon", async () => {
      called = true;
      return [];
    });
    await expect(service([adapter]).search(request)).rejects.toBeInstanceOf(SearchValidationError);
    expect(called).toBe(false);
  });
});

describe("SearchService listings", () => {
  const search = new SearchService(testEnv(), silentLogger());

  it("lists the supported regions", () => {
    const regions = search.listRegions();
    expect(regions).toHaveLength(15);
    expect(regions).toContainEqual({ code: "gr", name: "Greece" });
  });

  it("lists stores per region", () => {
    expect(search.listStores("gr").map((s) => s.code)).toEqual(["skroutz", "kotsovolos"]);
    expect(search.listStores()).toHaveLength(21);
    expect(search.sourceCount).toBe(21);
  });
});
