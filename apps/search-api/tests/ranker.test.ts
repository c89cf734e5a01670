import { describe, expect, it } from "vitest";
import type { MergedProduct } from "@dealfinder/shared";
import { computeFacets } from "../src/services/facets.js";
import { Ranker } from "../src/services/ranker.js";
import type { SearchIntent } from "../src/types/index.js";
import { makeIntent, makeProduct } from "./helpers.js";

describe("Ranker scoring", () => {
  const ranker = new Ranker();

  it("combines discount, rating and damped review volume into the deal score", () => {
    expect(ranker.dealScore(makeProduct({ discountPercentage: 20, rating: 4.5, reviewCount: 999 }))).toBe(59);
    expect(ranker.dealScore(makeProduct({ discountPercentage: 80, rating: 5, reviewCount: 99_999 }))).toBe(100);
    expect(ranker.dealScore(makeProduct())).toBe(0);
  });

  it("rewards term overlap, completeness and multi-store confirmation", () => {
    const complete = makeProduct({
      normalizedTitle: "sony wh1000xm4 headphones",
      originalPrice: 349.99,
      rating: 4.6,
      reviewCount: 10,
      imageUrl: "https://images.example/sony.jpg",
      brand: "Sony",
      category: "Headphones",
      availability: "in_stock",
      shippingCost: 0,
      sourceCount: 2,
    });
    expect(ranker.relevanceScore(complete, ["sony", "headphone"])).toBe(90);
    expect(ranker.relevanceScore(makeProduct({ normalizedTitle: "gaming mouse" }), ["laptop"])).toBe(0);
    expect(ranker.relevanceScore(makeProduct({ normalizedTitle: "gaming mouse" }), [])).toBe(60);
  });

  it("excludes products without a usable price and counts them", () => {
    const { products, excluded } = ranker.score(
      [makeProduct({ id: "ok" }), makeProduct({ id: "zero", price: 0 }), makeProduct({ id: "nan", price: Number.NaN })],
      makeIntent({ terms: ["sony"] })
    );
    expect(products.map((p) => p.id)).toEqual(["ok"]);
    expect(excluded).toBe(2);
    expect(products[0]?.relevanceScore).toBe(60);
  });
});

describe("Ranker intent signals", () => {
  const ranker = new Ranker();
  const relevance = (products: MergedProduct[], intent: SearchIntent) =>
    Object.fromEntries(ranker.score(products, intent).products.map((p) => [p.id, p.relevanceScore]));

  it("boosts products of the brand named in the query", () => {
    const scores = relevance(
      [
        makeProduct({ id: "listed", brand: "Sony", normalizedTitle: "wh1000xm4" }),
        makeProduct({ id: "titled", normalizedTitle: "sony wh1000xm4" }),
        makeProduct({ id: "other", brand: "Bose", normalizedTitle: "bose qc45" }),
      ],
      makeIntent({ terms: ["headphones"], brand: "sony" })
    );
    expect(scores).toEqual({ listed: 18.1, titled: 15, other: 3.1 });
  });

  it("favours cheaper products for budget queries and dearer ones for premium queries", () => {
    const products = [makeProduct({ id: "cheap", price: 100 }), makeProduct({ id: "pricey", price: 200 })];
    expect(relevance(products, makeIntent({ terms: [], hints: ["budget"] }))).toEqual({ cheap: 70, pricey: 65 });
    expect(relevance(products, makeIntent({ terms: [], hints: ["premium"] }))).toEqual({ cheap: 65, pricey: 70 });
  });

  it("rewards deal score for deal queries and rating for best queries", () => {
    const deals = [makeProduct({ id: "discounted", discountPercentage: 20 }), makeProduct({ id: "full" })];
    expect(relevance(deals, makeIntent({ terms: [], hints: ["deal"] }))).toEqual({ discounted: 62, full: 60 });

    const rated = [makeProduct({ id: "rated", rating: 4 }), makeProduct({ id: "unrated" })];
    expect(relevance(rated, makeIntent({ terms: [], hints: ["best"] }))).toEqual({ rated: 71.1, unrated: 60 });
  });
});

describe("Ranker sorting", () => {
  const ranker = new Ranker();
  const products = [
    makeProduct({ id: "a", price: 30, relevanceScore: 50, dealScore: 10, rating: 4.5, reviewCount: 10 }),
    makeProduct({ id: "b", price: 10, relevanceScore: 80, dealScore: 40 }),
    makeProduct({ id: "c", price: 20, relevanceScore: 80, dealScore: 60, rating: 4.5, reviewCount: 200, discountPercentage: 15 }),
    makeProduct({ id: "d", price: 20, relevanceScore: 40, dealScore: 5, rating: 3.9, discountPercentage: 40 }),
  ];
  const ids = (sortBy: Parameters<Ranker["sort"]>[1]) => ranker.sort(products, sortBy).map((p) => p.id);

  it("sorts by relevance, breaking ties by deal score", () => {
    expect(ids("relevance")).toEqual(["c", "b", "a", "d"]);
  });

  it("sorts by price in both directions", () => {
    expect(ids("price_asc")).toEqual(["b", "c", "d", "a"]);
    expect(ids("price_desc")).toEqual(["a", "c", "d", "b"]);
  });

  it("sorts by rating with review count as tie-break and unrated last", () => {
    expect(ids("rating")).toEqual(["c", "a", "d", "b"]);
  });

  it("sorts by discount with undiscounted products last", () => {
    expect(ids("discount")).toEqual(["d", "c", "b", "a"]);
  });
});

describe("computeFacets", () => {
  it("counts brands, sources, price ranges and rating buckets", () => {
    const facets = computeFacets([
      makeProduct({ brand: "Sony", price: 25, rating: 4.7, source: "amazon" }),
      makeProduct({ brand: "Sony", price: 50, rating: 4.2, source: "ebay" }),
      makeProduct({ brand: "Apple", price: 1200, source: "amazon", category: "Laptops" }),
    ]);

    expect(facets).toEqual({
      brands: [
        { name: "Sony", count: 2 },
        { name: "Apple", count: 1 },
      ],
      categories: [{ name: "Laptops", count: 1 }],
      sources: [
        { name: "amazon", count: 2 },
        { name: "ebay", count: 1 },
      ],
      priceRanges: [
        { range: "0-50", count: 1 },
        { range: "50-100", count: 1 },
        { range: "1000+", count: 1 },
      ],
      ratings: [
        { label: "4.5+", count: 1 },
        { label: "4-4.5", count: 1 },
        { label: "unrated", count: 1 },
      ],
    });
  });
});
