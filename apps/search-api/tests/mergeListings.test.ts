import { describe, expect, it } from "vitest";
import {
  aggregateRating,
  discountPercentage,
  formatBrand,
  mergeGroup,
  productId,
} from "../src/services/matching/mergeListings.js";
import { describeListing } from "../src/services/matching/titleNormalizer.js";
import { makeListing } from "./helpers.js";

const priorityOf = (source: string) => ["amazon", "ebay", "walmart"].indexOf(source);

describe("mergeListings helpers", () => {
  it("weights ratings by review count", () => {
    expect(
      aggregateRating([makeListing({ rating: 4, reviewCount: 100 }), makeListing({ rating: 5, reviewCount: 300 })])
    ).toBe(4.75);
    expect(aggregateRating([makeListing({ rating: 4 }), makeListing({ rating: 4.5 })])).toBe(4.25);
    expect(aggregateRating([makeListing({ rating: 3 }), makeListing({ rating: 5, reviewCount: 10 })])).toBe(5);
    expect(aggregateRating([makeListing()])).toBeUndefined();
  });

  it("keeps discounts within 0..100", () => {
    expect(discountPercentage(75, 100)).toBe(25);
    expect(discountPercentage(33, 99)).toBe(66.7);
    expect(discountPercentage(120, 100)).toBe(0);
    expect(discountPercentage(50, undefined)).toBeUndefined();
    expect(discountPercentage(50, 0)).toBeUndefined();
  });

  it("formats detected brands", () => {
    expect(formatBrand("lg")).toBe("LG");
    expect(formatBrand("western digital")).toBe("Western Digital");
  });

  it("derives a stable short id", () => {
    expect(productId("sony wh1000xm4", "amazon")).toMatch(/^[0-9a-f]{16}$/);
    expect(productId("sony wh1000xm4", "amazon")).toBe(productId("sony wh1000xm4", "amazon"));
    expect(productId("sony wh1000xm4", "amazon")).not.toBe(productId("sony wh1000xm4", "ebay"));
  });
});

describe("mergeGroup", () => {
  it("selects the cheapest offer and aggregates the rest", () => {
    const members = [
      makeListing({
        source: "walmart",
        price: 249,
        rating: 4.4,
        reviewCount: 100,
        url: "https://walmart.example/1",
        category: "Headphones",
      }),
      makeListing({
        source: "amazon",
        price: 249,
        originalPrice: 349.99,
        rating: 4.6,
        reviewCount: 300,
        url: "https://amazon.example/1",
        imageUrl: "https://images.example/1.jpg",
        freeShipping: true,
      }),
      makeListing({ source: "ebay", price: 299, url: "https://ebay.example/1", brand: "Sony" }),
    ].map((listing, index) => describeListing(listing, index));

    const product = mergeGroup(members, priorityOf);

    expect(product).toMatchObject({
      source: "amazon",
      price: 249,
      originalPrice: 349.99,
      discountPercentage: 28.9,
      url: "https://amazon.example/1",
      sources: ["amazon", "ebay", "walmart"],
      sourceCount: 3,
      similarListings: 2,
      priceSpread: 50,
      rating: 4.55,
      reviewCount: 400,
      brand: "Sony",
      category: "Headphones",
      imageUrl: "https://images.example/1.jpg",
      freeShipping: true,
      id: productId("sony wh1000xm4", "amazon"),
    });
    expect(product.listings.map((l) => l.source)).toEqual(["amazon", "walmart", "ebay"]);
  });

  it("counts distinct sources, not listings", () => {
    const members = [
      makeListing({ source: "ebay", price: 10, url: "https://ebay.example/1" }),
      makeListing({ source: "ebay", price: 12, url: "https://ebay.example/2" }),
    ].map((listing, index) => describeListing(listing, index));

    const product = mergeGroup(members, priorityOf);
    expect(product.sourceCount).toBe(1);
    expect(product.similarListings).toBe(1);
  });
});
