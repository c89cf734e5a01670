import { describe, expect, it } from "vitest";
import { AdapterError, NoSourcesAvailableError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { FanOutCoordinator, type FanOutOptions } from "../src/services/fanOutCoordinator.js";
import { AdapterRegistry } from "../src/services/siteAdapters/registry.js";
import type { SiteAdapter } from "../src/services/siteAdapters/types.js";
import { fakeAdapter, makeIntent, makeListing, sleep, staticAdapter, untilAborted } from "./helpers.js";

const DEFAULTS: FanOutOptions = { adapterTimeoutMs: 1000, budgetMs: 2000, maxListingsPerSource: 20 };

function coordinator(adapters: SiteAdapter[], options: Partial<FanOutOptions> = {}) {
  return new FanOutCoordinator(new AdapterRegistry(adapters), { ...DEFAULTS, ...options }, silentLogger());
}

describe("FanOutCoordinator", () => {
  it("collects listings and records one diagnostic per source", async () => {
    const result = await coordinator([
      staticAdapter("alpha", [makeListing({ source: "alpha" }), makeListing({ source: "alpha", url: "https://alpha.example/2" })]),
      staticAdapter("beta", []),
      fakeAdapter("gamma", async () => {
        throw new AdapterError("gamma", "http", "Store responded with 500", 500);
      }),
    ]).collect(makeIntent(), "us");

    expect(result.listings).toHaveLength(2);
    expect(result.diagnostics.map((d) => [d.source, d.status, d.listings])).toEqual([
      ["alpha", "ok", 2],
      ["beta", "empty", 0],
      ["gamma", "failed", 0],
    ]);
    expect(result.diagnostics[2]).toMatchObject({ errorKind: "http", error: "[gamma] Store responded with 500" });
  });

  it("wraps unexpected adapter errors as parse failures", async () => {
    const result = await coordinator([
      staticAdapter("alpha", [makeListing({ source: "alpha" })]),
      fakeAdapter("beta", async () => {
        throw new Error("selector exploded");
      }),
    ]).collect(makeIntent(), "us");

    expect(result.diagnostics[1]).toMatchObject({ status: "failed", errorKind: "parse", error: "[beta] selector exploded" });
  });

  it("times out a slow adapter without holding back the others", async () => {
    const result = await coordinator(
      [staticAdapter("alpha", [makeListing({ source: "alpha" })]), fakeAdapter("slow", (ctx) => untilAborted(ctx.signal))],
      { adapterTimeoutMs: 20 }
    ).collect(makeIntent(), "us");

    expect(result.listings).toHaveLength(1);
    expect(result.diagnostics[1]).toMatchObject({ source: "slow", status: "timeout", errorKind: "timeout" });
  });

  it("abandons adapters still running at the global deadline and discards late listings", async () => {
    const late = fakeAdapter("late", async () => {
      await sleep(100);
      return [makeListing({ source: "late" })];
    });
    const result = await coordinator([staticAdapter("alpha", [makeListing({ source: "alpha" })]), late], {
      budgetMs: 20,
    }).collect(makeIntent(), "us");

    expect(result.listings.map((l) => l.source)).toEqual(["alpha"]);
    expect(result.diagnostics[1]).toMatchObject({ source: "late", status: "abandoned", listings: 0 });
  });

  it("caps listings per source", async () => {
    const many = Array.from({ length: 5 }, (_, i) => makeListing({ source: "alpha", url: `https://alpha.example/${i}` }));
    const result = await coordinator([staticAdapter("alpha", many)], { maxListingsPerSource: 3 }).collect(
      makeIntent(),
      "us"
    );
    expect(result.listings).toHaveLength(3);
    expect(result.diagnostics[0]?.listings).toBe(3);
  });

  it("throws NoSourcesAvailableError when every adapter fails", async () => {
    const failing = (id: string) =>
      fakeAdapter(id, async () => {
        throw new AdapterError(id, "blocked", "Request blocked (403)", 403);
      });

    const error = await coordinator([failing("alpha"), failing("beta")])
      .collect(makeIntent(), "us")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoSourcesAvailableError);
    expect(error).toMatchObject({
      message: 'No sources available: all 2 sources failed for region "us" [alpha: failed (blocked), beta: failed (blocked)]',
    });
  });

  it("throws NoSourcesAvailableError when no adapter serves the region", async () => {
    await expect(
      coordinator([staticAdapter("alpha", [], ["gr"])]).collect(makeIntent(), "us")
    ).rejects.toThrow('No sources available for region "us"');
  });

  it("treats an all-empty fan-out as a success", async () => {
    const result = await coordinator([staticAdapter("alpha", []), staticAdapter("beta", [])]).collect(makeIntent(), "us");
    expect(result.listings).toEqual([]);
    expect(result.diagnostics.map((d) => d.status)).toEqual(["empty", "empty"]);
  });
});
