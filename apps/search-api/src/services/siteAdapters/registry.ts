import type { Logger } from "pino";
import type { StoreInfo } from "@dealfinder/shared";
import { GLOBAL_REGION } from "./regions.js";
import type { HtmlFetcher, SiteAdapter } from "./types.js";
import { ALIEXPRESS_STORE, AliExpressAdapter } from "./stores/aliexpress.js";
import { AMAZON_STORES, AmazonAdapter } from "./stores/amazon.js";
import { BESTBUY_STORE, BestBuyAdapter } from "./stores/bestbuy.js";
import { BHPHOTO_STORE, BhPhotoAdapter } from "./stores/bhPhoto.js";
import { COSTCO_STORE, CostcoAdapter } from "./stores/costco.js";
import { EBAY_STORES, EbayAdapter } from "./stores/ebay.js";
import { HOMEDEPOT_STORE, HomeDepotAdapter } from "./stores/homeDepot.js";
import { JD_STORE, JdAdapter } from "./stores/jd.js";
import { KOTSOVOLOS_STORE, KotsovolosAdapter } from "./stores/kotsovolos.js";
import { NEWEGG_STORE, NeweggAdapter } from "./stores/newegg.js";
import { OTTO_STORE, OttoAdapter } from "./stores/otto.js";
import { RAKUTEN_STORE, RakutenAdapter } from "./stores/rakuten.js";
import { SKROUTZ_STORE, SkroutzAdapter } from "./stores/skroutz.js";
import { TARGET_STORE, TargetAdapter } from "./stores/target.js";
import { WALMART_STORE, WalmartAdapter } from "./stores/walmart.js";

/**
 * All built-in stores, in source priority order (earlier wins price ties).
 */
export function createDefaultAdapters(fetcher: HtmlFetcher, logger: Logger): SiteAdapter[] {
  return [
    ...AMAZON_STORES.map((store) => new AmazonAdapter(store, fetcher, logger)),
    ...EBAY_STORES.map((store) => new EbayAdapter(store, fetcher, logger)),
    new WalmartAdapter(WALMART_STORE, fetcher, logger),
    new BestBuyAdapter(BESTBUY_STORE, fetcher, logger),
    new TargetAdapter(TARGET_STORE, fetcher, logger),
    new NeweggAdapter(NEWEGG_STORE, fetcher, logger),
    new BhPhotoAdapter(BHPHOTO_STORE, fetcher, logger),
    new CostcoAdapter(COSTCO_STORE, fetcher, logger),
    new HomeDepotAdapter(HOMEDEPOT_STORE, fetcher, logger),
    new AliExpressAdapter(ALIEXPRESS_STORE, fetcher, logger),
    new RakutenAdapter(RAKUTEN_STORE, fetcher, logger),
    new OttoAdapter(OTTO_STORE, fetcher, logger),
    new JdAdapter(JD_STORE, fetcher, logger),
    new SkroutzAdapter(SKROUTZ_STORE, fetcher, logger),
    new KotsovolosAdapter(KOTSOVOLOS_STORE, fetcher, logger),
  ];
}

export class AdapterRegistry {
  private readonly byId = new Map<string, SiteAdapter>();
  private readonly priority = new Map<string, number>();

  constructor(private readonly adapters: readonly SiteAdapter[]) {
    adapters.forEach((adapter, index) => {
      if (this.byId.has(adapter.id)) {
        throw new Error(`Duplicate adapter id: ${adapter.id}`);
      }
      this.byId.set(adapter.id, adapter);
      this.priority.set(adapter.id, index);
    });
  }

  get size(): number {
    return this.adapters.length;
  }

  get(id: string): SiteAdapter | undefined {
    return this.byId.get(id);
  }

  /**
   * Adapters serving a region. Regions without a local store fall back to the global marketplaces.
   */
  forRegion(region: string): SiteAdapter[] {
    const local = this.adapters.filter((adapter) => adapter.regions.includes(region));
    if (local.length > 0 || region === GLOBAL_REGION) return local;
    return this.adapters.filter((adapter) => adapter.regions.includes(GLOBAL_REGION));
  }

  /** Lower is preferred; unknown sources sort last. */
  priorityOf(source: string): number {
    return this.priority.get(source) ?? Number.MAX_SAFE_INTEGER;
  }

  listStores(region?: string): StoreInfo[] {
    const adapters = region ? this.forRegion(region) : this.adapters;
    return adapters.map((adapter) => ({
      code: adapter.id,
      name: adapter.name,
      homeUrl: adapter.homeUrl,
      regions: [...adapter.regions],
    }));
  }
}
