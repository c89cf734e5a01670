import type { Logger } from "pino";
import type { RawListing, SourceDiagnostic, SourceStatus } from "@dealfinder/shared";
import { AdapterError, NoSourcesAvailableError } from "../errors.js";
import type { SearchIntent } from "../types/index.js";
import type { AdapterRegistry } from "./siteAdapters/registry.js";
import type { SiteAdapter } from "./siteAdapters/types.js";

export interface FanOutOptions {
  adapterTimeoutMs: number;
  budgetMs: number;
  maxListingsPerSource: number;
}

export interface FanOutResult {
  listings: RawListing[];
  diagnostics: SourceDiagnostic[];
}

interface AdapterOutcome {
  listings: RawListing[];
  diagnostic: SourceDiagnostic;
}

const SUCCESSFUL: ReadonlySet<SourceStatus> = new Set(["ok", "empty"]);

/**
 * Runs every adapter for a region concurrently.
 * Each call has its own timeout and result list; a global budget abandons whatever is still pending.
 */
export class FanOutCoordinator {
  constructor(
    private readonly registry: AdapterRegistry,
    private readonly options: FanOutOptions,
    private readonly logger: Logger
  ) {}

  async collect(intent: SearchIntent, region: string): Promise<FanOutResult> {
    const adapters = this.registry.forRegion(region);
    if (adapters.length === 0) {
      throw new NoSourcesAvailableError(region, []);
    }

    const startedAt = Date.now();
    const deadline = new AbortController();
    let budgetTimer: NodeJS.Timeout | undefined;
    const budgetElapsed = new Promise<void>((resolve) => {
      budgetTimer = setTimeout(() => {
        deadline.abort(new Error(`Fan-out budget of ${this.options.budgetMs}ms elapsed`));
        resolve();
      }, this.options.budgetMs);
    });

    let outcomes: AdapterOutcome[];
    try {
      outcomes = await Promise.all(
        adapters.map((adapter) =>
          Promise.race([
            this.runAdapter(adapter, intent, region, deadline.signal),
            budgetElapsed.then(() => this.abandoned(adapter, startedAt)),
          ])
        )
      );
    } finally {
      clearTimeout(budgetTimer);
    }

    const diagnostics = outcomes.map((outcome) => outcome.diagnostic);
    if (!diagnostics.some((d) => SUCCESSFUL.has(d.status))) {
      throw new NoSourcesAvailableError(region, diagnostics);
    }

    return {
      listings: outcomes.flatMap((outcome) => outcome.listings),
      diagnostics,
    };
  }

  private async runAdapter(
    adapter: SiteAdapter,
    intent: SearchIntent,
    region: string,
    deadline: AbortSignal
  ): Promise<AdapterOutcome> {
    const startedAt = Date.now();
    const controller = new AbortController();
    const onDeadline = () => controller.abort(deadline.reason);
    deadline.addEventListener("abort", onDeadline, { once: true });

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error("Adapter timeout"));
        reject(new AdapterError(adapter.id, "timeout", `Timed out after ${this.options.adapterTimeoutMs}ms`));
      }, this.options.adapterTimeoutMs);
    });

    const listings: RawListing[] = [];
    try {
      await Promise.race([this.drain(adapter, intent, region, controller.signal, listings), timeout]);

      const diagnostic: SourceDiagnostic = {
        source: adapter.id,
        status: listings.length > 0 ? "ok" : "empty",
        listings: listings.length,
        latencyMs: Date.now() - startedAt,
      };
      this.logger.debug(diagnostic, "Adapter completed");
      return { listings, diagnostic };
    } catch (error) {
      const adapterError = AdapterError.from(adapter.id, error);
      const status: SourceStatus = deadline.aborted ? "abandoned" : timedOut ? "timeout" : "failed";
      const diagnostic: SourceDiagnostic = {
        source: adapter.id,
        status,
        listings: 0,
        latencyMs: Date.now() - startedAt,
        errorKind: status === "failed" ? adapterError.kind : status,
        error: adapterError.message,
      };
      this.logger.warn(diagnostic, "Adapter degraded");
      return { listings: [], diagnostic };
    } finally {
      clearTimeout(timer);
      deadline.removeEventListener("abort", onDeadline);
    }
  }

  private async drain(
    adapter: SiteAdapter,
    intent: SearchIntent,
    region: string,
    signal: AbortSignal,
    into: RawListing[]
  ): Promise<void> {
    const context = { region, page: 1, signal, maxListings: this.options.maxListingsPerSource };
    for await (const listing of adapter.fetch(intent, context)) {
      into.push(listing);
      if (into.length >= this.options.maxListingsPerSource) break;
    }
  }

  private abandoned(adapter: SiteAdapter, startedAt: number): AdapterOutcome {
    return {
      listings: [],
      diagnostic: {
        source: adapter.id,
        status: "abandoned",
        listings: 0,
        latencyMs: Date.now() - startedAt,
        errorKind: "abandoned",
        error: `Still pending when the ${this.options.budgetMs}ms budget elapsed`,
      },
    };
  }
}
