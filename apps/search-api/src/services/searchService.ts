import type { Logger } from "pino";
import type { RegionInfo, SearchDiagnostics, SearchResponse, StoreInfo } from "@dealfinder/shared";
import { NoSourcesAvailableError, SearchValidationError } from "../errors.js";
import { SearchRequestSchema, type Env, type SearchIntent, type SearchRequest } from "../types/index.js";
import { EmbeddingService, embeddingConfigFromEnv } from "./embeddingService.js";
import { emptyFacets } from "./facets.js";
import { FanOutCoordinator, type FanOutResult } from "./fanOutCoordinator.js";
import { createLlmClient, llmConfigFromEnv } from "./llmClient.js";
import { ProductMatcher } from "./matching/productMatcher.js";
import { QueryInterpreter } from "./queryInterpreter.js";
import { QueryParser } from "./queryParser.js";
import { Ranker } from "./ranker.js";
import { ResultAssembler } from "./resultAssembler.js";
import { AdapterRegistry, createDefaultAdapters } from "./siteAdapters/registry.js";
import { REGIONS } from "./siteAdapters/regions.js";
import { ScraperClient, scraperOptionsFromEnv } from "./siteAdapters/scraperClient.js";
import type { FetchLike, SiteAdapter } from "./siteAdapters/types.js";

export interface SearchServiceOverrides {
  /** Replaces the built-in store adapters. */
  adapters?: SiteAdapter[];
  /** Used for store pages, LLM and embedding calls. */
  fetchImpl?: FetchLike;
}

const toSeconds = (ms: number) => Math.round(ms / 10) / 100;

/**
 * Main search orchestrator
 * Coordinates interpretation, fan-out retrieval, matching, ranking and assembly
 */
export class SearchService {
  private readonly registry: AdapterRegistry;
  private readonly interpreter: QueryInterpreter;
  private readonly coordinator: FanOutCoordinator;
  private readonly matcher: ProductMatcher;
  private readonly ranker: Ranker;
  private readonly assembler: ResultAssembler;
  private readonly logger: Logger;

  constructor(env: Env, logger: Logger, overrides: SearchServiceOverrides = {}) {
    this.logger = logger.child({ component: "search" });

    const adapters =
      overrides.adapters ??
      createDefaultAdapters(new ScraperClient(scraperOptionsFromEnv(env), logger, overrides.fetchImpl), logger);
    this.registry = new AdapterRegistry(adapters);

    const llmConfig = llmConfigFromEnv(env);
    this.interpreter = new QueryInterpreter(
      new QueryParser(),
      llmConfig ? createLlmClient(llmConfig, overrides.fetchImpl) : undefined,
      env.INTERPRETER_TIMEOUT_MS,
      logger.child({ component: "interpreter" })
    );

    this.coordinator = new FanOutCoordinator(
      this.registry,
      {
        adapterTimeoutMs: env.ADAPTER_TIMEOUT_MS,
        budgetMs: env.FANOUT_BUDGET_MS,
        maxListingsPerSource: env.MAX_LISTINGS_PER_SOURCE,
      },
      logger.child({ component: "fanout" })
    );

    const embeddingConfig = embeddingConfigFromEnv(env);
    this.matcher = new ProductMatcher(
      {
        embeddingThreshold: env.MATCH_EMBEDDING_THRESHOLD,
        fuzzyThreshold: env.MATCH_FUZZY_THRESHOLD,
        transitive: env.MATCH_TRANSITIVE,
      },
      (source) => this.registry.priorityOf(source),
      embeddingConfig ? new EmbeddingService(embeddingConfig, overrides.fetchImpl) : undefined,
      logger.child({ component: "matcher" })
    );

    this.ranker = new Ranker();
    this.assembler = new ResultAssembler(this.ranker, {
      bestDealsCount: env.BEST_DEALS_COUNT,
      maxPageLimit: env.MAX_PAGE_LIMIT,
    });
  }

  get sourceCount(): number {
    return this.registry.size;
  }

  listRegions(): RegionInfo[] {
    return REGIONS.map((region) => ({ ...region }));
  }

  listStores(region?: string): StoreInfo[] {
    return this.registry.listStores(region);
  }

  /**
   * Validate a raw request body or object.
   */
  parseRequest(input: unknown): SearchRequest {
    const parsed = SearchRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new SearchValidationError(
        parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
      );
    }
    return parsed.data;
  }

  /**
   * Perform a cross-store search. Throws only SearchValidationError;
   * total source failure is reported as `success: false`.
   */
  async search(input: unknown): Promise<SearchResponse> {
    const request = this.parseRequest(input);
    const timings = { interpretation: 0, retrieval: 0, matching: 0, ranking: 0, total: 0 };
    const startTotal = Date.now();

    // 1. Interpret query
    const startInterpretation = Date.now();
    const intent = await this.interpreter.interpret(request.query, {
      naturalLanguage: request.naturalLanguage,
      useOpenai: request.useOpenai,
    });
    timings.interpretation = Date.now() - startInterpretation;
    const processedQuery = this.processedQuery(request.query, intent);

    // 2. Fan out to stores
    const startRetrieval = Date.now();
    let collected: FanOutResult;
    try {
      collected = await this.coordinator.collect(intent, request.region);
    } catch (error) {
      if (!(error instanceof NoSourcesAvailableError)) throw error;
      timings.retrieval = Date.now() - startRetrieval;
      timings.total = Date.now() - startTotal;
      this.logger.warn({ query: request.query, region: request.region, error: error.message }, "No sources available");
      return {
        success: false,
        error: error.message,
        query: request.query,
        processedQuery,
        region: request.region,
        products: [],
        bestDeals: [],
        totalResults: 0,
        page: request.page,
        limit: Math.min(request.limit, this.assembler.maxPageLimit),
        facets: emptyFacets(),
        executionTime: toSeconds(timings.total),
        diagnostics: {
          interpretedBy: intent.interpretedBy,
          sources: error.diagnostics,
          excludedProducts: 0,
          matching: { listings: 0, groups: 0, embeddingComparisons: 0, fuzzyComparisons: 0, exactComparisons: 0 },
          timings,
        },
      };
    }
    timings.retrieval = Date.now() - startRetrieval;

    // 3. Match listings across stores
    const startMatching = Date.now();
    const matched = await this.matcher.match(collected.listings, {
      advanced: request.advancedMatching,
      useEmbeddings: request.useOpenai,
    });
    timings.matching = Date.now() - startMatching;

    // 4. Rank, filter, facet, paginate
    const startRanking = Date.now();
    const ranked = this.ranker.score(matched.products, intent);
    if (ranked.excluded > 0) {
      this.logger.warn({ excluded: ranked.excluded }, "Products without a usable price excluded from ranking");
    }
    const assembled = this.assembler.assemble({
      products: ranked.products,
      intent,
      filters: request.filters,
      sortBy: request.sortBy,
      page: request.page,
      limit: request.limit,
    });
    timings.ranking = Date.now() - startRanking;
    timings.total = Date.now() - startTotal;

    const diagnostics: SearchDiagnostics = {
      interpretedBy: intent.interpretedBy,
      sources: collected.diagnostics,
      excludedProducts: ranked.excluded,
      matching: matched.stats,
      timings,
    };

    return {
      success: true,
      query: request.query,
      processedQuery,
      region: request.region,
      ...assembled,
      executionTime: toSeconds(timings.total),
      diagnostics,
    };
  }

  private processedQuery(query: string, intent: SearchIntent): string | undefined {
    const processed = intent.terms.join(" ");
    if (!processed || processed === query.trim().toLowerCase()) return undefined;
    return processed;
  }
}
