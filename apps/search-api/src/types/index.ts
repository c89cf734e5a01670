import { z } from "zod";
import type { SortKey } from "@dealfinder/shared";
import { isKnownRegion } from "../services/siteAdapters/regions.js";

// ============================================================================
// Request Schemas
// ============================================================================

export const SORT_KEYS = ["relevance", "price_asc", "price_desc", "rating", "discount"] as const satisfies readonly SortKey[];

const PriceSchema = z.number().finite().min(0);

export const SearchFiltersSchema = z.object({
  brands: z.array(z.string().trim().min(1)).max(50).optional(),
  categories: z.array(z.string().trim().min(1)).max(50).optional(),
  priceRange: z
    .object({
      min: PriceSchema.optional(),
      max: PriceSchema.optional(),
    })
    .optional(),
  minPrice: PriceSchema.optional(),
  maxPrice: PriceSchema.optional(),
  minRating: z.number().min(0).max(5).optional(),
  sources: z.array(z.string().trim().min(1)).max(50).optional(),
  freeShipping: z.boolean().optional(),
  minDealScore: z.number().min(0).max(100).optional(),
});

export type SearchFilters = z.infer<typeof SearchFiltersSchema>;

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty").max(500),
  region: z
    .string()
    .trim()
    .toLowerCase()
    .default("global")
    .refine(isKnownRegion, { message: "unknown region" }),
  filters: SearchFiltersSchema.default({}),
  sortBy: z.enum(SORT_KEYS).default("relevance"),
  page: z.number().int().min(1).default(1),
  // Upper bound is clamped by the assembler, not rejected.
  limit: z.number().int().min(1).default(20),
  advancedMatching: z.boolean().default(true),
  useOpenai: z.boolean().default(false),
  naturalLanguage: z.boolean().default(false),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
export type SearchRequestInput = z.input<typeof SearchRequestSchema>;

export const StoresQuerySchema = z.object({
  region: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isKnownRegion, { message: "unknown region" })
    .optional(),
});

// ============================================================================
// Search Intent (from rule parsing / LLM interpretation)
// ============================================================================

export type InterpretedBy = "raw" | "rules" | "llm";

export interface SearchIntent {
  rawQuery: string;
  /** Lowercased terms used for relevance scoring. */
  terms: string[];
  /** Query string sent to the stores. */
  searchText: string;
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
  brand?: string;
  hints: string[];
  interpretedBy: InterpretedBy;
}

// ============================================================================
// Environment Configuration
// ============================================================================

const envFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4100),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CORS_ORIGIN: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),

  SCRAPER_API_KEY: z.string().optional(),
  SCRAPER_API_URL: z.string().url().default("https://api.scraperapi.com"),
  SCRAPER_RENDER_JS: envFlag(true),
  ADAPTER_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ADAPTER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  ADAPTER_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1000),
  MAX_LISTINGS_PER_SOURCE: z.coerce.number().int().positive().default(20),
  FANOUT_BUDGET_MS: z.coerce.number().int().positive().default(30_000),

  OPENAI_BASE_URL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  INTERPRETER_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),

  EMBEDDING_BASE_URL: z.string().optional(),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  MATCH_EMBEDDING_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  MATCH_FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  MATCH_TRANSITIVE: envFlag(true),
  BEST_DEALS_COUNT: z.coerce.number().int().min(0).default(5),
  MAX_PAGE_LIMIT: z.coerce.number().int().positive().default(100),
});

export type Env = z.infer<typeof EnvSchema>;
