import Fastify from "fastify";
import cors from "@fastify/cors";
import type { Logger } from "pino";
import type { Env } from "./types/index.js";
import { createLogger } from "./logger.js";
import { SearchService, type SearchServiceOverrides } from "./services/searchService.js";
import { createSearchRoutes } from "./routes/search.js";
import { createRateLimitMiddleware } from "./middleware/rateLimit.js";

export interface ServerDeps extends SearchServiceOverrides {
  logger?: Logger;
  searchService?: SearchService;
}

/**
 * Build and configure the Fastify server
 */
export async function buildServer(env: Env, deps: ServerDeps = {}) {
  const logger = deps.logger ?? createLogger(env);
  const server = Fastify({ loggerInstance: logger });

  server.log.info({ corsOrigin: env.CORS_ORIGIN }, "CORS_ORIGIN configured");

  const searchService =
    deps.searchService ?? new SearchService(env, logger, { adapters: deps.adapters, fetchImpl: deps.fetchImpl });
  server.log.info({ sources: searchService.sourceCount }, "Search service initialized");

  // Enable CORS
  await server.register(cors, {
    origin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(",").map((o) => o.trim()) : true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    exposedHeaders: ["X-Search-Time", "X-Sources-Failed", "X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset"],
  });

  server.addHook("onRequest", createRateLimitMiddleware({ maxRequests: env.RATE_LIMIT_PER_MINUTE }));

  // Register routes
  await server.register(createSearchRoutes(searchService));

  return server;
}
