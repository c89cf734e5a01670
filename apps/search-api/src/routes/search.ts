import type { FastifyPluginAsync } from "fastify";
import { SearchValidationError } from "../errors.js";
import { StoresQuerySchema } from "../types/index.js";
import type { SearchService } from "../services/searchService.js";

const HEALTHY_STATUSES = new Set(["ok", "empty"]);

export function createSearchRoutes(searchService: SearchService): FastifyPluginAsync {
  return async (server) => {
    /**
     * POST /search
     * Cross-store product search
     */
    server.post("/search", async (request, reply) => {
      try {
        const result = await searchService.search(request.body);
        const sources = result.diagnostics?.sources ?? [];
        const failed = sources.filter((s) => !HEALTHY_STATUSES.has(s.status)).length;

        server.log.info(
          {
            query: result.query,
            region: result.region,
            success: result.success,
            totalResults: result.totalResults,
            sourcesFailed: failed,
            timings: result.diagnostics?.timings,
          },
          "Search completed"
        );

        // Add performance headers
        reply.header("X-Search-Time", (result.diagnostics?.timings.total ?? 0).toString());
        reply.header("X-Sources-Failed", failed.toString());

        return reply.send(result);
      } catch (error) {
        if (error instanceof SearchValidationError) {
          return reply.status(400).send({
            error: "invalid_request",
            issues: error.issues,
          });
        }
        server.log.error({ error }, "Search failed");
        return reply.status(500).send({
          error: "search_failed",
          message: error instanceof Error ? error.message : "Unknown error",
        });
      }
    });

    /**
     * GET /regions
     */
    server.get("/regions", async () => ({ regions: searchService.listRegions() }));

    /**
     * GET /stores?region=xx
     */
    server.get("/stores", async (request, reply) => {
      const parsed = StoresQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: "invalid_request",
          issues: parsed.error.issues,
        });
      }
      return { stores: searchService.listStores(parsed.data.region) };
    });

    /**
     * GET /health
     */
    server.get("/health", async () => ({
      status: "healthy",
      sources: searchService.sourceCount,
    }));
  };
}
