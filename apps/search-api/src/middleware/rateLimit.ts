import type { FastifyReply, FastifyRequest } from "fastify";

/**
 * Simple in-memory rate limiter
 * Limits requests per client IP per time window
 */

export interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const RATE_LIMIT_WINDOW_MS = 60 * 1000; // 1 minute

export interface RateLimitOptions {
  maxRequests: number;
  windowMs?: number;
  now?: () => number;
  store?: Map<string, RateLimitEntry>;
}

export function createRateLimitMiddleware(options: RateLimitOptions) {
  const store = options.store ?? new Map<string, RateLimitEntry>();
  const windowMs = options.windowMs ?? RATE_LIMIT_WINDOW_MS;
  const now = options.now ?? Date.now;
  let nextSweepAt = 0;

  return async function rateLimitMiddleware(request: FastifyRequest, reply: FastifyReply) {
    const pathname = getPathname(request);

    // Skip rate limiting for health check
    if (request.method === "OPTIONS" || pathname.endsWith("/health")) {
      return;
    }

    const ip = request.ip || String(request.headers["x-forwarded-for"] || request.headers["x-real-ip"] || "unknown");
    const at = now();
    if (at >= nextSweepAt) {
      pruneExpired(store, at);
      nextSweepAt = at + windowMs;
    }
    const entry = consumeRateLimit(store, ip, at, windowMs);

    reply.header("X-RateLimit-Limit", options.maxRequests.toString());
    reply.header("X-RateLimit-Remaining", Math.max(0, options.maxRequests - entry.count).toString());
    reply.header("X-RateLimit-Reset", new Date(entry.resetAt).toISOString());

    if (entry.count > options.maxRequests) {
      return reply.status(429).send({
        error: "rate_limit_exceeded",
        message: `Rate limit exceeded. Max ${options.maxRequests} requests per minute.`,
        retryAfter: Math.ceil((entry.resetAt - at) / 1000),
      });
    }
  };
}

function getPathname(request: FastifyRequest): string {
  const raw = String(request.raw.url || request.url || "").trim();
  if (!raw) return "/";
  return raw.split("?")[0] || "/";
}

// Drops clients whose window has closed; at most one sweep per window.
function pruneExpired(store: Map<string, RateLimitEntry>, now: number) {
  for (const [key, entry] of store) {
    if (now > entry.resetAt) store.delete(key);
  }
}

function consumeRateLimit(
  store: Map<string, RateLimitEntry>,
  key: string,
  now: number,
  windowMs: number
): RateLimitEntry {
  const entry = store.get(key);
  if (!entry || now > entry.resetAt) {
    const next: RateLimitEntry = {
      count: 1,
      resetAt: now + windowMs,
    };
    store.set(key, next);
    return next;
  }

  entry.count += 1;
  return entry;
}
