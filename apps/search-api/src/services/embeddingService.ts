import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import type { Env } from "../types/index.js";
import type { FetchLike } from "./siteAdapters/types.js";

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().min(0).optional(),
      embedding: z.array(z.number()),
    })
  ),
});

export interface EmbeddingConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimensions?: number;
  timeoutMs: number;
}

export function embeddingConfigFromEnv(env: Env): EmbeddingConfig | undefined {
  const apiKey = env.EMBEDDING_API_KEY || env.OPENAI_API_KEY || env.LLM_API_KEY || "";
  if (!apiKey) return undefined;
  let baseUrl = env.EMBEDDING_BASE_URL || env.OPENAI_BASE_URL || "https://api.openai.com/v1";
  if (baseUrl.endsWith("/")) baseUrl = baseUrl.slice(0, -1);
  return {
    apiKey,
    baseUrl,
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
    timeoutMs: env.EMBEDDING_TIMEOUT_MS,
  };
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | undefined {
  if (a.length === 0 || a.length !== b.length) return undefined;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return undefined;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * OpenAI-compatible embeddings for product titles.
 */
export class EmbeddingService {
  private readonly maxRetryAttempts = 3;
  private readonly baseRetryDelayMs = 500;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: EmbeddingConfig,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async generateBatchEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.withRetryOnQuota(() => this.requestEmbeddings(texts));
  }

  private async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      input: texts,
    };
    if (this.config.dimensions && this.config.model.startsWith("text-embedding-3")) {
      body.dimensions = this.config.dimensions;
    }

    const response = await this.fetchImpl(`${this.config.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      throw new Error(`Embedding API error (${response.status}): ${errorText}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Embedding API returned an unexpected payload");
    }
    if (parsed.data.data.length !== texts.length) {
      throw new Error(`Embedding API returned ${parsed.data.data.length} vectors for ${texts.length} inputs`);
    }

    return [...parsed.data.data]
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map((item) => item.embedding);
  }

  private async withRetryOnQuota<T>(fn: () => Promise<T>): Promise<T> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt < this.maxRetryAttempts) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        const canRetry = this.isRateLimitOrQuotaError(error);
        if (!canRetry || attempt === this.maxRetryAttempts - 1) break;
        await delay(this.baseRetryDelayMs * 2 ** attempt);
        attempt += 1;
      }
    }

    throw lastError instanceof Error ? lastError : new Error("Embedding request failed");
  }

  private isRateLimitOrQuotaError(error: unknown): boolean {
    const message = error instanceof Error ? error.message : String(error || "");
    return message.includes("(429)") || message.includes("quota") || message.includes("rate limit");
  }
}
