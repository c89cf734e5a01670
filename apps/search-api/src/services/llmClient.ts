import { InterpretationError } from "../errors.js";
import type { Env } from "../types/index.js";
import type { FetchLike } from "./siteAdapters/types.js";

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

export type LlmClient = {
  chatJson: (args: { messages: ChatMessage[]; temperature?: number; timeoutMs: number }) => Promise<unknown>;
};

export interface LlmConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

function buildUrl(baseUrl: string, path: string) {
  return `${baseUrl.replace(/\/+$/, "")}${path}`;
}

export function llmConfigFromEnv(env: Env): LlmConfig | undefined {
  const apiKey = env.LLM_API_KEY ?? env.OPENAI_API_KEY;
  if (!apiKey) return undefined;
  return {
    baseUrl: env.LLM_BASE_URL ?? env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
    apiKey,
    model: env.LLM_MODEL,
  };
}

/**
 * Extract a JSON object string from model output, tolerating markdown fences and commentary.
 */
export function extractJson(raw: string): string | null {
  let s = raw.trim();

  if (s.startsWith("```")) {
    s = s.replace(/^```[a-zA-Z]*\s*/m, "").replace(/```$/m, "").trim();
  }

  const start = s.indexOf("{");
  const end = s.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) return null;
  return s.slice(start, end + 1);
}

function readContent(payload: unknown): unknown {
  if (typeof payload !== "object" || payload === null || !("choices" in payload)) return undefined;
  const { choices } = payload;
  if (!Array.isArray(choices)) return undefined;
  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) return undefined;
  const { message } = first;
  if (typeof message !== "object" || message === null || !("content" in message)) return undefined;
  return message.content;
}

/**
 * OpenAI-compatible Chat Completions client returning parsed JSON.
 * Single attempt, hard timeout; callers decide how to degrade.
 */
export function createLlmClient(config: LlmConfig, fetchImpl: FetchLike = (input, init) => fetch(input, init)): LlmClient {
  async function chatJson(args: {
    messages: ChatMessage[];
    temperature?: number;
    timeoutMs: number;
  }): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), args.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetchImpl(buildUrl(config.baseUrl, "/chat/completions"), {
          method: "POST",
          headers: {
            "content-type": "application/json",
            authorization: `Bearer ${config.apiKey}`,
          },
          body: JSON.stringify({
            model: config.model,
            temperature: args.temperature ?? 0.3,
            response_format: { type: "json_object" },
            messages: args.messages,
          }),
          signal: controller.signal,
        });
      } catch (error) {
        const reason = controller.signal.aborted
          ? `timed out after ${args.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
        throw new InterpretationError(`LLM request failed: ${reason}`, { cause: error });
      }

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new InterpretationError(`LLM request failed: ${res.status} ${text}`.trim());
      }

      const content = readContent(await res.json());
      if (typeof content !== "string" || !content.trim()) {
        throw new InterpretationError("LLM returned empty content");
      }

      const json = extractJson(content);
      if (!json) {
        throw new InterpretationError("LLM returned non-JSON content");
      }
      try {
        return JSON.parse(json);
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new InterpretationError(`LLM returned non-JSON content: ${reason}`, { cause: e });
      }
    } finally {
      clearTimeout(timer);
    }
  }

  return { chatJson };
}
