import { z } from "zod";
import type { Logger } from "pino";
import { InterpretationError } from "../errors.js";
import type { SearchIntent } from "../types/index.js";
import type { LlmClient } from "./llmClient.js";
import type { QueryParser } from "./queryParser.js";

const LlmIntentSchema = z.object({
  searchTerms: z.string().trim().min(1),
  minPrice: z.number().positive().nullish(),
  maxPrice: z.number().positive().nullish(),
  minRating: z.number().min(0).max(5).nullish(),
  brand: z.string().trim().min(1).nullish(),
});

const SYSTEM_PROMPT = [
  "You convert natural language shopping queries into effective search terms for e-commerce sites.",
  "Output ONLY a JSON object. Do not wrap it in markdown code fences.",
  "",
  "Schema:",
  "{",
  '  "searchTerms": string,      // short keyword query a store search box understands',
  '  "minPrice"?: number | null,',
  '  "maxPrice"?: number | null,',
  '  "minRating"?: number | null, // 0-5 stars',
  '  "brand"?: string | null',
  "}",
  "",
  "Rules:",
  "- Keep product type, brand, model and key specs in searchTerms; drop filler words and prices.",
  "- 'under $1000' => maxPrice 1000. 'good reviews' => minRating 4.",
  "- If uncertain, omit the field.",
].join("\n");

export interface InterpretOptions {
  naturalLanguage: boolean;
  useOpenai: boolean;
}

/**
 * Turns the raw query into a SearchIntent. Never throws: every failure degrades to a simpler intent.
 */
export class QueryInterpreter {
  constructor(
    private readonly parser: QueryParser,
    private readonly llm: LlmClient | undefined,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  async interpret(query: string, options: InterpretOptions): Promise<SearchIntent> {
    if (!options.naturalLanguage) {
      return this.rawIntent(query);
    }

    let ruleIntent: SearchIntent;
    try {
      ruleIntent = this.parser.parse(query);
    } catch (error) {
      this.logger.warn({ error, query }, "Rule-based query parsing failed; using raw terms");
      return this.rawIntent(query);
    }

    if (!options.useOpenai || !this.llm) {
      return ruleIntent;
    }

    try {
      return await this.refineWithLlm(this.llm, query, ruleIntent);
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error), query },
        "Natural-language interpretation failed; using rule-based intent"
      );
      return ruleIntent;
    }
  }

  /**
   * Whitespace tokens of the query and no constraints.
   */
  rawIntent(query: string): SearchIntent {
    const rawQuery = query.trim();
    return {
      rawQuery,
      terms: rawQuery.toLowerCase().split(/\s+/).filter(Boolean),
      searchText: rawQuery,
      hints: [],
      interpretedBy: "raw",
    };
  }

  private async refineWithLlm(llm: LlmClient, query: string, ruleIntent: SearchIntent): Promise<SearchIntent> {
    const payload = await llm.chatJson({
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: `Query: ${query}` },
      ],
      temperature: 0.3,
      timeoutMs: this.timeoutMs,
    });

    const parsed = LlmIntentSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InterpretationError(
        `LLM intent failed validation: ${parsed.error.issues.map((i) => i.message).join("; ")}`
      );
    }

    const llmIntent = parsed.data;
    const terms = this.parser.tokenize(llmIntent.searchTerms);

    // Explicit phrases caught by the rules win over the model's reading.
    return {
      rawQuery: ruleIntent.rawQuery,
      terms: terms.length > 0 ? terms : ruleIntent.terms,
      searchText: llmIntent.searchTerms,
      minPrice: ruleIntent.minPrice ?? llmIntent.minPrice ?? undefined,
      maxPrice: ruleIntent.maxPrice ?? llmIntent.maxPrice ?? undefined,
      minRating: ruleIntent.minRating ?? llmIntent.minRating ?? undefined,
      brand: ruleIntent.brand ?? llmIntent.brand?.toLowerCase() ?? undefined,
      hints: ruleIntent.hints,
      interpretedBy: "llm",
    };
  }
}
