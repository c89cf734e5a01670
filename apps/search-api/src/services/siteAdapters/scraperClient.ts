import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { AdapterError } from "../../errors.js";
import type { Env } from "../../types/index.js";
import type { FetchLike, HtmlFetcher, HtmlFetchOptions } from "./types.js";

const BROWSER_LIKE_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";

const BLOCK_MARKERS = [
  /api-services-support@amazon\.com/i,
  /\/errors\/validateCaptcha/i,
  /enter the characters you see below/i,
  /px-captcha/i,
  /are you a human\?/i,
  /<title>\s*(?:robot check|access denied|attention required)/i,
];

export interface ScraperClientOptions {
  apiKey?: string;
  apiUrl: string;
  renderJs: boolean;
  maxRetries: number;
  retryBaseMs: number;
}

export function scraperOptionsFromEnv(env: Env): ScraperClientOptions {
  return {
    apiKey: env.SCRAPER_API_KEY,
    apiUrl: env.SCRAPER_API_URL,
    renderJs: env.SCRAPER_RENDER_JS,
    maxRetries: env.ADAPTER_MAX_RETRIES,
    retryBaseMs: env.ADAPTER_RETRY_BASE_MS,
  };
}

/**
 * Downloads store search pages, through the scraping proxy when a key is configured.
 * Transient failures are retried with exponential backoff; everything else maps to an `AdapterError`.
 */
export class ScraperClient implements HtmlFetcher {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: ScraperClientOptions,
    private readonly logger: Logger,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchHtml(source: string, url: string, options: HtmlFetchOptions): Promise<string> {
    let attempt = 0;

    while (true) {
      try {
        return await this.fetchOnce(source, url, options);
      } catch (error) {
        const adapterError = AdapterError.from(source, error);
        const canRetry =
          adapterError.retryable && attempt < this.options.maxRetries && !options.signal.aborted;
        this.logger.warn(
          { source, attempt: attempt + 1, kind: adapterError.kind, status: adapterError.status, willRetry: canRetry },
          "Store request failed"
        );
        if (!canRetry) throw adapterError;

        try {
          await delay(this.options.retryBaseMs * 2 ** attempt, undefined, { signal: options.signal });
        } catch (abortError) {
          throw new AdapterError(source, "aborted", "Request cancelled during retry backoff", undefined, {
            cause: abortError,
          });
        }
        attempt += 1;
      }
    }
  }

  buildRequestUrl(url: string, countryCode?: string): string {
    if (!this.options.apiKey) return url;

    const proxied = new URL(this.options.apiUrl);
    proxied.searchParams.set("api_key", this.options.apiKey);
    proxied.searchParams.set("url", url);
    if (countryCode) proxied.searchParams.set("country_code", countryCode);
    if (this.options.renderJs) proxied.searchParams.set("render", "true");
    return proxied.toString();
  }

  private async fetchOnce(source: string, url: string, options: HtmlFetchOptions): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.buildRequestUrl(url, options.countryCode), {
        signal: options.signal,
        headers: {
          "User-Agent": BROWSER_LIKE_USER_AGENT,
          Accept: "text/html,application/xhtml+xml,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
      });
    } catch (error) {
      if (options.signal.aborted) {
        throw new AdapterError(source, "aborted", "Request cancelled", undefined, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new AdapterError(source, "network", `Network error: ${message}`, undefined, { cause: error });
    }

    if (response.status === 429) {
      throw new AdapterError(source, "rate_limited", "Rate limited by store", 429);
    }
    if (response.status === 401 || response.status === 403) {
      throw new AdapterError(source, "blocked", `Request blocked (${response.status})`, response.status);
    }
    if (!response.ok) {
      throw new AdapterError(source, "http", `Store responded with ${response.status}`, response.status);
    }

    const body = await response.text();
    if (BLOCK_MARKERS.some((marker) => marker.test(body))) {
      throw new AdapterError(source, "blocked", "Captcha or robot check page returned", response.status);
    }
    if (!/<(?:!doctype|html|body|div)\b/i.test(body)) {
      throw new AdapterError(source, "parse", "Response does not look like HTML", response.status);
    }

    return body;
  }
}
