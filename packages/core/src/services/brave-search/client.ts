/**
 * Brave Search API client
 * Handles rate limiting, request building and response decoding
 */

import type { Logger } from "../../logging/logger";
import { sleep as defaultSleep } from "../../utils/retry";
import type { SearchConfig } from "../research-engine/config";
import { BraveApiResponseSchema, type BraveSearchResponse } from "./types";

export const BRAVE_SEARCH_API_URL = "https://api.search.brave.com/res/v1/web/search";

export interface BraveSearchClientOptions {
  apiKey: string;
  config: Pick<SearchConfig, "resultsPerQuery" | "safeSearch" | "minRequestIntervalMs">;
  logger: Logger;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class BraveSearchClient {
  private readonly apiKey: string;
  private readonly config: BraveSearchClientOptions["config"];
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestTime = 0;

  constructor(options: BraveSearchClientOptions) {
    if (!options.apiKey) {
      throw new Error("Brave Search API key is required");
    }
    this.apiKey = options.apiKey;
    this.config = options.config;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Search the web. Throws on transport errors and non-2xx responses.
   */
  async searchWeb(query: string): Promise<BraveSearchResponse> {
    await this.applyRateLimit();

    const url = `${BRAVE_SEARCH_API_URL}?${this.buildParams(query).toString()}`;
    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": this.apiKey,
      },
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Brave Search API error (${response.status}): ${errorText}`);
    }

    const data = BraveApiResponseSchema.parse(await response.json());
    const webResults = data.web?.results ?? [];
    this.logger.debug("Brave search completed", { query, results: webResults.length });

    return {
      query,
      results: webResults
        .filter((result) => Boolean(result.url))
        .map((result) => ({
          title: result.title ?? "",
          url: result.url ?? "",
          description: result.description ?? "",
          age: result.age,
        })),
      totalResults: webResults.length,
    };
  }

  private buildParams(query: string): URLSearchParams {
    return new URLSearchParams({
      q: query,
      count: String(this.config.resultsPerQuery),
      safesearch: this.config.safeSearch,
    });
  }

  private async applyRateLimit(): Promise<void> {
    const elapsed = this.now() - this.lastRequestTime;
    if (elapsed < this.config.minRequestIntervalMs) {
      await this.sleep(this.config.minRequestIntervalMs - elapsed);
    }
    this.lastRequestTime = this.now();
  }
}
