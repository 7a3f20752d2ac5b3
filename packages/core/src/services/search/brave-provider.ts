/**
 * Brave Search Provider Implementation
 *
 * Adapts BraveSearchClient to the SearchProvider interface, retrying failed
 * requests with exponential backoff.
 */

import type { SearchProvider, SearchResponse } from "../../interfaces/search-provider";
import type { Logger } from "../../logging/logger";
import { withRetry } from "../../utils/retry";
import { BraveSearchClient, type BraveSearchClientOptions } from "../brave-search/client";
import type { BraveSearchResponse } from "../brave-search/types";
import type { SearchConfig } from "../research-engine/config";

export interface BraveSearchProviderOptions extends Omit<BraveSearchClientOptions, "config"> {
  config: SearchConfig;
}

export class BraveSearchProvider implements SearchProvider {
  private readonly client: BraveSearchClient;
  private readonly maxRetries: number;
  private readonly logger: Logger;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(options: BraveSearchProviderOptions) {
    this.client = new BraveSearchClient(options);
    this.maxRetries = options.config.maxRetries;
    this.logger = options.logger;
    this.sleep = options.sleep;
  }

  private convertResponse(braveResponse: BraveSearchResponse): SearchResponse {
    return {
      query: braveResponse.query,
      results: braveResponse.results.map((result) => ({
        title: result.title,
        url: result.url,
        description: result.description,
        publishedDate: result.age,
      })),
      totalResults: braveResponse.totalResults,
    };
  }

  async search(query: string): Promise<SearchResponse> {
    const braveResponse = await withRetry(() => this.client.searchWeb(query), {
      maxRetries: this.maxRetries,
      label: "Brave search",
      logger: this.logger,
      sleep: this.sleep,
    });
    return this.convertResponse(braveResponse);
  }

  getName(): string {
    return "Brave Search";
  }
}
