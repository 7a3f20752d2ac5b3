/**
 * Search Provider Interface
 *
 * Abstract interface for web search providers.
 * Allows switching between Brave Search and other engines.
 */

/**
 * Single search result (provider-agnostic)
 */
export interface SearchResultItem {
  title: string;
  url: string;
  description: string;
  publishedDate?: string;
}

/**
 * Search response (provider-agnostic)
 */
export interface SearchResponse {
  query: string; // The query that was executed
  results: SearchResultItem[];
  totalResults: number;
}

/**
 * Search Provider interface
 * All search providers must implement these methods
 */
export interface SearchProvider {
  /**
   * Execute a single web search
   */
  search(query: string): Promise<SearchResponse>;

  /**
   * Get the provider name
   */
  getName(): string;
}
