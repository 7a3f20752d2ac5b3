/**
 * Brave Search API service
 */

export { BraveSearchClient, BRAVE_SEARCH_API_URL, type BraveSearchClientOptions } from "./client";
export type { BraveSearchResult, BraveSearchResponse } from "./types";
