/**
 * Type definitions for Brave Search service
 */

import { z } from "zod";

/**
 * Subset of the web search response body that the client reads
 */
export const BraveApiResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
            age: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

/**
 * Single search result from Brave
 */
export interface BraveSearchResult {
  title: string;
  url: string;
  description: string;
  age?: string; // relative or ISO date as reported by Brave
}

/**
 * Brave Search API response
 */
export interface BraveSearchResponse {
  query: string;
  results: BraveSearchResult[];
  totalResults: number;
}
