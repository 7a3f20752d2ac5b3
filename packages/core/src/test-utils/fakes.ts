/**
 * In-process fakes for the collaborator interfaces, shared by tests
 */

import { vi } from "vitest";
import type { LLMProvider } from "../interfaces/llm-provider";
import type { SearchProvider, SearchResultItem } from "../interfaces/search-provider";
import type { EmbeddingProvider, PageFetcher } from "../interfaces/content-sources";

export function fakeLLM(overrides: Partial<LLMProvider> = {}): LLMProvider {
  return {
    generateQuery: vi.fn(async (task: string) => task),
    scoreText: vi.fn(async () => "0.5"),
    scoreBatch: vi.fn(async () => '{"scores": []}'),
    evaluateContent: vi.fn(async () => '{"is_relevant": false, "relevance_score": 0}'),
    cleanBlock: vi.fn(async (text: string) => text),
    synthesizeAnswer: vi.fn(async () => "synthesized answer"),
    summarize: vi.fn(async () => "summary"),
    ...overrides,
  };
}

/**
 * Search provider returning one canned page of results per call, in order
 */
export function fakeSearch(pages: SearchResultItem[][]): SearchProvider {
  let call = 0;
  return {
    search: vi.fn(async (query: string) => {
      const results = pages[call] ?? [];
      call++;
      return { query, results, totalResults: results.length };
    }),
    getName: () => "fake",
  };
}

export function fakeFetcher(pages: Record<string, string>): PageFetcher {
  return {
    fetchPage: vi.fn(async (url: string) => {
      const page = pages[url];
      if (page === undefined) {
        throw new Error(`no page for ${url}`);
      }
      return page;
    }),
  };
}

/**
 * Embeds text as a bag-of-letters vector so identical texts score 1.0
 */
export function fakeEmbeddings(vectorFor?: (text: string) => number[]): EmbeddingProvider {
  const toVector =
    vectorFor ??
    ((text: string) => {
      const vector = new Array<number>(26).fill(0);
      for (const char of text.toLowerCase()) {
        const code = char.charCodeAt(0) - 97;
        if (code >= 0 && code < 26) {
          vector[code] += 1;
        }
      }
      return vector;
    });
  return {
    embed: vi.fn(async (texts: string[]) => texts.map(toVector)),
  };
}
