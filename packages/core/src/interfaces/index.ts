/**
 * Provider interfaces for dependency injection
 */

export type { LLMProvider, LinkCandidate } from "./llm-provider";

export type {
  SearchProvider,
  SearchResultItem,
  SearchResponse,
} from "./search-provider";

export type {
  PageFetcher,
  DocumentTextExtractor,
  EmbeddingProvider,
} from "./content-sources";
