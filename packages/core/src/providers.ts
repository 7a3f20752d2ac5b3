/**
 * Provider Factory Functions
 *
 * Centralized provider creation and initialization.
 * Allows easy switching between providers via configuration.
 */

import * as path from "path";
import type { EmbeddingProvider, PageFetcher } from "./interfaces/content-sources";
import type { LLMProvider } from "./interfaces/llm-provider";
import type { SearchProvider } from "./interfaces/search-provider";
import type { Logger } from "./logging/logger";
import { ContentCache } from "./services/content-cache/content-cache";
import { PdfTextExtractor } from "./services/content-cache/pdf-extractor";
import { ContentCleaner } from "./services/content-cleaner/content-cleaner";
import { HttpPageFetcher } from "./services/content-extractor";
import { OpenAIEmbeddingProvider } from "./services/llm/embeddings";
import { OpenAIProvider } from "./services/llm/openai-provider";
import { ContentRelevanceEvaluator } from "./services/relevance/content-relevance";
import { LinkRelevanceEvaluator } from "./services/relevance/link-relevance";
import type { LLMConfig, ResearchConfig, SearchConfig } from "./services/research-engine/config";
import { ResearchOrchestrator } from "./services/research-engine/orchestrator";
import { ResearchJobRegistry } from "./services/research-jobs/job-registry";
import { FileTaskGroupStore } from "./services/research-jobs/task-group-store";
import { RetrievalIndexStore } from "./services/retrieval-index/index-store";
import { BraveSearchProvider } from "./services/search/brave-provider";

/**
 * LLM Provider types
 */
export type LLMProviderType = "openai" | "custom";

/**
 * Search Provider types
 */
export type SearchProviderType = "brave" | "custom";

/**
 * LLM Provider configuration
 */
export interface LLMProviderConfig {
  provider: LLMProviderType;
  models: LLMConfig["models"];
  logger: Logger;
  apiKey?: string;
  customProvider?: LLMProvider; // For custom implementations
}

/**
 * Embedding Provider configuration
 */
export interface EmbeddingProviderConfig {
  provider: LLMProviderType;
  embeddings: LLMConfig["embeddings"];
  logger: Logger;
  apiKey?: string;
  customProvider?: EmbeddingProvider;
}

/**
 * Search Provider configuration
 */
export interface SearchProviderConfig {
  provider: SearchProviderType;
  search: SearchConfig;
  logger: Logger;
  apiKey?: string;
  customProvider?: SearchProvider; // For custom implementations
}

/**
 * Create an LLM provider from configuration
 */
export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case "openai":
      if (!config.apiKey) {
        throw new Error("OpenAI API key is required (set OPENAI_API_KEY)");
      }
      return new OpenAIProvider({
        models: config.models,
        logger: config.logger,
        apiKey: config.apiKey,
      });

    case "custom":
      if (!config.customProvider) {
        throw new Error("Custom LLM provider specified but not provided in config.customProvider");
      }
      return config.customProvider;
  }
}

/**
 * Create an embedding provider from configuration
 */
export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.apiKey) {
        throw new Error("OpenAI API key is required (set OPENAI_API_KEY)");
      }
      return new OpenAIEmbeddingProvider({
        config: config.embeddings,
        logger: config.logger,
        apiKey: config.apiKey,
      });

    case "custom":
      if (!config.customProvider) {
        throw new Error(
          "Custom embedding provider specified but not provided in config.customProvider"
        );
      }
      return config.customProvider;
  }
}

/**
 * Create a search provider from configuration
 */
export function createSearchProvider(config: SearchProviderConfig): SearchProvider {
  switch (config.provider) {
    case "brave":
      if (!config.apiKey) {
        throw new Error("Brave Search API key is required (set BRAVE_SEARCH_API_KEY)");
      }
      return new BraveSearchProvider({
        apiKey: config.apiKey,
        config: config.search,
        logger: config.logger,
      });

    case "custom":
      if (!config.customProvider) {
        throw new Error(
          "Custom search provider specified but not provided in config.customProvider"
        );
      }
      return config.customProvider;
  }
}

export interface CreateResearchServicesOptions {
  config: ResearchConfig;
  logger: Logger;
  openaiApiKey?: string;
  braveApiKey?: string;
  baseDir?: string; // relative data directories resolve against this (default: cwd)

  // Injected collaborators replace the configured ones
  llm?: LLMProvider;
  embeddings?: EmbeddingProvider;
  search?: SearchProvider;
  fetcher?: PageFetcher;
}

/**
 * Everything an entry point needs, wired from one configuration
 */
export interface ResearchServices {
  config: ResearchConfig;
  llm: LLMProvider;
  search: SearchProvider;
  cache: ContentCache;
  indexStore: RetrievalIndexStore;
  orchestrator: ResearchOrchestrator;
  taskGroups: FileTaskGroupStore;
  jobs: ResearchJobRegistry;
}

export function createResearchServices(options: CreateResearchServicesOptions): ResearchServices {
  const { config, logger } = options;
  const baseDir = options.baseDir ?? process.cwd();
  const resolveDir = (dir: string) => path.resolve(baseDir, dir);

  const llm = createLLMProvider({
    provider: options.llm ? "custom" : config.llm.provider,
    models: config.llm.models,
    logger: logger.child({ component: "llm" }),
    apiKey: options.openaiApiKey,
    customProvider: options.llm,
  });
  const embeddings = createEmbeddingProvider({
    provider: options.embeddings ? "custom" : config.llm.provider,
    embeddings: config.llm.embeddings,
    logger: logger.child({ component: "embeddings" }),
    apiKey: options.openaiApiKey,
    customProvider: options.embeddings,
  });
  const search = createSearchProvider({
    provider: options.search ? "custom" : config.search.provider,
    search: config.search,
    logger: logger.child({ component: "search" }),
    apiKey: options.braveApiKey,
    customProvider: options.search,
  });

  const cache = new ContentCache({
    cacheDir: resolveDir(config.cache.dir),
    logger: logger.child({ component: "cache" }),
    documentExtractor: new PdfTextExtractor(config.extraction, logger.child({ component: "pdf" })),
    persistEmptyContent: config.cache.persistEmptyContent,
  });
  const indexStore = new RetrievalIndexStore({
    dir: resolveDir(config.index.dir),
    embeddings,
    llm,
    config: config.index,
    logger: logger.child({ component: "index" }),
  });

  const orchestrator = new ResearchOrchestrator({
    llm,
    search,
    fetcher:
      options.fetcher ??
      new HttpPageFetcher(config.extraction, logger.child({ component: "fetcher" })),
    cache,
    linkGate: new LinkRelevanceEvaluator(llm, config.relevance, logger.child({ component: "links" })),
    contentGate: new ContentRelevanceEvaluator(
      llm,
      config.relevance,
      logger.child({ component: "content" })
    ),
    cleaner: new ContentCleaner(llm, config.cleaner, logger.child({ component: "cleaner" })),
    indexStore,
    config,
    logger: logger.child({ component: "research" }),
  });

  const taskGroups = new FileTaskGroupStore({ dataDir: resolveDir(config.jobs.dataDir) });
  const jobs = new ResearchJobRegistry({
    store: taskGroups,
    orchestrator,
    indexStore,
    config: config.jobs,
    logger: logger.child({ component: "jobs" }),
  });

  return { config, llm, search, cache, indexStore, orchestrator, taskGroups, jobs };
}
