/**
 * Research orchestrator
 * Core logic for executing the research flow
 *
 * Each cycle generates one query (earlier queries passed as ones to avoid),
 * searches, and walks the results in order: link relevance first, then
 * fetch through the content cache, clean, and evaluate the content section
 * by section. Runs stop after the cycle that accepts a first result, or
 * after maxCycles.
 */

import type { LLMProvider } from "../../interfaces/llm-provider";
import type { PageFetcher } from "../../interfaces/content-sources";
import type { SearchProvider, SearchResultItem } from "../../interfaces/search-provider";
import { toEvidenceDocument, type AcceptedResult } from "../../models/evidence";
import { describeError } from "../../errors";
import { errorFields, type Logger } from "../../logging/logger";
import type { ContentCache } from "../content-cache/content-cache";
import type { ContentCleaner } from "../content-cleaner/content-cleaner";
import type { ContentRelevanceEvaluator } from "../relevance/content-relevance";
import type { LinkRelevanceEvaluator } from "../relevance/link-relevance";
import type { RetrievalIndexStore } from "../retrieval-index/index-store";
import type { ResearchConfig } from "./config";
import type { ResearchOptions, ResearchRunResult, ResearchState, StateChange } from "./types";

export const SUMMARY_UNAVAILABLE = "Content not available or too short to summarize.";
const TRUNCATION_MARKER = "\n...[content truncated]...";

export interface ResearchOrchestratorDeps {
  llm: LLMProvider;
  search: SearchProvider;
  fetcher: PageFetcher;
  cache: ContentCache;
  linkGate: LinkRelevanceEvaluator;
  contentGate: ContentRelevanceEvaluator;
  cleaner: ContentCleaner;
  indexStore: RetrievalIndexStore;
  config: Pick<ResearchConfig, "research" | "relevance">;
  logger: Logger;
  now?: () => number;
}

interface RunSettings {
  maxCycles: number;
  maxResults: number;
  linkThreshold: number;
  contentThreshold: number;
}

/**
 * Mutable bookkeeping of one run
 */
interface RunState {
  task: string;
  settings: RunSettings;
  cycle: number;
  queries: string[];
  visited: Set<string>;
  results: AcceptedResult[];
  urlsFetched: number;
  notify: (state: ResearchState, detail?: Pick<StateChange, "query" | "url">) => void;
}

export class ResearchOrchestrator {
  private readonly deps: ResearchOrchestratorDeps;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: ResearchOrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run the research cycles for a task
   */
  async run(task: string, options: ResearchOptions = {}): Promise<ResearchRunResult> {
    const startedAt = this.now();
    const { research, relevance } = this.deps.config;
    const state: RunState = {
      task,
      settings: {
        maxCycles: options.maxCycles ?? research.maxCycles,
        maxResults: options.maxResults ?? research.maxResults,
        linkThreshold: options.linkThreshold ?? relevance.linkThreshold,
        contentThreshold: options.contentThreshold ?? relevance.contentThreshold,
      },
      cycle: 0,
      queries: [],
      visited: new Set(),
      results: [],
      urlsFetched: 0,
      notify: (researchState, detail) =>
        options.onStateChange?.({ state: researchState, cycle: state.cycle, ...detail }),
    };

    this.logger.info("Starting research", { task, ...state.settings });
    state.notify("idle");

    let error: string | undefined;
    try {
      while (state.cycle < state.settings.maxCycles) {
        state.cycle++;
        await this.runCycle(state);
        state.notify("cycle-done");

        if (state.results.length > 0) {
          break;
        }
      }
    } catch (cause) {
      error = describeError(cause);
      this.logger.error("Research run failed", { task, cycle: state.cycle, ...errorFields(cause) });
    }

    const sorted = [...state.results].sort(
      (a, b) => b.evaluation.relevanceScore - a.evaluation.relevanceScore
    );

    const shouldPersist = error === undefined && (options.persist ?? true) && sorted.length > 0;
    const indexId = shouldPersist
      ? await this.persistResults(task, sorted, options.indexId)
      : undefined;
    const relevantResults = indexId ? sorted.map((result) => ({ ...result, indexId })) : sorted;

    state.notify("terminal");
    const completedAt = this.now();
    this.logger.info("Research finished", {
      task,
      results: relevantResults.length,
      cyclesUsed: state.cycle,
      urlsVisited: state.visited.size,
      urlsFetched: state.urlsFetched,
    });

    return {
      success: error === undefined,
      task,
      relevantResults,
      cyclesUsed: state.cycle,
      queriesGenerated: state.queries,
      urlsVisited: state.visited.size,
      urlsFetched: state.urlsFetched,
      indexId,
      error,
      startedAt,
      completedAt,
      durationMs: completedAt - startedAt,
    };
  }

  /**
   * Summarize a page (fetched through the cache and cleaned) or raw text
   */
  async summarizeContent(urlOrContent: string, isUrl: boolean = false): Promise<string> {
    const { summaryMaxLength, minSummaryLength } = this.deps.config.research;

    let content = urlOrContent;
    if (isUrl) {
      const raw = await this.deps.cache.getContent(urlOrContent, (url) =>
        this.deps.fetcher.fetchPage(url)
      );
      content = raw ? await this.deps.cleaner.clean(raw) : "";
    }

    if (content.trim().length < minSummaryLength) {
      return SUMMARY_UNAVAILABLE;
    }
    if (content.length > summaryMaxLength) {
      content = content.slice(0, summaryMaxLength) + TRUNCATION_MARKER;
    }

    try {
      return await this.deps.llm.summarize(content);
    } catch (error) {
      this.logger.error("Summary generation failed", errorFields(error));
      return `Error generating summary: ${describeError(error)}`;
    }
  }

  private async runCycle(state: RunState): Promise<void> {
    const { llm, search } = this.deps;
    this.logger.info("Research cycle", { cycle: state.cycle, maxCycles: state.settings.maxCycles });

    state.notify("generate-query");
    const query = await this.nextQuery(llm, state);
    state.queries.push(query);

    state.notify("search", { query });
    const response = await search.search(query);
    if (response.results.length === 0) {
      this.logger.info("No search results", { query });
      return;
    }

    state.notify("evaluate-links");
    const prescored = await this.prescoreLinks(state, response.results);

    for (const item of response.results) {
      if (state.results.length >= state.settings.maxResults) {
        break;
      }
      if (state.visited.has(item.url)) {
        continue;
      }
      state.visited.add(item.url);

      try {
        await this.processCandidate(state, item, prescored.get(item.url));
      } catch (error) {
        this.logger.warn("Skipping URL after processing error", {
          url: item.url,
          ...errorFields(error),
        });
      }
    }
  }

  /**
   * Generate a query; a repeat of an earlier query is retried once, then used
   */
  private async nextQuery(llm: LLMProvider, state: RunState): Promise<string> {
    const query = await llm.generateQuery(state.task, [...state.queries]);
    if (!state.queries.includes(query)) {
      return query;
    }

    this.logger.debug("Generated query repeats an earlier one, retrying", { query });
    return llm.generateQuery(state.task, [...state.queries]);
  }

  /**
   * Batch-score this page's unvisited candidates when batch scoring is on
   */
  private async prescoreLinks(
    state: RunState,
    items: SearchResultItem[]
  ): Promise<Map<string, number>> {
    const scores = new Map<string, number>();
    if (!this.deps.config.relevance.batchLinkScoring) {
      return scores;
    }

    const seen = new Set<string>();
    const fresh = items.filter((item) => {
      if (state.visited.has(item.url) || seen.has(item.url)) {
        return false;
      }
      seen.add(item.url);
      return true;
    });

    for (const candidate of await this.deps.linkGate.scoreCandidates(fresh, state.task)) {
      scores.set(candidate.url, candidate.linkRelevanceScore);
    }
    return scores;
  }

  private async processCandidate(
    state: RunState,
    item: SearchResultItem,
    prescored: number | undefined
  ): Promise<void> {
    const { cache, cleaner, contentGate, fetcher, linkGate } = this.deps;
    const { task, settings } = state;

    const linkScore = prescored ?? (await linkGate.scoreCandidate(item, task));
    if (!linkGate.passes(linkScore, settings.linkThreshold)) {
      this.logger.debug("Link below threshold", { url: item.url, linkScore });
      return;
    }

    state.notify("fetch", { url: item.url });
    const raw = await cache.getContent(item.url, (url) => fetcher.fetchPage(url));
    state.urlsFetched++;
    if (!raw.trim()) {
      this.logger.info("No content for URL", { url: item.url });
      return;
    }

    state.notify("clean", { url: item.url });
    const content = await cleaner.clean(raw, task);

    state.notify("evaluate-content", { url: item.url });
    const evaluation = await contentGate.evaluateSections(task, content);
    if (!evaluation.isRelevant || evaluation.relevanceScore < settings.contentThreshold) {
      this.logger.info("Content rejected", {
        url: item.url,
        relevanceScore: evaluation.relevanceScore,
        reason: evaluation.reason,
      });
      return;
    }

    state.notify("accumulate", { url: item.url });
    state.results.push({
      title: item.title,
      url: item.url,
      description: item.description,
      linkRelevanceScore: linkScore,
      content,
      evaluation,
      cacheRef: cache.getCacheFileName(item.url),
    });
    this.logger.info("Accepted result", {
      url: item.url,
      linkScore,
      contentScore: evaluation.relevanceScore,
    });
  }

  private async persistResults(
    task: string,
    results: AcceptedResult[],
    indexId: string | undefined
  ): Promise<string | undefined> {
    const documents = results.map(toEvidenceDocument);

    if (indexId) {
      const updated = await this.deps.indexStore.update(indexId, task, documents);
      if (updated) {
        return indexId;
      }
    } else {
      const created = await this.deps.indexStore.create(task, documents);
      if (created) {
        return created;
      }
    }

    this.logger.warn("Results were not indexed", { task, indexId: indexId ?? null });
    return undefined;
  }
}
