/**
 * Research Engine service
 *
 * Core orchestrator that coordinates the research flow:
 * 1. Generate a search query (via LLM provider)
 * 2. Execute the search (via Search provider)
 * 3. Score links, fetch and clean pages, evaluate their content
 * 4. Store accepted evidence in a retrieval index
 */

export { ResearchOrchestrator, SUMMARY_UNAVAILABLE, type ResearchOrchestratorDeps } from "./orchestrator";
export * from "./config";
export type {
  ResearchOptions,
  ResearchRunResult,
  ResearchState,
  StateChange,
} from "./types";
