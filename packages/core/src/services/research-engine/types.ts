/**
 * Type definitions for research engine
 */

import type { AcceptedResult } from "../../models/evidence";

/**
 * Steps of a research run, in the order a cycle visits them
 */
export type ResearchState =
  | "idle"
  | "generate-query"
  | "search"
  | "evaluate-links"
  | "fetch"
  | "clean"
  | "evaluate-content"
  | "accumulate"
  | "cycle-done"
  | "terminal";

export interface StateChange {
  state: ResearchState;
  cycle: number;
  query?: string;
  url?: string;
}

/**
 * Research execution options
 */
export interface ResearchOptions {
  maxCycles?: number; // default: research.maxCycles
  maxResults?: number; // default: research.maxResults
  linkThreshold?: number; // default: relevance.linkThreshold
  contentThreshold?: number; // default: relevance.contentThreshold
  persist?: boolean; // store accepted results in a retrieval index (default: true)
  indexId?: string; // update this index instead of creating a new one
  onStateChange?: (change: StateChange) => void;
}

/**
 * Research execution result
 */
export interface ResearchRunResult {
  success: boolean;
  task: string;

  // Results, best content score first
  relevantResults: AcceptedResult[];
  cyclesUsed: number;

  queriesGenerated: string[];
  urlsVisited: number;
  urlsFetched: number;

  indexId?: string;
  error?: string;

  // Timing
  startedAt: number;
  completedAt: number;
  durationMs: number;
}
