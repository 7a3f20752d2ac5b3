/**
 * Background research job models
 */

import type { QuerySource } from "./retrieval-index";

/**
 * Structured key of a job: one task group inside one context
 */
export interface JobKey {
  contextId: string;
  groupId: string;
}

export function jobKeyToString(key: JobKey): string {
  return JSON.stringify([key.contextId, key.groupId]);
}

export type JobState = "not-started" | "in-progress" | "completed";

/**
 * Full job status, owned by the job registry
 */
export interface JobStatus {
  readonly state: JobState;
  readonly inProgress: boolean;
  readonly completed: boolean;
  readonly completedTaskIds: readonly string[];
  readonly currentTaskId: string | null;
  readonly totalTasks: number;
  readonly indexId: string | null;
  readonly startedAt: number | null;
  readonly finishedAt: number | null;
}

/**
 * What pollers see. Start time and total task count stay internal.
 */
export interface ProgressSnapshot {
  inProgress: boolean;
  completed: boolean;
  completedTasks: string[];
  currentTaskIndex: string | null;
  indexId: string | null;
}

export type StartRejection = "already-running" | "group-not-found" | "no-open-tasks";

export type StartResult =
  | { accepted: true }
  | { accepted: false; reason: StartRejection };

/**
 * Result of asking a question of a group's retrieval index
 */
export type GroupQueryResult =
  | {
      success: true;
      response: string;
      sources: QuerySource[];
      indexId: string;
    }
  | { success: false; error: string };
