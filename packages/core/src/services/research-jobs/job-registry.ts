/**
 * Background research jobs
 *
 * Starts one asynchronous worker per task group. The worker researches each
 * open task in order (without indexing), marks finished tasks completed in
 * the task group store, and finally puts every accepted result into the
 * group's retrieval index `idx_<contextId>_<groupId>`.
 *
 * Nothing is cancelled: a started job runs until its last task is done.
 */

import { JobFailure, describeError } from "../../errors";
import { errorFields, type Logger } from "../../logging/logger";
import { toEvidenceDocument, type AcceptedResult } from "../../models/evidence";
import {
  jobKeyToString,
  type GroupQueryResult,
  type JobKey,
  type JobStatus,
  type ProgressSnapshot,
  type StartResult,
} from "../../models/research-job";
import type { TaskGroup } from "../../models/task-group";
import { sleep as defaultSleep } from "../../utils/retry";
import type { ResearchOrchestrator } from "../research-engine/orchestrator";
import type { JobsConfig } from "../research-engine/config";
import type { RetrievalIndexStore } from "../retrieval-index/index-store";
import { NOT_STARTED, reduceJobStatus, toProgressSnapshot, type JobEvent } from "./job-status";
import type { TaskGroupStore } from "./task-group-store";

export interface ResearchJobRegistryDeps {
  store: TaskGroupStore;
  orchestrator: Pick<ResearchOrchestrator, "run">;
  indexStore: Pick<RetrievalIndexStore, "create" | "update" | "exists" | "query">;
  config: JobsConfig;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function groupIndexId(key: JobKey): string {
  return `idx_${key.contextId}_${key.groupId}`;
}

export class ResearchJobRegistry {
  private readonly statuses = new Map<string, JobStatus>();
  private readonly workers = new Map<string, Promise<void>>();
  private readonly starting = new Set<string>();
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly deps: ResearchJobRegistryDeps) {
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Start researching a task group in the background
   */
  async start(key: JobKey): Promise<StartResult> {
    const id = jobKeyToString(key);
    if (this.starting.has(id) || this.status(key).inProgress) {
      return { accepted: false, reason: "already-running" };
    }

    this.starting.add(id);
    try {
      const group = await this.deps.store.getGroup(key.contextId, key.groupId);
      if (!group) {
        return { accepted: false, reason: "group-not-found" };
      }
      const openTasks = group.tasks.filter((task) => !task.completed);
      if (openTasks.length === 0) {
        return { accepted: false, reason: "no-open-tasks" };
      }

      await this.deps.store.updateGroup(key.contextId, key.groupId, (current) => ({
        ...current,
        researchInProgress: true,
      }));
      this.dispatch(key, { type: "started", totalTasks: openTasks.length, at: this.now() });

      const worker: Promise<void> = this.runJob(key, group).finally(() => {
        // a restart may already have replaced this entry
        if (this.workers.get(id) === worker) {
          this.workers.delete(id);
        }
      });
      this.workers.set(id, worker);
      return { accepted: true };
    } finally {
      this.starting.delete(id);
    }
  }

  status(key: JobKey): JobStatus {
    return this.statuses.get(jobKeyToString(key)) ?? NOT_STARTED;
  }

  poll(key: JobKey): ProgressSnapshot {
    return toProgressSnapshot(this.status(key));
  }

  /**
   * Resolves once the job's worker (if any) has finished
   */
  async whenIdle(key: JobKey): Promise<void> {
    await this.workers.get(jobKeyToString(key));
  }

  /**
   * Resolves once every running worker has finished
   */
  async whenAllIdle(): Promise<void> {
    await Promise.all([...this.workers.values()]);
  }

  /**
   * Ask a question of a group's retrieval index
   */
  async queryGroup(contextId: string, groupId: string, question: string): Promise<GroupQueryResult> {
    const group = await this.deps.store.getGroup(contextId, groupId);
    if (!group) {
      return { success: false, error: "Task group not found" };
    }
    if (!group.indexId) {
      return { success: false, error: "No research index for this group yet" };
    }
    if (!question.trim()) {
      return { success: false, error: "Query must not be empty" };
    }

    const result = await this.deps.indexStore.query(group.indexId, question);
    if (!result) {
      return { success: false, error: "Query failed" };
    }
    return {
      success: true,
      response: result.response,
      sources: result.sources,
      indexId: result.indexId,
    };
  }

  private dispatch(key: JobKey, event: JobEvent): void {
    const id = jobKeyToString(key);
    this.statuses.set(id, reduceJobStatus(this.status(key), event));
  }

  private async runJob(key: JobKey, group: TaskGroup): Promise<void> {
    const logger = this.logger.child({ contextId: key.contextId, groupId: key.groupId });
    const results: AcceptedResult[] = [];
    const openTasks = group.tasks.filter((task) => !task.completed);

    try {
      for (const [i, task] of openTasks.entries()) {
        this.dispatch(key, { type: "task-started", taskId: task.id });
        logger.info("Researching task", { taskId: task.id, task: task.description });

        try {
          const run = await this.deps.orchestrator.run(task.description, { persist: false });
          if (!run.success) {
            throw new JobFailure(task.id, run.error ?? "research run failed");
          }
          results.push(...run.relevantResults);

          await this.deps.store.updateGroup(key.contextId, key.groupId, (current) => ({
            ...current,
            tasks: current.tasks.map((item) =>
              item.id === task.id ? { ...item, completed: true } : item
            ),
          }));
          this.dispatch(key, { type: "task-completed", taskId: task.id });
          logger.info("Task completed", { taskId: task.id, results: run.relevantResults.length });
        } catch (error) {
          const failure =
            error instanceof JobFailure
              ? error
              : new JobFailure(task.id, describeError(error), { cause: error });
          logger.error("Task failed, leaving it open", { taskId: task.id, error: failure.message });
          this.dispatch(key, { type: "task-failed", taskId: task.id, error: failure.message });
        }

        if (i < openTasks.length - 1 && this.deps.config.taskDelayMs > 0) {
          await this.sleep(this.deps.config.taskDelayMs);
        }
      }

      if (results.length > 0) {
        const indexId = await this.attachIndex(key, group, results, logger);
        if (indexId) {
          this.dispatch(key, { type: "index-attached", indexId });
        }
      }
    } catch (error) {
      logger.error("Research job failed", errorFields(error));
    } finally {
      await this.clearInProgress(key, logger);
      this.dispatch(key, { type: "finished", at: this.now() });
      logger.info("Research job finished", { completedTasks: this.status(key).completedTaskIds.length });
    }
  }

  private async attachIndex(
    key: JobKey,
    group: TaskGroup,
    results: AcceptedResult[],
    logger: Logger
  ): Promise<string | null> {
    const { indexStore, store } = this.deps;
    const indexId = groupIndexId(key);
    const documents = results.map(toEvidenceDocument);

    const stored = (await indexStore.exists(indexId))
      ? await indexStore.update(indexId, group.prompt, documents)
      : (await indexStore.create(group.prompt, documents, { research_id: key.contextId }, indexId)) ===
        indexId;
    if (!stored) {
      logger.warn("Could not store results in the group index", { indexId });
      return null;
    }

    await store.updateGroup(key.contextId, key.groupId, (current) => ({ ...current, indexId }));
    logger.info("Results stored in group index", { indexId, documents: documents.length });
    return indexId;
  }

  private async clearInProgress(key: JobKey, logger: Logger): Promise<void> {
    try {
      await this.deps.store.updateGroup(key.contextId, key.groupId, (current) => ({
        ...current,
        researchInProgress: false,
      }));
    } catch (error) {
      logger.error("Could not clear research-in-progress flag", errorFields(error));
    }
  }
}
