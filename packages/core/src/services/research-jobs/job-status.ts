/**
 * Job status reducer
 *
 * The registry is the only writer of job status: workers post events and
 * the reducer folds them, in order, into a new frozen snapshot. Events that
 * would move a job backward are ignored.
 */

import type { JobStatus, ProgressSnapshot } from "../../models/research-job";

export type JobEvent =
  | { type: "started"; totalTasks: number; at: number }
  | { type: "task-started"; taskId: string }
  | { type: "task-completed"; taskId: string }
  | { type: "task-failed"; taskId: string; error: string }
  | { type: "index-attached"; indexId: string }
  | { type: "finished"; at: number };

function freeze(status: JobStatus): JobStatus {
  Object.freeze(status.completedTaskIds);
  return Object.freeze(status);
}

export const NOT_STARTED: JobStatus = freeze({
  state: "not-started",
  inProgress: false,
  completed: false,
  completedTaskIds: [],
  currentTaskId: null,
  totalTasks: 0,
  indexId: null,
  startedAt: null,
  finishedAt: null,
});

export function reduceJobStatus(status: JobStatus, event: JobEvent): JobStatus {
  if (event.type === "started") {
    // a finished job may be started again; that begins a new job
    if (status.state === "in-progress") {
      return status;
    }
    return freeze({
      ...NOT_STARTED,
      state: "in-progress",
      inProgress: true,
      totalTasks: event.totalTasks,
      startedAt: event.at,
    });
  }

  if (status.state !== "in-progress") {
    return status;
  }

  switch (event.type) {
    case "task-started":
      return freeze({ ...status, currentTaskId: event.taskId });
    case "task-completed":
      return freeze({
        ...status,
        currentTaskId: null,
        completedTaskIds: status.completedTaskIds.includes(event.taskId)
          ? status.completedTaskIds
          : [...status.completedTaskIds, event.taskId],
      });
    case "task-failed":
      return freeze({ ...status, currentTaskId: null });
    case "index-attached":
      return freeze({ ...status, indexId: event.indexId });
    case "finished":
      return freeze({
        ...status,
        state: "completed",
        inProgress: false,
        completed: true,
        currentTaskId: null,
        finishedAt: event.at,
      });
  }
}

/**
 * The part of a status exposed to pollers
 */
export function toProgressSnapshot(status: JobStatus): ProgressSnapshot {
  return {
    inProgress: status.inProgress,
    completed: status.completed,
    completedTasks: [...status.completedTaskIds],
    currentTaskIndex: status.currentTaskId,
    indexId: status.indexId,
  };
}
