/**
 * Task group data models
 *
 * A context (research session) owns task groups; each group holds the task
 * items a background job researches.
 */

export interface TaskItem {
  id: string;
  description: string;
  completed: boolean;
  notes?: string;
}

export interface TaskGroup {
  id: string;
  contextId: string;
  prompt: string;
  tasks: TaskItem[];
  researchInProgress: boolean;
  indexId: string | null;
  createdAt: number;
  updatedAt: number;
}

/**
 * Request to create a task group
 */
export interface NewTaskGroup {
  prompt: string;
  tasks: string[]; // task descriptions
}
