/**
 * Task group persistence
 *
 * One JSON file per context under the jobs data directory, holding every
 * task group of that context. Writes to one context are serialized within
 * the process so read-modify-write updates do not overwrite each other.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { NewTaskGroup, TaskGroup } from "../../models/task-group";

export interface TaskGroupStore {
  listGroups(contextId: string): Promise<TaskGroup[]>;
  getGroup(contextId: string, groupId: string): Promise<TaskGroup | null>;
  createGroup(contextId: string, input: NewTaskGroup): Promise<TaskGroup>;
  /**
   * Apply `mutate` to the stored group and persist the result.
   * Resolves to null when the group does not exist.
   */
  updateGroup(
    contextId: string,
    groupId: string,
    mutate: (group: TaskGroup) => TaskGroup
  ): Promise<TaskGroup | null>;
}

const TaskGroupSchema = z.object({
  id: z.string(),
  contextId: z.string(),
  prompt: z.string(),
  tasks: z.array(
    z.object({
      id: z.string(),
      description: z.string(),
      completed: z.boolean(),
      notes: z.string().optional(),
    })
  ),
  researchInProgress: z.boolean(),
  indexId: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const ContextFileSchema = z.object({
  contextId: z.string(),
  groups: z.array(TaskGroupSchema),
});

type ContextFile = z.infer<typeof ContextFileSchema>;

export const CONTEXT_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface FileTaskGroupStoreOptions {
  dataDir: string;
  createId?: () => string;
  now?: () => number;
}

export class FileTaskGroupStore implements TaskGroupStore {
  private readonly dataDir: string;
  private readonly createId: () => string;
  private readonly now: () => number;
  private readonly writes = new Map<string, Promise<unknown>>();

  constructor(options: FileTaskGroupStoreOptions) {
    this.dataDir = path.resolve(options.dataDir);
    this.createId = options.createId ?? (() => randomUUID().slice(0, 8));
    this.now = options.now ?? Date.now;
  }

  contextPath(contextId: string): string {
    if (!CONTEXT_ID_PATTERN.test(contextId)) {
      throw new Error(`Invalid context id: ${contextId}`);
    }
    return path.join(this.dataDir, `${contextId}.json`);
  }

  async listGroups(contextId: string): Promise<TaskGroup[]> {
    return (await this.readContext(contextId)).groups;
  }

  async getGroup(contextId: string, groupId: string): Promise<TaskGroup | null> {
    const groups = await this.listGroups(contextId);
    return groups.find((group) => group.id === groupId) ?? null;
  }

  async createGroup(contextId: string, input: NewTaskGroup): Promise<TaskGroup> {
    const now = this.now();
    const group: TaskGroup = {
      id: this.createId(),
      contextId,
      prompt: input.prompt,
      tasks: input.tasks.map((description) => ({
        id: this.createId(),
        description,
        completed: false,
      })),
      researchInProgress: false,
      indexId: null,
      createdAt: now,
      updatedAt: now,
    };

    await this.modify(contextId, (file) => ({ ...file, groups: [...file.groups, group] }));
    return group;
  }

  async updateGroup(
    contextId: string,
    groupId: string,
    mutate: (group: TaskGroup) => TaskGroup
  ): Promise<TaskGroup | null> {
    let updated: TaskGroup | null = null;
    await this.modify(contextId, (file) => ({
      ...file,
      groups: file.groups.map((group) => {
        if (group.id !== groupId) {
          return group;
        }
        updated = { ...mutate(group), id: group.id, contextId, updatedAt: this.now() };
        return updated;
      }),
    }));
    return updated;
  }

  /**
   * Queue a read-modify-write of one context file behind earlier ones
   */
  private async modify(contextId: string, change: (file: ContextFile) => ContextFile): Promise<void> {
    const filePath = this.contextPath(contextId);
    const previous = this.writes.get(filePath) ?? Promise.resolve();
    // an earlier failed write was already reported to its own caller
    const next = previous
      .catch(() => undefined)
      .then(async () => {
        const file = change(await this.readContext(contextId));
        await fs.mkdir(this.dataDir, { recursive: true });
        await fs.writeFile(filePath, JSON.stringify(file, null, 2), "utf-8");
      });
    this.writes.set(filePath, next);
    try {
      await next;
    } finally {
      if (this.writes.get(filePath) === next) {
        this.writes.delete(filePath);
      }
    }
  }

  private async readContext(contextId: string): Promise<ContextFile> {
    const filePath = this.contextPath(contextId);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { contextId, groups: [] };
      }
      throw error;
    }
    return ContextFileSchema.parse(JSON.parse(raw));
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
