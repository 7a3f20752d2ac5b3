import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { DEFAULT_CONFIG, createResearchServices, type TaskGroup } from "core";
import { fakeEmbeddings, fakeFetcher, fakeLLM, fakeSearch } from "core/test-utils";
import { buildApp } from "./app.js";

const SOLAR_URL = "https://example.com/solar";
const SOLAR_TEXT = "Residential solar rebates cover part of the installation cost in 2024.";

describe("research API", () => {
  let tmpDir: string;
  let app: FastifyInstance;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "research-api-"));
    app = await buildApp({
      logger: false,
      createServices: (logger) =>
        createResearchServices({
          config: DEFAULT_CONFIG,
          logger,
          baseDir: tmpDir,
          llm: fakeLLM({
            scoreText: vi.fn(async () => "0.9"),
            evaluateContent: vi.fn(
              async () => '{"is_relevant": true, "relevance_score": 0.9, "reason": "on topic"}'
            ),
          }),
          embeddings: fakeEmbeddings(),
          search: fakeSearch([
            [{ title: "Solar rebates", url: SOLAR_URL, description: "Rebates for solar panels" }],
          ]),
          fetcher: fakeFetcher({ [SOLAR_URL]: SOLAR_TEXT }),
        }),
    });
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createGroup(tasks: string[]): Promise<TaskGroup> {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research/ctx1/groups",
      payload: { prompt: "solar incentives", tasks },
    });
    expect(res.statusCode).toBe(201);
    return res.json<{ group: TaskGroup }>().group;
  }

  it("reports health", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it("creates and reads a task group", async () => {
    const group = await createGroup(["find rebates", "find tax credits"]);

    expect(group.tasks.map((task) => task.description)).toEqual([
      "find rebates",
      "find tax credits",
    ]);
    expect(group.researchInProgress).toBe(false);

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/research/ctx1/groups/${group.id}`,
    });
    expect(res.statusCode).toBe(200);
    expect(res.json<TaskGroup>().id).toBe(group.id);

    const list = await app.inject({ method: "GET", url: "/api/v1/research/ctx1/groups" });
    expect(list.json<{ groups: TaskGroup[] }>().groups).toHaveLength(1);
  });

  it("rejects invalid group bodies and context ids", async () => {
    const noTasks = await app.inject({
      method: "POST",
      url: "/api/v1/research/ctx1/groups",
      payload: { prompt: "solar incentives", tasks: [] },
    });
    expect(noTasks.statusCode).toBe(400);
    expect(noTasks.json().error.code).toBe("invalid_request");

    const badContext = await app.inject({
      method: "POST",
      url: "/api/v1/research/bad.context/groups",
      payload: { prompt: "solar incentives", tasks: ["find rebates"] },
    });
    expect(badContext.statusCode).toBe(400);
    expect(badContext.json().error.code).toBe("invalid_request");
  });

  it("returns 404 for unknown groups", async () => {
    const res = await app.inject({ method: "GET", url: "/api/v1/research/ctx1/groups/missing" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: "not_found", message: "Task group not found" },
    });

    const start = await app.inject({
      method: "POST",
      url: "/api/v1/research/ctx1/groups/missing/start",
    });
    expect(start.statusCode).toBe(404);
    expect(start.json()).toEqual({ success: false, error: "Task group not found" });
  });

  it("runs a job, reports progress and answers questions from the group index", async () => {
    const group = await createGroup(["find rebates"]);
    const [task] = group.tasks;

    const start = await app.inject({
      method: "POST",
      url: `/api/v1/research/ctx1/groups/${group.id}/start`,
    });
    expect(start.statusCode).toBe(202);
    expect(start.json()).toEqual({ success: true });

    await app.research.jobs.whenAllIdle();

    const progress = await app.inject({
      method: "GET",
      url: `/api/v1/research/ctx1/groups/${group.id}/progress`,
    });
    expect(progress.json()).toEqual({
      inProgress: false,
      completed: true,
      completedTasks: [task.id],
      currentTaskIndex: null,
      indexId: `idx_ctx1_${group.id}`,
    });

    const again = await app.inject({
      method: "POST",
      url: `/api/v1/research/ctx1/groups/${group.id}/start`,
    });
    expect(again.statusCode).toBe(400);
    expect(again.json()).toEqual({
      success: false,
      error: "All tasks in this group are completed",
    });

    const query = await app.inject({
      method: "POST",
      url: `/api/v1/research/ctx1/groups/${group.id}/query`,
      payload: { query: "Which rebates exist?" },
    });
    expect(query.statusCode).toBe(200);
    const answer = query.json<{ success: boolean; response: string; sources: { url: string }[] }>();
    expect(answer.success).toBe(true);
    expect(answer.response).toBe("synthesized answer");
    expect(answer.sources.map((source) => source.url)).toEqual([SOLAR_URL]);

    const empty = await app.inject({
      method: "POST",
      url: `/api/v1/research/ctx1/groups/${group.id}/query`,
      payload: { query: "  " },
    });
    expect(empty.statusCode).toBe(400);
    expect(empty.json()).toEqual({ success: false, error: "Query must not be empty" });
  });

  it("refuses to query a group without an index", async () => {
    const group = await createGroup(["find rebates"]);

    const res = await app.inject({
      method: "POST",
      url: `/api/v1/research/ctx1/groups/${group.id}/query`,
      payload: { query: "Which rebates exist?" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: "No research index for this group yet",
    });
  });

  it("lists and queries indices", async () => {
    const group = await createGroup(["find rebates"]);
    await app.inject({ method: "POST", url: `/api/v1/research/ctx1/groups/${group.id}/start` });
    await app.research.jobs.whenAllIdle();

    const list = await app.inject({ method: "GET", url: "/api/v1/indices" });
    const indices = list.json<{ indices: { id: string; task: string; numDocuments: number }[] }>()
      .indices;
    expect(indices).toHaveLength(1);
    expect(indices[0]).toMatchObject({
      id: `idx_ctx1_${group.id}`,
      task: "solar incentives",
      numDocuments: 1,
    });

    const query = await app.inject({
      method: "POST",
      url: `/api/v1/indices/idx_ctx1_${group.id}/query`,
      payload: { query: "solar rebates", topK: 2 },
    });
    expect(query.statusCode).toBe(200);
    expect(query.json()).toMatchObject({
      response: "synthesized answer",
      task: "solar incentives",
      indexId: `idx_ctx1_${group.id}`,
    });

    const missing = await app.inject({
      method: "POST",
      url: "/api/v1/indices/nope/query",
      payload: { query: "solar rebates" },
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().error.code).toBe("not_found");
  });

  it("lists and evicts cache entries", async () => {
    const group = await createGroup(["find rebates"]);
    await app.inject({ method: "POST", url: `/api/v1/research/ctx1/groups/${group.id}/start` });
    await app.research.jobs.whenAllIdle();

    const list = await app.inject({ method: "GET", url: "/api/v1/cache" });
    const entries = list.json<{ entries: { url: string; size: number }[] }>().entries;
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ url: SOLAR_URL, size: SOLAR_TEXT.length });

    const old = await app.inject({ method: "DELETE", url: "/api/v1/cache?olderThanDays=30" });
    expect(old.json()).toEqual({ removed: 0 });

    const all = await app.inject({ method: "DELETE", url: "/api/v1/cache" });
    expect(all.json()).toEqual({ removed: 1 });
  });

  it("shapes unknown routes as not_found errors", async () => {
    const res = await app.inject({ method: "GET", url: "/api/v1/nothing" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: "not_found", message: "Route GET /api/v1/nothing not found" },
    });
  });
});
