import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { RetrievalIndexStore } from "./index-store";
import { fakeEmbeddings, fakeLLM } from "../../test-utils/fakes";
import { createSilentLogger } from "../../logging/logger";
import { DEFAULT_CONFIG } from "../research-engine/config";
import type { EvidenceDocument } from "../../models/evidence";
import type { EmbeddingProvider } from "../../interfaces/content-sources";
import type { LLMProvider } from "../../interfaces/llm-provider";

function doc(name: string, text = `${name} text`): EvidenceDocument {
  return {
    text,
    url: `https://example.org/${name}`,
    title: `${name} title`,
    linkRelevanceScore: 0.9,
    contentRelevanceScore: 0.8,
    cacheRef: `${name}.json`,
  };
}

describe("RetrievalIndexStore", () => {
  let dir: string;
  let ids: string[];

  function makeStore(embeddings: EmbeddingProvider = fakeEmbeddings(), llm: LLMProvider = fakeLLM()) {
    return new RetrievalIndexStore({
      dir,
      embeddings,
      llm,
      config: DEFAULT_CONFIG.index,
      logger: createSilentLogger(),
      createId: () => ids.shift() ?? "fallback",
      now: () => new Date("2024-06-01T00:00:00.000Z"),
    });
  }

  async function readRecord(id: string): Promise<unknown> {
    return JSON.parse(await fs.readFile(path.join(dir, `index_${id}`, "metadata.json"), "utf-8"));
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "retrieval-index-"));
    ids = ["abc12345", "def67890"];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("create", () => {
    it("writes the metadata record and storage files", async () => {
      const store = makeStore();

      const id = await store.create("solar incentives", [doc("alpha"), doc("beta")], {
        research_id: "ctx-1",
      });

      expect(id).toBe("abc12345");
      expect(await readRecord("abc12345")).toEqual({
        id: "abc12345",
        task: "solar incentives",
        createdAt: "2024-06-01T00:00:00.000Z",
        numDocuments: 2,
        cacheReferences: [
          { url: "https://example.org/alpha", cacheFile: "alpha.json", title: "alpha title" },
          { url: "https://example.org/beta", cacheFile: "beta.json", title: "beta title" },
        ],
        metadata: { research_id: "ctx-1" },
      });
      const files = await fs.readdir(path.join(dir, "index_abc12345"));
      expect(files.sort()).toEqual(["docstore.json", "metadata.json", "vector_store.json"]);
    });

    it("returns null when no document has text", async () => {
      expect(await makeStore().create("solar", [doc("empty", "   ")])).toBeNull();
    });

    it("uses the given id", async () => {
      expect(await makeStore().create("solar", [doc("alpha")], {}, "idx_ctx_grp")).toBe(
        "idx_ctx_grp"
      );
    });
  });

  describe("update", () => {
    it("adds only documents whose url is not indexed yet", async () => {
      const store = makeStore();
      const id = await store.create("solar", [doc("alpha")]);
      expect(id).toBe("abc12345");

      expect(await store.update("abc12345", "wind", [doc("alpha"), doc("beta")])).toBe(true);
      expect(await store.update("abc12345", "wind", [doc("alpha"), doc("beta")])).toBe(true);

      const loaded = await store.load("abc12345");
      expect(loaded?.record.numDocuments).toBe(2);
      expect(loaded?.record.task).toBe("solar + wind");
      expect(loaded?.record.updatedAt).toBe("2024-06-01T00:00:00.000Z");
      expect(loaded?.index.size).toBe(2);
    });

    it("creates a missing index under the requested id", async () => {
      const store = makeStore();

      expect(await store.update("idx_ctx_grp", "solar", [doc("alpha")])).toBe(true);
      expect((await store.load("idx_ctx_grp"))?.record.task).toBe("solar");
    });

    it("rejects an empty document list", async () => {
      expect(await makeStore().update("abc12345", "solar", [])).toBe(false);
    });
  });

  describe("query", () => {
    const vectors: Record<string, number[]> = {
      question: [1, 0],
      "alpha text": [0.1, 1],
      "beta text": [0.2, 1],
      "gamma text": [0.3, 1],
      "delta text": [0.4, 1],
      "exact text": [1, 0],
    };
    const embedByTable = () => fakeEmbeddings((text) => vectors[text] ?? [0, 1]);

    it("falls back to the best three chunks when none reach the threshold", async () => {
      const synthesizeAnswer = vi.fn().mockResolvedValue("Not enough information.");
      const store = makeStore(embedByTable(), fakeLLM({ synthesizeAnswer }));
      await store.create("solar", [doc("alpha"), doc("beta"), doc("gamma"), doc("delta")]);

      const result = await store.query("abc12345", "question", 5, 0.6);

      expect(result?.sources.map((source) => source.url)).toEqual([
        "https://example.org/delta",
        "https://example.org/gamma",
        "https://example.org/beta",
      ]);
      expect(result?.response).toBe("Not enough information.");
      expect(synthesizeAnswer).toHaveBeenCalledWith(
        "delta text\n\n---\n\ngamma text\n\n---\n\nbeta text",
        "question"
      );
    });

    it("keeps only chunks at or above the threshold", async () => {
      const store = makeStore(embedByTable());
      await store.create("solar", [doc("alpha"), doc("exact")]);

      const result = await store.query("abc12345", "question");

      expect(result).toEqual({
        query: "question",
        response: "synthesized answer",
        sources: [
          {
            content: "exact text",
            score: 1,
            url: "https://example.org/exact",
            title: "exact title",
            cacheRef: "exact.json",
          },
        ],
        task: "solar",
        indexId: "abc12345",
      });
    });

    it("returns null for an unknown index", async () => {
      expect(await makeStore().query("missing", "question")).toBeNull();
    });

    it("returns null when the answer cannot be generated", async () => {
      const store = makeStore(
        embedByTable(),
        fakeLLM({ synthesizeAnswer: vi.fn().mockRejectedValue(new Error("quota exceeded")) })
      );
      await store.create("solar", [doc("exact")]);

      expect(await store.query("abc12345", "question")).toBeNull();
    });
  });

  it("lists index records", async () => {
    const store = makeStore();
    await store.create("solar", [doc("alpha")]);
    await store.create("wind", [doc("beta")]);

    const records = await store.list();

    expect(records.map((record) => record.id).sort()).toEqual(["abc12345", "def67890"]);
  });

  it("creates the unified index once", async () => {
    const store = makeStore();

    expect(await store.getOrCreateUnified("unified")).toBe("unified");
    expect(await store.getOrCreateUnified("unified")).toBe("unified");

    const loaded = await store.load("unified");
    expect(loaded?.record).toMatchObject({
      task: "Unified retrieval index",
      numDocuments: 0,
      metadata: { type: "unified" },
    });
    expect(loaded?.index.size).toBe(0);
  });
});
