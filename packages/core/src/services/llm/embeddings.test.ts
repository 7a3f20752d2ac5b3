import { describe, it, expect, vi } from "vitest";
import type { EmbeddingCreateParams } from "openai/resources/embeddings";
import { OpenAIEmbeddingProvider, cosineSimilarity } from "./embeddings";
import { createSilentLogger } from "../../logging/logger";

describe("OpenAIEmbeddingProvider", () => {
  it("batches requests and restores input order", async () => {
    const create = vi.fn(async (body: EmbeddingCreateParams) => {
      const input: unknown[] = Array.isArray(body.input) ? body.input : [body.input];
      const data = input.map((text, index) => ({ embedding: [String(text).length], index }));
      return { data: data.reverse() };
    });
    const provider = new OpenAIEmbeddingProvider({
      config: { model: "text-embedding-3-small", dimensions: 1536, batchSize: 2 },
      logger: createSilentLogger(),
      client: { embeddings: { create } },
    });

    const vectors = await provider.embed(["a", "bb", "ccc"]);

    expect(vectors).toEqual([[1], [2], [3]]);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[1][0].input).toEqual(["ccc"]);
  });

  it("skips the API for no input", async () => {
    const create = vi.fn();
    const provider = new OpenAIEmbeddingProvider({
      config: { model: "text-embedding-3-small", dimensions: 1536, batchSize: 2 },
      logger: createSilentLogger(),
      client: { embeddings: { create } },
    });

    expect(await provider.embed([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("requires a client or an API key", () => {
    expect(
      () =>
        new OpenAIEmbeddingProvider({
          config: { model: "text-embedding-3-small", dimensions: 1536, batchSize: 2 },
          logger: createSilentLogger(),
        })
    ).toThrow("OpenAIEmbeddingProvider needs a client or an API key");
  });
});

describe("cosineSimilarity", () => {
  it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("is 0 when a vector has no magnitude", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow("Vector length mismatch: 1 vs 2");
  });
});
