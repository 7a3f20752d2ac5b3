import { describe, it, expect, vi } from "vitest";
import { LinkRelevanceEvaluator } from "./link-relevance";
import { fakeLLM } from "../../test-utils/fakes";
import { createSilentLogger } from "../../logging/logger";

const candidate = {
  title: "Solar tax credits explained",
  url: "https://example.org/solar",
  description: "A guide to 2024 residential solar incentives",
};

function evaluator(llm = fakeLLM()) {
  return new LinkRelevanceEvaluator(llm, { linkThreshold: 0.7 }, createSilentLogger());
}

describe("LinkRelevanceEvaluator", () => {
  describe("scoreCandidate", () => {
    it("returns the model's score", async () => {
      const llm = fakeLLM({ scoreText: vi.fn().mockResolvedValue("0.9") });
      expect(await evaluator(llm).scoreCandidate(candidate, "solar incentives")).toBe(0.9);
    });

    it("clamps scores above one", async () => {
      const llm = fakeLLM({ scoreText: vi.fn().mockResolvedValue("2") });
      expect(await evaluator(llm).scoreCandidate(candidate, "solar incentives")).toBe(1);
    });

    it("falls back to 0.5 for a reply that is not a number", async () => {
      const llm = fakeLLM({ scoreText: vi.fn().mockResolvedValue("n/a") });
      expect(await evaluator(llm).scoreCandidate(candidate, "solar incentives")).toBe(0.5);
    });

    it("falls back to 0.5 when the provider throws", async () => {
      const llm = fakeLLM({ scoreText: vi.fn().mockRejectedValue(new Error("rate limited")) });
      expect(await evaluator(llm).scoreCandidate(candidate, "solar incentives")).toBe(0.5);
    });
  });

  describe("scoreCandidates", () => {
    const second = { ...candidate, url: "https://example.org/wind", title: "Wind farms" };

    it("uses a single batch call when the reply decodes", async () => {
      const llm = fakeLLM({ scoreBatch: vi.fn().mockResolvedValue('{"scores": [0.8, 0.3]}') });

      const results = await evaluator(llm).scoreCandidates([candidate, second], "solar");

      expect(results.map((r) => r.linkRelevanceScore)).toEqual([0.8, 0.3]);
      expect(results[1].url).toBe("https://example.org/wind");
      expect(llm.scoreText).not.toHaveBeenCalled();
    });

    it("scores each candidate when the batch has the wrong length", async () => {
      const llm = fakeLLM({
        scoreBatch: vi.fn().mockResolvedValue('{"scores": [0.8]}'),
        scoreText: vi.fn().mockResolvedValueOnce("0.6").mockResolvedValueOnce("0.1"),
      });

      const results = await evaluator(llm).scoreCandidates([candidate, second], "solar");

      expect(results.map((r) => r.linkRelevanceScore)).toEqual([0.6, 0.1]);
      expect(llm.scoreText).toHaveBeenCalledTimes(2);
    });

    it("returns nothing for no candidates", async () => {
      const llm = fakeLLM();
      expect(await evaluator(llm).scoreCandidates([], "solar")).toEqual([]);
      expect(llm.scoreBatch).not.toHaveBeenCalled();
    });
  });

  it("passes scores at or above the threshold", () => {
    const gate = evaluator();
    expect(gate.passes(0.7)).toBe(true);
    expect(gate.passes(0.69)).toBe(false);
  });
});
