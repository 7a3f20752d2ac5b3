import { describe, it, expect, vi } from "vitest";
import { ContentRelevanceEvaluator, splitSections } from "./content-relevance";
import { fakeLLM } from "../../test-utils/fakes";
import { createSilentLogger } from "../../logging/logger";
import type { LLMProvider } from "../../interfaces/llm-provider";

function evaluator(llm: LLMProvider) {
  return new ContentRelevanceEvaluator(
    llm,
    { sectionSize: 2000, maxContentLength: 8000 },
    createSilentLogger()
  );
}

describe("splitSections", () => {
  it("breaks after a blank line past half the section", () => {
    const content = "A".repeat(1200) + "\n\n" + "B".repeat(1500);
    expect(splitSections(content, 2000)).toEqual(["A".repeat(1200), "B".repeat(1500)]);
  });

  it("breaks after a sentence when there is no paragraph break", () => {
    const content = "x".repeat(1500) + ". " + "y".repeat(1000);
    expect(splitSections(content, 2000)).toEqual(["x".repeat(1500) + ".", "y".repeat(1000)]);
  });

  it("cuts at the size when no break lies past half the section", () => {
    const sections = splitSections("z".repeat(4500), 2000);
    expect(sections.map((s) => s.length)).toEqual([2000, 2000, 500]);
  });
});

describe("ContentRelevanceEvaluator", () => {
  describe("evaluate", () => {
    it("rejects missing content without calling the model", async () => {
      const llm = fakeLLM();
      const result = await evaluator(llm).evaluate("solar incentives", "");

      expect(result).toEqual({
        kind: "simple",
        isRelevant: false,
        relevanceScore: 0,
        reason: "missing task or content",
        keyPoints: [],
      });
      expect(llm.evaluateContent).not.toHaveBeenCalled();
    });

    it("truncates long content with a marker", async () => {
      const evaluateContent = vi
        .fn()
        .mockResolvedValue('{"is_relevant": true, "relevance_score": 0.9, "reason": "on topic"}');
      await evaluator(fakeLLM({ evaluateContent })).evaluate("solar", "a".repeat(9000));

      expect(evaluateContent).toHaveBeenCalledWith(
        "solar",
        "a".repeat(8000) + "\n...[content truncated]..."
      );
    });

    it("maps a well-formed reply", async () => {
      const llm = fakeLLM({
        evaluateContent: vi
          .fn()
          .mockResolvedValue(
            '{"is_relevant": true, "relevance_score": 0.85, "reason": "covers credits", "key_points": ["30% credit"]}'
          ),
      });

      expect(await evaluator(llm).evaluate("solar", "The credit is 30%.")).toEqual({
        kind: "simple",
        isRelevant: true,
        relevanceScore: 0.85,
        reason: "covers credits",
        keyPoints: ["30% credit"],
      });
    });

    it("treats an unparseable reply as irrelevant", async () => {
      const llm = fakeLLM({ evaluateContent: vi.fn().mockResolvedValue("Sure! It is relevant.") });
      const result = await evaluator(llm).evaluate("solar", "text");

      expect(result.isRelevant).toBe(false);
      expect(result.relevanceScore).toBe(0);
      expect(result.reason.startsWith("could not parse evaluation: invalid JSON")).toBe(true);
    });

    it("treats a provider error as irrelevant", async () => {
      const llm = fakeLLM({ evaluateContent: vi.fn().mockRejectedValue(new Error("boom")) });
      const result = await evaluator(llm).evaluate("solar", "text");

      expect(result.reason).toBe("evaluation failed: boom");
      expect(result.relevanceScore).toBe(0);
    });
  });

  describe("evaluateSections", () => {
    it("uses a single evaluation for short content", async () => {
      const llm = fakeLLM();
      const result = await evaluator(llm).evaluateSections("solar", "short text");

      expect(result.kind).toBe("simple");
      expect(llm.evaluateContent).toHaveBeenCalledTimes(1);
    });

    it("aggregates section verdicts", async () => {
      const llm = fakeLLM({
        evaluateContent: vi.fn(async (_task: string, content: string) =>
          content.startsWith("A")
            ? '{"is_relevant": false, "relevance_score": 0.3, "reason": "off"}'
            : '{"is_relevant": true, "relevance_score": 0.85, "reason": "on", "key_points": ["p"]}'
        ),
      });
      const content = "A".repeat(1200) + "\n\n" + "B".repeat(1500);

      const result = await evaluator(llm).evaluateSections("solar", content);

      expect(result).toEqual({
        kind: "sectioned",
        isRelevant: true,
        relevanceScore: 0.85,
        reason: "At least one section of the content is relevant to the task",
        summary: "Content has 1/2 relevant sections",
        sections: [
          { sectionIndex: 0, isRelevant: false, relevanceScore: 0.3, reason: "off", keyPoints: [] },
          { sectionIndex: 1, isRelevant: true, relevanceScore: 0.85, reason: "on", keyPoints: ["p"] },
        ],
        relevantSections: [
          { sectionIndex: 1, preview: "B".repeat(500) + "...", relevanceScore: 0.85 },
        ],
      });
    });
  });
});
