/**
 * Content-level relevance
 *
 * Judges fetched page text against the task. Long pages are split into
 * sections on paragraph or sentence boundaries and judged section by
 * section; the page is relevant when any section is.
 */

import type { LLMProvider } from "../../interfaces/llm-provider";
import type {
  ContentEvaluation,
  RelevantSection,
  SectionEvaluation,
  SimpleEvaluation,
} from "../../models/evidence";
import { describeError, isParseFailure } from "../../errors";
import type { Logger } from "../../logging/logger";
import type { RelevanceConfig } from "../research-engine/config";
import { decodeContentVerdict } from "./schemas";

const TRUNCATION_MARKER = "\n...[content truncated]...";
const PREVIEW_LENGTH = 500;

function irrelevant(reason: string): SimpleEvaluation {
  return { kind: "simple", isRelevant: false, relevanceScore: 0, reason, keyPoints: [] };
}

/**
 * Split content into sections of at most `size` characters.
 *
 * A section that would end mid-text is cut after the last blank line, or
 * failing that after the last ". ", provided the break lies past half the
 * section. Sections are trimmed.
 */
export function splitSections(content: string, size: number): string[] {
  const sections: string[] = [];
  const half = Math.floor(size / 2);
  let start = 0;

  while (start < content.length) {
    let end = start + size;

    if (end < content.length) {
      const paragraphEnd = content.lastIndexOf("\n\n", end - 2);
      const sentenceEnd = content.lastIndexOf(". ", end - 2);

      if (paragraphEnd > start + half) {
        end = paragraphEnd + 2;
      } else if (sentenceEnd > start + half) {
        end = sentenceEnd + 2;
      }
    }

    sections.push(content.slice(start, end).trim());
    start = end;
  }

  return sections;
}

export class ContentRelevanceEvaluator {
  constructor(
    private readonly llm: LLMProvider,
    private readonly config: Pick<RelevanceConfig, "sectionSize" | "maxContentLength">,
    private readonly logger: Logger
  ) {}

  /**
   * Evaluate content with a single model call
   */
  async evaluate(task: string, content: string): Promise<SimpleEvaluation> {
    if (!task.trim() || !content.trim()) {
      this.logger.warn("Missing task or content for relevance evaluation");
      return irrelevant("missing task or content");
    }

    let preview = content;
    if (content.length > this.config.maxContentLength) {
      preview = content.slice(0, this.config.maxContentLength) + TRUNCATION_MARKER;
      this.logger.info("Content truncated for evaluation", {
        from: content.length,
        to: this.config.maxContentLength,
      });
    }

    let raw: string;
    try {
      raw = await this.llm.evaluateContent(task, preview);
    } catch (error) {
      this.logger.error("Content relevance call failed", { error: describeError(error) });
      return irrelevant(`evaluation failed: ${describeError(error)}`);
    }

    const verdict = decodeContentVerdict(raw);
    if (isParseFailure(verdict)) {
      this.logger.warn("Could not parse content relevance reply", { reason: verdict.reason });
      return irrelevant(`could not parse evaluation: ${verdict.reason}`);
    }

    this.logger.info("Content evaluated", {
      relevanceScore: verdict.relevanceScore,
      isRelevant: verdict.isRelevant,
    });
    return { kind: "simple", ...verdict };
  }

  /**
   * Evaluate long content section by section
   */
  async evaluateSections(
    task: string,
    content: string,
    sectionSize: number = this.config.sectionSize
  ): Promise<ContentEvaluation> {
    if (!content || content.length <= sectionSize) {
      return this.evaluate(task, content);
    }

    const sections = splitSections(content, sectionSize);
    this.logger.info("Content split into sections", { sections: sections.length });

    const evaluations: SectionEvaluation[] = [];
    const relevantSections: RelevantSection[] = [];
    let maxScore = 0;

    for (const [sectionIndex, section] of sections.entries()) {
      const result = await this.evaluate(task, section);

      evaluations.push({
        sectionIndex,
        isRelevant: result.isRelevant,
        relevanceScore: result.relevanceScore,
        reason: result.reason,
        keyPoints: result.keyPoints,
      });
      maxScore = Math.max(maxScore, result.relevanceScore);

      if (result.isRelevant) {
        relevantSections.push({
          sectionIndex,
          preview:
            section.length > PREVIEW_LENGTH ? section.slice(0, PREVIEW_LENGTH) + "..." : section,
          relevanceScore: result.relevanceScore,
        });
      }
    }

    const isRelevant = relevantSections.length > 0;
    return {
      kind: "sectioned",
      isRelevant,
      relevanceScore: maxScore,
      reason: isRelevant
        ? "At least one section of the content is relevant to the task"
        : "No section of the content is relevant to the task",
      summary: `Content has ${relevantSections.length}/${sections.length} relevant sections`,
      sections: evaluations,
      relevantSections,
    };
  }
}
