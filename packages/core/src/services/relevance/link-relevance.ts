/**
 * Link-level relevance
 *
 * Scores search results (title, description, URL) against the task before
 * anything is fetched. Malformed model output and provider errors resolve
 * to the neutral score 0.5 rather than failing the cycle.
 */

import type { LLMProvider, LinkCandidate } from "../../interfaces/llm-provider";
import type { CandidateResult } from "../../models/evidence";
import { isParseFailure } from "../../errors";
import { errorFields, type Logger } from "../../logging/logger";
import type { RelevanceConfig } from "../research-engine/config";
import { NEUTRAL_SCORE, decodeBatchScores, scoreFromText } from "./schemas";

export class LinkRelevanceEvaluator {
  constructor(
    private readonly llm: LLMProvider,
    private readonly config: Pick<RelevanceConfig, "linkThreshold">,
    private readonly logger: Logger
  ) {}

  /**
   * Score one candidate with a single model call
   */
  async scoreCandidate(candidate: LinkCandidate, task: string): Promise<number> {
    let raw: string;
    try {
      raw = await this.llm.scoreText(candidate, task);
    } catch (error) {
      this.logger.error("Link relevance call failed", {
        url: candidate.url,
        ...errorFields(error),
      });
      return NEUTRAL_SCORE;
    }

    const score = scoreFromText(raw);
    if (isParseFailure(score)) {
      this.logger.warn("Could not read link relevance score", {
        url: candidate.url,
        reason: score.reason,
        raw: score.raw,
      });
      return NEUTRAL_SCORE;
    }
    return score;
  }

  /**
   * Score several candidates with one batch call, falling back to one call
   * per candidate when the batch reply cannot be decoded
   */
  async scoreCandidates(candidates: LinkCandidate[], task: string): Promise<CandidateResult[]> {
    if (candidates.length === 0) {
      return [];
    }

    const scores =
      (await this.scoreInBatch(candidates, task)) ?? (await this.scoreEach(candidates, task));

    return candidates.map((candidate, i) => ({
      title: candidate.title,
      url: candidate.url,
      description: candidate.description,
      linkRelevanceScore: scores[i] ?? NEUTRAL_SCORE,
    }));
  }

  passes(score: number, threshold: number = this.config.linkThreshold): boolean {
    return score >= threshold;
  }

  private async scoreInBatch(candidates: LinkCandidate[], task: string): Promise<number[] | null> {
    try {
      const raw = await this.llm.scoreBatch(candidates, task);
      const decoded = decodeBatchScores(raw, candidates.length);
      if (isParseFailure(decoded)) {
        this.logger.warn("Batch relevance reply unusable, scoring individually", {
          reason: decoded.reason,
        });
        return null;
      }
      return decoded;
    } catch (error) {
      this.logger.error("Batch relevance call failed, scoring individually", errorFields(error));
      return null;
    }
  }

  private async scoreEach(candidates: LinkCandidate[], task: string): Promise<number[]> {
    const scores: number[] = [];
    for (const candidate of candidates) {
      scores.push(await this.scoreCandidate(candidate, task));
    }
    return scores;
  }
}
