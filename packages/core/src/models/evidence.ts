/**
 * Evidence data models
 *
 * Types for search candidates, content evaluations and the documents
 * that end up in a retrieval index.
 */

/**
 * Search result after link-level scoring. Ephemeral, one per search hit.
 */
export interface CandidateResult {
  title: string;
  url: string;
  description: string;
  linkRelevanceScore: number; // 0-1
}

/**
 * Evaluation of one section of a long page
 */
export interface SectionEvaluation {
  sectionIndex: number;
  isRelevant: boolean;
  relevanceScore: number;
  reason: string;
  keyPoints: string[];
}

/**
 * Preview of a section that passed evaluation
 */
export interface RelevantSection {
  sectionIndex: number;
  preview: string; // first 500 chars, "..." appended when cut
  relevanceScore: number;
}

/**
 * Whole-page evaluation from a single model call
 */
export interface SimpleEvaluation {
  kind: "simple";
  isRelevant: boolean;
  relevanceScore: number;
  reason: string;
  keyPoints: string[];
}

/**
 * Long page evaluated section by section.
 * Relevant if any section is; relevanceScore is the max section score.
 */
export interface SectionedEvaluation {
  kind: "sectioned";
  isRelevant: boolean;
  relevanceScore: number;
  reason: string;
  summary: string;
  sections: SectionEvaluation[];
  relevantSections: RelevantSection[];
}

export type ContentEvaluation = SimpleEvaluation | SectionedEvaluation;

/**
 * Key points gathered from an evaluation, whatever its kind
 */
export function keyPointsOf(evaluation: ContentEvaluation): string[] {
  switch (evaluation.kind) {
    case "simple":
      return evaluation.keyPoints;
    case "sectioned":
      return evaluation.sections
        .filter((section) => section.isRelevant)
        .flatMap((section) => section.keyPoints);
  }
}

/**
 * A page that passed both relevance gates during a research run
 */
export interface AcceptedResult extends CandidateResult {
  content: string; // cleaned text
  evaluation: ContentEvaluation;
  cacheRef: string; // cache file name, <md5>.json
  indexId?: string; // set once persisted into a retrieval index
}

/**
 * Document as stored in a retrieval index. Immutable once indexed.
 */
export interface EvidenceDocument {
  text: string;
  url: string;
  title: string;
  linkRelevanceScore: number;
  contentRelevanceScore: number;
  cacheRef: string;
}

export function toEvidenceDocument(result: AcceptedResult): EvidenceDocument {
  return {
    text: result.content,
    url: result.url,
    title: result.title,
    linkRelevanceScore: result.linkRelevanceScore,
    contentRelevanceScore: result.evaluation.relevanceScore,
    cacheRef: result.cacheRef,
  };
}
