/**
 * Relevance gate: link-level and content-level scoring
 */

export { LinkRelevanceEvaluator } from "./link-relevance";
export { ContentRelevanceEvaluator, splitSections } from "./content-relevance";
export {
  NEUTRAL_SCORE,
  clampScore,
  scoreFromText,
  decodeBatchScores,
  decodeContentVerdict,
  type ContentVerdict,
} from "./schemas";
