import { z } from "zod";
import { parseFailure, type EvaluationParseFailure } from "../../errors";

/**
 * Zod schemas and decoders for model replies
 *
 * Every decoder returns either the decoded value or a single
 * EvaluationParseFailure; callers fold the failure into a default.
 */

export const NEUTRAL_SCORE = 0.5;

const NUMERIC_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

// Batch link scoring reply
export const BatchScoresSchema = z.object({
  scores: z.array(z.unknown()),
});

// Content relevance reply; absent fields take defaults
export const ContentVerdictSchema = z.object({
  is_relevant: z.boolean().default(false),
  relevance_score: z.union([z.number(), z.string()]).default(0),
  reason: z.string().default("No reason provided"),
  key_points: z.array(z.string()).default([]),
});

export type ContentVerdictPayload = z.infer<typeof ContentVerdictSchema>;

export interface ContentVerdict {
  isRelevant: boolean;
  relevanceScore: number;
  reason: string;
  keyPoints: string[];
}

export const MAX_KEY_POINTS = 5;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) {
    return NEUTRAL_SCORE;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Decode a bare numeric reply such as "0.8" into a clamped score
 */
export function scoreFromText(raw: string): number | EvaluationParseFailure {
  const text = raw.trim();
  if (!NUMERIC_PATTERN.test(text)) {
    return parseFailure("reply is not a number", raw);
  }
  return clampScore(Number(text));
}

type JsonDecode = { ok: true; value: unknown } | { ok: false; failure: EvaluationParseFailure };

function parseJson(raw: string): JsonDecode {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return {
      ok: false,
      failure: parseFailure(
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        raw
      ),
    };
  }
}

/**
 * Decode `{"scores": [...]}` holding exactly `expected` entries.
 * Entries that are not numeric become the neutral score.
 */
export function decodeBatchScores(
  raw: string,
  expected: number
): number[] | EvaluationParseFailure {
  const json = parseJson(raw);
  if (!json.ok) {
    return json.failure;
  }

  const parsed = BatchScoresSchema.safeParse(json.value);
  if (!parsed.success) {
    return parseFailure("reply has no scores array", raw);
  }
  if (parsed.data.scores.length !== expected) {
    return parseFailure(
      `expected ${expected} scores, got ${parsed.data.scores.length}`,
      raw
    );
  }

  return parsed.data.scores.map((entry) => {
    if (typeof entry === "number") {
      return clampScore(entry);
    }
    if (typeof entry === "string") {
      const score = scoreFromText(entry);
      return typeof score === "number" ? score : NEUTRAL_SCORE;
    }
    return NEUTRAL_SCORE;
  });
}

/**
 * Decode a content relevance reply
 */
export function decodeContentVerdict(raw: string): ContentVerdict | EvaluationParseFailure {
  const json = parseJson(raw);
  if (!json.ok) {
    return json.failure;
  }

  const parsed = ContentVerdictSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return parseFailure(
      issue ? `${issue.path.join(".") || "reply"}: ${issue.message}` : "unexpected shape",
      raw
    );
  }

  const payload = parsed.data;
  let relevanceScore: number;
  if (typeof payload.relevance_score === "number") {
    relevanceScore = clampScore(payload.relevance_score);
  } else {
    const score = scoreFromText(payload.relevance_score);
    if (typeof score !== "number") {
      return parseFailure("relevance_score is not a number", raw);
    }
    relevanceScore = score;
  }

  return {
    isRelevant: payload.is_relevant,
    relevanceScore,
    reason: payload.reason,
    keyPoints: payload.key_points.slice(0, MAX_KEY_POINTS),
  };
}
