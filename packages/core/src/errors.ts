/**
 * Error taxonomy for the research pipeline
 *
 * Nothing in the pipeline is process-fatal: each failure class below is
 * caught at a well-defined boundary and turned into a skip, a neutral
 * score or a partial result.
 */

/**
 * Network or extraction error while retrieving a page.
 * Caught by the content cache; the page resolves to empty content.
 */
export class FetchFailure extends Error {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchFailure";
    this.url = url;
  }
}

/**
 * Create/update/query error inside the retrieval index store.
 * Surfaced to callers as `null` or `false`, never thrown across the store boundary.
 */
export class IndexFailure extends Error {
  readonly indexId: string | undefined;

  constructor(message: string, indexId?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexFailure";
    this.indexId = indexId;
  }
}

/**
 * Failure of a single task inside a background research job.
 * The task stays open and the job moves on to the next one.
 */
export class JobFailure extends Error {
  readonly taskId: string;

  constructor(taskId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JobFailure";
    this.taskId = taskId;
  }
}

/**
 * research-config.yaml parsed but did not match the expected shape
 */
export class ConfigError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

/**
 * A model response that could not be decoded into the expected score/JSON shape.
 *
 * This is a value, not an exception: decoders return it and evaluators fold it
 * into a neutral or "irrelevant" default.
 */
export interface EvaluationParseFailure {
  kind: "parse-failure";
  reason: string;
  raw: string;
}

export function parseFailure(reason: string, raw: string): EvaluationParseFailure {
  return { kind: "parse-failure", reason, raw };
}

export function isParseFailure(value: unknown): value is EvaluationParseFailure {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "parse-failure"
  );
}

/**
 * Render any thrown value as a message string
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
