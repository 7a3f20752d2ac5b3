/**
 * Core package entry point
 *
 * Exports the research pipeline, its data models, providers, and helpers.
 */

// Models
export type { JsonValue } from "./models/json";
export type { CacheEntry, CacheListing } from "./models/cache";
export {
  keyPointsOf,
  toEvidenceDocument,
  type CandidateResult,
  type SectionEvaluation,
  type RelevantSection,
  type SimpleEvaluation,
  type SectionedEvaluation,
  type ContentEvaluation,
  type AcceptedResult,
  type EvidenceDocument,
} from "./models/evidence";
export type {
  CacheReference,
  IndexRecord,
  QuerySource,
  QueryResult,
} from "./models/retrieval-index";
export type { TaskItem, TaskGroup, NewTaskGroup } from "./models/task-group";
export {
  jobKeyToString,
  type JobKey,
  type JobState,
  type JobStatus,
  type ProgressSnapshot,
  type StartRejection,
  type StartResult,
  type GroupQueryResult,
} from "./models/research-job";

// Errors and logging
export {
  FetchFailure,
  IndexFailure,
  JobFailure,
  ConfigError,
  parseFailure,
  isParseFailure,
  describeError,
  type EvaluationParseFailure,
} from "./errors";
export {
  createLogger,
  createSilentLogger,
  fromPino,
  errorFields,
  type Logger,
  type LogFields,
  type LogLevel,
  type CreateLoggerOptions,
} from "./logging/logger";

// Provider interfaces
export * from "./interfaces";

// Services
export * from "./services/research-engine";
export * from "./services/search";
export * from "./services/brave-search";
export * from "./services/llm";
export * from "./services/relevance";
export * from "./services/content-cache";
export * from "./services/content-cleaner";
export * from "./services/retrieval-index";
export * from "./services/research-jobs";
export { HttpPageFetcher, extractReadableText } from "./services/content-extractor";

// Provider factories
export {
  createLLMProvider,
  createEmbeddingProvider,
  createSearchProvider,
  createResearchServices,
  type LLMProviderType,
  type SearchProviderType,
  type LLMProviderConfig,
  type EmbeddingProviderConfig,
  type SearchProviderConfig,
  type CreateResearchServicesOptions,
  type ResearchServices,
} from "./providers";

// Utilities
export * from "./utils";
