/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml
 * Provides strongly typed access to all configurable settings.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../../errors";
import type { Logger } from "../../logging/logger";

// =============================================================================
// Schema and Type Definitions
// =============================================================================

/**
 * LLM model configuration for a specific step
 */
const ModelConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  responseFormat: z.enum(["json_object", "text"]).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const LLMConfigSchema = z.object({
  provider: z.literal("openai"),
  models: z.object({
    queryGeneration: ModelConfigSchema,
    linkRelevance: ModelConfigSchema,
    linkRelevanceBatch: ModelConfigSchema,
    contentRelevance: ModelConfigSchema,
    contentCleaning: ModelConfigSchema,
    answerSynthesis: ModelConfigSchema,
    summarization: ModelConfigSchema,
  }),
  embeddings: z.object({
    model: z.string().min(1),
    dimensions: z.number().int().positive(),
    batchSize: z.number().int().positive(),
  }),
});

const SearchConfigSchema = z.object({
  provider: z.literal("brave"),
  resultsPerQuery: z.number().int().min(1).max(20),
  safeSearch: z.enum(["off", "moderate", "strict"]),
  maxRetries: z.number().int().min(1),
  minRequestIntervalMs: z.number().int().min(0),
});

const ExtractionConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  userAgent: z.string(),
  maxRetries: z.number().int().min(0),
  retryDelayMs: z.number().int().min(0),
});

const CacheConfigSchema = z.object({
  dir: z.string().min(1),
  persistEmptyContent: z.boolean(),
});

const CleanerConfigSchema = z.object({
  blockSize: z.number().int().positive(),
  maxWorkers: z.number().int().positive(),
  maxOverlapWindow: z.number().int().positive(),
  minOverlap: z.number().int().min(0),
});

const RelevanceConfigSchema = z.object({
  linkThreshold: z.number().min(0).max(1),
  contentThreshold: z.number().min(0).max(1),
  sectionSize: z.number().int().positive(),
  maxContentLength: z.number().int().positive(),
  batchLinkScoring: z.boolean(),
});

const ResearchPipelineConfigSchema = z.object({
  maxCycles: z.number().int().positive(),
  maxResults: z.number().int().positive(),
  summaryMaxLength: z.number().int().positive(),
  minSummaryLength: z.number().int().min(0),
});

const IndexConfigSchema = z.object({
  dir: z.string().min(1),
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().min(0),
  topK: z.number().int().positive(),
  scoreThreshold: z.number().min(-1).max(1),
  fallbackCount: z.number().int().positive(),
});

const JobsConfigSchema = z.object({
  dataDir: z.string().min(1),
  taskDelayMs: z.number().int().min(0),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const ResearchConfigSchema = z.object({
  llm: LLMConfigSchema,
  search: SearchConfigSchema,
  extraction: ExtractionConfigSchema,
  cache: CacheConfigSchema,
  cleaner: CleanerConfigSchema,
  relevance: RelevanceConfigSchema,
  research: ResearchPipelineConfigSchema,
  index: IndexConfigSchema,
  jobs: JobsConfigSchema,
  logging: LoggingConfigSchema,
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type ModelStep = keyof LLMConfig["models"];
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type CleanerConfig = z.infer<typeof CleanerConfigSchema>;
export type RelevanceConfig = z.infer<typeof RelevanceConfigSchema>;
export type ResearchPipelineConfig = z.infer<typeof ResearchPipelineConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type JobsConfig = z.infer<typeof JobsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete research configuration
 */
export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

// =============================================================================
// Default Configuration
// =============================================================================

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = {
  llm: {
    provider: "openai",
    models: {
      queryGeneration: {
        model: "gpt-4o-mini",
        temperature: 0.3,
        responseFormat: "text",
        maxTokens: 100,
      },
      linkRelevance: {
        model: "gpt-4o-mini",
        temperature: 0.3,
        responseFormat: "text",
        maxTokens: 5,
      },
      linkRelevanceBatch: {
        model: "gpt-4o-mini",
        temperature: 0.3,
        responseFormat: "json_object",
        maxTokens: 200,
      },
      contentRelevance: {
        model: "gpt-4o-mini",
        temperature: 0.3,
        responseFormat: "json_object",
        maxTokens: 1024,
      },
      contentCleaning: {
        model: "gpt-4o-mini",
        temperature: 0.3,
        responseFormat: "text",
        maxTokens: 2048,
      },
      answerSynthesis: {
        model: "gpt-4o-mini",
        temperature: 0.3,
        responseFormat: "text",
      },
      summarization: {
        model: "gpt-4o-mini",
        temperature: 0.5,
        responseFormat: "text",
        maxTokens: 1024,
      },
    },
    embeddings: {
      model: "text-embedding-3-small",
      dimensions: 1536,
      batchSize: 64,
    },
  },
  search: {
    provider: "brave",
    resultsPerQuery: 10,
    safeSearch: "moderate",
    maxRetries: 3,
    minRequestIntervalMs: 1000,
  },
  extraction: {
    timeoutMs: 10000,
    userAgent: "Mozilla/5.0 (compatible; EvidenceResearchBot/1.0)",
    maxRetries: 2,
    retryDelayMs: 1000,
  },
  cache: {
    dir: "cache",
    persistEmptyContent: true,
  },
  cleaner: {
    blockSize: 5000,
    maxWorkers: 5,
    maxOverlapWindow: 100,
    minOverlap: 10,
  },
  relevance: {
    linkThreshold: 0.7,
    contentThreshold: 0.7,
    sectionSize: 2000,
    maxContentLength: 8000,
    batchLinkScoring: false,
  },
  research: {
    maxCycles: 3,
    maxResults: 3,
    summaryMaxLength: 10000,
    minSummaryLength: 50,
  },
  index: {
    dir: "output/rag",
    chunkSize: 512,
    chunkOverlap: 50,
    topK: 5,
    scoreThreshold: 0.6,
    fallbackCount: 3,
  },
  jobs: {
    dataDir: "output/research",
    taskDelayMs: 1000,
  },
  logging: {
    level: "info",
  },
};

// =============================================================================
// Configuration Loader
// =============================================================================

let cachedConfig: ResearchConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
export function findConfigFile(startDir?: string): string | null {
  const filename = "research-config.yaml";
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, filename);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain values, with source taking precedence
 */
export function deepMerge(target: unknown, source: unknown): unknown {
  if (!isPlainObject(target) || !isPlainObject(source)) {
    return source === undefined ? target : source;
  }

  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    result[key] = deepMerge(target[key], sourceValue);
  }
  return result;
}

/**
 * Validate a merged configuration object, throwing ConfigError on mismatch
 */
function validateConfig(raw: unknown, filePath: string | null): ResearchConfig {
  const parsed = ResearchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid research configuration: ${issues}`, filePath);
  }
  return parsed.data;
}

/**
 * Load configuration from YAML file
 *
 * A missing or unreadable file falls back to DEFAULT_CONFIG. A file that
 * parses but fails validation throws ConfigError.
 */
export function loadConfig(customPath?: string, logger?: Logger): ResearchConfig {
  // Return cached config if available and no custom path specified
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  const filePath = customPath || findConfigFile();

  if (!filePath) {
    logger?.warn("research-config.yaml not found, using default configuration");
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  let rawConfig: unknown;
  try {
    const fileContents = fs.readFileSync(filePath, "utf8");
    rawConfig = yaml.load(fileContents);
  } catch (error) {
    logger?.error("Error loading research config, using defaults", {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  // Merge with defaults to ensure all fields are present
  const config = validateConfig(deepMerge(DEFAULT_CONFIG, rawConfig ?? {}), filePath);

  cachedConfig = config;
  configPath = filePath;

  logger?.info("Loaded research config", { path: filePath });
  return config;
}

/**
 * Forget the loaded configuration; the next loadConfig reads the file again
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Override specific configuration values on top of a base configuration,
 * validating the result
 */
export function withConfigOverrides(
  overrides: DeepPartial<ResearchConfig>,
  base: ResearchConfig = DEFAULT_CONFIG
): ResearchConfig {
  return validateConfig(deepMerge(base, overrides), null);
}
