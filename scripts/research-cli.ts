/**
 * Research CLI helpers: argument parsing and plain-text output formatting
 */

import {
  keyPointsOf,
  type CacheListing,
  type IndexRecord,
  type QueryResult,
  type ResearchRunResult,
} from "../packages/core/src";

export interface CliOptions {
  task?: string;
  maxResults?: number;
  maxCycles?: number;
  noIndex: boolean;
  queryIndex?: string;
  listIndices: boolean;
  listCache: boolean;
  clearCache: boolean;
  clearOldCache?: number;
  summarize?: string;
  output?: string;
  help: boolean;
}

export const USAGE = `Usage:
  tsx scripts/research.ts "<task>" [options]
  tsx scripts/research.ts "<question>" --query-index=<ID>

Options:
  --max-results=N        Stop after N relevant results
  --max-cycles=N         Run at most N search cycles
  --no-index             Do not store results in a retrieval index
  --query-index=ID       Ask the question of retrieval index ID
  --list-indices         List retrieval indices
  --list-cache           List cached pages
  --clear-cache          Remove every cached page
  --clear-old-cache=DAYS Remove cached pages at least DAYS days old
  --summarize=URL        Summarize the content of URL
  --output=FILE          Write the output to FILE instead of stdout
  --help                 Show this message`;

const FLAGS = new Set(["--no-index", "--list-indices", "--list-cache", "--clear-cache", "--help"]);
const VALUE_OPTIONS = new Set([
  "--max-results",
  "--max-cycles",
  "--query-index",
  "--clear-old-cache",
  "--summarize",
  "--output",
]);

function parseCount(name: string, value: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} expects an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse `process.argv.slice(2)`. Options take their value as `--name=value`.
 *
 * @throws Error on unknown options or malformed values
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    noIndex: false,
    listIndices: false,
    listCache: false,
    clearCache: false,
    help: false,
  };
  const positional: string[] = [];

  for (const arg of argv) {
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    if (FLAGS.has(name)) {
      if (value !== undefined) {
        throw new Error(`${name} does not take a value`);
      }
    } else if (VALUE_OPTIONS.has(name)) {
      if (!value) {
        throw new Error(`${name} requires a value (${name}=...)`);
      }
    } else {
      throw new Error(`Unknown option: ${name}`);
    }

    switch (name) {
      case "--no-index":
        options.noIndex = true;
        break;
      case "--list-indices":
        options.listIndices = true;
        break;
      case "--list-cache":
        options.listCache = true;
        break;
      case "--clear-cache":
        options.clearCache = true;
        break;
      case "--help":
        options.help = true;
        break;
      case "--max-results":
        options.maxResults = parseCount(name, value ?? "", 1);
        break;
      case "--max-cycles":
        options.maxCycles = parseCount(name, value ?? "", 1);
        break;
      case "--clear-old-cache":
        options.clearOldCache = parseCount(name, value ?? "", 0);
        break;
      case "--query-index":
        options.queryIndex = value;
        break;
      case "--summarize":
        options.summarize = value;
        break;
      case "--output":
        options.output = value;
        break;
    }
  }

  if (positional.length > 0) {
    options.task = positional.join(" ");
  }
  return options;
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}

export function formatRunResult(result: ResearchRunResult): string {
  const lines: string[] = [];

  if (!result.success) {
    lines.push(`Research failed: ${result.error ?? "unknown error"}`, "");
  }

  if (result.relevantResults.length === 0) {
    lines.push("No relevant results found.");
  } else {
    lines.push(`Found ${result.relevantResults.length} relevant results:`, "");
    result.relevantResults.forEach((item, idx) => {
      lines.push(`${idx + 1}. ${item.title}`);
      lines.push(`   URL: ${item.url}`);
      lines.push(`   Link relevance:    ${formatScore(item.linkRelevanceScore)}`);
      lines.push(`   Content relevance: ${formatScore(item.evaluation.relevanceScore)}`);
      const keyPoints = keyPointsOf(item.evaluation);
      if (keyPoints.length > 0) {
        lines.push("   Key points:");
        for (const point of keyPoints) {
          lines.push(`   - ${point}`);
        }
      }
      lines.push("");
    });
  }

  lines.push(
    `Cycles: ${result.cyclesUsed}  Queries: ${result.queriesGenerated.length}  ` +
      `URLs visited: ${result.urlsVisited}  Fetched: ${result.urlsFetched}`
  );
  if (result.indexId) {
    lines.push(`Results stored in retrieval index ${result.indexId}`);
    lines.push(`Query it with: tsx scripts/research.ts "<question>" --query-index=${result.indexId}`);
  }
  return lines.join("\n");
}

export function formatQueryResult(result: QueryResult): string {
  const lines = [
    `Answer for: ${result.query}`,
    "-".repeat(50),
    result.response,
    "",
  ];

  if (result.sources.length === 0) {
    lines.push("No sources.");
    return lines.join("\n");
  }

  lines.push(`Sources (${result.sources.length}):`, "");
  result.sources.forEach((source, idx) => {
    const preview =
      source.content.length > 150 ? `${source.content.slice(0, 150)}...` : source.content;
    lines.push(`${idx + 1}. ${source.title} (score: ${formatScore(source.score)})`);
    lines.push(`   URL: ${source.url}`);
    lines.push(`   Cache: ${source.cacheRef || "n/a"}`);
    lines.push(`   Preview: ${preview}`);
    lines.push("");
  });
  return lines.join("\n");
}

export function formatIndexList(indices: IndexRecord[]): string {
  if (indices.length === 0) {
    return "No retrieval indices found.";
  }

  const lines = [`Retrieval indices (${indices.length}):`, ""];
  for (const index of indices) {
    lines.push(`${index.id}  ${index.task}`);
    lines.push(`   Created: ${index.createdAt}  Documents: ${index.numDocuments}`);
    if (index.updatedAt) {
      lines.push(`   Updated: ${index.updatedAt}`);
    }
  }
  return lines.join("\n");
}

export function formatCacheList(entries: CacheListing[]): string {
  if (entries.length === 0) {
    return "The cache is empty.";
  }

  const lines = [`Cached pages (${entries.length}):`, ""];
  for (const entry of entries) {
    lines.push(`${entry.url}`);
    lines.push(
      `   Fetched: ${new Date(entry.fetchedAt).toISOString()}  Size: ${entry.size} chars  File: ${entry.cacheFile}`
    );
  }
  return lines.join("\n");
}
