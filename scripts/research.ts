/**
 * Research CLI
 *
 * Runs a research task from the command line, or administers the retrieval
 * indices and the content cache the research runs produce.
 *
 * Usage:
 *   npx tsx scripts/research.ts "renewable energy incentives 2024" --max-results=3
 *   npx tsx scripts/research.ts "Which rebates exist?" --query-index=ab12cd34
 *   npx tsx scripts/research.ts --list-indices
 *   npx tsx scripts/research.ts --clear-old-cache=30
 *
 * Environment variables required for research and index queries:
 *   OPENAI_API_KEY
 *   BRAVE_SEARCH_API_KEY
 */

import * as dotenv from "dotenv";
import * as fs from "fs/promises";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  createLogger,
  createResearchServices,
  getConfigPath,
  loadConfig,
  type ResearchServices,
} from "../packages/core/src";
import {
  USAGE,
  formatCacheList,
  formatIndexList,
  formatQueryResult,
  formatRunResult,
  parseArgs,
  type CliOptions,
} from "./research-cli";

// Load environment variables from .env file
const scriptDir = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(scriptDir, "../.env") });

async function execute(options: CliOptions, services: ResearchServices): Promise<string> {
  const { cache, indexStore, orchestrator } = services;

  if (options.listCache) {
    return formatCacheList(await cache.listEntries());
  }
  if (options.clearCache) {
    const removed = await cache.evict();
    return `Cache cleared: ${removed} files removed.`;
  }
  if (options.clearOldCache !== undefined) {
    const removed = await cache.evict(options.clearOldCache);
    return `Removed ${removed} cached pages at least ${options.clearOldCache} days old.`;
  }
  if (options.listIndices) {
    return formatIndexList(await indexStore.list());
  }
  if (options.queryIndex) {
    if (!options.task) {
      throw new Error("--query-index needs a question");
    }
    const result = await indexStore.query(options.queryIndex, options.task);
    return result
      ? formatQueryResult(result)
      : `Could not query retrieval index ${options.queryIndex}.`;
  }
  if (options.summarize) {
    const summary = await orchestrator.summarizeContent(options.summarize, true);
    return `Summary of ${options.summarize}:\n\n${summary}`;
  }
  if (options.task) {
    console.log(`🔍 Researching: ${options.task}\n`);
    const result = await orchestrator.run(options.task, {
      maxResults: options.maxResults,
      maxCycles: options.maxCycles,
      persist: !options.noIndex,
      onStateChange: (change) => {
        if (change.state === "search" && change.query) {
          console.log(`  [cycle ${change.cycle}] query: ${change.query}`);
        } else if (change.state === "fetch" && change.url) {
          console.log(`  [cycle ${change.cycle}] fetching ${change.url}`);
        }
      },
    });
    const output = formatRunResult(result);
    if (!options.noIndex && result.success && result.relevantResults.length > 0 && !result.indexId) {
      return `${output}\nNote: the results could not be stored in a retrieval index.`;
    }
    return output;
  }

  return USAGE;
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`✗ ${error instanceof Error ? error.message : String(error)}\n`);
    console.error(USAGE);
    return 2;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const logger = createLogger({ name: "research-cli", level: config.logging.level });
  const configPath = getConfigPath();

  // Cache and index administration never call the providers, so they run
  // without API keys
  const needsProviders = Boolean(options.task || options.summarize);
  const services = createResearchServices({
    config,
    logger,
    baseDir: configPath ? path.dirname(configPath) : process.cwd(),
    openaiApiKey: process.env.OPENAI_API_KEY ?? (needsProviders ? undefined : "unused"),
    braveApiKey: process.env.BRAVE_SEARCH_API_KEY ?? (needsProviders ? undefined : "unused"),
  });

  const startTime = Date.now();
  const output = await execute(options, services);

  if (options.output) {
    await fs.writeFile(options.output, output, "utf8");
    console.log(`✓ Output written to ${options.output}`);
  } else {
    console.log(output);
  }

  const duration = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log(`\nDone in ${duration}s`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("\n✗ Fatal error:", error);
    process.exit(1);
  });
