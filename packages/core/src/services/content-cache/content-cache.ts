/**
 * Content cache
 *
 * Memoizes fetched page content on disk, one JSON file per URL named by the
 * MD5 digest of the URL. A cached URL is never fetched again until the entry
 * is evicted. Fetch failures resolve to "" and, unless configured otherwise,
 * the empty result is persisted too so a failing URL is not retried on
 * every run (clear it with evict()).
 *
 * No locking: two concurrent misses on the same URL both fetch, and the
 * last write wins.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { createHash } from "crypto";
import { z } from "zod";
import type { DocumentTextExtractor } from "../../interfaces/content-sources";
import type { CacheEntry, CacheListing } from "../../models/cache";
import { FetchFailure, describeError } from "../../errors";
import type { Logger } from "../../logging/logger";
import { isPdfUrl } from "./url-detector";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * On-disk layout. `timestamp` is epoch seconds (fractional allowed).
 */
const CacheFileSchema = z.object({
  url: z.string(),
  timestamp: z.number(),
  content: z.string(),
});

export type FetchFn = (url: string) => Promise<string>;

export interface ContentCacheOptions {
  cacheDir: string;
  logger: Logger;
  documentExtractor?: DocumentTextExtractor;
  persistEmptyContent?: boolean; // default: true
  now?: () => number; // epoch ms, injectable for tests
}

export class ContentCache {
  private readonly cacheDir: string;
  private readonly logger: Logger;
  private readonly documentExtractor: DocumentTextExtractor | undefined;
  private readonly persistEmptyContent: boolean;
  private readonly now: () => number;

  constructor(options: ContentCacheOptions) {
    this.cacheDir = path.resolve(options.cacheDir);
    this.logger = options.logger;
    this.documentExtractor = options.documentExtractor;
    this.persistEmptyContent = options.persistEmptyContent ?? true;
    this.now = options.now ?? Date.now;
  }

  getCacheFileName(url: string): string {
    return `${createHash("md5").update(url).digest("hex")}.json`;
  }

  getCachePath(url: string): string {
    return path.join(this.cacheDir, this.getCacheFileName(url));
  }

  /**
   * Get the content of a URL, fetching it only on a cache miss
   */
  async getContent(url: string, fetchFn: FetchFn): Promise<string> {
    const cached = await this.read(url);
    if (cached) {
      this.logger.debug("Cache hit", { url });
      return cached.content;
    }

    let content: string;
    if (isPdfUrl(url) && this.documentExtractor) {
      this.logger.info("Detected PDF URL", { url });
      const extractor = this.documentExtractor;
      content = await this.fetchSafely(url, (target) => extractor.extractText(target));
    } else {
      content = await this.fetchSafely(url, fetchFn);
    }

    if (content || this.persistEmptyContent) {
      await this.write({ url, fetchedAt: this.now(), content });
    }
    return content;
  }

  /**
   * Read a cache entry; unreadable or malformed files count as misses
   */
  async read(url: string): Promise<CacheEntry | null> {
    const entry = await this.readFile(this.getCachePath(url));
    return entry && entry.url === url ? entry : null;
  }

  /**
   * Enumerate cached items
   */
  async listEntries(): Promise<CacheListing[]> {
    const listings: CacheListing[] = [];
    for (const fileName of await this.listCacheFiles()) {
      const entry = await this.readFile(path.join(this.cacheDir, fileName));
      if (!entry) {
        this.logger.warn("Unreadable cache file", { cacheFile: fileName });
        continue;
      }
      listings.push({
        url: entry.url,
        fetchedAt: entry.fetchedAt,
        size: entry.content.length,
        cacheFile: fileName,
      });
    }
    return listings.sort((a, b) => b.fetchedAt - a.fetchedAt);
  }

  /**
   * Remove every entry, or only those at least `maxAgeDays` old.
   * Entries that cannot be read are removed whatever their age.
   *
   * @returns number of entries removed
   */
  async evict(maxAgeDays?: number): Promise<number> {
    const now = this.now();
    let removed = 0;

    for (const fileName of await this.listCacheFiles()) {
      const filePath = path.join(this.cacheDir, fileName);

      if (maxAgeDays !== undefined) {
        const entry = await this.readFile(filePath);
        if (entry && (now - entry.fetchedAt) / DAY_MS < maxAgeDays) {
          continue;
        }
      }

      try {
        await fs.rm(filePath, { force: true });
        removed++;
      } catch (error) {
        this.logger.error("Failed to remove cache file", {
          cacheFile: fileName,
          error: describeError(error),
        });
      }
    }

    this.logger.info("Evicted cache entries", { removed, maxAgeDays: maxAgeDays ?? null });
    return removed;
  }

  private async fetchSafely(url: string, fetchFn: FetchFn): Promise<string> {
    try {
      this.logger.info("Fetching content", { url });
      return await fetchFn(url);
    } catch (error) {
      const failure =
        error instanceof FetchFailure
          ? error
          : new FetchFailure(url, describeError(error), { cause: error });
      this.logger.warn("Fetch failed, using empty content", {
        url,
        error: failure.message,
      });
      return "";
    }
  }

  private async write(entry: CacheEntry): Promise<void> {
    const payload = {
      url: entry.url,
      timestamp: entry.fetchedAt / 1000,
      content: entry.content,
    };
    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      await fs.writeFile(this.getCachePath(entry.url), JSON.stringify(payload, null, 2), "utf-8");
    } catch (error) {
      this.logger.error("Failed to write cache entry", {
        url: entry.url,
        error: describeError(error),
      });
    }
  }

  private async readFile(filePath: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = CacheFileSchema.safeParse(json);
    if (!parsed.success) {
      return null;
    }
    return {
      url: parsed.data.url,
      fetchedAt: parsed.data.timestamp * 1000,
      content: parsed.data.content,
    };
  }

  private async listCacheFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.cacheDir);
      return names.filter((name) => name.endsWith(".json"));
    } catch {
      return [];
    }
  }
}
