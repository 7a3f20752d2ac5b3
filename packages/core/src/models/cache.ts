/**
 * Content cache data models
 */

/**
 * Memoized page content, keyed by the MD5 digest of the URL.
 * Never mutated after it is written; removed only by eviction.
 */
export interface CacheEntry {
  url: string;
  fetchedAt: number; // epoch ms
  content: string;
}

/**
 * Cache listing row
 */
export interface CacheListing {
  url: string;
  fetchedAt: number; // epoch ms
  size: number; // content length in characters
  cacheFile: string;
}
