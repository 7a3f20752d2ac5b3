/**
 * Retrieval index data models
 */

import type { JsonValue } from "./json";

/**
 * Link from an indexed document back to its content cache entry
 */
export interface CacheReference {
  url: string;
  cacheFile: string;
  title: string;
}

/**
 * Persisted metadata.json of one retrieval index
 */
export interface IndexRecord {
  id: string;
  task: string;
  createdAt: string; // ISO timestamp
  updatedAt?: string; // ISO timestamp, set by update()
  numDocuments: number;
  cacheReferences: CacheReference[];
  metadata: Record<string, JsonValue>;
}

/**
 * One retrieved chunk backing a query answer
 */
export interface QuerySource {
  content: string;
  score: number;
  url: string;
  title: string;
  cacheRef: string;
}

/**
 * Answer to a question asked of a retrieval index
 */
export interface QueryResult {
  query: string;
  response: string;
  sources: QuerySource[];
  task: string;
  indexId: string;
}
