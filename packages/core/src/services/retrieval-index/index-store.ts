/**
 * Retrieval index store
 *
 * Persists accepted evidence as chunked, embedded documents under
 * `<dir>/index_<id>/` and answers questions from the closest chunks.
 * Every public method catches its own failures: callers get `null` or
 * `false` and a log line, never an exception.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import type { EmbeddingProvider } from "../../interfaces/content-sources";
import type { LLMProvider } from "../../interfaces/llm-provider";
import type { EvidenceDocument } from "../../models/evidence";
import type { JsonValue } from "../../models/json";
import type {
  CacheReference,
  IndexRecord,
  QueryResult,
  QuerySource,
} from "../../models/retrieval-index";
import { IndexFailure } from "../../errors";
import { errorFields, type Logger } from "../../logging/logger";
import { tokensToChars } from "../../utils/token-estimation";
import type { IndexConfig } from "../research-engine/config";
import { IndexRecordSchema, METADATA_FILE } from "./record-schema";
import { splitText } from "./text-splitter";
import { JsonVectorStore, type StoredChunk } from "./vector-store";

export const UNIFIED_INDEX_TASK = "Unified retrieval index";
const CONTEXT_SEPARATOR = "\n\n---\n\n";

export interface RetrievalIndexStoreOptions {
  dir: string;
  embeddings: EmbeddingProvider;
  llm: LLMProvider;
  config: IndexConfig;
  logger: Logger;
  createId?: () => string;
  now?: () => Date;
}

export interface LoadedIndex {
  index: JsonVectorStore;
  record: IndexRecord;
}

export class RetrievalIndexStore {
  private readonly dir: string;
  private readonly embeddings: EmbeddingProvider;
  private readonly llm: LLMProvider;
  private readonly config: IndexConfig;
  private readonly logger: Logger;
  private readonly createId: () => string;
  private readonly now: () => Date;

  constructor(options: RetrievalIndexStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.embeddings = options.embeddings;
    this.llm = options.llm;
    this.config = options.config;
    this.logger = options.logger;
    this.createId = options.createId ?? (() => randomUUID().slice(0, 8));
    this.now = options.now ?? (() => new Date());
  }

  indexDir(id: string): string {
    return path.join(this.dir, `index_${id}`);
  }

  /**
   * Create an index from evidence documents
   *
   * @returns the index id, or null when no document has text or storage fails
   */
  async create(
    task: string,
    documents: EvidenceDocument[],
    metadata: Record<string, JsonValue> = {},
    indexId?: string
  ): Promise<string | null> {
    const usable = this.selectNewDocuments(documents, new Set());
    if (usable.length === 0) {
      this.logger.warn("No documents with text to index", { task });
      return null;
    }

    const id = indexId ?? this.createId();
    try {
      const index = JsonVectorStore.empty();
      index.add(await this.embedDocuments(usable));

      await this.writeIndex(index, {
        id,
        task,
        createdAt: this.now().toISOString(),
        numDocuments: usable.length,
        cacheReferences: usable.map(toCacheReference),
        metadata,
      });

      this.logger.info("Created retrieval index", { indexId: id, documents: usable.length });
      return id;
    } catch (error) {
      this.logger.error("Failed to create retrieval index", { indexId: id, ...errorFields(error) });
      return null;
    }
  }

  /**
   * Load an index and its metadata; null when either is missing or unreadable
   */
  async load(id: string): Promise<LoadedIndex | null> {
    try {
      const record = await this.readRecord(this.indexDir(id));
      if (!record) {
        this.logger.warn("Retrieval index not found", { indexId: id });
        return null;
      }
      const index = await JsonVectorStore.load(this.indexDir(id));
      return { index, record };
    } catch (error) {
      this.logger.error("Failed to load retrieval index", { indexId: id, ...errorFields(error) });
      return null;
    }
  }

  /**
   * Answer a question from the chunks closest to it
   *
   * Chunks scoring below `scoreThreshold` are dropped; if that leaves none,
   * the best few retrieved chunks are used anyway.
   */
  async query(
    id: string,
    question: string,
    topK: number = this.config.topK,
    scoreThreshold: number = this.config.scoreThreshold
  ): Promise<QueryResult | null> {
    const loaded = await this.load(id);
    if (!loaded) {
      return null;
    }

    try {
      const [queryEmbedding] = await this.embeddings.embed([question]);
      if (!queryEmbedding) {
        throw new IndexFailure("No embedding returned for the question", id);
      }

      const retrieved = loaded.index.search(queryEmbedding, topK);
      let selected = retrieved.filter((hit) => hit.score >= scoreThreshold);
      if (selected.length === 0 && retrieved.length > 0) {
        selected = retrieved.slice(0, this.config.fallbackCount);
        this.logger.info("No chunk above threshold, using best matches", {
          indexId: id,
          scoreThreshold,
          used: selected.length,
        });
      }

      const sources: QuerySource[] = selected.map(({ chunk, score }) => ({
        content: chunk.text,
        score,
        url: chunk.metadata.url,
        title: chunk.metadata.title,
        cacheRef: chunk.metadata.cacheFile,
      }));

      const context = sources.map((source) => source.content).join(CONTEXT_SEPARATOR);
      const response = await this.llm.synthesizeAnswer(context, question);

      return { query: question, response, sources, task: loaded.record.task, indexId: id };
    } catch (error) {
      this.logger.error("Failed to query retrieval index", { indexId: id, ...errorFields(error) });
      return null;
    }
  }

  /**
   * Add documents to an index, creating it under `id` when it does not exist.
   * Documents whose URL is already indexed are skipped.
   */
  async update(id: string, task: string, documents: EvidenceDocument[]): Promise<boolean> {
    if (documents.length === 0) {
      this.logger.warn("No documents given for index update", { indexId: id });
      return false;
    }

    if (!(await this.exists(id))) {
      this.logger.info("Retrieval index does not exist, creating it", { indexId: id });
      return (await this.create(task, documents, {}, id)) === id;
    }

    const loaded = await this.load(id);
    if (!loaded) {
      return false;
    }

    const { index, record } = loaded;
    const known = new Set(record.cacheReferences.map((ref) => ref.url));
    const fresh = this.selectNewDocuments(documents, known);
    if (fresh.length === 0) {
      this.logger.info("No new documents for retrieval index", { indexId: id });
      return true;
    }

    try {
      index.add(await this.embedDocuments(fresh));
      await this.writeIndex(index, {
        ...record,
        task: `${record.task} + ${task}`,
        numDocuments: record.numDocuments + fresh.length,
        cacheReferences: [...record.cacheReferences, ...fresh.map(toCacheReference)],
        updatedAt: this.now().toISOString(),
      });

      this.logger.info("Updated retrieval index", { indexId: id, added: fresh.length });
      return true;
    } catch (error) {
      this.logger.error("Failed to update retrieval index", { indexId: id, ...errorFields(error) });
      return false;
    }
  }

  /**
   * Metadata of every index on disk, newest first
   */
  async list(): Promise<IndexRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch {
      return [];
    }

    const records: IndexRecord[] = [];
    for (const name of names.filter((entry) => entry.startsWith("index_"))) {
      try {
        const record = await this.readRecord(path.join(this.dir, name));
        if (record) {
          records.push(record);
        }
      } catch (error) {
        this.logger.error("Unreadable index metadata", { index: name, ...errorFields(error) });
      }
    }
    return records.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /**
   * Ensure an empty shared index exists under `id`
   */
  async getOrCreateUnified(id: string): Promise<string | null> {
    if (await this.exists(id)) {
      return id;
    }

    try {
      await this.writeIndex(JsonVectorStore.empty(), {
        id,
        task: UNIFIED_INDEX_TASK,
        createdAt: this.now().toISOString(),
        numDocuments: 0,
        cacheReferences: [],
        metadata: { type: "unified" },
      });
      this.logger.info("Created unified retrieval index", { indexId: id });
      return id;
    } catch (error) {
      this.logger.error("Failed to create unified index", { indexId: id, ...errorFields(error) });
      return null;
    }
  }

  async exists(id: string): Promise<boolean> {
    try {
      await fs.access(path.join(this.indexDir(id), METADATA_FILE));
      return true;
    } catch {
      return false;
    }
  }

  private selectNewDocuments(
    documents: EvidenceDocument[],
    knownUrls: Set<string>
  ): EvidenceDocument[] {
    const seen = new Set(knownUrls);
    const selected: EvidenceDocument[] = [];
    for (const document of documents) {
      if (!document.text.trim()) {
        continue;
      }
      if (seen.has(document.url)) {
        this.logger.debug("URL already indexed", { url: document.url });
        continue;
      }
      seen.add(document.url);
      selected.push(document);
    }
    return selected;
  }

  private async embedDocuments(documents: EvidenceDocument[]): Promise<StoredChunk[]> {
    const pending: Omit<StoredChunk, "embedding">[] = [];
    for (const document of documents) {
      const chunks = splitText(document.text, {
        chunkSize: tokensToChars(this.config.chunkSize),
        chunkOverlap: tokensToChars(this.config.chunkOverlap),
      });
      for (const text of chunks) {
        pending.push({
          id: randomUUID(),
          text,
          metadata: {
            source: "web",
            url: document.url,
            title: document.title || "Untitled",
            linkRelevanceScore: document.linkRelevanceScore,
            contentRelevanceScore: document.contentRelevanceScore,
            cacheFile: document.cacheRef,
          },
        });
      }
    }

    const vectors = await this.embeddings.embed(pending.map((chunk) => chunk.text));
    if (vectors.length !== pending.length) {
      throw new IndexFailure(
        `Expected ${pending.length} embeddings, got ${vectors.length}`
      );
    }
    return pending.map((chunk, i) => ({ ...chunk, embedding: vectors[i] }));
  }

  private async writeIndex(index: JsonVectorStore, record: IndexRecord): Promise<void> {
    const dir = this.indexDir(record.id);
    await index.persist(dir);
    await fs.writeFile(path.join(dir, METADATA_FILE), JSON.stringify(record, null, 2), "utf-8");
  }

  private async readRecord(indexDir: string): Promise<IndexRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(indexDir, METADATA_FILE), "utf-8");
    } catch {
      return null;
    }

    const parsed = IndexRecordSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new IndexFailure(`Invalid ${METADATA_FILE} in ${indexDir}`);
    }
    return parsed.data;
  }
}

function toCacheReference(document: EvidenceDocument): CacheReference {
  return {
    url: document.url,
    cacheFile: document.cacheRef,
    title: document.title || "Untitled",
  };
}
