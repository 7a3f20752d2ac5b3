/**
 * File-backed vector store
 *
 * Two JSON files per index directory: vector_store.json maps chunk ids to
 * embeddings, docstore.json maps chunk ids to text and metadata. Search is
 * a linear cosine-similarity scan, which is plenty for a few thousand chunks.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { IndexFailure } from "../../errors";
import { cosineSimilarity } from "../llm/embeddings";

export const VECTOR_STORE_FILE = "vector_store.json";
export const DOCSTORE_FILE = "docstore.json";

const ChunkMetadataSchema = z.object({
  source: z.literal("web"),
  url: z.string(),
  title: z.string(),
  linkRelevanceScore: z.number(),
  contentRelevanceScore: z.number(),
  cacheFile: z.string(),
});

const VectorFileSchema = z.object({
  embeddings: z.record(z.array(z.number())),
});

const DocstoreFileSchema = z.object({
  nodes: z.record(
    z.object({
      text: z.string(),
      metadata: ChunkMetadataSchema,
    })
  ),
});

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

export interface StoredChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  embedding: number[];
}

export interface ScoredChunk {
  chunk: StoredChunk;
  score: number;
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf-8");
  return JSON.parse(raw);
}

export class JsonVectorStore {
  private constructor(private readonly chunks: StoredChunk[]) {}

  static empty(): JsonVectorStore {
    return new JsonVectorStore([]);
  }

  /**
   * Read both store files from an index directory
   */
  static async load(dir: string): Promise<JsonVectorStore> {
    let vectors: z.infer<typeof VectorFileSchema>;
    let docstore: z.infer<typeof DocstoreFileSchema>;
    try {
      vectors = VectorFileSchema.parse(await readJson(path.join(dir, VECTOR_STORE_FILE)));
      docstore = DocstoreFileSchema.parse(await readJson(path.join(dir, DOCSTORE_FILE)));
    } catch (error) {
      throw new IndexFailure(`Unreadable vector store in ${dir}`, undefined, { cause: error });
    }

    const chunks: StoredChunk[] = [];
    for (const [id, node] of Object.entries(docstore.nodes)) {
      const embedding = vectors.embeddings[id];
      if (!embedding) {
        throw new IndexFailure(`Chunk ${id} has no embedding in ${dir}`);
      }
      chunks.push({ id, text: node.text, metadata: node.metadata, embedding });
    }
    return new JsonVectorStore(chunks);
  }

  get size(): number {
    return this.chunks.length;
  }

  add(chunks: StoredChunk[]): void {
    this.chunks.push(...chunks);
  }

  /**
   * Top-K chunks by cosine similarity, best first
   */
  search(queryEmbedding: number[], topK: number): ScoredChunk[] {
    return this.chunks
      .map((chunk) => ({ chunk, score: cosineSimilarity(queryEmbedding, chunk.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async persist(dir: string): Promise<void> {
    const embeddings: Record<string, number[]> = {};
    const nodes: Record<string, { text: string; metadata: ChunkMetadata }> = {};
    for (const chunk of this.chunks) {
      embeddings[chunk.id] = chunk.embedding;
      nodes[chunk.id] = { text: chunk.text, metadata: chunk.metadata };
    }

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, VECTOR_STORE_FILE), JSON.stringify({ embeddings }), "utf-8");
    await fs.writeFile(
      path.join(dir, DOCSTORE_FILE),
      JSON.stringify({ nodes }, null, 2),
      "utf-8"
    );
  }
}
