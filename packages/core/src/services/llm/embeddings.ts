/**
 * OpenAI Embeddings
 *
 * Embeds evidence chunks and questions for the retrieval index.
 */

import type { EmbeddingCreateParams } from "openai/resources/embeddings";
import type { EmbeddingProvider } from "../../interfaces/content-sources";
import type { Logger } from "../../logging/logger";
import { withRetry } from "../../utils/retry";
import type { LLMConfig } from "../research-engine/config";
import { createOpenAIClient } from "./client";

/**
 * The slice of the OpenAI client used for embeddings
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: EmbeddingCreateParams
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  config: LLMConfig["embeddings"];
  logger: Logger;
  apiKey?: string;
  client?: EmbeddingsClient;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: EmbeddingsClient;

  constructor(private readonly options: OpenAIEmbeddingProviderOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = createOpenAIClient(options.apiKey);
    } else {
      throw new Error("OpenAIEmbeddingProvider needs a client or an API key");
    }
  }

  /**
   * Generate embeddings for a list of texts, batched per configuration
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const { model, dimensions, batchSize } = this.options.config;
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const response = await withRetry(
        () => this.client.embeddings.create({ model, input: batch, dimensions }),
        {
          maxRetries: this.options.maxRetries ?? 3,
          label: "OpenAI embeddings",
          logger: this.options.logger,
          sleep: this.options.sleep,
        }
      );

      // Sort by index to ensure correct order
      const sorted = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...sorted.map((item) => item.embedding));
    }

    return vectors;
  }
}

/**
 * Calculate cosine similarity between two vectors
 * Returns value between -1 and 1 (1 = identical, 0 = orthogonal, -1 = opposite)
 */
export function cosineSimilarity(vecA: number[], vecB: number[]): number {
  if (vecA.length !== vecB.length) {
    throw new Error(`Vector length mismatch: ${vecA.length} vs ${vecB.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    normA += vecA[i] * vecA[i];
    normB += vecB[i] * vecB[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}
