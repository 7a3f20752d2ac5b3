/**
 * Interfaces for retrieving raw page content and computing embeddings
 */

/**
 * Retrieves the readable text of a web page
 */
export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

/**
 * Extracts text from a non-HTML document (PDF) addressed by URL.
 * Implementations resolve to "" instead of throwing.
 */
export interface DocumentTextExtractor {
  extractText(url: string): Promise<string>;
}

/**
 * Turns texts into embedding vectors, one per input, in input order
 */
export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}
