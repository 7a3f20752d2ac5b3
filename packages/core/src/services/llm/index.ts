/**
 * LLM Provider implementations
 */

export { createOpenAIClient } from "./client";
export { OpenAIProvider, type OpenAIProviderOptions, type ChatClient } from "./openai-provider";
export {
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  type OpenAIEmbeddingProviderOptions,
  type EmbeddingsClient,
} from "./embeddings";
export { renderPrompt, type PromptConfig } from "./prompts";
