export {
  RetrievalIndexStore,
  UNIFIED_INDEX_TASK,
  type RetrievalIndexStoreOptions,
  type LoadedIndex,
} from "./index-store";
export { JsonVectorStore, type StoredChunk, type ScoredChunk, type ChunkMetadata } from "./vector-store";
export { splitText, type SplitOptions } from "./text-splitter";
