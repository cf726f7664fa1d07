// Types
export type {
  Chunk,
  ChunkKey,
  ChunkMetadata,
  ChunkType,
  ContentType,
  FileType,
  NewRecord,
  PersistedRecord,
  Provenance,
  QueryResult,
  RecordFilter,
  ResultRole,
  StoredRecord,
  VectorDatabase,
  VectorHit,
} from "./types.js";
export { NO_PARENT, compareGranularity, parseChunkKey, toChunkKey } from "./types.js";

// Chunking
export { HierarchicalContent, type HierarchyMetadata } from "./hierarchy.js";
export {
  ChunkTreeBuilder,
  DEFAULT_CHUNK_TREE_OPTIONS,
  splitIntoWindows,
  splitLongText,
  validateChunkTreeOptions,
  type ChunkTreeOptions,
} from "./chunker.js";
export * from "./parsers/index.js";

// Retrieval
export { BM25Scorer, tokenize, type BM25Hit, type BM25Options } from "./bm25.js";
export {
  HybridRetriever,
  normalizeDistances,
  normalizeKeywordScores,
  type FusedCandidate,
  type HybridRetrieverOptions,
  type VectorScore,
} from "./hybridRetriever.js";
export {
  CONTEXT_SCORE,
  HierarchicalExpander,
  type ExpandedItem,
  type ExpansionOptions,
  type TreeLookup,
  type TreeNode,
} from "./expander.js";

// Storage
export { InMemoryVectorDatabase, LanceDBVectorDatabase, toSqlPredicate } from "./vectorStore.js";
export {
  HierarchicalStore,
  DEFAULT_STORE_OPTIONS,
  type ChunkContext,
  type HierarchicalSearchOptions,
  type HierarchicalStoreOptions,
  type HybridSearchOptions,
  type SourceSummary,
  type StoreStats,
} from "./store.js";

// Embeddings
export * from "./embeddings/index.js";

// Facade
export {
  KnowledgeBase,
  createVectorDatabase,
  type BatchIngestResult,
  type DeleteResult,
  type ImageUploadResult,
  type IngestResult,
  type KnowledgeBaseOptions,
  type KnowledgeBaseStats,
  type QueryOptions,
} from "./knowledgeBase.js";
