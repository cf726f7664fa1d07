/**
 * Core types for chunk trees, persisted records and retrieval results
 */

import { z } from "zod";

// ============================================================================
// Chunk tree
// ============================================================================

/**
 * Chunk granularity, coarsest first
 */
export const ChunkTypeSchema = z.enum([
  "document",
  "section",
  "subsection",
  "paragraph",
  "sentence",
]);

export type ChunkType = z.infer<typeof ChunkTypeSchema>;

export const CHUNK_TYPE_ORDER: readonly ChunkType[] = ChunkTypeSchema.options;

/**
 * Negative when `a` is coarser than `b`
 */
export function compareGranularity(a: ChunkType, b: ChunkType): number {
  return CHUNK_TYPE_ORDER.indexOf(a) - CHUNK_TYPE_ORDER.indexOf(b);
}

export interface ChunkMetadata {
  /** Markdown/Word heading level for heading chunks (and demoted deep headings) */
  headingLevel?: number;
  isTable?: boolean;
  tableIndex?: number;
  isCode?: boolean;
  codeLanguage?: string;
  filePath?: string;
  [key: string]: unknown;
}

export interface Chunk {
  /** Unique within one document-processing run, assigned in traversal order */
  readonly index: number;
  readonly content: string;
  readonly chunkType: ChunkType;
  /** Depth from the document root (root = 0) */
  readonly level: number;
  /** null only for the root */
  readonly parentId: number | null;
  readonly childrenIds: readonly number[];
  readonly metadata: Readonly<ChunkMetadata>;
}

// ============================================================================
// Provenance and persisted records
// ============================================================================

export const ContentTypeSchema = z.enum(["text", "image"]);
export type ContentType = z.infer<typeof ContentTypeSchema>;

export const FileTypeSchema = z.enum(["word", "markdown", "image_folder"]);
export type FileType = z.infer<typeof FileTypeSchema>;

/** Chunk type tag stored per record; image records carry "image" */
export const RecordChunkTypeSchema = z.enum([
  "document",
  "section",
  "subsection",
  "paragraph",
  "sentence",
  "image",
]);
export type RecordChunkType = z.infer<typeof RecordChunkTypeSchema>;

export interface Provenance {
  filePath: string;
  fileType: FileType;
}

/** Parent index stored for chunks without a parent */
export const NO_PARENT = -1;

/**
 * A persisted record without its vector; what searches and queries return.
 * Numeric columns are coerced because some backends hand back bigint/float columns.
 */
export const StoredRecordSchema = z.object({
  id: z.string(),
  contentType: ContentTypeSchema,
  content: z.string(),
  filePath: z.string(),
  fileType: FileTypeSchema,
  chunkIndex: z.coerce.number().int(),
  parentId: z.coerce.number().int(),
  chunkType: RecordChunkTypeSchema,
  level: z.coerce.number().int(),
  /** Serialized JSON object */
  metadata: z.string(),
  createdAt: z.string(),
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

export interface PersistedRecord extends StoredRecord {
  vector: number[];
}

/** Record handed to a vector database; the database assigns `id` */
export type NewRecord = Omit<PersistedRecord, "id">;

/**
 * Structured filter; fields are ANDed.
 * `expression` is a raw backend-specific predicate (SQL for LanceDB).
 */
export interface RecordFilter {
  contentType?: ContentType;
  filePath?: string;
  chunkIndices?: readonly number[];
  expression?: string;
}

export interface VectorHit {
  record: StoredRecord;
  /** Squared Euclidean distance; smaller is more similar */
  distance: number;
}

/**
 * Contract required from the vector database collaborator
 */
export interface VectorDatabase {
  initialize(): Promise<void>;
  /** Whether the collection exists and can be searched */
  hasIndex(): Promise<boolean>;
  /** Batch insert; returns assigned ids in input order */
  insert(records: NewRecord[]): Promise<string[]>;
  search(vector: number[], options: { filter?: RecordFilter; limit: number }): Promise<VectorHit[]>;
  query(options: { filter?: RecordFilter; limit: number }): Promise<StoredRecord[]>;
  /** Returns the number of deleted records */
  delete(filter: RecordFilter): Promise<number>;
  count(filter?: RecordFilter): Promise<number>;
  close(): Promise<void>;
}


// ============================================================================
// Retrieval
// ============================================================================

/** Collection-wide chunk identity: provenance path plus document-local index */
export type ChunkKey = string;

export function toChunkKey(filePath: string, chunkIndex: number): ChunkKey {
  return `${filePath}#${chunkIndex}`;
}

export function parseChunkKey(key: ChunkKey): { filePath: string; chunkIndex: number } | null {
  const separator = key.lastIndexOf("#");
  if (separator < 0) return null;
  const rawIndex = key.slice(separator + 1);
  if (!/^\d+$/.test(rawIndex)) return null;
  return { filePath: key.slice(0, separator), chunkIndex: Number(rawIndex) };
}

export type ResultRole = "hit" | "parent" | "child" | "sibling";

export interface QueryResult {
  key: ChunkKey;
  id: string;
  contentType: ContentType;
  content: string;
  filePath: string;
  fileType: FileType;
  chunkIndex: number;
  chunkType: RecordChunkType;
  level: number;
  parentIndex: number | null;
  metadata: Record<string, unknown>;
  /** Fused score for hits, best-known or context sentinel for expanded chunks */
  score: number;
  role: ResultRole;
  vectorSimilarity?: number;
  keywordScore?: number;
  distance?: number;
}
