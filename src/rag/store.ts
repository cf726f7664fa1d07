/**
 * Hierarchical Store
 *
 * Persists chunk trees as one record per chunk and owns the derived,
 * rebuildable retrieval state for one collection:
 * - the BM25 corpus over all text records
 * - the chunk key ↔ primary key mapping
 *
 * The vector database stays authoritative. Corpus state is refreshed by a
 * full re-fit on every insert and rebuilt from persisted records whenever it
 * is missing or marked stale (failed insert, delete, first use).
 *
 * Concurrency: a query running while another writer (or an un-awaited insert)
 * adds records may use a corpus snapshot without those records until the next
 * rebuild. A query issued after an awaited insert always sees it.
 */

import { z } from "zod";
import { ErrorCode, StratumError, ValidationError, VectorStoreError } from "../utils/errors.js";
import { scopedLogger } from "../utils/logger.js";
import { truncateUtf8, utf8Length } from "../utils/text.js";
import { CONTEXT_SCORE, HierarchicalExpander, type TreeNode } from "./expander.js";
import type { HierarchicalContent } from "./hierarchy.js";
import { HybridRetriever, type FusedCandidate, type VectorScore } from "./hybridRetriever.js";
import {
  NO_PARENT,
  parseChunkKey,
  toChunkKey,
  type ChunkKey,
  type ContentType,
  type FileType,
  type NewRecord,
  type Provenance,
  type QueryResult,
  type RecordFilter,
  type ResultRole,
  type StoredRecord,
  type VectorDatabase,
  type VectorHit,
} from "./types.js";

const logger = scopedLogger("store");

/** Record field bounds (bytes) */
export const MAX_CONTENT_BYTES = 65535;
export const MAX_PATH_BYTES = 1024;
export const MAX_METADATA_BYTES = 65535;

/** Minimum vector candidates requested per final result */
const MIN_CANDIDATE_MULTIPLIER = 3;

export interface HierarchicalStoreOptions {
  /** Default fusion weight. Default: 0.7 */
  alpha: number;
  k1: number;
  b: number;
  /** Max text records read back when rebuilding the corpus. Default: 16384 */
  corpusPageSize: number;
  /** Vector candidates per requested result, never below 3. Default: 3 */
  candidateMultiplier: number;
}

export const DEFAULT_STORE_OPTIONS: HierarchicalStoreOptions = {
  alpha: 0.7,
  k1: 1.5,
  b: 0.75,
  corpusPageSize: 16384,
  candidateMultiplier: 3,
};

export interface SearchFilterOptions {
  contentType?: ContentType;
  /** Raw backend predicate, ANDed with the other filters */
  filterExpression?: string;
}

export interface HybridSearchOptions extends SearchFilterOptions {
  topK: number;
  alpha?: number;
}

export interface HierarchicalSearchOptions extends HybridSearchOptions {
  includeParent: boolean;
  includeChildren: boolean;
  includeSiblings?: boolean;
}

export interface SourceSummary {
  filePath: string;
  fileType: FileType;
  contentType: ContentType;
  records: number;
  createdAt: string;
}

export interface ChunkContext {
  chunk: QueryResult;
  parent: QueryResult | null;
  children: QueryResult[];
  siblings: QueryResult[];
}

export interface StoreStats {
  hasIndex: boolean;
  totalRecords: number;
  textRecords: number;
  imageRecords: number;
  corpusSize: number;
  corpusStale: boolean;
}

const RecordMetadataSchema = z
  .object({
    childrenIds: z.array(z.number().int()).optional(),
  })
  .passthrough();

function readMetadata(raw: string): z.infer<typeof RecordMetadataSchema> | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = RecordMetadataSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parseRecordMetadata(raw: string): Record<string, unknown> {
  return readMetadata(raw) ?? {};
}

function childIndicesOf(record: StoredRecord): number[] {
  return readMetadata(record.metadata)?.childrenIds ?? [];
}

export function recordKey(record: StoredRecord): ChunkKey {
  return toChunkKey(record.filePath, record.chunkIndex);
}

function parentKeyOf(record: StoredRecord): ChunkKey | null {
  return record.parentId === NO_PARENT ? null : toChunkKey(record.filePath, record.parentId);
}

function toTreeNode(record: StoredRecord): TreeNode<ChunkKey> {
  return {
    key: recordKey(record),
    parentKey: parentKeyOf(record),
    childKeys: childIndicesOf(record).map((index) => toChunkKey(record.filePath, index)),
  };
}

/**
 * Serialize chunk metadata with the structural keys always present.
 * Oversized extras are dropped before giving up.
 */
function serializeMetadata(base: Record<string, unknown>, structural: Record<string, unknown>): string {
  const full = JSON.stringify({ ...base, ...structural });
  if (utf8Length(full) <= MAX_METADATA_BYTES) {
    return full;
  }
  const minimal = JSON.stringify(structural);
  if (utf8Length(minimal) <= MAX_METADATA_BYTES) {
    logger.warn("Chunk metadata too large; extra keys dropped");
    return minimal;
  }
  throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, "Chunk metadata exceeds the record size limit", {
    field: "metadata",
  });
}

export function toQueryResult(
  record: StoredRecord,
  score: number,
  role: ResultRole,
  candidate?: FusedCandidate<ChunkKey>
): QueryResult {
  const result: QueryResult = {
    key: recordKey(record),
    id: record.id,
    contentType: record.contentType,
    content: record.content,
    filePath: record.filePath,
    fileType: record.fileType,
    chunkIndex: record.chunkIndex,
    chunkType: record.chunkType,
    level: record.level,
    parentIndex: record.parentId === NO_PARENT ? null : record.parentId,
    metadata: parseRecordMetadata(record.metadata),
    score,
    role,
  };
  if (candidate) {
    result.vectorSimilarity = candidate.vectorSimilarity;
    result.keywordScore = candidate.keywordScore;
    if (candidate.distance !== undefined) {
      result.distance = candidate.distance;
    }
  }
  return result;
}

interface RankedRecord {
  candidate: FusedCandidate<ChunkKey>;
  record: StoredRecord;
}

export class HierarchicalStore {
  private readonly options: HierarchicalStoreOptions;
  private readonly retriever: HybridRetriever<ChunkKey>;
  private corpusTexts: string[] = [];
  private corpusKeys: ChunkKey[] = [];
  private keyToId = new Map<ChunkKey, string>();
  private idToKey = new Map<string, ChunkKey>();
  private corpusLoaded = false;
  private stale = false;
  private rebuilding: Promise<number> | null = null;

  constructor(private readonly db: VectorDatabase, options: Partial<HierarchicalStoreOptions> = {}) {
    this.options = { ...DEFAULT_STORE_OPTIONS, ...options };
    this.retriever = new HybridRetriever<ChunkKey>({
      alpha: this.options.alpha,
      k1: this.options.k1,
      b: this.options.b,
    });
  }

  async open(): Promise<void> {
    await this.db.initialize();
  }

  async close(): Promise<void> {
    this.resetCorpus();
    this.corpusLoaded = false;
    await this.db.close();
  }

  // ==========================================================================
  // Mapping
  // ==========================================================================

  getPrimaryKey(key: ChunkKey): string | undefined {
    return this.keyToId.get(key);
  }

  getChunkKey(id: string): ChunkKey | undefined {
    return this.idToKey.get(id);
  }

  private remember(key: ChunkKey, id: string): void {
    this.keyToId.set(key, id);
    this.idToKey.set(id, key);
  }

  isCorpusStale(): boolean {
    return this.stale || !this.corpusLoaded;
  }

  get corpusSize(): number {
    return this.retriever.size;
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  /**
   * Persist one record per chunk and extend the keyword corpus.
   *
   * @returns primary keys in chunk order
   * @throws {ValidationError} when chunk and vector counts differ
   * @throws {VectorStoreError} when the database rejects the insert (corpus is marked stale)
   */
  async insertChunks(tree: HierarchicalContent, vectors: readonly number[][], provenance: Provenance): Promise<string[]> {
    if (tree.chunks.length !== vectors.length) {
      throw new ValidationError(
        ErrorCode.VALIDATION_LENGTH_MISMATCH,
        `Got ${tree.chunks.length} chunks but ${vectors.length} vectors for ${provenance.filePath}`
      );
    }

    const filePath = truncateUtf8(provenance.filePath, MAX_PATH_BYTES);
    const createdAt = new Date().toISOString();

    const records: NewRecord[] = tree.chunks.map((chunk, position) => ({
      contentType: "text",
      content: truncateUtf8(chunk.content, MAX_CONTENT_BYTES),
      vector: [...(vectors[position] ?? [])],
      filePath,
      fileType: provenance.fileType,
      chunkIndex: chunk.index,
      parentId: chunk.parentId ?? NO_PARENT,
      chunkType: chunk.chunkType,
      level: chunk.level,
      metadata: serializeMetadata({ ...chunk.metadata }, {
        chunkIndex: chunk.index,
        childrenIds: [...chunk.childrenIds],
      }),
      createdAt,
    }));

    const ids = await this.persist(records);
    const keys = records.map((record) => toChunkKey(record.filePath, record.chunkIndex));
    keys.forEach((key, position) => {
      const id = ids[position];
      if (id !== undefined) this.remember(key, id);
    });

    await this.extendCorpus(records.map((record) => record.content), keys);
    logger.debug(`Stored ${records.length} chunks for ${filePath}`);
    return ids;
  }

  /**
   * Persist image records. Content is the image path; images are not part of the keyword corpus.
   *
   * @param startIndex - index of the first image within its folder, so batches don't collide
   */
  async insertImages(
    imagePaths: readonly string[],
    vectors: readonly number[][],
    provenance: Provenance,
    startIndex = 0,
    extraMetadata: Record<string, unknown> = {}
  ): Promise<string[]> {
    if (imagePaths.length !== vectors.length) {
      throw new ValidationError(
        ErrorCode.VALIDATION_LENGTH_MISMATCH,
        `Got ${imagePaths.length} images but ${vectors.length} vectors`
      );
    }

    const filePath = truncateUtf8(provenance.filePath, MAX_PATH_BYTES);
    const createdAt = new Date().toISOString();
    const records: NewRecord[] = imagePaths.map((imagePath, position) => ({
      contentType: "image",
      content: truncateUtf8(imagePath, MAX_CONTENT_BYTES),
      vector: [...(vectors[position] ?? [])],
      filePath,
      fileType: provenance.fileType,
      chunkIndex: startIndex + position,
      parentId: NO_PARENT,
      chunkType: "image",
      level: 0,
      metadata: serializeMetadata({ ...extraMetadata, imagePath }, { chunkIndex: startIndex + position, childrenIds: [] }),
      createdAt,
    }));

    const ids = await this.persist(records);
    records.forEach((record, position) => {
      const id = ids[position];
      if (id !== undefined) this.remember(toChunkKey(record.filePath, record.chunkIndex), id);
    });
    return ids;
  }

  private async persist(records: NewRecord[]): Promise<string[]> {
    let ids: string[];
    try {
      ids = await this.db.insert(records);
    } catch (error) {
      // A partial write may have happened; only the database knows
      this.stale = true;
      if (error instanceof StratumError) throw error;
      throw new VectorStoreError(ErrorCode.STORE_INSERT_FAILED, error instanceof Error ? error.message : String(error), {
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (ids.length !== records.length) {
      this.stale = true;
      throw new VectorStoreError(
        ErrorCode.STORE_INSERT_FAILED,
        `Database returned ${ids.length} ids for ${records.length} records`
      );
    }
    return ids;
  }

  private async extendCorpus(texts: string[], keys: ChunkKey[]): Promise<void> {
    if (!this.corpusLoaded || this.stale) {
      // Rebuild picks up the records just written along with everything else
      try {
        await this.rebuildCorpus();
      } catch (error) {
        this.stale = true;
        logger.warn("Corpus rebuild after insert failed; will retry on next query", error);
      }
      return;
    }

    this.corpusTexts = [...this.corpusTexts, ...texts];
    this.corpusKeys = [...this.corpusKeys, ...keys];
    this.retriever.indexDocuments(this.corpusTexts, this.corpusKeys);
  }

  // ==========================================================================
  // Corpus
  // ==========================================================================

  private resetCorpus(): void {
    this.corpusTexts = [];
    this.corpusKeys = [];
    this.keyToId.clear();
    this.idToKey.clear();
    this.retriever.indexDocuments([], []);
  }

  /**
   * Rebuild the keyword corpus and key mapping from persisted text records.
   * Concurrent callers share one rebuild.
   *
   * @returns corpus size
   */
  async rebuildCorpus(): Promise<number> {
    if (!this.rebuilding) {
      this.rebuilding = this.loadCorpus().finally(() => {
        this.rebuilding = null;
      });
    }
    return this.rebuilding;
  }

  private async loadCorpus(): Promise<number> {
    if (!(await this.db.hasIndex())) {
      this.resetCorpus();
      this.corpusLoaded = true;
      this.stale = false;
      return 0;
    }

    const pageSize = this.options.corpusPageSize;
    const records = await this.db.query({ filter: { contentType: "text" }, limit: pageSize });
    if (records.length >= pageSize) {
      logger.warn(`Keyword corpus truncated at ${pageSize} records`);
    }

    this.resetCorpus();
    for (const record of records) {
      const key = recordKey(record);
      this.corpusTexts.push(record.content);
      this.corpusKeys.push(key);
      this.remember(key, record.id);
    }
    this.retriever.indexDocuments(this.corpusTexts, this.corpusKeys);
    this.corpusLoaded = true;
    this.stale = false;

    logger.debug(`Keyword corpus rebuilt with ${records.length} records`);
    return records.length;
  }

  private async ensureCorpus(): Promise<void> {
    if (this.isCorpusStale() || this.retriever.size === 0) {
      await this.rebuildCorpus();
    }
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  private buildFilter(options: SearchFilterOptions): RecordFilter | undefined {
    const filter: RecordFilter = {};
    if (options.contentType) filter.contentType = options.contentType;
    if (options.filterExpression && options.filterExpression.trim()) filter.expression = options.filterExpression;
    return Object.keys(filter).length > 0 ? filter : undefined;
  }

  /**
   * Similarity search requesting `topK * max(3, candidateMultiplier)` candidates.
   *
   * @throws {VectorStoreError} STORE_INDEX_MISSING when the collection does not exist
   */
  async vectorSearch(
    queryVector: number[],
    options: { topK: number; filter?: RecordFilter; candidateMultiplier?: number }
  ): Promise<VectorHit[]> {
    if (!(await this.db.hasIndex())) {
      throw new VectorStoreError(ErrorCode.STORE_INDEX_MISSING);
    }

    const multiplier = Math.max(MIN_CANDIDATE_MULTIPLIER, options.candidateMultiplier ?? this.options.candidateMultiplier);
    const hits = await this.db.search(queryVector, { filter: options.filter, limit: options.topK * multiplier });
    for (const hit of hits) {
      this.remember(recordKey(hit.record), hit.record.id);
    }
    return hits;
  }

  /**
   * Batch lookup by chunk key, honoring an optional filter. Unknown keys are absent from the result.
   */
  async resolveChunks(keys: Iterable<ChunkKey>, filter?: RecordFilter): Promise<Map<ChunkKey, StoredRecord>> {
    const byPath = new Map<string, Set<number>>();
    for (const key of keys) {
      const parsed = parseChunkKey(key);
      if (!parsed) continue;
      const indices = byPath.get(parsed.filePath) ?? new Set<number>();
      indices.add(parsed.chunkIndex);
      byPath.set(parsed.filePath, indices);
    }

    const resolved = new Map<ChunkKey, StoredRecord>();
    for (const [filePath, indices] of byPath) {
      const records = await this.db.query({
        filter: { ...filter, filePath, chunkIndices: [...indices] },
        // Re-ingested documents can hold duplicate keys; the first record wins
        limit: indices.size * 2,
      });
      for (const record of records) {
        const key = recordKey(record);
        if (!resolved.has(key)) {
          resolved.set(key, record);
          this.remember(key, record.id);
        }
      }
    }
    return resolved;
  }

  private async rankedSearch(queryText: string, queryVector: number[], options: HybridSearchOptions): Promise<RankedRecord[]> {
    if (options.topK <= 0) return [];
    const filter = this.buildFilter(options);

    const hits = await this.vectorSearch(queryVector, { topK: options.topK, filter });
    await this.ensureCorpus();

    const records = new Map<ChunkKey, StoredRecord>();
    const vectorScores: VectorScore<ChunkKey>[] = [];
    for (const hit of hits) {
      const key = recordKey(hit.record);
      if (!records.has(key)) records.set(key, hit.record);
      vectorScores.push({ key, distance: hit.distance });
    }

    // Rank everything, then drop keyword-only keys that fail the filter before truncating
    const fused = this.retriever.search(queryText, vectorScores, vectorScores.length + this.retriever.size, options.alpha);
    const keywordOnly = fused.filter((candidate) => !records.has(candidate.key)).map((candidate) => candidate.key);
    if (keywordOnly.length > 0) {
      const resolved = await this.resolveChunks(keywordOnly, filter);
      for (const [key, record] of resolved) {
        records.set(key, record);
      }
    }

    const ranked: RankedRecord[] = [];
    for (const candidate of fused) {
      const record = records.get(candidate.key);
      if (record) {
        ranked.push({ candidate, record });
        if (ranked.length >= options.topK) break;
      }
    }
    return ranked;
  }

  /**
   * Vector + keyword fusion without tree expansion.
   */
  async hybridSearch(queryText: string, queryVector: number[], options: HybridSearchOptions): Promise<QueryResult[]> {
    const ranked = await this.rankedSearch(queryText, queryVector, options);
    return ranked.map(({ candidate, record }) => toQueryResult(record, candidate.score, "hit", candidate));
  }

  /**
   * Hybrid search over `2 * topK` candidates, expanded along the chunk tree
   * and truncated back to `topK`.
   */
  async hierarchicalSearch(queryText: string, queryVector: number[], options: HierarchicalSearchOptions): Promise<QueryResult[]> {
    if (options.topK <= 0) return [];
    const filter = this.buildFilter(options);
    const ranked = await this.rankedSearch(queryText, queryVector, { ...options, topK: options.topK * 2 });

    const records = new Map<ChunkKey, StoredRecord>();
    for (const { record } of ranked) {
      records.set(recordKey(record), record);
    }

    // Prefetch every record the expander may touch
    const wanted = new Set<ChunkKey>();
    for (const { record } of ranked) {
      const node = toTreeNode(record);
      if ((options.includeParent || options.includeSiblings) && node.parentKey) wanted.add(node.parentKey);
      if (options.includeChildren) node.childKeys.forEach((key) => wanted.add(key));
    }
    await this.fetchInto(records, wanted, filter);

    if (options.includeSiblings) {
      const siblings = new Set<ChunkKey>();
      for (const { record } of ranked) {
        const parentKey = parentKeyOf(record);
        const parent = parentKey ? records.get(parentKey) : undefined;
        if (parent) toTreeNode(parent).childKeys.forEach((key) => siblings.add(key));
      }
      await this.fetchInto(records, siblings, filter);
    }

    const expander = new HierarchicalExpander<ChunkKey>((key) => {
      const record = records.get(key);
      return record ? toTreeNode(record) : undefined;
    });

    const items = expander.expand(
      ranked.map(({ candidate }) => candidate),
      {
        topK: options.topK,
        includeParent: options.includeParent,
        includeChildren: options.includeChildren,
        includeSiblings: options.includeSiblings ?? false,
      }
    );

    const results: QueryResult[] = [];
    for (const item of items) {
      const record = records.get(item.key);
      if (record) {
        results.push(toQueryResult(record, item.score, item.role, item.candidate));
      }
    }
    return results;
  }

  /**
   * One chunk with its parent, children and (optionally) siblings, in tree order.
   * Returns null when the chunk does not exist.
   */
  async getContext(sourcePath: string, chunkIndex: number, options: { includeSiblings?: boolean } = {}): Promise<ChunkContext | null> {
    const key = toChunkKey(truncateUtf8(sourcePath, MAX_PATH_BYTES), chunkIndex);
    const records = await this.resolveChunks([key]);
    const record = records.get(key);
    if (!record) return null;

    const node = toTreeNode(record);
    const wanted = new Set<ChunkKey>(node.childKeys);
    if (node.parentKey) wanted.add(node.parentKey);
    await this.fetchInto(records, wanted);

    const parent = node.parentKey ? records.get(node.parentKey) : undefined;
    const collect = (keys: readonly ChunkKey[], role: ResultRole): QueryResult[] =>
      keys
        .map((childKey) => records.get(childKey))
        .filter((found): found is StoredRecord => found !== undefined)
        .map((found) => toQueryResult(found, CONTEXT_SCORE, role));

    let siblings: QueryResult[] = [];
    if (options.includeSiblings && parent) {
      const siblingKeys = toTreeNode(parent).childKeys.filter((siblingKey) => siblingKey !== key);
      await this.fetchInto(records, new Set(siblingKeys));
      siblings = collect(siblingKeys, "sibling");
    }

    return {
      chunk: toQueryResult(record, CONTEXT_SCORE, "hit"),
      parent: parent ? toQueryResult(parent, CONTEXT_SCORE, "parent") : null,
      children: collect(node.childKeys, "child"),
      siblings,
    };
  }

  private async fetchInto(records: Map<ChunkKey, StoredRecord>, keys: Set<ChunkKey>, filter?: RecordFilter): Promise<void> {
    const missing = [...keys].filter((key) => !records.has(key));
    if (missing.length === 0) return;
    const resolved = await this.resolveChunks(missing, filter);
    for (const [key, record] of resolved) {
      records.set(key, record);
    }
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Remove every record from one source. The corpus is rebuilt on next use.
   */
  async deleteByProvenance(sourcePath: string): Promise<number> {
    const filePath = truncateUtf8(sourcePath, MAX_PATH_BYTES);
    const deleted = await this.db.delete({ filePath });

    const prefix = `${filePath}#`;
    for (const [key, id] of [...this.keyToId]) {
      if (key.startsWith(prefix) && parseChunkKey(key)?.filePath === filePath) {
        this.keyToId.delete(key);
        this.idToKey.delete(id);
      }
    }
    this.stale = true;
    return deleted;
  }

  /**
   * Distinct sources in the collection (bounded by the corpus page size).
   */
  async listSources(): Promise<SourceSummary[]> {
    if (!(await this.db.hasIndex())) return [];
    const records = await this.db.query({ limit: this.options.corpusPageSize });

    const sources = new Map<string, SourceSummary>();
    for (const record of records) {
      const id = `${record.contentType}:${record.filePath}`;
      const existing = sources.get(id);
      if (existing) {
        existing.records++;
        if (record.createdAt < existing.createdAt) existing.createdAt = record.createdAt;
      } else {
        sources.set(id, {
          filePath: record.filePath,
          fileType: record.fileType,
          contentType: record.contentType,
          records: 1,
          createdAt: record.createdAt,
        });
      }
    }
    return [...sources.values()].sort((a, b) => a.filePath.localeCompare(b.filePath));
  }

  async getStats(): Promise<StoreStats> {
    const hasIndex = await this.db.hasIndex();
    if (!hasIndex) {
      return { hasIndex, totalRecords: 0, textRecords: 0, imageRecords: 0, corpusSize: 0, corpusStale: this.isCorpusStale() };
    }
    const [totalRecords, textRecords, imageRecords] = await Promise.all([
      this.db.count(),
      this.db.count({ contentType: "text" }),
      this.db.count({ contentType: "image" }),
    ]);
    return {
      hasIndex,
      totalRecords,
      textRecords,
      imageRecords,
      corpusSize: this.retriever.size,
      corpusStale: this.isCorpusStale(),
    };
  }
}
