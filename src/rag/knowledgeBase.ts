/**
 * Knowledge base facade
 *
 * Wires parsers, the chunk tree builder, the embedding encoder and the
 * hierarchical store into one object the CLI (or an embedding app) talks to.
 * Ingestion and query methods report failures in their results instead of throwing.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import { expandPath, loadConfig, type StoreConfig, type StratumConfig } from "../utils/config.js";
import {
  ErrorCode,
  FileSystemError,
  ValidationError,
  formatErrorForUser,
  isErrnoException,
  toStratumError,
} from "../utils/errors.js";
import { createErrorTracker, scopedLogger } from "../utils/logger.js";
import { ChunkTreeBuilder } from "./chunker.js";
import { ClipHttpEncoder } from "./embeddings/clipClient.js";
import type { EmbeddingEncoder } from "./embeddings/types.js";
import { SUPPORTED_DOCUMENT_EXTENSIONS, getParserForPath } from "./parsers/index.js";
import { HierarchicalStore, type ChunkContext, type SourceSummary, type StoreStats } from "./store.js";
import type { ContentType, FileType, QueryResult, VectorDatabase } from "./types.js";
import { InMemoryVectorDatabase, LanceDBVectorDatabase } from "./vectorStore.js";

const logger = scopedLogger("KnowledgeBase");
const trackError = createErrorTracker("KnowledgeBase");

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".bmp", ".webp", ".tiff", ".tif"] as const;
export const DEFAULT_IMAGE_BATCH_SIZE = 32;

// ============================================================================
// Types
// ============================================================================

export interface IngestResult {
  success: boolean;
  filePath: string;
  fileType?: FileType;
  chunksCount?: number;
  maxLevel?: number;
  message: string;
  error?: string;
}

export interface BatchIngestResult {
  total: number;
  succeeded: number;
  failed: number;
  results: IngestResult[];
}

export type IngestProgressCallback = (completed: number, total: number, result: IngestResult) => void;

export interface ImageUploadResult {
  success: boolean;
  folderPath: string;
  imagesCount: number;
  failedCount: number;
  message: string;
  error?: string;
}

export interface DeleteResult {
  success: boolean;
  filePath: string;
  deletedCount: number;
  message: string;
  error?: string;
}

export interface QueryOptions {
  topK?: number;
  alpha?: number;
  hierarchical?: boolean;
  includeParent?: boolean;
  includeChildren?: boolean;
  includeSiblings?: boolean;
  contentType?: ContentType;
  /** Raw backend predicate (SQL for LanceDB) */
  filterExpression?: string;
}

export interface KnowledgeBaseStats extends StoreStats {
  backend: StoreConfig["backend"];
  collection: string;
  encoder: string;
}

export interface KnowledgeBaseOptions {
  config?: StratumConfig;
  /** Replaces the CLIP HTTP encoder built from config */
  encoder?: EmbeddingEncoder;
  /** Replaces the backend built from config */
  database?: VectorDatabase;
}

// ============================================================================
// Factories
// ============================================================================

export function createVectorDatabase(config: StoreConfig): VectorDatabase {
  if (config.backend === "memory") {
    return new InMemoryVectorDatabase();
  }
  return new LanceDBVectorDatabase({ dbPath: expandPath(config.dbPath), collection: config.collection });
}

function resolvePath(inputPath: string): string {
  return path.resolve(expandPath(inputPath));
}

function describeFailure(error: unknown): string {
  return toStratumError(error).message;
}

async function requireDirectory(dirPath: string): Promise<void> {
  try {
    const stats = await fs.stat(dirPath);
    if (!stats.isDirectory()) {
      throw new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, `Not a directory: ${dirPath}`, {
        path: dirPath,
        operation: "access",
      });
    }
  } catch (error) {
    if (isErrnoException(error)) {
      throw new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, `Directory not found: ${dirPath}`, {
        path: dirPath,
        operation: "access",
        cause: error,
      });
    }
    throw error;
  }
}

function extensionPattern(extensions: readonly string[], recursive: boolean): string {
  const names = extensions.map((extension) => extension.replace(/^\./, ""));
  const suffix = names.length === 1 ? names.join("") : `{${names.join(",")}}`;
  return `${recursive ? "**/" : ""}*.${suffix}`;
}

// ============================================================================
// KnowledgeBase
// ============================================================================

export class KnowledgeBase {
  private readonly builder: ChunkTreeBuilder;
  private closed = false;

  private constructor(
    private readonly config: StratumConfig,
    private readonly encoder: EmbeddingEncoder,
    private readonly store: HierarchicalStore
  ) {
    this.builder = new ChunkTreeBuilder(config.chunking);
  }

  /**
   * Build and open a knowledge base. Config is loaded from disk when not given.
   */
  static async open(options: KnowledgeBaseOptions = {}): Promise<KnowledgeBase> {
    const config = options.config ?? (await loadConfig());
    const encoder = options.encoder ?? new ClipHttpEncoder({
      serverUrl: config.encoder.serverUrl,
      batchSize: config.encoder.batchSize,
      timeoutMs: config.encoder.timeoutMs,
    });
    const database = options.database ?? createVectorDatabase(config.store);
    const store = new HierarchicalStore(database, {
      alpha: config.retrieval.alpha,
      k1: config.retrieval.k1,
      b: config.retrieval.b,
      corpusPageSize: config.store.corpusPageSize,
      candidateMultiplier: config.store.candidateMultiplier,
    });
    await store.open();

    logger.debug(`Knowledge base opened (${config.store.backend}, collection "${config.store.collection}")`);
    return new KnowledgeBase(config, encoder, store);
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  /**
   * Parse, chunk, embed and store one document. Re-ingesting a path replaces its records.
   */
  async addDocument(filePath: string, fileType?: FileType): Promise<IngestResult> {
    const resolved = resolvePath(filePath);

    try {
      const parser = getParserForPath(resolved, fileType);
      const document = await parser.parse(resolved);
      const tree = this.builder.build(document);

      const problems = tree.validate();
      if (problems.length > 0) {
        throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `Malformed chunk tree: ${problems[0]}`);
      }
      if (tree.chunks.length <= 1) {
        throw new ValidationError(ErrorCode.VALIDATION_EMPTY_DOCUMENT, `No content to index in ${resolved}`, {
          field: "filePath",
          value: resolved,
        });
      }

      const vectors = await this.encoder.encodeTexts(tree.chunks.map((chunk) => chunk.content));

      const replaced = await this.store.deleteByProvenance(resolved);
      if (replaced > 0) {
        logger.debug(`Replacing ${replaced} existing records for ${resolved}`);
      }
      await this.store.insertChunks(tree, vectors, { filePath: resolved, fileType: document.fileType });

      const { totalChunks, maxLevel } = tree.metadata;
      logger.info(`Indexed ${path.basename(resolved)}: ${totalChunks} chunks, depth ${maxLevel}`);
      return {
        success: true,
        filePath: resolved,
        fileType: document.fileType,
        chunksCount: totalChunks,
        maxLevel,
        message: `Processed ${totalChunks} chunks (max level ${maxLevel})`,
      };
    } catch (error) {
      const failure = toStratumError(error);
      trackError(failure, "addDocument", { filePath: resolved });
      return {
        success: false,
        filePath: resolved,
        message: formatErrorForUser(failure, "minimal"),
        error: describeFailure(error),
      };
    }
  }

  /**
   * Ingest documents one after another; failures are recorded and skipped.
   */
  async addDocuments(filePaths: readonly string[], onProgress?: IngestProgressCallback): Promise<BatchIngestResult> {
    const results: IngestResult[] = [];
    for (const filePath of filePaths) {
      const result = await this.addDocument(filePath);
      results.push(result);
      onProgress?.(results.length, filePaths.length, result);
    }

    const succeeded = results.filter((result) => result.success).length;
    return { total: results.length, succeeded, failed: results.length - succeeded, results };
  }

  /**
   * Ingest every supported document under a directory.
   *
   * @throws {FileSystemError} FS_DIRECTORY_NOT_FOUND
   */
  async addDirectory(
    dirPath: string,
    options: { recursive?: boolean } = {},
    onProgress?: IngestProgressCallback
  ): Promise<BatchIngestResult> {
    const resolved = resolvePath(dirPath);
    await requireDirectory(resolved);

    const files = await glob(extensionPattern(SUPPORTED_DOCUMENT_EXTENSIONS, options.recursive ?? true), {
      cwd: resolved,
      absolute: true,
      nodir: true,
      nocase: true,
    });
    files.sort();

    logger.info(`Found ${files.length} documents in ${resolved}`);
    return this.addDocuments(files, onProgress);
  }

  /**
   * Embed every image under a folder in batches. A failed batch is counted and skipped.
   */
  async addImageFolder(
    folderPath: string,
    options: { recursive?: boolean; batchSize?: number } = {}
  ): Promise<ImageUploadResult> {
    const resolved = resolvePath(folderPath);
    const batchSize = options.batchSize ?? DEFAULT_IMAGE_BATCH_SIZE;

    try {
      if (!Number.isInteger(batchSize) || batchSize <= 0) {
        throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `batchSize must be a positive integer, got ${batchSize}`, {
          field: "batchSize",
          value: batchSize,
        });
      }
      await requireDirectory(resolved);

      const images = await glob(extensionPattern(IMAGE_EXTENSIONS, options.recursive ?? true), {
        cwd: resolved,
        absolute: true,
        nodir: true,
        nocase: true,
      });
      images.sort();

      if (images.length === 0) {
        return {
          success: false,
          folderPath: resolved,
          imagesCount: 0,
          failedCount: 0,
          message: `No images found in ${resolved}`,
        };
      }

      let stored = 0;
      let failed = 0;
      let replacedPrevious = false;
      let lastError: string | undefined;

      for (let start = 0; start < images.length; start += batchSize) {
        const batch = images.slice(start, start + batchSize);
        try {
          const vectors = await this.encoder.encodeImages(batch);
          if (!replacedPrevious) {
            await this.store.deleteByProvenance(resolved);
            replacedPrevious = true;
          }
          await this.store.insertImages(batch, vectors, { filePath: resolved, fileType: "image_folder" }, start, {
            folder: resolved,
          });
          stored += batch.length;
          logger.debug(`Stored images ${start + 1}-${start + batch.length} of ${images.length}`);
        } catch (error) {
          failed += batch.length;
          lastError = describeFailure(error);
          logger.warn(`Image batch starting at ${start} failed: ${lastError}`);
        }
      }

      logger.info(`Indexed ${stored} of ${images.length} images from ${resolved}`);
      return {
        success: stored > 0,
        folderPath: resolved,
        imagesCount: stored,
        failedCount: failed,
        message: failed > 0
          ? `Processed ${stored} images, ${failed} failed`
          : `Processed ${stored} images`,
        ...(lastError ? { error: lastError } : {}),
      };
    } catch (error) {
      const failure = toStratumError(error);
      trackError(failure, "addImageFolder", { folderPath: resolved });
      return {
        success: false,
        folderPath: resolved,
        imagesCount: 0,
        failedCount: 0,
        message: formatErrorForUser(failure, "minimal"),
        error: describeFailure(error),
      };
    }
  }

  // ==========================================================================
  // Retrieval
  // ==========================================================================

  /**
   * Hybrid (optionally hierarchical) search. Returns [] on any failure.
   */
  async query(text: string, options: QueryOptions = {}): Promise<QueryResult[]> {
    if (!text.trim()) return [];
    const defaults = this.config.retrieval;

    try {
      const [queryVector] = await this.encoder.encodeTexts([text]);
      if (!queryVector) return [];

      const searchOptions = {
        topK: options.topK ?? defaults.topK,
        alpha: options.alpha ?? defaults.alpha,
        contentType: options.contentType,
        filterExpression: options.filterExpression,
      };

      if (options.hierarchical ?? defaults.hierarchical) {
        return await this.store.hierarchicalSearch(text, queryVector, {
          ...searchOptions,
          includeParent: options.includeParent ?? defaults.includeParent,
          includeChildren: options.includeChildren ?? defaults.includeChildren,
          includeSiblings: options.includeSiblings ?? false,
        });
      }
      return await this.store.hybridSearch(text, queryVector, searchOptions);
    } catch (error) {
      const failure = toStratumError(error);
      if (failure.code === ErrorCode.STORE_INDEX_MISSING) {
        logger.warn("Query against an empty knowledge base");
      } else {
        trackError(failure, "query", { query: text });
      }
      return [];
    }
  }

  async queryBatch(texts: readonly string[], options: QueryOptions = {}): Promise<QueryResult[][]> {
    const results: QueryResult[][] = [];
    for (const text of texts) {
      results.push(await this.query(text, options));
    }
    return results;
  }

  async getContext(
    filePath: string,
    chunkIndex: number,
    options: { includeSiblings?: boolean } = {}
  ): Promise<ChunkContext | null> {
    return this.store.getContext(resolvePath(filePath), chunkIndex, options);
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  async deleteDocument(filePath: string): Promise<DeleteResult> {
    const resolved = resolvePath(filePath);
    try {
      const deletedCount = await this.store.deleteByProvenance(resolved);
      return {
        success: deletedCount > 0,
        filePath: resolved,
        deletedCount,
        message: deletedCount > 0
          ? `Deleted ${deletedCount} records`
          : `Nothing stored for ${resolved}`,
      };
    } catch (error) {
      const failure = toStratumError(error);
      trackError(failure, "deleteDocument", { filePath: resolved });
      return {
        success: false,
        filePath: resolved,
        deletedCount: 0,
        message: formatErrorForUser(failure, "minimal"),
        error: describeFailure(error),
      };
    }
  }

  async listDocuments(): Promise<SourceSummary[]> {
    return this.store.listSources();
  }

  /**
   * @returns keyword corpus size after the rebuild
   */
  async rebuildHybridIndex(): Promise<number> {
    const size = await this.store.rebuildCorpus();
    logger.info(`Keyword index rebuilt with ${size} chunks`);
    return size;
  }

  async getStats(): Promise<KnowledgeBaseStats> {
    const stats = await this.store.getStats();
    return {
      ...stats,
      backend: this.config.store.backend,
      collection: this.config.store.collection,
      encoder: this.encoder.name,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.store.close();
  }
}
