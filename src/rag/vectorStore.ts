/**
 * Vector database backends
 *
 * - LanceDBVectorDatabase: persistent, on-disk (@lancedb/lancedb)
 * - InMemoryVectorDatabase: tests and fallback
 *
 * Both report squared Euclidean (L2) distance; the collection is created on first insert.
 */

import * as lancedb from "@lancedb/lancedb";
import type { Connection, Table } from "@lancedb/lancedb";
import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ErrorCode, VectorStoreError } from "../utils/errors.js";
import { scopedLogger } from "../utils/logger.js";
import {
  ContentTypeSchema,
  FileTypeSchema,
  RecordChunkTypeSchema,
  type NewRecord,
  type PersistedRecord,
  type RecordFilter,
  type StoredRecord,
  type VectorDatabase,
  type VectorHit,
} from "./types.js";

const logger = scopedLogger("vectors");

// ============================================================================
// LanceDB
// ============================================================================

/** Columns returned by queries (everything but the vector) */
const SELECT_COLUMNS = [
  "id",
  "content_type",
  "content",
  "file_path",
  "file_type",
  "chunk_index",
  "parent_id",
  "chunk_type",
  "level",
  "metadata",
  "created_at",
];

/**
 * LanceDB row → StoredRecord. Integer columns may come back as bigint.
 */
const LanceRowSchema = z
  .object({
    id: z.string(),
    content_type: ContentTypeSchema,
    content: z.string(),
    file_path: z.string(),
    file_type: FileTypeSchema,
    chunk_index: z.coerce.number().int(),
    parent_id: z.coerce.number().int(),
    chunk_type: RecordChunkTypeSchema,
    level: z.coerce.number().int(),
    metadata: z.string(),
    created_at: z.string(),
  })
  .transform((row): StoredRecord => ({
    id: row.id,
    contentType: row.content_type,
    content: row.content,
    filePath: row.file_path,
    fileType: row.file_type,
    chunkIndex: row.chunk_index,
    parentId: row.parent_id,
    chunkType: row.chunk_type,
    level: row.level,
    metadata: row.metadata,
    createdAt: row.created_at,
  }));

const LanceSearchRowSchema = z.object({ _distance: z.coerce.number() }).passthrough();

function toLanceRow(record: PersistedRecord): Record<string, unknown> {
  return {
    id: record.id,
    content_type: record.contentType,
    content: record.content,
    vector: record.vector,
    file_path: record.filePath,
    file_type: record.fileType,
    chunk_index: record.chunkIndex,
    parent_id: record.parentId,
    chunk_type: record.chunkType,
    level: record.level,
    metadata: record.metadata,
    created_at: record.createdAt,
  };
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Compile a structured filter into a LanceDB SQL predicate.
 * Returns null for an empty filter.
 */
export function toSqlPredicate(filter: RecordFilter | undefined): string | null {
  if (!filter) return null;
  const clauses: string[] = [];

  if (filter.contentType) {
    clauses.push(`content_type = ${quote(filter.contentType)}`);
  }
  if (filter.filePath !== undefined) {
    clauses.push(`file_path = ${quote(filter.filePath)}`);
  }
  if (filter.chunkIndices) {
    const indices = filter.chunkIndices.filter((index) => Number.isInteger(index));
    clauses.push(indices.length > 0 ? `chunk_index IN (${indices.join(", ")})` : "FALSE");
  }
  if (filter.expression && filter.expression.trim()) {
    clauses.push(`(${filter.expression.trim()})`);
  }

  return clauses.length > 0 ? clauses.join(" AND ") : null;
}

export interface LanceDBVectorDatabaseOptions {
  dbPath: string;
  collection: string;
}

export class LanceDBVectorDatabase implements VectorDatabase {
  private db: Connection | null = null;
  private table: Table | null = null;
  private readonly dbPath: string;
  private readonly tableName: string;

  constructor(options: LanceDBVectorDatabaseOptions) {
    this.dbPath = options.dbPath;
    this.tableName = options.collection;
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      this.db = await lancedb.connect(this.dbPath);
      await this.openExistingTable();
    } catch (error) {
      throw new VectorStoreError(ErrorCode.STORE_CONNECTION_FAILED, `Failed to open LanceDB at ${this.dbPath}`, {
        cause: error instanceof Error ? error : undefined,
        collection: this.tableName,
      });
    }
  }

  private async openExistingTable(): Promise<Table | null> {
    if (this.table) return this.table;
    const db = this.requireDb();
    const tableNames = await db.tableNames();
    if (tableNames.includes(this.tableName)) {
      this.table = await db.openTable(this.tableName);
    }
    return this.table;
  }

  private requireDb(): Connection {
    if (!this.db) {
      throw new VectorStoreError(ErrorCode.STORE_CONNECTION_FAILED, "Vector database not initialized", {
        collection: this.tableName,
      });
    }
    return this.db;
  }

  async hasIndex(): Promise<boolean> {
    // Another writer may have created the table since we connected
    return (await this.openExistingTable()) !== null;
  }

  async insert(records: NewRecord[]): Promise<string[]> {
    const db = this.requireDb();
    if (records.length === 0) return [];

    const withIds: PersistedRecord[] = records.map((record) => ({ ...record, id: randomUUID() }));
    const rows = withIds.map(toLanceRow);

    try {
      const table = await this.openExistingTable();
      if (!table) {
        this.table = await db.createTable(this.tableName, rows);
      } else {
        await table.add(rows);
      }
    } catch (error) {
      throw this.wrapError(ErrorCode.STORE_INSERT_FAILED, error);
    }

    return withIds.map((record) => record.id);
  }

  async search(vector: number[], options: { filter?: RecordFilter; limit: number }): Promise<VectorHit[]> {
    const table = await this.requireTable();
    if (options.filter?.chunkIndices?.length === 0 || options.limit <= 0) return [];

    let rows: unknown[];
    try {
      let query = table.vectorSearch(vector).distanceType("l2").select(SELECT_COLUMNS).limit(options.limit);
      const predicate = toSqlPredicate(options.filter);
      if (predicate) {
        query = query.where(predicate);
      }
      rows = await query.toArray();
    } catch (error) {
      throw this.wrapError(ErrorCode.STORE_QUERY_FAILED, error, options.filter);
    }

    const hits: VectorHit[] = [];
    for (const row of rows) {
      const parsed = LanceRowSchema.safeParse(row);
      const distance = LanceSearchRowSchema.safeParse(row);
      if (parsed.success && distance.success) {
        hits.push({ record: parsed.data, distance: distance.data._distance });
      } else {
        logger.debug("Skipping malformed LanceDB row");
      }
    }
    return hits;
  }

  async query(options: { filter?: RecordFilter; limit: number }): Promise<StoredRecord[]> {
    const table = await this.openExistingTable();
    if (!table || options.filter?.chunkIndices?.length === 0 || options.limit <= 0) return [];

    let rows: unknown[];
    try {
      let query = table.query().select(SELECT_COLUMNS).limit(options.limit);
      const predicate = toSqlPredicate(options.filter);
      if (predicate) {
        query = query.where(predicate);
      }
      rows = await query.toArray();
    } catch (error) {
      throw this.wrapError(ErrorCode.STORE_QUERY_FAILED, error, options.filter);
    }

    const records: StoredRecord[] = [];
    for (const row of rows) {
      const parsed = LanceRowSchema.safeParse(row);
      if (parsed.success) {
        records.push(parsed.data);
      }
    }
    return records;
  }

  async delete(filter: RecordFilter): Promise<number> {
    const table = await this.openExistingTable();
    const predicate = toSqlPredicate(filter);
    if (!table || !predicate) return 0;

    try {
      const matching = await table.countRows(predicate);
      if (matching > 0) {
        await table.delete(predicate);
      }
      return matching;
    } catch (error) {
      throw this.wrapError(ErrorCode.STORE_DELETE_FAILED, error, filter);
    }
  }

  async count(filter?: RecordFilter): Promise<number> {
    const table = await this.openExistingTable();
    if (!table) return 0;
    const predicate = toSqlPredicate(filter);
    try {
      return predicate ? await table.countRows(predicate) : await table.countRows();
    } catch (error) {
      throw this.wrapError(ErrorCode.STORE_QUERY_FAILED, error, filter);
    }
  }

  async close(): Promise<void> {
    this.table?.close();
    this.db?.close();
    this.table = null;
    this.db = null;
  }

  private async requireTable(): Promise<Table> {
    const table = await this.openExistingTable();
    if (!table) {
      throw new VectorStoreError(ErrorCode.STORE_INDEX_MISSING, `Collection "${this.tableName}" does not exist`, {
        collection: this.tableName,
      });
    }
    return table;
  }

  private wrapError(code: ErrorCode, error: unknown, filter?: RecordFilter): VectorStoreError {
    const cause = error instanceof Error ? error : undefined;
    const message = cause?.message ?? String(error);
    // A raw expression is the usual reason LanceDB rejects a predicate
    if (filter?.expression && /parse|sql|filter|expression|column/i.test(message)) {
      return new VectorStoreError(ErrorCode.STORE_INVALID_FILTER, `Invalid filter "${filter.expression}": ${message}`, {
        cause,
        collection: this.tableName,
      });
    }
    return new VectorStoreError(code, message, { cause, collection: this.tableName });
  }
}

// ============================================================================
// In-memory
// ============================================================================

export interface InMemoryVectorDatabaseOptions {
  /** Start with an (empty) collection already present */
  indexed?: boolean;
}

/**
 * In-process vector database (tests and fallback).
 * Evaluates structured filters only; raw expressions are rejected.
 */
export class InMemoryVectorDatabase implements VectorDatabase {
  private records = new Map<string, PersistedRecord>();
  private nextId = 1;
  private indexed: boolean;

  constructor(options: InMemoryVectorDatabaseOptions = {}) {
    this.indexed = options.indexed ?? false;
  }

  async initialize(): Promise<void> {
    // Nothing to connect to
  }

  async hasIndex(): Promise<boolean> {
    return this.indexed;
  }

  async insert(records: NewRecord[]): Promise<string[]> {
    const ids: string[] = [];
    for (const record of records) {
      const id = String(this.nextId++);
      this.records.set(id, { ...record, vector: [...record.vector], id });
      ids.push(id);
    }
    if (records.length > 0) {
      this.indexed = true;
    }
    return ids;
  }

  async search(vector: number[], options: { filter?: RecordFilter; limit: number }): Promise<VectorHit[]> {
    if (!this.indexed) {
      throw new VectorStoreError(ErrorCode.STORE_INDEX_MISSING, "Collection does not exist");
    }
    const matches = this.matching(options.filter);
    const hits = matches.map((record) => ({
      record: toStored(record),
      distance: squaredL2(vector, record.vector),
    }));
    hits.sort((a, b) => a.distance - b.distance);
    return hits.slice(0, Math.max(0, options.limit));
  }

  async query(options: { filter?: RecordFilter; limit: number }): Promise<StoredRecord[]> {
    return this.matching(options.filter).slice(0, Math.max(0, options.limit)).map(toStored);
  }

  async delete(filter: RecordFilter): Promise<number> {
    const matches = this.matching(filter);
    for (const record of matches) {
      this.records.delete(record.id);
    }
    return matches.length;
  }

  async count(filter?: RecordFilter): Promise<number> {
    return this.matching(filter).length;
  }

  async close(): Promise<void> {
    // Records stay in memory so a reopened adapter can rebuild from them
  }

  private matching(filter: RecordFilter | undefined): PersistedRecord[] {
    if (filter?.expression && filter.expression.trim()) {
      throw new VectorStoreError(
        ErrorCode.STORE_INVALID_FILTER,
        `Raw filter expressions are not supported by the in-memory store: ${filter.expression}`
      );
    }
    const indices = filter?.chunkIndices ? new Set(filter.chunkIndices) : null;
    return [...this.records.values()].filter((record) =>
      (!filter?.contentType || record.contentType === filter.contentType) &&
      (filter?.filePath === undefined || record.filePath === filter.filePath) &&
      (!indices || indices.has(record.chunkIndex))
    );
  }
}

function toStored(record: PersistedRecord): StoredRecord {
  const { vector: _vector, ...stored } = record;
  return stored;
}

function squaredL2(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new VectorStoreError(
      ErrorCode.STORE_QUERY_FAILED,
      `Query vector has ${a.length} dimensions but stored vectors have ${b.length}`
    );
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return sum;
}
