/**
 * Immutable chunk tree for one document.
 *
 * Chunks live in a flat arena addressed by `index`; parent and children are
 * plain integer references resolved through this collection.
 */

import type { Chunk, FileType } from "./types.js";

export interface HierarchyMetadata {
  filePath: string;
  fileType: FileType;
  title: string;
  totalChunks: number;
  maxLevel: number;
}

export class HierarchicalContent {
  readonly chunks: readonly Chunk[];
  readonly rootChunks: readonly number[];
  readonly metadata: Readonly<HierarchyMetadata>;
  private readonly byIndex: ReadonlyMap<number, Chunk>;

  constructor(chunks: Chunk[], meta: Omit<HierarchyMetadata, "totalChunks" | "maxLevel">) {
    const frozen = chunks.map((chunk) =>
      Object.freeze({
        ...chunk,
        childrenIds: Object.freeze([...chunk.childrenIds]),
        metadata: Object.freeze({ ...chunk.metadata }),
      })
    );

    this.chunks = Object.freeze(frozen);
    this.byIndex = new Map(frozen.map((chunk) => [chunk.index, chunk]));
    this.rootChunks = Object.freeze(frozen.filter((chunk) => chunk.parentId === null).map((chunk) => chunk.index));
    this.metadata = Object.freeze({
      ...meta,
      totalChunks: frozen.length,
      maxLevel: frozen.reduce((max, chunk) => Math.max(max, chunk.level), 0),
    });
  }

  getChunk(index: number): Chunk | undefined {
    return this.byIndex.get(index);
  }

  getChildren(index: number): Chunk[] {
    const chunk = this.byIndex.get(index);
    if (!chunk) return [];
    return chunk.childrenIds
      .map((childId) => this.byIndex.get(childId))
      .filter((child): child is Chunk => child !== undefined);
  }

  getParent(index: number): Chunk | undefined {
    const chunk = this.byIndex.get(index);
    if (!chunk || chunk.parentId === null) return undefined;
    return this.byIndex.get(chunk.parentId);
  }

  /** Other children of the same parent, in document order */
  getSiblings(index: number): Chunk[] {
    const parent = this.getParent(index);
    if (!parent) return [];
    return this.getChildren(parent.index).filter((chunk) => chunk.index !== index);
  }

  /** Parent first, root last */
  getAncestors(index: number): Chunk[] {
    const ancestors: Chunk[] = [];
    const visited = new Set<number>([index]);
    let current = this.getParent(index);
    while (current && !visited.has(current.index)) {
      ancestors.push(current);
      visited.add(current.index);
      current = this.getParent(current.index);
    }
    return ancestors;
  }

  /**
   * Check the tree invariants. Returns a list of violations (empty when valid).
   */
  validate(): string[] {
    const problems: string[] = [];

    if (this.rootChunks.length !== 1) {
      problems.push(`expected exactly one root, found ${this.rootChunks.length}`);
    }
    if (this.byIndex.size !== this.chunks.length) {
      problems.push("duplicate chunk indices");
    }

    for (const chunk of this.chunks) {
      if (chunk.parentId !== null) {
        const parent = this.byIndex.get(chunk.parentId);
        if (!parent) {
          problems.push(`chunk ${chunk.index} references missing parent ${chunk.parentId}`);
        } else if (!parent.childrenIds.includes(chunk.index)) {
          problems.push(`chunk ${chunk.index} is not listed by its parent ${parent.index}`);
        }
      }
      for (const childId of chunk.childrenIds) {
        const child = this.byIndex.get(childId);
        if (!child || child.parentId !== chunk.index) {
          problems.push(`chunk ${chunk.index} lists ${childId} which does not point back`);
        }
      }
    }

    const root = this.rootChunks[0];
    if (root !== undefined) {
      for (const chunk of this.chunks) {
        if (chunk.index === root) continue;
        const ancestors = this.getAncestors(chunk.index);
        if (ancestors[ancestors.length - 1]?.index !== root) {
          problems.push(`chunk ${chunk.index} is not reachable from the root`);
        }
      }
    }

    return problems;
  }
}
