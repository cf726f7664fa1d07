/**
 * Hierarchical Expander
 *
 * Adds tree-adjacent context (parent, children, optionally siblings) to a
 * fused ranking, de-duplicates, re-sorts by score (higher is better) and
 * truncates to top-K.
 */

import type { FusedCandidate } from "./hybridRetriever.js";
import type { ResultRole } from "./types.js";

/** Score given to context chunks that were not themselves ranked */
export const CONTEXT_SCORE = 0;

export interface TreeNode<K> {
  key: K;
  parentKey: K | null;
  childKeys: readonly K[];
}

/**
 * Resolves a key to its tree links; `undefined` when the chunk is unknown
 * (not persisted yet, or deleted). Unknown chunks are skipped.
 */
export type TreeLookup<K> = (key: K) => TreeNode<K> | undefined;

export interface ExpansionOptions {
  topK: number;
  includeParent: boolean;
  includeChildren: boolean;
  includeSiblings?: boolean;
}

export interface ExpandedItem<K> {
  key: K;
  score: number;
  role: ResultRole;
  /** Set for ranked hits and for context chunks that were also ranked */
  candidate?: FusedCandidate<K>;
}

export class HierarchicalExpander<K> {
  constructor(private readonly lookup: TreeLookup<K>) {}

  expand(ranked: readonly FusedCandidate<K>[], options: ExpansionOptions): ExpandedItem<K>[] {
    if (options.topK <= 0) return [];

    const bestKnown = new Map<K, FusedCandidate<K>>();
    for (const candidate of ranked) {
      const previous = bestKnown.get(candidate.key);
      if (!previous || candidate.score > previous.score) {
        bestKnown.set(candidate.key, candidate);
      }
    }

    const ordered = [...ranked].sort((a, b) => b.score - a.score);
    const seen = new Set<K>();
    const items: ExpandedItem<K>[] = [];

    const emitContext = (key: K, role: ResultRole) => {
      if (seen.has(key) || !this.lookup(key)) return;
      seen.add(key);
      const known = bestKnown.get(key);
      items.push(known ? { key, score: known.score, role, candidate: known } : { key, score: CONTEXT_SCORE, role });
    };

    for (const hit of ordered) {
      if (seen.has(hit.key)) continue;
      seen.add(hit.key);
      items.push({ key: hit.key, score: hit.score, role: "hit", candidate: hit });

      const node = this.lookup(hit.key);
      if (!node) continue;

      if (options.includeParent && node.parentKey !== null) {
        emitContext(node.parentKey, "parent");
      }
      if (options.includeChildren) {
        for (const childKey of node.childKeys) {
          emitContext(childKey, "child");
        }
      }
      if (options.includeSiblings && node.parentKey !== null) {
        const parent = this.lookup(node.parentKey);
        for (const siblingKey of parent?.childKeys ?? []) {
          if (siblingKey !== hit.key) {
            emitContext(siblingKey, "sibling");
          }
        }
      }
    }

    items.sort((a, b) => b.score - a.score);
    return items.slice(0, options.topK);
  }
}
