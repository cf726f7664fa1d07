/**
 * Hybrid Retriever
 *
 * Fuses externally computed vector distances with BM25 relevance over the
 * same corpus. Both signals are min-max normalized per query, then combined
 * as `alpha * similarity + (1 - alpha) * keyword`.
 */

import { ErrorCode, ValidationError } from "../utils/errors.js";
import { BM25Scorer, type BM25Options } from "./bm25.js";

export interface HybridRetrieverOptions extends BM25Options {
  /** Weight of vector similarity in [0, 1]. Default: 0.7 */
  alpha: number;
}

export const DEFAULT_HYBRID_OPTIONS: HybridRetrieverOptions = {
  alpha: 0.7,
  k1: 1.5,
  b: 0.75,
};

export interface VectorScore<K> {
  key: K;
  /** Smaller is more similar */
  distance: number;
}

export interface KeywordHit<K> {
  key: K;
  score: number;
}

export interface FusedCandidate<K> {
  key: K;
  score: number;
  /** Normalized similarity in [0, 1]; 0 when the key had no vector score */
  vectorSimilarity: number;
  /** Normalized BM25 in [0, 1]; 0 when the key had no keyword hit */
  keywordScore: number;
  /** Raw distance when the key came from the vector side */
  distance?: number;
}

function assertAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `alpha must be within [0, 1], got ${alpha}`, {
      field: "alpha",
      value: alpha,
    });
  }
}

function bounds(values: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

/**
 * Convert distances to similarities: `1 - (d - min) / range`, clamped at 0.
 * A zero range counts as 1, so equal distances all map to similarity 1.
 */
export function normalizeDistances<K>(scores: readonly VectorScore<K>[]): Map<K, number> {
  const normalized = new Map<K, number>();
  if (scores.length === 0) return normalized;

  const { min, max } = bounds(scores.map((entry) => entry.distance));
  const range = max - min || 1;

  for (const { key, distance } of scores) {
    normalized.set(key, Math.max(0, 1 - (distance - min) / range));
  }
  return normalized;
}

/**
 * Min-max normalize keyword scores to [0, 1]. Equal scores all map to 1.
 */
export function normalizeKeywordScores<K>(hits: readonly KeywordHit<K>[]): Map<K, number> {
  const normalized = new Map<K, number>();
  if (hits.length === 0) return normalized;

  const { min, max } = bounds(hits.map((hit) => hit.score));
  const range = max - min;

  for (const { key, score } of hits) {
    const value = range === 0 ? 1 : (score - min) / range;
    normalized.set(key, Math.max(normalized.get(key) ?? 0, value));
  }
  return normalized;
}

export class HybridRetriever<K> {
  private readonly options: HybridRetrieverOptions;
  private readonly scorer: BM25Scorer;
  private keys: K[] = [];

  constructor(options: Partial<HybridRetrieverOptions> = {}) {
    this.options = { ...DEFAULT_HYBRID_OPTIONS, ...options };
    assertAlpha(this.options.alpha);
    this.scorer = new BM25Scorer({ k1: this.options.k1, b: this.options.b });
  }

  /**
   * Establish or replace the keyword corpus. `keys[i]` identifies `documents[i]`.
   */
  indexDocuments(documents: readonly string[], keys: readonly K[]): void {
    if (documents.length !== keys.length) {
      throw new ValidationError(
        ErrorCode.VALIDATION_LENGTH_MISMATCH,
        `Got ${documents.length} documents but ${keys.length} keys`
      );
    }
    this.scorer.fit(documents);
    this.keys = [...keys];
  }

  get size(): number {
    return this.keys.length;
  }

  getKeys(): readonly K[] {
    return this.keys;
  }

  /**
   * BM25 ranking over the whole corpus, mapped to caller keys.
   */
  keywordSearch(query: string, topK: number = this.keys.length): KeywordHit<K>[] {
    const hits: KeywordHit<K>[] = [];
    for (const { docIndex, score } of this.scorer.search(query, topK)) {
      const key = this.keys[docIndex];
      if (key !== undefined) {
        hits.push({ key, score });
      }
    }
    return hits;
  }

  /**
   * Fuse vector distances with keyword relevance.
   *
   * Keys present in only one ranking get 0 for the other. Ties keep union
   * order: vector candidates first, then keyword-only candidates.
   */
  search(query: string, vectorScores: readonly VectorScore<K>[], topK: number, alpha: number = this.options.alpha): FusedCandidate<K>[] {
    assertAlpha(alpha);
    if (topK <= 0) return [];

    // A key reported twice keeps its best distance
    const bestDistance = new Map<K, number>();
    for (const { key, distance } of vectorScores) {
      const previous = bestDistance.get(key);
      if (previous === undefined || distance < previous) {
        bestDistance.set(key, distance);
      }
    }
    const uniqueVectorScores = [...bestDistance].map(([key, distance]) => ({ key, distance }));

    const similarities = normalizeDistances(uniqueVectorScores);
    const keywordScores = normalizeKeywordScores(this.keywordSearch(query));

    const candidates: FusedCandidate<K>[] = [];
    const seen = new Set<K>();
    const pushCandidate = (key: K) => {
      if (seen.has(key)) return;
      seen.add(key);
      const vectorSimilarity = similarities.get(key) ?? 0;
      const keywordScore = keywordScores.get(key) ?? 0;
      const candidate: FusedCandidate<K> = {
        key,
        score: alpha * vectorSimilarity + (1 - alpha) * keywordScore,
        vectorSimilarity,
        keywordScore,
      };
      const distance = bestDistance.get(key);
      if (distance !== undefined) {
        candidate.distance = distance;
      }
      candidates.push(candidate);
    };

    for (const { key } of uniqueVectorScores) pushCandidate(key);
    for (const key of keywordScores.keys()) pushCandidate(key);

    candidates.sort((a, b) => b.score - a.score);
    return candidates.slice(0, topK);
  }
}
