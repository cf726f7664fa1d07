/**
 * BM25 keyword relevance over a fixed in-memory corpus
 */

export interface BM25Options {
  /** Term-frequency saturation. Default: 1.5 */
  k1: number;
  /** Length normalization. Default: 0.75 */
  b: number;
}

export const DEFAULT_BM25_OPTIONS: BM25Options = {
  k1: 1.5,
  b: 0.75,
};

export interface BM25Hit {
  /** Position of the document in the fitted corpus */
  docIndex: number;
  score: number;
}

/**
 * Lower-case, replace everything but letters, marks, digits and `_` with
 * whitespace, split on whitespace. No stemming.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}_\s]/gu, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export class BM25Scorer {
  private readonly options: BM25Options;
  private termFrequencies: Map<string, number>[] = [];
  private documentLengths: number[] = [];
  private documentFrequencies = new Map<string, number>();
  private averageLength = 0;

  constructor(options: Partial<BM25Options> = {}) {
    this.options = { ...DEFAULT_BM25_OPTIONS, ...options };
  }

  /**
   * Replace all corpus state with the given documents.
   */
  fit(documents: readonly string[]): void {
    this.termFrequencies = [];
    this.documentLengths = [];
    this.documentFrequencies = new Map();

    for (const document of documents) {
      const tokens = tokenize(document);
      const frequencies = new Map<string, number>();
      for (const token of tokens) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      for (const term of frequencies.keys()) {
        this.documentFrequencies.set(term, (this.documentFrequencies.get(term) ?? 0) + 1);
      }
      this.termFrequencies.push(frequencies);
      this.documentLengths.push(tokens.length);
    }

    const totalLength = this.documentLengths.reduce((sum, length) => sum + length, 0);
    this.averageLength = documents.length > 0 ? totalLength / documents.length : 0;
  }

  get size(): number {
    return this.termFrequencies.length;
  }

  idf(term: string): number {
    const df = this.documentFrequencies.get(term);
    if (df === undefined) return 0;
    const n = this.termFrequencies.length;
    return Math.log((n - df + 0.5) / (df + 0.5) + 1);
  }

  score(query: string, docIndex: number): number {
    return this.scoreTokens(tokenize(query), docIndex);
  }

  /**
   * Documents with a strictly positive score, best first; ties keep corpus order.
   */
  search(query: string, topK: number): BM25Hit[] {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0 || topK <= 0) {
      return [];
    }

    const hits: BM25Hit[] = [];
    for (let docIndex = 0; docIndex < this.termFrequencies.length; docIndex++) {
      const score = this.scoreTokens(queryTokens, docIndex);
      if (score > 0) {
        hits.push({ docIndex, score });
      }
    }

    // Array.prototype.sort is stable
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, topK);
  }

  private scoreTokens(queryTokens: readonly string[], docIndex: number): number {
    const frequencies = this.termFrequencies[docIndex];
    const length = this.documentLengths[docIndex];
    if (!frequencies || length === undefined) {
      return 0;
    }

    const { k1, b } = this.options;
    const lengthRatio = this.averageLength > 0 ? length / this.averageLength : 0;
    let score = 0;

    for (const term of queryTokens) {
      const tf = frequencies.get(term);
      if (!tf) continue;
      const numerator = tf * (k1 + 1);
      const denominator = tf + k1 * (1 - b + b * lengthRatio);
      score += this.idf(term) * (numerator / denominator);
    }

    return score;
  }
}
