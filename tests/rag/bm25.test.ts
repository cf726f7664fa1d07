import { describe, it, expect, beforeEach } from "@jest/globals";
import { BM25Scorer, tokenize } from "../../src/rag/bm25.js";

describe("tokenize", () => {
  it("lower-cases and turns punctuation into separators", () => {
    expect(tokenize("Hello, World! foo_bar 42")).toEqual(["hello", "world", "foo_bar", "42"]);
  });

  it("keeps non-Latin letters", () => {
    expect(tokenize("Café naïve — 検索")).toEqual(["café", "naïve", "検索"]);
  });

  it("returns no tokens for punctuation only", () => {
    expect(tokenize("?!... --")).toEqual([]);
  });
});

describe("BM25Scorer", () => {
  let scorer: BM25Scorer;

  beforeEach(() => {
    scorer = new BM25Scorer();
  });

  it("computes the textbook score for a single-term query", () => {
    scorer.fit(["a b", "b c"]);
    // idf(a) = ln((2 - 1 + 0.5) / (1 + 0.5) + 1) = ln 2; tf = 1 and |d| = avgdl
    expect(scorer.idf("a")).toBeCloseTo(Math.log(2), 10);
    expect(scorer.score("a", 0)).toBeCloseTo(Math.log(2), 10);
    expect(scorer.score("a", 1)).toBe(0);
  });

  it("scores 0 for terms outside the vocabulary", () => {
    scorer.fit(["the quick brown fox", "jumps over the lazy dog"]);
    expect(scorer.idf("zebra")).toBe(0);
    expect(scorer.score("zebra", 0)).toBe(0);
    expect(scorer.search("zebra", 10)).toEqual([]);
  });

  it("gives a positive score to a rare repeated term", () => {
    scorer.fit(["quantum quantum entanglement", "classical mechanics", "thermal physics"]);
    expect(scorer.score("quantum", 0)).toBeGreaterThan(0);
  });

  it("ranks frequent short matches above a single mention in a long document", () => {
    const filler = Array.from({ length: 99 }, (_, i) => `word${i}`);
    const docA = "cat cat cat cat cat sat on the mat";
    const docB = ["cat", ...filler].join(" ");
    scorer.fit([docB, docA, "dogs and birds"]);

    const hits = scorer.search("cat", 10);
    expect(hits.map((hit) => hit.docIndex)).toEqual([1, 0]);
    expect(hits[0]?.score).toBeGreaterThan(hits[1]?.score ?? Infinity);
  });

  it("keeps corpus order for equal scores and truncates to topK", () => {
    scorer.fit(["x y", "z", "x y", "x y"]);
    expect(scorer.search("x", 2).map((hit) => hit.docIndex)).toEqual([0, 2]);
    expect(scorer.search("x", 0)).toEqual([]);
  });

  it("replaces all state on refit", () => {
    scorer.fit(["apple pie"]);
    scorer.fit(["banana bread", "banana split"]);
    expect(scorer.size).toBe(2);
    expect(scorer.score("apple", 0)).toBe(0);
    expect(scorer.search("banana", 5).map((hit) => hit.docIndex)).toEqual([0, 1]);
  });

  it("handles an empty corpus", () => {
    scorer.fit([]);
    expect(scorer.size).toBe(0);
    expect(scorer.search("anything", 5)).toEqual([]);
    expect(scorer.score("anything", 0)).toBe(0);
  });
});
