import { describe, it, expect } from "@jest/globals";
import {
  ChunkTreeBuilder,
  splitIntoWindows,
  splitLongText,
  validateChunkTreeOptions,
} from "../../src/rag/chunker.js";
import type { DocumentBlock, ParsedDocument } from "../../src/rag/parsers/types.js";
import { ErrorCode, ValidationError } from "../../src/utils/errors.js";

function doc(blocks: DocumentBlock[], title = "Guide"): ParsedDocument {
  return { filePath: "/docs/guide.md", fileType: "markdown", title, blocks };
}

const LONG_PROSE = "Paragraphs under fifty characters are dropped, this one is kept.";

describe("splitLongText", () => {
  it("returns short text unchanged as a single piece", () => {
    const text = "  Short text. With two sentences!  ";
    expect(splitLongText(text, { maxChunkSize: 500, overlapSize: 50 })).toEqual([text]);
  });

  it("returns text of exactly maxChunkSize as one piece", () => {
    const text = "x".repeat(100);
    expect(splitLongText(text, { maxChunkSize: 100, overlapSize: 10 })).toEqual([text]);
  });

  it("packs sentences greedily, keeping terminators", () => {
    const pieces = splitLongText("Alpha one. Beta two. Gamma three.", { maxChunkSize: 20, overlapSize: 5 });
    expect(pieces).toEqual(["Alpha one.", "Beta two.", "Gamma three."]);
  });

  it("packs several short sentences into one piece when they fit", () => {
    const pieces = splitLongText("A b. C d. E f. G h.", { maxChunkSize: 10, overlapSize: 2 });
    expect(pieces).toEqual(["A b. C d.", "E f. G h."]);
  });

  it("splits on CJK terminators", () => {
    expect(splitLongText("你好。世界！", { maxChunkSize: 4, overlapSize: 1 })).toEqual(["你好。", "世界！"]);
  });

  it("force-splits text without terminators into overlapping windows", () => {
    const text = Array.from({ length: 1000 }, (_, i) => "abcdefghij"[i % 10]).join("");
    const pieces = splitLongText(text, { maxChunkSize: 300, overlapSize: 50 });

    expect(pieces).toHaveLength(4);
    for (const piece of pieces) {
      expect(piece.length).toBeLessThanOrEqual(300);
    }
    for (let i = 1; i < pieces.length; i++) {
      const previous = pieces[i - 1] ?? "";
      expect((pieces[i] ?? "").slice(0, 50)).toBe(previous.slice(-50));
    }

    const rebuilt = pieces.reduce((acc, piece, i) => (i === 0 ? piece : acc + piece.slice(50)), "");
    expect(rebuilt).toBe(text);
  });
});

describe("splitIntoWindows", () => {
  it("stops once a window reaches the end", () => {
    const windows = splitIntoWindows("a".repeat(600), 500, 50);
    expect(windows.map((w) => w.length)).toEqual([500, 150]);
  });

  it("skips whitespace-only windows", () => {
    expect(splitIntoWindows(`${"a".repeat(10)}${" ".repeat(20)}`, 10, 0)).toEqual(["a".repeat(10)]);
  });
});

describe("validateChunkTreeOptions", () => {
  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => validateChunkTreeOptions({ maxChunkSize: 50, minChunkSize: 10, overlapSize: 50 })).toThrow(ValidationError);
  });

  it("rejects a non-positive chunk size", () => {
    try {
      new ChunkTreeBuilder({ maxChunkSize: 0, overlapSize: 0 });
      throw new Error("expected a ValidationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: ErrorCode.VALIDATION_INVALID_FORMAT, field: "maxChunkSize" });
    }
  });
});

describe("ChunkTreeBuilder", () => {
  it("builds root, section and split paragraphs, dropping short prose", () => {
    const builder = new ChunkTreeBuilder({ maxChunkSize: 500, minChunkSize: 50 });
    const tree = builder.build(
      doc([
        { kind: "heading", level: 1, text: "Intro" },
        { kind: "paragraph", text: "a".repeat(600) },
        { kind: "paragraph", text: "b".repeat(30) },
      ])
    );

    expect(tree.chunks.map((chunk) => [chunk.chunkType, chunk.content.length])).toEqual([
      ["document", "Document: Guide".length],
      ["section", 5],
      ["paragraph", 500],
      ["paragraph", 150],
    ]);
    expect(tree.chunks[1]?.content).toBe("Intro");
    expect(tree.chunks[2]?.parentId).toBe(1);
    expect(tree.chunks[3]?.parentId).toBe(1);
    expect(tree.getChunk(1)?.childrenIds).toEqual([2, 3]);
    expect(tree.metadata.totalChunks).toBe(4);
    expect(tree.metadata.maxLevel).toBe(2);
    expect(tree.validate()).toEqual([]);
  });

  it("yields only the root for an empty document", () => {
    const tree = new ChunkTreeBuilder().build(doc([]));
    expect(tree.chunks).toHaveLength(1);
    expect(tree.chunks[0]).toMatchObject({ index: 0, chunkType: "document", level: 0, parentId: null });
    expect(tree.chunks[0]?.metadata).toEqual({ filePath: "/docs/guide.md" });
    expect(tree.metadata.maxLevel).toBe(0);
  });

  it("attaches paragraphs to the root when there are no headings", () => {
    const tree = new ChunkTreeBuilder().build(
      doc([
        { kind: "paragraph", text: LONG_PROSE },
        { kind: "paragraph", text: LONG_PROSE },
      ])
    );
    expect(tree.getChildren(0).map((chunk) => chunk.chunkType)).toEqual(["paragraph", "paragraph"]);
    expect(tree.chunks.slice(1).every((chunk) => chunk.level === 1)).toBe(true);
  });

  it("nests subsections under the open section and resets them at the next section", () => {
    const tree = new ChunkTreeBuilder().build(
      doc([
        { kind: "heading", level: 3, text: "Orphan" },
        { kind: "paragraph", text: LONG_PROSE },
        { kind: "heading", level: 2, text: "Setup" },
        { kind: "heading", level: 3, text: "Install" },
        { kind: "paragraph", text: LONG_PROSE },
        { kind: "heading", level: 1, text: "Usage" },
        { kind: "paragraph", text: LONG_PROSE },
      ])
    );

    expect(tree.chunks.map((chunk) => [chunk.index, chunk.chunkType, chunk.parentId, chunk.level])).toEqual([
      [0, "document", null, 0],
      [1, "subsection", 0, 1],
      [2, "paragraph", 1, 3],
      [3, "section", 0, 1],
      [4, "subsection", 3, 2],
      [5, "paragraph", 4, 3],
      [6, "section", 0, 1],
      [7, "paragraph", 6, 2],
    ]);
    expect(tree.chunks[4]?.metadata.headingLevel).toBe(3);
    expect(tree.getAncestors(5).map((chunk) => chunk.index)).toEqual([4, 3, 0]);
    expect(tree.getSiblings(3).map((chunk) => chunk.index)).toEqual([1, 6]);
    expect(tree.metadata.maxLevel).toBe(3);
    expect(tree.validate()).toEqual([]);
  });

  it("keeps short tables and code blocks with their markers", () => {
    const tree = new ChunkTreeBuilder().build(
      doc([
        { kind: "heading", level: 1, text: "Data" },
        { kind: "table", text: "a | b\n1 | 2" },
        { kind: "code", text: "```ts\nx()\n```", language: "ts" },
        { kind: "table", text: "c | d" },
      ])
    );

    expect(tree.chunks[2]?.content).toBe("[Table 1]\na | b\n1 | 2");
    expect(tree.chunks[2]?.metadata).toEqual({ isTable: true, tableIndex: 0 });
    expect(tree.chunks[3]?.metadata).toEqual({ isCode: true, codeLanguage: "ts" });
    expect(tree.chunks[4]?.content).toBe("[Table 2]\nc | d");
    expect(tree.chunks[4]?.metadata.tableIndex).toBe(1);
  });

  it("treats headings deeper than level 4 as paragraphs", () => {
    const deep = "A level five heading that is long enough to be kept as prose";
    const tree = new ChunkTreeBuilder().build(
      doc([
        { kind: "heading", level: 1, text: "Top" },
        { kind: "heading", level: 5, text: deep },
        { kind: "heading", level: 6, text: "Too short" },
      ])
    );

    expect(tree.chunks).toHaveLength(3);
    expect(tree.chunks[2]).toMatchObject({ chunkType: "paragraph", content: deep, parentId: 1 });
    expect(tree.chunks[2]?.metadata).toEqual({ headingLevel: 5 });
  });

  it("assigns traversal-order indices and consistent parent/child links", () => {
    const tree = new ChunkTreeBuilder({ maxChunkSize: 60, overlapSize: 10, minChunkSize: 5 }).build(
      doc([
        { kind: "heading", level: 1, text: "One" },
        { kind: "paragraph", text: "First sentence here. Second sentence follows. Third one closes it out." },
        { kind: "heading", level: 2, text: "Two" },
        { kind: "heading", level: 4, text: "Two point one" },
        { kind: "paragraph", text: "Tiny para." },
      ])
    );

    expect(tree.chunks.map((chunk) => chunk.index)).toEqual(tree.chunks.map((_, i) => i));
    expect(tree.rootChunks).toEqual([0]);
    for (const chunk of tree.chunks) {
      if (chunk.parentId === null) continue;
      expect(tree.getChunk(chunk.parentId)?.childrenIds).toContain(chunk.index);
    }
    expect(tree.chunks.map((chunk) => [chunk.chunkType, chunk.level])).toEqual([
      ["document", 0],
      ["section", 1],
      ["paragraph", 2],
      ["paragraph", 2],
      ["section", 1],
      ["subsection", 2],
      ["paragraph", 3],
    ]);
    expect(tree.validate()).toEqual([]);
  });

  it("returns frozen chunks", () => {
    const tree = new ChunkTreeBuilder().build(doc([{ kind: "paragraph", text: LONG_PROSE }]));
    expect(Object.isFrozen(tree.chunks)).toBe(true);
    expect(Object.isFrozen(tree.chunks[1])).toBe(true);
  });
});
