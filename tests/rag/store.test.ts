import { describe, it, expect, beforeEach } from "@jest/globals";
import { ChunkTreeBuilder } from "../../src/rag/chunker.js";
import type { HierarchicalContent } from "../../src/rag/hierarchy.js";
import type { DocumentBlock } from "../../src/rag/parsers/types.js";
import { HierarchicalStore } from "../../src/rag/store.js";
import type { NewRecord } from "../../src/rag/types.js";
import { InMemoryVectorDatabase } from "../../src/rag/vectorStore.js";
import { ErrorCode, ValidationError, VectorStoreError } from "../../src/utils/errors.js";
import { hashVector } from "../setup.js";

const DIM = 8;
const PETS = "/docs/pets.md";

const CATS = "Cats are small domesticated carnivores that purr and sleep most of the day.";
const DOGS = "Dogs are loyal companions that bark at strangers and love long walks outside.";

function buildTree(filePath: string, title: string, blocks: DocumentBlock[]): HierarchicalContent {
  return new ChunkTreeBuilder().build({ filePath, fileType: "markdown", title, blocks });
}

// 0 root, 1 "Cats", 2 cats paragraph, 3 "Dogs", 4 dogs paragraph
function petsTree(): HierarchicalContent {
  return buildTree(PETS, "Pets", [
    { kind: "heading", level: 1, text: "Cats" },
    { kind: "paragraph", text: CATS },
    { kind: "heading", level: 1, text: "Dogs" },
    { kind: "paragraph", text: DOGS },
  ]);
}

function vectorsFor(tree: HierarchicalContent): number[][] {
  return tree.chunks.map((chunk) => hashVector(chunk.content, DIM));
}

async function insertPets(store: HierarchicalStore): Promise<string[]> {
  const tree = petsTree();
  return store.insertChunks(tree, vectorsFor(tree), { filePath: PETS, fileType: "markdown" });
}

class FailingInsertDatabase extends InMemoryVectorDatabase {
  async insert(_records: NewRecord[]): Promise<string[]> {
    throw new Error("disk full");
  }
}

describe("HierarchicalStore", () => {
  let db: InMemoryVectorDatabase;
  let store: HierarchicalStore;

  beforeEach(async () => {
    db = new InMemoryVectorDatabase();
    store = new HierarchicalStore(db);
    await store.open();
  });

  describe("insertChunks", () => {
    it("persists one record per chunk and maps chunk keys to ids", async () => {
      const ids = await insertPets(store);

      expect(ids).toEqual(["1", "2", "3", "4", "5"]);
      expect(store.getPrimaryKey(`${PETS}#2`)).toBe("3");
      expect(store.getChunkKey("5")).toBe(`${PETS}#4`);
      expect(await db.count({ filePath: PETS })).toBe(5);

      const [root] = await db.query({ filter: { filePath: PETS, chunkIndices: [0] }, limit: 1 });
      expect(root).toMatchObject({ parentId: -1, chunkType: "document", level: 0, contentType: "text" });
      expect(JSON.parse(root?.metadata ?? "{}")).toEqual({ filePath: PETS, chunkIndex: 0, childrenIds: [1, 3] });
    });

    it("rejects a chunk/vector count mismatch without writing", async () => {
      const tree = petsTree();
      await expect(store.insertChunks(tree, vectorsFor(tree).slice(1), { filePath: PETS, fileType: "markdown" }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(await db.count()).toBe(0);
    });

    it("marks the corpus stale when the database rejects the insert", async () => {
      const failing = new HierarchicalStore(new FailingInsertDatabase());
      const tree = petsTree();

      await expect(failing.insertChunks(tree, vectorsFor(tree), { filePath: PETS, fileType: "markdown" }))
        .rejects.toMatchObject({ code: ErrorCode.STORE_INSERT_FAILED });
      expect(failing.isCorpusStale()).toBe(true);
    });

    it("truncates oversized content to the record bound", async () => {
      const tree = buildTree("/docs/big.md", "Big", [{ kind: "code", text: "é".repeat(40000) }]);
      await store.insertChunks(tree, vectorsFor(tree), { filePath: "/docs/big.md", fileType: "markdown" });

      const [code] = await db.query({ filter: { filePath: "/docs/big.md", chunkIndices: [1] }, limit: 1 });
      expect(Buffer.byteLength(code?.content ?? "", "utf8")).toBeLessThanOrEqual(65535);
      expect(code?.content).toBe("é".repeat(32767));
    });
  });

  describe("hybridSearch", () => {
    it("finds a chunk by keyword right after it was inserted", async () => {
      await insertPets(store);
      const first = await store.hybridSearch("purr", hashVector("purr", DIM), { topK: 1, alpha: 0 });
      expect(first.map((result) => result.key)).toEqual([`${PETS}#2`]);

      const zoo = buildTree("/docs/zoo.md", "Zoo", [
        { kind: "paragraph", text: "The zebra grazes on the savanna next to a herd of antelope." },
      ]);
      await store.insertChunks(zoo, vectorsFor(zoo), { filePath: "/docs/zoo.md", fileType: "markdown" });

      const [top] = await store.hybridSearch("zebra", hashVector("zebra", DIM), { topK: 1, alpha: 0 });
      expect(top).toMatchObject({ key: "/docs/zoo.md#1", role: "hit", keywordScore: 1, chunkType: "paragraph" });
      expect(store.corpusSize).toBe(7);
    });

    it("returns records with their tree position", async () => {
      await insertPets(store);
      const [top] = await store.hybridSearch("bark strangers", hashVector("bark strangers", DIM), { topK: 1, alpha: 0 });
      expect(top).toMatchObject({
        key: `${PETS}#4`,
        content: DOGS,
        filePath: PETS,
        fileType: "markdown",
        chunkIndex: 4,
        parentIndex: 3,
        level: 2,
        score: 1,
      });
      expect(top?.metadata).toEqual({ chunkIndex: 4, childrenIds: [] });
    });

    it("fails with STORE_INDEX_MISSING before anything was stored", async () => {
      await expect(store.hybridSearch("cats", hashVector("cats", DIM), { topK: 3 }))
        .rejects.toMatchObject({ code: ErrorCode.STORE_INDEX_MISSING });
      await expect(store.vectorSearch(hashVector("cats", DIM), { topK: 3 })).rejects.toBeInstanceOf(VectorStoreError);
    });

    it("requests at least three candidates per result", async () => {
      await insertPets(store);
      const hits = await store.vectorSearch(hashVector("cats", DIM), { topK: 1, candidateMultiplier: 1 });
      expect(hits).toHaveLength(3);
    });

    it("drops keyword-only candidates that fail the content filter", async () => {
      await insertPets(store);
      await store.insertImages(["/img/cat.png"], [hashVector("cat", DIM)], { filePath: "/img", fileType: "image_folder" });

      const results = await store.hybridSearch("purr", hashVector("purr", DIM), { topK: 5, contentType: "image" });
      expect(results.map((result) => [result.key, result.contentType, result.chunkType])).toEqual([
        ["/img#0", "image", "image"],
      ]);
    });

    it("surfaces an invalid raw filter as STORE_INVALID_FILTER", async () => {
      await insertPets(store);
      await expect(
        store.hybridSearch("purr", hashVector("purr", DIM), { topK: 2, filterExpression: "level > 1" })
      ).rejects.toMatchObject({ code: ErrorCode.STORE_INVALID_FILTER });
    });

    it("returns nothing for topK 0", async () => {
      await insertPets(store);
      expect(await store.hybridSearch("purr", hashVector("purr", DIM), { topK: 0 })).toEqual([]);
    });
  });

  describe("hierarchicalSearch", () => {
    it("adds the parent section and keeps keys unique", async () => {
      await insertPets(store);
      const results = await store.hierarchicalSearch("purr", hashVector("purr", DIM), {
        topK: 3,
        alpha: 0,
        includeParent: true,
        includeChildren: true,
      });

      expect(results).toHaveLength(3);
      expect(results[0]).toMatchObject({ key: `${PETS}#2`, role: "hit", score: 1 });
      expect(results[1]).toMatchObject({ key: `${PETS}#1`, role: "parent", content: "Cats" });
      const keys = results.map((result) => result.key);
      expect(new Set(keys).size).toBe(keys.length);
    });

    it("returns plain hits when expansion is off", async () => {
      await insertPets(store);
      const results = await store.hierarchicalSearch("purr", hashVector("purr", DIM), {
        topK: 2,
        alpha: 0,
        includeParent: false,
        includeChildren: false,
      });
      expect(results.every((result) => result.role === "hit")).toBe(true);
      expect(results[0]?.key).toBe(`${PETS}#2`);
    });
  });

  describe("corpus rebuild", () => {
    it("lets a fresh adapter rebuild from persisted records", async () => {
      await insertPets(store);
      await store.insertImages(["/img/a.png"], [hashVector("a", DIM)], { filePath: "/img", fileType: "image_folder" });

      const reopened = new HierarchicalStore(db);
      expect(reopened.isCorpusStale()).toBe(true);
      expect(await reopened.rebuildCorpus()).toBe(5);
      expect(reopened.isCorpusStale()).toBe(false);
      expect(reopened.getPrimaryKey(`${PETS}#4`)).toBe("5");

      const [top] = await reopened.hybridSearch("bark", hashVector("bark", DIM), { topK: 1, alpha: 0 });
      expect(top?.key).toBe(`${PETS}#4`);
    });

    it("shares one rebuild between concurrent callers", async () => {
      await insertPets(store);
      const reopened = new HierarchicalStore(db);
      const [a, b] = await Promise.all([reopened.rebuildCorpus(), reopened.rebuildCorpus()]);
      expect([a, b]).toEqual([5, 5]);
    });

    it("yields an empty corpus when no collection exists", async () => {
      expect(await store.rebuildCorpus()).toBe(0);
      expect(store.corpusSize).toBe(0);
    });

    it("warns and truncates at the corpus page size", async () => {
      await insertPets(store);
      const small = new HierarchicalStore(db, { corpusPageSize: 2 });
      expect(await small.rebuildCorpus()).toBe(2);
    });
  });

  describe("deleteByProvenance", () => {
    it("removes every record of the source and forgets it in later queries", async () => {
      await insertPets(store);
      expect(await store.deleteByProvenance(PETS)).toBe(5);
      expect(store.isCorpusStale()).toBe(true);
      expect(store.getPrimaryKey(`${PETS}#2`)).toBeUndefined();

      expect(await store.hybridSearch("purr", hashVector("purr", DIM), { topK: 3 })).toEqual([]);
      expect(store.corpusSize).toBe(0);
    });

    it("returns 0 for an unknown source", async () => {
      await insertPets(store);
      expect(await store.deleteByProvenance("/docs/none.md")).toBe(0);
    });
  });

  describe("getContext", () => {
    it("returns the chunk with parent, children and siblings", async () => {
      await insertPets(store);
      const context = await store.getContext(PETS, 1, { includeSiblings: true });

      expect(context?.chunk).toMatchObject({ key: `${PETS}#1`, content: "Cats", role: "hit" });
      expect(context?.parent).toMatchObject({ key: `${PETS}#0`, role: "parent", parentIndex: null });
      expect(context?.children.map((child) => child.key)).toEqual([`${PETS}#2`]);
      expect(context?.siblings.map((sibling) => [sibling.key, sibling.role])).toEqual([[`${PETS}#3`, "sibling"]]);
    });

    it("returns null for a missing chunk", async () => {
      await insertPets(store);
      expect(await store.getContext(PETS, 99)).toBeNull();
    });
  });

  describe("listSources and getStats", () => {
    it("summarizes what is stored", async () => {
      await insertPets(store);
      await store.insertImages(
        ["/img/a.png", "/img/b.png"],
        [hashVector("a", DIM), hashVector("b", DIM)],
        { filePath: "/img", fileType: "image_folder" }
      );

      const sources = await store.listSources();
      expect(sources.map((source) => [source.filePath, source.contentType, source.records])).toEqual([
        [PETS, "text", 5],
        ["/img", "image", 2],
      ]);

      expect(await store.getStats()).toEqual({
        hasIndex: true,
        totalRecords: 7,
        textRecords: 5,
        imageRecords: 2,
        corpusSize: 5,
        corpusStale: false,
      });
    });

    it("reports an empty collection", async () => {
      expect(await store.listSources()).toEqual([]);
      expect(await store.getStats()).toMatchObject({ hasIndex: false, totalRecords: 0 });
    });
  });

  it("numbers image batches from the given start index", async () => {
    await store.insertImages(["/img/c.png"], [hashVector("c", DIM)], { filePath: "/img", fileType: "image_folder" }, 32);
    const [record] = await db.query({ filter: { contentType: "image" }, limit: 5 });
    expect(record).toMatchObject({ chunkIndex: 32, parentId: -1, level: 0, content: "/img/c.png" });
    expect(JSON.parse(record?.metadata ?? "{}")).toEqual({ imagePath: "/img/c.png", chunkIndex: 32, childrenIds: [] });
  });
});
