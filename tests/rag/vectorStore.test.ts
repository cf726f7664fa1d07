import { describe, it, expect } from "@jest/globals";
import { InMemoryVectorDatabase, toSqlPredicate } from "../../src/rag/vectorStore.js";
import type { NewRecord } from "../../src/rag/types.js";
import { ErrorCode } from "../../src/utils/errors.js";

function record(filePath: string, chunkIndex: number, vector: number[], contentType: "text" | "image" = "text"): NewRecord {
  return {
    contentType,
    content: `${filePath} ${chunkIndex}`,
    filePath,
    fileType: contentType === "image" ? "image_folder" : "markdown",
    chunkIndex,
    parentId: -1,
    chunkType: contentType === "image" ? "image" : "paragraph",
    level: contentType === "image" ? 0 : 1,
    metadata: "{}",
    createdAt: "2026-01-01T00:00:00.000Z",
    vector,
  };
}

describe("toSqlPredicate", () => {
  it("returns null for an empty filter", () => {
    expect(toSqlPredicate(undefined)).toBeNull();
    expect(toSqlPredicate({})).toBeNull();
    expect(toSqlPredicate({ expression: "   " })).toBeNull();
  });

  it("ANDs clauses and escapes quotes", () => {
    expect(
      toSqlPredicate({
        contentType: "text",
        filePath: "/kb/o'brien.md",
        chunkIndices: [0, 2],
        expression: " level <= 2 ",
      })
    ).toBe("content_type = 'text' AND file_path = '/kb/o''brien.md' AND chunk_index IN (0, 2) AND (level <= 2)");
  });

  it("matches nothing for an empty index list", () => {
    expect(toSqlPredicate({ chunkIndices: [] })).toBe("FALSE");
  });
});

describe("InMemoryVectorDatabase", () => {
  it("has no index until the first insert", async () => {
    const db = new InMemoryVectorDatabase();
    expect(await db.hasIndex()).toBe(false);
    await expect(db.search([0, 0], { limit: 1 })).rejects.toMatchObject({ code: ErrorCode.STORE_INDEX_MISSING });

    expect(await db.insert([record("/a.md", 0, [0, 0])])).toEqual(["1"]);
    expect(await db.hasIndex()).toBe(true);
  });

  it("ranks by squared L2 distance", async () => {
    const db = new InMemoryVectorDatabase();
    await db.insert([record("/a.md", 0, [3, 4]), record("/a.md", 1, [1, 0]), record("/b.md", 0, [0, 2])]);

    const hits = await db.search([0, 0], { limit: 2 });
    expect(hits.map((hit) => [hit.record.filePath, hit.record.chunkIndex, hit.distance])).toEqual([
      ["/a.md", 1, 1],
      ["/b.md", 0, 4],
    ]);
    expect(hits[0]?.record).not.toHaveProperty("vector");
  });

  it("rejects a query vector of the wrong dimension", async () => {
    const db = new InMemoryVectorDatabase();
    await db.insert([record("/a.md", 0, [1, 0, 0])]);

    await expect(db.search([1, 0], { limit: 1 })).rejects.toMatchObject({
      code: ErrorCode.STORE_QUERY_FAILED,
      message: "Query vector has 2 dimensions but stored vectors have 3",
    });
  });

  it("applies structured filters to query, count and delete", async () => {
    const db = new InMemoryVectorDatabase();
    await db.insert([
      record("/a.md", 0, [0]),
      record("/a.md", 1, [0]),
      record("/pics", 0, [0], "image"),
    ]);

    expect(await db.count({ contentType: "image" })).toBe(1);
    expect((await db.query({ filter: { filePath: "/a.md", chunkIndices: [1] }, limit: 10 })).map((r) => r.chunkIndex)).toEqual([1]);
    expect(await db.delete({ filePath: "/a.md" })).toBe(2);
    expect(await db.count()).toBe(1);
  });

  it("rejects raw expressions", async () => {
    const db = new InMemoryVectorDatabase({ indexed: true });
    await expect(db.query({ filter: { expression: "level = 1" }, limit: 1 })).rejects.toMatchObject({
      code: ErrorCode.STORE_INVALID_FILTER,
    });
  });
});
