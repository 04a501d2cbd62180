/**
 * Keyword Index & Sparse Encoder Tests
 */

import { beforeEach, describe, expect, it } from "vitest";
import { KeywordIndex, tokenize } from "../fusion/keywordIndex";
import { fnv1a, TermHashSparseEncoder } from "../retrievers/sparseEncoder";

describe("tokenize", () => {
  it("lowercases, strips punctuation and drops single characters", () => {
    expect(tokenize("Hello, World! a B2")).toEqual(["hello", "world", "b2"]);
  });

  it("keeps Hangul and CJK terms", () => {
    expect(tokenize("안녕 하세요! 東京")).toEqual(["안녕", "하세요", "東京"]);
  });
});

describe("KeywordIndex", () => {
  let index: KeywordIndex;

  beforeEach(() => {
    index = new KeywordIndex();
    index.add([
      { id: "a", content: "apple banana", metadata: { kind: "fruit" } },
      { id: "b", content: "banana cherry" },
      { id: "c", content: "cherry cherry durian" },
    ]);
  });

  it("ranks documents by BM25 score", () => {
    const rows = index.search("cherry", 10);
    expect(rows.map((row) => row.id)).toEqual(["c", "b"]);
    expect(rows[0]?.score ?? 0).toBeGreaterThan(rows[1]?.score ?? 0);
  });

  it("returns content and a copy of the metadata", () => {
    const [row] = index.search("apple", 1);
    expect(row).toMatchObject({ id: "a", content: "apple banana", metadata: { kind: "fruit" } });
  });

  it("keeps insertion order between equal scores", () => {
    expect(index.search("banana", 10).map((row) => row.id)).toEqual(["a", "b"]);
  });

  it("returns nothing for unknown terms or topK 0", () => {
    expect(index.search("mango", 5)).toEqual([]);
    expect(index.search("banana", 0)).toEqual([]);
  });

  it("removes documents from the inverted index", () => {
    expect(index.remove(["b", "missing"])).toBe(1);
    expect(index.search("banana", 10).map((row) => row.id)).toEqual(["a"]);
    expect(index.getStats()).toEqual({ totalDocs: 2, totalTerms: 4, avgDocLength: 2.5 });
  });

  it("re-indexes a document added twice", () => {
    index.add([{ id: "a", content: "mango" }]);
    expect(index.search("apple", 5)).toEqual([]);
    expect(index.search("mango", 5).map((row) => row.id)).toEqual(["a"]);
  });

  it("clears everything", () => {
    index.clear();
    expect(index.getStats()).toEqual({ totalDocs: 0, totalTerms: 0, avgDocLength: 0 });
  });
});

describe("fnv1a", () => {
  it("matches the 32-bit FNV-1a reference values", () => {
    expect(fnv1a("")).toBe(0x811c9dc5);
    expect(fnv1a("a")).toBe(0xe40c292c);
    expect(fnv1a("foobar")).toBe(0xbf9cf968);
  });
});

describe("TermHashSparseEncoder", () => {
  it("weights terms by 1 + ln(tf) with sorted indices", async () => {
    const encoder = new TermHashSparseEncoder();
    const vector = await encoder.encode("Apple apple banana");

    expect(vector.indices).toEqual([565072, 797375]);
    expect(vector.values[0]).toBe(1);
    expect(vector.values[1]).toBeCloseTo(1 + Math.log(2), 12);
  });

  it("adds up colliding terms", () => {
    const vector = new TermHashSparseEncoder(1).encodeSync("apple banana");
    expect(vector.indices).toEqual([0]);
    expect(vector.values[0]).toBeCloseTo(1 + Math.log(2), 12);
  });

  it("encodes text without terms as an empty vector", () => {
    expect(new TermHashSparseEncoder().encodeSync("a !")).toEqual({ indices: [], values: [] });
  });
});
