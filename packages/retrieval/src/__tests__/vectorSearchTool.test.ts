/**
 * Vector Search Tool Tests
 */

import { describe, expect, it, vi } from "vitest";
import { VectorSearchTool } from "../tools/vectorSearchTool";
import { createSearchResult, type Retriever, type SearchFilters } from "../types";

function retrieverStub(search: Retriever["search"]): Retriever {
  return {
    search,
    healthCheck: async () => true,
    getStats: () => ({ totalSearches: 0, hybridSearches: 0, errors: 0, bm25Preprocessed: 0 }),
  };
}

describe("VectorSearchTool", () => {
  it("wraps results in a success envelope", async () => {
    const hit = createSearchResult("a", "alpha", 0.9, { source: "kb.md" });
    const search = vi.fn(async (_query: string, _topK?: number, _filters?: SearchFilters) => [hit]);
    const tool = new VectorSearchTool(retrieverStub(search));

    const result = await tool.execute({ query: "alpha", filters: { source: "kb.md" } });

    expect(search).toHaveBeenCalledWith("alpha", 5, { source: "kb.md" });
    expect(result).toMatchObject({
      success: true,
      data: [hit],
      error: null,
      toolName: "vector_search",
      metadata: { query: "alpha", topK: 5, resultCount: 1 },
    });
    expect(result.executionTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("reports retriever failures without throwing", async () => {
    const tool = new VectorSearchTool(
      retrieverStub(async () => {
        throw new Error("qdrant search failed: connection refused");
      })
    );

    const result = await tool.execute({ query: "alpha", topK: 3 });

    expect(result).toMatchObject({
      success: false,
      data: null,
      error: "qdrant search failed: connection refused",
      metadata: { query: "alpha", topK: 3 },
    });
  });

  it("rejects a blank query before searching", async () => {
    const search = vi.fn(async () => []);
    const tool = new VectorSearchTool(retrieverStub(search));

    const result = await tool.execute({ query: "   " });

    expect(result.success).toBe(false);
    expect(result.error).toBe("query is required");
    expect(search).not.toHaveBeenCalled();
  });

  it("describes its input schema", () => {
    const tool = new VectorSearchTool(retrieverStub(async () => []));
    expect(tool.descriptor.name).toBe("vector_search");
    expect(tool.descriptor.inputSchema.required).toEqual(["query"]);
  });
});
