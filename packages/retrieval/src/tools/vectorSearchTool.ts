/**
 * Vector Search Tool
 *
 * Exposes a retriever to tool-calling agents. Failures come back inside the
 * result envelope instead of being thrown.
 */

import { toErrorMessage } from "@ragline/ai-core";
import { z } from "zod";
import type { Retriever, SearchResult } from "../types";

export interface ToolResult<T> {
  success: boolean;
  data: T | null;
  error: string | null;
  toolName: string;
  executionTimeMs: number;
  metadata: Record<string, unknown>;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, { type: string; description: string }>;
    required?: string[];
  };
  annotations?: { readOnly?: boolean };
}

const VectorSearchArgsSchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  topK: z.number().int().positive().max(100).optional(),
  filters: z
    .object({ ids: z.array(z.string()).optional() })
    .catchall(z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]))
    .optional(),
});

export type VectorSearchArgs = z.infer<typeof VectorSearchArgsSchema>;

export const VECTOR_SEARCH_TOOL_NAME = "vector_search";

export class VectorSearchTool {
  readonly descriptor: ToolDescriptor = {
    name: VECTOR_SEARCH_TOOL_NAME,
    description:
      "Search the knowledge base for passages relevant to a query. Returns ranked passages with scores and metadata.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Natural-language search query" },
        topK: { type: "number", description: "Maximum passages to return (default 5)" },
        filters: { type: "object", description: "Exact-match metadata filters" },
      },
      required: ["query"],
    },
    annotations: { readOnly: true },
  };

  constructor(
    private readonly retriever: Retriever,
    private readonly defaultTopK = 5
  ) {}

  async execute(args: unknown): Promise<ToolResult<SearchResult[]>> {
    const start = performance.now();
    const parsed = VectorSearchArgsSchema.safeParse(args);
    if (!parsed.success) {
      return this.failure(
        parsed.error.issues.map((issue) => issue.message).join("; "),
        start
      );
    }

    const { query, topK = this.defaultTopK, filters } = parsed.data;
    try {
      const results = await this.retriever.search(query, topK, filters);
      return {
        success: true,
        data: results,
        error: null,
        toolName: VECTOR_SEARCH_TOOL_NAME,
        executionTimeMs: Math.round(performance.now() - start),
        metadata: { query, topK, resultCount: results.length },
      };
    } catch (error) {
      return this.failure(toErrorMessage(error), start, { query, topK });
    }
  }

  private failure(
    message: string,
    start: number,
    metadata: Record<string, unknown> = {}
  ): ToolResult<SearchResult[]> {
    return {
      success: false,
      data: null,
      error: message,
      toolName: VECTOR_SEARCH_TOOL_NAME,
      executionTimeMs: Math.round(performance.now() - start),
      metadata,
    };
  }
}
