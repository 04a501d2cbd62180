/**
 * Dense Retriever
 *
 * Embed the query, run a nearest-neighbour search, map rows to results.
 * Used with backends that have no sparse leg (pgvector, MongoDB Atlas).
 */

import type { SearchFilters, SearchResult } from "../types";
import { BaseRetriever, type RetrieverOptions } from "./baseRetriever";
import { toSearchResults } from "./rowMapping";

export class DenseRetriever extends BaseRetriever {
  constructor(options: RetrieverOptions) {
    super("dense-retriever", options);
  }

  protected async execute(
    query: string,
    topK: number,
    filters?: SearchFilters
  ): Promise<SearchResult[]> {
    const vector = await this.embedder.embedQuery(query);
    const rows = await this.store.search(this.config.collection, vector, topK, filters);
    return toSearchResults(rows);
  }
}
