/**
 * Hybrid Retriever
 *
 * Dense + sparse search against a store that fuses both legs. The dense leg
 * always embeds the original query; only the sparse leg sees preprocessed
 * text.
 */

import type {
  QueryPreprocessors,
  SearchFilters,
  SearchResult,
  SparseEncoder,
  SparseVector,
} from "../types";
import { BaseRetriever, type RetrieverOptions } from "./baseRetriever";
import { QueryPreprocessor } from "./queryPreprocessor";
import { toSearchResults } from "./rowMapping";

export interface HybridRetrieverOptions extends RetrieverOptions {
  sparseEncoder?: SparseEncoder;
  preprocessors?: QueryPreprocessors;
}

export class HybridRetriever extends BaseRetriever {
  private readonly sparseEncoder: SparseEncoder | undefined;
  private readonly preprocessor: QueryPreprocessor;

  constructor(options: HybridRetrieverOptions) {
    super("hybrid-retriever", options);
    this.sparseEncoder = options.sparseEncoder;
    this.preprocessor = new QueryPreprocessor(options.preprocessors, this.logger);

    if (this.sparseEncoder && !this.store.supportsSparse) {
      this.logger.warn("Store ignores sparse vectors; searching dense only", {
        backend: this.store.backend,
      });
    }
  }

  /** Whether searches run the sparse leg */
  get isHybrid(): boolean {
    return (
      this.config.hybridAlpha < 1 && this.sparseEncoder !== undefined && this.store.supportsSparse
    );
  }

  protected async execute(
    query: string,
    topK: number,
    filters?: SearchFilters
  ): Promise<SearchResult[]> {
    const vector = await this.embedder.embedQuery(query);

    let sparseVector: SparseVector | undefined;
    if (this.isHybrid && this.sparseEncoder) {
      const processed = this.preprocessor.process(query);
      if (processed.changed) {
        this.stats.bm25Preprocessed++;
        this.logger.debug("Sparse query preprocessed", {
          original: query,
          processed: processed.text,
        });
      }
      sparseVector = await this.sparseEncoder.encode(processed.text);
      this.stats.hybridSearches++;
    }

    const rows = await this.store.search(
      this.config.collection,
      vector,
      topK,
      filters,
      sparseVector
    );
    return toSearchResults(rows);
  }
}
