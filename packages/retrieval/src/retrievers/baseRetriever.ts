/**
 * Base Retriever
 *
 * Shared config resolution, counters and health probing for retrievers.
 */

import { ConfigurationError, createModuleLogger, type Logger } from "@ragline/ai-core";
import { validateAlpha } from "../fusion/hybridMerger";
import type {
  Embedder,
  Retriever,
  RetrieverStats,
  SearchFilters,
  SearchResult,
  VectorStoreAdapter,
} from "../types";

export interface RetrieverConfig {
  readonly collection: string;
  readonly topK: number;
  /** Dense-vs-sparse weight: 1.0 = dense only, 0.0 = sparse only */
  readonly hybridAlpha: number;
  /** Dimension of the zero vector used by health checks */
  readonly dimension: number;
}

export interface RetrieverOptions {
  store: VectorStoreAdapter;
  embedder: Embedder;
  collection?: string;
  topK?: number;
  hybridAlpha?: number;
  dimension?: number;
  logger?: Logger;
}

const DEFAULT_CONFIG: RetrieverConfig = {
  collection: "documents",
  topK: 10,
  hybridAlpha: 0.6,
  dimension: 768,
};

export function resolveRetrieverConfig(options: Partial<RetrieverConfig>): RetrieverConfig {
  const config = {
    collection: options.collection ?? DEFAULT_CONFIG.collection,
    topK: options.topK ?? DEFAULT_CONFIG.topK,
    hybridAlpha: options.hybridAlpha ?? DEFAULT_CONFIG.hybridAlpha,
    dimension: options.dimension ?? DEFAULT_CONFIG.dimension,
  };
  validateAlpha(config.hybridAlpha, "hybridAlpha");
  if (!Number.isInteger(config.topK) || config.topK <= 0) {
    throw new ConfigurationError(`topK must be a positive integer, got ${config.topK}`);
  }
  if (!Number.isInteger(config.dimension) || config.dimension <= 0) {
    throw new ConfigurationError(`dimension must be a positive integer, got ${config.dimension}`);
  }
  if (config.collection.length === 0) {
    throw new ConfigurationError("collection must not be empty");
  }
  return Object.freeze(config);
}

export abstract class BaseRetriever implements Retriever {
  readonly config: RetrieverConfig;

  protected readonly store: VectorStoreAdapter;
  protected readonly embedder: Embedder;
  protected readonly logger: Logger;
  protected readonly stats: RetrieverStats = {
    totalSearches: 0,
    hybridSearches: 0,
    errors: 0,
    bm25Preprocessed: 0,
  };

  constructor(module: string, options: RetrieverOptions) {
    this.config = resolveRetrieverConfig(options);
    this.store = options.store;
    this.embedder = options.embedder;
    this.logger = createModuleLogger(module, options.logger);
  }

  async search(
    query: string,
    topK: number = this.config.topK,
    filters?: SearchFilters
  ): Promise<SearchResult[]> {
    this.stats.totalSearches++;
    try {
      const results = await this.execute(query, topK, filters);
      this.logger.debug("Search completed", {
        backend: this.store.backend,
        topK,
        results: results.length,
      });
      return results;
    } catch (error) {
      this.stats.errors++;
      this.logger.error("Search failed", error, { backend: this.store.backend });
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const probe = new Array<number>(this.config.dimension).fill(0);
      await this.store.search(this.config.collection, probe, 1);
      return true;
    } catch (error) {
      this.logger.warn("Health check failed", {
        backend: this.store.backend,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  getStats(): RetrieverStats {
    return { ...this.stats };
  }

  protected abstract execute(
    query: string,
    topK: number,
    filters?: SearchFilters
  ): Promise<SearchResult[]>;
}
