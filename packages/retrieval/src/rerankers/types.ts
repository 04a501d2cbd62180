/**
 * Reranker Types
 */

import type { DegradedReasonKind, Result } from "@ragline/ai-core";
import type { RankedList, SearchResult } from "../types";

/** Why a rerank call fell back to its input */
export interface DegradedReason {
  kind: DegradedReasonKind;
  message: string;
  reranker: string;
}

export type RerankOutcome = Result<SearchResult[], DegradedReason>;

export interface RerankerStats {
  reranker: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  /** Percentage, rounded to 2 decimals */
  successRate: number;
  config: Record<string, unknown>;
}

/**
 * Re-scores a candidate list against a query. Scores on success are
 * normalized to [0, 1]. A failing backend never throws out of `rerank`:
 * the original list comes back unchanged and untruncated.
 */
export interface Reranker {
  readonly name: string;

  rerank(query: string, results: RankedList, topN?: number): Promise<SearchResult[]>;

  /** Same as `rerank`, with the degradation branch made explicit */
  rerankWithOutcome(query: string, results: RankedList, topN?: number): Promise<RerankOutcome>;

  /** True when the same query/document pair always gets the same score */
  supportsCaching(): boolean;

  getStats(): RerankerStats;

  /** Warm up models or connections ahead of the first request */
  initialize?(): Promise<void>;

  close?(): Promise<void>;
}
