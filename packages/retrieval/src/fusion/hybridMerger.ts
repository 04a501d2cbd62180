/**
 * Hybrid Merger
 *
 * Fuses a dense-ranked list and a BM25-ranked list with weighted Reciprocal
 * Rank Fusion:
 *
 *   score(d) = alpha * 1 / (rank_dense(d) + K) + (1 - alpha) * 1 / (rank_bm25(d) + K)
 *
 * with 1-based ranks and K = 60. A document missing from a list gets no
 * contribution from it. Native scores are ignored; only positions matter.
 */

import { ConfigurationError } from "@ragline/ai-core";
import { createSearchResult, type RankedList, type SearchResult } from "../types";

/** RRF damping constant */
export const RRF_K = 60;

/** Keyword-search row as produced by a BM25 backend */
export interface Bm25Row {
  id: string;
  content: string;
  score?: number;
  metadata?: Record<string, unknown> | null;
}

interface FusedEntry {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  score: number;
  /** Position of first appearance: dense order, then BM25 order */
  order: number;
}

/**
 * Validate a fusion weight. Out-of-range values are rejected, never clamped.
 */
export function validateAlpha(alpha: number, name = "alpha"): number {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new ConfigurationError(`${name} must be within [0.0, 1.0], got ${alpha}`, {
      context: { [name]: alpha },
    });
  }
  return alpha;
}

/**
 * RRF contribution of a 1-based rank.
 */
export function rrfScore(rank: number, weight = 1): number {
  return weight / (rank + RRF_K);
}

export class HybridMerger {
  readonly alpha: number;

  constructor(alpha = 0.5) {
    this.alpha = validateAlpha(alpha);
  }

  merge(
    denseResults: RankedList,
    bm25Results: readonly Bm25Row[],
    topK: number,
    alpha: number = this.alpha
  ): SearchResult[] {
    validateAlpha(alpha);
    if (topK <= 0) {
      return [];
    }

    const fused = new Map<string, FusedEntry>();
    let order = 0;

    const accumulate = (
      id: string,
      rank: number,
      weight: number,
      content: string,
      metadata: Record<string, unknown>
    ) => {
      const existing = fused.get(id);
      if (existing) {
        existing.score += rrfScore(rank, weight);
        return;
      }
      fused.set(id, { id, content, metadata, score: rrfScore(rank, weight), order: order++ });
    };

    // A repeated id inside one list only counts at its best rank.
    const seenDense = new Set<string>();
    denseResults.forEach((result, index) => {
      if (seenDense.has(result.id)) {
        return;
      }
      seenDense.add(result.id);
      accumulate(result.id, index + 1, alpha, result.content, { ...result.metadata });
    });

    const seenBm25 = new Set<string>();
    bm25Results.forEach((row, index) => {
      if (seenBm25.has(row.id)) {
        return;
      }
      seenBm25.add(row.id);
      accumulate(row.id, index + 1, 1 - alpha, row.content, { ...(row.metadata ?? {}) });
    });

    return Array.from(fused.values())
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, topK)
      .map((entry) => createSearchResult(entry.id, entry.content, entry.score, entry.metadata));
  }
}
