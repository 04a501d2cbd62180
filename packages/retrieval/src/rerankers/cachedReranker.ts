/**
 * Cached Reranker
 *
 * Memoizes successful outcomes of a deterministic reranker, keyed by the
 * query, topN and the exact candidate list. Degraded outcomes are never
 * stored, so a transient backend failure is retried on the next call.
 */

import { createHash } from "node:crypto";
import { type CacheStats, isOk, LRUCache, type LRUCacheConfig, ok } from "@ragline/ai-core";
import type { RankedList, SearchResult } from "../types";
import type { Reranker, RerankerStats, RerankOutcome } from "./types";

export class CachedReranker implements Reranker {
  readonly name: string;

  private readonly inner: Reranker;
  private readonly cache: LRUCache<string, SearchResult[]>;

  constructor(inner: Reranker, config: Partial<LRUCacheConfig> = {}) {
    this.inner = inner;
    this.name = inner.name;
    this.cache = new LRUCache(config);
  }

  async initialize(): Promise<void> {
    await this.inner.initialize?.();
  }

  async close(): Promise<void> {
    this.cache.clear();
    await this.inner.close?.();
  }

  async rerank(query: string, results: RankedList, topN?: number): Promise<SearchResult[]> {
    const outcome = await this.rerankWithOutcome(query, results, topN);
    return isOk(outcome) ? outcome.value : [...results];
  }

  async rerankWithOutcome(
    query: string,
    results: RankedList,
    topN?: number
  ): Promise<RerankOutcome> {
    if (!this.inner.supportsCaching() || results.length === 0) {
      return this.inner.rerankWithOutcome(query, results, topN);
    }

    const key = cacheKey(query, results, topN);
    const cached = this.cache.get(key);
    if (cached) {
      return ok([...cached]);
    }

    const outcome = await this.inner.rerankWithOutcome(query, results, topN);
    if (isOk(outcome)) {
      this.cache.set(key, [...outcome.value]);
    }
    return outcome;
  }

  supportsCaching(): boolean {
    return this.inner.supportsCaching();
  }

  getStats(): RerankerStats {
    return this.inner.getStats();
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }
}

function cacheKey(query: string, results: RankedList, topN: number | undefined): string {
  const hash = createHash("sha1");
  hash.update(query).update("\u0000").update(String(topN ?? "all"));
  for (const result of results) {
    hash.update("\u0000").update(result.id).update("\u0001").update(result.content);
  }
  return hash.digest("hex");
}
