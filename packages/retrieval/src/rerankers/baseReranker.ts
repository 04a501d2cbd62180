/**
 * Base Reranker
 *
 * Owns the degradation policy shared by every reranker:
 * - empty input returns []
 * - when `maxDocuments` is set, only that many are scored; the rest follow
 *   in their original order with score 0
 * - scoring runs under a timeout
 * - any failure returns the original list, untruncated
 * - on success scores are clamped to [0, 1], sorted and cut to `topN`
 * Subclasses only implement `scoreDocuments`.
 */

import {
  createModuleLogger,
  DegradableError,
  err,
  isErr,
  type Logger,
  ok,
  type Result,
} from "@ragline/ai-core";
import { type RankedList, type SearchResult, withScore } from "../types";
import { clamp01, classifyFailure } from "./scoring";
import type { DegradedReason, Reranker, RerankerStats, RerankOutcome } from "./types";

export interface BaseRerankerOptions {
  /** Per-call scoring timeout in ms */
  timeoutMs?: number;
  /** Maximum documents sent to the scoring backend; unset scores them all */
  maxDocuments?: number;
  logger?: Logger;
}

/** Scores aligned with the documents passed in */
export type ScoreOutcome = Result<number[], DegradedReason>;

const DEFAULT_TIMEOUT_MS = 30000;

export abstract class BaseReranker implements Reranker {
  abstract readonly name: string;

  protected readonly timeoutMs: number;
  protected readonly maxDocuments: number | undefined;
  protected readonly logger: Logger;

  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;

  constructor(module: string, options: BaseRerankerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxDocuments = options.maxDocuments;
    this.logger = createModuleLogger(module, options.logger);
  }

  async rerank(query: string, results: RankedList, topN?: number): Promise<SearchResult[]> {
    const outcome = await this.rerankWithOutcome(query, results, topN);
    return isErr(outcome) ? [...results] : outcome.value;
  }

  async rerankWithOutcome(
    query: string,
    results: RankedList,
    topN?: number
  ): Promise<RerankOutcome> {
    if (results.length === 0) {
      return ok([]);
    }

    this.totalRequests++;
    const candidates = results.slice(0, this.maxDocuments ?? results.length);
    const outcome = await this.scoreWithTimeout(query, candidates);

    if (isErr(outcome)) {
      this.failedRequests++;
      this.logger.warn("Rerank failed, returning original order", {
        reason: outcome.error.kind,
        error: outcome.error.message,
        documents: results.length,
      });
      return outcome;
    }

    const scores = outcome.value;
    if (scores.length !== candidates.length) {
      this.failedRequests++;
      const reason = this.degraded(
        "malformed_response",
        `expected ${candidates.length} scores, got ${scores.length}`
      );
      this.logger.warn("Rerank returned a misaligned score list", { reason: reason.message });
      return err(reason);
    }

    this.successfulRequests++;
    const rescored = candidates
      .map((result, index) => ({ result: withScore(result, clamp01(scores[index] ?? 0)), index }))
      .sort((a, b) => b.result.score - a.result.score || a.index - b.index)
      .map((entry) => entry.result);
    for (const unscored of results.slice(candidates.length)) {
      rescored.push(withScore(unscored, 0));
    }

    return ok(topN !== undefined && topN >= 0 ? rescored.slice(0, topN) : rescored);
  }

  supportsCaching(): boolean {
    return false;
  }

  getStats(): RerankerStats {
    const successRate =
      this.totalRequests > 0
        ? Math.round((this.successfulRequests / this.totalRequests) * 10000) / 100
        : 0;
    return {
      reranker: this.name,
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      successRate,
      config: {
        timeoutMs: this.timeoutMs,
        ...(this.maxDocuments !== undefined ? { maxDocuments: this.maxDocuments } : {}),
        ...this.describeConfig(),
      },
    };
  }

  /**
   * Score each document against the query. Return Err for expected backend
   * failures; thrown errors are classified the same way.
   */
  protected abstract scoreDocuments(
    query: string,
    documents: readonly SearchResult[],
    signal: AbortSignal
  ): Promise<ScoreOutcome>;

  /** Identifying config reported in stats */
  protected describeConfig(): Record<string, unknown> {
    return {};
  }

  protected degraded(kind: DegradedReason["kind"], message: string): DegradedReason {
    return { kind, message, reranker: this.name };
  }

  private async scoreWithTimeout(
    query: string,
    documents: readonly SearchResult[]
  ): Promise<ScoreOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    // Backends that ignore the signal are still cut off by the race.
    const timeout = new Promise<ScoreOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new DegradableError("timeout", `timed out after ${this.timeoutMs}ms`));
        resolve(err(this.degraded("timeout", `timed out after ${this.timeoutMs}ms`)));
      }, this.timeoutMs);
    });

    const scoring = this.scoreDocuments(query, documents, controller.signal).catch(
      (error: unknown): ScoreOutcome => {
        const failure = classifyFailure(error);
        return err(this.degraded(failure.kind, failure.message));
      }
    );

    try {
      return await Promise.race([scoring, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
