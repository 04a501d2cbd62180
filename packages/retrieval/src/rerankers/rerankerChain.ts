/**
 * Reranker Chain
 *
 * Runs rerankers one after another, each over the previous stage's output.
 * A degraded stage passes its input through; the chain only degrades when
 * every stage did.
 */

import {
  ConfigurationError,
  createModuleLogger,
  err,
  isOk,
  type Logger,
  ok,
} from "@ragline/ai-core";
import type { RankedList, SearchResult } from "../types";
import type { DegradedReason, Reranker, RerankerStats, RerankOutcome } from "./types";

export interface RerankerChainOptions {
  logger?: Logger;
}

export class RerankerChain implements Reranker {
  readonly name: string;

  private readonly stages: readonly Reranker[];
  private readonly logger: Logger;
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;

  constructor(stages: readonly Reranker[], options: RerankerChainOptions = {}) {
    if (stages.length === 0) {
      throw new ConfigurationError("RerankerChain needs at least one stage");
    }
    this.stages = [...stages];
    this.name = `chain(${stages.map((stage) => stage.name).join(" > ")})`;
    this.logger = createModuleLogger("reranker-chain", options.logger);
  }

  async initialize(): Promise<void> {
    for (const stage of this.stages) {
      await stage.initialize?.();
    }
  }

  async close(): Promise<void> {
    for (const stage of this.stages) {
      await stage.close?.();
    }
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
    if (results.length === 0) {
      return ok([]);
    }

    this.totalRequests++;
    let current: SearchResult[] = [...results];
    let succeeded = 0;
    let lastFailure: DegradedReason | undefined;

    for (const [index, stage] of this.stages.entries()) {
      const isFinal = index === this.stages.length - 1;
      const outcome = await stage.rerankWithOutcome(query, current, isFinal ? topN : undefined);
      if (isOk(outcome)) {
        current = outcome.value;
        succeeded++;
        continue;
      }
      lastFailure = outcome.error;
      this.logger.warn("Chain stage degraded, passing results through", {
        stage: stage.name,
        reason: outcome.error.kind,
      });
    }

    if (succeeded === 0) {
      this.failedRequests++;
      return err(
        lastFailure ?? { kind: "unknown", message: "no stage succeeded", reranker: this.name }
      );
    }

    this.successfulRequests++;
    return ok(topN !== undefined && topN >= 0 ? current.slice(0, topN) : current);
  }

  supportsCaching(): boolean {
    return this.stages.every((stage) => stage.supportsCaching());
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
      config: { stages: this.stages.map((stage) => stage.getStats()) },
    };
  }
}
