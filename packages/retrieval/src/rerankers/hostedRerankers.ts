/**
 * Hosted Rerankers
 *
 * Rerank APIs that take (query, documents) and answer with
 * `{ results: [{ index, relevance_score }] }`: Jina cross-encoder,
 * Jina ColBERT (late interaction) and Cohere.
 */

import { ConfigurationError, err, type FetchFn, ok } from "@ragline/ai-core";
import { z } from "zod";
import type { SearchResult } from "../types";
import { BaseReranker, type BaseRerankerOptions, type ScoreOutcome } from "./baseReranker";
import { clamp01, normalizeByMax } from "./scoring";

export interface HostedRerankerOptions extends BaseRerankerOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  fetch?: FetchFn;
}

const RerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

abstract class HostedReranker extends BaseReranker {
  readonly model: string;

  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  private readonly endpoint: string;
  private readonly label: string;
  private readonly fetchImpl: FetchFn;

  constructor(
    module: string,
    label: string,
    defaults: { model: string; baseUrl: string; endpoint: string },
    options: HostedRerankerOptions
  ) {
    super(module, options);
    if (!options.apiKey) {
      throw new ConfigurationError(`${label} API key is required`);
    }
    this.apiKey = options.apiKey;
    this.label = label;
    this.endpoint = defaults.endpoint;
    this.model = options.model ?? defaults.model;
    this.baseUrl = (options.baseUrl ?? defaults.baseUrl).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  override supportsCaching(): boolean {
    return true;
  }

  protected async scoreDocuments(
    query: string,
    documents: readonly SearchResult[],
    signal: AbortSignal
  ): Promise<ScoreOutcome> {
    const res = await this.fetchImpl(`${this.baseUrl}${this.endpoint}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        query,
        documents: documents.map((doc) => doc.content),
        top_n: documents.length,
      }),
      signal,
    });
    if (!res.ok) {
      const errorText = await res.text();
      throw new Error(`${this.label} API error (${res.status}): ${errorText}`);
    }

    const parsed = RerankResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      return err(this.degraded("malformed_response", parsed.error.message));
    }

    // Documents the API left out score 0.
    const raw = new Array<number>(documents.length).fill(0);
    for (const item of parsed.data.results) {
      if (item.index >= documents.length) {
        return err(
          this.degraded("malformed_response", `result index ${item.index} out of range`)
        );
      }
      raw[item.index] = item.relevance_score;
    }
    return ok(this.normalize(raw));
  }

  protected normalize(scores: number[]): number[] {
    return scores.map(clamp01);
  }

  protected override describeConfig(): Record<string, unknown> {
    return { model: this.model };
  }
}

export class JinaReranker extends HostedReranker {
  readonly name = "jina";

  constructor(options: HostedRerankerOptions) {
    super(
      "jina-reranker",
      "Jina",
      {
        model: "jina-reranker-v2-base-multilingual",
        baseUrl: "https://api.jina.ai",
        endpoint: "/v1/rerank",
      },
      options
    );
  }
}

/**
 * Late-interaction scoring. ColBERT relevance is a sum of token-level
 * maxima and is not bounded by 1, so batches are scaled by their maximum.
 */
export class JinaColbertReranker extends HostedReranker {
  readonly name = "jina-colbert";

  constructor(options: HostedRerankerOptions) {
    super(
      "jina-colbert-reranker",
      "Jina",
      { model: "jina-colbert-v2", baseUrl: "https://api.jina.ai", endpoint: "/v1/rerank" },
      options
    );
  }

  protected override normalize(scores: number[]): number[] {
    return normalizeByMax(scores);
  }
}

export class CohereReranker extends HostedReranker {
  readonly name = "cohere";

  constructor(options: HostedRerankerOptions) {
    super(
      "cohere-reranker",
      "Cohere",
      { model: "rerank-v3.5", baseUrl: "https://api.cohere.com", endpoint: "/v2/rerank" },
      options
    );
  }
}
