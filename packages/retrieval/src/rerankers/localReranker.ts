/**
 * Local Reranker
 *
 * Runs a cross-encoder in process and squashes its logits with a sigmoid.
 * The default model is a lexical scorer; any model exposing `predict` over
 * (query, document) pairs can be plugged in.
 */

import { ok } from "@ragline/ai-core";
import { tokenize } from "../fusion/keywordIndex";
import type { SearchResult } from "../types";
import { BaseReranker, type BaseRerankerOptions, type ScoreOutcome } from "./baseReranker";
import { sigmoid } from "./scoring";

/** Cross-encoder returning one real-valued logit per pair */
export interface CrossEncoderModel {
  readonly name: string;
  predict(pairs: ReadonlyArray<readonly [string, string]>): Promise<number[]>;
  load?(): Promise<void>;
}

/**
 * Deterministic term-overlap scorer.
 *
 * logit = 6 * coverage - 3 (+ 2 when the whole query appears verbatim),
 * where coverage is the share of distinct query terms found in the document.
 */
export class LexicalCrossEncoder implements CrossEncoderModel {
  readonly name = "lexical-overlap";

  async predict(pairs: ReadonlyArray<readonly [string, string]>): Promise<number[]> {
    return pairs.map(([query, document]) => lexicalLogit(query, document));
  }
}

export function lexicalLogit(query: string, document: string): number {
  const queryTerms = new Set(tokenize(query));
  if (queryTerms.size === 0) {
    return -3;
  }
  const documentTerms = new Set(tokenize(document));
  let matched = 0;
  for (const term of queryTerms) {
    if (documentTerms.has(term)) {
      matched++;
    }
  }
  const coverage = matched / queryTerms.size;
  const verbatim = document.toLowerCase().includes(query.trim().toLowerCase()) ? 2 : 0;
  return 6 * coverage - 3 + verbatim;
}

export interface LocalRerankerOptions extends BaseRerankerOptions {
  model?: CrossEncoderModel;
}

export class LocalReranker extends BaseReranker {
  readonly name = "local";

  private readonly model: CrossEncoderModel;
  private loaded = false;

  constructor(options: LocalRerankerOptions = {}) {
    super("local-reranker", options);
    this.model = options.model ?? new LexicalCrossEncoder();
  }

  async initialize(): Promise<void> {
    if (this.loaded) {
      return;
    }
    await this.model.load?.();
    this.loaded = true;
    this.logger.info("Cross-encoder ready", { model: this.model.name });
  }

  override supportsCaching(): boolean {
    return true;
  }

  protected async scoreDocuments(
    query: string,
    documents: readonly SearchResult[]
  ): Promise<ScoreOutcome> {
    await this.initialize();
    const logits = await this.model.predict(
      documents.map((doc) => [query, doc.content] as const)
    );
    return ok(logits.map(sigmoid));
  }

  protected override describeConfig(): Record<string, unknown> {
    return { modelName: this.model.name };
  }
}
