/**
 * RAG Streaming Pipeline
 *
 * Retrieval-augmented generation as an event stream:
 * retrieve (optionally fused with a keyword index), rerank, build the
 * context, then stream the model's answer.
 *
 * Failures are yielded as `error` events; the pipeline itself does not throw
 * for retrieval or generation faults.
 */

import {
  createModuleLogger,
  isRagError,
  type Logger,
  type LLMProvider,
  type Message,
  type TokenUsage,
  toErrorMessage,
} from "@ragline/ai-core";
import {
  HybridMerger,
  type KeywordIndex,
  type Reranker,
  type Retriever,
  type SearchResult,
} from "@ragline/retrieval";
import type { SourceDocument } from "../protocol/schemas";

// ============================================================================
// Events
// ============================================================================

export interface PipelineMetadata {
  sessionId: string;
  searchResults: number;
  rankedResults: number;
  rerankingApplied: boolean;
  keywordFusion: boolean;
}

export interface PipelineDone {
  sessionId: string;
  totalChunks: number;
  processingTimeMs: number;
  tokensUsed: number;
  sources: SourceDocument[];
}

export type PipelineEvent =
  | { event: "metadata"; data: PipelineMetadata }
  | { event: "chunk"; data: string; chunkIndex: number }
  | { event: "done"; data: PipelineDone }
  | { event: "error"; errorCode?: string; message?: string; solutions?: string[] };

export interface PipelineStreamOptions {
  topK?: number;
  signal?: AbortSignal;
}

/** Generation backend driven by a StreamingSession */
export interface GenerationPipeline {
  stream(
    message: string,
    sessionId: string,
    options?: PipelineStreamOptions
  ): AsyncIterable<PipelineEvent>;
  /** Probe of the retrieval backend, reported by /health */
  healthCheck?(): Promise<boolean>;
}

export const PIPELINE_ERROR_CODES = {
  retrieval: "RAG-101-RETRIEVAL_FAILED",
  generation: "GEN-001-GENERATION_FAILED",
} as const;

// ============================================================================
// Pipeline
// ============================================================================

export interface RagPipelineConfig {
  /** Candidates fetched from the retriever */
  retrieveTopK: number;
  /** Passages kept for the prompt after reranking */
  contextTopN: number;
  maxContextTokens: number;
  temperature: number;
  systemPrompt: string;
}

export interface RagPipelineOptions extends Partial<RagPipelineConfig> {
  retriever: Retriever;
  provider: LLMProvider;
  reranker?: Reranker | null;
  /** Keyword index fused with the retriever's results via RRF */
  keywordIndex?: KeywordIndex;
  /** Fusion weight of the retriever leg when a keyword index is set */
  fusionAlpha?: number;
  model?: string;
  logger?: Logger;
}

const DEFAULT_CONFIG: RagPipelineConfig = {
  retrieveTopK: 10,
  contextTopN: 5,
  maxContextTokens: 4000,
  temperature: 0.3,
  systemPrompt: `You are a helpful research assistant. Answer questions based on the provided context.
Cite your sources using [1], [2], etc. If the context does not contain enough information to answer, say so.
Be concise but thorough.`,
};

/** Characters of each passage returned as a source */
const SOURCE_PREVIEW_CHARS = 200;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function toSourceDocument(result: SearchResult): SourceDocument {
  return {
    id: result.id,
    content: result.content.slice(0, SOURCE_PREVIEW_CHARS),
    score: result.score,
    metadata: { ...result.metadata },
  };
}

/**
 * Numbered context block. Passages that would overflow the token budget are
 * truncated, and the rest dropped.
 */
export function buildContext(results: readonly SearchResult[], maxTokens: number): string {
  const parts: string[] = [];
  let used = 0;

  for (const [index, result] of results.entries()) {
    const header = `[${index + 1}] Source:`;
    const cost = estimateTokens(header) + estimateTokens(result.content);
    if (used + cost > maxTokens) {
      const remaining = maxTokens - used - estimateTokens(header);
      if (remaining > 50) {
        parts.push(`${header}\n${result.content.slice(0, remaining * 4)}`);
      }
      break;
    }
    parts.push(`${header}\n${result.content}`);
    used += cost;
  }

  return parts.join("\n\n---\n\n");
}

export class RagPipeline implements GenerationPipeline {
  private readonly retriever: Retriever;
  private readonly provider: LLMProvider;
  private readonly reranker: Reranker | null;
  private readonly keywordIndex: KeywordIndex | undefined;
  private readonly merger: HybridMerger;
  private readonly model: string | undefined;
  private readonly config: RagPipelineConfig;
  private readonly logger: Logger;

  constructor(options: RagPipelineOptions) {
    this.retriever = options.retriever;
    this.provider = options.provider;
    this.reranker = options.reranker ?? null;
    this.keywordIndex = options.keywordIndex;
    this.merger = new HybridMerger(options.fusionAlpha ?? 0.5);
    this.model = options.model;
    this.config = {
      retrieveTopK: options.retrieveTopK ?? DEFAULT_CONFIG.retrieveTopK,
      contextTopN: options.contextTopN ?? DEFAULT_CONFIG.contextTopN,
      maxContextTokens: options.maxContextTokens ?? DEFAULT_CONFIG.maxContextTokens,
      temperature: options.temperature ?? DEFAULT_CONFIG.temperature,
      systemPrompt: options.systemPrompt ?? DEFAULT_CONFIG.systemPrompt,
    };
    this.logger = createModuleLogger("rag-pipeline", options.logger);
  }

  healthCheck(): Promise<boolean> {
    return this.retriever.healthCheck();
  }

  async *stream(
    message: string,
    sessionId: string,
    options: PipelineStreamOptions = {}
  ): AsyncGenerator<PipelineEvent> {
    const startTime = performance.now();
    const topK = options.topK ?? this.config.retrieveTopK;

    // 1. Retrieve
    let candidates: SearchResult[];
    try {
      candidates = await this.retrieve(message, topK);
    } catch (error) {
      this.logger.error("Retrieval failed", error, { sessionId });
      yield {
        event: "error",
        errorCode: PIPELINE_ERROR_CODES.retrieval,
        message: `Document retrieval failed: ${toErrorMessage(error)}`,
        solutions: isRagError(error) ? error.solutions : undefined,
      };
      return;
    }

    // 2. Rerank. A degraded reranker hands back the full input order.
    const reranked = this.reranker
      ? await this.reranker.rerank(message, candidates, this.config.contextTopN)
      : candidates;
    const ranked = reranked.slice(0, this.config.contextTopN);

    yield {
      event: "metadata",
      data: {
        sessionId,
        searchResults: candidates.length,
        rankedResults: ranked.length,
        rerankingApplied: this.reranker !== null,
        keywordFusion: this.usesKeywordIndex(),
      },
    };

    // 3. Generate
    const context = buildContext(ranked, this.config.maxContextTokens);
    const messages: Message[] = [
      { role: "system", content: `${this.config.systemPrompt}\n\nContext:\n${context}` },
      { role: "user", content: message },
    ];

    let chunkIndex = 0;
    let usage: TokenUsage | undefined;
    try {
      for await (const chunk of this.provider.stream({
        model: this.model,
        messages,
        temperature: this.config.temperature,
        signal: options.signal,
      })) {
        if (chunk.type === "content" && chunk.content) {
          yield { event: "chunk", data: chunk.content, chunkIndex: chunkIndex++ };
        } else if (chunk.type === "error") {
          yield this.generationError(chunk.error ?? "unknown provider error", sessionId);
          return;
        } else if (chunk.usage) {
          usage = chunk.usage;
        }
      }
    } catch (error) {
      yield this.generationError(toErrorMessage(error), sessionId);
      return;
    }

    const processingTimeMs = Math.round(performance.now() - startTime);
    this.logger.info("Answer generated", {
      sessionId,
      chunks: chunkIndex,
      sources: ranked.length,
      processingTimeMs,
    });

    yield {
      event: "done",
      data: {
        sessionId,
        totalChunks: chunkIndex,
        processingTimeMs,
        tokensUsed: usage?.totalTokens ?? 0,
        sources: ranked.map(toSourceDocument),
      },
    };
  }

  private usesKeywordIndex(): boolean {
    return this.keywordIndex !== undefined && this.keywordIndex.getStats().totalDocs > 0;
  }

  private async retrieve(query: string, topK: number): Promise<SearchResult[]> {
    const dense = await this.retriever.search(query, topK);
    if (!this.keywordIndex || !this.usesKeywordIndex()) {
      return dense;
    }
    const keywordRows = this.keywordIndex.search(query, topK);
    return this.merger.merge(dense, keywordRows, topK);
  }

  private generationError(reason: string, sessionId: string): PipelineEvent {
    this.logger.warn("Generation failed", { sessionId, reason });
    return {
      event: "error",
      errorCode: PIPELINE_ERROR_CODES.generation,
      message: `Answer generation failed: ${reason}`,
      solutions: ["Please try again shortly.", "Check the LLM provider status and API key."],
    };
  }
}
