/**
 * Builds the runtime graph from a ServerConfig: providers, vector store,
 * retriever, reranker and pipeline.
 */

import {
  DependencyUnavailableError,
  type FetchFn,
  GeminiProvider,
  type Logger,
  type LLMProvider,
  OpenAIProvider,
  OpenRouterProvider,
} from "@ragline/ai-core";
import {
  createReranker,
  createVectorStore,
  HybridRetriever,
  KeywordIndex,
  type Reranker,
  TermHashSparseEncoder,
  type VectorStoreAdapter,
} from "@ragline/retrieval";
import { ProviderEmbedder } from "./ai/providerEmbedder";
import { RagPipeline } from "./ai/ragPipeline";
import type { LlmProviderName, ServerConfig } from "./config";

export interface RuntimeDeps {
  env?: Record<string, string | undefined>;
  fetch?: FetchFn;
  logger?: Logger;
  /** Seeded keyword corpus; an empty index is created otherwise */
  keywordIndex?: KeywordIndex;
}

export interface Runtime {
  pipeline: RagPipeline;
  store: VectorStoreAdapter;
  reranker: Reranker | null;
  /** Documents added here are fused with dense results on the next turn */
  keywordIndex: KeywordIndex;
  close(): Promise<void>;
}

export function createLlmProvider(
  provider: LlmProviderName,
  options: { apiKey: string; model?: string; fetch?: FetchFn }
): LLMProvider {
  const config = { apiKey: options.apiKey, defaultModel: options.model, fetch: options.fetch };
  switch (provider) {
    case "openai":
      return new OpenAIProvider(config);
    case "gemini":
      return new GeminiProvider(config);
    case "openrouter":
      return new OpenRouterProvider({ ...config, appName: "ragline" });
  }
}

export async function createRuntime(
  config: ServerConfig,
  deps: RuntimeDeps = {}
): Promise<Runtime> {
  const { logger } = deps;

  const selection = createVectorStore(config.vectorStore, { logger });
  if (selection.status === "unavailable") {
    throw new DependencyUnavailableError(selection.packageName, `the ${selection.backend} store`);
  }
  const store = selection.store;

  const embeddingProvider = createLlmProvider(config.embedding.provider, {
    apiKey: config.embedding.apiKey,
    fetch: deps.fetch,
  });
  const retriever = new HybridRetriever({
    store,
    embedder: new ProviderEmbedder(embeddingProvider, {
      model: config.embedding.model,
      dimensions: config.retriever.dimension,
    }),
    sparseEncoder: store.supportsSparse ? new TermHashSparseEncoder() : undefined,
    collection: config.retriever.collection,
    topK: config.retriever.topK,
    hybridAlpha: config.retriever.hybridAlpha,
    dimension: config.retriever.dimension,
    logger,
  });

  const reranker = createReranker(config.reranker, { env: deps.env, fetch: deps.fetch, logger });
  if (reranker) {
    await reranker.initialize?.();
  }

  const llm = createLlmProvider(config.llm.provider, {
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    fetch: deps.fetch,
  });

  const keywordIndex = deps.keywordIndex ?? new KeywordIndex();
  const pipeline = new RagPipeline({
    retriever,
    provider: llm,
    reranker,
    keywordIndex,
    fusionAlpha: config.retriever.hybridAlpha,
    retrieveTopK: config.retriever.topK,
    contextTopN: config.contextTopN,
    logger,
  });

  return {
    pipeline,
    store,
    reranker,
    keywordIndex,
    close: async () => {
      await reranker?.close?.();
      await store.close();
    },
  };
}
