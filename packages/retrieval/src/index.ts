/**
 * @ragline/retrieval
 *
 * Vector store adapters, dense and hybrid retrievers, RRF fusion and
 * rerankers.
 */

// ============================================================================
// Core types
// ============================================================================
export { createSearchResult, withScore } from "./types";
export type {
  DeleteRequest,
  Embedder,
  FilterScalar,
  ProtectedText,
  QueryPreprocessors,
  RankedList,
  RawRow,
  Retriever,
  RetrieverStats,
  SearchFilters,
  SearchResult,
  SparseEncoder,
  SparseVector,
  StopwordFilter,
  StoreStats,
  SynonymExpander,
  UserDictionary,
  VectorDocument,
  VectorStoreAdapter,
} from "./types";

// ============================================================================
// Stores
// ============================================================================
export { BaseVectorStore, matchesFilters, splitFilters, toRawRow } from "./stores/baseVectorStore";
export type {
  BaseVectorStoreOptions,
  PreparedDocument,
  VectorQuery,
} from "./stores/baseVectorStore";
export { cosineSimilarity, InMemoryVectorStore, sparseDot } from "./stores/memoryStore";
export { PgVectorStore, toVectorLiteral } from "./stores/pgvectorStore";
export type { PgClientLike, PgVectorStoreOptions } from "./stores/pgvectorStore";
export { MongoAtlasStore } from "./stores/mongoAtlasStore";
export type {
  MongoAtlasStoreOptions,
  MongoCollectionLike,
  MongoDatabaseLike,
} from "./stores/mongoAtlasStore";
export { QdrantStore, toPointId } from "./stores/qdrantStore";
export type { QdrantStoreOptions } from "./stores/qdrantStore";
export { isModuleAvailable, loadOptionalModule } from "./stores/optionalModule";
export { createVectorStore } from "./stores/storeFactory";
export type {
  VectorBackend,
  VectorStoreConfig,
  VectorStoreFactoryOptions,
  VectorStoreSelection,
} from "./stores/storeFactory";

// ============================================================================
// Fusion
// ============================================================================
export { HybridMerger, RRF_K, rrfScore, validateAlpha } from "./fusion/hybridMerger";
export type { Bm25Row } from "./fusion/hybridMerger";
export { KeywordIndex, tokenize } from "./fusion/keywordIndex";
export type { KeywordDocument } from "./fusion/keywordIndex";

// ============================================================================
// Retrievers
// ============================================================================
export { BaseRetriever, resolveRetrieverConfig } from "./retrievers/baseRetriever";
export type { RetrieverConfig, RetrieverOptions } from "./retrievers/baseRetriever";
export { DenseRetriever } from "./retrievers/denseRetriever";
export { HybridRetriever } from "./retrievers/hybridRetriever";
export type { HybridRetrieverOptions } from "./retrievers/hybridRetriever";
export { QueryPreprocessor } from "./retrievers/queryPreprocessor";
export type { PreprocessedQuery } from "./retrievers/queryPreprocessor";
export { TermHashSparseEncoder } from "./retrievers/sparseEncoder";

// ============================================================================
// Rerankers
// ============================================================================
export { BaseReranker } from "./rerankers/baseReranker";
export type { BaseRerankerOptions, ScoreOutcome } from "./rerankers/baseReranker";
export { LexicalCrossEncoder, LocalReranker } from "./rerankers/localReranker";
export type { CrossEncoderModel, LocalRerankerOptions } from "./rerankers/localReranker";
export { CohereReranker, JinaColbertReranker, JinaReranker } from "./rerankers/hostedRerankers";
export type { HostedRerankerOptions } from "./rerankers/hostedRerankers";
export {
  GeminiReranker,
  LlmReranker,
  OpenAIReranker,
  OpenRouterReranker,
  parseRankings,
} from "./rerankers/llmReranker";
export type { HostedLlmRerankerOptions, LlmRerankerOptions } from "./rerankers/llmReranker";
export { CachedReranker } from "./rerankers/cachedReranker";
export { RerankerChain } from "./rerankers/rerankerChain";
export {
  createReranker,
  createRerankerChain,
  PROVIDER_KEY_ENV,
  RerankerConfigSchema,
} from "./rerankers/rerankerFactory";
export type {
  RerankerApproach,
  RerankerConfig,
  RerankerFactoryOptions,
  RerankerProvider,
} from "./rerankers/rerankerFactory";
export { clamp01, normalizeByMax, sigmoid } from "./rerankers/scoring";
export type { DegradedReason, Reranker, RerankerStats, RerankOutcome } from "./rerankers/types";

// ============================================================================
// Tools
// ============================================================================
export { VECTOR_SEARCH_TOOL_NAME, VectorSearchTool } from "./tools/vectorSearchTool";
export type { ToolDescriptor, ToolResult, VectorSearchArgs } from "./tools/vectorSearchTool";
