/**
 * @ragline/ai-core
 *
 * Shared infrastructure for the RAG packages:
 * - Error taxonomy and Result envelope
 * - Pino logger factory
 * - LRU cache
 * - Fetch-based LLM and embedding providers
 */

// ============================================================================
// Errors & Result
// ============================================================================
export {
  ConfigurationError,
  DegradableError,
  DependencyUnavailableError,
  isRagError,
  LifecycleError,
  RagError,
  StoreError,
  toError,
  toErrorMessage,
  ValidationError,
} from "./errors/ragError";
export type {
  DegradedReasonKind,
  RagErrorCode,
  RagErrorOptions,
  StoreOperation,
} from "./errors/ragError";

export { err, isErr, isOk, mapResult, ok, tryCatchAsync, unwrapOr } from "./types/result";
export type { Err, Ok, Result } from "./types/result";

// ============================================================================
// Logging
// ============================================================================
export {
  createLogger,
  createModuleLogger,
  createPinoLogger,
  noopLogger,
  wrapLogger,
} from "./logging/logger";
export type { LogLevel, Logger, LoggerConfig } from "./logging/logger";

// ============================================================================
// Performance
// ============================================================================
export { LRUCache } from "./performance/cache";
export type { CacheStats, LRUCacheConfig } from "./performance/cache";

// ============================================================================
// Providers
// ============================================================================
export { BaseLLMProvider, mergeSignals } from "./providers/baseProvider";
export { OpenAIProvider, parseSSELine } from "./providers/openaiProvider";
export { GeminiProvider } from "./providers/geminiProvider";
export { OpenRouterProvider } from "./providers/openRouterProvider";
export type { OpenRouterConfig } from "./providers/openRouterProvider";
export type {
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  FetchFn,
  FinishReason,
  LLMProvider,
  Message,
  MessageRole,
  ProviderConfig,
  ProviderMetrics,
  StreamChunk,
  StreamChunkType,
  TokenUsage,
} from "./providers/types";
