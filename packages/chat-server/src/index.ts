/**
 * @ragline/chat-server
 *
 * WebSocket delivery of streamed RAG answers.
 */

// ============================================================================
// Protocol
// ============================================================================
export {
  ClientMessageSchema,
  createErrorEvent,
  DEFAULT_ERROR_SOLUTIONS,
  DEFAULT_PIPELINE_ERROR_CODE,
  MAX_CONTENT_LENGTH,
  WS_ERROR_CODES,
} from "./protocol/schemas";
export type {
  ClientMessage,
  SourceDocument,
  StreamEndEvent,
  StreamErrorEvent,
  StreamEvent,
  StreamEventType,
  StreamSourcesEvent,
  StreamStartEvent,
  StreamTokenEvent,
  WsErrorCode,
} from "./protocol/schemas";

// ============================================================================
// Sessions
// ============================================================================
export { ConnectionRegistry } from "./connectionRegistry";
export type {
  BroadcastResult,
  ConnectionRegistryOptions,
  TransportHandle,
} from "./connectionRegistry";
export { StreamingSession } from "./streamingSession";
export type { SessionState, SessionStats, StreamingSessionOptions } from "./streamingSession";

// ============================================================================
// Pipeline
// ============================================================================
export {
  buildContext,
  estimateTokens,
  PIPELINE_ERROR_CODES,
  RagPipeline,
  toSourceDocument,
} from "./ai/ragPipeline";
export type {
  GenerationPipeline,
  PipelineDone,
  PipelineEvent,
  PipelineMetadata,
  PipelineStreamOptions,
  RagPipelineConfig,
  RagPipelineOptions,
} from "./ai/ragPipeline";
export { ProviderEmbedder } from "./ai/providerEmbedder";

// ============================================================================
// Server
// ============================================================================
export { createTransport, RagStreamServer } from "./server";
export type { HealthReport, RagStreamServerConfig, RetrieverHealth } from "./server";
export { loadServerConfig } from "./config";
export type { LlmProviderName, ServerConfig } from "./config";
export { createLlmProvider, createRuntime } from "./bootstrap";
export type { Runtime, RuntimeDeps } from "./bootstrap";
