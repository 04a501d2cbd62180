/**
 * LLM Provider Types
 */

export type MessageRole = "system" | "user" | "assistant";

export interface Message {
  role: MessageRole;
  content: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type FinishReason = "stop" | "length" | "content_filter" | "error";

export interface CompletionRequest {
  /** Model id; falls back to the provider default when empty */
  model?: string;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON object response */
  responseFormat?: "text" | "json_object";
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  finishReason: FinishReason;
  model: string;
  latencyMs: number;
}

export type StreamChunkType = "content" | "usage" | "done" | "error";

export interface StreamChunk {
  type: StreamChunkType;
  /** Content delta (for content type) */
  content?: string;
  /** Usage (for usage/done type) */
  usage?: TokenUsage;
  /** Error message (for error type) */
  error?: string;
  finishReason?: FinishReason;
}

export interface EmbeddingRequest {
  texts: string[];
  model?: string;
  dimensions?: number;
  signal?: AbortSignal;
}

export interface EmbeddingResponse {
  embeddings: number[][];
  model: string;
  usage: TokenUsage;
}

export interface ProviderMetrics {
  provider: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  avgLatencyMs: number;
  lastRequestAt: number;
}

/**
 * Chat-completion and embedding provider.
 */
export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /** Stream completion deltas. Transport failures surface as an `error` chunk. */
  stream(request: CompletionRequest): AsyncIterable<StreamChunk>;

  embed(request: EmbeddingRequest): Promise<EmbeddingResponse>;

  getMetrics(): ProviderMetrics;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderConfig {
  apiKey: string;
  /** Base URL override */
  baseUrl?: string;
  /** Default model override */
  defaultModel?: string;
  /** Default timeout in ms */
  timeoutMs?: number;
  /** fetch implementation (defaults to global fetch) */
  fetch?: FetchFn;
}
