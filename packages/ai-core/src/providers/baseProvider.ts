/**
 * Base LLM Provider
 *
 * Shared metrics tracking and abort-signal plumbing for fetch-based providers.
 */

import type {
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  FetchFn,
  LLMProvider,
  ProviderConfig,
  ProviderMetrics,
  StreamChunk,
} from "./types";

const DEFAULT_TIMEOUT_MS = 30000;

function emptyMetrics(provider: string): ProviderMetrics {
  return {
    provider,
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    avgLatencyMs: 0,
    lastRequestAt: 0,
  };
}

export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected readonly apiKey: string;
  protected readonly timeoutMs: number;
  protected readonly fetchImpl: FetchFn;
  private metrics: ProviderMetrics = emptyMetrics("");

  constructor(config: ProviderConfig) {
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  abstract complete(request: CompletionRequest): Promise<CompletionResponse>;

  abstract stream(request: CompletionRequest): AsyncIterable<StreamChunk>;

  abstract embed(request: EmbeddingRequest): Promise<EmbeddingResponse>;

  getMetrics(): ProviderMetrics {
    return { ...this.metrics, provider: this.name };
  }

  protected trackSuccess(inputTokens: number, outputTokens: number, latencyMs: number): void {
    this.metrics.totalRequests++;
    this.metrics.successfulRequests++;
    this.metrics.totalInputTokens += inputTokens;
    this.metrics.totalOutputTokens += outputTokens;
    this.metrics.lastRequestAt = Date.now();

    const totalLatency =
      this.metrics.avgLatencyMs * (this.metrics.successfulRequests - 1) + latencyMs;
    this.metrics.avgLatencyMs = totalLatency / this.metrics.successfulRequests;
  }

  protected trackFailure(): void {
    this.metrics.totalRequests++;
    this.metrics.failedRequests++;
    this.metrics.lastRequestAt = Date.now();
  }

  /**
   * Combine an optional external signal with a timeout signal.
   */
  protected resolveTimeoutSignal(timeoutMs: number | undefined, signal?: AbortSignal): AbortSignal {
    const timeoutSignal = AbortSignal.timeout(timeoutMs ?? this.timeoutMs);
    if (!signal) {
      return timeoutSignal;
    }
    return mergeSignals(signal, timeoutSignal);
  }

  protected getModel(requestModel: string | undefined): string {
    return requestModel && requestModel.length > 0 ? requestModel : this.defaultModel;
  }
}

/**
 * Abort when either signal aborts.
 */
export function mergeSignals(primary: AbortSignal, secondary: AbortSignal): AbortSignal {
  const controller = new AbortController();
  if (primary.aborted || secondary.aborted) {
    controller.abort(primary.aborted ? primary.reason : secondary.reason);
    return controller.signal;
  }

  const abortFrom = (source: AbortSignal) => () => controller.abort(source.reason);
  primary.addEventListener("abort", abortFrom(primary), { once: true });
  secondary.addEventListener("abort", abortFrom(secondary), { once: true });
  return controller.signal;
}
