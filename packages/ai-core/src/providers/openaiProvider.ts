/**
 * OpenAI Provider
 *
 * Provider for the OpenAI chat-completions and embeddings API. Any service
 * exposing the same wire format (Gemini's compatibility endpoint, OpenRouter)
 * reuses it through a subclass that overrides the base URL.
 */

import { BaseLLMProvider, mergeSignals } from "./baseProvider";
import type {
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  FinishReason,
  ProviderConfig,
  StreamChunk,
  TokenUsage,
} from "./types";

interface OpenAICompletionResponse {
  model: string;
  choices: Array<{
    index: number;
    message: { role: string; content: string | null };
    finish_reason: string | null;
  }>;
  usage?: OpenAIUsage;
}

interface OpenAIStreamPayload {
  choices?: Array<{
    delta?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: OpenAIUsage | null;
}

interface OpenAIEmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
  model: string;
  usage?: { prompt_tokens: number; total_tokens: number };
}

interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

const STREAM_DONE_MARKER = "[DONE]";

export class OpenAIProvider extends BaseLLMProvider {
  readonly name: string = "openai";
  readonly defaultModel: string;
  readonly defaultEmbeddingModel: string = "text-embedding-3-small";

  protected readonly baseUrl: string;

  constructor(config: ProviderConfig) {
    super(config);
    this.baseUrl = config.baseUrl || "https://api.openai.com/v1";
    this.defaultModel = config.defaultModel || "gpt-4o-mini";
  }

  /** Label used in error messages */
  protected get apiLabel(): string {
    return "OpenAI";
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const start = performance.now();
    try {
      const body: Record<string, unknown> = {
        model: this.getModel(request.model),
        messages: request.messages,
        temperature: request.temperature ?? 1,
        max_tokens: request.maxTokens,
      };
      if (request.responseFormat === "json_object") {
        body.response_format = { type: "json_object" };
      }

      const res = await this.post(
        "/chat/completions",
        body,
        this.resolveTimeoutSignal(request.timeoutMs, request.signal)
      );
      const response = (await res.json()) as OpenAICompletionResponse;

      const latencyMs = performance.now() - start;
      const usage = parseUsage(response.usage);
      this.trackSuccess(usage.inputTokens, usage.outputTokens, latencyMs);

      const choice = response.choices[0];
      return {
        content: choice?.message.content ?? "",
        usage,
        finishReason: mapFinishReason(choice?.finish_reason),
        model: response.model,
        latencyMs,
      };
    } catch (error) {
      this.trackFailure();
      throw error;
    }
  }

  async *stream(request: CompletionRequest): AsyncIterable<StreamChunk> {
    const start = performance.now();
    const usage = { inputTokens: 0, outputTokens: 0 };

    try {
      const res = await this.post(
        "/chat/completions",
        {
          model: this.getModel(request.model),
          messages: request.messages,
          temperature: request.temperature ?? 1,
          max_tokens: request.maxTokens,
          stream: true,
          stream_options: { include_usage: true },
        },
        this.resolveStreamSignal(request)
      );
      const reader = res.body?.getReader();
      if (!reader) {
        throw new Error("No response body");
      }

      for await (const chunk of parseSSEStream(reader)) {
        if (chunk.usage) {
          usage.inputTokens = chunk.usage.inputTokens;
          usage.outputTokens = chunk.usage.outputTokens;
        }
        yield chunk;
      }

      this.trackSuccess(usage.inputTokens, usage.outputTokens, performance.now() - start);
    } catch (error) {
      this.trackFailure();
      yield { type: "error", error: error instanceof Error ? error.message : "Unknown error" };
    }
  }

  async embed(request: EmbeddingRequest): Promise<EmbeddingResponse> {
    const start = performance.now();
    try {
      const res = await this.post(
        "/embeddings",
        {
          model: request.model || this.defaultEmbeddingModel,
          input: request.texts,
          dimensions: request.dimensions,
        },
        this.resolveTimeoutSignal(undefined, request.signal)
      );
      const response = (await res.json()) as OpenAIEmbeddingResponse;

      const promptTokens = response.usage?.prompt_tokens ?? 0;
      this.trackSuccess(promptTokens, 0, performance.now() - start);

      return {
        embeddings: [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding),
        model: response.model,
        usage: { inputTokens: promptTokens, outputTokens: 0, totalTokens: promptTokens },
      };
    } catch (error) {
      this.trackFailure();
      throw error;
    }
  }

  protected getHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Authorization: `Bearer ${this.apiKey}`,
    };
  }

  private async post(path: string, body: Record<string, unknown>, signal?: AbortSignal) {
    const init: RequestInit = {
      method: "POST",
      headers: this.getHeaders(),
      body: JSON.stringify(body),
    };
    if (signal) {
      init.signal = signal;
    }

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    if (!res.ok) {
      const errorText = await res.text();
      throw new Error(`${this.apiLabel} API error (${res.status}): ${errorText}`);
    }
    return res;
  }

  /** Streams only time out when the caller asks for it. */
  private resolveStreamSignal(request: CompletionRequest): AbortSignal | undefined {
    if (request.timeoutMs === undefined) {
      return request.signal;
    }
    const timeoutSignal = AbortSignal.timeout(request.timeoutMs);
    return request.signal ? mergeSignals(request.signal, timeoutSignal) : timeoutSignal;
  }
}

async function* parseSSEStream(
  reader: ReadableStreamDefaultReader<Uint8Array>
): AsyncIterable<StreamChunk> {
  const decoder = new TextDecoder();
  let buffer = "";

  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }

    buffer += decoder.decode(value, { stream: true });
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";

    for (const line of lines) {
      yield* parseSSELine(line);
    }
  }

  if (buffer.length > 0) {
    yield* parseSSELine(buffer);
  }
}

export function parseSSELine(line: string): StreamChunk[] {
  if (!line.startsWith("data: ")) {
    return [];
  }
  const data = line.slice(6).trim();
  if (!data || data === STREAM_DONE_MARKER) {
    return [];
  }

  let parsed: OpenAIStreamPayload;
  try {
    parsed = JSON.parse(data) as OpenAIStreamPayload;
  } catch {
    // Keep-alive comments and partial frames are not chunks.
    return [];
  }

  const chunks: StreamChunk[] = [];
  const choice = parsed.choices?.[0];
  if (choice?.delta?.content) {
    chunks.push({ type: "content", content: choice.delta.content });
  }
  if (choice?.finish_reason) {
    chunks.push({ type: "done", finishReason: mapFinishReason(choice.finish_reason) });
  }
  if (parsed.usage) {
    chunks.push({ type: "usage", usage: parseUsage(parsed.usage) });
  }
  return chunks;
}

function parseUsage(usage: OpenAIUsage | undefined): TokenUsage {
  if (!usage) {
    return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  }
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case "length":
      return "length";
    case "content_filter":
      return "content_filter";
    case "stop":
    case "tool_calls":
    case null:
    case undefined:
      return "stop";
    default:
      return "error";
  }
}
