/**
 * LLM Reranker
 *
 * Uses a chat model as a relevance judge. The model sees the numbered
 * candidates and answers with `{"rankings":[{"index":i,"score":s}]}`.
 */

import {
  ConfigurationError,
  err,
  type FetchFn,
  GeminiProvider,
  type LLMProvider,
  ok,
  OpenAIProvider,
  OpenRouterProvider,
} from "@ragline/ai-core";
import { z } from "zod";
import type { SearchResult } from "../types";
import { BaseReranker, type BaseRerankerOptions, type ScoreOutcome } from "./baseReranker";
import { clamp01 } from "./scoring";

const RankingsSchema = z.object({
  rankings: z.array(
    z.object({
      index: z.number().int(),
      score: z.number(),
    })
  ),
});

export type Rankings = z.infer<typeof RankingsSchema>["rankings"];

/** Characters of each document shown to the judge */
const DOCUMENT_PREVIEW_CHARS = 1000;

const SYSTEM_PROMPT = [
  "You rank documents by how well they answer a search query.",
  "Score every document between 0.0 (irrelevant) and 1.0 (fully answers the query).",
  'Reply with JSON only: {"rankings":[{"index":<document index>,"score":<score>}]}',
].join("\n");

export function buildRerankPrompt(query: string, documents: readonly SearchResult[]): string {
  const lines = documents.map(
    (doc, index) => `[${index}] ${doc.content.slice(0, DOCUMENT_PREVIEW_CHARS)}`
  );
  return `Query: ${query}\n\nDocuments:\n${lines.join("\n\n")}`;
}

/**
 * Pull the rankings out of a model reply. Accepts a bare JSON object, one
 * wrapped in a ```json fence, or one surrounded by prose.
 * Returns null when no valid rankings object is found.
 */
export function parseRankings(content: string): Rankings | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content)?.[1];
  const candidates = [fenced, content, extractBraces(content)];
  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const parsed = RankingsSchema.safeParse(parseJson(candidate.trim()));
    if (parsed.success) {
      return parsed.data.rankings;
    }
  }
  return null;
}

function extractBraces(content: string): string | undefined {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  return start >= 0 && end > start ? content.slice(start, end + 1) : undefined;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Judges sometimes answer on a 0-10 scale. */
function normalizeJudgeScore(score: number): number {
  return clamp01(score > 1 ? score / 10 : score);
}

export interface LlmRerankerOptions extends BaseRerankerOptions {
  provider: LLMProvider;
  /** Provider tag reported in stats */
  providerName: string;
  model?: string;
}

export class LlmReranker extends BaseReranker {
  readonly name: string = "llm";
  readonly model: string;

  private readonly provider: LLMProvider;
  private readonly providerName: string;
  private closed = false;

  constructor(options: LlmRerankerOptions, module = "llm-reranker") {
    super(module, options);
    this.provider = options.provider;
    this.providerName = options.providerName;
    this.model = options.model ?? options.provider.defaultModel;
  }

  async initialize(): Promise<void> {
    this.closed = false;
    this.logger.info("LLM reranker ready", { provider: this.providerName, model: this.model });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  protected async scoreDocuments(
    query: string,
    documents: readonly SearchResult[],
    signal: AbortSignal
  ): Promise<ScoreOutcome> {
    if (this.closed) {
      return err(this.degraded("unknown", "reranker is closed"));
    }

    const response = await this.provider.complete({
      model: this.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildRerankPrompt(query, documents) },
      ],
      temperature: 0,
      responseFormat: "json_object",
      timeoutMs: this.timeoutMs,
      signal,
    });

    const rankings = parseRankings(response.content);
    if (!rankings) {
      return err(this.degraded("malformed_response", "judge reply holds no rankings"));
    }

    const scores = new Array<number>(documents.length).fill(0);
    let matched = 0;
    for (const { index, score } of rankings) {
      if (index < 0 || index >= documents.length) {
        continue;
      }
      scores[index] = normalizeJudgeScore(score);
      matched++;
    }
    if (matched === 0) {
      return err(this.degraded("malformed_response", "judge ranked no known document"));
    }
    return ok(scores);
  }

  protected override describeConfig(): Record<string, unknown> {
    return { model: this.model, provider: this.providerName };
  }
}

export interface HostedLlmRerankerOptions extends BaseRerankerOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  fetch?: FetchFn;
}

function requireKey(label: string, apiKey: string): string {
  if (!apiKey) {
    throw new ConfigurationError(`${label} API key is required`);
  }
  return apiKey;
}

export class OpenAIReranker extends LlmReranker {
  override readonly name = "openai";

  constructor(options: HostedLlmRerankerOptions) {
    const provider = new OpenAIProvider({
      apiKey: requireKey("OpenAI", options.apiKey),
      baseUrl: options.baseUrl,
      defaultModel: options.model,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    });
    super({ ...options, provider, providerName: "openai" }, "openai-reranker");
  }
}

export class GeminiReranker extends LlmReranker {
  override readonly name = "gemini";

  constructor(options: HostedLlmRerankerOptions) {
    const provider = new GeminiProvider({
      apiKey: requireKey("Google", options.apiKey),
      baseUrl: options.baseUrl,
      defaultModel: options.model,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    });
    super({ ...options, provider, providerName: "google" }, "gemini-reranker");
  }
}

export class OpenRouterReranker extends LlmReranker {
  override readonly name = "openrouter";

  constructor(options: HostedLlmRerankerOptions) {
    const provider = new OpenRouterProvider({
      apiKey: requireKey("OpenRouter", options.apiKey),
      baseUrl: options.baseUrl,
      defaultModel: options.model,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    });
    super({ ...options, provider, providerName: "openrouter" }, "openrouter-reranker");
  }
}
