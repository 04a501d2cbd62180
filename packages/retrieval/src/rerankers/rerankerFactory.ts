/**
 * Reranker Factory
 *
 * Selects a reranker from (approach, provider). Returns null when reranking
 * is disabled or the provider's API key is not set, so callers can run
 * without a reranker instead of failing at startup.
 */

import { ConfigurationError, type FetchFn, type Logger } from "@ragline/ai-core";
import { z } from "zod";
import { CachedReranker } from "./cachedReranker";
import {
  CohereReranker,
  type HostedRerankerOptions,
  JinaColbertReranker,
  JinaReranker,
} from "./hostedRerankers";
import { GeminiReranker, OpenAIReranker, OpenRouterReranker } from "./llmReranker";
import { LocalReranker } from "./localReranker";
import { RerankerChain } from "./rerankerChain";
import type { Reranker } from "./types";

export const RerankerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  approach: z.enum(["cross-encoder", "late-interaction", "llm"]),
  provider: z.enum(["local", "jina", "cohere", "openai", "google", "openrouter"]),
  model: z.string().min(1).optional(),
  maxDocuments: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
  /** Wrap deterministic rerankers in an LRU cache */
  cache: z.boolean().default(false),
});

export type RerankerConfig = z.input<typeof RerankerConfigSchema>;
export type RerankerApproach = z.infer<typeof RerankerConfigSchema>["approach"];
export type RerankerProvider = z.infer<typeof RerankerConfigSchema>["provider"];

export interface RerankerFactoryOptions {
  env?: Record<string, string | undefined>;
  fetch?: FetchFn;
  logger?: Logger;
}

/** Environment variable holding each hosted provider's key */
export const PROVIDER_KEY_ENV: Record<Exclude<RerankerProvider, "local">, string> = {
  jina: "JINA_API_KEY",
  cohere: "COHERE_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
};

const SUPPORTED: Record<RerankerApproach, readonly RerankerProvider[]> = {
  "cross-encoder": ["local", "jina", "cohere"],
  "late-interaction": ["jina"],
  llm: ["openai", "google", "openrouter"],
};

export function createReranker(
  config: RerankerConfig,
  options: RerankerFactoryOptions = {}
): Reranker | null {
  const parsed = RerankerConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid reranker config: ${parsed.error.message}`);
  }
  const { enabled, approach, provider, model, maxDocuments, timeoutMs, cache } = parsed.data;
  if (!enabled) {
    return null;
  }
  if (!SUPPORTED[approach].includes(provider)) {
    throw new ConfigurationError(
      `Unsupported reranker: approach "${approach}" with provider "${provider}"`
    );
  }

  const common = { model, maxDocuments, timeoutMs, logger: options.logger };
  if (provider === "local") {
    const reranker = new LocalReranker({ maxDocuments, timeoutMs, logger: options.logger });
    return cache ? new CachedReranker(reranker) : reranker;
  }

  const env = options.env ?? process.env;
  const apiKey = env[PROVIDER_KEY_ENV[provider]];
  if (!apiKey) {
    options.logger?.warn("Reranker API key not set, reranking disabled", {
      provider,
      env: PROVIDER_KEY_ENV[provider],
    });
    return null;
  }
  const reranker = createHostedReranker(approach, provider, {
    ...common,
    apiKey,
    fetch: options.fetch,
  });
  return cache ? new CachedReranker(reranker) : reranker;
}

function createHostedReranker(
  approach: RerankerApproach,
  provider: Exclude<RerankerProvider, "local">,
  options: HostedRerankerOptions
): Reranker {
  switch (provider) {
    case "jina":
      return approach === "late-interaction"
        ? new JinaColbertReranker(options)
        : new JinaReranker(options);
    case "cohere":
      return new CohereReranker(options);
    case "openai":
      return new OpenAIReranker(options);
    case "google":
      return new GeminiReranker(options);
    case "openrouter":
      return new OpenRouterReranker(options);
  }
}

/**
 * Build a chain from several configs, skipping stages that resolve to null.
 * Returns null when no stage is left, and the bare reranker for one stage.
 */
export function createRerankerChain(
  configs: readonly RerankerConfig[],
  options: RerankerFactoryOptions = {}
): Reranker | null {
  const stages = configs
    .map((config) => createReranker(config, options))
    .filter((stage): stage is Reranker => stage !== null);
  if (stages.length === 0) {
    return null;
  }
  if (stages.length === 1) {
    return stages[0] ?? null;
  }
  return new RerankerChain(stages, { logger: options.logger });
}
