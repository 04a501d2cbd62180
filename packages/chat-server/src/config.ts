/**
 * Server configuration, read once from the environment.
 */

import { ConfigurationError, type LogLevel } from "@ragline/ai-core";
import type { RerankerConfig, VectorStoreConfig } from "@ragline/retrieval";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  HOST: z.string().default("0.0.0.0"),
  WS_PATH: z.string().startsWith("/").default("/chat-ws"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),

  VECTOR_BACKEND: z.enum(["memory", "pgvector", "mongodb", "qdrant"]).default("memory"),
  VECTOR_COLLECTION: z.string().min(1).default("documents"),
  DATABASE_URL: z.string().optional(),
  MONGODB_URI: z.string().optional(),
  MONGODB_DATABASE: z.string().optional(),
  QDRANT_URL: z.string().url().optional(),
  QDRANT_API_KEY: z.string().optional(),

  RETRIEVER_TOP_K: z.coerce.number().int().positive().default(10),
  HYBRID_ALPHA: z.coerce.number().min(0).max(1).default(0.6),

  EMBEDDING_PROVIDER: z.enum(["openai", "gemini"]).default("openai"),
  EMBEDDING_MODEL: z.string().optional(),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),

  LLM_PROVIDER: z.enum(["openai", "gemini", "openrouter"]).default("openai"),
  LLM_MODEL: z.string().optional(),

  RERANK_ENABLED: booleanFlag.default("false"),
  RERANK_APPROACH: z.enum(["cross-encoder", "late-interaction", "llm"]).default("cross-encoder"),
  RERANK_PROVIDER: z
    .enum(["local", "jina", "cohere", "openai", "google", "openrouter"])
    .default("local"),
  RERANK_MODEL: z.string().optional(),
  RERANK_TOP_N: z.coerce.number().int().positive().default(5),
  RERANK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

  OPENAI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  JINA_API_KEY: z.string().optional(),
  COHERE_API_KEY: z.string().optional(),
});

export type LlmProviderName = "openai" | "gemini" | "openrouter";

export interface ServerConfig {
  server: { host: string; port: number; wsPath: string };
  logLevel?: LogLevel;
  vectorStore: VectorStoreConfig;
  retriever: { collection: string; topK: number; hybridAlpha: number; dimension: number };
  embedding: { provider: "openai" | "gemini"; model?: string; apiKey: string };
  llm: { provider: LlmProviderName; model?: string; apiKey: string };
  reranker: RerankerConfig;
  /** Passages kept after reranking */
  contextTopN: number;
}

const KEY_ENV: Record<LlmProviderName, "OPENAI_API_KEY" | "GOOGLE_API_KEY" | "OPENROUTER_API_KEY"> =
  {
    openai: "OPENAI_API_KEY",
    gemini: "GOOGLE_API_KEY",
    openrouter: "OPENROUTER_API_KEY",
  };

/**
 * Validate the environment. Empty strings count as unset.
 *
 * @throws ConfigurationError on any invalid or missing value
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`, {
      context: { issues },
    });
  }
  const vars = parsed.data;

  const requireKey = (provider: LlmProviderName, usage: string): string => {
    const name = KEY_ENV[provider];
    const value = vars[name];
    if (!value) {
      throw new ConfigurationError(`${name} is required for ${usage}=${provider}`, {
        solutions: [`Set ${name} in the environment.`],
      });
    }
    return value;
  };

  return {
    server: { host: vars.HOST, port: vars.PORT, wsPath: vars.WS_PATH },
    logLevel: vars.LOG_LEVEL,
    vectorStore: toVectorStoreConfig(vars),
    retriever: {
      collection: vars.VECTOR_COLLECTION,
      topK: vars.RETRIEVER_TOP_K,
      hybridAlpha: vars.HYBRID_ALPHA,
      dimension: vars.EMBEDDING_DIMENSIONS,
    },
    embedding: {
      provider: vars.EMBEDDING_PROVIDER,
      model: vars.EMBEDDING_MODEL,
      apiKey: requireKey(vars.EMBEDDING_PROVIDER, "EMBEDDING_PROVIDER"),
    },
    llm: {
      provider: vars.LLM_PROVIDER,
      model: vars.LLM_MODEL,
      apiKey: requireKey(vars.LLM_PROVIDER, "LLM_PROVIDER"),
    },
    reranker: {
      enabled: vars.RERANK_ENABLED,
      approach: vars.RERANK_APPROACH,
      provider: vars.RERANK_PROVIDER,
      model: vars.RERANK_MODEL,
      timeoutMs: vars.RERANK_TIMEOUT_MS,
    },
    contextTopN: vars.RERANK_TOP_N,
  };
}

function toVectorStoreConfig(vars: z.infer<typeof EnvSchema>): VectorStoreConfig {
  switch (vars.VECTOR_BACKEND) {
    case "memory":
      return { backend: "memory" };
    case "pgvector":
      if (!vars.DATABASE_URL) {
        throw new ConfigurationError("DATABASE_URL is required for VECTOR_BACKEND=pgvector");
      }
      return { backend: "pgvector", connectionString: vars.DATABASE_URL };
    case "mongodb":
      if (!vars.MONGODB_URI) {
        throw new ConfigurationError("MONGODB_URI is required for VECTOR_BACKEND=mongodb");
      }
      return { backend: "mongodb", uri: vars.MONGODB_URI, databaseName: vars.MONGODB_DATABASE };
    case "qdrant":
      return { backend: "qdrant", url: vars.QDRANT_URL, apiKey: vars.QDRANT_API_KEY };
  }
}
