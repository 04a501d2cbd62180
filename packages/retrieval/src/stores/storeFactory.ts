/**
 * Vector Store Factory
 *
 * Maps declarative backend config to a concrete adapter. Backends whose
 * client library is not installed come back as an explicit `unavailable`
 * selection instead of failing at import time.
 */

import type { FetchFn, Logger } from "@ragline/ai-core";
import type { VectorStoreAdapter } from "../types";
import { InMemoryVectorStore } from "./memoryStore";
import { MongoAtlasStore } from "./mongoAtlasStore";
import { isModuleAvailable } from "./optionalModule";
import { PgVectorStore } from "./pgvectorStore";
import { QdrantStore } from "./qdrantStore";

export type VectorBackend = "memory" | "pgvector" | "mongodb" | "qdrant";

export type VectorStoreConfig =
  | { backend: "memory" }
  | { backend: "pgvector"; connectionString?: string; maxConnections?: number }
  | { backend: "mongodb"; uri?: string; databaseName?: string; indexName?: string }
  | { backend: "qdrant"; url?: string; apiKey?: string; timeoutMs?: number; fetch?: FetchFn };

export type VectorStoreSelection =
  | { status: "ready"; backend: VectorBackend; store: VectorStoreAdapter }
  | {
      status: "unavailable";
      backend: VectorBackend;
      packageName: string;
      reason: string;
      installHint: string;
    };

export interface VectorStoreFactoryOptions {
  logger?: Logger;
  /** Override the installed-package probe */
  isAvailable?: (specifier: string) => boolean;
}

const OPTIONAL_PACKAGES: Partial<Record<VectorBackend, string>> = {
  pgvector: "pg",
  mongodb: "mongodb",
};

export function createVectorStore(
  config: VectorStoreConfig,
  options: VectorStoreFactoryOptions = {}
): VectorStoreSelection {
  const probe = options.isAvailable ?? isModuleAvailable;
  const required = OPTIONAL_PACKAGES[config.backend];
  if (required && !probe(required)) {
    return {
      status: "unavailable",
      backend: config.backend,
      packageName: required,
      reason: `install ${required} to use the ${config.backend} store`,
      installHint: `npm install ${required}`,
    };
  }

  const logger = options.logger;
  switch (config.backend) {
    case "memory":
      return { status: "ready", backend: "memory", store: new InMemoryVectorStore({ logger }) };
    case "pgvector":
      return {
        status: "ready",
        backend: "pgvector",
        store: new PgVectorStore({
          logger,
          connectionString: config.connectionString,
          maxConnections: config.maxConnections,
        }),
      };
    case "mongodb":
      return {
        status: "ready",
        backend: "mongodb",
        store: new MongoAtlasStore({
          logger,
          uri: config.uri,
          databaseName: config.databaseName,
          indexName: config.indexName,
        }),
      };
    case "qdrant":
      return {
        status: "ready",
        backend: "qdrant",
        store: new QdrantStore({
          logger,
          url: config.url,
          apiKey: config.apiKey,
          timeoutMs: config.timeoutMs,
          fetch: config.fetch,
        }),
      };
  }
}
