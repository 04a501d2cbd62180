/**
 * Base Vector Store
 *
 * Owns the behaviour every backend shares: id generation, skipping documents
 * without an embedding, filter splitting, counters and StoreError wrapping.
 * Backends only implement the raw upsert/query/remove calls.
 */

import { randomUUID } from "node:crypto";
import {
  createModuleLogger,
  isRagError,
  type Logger,
  StoreError,
  type StoreOperation,
} from "@ragline/ai-core";
import type {
  DeleteRequest,
  FilterScalar,
  RawRow,
  SearchFilters,
  SparseVector,
  StoreStats,
  VectorDocument,
  VectorStoreAdapter,
} from "../types";

/** Document ready to be written: id assigned, embedding present */
export interface PreparedDocument {
  id: string;
  embedding: readonly number[];
  sparseEmbedding?: SparseVector;
  content: string;
  metadata: Record<string, unknown>;
}

export interface VectorQuery {
  vector: readonly number[];
  topK: number;
  /** Direct id lookup, when the caller passed `ids` */
  ids?: readonly string[];
  /** Metadata equality conditions (AND) */
  match: Record<string, FilterScalar>;
  sparseVector?: SparseVector;
}

export interface BaseVectorStoreOptions {
  logger?: Logger;
}

export abstract class BaseVectorStore implements VectorStoreAdapter {
  abstract readonly backend: string;
  abstract readonly supportsSparse: boolean;

  protected readonly logger: Logger;
  private readonly stats = { documentsAdded: 0, searches: 0, deletions: 0 };

  constructor(module: string, options: BaseVectorStoreOptions = {}) {
    this.logger = createModuleLogger(module, options.logger);
  }

  async addDocuments(collection: string, documents: readonly VectorDocument[]): Promise<number> {
    // Keyed by id: a repeated id within one batch is written once, last write wins.
    const byId = new Map<string, PreparedDocument>();
    for (const doc of documents) {
      const id = doc.id ?? randomUUID();
      if (!doc.embedding || doc.embedding.length === 0) {
        this.logger.warn("Skipping document without embedding", { collection, id });
        continue;
      }
      byId.set(id, {
        id,
        embedding: doc.embedding,
        sparseEmbedding: doc.sparseEmbedding,
        content: doc.content,
        metadata: { ...doc.metadata },
      });
    }
    const prepared = Array.from(byId.values());

    if (prepared.length === 0) {
      return 0;
    }

    const written = await this.guard("add", () => this.upsert(collection, prepared));
    this.stats.documentsAdded += written;
    this.logger.info("Documents upserted", { collection, written });
    return written;
  }

  async search(
    collection: string,
    queryVector: readonly number[],
    topK: number,
    filters?: SearchFilters,
    sparseVector?: SparseVector
  ): Promise<RawRow[]> {
    if (topK <= 0) {
      return [];
    }

    const { ids, match } = splitFilters(filters);
    const rows = await this.guard("search", () =>
      this.query(collection, {
        vector: queryVector,
        topK,
        ids,
        match,
        sparseVector: this.supportsSparse ? sparseVector : undefined,
      })
    );
    this.stats.searches++;
    return rows.slice(0, topK);
  }

  async delete(collection: string, request: DeleteRequest): Promise<number> {
    if (request.ids.length === 0) {
      this.logger.warn("Delete called with an empty id list", { collection });
      return 0;
    }

    const deleted = await this.guard("delete", () => this.remove(collection, request.ids));
    this.stats.deletions += deleted;
    return deleted;
  }

  getStats(): StoreStats {
    return { backend: this.backend, ...this.stats };
  }

  async close(): Promise<void> {}

  protected abstract upsert(collection: string, documents: PreparedDocument[]): Promise<number>;

  /** Rows must come back ordered by similarity, highest first */
  protected abstract query(collection: string, query: VectorQuery): Promise<RawRow[]>;

  protected abstract remove(collection: string, ids: readonly string[]): Promise<number>;

  protected async guard<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      // Lifecycle problems (missing optional package) keep their own type.
      if (isRagError(error)) {
        throw error;
      }
      const wrapped = new StoreError(this.backend, operation, describe(error), {
        cause: error,
        solutions: this.remediation(operation),
      });
      this.logger.error("Store operation failed", error, { operation });
      throw wrapped;
    }
  }

  /** Backend-specific remediation hints; defaults come from StoreError */
  protected remediation(_operation: StoreOperation): string[] | undefined {
    return undefined;
  }
}

/**
 * Separate the reserved `ids` key from metadata equality filters.
 * Array values under any other key are not metadata filters and are dropped.
 */
export function splitFilters(filters: SearchFilters | undefined): {
  ids?: readonly string[];
  match: Record<string, FilterScalar>;
} {
  const match: Record<string, FilterScalar> = {};
  if (!filters) {
    return { match };
  }
  for (const [key, value] of Object.entries(filters)) {
    if (key === "ids" || value === undefined || Array.isArray(value)) {
      continue;
    }
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      match[key] = value;
    }
  }
  return { ids: filters.ids, match };
}

/**
 * Build a row: reserved keys first, payload metadata merged in.
 * Metadata can not shadow the reserved keys.
 */
export function toRawRow(
  id: string,
  score: number,
  content: string,
  metadata: Record<string, unknown> = {}
): RawRow {
  return { ...metadata, _id: id, _score: score, content };
}

export function matchesFilters(
  metadata: Record<string, unknown>,
  match: Record<string, FilterScalar>
): boolean {
  return Object.entries(match).every(([key, value]) => metadata[key] === value);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
