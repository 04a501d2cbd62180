/**
 * Qdrant Store
 *
 * Talks to the Qdrant REST API with fetch. Points carry a named dense vector
 * (`dense`) and, when indexed with one, a named sparse vector (`sparse`).
 * Hybrid queries prefetch both legs and let Qdrant fuse them with RRF.
 */

import { ConfigurationError, type FetchFn, type StoreOperation } from "@ragline/ai-core";
import { v5 as uuidv5 } from "uuid";
import type { RawRow } from "../types";
import {
  BaseVectorStore,
  type BaseVectorStoreOptions,
  type PreparedDocument,
  toRawRow,
  type VectorQuery,
} from "./baseVectorStore";

export interface QdrantStoreOptions extends BaseVectorStoreOptions {
  url?: string;
  apiKey?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

type PointId = string | number;

interface QdrantPoint {
  id: PointId;
  score: number;
  payload?: Record<string, unknown> | null;
}

interface QdrantResponse<T> {
  result?: T;
  status?: string | { error?: string };
}

interface QdrantCondition {
  key?: string;
  match?: { value: string | number | boolean };
  has_id?: PointId[];
}

export const DENSE_VECTOR = "dense";
export const SPARSE_VECTOR = "sparse";
/** Payload key holding the caller-facing document id */
export const DOC_ID_KEY = "doc_id";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
/** Namespace for name-based point ids; changing it re-keys every stored point */
export const POINT_ID_NAMESPACE = "6f1c8a52-3b9e-4d1a-9c47-2e5b8f0d7a13";
/** Prefetch depth per leg, relative to the final limit */
const PREFETCH_MULTIPLIER = 2;

/**
 * Qdrant accepts unsigned integers and UUIDs as point ids. Anything else is
 * mapped onto a v5 UUID in a fixed namespace, stable for the same input.
 */
export function toPointId(id: string): PointId {
  if (UUID_PATTERN.test(id)) {
    return id.toLowerCase();
  }
  if (/^\d+$/.test(id) && Number.isSafeInteger(Number(id))) {
    return Number(id);
  }
  return uuidv5(id, POINT_ID_NAMESPACE);
}

export class QdrantStore extends BaseVectorStore {
  readonly backend = "qdrant";
  readonly supportsSparse = true;

  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: QdrantStoreOptions = {}) {
    super("qdrant-store", options);
    this.baseUrl = (options.url ?? "http://localhost:6333").replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Create a collection with a cosine dense vector and a sparse vector slot.
   */
  async createCollection(collection: string, dimension: number): Promise<void> {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ConfigurationError(`Invalid vector dimension: ${dimension}`);
    }
    await this.guard("setup", () =>
      this.request("PUT", `/collections/${encodeURIComponent(collection)}`, {
        vectors: { [DENSE_VECTOR]: { size: dimension, distance: "Cosine" } },
        sparse_vectors: { [SPARSE_VECTOR]: {} },
      })
    );
    this.logger.info("Collection ready", { collection, dimension });
  }

  protected async upsert(collection: string, documents: PreparedDocument[]): Promise<number> {
    const points = documents.map((doc) => {
      const vector: Record<string, unknown> = { [DENSE_VECTOR]: [...doc.embedding] };
      if (doc.sparseEmbedding) {
        vector[SPARSE_VECTOR] = doc.sparseEmbedding;
      }
      return {
        id: toPointId(doc.id),
        vector,
        payload: { ...doc.metadata, content: doc.content, [DOC_ID_KEY]: doc.id },
      };
    });

    await this.request("PUT", `/collections/${encodeURIComponent(collection)}/points?wait=true`, {
      points,
    });
    return documents.length;
  }

  protected async query(collection: string, query: VectorQuery): Promise<RawRow[]> {
    const filter = buildFilter(query);
    const body: Record<string, unknown> = {
      limit: query.topK,
      with_payload: true,
    };

    if (query.sparseVector) {
      const prefetchLimit = query.topK * PREFETCH_MULTIPLIER;
      body.prefetch = [
        { query: [...query.vector], using: DENSE_VECTOR, limit: prefetchLimit, filter },
        { query: query.sparseVector, using: SPARSE_VECTOR, limit: prefetchLimit, filter },
      ];
      body.query = { fusion: "rrf" };
    } else {
      body.query = [...query.vector];
      body.using = DENSE_VECTOR;
    }
    if (filter) {
      body.filter = filter;
    }

    const result = await this.request<{ points?: QdrantPoint[] }>(
      "POST",
      `/collections/${encodeURIComponent(collection)}/points/query`,
      body
    );

    return (result?.points ?? []).map((point) => {
      const { content, [DOC_ID_KEY]: docId, ...metadata } = point.payload ?? {};
      return toRawRow(
        typeof docId === "string" ? docId : String(point.id),
        point.score,
        typeof content === "string" ? content : "",
        metadata
      );
    });
  }

  protected async remove(collection: string, ids: readonly string[]): Promise<number> {
    await this.request(
      "POST",
      `/collections/${encodeURIComponent(collection)}/points/delete?wait=true`,
      { points: ids.map(toPointId) }
    );
    // Qdrant does not report how many of the ids existed.
    return ids.length;
  }

  protected override remediation(operation: StoreOperation): string[] {
    if (operation === "search") {
      return [
        `Check that the Qdrant server at ${this.baseUrl} is running.`,
        "Check that the collection exists and the vector dimension matches.",
      ];
    }
    return [
      `Check that the Qdrant server at ${this.baseUrl} is running.`,
      "Check the collection schema (named vectors `dense` and `sparse`).",
    ];
  }

  private async request<T>(
    method: "GET" | "POST" | "PUT",
    path: string,
    body?: unknown
  ): Promise<T | undefined> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers["api-key"] = this.apiKey;
    }

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      const errorText = await res.text();
      throw new Error(`Qdrant API error (${res.status}): ${errorText}`);
    }
    const payload = (await res.json()) as QdrantResponse<T>;
    return payload.result;
  }
}

function buildFilter(query: VectorQuery): { must: QdrantCondition[] } | undefined {
  const must: QdrantCondition[] = Object.entries(query.match).map(([key, value]) => ({
    key,
    match: { value },
  }));
  if (query.ids) {
    must.push({ has_id: query.ids.map(toPointId) });
  }
  return must.length > 0 ? { must } : undefined;
}
