/**
 * In-Memory Vector Store
 *
 * Brute-force cosine search for development and tests. With a sparse query
 * vector the dense and sparse rankings are fused with RRF, the same way a
 * hybrid-capable engine fuses them server-side.
 */

import { HybridMerger } from "../fusion/hybridMerger";
import { createSearchResult, type RawRow, type SparseVector } from "../types";
import {
  BaseVectorStore,
  type BaseVectorStoreOptions,
  matchesFilters,
  type PreparedDocument,
  toRawRow,
  type VectorQuery,
} from "./baseVectorStore";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: expected ${b.length}, got ${a.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dotProduct / magnitude;
}

export function sparseDot(a: SparseVector, b: SparseVector): number {
  const weights = new Map<number, number>();
  a.indices.forEach((index, i) => weights.set(index, a.values[i] ?? 0));
  let total = 0;
  b.indices.forEach((index, i) => {
    total += (weights.get(index) ?? 0) * (b.values[i] ?? 0);
  });
  return total;
}

export class InMemoryVectorStore extends BaseVectorStore {
  readonly backend = "memory";
  readonly supportsSparse = true;

  private readonly collections = new Map<string, Map<string, PreparedDocument>>();
  private readonly fusion = new HybridMerger(0.5);

  constructor(options: BaseVectorStoreOptions = {}) {
    super("memory-store", options);
  }

  /** Number of documents stored in a collection */
  count(collection: string): number {
    return this.collections.get(collection)?.size ?? 0;
  }

  protected async upsert(collection: string, documents: PreparedDocument[]): Promise<number> {
    let docs = this.collections.get(collection);
    if (!docs) {
      docs = new Map();
      this.collections.set(collection, docs);
    }
    for (const document of documents) {
      docs.set(document.id, document);
    }
    return documents.length;
  }

  protected async query(collection: string, query: VectorQuery): Promise<RawRow[]> {
    const candidates = this.candidates(collection, query);

    const dense = candidates
      .map((doc) => ({ doc, score: cosineSimilarity(query.vector, doc.embedding) }))
      .sort((a, b) => b.score - a.score);

    const sparseVector = query.sparseVector;
    if (!sparseVector) {
      return dense
        .slice(0, query.topK)
        .map(({ doc, score }) => toRawRow(doc.id, score, doc.content, doc.metadata));
    }

    const sparse = candidates
      .map((doc) => ({
        doc,
        score: doc.sparseEmbedding ? sparseDot(sparseVector, doc.sparseEmbedding) : 0,
      }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score);

    return this.fusion
      .merge(
        dense.map(({ doc, score }) => createSearchResult(doc.id, doc.content, score, doc.metadata)),
        sparse.map(({ doc, score }) => ({
          id: doc.id,
          content: doc.content,
          score,
          metadata: doc.metadata,
        })),
        query.topK
      )
      .map((result) => toRawRow(result.id, result.score, result.content, { ...result.metadata }));
  }

  protected async remove(collection: string, ids: readonly string[]): Promise<number> {
    const docs = this.collections.get(collection);
    if (!docs) {
      return 0;
    }
    let deleted = 0;
    for (const id of ids) {
      if (docs.delete(id)) {
        deleted++;
      }
    }
    return deleted;
  }

  private candidates(collection: string, query: VectorQuery): PreparedDocument[] {
    const docs = this.collections.get(collection);
    if (!docs) {
      return [];
    }
    const pool = query.ids
      ? query.ids.flatMap((id) => {
          const doc = docs.get(id);
          return doc ? [doc] : [];
        })
      : Array.from(docs.values());
    return pool.filter((doc) => matchesFilters(doc.metadata, query.match));
  }
}
