/**
 * Retrieval Types
 *
 * Shared data model for stores, retrievers, fusion and reranking.
 */

// ============================================================================
// Search results
// ============================================================================

/**
 * One ranked hit. Immutable: re-scoring produces a new instance.
 * `score` is only comparable within the list that produced it.
 */
export interface SearchResult {
  readonly id: string;
  readonly content: string;
  readonly score: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** Ordered by score, descending */
export type RankedList = readonly SearchResult[];

export function createSearchResult(
  id: string,
  content: string,
  score: number,
  metadata: Record<string, unknown> = {}
): SearchResult {
  return Object.freeze({ id, content, score, metadata: Object.freeze({ ...metadata }) });
}

export function withScore(result: SearchResult, score: number): SearchResult {
  return Object.freeze({ ...result, score });
}

// ============================================================================
// Store rows & documents
// ============================================================================

/**
 * Row returned by a store: reserved keys plus payload fields merged in.
 */
export interface RawRow {
  _id: string;
  _score: number;
  content: string;
  [key: string]: unknown;
}

export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface VectorDocument {
  /** Generated when absent */
  id?: string;
  /** Documents without one are skipped */
  embedding?: readonly number[];
  sparseEmbedding?: SparseVector;
  content: string;
  metadata?: Record<string, unknown>;
}

export type FilterScalar = string | number | boolean;

/**
 * Metadata equality filters (AND). `ids` narrows by document id and is never
 * matched against metadata.
 */
export interface SearchFilters {
  readonly ids?: readonly string[];
  readonly [key: string]: FilterScalar | readonly string[] | undefined;
}

export interface DeleteRequest {
  ids: readonly string[];
}

export interface StoreStats {
  backend: string;
  documentsAdded: number;
  searches: number;
  deletions: number;
}

/**
 * Uniform contract over a concrete vector backend.
 */
export interface VectorStoreAdapter {
  readonly backend: string;
  /** Whether `search` honours a sparse query vector */
  readonly supportsSparse: boolean;

  addDocuments(collection: string, documents: readonly VectorDocument[]): Promise<number>;

  search(
    collection: string,
    queryVector: readonly number[],
    topK: number,
    filters?: SearchFilters,
    sparseVector?: SparseVector
  ): Promise<RawRow[]>;

  delete(collection: string, request: DeleteRequest): Promise<number>;

  getStats(): StoreStats;

  close(): Promise<void>;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface Embedder {
  embedQuery(text: string): Promise<number[]>;
}

export interface SparseEncoder {
  encode(text: string): Promise<SparseVector>;
}

export interface ProtectedText {
  text: string;
  /** placeholder -> original term */
  restoreMap: ReadonlyMap<string, string>;
}

/** Shields compound terms from the later text transforms */
export interface UserDictionary {
  protect(text: string): ProtectedText;
  restore(text: string, restoreMap: ReadonlyMap<string, string>): string;
}

export interface SynonymExpander {
  expandQuery(text: string): string;
}

export interface StopwordFilter {
  filterText(text: string): string;
}

export interface QueryPreprocessors {
  userDictionary?: UserDictionary;
  synonyms?: SynonymExpander;
  stopwords?: StopwordFilter;
}

// ============================================================================
// Retriever
// ============================================================================

export interface RetrieverStats {
  totalSearches: number;
  hybridSearches: number;
  errors: number;
  bm25Preprocessed: number;
}

export interface Retriever {
  search(query: string, topK?: number, filters?: SearchFilters): Promise<SearchResult[]>;
  /** Minimal probe search; never throws */
  healthCheck(): Promise<boolean>;
  getStats(): RetrieverStats;
}
