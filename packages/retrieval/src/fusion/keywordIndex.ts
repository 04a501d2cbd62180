/**
 * BM25 Keyword Index
 *
 * In-process full-text index producing the BM25 leg for HybridMerger.
 */

import type { Bm25Row } from "./hybridMerger";

const BM25_K1 = 1.2;
const BM25_B = 0.75;

export interface KeywordDocument {
  id: string;
  content: string;
  metadata?: Record<string, unknown>;
}

interface IndexEntry {
  document: KeywordDocument;
  terms: Map<string, number>; // term -> frequency
  length: number;
}

/**
 * Lowercase, strip punctuation, split on whitespace, drop single characters.
 * Letters of every script are kept, so Hangul and CJK survive.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((term) => term.length > 1);
}

export class KeywordIndex {
  private readonly index = new Map<string, IndexEntry>();
  private readonly invertedIndex = new Map<string, Set<string>>(); // term -> ids
  private avgDocLength = 0;

  add(documents: readonly KeywordDocument[]): void {
    for (const document of documents) {
      this.removeEntry(document.id);
      this.addEntry(document);
    }
    this.updateStats();
  }

  remove(ids: readonly string[]): number {
    let removed = 0;
    for (const id of ids) {
      if (this.removeEntry(id)) {
        removed++;
      }
    }
    this.updateStats();
    return removed;
  }

  search(query: string, topK: number): Bm25Row[] {
    const scores = new Map<string, number>();

    for (const term of new Set(tokenize(query))) {
      const ids = this.invertedIndex.get(term);
      if (!ids) {
        continue;
      }
      const idf = this.calculateIDF(ids.size);

      for (const id of ids) {
        const entry = this.index.get(id);
        if (!entry) {
          continue;
        }
        const tf = entry.terms.get(term) ?? 0;
        scores.set(id, (scores.get(id) ?? 0) + this.calculateBM25Score(tf, entry.length, idf));
      }
    }

    const rows: Bm25Row[] = [];
    for (const [id, score] of scores) {
      const entry = this.index.get(id);
      if (entry) {
        rows.push({
          id,
          content: entry.document.content,
          score,
          metadata: { ...entry.document.metadata },
        });
      }
    }
    return rows.sort((a, b) => (b.score ?? 0) - (a.score ?? 0)).slice(0, Math.max(0, topK));
  }

  getStats(): { totalDocs: number; totalTerms: number; avgDocLength: number } {
    return {
      totalDocs: this.index.size,
      totalTerms: this.invertedIndex.size,
      avgDocLength: this.avgDocLength,
    };
  }

  clear(): void {
    this.index.clear();
    this.invertedIndex.clear();
    this.avgDocLength = 0;
  }

  private addEntry(document: KeywordDocument): void {
    const terms = tokenize(document.content);
    const termFreq = new Map<string, number>();

    for (const term of terms) {
      termFreq.set(term, (termFreq.get(term) ?? 0) + 1);
      let ids = this.invertedIndex.get(term);
      if (!ids) {
        ids = new Set();
        this.invertedIndex.set(term, ids);
      }
      ids.add(document.id);
    }

    this.index.set(document.id, { document, terms: termFreq, length: terms.length });
  }

  private removeEntry(id: string): boolean {
    const entry = this.index.get(id);
    if (!entry) {
      return false;
    }
    for (const term of entry.terms.keys()) {
      const ids = this.invertedIndex.get(term);
      ids?.delete(id);
      if (ids?.size === 0) {
        this.invertedIndex.delete(term);
      }
    }
    this.index.delete(id);
    return true;
  }

  private calculateIDF(docFreq: number): number {
    return Math.log(1 + (this.index.size - docFreq + 0.5) / (docFreq + 0.5));
  }

  private calculateBM25Score(tf: number, docLength: number, idf: number): number {
    const numerator = tf * (BM25_K1 + 1);
    const denominator = tf + BM25_K1 * (1 - BM25_B + BM25_B * (docLength / this.avgDocLength));
    return idf * (numerator / denominator);
  }

  private updateStats(): void {
    if (this.index.size === 0) {
      this.avgDocLength = 0;
      return;
    }
    let totalLength = 0;
    for (const entry of this.index.values()) {
      totalLength += entry.length;
    }
    this.avgDocLength = totalLength / this.index.size;
  }
}
