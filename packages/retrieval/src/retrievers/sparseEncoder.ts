/**
 * Term-hash sparse encoder.
 *
 * Maps each token to a bucket with 32-bit FNV-1a and weights it by
 * 1 + ln(term frequency). Collisions add up.
 */

import { tokenize } from "../fusion/keywordIndex";
import type { SparseEncoder, SparseVector } from "../types";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (const byte of new TextEncoder().encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class TermHashSparseEncoder implements SparseEncoder {
  constructor(private readonly buckets = 2 ** 20) {}

  async encode(text: string): Promise<SparseVector> {
    return this.encodeSync(text);
  }

  encodeSync(text: string): SparseVector {
    const counts = new Map<number, number>();
    for (const term of tokenize(text)) {
      const index = fnv1a(term) % this.buckets;
      counts.set(index, (counts.get(index) ?? 0) + 1);
    }

    const indices = Array.from(counts.keys()).sort((a, b) => a - b);
    return {
      indices,
      values: indices.map((index) => 1 + Math.log(counts.get(index) ?? 1)),
    };
  }
}
