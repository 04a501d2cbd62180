import { createSearchResult, type RawRow, type SearchResult } from "../types";

/**
 * Convert raw store rows into SearchResults. Reserved keys become the typed
 * fields; every other key is metadata. Store order is kept.
 */
export function toSearchResults(rows: readonly RawRow[]): SearchResult[] {
  return rows.map((row) => {
    const { _id, _score, content, ...metadata } = row;
    return createSearchResult(
      String(_id),
      typeof content === "string" ? content : String(content ?? ""),
      Number(_score ?? 0),
      metadata
    );
  });
}
