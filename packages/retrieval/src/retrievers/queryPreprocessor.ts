/**
 * Query Preprocessor
 *
 * Text pipeline for the sparse (BM25) leg of hybrid search:
 * protect compound terms, expand synonyms, strip stopwords, restore terms.
 * Every step is optional; a missing collaborator passes the text through.
 */

import { createModuleLogger, type Logger } from "@ragline/ai-core";
import type { QueryPreprocessors } from "../types";

export interface PreprocessedQuery {
  text: string;
  /** Whether any step changed the text */
  changed: boolean;
  /** Set when a step threw and the original text was used */
  fellBack: boolean;
}

export class QueryPreprocessor {
  private readonly logger: Logger;

  constructor(
    private readonly collaborators: QueryPreprocessors = {},
    logger?: Logger
  ) {
    this.logger = createModuleLogger("query-preprocessor", logger);
  }

  get isEmpty(): boolean {
    const { userDictionary, synonyms, stopwords } = this.collaborators;
    return !userDictionary && !synonyms && !stopwords;
  }

  process(query: string): PreprocessedQuery {
    const { userDictionary, synonyms, stopwords } = this.collaborators;
    try {
      let text = query;
      let restoreMap: ReadonlyMap<string, string> = new Map();

      if (userDictionary) {
        const protectedText = userDictionary.protect(text);
        text = protectedText.text;
        restoreMap = protectedText.restoreMap;
      }
      if (synonyms) {
        text = synonyms.expandQuery(text);
      }
      if (stopwords) {
        text = stopwords.filterText(text);
      }
      if (userDictionary && restoreMap.size > 0) {
        text = userDictionary.restore(text, restoreMap);
      }

      return { text, changed: text !== query, fellBack: false };
    } catch (error) {
      this.logger.warn("Query preprocessing failed, using the original query", {
        error: error instanceof Error ? error.message : String(error),
      });
      return { text: query, changed: false, fellBack: true };
    }
  }
}
