// pattern: Functional Core

import type { SearchResult } from "../registry/types.ts";
import type { CatalogStore } from "./store.ts";
import { ASSIGNABLE_CLASS_KINDS } from "./types.ts";
import type { CatalogEntry } from "./types.ts";

export type OfflineSearchIndex = {
  searchOffline(text: string, limit: number): Promise<ReadonlyArray<SearchResult>>;
};

type OfflineSearchOptions = {
  readonly store: CatalogStore;
  readonly minQueryLength: number;
};

export function toSearchResult(entry: CatalogEntry): SearchResult {
  return {
    externalId: entry.uri,
    title: entry.title,
    ...(entry.code ? { code: entry.code } : {}),
    ...(entry.chapterCode ? { chapterHint: entry.chapterCode } : {}),
  };
}

/**
 * Substring search over the seeded catalog. Only assignable categories are returned;
 * chapters and blocks are structure, not diagnoses. No ranking is computed here.
 */
export function createOfflineSearchIndex(options: OfflineSearchOptions): OfflineSearchIndex {
  const { store, minQueryLength } = options;

  return {
    async searchOffline(text: string, limit: number): Promise<ReadonlyArray<SearchResult>> {
      const trimmed = text.trim();
      if (trimmed.length < minQueryLength || limit <= 0) {
        return [];
      }

      const entries = await store.searchByTitle(trimmed, ASSIGNABLE_CLASS_KINDS, limit);
      return entries.map(toSearchResult);
    },
  };
}
