// pattern: Functional Core

/**
 * Session-lifetime cache of remote search results.
 * No TTL: the caller clears it on logical session boundaries. Lists are stored as frozen
 * copies and replaced wholesale, so a reader never observes a list being written.
 */

import type { SearchQuery, SearchResult } from "../registry/types.ts";

export type CacheEntry = {
  readonly key: SearchQuery;
  readonly value: ReadonlyArray<SearchResult>;
  readonly createdAt: number;
};

export type ResultCache = {
  get(query: SearchQuery): ReadonlyArray<SearchResult> | undefined;
  put(query: SearchQuery, results: ReadonlyArray<SearchResult>): void;
  clear(): void;
  readonly size: number;
};

export function normalizeQuery(query: SearchQuery): SearchQuery {
  return {
    text: query.text.trim().toLowerCase(),
    offset: query.offset,
    limit: query.limit,
    language: query.language.trim().toLowerCase(),
  };
}

export function cacheKey(query: SearchQuery): string {
  const normalized = normalizeQuery(query);
  return [normalized.text, normalized.offset, normalized.limit, normalized.language].join("|");
}

export function createResultCache(now: () => number = Date.now): ResultCache {
  const entries = new Map<string, CacheEntry>();

  return {
    get(query: SearchQuery): ReadonlyArray<SearchResult> | undefined {
      return entries.get(cacheKey(query))?.value;
    },
    put(query: SearchQuery, results: ReadonlyArray<SearchResult>): void {
      const value = Object.freeze(results.map((result) => Object.freeze({ ...result })));
      entries.set(cacheKey(query), {
        key: normalizeQuery(query),
        value,
        createdAt: now(),
      });
    },
    clear(): void {
      entries.clear();
    },
    get size(): number {
      return entries.size;
    },
  };
}
