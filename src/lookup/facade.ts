// pattern: Imperative Shell

/**
 * Single entry point for diagnosis lookups: session cache, then the remote registry, then
 * the offline catalog. Every coded registry failure falls through to the offline path; the
 * original failure is only surfaced when the offline catalog has nothing to offer.
 */

import type { ResultCache } from "../cache/result-cache.ts";
import type { OfflineSearchIndex } from "../catalog/offline-search.ts";
import type { SearchConfig } from "../config/schema.ts";
import { describeError, isLookupError } from "../errors.ts";
import type { LookupError } from "../errors.ts";
import type { RemoteSearchClient, SearchQuery, SearchResult } from "../registry/types.ts";
import type { LookupFacade, LookupOptions, LookupOutcome } from "./types.ts";

type LookupFacadeDeps = {
  readonly cache: ResultCache;
  readonly remote: RemoteSearchClient;
  readonly offline: OfflineSearchIndex;
  readonly search: Pick<SearchConfig, "min_query_length" | "default_limit" | "offline_limit">;
  readonly language: string;
};

export function createLookupFacade(deps: LookupFacadeDeps): LookupFacade {
  const { cache, remote, offline, search, language } = deps;

  async function searchOfflineSafely(text: string, limit: number): Promise<ReadonlyArray<SearchResult>> {
    try {
      return await offline.searchOffline(text, limit);
    } catch (error) {
      console.error(`[lookup] offline search failed: ${describeError(error)}`);
      return [];
    }
  }

  async function fallBackOffline(query: SearchQuery, remoteError: LookupError): Promise<LookupOutcome> {
    // the offline catalog has no paging: its single page is the first one
    const results = query.offset > 0 ? [] : await searchOfflineSafely(query.text, query.limit);
    if (results.length === 0) {
      console.warn(`[lookup] "${query.text}": registry failed (${remoteError.code}) and offline catalog has no match`);
      return { status: "failed", error: remoteError };
    }

    console.warn(
      `[lookup] "${query.text}": serving ${results.length} offline results after ${remoteError.code} error: ${remoteError.message}`,
    );
    return { status: "ok", source: "offline", degraded: true, results, remoteError };
  }

  async function lookup(text: string, options: LookupOptions = {}): Promise<LookupOutcome> {
    const trimmed = text.trim();
    if (trimmed.length < search.min_query_length) {
      return { status: "ok", source: "skipped", degraded: false, results: [] };
    }

    const query: SearchQuery = {
      text: trimmed,
      offset: options.offset ?? 0,
      limit: options.limit ?? search.default_limit,
      language: options.language ?? language,
    };

    const cached = cache.get(query);
    if (cached) {
      return { status: "ok", source: "cache", degraded: false, results: cached };
    }

    let results: ReadonlyArray<SearchResult>;
    try {
      results = await remote.search(query.text, query.offset, query.limit, query.language);
    } catch (error) {
      if (!isLookupError(error)) {
        throw error;
      }
      return fallBackOffline(
        { ...query, limit: Math.min(query.limit, search.offline_limit) },
        error,
      );
    }

    cache.put(query, results);
    return { status: "ok", source: "remote", degraded: false, results: cache.get(query) ?? results };
  }

  return {
    lookup,
    clearCache(): void {
      cache.clear();
    },
  };
}
