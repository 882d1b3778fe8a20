// pattern: Imperative Shell

/**
 * In-process CatalogStore, used when no database is configured.
 * Rows live for the lifetime of the process.
 */

import { foldForMatch } from "./fold.ts";
import type { CatalogStore } from "./store.ts";
import type { CatalogEntry, ClassKind, SeedState } from "./types.ts";

type StoredEntry = {
  readonly entry: CatalogEntry;
  readonly folded: string;
};

export function createInMemoryCatalogStore(locale?: string): CatalogStore {
  const rows: Array<StoredEntry> = [];
  const uris = new Set<string>();
  let seedState: SeedState | null = null;

  return {
    async count(): Promise<number> {
      return rows.length;
    },

    async insertBatch(entries: ReadonlyArray<CatalogEntry>): Promise<number> {
      // build the whole batch first so readers see all of it or none of it
      const fresh: Array<StoredEntry> = [];
      for (const entry of entries) {
        if (uris.has(entry.uri)) continue;
        uris.add(entry.uri);
        fresh.push({ entry, folded: foldForMatch(entry.title, locale) });
      }
      rows.push(...fresh);
      return fresh.length;
    },

    async searchByTitle(
      text: string,
      kinds: ReadonlyArray<ClassKind>,
      limit: number,
    ): Promise<Array<CatalogEntry>> {
      const needle = foldForMatch(text.trim(), locale);
      const allowed = new Set(kinds);
      const matches: Array<CatalogEntry> = [];

      for (const row of rows) {
        if (matches.length >= limit) break;
        if (allowed.has(row.entry.classKind) && row.folded.includes(needle)) {
          matches.push(row.entry);
        }
      }
      return matches;
    },

    async getSeedState(): Promise<SeedState | null> {
      return seedState;
    },

    async markSeeded(rowCount: number): Promise<void> {
      seedState = { completedAt: new Date(), rowCount };
    },
  };
}
