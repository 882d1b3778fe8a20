// pattern: Functional Core

/**
 * CatalogStore port interface.
 * The offline catalog's persistence boundary: bulk insert during seeding, filtered reads
 * for offline search. Implementations must treat `uri` as unique and skip duplicates.
 */

import type { CatalogEntry, ClassKind, SeedState } from "./types.ts";

export interface CatalogStore {
  count(): Promise<number>;

  /** Commit one batch atomically; returns how many rows were new. */
  insertBatch(entries: ReadonlyArray<CatalogEntry>): Promise<number>;

  /**
   * Case- and accent-insensitive substring match on title, restricted to the given kinds.
   * Order must be stable for repeated identical calls.
   */
  searchByTitle(
    text: string,
    kinds: ReadonlyArray<ClassKind>,
    limit: number,
  ): Promise<Array<CatalogEntry>>;

  // Completion marker
  getSeedState(): Promise<SeedState | null>;
  markSeeded(rowCount: number): Promise<void>;
}
