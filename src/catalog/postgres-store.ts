// pattern: Imperative Shell

/**
 * PostgreSQL implementation of the CatalogStore port.
 * Title matching goes through `unaccent(lower(...))`; the extension is created by the
 * catalog migration.
 */

import type { PersistenceProvider, QueryFunction } from "../persistence/types.ts";
import type { CatalogStore } from "./store.ts";
import { CLASS_KINDS } from "./types.ts";
import type { CatalogEntry, ClassKind, SeedState } from "./types.ts";

// Postgres caps a statement at 65535 bind parameters; six per row.
const ROWS_PER_STATEMENT = 5000;

type CatalogEntryRow = {
  id: string;
  code: string;
  title: string;
  uri: string;
  class_kind: string;
  chapter_code: string;
};

type SeedStateRow = {
  completed_at: string | Date;
  row_count: number;
};

function parseCatalogEntry(row: CatalogEntryRow): CatalogEntry {
  const classKind = CLASS_KINDS.find((kind) => kind === row.class_kind);
  if (!classKind) {
    throw new Error(`unknown class_kind in catalog_entries: ${row.class_kind}`);
  }
  return {
    id: row.id,
    code: row.code,
    title: row.title,
    uri: row.uri,
    classKind,
    chapterCode: row.chapter_code,
  };
}

export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (match) => `\\${match}`);
}

async function insertRows(
  query: QueryFunction,
  entries: ReadonlyArray<CatalogEntry>,
): Promise<number> {
  const params: Array<unknown> = [];
  const tuples = entries.map((entry, index) => {
    const base = index * 6;
    params.push(entry.id, entry.code, entry.title, entry.uri, entry.classKind, entry.chapterCode);
    return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`;
  });

  const rows = await query<{ id: string }>(
    `INSERT INTO catalog_entries (id, code, title, uri, class_kind, chapter_code)
     VALUES ${tuples.join(", ")}
     ON CONFLICT (uri) DO NOTHING
     RETURNING id`,
    params,
  );
  return rows.length;
}

export function createPostgresCatalogStore(persistence: PersistenceProvider): CatalogStore {
  async function count(): Promise<number> {
    const rows = await persistence.query<{ count: number }>(
      "SELECT COUNT(*)::int AS count FROM catalog_entries",
    );
    return rows[0]?.count ?? 0;
  }

  async function insertBatch(entries: ReadonlyArray<CatalogEntry>): Promise<number> {
    if (entries.length === 0) {
      return 0;
    }

    return persistence.withTransaction(async (query) => {
      let inserted = 0;
      for (let start = 0; start < entries.length; start += ROWS_PER_STATEMENT) {
        inserted += await insertRows(query, entries.slice(start, start + ROWS_PER_STATEMENT));
      }
      return inserted;
    });
  }

  async function searchByTitle(
    text: string,
    kinds: ReadonlyArray<ClassKind>,
    limit: number,
  ): Promise<Array<CatalogEntry>> {
    const rows = await persistence.query<CatalogEntryRow>(
      `SELECT id, code, title, uri, class_kind, chapter_code
       FROM catalog_entries
       WHERE class_kind = ANY($1::text[])
         AND unaccent(lower(title)) LIKE '%' || unaccent(lower($2)) || '%' ESCAPE '\\'
       ORDER BY code ASC, uri ASC
       LIMIT $3`,
      [Array.from(kinds), escapeLikePattern(text.trim()), limit],
    );
    return rows.map(parseCatalogEntry);
  }

  async function getSeedState(): Promise<SeedState | null> {
    const rows = await persistence.query<SeedStateRow>(
      "SELECT completed_at, row_count FROM catalog_seed_state WHERE id = 1",
    );
    const row = rows[0];
    return row ? { completedAt: new Date(row.completed_at), rowCount: row.row_count } : null;
  }

  async function markSeeded(rowCount: number): Promise<void> {
    await persistence.query(
      `INSERT INTO catalog_seed_state (id, completed_at, row_count)
       VALUES (1, NOW(), $1)
       ON CONFLICT (id) DO UPDATE SET completed_at = EXCLUDED.completed_at, row_count = EXCLUDED.row_count`,
      [rowCount],
    );
  }

  return {
    count,
    insertBatch,
    searchByTitle,
    getSeedState,
    markSeeded,
  };
}
