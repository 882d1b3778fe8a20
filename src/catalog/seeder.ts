// pattern: Imperative Shell

/**
 * Populates the offline catalog from the bundled dataset on first run.
 *
 * The dataset is a JSON array of tens of thousands of rows, so it is streamed element by
 * element and committed in fixed-size batches: memory stays bounded by one batch, and an
 * interrupted import loses at most the uncommitted tail.
 *
 * Idempotency rests on the completion marker written after the final batch. A store that
 * holds rows without a marker was interrupted mid-import; the import is replayed and the
 * store's unique `uri` constraint drops the rows that were already committed.
 */

import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import StreamArray from "stream-json/streamers/StreamArray.js";
import { LookupError, describeError } from "../errors.ts";
import type { CatalogStore } from "./store.ts";
import { SeedRecordSchema } from "./types.ts";
import type { CatalogEntry } from "./types.ts";

export type SeedOptions = {
  readonly signal?: AbortSignal;
};

export type CatalogSeeder = {
  seedIfNeeded(datasetPath: string, options?: SeedOptions): Promise<number>;
};

type CatalogSeederOptions = {
  readonly store: CatalogStore;
  readonly batchSize: number;
};

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function createCatalogSeeder(options: CatalogSeederOptions): CatalogSeeder {
  const { store, batchSize } = options;

  async function importDataset(datasetPath: string, signal: AbortSignal | undefined) {
    const source = createReadStream(datasetPath);
    const records = source.pipe(StreamArray.withParser());
    source.once("error", (error) => records.destroy(error));

    let batch: Array<CatalogEntry> = [];
    let inserted = 0;
    let skipped = 0;
    let commits = 0;
    let aborted = false;

    const commit = async (): Promise<void> => {
      const pending = batch;
      batch = [];
      try {
        inserted += await store.insertBatch(pending);
      } catch (error) {
        throw new LookupError("seed", `catalog batch insert failed: ${describeError(error)}`, {
          cause: error,
        });
      }
      commits++;
    };

    try {
      for await (const item of records) {
        const parsed = SeedRecordSchema.safeParse(item.value);
        if (!parsed.success) {
          skipped++;
          continue;
        }

        batch.push({ id: randomUUID(), ...parsed.data });

        if (batch.length >= batchSize) {
          await commit();
          if (signal?.aborted) {
            aborted = true;
            break;
          }
        }
      }
    } catch (error) {
      if (error instanceof LookupError) {
        throw error;
      }
      throw new LookupError("seed", `catalog dataset ${datasetPath} could not be decoded: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      records.destroy();
      source.destroy();
    }

    if (!aborted && batch.length > 0) {
      await commit();
    }

    return { inserted, skipped, commits, aborted };
  }

  async function seed(datasetPath: string, signal: AbortSignal | undefined): Promise<number> {
    const state = await store.getSeedState();
    if (state) {
      return 0;
    }

    if (!(await fileExists(datasetPath))) {
      console.warn(`[catalog] seed dataset not found at ${datasetPath}; offline search disabled`);
      return 0;
    }

    const existing = await store.count();
    if (existing > 0) {
      console.warn(`[catalog] resuming interrupted import (${existing} rows already present)`);
    }

    console.log(`[catalog] seeding offline catalog from ${datasetPath}`);
    const result = await importDataset(datasetPath, signal);

    if (result.aborted) {
      console.warn(`[catalog] seeding aborted after ${result.commits} batches (${result.inserted} rows)`);
      return result.inserted;
    }

    await store.markSeeded(existing + result.inserted);
    console.log(
      `[catalog] seeded ${result.inserted} rows in ${result.commits} batches` +
        (result.skipped > 0 ? ` (${result.skipped} invalid rows skipped)` : ""),
    );
    return result.inserted;
  }

  async function seedOnce(datasetPath: string, signal: AbortSignal | undefined): Promise<number> {
    try {
      return await seed(datasetPath, signal);
    } catch (error) {
      if (error instanceof LookupError) {
        throw error;
      }
      throw new LookupError("seed", `catalog seeding failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  // callers arriving while an import runs share it instead of starting a second one
  let inFlight: Promise<number> | null = null;

  return {
    seedIfNeeded(datasetPath: string, seedOptions: SeedOptions = {}): Promise<number> {
      if (inFlight) {
        return inFlight;
      }

      inFlight = seedOnce(datasetPath, seedOptions.signal).finally(() => {
        inFlight = null;
      });
      return inFlight;
    },
  };
}

/**
 * Start seeding in the background. Never rejects: a failed or partial seed only reduces
 * what offline search can find, so it is logged and startup carries on.
 */
export function startCatalogSeeding(
  seeder: CatalogSeeder,
  datasetPath: string,
  options: SeedOptions = {},
): Promise<number> {
  return seeder.seedIfNeeded(datasetPath, options).catch((error: unknown) => {
    console.error(`[catalog] seeding failed: ${describeError(error)}`);
    return 0;
  });
}
