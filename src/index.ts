// pattern: Imperative Shell

/**
 * Diagnosis lookup entry point.
 * Composition root that wires the registry client, the offline catalog and the lookup
 * facade, then starts an interactive REPL: each line is looked up and printed.
 */

import * as readline from "node:readline";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config/config.ts";
import { createPostgresProvider } from "./persistence/postgres.ts";
import { createResultCache } from "./cache/result-cache.ts";
import {
  createCatalogSeeder,
  createInMemoryCatalogStore,
  createOfflineSearchIndex,
  createPostgresCatalogStore,
  startCatalogSeeding,
} from "./catalog/index.ts";
import { createFileCredentialStore, createRemoteSearchClient, createTokenManager } from "./registry/index.ts";
import { createLookupFacade } from "./lookup/index.ts";
import { describeError } from "./errors.ts";
import type { CatalogStore } from "./catalog/index.ts";
import type { LookupFacade, LookupOutcome } from "./lookup/index.ts";
import type { PersistenceProvider } from "./persistence/types.ts";

const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));

export const CLEAR_COMMAND = ":clear";

/** Render a lookup outcome as REPL output lines. */
export function formatOutcome(query: string, outcome: LookupOutcome): Array<string> {
  if (outcome.status === "failed") {
    return [`no results for "${query}": ${outcome.error.code} error: ${outcome.error.message}`];
  }

  if (outcome.source === "skipped") {
    return [`query too short: "${query}"`];
  }

  if (outcome.results.length === 0) {
    return [`no results for "${query}"`];
  }

  const marker = outcome.degraded ? "[offline] " : "";
  const lines = outcome.results.map((result) => {
    const code = result.code ?? "-";
    return `${marker}${code.padEnd(10)} ${result.title}`;
  });
  if (outcome.remoteError) {
    lines.push(`(registry unavailable: ${outcome.remoteError.message})`);
  }
  return lines;
}

type InteractionLoopDeps = {
  readonly lookup: LookupFacade;
  readonly write: (line: string) => void;
};

/**
 * Handle one REPL line. Extracted for testability without a readline event loop.
 */
export function createInteractionLoop(deps: InteractionLoopDeps): (input: string) => Promise<void> {
  return async (userInput: string) => {
    if (userInput === CLEAR_COMMAND) {
      deps.lookup.clearCache();
      deps.write("session cache cleared");
      return;
    }

    const outcome = await deps.lookup.lookup(userInput);
    for (const line of formatOutcome(userInput, outcome)) {
      deps.write(line);
    }
  };
}

/**
 * Core shutdown logic without process.exit, for testability.
 */
export async function performShutdown(
  rl: Pick<readline.Interface, "close">,
  seeding: { readonly controller: AbortController; readonly done: Promise<number> },
  persistence: PersistenceProvider | null,
): Promise<void> {
  seeding.controller.abort();
  rl.close();
  // an aborted import stops after its current batch; wait for it before closing the pool
  await seeding.done;
  if (persistence) {
    await persistence.disconnect();
  }
}

async function openCatalogStore(
  databaseUrl: string | undefined,
): Promise<{ store: CatalogStore; persistence: PersistenceProvider | null }> {
  if (!databaseUrl) {
    console.warn("[catalog] no database configured; using an in-memory offline catalog");
    return { store: createInMemoryCatalogStore(), persistence: null };
  }

  const persistence = createPostgresProvider({ connectionString: databaseUrl });
  await persistence.connect();
  console.log("connected to database");
  await persistence.runMigrations();
  console.log("migrations completed");
  return { store: createPostgresCatalogStore(persistence), persistence };
}

async function main(): Promise<void> {
  console.log("diagnostic lookup starting...\n");

  const config = loadConfig();
  const { store, persistence } = await openCatalogStore(config.database.url);

  // Seeding runs in the background; lookups fall back to whatever has been committed.
  const seeding = new AbortController();
  const seeder = createCatalogSeeder({ store, batchSize: config.catalog.batch_size });
  const seeded = startCatalogSeeding(seeder, resolve(PROJECT_ROOT, config.catalog.seed_path), {
    signal: seeding.signal,
  });

  const tokens = createTokenManager({
    config: config.registry,
    credentials: createFileCredentialStore(resolve(PROJECT_ROOT, config.registry.credentials_path)),
  });
  const remote = createRemoteSearchClient({ registry: config.registry, search: config.search, tokens });
  const offline = createOfflineSearchIndex({ store, minQueryLength: config.search.min_query_length });
  const lookup = createLookupFacade({
    cache: createResultCache(),
    remote,
    offline,
    search: config.search,
    language: config.registry.language,
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const interactionHandler = createInteractionLoop({
    lookup,
    write: (line) => process.stdout.write(`${line}\n`),
  });

  let shuttingDown = false;
  const shutdownHandler = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("\nShutting down...");
    try {
      await performShutdown(rl, { controller: seeding, done: seeded }, persistence);
    } catch (error) {
      console.error(`error during shutdown: ${describeError(error)}`);
      process.exitCode = 1;
    }
    process.exit();
  };
  const onSignal = (): void => {
    shutdownHandler().catch((error: unknown) => {
      console.error("shutdown failed:", error);
    });
  };

  // readline swallows Ctrl+C on a TTY and re-emits it on the interface
  rl.on("SIGINT", onSignal);
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  console.log(`Type a diagnosis to look up (${CLEAR_COMMAND} clears the session cache, Ctrl+C exits):\n`);

  rl.setPrompt("> ");
  rl.on("line", async (line: string) => {
    const trimmed = line.trim();
    if (trimmed) {
      try {
        await interactionHandler(trimmed);
      } catch (error) {
        console.error(`error: ${describeError(error)}`);
      }
    }
    rl.prompt();
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
