// pattern: Functional Core (barrel export)

export type { CatalogEntry, ClassKind, SeedState, SeedRecord } from "./types.ts";
export { CLASS_KINDS, ASSIGNABLE_CLASS_KINDS, SeedRecordSchema } from "./types.ts";
export type { CatalogStore } from "./store.ts";
export { createPostgresCatalogStore } from "./postgres-store.ts";
export { createInMemoryCatalogStore } from "./memory-store.ts";
export { createOfflineSearchIndex } from "./offline-search.ts";
export type { OfflineSearchIndex } from "./offline-search.ts";
export { createCatalogSeeder, startCatalogSeeding } from "./seeder.ts";
export type { CatalogSeeder, SeedOptions } from "./seeder.ts";
