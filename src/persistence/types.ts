// pattern: Functional Core

/**
 * Persistence port shared by every Postgres-backed store.
 * Row types passed as `T` describe the selected columns, not the whole table.
 */

export type QueryFunction = <T extends Record<string, unknown>>(
  sql: string,
  params?: ReadonlyArray<unknown>,
) => Promise<Array<T>>;

export type PersistenceProvider = {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  runMigrations(): Promise<void>;
  query: QueryFunction;
  /** Runs `fn` inside BEGIN/COMMIT on one pooled client; rolls back if it throws. */
  withTransaction<T>(
    fn: (query: QueryFunction) => Promise<T>,
  ): Promise<T>;
};
