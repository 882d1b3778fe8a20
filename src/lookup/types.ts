// pattern: Functional Core

import type { LookupError } from "../errors.ts";
import type { SearchResult } from "../registry/types.ts";

export type LookupSource = "skipped" | "cache" | "remote" | "offline";

export type LookupOutcome =
  | {
      readonly status: "ok";
      readonly source: LookupSource;
      /** True when the results come from the offline catalog instead of the registry. */
      readonly degraded: boolean;
      readonly results: ReadonlyArray<SearchResult>;
      readonly remoteError?: LookupError;
    }
  | {
      readonly status: "failed";
      /** The remote failure, surfaced because the offline catalog had nothing either. */
      readonly error: LookupError;
    };

export type LookupOptions = {
  readonly offset?: number;
  readonly limit?: number;
  readonly language?: string;
};

export interface LookupFacade {
  lookup(text: string, options?: LookupOptions): Promise<LookupOutcome>;
  clearCache(): void;
}
