// pattern: Imperative Shell

/**
 * Drives lookups for one search field as the user types. Input is debounced, and a
 * generation counter makes the latest input win: a lookup that resolves after a newer
 * update has been made is dropped instead of reported.
 */

import { describeError } from "../errors.ts";
import type { LookupFacade, LookupOptions, LookupOutcome } from "./types.ts";

export type SearchSessionState =
  | { readonly kind: "idle"; readonly text: string }
  | { readonly kind: "loading"; readonly text: string }
  | { readonly kind: "done"; readonly text: string; readonly outcome: LookupOutcome }
  | { readonly kind: "error"; readonly text: string; readonly message: string };

export type SearchSession = {
  update(text: string): void;
  dispose(): void;
};

type SearchSessionOptions = {
  readonly lookup: LookupFacade;
  readonly minQueryLength: number;
  readonly onChange: (state: SearchSessionState) => void;
  readonly debounceMs?: number;
  readonly lookupOptions?: LookupOptions;
};

export const DEFAULT_DEBOUNCE_MS = 400;

export function createSearchSession(options: SearchSessionOptions): SearchSession {
  const { lookup, minQueryLength, onChange, lookupOptions } = options;
  const debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;

  let generation = 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let disposed = false;

  function cancelTimer(): void {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  }

  async function run(text: string, issuedAt: number): Promise<void> {
    onChange({ kind: "loading", text });
    try {
      const outcome = await lookup.lookup(text, lookupOptions);
      if (issuedAt === generation) {
        onChange({ kind: "done", text, outcome });
      }
    } catch (error) {
      if (issuedAt === generation) {
        onChange({ kind: "error", text, message: describeError(error) });
      }
    }
  }

  return {
    update(text: string): void {
      if (disposed) return;

      generation++;
      cancelTimer();

      const trimmed = text.trim();
      if (trimmed.length < minQueryLength) {
        onChange({ kind: "idle", text: trimmed });
        return;
      }

      const issuedAt = generation;
      timer = setTimeout(() => {
        timer = null;
        run(trimmed, issuedAt).catch((error: unknown) => {
          console.error(`[lookup] search session listener failed: ${describeError(error)}`);
        });
      }, debounceMs);
    },

    dispose(): void {
      disposed = true;
      generation++;
      cancelTimer();
    },
  };
}
