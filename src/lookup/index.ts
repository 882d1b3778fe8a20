// pattern: Functional Core (barrel export)

export type { LookupFacade, LookupOptions, LookupOutcome, LookupSource } from "./types.ts";
export { createLookupFacade } from "./facade.ts";
export { createSearchSession, DEFAULT_DEBOUNCE_MS } from "./session.ts";
export type { SearchSession, SearchSessionState } from "./session.ts";
