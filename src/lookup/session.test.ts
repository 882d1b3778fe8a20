// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createSearchSession } from "./session.ts";
import type { SearchSessionState } from "./session.ts";
import type { LookupFacade, LookupOutcome } from "./types.ts";

function outcomeFor(text: string): LookupOutcome {
  return {
    status: "ok",
    source: "remote",
    degraded: false,
    results: [{ externalId: `http://id.who.int/icd/entity/${text}`, title: text }],
  };
}

type PendingLookup = {
  readonly text: string;
  resolve(outcome: LookupOutcome): void;
  reject(error: Error): void;
};

/** Facade whose lookups stay pending until the test settles them. */
function createControlledFacade(): LookupFacade & { readonly pending: Array<PendingLookup> } {
  const pending: Array<PendingLookup> = [];
  return {
    pending,
    lookup(text) {
      return new Promise<LookupOutcome>((resolve, reject) => {
        pending.push({ text, resolve, reject });
      });
    },
    clearCache() {},
  };
}

describe("createSearchSession", () => {
  let states: Array<SearchSessionState>;
  const onChange = (state: SearchSessionState) => {
    states.push(state);
  };

  beforeEach(() => {
    states = [];
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits for input to settle before looking up", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange, debounceMs: 400 });

    session.update("ans");
    await vi.advanceTimersByTimeAsync(200);
    session.update("ansi");
    await vi.advanceTimersByTimeAsync(200);
    session.update("ansiedad");
    await vi.advanceTimersByTimeAsync(399);

    expect(facade.pending).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);

    expect(facade.pending.map((lookup) => lookup.text)).toEqual(["ansiedad"]);
    expect(states).toEqual([{ kind: "loading", text: "ansiedad" }]);
  });

  it("reports the outcome of the current lookup", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("depresion");
    await vi.advanceTimersByTimeAsync(400);
    facade.pending[0]?.resolve(outcomeFor("depresion"));
    await vi.advanceTimersByTimeAsync(0);

    expect(states).toEqual([
      { kind: "loading", text: "depresion" },
      { kind: "done", text: "depresion", outcome: outcomeFor("depresion") },
    ]);
  });

  it("discards a stale lookup that resolves after a newer one started", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("ansie");
    await vi.advanceTimersByTimeAsync(400);
    session.update("ansiedad");
    await vi.advanceTimersByTimeAsync(400);

    const [older, newer] = facade.pending;
    newer?.resolve(outcomeFor("ansiedad"));
    await vi.advanceTimersByTimeAsync(0);
    older?.resolve(outcomeFor("ansie"));
    await vi.advanceTimersByTimeAsync(0);

    expect(states).toEqual([
      { kind: "loading", text: "ansie" },
      { kind: "loading", text: "ansiedad" },
      { kind: "done", text: "ansiedad", outcome: outcomeFor("ansiedad") },
    ]);
  });

  it("drops an in-flight result once the input becomes too short", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("ansiedad");
    await vi.advanceTimersByTimeAsync(400);
    session.update("an");
    facade.pending[0]?.resolve(outcomeFor("ansiedad"));
    await vi.advanceTimersByTimeAsync(0);

    expect(states).toEqual([
      { kind: "loading", text: "ansiedad" },
      { kind: "idle", text: "an" },
    ]);
  });

  it("emits idle immediately for short input and cancels the pending timer", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("ansiedad");
    session.update(" a ");
    await vi.advanceTimersByTimeAsync(1000);

    expect(facade.pending).toHaveLength(0);
    expect(states).toEqual([{ kind: "idle", text: "a" }]);
  });

  it("reports a rejected lookup as an error", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("ansiedad");
    await vi.advanceTimersByTimeAsync(400);
    facade.pending[0]?.reject(new Error("store closed"));
    await vi.advanceTimersByTimeAsync(0);

    expect(states).toEqual([
      { kind: "loading", text: "ansiedad" },
      { kind: "error", text: "ansiedad", message: "store closed" },
    ]);
  });

  it("stops reporting after dispose", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("ansiedad");
    await vi.advanceTimersByTimeAsync(400);
    session.update("depresion");
    session.dispose();
    facade.pending[0]?.resolve(outcomeFor("ansiedad"));
    await vi.advanceTimersByTimeAsync(1000);
    session.update("trastorno");
    await vi.advanceTimersByTimeAsync(1000);

    expect(facade.pending).toHaveLength(1);
    expect(states).toEqual([{ kind: "loading", text: "ansiedad" }]);
  });

  it("uses a 400 ms window by default", async () => {
    const facade = createControlledFacade();
    const session = createSearchSession({ lookup: facade, minQueryLength: 3, onChange });

    session.update("ansiedad");
    await vi.advanceTimersByTimeAsync(399);
    expect(facade.pending).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(facade.pending).toHaveLength(1);
  });
});
