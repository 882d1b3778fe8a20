// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { createOfflineSearchIndex } from "./offline-search.ts";
import { createInMemoryCatalogStore } from "./memory-store.ts";

async function seededStore() {
  const store = createInMemoryCatalogStore("es");
  await store.insertBatch([
    {
      id: "id-1",
      code: "06",
      title: "Trastornos mentales, del comportamiento y del neurodesarrollo",
      uri: "http://id.who.int/icd/entity/100",
      classKind: "chapter",
      chapterCode: "06",
    },
    {
      id: "id-2",
      code: "",
      title: "Trastornos de ansiedad o relacionados con el miedo",
      uri: "http://id.who.int/icd/entity/200",
      classKind: "block",
      chapterCode: "06",
    },
    {
      id: "id-3",
      code: "6B00",
      title: "Trastorno de ansiedad generalizada",
      uri: "http://id.who.int/icd/entity/300",
      classKind: "category",
      chapterCode: "06",
    },
    {
      id: "id-4",
      code: "6B01",
      title: "Trastorno de pánico",
      uri: "http://id.who.int/icd/entity/400",
      classKind: "category",
      chapterCode: "",
    },
  ]);
  return store;
}

describe("createOfflineSearchIndex", () => {
  it("returns matching categories and leaves out chapters and blocks", async () => {
    const index = createOfflineSearchIndex({ store: await seededStore(), minQueryLength: 3 });

    const results = await index.searchOffline("ansiedad", 10);

    expect(results).toEqual([
      {
        externalId: "http://id.who.int/icd/entity/300",
        code: "6B00",
        title: "Trastorno de ansiedad generalizada",
        chapterHint: "06",
      },
    ]);
  });

  it("omits an empty chapter code and never reports a relevance score", async () => {
    const index = createOfflineSearchIndex({ store: await seededStore(), minQueryLength: 3 });

    const results = await index.searchOffline("PANICO", 10);

    expect(results).toEqual([
      { externalId: "http://id.who.int/icd/entity/400", code: "6B01", title: "Trastorno de pánico" },
    ]);
  });

  it("returns the same order for repeated identical queries", async () => {
    const index = createOfflineSearchIndex({ store: await seededStore(), minQueryLength: 3 });

    const first = await index.searchOffline("trastorno", 10);
    const second = await index.searchOffline("trastorno", 10);

    expect(first.map((r) => r.externalId)).toEqual([
      "http://id.who.int/icd/entity/300",
      "http://id.who.int/icd/entity/400",
    ]);
    expect(second).toEqual(first);
  });

  it("returns nothing for short queries", async () => {
    const index = createOfflineSearchIndex({ store: await seededStore(), minQueryLength: 3 });

    expect(await index.searchOffline(" an ", 10)).toEqual([]);
  });
});
