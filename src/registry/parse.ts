// pattern: Functional Core

/**
 * Registry search response parsing.
 * Entities are validated one by one: an entity missing its id or title is skipped and a
 * malformed optional field is dropped. Only a broken envelope fails the whole parse.
 */

import { z } from "zod";
import { LookupError } from "../errors.ts";
import { stripMarkup } from "./markup.ts";
import type { SearchResult } from "./types.ts";

const SearchEnvelopeSchema = z.object({
  destinationEntities: z.array(z.unknown()),
});

const DestinationEntitySchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  theCode: z.string().min(1).optional().catch(undefined),
  chapter: z.string().min(1).optional().catch(undefined),
  score: z.number().finite().optional().catch(undefined),
});

export function parseSearchResponse(payload: unknown): Array<SearchResult> {
  const envelope = SearchEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new LookupError("parse", "registry response has no destinationEntities list", {
      cause: envelope.error,
    });
  }

  const results: Array<SearchResult> = [];
  for (const candidate of envelope.data.destinationEntities) {
    const result = toSearchResult(candidate);
    if (result) {
      results.push(result);
    }
  }
  return results;
}

function toSearchResult(candidate: unknown): SearchResult | null {
  const entity = DestinationEntitySchema.safeParse(candidate);
  if (!entity.success) {
    return null;
  }

  const title = stripMarkup(entity.data.title);
  if (!title) {
    return null;
  }

  const { id, theCode, chapter, score } = entity.data;
  return {
    externalId: id,
    title,
    ...(theCode !== undefined ? { code: theCode } : {}),
    ...(chapter !== undefined ? { chapterHint: chapter } : {}),
    ...(score !== undefined ? { relevanceScore: score } : {}),
  };
}
