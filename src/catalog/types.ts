// pattern: Functional Core

import { z } from "zod";

export const CLASS_KINDS = ["chapter", "block", "category", "window"] as const;

export type ClassKind = (typeof CLASS_KINDS)[number];

/** Class kinds that denote an assignable diagnosis rather than a structural grouping. */
export const ASSIGNABLE_CLASS_KINDS: ReadonlyArray<ClassKind> = ["category"];

export type CatalogEntry = {
  readonly id: string;
  readonly code: string;
  readonly title: string;
  readonly uri: string;
  readonly classKind: ClassKind;
  readonly chapterCode: string;
};

export type SeedState = {
  readonly completedAt: Date;
  readonly rowCount: number;
};

/** One row of the bundled dataset. */
export const SeedRecordSchema = z.object({
  code: z.string(),
  title: z.string().min(1),
  uri: z.string().min(1),
  classKind: z.enum(CLASS_KINDS),
  chapterCode: z.string(),
});

export type SeedRecord = z.infer<typeof SeedRecordSchema>;
