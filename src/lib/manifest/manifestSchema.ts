import { z } from "zod";

/**
 * Persisted manifest (manifest.json) wire format.
 *
 * This schema is the only parser for a manifest read back from disk.
 * Field names and order are an external contract.
 */

const PageRangeSchema = z.tuple([
  z.number().int().positive(),
  z.number().int().positive(),
]);

export const PersistedNarrativeSchema = z.object({
  file: z.string().min(1),
  pages_in_source: PageRangeSchema,
  page_count: z.number().int().nonnegative(),
});

export const PersistedTlfSchema = z.object({
  id: z.string().min(1),
  type: z.enum(["table", "figure"]),
  title: z.string(),
  file: z.string().min(1),
  pages_in_source: PageRangeSchema,
  page_count: z.number().int().nonnegative(),
  population: z.string(),
  source_program: z.string().optional(),
});

export const PersistedManifestSchema = z.object({
  source_file: z.string(),
  source_pages: z.number().int().nonnegative(),
  extraction_date: z.string(),
  narrative: PersistedNarrativeSchema,
  tlfs: z.array(PersistedTlfSchema),
});

export type PersistedNarrative = z.infer<typeof PersistedNarrativeSchema>;
export type PersistedTlf = z.infer<typeof PersistedTlfSchema>;
export type PersistedManifest = z.infer<typeof PersistedManifestSchema>;

export const MANIFEST_CSV_HEADER = [
  "id",
  "type",
  "title",
  "file",
  "pages_in_source_start",
  "pages_in_source_end",
  "page_count",
  "population",
  "source_program",
] as const;
