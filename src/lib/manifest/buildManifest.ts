/**
 * Manifest Builder — Pure Module
 *
 * Turns a segmentation result into the manifest record, its persisted JSON
 * shape and the flattened CSV projection. No IO; the caller supplies the
 * timestamp.
 */

import { NARRATIVE_PDF_PATH, NARRATIVE_STEM } from "../tlf/outputPaths";
import { NARRATIVE_PAGE_COUNT } from "../tlf/types";
import type { NarrativeRecord, TlfRecord } from "../tlf/types";
import { MANIFEST_CSV_HEADER } from "./manifestSchema";
import type { PersistedManifest, PersistedTlf } from "./manifestSchema";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Manifest = {
  sourceFile: string;
  sourcePageCount: number;
  /** ISO-8601 UTC, second precision, "Z" suffix */
  extractionDate: string;
  narrative: NarrativeRecord;
  tlfs: readonly TlfRecord[];
};

export type ManifestRow = Record<(typeof MANIFEST_CSV_HEADER)[number], string>;

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function narrativeRecord(): NarrativeRecord {
  return {
    outputFile: NARRATIVE_PDF_PATH,
    firstPage: 1,
    lastPage: NARRATIVE_PAGE_COUNT,
    pageCount: NARRATIVE_PAGE_COUNT,
  };
}

/** 2026-10-18T09:30:12.345Z -> 2026-10-18T09:30:12Z */
export function formatExtractionDate(at: Date): string {
  return `${at.toISOString().slice(0, 19)}Z`;
}

export function buildManifest(args: {
  sourceFile: string;
  sourcePageCount: number;
  records: readonly TlfRecord[];
  extractedAt: Date;
}): Manifest {
  return {
    sourceFile: args.sourceFile,
    sourcePageCount: args.sourcePageCount,
    extractionDate: formatExtractionDate(args.extractedAt),
    narrative: narrativeRecord(),
    tlfs: args.records.map((r) => ({ ...r })),
  };
}

// ---------------------------------------------------------------------------
// Persisted JSON
// ---------------------------------------------------------------------------

export function toPersistedManifest(manifest: Manifest): PersistedManifest {
  const { narrative } = manifest;
  return {
    source_file: manifest.sourceFile,
    source_pages: manifest.sourcePageCount,
    extraction_date: manifest.extractionDate,
    narrative: {
      file: narrative.outputFile,
      pages_in_source: [narrative.firstPage, narrative.lastPage],
      page_count: narrative.pageCount,
    },
    tlfs: manifest.tlfs.map(toPersistedTlf),
  };
}

function toPersistedTlf(record: TlfRecord): PersistedTlf {
  const out: PersistedTlf = {
    id: record.id,
    type: record.kind,
    title: record.title,
    file: record.outputFile,
    pages_in_source: [record.firstPage, record.lastPage],
    page_count: record.pageCount,
    population: record.population ?? "",
  };
  if (record.sourceProgram) out.source_program = record.sourceProgram;
  return out;
}

export function renderManifestJson(manifest: Manifest): string {
  return `${JSON.stringify(toPersistedManifest(manifest), null, 2)}\n`;
}

// ---------------------------------------------------------------------------
// Tabular projection
// ---------------------------------------------------------------------------

export function toManifestRows(manifest: Manifest): ManifestRow[] {
  const { narrative } = manifest;
  const narrativeRow: ManifestRow = {
    id: NARRATIVE_STEM,
    type: "narrative",
    title: "",
    file: narrative.outputFile,
    pages_in_source_start: String(narrative.firstPage),
    pages_in_source_end: String(narrative.lastPage),
    page_count: String(narrative.pageCount),
    population: "",
    source_program: "",
  };

  return [
    narrativeRow,
    ...manifest.tlfs.map((t) => ({
      id: t.id,
      type: t.kind,
      title: t.title,
      file: t.outputFile,
      pages_in_source_start: String(t.firstPage),
      pages_in_source_end: String(t.lastPage),
      page_count: String(t.pageCount),
      population: t.population ?? "",
      source_program: t.sourceProgram ?? "",
    })),
  ];
}

/** RFC 4180: quote fields holding a comma, quote or line break; CRLF rows. */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderManifestCsv(manifest: Manifest): string {
  const lines = [
    MANIFEST_CSV_HEADER.join(","),
    ...toManifestRows(manifest).map((row) =>
      MANIFEST_CSV_HEADER.map((col) => csvField(row[col])).join(","),
    ),
  ];
  return lines.map((l) => `${l}\r\n`).join("");
}
