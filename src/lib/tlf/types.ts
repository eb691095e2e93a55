/**
 * CSR TLF Segmentation — Types
 *
 * Pure type definitions. No runtime deps beyond layout constants.
 */

/** Linearized, trimmed, non-empty lines of one page, in reading order. */
export type PageText = readonly string[];

export type TlfKind = "table" | "figure";

export type TlfIdentity = {
  /** Raw heading line, case preserved (e.g. "Table 14.1.1") */
  id: string;
  kind: TlfKind;
  title: string;
  population?: string;
  sourceProgram?: string;
};

export type TlfRecord = {
  id: string;
  kind: TlfKind;
  title: string;
  /** Relative to the output directory, e.g. "pdf/Table_14.1.1.pdf" */
  outputFile: string;
  /** 1-based, inclusive, source-document numbering */
  firstPage: number;
  lastPage: number;
  pageCount: number;
  population?: string;
  sourceProgram?: string;
};

export type NarrativeRecord = {
  outputFile: string;
  firstPage: 1;
  lastPage: number;
  pageCount: number;
};

export type SourcePage = {
  pageNumber: number;
  text: PageText;
};

export type SegmentationWarningCode = "page_before_first_tlf" | "duplicate_tlf_id";

export type SegmentationWarning = {
  code: SegmentationWarningCode;
  pageNumber: number;
  message: string;
};

// ---------------------------------------------------------------------------
// Fixed ICH E3 layout
// ---------------------------------------------------------------------------

export const NARRATIVE_PAGE_COUNT = 42;
export const FIRST_TLF_PAGE = NARRATIVE_PAGE_COUNT + 1;
/** A source must reach the first TLF page to be extractable. */
export const MIN_SOURCE_PAGES = FIRST_TLF_PAGE;
