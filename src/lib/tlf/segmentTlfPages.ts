/**
 * TLF Segmentation Engine — Pure Module
 *
 * Run-length segmentation of the TLF section: each page either opens a new
 * record (new heading id), extends the open record (same id, or no heading),
 * or terminates the scan (section 15/16 heading).
 *
 * The scan state is an explicit value threaded through advanceSegmentation;
 * nothing is mutated in place. The open record is always the last element
 * of `records`, so page ranges come out ordered, contiguous per record and
 * never overlapping.
 */

import { classifyTlfPage } from "./classifyTlfPage";
import { isTerminationPage } from "./detectTermination";
import { toPageText } from "./pageText";
import { tlfPdfPath } from "./outputPaths";
import { FIRST_TLF_PAGE } from "./types";
import type {
  SegmentationWarning,
  SourcePage,
  TlfIdentity,
  TlfRecord,
} from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SegmentationState =
  | { kind: "no_open_record" }
  | { kind: "record_open"; current: TlfRecord }
  | { kind: "done"; terminationPage: number | null };

export type SegmentationScan = {
  state: SegmentationState;
  records: readonly TlfRecord[];
  warnings: readonly SegmentationWarning[];
  /** Pages folded into records so far */
  tlfPageCount: number;
};

export type PageTransition =
  | "opened"
  | "extended"
  | "skipped"
  | "terminated"
  | "ignored";

export type SegmentationStep = {
  scan: SegmentationScan;
  transition: PageTransition;
  /** Record finalized by this step (a new id appeared, or the scan terminated) */
  closed: TlfRecord | null;
};

export type SegmentationResult = {
  records: TlfRecord[];
  warnings: SegmentationWarning[];
  /** Page carrying the section 15/16 heading, null when the document just ended */
  terminationPage: number | null;
  tlfPageCount: number;
};

/** Minimal text capability needed to drive a scan over a real document */
export type PageTextReader = {
  readonly pageCount: number;
  getPageText(pageNumber: number): Promise<string>;
};

// ---------------------------------------------------------------------------
// Transition function
// ---------------------------------------------------------------------------

export function initialSegmentationScan(): SegmentationScan {
  return {
    state: { kind: "no_open_record" },
    records: [],
    warnings: [],
    tlfPageCount: 0,
  };
}

export function advanceSegmentation(
  scan: SegmentationScan,
  page: SourcePage,
): SegmentationStep {
  const { state } = scan;

  if (state.kind === "done") {
    return { scan, transition: "ignored", closed: null };
  }

  const open = state.kind === "record_open" ? state.current : null;

  if (isTerminationPage(page.text)) {
    return {
      scan: { ...scan, state: { kind: "done", terminationPage: page.pageNumber } },
      transition: "terminated",
      closed: open,
    };
  }

  const identity = classifyTlfPage(page.text);

  // Continuation page, or same heading repeated on the next page
  if (open && (identity === null || identity.id === open.id)) {
    return { scan: extendOpenRecord(scan, open, page.pageNumber), transition: "extended", closed: null };
  }

  if (identity === null) {
    if (scan.records.length > 0) {
      return { scan, transition: "skipped", closed: null };
    }
    const warning: SegmentationWarning = {
      code: "page_before_first_tlf",
      pageNumber: page.pageNumber,
      message: `No clear TLF ID found on page ${page.pageNumber} before any TLF started.`,
    };
    return {
      scan: { ...scan, warnings: [...scan.warnings, warning] },
      transition: "skipped",
      closed: null,
    };
  }

  return { scan: openRecord(scan, identity, page.pageNumber), transition: "opened", closed: open };
}

/** Close the scan at end of document; a still-open record is kept as-is. */
export function finishSegmentation(scan: SegmentationScan): SegmentationResult {
  return {
    records: [...scan.records],
    warnings: [...scan.warnings],
    terminationPage: scan.state.kind === "done" ? scan.state.terminationPage : null,
    tlfPageCount: scan.tlfPageCount,
  };
}

// ---------------------------------------------------------------------------
// Drivers
// ---------------------------------------------------------------------------

/** Fold an in-memory page sequence (pages already in section order). */
export function segmentTlfPages(pages: Iterable<SourcePage>): SegmentationResult {
  let scan = initialSegmentationScan();
  for (const page of pages) {
    scan = advanceSegmentation(scan, page).scan;
    if (scan.state.kind === "done") break;
  }
  return finishSegmentation(scan);
}

/**
 * Scan a document from `firstPage` to its last page. Text is read one page
 * at a time and reading stops at the termination page.
 */
export async function scanTlfSection(
  reader: PageTextReader,
  opts: {
    firstPage?: number;
    onStep?: (step: SegmentationStep, pageNumber: number) => void;
  } = {},
): Promise<SegmentationResult> {
  let scan = initialSegmentationScan();
  const firstPage = opts.firstPage ?? FIRST_TLF_PAGE;

  for (let pageNumber = firstPage; pageNumber <= reader.pageCount; pageNumber++) {
    const raw = await reader.getPageText(pageNumber);
    const step = advanceSegmentation(scan, { pageNumber, text: toPageText(raw) });
    opts.onStep?.(step, pageNumber);
    scan = step.scan;
    if (scan.state.kind === "done") break;
  }

  return finishSegmentation(scan);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function extendOpenRecord(
  scan: SegmentationScan,
  open: TlfRecord,
  pageNumber: number,
): SegmentationScan {
  const extended: TlfRecord = {
    ...open,
    lastPage: pageNumber,
    pageCount: pageNumber - open.firstPage + 1,
  };
  return {
    ...scan,
    state: { kind: "record_open", current: extended },
    records: [...scan.records.slice(0, -1), extended],
    tlfPageCount: scan.tlfPageCount + 1,
  };
}

function openRecord(
  scan: SegmentationScan,
  identity: TlfIdentity,
  pageNumber: number,
): SegmentationScan {
  const record: TlfRecord = {
    id: identity.id,
    kind: identity.kind,
    title: identity.title,
    outputFile: tlfPdfPath(identity.id),
    firstPage: pageNumber,
    lastPage: pageNumber,
    pageCount: 1,
  };
  if (identity.population !== undefined) record.population = identity.population;
  if (identity.sourceProgram !== undefined) record.sourceProgram = identity.sourceProgram;

  const warnings = scan.records.some((r) => r.id === identity.id)
    ? [
        ...scan.warnings,
        {
          code: "duplicate_tlf_id" as const,
          pageNumber,
          message: `${identity.id} reappears on page ${pageNumber}; its output file will be overwritten.`,
        },
      ]
    : scan.warnings;

  return {
    state: { kind: "record_open", current: record },
    records: [...scan.records, record],
    warnings,
    tlfPageCount: scan.tlfPageCount + 1,
  };
}
