/**
 * CSR Extraction Driver
 *
 * Splits an ICH E3 clinical study report into its narrative body (pages
 * 1-42) and one PDF (plus optional text extract) per Table/Figure of
 * section 14, then records everything in manifest.json / manifest.csv.
 *
 * Safety model:
 *   - Document-level guards (missing input, too few pages) run BEFORE any
 *     directory is created; they throw CsrExtractionError.
 *   - Per-file faults (one text extract) are recorded and the run continues.
 *   - Dry run computes the identical segmentation and manifest and writes
 *     nothing; segmentation never depends on a write having happened.
 *   - The manifest is written last, after every TLF file exists.
 */

import fs from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";

import type { Logger } from "../log/logger";
import { buildManifest, renderManifestCsv, renderManifestJson } from "../manifest/buildManifest";
import type { Manifest } from "../manifest/buildManifest";
import { openPdfSource } from "../pdf/openPdfSource";
import type { PdfDocumentSource, PdfSourceOpener } from "../pdf/types";
import {
  MANIFEST_CSV,
  MANIFEST_JSON,
  NARRATIVE_PDF_PATH,
  NARRATIVE_TEXT_PATH,
  PDF_DIR,
  TEXT_DIR,
  tlfTextPath,
} from "../tlf/outputPaths";
import { scanTlfSection } from "../tlf/segmentTlfPages";
import type { SegmentationResult } from "../tlf/segmentTlfPages";
import { FIRST_TLF_PAGE, MIN_SOURCE_PAGES, NARRATIVE_PAGE_COUNT } from "../tlf/types";
import type { TlfRecord } from "../tlf/types";
import { CsrExtractionError } from "./errors";
import { writeTextExtract } from "./textExtract";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ExtractCsrOptions = {
  inputPath: string;
  outputDir: string;
  /** Detect only: no directory, PDF, text or manifest is written */
  dryRun?: boolean;
  writeText?: boolean;
};

export type ExtractCsrDeps = {
  logger: Logger;
  openSource?: PdfSourceOpener;
  now?: () => Date;
  writeConcurrency?: number;
};

export type ExtractionResult = {
  manifest: Manifest;
  segmentation: SegmentationResult;
  dryRun: boolean;
  /** Paths relative to outputDir, in write order (empty on dry run) */
  writtenFiles: string[];
  /** Text extracts replaced by the failure marker */
  textFailures: number;
};

const DEFAULT_WRITE_CONCURRENCY = 4;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function extractCsr(
  options: ExtractCsrOptions,
  deps: ExtractCsrDeps,
): Promise<ExtractionResult> {
  const { logger } = deps;
  const dryRun = options.dryRun ?? false;
  const writeText = options.writeText ?? true;
  const openSource = deps.openSource ?? openPdfSource;

  const source = await openSource(options.inputPath);
  try {
    // ── Abort guard: fixed ICH E3 layout ──────────────────────────────
    if (source.pageCount < MIN_SOURCE_PAGES) {
      throw new CsrExtractionError(
        "too_few_pages",
        `Document has too few pages (${source.pageCount}). Cannot extract CSR.`,
      );
    }

    const out = new OutputWriter(options.outputDir, dryRun);
    await out.ensureDirs(writeText);

    // ── Narrative body ────────────────────────────────────────────────
    logger.info(`Extracting narrative body (pages 1-${NARRATIVE_PAGE_COUNT})...`);
    let textFailures = 0;
    if (!dryRun) {
      await out.writeBytes(NARRATIVE_PDF_PATH, await source.extractPages(1, NARRATIVE_PAGE_COUNT));
      if (writeText) {
        const ok = await writeTextExtract({
          source,
          firstPage: 1,
          lastPage: NARRATIVE_PAGE_COUNT,
          filePath: out.resolve(NARRATIVE_TEXT_PATH),
          logger,
        });
        out.recordWritten(NARRATIVE_TEXT_PATH);
        if (!ok) textFailures += 1;
      }
    }

    // ── Section 14 scan ───────────────────────────────────────────────
    const segmentation = await scanTlfSection(source, {
      firstPage: FIRST_TLF_PAGE,
      onStep: (step, pageNumber) => {
        if (step.transition === "terminated") {
          logger.info(`Reached Section 15/16 on page ${pageNumber}. Terminating TLF extraction.`);
        }
        if (step.closed) {
          logger.info(`Found ${step.closed.id} (Pages ${step.closed.firstPage}-${step.closed.lastPage})`);
        }
      },
    });

    for (const w of segmentation.warnings) logger.warn(w.message);

    const last = segmentation.records[segmentation.records.length - 1];
    if (last && segmentation.terminationPage === null) {
      logger.info(`Found ${last.id} (Pages ${last.firstPage}-${last.lastPage})`);
    }

    // ── Per-TLF outputs ───────────────────────────────────────────────
    if (!dryRun) {
      textFailures += await writeTlfOutputs({
        source,
        records: segmentation.records,
        out,
        writeText,
        logger,
        concurrency: deps.writeConcurrency ?? DEFAULT_WRITE_CONCURRENCY,
      });
    }

    // ── Manifest (observes the final record list) ─────────────────────
    const manifest = buildManifest({
      sourceFile: path.basename(options.inputPath),
      sourcePageCount: source.pageCount,
      records: segmentation.records,
      extractedAt: (deps.now ?? (() => new Date()))(),
    });

    if (!dryRun) {
      await out.writeText(MANIFEST_JSON, renderManifestJson(manifest));
      await out.writeText(MANIFEST_CSV, renderManifestCsv(manifest));
    }

    return { manifest, segmentation, dryRun, writtenFiles: out.written, textFailures };
  } finally {
    await source.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function writeTlfOutputs(args: {
  source: PdfDocumentSource;
  records: readonly TlfRecord[];
  out: OutputWriter;
  writeText: boolean;
  logger: Logger;
  concurrency: number;
}): Promise<number> {
  const limiter = pLimit(args.concurrency);
  let failures = 0;

  // Records sharing an output file (a repeated id) are written in scan
  // order inside one task, so the last record owns the file.
  const byFile = new Map<string, TlfRecord[]>();
  for (const record of args.records) {
    const group = byFile.get(record.outputFile);
    if (group) group.push(record);
    else byFile.set(record.outputFile, [record]);
  }

  const writeRecord = async (record: TlfRecord) => {
    const bytes = await args.source.extractPages(record.firstPage, record.lastPage);
    await args.out.writeBytes(record.outputFile, bytes);

    if (!args.writeText) return;
    const textPath = tlfTextPath(record.id);
    const ok = await writeTextExtract({
      source: args.source,
      firstPage: record.firstPage,
      lastPage: record.lastPage,
      filePath: args.out.resolve(textPath),
      logger: args.logger,
    });
    args.out.recordWritten(textPath);
    if (!ok) failures += 1;
  };

  await Promise.all(
    [...byFile.values()].map((group) =>
      limiter(async () => {
        for (const record of group) await writeRecord(record);
      }),
    ),
  );

  return failures;
}

/** All filesystem writes of a run go through here; a dry run writes nothing. */
class OutputWriter {
  readonly written: string[] = [];

  constructor(
    private readonly outputDir: string,
    private readonly dryRun: boolean,
  ) {}

  resolve(relative: string): string {
    return path.join(this.outputDir, relative);
  }

  async ensureDirs(withText: boolean): Promise<void> {
    if (this.dryRun) return;
    await fs.mkdir(this.resolve(PDF_DIR), { recursive: true });
    if (withText) await fs.mkdir(this.resolve(TEXT_DIR), { recursive: true });
  }

  async writeBytes(relative: string, bytes: Uint8Array): Promise<void> {
    if (this.dryRun) return;
    await fs.writeFile(this.resolve(relative), bytes);
    this.recordWritten(relative);
  }

  async writeText(relative: string, text: string): Promise<void> {
    if (this.dryRun) return;
    await fs.writeFile(this.resolve(relative), text, "utf8");
    this.recordWritten(relative);
  }

  recordWritten(relative: string): void {
    this.written.push(relative);
  }
}
