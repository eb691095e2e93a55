import { NARRATIVE_PDF_PATH } from "../tlf/outputPaths";
import type { ExtractionResult } from "./extractCsr";

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}

/**
 * Human-readable run summary. Built from in-memory data only, so a dry
 * run and a real run over the same document print the same lines.
 */
export function formatExtractionSummary(result: ExtractionResult): string[] {
  const { manifest, segmentation } = result;
  const tables = manifest.tlfs.filter((t) => t.kind === "table").length;
  const figures = manifest.tlfs.length - tables;
  const { narrative } = manifest;
  // Pages dropped before the first heading; duplicate ids are logged only
  const skippedPages = segmentation.warnings.filter((w) => w.code === "page_before_first_tlf").length;

  return [
    "=== Extraction Summary ===",
    `Source: ${manifest.sourceFile} (${manifest.sourcePageCount} pages)`,
    `Narrative: pages ${narrative.firstPage}-${narrative.lastPage} -> ${NARRATIVE_PDF_PATH}`,
    `TLFs extracted: ${manifest.tlfs.length} (${plural(tables, "table")}, ${plural(figures, "figure")})`,
    `Total TLF pages: ${segmentation.tlfPageCount}`,
    `Warnings: ${skippedPages}`,
    "",
    ...manifest.tlfs.map(
      (t) => `${t.id.padEnd(14)} ${`(${t.pageCount}p)`.padEnd(6)} ${t.title}`,
    ),
  ];
}
