/**
 * Output file naming. Paths are relative to the output directory and
 * always use "/" so the manifest reads the same on every platform.
 */

export const PDF_DIR = "pdf";
export const TEXT_DIR = "text";

export const NARRATIVE_STEM = "narrative_body";
export const NARRATIVE_PDF_PATH = `${PDF_DIR}/${NARRATIVE_STEM}.pdf`;
export const NARRATIVE_TEXT_PATH = `${TEXT_DIR}/${NARRATIVE_STEM}.txt`;

export const MANIFEST_JSON = "manifest.json";
export const MANIFEST_CSV = "manifest.csv";

/** "Table 14.1.1" -> "Table_14.1.1" */
export function sanitizeTlfId(id: string): string {
  return id
    .replace(/[\r\n]/g, "")
    .replace(/[ \t]/g, "_")
    .replace(/[/\\]/g, "_");
}

export function tlfPdfPath(id: string): string {
  return `${PDF_DIR}/${sanitizeTlfId(id)}.pdf`;
}

export function tlfTextPath(id: string): string {
  return `${TEXT_DIR}/${sanitizeTlfId(id)}.txt`;
}
