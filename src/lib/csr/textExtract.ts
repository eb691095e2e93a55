import fs from "node:fs/promises";

import type { Logger } from "../log/logger";
import type { PdfDocumentSource } from "../pdf/types";

/**
 * Plain text of pages firstPage..lastPage. Pages are separated by
 * "--- Page <k> ---" where k counts from 1 inside the extract, so the
 * first separator reads "--- Page 2 ---".
 */
export async function buildTextExtract(
  source: Pick<PdfDocumentSource, "getPageText">,
  firstPage: number,
  lastPage: number,
): Promise<string> {
  let text = "";
  for (let p = firstPage; p <= lastPage; p++) {
    text += await source.getPageText(p);
    if (p < lastPage) text += `\n--- Page ${p - firstPage + 2} ---\n`;
  }
  return text;
}

export function textFailureMarker(firstPage: number): string {
  return `[TEXT EXTRACTION FAILED ON PAGE ${firstPage}]`;
}

/**
 * Write the text extract of a page range. A failure to read page text is
 * recorded in the file itself and logged; the run continues.
 * Returns false when the placeholder was written instead.
 */
export async function writeTextExtract(args: {
  source: Pick<PdfDocumentSource, "getPageText">;
  firstPage: number;
  lastPage: number;
  filePath: string;
  logger: Logger;
}): Promise<boolean> {
  let text: string;
  try {
    text = await buildTextExtract(args.source, args.firstPage, args.lastPage);
  } catch (e: unknown) {
    args.logger.warn(
      `Failed to extract text to ${args.filePath}: ${e instanceof Error ? e.message : String(e)}`,
    );
    await fs.writeFile(args.filePath, textFailureMarker(args.firstPage), "utf8");
    return false;
  }
  await fs.writeFile(args.filePath, text, "utf8");
  return true;
}
