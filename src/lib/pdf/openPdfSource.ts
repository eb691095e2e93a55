/**
 * pdf-lib + pdfjs-dist implementation of the PDF collaborator.
 *
 *   - pdfjs-dist (legacy build, runs under Node without a worker URL)
 *     supplies page text.
 *   - pdf-lib copies page ranges into new documents and counts pages.
 *
 * Both libraries get their own copy of the bytes: pdfjs transfers the
 * buffer it is given.
 */

import fs from "node:fs/promises";
import { PDFDocument } from "pdf-lib";
import * as pdfjs from "pdfjs-dist/legacy/build/pdf.mjs";

import { CsrExtractionError } from "../csr/errors";
import type { PdfDocumentSource, PdfPageCounter } from "./types";

type PdfjsDocument = Awaited<ReturnType<typeof pdfjs.getDocument>["promise"]>;

/** Structural views of pdfjs TextItem / TextMarkedContent */
type TextRun = { str: string; hasEOL: boolean };
type MarkedContent = { type: string };

export async function openPdfSource(filePath: string): Promise<PdfDocumentSource> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await fs.readFile(filePath));
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new CsrExtractionError("source_not_found", `Input file not found: ${filePath}`);
    }
    throw e;
  }

  let pdfDoc: PDFDocument;
  let textDoc: PdfjsDocument;
  try {
    pdfDoc = await PDFDocument.load(bytes);
    textDoc = await pdfjs.getDocument({
      data: bytes.slice(),
      isEvalSupported: false,
      verbosity: 0,
    }).promise;
  } catch (e: unknown) {
    throw new CsrExtractionError(
      "source_unreadable",
      `Cannot open ${filePath} as PDF: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  return new PdfLibSource(pdfDoc, textDoc);
}

class PdfLibSource implements PdfDocumentSource {
  readonly pageCount: number;

  constructor(
    private readonly pdfDoc: PDFDocument,
    private readonly textDoc: PdfjsDocument,
  ) {
    this.pageCount = pdfDoc.getPageCount();
  }

  async getPageText(pageNumber: number): Promise<string> {
    const page = await this.textDoc.getPage(pageNumber);
    try {
      const content = await page.getTextContent();
      return linearizeTextItems(content.items);
    } finally {
      page.cleanup();
    }
  }

  async extractPages(firstPage: number, lastPage: number): Promise<Uint8Array> {
    // pdf-lib pages are 0-indexed
    const child = await PDFDocument.create();
    const indices = Array.from(
      { length: lastPage - firstPage + 1 },
      (_, k) => firstPage - 1 + k,
    );
    const copied = await child.copyPages(this.pdfDoc, indices);
    copied.forEach((p) => child.addPage(p));
    return child.save();
  }

  async close(): Promise<void> {
    await this.textDoc.destroy();
  }
}

/**
 * Concatenate text runs in content-stream order; a run flagged hasEOL
 * closes the current line.
 */
export function linearizeTextItems(items: ReadonlyArray<TextRun | MarkedContent>): string {
  let text = "";
  for (const item of items) {
    if (!("str" in item)) continue;
    text += item.str;
    if (item.hasEOL) text += "\n";
  }
  return text;
}

export const pdfLibPageCounter: PdfPageCounter = {
  async countPages(filePath: string): Promise<number> {
    const bytes = await fs.readFile(filePath);
    const doc = await PDFDocument.load(new Uint8Array(bytes));
    return doc.getPageCount();
  },
};
