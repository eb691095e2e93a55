/**
 * PDF collaborator contracts.
 *
 * Segmentation and validation only ever see these interfaces; the
 * pdf-lib/pdfjs-dist implementation lives in openPdfSource.ts.
 */

export interface PdfDocumentSource {
  readonly pageCount: number;
  /** 1-based. Linearized text, one visual line per "\n". */
  getPageText(pageNumber: number): Promise<string>;
  /** New PDF holding pages firstPage..lastPage (1-based, inclusive). */
  extractPages(firstPage: number, lastPage: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface PdfPageCounter {
  /** Rejects when the file is not a readable PDF. */
  countPages(filePath: string): Promise<number>;
}

export type PdfSourceOpener = (filePath: string) => Promise<PdfDocumentSource>;
