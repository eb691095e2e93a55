export type CsrExtractionErrorCode =
  | "source_not_found"
  | "source_unreadable"
  | "too_few_pages";

/** Document-level failure: raised before any output is written. */
export class CsrExtractionError extends Error {
  readonly code: CsrExtractionErrorCode;

  constructor(code: CsrExtractionErrorCode, message: string) {
    super(message);
    this.name = "CsrExtractionError";
    this.code = code;
  }
}
