import type { PageText } from "./types";

/** Lines examined for a section 15/16 heading */
const TERMINATION_WINDOW = 20;

/**
 * True when the page opens the References (15.) or Appendices (16.)
 * section, which ends the TLF section of an ICH E3 report.
 */
export function isTerminationPage(page: PageText): boolean {
  return page.slice(0, TERMINATION_WINDOW).some(isTerminationHeading);
}

function isTerminationHeading(line: string): boolean {
  const upper = line.toUpperCase();
  return (
    upper === "15." ||
    upper === "16." ||
    upper.startsWith("15. REFERENCE") ||
    upper.startsWith("16. APPEND")
  );
}
