/**
 * TLF Page Classifier — Pure Module
 *
 * Reads the heading block and footer of one page and returns the TLF
 * identity it announces, or null for a page without a heading.
 * No IO, no state: the same page text always yields the same identity.
 */

import type { PageText, TlfIdentity, TlfKind } from "./types";

// ---------------------------------------------------------------------------
// Anchors
// ---------------------------------------------------------------------------

/** Lines examined for the heading and the population label */
const HEADING_WINDOW = 10;

/** Non-empty lines, counted from the bottom, examined for the source footer */
const FOOTER_WINDOW = 15;

/** "Table 14.1.1", "Figure 14-2.3", "TABLE14.3.1.2 ...": section 14 only */
const TLF_HEADING_RE = /^\s*(?:table|figure)\s*14[.\-][\d.\-]+/i;

const POPULATION_PREFIX = "population:";
const SOURCE_PREFIX = "source:";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function isTlfHeading(line: string): boolean {
  return TLF_HEADING_RE.test(line);
}

export function classifyTlfPage(page: PageText): TlfIdentity | null {
  const headingLines = page.slice(0, HEADING_WINDOW);
  const idIndex = headingLines.findIndex(isTlfHeading);
  if (idIndex === -1) return null;

  const id = headingLines[idIndex];
  const identity: TlfIdentity = {
    id,
    kind: headingKind(id),
    title: page[idIndex + 1] ?? "",
  };

  const population = findPopulation(headingLines);
  if (population) identity.population = population;

  const sourceProgram = findSourceProgram(page);
  if (sourceProgram) identity.sourceProgram = sourceProgram;

  return identity;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function headingKind(line: string): TlfKind {
  return line.toLowerCase().includes("table") ? "table" : "figure";
}

function findPopulation(headingLines: PageText): string | undefined {
  const line = headingLines.find((l) => l.toLowerCase().startsWith(POPULATION_PREFIX));
  if (line === undefined) return undefined;
  return line.slice(line.indexOf(":") + 1).trim();
}

/** "Source:   t_demog.sas   02JUN2023 10:14" -> "t_demog.sas" */
function findSourceProgram(page: PageText): string | undefined {
  const footer = page.slice(-FOOTER_WINDOW);
  for (let i = footer.length - 1; i >= 0; i--) {
    const line = footer[i];
    if (!line.toLowerCase().startsWith(SOURCE_PREFIX)) continue;
    const rest = line.slice(SOURCE_PREFIX.length).trim();
    return rest.split(/\s{2,}/)[0];
  }
  return undefined;
}
