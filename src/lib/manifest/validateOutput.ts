/**
 * Output Validator
 *
 * Re-reads manifest.json and the files it references and re-derives every
 * consistency property from disk. Deliberately independent of the
 * segmentation engine and the builder: it trusts nothing held in memory,
 * so it also catches damage done to an output directory after extraction.
 *
 * Only a missing or unparseable manifest stops validation. Every other
 * finding is accumulated and all checks always run.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { PdfPageCounter } from "../pdf/types";
import { MANIFEST_JSON } from "../tlf/outputPaths";
import { PersistedManifestSchema } from "./manifestSchema";
import type { PersistedManifest, PersistedTlf } from "./manifestSchema";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const VALIDATION_CHECKS = [
  "files_exist",
  "files_non_empty",
  "page_count_match",
  "no_page_gaps",
  "no_page_overlaps",
  "narrative_ok",
  "pdfs_readable",
] as const;

export type ValidationCheck = (typeof VALIDATION_CHECKS)[number];

export type ValidationReport = {
  passed: boolean;
  checks: Record<ValidationCheck, boolean>;
  /** Itemized failures, in discovery order */
  failures: string[];
  /** One line per passing check */
  summary: string[];
  verdict: string;
  passedCount: number;
  totalCount: number;
};

export type ManifestErrorCode = "manifest_missing" | "manifest_corrupt";

export type ValidationOutcome =
  | { kind: "report"; report: ValidationReport; manifest: PersistedManifest }
  | { kind: "fatal"; code: ManifestErrorCode; message: string };

export type PageContinuityIssue = {
  kind: "gap" | "overlap";
  id: string;
  expected: number;
  actual: number;
  message: string;
};

// ---------------------------------------------------------------------------
// Page continuity (pure)
// ---------------------------------------------------------------------------

type PagedEntry = Pick<PersistedTlf, "id" | "pages_in_source">;

function continuityIssue(expected: number | null, entry: PagedEntry): PageContinuityIssue | null {
  if (expected === null) return null;
  const [start] = entry.pages_in_source;
  if (start > expected) {
    return {
      kind: "gap",
      id: entry.id,
      expected,
      actual: start,
      message: `Page gap before ${entry.id} (expected ${expected}, got ${start})`,
    };
  }
  if (start < expected) {
    return {
      kind: "overlap",
      id: entry.id,
      expected,
      actual: start,
      message: `Page overlap at ${entry.id} (expected ${expected}, got ${start})`,
    };
  }
  return null;
}

/** Walk TLFs in manifest order: each must start right after the previous one. */
export function checkPageContinuity(tlfs: readonly PagedEntry[]): PageContinuityIssue[] {
  const issues: PageContinuityIssue[] = [];
  let expected: number | null = null;
  for (const tlf of tlfs) {
    const issue = continuityIssue(expected, tlf);
    if (issue) issues.push(issue);
    expected = tlf.pages_in_source[1] + 1;
  }
  return issues;
}

// ---------------------------------------------------------------------------
// Manifest loading
// ---------------------------------------------------------------------------

export async function readManifest(
  outputDir: string,
): Promise<
  | { ok: true; manifest: PersistedManifest }
  | { ok: false; code: ManifestErrorCode; message: string }
> {
  const manifestPath = path.join(outputDir, MANIFEST_JSON);

  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, "utf8");
  } catch (e: unknown) {
    if (isNotFound(e)) {
      return {
        ok: false,
        code: "manifest_missing",
        message: `Cannot validate: ${MANIFEST_JSON} not found in ${outputDir}`,
      };
    }
    throw e;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, code: "manifest_corrupt", message: `Invalid ${MANIFEST_JSON} format` };
  }

  const parsed = PersistedManifestSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "schema mismatch";
    return { ok: false, code: "manifest_corrupt", message: `Invalid ${MANIFEST_JSON} format (${where})` };
  }

  return { ok: true, manifest: parsed.data };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export async function validateOutput(
  outputDir: string,
  deps: { pageCounter: PdfPageCounter },
): Promise<ValidationOutcome> {
  const loaded = await readManifest(outputDir);
  if (!loaded.ok) {
    return { kind: "fatal", code: loaded.code, message: loaded.message };
  }

  const { manifest } = loaded;
  const { pageCounter } = deps;

  const checks: Record<ValidationCheck, boolean> = {
    files_exist: true,
    files_non_empty: true,
    page_count_match: true,
    no_page_gaps: true,
    no_page_overlaps: true,
    narrative_ok: true,
    pdfs_readable: true,
  };
  const failures: string[] = [];

  const fail = (check: ValidationCheck, message: string) => {
    checks[check] = false;
    failures.push(`❌ ${message}`);
  };

  // ── Narrative ─────────────────────────────────────────────────────────
  const narrative = manifest.narrative;
  const narrativePath = path.join(outputDir, narrative.file);
  const narrativeSize = await fileSize(narrativePath);

  if (narrativeSize === null) {
    fail("narrative_ok", `Narrative body missing: ${narrativePath}`);
    checks.files_exist = false;
  } else if (narrativeSize === 0) {
    fail("narrative_ok", `Narrative body is empty: ${narrativePath}`);
    checks.files_non_empty = false;
  } else {
    const counted = await countPagesSafely(pageCounter, narrativePath);
    if (counted === null) {
      fail("narrative_ok", `Narrative body is unreadable: ${narrativePath}`);
      checks.pdfs_readable = false;
    } else if (counted !== narrative.page_count) {
      fail("narrative_ok", `Narrative page count mismatch: ${counted} != ${narrative.page_count}`);
    }
  }

  // ── TLFs ──────────────────────────────────────────────────────────────
  let expectedNext: number | null = null;

  for (const tlf of manifest.tlfs) {
    const issue = continuityIssue(expectedNext, tlf);
    if (issue) fail(issue.kind === "gap" ? "no_page_gaps" : "no_page_overlaps", issue.message);
    expectedNext = tlf.pages_in_source[1] + 1;

    const filePath = path.join(outputDir, tlf.file);
    const size = await fileSize(filePath);

    if (size === null) {
      fail("files_exist", `File missing for ${tlf.id}: ${filePath}`);
      continue;
    }
    if (size === 0) {
      fail("files_non_empty", `File empty for ${tlf.id}: ${filePath}`);
      continue;
    }

    const counted = await countPagesSafely(pageCounter, filePath);
    if (counted === null) {
      fail("pdfs_readable", `File unreadable for ${tlf.id}: ${filePath}`);
    } else if (counted !== tlf.page_count) {
      fail(
        "page_count_match",
        `Page count mismatch: ${path.basename(filePath)} has ${counted} pages but manifest says ${tlf.page_count}`,
      );
    }
  }

  const summary = passingSummary(checks, manifest);
  const passedCount = VALIDATION_CHECKS.filter((c) => checks[c]).length;
  const totalCount = VALIDATION_CHECKS.length;
  const passed = passedCount === totalCount;

  return {
    kind: "report",
    manifest,
    report: {
      passed,
      checks,
      failures,
      summary,
      verdict: passed
        ? `Validation PASSED (${passedCount}/${totalCount} checks)`
        : `Validation FAILED (${passedCount}/${totalCount} checks passed)`,
      passedCount,
      totalCount,
    },
  };
}

export function formatValidationReport(report: ValidationReport): string[] {
  return ["=== Validation ===", ...report.summary, ...report.failures, "", report.verdict];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function passingSummary(
  checks: Record<ValidationCheck, boolean>,
  manifest: PersistedManifest,
): string[] {
  const { tlfs } = manifest;
  const lines: Record<ValidationCheck, string> = {
    files_exist: `All ${tlfs.length} TLF files exist`,
    files_non_empty: "All files non-empty",
    page_count_match: "Page counts consistent",
    no_page_gaps:
      tlfs.length > 0
        ? `No page gaps in Section 14 (pages ${tlfs[0].pages_in_source[0]}-${tlfs[tlfs.length - 1].pages_in_source[1]} covered)`
        : "No page gaps in Section 14",
    no_page_overlaps: "No page overlaps",
    narrative_ok: `Narrative body OK (${manifest.narrative.page_count} pages)`,
    pdfs_readable: "All PDFs readable",
  };
  return VALIDATION_CHECKS.filter((c) => checks[c]).map((c) => `✅ ${lines[c]}`);
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.size;
  } catch {
    // Any path stat cannot reach (ENOENT, ENOTDIR, EACCES) is reported as missing
    return null;
  }
}

async function countPagesSafely(counter: PdfPageCounter, filePath: string): Promise<number | null> {
  try {
    return await counter.countPages(filePath);
  } catch {
    // Unreadable is a finding, reported by the caller
    return null;
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}
