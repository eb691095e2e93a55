/**
 * Output Validator — Tests
 *
 * Each test builds an output directory under the OS temp dir with real
 * (blank-page) PDFs and re-validates it from disk.
 */

import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { checkPageContinuity, formatValidationReport, validateOutput } from "../validateOutput";
import type { ValidationOutcome, ValidationReport } from "../validateOutput";
import type { PersistedManifest, PersistedTlf } from "../manifestSchema";
import { pdfLibPageCounter } from "../../pdf/openPdfSource";
import { blankPdf } from "../../../test/csrFixtures";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "tlf-validate-"));
}

function tlf(id: string, first: number, last: number, file = `pdf/${id.replace(/ /g, "_")}.pdf`): PersistedTlf {
  return {
    id,
    type: "table",
    title: `${id} title`,
    file,
    pages_in_source: [first, last],
    page_count: last - first + 1,
    population: "Safety",
  };
}

function manifestWith(tlfs: PersistedTlf[]): PersistedManifest {
  return {
    source_file: "csr.pdf",
    source_pages: 60,
    extraction_date: "2026-10-18T09:30:12Z",
    narrative: { file: "pdf/narrative_body.pdf", pages_in_source: [1, 42], page_count: 42 },
    tlfs,
  };
}

/** Write manifest.json plus a PDF of the recorded size for every entry. */
async function writeOutput(dir: string, manifest: PersistedManifest): Promise<void> {
  await fs.mkdir(path.join(dir, "pdf"), { recursive: true });
  await fs.writeFile(path.join(dir, "manifest.json"), JSON.stringify(manifest, null, 2));
  await fs.writeFile(path.join(dir, manifest.narrative.file), await blankPdf(manifest.narrative.page_count));
  for (const t of manifest.tlfs) {
    await fs.writeFile(path.join(dir, t.file), await blankPdf(t.page_count));
  }
}

function expectReport(outcome: ValidationOutcome): ValidationReport {
  assert.equal(outcome.kind, "report");
  if (outcome.kind !== "report") throw new Error("unreachable");
  return outcome.report;
}

const deps = { pageCounter: pdfLibPageCounter };

// ---------------------------------------------------------------------------
// Fatal manifest errors
// ---------------------------------------------------------------------------

test("missing manifest.json → fatal manifest_missing", async () => {
  const dir = await tempDir();
  const outcome = await validateOutput(dir, deps);

  assert.deepEqual(outcome, {
    kind: "fatal",
    code: "manifest_missing",
    message: `Cannot validate: manifest.json not found in ${dir}`,
  });
});

test("unparseable manifest.json → fatal manifest_corrupt", async () => {
  const dir = await tempDir();
  await fs.writeFile(path.join(dir, "manifest.json"), "{ not json");

  const outcome = await validateOutput(dir, deps);

  assert.deepEqual(outcome, {
    kind: "fatal",
    code: "manifest_corrupt",
    message: "Invalid manifest.json format",
  });
});

test("manifest.json with the wrong shape → fatal manifest_corrupt", async () => {
  const dir = await tempDir();
  await fs.writeFile(path.join(dir, "manifest.json"), JSON.stringify({ source_file: "csr.pdf", tlfs: "none" }));

  const outcome = await validateOutput(dir, deps);

  assert.equal(outcome.kind, "fatal");
  if (outcome.kind !== "fatal") return;
  assert.equal(outcome.code, "manifest_corrupt");
  assert.ok(outcome.message.startsWith("Invalid manifest.json format ("), outcome.message);
});

// ---------------------------------------------------------------------------
// Passing output
// ---------------------------------------------------------------------------

test("consistent output passes all 7 checks", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([tlf("Table 14.1.1", 43, 44), tlf("Table 14.1.2", 45, 45)]));

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.passed, true);
  assert.deepEqual(report.failures, []);
  assert.deepEqual(report.summary, [
    "✅ All 2 TLF files exist",
    "✅ All files non-empty",
    "✅ Page counts consistent",
    "✅ No page gaps in Section 14 (pages 43-45 covered)",
    "✅ No page overlaps",
    "✅ Narrative body OK (42 pages)",
    "✅ All PDFs readable",
  ]);
  assert.equal(report.verdict, "Validation PASSED (7/7 checks)");
});

test("no TLFs: gap summary without a page range", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([]));

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.passed, true);
  assert.ok(report.summary.includes("✅ No page gaps in Section 14"));
});

// ---------------------------------------------------------------------------
// Continuity findings
// ---------------------------------------------------------------------------

test("page gap before the second TLF is reported with expected and actual start", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([tlf("Table A", 43, 44), tlf("Table B", 46, 46)]));

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.checks.no_page_gaps, false);
  assert.equal(report.checks.no_page_overlaps, true);
  assert.deepEqual(report.failures, ["❌ Page gap before Table B (expected 45, got 46)"]);
  assert.equal(report.verdict, "Validation FAILED (6/7 checks passed)");
});

test("page overlap is reported separately from gaps", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([tlf("Table A", 43, 45), tlf("Table B", 45, 46)]));

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.checks.no_page_gaps, true);
  assert.equal(report.checks.no_page_overlaps, false);
  assert.deepEqual(report.failures, ["❌ Page overlap at Table B (expected 46, got 45)"]);
});

test("checkPageContinuity returns typed issues in manifest order", () => {
  const issues = checkPageContinuity([
    { id: "A", pages_in_source: [43, 44] },
    { id: "B", pages_in_source: [46, 47] },
    { id: "C", pages_in_source: [47, 47] },
  ]);

  assert.deepEqual(
    issues.map((i) => [i.kind, i.id, i.expected, i.actual]),
    [
      ["gap", "B", 45, 46],
      ["overlap", "C", 48, 47],
    ],
  );
});

// ---------------------------------------------------------------------------
// File findings
// ---------------------------------------------------------------------------

test("missing, empty, unreadable and short TLF files each fail their own check", async () => {
  const dir = await tempDir();
  const manifest = manifestWith([
    tlf("Table 14.1.1", 43, 43),
    tlf("Table 14.1.2", 44, 44),
    tlf("Table 14.1.3", 45, 45),
    tlf("Table 14.1.4", 46, 47),
  ]);
  await writeOutput(dir, manifest);

  await fs.rm(path.join(dir, "pdf/Table_14.1.1.pdf"));
  await fs.writeFile(path.join(dir, "pdf/Table_14.1.2.pdf"), "");
  await fs.writeFile(path.join(dir, "pdf/Table_14.1.3.pdf"), "not a pdf");
  await fs.writeFile(path.join(dir, "pdf/Table_14.1.4.pdf"), await blankPdf(1));

  const report = expectReport(await validateOutput(dir, deps));

  assert.deepEqual(report.checks, {
    files_exist: false,
    files_non_empty: false,
    page_count_match: false,
    no_page_gaps: true,
    no_page_overlaps: true,
    narrative_ok: true,
    pdfs_readable: false,
  });
  assert.deepEqual(report.failures, [
    `❌ File missing for Table 14.1.1: ${path.join(dir, "pdf/Table_14.1.1.pdf")}`,
    `❌ File empty for Table 14.1.2: ${path.join(dir, "pdf/Table_14.1.2.pdf")}`,
    `❌ File unreadable for Table 14.1.3: ${path.join(dir, "pdf/Table_14.1.3.pdf")}`,
    "❌ Page count mismatch: Table_14.1.4.pdf has 1 pages but manifest says 2",
  ]);
  assert.equal(report.verdict, "Validation FAILED (3/7 checks passed)");
});

test("narrative faults fail narrative_ok", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([tlf("Table 14.1.1", 43, 43)]));
  await fs.writeFile(path.join(dir, "pdf/narrative_body.pdf"), await blankPdf(40));

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.checks.narrative_ok, false);
  assert.equal(report.checks.page_count_match, true);
  assert.deepEqual(report.failures, ["❌ Narrative page count mismatch: 40 != 42"]);
});

test("missing narrative also fails files_exist", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([]));
  await fs.rm(path.join(dir, "pdf/narrative_body.pdf"));

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.checks.narrative_ok, false);
  assert.equal(report.checks.files_exist, false);
  assert.deepEqual(report.failures, [
    `❌ Narrative body missing: ${path.join(dir, "pdf/narrative_body.pdf")}`,
  ]);
});

test("pdf/ replaced by a plain file: files reported missing, validation still completes", async () => {
  const dir = await tempDir();
  await writeOutput(dir, manifestWith([tlf("Table 14.1.1", 43, 43)]));
  await fs.rm(path.join(dir, "pdf"), { recursive: true });
  await fs.writeFile(path.join(dir, "pdf"), "not a directory");

  const report = expectReport(await validateOutput(dir, deps));

  assert.equal(report.checks.files_exist, false);
  assert.equal(report.checks.narrative_ok, false);
  assert.deepEqual(report.failures, [
    `❌ Narrative body missing: ${path.join(dir, "pdf/narrative_body.pdf")}`,
    `❌ File missing for Table 14.1.1: ${path.join(dir, "pdf/Table_14.1.1.pdf")}`,
  ]);
  assert.equal(report.verdict, "Validation FAILED (5/7 checks passed)");
});

test("output directory that is a plain file → fatal manifest_missing", async () => {
  const dir = await tempDir();
  const notADir = path.join(dir, "out");
  await fs.writeFile(notADir, "plain file");

  const outcome = await validateOutput(notADir, deps);

  assert.equal(outcome.kind, "fatal");
  if (outcome.kind !== "fatal") return;
  assert.equal(outcome.code, "manifest_missing");
});

test("formatValidationReport: header, passing lines, failures, verdict", () => {
  const lines = formatValidationReport({
    passed: false,
    checks: {
      files_exist: true,
      files_non_empty: true,
      page_count_match: true,
      no_page_gaps: false,
      no_page_overlaps: true,
      narrative_ok: true,
      pdfs_readable: true,
    },
    failures: ["❌ Page gap before B (expected 45, got 46)"],
    summary: ["✅ No page overlaps"],
    verdict: "Validation FAILED (6/7 checks passed)",
    passedCount: 6,
    totalCount: 7,
  });

  assert.deepEqual(lines, [
    "=== Validation ===",
    "✅ No page overlaps",
    "❌ Page gap before B (expected 45, got 46)",
    "",
    "Validation FAILED (6/7 checks passed)",
  ]);
});
