/**
 * Extract Tables/Figures from an ICH E3 clinical study report.
 *
 * Usage:
 *   npx tsx scripts/extractTlfs.ts --input csr.pdf --output out/
 *   npx tsx scripts/extractTlfs.ts --input csr.pdf --output out/ --dry-run --verbose
 *   npx tsx scripts/extractTlfs.ts --input csr.pdf --output out/ --validate
 *   npx tsx scripts/extractTlfs.ts --output out/ --validate
 *
 * Optional env vars:
 *   TLF_WRITE_CONCURRENCY  parallel PDF/text writes (default 4)
 *   TLF_LOG_LEVEL          info | warn | error (overrides --verbose)
 */

import { runCli } from "@/lib/cli/runCli";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
