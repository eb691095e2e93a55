/**
 * Command runner behind scripts/extractTlfs.ts.
 *
 * Exit codes:
 *   0  — extraction completed and/or validation passed
 *   1  — fatal error, or validation failed
 *   2  — usage error
 */

import { CsrExtractionError } from "../csr/errors";
import { extractCsr } from "../csr/extractCsr";
import { formatExtractionSummary } from "../csr/summary";
import { extractorEnv } from "../env/extractorEnv";
import type { ExtractorEnv } from "../env/extractorEnv";
import { createConsoleLogger, resolveLogLevel } from "../log/logger";
import type { Logger } from "../log/logger";
import { formatValidationReport, validateOutput } from "../manifest/validateOutput";
import { pdfLibPageCounter } from "../pdf/openPdfSource";
import type { PdfPageCounter, PdfSourceOpener } from "../pdf/types";
import { USAGE, parseCommand } from "./parseCliArgs";

export type CliDeps = {
  env?: ExtractorEnv;
  /** Report output (summary, validation) */
  print?: (line: string) => void;
  /** Diagnostic output, behind the logger */
  writeLog?: (line: string) => void;
  openSource?: PdfSourceOpener;
  pageCounter?: PdfPageCounter;
  now?: () => Date;
};

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  const parsed = parseCommand(argv);
  if (!parsed.ok) {
    print(USAGE);
    print("");
    print(`error: ${parsed.error}`);
    return 2;
  }

  const { command } = parsed;
  if (command.kind === "help") {
    print(USAGE);
    return 0;
  }

  const env = deps.env ?? extractorEnv();
  const logger = createConsoleLogger({
    level: resolveLogLevel(command.verbose, env.TLF_LOG_LEVEL),
    write: deps.writeLog,
  });
  const pageCounter = deps.pageCounter ?? pdfLibPageCounter;

  if (command.kind === "validate") {
    return runValidation(command.outputDir, { logger, print, pageCounter });
  }

  try {
    const result = await extractCsr(
      {
        inputPath: command.inputPath,
        outputDir: command.outputDir,
        dryRun: command.dryRun,
        writeText: command.writeText,
      },
      {
        logger,
        openSource: deps.openSource,
        now: deps.now,
        writeConcurrency: env.TLF_WRITE_CONCURRENCY,
      },
    );
    print("");
    formatExtractionSummary(result).forEach((line) => print(line));
    if (result.dryRun) logger.info("Dry run: no files were written.");
  } catch (e: unknown) {
    if (e instanceof CsrExtractionError) {
      logger.error(e.message);
      return 1;
    }
    throw e;
  }

  if (command.validateAfter) {
    return runValidation(command.outputDir, { logger, print, pageCounter });
  }
  return 0;
}

async function runValidation(
  outputDir: string,
  ctx: { logger: Logger; print: (line: string) => void; pageCounter: PdfPageCounter },
): Promise<number> {
  const outcome = await validateOutput(outputDir, { pageCounter: ctx.pageCounter });
  if (outcome.kind === "fatal") {
    ctx.logger.error(outcome.message);
    return 1;
  }
  ctx.print("");
  formatValidationReport(outcome.report).forEach((line) => ctx.print(line));
  return outcome.report.passed ? 0 : 1;
}
