// ── CLI arg parsing ─────────────────────────────────────────────────────────

export interface CliArgs {
  input?: string;
  output?: string;
  verbose: boolean;
  dryRun: boolean;
  validate: boolean;
  noText: boolean;
  help: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "validate"; outputDir: string; verbose: boolean }
  | {
      kind: "extract";
      inputPath: string;
      outputDir: string;
      verbose: boolean;
      dryRun: boolean;
      writeText: boolean;
      /** Validate the fresh output afterwards (never on dry run) */
      validateAfter: boolean;
    };

export type ParsedCommand = { ok: true; command: CliCommand } | { ok: false; error: string };

export const USAGE = [
  "Usage: npm run extract -- --output <dir> [--input <csr.pdf>] [options]",
  "",
  "Split an ICH E3 clinical study report into its narrative body and",
  "one PDF per Table/Figure of section 14.",
  "",
  "  --input <path>   Source PDF (required unless running standalone --validate)",
  "  --output <dir>   Directory to save the extracted outputs",
  "  --verbose        Print extraction progress",
  "  --dry-run        Detect without creating files",
  "  --validate       Validate the output directory (after extraction, or standalone)",
  "  --no-text        Skip text extraction",
  "  -h, --help       Show this help",
].join("\n");

export function parseArgs(argv: readonly string[]): { ok: true; args: CliArgs } | { ok: false; error: string } {
  const args: CliArgs = {
    verbose: false,
    dryRun: false,
    validate: false,
    noText: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--help":
      case "-h":
        args.help = true;
        break;
      case "--verbose":
        args.verbose = true;
        break;
      case "--dry-run":
        args.dryRun = true;
        break;
      case "--validate":
        args.validate = true;
        break;
      case "--no-text":
        args.noText = true;
        break;
      case "--input":
      case "--output": {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
          return { ok: false, error: `${arg} expects a value` };
        }
        if (arg === "--input") args.input = value;
        else args.output = value;
        i++;
        break;
      }
      default:
        return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { ok: true, args };
}

export function resolveCommand(args: CliArgs): ParsedCommand {
  if (args.help) return { ok: true, command: { kind: "help" } };

  if (!args.output) {
    return { ok: false, error: "--output is required" };
  }

  if (!args.input) {
    if (args.validate) {
      return { ok: true, command: { kind: "validate", outputDir: args.output, verbose: args.verbose } };
    }
    return { ok: false, error: "--input is required unless running standalone --validate" };
  }

  return {
    ok: true,
    command: {
      kind: "extract",
      inputPath: args.input,
      outputDir: args.output,
      verbose: args.verbose,
      dryRun: args.dryRun,
      writeText: !args.noText,
      validateAfter: args.validate && !args.dryRun,
    },
  };
}

export function parseCommand(argv: readonly string[]): ParsedCommand {
  const parsed = parseArgs(argv);
  if (!parsed.ok) return parsed;
  return resolveCommand(parsed.args);
}
