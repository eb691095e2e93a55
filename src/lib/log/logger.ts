/**
 * Console logger with a severity prefix ("INFO: ", "WARNING: ", "ERROR: ").
 *
 * Diagnostics go to stderr; reports (summaries, validation results) are
 * printed by the caller on stdout.
 */

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

const PREFIX: Record<LogLevel, string> = {
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

export function createConsoleLogger(opts: {
  level: LogLevel;
  write?: (line: string) => void;
}): Logger {
  const write = opts.write ?? ((line: string) => console.error(line));
  const emit = (level: LogLevel, message: string) => {
    if (RANK[level] < RANK[opts.level]) return;
    write(`${PREFIX[level]}: ${message}`);
  };
  return {
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
  };
}

export function resolveLogLevel(verbose: boolean, override?: LogLevel): LogLevel {
  return override ?? (verbose ? "info" : "warn");
}
