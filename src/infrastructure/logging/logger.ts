import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatJsonEntry, formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Anything with a write(string) — process.stderr in production. */
export interface LogSink {
  write(line: string): unknown;
}

/**
 * Logger — zero dependencies.
 * Every line goes to the sink (stderr by default) so that stdout stays free
 * for prompts and command output.
 * - "pretty": ANSI-colored human-readable output (default, for terminals)
 * - "json": structured JSON lines (for log collectors)
 */
export const createLogger = (
  minLevel: LogLevel = "warn",
  bindings: Record<string, unknown> = {},
  format: LogFormat = "pretty",
  sink: LogSink = process.stderr,
): Logger => {
  const minPriority = LEVEL_PRIORITY[minLevel];
  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;
    sink.write(formatter(level, msg, { ...bindings, ...meta }));
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger(minLevel, { ...bindings, ...extra }, format, sink),
  };
};
