import type { LogLevel } from "../core/ports/logger.js";
import { bgRed, dim, gray, green, red, white, yellow } from "./ansi.js";

/** Metadata keys whose values never reach a log line. */
const REDACTED_KEYS = new Set(["secret", "code", "candidate", "token", "uri"]);
export const REDACTED = "[redacted]";

export const redact = (meta: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = REDACTED_KEYS.has(k.toLowerCase()) ? REDACTED : v;
  }
  return out;
};

// ── Helpers ─────────────────────────────────────────────────────────────

const timestamp = (d: Date): string => {
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
};

const levelBadge = (level: LogLevel): string => {
  switch (level) {
    case "debug":
      return gray("DBG");
    case "info":
      return green("INF");
    case "warn":
      return yellow("WRN");
    case "error":
      return red("ERR");
    case "fatal":
      return bgRed("FTL");
  }
};

const formatMeta = (meta: Record<string, unknown>): string => {
  const entries = Object.entries(meta);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${dim(k)}${dim("=")}${white(String(v))}`);
  return ` ${parts.join(" ")}`;
};

// ── Public formatters ───────────────────────────────────────────────────

/**
 * Human-readable line for terminals.
 *
 *   WRN 12:34:56.789 Breaking stale lock  lockPath=/var/run/totpgate/alice.lock
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
  now: Date = new Date(),
): string => {
  const ts = dim(gray(timestamp(now)));
  return `  ${levelBadge(level)} ${ts} ${white(msg)}${formatMeta(redact(meta))}\n`;
};

/**
 * Structured JSON line for journald / syslog collectors.
 */
export const formatJsonEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
  now: Date = new Date(),
): string => `${JSON.stringify({ level, msg, time: now.toISOString(), ...redact(meta) })}\n`;
