/**
 * CLI UI utilities — zero-dependency ANSI output helpers.
 * Command output goes to stdout; failures to stderr.
 */

import { bold, cyan, dim, gray, green, magenta, red, white, yellow } from "../shared/ansi.js";

export { bold, cyan, dim, gray, green, red, white, yellow };

// ── Icons ───────────────────────────────────────────────────────────────

export const icons = {
  success: green("✔"),
  error: red("✗"),
  warning: yellow("⚠"),
  info: cyan("ℹ"),
  chevron: cyan("›"),
  key: magenta("🔑"),
  phone: magenta("📱"),
  lock: yellow("🔐"),
} as const;

// ── Logo ────────────────────────────────────────────────────────────────

export const logo = (version: string): string => {
  const lines = [
    `${bold(cyan("  ┌─────────────────────────────────────────┐"))}`,
    `${bold(cyan("  │"))}   ${bold(white("🔐 totpgate"))}  ${dim(gray(`v${version}`))}                     ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("TOTP second factor with replay guard"))}  ${bold(cyan("│"))}`,
    `${bold(cyan("  └─────────────────────────────────────────┘"))}`,
  ];
  return lines.join("\n");
};

// ── Output helpers ──────────────────────────────────────────────────────

export const log = (msg: string) => process.stdout.write(`${msg}\n`);
export const blank = () => process.stdout.write("\n");
export const error = (msg: string) => process.stderr.write(`  ${icons.error} ${red(msg)}\n`);
export const warn = (msg: string) => process.stdout.write(`  ${icons.warning} ${yellow(msg)}\n`);
export const info = (msg: string) => process.stdout.write(`  ${icons.info} ${msg}\n`);
export const success = (msg: string) => process.stdout.write(`  ${icons.success} ${green(msg)}\n`);

export const rule = (width = 56): void => {
  log(`  ${gray("─".repeat(width))}`);
};

// ── Section header ──────────────────────────────────────────────────────

export const section = (title: string): void => {
  blank();
  log(`  ${bold(white(title))}`);
  rule(50);
};

// ── Table helper ────────────────────────────────────────────────────────

export const printKeyValue = (pairs: readonly (readonly [string, string])[]): void => {
  const maxKey = Math.max(...pairs.map(([k]) => k.length));
  for (const [key, value] of pairs) {
    log(`  ${gray("│")} ${dim(key.padEnd(maxKey))}  ${white(value)}`);
  }
};
