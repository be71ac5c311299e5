/**
 * `totpgate help` — display help information.
 */

import { blank, bold, cyan, dim, gray, green, log, logo, white, yellow } from "../ui.js";

export const helpCommand = (version: string): void => {
  blank();
  log(logo(version));
  blank();

  log(`  ${bold(white("USAGE"))}`);
  log(`  ${gray("─".repeat(50))}`);
  log(`  ${dim("$")} ${cyan("totpgate")} ${green("<command>")} ${dim("[principal]")}`);
  blank();

  log(`  ${bold(white("COMMANDS"))}`);
  log(`  ${gray("─".repeat(50))}`);

  const commands = [
    ["setup [principal]", "Enroll a principal (defaults to $SUDO_USER)"],
    ["auth <principal>", "Prompt for a code; exit 0 only on success"],
    ["status <principal>", "Show whether a principal is enrolled"],
    ["remove <principal>", "Delete a principal's secret"],
    ["version", "Show version"],
    ["help", "Show this help message"],
  ] as const;

  const maxCmd = Math.max(...commands.map(([c]) => c.length));
  for (const [cmd, desc] of commands) {
    log(`  ${green(cmd.padEnd(maxCmd + 2))} ${dim(desc)}`);
  }

  blank();
  log(`  ${bold(white("ENVIRONMENT"))}`);
  log(`  ${gray("─".repeat(50))}`);

  const vars = [
    ["TOTP_DIGITS", "Code length, 4–10 (6)"],
    ["TOTP_PERIOD", "Seconds per code (30)"],
    ["TOTP_ALGORITHM", "SHA1 | SHA256 | SHA512 (SHA1)"],
    ["TOTP_WINDOW", "Periods of drift accepted each way (1)"],
    ["TOTP_ISSUER", "Issuer shown in authenticator apps (totpgate)"],
    ["TOTP_MAX_ATTEMPTS", "Prompts per auth session (10)"],
    ["TOTP_REPLAY_DIR", "Replay records (/var/run/totpgate)"],
    ["TOTP_REPLAY_RETENTION_PERIODS", "Periods a used code is remembered (10)"],
    ["TOTP_LOCK_TIMEOUT_MS", "Lock wait budget (5000)"],
    ["TOTP_LOCK_STALE_MS", "Age after which a lock is abandoned (30000)"],
    ["TOTP_SECRET_DIR", "Secret files (/etc/totpgate/secrets)"],
    ["TOTP_SETUP_REQUIRE_ROOT", "setup/remove need root (true)"],
    ["LOG_LEVEL", "debug | info | warn | error | fatal (warn)"],
    ["LOG_FORMAT", "pretty | json (pretty)"],
  ] as const;

  const maxVar = Math.max(...vars.map(([v]) => v.length));
  for (const [name, desc] of vars) {
    log(`  ${yellow(name.padEnd(maxVar + 2))} ${dim(desc)}`);
  }

  blank();
  log(`  ${bold(white("EXAMPLES"))}`);
  log(`  ${gray("─".repeat(50))}`);

  const examples = [
    ["sudo totpgate setup alice", "Enroll alice and show her QR code"],
    ["totpgate auth alice", "Verify a code for alice"],
    ["TOTP_WINDOW=0 totpgate auth alice", "Accept the current period only"],
  ] as const;

  for (const [cmd, desc] of examples) {
    log(`  ${dim("$")} ${cyan(cmd)}`);
    log(`    ${dim(desc)}`);
  }
  blank();
};
