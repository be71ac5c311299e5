/**
 * `totpgate setup [principal]` — enroll a principal.
 *
 * Generates a secret, shows it as a QR code and as grouped base32, asks for
 * one code from the authenticator, then stores the secret.
 */

import QRCode from "qrcode";
import { groupSecret } from "../../application/services/enrollment.service.js";
import type { TerminalConversation } from "../../infrastructure/conversation/terminal-conversation.js";
import type { AppContext } from "../../main.js";
import { blank, bold, cyan, dim, error, icons, log, printKeyValue, section, success, warn } from "../ui.js";
import { EX_USAGE, fail, requireRootOrFail } from "./shared.js";

export const setupCommand = async (
  args: readonly string[],
  app: AppContext,
  conversation: TerminalConversation,
): Promise<number> => {
  const denied = requireRootOrFail(app.config.setup.requireRoot, "setup");
  if (denied !== null) return denied;

  const principal = args[0] ?? process.env["SUDO_USER"];
  if (principal === undefined || principal.trim() === "") {
    error("No principal given and SUDO_USER is not set.");
    log(`  ${dim("Usage:")} ${cyan("totpgate setup <principal>")}`);
    return EX_USAGE;
  }

  if (await app.enrollmentService.isEnrolled(principal)) {
    warn(`TOTP is already configured for ${bold(principal)}.`);
    const answer = await conversation.prompt("  Reconfigure and invalidate the old secret? (yes/no): ", {
      masked: false,
    });
    if (answer?.trim().toLowerCase() !== "yes") {
      log(`  ${dim("Setup cancelled.")}`);
      return 0;
    }
  }

  const started = app.enrollmentService.begin(principal);
  if (!started.ok) return fail(started.error);
  const enrollment = started.value;

  try {
    section(`${icons.phone} Scan with your authenticator app`);
    blank();
    log(await QRCode.toString(enrollment.uri, { type: "terminal", small: true }));

    section(`${icons.key} Or enter the secret manually`);
    printKeyValue([
      ["Secret", groupSecret(enrollment.base32Secret)],
      ["Account", principal],
      ["Issuer", app.config.totp.issuer],
      ["Type", "Time-based"],
      ["Digits", String(app.config.totp.digits)],
      ["Period", `${app.config.totp.period}s`],
      ["Algorithm", app.config.totp.algorithm],
    ]);
    blank();

    const code = await conversation.prompt("  Enter the code shown in the app to confirm: ", {
      masked: false,
    });
    if (code === null) {
      error("No code entered. Setup aborted.");
      return EX_USAGE;
    }

    const confirmed = await app.enrollmentService.confirm(enrollment, code);
    if (!confirmed.ok) return fail(confirmed.error);
  } finally {
    app.enrollmentService.discard(enrollment);
  }

  blank();
  success(`TOTP configured for ${principal}.`);
  blank();
  return 0;
};
