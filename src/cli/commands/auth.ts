/**
 * `totpgate auth <principal>` — one interactive authentication session.
 * Exit status 0 means the principal passed the second factor.
 */

import { AuthOutcome } from "../../application/services/auth.service.js";
import { ErrorCode, exitCode } from "../../core/errors/app-error.js";
import type { Conversation } from "../../core/ports/conversation.js";
import type { AppContext } from "../../main.js";
import { cyan, dim, error, log } from "../ui.js";
import { EX_NOPERM, EX_USAGE } from "./shared.js";

const EXIT_STATUS: Record<AuthOutcome, number> = {
  [AuthOutcome.SUCCESS]: 0,
  [AuthOutcome.NOT_ENROLLED]: 1,
  [AuthOutcome.SECRET_UNAVAILABLE]: exitCode(ErrorCode.SECRET_UNAVAILABLE),
  [AuthOutcome.NO_RESPONSE]: 1,
  [AuthOutcome.MAX_ATTEMPTS]: EX_NOPERM,
};

export const authCommand = async (
  args: readonly string[],
  app: AppContext,
  conversation: Conversation,
): Promise<number> => {
  const principal = args[0];
  if (principal === undefined || principal.trim() === "") {
    error("Missing principal.");
    log(`  ${dim("Usage:")} ${cyan("totpgate auth <principal>")}`);
    return EX_USAGE;
  }

  const result = await app.authService.authenticate(principal, conversation);
  return EXIT_STATUS[result.outcome];
};
