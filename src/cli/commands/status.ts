import type { AppContext } from "../../main.js";
import { cyan, dim, error, info, log, success } from "../ui.js";
import { EX_USAGE } from "./shared.js";

/** `totpgate status <principal>` — exit 0 when enrolled, 1 otherwise. */
export const statusCommand = async (args: readonly string[], app: AppContext): Promise<number> => {
  const principal = args[0];
  if (principal === undefined || principal.trim() === "") {
    error("Missing principal.");
    log(`  ${dim("Usage:")} ${cyan("totpgate status <principal>")}`);
    return EX_USAGE;
  }

  if (await app.enrollmentService.isEnrolled(principal)) {
    success(`TOTP is configured for ${principal}.`);
    return 0;
  }
  info(`TOTP is not configured for ${principal}.`);
  return 1;
};
