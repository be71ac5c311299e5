import type { AppContext } from "../../main.js";
import { cyan, dim, error, log, success } from "../ui.js";
import { EX_USAGE, fail, requireRootOrFail } from "./shared.js";

/**
 * `totpgate remove <principal>` — delete a principal's secret. Replay
 * records are left to age out.
 */
export const removeCommand = async (args: readonly string[], app: AppContext): Promise<number> => {
  const denied = requireRootOrFail(app.config.setup.requireRoot, "remove");
  if (denied !== null) return denied;

  const principal = args[0];
  if (principal === undefined || principal.trim() === "") {
    error("Missing principal.");
    log(`  ${dim("Usage:")} ${cyan("totpgate remove <principal>")}`);
    return EX_USAGE;
  }

  const removed = await app.enrollmentService.remove(principal);
  if (!removed.ok) return fail(removed.error);

  success(`TOTP secret removed for ${principal}.`);
  return 0;
};
