import { type AppError, exitCode } from "../../core/errors/app-error.js";
import { error } from "../ui.js";

/** sysexits EX_NOPERM */
export const EX_NOPERM = 77;
/** sysexits EX_USAGE */
export const EX_USAGE = 64;

/** True on hosts without uids (getuid is POSIX only). */
export const isRoot = (): boolean => {
  const uid = process.getuid?.();
  return uid === undefined || uid === 0;
};

export const requireRootOrFail = (required: boolean, action: string): number | null => {
  if (!required || isRoot()) return null;
  error(`${action} must be run as root (sudo totpgate …).`);
  return EX_NOPERM;
};

export const fail = (e: AppError): number => {
  error(e.message);
  return exitCode(e.code);
};
