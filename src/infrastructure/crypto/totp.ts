import { randomBytes } from "node:crypto";
import {
  type Code,
  type Counter,
  DEFAULT_SECRET_BYTES,
  type OtpParams,
  type Secret,
  validatePeriod,
} from "../../core/entities/otp-params.js";
import {
  type AppError,
  UnrecoverableError,
  invalidParameter,
  randomSourceUnavailable,
} from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { type HotpGenerator, hotp } from "./hotp.js";

/**
 * TOTP (RFC 6238): HOTP with a counter derived from wall-clock time.
 */

export const unixSeconds = (time: Date): number => Math.floor(time.getTime() / 1000);

export const isValidTime = (time: Date): boolean => Number.isFinite(time.getTime());

/**
 * floor(unixSeconds / period). Instants before the epoch map to counter 0;
 * an invalid Date is INVALID_PARAMETER.
 */
export const totpCounter = (time: Date, period: number): Result<Counter, AppError> => {
  const p = validatePeriod(period);
  if (!p.ok) return p;
  if (!isValidTime(time)) return err(invalidParameter("time must be a valid Date"));
  return ok(Math.max(0, Math.floor(unixSeconds(time) / p.value)));
};

/** Counter for already-validated parameters. */
export const counterAt = (time: Date, params: OtpParams): Counter =>
  Math.max(0, Math.floor(unixSeconds(time) / params.period));

export const generateTotp = (
  secret: Secret,
  time: Date,
  params: OtpParams,
  generator: HotpGenerator = hotp,
): Code => generator(secret, counterAt(time, params), params.digits, params.algorithm);

export type RandomSource = (size: number) => Uint8Array;

/**
 * Draw a new secret from the CSPRNG. There is no fallback: a failing random
 * source aborts with an UnrecoverableError instead of yielding a weak secret.
 */
export const generateSecret = (
  length: number = DEFAULT_SECRET_BYTES,
  source: RandomSource = randomBytes,
): Secret => {
  if (!Number.isInteger(length) || length <= 0) {
    throw new UnrecoverableError(
      invalidParameter("secret length must be a positive integer", { length }),
    );
  }

  let bytes: Uint8Array;
  try {
    bytes = source(length);
  } catch (e: unknown) {
    throw new UnrecoverableError(randomSourceUnavailable(e));
  }

  if (bytes.length !== length) {
    bytes.fill(0);
    throw new UnrecoverableError(randomSourceUnavailable());
  }

  return bytes;
};
