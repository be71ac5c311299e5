import { createHmac } from "node:crypto";
import {
  type Algorithm,
  type Code,
  type Counter,
  type Secret,
  validateAlgorithm,
  validateDigits,
} from "../../core/entities/otp-params.js";
import {
  type AppError,
  UnrecoverableError,
  invalidParameter,
} from "../../core/errors/app-error.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * HOTP (RFC 4226) over node:crypto HMAC.
 */

type Digest = (key: Uint8Array, message: Uint8Array) => Uint8Array;

const hmacWith =
  (hash: string): Digest =>
  (key, message) =>
    createHmac(hash, key).update(message).digest();

const DIGESTS: Record<Algorithm, Digest> = {
  SHA1: hmacWith("sha1"),
  SHA256: hmacWith("sha256"),
  SHA512: hmacWith("sha512"),
};

export type HotpGenerator = (
  secret: Secret,
  counter: Counter,
  digits: number,
  algorithm: Algorithm,
) => Code;

/** Convert a counter to an 8-byte big-endian buffer */
const counterToBytes = (counter: Counter): Uint8Array => {
  const buf = new Uint8Array(8);
  let n = counter;
  for (let i = 7; i >= 0; i--) {
    buf[i] = n % 256;
    n = Math.floor(n / 256);
  }
  return buf;
};

/** Dynamic truncation (RFC 4226 §5.4) */
const dynamicTruncate = (mac: Uint8Array): number => {
  const offset = (mac[mac.length - 1] ?? 0) & 0x0f;
  return (
    (((mac[offset] ?? 0) & 0x7f) << 24) |
    (((mac[offset + 1] ?? 0) & 0xff) << 16) |
    (((mac[offset + 2] ?? 0) & 0xff) << 8) |
    ((mac[offset + 3] ?? 0) & 0xff)
  );
};

/**
 * Configuration-time check of the HOTP parameters. {@link hotp} itself trusts
 * its digits and algorithm arguments.
 */
export const validateHotpParams = (
  digits: number,
  algorithm: string,
): Result<{ readonly digits: number; readonly algorithm: Algorithm }, AppError> => {
  const d = validateDigits(digits);
  if (!d.ok) return d;
  const a = validateAlgorithm(algorithm);
  if (!a.ok) return a;
  return ok({ digits: d.value, algorithm: a.value });
};

export const hotp: HotpGenerator = (secret, counter, digits, algorithm) => {
  if (!Number.isSafeInteger(counter) || counter < 0) {
    throw new UnrecoverableError(
      invalidParameter("counter must be a non-negative safe integer", { counter }),
    );
  }

  const message = counterToBytes(counter);
  const mac = DIGESTS[algorithm](secret, message);
  const value = dynamicTruncate(mac) % 10 ** digits;
  mac.fill(0);

  return value.toString().padStart(digits, "0");
};
