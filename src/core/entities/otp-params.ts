import { type AppError, invalidParameter } from "../errors/app-error.js";
import { type Brand, brand } from "../types/brand.js";
import { type Result, err, ok } from "../types/result.js";

/**
 * Hash used inside HOTP. Closed set: each variant only decides which HMAC
 * digest is computed; truncation and formatting are shared.
 */
export const Algorithm = {
  SHA1: "SHA1",
  SHA256: "SHA256",
  SHA512: "SHA512",
} as const;

export type Algorithm = (typeof Algorithm)[keyof typeof Algorithm];

export const ALGORITHMS: readonly Algorithm[] = Object.values(Algorithm);

export const isAlgorithm = (value: string): value is Algorithm =>
  ALGORITHMS.some((a) => a === value);

export const MIN_DIGITS = 4;
export const MAX_DIGITS = 10;

export const DEFAULT_DIGITS = 6;
export const DEFAULT_PERIOD = 30;
export const DEFAULT_ALGORITHM: Algorithm = Algorithm.SHA1;

/** Secret bytes shared with the authenticator app. 160 bits by default. */
export type Secret = Uint8Array;
export const DEFAULT_SECRET_BYTES = 20;

/** floor(epochSeconds / period), a non-negative safe integer. */
export type Counter = number;

/** Fixed-width decimal string, leading zeros significant. */
export type Code = string;

interface OtpParamsShape {
  readonly digits: number;
  readonly period: number;
  readonly algorithm: Algorithm;
}

/** Digits / period / algorithm that have passed {@link otpParams}. */
export type OtpParams = Brand<OtpParamsShape, "OtpParams">;

export interface OtpParamsInput {
  readonly digits?: number;
  readonly period?: number;
  readonly algorithm?: string;
}

export const validateDigits = (digits: number): Result<number, AppError> =>
  Number.isInteger(digits) && digits >= MIN_DIGITS && digits <= MAX_DIGITS
    ? ok(digits)
    : err(
        invalidParameter(`digits must be an integer between ${MIN_DIGITS} and ${MAX_DIGITS}`, {
          digits,
        }),
      );

export const validatePeriod = (period: number): Result<number, AppError> =>
  Number.isInteger(period) && period > 0
    ? ok(period)
    : err(invalidParameter("period must be a positive integer number of seconds", { period }));

export const validateAlgorithm = (algorithm: string): Result<Algorithm, AppError> => {
  const normalized = algorithm.toUpperCase();
  return isAlgorithm(normalized)
    ? ok(normalized)
    : err(invalidParameter(`algorithm must be one of ${ALGORITHMS.join(", ")}`, { algorithm }));
};

/**
 * Validate code parameters once, at configuration time. Generators and the
 * verifier only accept the branded result, so they never re-check per call.
 */
export const otpParams = (input: OtpParamsInput = {}): Result<OtpParams, AppError> => {
  const digits = validateDigits(input.digits ?? DEFAULT_DIGITS);
  if (!digits.ok) return digits;

  const period = validatePeriod(input.period ?? DEFAULT_PERIOD);
  if (!period.ok) return period;

  const algorithm = validateAlgorithm(input.algorithm ?? DEFAULT_ALGORITHM);
  if (!algorithm.ok) return algorithm;

  return ok(
    brand<OtpParamsShape, "OtpParams">({
      digits: digits.value,
      period: period.value,
      algorithm: algorithm.value,
    }),
  );
};
