import type { Counter, OtpParams, Secret } from "../../core/entities/otp-params.js";
import { type AppError, invalidParameter } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { ReplayGuard } from "../../core/ports/replay-guard.js";
import {
  type TotpService,
  type VerifyOptions,
  VerifyOutcome,
  type VerifyReport,
} from "../../core/ports/totp-service.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { type ByteProbe, fixedWidthEqual } from "../../shared/utils/timing-safe.js";
import { type HotpGenerator, hotp as defaultHotp } from "../crypto/hotp.js";
import { buildOtpauthUri } from "../crypto/otpauth-uri.js";
import { counterAt, generateSecret, generateTotp, isValidTime } from "../crypto/totp.js";

/**
 * TOTP verifier (RFC 6238) with drift window, constant-time comparison,
 * and persistent replay protection.
 */

export interface TotpServiceOptions {
  readonly params: OtpParams;
  /** Counters checked on each side of the current one. 0 = exact match only. */
  readonly window: number;
  readonly issuer: string;
  readonly replayGuard: ReplayGuard;
  readonly logger: Logger;
  /** Swappable for instrumentation in tests. */
  readonly hotp?: HotpGenerator;
  readonly byteProbe?: ByteProbe;
}

export const DEFAULT_WINDOW = 1;

const DIGIT_ZERO = 0x30;
const DIGIT_NINE = 0x39;

/**
 * Format check without early exit: every character is inspected whatever
 * the outcome.
 */
const isWellFormed = (candidate: string, digits: number): boolean => {
  let bad = candidate.length ^ digits;
  for (let i = 0; i < candidate.length; i++) {
    const c = candidate.charCodeAt(i);
    bad |= c < DIGIT_ZERO || c > DIGIT_NINE ? 1 : 0;
  }
  return bad === 0;
};

export const createTotpService = (options: TotpServiceOptions): Result<TotpService, AppError> => {
  const { params, window, issuer, replayGuard, byteProbe } = options;
  const hotp = options.hotp ?? defaultHotp;
  const logger = options.logger.child({ service: "totp" });

  if (!Number.isInteger(window) || window < 0) {
    return err(invalidParameter("window must be a non-negative integer", { window }));
  }

  /**
   * Compute the code of every counter in [center - window, center + window]
   * and compare each one; the last match wins. No early exit.
   */
  const scan = (candidate: string, secret: Secret, center: Counter): Counter | undefined => {
    let matched: Counter | undefined;
    for (let offset = -window; offset <= window; offset++) {
      const counter = Math.max(0, center + offset);
      const expected = hotp(secret, counter, params.digits, params.algorithm);
      if (fixedWidthEqual(candidate, expected, params.digits, byteProbe)) {
        matched = counter;
      }
    }
    return matched;
  };

  const check = (candidate: string, secret: Secret, opts: VerifyOptions = {}): VerifyReport => {
    const at = opts.at ?? new Date();

    if (!isWellFormed(candidate, params.digits)) {
      // Same amount of HMAC work as a well-formed candidate.
      scan("", secret, 0);
      return { outcome: VerifyOutcome.INVALID_FORMAT };
    }

    if (!isValidTime(at)) {
      scan("", secret, 0);
      return { outcome: VerifyOutcome.INVALID_TIME };
    }

    const counter = scan(candidate, secret, counterAt(at, params));
    if (counter === undefined) {
      return { outcome: VerifyOutcome.NO_MATCH };
    }

    if (opts.principal === undefined) {
      return { outcome: VerifyOutcome.ACCEPTED, counter };
    }

    const consumed = replayGuard.consume(opts.principal, counter);
    if (!consumed.ok) {
      return { outcome: VerifyOutcome.REPLAY_UNAVAILABLE, counter };
    }
    return consumed.value
      ? { outcome: VerifyOutcome.ACCEPTED, counter }
      : { outcome: VerifyOutcome.REJECTED_REPLAY, counter };
  };

  return ok({
    generateSecret(): Secret {
      return generateSecret();
    },

    generateUri(secret: Secret, principal: string): string {
      return buildOtpauthUri(secret, principal, issuer, params);
    },

    generate(secret: Secret, at: Date = new Date()): string {
      return generateTotp(secret, at, params, hotp);
    },

    check,

    verify(candidate: string, secret: Secret, opts: VerifyOptions = {}): boolean {
      const report = check(candidate, secret, opts);
      logger.debug("TOTP verification", {
        outcome: report.outcome,
        ...(opts.principal === undefined ? {} : { principal: opts.principal }),
        ...(report.counter === undefined ? {} : { counter: report.counter }),
      });
      return report.outcome === VerifyOutcome.ACCEPTED;
    },
  });
};
