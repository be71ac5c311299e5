import type { Secret } from "../../core/entities/otp-params.js";
import {
  type AppError,
  codeMismatch,
  invalidParameter,
} from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { SecretStore } from "../../core/ports/secret-store.js";
import type { TotpService } from "../../core/ports/totp-service.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { base32EncodeUnpadded } from "../../infrastructure/crypto/base32.js";

export interface Enrollment {
  readonly principal: string;
  readonly secret: Secret;
  /** Unpadded base32, as typed into an authenticator by hand. */
  readonly base32Secret: string;
  readonly uri: string;
}

export interface EnrollmentService {
  isEnrolled(principal: string): Promise<boolean>;
  /** Generate a secret and its provisioning URI. Nothing is stored yet. */
  begin(principal: string): Result<Enrollment, AppError>;
  /** Check a first code from the authenticator, then store the secret. */
  confirm(enrollment: Enrollment, code: string, at?: Date): Promise<Result<void, AppError>>;
  /** Zero the enrollment's secret buffer. */
  discard(enrollment: Enrollment): void;
  remove(principal: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly secretStore: SecretStore;
  readonly totpService: TotpService;
  readonly logger: Logger;
}

/** "JBSWY3DPEHPK3PXP" → "JBSW Y3DP EHPK 3PXP" */
export const groupSecret = (base32: string, size = 4): string =>
  (base32.match(new RegExp(`.{1,${size}}`, "g")) ?? []).join(" ");

export const createEnrollmentService = (deps: Deps): EnrollmentService => {
  const { secretStore, totpService } = deps;
  const logger = deps.logger.child({ service: "enrollment" });

  return {
    isEnrolled(principal: string): Promise<boolean> {
      return secretStore.exists(principal);
    },

    begin(principal: string): Result<Enrollment, AppError> {
      if (principal.trim().length === 0) {
        return err(invalidParameter("principal must not be empty"));
      }
      const secret = totpService.generateSecret();
      logger.info("Enrollment started", { principal });
      return ok({
        principal,
        secret,
        base32Secret: base32EncodeUnpadded(secret),
        uri: totpService.generateUri(secret, principal),
      });
    },

    async confirm(enrollment: Enrollment, code: string, at?: Date): Promise<Result<void, AppError>> {
      // No principal: the confirmation code must stay usable for the first login.
      const matches = totpService.verify(code.trim(), enrollment.secret, at ? { at } : {});
      if (!matches) {
        logger.warn("Enrollment confirmation failed", { principal: enrollment.principal });
        return err(codeMismatch("Invalid code. Please try setup again."));
      }

      const saved = await secretStore.save(enrollment.principal, enrollment.secret);
      if (!saved.ok) return saved;

      logger.info("Enrollment completed", { principal: enrollment.principal });
      return ok(undefined);
    },

    discard(enrollment: Enrollment): void {
      enrollment.secret.fill(0);
    },

    async remove(principal: string): Promise<Result<void, AppError>> {
      const removed = await secretStore.delete(principal);
      if (removed.ok) logger.info("Enrollment removed", { principal });
      return removed;
    },
  };
};
