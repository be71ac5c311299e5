import { ErrorCode } from "../../core/errors/app-error.js";
import type { Conversation } from "../../core/ports/conversation.js";
import type { Logger } from "../../core/ports/logger.js";
import type { SecretStore } from "../../core/ports/secret-store.js";
import type { TotpService } from "../../core/ports/totp-service.js";

/**
 * Interactive TOTP authentication — the host-integration side of the
 * verifier. Prompts through a Conversation, counts attempts for this session
 * only, and never tells the user whether a rejected code was wrong or
 * replayed.
 */

export const AuthOutcome = {
  SUCCESS: "success",
  NOT_ENROLLED: "not_enrolled",
  SECRET_UNAVAILABLE: "secret_unavailable",
  NO_RESPONSE: "no_response",
  MAX_ATTEMPTS: "max_attempts",
} as const;

export type AuthOutcome = (typeof AuthOutcome)[keyof typeof AuthOutcome];

export interface AuthResult {
  readonly outcome: AuthOutcome;
  /** Prompts answered, including malformed ones. */
  readonly attempts: number;
}

export interface AuthService {
  authenticate(principal: string, conversation: Conversation): Promise<AuthResult>;
}

interface Deps {
  readonly secretStore: SecretStore;
  readonly totpService: TotpService;
  readonly logger: Logger;
  readonly maxAttempts: number;
  readonly digits: number;
  /** Clock for verification; defaults to now. */
  readonly now?: () => Date;
}

export const createAuthService = (deps: Deps): AuthService => {
  const { secretStore, totpService, maxAttempts, digits } = deps;
  const logger = deps.logger.child({ service: "auth" });
  const now = deps.now ?? (() => new Date());
  const wellFormed = new RegExp(`^\\d{${digits}}$`);

  return {
    async authenticate(principal: string, conversation: Conversation): Promise<AuthResult> {
      if (!(await secretStore.exists(principal))) {
        logger.warn("Authentication for unenrolled principal", { principal });
        conversation.error("TOTP not configured. Contact your administrator.");
        return { outcome: AuthOutcome.NOT_ENROLLED, attempts: 0 };
      }

      let attempts = 0;
      while (attempts < maxAttempts) {
        const input = await conversation.prompt(`TOTP code (${attempts + 1}/${maxAttempts}): `, {
          masked: true,
        });
        if (input === null) {
          conversation.error("Failed to read TOTP code.");
          return { outcome: AuthOutcome.NO_RESPONSE, attempts };
        }
        attempts++;

        const candidate = input.trim();
        if (!wellFormed.test(candidate)) {
          conversation.error(`Invalid format. TOTP code must be ${digits} digits.`);
          continue;
        }

        const loaded = await secretStore.load(principal);
        if (!loaded.ok) {
          logger.error("Secret unavailable", {
            principal,
            errorCode: loaded.error.code,
            reason: loaded.error.message,
          });
          conversation.error(
            loaded.error.code === ErrorCode.NOT_FOUND
              ? "TOTP not configured. Contact your administrator."
              : "Cannot authenticate: TOTP secret unavailable.",
          );
          return { outcome: AuthOutcome.SECRET_UNAVAILABLE, attempts };
        }

        const secret = loaded.value;
        let accepted: boolean;
        try {
          accepted = totpService.verify(candidate, secret, { principal, at: now() });
        } finally {
          secret.fill(0);
        }

        if (accepted) {
          logger.info("TOTP authentication succeeded", { principal, attempts });
          conversation.info("TOTP authentication successful!");
          return { outcome: AuthOutcome.SUCCESS, attempts };
        }

        const remaining = maxAttempts - attempts;
        conversation.error(
          remaining > 0
            ? `Invalid TOTP code. ${remaining} attempts remaining.`
            : "Invalid TOTP code. Maximum attempts exceeded.",
        );
      }

      logger.warn("TOTP authentication failed", { principal, attempts });
      return { outcome: AuthOutcome.MAX_ATTEMPTS, attempts };
    },
  };
};
