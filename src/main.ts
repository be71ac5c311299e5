import { type AuthService, createAuthService } from "./application/services/auth.service.js";
import {
  type EnrollmentService,
  createEnrollmentService,
} from "./application/services/enrollment.service.js";
import { otpParams } from "./core/entities/otp-params.js";
import type { AppError } from "./core/errors/app-error.js";
import type { Logger } from "./core/ports/logger.js";
import type { SecretStore } from "./core/ports/secret-store.js";
import type { TotpService } from "./core/ports/totp-service.js";
import { type Result, ok } from "./core/types/result.js";
import type { AppConfig } from "./infrastructure/config/config.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createFileLock } from "./infrastructure/security/file-lock.js";
import { createFileReplayGuard } from "./infrastructure/security/replay-guard.js";
import { createTotpService } from "./infrastructure/security/totp-service.js";
import { createFileSecretStore } from "./infrastructure/storage/file-secret-store.js";

export interface AppContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly secretStore: SecretStore;
  readonly totpService: TotpService;
  readonly authService: AuthService;
  readonly enrollmentService: EnrollmentService;
}

export interface AppOverrides {
  readonly logger?: Logger;
  readonly secretStore?: SecretStore;
}

/**
 * Composition root — wire config into adapters and services.
 * Fails with INVALID_PARAMETER before anything touches disk if the code
 * parameters are unusable.
 */
export const createApp = (
  config: AppConfig,
  overrides: AppOverrides = {},
): Result<AppContext, AppError> => {
  const logger = overrides.logger ?? createLogger(config.log.level, {}, config.log.format);

  const params = otpParams(config.totp);
  if (!params.ok) return params;

  const lock = createFileLock({
    timeoutMs: config.replay.lockTimeoutMs,
    staleMs: config.replay.lockStaleMs,
    logger: logger.child({ service: "lock" }),
  });

  const replayGuard = createFileReplayGuard({
    directory: config.replay.directory,
    retentionPeriods: config.replay.retentionPeriods,
    lock,
    logger: logger.child({ service: "replay" }),
  });

  const totpService = createTotpService({
    params: params.value,
    window: config.totp.window,
    issuer: config.totp.issuer,
    replayGuard,
    logger,
  });
  if (!totpService.ok) return totpService;

  const secretStore =
    overrides.secretStore ?? createFileSecretStore({ directory: config.secrets.directory });

  return ok({
    config,
    logger,
    secretStore,
    totpService: totpService.value,
    authService: createAuthService({
      secretStore,
      totpService: totpService.value,
      logger,
      maxAttempts: config.auth.maxAttempts,
      digits: params.value.digits,
    }),
    enrollmentService: createEnrollmentService({
      secretStore,
      totpService: totpService.value,
      logger,
    }),
  });
};
