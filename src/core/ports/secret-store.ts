import type { Secret } from "../entities/otp-params.js";
import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Secret Store
 * Persistent, access-restricted storage of each principal's shared secret.
 * Verification only loads; provisioning saves and deletes.
 *
 * The returned buffer belongs to the caller, who should zero it after use.
 */
export interface SecretStore {
  /** NOT_FOUND when the principal is not enrolled, SECRET_UNAVAILABLE on any other failure. */
  load(principal: string): Promise<Result<Secret, AppError>>;
  save(principal: string, secret: Secret): Promise<Result<void, AppError>>;
  exists(principal: string): Promise<boolean>;
  delete(principal: string): Promise<Result<void, AppError>>;
}
