import type { Secret } from "../../core/entities/otp-params.js";
import { type AppError, invalidParameter, notFound } from "../../core/errors/app-error.js";
import type { SecretStore } from "../../core/ports/secret-store.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * In-memory secret store — for tests and embedding. Buffers are copied on
 * the way in and out so callers can zero theirs freely.
 */
export const createInMemorySecretStore = (): SecretStore => {
  const store = new Map<string, Uint8Array>();

  return {
    async load(principal: string): Promise<Result<Secret, AppError>> {
      const secret = store.get(principal);
      if (!secret) return err(notFound(`Secret for '${principal}'`));
      return ok(Uint8Array.from(secret));
    },

    async save(principal: string, secret: Secret): Promise<Result<void, AppError>> {
      if (principal.length === 0) return err(invalidParameter("principal must not be empty"));
      if (secret.length === 0) return err(invalidParameter("secret must not be empty"));
      store.get(principal)?.fill(0);
      store.set(principal, Uint8Array.from(secret));
      return ok(undefined);
    },

    async exists(principal: string): Promise<boolean> {
      return store.has(principal);
    },

    async delete(principal: string): Promise<Result<void, AppError>> {
      const secret = store.get(principal);
      if (!secret) return err(notFound(`Secret for '${principal}'`));
      secret.fill(0);
      store.delete(principal);
      return ok(undefined);
    },
  };
};
