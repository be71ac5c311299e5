import { existsSync } from "node:fs";
import { readFile, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { Secret } from "../../core/entities/otp-params.js";
import {
  type AppError,
  invalidParameter,
  notFound,
  persistenceFailure,
  secretUnavailable,
} from "../../core/errors/app-error.js";
import type { SecretStore } from "../../core/ports/secret-store.js";
import { type Result, err, ok, tryCatch } from "../../core/types/result.js";
import { ensureDirectorySync, errnoCode, writeFileAtomicSync } from "../../shared/utils/atomic-file.js";
import { principalFileName } from "../../shared/utils/file-name.js";
import { base32Decode, base32Encode } from "../crypto/base32.js";

/**
 * Secret store on the local filesystem: one base32 file per principal in a
 * root-only directory. Stands in for a platform credential store.
 */

export interface FileSecretStoreOptions {
  readonly directory: string;
}

const DIRECTORY_MODE = 0o700;
const SECRET_MODE = 0o600;

export const createFileSecretStore = (options: FileSecretStoreOptions): SecretStore => {
  const { directory } = options;

  const pathFor = (principal: string): Result<string, AppError> =>
    principal.length === 0
      ? err(invalidParameter("principal must not be empty"))
      : ok(join(directory, principalFileName(principal)));

  return {
    async load(principal: string): Promise<Result<Secret, AppError>> {
      const path = pathFor(principal);
      if (!path.ok) return path;

      let content: string;
      try {
        content = await readFile(path.value, "utf8");
      } catch (e: unknown) {
        if (errnoCode(e) === "ENOENT") return err(notFound(`Secret for '${principal}'`));
        return err(secretUnavailable(`Secret for '${principal}' could not be read`, e));
      }

      const decoded = base32Decode(content.trim());
      if (!decoded.ok || decoded.value.length === 0) {
        return err(secretUnavailable(`Secret record for '${principal}' is corrupt`));
      }
      return ok(decoded.value);
    },

    async save(principal: string, secret: Secret): Promise<Result<void, AppError>> {
      const path = pathFor(principal);
      if (!path.ok) return path;
      if (secret.length === 0) return err(invalidParameter("secret must not be empty"));

      return tryCatch(
        () => {
          ensureDirectorySync(directory, DIRECTORY_MODE);
          writeFileAtomicSync(path.value, `${base32Encode(secret)}\n`, SECRET_MODE);
        },
        (e) => persistenceFailure(`Secret for '${principal}' could not be saved`, e),
      );
    },

    async exists(principal: string): Promise<boolean> {
      const path = pathFor(principal);
      return path.ok && existsSync(path.value);
    },

    async delete(principal: string): Promise<Result<void, AppError>> {
      const path = pathFor(principal);
      if (!path.ok) return path;
      try {
        await unlink(path.value);
        return ok(undefined);
      } catch (e: unknown) {
        if (errnoCode(e) === "ENOENT") return err(notFound(`Secret for '${principal}'`));
        return err(persistenceFailure(`Secret for '${principal}' could not be deleted`, e));
      }
    },
  };
};
