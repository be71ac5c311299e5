import { closeSync, openSync, statSync, unlinkSync, writeSync } from "node:fs";
import { type AppError, describeCause, persistenceFailure } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { errnoCode } from "../../shared/utils/atomic-file.js";

/**
 * Cross-process mutual exclusion built on exclusive file creation (O_EXCL).
 *
 * Every authentication attempt may run in its own process, so an in-process
 * mutex cannot serialize check-and-mark. Whoever creates `<path>` holds the
 * lock; the others poll until it disappears or the wait budget runs out.
 * A lock file older than `staleMs` belonged to a process that died while
 * holding it and is removed.
 */

export interface FileLockOptions {
  /** Give up waiting after this long. */
  readonly timeoutMs: number;
  /** Lock files older than this are considered abandoned. */
  readonly staleMs: number;
  readonly retryDelayMs?: number;
  readonly logger: Logger;
}

export interface FileLock {
  /** Run `fn` while holding the lock at `lockPath`. */
  withLock<T>(lockPath: string, fn: () => Result<T, AppError>): Result<T, AppError>;
}

const DEFAULT_RETRY_DELAY_MS = 25;

const sleepSync = (ms: number): void => {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

export const createFileLock = (options: FileLockOptions): FileLock => {
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const logger = options.logger;

  const isStale = (lockPath: string): boolean => {
    try {
      return Date.now() - statSync(lockPath).mtimeMs > options.staleMs;
    } catch (e: unknown) {
      // Released between our create attempt and the stat: just retry.
      if (errnoCode(e) === "ENOENT") return false;
      throw e;
    }
  };

  const tryCreate = (lockPath: string): boolean => {
    let fd: number;
    try {
      fd = openSync(lockPath, "wx", 0o600);
    } catch (e: unknown) {
      if (errnoCode(e) === "EEXIST") return false;
      throw e;
    }
    try {
      writeSync(fd, `${process.pid}\n`);
    } finally {
      closeSync(fd);
    }
    return true;
  };

  const acquire = (lockPath: string): Result<void, AppError> => {
    const deadline = Date.now() + options.timeoutMs;
    try {
      for (;;) {
        if (tryCreate(lockPath)) return ok(undefined);

        if (isStale(lockPath)) {
          logger.warn("Breaking stale lock", { lockPath });
          try {
            unlinkSync(lockPath);
          } catch (e: unknown) {
            if (errnoCode(e) !== "ENOENT") throw e;
          }
          continue;
        }

        if (Date.now() >= deadline) {
          return err(persistenceFailure(`Timed out after ${options.timeoutMs}ms waiting for lock`));
        }
        sleepSync(retryDelayMs);
      }
    } catch (e: unknown) {
      return err(persistenceFailure("Could not acquire lock", e));
    }
  };

  const release = (lockPath: string): void => {
    try {
      unlinkSync(lockPath);
    } catch (e: unknown) {
      // Left behind, the file is only cleared once it turns stale.
      logger.error("Failed to release lock", { lockPath, cause: describeCause(e) });
    }
  };

  return {
    withLock<T>(lockPath: string, fn: () => Result<T, AppError>): Result<T, AppError> {
      const acquired = acquire(lockPath);
      if (!acquired.ok) return acquired;
      try {
        return fn();
      } finally {
        release(lockPath);
      }
    },
  };
};
