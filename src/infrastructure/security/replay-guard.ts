import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { Counter } from "../../core/entities/otp-params.js";
import {
  type AppError,
  describeCause,
  invalidParameter,
  persistenceFailure,
} from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { ReplayGuard } from "../../core/ports/replay-guard.js";
import { type Result, err, ok, tryCatch } from "../../core/types/result.js";
import { ensureDirectorySync, errnoCode, writeFileAtomicSync } from "../../shared/utils/atomic-file.js";
import { principalFileName } from "../../shared/utils/file-name.js";
import type { FileLock } from "./file-lock.js";

/**
 * File-backed replay guard — one record per principal under `directory`,
 * holding the consumed counters as ascending decimal lines.
 *
 * Every write happens under the principal's lock file, prunes counters that
 * fell out of the retention window, and atomically replaces the record.
 */

export interface FileReplayGuardOptions {
  readonly directory: string;
  /** Counters older than `latest - retentionPeriods` are dropped on write. */
  readonly retentionPeriods: number;
  readonly lock: FileLock;
  readonly logger: Logger;
}

export const DEFAULT_RETENTION_PERIODS = 10;

const DIRECTORY_MODE = 0o700;
const RECORD_MODE = 0o600;

export const parseCounters = (content: string): Set<Counter> => {
  const counters = new Set<Counter>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const value = Number(trimmed);
    if (Number.isSafeInteger(value)) counters.add(value);
  }
  return counters;
};

export const serializeCounters = (counters: Iterable<Counter>): string =>
  [...counters].sort((a, b) => a - b).join("\n");

export const createFileReplayGuard = (options: FileReplayGuardOptions): ReplayGuard => {
  const { directory, retentionPeriods, lock, logger } = options;

  const recordPath = (principal: string, counter: Counter): Result<string, AppError> => {
    if (principal.length === 0) {
      return err(invalidParameter("principal must not be empty"));
    }
    if (!Number.isSafeInteger(counter) || counter < 0) {
      return err(invalidParameter("counter must be a non-negative safe integer", { counter }));
    }
    return ok(join(directory, principalFileName(principal)));
  };

  const readCounters = (path: string): Set<Counter> => {
    try {
      return parseCounters(readFileSync(path, "utf8"));
    } catch (e: unknown) {
      if (errnoCode(e) === "ENOENT") return new Set();
      throw e;
    }
  };

  /** Prune, insert, persist. Caller holds the lock. */
  const record = (path: string, counters: Set<Counter>, counter: Counter): void => {
    const cutoff = Math.max(0, counter - retentionPeriods);
    const kept = [...counters].filter((c) => c >= cutoff);
    kept.push(counter);
    writeFileAtomicSync(path, serializeCounters(new Set(kept)), RECORD_MODE);
  };

  const locked = <T>(
    principal: string,
    counter: Counter,
    fn: (path: string) => T,
  ): Result<T, AppError> => {
    const path = recordPath(principal, counter);
    if (!path.ok) return path;

    const dir = tryCatch(
      () => ensureDirectorySync(directory, DIRECTORY_MODE),
      (e) => persistenceFailure(`Cannot create replay directory ${directory}`, e),
    );
    if (!dir.ok) return dir;

    return lock.withLock(`${path.value}.lock`, () =>
      tryCatch(
        () => fn(path.value),
        (e) => persistenceFailure("Replay record read/write failed", e),
      ),
    );
  };

  const logFailure = (op: string, principal: string, error: AppError): void => {
    logger.error("Replay guard failure", {
      op,
      principal,
      errorCode: error.code,
      reason: error.message,
      ...(error.cause === undefined ? {} : { cause: describeCause(error.cause) }),
    });
  };

  return {
    isUsed(principal: string, counter: Counter): boolean {
      const path = recordPath(principal, counter);
      const result = path.ok
        ? tryCatch(
            () => readCounters(path.value).has(counter),
            (e) => persistenceFailure("Replay record read failed", e),
          )
        : path;
      if (!result.ok) {
        logFailure("isUsed", principal, result.error);
        return true;
      }
      return result.value;
    },

    markUsed(principal: string, counter: Counter): boolean {
      const result = locked(principal, counter, (path) => {
        record(path, readCounters(path), counter);
      });
      if (!result.ok) {
        logFailure("markUsed", principal, result.error);
        return false;
      }
      return true;
    },

    consume(principal: string, counter: Counter): Result<boolean, AppError> {
      const result = locked(principal, counter, (path) => {
        const counters = readCounters(path);
        if (counters.has(counter)) return false;
        record(path, counters, counter);
        return true;
      });
      if (!result.ok) logFailure("consume", principal, result.error);
      return result;
    },
  };
};
