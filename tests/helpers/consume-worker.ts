import { existsSync, writeSync } from "node:fs";
import { join } from "node:path";
import { createLogger } from "../../src/infrastructure/logging/logger.js";
import { createFileLock } from "../../src/infrastructure/security/file-lock.js";
import { createFileReplayGuard } from "../../src/infrastructure/security/replay-guard.js";

/**
 * Child process for the cross-process replay test.
 *
 *   node --import tsx consume-worker.ts <dir> <principal> <counter>
 *
 * Prints "ready", waits for `<dir>/go` to appear, runs one consume against
 * `<dir>/replay` and prints the result as a JSON line.
 */

const STDOUT = 1;
const WAIT_LIMIT_MS = 20_000;

const sleepSync = (ms: number): void => {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

const run = (): number => {
  const [directory, principal, counterArg] = process.argv.slice(2);
  const counter = Number(counterArg);
  if (directory === undefined || principal === undefined || !Number.isSafeInteger(counter)) {
    return 64;
  }

  const logger = createLogger("error");
  const guard = createFileReplayGuard({
    directory: join(directory, "replay"),
    retentionPeriods: 10,
    lock: createFileLock({ timeoutMs: WAIT_LIMIT_MS, staleMs: 60_000, retryDelayMs: 1, logger }),
    logger,
  });

  writeSync(STDOUT, "ready\n");
  const go = join(directory, "go");
  const deadline = Date.now() + WAIT_LIMIT_MS;
  while (!existsSync(go)) {
    if (Date.now() > deadline) return 75;
    sleepSync(1);
  }

  const result = guard.consume(principal, counter);
  writeSync(
    STDOUT,
    `${JSON.stringify(result.ok ? { consumed: result.value } : { error: result.error.code })}\n`,
  );
  return 0;
};

process.exitCode = run();
