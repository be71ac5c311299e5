import type { Counter } from "../entities/otp-params.js";
import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Replay Guard
 * Remembers which counters were already accepted for each principal, across
 * process restarts. A recorded counter never verifies again for the same
 * principal and has no effect on any other principal.
 *
 * Calls are synchronous and may block on disk I/O and cross-process locks.
 */
export interface ReplayGuard {
  /** Whether the counter was already consumed. Unreadable state reports true. */
  isUsed(principal: string, counter: Counter): boolean;
  /** Record the counter. false means it could not be persisted. */
  markUsed(principal: string, counter: Counter): boolean;
  /**
   * Check-and-mark as one critical section.
   * ok(true): freshly consumed. ok(false): already consumed.
   */
  consume(principal: string, counter: Counter): Result<boolean, AppError>;
}
