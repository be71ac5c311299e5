import type { Code, Counter, Secret } from "../entities/otp-params.js";

/** Terminal state of one verification. Only "accepted" means success. */
export const VerifyOutcome = {
  ACCEPTED: "accepted",
  INVALID_FORMAT: "invalid_format",
  INVALID_TIME: "invalid_time",
  NO_MATCH: "no_match",
  REJECTED_REPLAY: "rejected_replay",
  REPLAY_UNAVAILABLE: "replay_unavailable",
} as const;

export type VerifyOutcome = (typeof VerifyOutcome)[keyof typeof VerifyOutcome];

export interface VerifyOptions {
  /** Defaults to now. */
  readonly at?: Date;
  /** Enables replay protection scoped to this identity. */
  readonly principal?: string;
}

export interface VerifyReport {
  readonly outcome: VerifyOutcome;
  /** Counter that matched, when one did. */
  readonly counter?: Counter;
}

/**
 * Port: TOTP Service
 * Time-based One-Time Password (RFC 6238) for a second authentication factor.
 * Compatible with Google Authenticator, Authy, 1Password, etc.
 */
export interface TotpService {
  /** Fresh random secret. Throws UnrecoverableError if no secure random source. */
  generateSecret(): Secret;
  /** otpauth:// URI for authenticator enrollment. */
  generateUri(secret: Secret, principal: string): string;
  /** Code for the given instant (defaults to now). */
  generate(secret: Secret, at?: Date): Code;
  /**
   * Verify a candidate. Wrong, malformed, and replayed codes all yield false
   * so a caller cannot tell them apart.
   */
  verify(candidate: string, secret: Secret, options?: VerifyOptions): boolean;
  /** Same evaluation as verify, exposing the terminal state for diagnostics. */
  check(candidate: string, secret: Secret, options?: VerifyOptions): VerifyReport;
}
