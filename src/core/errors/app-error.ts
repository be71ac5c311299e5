/**
 * Canonical application error — every expected failure is expressed as an
 * AppError so the verifier, the CLI, and the logger share a single shape.
 */

export const ErrorCode = {
  // Caller / configuration errors
  INVALID_PARAMETER: "INVALID_PARAMETER",
  INVALID_FORMAT: "INVALID_FORMAT",
  INVALID_CHARACTER: "INVALID_CHARACTER",
  NOT_FOUND: "NOT_FOUND",
  CODE_MISMATCH: "CODE_MISMATCH",
  // Environment errors
  SECRET_UNAVAILABLE: "SECRET_UNAVAILABLE",
  PERSISTENCE_FAILURE: "PERSISTENCE_FAILURE",
  RANDOM_SOURCE_UNAVAILABLE: "RANDOM_SOURCE_UNAVAILABLE",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  INVALID_PARAMETER: 64,
  INVALID_FORMAT: 65,
  INVALID_CHARACTER: 65,
  NOT_FOUND: 66,
  CODE_MISMATCH: 77,
  SECRET_UNAVAILABLE: 69,
  PERSISTENCE_FAILURE: 74,
  RANDOM_SOURCE_UNAVAILABLE: 71,
  INTERNAL: 70,
};

/** sysexits(3)-style process status for a failed CLI command. */
export const exitCode = (code: ErrorCode): number => EXIT_CODE_MAP[code];

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause === undefined ? { ...error, details } : { ...error, details, cause };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const invalidParameter = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.INVALID_PARAMETER, msg, details);

export const invalidFormat = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.INVALID_FORMAT, msg, details);

export const invalidCharacter = (char: string, index: number): AppError =>
  appError(ErrorCode.INVALID_CHARACTER, `Invalid character '${char}' at position ${index}`, {
    char,
    index,
  });

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const codeMismatch = (msg = "Code did not match"): AppError =>
  appError(ErrorCode.CODE_MISMATCH, msg);

export const secretUnavailable = (msg = "Secret could not be loaded", cause?: unknown): AppError =>
  appError(ErrorCode.SECRET_UNAVAILABLE, msg, undefined, cause);

export const persistenceFailure = (msg: string, cause?: unknown): AppError =>
  appError(ErrorCode.PERSISTENCE_FAILURE, msg, undefined, cause);

export const randomSourceUnavailable = (cause?: unknown): AppError =>
  appError(
    ErrorCode.RANDOM_SOURCE_UNAVAILABLE,
    "Cryptographically secure random source unavailable",
    undefined,
    cause,
  );

/**
 * Thrown only for conditions the process must not continue past, such as a
 * missing random source during secret generation. Everything else travels
 * as a Result.
 */
export class UnrecoverableError extends Error {
  readonly error: AppError;

  constructor(error: AppError) {
    super(error.message, error.cause === undefined ? undefined : { cause: error.cause });
    this.name = "UnrecoverableError";
    this.error = error;
  }
}

/** Render the cause chain of an unknown thrown value for logs. */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return "code" in cause && typeof cause.code === "string"
      ? `${cause.code}: ${cause.message}`
      : cause.message;
  }
  return String(cause);
};
