import type { AppError } from "../errors/app-error.js";

/**
 * Result type — expected failures are values, not exceptions.
 * Every fallible core operation returns Result<T, E> instead of throwing.
 */

export type Result<T, E = AppError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Run a throwing (usually filesystem) call and convert whatever it throws
 * into an AppError with the supplied factory.
 */
export const tryCatch = <T>(fn: () => T, onError: (cause: unknown) => AppError): Result<T> => {
  try {
    return ok(fn());
  } catch (e: unknown) {
    return err(onError(e));
  }
};
