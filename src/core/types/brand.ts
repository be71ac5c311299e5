/**
 * Branded / Opaque type utility.
 * A branded value can only come out of the function that validated it.
 *
 * @example
 * type OtpParams = Brand<OtpParamsShape, "OtpParams">;
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;
