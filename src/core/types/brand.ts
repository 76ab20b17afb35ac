/**
 * Branded / Opaque type utility.
 * Keeps a user id from being passed where a request id is expected.
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type UserId = Brand<string, "UserId">;
export type RequestId = Brand<string, "RequestId">;
/** Milliseconds since epoch */
export type Timestamp = Brand<number, "Timestamp">;

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;
