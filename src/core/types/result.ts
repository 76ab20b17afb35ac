import type { AppError } from "../errors/app-error.js";

/**
 * Result monad. Replaces throw-based control flow.
 * Every fallible operation returns Result<T, E> instead of throwing.
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

/** Map over the success value */
export const map = <T, U, E>(result: Result<T, E>, fn: (v: T) => U): Result<U, E> =>
  result.ok ? ok(fn(result.value)) : result;
