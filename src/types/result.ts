/**
 * Result type for expected failures
 * Prompts and other operator-facing calls return a Result instead of throwing,
 * so callers decide whether a cancelled answer aborts the run.
 */

/**
 * Successful result carrying a value
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed result carrying an error
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
