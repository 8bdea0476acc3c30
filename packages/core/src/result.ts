/**
 * Result pattern for explicit error handling.
 * Stage-specific error types live with their stage (database, identity, etc.).
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Replace the error of a failed result, leaving successes untouched */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (e: E) => F): Result<T, F> {
  return result.ok ? result : err(fn(result.error));
}
