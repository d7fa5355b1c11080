import type { RowframeError } from '../errors/index.ts';

/**
 * Outcome of a selection that may fail with a RowframeError.
 * `trySelectRows` returns one instead of throwing.
 */
export type Result<T, E = RowframeError> = { ok: true; data: T } | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** The selected value, or the stored error rethrown. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.data;
}
