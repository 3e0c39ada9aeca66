/**
 * Generic Result type for expected failures.
 * Throw only for programmer errors; return Result for malformed input.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Splits a list of results into successes and failures, each side
 * keeping the original relative order.
 */
export function partitionResults<T, E>(
  results: readonly Result<T, E>[],
): { readonly values: readonly T[]; readonly errors: readonly E[] } {
  const values: T[] = [];
  const errors: E[] = [];
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }
  return { values, errors };
}
