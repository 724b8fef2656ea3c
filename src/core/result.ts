/**
 * Discriminated union for operations that fail in expected ways
 * (unknown task, invalid config, unreachable agent).
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Wrap a success value. */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Wrap an expected failure. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Narrow to the success branch. */
export function isOk<T, E>(
  result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
  return result.ok;
}

/** Narrow to the failure branch. */
export function isErr<T, E>(
  result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
  return !result.ok;
}

/**
 * Return the value or throw the error.
 * Meant for tests and startup code where a failure is fatal anyway.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Convert any thrown value into an Error instance. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
