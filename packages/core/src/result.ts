/**
 * Result type for explicit error handling.
 * Services return these instead of throwing across their boundary.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/**
 * Create an error result.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Transform the value of a success Result; errors pass through.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (result.ok) {
    return Ok(fn(result.value));
  }
  return result;
}

/**
 * Run a function that may throw and capture the outcome.
 * Non-Error throws are wrapped so callers always see an Error.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
