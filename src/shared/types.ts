// Shared result helpers for drivers, transports and the verifier

// ============ Result Type ============
// Device operations resolve Result<T, E> instead of throwing.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Normalize anything caught at a library boundary into an Error */
export const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(String(e));

// Result utilities for ergonomic chaining
export const Result = {
  /** Chain operations that return Result (flatMap) */
  andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },

  /** Combine multiple Results - returns first error or all values */
  all<T, E>(results: Result<T, E>[]): Result<T[], E> {
    const values: T[] = [];
    for (const result of results) {
      if (!result.ok) return result;
      values.push(result.value);
    }
    return Ok(values);
  },
};
