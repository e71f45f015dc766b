/**
 * Result type for operations whose failure is an expected outcome rather than
 * an exceptional one (parse errors, invalid recurrence settings).
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
