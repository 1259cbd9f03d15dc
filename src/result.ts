/**
 * Result
 *
 * Discriminated success/failure value for operations whose failure is an
 * expected outcome rather than an exception (date parsing, capacity-checked
 * reschedules).
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
