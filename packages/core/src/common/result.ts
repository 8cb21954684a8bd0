/**
 * Data-carrying Result for operations that produce a value, such as parsing a
 * configuration record. Plain status returns use `ResultCode` instead.
 */

import type { LurkError } from './errors.js'

export type Result<T, E = LurkError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
