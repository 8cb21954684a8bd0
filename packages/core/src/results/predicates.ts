import { ResultKind, NAMED_ERRORS } from './kinds.js'
import type { ResultCode } from './kinds.js'

/**
 * True only for exactly `Success`. `False` and `ValidObject` share its value
 * and cannot be told apart.
 */
export function isSuccess(result: ResultCode): boolean {
  return result === ResultKind.Success
}

export function isValidObject(result: ResultCode): boolean {
  return result === ResultKind.ValidObject
}

/** Any negative value counts, named or not. */
export function isError(result: ResultCode): boolean {
  return result < 0
}

/** Only the three errors the taxonomy names; other negatives are not members. */
export function isLurkError(result: ResultCode): boolean {
  return NAMED_ERRORS.includes(result)
}

export function isTrue(result: ResultCode): boolean {
  return result === ResultKind.True
}

export function isFalse(result: ResultCode): boolean {
  return result === ResultKind.False
}
