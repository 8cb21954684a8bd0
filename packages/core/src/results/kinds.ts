/**
 * Result taxonomy — one small integer carries errors, success, statuses and booleans.
 *
 * Errors are always negative, statuses always positive, success is exactly zero.
 * A failure is a status, not an error: errors are reserved for unexpected behavior
 * or invalid values.
 *
 * `True`/`False` share numbers with other kinds (`False === Success === ValidObject`,
 * `True === Failure`). Functions returning boolean results must say so in their docs,
 * and boolean results must never be compared against status or success results.
 */

export const ResultKind = {
  /** An object (usually a record passed in by a caller) failed validation. */
  InvalidObject: -2,
  /** Something went wrong internally that the caller cannot fix. */
  InternalError: -3,
  /** A parameter passed to a function is invalid. */
  BadParam: -1,

  Success: 0,
  /** A non-error failure, e.g. dequeuing from an empty queue. */
  Failure: 1,
  /** An iterator or ongoing job has finished. */
  Done: 2,

  /** Same value as `Success`, read as "object passed validation". */
  ValidObject: 0,

  True: 1,
  False: 0,
} as const

export type ResultKindName = keyof typeof ResultKind

/** Any integer result; may be a named kind or a caller-defined value. */
export type ResultCode = number

/** A `ResultCode` a function documents as `True`, `False` or an error. */
export type BoolResultCode = number

export const NAMED_ERRORS: readonly ResultCode[] = [
  ResultKind.InvalidObject,
  ResultKind.InternalError,
  ResultKind.BadParam,
]
