import { ResultKind } from './kinds.js'
import type { ResultCode, ResultKindName } from './kinds.js'

// Aliases (ValidObject, True, False) resolve to the canonical reading of their value
const CANONICAL_NAMES: ReadonlyMap<ResultCode, ResultKindName> = new Map<ResultCode, ResultKindName>([
  [ResultKind.InternalError, 'InternalError'],
  [ResultKind.InvalidObject, 'InvalidObject'],
  [ResultKind.BadParam, 'BadParam'],
  [ResultKind.Success, 'Success'],
  [ResultKind.Failure, 'Failure'],
  [ResultKind.Done, 'Done'],
])

export function resultName(result: ResultCode): ResultKindName | undefined {
  return CANONICAL_NAMES.get(result)
}

/**
 * Eight lowercase hex digits of the 32-bit two's complement, so `-1` reads `ffffffff`.
 */
export function formatResultCode(result: ResultCode): string {
  return (Math.trunc(result) >>> 0).toString(16).padStart(8, '0')
}

export function describeResult(result: ResultCode): string {
  return `${resultName(result) ?? 'unknown'} (${formatResultCode(result)})`
}
