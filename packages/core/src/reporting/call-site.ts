/**
 * Call-site helpers — report an error through the process-wide reporter and
 * return its result, so guards read `return badParam('size')`.
 *
 * When no `site` is passed, the caller's function name and line number are taken
 * from the V8 stack.
 */

import { ResultKind, formatResultCode, isValidObject } from '../results/index.js'
import type { ResultCode } from '../results/index.js'
import { reportError } from './global.js'

export interface CallSite {
  caller: string | null
  location: string | null
}

// "    at Foo.bar (/src/file.ts:12:5)" or "    at /src/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/

type Boundary = (...args: never[]) => unknown

export function parseStackFrame(frame: string): CallSite {
  const match = FRAME_PATTERN.exec(frame)
  if (!match) return { caller: null, location: null }

  const [, rawName, , line] = match
  if (rawName === undefined) return { caller: null, location: line }

  const name = rawName.replace(/^(async |new )/, '').replace(/ \[as \w+\]$/, '')
  const bare = name.slice(name.lastIndexOf('.') + 1)
  return { caller: bare === '<anonymous>' || bare === '' ? null : bare, location: line }
}

/** The frame just outside `boundary`. */
export function captureCallSite(boundary: Boundary): CallSite {
  const holder: { stack?: unknown } = {}
  Error.captureStackTrace(holder, boundary)
  // A custom Error.prepareStackTrace may hand back something other than text
  if (typeof holder.stack !== 'string') return { caller: null, location: null }
  const frame = holder.stack.split('\n')[1]
  return frame === undefined ? { caller: null, location: null } : parseStackFrame(frame)
}

function emit(result: ResultCode, site: CallSite, message: string): ResultCode {
  // The message is already final: no substitution arguments follow it
  return reportError(result, site.caller, site.location, message)
}

export function trace(result: ResultCode, site: CallSite = captureCallSite(trace)): ResultCode {
  return emit(result, site, 'Callback trace.')
}

export function passError(
  result: ResultCode,
  pass: ResultCode,
  site: CallSite = captureCallSite(passError),
): ResultCode {
  return emit(result, site, `Callback trace, passing: [${formatResultCode(pass)}].`)
}

export function badParam(param: string, site: CallSite = captureCallSite(badParam)): ResultCode {
  return emit(ResultKind.BadParam, site, `Bad parameter [${param}].`)
}

export function badParamNull(param: string, site: CallSite = captureCallSite(badParamNull)): ResultCode {
  return emit(ResultKind.BadParam, site, `Bad parameter [${param}]. Must not be [null]`)
}

export function invalidObject(obj: string, site: CallSite = captureCallSite(invalidObject)): ResultCode {
  return emit(ResultKind.InvalidObject, site, `Invalid object [${obj}].`)
}

export function invalidObjectMember(
  obj: string,
  member: string,
  site: CallSite = captureCallSite(invalidObjectMember),
): ResultCode {
  return emit(ResultKind.InvalidObject, site, `Invalid object member [${obj}.${member}].`)
}

export function invalidObjectMembers(
  obj: string,
  members: readonly string[],
  site: CallSite = captureCallSite(invalidObjectMembers),
): ResultCode {
  return emit(ResultKind.InvalidObject, site, `Invalid object member [${obj}.(${members.join(', ')})].`)
}

export function internalError(site: CallSite = captureCallSite(internalError)): ResultCode {
  return emit(ResultKind.InternalError, site, 'Internal error.')
}

/** Report `result` with a printf-style message; the site is captured from the stack. */
export function returnError(result: ResultCode, format: string, ...args: unknown[]): ResultCode {
  return returnErrorAt(result, captureCallSite(returnError), format, ...args)
}

export function returnErrorAt(
  result: ResultCode,
  site: CallSite,
  format: string,
  ...args: unknown[]
): ResultCode {
  return reportError(result, site.caller, site.location, format, ...args)
}

/**
 * Guard on a validity check: passes `ValidObject` through, otherwise reports
 * `name` as an invalid object.
 */
export function validateObject(
  check: ResultCode,
  name: string,
  site: CallSite = captureCallSite(validateObject),
): ResultCode {
  if (isValidObject(check)) return ResultKind.ValidObject
  return invalidObject(name, site)
}

export function validateObjectMember(
  check: ResultCode,
  obj: string,
  member: string,
  site: CallSite = captureCallSite(validateObjectMember),
): ResultCode {
  if (isValidObject(check)) return ResultKind.ValidObject
  return invalidObjectMember(obj, member, site)
}

export function nullGuard(
  value: unknown,
  name: string,
  site: CallSite = captureCallSite(nullGuard),
): ResultCode {
  if (value == null) return badParamNull(name, site)
  return ResultKind.Success
}
