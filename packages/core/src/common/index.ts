/**
 * Common utilities — Result pattern, error handling.
 */

export { Ok, Err } from './result.js'
export type { Result } from './result.js'

export { LurkError } from './errors.js'
export type { ErrorCode } from './errors.js'
