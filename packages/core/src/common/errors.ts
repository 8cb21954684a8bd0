/**
 * Typed error class for failures the result codes cannot express.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'FORMAT_ERROR'

export class LurkError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LurkError'
    this.code = code
  }

  static validation(message: string): LurkError {
    return new LurkError('VALIDATION_ERROR', message)
  }

  /** The message template does not match its arguments. */
  static format(template: string, cause: unknown): LurkError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new LurkError('FORMAT_ERROR', `cannot format "${template}": ${reason}`, { cause })
  }

  /** A report line could not be written. Fatal: callers must not carry on as if it was. */
  static io(stream: string, cause: unknown): LurkError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new LurkError('IO_ERROR', `failed to write to ${stream}: ${reason}`, { cause })
  }
}
