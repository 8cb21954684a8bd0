import { LurkError } from '../common/index.js'

/** The part of a Node writable the reporters need; `process.stdout` satisfies it. */
export interface OutputStream {
  write(chunk: string): unknown
}

/**
 * Write a report line. A stream that throws or is already destroyed raises a
 * fatal `IO_ERROR`.
 */
export function writeReport(stream: OutputStream, name: string, text: string): void {
  if ('destroyed' in stream && stream.destroyed === true) {
    throw LurkError.io(name, new Error('stream is destroyed'))
  }
  try {
    stream.write(text)
  } catch (error) {
    throw LurkError.io(name, error)
  }
}
