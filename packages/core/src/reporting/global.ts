/**
 * Process-wide reporter. Configuration is a plain shared reference with
 * last-writer-wins semantics and no synchronization.
 */

import type { ResultCode } from '../results/index.js'
import type { ReportingConfig } from './config.js'
import { Reporter } from './reporter.js'

export const defaultReporter = new Reporter()

export function setConfiguration(config: ReportingConfig | null | undefined): ResultCode {
  return defaultReporter.setConfiguration(config)
}

export function getDefaults(destination: ReportingConfig | null | undefined): ResultCode {
  return defaultReporter.getDefaults(destination)
}

export function report(result: ResultCode, format?: string | null, ...args: unknown[]): ResultCode {
  return defaultReporter.report(result, format, ...args)
}

export function reportError(
  result: ResultCode,
  caller: string | null | undefined,
  location: string | null | undefined,
  format?: string | null,
  ...args: unknown[]
): ResultCode {
  return defaultReporter.reportError(result, caller, location, format, ...args)
}
