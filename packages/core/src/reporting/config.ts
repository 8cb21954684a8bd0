/**
 * Reporting configuration — what the dispatch entry points consult on every call.
 *
 * An override is installed by reference. Each field left `null`/`undefined` falls
 * back to the built-in default on its own; an empty string counts as set (an empty
 * `projectName` prints `[]`, an empty `postfix` drops the newline).
 */

import { ResultKind } from '../results/index.js'
import type { ResultCode } from '../results/index.js'

export type LogHandler = (result: ResultCode, message: string) => void

/** `caller` and `location` are whatever the call site passed, `null` included. */
export type ErrorHandler = (
  result: ResultCode,
  caller: string | null,
  location: string | null,
  message: string,
) => void

export interface ReportingConfig {
  /** Tag printed in brackets. Defaults to `lurk`. */
  projectName?: string | null
  /** Printed after the tag, before the message. */
  prefix?: string | null
  /** Printed after the message. Defaults to a newline. */
  postfix?: string | null
  logEnabled?: boolean | null
  errEnabled?: boolean | null
  /** Replaces the built-in stdout reporter. */
  logHandler?: LogHandler | null
  /** Replaces the built-in stderr reporter. */
  errorHandler?: ErrorHandler | null
}

export interface ResolvedReportingConfig {
  projectName: string
  prefix: string
  postfix: string
  logEnabled: boolean
  errEnabled: boolean
  logHandler: LogHandler | null
  errorHandler: ErrorHandler | null
}

export const DEFAULT_REPORTING_CONFIG: Readonly<ResolvedReportingConfig> = Object.freeze({
  projectName: 'lurk',
  prefix: '',
  postfix: '\n',
  logEnabled: true,
  errEnabled: true,
  logHandler: null,
  errorHandler: null,
})

export function defaultReportingConfig(): ResolvedReportingConfig {
  return { ...DEFAULT_REPORTING_CONFIG }
}

/**
 * Copy the defaults into `destination`, for callers that start from the defaults
 * and change a few fields before installing the record.
 */
export function copyDefaults(destination: ReportingConfig | null | undefined): ResultCode {
  if (destination == null) return ResultKind.BadParam
  Object.assign(destination, DEFAULT_REPORTING_CONFIG)
  return ResultKind.Success
}

export function resolveReportingConfig(override: ReportingConfig | null): ResolvedReportingConfig {
  if (override === null) return defaultReportingConfig()

  const d = DEFAULT_REPORTING_CONFIG
  return {
    projectName: override.projectName ?? d.projectName,
    prefix: override.prefix ?? d.prefix,
    postfix: override.postfix ?? d.postfix,
    logEnabled: override.logEnabled ?? d.logEnabled,
    errEnabled: override.errEnabled ?? d.errEnabled,
    logHandler: override.logHandler ?? d.logHandler,
    errorHandler: override.errorHandler ?? d.errorHandler,
  }
}
