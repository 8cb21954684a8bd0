/**
 * Reporter — resolves the active configuration and dispatches report lines.
 *
 * Both entry points hand back the result they were given, so a call site can
 * log and propagate in one expression: `return reporter.reportError(...)`.
 */

import { ResultKind } from '../results/index.js'
import type { ResultCode } from '../results/index.js'
import { copyDefaults, resolveReportingConfig } from './config.js'
import type { ReportingConfig, ResolvedReportingConfig } from './config.js'
import { formatLine, formatMessage, formatTag } from './format.js'
import { writeReport } from './streams.js'
import type { OutputStream } from './streams.js'

export const UNKNOWN_CALLER = '(unknown)'
export const UNKNOWN_LOCATION = '???'

export type Clock = () => Date

export interface ReporterOptions {
  /** Log channel. Defaults to `process.stdout`. */
  stdout?: OutputStream
  /** Error channel. Defaults to `process.stderr`. */
  stderr?: OutputStream
  clock?: Clock
}

export class Reporter {
  private override: ReportingConfig | null = null
  private readonly stdout: OutputStream
  private readonly stderr: OutputStream
  private readonly clock: Clock

  constructor(options: ReporterOptions = {}) {
    this.stdout = options.stdout ?? process.stdout
    this.stderr = options.stderr ?? process.stderr
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * Install `config` as the active override, replacing any previous one; `null`
   * restores the defaults. The record is held by reference, so later edits to it
   * apply to the next report. Always returns `Success`.
   */
  setConfiguration(config: ReportingConfig | null | undefined): ResultCode {
    this.override = config ?? null
    return ResultKind.Success
  }

  /** `BadParam` when `destination` is missing, else `Success`. */
  getDefaults(destination: ReportingConfig | null | undefined): ResultCode {
    return copyDefaults(destination)
  }

  resolve(): ResolvedReportingConfig {
    return resolveReportingConfig(this.override)
  }

  report(result: ResultCode, format?: string | null, ...args: unknown[]): ResultCode {
    if (!format) return result

    const config = this.resolve()
    if (!config.logEnabled) return result

    const message = formatMessage(format, args)
    if (config.logHandler) {
      config.logHandler(result, message)
    } else {
      this.defaultLog(result, message)
    }
    return result
  }

  reportError(
    result: ResultCode,
    caller: string | null | undefined,
    location: string | null | undefined,
    format?: string | null,
    ...args: unknown[]
  ): ResultCode {
    if (!format) return result

    const config = this.resolve()
    if (!config.errEnabled) return result

    const message = formatMessage(format, args)
    if (config.errorHandler) {
      config.errorHandler(result, caller ?? null, location ?? null, message)
    } else {
      this.defaultError(result, caller, location, message)
    }
    return result
  }

  /** Built-in log reporter: one line on stdout. Custom handlers may delegate here. */
  defaultLog(result: ResultCode, message: string): void {
    const config = this.resolve()
    if (!config.logEnabled) return

    writeReport(this.stdout, 'stdout', formatLine({
      time: this.clock(),
      result,
      tag: formatTag(config.projectName),
      prefix: config.prefix,
      message,
      postfix: config.postfix,
    }))
  }

  /** Built-in error reporter: one line on stderr, tagged with caller and location. */
  defaultError(
    result: ResultCode,
    caller: string | null | undefined,
    location: string | null | undefined,
    message: string,
  ): void {
    const config = this.resolve()
    if (!config.errEnabled) return

    writeReport(this.stderr, 'stderr', formatLine({
      time: this.clock(),
      result,
      tag: formatTag(config.projectName, caller ?? UNKNOWN_CALLER, location ?? UNKNOWN_LOCATION),
      prefix: config.prefix,
      message,
      postfix: config.postfix,
    }))
  }
}

export function createReporter(options: ReporterOptions = {}): Reporter {
  return new Reporter(options)
}
