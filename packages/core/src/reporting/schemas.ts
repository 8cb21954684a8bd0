import { z } from 'zod'
import { Ok, Err, LurkError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ErrorHandler, LogHandler, ReportingConfig } from './config.js'

const LogHandlerSchema = z.custom<LogHandler>(
  (value) => typeof value === 'function',
  'logHandler must be a function',
)

const ErrorHandlerSchema = z.custom<ErrorHandler>(
  (value) => typeof value === 'function',
  'errorHandler must be a function',
)

export const ReportingConfigSchema = z.object({
  projectName: z.string().nullish(),
  prefix: z.string().nullish(),
  postfix: z.string().nullish(),
  logEnabled: z.boolean().nullish(),
  errEnabled: z.boolean().nullish(),
  logHandler: LogHandlerSchema.nullish(),
  errorHandler: ErrorHandlerSchema.nullish(),
}).strict()

/**
 * Validate a configuration record built by untyped code before installing it.
 * Typed callers can hand a `ReportingConfig` to `setConfiguration` directly.
 */
export function parseReportingConfig(input: unknown): Result<ReportingConfig> {
  const parsed = ReportingConfigSchema.safeParse(input)
  if (!parsed.success) {
    return Err(LurkError.validation(parsed.error.message))
  }
  return Ok(parsed.data)
}
