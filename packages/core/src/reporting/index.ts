export {
  DEFAULT_REPORTING_CONFIG,
  defaultReportingConfig,
  copyDefaults,
  resolveReportingConfig,
} from './config.js'
export type {
  ReportingConfig,
  ResolvedReportingConfig,
  LogHandler,
  ErrorHandler,
} from './config.js'

export { ReportingConfigSchema, parseReportingConfig } from './schemas.js'

export { formatClock, formatMessage, formatTag, formatLine } from './format.js'
export type { LineParts } from './format.js'

export { writeReport } from './streams.js'
export type { OutputStream } from './streams.js'

export { Reporter, createReporter, UNKNOWN_CALLER, UNKNOWN_LOCATION } from './reporter.js'
export type { ReporterOptions, Clock } from './reporter.js'

export { defaultReporter, setConfiguration, getDefaults, report, reportError } from './global.js'

export {
  captureCallSite,
  parseStackFrame,
  trace,
  passError,
  badParam,
  badParamNull,
  invalidObject,
  invalidObjectMember,
  invalidObjectMembers,
  internalError,
  returnError,
  returnErrorAt,
  validateObject,
  validateObjectMember,
  nullGuard,
} from './call-site.js'
export type { CallSite } from './call-site.js'
