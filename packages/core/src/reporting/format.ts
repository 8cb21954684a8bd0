import sprintfJs from 'sprintf-js'
import { LurkError } from '../common/index.js'
import { formatResultCode } from '../results/index.js'
import type { ResultCode } from '../results/index.js'

export interface LineParts {
  time: Date
  result: ResultCode
  tag: string
  prefix: string
  message: string
  postfix: string
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/** `HH:MM:SS` in UTC. */
export function formatClock(time: Date): string {
  return `${pad2(time.getUTCHours())}:${pad2(time.getUTCMinutes())}:${pad2(time.getUTCSeconds())}`
}

const { vsprintf } = sprintfJs

/**
 * printf-style substitution, flags and widths included (`%s`, `%d`, `%08x`, `%.2f`).
 * Arguments beyond the placeholders are ignored. A template with no arguments is
 * returned untouched, `%` signs included.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  if (args.length === 0) return template
  try {
    return vsprintf(template, [...args])
  } catch (error) {
    throw LurkError.format(template, error)
  }
}

export function formatTag(projectName: string, caller?: string, location?: string): string {
  if (caller === undefined || location === undefined) return `[${projectName}]`
  return `[${projectName}:${caller}.${location}]`
}

/** `HH:MM:SS  <8 hex>  <tag>  <prefix><message><postfix>` */
export function formatLine(parts: LineParts): string {
  return `${formatClock(parts.time)}  ${formatResultCode(parts.result)}  ${parts.tag}  ${parts.prefix}${parts.message}${parts.postfix}`
}
