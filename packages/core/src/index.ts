/**
 * @lurk/core
 *
 * Result codes that fold errors, success, statuses and booleans into one integer,
 * plus configurable reporting of those results to stdout/stderr or custom handlers.
 */

export * from './results/index.js'
export * from './reporting/index.js'
export * from './common/index.js'
