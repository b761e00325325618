import { Flags } from '@oclif/core'

/**
 * Common CLI flags shared across multiple commands
 *
 * Standardized flag definitions so behavior and help text stay
 * consistent between commands.
 */

/**
 * JSON output flag
 * Enables structured JSON output instead of human-readable format
 */
export const jsonFlag = Flags.boolean({
  char: 'j',
  description: 'Output result in JSON format',
  default: false,
})

/**
 * Concurrency flag
 * Number of files transferred in parallel; falls back to configuration
 */
export const concurrencyFlag = Flags.integer({
  char: 'c',
  description: 'Number of files to copy in parallel',
  min: 1,
  max: 64,
  required: false,
})

/**
 * Retries flag
 * Extra attempts for files whose destination write fails
 */
export const retriesFlag = Flags.integer({
  char: 'r',
  description: 'Retry a file this many times when writing it fails',
  min: 0,
  required: false,
})
