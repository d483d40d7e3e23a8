/**
 * Configuration
 *
 * Report options with their defaults, and the command line: one optional
 * log file argument plus a few flags. The grid resolution is a library
 * option only.
 */

import type { Duration } from './core'
import type { Instant } from './time-date'
import { instantFromDate } from './time-date'
import { DEFAULT_RESOLUTION } from './quantize'
import { DEFAULT_WEEKS_LIMIT } from './stats'

export { UsageError } from './errors'
import { UsageError } from './errors'

// ============================================================================
// Report Options
// ============================================================================

export type ReportOptions = {
  /** Grid slot size; must divide one day */
  resolution: Duration
  /** Clock used to size the Days statistic */
  now: Instant
  weeksLimit: number
}

export function resolveReportOptions(options: Partial<ReportOptions> = {}): ReportOptions {
  return {
    resolution: options.resolution ?? DEFAULT_RESOLUTION,
    now: options.now ?? instantFromDate(new Date()),
    weeksLimit: options.weeksLimit ?? DEFAULT_WEEKS_LIMIT,
  }
}

// ============================================================================
// Command Line
// ============================================================================

export const DEFAULT_LOG_FILE = 'log.txt'

export type CliConfig = {
  file: string
  help: boolean
  debug: boolean
  color: boolean
}

export type Env = Record<string, string | undefined>

export function parseCliArgs(args: readonly string[], env: Env = {}): CliConfig {
  const config: CliConfig = {
    file: DEFAULT_LOG_FILE,
    help: false,
    debug: env.TIMELOG_DEBUG === '1',
    color: env.NO_COLOR === undefined || env.NO_COLOR === '',
  }
  let positional = 0

  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        config.help = true
        break
      case '--debug':
        config.debug = true
        break
      case '--no-color':
        config.color = false
        break
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`)
        }
        if (++positional > 1) {
          throw new UsageError(`Unexpected argument: ${arg}`)
        }
        config.file = arg
    }
  }

  return config
}
