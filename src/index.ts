/**
 * timelog
 *
 * Public API exports
 */

// Error system
export {
  TimelogError, TimelogErrorCode,
  ParseError, InvalidPeriodError, InvalidResolutionError, LogFileError, UsageError,
} from './errors'
export type { TimelogErrorCode as TimelogErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Durations
export type { Duration } from './core'
export {
  makeDuration, toHours, minutes, hours,
  ZERO, MILLISECOND, SECOND, MINUTE, HOUR, DAY,
} from './core'

// Time & Date
export type { Instant, LocalDate, WallClock, IsoWeek } from './time-date'
export {
  isLeapYear, daysInMonth, makeDate,
  isoWeekday, sundayBasedWeekday, weekdayAbbreviation, isoWeekOf,
  makeInstant, instantFromWallClock, instantFromDate, wallClock, localDateOf,
  sinceMidnight, midnightOf, addDuration, withOffset, diff,
  compareInstants, instantEquals, laterOf,
  formatOffset, formatInstant, formatDuration,
} from './time-date'

// Timestamp parsing
export { normalizeOffset, parseTimestamp, parseMany } from './timestamp'

// Periods
export type { PeriodInit, PeriodChanges } from './period'
export { Period, compareByStart, compareByDuration, uniquePeriods } from './period'

// Quantization
export { DEFAULT_RESOLUTION, assertResolution, quantize, quantizeAll } from './quantize'

// Merging
export { mergeSorted, mergePeriods, sessionGap } from './merge'

// Statistics
export type {
  KeyPart, StatKey, StatConfig, WeekdaySummary, Statistic, StatResult,
} from './stats'
export {
  keysEqual, groupAdjacent, countHours, makeStat,
  monthKey, isoWeekKey, dayKey, weekdayKey,
  DEFAULT_WEEKS_LIMIT, months, weeks, days, daysOfWeek, longestSession,
  weekdayTotals, findLongestSession, computeStatistic, standardStatistics,
} from './stats'

// Configuration
export type { ReportOptions, CliConfig, Env } from './config'
export { resolveReportOptions, parseCliArgs, DEFAULT_LOG_FILE } from './config'

// Report
export type { Report, RenderOptions } from './report'
export { readLines, buildReport, renderReport } from './report'

// Logging
export type { Logger } from './logger'
export { createLogger, logger } from './logger'

// CLI
export type { CliIo } from './cli'
export { run } from './cli'
