/**
 * Report
 *
 * Reads the log, turns it into the canonical slot sequence and evaluates the
 * statistics in print order. Nothing is computed until every line has parsed.
 */

import { readFileSync } from 'node:fs'
import pc from 'picocolors'
import type { Period } from './period'
import { parseMany } from './timestamp'
import { quantizeAll } from './quantize'
import { computeStatistic, standardStatistics, type StatResult, type WeekdaySummary } from './stats'
import { resolveReportOptions, type ReportOptions } from './config'
import { logger } from './logger'

export { LogFileError } from './errors'
import { LogFileError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Report = {
  /** Deduplicated slots sorted by start */
  periods: Period[]
  stats: StatResult[]
}

export type RenderOptions = {
  color?: boolean
}

// ============================================================================
// Input
// ============================================================================

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * All lines of a UTF-8 file, trimmed. A trailing newline does not produce an
 * extra empty line, so an empty file has no lines at all.
 */
export function readLines(path: string): string[] {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (err) {
    throw new LogFileError(path, `Cannot read log file '${path}': ${describeError(err)}`, err)
  }
  if (text === '') return []
  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines.map((line) => line.trim())
}

// ============================================================================
// Evaluation
// ============================================================================

export function buildReport(lines: Iterable<string>, options: Partial<ReportOptions> = {}): Report {
  const resolved = resolveReportOptions(options)
  const instants = [...parseMany(lines)]
  const periods = quantizeAll(instants, resolved.resolution)
  logger.debug(`parsed ${instants.length} timestamps into ${periods.length} slots`)

  const stats = standardStatistics(resolved).map((stat) => computeStatistic(stat, periods))
  return { periods, stats }
}

// ============================================================================
// Rendering
// ============================================================================

const INDENT = '  '

function sortedEntries<V>(values: Map<string, V>): [string, V][] {
  return [...values].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

/** Whole numbers keep one decimal: 2.0, not 2 */
function formatHours(hours: number): string {
  return Number.isInteger(hours) ? hours.toFixed(1) : String(hours)
}

function formatWeekday(summary: WeekdaySummary): string {
  return `avg ${formatHours(summary.avg)}, sum ${formatHours(summary.sum)}`
}

function renderBody(result: StatResult): string[] {
  switch (result.kind) {
    case 'hours':
      if (result.values.size === 0) return [`${INDENT}(none)`]
      return sortedEntries(result.values).map(([key, hours]) => `${INDENT}${key}: ${formatHours(hours)}`)
    case 'weekdays':
      if (result.values.size === 0) return [`${INDENT}(none)`]
      return sortedEntries(result.values).map(
        ([key, summary]) => `${INDENT}${key}: ${formatWeekday(summary)}`
      )
    case 'longestSession':
      return [`${INDENT}${result.session === null ? '(no sessions)' : result.session.toString()}`]
  }
}

/** Titled blocks, one per statistic, separated by blank lines */
export function renderReport(report: Report, options: RenderOptions = {}): string {
  const colors = pc.createColors(options.color ?? false)
  return report.stats
    .map((result) => [colors.bold(`${result.name}:`), ...renderBody(result)].join('\n'))
    .join('\n\n')
}
