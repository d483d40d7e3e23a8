/**
 * Statistics
 *
 * One generic group-and-reduce pass over the start-ordered working set, and
 * the fixed family of statistics the report prints. Grouping is
 * group-adjacent: equal keys that are not next to each other form separate
 * groups.
 */

import type { Duration } from './core'
import { toHours } from './core'
import type { Instant } from './time-date'
import {
  isoWeekOf,
  isoWeekday,
  localDateOf,
  pad2,
  sundayBasedWeekday,
  weekdayAbbreviation,
} from './time-date'
import { Period, compareByDuration } from './period'
import { mergePeriods, sessionGap } from './merge'
import { DEFAULT_RESOLUTION } from './quantize'

// ============================================================================
// Types
// ============================================================================

export type KeyPart = string | number

/** Group key: a scalar or a tuple of scalars compared element-wise */
export type StatKey = KeyPart | readonly KeyPart[]

export type StatConfig<K extends StatKey, V> = {
  key: (period: Period) => K
  formatKey: (key: K) => string
  /** Keep only the first `limit` groups, in encounter order; 0 means no cap */
  limit?: number
  aggregate: (group: readonly Period[]) => V
}

export type WeekdaySummary = {
  avg: number
  sum: number
}

export type Statistic =
  | { kind: 'hours'; name: string; config: StatConfig<StatKey, number> }
  | { kind: 'weekdays'; name: string }
  | { kind: 'longestSession'; name: string; maxGap: Duration }

export type StatResult =
  | { kind: 'hours'; name: string; values: Map<string, number> }
  | { kind: 'weekdays'; name: string; values: Map<string, WeekdaySummary> }
  | { kind: 'longestSession'; name: string; session: Period | null }

// ============================================================================
// Grouping
// ============================================================================

export function keysEqual(a: StatKey, b: StatKey): boolean {
  if (typeof a !== 'object' || typeof b !== 'object') return a === b
  return a.length === b.length && a.every((part, i) => part === b[i])
}

/** Consecutive runs of items sharing a key */
export function* groupAdjacent<T, K extends StatKey>(
  items: Iterable<T>,
  key: (item: T) => K
): Generator<[K, T[]], void, undefined> {
  let currentKey: K | undefined
  let group: T[] = []
  for (const item of items) {
    const k = key(item)
    if (currentKey !== undefined && keysEqual(currentKey, k)) {
      group.push(item)
      continue
    }
    if (currentKey !== undefined) yield [currentKey, group]
    currentKey = k
    group = [item]
  }
  if (currentKey !== undefined) yield [currentKey, group]
}

function* take<T>(n: number, items: Iterable<T>): Generator<T, void, undefined> {
  if (n <= 0) return
  let taken = 0
  for (const item of items) {
    yield item
    if (++taken >= n) return
  }
}

// ============================================================================
// Generic Stat
// ============================================================================

/** Total duration in hours, unrounded */
export function countHours(periods: Iterable<Period>): number {
  let total = 0
  for (const p of periods) total += toHours(p.duration)
  return total
}

export function makeStat<K extends StatKey, V>(
  config: StatConfig<K, V>,
  periods: Iterable<Period>
): Map<string, V> {
  let grouped: Iterable<[K, Period[]]> = groupAdjacent(periods, config.key)
  if (config.limit) grouped = take(config.limit, grouped)
  const stats = new Map<string, V>()
  for (const [key, group] of grouped) {
    stats.set(config.formatKey(key), config.aggregate(group))
  }
  return stats
}

// ============================================================================
// Keys
// ============================================================================

export function monthKey(p: Period): readonly [number, number] {
  return [p.year, p.month]
}

export function isoWeekKey(p: Period): readonly [number, number] {
  const { year, week } = isoWeekOf(p.date)
  return [year, week]
}

/** e.g. `2020-01-06 Mon` */
export function dayKey(p: Period): string {
  return `${p.date} ${weekdayAbbreviation(p.date)}`
}

/** Sunday-based weekday number and name, e.g. `1 Mon` or `0 Sun` */
export function weekdayKey(p: Period): string {
  return `${sundayBasedWeekday(p.date)} ${weekdayAbbreviation(p.date)}`
}

function formatPair(sep: string): (key: StatKey) => string {
  return (key) => {
    if (typeof key !== 'object') return String(key)
    const [year, n] = key
    return `${year}${sep}${pad2(Number(n))}`
  }
}

// ============================================================================
// The Report's Statistics
// ============================================================================

export const DEFAULT_WEEKS_LIMIT = 8

export function months(): Statistic {
  return {
    kind: 'hours',
    name: 'Months',
    config: { key: monthKey, formatKey: formatPair('-'), aggregate: countHours },
  }
}

/**
 * Weeks keeps the first `limit` weeks met in ascending order, i.e. the
 * oldest weeks of the log. A limit of 0 keeps every week.
 */
export function weeks(limit: number = DEFAULT_WEEKS_LIMIT): Statistic {
  return {
    kind: 'hours',
    name: 'Weeks',
    config: { key: isoWeekKey, formatKey: formatPair('-W'), limit, aggregate: countHours },
  }
}

/**
 * Days is capped at today's ISO weekday plus seven groups, roughly this week
 * and the last. Days without activity do not count towards the cap.
 */
export function days(now: Instant): Statistic {
  return {
    kind: 'hours',
    name: 'Days',
    config: {
      key: dayKey,
      formatKey: String,
      limit: isoWeekday(localDateOf(now)) + 7,
      aggregate: countHours,
    },
  }
}

export function daysOfWeek(): Statistic {
  return { kind: 'weekdays', name: 'DaysOfWeek' }
}

export function longestSession(resolution: Duration = DEFAULT_RESOLUTION): Statistic {
  return { kind: 'longestSession', name: 'LongestSession', maxGap: sessionGap(resolution) }
}

// ============================================================================
// Evaluation
// ============================================================================

/** Two decimals; exact halves go to the even neighbour */
function roundTo2(n: number): number {
  const scaled = n * 100
  const lower = Math.floor(scaled)
  if (scaled - lower === 0.5) return (lower % 2 === 0 ? lower : lower + 1) / 100
  return Math.round(scaled) / 100
}

/**
 * Per weekday, the hour totals of every separate run of that weekday across
 * the log, summarised as their mean and sum.
 */
export function weekdayTotals(periods: Iterable<Period>): Map<string, WeekdaySummary> {
  const totals = new Map<string, number[]>()
  for (const [weekday, group] of groupAdjacent(periods, weekdayKey)) {
    const list = totals.get(weekday)
    if (list) list.push(countHours(group))
    else totals.set(weekday, [countHours(group)])
  }
  const result = new Map<string, WeekdaySummary>()
  for (const [weekday, hours] of totals) {
    const sum = hours.reduce((acc, h) => acc + h, 0)
    result.set(weekday, { avg: roundTo2(sum / hours.length), sum })
  }
  return result
}

/** Longest merged session; ties go to the one starting last */
export function findLongestSession(periods: Iterable<Period>, maxGap: Duration): Period | null {
  const merged = mergePeriods(periods, maxGap).sort(compareByDuration)
  return merged[merged.length - 1] ?? null
}

export function computeStatistic(stat: Statistic, periods: readonly Period[]): StatResult {
  switch (stat.kind) {
    case 'hours':
      return { kind: 'hours', name: stat.name, values: makeStat(stat.config, periods) }
    case 'weekdays':
      return { kind: 'weekdays', name: stat.name, values: weekdayTotals(periods) }
    case 'longestSession':
      return {
        kind: 'longestSession',
        name: stat.name,
        session: findLongestSession(periods, stat.maxGap),
      }
  }
}

export function standardStatistics(options: {
  resolution: Duration
  now: Instant
  weeksLimit?: number
}): Statistic[] {
  return [
    months(),
    weeks(options.weeksLimit),
    days(options.now),
    daysOfWeek(),
    longestSession(options.resolution),
  ]
}
