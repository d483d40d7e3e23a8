/**
 * Time & Date Utilities
 *
 * Pure functions for offset-aware instants and calendar arithmetic.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Zero external dependencies. Every instant carries the fixed UTC offset it was
 * observed with, and calendar fields are read off its local wall clock.
 */

import type { Duration } from './core'
import { DAY, HOUR, MINUTE, SECOND, makeDuration } from './core'

// ============================================================================
// Types
// ============================================================================

declare const __localDate: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** A moment in time together with the UTC offset (in minutes) it is shown in */
export type Instant = {
  readonly epochMs: number
  readonly offsetMinutes: number
}

export type WallClock = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
}

export type IsoWeek = {
  year: number
  week: number
}

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

/** Floor modulo; JS % keeps the sign of the dividend */
function mod(a: number, b: number): number {
  return ((a % b) + b) % b
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

const UNIX_EPOCH_JDN = 2440588

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Local Dates
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

function jdnOf(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAY_ABBREVIATIONS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const

/** Monday = 0 .. Sunday = 6 */
function weekdayToIndex(date: LocalDate): number {
  // JDN 0 is a Monday
  return mod(jdnOf(date), 7)
}

/** Monday = 1 .. Sunday = 7 */
export function isoWeekday(date: LocalDate): number {
  return weekdayToIndex(date) + 1
}

/** Sunday = 0 .. Saturday = 6, strftime's `%w` numbering */
export function sundayBasedWeekday(date: LocalDate): number {
  return mod(weekdayToIndex(date) + 1, 7)
}

/** English three-letter abbreviation, e.g. `Mon` */
export function weekdayAbbreviation(date: LocalDate): string {
  return WEEKDAY_ABBREVIATIONS[weekdayToIndex(date)] ?? 'Mon'
}

/**
 * ISO 8601 week-numbering year and week. Weeks start on Monday and week 1
 * is the one holding the year's first Thursday.
 */
export function isoWeekOf(date: LocalDate): IsoWeek {
  const thursday = jdnOf(date) - weekdayToIndex(date) + 3
  const year = jdnToDate(thursday).year
  const week = Math.floor((thursday - dateToJDN(year, 1, 1)) / 7) + 1
  return { year, week }
}

// ============================================================================
// Instants
// ============================================================================

export function makeInstant(epochMs: number, offsetMinutes = 0): Instant {
  return Object.freeze({ epochMs, offsetMinutes })
}

/** Build an instant from wall-clock fields observed at the given offset */
export function instantFromWallClock(clock: WallClock, offsetMinutes: number): Instant {
  const days = dateToJDN(clock.year, clock.month, clock.day) - UNIX_EPOCH_JDN
  const localMs =
    days * DAY +
    clock.hour * HOUR +
    clock.minute * MINUTE +
    clock.second * SECOND +
    clock.millisecond
  return makeInstant(localMs - offsetMinutes * MINUTE, offsetMinutes)
}

/** Instant from a JS Date, shown in UTC */
export function instantFromDate(date: Date): Instant {
  return makeInstant(date.getTime(), 0)
}

function localMsOf(instant: Instant): number {
  return instant.epochMs + instant.offsetMinutes * MINUTE
}

export function wallClock(instant: Instant): WallClock {
  const localMs = localMsOf(instant)
  const days = Math.floor(localMs / DAY)
  const { year, month, day } = jdnToDate(days + UNIX_EPOCH_JDN)
  let rest = localMs - days * DAY
  const hour = Math.floor(rest / HOUR)
  rest -= hour * HOUR
  const minute = Math.floor(rest / MINUTE)
  rest -= minute * MINUTE
  const second = Math.floor(rest / SECOND)
  return { year, month, day, hour, minute, second, millisecond: rest - second * SECOND }
}

export function localDateOf(instant: Instant): LocalDate {
  const { year, month, day } = wallClock(instant)
  return makeDate(year, month, day)
}

/** Time elapsed since local midnight of the instant's own calendar day */
export function sinceMidnight(instant: Instant): Duration {
  return makeDuration(mod(localMsOf(instant), DAY))
}

export function midnightOf(instant: Instant): Instant {
  return makeInstant(instant.epochMs - sinceMidnight(instant), instant.offsetMinutes)
}

export function addDuration(instant: Instant, d: Duration): Instant {
  return makeInstant(instant.epochMs + d, instant.offsetMinutes)
}

/** Same moment shown at another offset */
export function withOffset(instant: Instant, offsetMinutes: number): Instant {
  return makeInstant(instant.epochMs, offsetMinutes)
}

/** b - a */
export function diff(a: Instant, b: Instant): Duration {
  return makeDuration(b.epochMs - a.epochMs)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareInstants(a: Instant, b: Instant): number {
  if (a.epochMs < b.epochMs) return -1
  if (a.epochMs > b.epochMs) return 1
  return 0
}

/** True when both denote the same moment, whatever their offsets */
export function instantEquals(a: Instant, b: Instant): boolean {
  return a.epochMs === b.epochMs
}

export function laterOf(a: Instant, b: Instant): Instant {
  return compareInstants(a, b) >= 0 ? a : b
}

// ============================================================================
// Formatting
// ============================================================================

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+'
  const abs = Math.abs(offsetMinutes)
  return `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`
}

/** `YYYY-MM-DD HH:MM:SS±HH:MM`, with milliseconds only when present */
export function formatInstant(instant: Instant): string {
  const c = wallClock(instant)
  const fraction = c.millisecond === 0 ? '' : '.' + String(c.millisecond).padStart(3, '0')
  return (
    `${makeDate(c.year, c.month, c.day)} ` +
    `${pad2(c.hour)}:${pad2(c.minute)}:${pad2(c.second)}${fraction}` +
    formatOffset(instant.offsetMinutes)
  )
}

/** `H:MM:SS`, prefixed with `N day(s), ` once a full day is reached */
export function formatDuration(d: Duration): string {
  const sign = d < 0 ? '-' : ''
  let rest = Math.abs(d)
  const days = Math.floor(rest / DAY)
  rest -= days * DAY
  const h = Math.floor(rest / HOUR)
  rest -= h * HOUR
  const m = Math.floor(rest / MINUTE)
  rest -= m * MINUTE
  const s = Math.floor(rest / SECOND)
  const ms = rest - s * SECOND
  const fraction = ms === 0 ? '' : '.' + String(ms).padStart(3, '0')
  const clock = `${h}:${pad2(m)}:${pad2(s)}${fraction}`
  if (days === 0) return sign + clock
  return `${sign}${days} day${days === 1 ? '' : 's'}, ${clock}`
}
