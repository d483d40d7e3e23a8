/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Tests the foundational time and date utilities module.
 * These are pure functions with no external dependencies.
 */

import { describe, it, expect } from 'vitest'
import { DAY, hours, minutes, makeDuration, toHours } from '../src/core'
import {
  isLeapYear,
  daysInMonth,
  makeDate,
  isoWeekday,
  sundayBasedWeekday,
  weekdayAbbreviation,
  isoWeekOf,
  makeInstant,
  instantFromWallClock,
  wallClock,
  localDateOf,
  sinceMidnight,
  midnightOf,
  addDuration,
  withOffset,
  diff,
  compareInstants,
  instantEquals,
  laterOf,
  formatOffset,
  formatInstant,
  formatDuration,
  type LocalDate,
} from '../src/time-date'

function at(year: number, month: number, day: number, hour = 0, minute = 0, offsetMinutes = 0) {
  return instantFromWallClock({ year, month, day, hour, minute, second: 0, millisecond: 0 }, offsetMinutes)
}

// ============================================================================
// 1. CALENDAR HELPERS
// ============================================================================

describe('Calendar helpers', () => {
  it('knows leap years', () => {
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(2023)).toBe(false)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
  })

  it('knows month lengths', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(2024, 4)).toBe(30)
    expect(daysInMonth(2024, 12)).toBe(31)
  })

  it('pads dates', () => {
    expect(makeDate(2024, 3, 5)).toBe('2024-03-05')
  })
})

// ============================================================================
// 2. WEEKDAYS & ISO WEEKS
// ============================================================================

describe('Weekdays', () => {
  it('isoWeekday numbers Monday 1 to Sunday 7', () => {
    expect(isoWeekday('2024-03-18' as LocalDate)).toBe(1)
    expect(isoWeekday('2024-03-17' as LocalDate)).toBe(7)
  })

  it('sundayBasedWeekday numbers Sunday 0 to Saturday 6', () => {
    expect(sundayBasedWeekday('2024-03-17' as LocalDate)).toBe(0)
    expect(sundayBasedWeekday('2024-03-18' as LocalDate)).toBe(1)
    expect(sundayBasedWeekday('2024-03-23' as LocalDate)).toBe(6)
  })

  it('weekdayAbbreviation', () => {
    expect(weekdayAbbreviation('2020-01-01' as LocalDate)).toBe('Wed')
    expect(weekdayAbbreviation('2024-03-17' as LocalDate)).toBe('Sun')
  })
})

describe('isoWeekOf', () => {
  it('week 1 holds the first Thursday', () => {
    expect(isoWeekOf('2020-01-01' as LocalDate)).toEqual({ year: 2020, week: 1 })
    expect(isoWeekOf('2019-12-30' as LocalDate)).toEqual({ year: 2020, week: 1 })
  })

  it('early January can belong to the previous year', () => {
    expect(isoWeekOf('2021-01-03' as LocalDate)).toEqual({ year: 2020, week: 53 })
    expect(isoWeekOf('2021-01-04' as LocalDate)).toEqual({ year: 2021, week: 1 })
  })

  it('mid-year week', () => {
    expect(isoWeekOf('2020-01-06' as LocalDate)).toEqual({ year: 2020, week: 2 })
    expect(isoWeekOf('2020-12-31' as LocalDate)).toEqual({ year: 2020, week: 53 })
  })
})

// ============================================================================
// 3. INSTANTS
// ============================================================================

describe('Instants', () => {
  it('builds from wall clock in UTC', () => {
    expect(at(2020, 1, 1, 9).epochMs).toBe(Date.UTC(2020, 0, 1, 9))
  })

  it('applies the offset when building from wall clock', () => {
    const t = at(2020, 6, 1, 14, 30, 120)
    expect(t.epochMs).toBe(Date.UTC(2020, 5, 1, 12, 30))
    expect(t.offsetMinutes).toBe(120)
  })

  it('reads the local wall clock back', () => {
    expect(wallClock(makeInstant(Date.UTC(2020, 0, 1, 23, 30), 60))).toEqual({
      year: 2020, month: 1, day: 2, hour: 0, minute: 30, second: 0, millisecond: 0,
    })
  })

  it('handles instants before 1970', () => {
    expect(wallClock(makeInstant(Date.UTC(1969, 11, 31, 23, 59, 59, 500)))).toEqual({
      year: 1969, month: 12, day: 31, hour: 23, minute: 59, second: 59, millisecond: 500,
    })
  })

  it('local date follows the offset', () => {
    const t = makeInstant(Date.UTC(2020, 0, 1, 23, 30), 60)
    expect(localDateOf(t)).toBe('2020-01-02')
    expect(localDateOf(withOffset(t, 0))).toBe('2020-01-01')
  })

  it('measures time since local midnight', () => {
    expect(sinceMidnight(at(2020, 6, 1, 14, 30, 120))).toBe(hours(14.5))
  })

  it('midnight keeps the offset', () => {
    const midnight = midnightOf(at(2020, 6, 1, 14, 30, 120))
    expect(midnight.epochMs).toBe(Date.UTC(2020, 4, 31, 22))
    expect(midnight.offsetMinutes).toBe(120)
  })

  it('adds durations and measures differences', () => {
    const t = at(2020, 1, 1, 9)
    const later = addDuration(t, minutes(90))
    expect(diff(t, later)).toBe(minutes(90))
    expect(later.offsetMinutes).toBe(0)
  })

  it('compares moments regardless of offset', () => {
    const a = makeInstant(1000, 0)
    const b = makeInstant(1000, 60)
    expect(instantEquals(a, b)).toBe(true)
    expect(compareInstants(a, b)).toBe(0)
    expect(compareInstants(a, makeInstant(2000))).toBe(-1)
    expect(compareInstants(makeInstant(2000), a)).toBe(1)
    expect(laterOf(a, makeInstant(2000)).epochMs).toBe(2000)
  })

  it('instants are frozen', () => {
    expect(Object.isFrozen(makeInstant(0))).toBe(true)
  })
})

// ============================================================================
// 4. FORMATTING
// ============================================================================

describe('Formatting', () => {
  it('formatOffset', () => {
    expect(formatOffset(0)).toBe('+00:00')
    expect(formatOffset(120)).toBe('+02:00')
    expect(formatOffset(-330)).toBe('-05:30')
  })

  it('formatInstant shows local wall clock and offset', () => {
    expect(formatInstant(at(2020, 1, 1, 9))).toBe('2020-01-01 09:00:00+00:00')
    expect(formatInstant(at(2020, 6, 1, 14, 30, 120))).toBe('2020-06-01 14:30:00+02:00')
  })

  it('formatInstant shows milliseconds only when present', () => {
    expect(formatInstant(makeInstant(Date.UTC(2020, 0, 1, 9, 0, 0, 5)))).toBe(
      '2020-01-01 09:00:00.005+00:00'
    )
  })

  it('formatDuration', () => {
    expect(formatDuration(minutes(15))).toBe('0:15:00')
    expect(formatDuration(hours(2))).toBe('2:00:00')
    expect(formatDuration(makeDuration(DAY + hours(1)))).toBe('1 day, 1:00:00')
    expect(formatDuration(makeDuration(2 * DAY))).toBe('2 days, 0:00:00')
    expect(formatDuration(makeDuration(1500))).toBe('0:00:01.500')
    expect(formatDuration(minutes(-15))).toBe('-0:15:00')
  })

  it('toHours', () => {
    expect(toHours(minutes(15))).toBe(0.25)
    expect(toHours(minutes(90))).toBe(1.5)
  })
})
