/**
 * Segment 04: Quantizer Tests
 *
 * Tests slot assignment on the local-midnight grid, resolution checks and
 * the canonical working set built by quantizeAll.
 */

import { describe, it, expect } from 'vitest'
import { DAY, SECOND, hours, minutes, makeDuration } from '../src/core'
import { instantFromWallClock, formatInstant } from '../src/time-date'
import {
  DEFAULT_RESOLUTION,
  assertResolution,
  quantize,
  quantizeAll,
  InvalidResolutionError,
} from '../src/quantize'
import { parseMany } from '../src/timestamp'

function at(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, offsetMinutes = 0) {
  return instantFromWallClock({ year, month, day, hour, minute, second, millisecond: 0 }, offsetMinutes)
}

// ============================================================================
// 1. SINGLE INSTANTS
// ============================================================================

describe('quantize', () => {
  it('defaults to quarter hours', () => {
    expect(DEFAULT_RESOLUTION).toBe(minutes(15))
    const slot = quantize(at(2020, 1, 1, 9, 10))
    expect(formatInstant(slot.start)).toBe('2020-01-01 09:00:00+00:00')
    expect(slot.duration).toBe(minutes(15))
  })

  it('a slot boundary starts its own slot', () => {
    expect(formatInstant(quantize(at(2020, 1, 1, 9, 15)).start)).toBe('2020-01-01 09:15:00+00:00')
  })

  it('the last second of a slot stays in it', () => {
    expect(formatInstant(quantize(at(2020, 1, 1, 9, 14, 59)).start)).toBe(
      '2020-01-01 09:00:00+00:00'
    )
  })

  it('keeps the instant offset', () => {
    const slot = quantize(at(2020, 6, 1, 14, 37, 0, 120))
    expect(formatInstant(slot.start)).toBe('2020-06-01 14:30:00+02:00')
  })

  it('anchors the grid at local midnight, not UTC midnight', () => {
    const slot = quantize(at(2020, 6, 1, 10, 7, 0, 330), hours(1))
    expect(formatInstant(slot.start)).toBe('2020-06-01 10:00:00+05:30')
    expect(slot.start.epochMs).toBe(Date.UTC(2020, 5, 1, 4, 30))
  })

  it('supports coarse grids', () => {
    const slot = quantize(at(2020, 6, 1, 23, 59), hours(12))
    expect(formatInstant(slot.start)).toBe('2020-06-01 12:00:00+00:00')
    expect(formatInstant(slot.end)).toBe('2020-06-02 00:00:00+00:00')
  })
})

// ============================================================================
// 2. RESOLUTION CHECKS
// ============================================================================

describe('assertResolution', () => {
  it('accepts divisors of a day', () => {
    expect(() => assertResolution(minutes(90))).not.toThrow()
    expect(() => assertResolution(SECOND)).not.toThrow()
  })

  it.each([
    ['zero', makeDuration(0)],
    ['negative', minutes(-15)],
    ['a full day', DAY],
    ['more than a day', hours(25)],
  ])('rejects %s', (_label, resolution) => {
    expect(() => assertResolution(resolution)).toThrow(InvalidResolutionError)
  })

  it('rejects sizes that do not divide a day', () => {
    expect(() => assertResolution(minutes(7))).toThrow(
      'Resolution must divide one day evenly, got 420000ms'
    )
  })

  it('quantize checks its resolution', () => {
    expect(() => quantize(at(2020, 1, 1), minutes(7))).toThrow(InvalidResolutionError)
  })
})

// ============================================================================
// 3. WORKING SET
// ============================================================================

describe('quantizeAll', () => {
  it('collapses timestamps in one slot into a single period', () => {
    const instants = parseMany([
      '2020-01-01T09:00:00+00:00',
      '2020-01-01T09:10:00+00:00',
      '2020-01-01T09:05:00+00:00',
    ])
    const slots = quantizeAll(instants)
    expect(slots).toHaveLength(1)
    expect(slots[0]!.toString()).toBe(
      '[2020-01-01 09:00:00+00:00] to [2020-01-01 09:15:00+00:00] (0:15:00)'
    )
  })

  it('sorts slots by start', () => {
    const slots = quantizeAll([at(2020, 1, 2, 8), at(2020, 1, 1, 9), at(2020, 1, 1, 8, 50)])
    expect(slots.map((s) => formatInstant(s.start))).toEqual([
      '2020-01-01 08:45:00+00:00',
      '2020-01-01 09:00:00+00:00',
      '2020-01-02 08:00:00+00:00',
    ])
  })

  it('one moment seen at two offsets is one slot', () => {
    const slots = quantizeAll([at(2020, 1, 1, 9, 5), at(2020, 1, 1, 10, 5, 0, 60)])
    expect(slots).toHaveLength(1)
    expect(slots[0]!.offsetMinutes).toBe(0)
  })

  it('is empty for no instants', () => {
    expect(quantizeAll([])).toEqual([])
  })
})
