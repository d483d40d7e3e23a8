/**
 * Period
 *
 * An immutable span of time, `start + duration = end`. Instances are frozen
 * at construction; every change goes through `replace`, which re-runs the
 * same validation.
 */

import type { Duration } from './core'
import { ZERO, toHours } from './core'
import type { Instant, LocalDate } from './time-date'
import {
  addDuration,
  compareInstants,
  diff,
  formatDuration,
  formatInstant,
  instantEquals,
  localDateOf,
  wallClock,
  withOffset,
} from './time-date'

export { InvalidPeriodError } from './errors'
import { InvalidPeriodError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Exactly one of `duration` and `end` may be left out */
export type PeriodInit = {
  start: Instant
  duration?: Duration
  end?: Instant
}

export type PeriodChanges = Partial<PeriodInit>

// ============================================================================
// Period
// ============================================================================

export class Period {
  readonly start: Instant
  readonly duration: Duration

  private constructor(start: Instant, duration: Duration) {
    this.start = start
    this.duration = duration
    Object.freeze(this)
  }

  static of(init: PeriodInit): Period {
    const { start, duration, end } = init
    if (duration !== undefined && duration < ZERO) {
      throw new InvalidPeriodError(`Duration must not be negative: ${formatDuration(duration)}`)
    }
    if (end !== undefined && compareInstants(end, start) < 0) {
      throw new InvalidPeriodError(
        `End must not precede start: ${formatInstant(end)} < ${formatInstant(start)}`
      )
    }
    if (duration === undefined) {
      if (end === undefined) throw new InvalidPeriodError('Must provide end or duration')
      return new Period(start, diff(start, end))
    }
    if (end !== undefined && !instantEquals(addDuration(start, duration), end)) {
      throw new InvalidPeriodError('Duration must match end - start')
    }
    return new Period(start, duration)
  }

  get end(): Instant {
    return addDuration(this.start, this.duration)
  }

  /** Duration in fractional hours */
  get hours(): number {
    return toHours(this.duration)
  }

  get date(): LocalDate {
    return localDateOf(this.start)
  }

  get year(): number {
    return wallClock(this.start).year
  }

  get month(): number {
    return wallClock(this.start).month
  }

  get day(): number {
    return wallClock(this.start).day
  }

  get hour(): number {
    return wallClock(this.start).hour
  }

  get minute(): number {
    return wallClock(this.start).minute
  }

  get second(): number {
    return wallClock(this.start).second
  }

  get offsetMinutes(): number {
    return this.start.offsetMinutes
  }

  /** Hash key; equal periods share it */
  get key(): string {
    return `${this.start.epochMs}+${this.duration}`
  }

  /**
   * New period with some bounds changed. An unset start keeps this start;
   * when neither duration nor end is given, this duration is kept.
   */
  replace(changes: PeriodChanges): Period {
    const start = changes.start ?? this.start
    if (changes.duration === undefined && changes.end === undefined) {
      return Period.of({ start, duration: this.duration })
    }
    return Period.of({ start, duration: changes.duration, end: changes.end })
  }

  /** Same span, shown at another UTC offset */
  withOffset(offsetMinutes: number): Period {
    return this.replace({ start: withOffset(this.start, offsetMinutes) })
  }

  equals(other: Period): boolean {
    return instantEquals(this.start, other.start) && this.duration === other.duration
  }

  toString(): string {
    return `[${formatInstant(this.start)}] to [${formatInstant(this.end)}] (${formatDuration(this.duration)})`
  }
}

// ============================================================================
// Ordering & Deduplication
// ============================================================================

export function compareByStart(a: Period, b: Period): number {
  return compareInstants(a.start, b.start)
}

export function compareByDuration(a: Period, b: Period): number {
  return a.duration - b.duration
}

/** Drop repeated periods, keeping the first of each */
export function uniquePeriods(periods: Iterable<Period>): Period[] {
  const seen = new Map<string, Period>()
  for (const p of periods) {
    if (!seen.has(p.key)) seen.set(p.key, p)
  }
  return [...seen.values()]
}
