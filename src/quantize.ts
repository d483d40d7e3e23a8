/**
 * Quantizer
 *
 * Snaps instants onto a fixed grid of slots anchored at local midnight.
 */

import type { Duration } from './core'
import { DAY, ZERO, minutes, makeDuration } from './core'
import type { Instant } from './time-date'
import { addDuration, sinceMidnight } from './time-date'
import { Period, compareByStart, uniquePeriods } from './period'

export { InvalidResolutionError } from './errors'
import { InvalidResolutionError } from './errors'

export const DEFAULT_RESOLUTION = minutes(15)

export function assertResolution(resolution: Duration): void {
  if (!(resolution > ZERO && resolution < DAY)) {
    throw new InvalidResolutionError(`Resolution must be within (0, 1 day), got ${resolution}ms`)
  }
  if (DAY % resolution !== 0) {
    throw new InvalidResolutionError(`Resolution must divide one day evenly, got ${resolution}ms`)
  }
}

/** The grid slot `[start, start + resolution)` holding the instant */
export function quantize(instant: Instant, resolution: Duration = DEFAULT_RESOLUTION): Period {
  assertResolution(resolution)
  const intoSlot = makeDuration(sinceMidnight(instant) % resolution)
  const start = addDuration(instant, makeDuration(-intoSlot))
  return Period.of({ start, duration: resolution })
}

/**
 * Quantize every instant, collapse those landing in the same slot and sort
 * by start. The result is the working set every statistic reads.
 */
export function quantizeAll(
  instants: Iterable<Instant>,
  resolution: Duration = DEFAULT_RESOLUTION
): Period[] {
  const slots: Period[] = []
  for (const instant of instants) {
    slots.push(quantize(instant, resolution))
  }
  return uniquePeriods(slots).sort(compareByStart)
}
