/**
 * Period Merger
 *
 * Folds a start-ordered run of periods into maximal contiguous periods. Two
 * periods join when the gap between them is at most `maxGap`; a negative
 * `maxGap` demands an overlap of more than its magnitude.
 */

import type { Duration } from './core'
import { MILLISECOND, ZERO, makeDuration } from './core'
import { addDuration, compareInstants, laterOf } from './time-date'
import { Period, compareByStart } from './period'

/**
 * Streaming merge. Input must already be sorted by start; nothing is
 * re-sorted here.
 */
export function* mergeSorted(
  periods: Iterable<Period>,
  maxGap: Duration = ZERO
): Generator<Period, void, undefined> {
  let current: Period | undefined
  for (const next of periods) {
    if (current === undefined) {
      current = next
      continue
    }
    const [first, second]: [Period, Period] =
      compareInstants(next.start, current.start) < 0 ? [next, current] : [current, next]
    if (compareInstants(addDuration(first.end, maxGap), second.start) >= 0) {
      current = first.replace({ end: laterOf(first.end, second.end) })
    } else {
      yield current
      current = next
    }
  }
  if (current !== undefined) yield current
}

/** Sorts a copy of the input by start, then merges it */
export function mergePeriods(periods: Iterable<Period>, maxGap: Duration = ZERO): Period[] {
  return [...mergeSorted([...periods].sort(compareByStart), maxGap)]
}

/**
 * Largest gap that still joins grid slots into one session: just under two
 * slots, so a single empty slot is bridged and two are not.
 */
export function sessionGap(resolution: Duration): Duration {
  return makeDuration(2 * resolution - MILLISECOND)
}
