/**
 * Core Branded Types
 *
 * Durations are plain millisecond counts behind a brand so they cannot be
 * mixed up with epoch values or hour totals.
 */

export type { Instant, LocalDate } from './time-date'

declare const __duration: unique symbol
export type Duration = number & { readonly [__duration]: true }

export function makeDuration(ms: number): Duration {
  return ms as Duration
}

export const ZERO = makeDuration(0)
export const MILLISECOND = makeDuration(1)
export const SECOND = makeDuration(1000)
export const MINUTE = makeDuration(60 * 1000)
export const HOUR = makeDuration(60 * 60 * 1000)
export const DAY = makeDuration(24 * 60 * 60 * 1000)

export function minutes(n: number): Duration {
  return makeDuration(n * MINUTE)
}

export function hours(n: number): Duration {
  return makeDuration(n * HOUR)
}

/** Duration as a fractional number of hours, unrounded */
export function toHours(d: Duration): number {
  return d / HOUR
}
