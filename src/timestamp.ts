/**
 * Timestamp Parsing
 *
 * Accepts exactly one textual form, `YYYY-MM-DDTHH:MM:SS±HHMM`. The common
 * `±HH:MM` offset spelling is folded into it first by dropping the offset colon,
 * but only where it cannot be mistaken for anything else.
 */

import { Result, Ok, Err } from './result'
import { daysInMonth, instantFromWallClock, type Instant } from './time-date'

export { ParseError } from './errors'
import { ParseError } from './errors'

// Matches the offset colon only after a full date-time and sign-hours prefix,
// and only when exactly two minute digits follow.
const OFFSET_COLON = /(?<=\b\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}[-+]\d{2}):(?=\d{2}\b)/

const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})([-+])(\d{2})(\d{2})$/

export function normalizeOffset(str: string): string {
  return str.replace(OFFSET_COLON, '')
}

export function parseTimestamp(str: string): Result<Instant, ParseError> {
  const match = TIMESTAMP.exec(normalizeOffset(str))
  if (!match) return Err(new ParseError(`Invalid timestamp format: '${str}'`))

  const year = parseInt(match[1]!, 10)
  const month = parseInt(match[2]!, 10)
  const day = parseInt(match[3]!, 10)
  const hour = parseInt(match[4]!, 10)
  const minute = parseInt(match[5]!, 10)
  const second = parseInt(match[6]!, 10)
  const sign = match[7] === '-' ? -1 : 1
  const offsetHours = parseInt(match[8]!, 10)
  const offsetMins = parseInt(match[9]!, 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in timestamp: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in timestamp: '${str}'`))
  if (hour > 23 || minute > 59 || second > 59)
    return Err(new ParseError(`Invalid time in timestamp: '${str}'`))
  if (offsetHours > 23 || offsetMins > 59)
    return Err(new ParseError(`Invalid UTC offset in timestamp: '${str}'`))

  const offsetMinutes = sign * (offsetHours * 60 + offsetMins)
  return Ok(
    instantFromWallClock({ year, month, day, hour, minute, second, millisecond: 0 }, offsetMinutes)
  )
}

/**
 * Lazily parse one timestamp per line, in input order.
 * Throws the ParseError of the first line that does not parse; blank lines
 * count as bad lines.
 */
export function* parseMany(lines: Iterable<string>): Generator<Instant, void, undefined> {
  let lineNo = 0
  for (const line of lines) {
    lineNo++
    const result = parseTimestamp(line)
    if (!result.ok) {
      throw new ParseError(`Line ${lineNo}: ${result.error.message}`)
    }
    yield result.value
  }
}
