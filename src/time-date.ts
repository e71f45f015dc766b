/**
 * Time & Date Utilities
 *
 * Pure functions for instant parsing, formatting and arithmetic.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Everything is UTC; there is a single calendar and no timezone conversion.
 */

import type { Result } from './result'
import { Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __instant: unique symbol

/**
 * UTC instant, canonical form `YYYY-MM-DDTHH:MM:SSZ`.
 * Fixed width, so string order is chronological order.
 */
export type Instant = string & { readonly [__instant]: true }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const SECONDS_PER_DAY = 86400
const UNIX_EPOCH_JDN = 2440588

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

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
// Construction
// ============================================================================

export function makeInstant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): Instant {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}T${pad2(hour)}:${pad2(minute)}:${pad2(second)}Z` as Instant
}

export function instantFromEpochSeconds(seconds: number): Instant {
  const days = Math.floor(seconds / SECONDS_PER_DAY)
  const rem = seconds - days * SECONDS_PER_DAY
  const { year, month, day } = jdnToDate(days + UNIX_EPOCH_JDN)
  return makeInstant(year, month, day, Math.floor(rem / 3600), Math.floor((rem % 3600) / 60), rem % 60)
}

export function instantFromDate(date: Date): Instant {
  return instantFromEpochSeconds(Math.floor(date.getTime() / 1000))
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(instant: Instant): number {
  return parseInt(instant.substring(0, 4), 10)
}

export function monthOf(instant: Instant): number {
  return parseInt(instant.substring(5, 7), 10)
}

export function dayOf(instant: Instant): number {
  return parseInt(instant.substring(8, 10), 10)
}

export function hourOf(instant: Instant): number {
  return parseInt(instant.substring(11, 13), 10)
}

export function minuteOf(instant: Instant): number {
  return parseInt(instant.substring(14, 16), 10)
}

export function secondOf(instant: Instant): number {
  return parseInt(instant.substring(17, 19), 10)
}

export function epochSecondsOf(instant: Instant): number {
  const days = dateToJDN(yearOf(instant), monthOf(instant), dayOf(instant)) - UNIX_EPOCH_JDN
  return days * SECONDS_PER_DAY + hourOf(instant) * 3600 + minuteOf(instant) * 60 + secondOf(instant)
}

// ============================================================================
// Parsing
// ============================================================================

const MIN_EPOCH_SECONDS = epochSecondsOf(makeInstant(0, 1, 1))
/** Latest representable instant. */
export const MAX_INSTANT = makeInstant(9999, 12, 31, 23, 59, 59)

const MAX_EPOCH_SECONDS = epochSecondsOf(MAX_INSTANT)

const INSTANT_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/

/**
 * Parse an ISO-8601 instant. An offset is required (`Z` or `±HH:MM`);
 * fractional seconds are accepted and truncated.
 */
export function parseInstant(str: string): Result<Instant, ParseError> {
  const match = INSTANT_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid instant format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)
  const hour = parseInt(match[4] ?? '', 10)
  const minute = parseInt(match[5] ?? '', 10)
  const second = match[6] ? parseInt(match[6], 10) : 0

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in instant: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in instant: '${str}'`))
  if (hour > 23 || minute > 59 || second > 59)
    return Err(new ParseError(`Invalid time in instant: '${str}'`))

  let offsetMinutes = 0
  if (!match[7]) {
    const offsetHours = parseInt(match[9] ?? '', 10)
    const offsetMins = parseInt(match[10] ?? '', 10)
    if (offsetHours > 23 || offsetMins > 59)
      return Err(new ParseError(`Invalid offset in instant: '${str}'`))
    offsetMinutes = (offsetHours * 60 + offsetMins) * (match[8] === '-' ? -1 : 1)
  }

  const local = makeInstant(year, month, day, hour, minute, second)
  const seconds = epochSecondsOf(local) - offsetMinutes * 60
  if (seconds < MIN_EPOCH_SECONDS || seconds > MAX_EPOCH_SECONDS)
    return Err(new ParseError(`Instant out of range: '${str}'`))

  return Ok(instantFromEpochSeconds(seconds))
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Fixed 24-hour days. */
export function addDays(instant: Instant, n: number): Instant {
  return instantFromEpochSeconds(epochSecondsOf(instant) + n * SECONDS_PER_DAY)
}

export function addWeeks(instant: Instant, n: number): Instant {
  return addDays(instant, n * 7)
}

export function addSeconds(instant: Instant, n: number): Instant {
  return instantFromEpochSeconds(epochSecondsOf(instant) + n)
}

/**
 * Calendar months. The day of month is clamped to the last day of the target
 * month (Jan 31 + 1 month lands on Feb 28/29, never in March).
 */
export function addMonths(instant: Instant, n: number): Instant {
  const total = yearOf(instant) * 12 + (monthOf(instant) - 1) + n
  const year = Math.floor(total / 12)
  const month = total - year * 12 + 1
  const day = Math.min(dayOf(instant), daysInMonth(year, month))
  return makeInstant(year, month, day, hourOf(instant), minuteOf(instant), secondOf(instant))
}

export function addYears(instant: Instant, n: number): Instant {
  return addMonths(instant, n * 12)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareInstants(a: Instant, b: Instant): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function instantBefore(a: Instant, b: Instant): boolean {
  return a < b
}

export function instantAfter(a: Instant, b: Instant): boolean {
  return a > b
}
