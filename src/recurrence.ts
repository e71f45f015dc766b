/**
 * Recurrence Calculator
 *
 * Converts a frequency code + interval + anchor instant into the next
 * occurrence instant. DAY and WEEK are fixed-length; MONTH and YEAR follow the
 * calendar with end-of-month clamping. Failures are returned, never thrown, so
 * a scan can skip one bad reminder and carry on with the rest.
 */

import type { Result } from './result'
import { Ok, Err } from './result'
import { InvalidFrequencyError, InvalidIntervalError } from './errors'
import type { Instant } from './time-date'
import {
  MAX_INSTANT, addDays, addWeeks, addMonths, addYears, epochSecondsOf, yearOf, monthOf,
} from './time-date'

export { InvalidFrequencyError, InvalidIntervalError } from './errors'

// ============================================================================
// Frequency Codes
// ============================================================================

/** Stored integer codes, as accepted by the creation request. */
export const RecurrenceFrequency = {
  DAY: 1,
  WEEK: 2,
  MONTH: 3,
  YEAR: 4,
} as const

export type RecurrenceFrequency = (typeof RecurrenceFrequency)[keyof typeof RecurrenceFrequency]

export type FrequencyName = keyof typeof RecurrenceFrequency

export type RecurrenceError = InvalidFrequencyError | InvalidIntervalError

const ADVANCE: Record<RecurrenceFrequency, (instant: Instant, n: number) => Instant> = {
  [RecurrenceFrequency.DAY]: addDays,
  [RecurrenceFrequency.WEEK]: addWeeks,
  [RecurrenceFrequency.MONTH]: addMonths,
  [RecurrenceFrequency.YEAR]: addYears,
}

export function isRecurrenceFrequency(code: number): code is RecurrenceFrequency {
  return code === 1 || code === 2 || code === 3 || code === 4
}

const SECONDS_PER_DAY = 86400

// Checked on numbers: an advanced instant past year 9999 has no four-digit form.
function exceedsMaxInstant(frequency: RecurrenceFrequency, interval: number, last: Instant): boolean {
  switch (frequency) {
    case RecurrenceFrequency.DAY:
      return epochSecondsOf(last) + interval * SECONDS_PER_DAY > epochSecondsOf(MAX_INSTANT)
    case RecurrenceFrequency.WEEK:
      return epochSecondsOf(last) + interval * 7 * SECONDS_PER_DAY > epochSecondsOf(MAX_INSTANT)
    case RecurrenceFrequency.MONTH:
      return yearOf(last) + Math.floor((monthOf(last) - 1 + interval) / 12) > yearOf(MAX_INSTANT)
    case RecurrenceFrequency.YEAR:
      return yearOf(last) + interval > yearOf(MAX_INSTANT)
  }
}

export function frequencyName(code: RecurrenceFrequency): FrequencyName {
  switch (code) {
    case RecurrenceFrequency.DAY: return 'DAY'
    case RecurrenceFrequency.WEEK: return 'WEEK'
    case RecurrenceFrequency.MONTH: return 'MONTH'
    case RecurrenceFrequency.YEAR: return 'YEAR'
  }
}

// ============================================================================
// Calculation
// ============================================================================

/**
 * `last + interval × unit`.
 *
 * @param frequency - stored frequency code (1 = DAY, 2 = WEEK, 3 = MONTH, 4 = YEAR)
 * @param interval - positive integer multiplier
 * @param last - most recent occurrence, or the reminder's base timestamp if none exists
 */
export function nextOccurrence(
  frequency: number,
  interval: number,
  last: Instant,
): Result<Instant, RecurrenceError> {
  if (!isRecurrenceFrequency(frequency)) {
    return Err(new InvalidFrequencyError(`Invalid frequency provided: ${frequency}`))
  }
  if (!Number.isInteger(interval) || interval <= 0) {
    return Err(new InvalidIntervalError(`Recurrence interval must be a positive integer, got ${interval}`))
  }
  if (exceedsMaxInstant(frequency, interval, last)) {
    return Err(new InvalidIntervalError(
      `Next occurrence after ${last} every ${interval} ${frequencyName(frequency)} is beyond ${MAX_INSTANT}`,
    ))
  }
  return Ok(ADVANCE[frequency](last, interval))
}
