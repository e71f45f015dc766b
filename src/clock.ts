/**
 * Clock
 *
 * Every component that needs "now" receives a Clock. Only systemClock reads
 * ambient time.
 */

import type { Instant } from './time-date'
import { instantFromDate } from './time-date'

export type Clock = {
  now(): Instant
}

export const systemClock: Clock = {
  now: () => instantFromDate(new Date()),
}

export function fixedClock(instant: Instant): Clock {
  return { now: () => instant }
}
