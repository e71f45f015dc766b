/**
 * Due Occurrence Scanner
 *
 * Finds the reminders that owe a new occurrence and, separately, materializes
 * those occurrences. Computing is side-effect free, so a failed scan can be
 * rerun from scratch; once an occurrence is created it becomes the reminder's
 * latest, and the next computation moves past it.
 */

import createDebug from 'debug'
import type { Adapter, ReminderWithLastOccurrence } from './adapter'
import type { Clock } from './clock'
import type { Instant } from './time-date'
import { instantAfter, instantBefore } from './time-date'
import type { ReminderError } from './errors'
import { InvalidDataError } from './errors'
import type { Result } from './result'
import { Ok, Err } from './result'
import { isRecurrenceFrequency, frequencyName, nextOccurrence } from './recurrence'
import type { Reminder } from './reminders'
import { toReminder } from './reminders'
import type { Occurrence } from './occurrences'
import { createOccurrence } from './occurrences'

const debug = createDebug('reminders:scanner')

// ============================================================================
// Types
// ============================================================================

export type SkippedReminder = {
  reminderId: string
  error: ReminderError
}

export type ScanResult = {
  /** Reminder id → timestamp of the occurrence it owes */
  due: Map<string, Instant>
  skipped: SkippedReminder[]
}

export type MaterializeReport = {
  created: Occurrence[]
  /** Reminders whose due occurrence was already written by another scanner */
  duplicates: { reminderId: string; timestamp: Instant }[]
  skipped: SkippedReminder[]
}

// ============================================================================
// Candidate Computation
// ============================================================================

/**
 * The occurrence a reminder owes next, whether or not it is due yet.
 * `null` when a one-off reminder has already fired.
 */
export function candidateTimestamp(
  reminder: Reminder,
  lastOccurrenceAt: Instant | null
): Result<Instant | null, ReminderError> {
  if (lastOccurrenceAt === null) return Ok(reminder.timestamp)
  if (!reminder.isRecurring) return Ok(null)

  const { frequency, interval } = reminder.recurrence
  return nextOccurrence(frequency, interval, lastOccurrenceAt)
}

type DueReminder = {
  reminder: Reminder
  timestamp: Instant
}

function evaluate(
  entry: ReminderWithLastOccurrence,
  now: Instant
): Result<DueReminder | null, ReminderError> {
  const reminder = toReminder(entry.reminder)
  if (!reminder.ok) return reminder

  const candidate = candidateTimestamp(reminder.value, entry.lastOccurrenceAt)
  if (!candidate.ok) return candidate

  const timestamp = candidate.value
  if (timestamp === null || instantAfter(timestamp, now)) return Ok(null)
  if (instantBefore(timestamp, reminder.value.timestamp)) {
    return Err(new InvalidDataError(
      `Reminder '${reminder.value.id}' has an occurrence before its base timestamp '${reminder.value.timestamp}'`
    ))
  }
  return Ok({ reminder: reminder.value, timestamp })
}

function describeRecurrence(reminder: Reminder): string {
  if (!reminder.isRecurring) return 'one-off'
  const { frequency, interval } = reminder.recurrence
  return isRecurrenceFrequency(frequency) ? `every ${interval} ${frequencyName(frequency)}` : `frequency ${frequency}`
}

async function evaluateAll(
  adapter: Adapter,
  clock: Clock
): Promise<{ due: DueReminder[]; skipped: SkippedReminder[] }> {
  const now = clock.now()
  const entries = await adapter.getRemindersWithLastOccurrence()
  const due: DueReminder[] = []
  const skipped: SkippedReminder[] = []

  for (const entry of entries) {
    const result = evaluate(entry, now)
    if (!result.ok) {
      debug('Skipping reminder %s: %s', entry.reminder.id, result.error.message)
      skipped.push({ reminderId: entry.reminder.id, error: result.error })
      continue
    }
    if (result.value !== null) {
      debug('Reminder %s (%s) due at %s', entry.reminder.id, describeRecurrence(result.value.reminder), result.value.timestamp)
      due.push(result.value)
    }
  }

  debug('Scan at %s: %d of %d reminder(s) due, %d skipped', now, due.length, entries.length, skipped.length)
  return { due, skipped }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Evaluate every reminder against `clock.now()`. A reminder that cannot be
 * evaluated (bad stored data, unknown frequency, non-positive interval) is
 * reported in `skipped` and the scan carries on. Storage failures propagate.
 */
export async function scanReminders(adapter: Adapter, clock: Clock): Promise<ScanResult> {
  const { due, skipped } = await evaluateAll(adapter, clock)
  const timestamps = new Map<string, Instant>()
  for (const d of due) timestamps.set(d.reminder.id, d.timestamp)
  return { due: timestamps, skipped }
}

export async function computeNextOccurrenceTimestamps(
  adapter: Adapter,
  clock: Clock
): Promise<Map<string, Instant>> {
  const { due } = await scanReminders(adapter, clock)
  return due
}

/** Create one occurrence per due reminder. */
export async function materializeDueOccurrences(adapter: Adapter, clock: Clock): Promise<MaterializeReport> {
  const { due, skipped } = await evaluateAll(adapter, clock)
  const report: MaterializeReport = { created: [], duplicates: [], skipped }

  for (const { reminder, timestamp } of due) {
    const result = await createOccurrence(adapter, reminder, timestamp)
    if (result.created) report.created.push(result.occurrence)
    else report.duplicates.push({ reminderId: result.reminderId, timestamp: result.timestamp })
  }

  debug('Materialized %d occurrence(s), %d already present', report.created.length, report.duplicates.length)
  return report
}
