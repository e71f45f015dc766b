/**
 * Occurrences Module
 *
 * Occurrence lifecycle (created → notified → acknowledged) and the
 * due-before-cutoff queries.
 *
 * "Due" means timestamp strictly before the cutoff. Acknowledgment and
 * notification state are separate filters, and each query names the ones it
 * applies.
 */

import { randomUUID } from 'node:crypto'
import createDebug from 'debug'
import type { Adapter, OccurrenceQuery, OccurrenceRow } from './adapter'
import type { Instant } from './time-date'
import { instantBefore } from './time-date'
import type { Result } from './result'
import { Ok, Err } from './result'
import { DuplicateKeyError, InvalidDataError, ValidationError } from './errors'
import type { Reminder } from './reminders'
import { toReminder } from './reminders'

const debug = createDebug('reminders:occurrences')

// ============================================================================
// Types
// ============================================================================

export type Occurrence = {
  id: string
  reminder: Reminder
  timestamp: Instant
  isAcknowledged: boolean
  isNotificationSent: boolean
}

export type CreateOccurrenceResult =
  | { created: true; occurrence: Occurrence }
  | { created: false; reminderId: string; timestamp: Instant }

// ============================================================================
// Hydration
// ============================================================================

export function toOccurrence(row: OccurrenceRow): Result<Occurrence, InvalidDataError> {
  const reminder = toReminder(row.reminder)
  if (!reminder.ok) return reminder

  if (row.occurrence.reminderId !== reminder.value.id) {
    return Err(new InvalidDataError(
      `Occurrence '${row.occurrence.id}' belongs to reminder '${row.occurrence.reminderId}', not '${reminder.value.id}'`
    ))
  }

  return Ok({
    id: row.occurrence.id,
    reminder: reminder.value,
    timestamp: row.occurrence.timestamp,
    isAcknowledged: row.occurrence.isAcknowledged,
    isNotificationSent: row.occurrence.isNotificationSent,
  })
}

function hydrateAll(rows: OccurrenceRow[]): Occurrence[] {
  const occurrences: Occurrence[] = []
  for (const row of rows) {
    const result = toOccurrence(row)
    if (result.ok) occurrences.push(result.value)
    else debug('Skipping occurrence %s: %s', row.occurrence.id, result.error.message)
  }
  return occurrences
}

async function query(adapter: Adapter, q: OccurrenceQuery): Promise<Occurrence[]> {
  return hydrateAll(await adapter.getOccurrences(q))
}

// ============================================================================
// Creation
// ============================================================================

/**
 * Materialize one occurrence. Another writer may already have created the same
 * (reminder, timestamp) pair; that collision is reported as `created: false`
 * rather than thrown. Every other storage failure propagates.
 */
export async function createOccurrence(
  adapter: Adapter,
  reminder: Reminder,
  timestamp: Instant
): Promise<CreateOccurrenceResult> {
  if (instantBefore(timestamp, reminder.timestamp)) {
    throw new ValidationError(
      `Occurrence at '${timestamp}' precedes reminder '${reminder.id}' base timestamp '${reminder.timestamp}'`
    )
  }

  const id = randomUUID()
  try {
    await adapter.createOccurrence({
      id,
      reminderId: reminder.id,
      timestamp,
      isAcknowledged: false,
      isNotificationSent: false,
    })
  } catch (e) {
    if (e instanceof DuplicateKeyError) {
      debug('Occurrence for reminder %s at %s already exists', reminder.id, timestamp)
      return { created: false, reminderId: reminder.id, timestamp }
    }
    throw e
  }

  return {
    created: true,
    occurrence: { id, reminder, timestamp, isAcknowledged: false, isNotificationSent: false },
  }
}

// ============================================================================
// Queries
// ============================================================================

/** Every occurrence before the cutoff, acknowledged or not */
export function findDueBefore(adapter: Adapter, cutoff: Instant): Promise<Occurrence[]> {
  return query(adapter, { before: cutoff })
}

/** One employee's occurrences before the cutoff that are not yet acknowledged */
export function findUnacknowledgedDueBefore(
  adapter: Adapter,
  cutoff: Instant,
  employeeId: string
): Promise<Occurrence[]> {
  return query(adapter, { before: cutoff, employeeId, isAcknowledged: false })
}

/** Occurrences before the cutoff that still need a notification */
export function findPendingNotifications(adapter: Adapter, cutoff: Instant): Promise<Occurrence[]> {
  return query(adapter, { before: cutoff, isAcknowledged: false, isNotificationSent: false })
}

export async function findById(adapter: Adapter, id: string): Promise<Occurrence | null> {
  const row = await adapter.getOccurrence(id)
  if (!row) return null
  const result = toOccurrence(row)
  if (!result.ok) throw result.error
  return result.value
}

// ============================================================================
// Transitions
// ============================================================================

/** Idempotent; unknown ids are ignored. */
export async function markNotified(adapter: Adapter, id: string): Promise<void> {
  await adapter.markOccurrenceNotified(id)
}

/**
 * Idempotent; unknown ids are ignored. Callers that need to tell "not found"
 * apart check with findById first.
 */
export async function acknowledge(adapter: Adapter, id: string): Promise<void> {
  await adapter.acknowledgeOccurrence(id)
}
