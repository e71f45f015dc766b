/**
 * Reminder Scheduler
 *
 * High-level API: binds an adapter and a clock and exposes every operation the
 * request and notification layers need.
 */

import createDebug from 'debug'
import type { Adapter } from './adapter'
import type { Clock } from './clock'
import { systemClock } from './clock'
import type { Instant } from './time-date'
import { addSeconds } from './time-date'
import type { Reminder } from './reminders'
import { createReminder, getReminder, getRemindersByEmployee, parseCreateReminderRequest } from './reminders'
import type { Occurrence } from './occurrences'
import {
  acknowledge, findById, findDueBefore, findPendingNotifications,
  findUnacknowledgedDueBefore, markNotified,
} from './occurrences'
import type { MaterializeReport, ScanResult } from './scanner'
import { computeNextOccurrenceTimestamps, materializeDueOccurrences, scanReminders } from './scanner'

const debug = createDebug('reminders:scheduler')

// ============================================================================
// Types
// ============================================================================

export type ReminderSchedulerConfig = {
  adapter: Adapter
  /** Defaults to the system clock */
  clock?: Clock
}

/** Sends one notification; resolves once the send succeeded. */
export type NotificationDelivery = (occurrence: Occurrence) => Promise<void>

export type DispatchReport = {
  notified: Occurrence[]
  failed: { occurrence: Occurrence; error: unknown }[]
}

export type ReminderScheduler = {
  /** Validates the snake_case request payload, then stores the reminder */
  createReminder(payload: unknown): Promise<Reminder>
  getReminder(id: string): Promise<Reminder | null>
  getRemindersByEmployee(employeeId: string): Promise<Reminder[]>

  scan(): Promise<ScanResult>
  computeNextOccurrenceTimestamps(): Promise<Map<string, Instant>>
  materializeDueOccurrences(): Promise<MaterializeReport>

  findDueBefore(cutoff: Instant): Promise<Occurrence[]>
  findUnacknowledgedDueBefore(cutoff: Instant, employeeId: string): Promise<Occurrence[]>
  findById(id: string): Promise<Occurrence | null>
  markNotified(id: string): Promise<void>
  acknowledge(id: string): Promise<void>

  dispatchNotifications(deliver: NotificationDelivery): Promise<DispatchReport>

  close(): Promise<void>
}

// ============================================================================
// Factory
// ============================================================================

export function createReminderScheduler(config: ReminderSchedulerConfig): ReminderScheduler {
  const adapter = config.adapter
  const clock = config.clock ?? systemClock

  async function dispatchNotifications(deliver: NotificationDelivery): Promise<DispatchReport> {
    // Instants have second precision: this cutoff includes occurrences at exactly now
    const pending = await findPendingNotifications(adapter, addSeconds(clock.now(), 1))
    const report: DispatchReport = { notified: [], failed: [] }

    for (const occurrence of pending) {
      try {
        await deliver(occurrence)
      } catch (error) {
        debug('Delivery failed for occurrence %s: %O', occurrence.id, error)
        report.failed.push({ occurrence, error })
        continue
      }
      await markNotified(adapter, occurrence.id)
      report.notified.push({ ...occurrence, isNotificationSent: true })
    }

    debug('Dispatched %d notification(s), %d failed', report.notified.length, report.failed.length)
    return report
  }

  return {
    async createReminder(payload: unknown) {
      const request = parseCreateReminderRequest(payload)
      if (!request.ok) throw request.error
      return createReminder(adapter, request.value)
    },
    getReminder: (id) => getReminder(adapter, id),
    getRemindersByEmployee: (employeeId) => getRemindersByEmployee(adapter, employeeId),

    scan: () => scanReminders(adapter, clock),
    computeNextOccurrenceTimestamps: () => computeNextOccurrenceTimestamps(adapter, clock),
    materializeDueOccurrences: () => materializeDueOccurrences(adapter, clock),

    findDueBefore: (cutoff) => findDueBefore(adapter, cutoff),
    findUnacknowledgedDueBefore: (cutoff, employeeId) => findUnacknowledgedDueBefore(adapter, cutoff, employeeId),
    findById: (id) => findById(adapter, id),
    markNotified: (id) => markNotified(adapter, id),
    acknowledge: (id) => acknowledge(adapter, id),

    dispatchNotifications,

    async close() {
      await adapter.close?.()
    },
  }
}
