/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so that both embedded and networked stores fit.
 *
 * Storage types are flat and nullable; hydration into domain types (and the
 * validation that goes with it) happens in reminders.ts and occurrences.ts.
 */

import type { Instant } from './time-date'
import { DuplicateKeyError, ForeignKeyError } from './errors'

export type { Instant } from './time-date'

// Re-export errors thrown by adapters
export { DuplicateKeyError, ForeignKeyError, InvalidDataError, StorageUnavailableError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type ReminderRecord = {
  id: string
  employeeId: string
  text: string
  timestamp: Instant
  isRecurring: boolean
  recurrenceInterval: number | null
  recurrenceFrequency: number | null
}

export type OccurrenceRecord = {
  id: string
  reminderId: string
  timestamp: Instant
  isAcknowledged: boolean
  isNotificationSent: boolean
}

/** An occurrence joined with the reminder that owns it */
export type OccurrenceRow = {
  occurrence: OccurrenceRecord
  reminder: ReminderRecord
}

export type ReminderWithLastOccurrence = {
  reminder: ReminderRecord
  lastOccurrenceAt: Instant | null
}

export type OccurrenceQuery = {
  /** Strict upper bound on the occurrence timestamp */
  before: Instant
  employeeId?: string
  isAcknowledged?: boolean
  isNotificationSent?: boolean
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  // Reminder
  createReminder(reminder: ReminderRecord): Promise<void>
  getReminder(id: string): Promise<ReminderRecord | null>
  getRemindersByEmployee(employeeId: string): Promise<ReminderRecord[]>
  /** Every reminder with the maximum timestamp among its occurrences */
  getRemindersWithLastOccurrence(): Promise<ReminderWithLastOccurrence[]>

  // Occurrence
  /**
   * Unique on `id` and on `(reminderId, timestamp)`; either collision throws
   * DuplicateKeyError. Unknown reminder throws ForeignKeyError.
   */
  createOccurrence(occurrence: OccurrenceRecord): Promise<void>
  getOccurrence(id: string): Promise<OccurrenceRow | null>
  /** Ordered by timestamp, then id */
  getOccurrences(query: OccurrenceQuery): Promise<OccurrenceRow[]>
  getOccurrencesByReminder(reminderId: string): Promise<OccurrenceRecord[]>
  /** No-op for an unknown id */
  markOccurrenceNotified(id: string): Promise<void>
  /** No-op for an unknown id */
  acknowledgeOccurrence(id: string): Promise<void>

  // Lifecycle (optional; persistent adapters implement it)
  close?(): Promise<void>
}

// ============================================================================
// Shared Helpers
// ============================================================================

export function compareByTimestamp(
  a: { id: string; timestamp: Instant },
  b: { id: string; timestamp: Instant },
): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1
  if (a.id === b.id) return 0
  return a.id < b.id ? -1 : 1
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    reminders: new Map<string, ReminderRecord>(),
    occurrences: new Map<string, OccurrenceRecord>(),
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function join(occurrence: OccurrenceRecord): OccurrenceRow | null {
    const reminder = state.reminders.get(occurrence.reminderId)
    if (!reminder) return null
    return { occurrence: clone(occurrence), reminder: clone(reminder) }
  }

  function matches(row: OccurrenceRow, query: OccurrenceQuery): boolean {
    if (row.occurrence.timestamp >= query.before) return false
    if (query.employeeId !== undefined && row.reminder.employeeId !== query.employeeId) return false
    if (query.isAcknowledged !== undefined && row.occurrence.isAcknowledged !== query.isAcknowledged) return false
    if (query.isNotificationSent !== undefined && row.occurrence.isNotificationSent !== query.isNotificationSent) return false
    return true
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Reminder
    // ================================================================
    async createReminder(reminder: ReminderRecord) {
      if (state.reminders.has(reminder.id)) {
        throw new DuplicateKeyError(`Reminder '${reminder.id}' already exists`)
      }
      state.reminders.set(reminder.id, clone(reminder))
    },

    async getReminder(id: string) {
      const r = state.reminders.get(id)
      return r ? clone(r) : null
    },

    async getRemindersByEmployee(employeeId: string) {
      return [...state.reminders.values()]
        .filter((r) => r.employeeId === employeeId)
        .sort(compareByTimestamp)
        .map(clone)
    },

    async getRemindersWithLastOccurrence() {
      const last = new Map<string, Instant>()
      for (const o of state.occurrences.values()) {
        const current = last.get(o.reminderId)
        if (current === undefined || o.timestamp > current) {
          last.set(o.reminderId, o.timestamp)
        }
      }
      return [...state.reminders.values()].map((reminder) => ({
        reminder: clone(reminder),
        lastOccurrenceAt: last.get(reminder.id) ?? null,
      }))
    },

    // ================================================================
    // Occurrence
    // ================================================================
    async createOccurrence(occurrence: OccurrenceRecord) {
      if (!state.reminders.has(occurrence.reminderId)) {
        throw new ForeignKeyError(`Reminder '${occurrence.reminderId}' not found`)
      }
      if (state.occurrences.has(occurrence.id)) {
        throw new DuplicateKeyError(`Occurrence '${occurrence.id}' already exists`)
      }
      // Unique (reminderId, timestamp)
      for (const o of state.occurrences.values()) {
        if (o.reminderId === occurrence.reminderId && o.timestamp === occurrence.timestamp) {
          throw new DuplicateKeyError(
            `Occurrence for reminder '${occurrence.reminderId}' at '${occurrence.timestamp}' already exists`
          )
        }
      }
      state.occurrences.set(occurrence.id, clone(occurrence))
    },

    async getOccurrence(id: string) {
      const o = state.occurrences.get(id)
      return o ? join(o) : null
    },

    async getOccurrences(query: OccurrenceQuery) {
      const rows: OccurrenceRow[] = []
      for (const o of state.occurrences.values()) {
        const row = join(o)
        if (row && matches(row, query)) rows.push(row)
      }
      return rows.sort((a, b) => compareByTimestamp(a.occurrence, b.occurrence))
    },

    async getOccurrencesByReminder(reminderId: string) {
      return [...state.occurrences.values()]
        .filter((o) => o.reminderId === reminderId)
        .sort(compareByTimestamp)
        .map(clone)
    },

    async markOccurrenceNotified(id: string) {
      const existing = state.occurrences.get(id)
      if (existing) existing.isNotificationSent = true
    },

    async acknowledgeOccurrence(id: string) {
      const existing = state.occurrences.get(id)
      if (existing) existing.isAcknowledged = true
    },
  }

  return adapter
}
