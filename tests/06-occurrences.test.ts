/**
 * Segment 06: Occurrence Lifecycle Tests
 *
 * Creation, due-before-cutoff queries, and the notified / acknowledged
 * transitions.
 *
 * Dependencies: Segment 3 (Reminders), Segment 4 (Adapter)
 */

import { describe, it, expect, beforeEach } from 'vitest'
import * as fc from 'fast-check'
import {
  createOccurrence,
  toOccurrence,
  findDueBefore,
  findUnacknowledgedDueBefore,
  findPendingNotifications,
  findById,
  markNotified,
  acknowledge,
} from '../src/occurrences'
import { createMockAdapter, type Adapter, type ReminderRecord } from '../src/adapter'
import { toReminder, type Reminder } from '../src/reminders'
import { InvalidDataError, ValidationError } from '../src/errors'
import { parseInstant, addSeconds, type Instant } from '../src/time-date'

// ============================================================================
// Test Helpers
// ============================================================================

const EMPLOYEE_A = '3f0c8a52-6f1e-4a3b-9c2d-1e5f7a9b0c11'
const EMPLOYEE_B = '7b2d4e61-0a9c-4f8e-b3d5-6c1a2e4f8b22'

function instant(iso: string): Instant {
  const result = parseInstant(iso)
  if (!result.ok) throw result.error
  return result.value
}

function dailyRecord(id: string, employeeId: string): ReminderRecord {
  return {
    id,
    employeeId,
    text: `Stand-up ${id}`,
    timestamp: instant('2024-03-01T09:00:00Z'),
    isRecurring: true,
    recurrenceInterval: 1,
    recurrenceFrequency: 1,
  }
}

async function storeReminder(adapter: Adapter, record: ReminderRecord): Promise<Reminder> {
  await adapter.createReminder(record)
  const result = toReminder(record)
  if (!result.ok) throw result.error
  return result.value
}

async function occur(adapter: Adapter, reminder: Reminder, iso: string): Promise<string> {
  const result = await createOccurrence(adapter, reminder, instant(iso))
  if (!result.created) throw new Error(`occurrence at ${iso} already exists`)
  return result.occurrence.id
}

describe('Segment 6: Occurrence Lifecycle', () => {
  let adapter: Adapter
  let alice: Reminder
  let bob: Reminder

  beforeEach(async () => {
    adapter = createMockAdapter()
    alice = await storeReminder(adapter, dailyRecord('alice', EMPLOYEE_A))
    bob = await storeReminder(adapter, dailyRecord('bob', EMPLOYEE_B))
  })

  // ==========================================================================
  // Creation
  // ==========================================================================

  describe('createOccurrence', () => {
    it('starts unacknowledged and unnotified', async () => {
      const result = await createOccurrence(adapter, alice, instant('2024-03-01T09:00:00Z'))
      expect(result.created).toBe(true)
      if (result.created) {
        expect(result.occurrence.reminder).toEqual(alice)
        expect(result.occurrence.timestamp).toBe('2024-03-01T09:00:00Z')
        expect(result.occurrence.isAcknowledged).toBe(false)
        expect(result.occurrence.isNotificationSent).toBe(false)
        expect(await findById(adapter, result.occurrence.id)).toEqual(result.occurrence)
      }
    })

    it('reports a duplicate (reminder, timestamp) without throwing', async () => {
      await occur(adapter, alice, '2024-03-01T09:00:00Z')
      const result = await createOccurrence(adapter, alice, instant('2024-03-01T09:00:00Z'))
      expect(result).toEqual({ created: false, reminderId: 'alice', timestamp: '2024-03-01T09:00:00Z' })
    })

    it('refuses a timestamp before the reminder\'s base timestamp', async () => {
      await expect(createOccurrence(adapter, alice, instant('2024-02-29T09:00:00Z')))
        .rejects.toThrow(ValidationError)
      expect(await adapter.getOccurrencesByReminder('alice')).toEqual([])
    })
  })

  describe('toOccurrence', () => {
    it('rejects a row whose reminder does not own the occurrence', () => {
      const result = toOccurrence({
        occurrence: {
          id: 'o1', reminderId: 'bob', timestamp: instant('2024-03-01T09:00:00Z'),
          isAcknowledged: false, isNotificationSent: false,
        },
        reminder: dailyRecord('alice', EMPLOYEE_A),
      })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidDataError)
        expect(result.error.message).toBe("Occurrence 'o1' belongs to reminder 'bob', not 'alice'")
      }
    })
  })

  // ==========================================================================
  // Queries
  // ==========================================================================

  describe('queries', () => {
    let a1: string
    let a2: string
    let a3: string
    let b1: string

    beforeEach(async () => {
      a1 = await occur(adapter, alice, '2024-03-01T09:00:00Z')
      a2 = await occur(adapter, alice, '2024-03-02T09:00:00Z')
      a3 = await occur(adapter, alice, '2024-03-03T09:00:00Z')
      b1 = await occur(adapter, bob, '2024-03-01T09:00:00Z')
    })

    it('findDueBefore returns every occurrence strictly before the cutoff', async () => {
      const due = await findDueBefore(adapter, instant('2024-03-03T09:00:00Z'))
      expect(due.map((o) => o.timestamp)).toEqual([
        '2024-03-01T09:00:00Z',
        '2024-03-01T09:00:00Z',
        '2024-03-02T09:00:00Z',
      ])
      expect(due.map((o) => o.id)).not.toContain(a3)
    })

    it('findDueBefore includes acknowledged occurrences', async () => {
      await acknowledge(adapter, a1)
      const due = await findDueBefore(adapter, instant('2024-03-02T00:00:00Z'))
      expect(due.map((o) => o.id).sort()).toEqual([a1, b1].sort())
    })

    it('findUnacknowledgedDueBefore is scoped to one employee', async () => {
      const due = await findUnacknowledgedDueBefore(adapter, instant('2024-04-01T00:00:00Z'), EMPLOYEE_B)
      expect(due.map((o) => o.id)).toEqual([b1])
      expect(due[0]?.reminder.employeeId).toBe(EMPLOYEE_B)
    })

    it('findUnacknowledgedDueBefore drops acknowledged occurrences', async () => {
      await acknowledge(adapter, a2)
      const due = await findUnacknowledgedDueBefore(adapter, instant('2024-04-01T00:00:00Z'), EMPLOYEE_A)
      expect(due.map((o) => o.id)).toEqual([a1, a3])
    })

    it('findPendingNotifications drops notified and acknowledged occurrences', async () => {
      await markNotified(adapter, a1)
      await acknowledge(adapter, b1)
      const pending = await findPendingNotifications(adapter, instant('2024-04-01T00:00:00Z'))
      expect(pending.map((o) => o.id)).toEqual([a2, a3])
    })

    it('returns nothing before the earliest occurrence', async () => {
      expect(await findDueBefore(adapter, instant('2024-03-01T09:00:00Z'))).toEqual([])
    })
    it('findUnacknowledgedDueBefore returns exactly the open occurrences of one employee before the cutoff', async () => {
      const base = instant('2024-03-01T09:00:00Z')
      const generated = fc.uniqueArray(
        fc.record({
          employee: fc.constantFrom(EMPLOYEE_A, EMPLOYEE_B),
          day: fc.integer({ min: 0, max: 30 }),
          acknowledged: fc.boolean(),
        }),
        { selector: (o) => `${o.employee}/${o.day}`, maxLength: 40 }
      )
      const cutoffOffset = fc.integer({ min: -86400, max: 32 * 86400 })

      await fc.assert(
        fc.asyncProperty(generated, cutoffOffset, async (items, offset) => {
          const store = createMockAdapter()
          await store.createReminder(dailyRecord('alice', EMPLOYEE_A))
          await store.createReminder(dailyRecord('bob', EMPLOYEE_B))
          const records = items.map((item, index) => ({
            id: `occ-${index}`,
            reminderId: item.employee === EMPLOYEE_A ? 'alice' : 'bob',
            timestamp: addSeconds(base, item.day * 86400),
            isAcknowledged: item.acknowledged,
            isNotificationSent: false,
          }))
          for (const record of records) await store.createOccurrence(record)
          const cutoff = addSeconds(base, offset)

          const due = await findUnacknowledgedDueBefore(store, cutoff, EMPLOYEE_A)
          for (const occurrence of due) {
            expect(occurrence.reminder.employeeId).toBe(EMPLOYEE_A)
            expect(occurrence.isAcknowledged).toBe(false)
            expect(occurrence.timestamp < cutoff).toBe(true)
          }
          const expected = records
            .filter((r) => r.reminderId === 'alice' && !r.isAcknowledged && r.timestamp < cutoff)
            .map((r) => r.id)
          expect(due.map((o) => o.id).sort()).toEqual(expected.sort())
        })
      )
    })
  })

  // ==========================================================================
  // Transitions
  // ==========================================================================

  describe('transitions', () => {
    let id: string

    beforeEach(async () => {
      id = await occur(adapter, alice, '2024-03-01T09:00:00Z')
    })

    it('acknowledge sets the flag and is idempotent', async () => {
      await acknowledge(adapter, id)
      await acknowledge(adapter, id)
      const occurrence = await findById(adapter, id)
      expect(occurrence?.isAcknowledged).toBe(true)
      expect(occurrence?.isNotificationSent).toBe(false)
    })

    it('markNotified sets the flag and is idempotent', async () => {
      await markNotified(adapter, id)
      await markNotified(adapter, id)
      const occurrence = await findById(adapter, id)
      expect(occurrence?.isNotificationSent).toBe(true)
      expect(occurrence?.isAcknowledged).toBe(false)
    })

    it('ignores unknown ids', async () => {
      await expect(acknowledge(adapter, 'ghost')).resolves.toBeUndefined()
      await expect(markNotified(adapter, 'ghost')).resolves.toBeUndefined()
      expect(await findById(adapter, 'ghost')).toBeNull()
    })

    it('acknowledging does not stop the reminder from recurring', async () => {
      await acknowledge(adapter, id)
      const [entry] = await adapter.getRemindersWithLastOccurrence()
      expect(entry?.lastOccurrenceAt).toBe('2024-03-01T09:00:00Z')
    })
  })
})
