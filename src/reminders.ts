/**
 * Reminders Module
 *
 * Reminder hydration, creation request validation, creation and lookups.
 * Reminders are immutable once created.
 */

import { randomUUID } from 'node:crypto'
import createDebug from 'debug'
import { z } from 'zod'
import type { Adapter, ReminderRecord } from './adapter'
import type { Instant } from './time-date'
import { parseInstant } from './time-date'
import type { Result } from './result'
import { Ok, Err } from './result'
import { InvalidDataError, ValidationError } from './errors'
import { RecurrenceFrequency } from './recurrence'

const debug = createDebug('reminders:reminders')

// ============================================================================
// Types
// ============================================================================

export type Recurrence = {
  interval: number
  /** Stored frequency code; validated when the next occurrence is computed */
  frequency: number
}

type ReminderBase = {
  id: string
  employeeId: string
  text: string
  /** First occurrence for one-off reminders, anchor for recurring ones */
  timestamp: Instant
}

export type Reminder =
  | (ReminderBase & { isRecurring: true; recurrence: Recurrence })
  | (ReminderBase & { isRecurring: false; recurrence: null })

// ============================================================================
// Hydration
// ============================================================================

/**
 * Field-by-field mapping from storage. A recurring record must carry both
 * recurrence columns. A non-recurring record hydrates as one-off even when
 * stray recurrence columns are present.
 */
export function toReminder(record: ReminderRecord): Result<Reminder, InvalidDataError> {
  const base: ReminderBase = {
    id: record.id,
    employeeId: record.employeeId,
    text: record.text,
    timestamp: record.timestamp,
  }

  if (!record.isRecurring) {
    const oneOff: Reminder = { ...base, isRecurring: false, recurrence: null }
    return Ok(oneOff)
  }

  const interval = record.recurrenceInterval
  const frequency = record.recurrenceFrequency
  if (interval === null || frequency === null) {
    return Err(new InvalidDataError(
      `Reminder '${record.id}' is recurring but has no recurrence interval or frequency`
    ))
  }

  const recurring: Reminder = { ...base, isRecurring: true, recurrence: { interval, frequency } }
  return Ok(recurring)
}

export function toReminderRecord(reminder: Reminder): ReminderRecord {
  return {
    id: reminder.id,
    employeeId: reminder.employeeId,
    text: reminder.text,
    timestamp: reminder.timestamp,
    isRecurring: reminder.isRecurring,
    recurrenceInterval: reminder.recurrence?.interval ?? null,
    recurrenceFrequency: reminder.recurrence?.frequency ?? null,
  }
}

// ============================================================================
// Creation Request
// ============================================================================

const frequencyCodes = Object.values(RecurrenceFrequency)

export const createReminderRequestSchema = z
  .object({
    text: z.string().min(1, 'text must be non-empty'),
    employee_id: z.string().uuid('employee_id must be a UUID'),
    date: z.string().transform((value, ctx) => {
      const parsed = parseInstant(value)
      if (!parsed.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
        return z.NEVER
      }
      return parsed.value
    }),
    is_recurring: z.boolean(),
    recurrence_interval: z.number().int().positive().nullish(),
    recurrence_frequency: z
      .number()
      .int()
      .refine((code) => frequencyCodes.some((f) => f === code), {
        message: 'recurrence_frequency must be 1 (DAY), 2 (WEEK), 3 (MONTH) or 4 (YEAR)',
      })
      .nullish(),
  })
  .superRefine((req, ctx) => {
    const hasInterval = req.recurrence_interval != null
    const hasFrequency = req.recurrence_frequency != null
    if (req.is_recurring && (!hasInterval || !hasFrequency)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'recurring reminders require recurrence_interval and recurrence_frequency',
        path: [hasInterval ? 'recurrence_frequency' : 'recurrence_interval'],
      })
    }
    if (!req.is_recurring && (hasInterval || hasFrequency)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'one-off reminders must not set recurrence_interval or recurrence_frequency',
        path: [hasInterval ? 'recurrence_interval' : 'recurrence_frequency'],
      })
    }
  })

export type CreateReminderRequest = z.infer<typeof createReminderRequestSchema>

export function parseCreateReminderRequest(payload: unknown): Result<CreateReminderRequest, ValidationError> {
  const result = createReminderRequestSchema.safeParse(payload)
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    return Err(new ValidationError(message))
  }
  return Ok(result.data)
}

// ============================================================================
// Public API
// ============================================================================

export async function createReminder(
  adapter: Adapter,
  request: CreateReminderRequest
): Promise<Reminder> {
  const base: ReminderBase = {
    id: randomUUID(),
    employeeId: request.employee_id,
    text: request.text,
    timestamp: request.date,
  }

  const interval = request.recurrence_interval
  const frequency = request.recurrence_frequency
  const reminder: Reminder =
    request.is_recurring && interval != null && frequency != null
      ? { ...base, isRecurring: true, recurrence: { interval, frequency } }
      : { ...base, isRecurring: false, recurrence: null }

  await adapter.createReminder(toReminderRecord(reminder))
  return reminder
}

export async function getReminder(adapter: Adapter, id: string): Promise<Reminder | null> {
  const record = await adapter.getReminder(id)
  if (!record) return null
  const result = toReminder(record)
  if (!result.ok) throw result.error
  return result.value
}

export async function getRemindersByEmployee(adapter: Adapter, employeeId: string): Promise<Reminder[]> {
  const records = await adapter.getRemindersByEmployee(employeeId)
  const reminders: Reminder[] = []
  for (const record of records) {
    const result = toReminder(record)
    if (result.ok) reminders.push(result.value)
    else debug('Skipping reminder %s: %s', record.id, result.error.message)
  }
  return reminders
}
