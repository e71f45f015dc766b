/**
 * Public API exports
 */

// Error system (base class, codes and error classes)
export {
  ReminderError, ReminderErrorCode,
  DuplicateKeyError, ForeignKeyError, InvalidDataError, StorageUnavailableError,
  ValidationError, ParseError, InvalidFrequencyError, InvalidIntervalError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { Instant } from './time-date'
export {
  isLeapYear, daysInMonth, MAX_INSTANT,
  parseInstant, makeInstant, instantFromEpochSeconds, instantFromDate, epochSecondsOf,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf,
  addDays, addWeeks, addMonths, addYears, addSeconds,
  compareInstants, instantBefore, instantAfter,
} from './time-date'

// Clock
export type { Clock } from './clock'
export { systemClock, fixedClock } from './clock'

// Recurrence
export type { RecurrenceError, FrequencyName } from './recurrence'
export { RecurrenceFrequency, isRecurrenceFrequency, frequencyName, nextOccurrence } from './recurrence'

// Adapter (persistence interface + in-memory mock)
export type {
  Adapter, ReminderRecord, OccurrenceRecord, OccurrenceRow, OccurrenceQuery,
  ReminderWithLastOccurrence,
} from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Reminders
export type { Reminder, Recurrence, CreateReminderRequest } from './reminders'
export {
  toReminder, createReminderRequestSchema, parseCreateReminderRequest,
  createReminder, getReminder, getRemindersByEmployee,
} from './reminders'

// Occurrences
export type { Occurrence, CreateOccurrenceResult } from './occurrences'
export {
  toOccurrence, createOccurrence,
  findDueBefore, findUnacknowledgedDueBefore, findPendingNotifications, findById,
  markNotified, acknowledge,
} from './occurrences'

// Scanner
export type { ScanResult, SkippedReminder, MaterializeReport } from './scanner'
export {
  candidateTimestamp, scanReminders, computeNextOccurrenceTimestamps, materializeDueOccurrences,
} from './scanner'

// High-level API
export type {
  ReminderScheduler, ReminderSchedulerConfig, NotificationDelivery, DispatchReport,
} from './scheduler'
export { createReminderScheduler } from './scheduler'

// Worker & configuration
export type { ScanWorker, ScanWorkerOptions, TickReport } from './worker'
export { createScanWorker } from './worker'
export type { EnvConfig } from './env'
export { envSchema, validateEnvironment, loadEnv } from './env'
