/**
 * SQLite Adapter
 *
 * Production implementation of the reminder adapter using better-sqlite3.
 * The UNIQUE(reminder_id, timestamp) constraint is what keeps concurrent
 * scanners from writing the same occurrence twice.
 */
import Database from 'better-sqlite3'
import createDebug from 'debug'
import type {
  Adapter, ReminderRecord, OccurrenceRecord, OccurrenceRow, OccurrenceQuery,
  ReminderWithLastOccurrence,
} from './adapter'
import type { Instant } from './time-date'
import { parseInstant, instantFromDate } from './time-date'
import {
  DuplicateKeyError, ForeignKeyError, InvalidDataError, StorageUnavailableError,
} from './errors'

// Re-export errors for adapter consumers
export { DuplicateKeyError, ForeignKeyError, InvalidDataError, StorageUnavailableError }

const debug = createDebug('reminders:sqlite')

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  execute(sql: string): Promise<void>
  getSchemaVersion(): Promise<number>
}

export type SqliteAdapter = Adapter & SqliteExtras & { close(): Promise<void> }

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS reminder (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL,
    text TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    is_recurring INTEGER NOT NULL DEFAULT 0 CHECK (is_recurring IN (0, 1)),
    recurrence_interval INTEGER,
    recurrence_frequency INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_reminder_employee ON reminder(employee_id);

  CREATE TABLE IF NOT EXISTS occurrence (
    id TEXT PRIMARY KEY,
    reminder_id TEXT NOT NULL REFERENCES reminder(id) ON DELETE CASCADE,
    timestamp TEXT NOT NULL,
    is_acknowledged INTEGER NOT NULL DEFAULT 0 CHECK (is_acknowledged IN (0, 1)),
    notification_sent INTEGER NOT NULL DEFAULT 0 CHECK (notification_sent IN (0, 1)),
    UNIQUE(reminder_id, timestamp)
  );
  CREATE INDEX IF NOT EXISTS idx_occurrence_timestamp ON occurrence(timestamp);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

const UNAVAILABLE_CODES = new Set([
  'SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN', 'SQLITE_IOERR', 'SQLITE_FULL', 'SQLITE_READONLY',
])

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  if (e instanceof Database.SqliteError && UNAVAILABLE_CODES.has(e.code.split('_').slice(0, 2).join('_'))) {
    throw new StorageUnavailableError(msg)
  }
  if (/database connection is not open/i.test(msg)) throw new StorageUnavailableError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type ReminderRow = {
  id: string
  employee_id: string
  text: string
  timestamp: string
  is_recurring: number
  recurrence_interval: number | null
  recurrence_frequency: number | null
}

type ReminderWithLastRow = ReminderRow & {
  last_occurrence_at: string | null
}

type OccurrenceTableRow = {
  id: string
  reminder_id: string
  timestamp: string
  is_acknowledged: number
  notification_sent: number
}

type JoinedRow = {
  o_id: string
  o_reminder_id: string
  o_timestamp: string
  o_is_acknowledged: number
  o_notification_sent: number
  r_id: string
  r_employee_id: string
  r_text: string
  r_timestamp: string
  r_is_recurring: number
  r_recurrence_interval: number | null
  r_recurrence_frequency: number | null
}

type SchemaVersionRow = {
  v: number | null
}

const JOINED_SELECT = `
  SELECT
    o.id AS o_id, o.reminder_id AS o_reminder_id, o.timestamp AS o_timestamp,
    o.is_acknowledged AS o_is_acknowledged, o.notification_sent AS o_notification_sent,
    r.id AS r_id, r.employee_id AS r_employee_id, r.text AS r_text, r.timestamp AS r_timestamp,
    r.is_recurring AS r_is_recurring, r.recurrence_interval AS r_recurrence_interval,
    r.recurrence_frequency AS r_recurrence_frequency
  FROM occurrence o
  JOIN reminder r ON r.id = o.reminder_id
`

// ============================================================================
// Row → Record Mappers
// ============================================================================

function toInstant(value: string, column: string): Instant {
  const parsed = parseInstant(value)
  if (!parsed.ok) throw new InvalidDataError(`Column '${column}' holds an invalid instant: '${value}'`)
  return parsed.value
}

function toReminderRecord(row: ReminderRow): ReminderRecord {
  return {
    id: row.id,
    employeeId: row.employee_id,
    text: row.text,
    timestamp: toInstant(row.timestamp, 'reminder.timestamp'),
    isRecurring: row.is_recurring === 1,
    recurrenceInterval: row.recurrence_interval,
    recurrenceFrequency: row.recurrence_frequency,
  }
}

function toOccurrenceRecord(row: OccurrenceTableRow): OccurrenceRecord {
  return {
    id: row.id,
    reminderId: row.reminder_id,
    timestamp: toInstant(row.timestamp, 'occurrence.timestamp'),
    isAcknowledged: row.is_acknowledged === 1,
    isNotificationSent: row.notification_sent === 1,
  }
}

function toOccurrenceRow(row: JoinedRow): OccurrenceRow {
  return {
    occurrence: toOccurrenceRecord({
      id: row.o_id,
      reminder_id: row.o_reminder_id,
      timestamp: row.o_timestamp,
      is_acknowledged: row.o_is_acknowledged,
      notification_sent: row.o_notification_sent,
    }),
    reminder: toReminderRecord({
      id: row.r_id,
      employee_id: row.r_employee_id,
      text: row.r_text,
      timestamp: row.r_timestamp,
      is_recurring: row.r_is_recurring,
      recurrence_interval: row.r_recurrence_interval,
      recurrence_frequency: row.r_recurrence_frequency,
    }),
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = safe(() => new Database(path))
  safe(() => {
    db.pragma('foreign_keys = ON')
    db.exec(SCHEMA_SQL)
  })

  // Seed initial schema version if empty
  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, instantFromDate(new Date()),
    )
  }
  debug('Opened %s (schema v%d)', path, ver?.v ?? SCHEMA_VERSION)

  const adapter: SqliteAdapter = {
    // ================================================================
    // Reminder
    // ================================================================
    async createReminder(reminder: ReminderRecord) {
      safe(() =>
        db.prepare(
          'INSERT INTO reminder (id, employee_id, text, timestamp, is_recurring, recurrence_interval, recurrence_frequency) VALUES (?, ?, ?, ?, ?, ?, ?)',
        ).run(
          reminder.id,
          reminder.employeeId,
          reminder.text,
          reminder.timestamp,
          reminder.isRecurring ? 1 : 0,
          reminder.recurrenceInterval,
          reminder.recurrenceFrequency,
        ),
      )
    },

    async getReminder(id: string) {
      const row = safe(() => db.prepare<[string], ReminderRow>('SELECT * FROM reminder WHERE id = ?').get(id))
      return row ? toReminderRecord(row) : null
    },

    async getRemindersByEmployee(employeeId: string) {
      const rows = safe(() =>
        db.prepare<[string], ReminderRow>(
          'SELECT * FROM reminder WHERE employee_id = ? ORDER BY timestamp, id',
        ).all(employeeId),
      )
      return rows.map(toReminderRecord)
    },

    async getRemindersWithLastOccurrence(): Promise<ReminderWithLastOccurrence[]> {
      const rows = safe(() =>
        db.prepare<[], ReminderWithLastRow>(`
          SELECT r.*, MAX(o.timestamp) AS last_occurrence_at
          FROM reminder r
          LEFT JOIN occurrence o ON o.reminder_id = r.id
          GROUP BY r.id
          ORDER BY r.timestamp, r.id
        `).all(),
      )
      return rows.map((row) => ({
        reminder: toReminderRecord(row),
        lastOccurrenceAt: row.last_occurrence_at === null
          ? null
          : toInstant(row.last_occurrence_at, 'occurrence.timestamp'),
      }))
    },

    // ================================================================
    // Occurrence
    // ================================================================
    async createOccurrence(occurrence: OccurrenceRecord) {
      safe(() =>
        db.prepare(
          'INSERT INTO occurrence (id, reminder_id, timestamp, is_acknowledged, notification_sent) VALUES (?, ?, ?, ?, ?)',
        ).run(
          occurrence.id,
          occurrence.reminderId,
          occurrence.timestamp,
          occurrence.isAcknowledged ? 1 : 0,
          occurrence.isNotificationSent ? 1 : 0,
        ),
      )
    },

    async getOccurrence(id: string) {
      const row = safe(() => db.prepare<[string], JoinedRow>(`${JOINED_SELECT} WHERE o.id = ?`).get(id))
      return row ? toOccurrenceRow(row) : null
    },

    async getOccurrences(query: OccurrenceQuery) {
      const clauses = ['o.timestamp < ?']
      const params: (string | number)[] = [query.before]
      if (query.employeeId !== undefined) {
        clauses.push('r.employee_id = ?')
        params.push(query.employeeId)
      }
      if (query.isAcknowledged !== undefined) {
        clauses.push('o.is_acknowledged = ?')
        params.push(query.isAcknowledged ? 1 : 0)
      }
      if (query.isNotificationSent !== undefined) {
        clauses.push('o.notification_sent = ?')
        params.push(query.isNotificationSent ? 1 : 0)
      }
      const sql = `${JOINED_SELECT} WHERE ${clauses.join(' AND ')} ORDER BY o.timestamp, o.id`
      const rows = safe(() => db.prepare<(string | number)[], JoinedRow>(sql).all(...params))
      return rows.map(toOccurrenceRow)
    },

    async getOccurrencesByReminder(reminderId: string) {
      const rows = safe(() =>
        db.prepare<[string], OccurrenceTableRow>(
          'SELECT * FROM occurrence WHERE reminder_id = ? ORDER BY timestamp, id',
        ).all(reminderId),
      )
      return rows.map(toOccurrenceRecord)
    },

    async markOccurrenceNotified(id: string) {
      safe(() => db.prepare('UPDATE occurrence SET notification_sent = 1 WHERE id = ?').run(id))
    },

    async acknowledgeOccurrence(id: string) {
      safe(() => db.prepare('UPDATE occurrence SET is_acknowledged = 1 WHERE id = ?').run(id))
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras (introspection)
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async listIndices(table: string) {
      const rows = db.prepare<[string], { name: string }>('SELECT name FROM pragma_index_list(?)').all(table)
      return rows.map((r) => r.name)
    },

    async execute(sql: string) {
      safe(() => db.exec(sql))
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },
  }

  return adapter
}
