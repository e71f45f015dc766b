/**
 * Consolidated error system.
 *
 * All error classes extend ReminderError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ReminderErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',

  // Requests & configuration
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Recurrence
  INVALID_FREQUENCY: 'INVALID_FREQUENCY',
  INVALID_INTERVAL: 'INVALID_INTERVAL',
} as const

export type ReminderErrorCode = (typeof ReminderErrorCode)[keyof typeof ReminderErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ReminderError extends Error {
  readonly code: ReminderErrorCode

  constructor(code: ReminderErrorCode, message: string) {
    super(message)
    this.name = 'ReminderError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class ForeignKeyError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

/** The store could not be reached or is busy. A failed scan can simply be retried. */
export class StorageUnavailableError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.STORAGE_UNAVAILABLE, message)
    this.name = 'StorageUnavailableError'
  }
}

// ============================================================================
// Request & Configuration Errors
// ============================================================================

export class ValidationError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Recurrence Errors
// ============================================================================

export class InvalidFrequencyError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_FREQUENCY, message)
    this.name = 'InvalidFrequencyError'
  }
}

export class InvalidIntervalError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_INTERVAL, message)
    this.name = 'InvalidIntervalError'
  }
}
