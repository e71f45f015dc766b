/**
 * Segment 09: Error System Tests
 *
 * ReminderError base class, error code table, and every error subclass.
 */

import { describe, it, expect } from 'vitest'
import {
  ReminderError,
  ReminderErrorCode,
  DuplicateKeyError,
  ForeignKeyError,
  InvalidDataError,
  StorageUnavailableError,
  ValidationError,
  ParseError,
  InvalidFrequencyError,
  InvalidIntervalError,
} from '../src/errors'

describe('Segment 9: Error System', () => {
  // ========================================================================
  // ReminderError Base Class
  // ========================================================================

  describe('ReminderError base class', () => {
    it('constructor sets code and message', () => {
      const err = new ReminderError(ReminderErrorCode.DUPLICATE_KEY, 'test message')
      expect(err.code).toBe('DUPLICATE_KEY')
      expect(err.message).toBe('test message')
    })

    it('is an Error named ReminderError', () => {
      const err = new ReminderError(ReminderErrorCode.VALIDATION, 'x')
      expect(err).toBeInstanceOf(Error)
      expect(err.name).toBe('ReminderError')
    })
  })

  describe('ReminderErrorCode', () => {
    it('has exactly 8 unique code values', () => {
      const values = Object.values(ReminderErrorCode)
      expect(values).toHaveLength(8)
      expect(new Set(values).size).toBe(8)
    })

    it('code values match their key names', () => {
      for (const [key, value] of Object.entries(ReminderErrorCode)) {
        expect(value).toBe(key)
      }
    })
  })

  // ========================================================================
  // Error Subclasses (parametric)
  // ========================================================================

  const errorClasses = [
    { Class: DuplicateKeyError, code: 'DUPLICATE_KEY', name: 'DuplicateKeyError' },
    { Class: ForeignKeyError, code: 'FOREIGN_KEY', name: 'ForeignKeyError' },
    { Class: InvalidDataError, code: 'INVALID_DATA', name: 'InvalidDataError' },
    { Class: StorageUnavailableError, code: 'STORAGE_UNAVAILABLE', name: 'StorageUnavailableError' },
    { Class: ValidationError, code: 'VALIDATION', name: 'ValidationError' },
    { Class: ParseError, code: 'PARSE_ERROR', name: 'ParseError' },
    { Class: InvalidFrequencyError, code: 'INVALID_FREQUENCY', name: 'InvalidFrequencyError' },
    { Class: InvalidIntervalError, code: 'INVALID_INTERVAL', name: 'InvalidIntervalError' },
  ] as const

  describe('Error subclasses', () => {
    for (const { Class, code, name } of errorClasses) {
      describe(name, () => {
        it(`code is ${code}`, () => {
          expect(new Class('test').code).toBe(code)
        })

        it(`name is ${name}`, () => {
          expect(new Class('test').name).toBe(name)
        })

        it('instanceof chain: subclass -> ReminderError', () => {
          const err = new Class('test')
          expect(err).toBeInstanceOf(Class)
          expect(err).toBeInstanceOf(ReminderError)
          expect(err.message).toBe('test')
        })
      })
    }
  })
})
