/**
 * Segment 11: Error System Tests
 *
 * Every failure is a CalendricalError subclass with a stable code.
 */

import { describe, it, expect } from 'vitest'
import {
  CalendricalError,
  CalendricalErrorCode,
  ArithmeticOverflowError,
  InvalidValueError,
  UnsupportedUnitError,
  UnsupportedFieldError,
  ChronologyMismatchError,
  NoValidFieldsError,
  HasCalendarUnitsError,
  ParseError,
  NullInputError,
  requireValue,
} from '../src/errors'
import { Ok, Err, unwrap } from '../src/result'
import { Period } from '../src/period'
import { Unit } from '../src/units'
import { Field } from '../src/fields'

describe('Error classes', () => {
  it.each([
    [new ArithmeticOverflowError('overflow'), 'ArithmeticOverflowError', CalendricalErrorCode.ARITHMETIC_OVERFLOW],
    [new InvalidValueError('bad'), 'InvalidValueError', CalendricalErrorCode.INVALID_VALUE],
    [new UnsupportedUnitError(Unit.WEEKS), 'UnsupportedUnitError', CalendricalErrorCode.UNSUPPORTED_UNIT],
    [new UnsupportedFieldError(Field.YEAR), 'UnsupportedFieldError', CalendricalErrorCode.UNSUPPORTED_FIELD],
    [new ChronologyMismatchError('mismatch'), 'ChronologyMismatchError', CalendricalErrorCode.CHRONOLOGY_MISMATCH],
    [new NoValidFieldsError('none'), 'NoValidFieldsError', CalendricalErrorCode.NO_VALID_FIELDS],
    [new HasCalendarUnitsError('calendar'), 'HasCalendarUnitsError', CalendricalErrorCode.HAS_CALENDAR_UNITS],
    [new ParseError('parse', 'P?', 1), 'ParseError', CalendricalErrorCode.PARSE_ERROR],
    [new NullInputError('null'), 'NullInputError', CalendricalErrorCode.NULL_INPUT],
  ])('%s carries its name and code', (error, name, code) => {
    expect(error).toBeInstanceOf(CalendricalError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
  })

  it('names the unsupported unit or field', () => {
    const unitError = new UnsupportedUnitError(Unit.WEEKS)
    expect(unitError.unit).toBe('weeks')
    expect(unitError.message).toBe('Unsupported unit: weeks')
    const fieldError = new UnsupportedFieldError(Field.NANO_OF_DAY)
    expect(fieldError.field).toBe('nanoOfDay')
    expect(fieldError.message).toBe('Unsupported field: nanoOfDay')
  })

  it('the thrown error carries the unit', () => {
    try {
      Period.ZERO.plus(1, Unit.WEEKS)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(UnsupportedUnitError)
      if (e instanceof UnsupportedUnitError) expect(e.unit).toBe(Unit.WEEKS)
    }
  })
})

describe('requireValue', () => {
  it('passes present values through', () => {
    expect(requireValue(0, 'amount')).toBe(0)
    expect(requireValue('', 'text')).toBe('')
  })

  it('rejects null and undefined', () => {
    expect(() => requireValue(null, 'unit')).toThrow('unit must not be null')
    expect(() => requireValue(undefined, 'unit')).toThrow(NullInputError)
  })
})

describe('Result', () => {
  it('unwrap returns the value or throws the error', () => {
    expect(unwrap(Ok(5))).toBe(5)
    expect(() => unwrap(Err(new InvalidValueError('bad')))).toThrow('bad')
  })
})
