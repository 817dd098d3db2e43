/**
 * Consolidated error system for calendrical.
 *
 * All error classes extend CalendricalError, which carries a typed error code.
 * Callers match on `instanceof` or `code`, never on the message text.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendricalErrorCode = {
  // Integer arithmetic
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',

  // Units and fields
  UNSUPPORTED_UNIT: 'UNSUPPORTED_UNIT',
  UNSUPPORTED_FIELD: 'UNSUPPORTED_FIELD',
  INVALID_VALUE: 'INVALID_VALUE',

  // Between calculation
  CHRONOLOGY_MISMATCH: 'CHRONOLOGY_MISMATCH',
  NO_VALID_FIELDS: 'NO_VALID_FIELDS',

  // Period conversion
  HAS_CALENDAR_UNITS: 'HAS_CALENDAR_UNITS',

  // Text codec
  PARSE_ERROR: 'PARSE_ERROR',
  NULL_INPUT: 'NULL_INPUT',
} as const

export type CalendricalErrorCode = (typeof CalendricalErrorCode)[keyof typeof CalendricalErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendricalError extends Error {
  readonly code: CalendricalErrorCode

  constructor(code: CalendricalErrorCode, message: string) {
    super(message)
    this.name = 'CalendricalError'
    this.code = code
  }
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

export class ArithmeticOverflowError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.ARITHMETIC_OVERFLOW, message)
    this.name = 'ArithmeticOverflowError'
  }
}

export class InvalidValueError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.INVALID_VALUE, message)
    this.name = 'InvalidValueError'
  }
}

// ============================================================================
// Unit & Field Errors
// ============================================================================

export class UnsupportedUnitError extends CalendricalError {
  readonly unit: string

  constructor(unit: string, message?: string) {
    super(CalendricalErrorCode.UNSUPPORTED_UNIT, message ?? `Unsupported unit: ${unit}`)
    this.name = 'UnsupportedUnitError'
    this.unit = unit
  }
}

export class UnsupportedFieldError extends CalendricalError {
  readonly field: string

  constructor(field: string, message?: string) {
    super(CalendricalErrorCode.UNSUPPORTED_FIELD, message ?? `Unsupported field: ${field}`)
    this.name = 'UnsupportedFieldError'
    this.field = field
  }
}

// ============================================================================
// Between Errors
// ============================================================================

export class ChronologyMismatchError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.CHRONOLOGY_MISMATCH, message)
    this.name = 'ChronologyMismatchError'
  }
}

export class NoValidFieldsError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.NO_VALID_FIELDS, message)
    this.name = 'NoValidFieldsError'
  }
}

// ============================================================================
// Period Errors
// ============================================================================

export class HasCalendarUnitsError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.HAS_CALENDAR_UNITS, message)
    this.name = 'HasCalendarUnitsError'
  }
}

// ============================================================================
// Text Errors
// ============================================================================

export class ParseError extends CalendricalError {
  /** The text being parsed. */
  readonly input: string
  /** Offset into `input` at which parsing failed. */
  readonly errorIndex: number

  constructor(message: string, input: string, errorIndex: number) {
    super(CalendricalErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
    this.input = input
    this.errorIndex = errorIndex
  }
}

export class NullInputError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.NULL_INPUT, message)
    this.name = 'NullInputError'
  }
}

// ============================================================================
// Guards
// ============================================================================

/**
 * Rejects a missing argument from an untyped caller.
 */
export function requireValue<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new NullInputError(`${name} must not be null`)
  }
  return value
}
