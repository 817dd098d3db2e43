/**
 * Calendar Fields
 *
 * The closed set of date-time fields, their value ranges, and the accessor
 * interface through which period arithmetic reads a calendar value without
 * knowing its concrete type.
 */

import type { Chronology } from './chrono/chronology'
import { MIN_YEAR, MAX_YEAR, SECONDS_PER_DAY } from './constants'
import { InvalidValueError, UnsupportedFieldError } from './errors'

// ============================================================================
// Fields
// ============================================================================

export const Field = {
  ERA: 'era',
  YEAR_OF_ERA: 'yearOfEra',
  YEAR: 'year',
  MONTH_OF_YEAR: 'monthOfYear',
  DAY_OF_MONTH: 'dayOfMonth',
  DAY_OF_YEAR: 'dayOfYear',
  DAY_OF_WEEK: 'dayOfWeek',
  EPOCH_DAY: 'epochDay',
  EPOCH_MONTH: 'epochMonth',
  HOUR_OF_DAY: 'hourOfDay',
  MINUTE_OF_HOUR: 'minuteOfHour',
  SECOND_OF_MINUTE: 'secondOfMinute',
  NANO_OF_SECOND: 'nanoOfSecond',
  NANO_OF_DAY: 'nanoOfDay',
} as const

export type Field = (typeof Field)[keyof typeof Field]

export const DATE_FIELDS: readonly Field[] = [
  Field.ERA, Field.YEAR_OF_ERA, Field.YEAR, Field.MONTH_OF_YEAR,
  Field.DAY_OF_MONTH, Field.DAY_OF_YEAR, Field.DAY_OF_WEEK,
  Field.EPOCH_DAY, Field.EPOCH_MONTH,
]

export const TIME_FIELDS: readonly Field[] = [
  Field.HOUR_OF_DAY, Field.MINUTE_OF_HOUR, Field.SECOND_OF_MINUTE,
  Field.NANO_OF_SECOND, Field.NANO_OF_DAY,
]

export function isDateField(field: Field): boolean {
  return DATE_FIELDS.includes(field)
}

export function isTimeField(field: Field): boolean {
  return TIME_FIELDS.includes(field)
}

// ============================================================================
// Value Range
// ============================================================================

/**
 * The range of valid values for a field.
 *
 * A range is described by four bounds: the absolute minimum, the largest
 * minimum, the smallest maximum and the absolute maximum. Day-of-month, for
 * example, is 1 - 28/31: its maximum depends on the month.
 */
export class ValueRange {
  private constructor(
    readonly minimum: number,
    readonly largestMinimum: number,
    readonly smallestMaximum: number,
    readonly maximum: number,
  ) {}

  static of(min: number, max: number): ValueRange
  static of(min: number, smallestMax: number, max: number): ValueRange
  static of(min: number, largestMin: number, smallestMax: number, max: number): ValueRange
  static of(a: number, b: number, c?: number, d?: number): ValueRange {
    let min = a
    let largestMin = a
    let smallestMax = b
    let max = b
    if (d !== undefined && c !== undefined) {
      largestMin = b
      smallestMax = c
      max = d
    } else if (c !== undefined) {
      max = c
    }
    if (min > largestMin) {
      throw new InvalidValueError('Minimum value must be less than or equal to largest minimum value')
    }
    if (smallestMax > max) {
      throw new InvalidValueError('Smallest maximum value must be less than or equal to maximum value')
    }
    if (largestMin > max) {
      throw new InvalidValueError('Minimum value must be less than or equal to maximum value')
    }
    return new ValueRange(min, largestMin, smallestMax, max)
  }

  /** True when both the minimum and maximum are single values. */
  isFixed(): boolean {
    return this.minimum === this.largestMinimum && this.smallestMaximum === this.maximum
  }

  /** True when every value in the range fits in 32 bits. */
  isIntValue(): boolean {
    return this.minimum >= -2147483648 && this.maximum <= 2147483647
  }

  isValidValue(value: number): boolean {
    return value >= this.minimum && value <= this.maximum
  }

  checkValidValue(value: number, field: Field): number {
    if (!this.isValidValue(value)) {
      throw new InvalidValueError(`Invalid value for ${field} (valid values ${this.toString()}): ${value}`)
    }
    return value
  }

  equals(other: ValueRange): boolean {
    return (
      this.minimum === other.minimum &&
      this.largestMinimum === other.largestMinimum &&
      this.smallestMaximum === other.smallestMaximum &&
      this.maximum === other.maximum
    )
  }

  toString(): string {
    let text = `${this.minimum}`
    if (this.minimum !== this.largestMinimum) text += `/${this.largestMinimum}`
    text += ` - ${this.smallestMaximum}`
    if (this.smallestMaximum !== this.maximum) text += `/${this.maximum}`
    return text
  }
}

// ============================================================================
// Base Ranges
// ============================================================================

const BASE_RANGES: Record<Field, ValueRange> = {
  era: ValueRange.of(0, 1),
  yearOfEra: ValueRange.of(1, MAX_YEAR, MAX_YEAR + 1),
  year: ValueRange.of(MIN_YEAR, MAX_YEAR),
  monthOfYear: ValueRange.of(1, 12),
  dayOfMonth: ValueRange.of(1, 28, 31),
  dayOfYear: ValueRange.of(1, 365, 366),
  dayOfWeek: ValueRange.of(1, 7),
  epochDay: ValueRange.of(-365243219162, 365241780471),
  epochMonth: ValueRange.of((MIN_YEAR - 1970) * 12, (MAX_YEAR - 1970) * 12 + 11),
  hourOfDay: ValueRange.of(0, 23),
  minuteOfHour: ValueRange.of(0, 59),
  secondOfMinute: ValueRange.of(0, 59),
  nanoOfSecond: ValueRange.of(0, 999_999_999),
  nanoOfDay: ValueRange.of(0, SECONDS_PER_DAY * 1_000_000_000 - 1),
}

/** The chronology-independent range of a field. */
export function fieldRange(field: Field): ValueRange {
  return BASE_RANGES[field]
}

// ============================================================================
// Accessor
// ============================================================================

/**
 * Read access to a calendar value's fields.
 *
 * `get` throws UnsupportedFieldError for a field the value does not carry.
 */
export interface TemporalAccessor {
  readonly chronology: Chronology
  get(field: Field): number
  range(field: Field): ValueRange
}

/**
 * Probes whether an accessor carries a field.
 * Only UnsupportedFieldError counts as absence; any other failure propagates.
 */
export function isFieldSupported(accessor: TemporalAccessor, field: Field): boolean {
  try {
    accessor.get(field)
    return true
  } catch (error) {
    if (error instanceof UnsupportedFieldError) return false
    throw error
  }
}
