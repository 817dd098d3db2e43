/**
 * YearMonth
 *
 * A year and month in the ISO calendar, such as 2012-06. Carries no
 * day-of-month, so periods between year-months have no days part.
 */

import type { Chronology } from './chrono/chronology'
import { IsoChronology } from './chrono/iso-chronology'
import { LONG_MAX, LONG_MIN, MAX_YEAR, MIN_YEAR } from './constants'
import { InvalidValueError, UnsupportedFieldError, UnsupportedUnitError } from './errors'
import { Field, ValueRange, fieldRange, type TemporalAccessor } from './fields'
import { LocalDate } from './local-date'
import { type Amount, toLong, safeMultiplyLong, floorDivLong, floorModLong } from './safe-math'
import { daysInMonth, formatYear, pad2 } from './time-date'
import { Unit, type UnitAdjustable } from './units'

const SUPPORTED: readonly Field[] = [
  Field.ERA, Field.YEAR_OF_ERA, Field.YEAR, Field.MONTH_OF_YEAR, Field.EPOCH_MONTH,
]

export class YearMonth implements TemporalAccessor, UnitAdjustable<YearMonth> {
  private constructor(
    readonly year: number,
    readonly monthValue: number,
  ) {}

  static of(year: number, month: number): YearMonth {
    fieldRange(Field.YEAR).checkValidValue(year, Field.YEAR)
    fieldRange(Field.MONTH_OF_YEAR).checkValidValue(month, Field.MONTH_OF_YEAR)
    if (!Number.isInteger(year) || !Number.isInteger(month)) {
      throw new InvalidValueError(`Year-month fields must be integers: ${year}-${month}`)
    }
    return new YearMonth(year, month)
  }

  get chronology(): Chronology {
    return IsoChronology
  }

  /** Months since 1970-01. */
  get epochMonth(): number {
    return (this.year - 1970) * 12 + this.monthValue - 1
  }

  lengthOfMonth(): number {
    return daysInMonth(this.year, this.monthValue)
  }

  atDay(dayOfMonth: number): LocalDate {
    return LocalDate.of(this.year, this.monthValue, dayOfMonth)
  }

  get(field: Field): number {
    switch (field) {
      case Field.ERA:
        return this.year >= 1 ? 1 : 0
      case Field.YEAR_OF_ERA:
        return this.year >= 1 ? this.year : 1 - this.year
      case Field.YEAR:
        return this.year
      case Field.MONTH_OF_YEAR:
        return this.monthValue
      case Field.EPOCH_MONTH:
        return this.epochMonth
      default:
        throw new UnsupportedFieldError(field)
    }
  }

  range(field: Field): ValueRange {
    if (!SUPPORTED.includes(field)) throw new UnsupportedFieldError(field)
    if (field === Field.YEAR_OF_ERA) {
      return this.year <= 0 ? ValueRange.of(1, MAX_YEAR + 1) : ValueRange.of(1, MAX_YEAR)
    }
    return fieldRange(field)
  }

  // ========== Arithmetic ==========

  plusMonths(months: Amount): YearMonth {
    const amount = toLong(months)
    if (amount === 0n) return this
    const calc = BigInt(this.year) * 12n + BigInt(this.monthValue - 1) + amount
    return this.withYearMonth(floorDivLong(calc, 12n), Number(floorModLong(calc, 12n)) + 1)
  }

  plusYears(years: Amount): YearMonth {
    const amount = toLong(years)
    if (amount === 0n) return this
    return this.withYearMonth(BigInt(this.year) + amount, this.monthValue)
  }

  plus(amount: Amount, unit: Unit): YearMonth {
    const value = toLong(amount)
    switch (unit) {
      case Unit.MONTHS:
        return this.plusMonths(value)
      case Unit.YEARS:
        return this.plusYears(value)
      case Unit.DECADES:
        return this.plusYears(safeMultiplyLong(value, 10n))
      case Unit.CENTURIES:
        return this.plusYears(safeMultiplyLong(value, 100n))
      case Unit.MILLENNIA:
        return this.plusYears(safeMultiplyLong(value, 1000n))
      default:
        throw new UnsupportedUnitError(unit)
    }
  }

  minus(amount: Amount, unit: Unit): YearMonth {
    const value = toLong(amount)
    return value === LONG_MIN ? this.plus(LONG_MAX, unit).plus(1n, unit) : this.plus(-value, unit)
  }

  private withYearMonth(year: bigint, month: number): YearMonth {
    if (year < BigInt(MIN_YEAR) || year > BigInt(MAX_YEAR)) {
      throw new InvalidValueError(`Invalid value for year (valid values ${fieldRange(Field.YEAR).toString()}): ${year}`)
    }
    return new YearMonth(Number(year), month)
  }

  // ========== Comparison ==========

  compareTo(other: YearMonth): number {
    return this.year - other.year || this.monthValue - other.monthValue
  }

  equals(other: YearMonth): boolean {
    return this.compareTo(other) === 0
  }

  toString(): string {
    return `${formatYear(this.year)}-${pad2(this.monthValue)}`
  }
}
