/**
 * LocalDate
 *
 * An ISO calendar date without time or zone, from -999,999,999-01-01 to
 * 999,999,999-12-31. Month arithmetic clamps to the last valid day:
 * 2012-01-31 plus one month is 2012-02-29.
 */

import type { Chronology } from './chrono/chronology'
import { IsoChronology } from './chrono/iso-chronology'
import { LONG_MAX, LONG_MIN, MAX_YEAR, MIN_YEAR } from './constants'
import { InvalidValueError, ParseError, UnsupportedFieldError, UnsupportedUnitError } from './errors'
import { Field, ValueRange, fieldRange, isTimeField, type TemporalAccessor } from './fields'
import { Month } from './month'
import type { Period } from './period'
import { type Result, Ok, Err, unwrap } from './result'
import {
  type Amount,
  toLong,
  safeMultiplyLong,
  floorDivLong,
  floorModLong,
  truncDivInt,
} from './safe-math'
import {
  dateToEpochDay,
  epochDayToDate,
  dayOfWeekOf,
  dayOfYearOf,
  daysInMonth,
  daysInYear,
  formatDateParts,
  isLeapYear,
  parseDateParts,
} from './time-date'
import { Unit, type UnitAdjustable } from './units'

export class LocalDate implements TemporalAccessor, UnitAdjustable<LocalDate> {
  static readonly MIN = new LocalDate(MIN_YEAR, 1, 1)
  static readonly MAX = new LocalDate(MAX_YEAR, 12, 31)
  static readonly EPOCH = new LocalDate(1970, 1, 1)

  private constructor(
    readonly year: number,
    readonly monthValue: number,
    readonly dayOfMonth: number,
  ) {}

  // ========== Factories ==========

  static of(year: number, month: number | Month, dayOfMonth: number): LocalDate {
    const monthValue = typeof month === 'number' ? month : month.value
    fieldRange(Field.YEAR).checkValidValue(year, Field.YEAR)
    fieldRange(Field.MONTH_OF_YEAR).checkValidValue(monthValue, Field.MONTH_OF_YEAR)
    fieldRange(Field.DAY_OF_MONTH).checkValidValue(dayOfMonth, Field.DAY_OF_MONTH)
    if (!Number.isInteger(year) || !Number.isInteger(monthValue) || !Number.isInteger(dayOfMonth)) {
      throw new InvalidValueError(`Date fields must be integers: ${year}-${monthValue}-${dayOfMonth}`)
    }
    if (dayOfMonth > daysInMonth(year, monthValue)) {
      throw new InvalidValueError(
        `Invalid date '${Month.of(monthValue).name} ${dayOfMonth}'` +
          (dayOfMonth === 29 ? ` as '${year}' is not a leap year` : ''),
      )
    }
    return new LocalDate(year, monthValue, dayOfMonth)
  }

  static ofEpochDay(epochDay: Amount): LocalDate {
    const day = toLong(epochDay)
    const range = fieldRange(Field.EPOCH_DAY)
    if (day < BigInt(range.minimum) || day > BigInt(range.maximum)) {
      throw new InvalidValueError(`Invalid value for epochDay (valid values ${range.toString()}): ${day}`)
    }
    const { year, month, day: dom } = epochDayToDate(Number(day))
    return new LocalDate(year, month, dom)
  }

  static ofYearDay(year: number, dayOfYear: number): LocalDate {
    fieldRange(Field.YEAR).checkValidValue(year, Field.YEAR)
    if (!Number.isInteger(dayOfYear) || dayOfYear < 1 || dayOfYear > daysInYear(year)) {
      throw new InvalidValueError(`Invalid value for dayOfYear in year ${year}: ${dayOfYear}`)
    }
    return LocalDate.ofEpochDay(dateToEpochDay(year, 1, 1) + dayOfYear - 1)
  }

  static parse(text: string): LocalDate {
    return unwrap(parseLocalDate(text))
  }

  // ========== Queries ==========

  get chronology(): Chronology {
    return IsoChronology
  }

  get month(): Month {
    return Month.of(this.monthValue)
  }

  /** Months since 1970-01. */
  get epochMonth(): number {
    return (this.year - 1970) * 12 + this.monthValue - 1
  }

  get dayOfYear(): number {
    return dayOfYearOf(this.year, this.monthValue, this.dayOfMonth)
  }

  /** 1 (Monday) to 7 (Sunday). */
  get dayOfWeek(): number {
    return dayOfWeekOf(this.toEpochDay())
  }

  isLeapYear(): boolean {
    return isLeapYear(this.year)
  }

  lengthOfMonth(): number {
    return daysInMonth(this.year, this.monthValue)
  }

  lengthOfYear(): number {
    return daysInYear(this.year)
  }

  toEpochDay(): number {
    return dateToEpochDay(this.year, this.monthValue, this.dayOfMonth)
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
      case Field.DAY_OF_MONTH:
        return this.dayOfMonth
      case Field.DAY_OF_YEAR:
        return this.dayOfYear
      case Field.DAY_OF_WEEK:
        return this.dayOfWeek
      case Field.EPOCH_DAY:
        return this.toEpochDay()
      case Field.EPOCH_MONTH:
        return this.epochMonth
      default:
        throw new UnsupportedFieldError(field)
    }
  }

  range(field: Field): ValueRange {
    if (isTimeField(field)) throw new UnsupportedFieldError(field)
    switch (field) {
      case Field.DAY_OF_MONTH:
        return ValueRange.of(1, this.lengthOfMonth())
      case Field.DAY_OF_YEAR:
        return ValueRange.of(1, this.lengthOfYear())
      case Field.YEAR_OF_ERA:
        return this.year <= 0 ? ValueRange.of(1, MAX_YEAR + 1) : ValueRange.of(1, MAX_YEAR)
      default:
        return fieldRange(field)
    }
  }

  // ========== Adjusters ==========

  withYear(year: number): LocalDate {
    if (year === this.year) return this
    fieldRange(Field.YEAR).checkValidValue(year, Field.YEAR)
    return resolvePreviousValid(year, this.monthValue, this.dayOfMonth)
  }

  withMonth(month: number): LocalDate {
    if (month === this.monthValue) return this
    fieldRange(Field.MONTH_OF_YEAR).checkValidValue(month, Field.MONTH_OF_YEAR)
    return resolvePreviousValid(this.year, month, this.dayOfMonth)
  }

  withDayOfMonth(dayOfMonth: number): LocalDate {
    if (dayOfMonth === this.dayOfMonth) return this
    return LocalDate.of(this.year, this.monthValue, dayOfMonth)
  }

  // ========== Arithmetic ==========

  plusDays(days: Amount): LocalDate {
    const amount = toLong(days)
    if (amount === 0n) return this
    return LocalDate.ofEpochDay(BigInt(this.toEpochDay()) + amount)
  }

  plusWeeks(weeks: Amount): LocalDate {
    return this.plusDays(safeMultiplyLong(toLong(weeks), 7n))
  }

  plusMonths(months: Amount): LocalDate {
    const amount = toLong(months)
    if (amount === 0n) return this
    const monthCount = BigInt(this.year) * 12n + BigInt(this.monthValue - 1)
    const calc = monthCount + amount
    const newYear = floorDivLong(calc, 12n)
    if (newYear < BigInt(MIN_YEAR) || newYear > BigInt(MAX_YEAR)) {
      throw new InvalidValueError(`Invalid value for year (valid values ${fieldRange(Field.YEAR).toString()}): ${newYear}`)
    }
    const newMonth = Number(floorModLong(calc, 12n)) + 1
    return resolvePreviousValid(Number(newYear), newMonth, this.dayOfMonth)
  }

  plusYears(years: Amount): LocalDate {
    const amount = toLong(years)
    if (amount === 0n) return this
    const newYear = BigInt(this.year) + amount
    if (newYear < BigInt(MIN_YEAR) || newYear > BigInt(MAX_YEAR)) {
      throw new InvalidValueError(`Invalid value for year (valid values ${fieldRange(Field.YEAR).toString()}): ${newYear}`)
    }
    return resolvePreviousValid(Number(newYear), this.monthValue, this.dayOfMonth)
  }

  plus(amount: Amount, unit: Unit): LocalDate {
    const value = toLong(amount)
    switch (unit) {
      case Unit.DAYS:
        return this.plusDays(value)
      case Unit.WEEKS:
        return this.plusWeeks(value)
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

  minus(amount: Amount, unit: Unit): LocalDate {
    const value = toLong(amount)
    return value === LONG_MIN ? this.plus(LONG_MAX, unit).plus(1n, unit) : this.plus(-value, unit)
  }

  minusDays(days: Amount): LocalDate {
    return this.minus(days, Unit.DAYS)
  }

  minusMonths(months: Amount): LocalDate {
    return this.minus(months, Unit.MONTHS)
  }

  minusYears(years: Amount): LocalDate {
    return this.minus(years, Unit.YEARS)
  }

  plusPeriod(period: Period): LocalDate {
    return period.addTo<LocalDate>(this)
  }

  minusPeriod(period: Period): LocalDate {
    return period.subtractFrom<LocalDate>(this)
  }

  /**
   * The number of whole units from this date to `end`, negative when `end`
   * is earlier. A month is complete once the day-of-month is reached.
   */
  until(end: LocalDate, unit: Unit): number {
    switch (unit) {
      case Unit.DAYS:
        return end.toEpochDay() - this.toEpochDay()
      case Unit.WEEKS:
        return truncDivInt(end.toEpochDay() - this.toEpochDay(), 7)
      case Unit.MONTHS:
        return this.monthsUntil(end)
      case Unit.YEARS:
        return truncDivInt(this.monthsUntil(end), 12)
      case Unit.DECADES:
        return truncDivInt(this.monthsUntil(end), 120)
      case Unit.CENTURIES:
        return truncDivInt(this.monthsUntil(end), 1200)
      case Unit.MILLENNIA:
        return truncDivInt(this.monthsUntil(end), 12000)
      case Unit.ERAS:
        return end.get(Field.ERA) - this.get(Field.ERA)
      default:
        throw new UnsupportedUnitError(unit)
    }
  }

  private monthsUntil(end: LocalDate): number {
    let months = end.epochMonth - this.epochMonth
    if (months > 0 && end.dayOfMonth < this.dayOfMonth) months--
    else if (months < 0 && end.dayOfMonth > this.dayOfMonth) months++
    return months
  }

  // ========== Comparison ==========

  compareTo(other: LocalDate): number {
    return (
      this.year - other.year ||
      this.monthValue - other.monthValue ||
      this.dayOfMonth - other.dayOfMonth
    )
  }

  isBefore(other: LocalDate): boolean {
    return this.compareTo(other) < 0
  }

  isAfter(other: LocalDate): boolean {
    return this.compareTo(other) > 0
  }

  equals(other: LocalDate): boolean {
    return this.compareTo(other) === 0
  }

  toString(): string {
    return formatDateParts(this.year, this.monthValue, this.dayOfMonth)
  }
}

function resolvePreviousValid(year: number, month: number, day: number): LocalDate {
  return LocalDate.of(year, month, Math.min(day, daysInMonth(year, month)))
}

// ============================================================================
// Parsing
// ============================================================================

/** Parses `YYYY-MM-DD`, with a sign and more digits for years beyond 9999. */
export function parseLocalDate(text: string): Result<LocalDate, ParseError> {
  const parsed = parseDateParts(text)
  if (!parsed.ok) return parsed
  const { year, month, day } = parsed.value
  if (year < MIN_YEAR || year > MAX_YEAR) {
    return Err(new ParseError(`Year out of range in date: '${text}'`, text, 0))
  }
  return Ok(LocalDate.of(year, month, day))
}
