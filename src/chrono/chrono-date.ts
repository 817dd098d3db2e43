/**
 * Calendar Systems
 *
 * A non-ISO calendar is a CalendarSystem built from a CalendarRules value:
 * the rules say how years and eras are numbered, the ISO calendar supplies
 * months, days and arithmetic. A ChronoDate is an ISO date viewed through
 * those rules, so there is one date class for every calendar.
 */

import type { Chronology } from './chronology'
import { InvalidValueError, UnsupportedFieldError } from '../errors'
import { Field, ValueRange, fieldRange, isTimeField, type TemporalAccessor } from '../fields'
import { LocalDate } from '../local-date'
import type { Period } from '../period'
import type { Amount } from '../safe-math'
import { isLeapYear, pad2 } from '../time-date'
import { Unit, type UnitAdjustable } from '../units'

// ============================================================================
// Rules
// ============================================================================

export interface CalendarRules {
  readonly id: string
  readonly eraRange: ValueRange
  readonly yearRange: ValueRange
  readonly yearOfEraRange: ValueRange
  /** This calendar's proleptic year of an ISO date. */
  prolepticYear(iso: LocalDate): number
  /** The ISO year that a proleptic year of this calendar falls in. */
  isoYear(prolepticYear: number): number
  era(iso: LocalDate): number
  yearOfEra(iso: LocalDate): number
  /** The ISO year of a year-of-era; throws InvalidValueError for an unknown era. */
  isoYearOfEra(era: number, yearOfEra: number): number
  /** Year-of-era range of the era containing `iso`. */
  yearOfEraRangeAt(iso: LocalDate): ValueRange
  eraName(era: number): string
  /** Throws InvalidValueError when `iso` lies outside the calendar. */
  checkDate(iso: LocalDate): void
}

// ============================================================================
// Calendar System
// ============================================================================

export class CalendarSystem implements Chronology {
  constructor(private readonly rules: CalendarRules) {}

  get id(): string {
    return this.rules.id
  }

  isLeapYear(prolepticYear: number): boolean {
    return isLeapYear(this.rules.isoYear(prolepticYear))
  }

  range(field: Field): ValueRange {
    switch (field) {
      case Field.ERA:
        return this.rules.eraRange
      case Field.YEAR:
        return this.rules.yearRange
      case Field.YEAR_OF_ERA:
        return this.rules.yearOfEraRange
      default:
        return fieldRange(field)
    }
  }

  eraName(era: number): string {
    return this.rules.eraName(era)
  }

  // ========== Date Factories ==========

  date(prolepticYear: number, month: number, dayOfMonth: number): ChronoDate {
    this.rules.yearRange.checkValidValue(prolepticYear, Field.YEAR)
    return this.dateFrom(LocalDate.of(this.rules.isoYear(prolepticYear), month, dayOfMonth))
  }

  dateOfEra(era: number, yearOfEra: number, month: number, dayOfMonth: number): ChronoDate {
    return this.dateFrom(LocalDate.of(this.rules.isoYearOfEra(era, yearOfEra), month, dayOfMonth))
  }

  dateFromEpochDay(epochDay: Amount): ChronoDate {
    return this.dateFrom(LocalDate.ofEpochDay(epochDay))
  }

  /** The same day as an ISO date, in this calendar. */
  dateFrom(iso: LocalDate): ChronoDate {
    this.rules.checkDate(iso)
    return new ChronoDate(this, this.rules, iso)
  }
}

// ============================================================================
// Date
// ============================================================================

export class ChronoDate implements TemporalAccessor, UnitAdjustable<ChronoDate> {
  /** @internal use CalendarSystem factories */
  constructor(
    readonly chronology: CalendarSystem,
    private readonly rules: CalendarRules,
    private readonly iso: LocalDate,
  ) {}

  get prolepticYear(): number {
    return this.rules.prolepticYear(this.iso)
  }

  get era(): number {
    return this.rules.era(this.iso)
  }

  get yearOfEra(): number {
    return this.rules.yearOfEra(this.iso)
  }

  get monthValue(): number {
    return this.iso.monthValue
  }

  get dayOfMonth(): number {
    return this.iso.dayOfMonth
  }

  get epochMonth(): number {
    return this.iso.epochMonth
  }

  toEpochDay(): number {
    return this.iso.toEpochDay()
  }

  toLocalDate(): LocalDate {
    return this.iso
  }

  lengthOfMonth(): number {
    return this.iso.lengthOfMonth()
  }

  isLeapYear(): boolean {
    return this.iso.isLeapYear()
  }

  get(field: Field): number {
    switch (field) {
      case Field.ERA:
        return this.era
      case Field.YEAR_OF_ERA:
        return this.yearOfEra
      case Field.YEAR:
        return this.prolepticYear
      default:
        return this.iso.get(field)
    }
  }

  range(field: Field): ValueRange {
    if (isTimeField(field)) throw new UnsupportedFieldError(field)
    switch (field) {
      case Field.DAY_OF_MONTH:
      case Field.DAY_OF_YEAR:
        return this.iso.range(field)
      case Field.YEAR_OF_ERA:
        return this.rules.yearOfEraRangeAt(this.iso)
      default:
        return this.chronology.range(field)
    }
  }

  // ========== Adjusters ==========

  withYear(prolepticYear: number): ChronoDate {
    this.rules.yearRange.checkValidValue(prolepticYear, Field.YEAR)
    return this.with(this.iso.withYear(this.rules.isoYear(prolepticYear)))
  }

  /** Moves to another year of the current era, keeping month and day. */
  withYearOfEra(yearOfEra: number): ChronoDate {
    const moved = this.with(this.iso.withYear(this.rules.isoYearOfEra(this.era, yearOfEra)))
    if (moved.era !== this.era) {
      throw new InvalidValueError(`Invalid year of era ${this.rules.eraName(this.era)}: ${yearOfEra}`)
    }
    return moved
  }

  /** Moves to the same year-of-era in another era. */
  withEra(era: number): ChronoDate {
    this.rules.eraRange.checkValidValue(era, Field.ERA)
    if (era === this.era) return this
    const moved = this.with(this.iso.withYear(this.rules.isoYearOfEra(era, this.yearOfEra)))
    if (moved.era !== era) {
      throw new InvalidValueError(`Invalid year of era ${this.rules.eraName(era)}: ${this.yearOfEra}`)
    }
    return moved
  }

  // ========== Arithmetic ==========

  plus(amount: Amount, unit: Unit): ChronoDate {
    return this.with(this.iso.plus(amount, unit))
  }

  minus(amount: Amount, unit: Unit): ChronoDate {
    return this.with(this.iso.minus(amount, unit))
  }

  plusMonths(months: Amount): ChronoDate {
    return this.plus(months, Unit.MONTHS)
  }

  plusPeriod(period: Period): ChronoDate {
    return period.addTo<ChronoDate>(this)
  }

  minusPeriod(period: Period): ChronoDate {
    return period.subtractFrom<ChronoDate>(this)
  }

  private with(iso: LocalDate): ChronoDate {
    if (iso.equals(this.iso)) return this
    return this.chronology.dateFrom(iso)
  }

  // ========== Comparison ==========

  equals(other: ChronoDate): boolean {
    return this.chronology.id === other.chronology.id && this.iso.equals(other.iso)
  }

  /** e.g. `0544BUDDHIST-01-01 (ThaiBuddhist)` */
  toString(): string {
    const yoe = this.yearOfEra
    const year = yoe < 1000 ? `${yoe}`.padStart(4, '0') : `${yoe}`
    return (
      `${year}${this.rules.eraName(this.era)}-${pad2(this.monthValue)}-${pad2(this.dayOfMonth)}` +
      ` (${this.chronology.id})`
    )
  }
}
