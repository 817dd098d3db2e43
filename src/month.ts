/**
 * Month-of-year
 *
 * Twelve singleton values, January (1) to December (12). A Month carries
 * only the month-of-year field, so periods between months are whole months.
 */

import type { Chronology } from './chrono/chronology'
import { IsoChronology } from './chrono/iso-chronology'
import { Field, ValueRange, type TemporalAccessor } from './fields'
import { InvalidValueError, UnsupportedFieldError } from './errors'
import { floorModInt } from './safe-math'

const NAMES = [
  'JANUARY', 'FEBRUARY', 'MARCH', 'APRIL', 'MAY', 'JUNE',
  'JULY', 'AUGUST', 'SEPTEMBER', 'OCTOBER', 'NOVEMBER', 'DECEMBER',
] as const

export type MonthName = (typeof NAMES)[number]

const MONTH_RANGE = ValueRange.of(1, 12)

export class Month implements TemporalAccessor {
  private static readonly VALUES: readonly Month[] = NAMES.map((name, i) => new Month(i + 1, name))

  static readonly JANUARY = Month.of(1)
  static readonly FEBRUARY = Month.of(2)
  static readonly MARCH = Month.of(3)
  static readonly APRIL = Month.of(4)
  static readonly MAY = Month.of(5)
  static readonly JUNE = Month.of(6)
  static readonly JULY = Month.of(7)
  static readonly AUGUST = Month.of(8)
  static readonly SEPTEMBER = Month.of(9)
  static readonly OCTOBER = Month.of(10)
  static readonly NOVEMBER = Month.of(11)
  static readonly DECEMBER = Month.of(12)

  private constructor(
    readonly value: number,
    readonly name: MonthName,
  ) {}

  static of(month: number): Month {
    const found = Month.VALUES[month - 1]
    if (!Number.isInteger(month) || found === undefined) {
      throw new InvalidValueError(`Invalid value for monthOfYear: ${month}`)
    }
    return found
  }

  static values(): readonly Month[] {
    return Month.VALUES
  }

  get chronology(): Chronology {
    return IsoChronology
  }

  get(field: Field): number {
    if (field === Field.MONTH_OF_YEAR) return this.value
    throw new UnsupportedFieldError(field)
  }

  range(field: Field): ValueRange {
    if (field === Field.MONTH_OF_YEAR) return MONTH_RANGE
    throw new UnsupportedFieldError(field)
  }

  /** Rolls around the year: DECEMBER.plus(1) is JANUARY. */
  plus(months: number): Month {
    return Month.of(floorModInt(this.value - 1 + (months % 12), 12) + 1)
  }

  minus(months: number): Month {
    return this.plus(-(months % 12))
  }

  length(leapYear: boolean): number {
    switch (this.value) {
      case 2:
        return leapYear ? 29 : 28
      case 4:
      case 6:
      case 9:
      case 11:
        return 30
      default:
        return 31
    }
  }

  minLength(): number {
    return this.length(false)
  }

  maxLength(): number {
    return this.length(true)
  }

  /** Day-of-year of the first day of this month. */
  firstDayOfYear(leapYear: boolean): number {
    let day = 1
    for (let m = 1; m < this.value; m++) {
      day += Month.of(m).length(leapYear)
    }
    return day
  }

  toString(): string {
    return this.name
  }
}
