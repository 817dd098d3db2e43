/**
 * Between-Calculator
 *
 * Periods between two calendar points. `periodBetween` works on any pair of
 * values from the same calendar by differencing the fields they share;
 * `periodBetweenDates` is the exact ISO year/month/day algorithm with its
 * end-of-month rules; `periodBetweenTimes` differences two times of day.
 */

import { MONTHS_PER_YEAR } from './constants'
import { ChronologyMismatchError, NoValidFieldsError } from './errors'
import { Field, isFieldSupported, type TemporalAccessor } from './fields'
import { Period } from './period'
import { safeSubtractLong, safeToInt, truncDivInt, truncModInt } from './safe-math'

/** What the ISO date algorithm needs from a date. */
export interface MonthArithmeticDate {
  readonly epochMonth: number
  readonly dayOfMonth: number
  plusMonths(months: number): MonthArithmeticDate
  toEpochDay(): number
  lengthOfMonth(): number
}

/** What the time-of-day algorithm needs from a time. */
export interface NanoOfDayTime {
  toNanoOfDay(): bigint
}

// ============================================================================
// Generic
// ============================================================================

function fieldDifference(start: TemporalAccessor, end: TemporalAccessor, field: Field): bigint {
  return safeSubtractLong(BigInt(end.get(field)), BigInt(start.get(field)))
}

/**
 * The period between two values of one calendar, from the difference of
 * each of year, month-of-year, day-of-month and nano-of-day that `start`
 * carries. When the calendar's months per year are fixed, the year and
 * month differences are recombined so both share the sign of the total:
 * 2010-06-12 to 2009-09-24 is -9 months and 12 days, not -1 year 3 months.
 */
export function periodBetween(start: TemporalAccessor, end: TemporalAccessor): Period {
  if (start.chronology.id !== end.chronology.id) {
    throw new ChronologyMismatchError(
      `Unable to calculate period as date-times have different chronologies: ${start.chronology.id} and ${end.chronology.id}`,
    )
  }

  let valid = false
  let years = 0
  let months = 0
  let days = 0
  let nanos = 0n

  const hasYear = isFieldSupported(start, Field.YEAR)
  if (hasYear) {
    years = safeToInt(fieldDifference(start, end, Field.YEAR))
    valid = true
  }
  const hasMonth = isFieldSupported(start, Field.MONTH_OF_YEAR)
  if (hasMonth) {
    months = safeToInt(fieldDifference(start, end, Field.MONTH_OF_YEAR))
    valid = true

    if (hasYear) {
      const startRange = start.chronology.range(Field.MONTH_OF_YEAR)
      const endRange = end.chronology.range(Field.MONTH_OF_YEAR)
      if (startRange.isFixed() && startRange.isIntValue() && startRange.equals(endRange)) {
        const monthCount = startRange.maximum - startRange.minimum + 1
        const total = months + years * monthCount
        months = truncModInt(total, monthCount)
        years = truncDivInt(total, monthCount)
      }
    }
  }
  if (isFieldSupported(start, Field.DAY_OF_MONTH)) {
    days = safeToInt(fieldDifference(start, end, Field.DAY_OF_MONTH))
    valid = true
  }
  if (isFieldSupported(start, Field.NANO_OF_DAY)) {
    nanos = fieldDifference(start, end, Field.NANO_OF_DAY)
    valid = true
  }

  if (!valid) {
    throw new NoValidFieldsError('Unable to calculate period as date-times do not have any valid fields')
  }
  return Period.of(years, months, days, 0, 0, 0, nanos)
}

// ============================================================================
// ISO
// ============================================================================

/**
 * The exact years, months and days from `start` to `end`.
 *
 * A month counts once its day-of-month is reached. Going forward, the
 * remaining days are counted from `start` plus the whole months, so
 * 2010-01-31 to 2010-03-01 is 1 month 1 day. Going backward, the
 * remaining days are reduced by the length of `end`'s month.
 */
export function periodBetweenDates(start: MonthArithmeticDate, end: MonthArithmeticDate): Period {
  let totalMonths = end.epochMonth - start.epochMonth
  let days = end.dayOfMonth - start.dayOfMonth
  if (totalMonths > 0 && days < 0) {
    totalMonths--
    days = end.toEpochDay() - start.plusMonths(totalMonths).toEpochDay()
  } else if (totalMonths < 0 && days > 0) {
    totalMonths++
    days -= end.lengthOfMonth()
  }
  return Period.ofDate(truncDivInt(totalMonths, MONTHS_PER_YEAR), truncModInt(totalMonths, MONTHS_PER_YEAR), days)
}

/** The time-only period from one time of day to another. */
export function periodBetweenTimes(start: NanoOfDayTime, end: NanoOfDayTime): Period {
  return Period.ofTime(0, 0, 0, safeSubtractLong(end.toNanoOfDay(), start.toNanoOfDay()))
}
