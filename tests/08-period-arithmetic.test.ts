/**
 * Segment 08: Period Arithmetic Tests
 *
 * Field-wise addition, unit arithmetic, scaling, normalization,
 * conversion and applying a period to dates and times.
 */

import { describe, it, expect } from 'vitest'
import { Period } from '../src/period'
import { LocalDate } from '../src/local-date'
import { LocalTime } from '../src/local-time'
import { LocalDateTime } from '../src/local-date-time'
import { YearMonth } from '../src/year-month'
import { Unit } from '../src/units'
import { INT_MAX, INT_MIN, LONG_MAX, LONG_MIN } from '../src/constants'
import { ArithmeticOverflowError, HasCalendarUnitsError, UnsupportedUnitError } from '../src/errors'

// ============================================================================
// 1. PERIOD + PERIOD
// ============================================================================

describe('plus / minus a period', () => {
  it('adds field by field without carrying', () => {
    const sum = Period.ofDate(0, 11, 0).plus(Period.ofDate(0, 1, 0))
    expect(sum.years).toBe(0)
    expect(sum.months).toBe(12)
  })

  it('subtracting a period from itself gives zero', () => {
    const p = Period.of(1, 2, 3, 4, 5, 6, 7)
    expect(p.minus(p)).toBe(Period.ZERO)
  })

  it('fails when a field overflows', () => {
    expect(() => Period.ofDate(INT_MAX, 0, 0).plus(Period.ofDate(1, 0, 0))).toThrow(ArithmeticOverflowError)
    expect(() => Period.ofTime(0, 0, 0, LONG_MIN).minus(Period.ofTime(0, 0, 0, 1))).toThrow(ArithmeticOverflowError)
  })
})

// ============================================================================
// 2. UNIT ARITHMETIC
// ============================================================================

describe('plus / minus an amount of a unit', () => {
  it('adds to the matching field', () => {
    const p = Period.ZERO.plus(1, Unit.YEARS).plus(2, Unit.MONTHS).plus(3, Unit.DAYS)
    expect(p.toString()).toBe('P1Y2M3D')
  })

  it('adds time units to the nanosecond count', () => {
    expect(Period.ZERO.plusHours(1).plusMinutes(30).toString()).toBe('PT1H30M')
    expect(Period.ZERO.plus(250, Unit.MILLIS).toString()).toBe('PT0.25S')
    expect(Period.ZERO.minusSeconds(1).toString()).toBe('PT-1S')
  })

  it('returns the same instance for a zero amount', () => {
    const p = Period.ofDate(1, 0, 0)
    expect(p.plus(0, Unit.HOURS)).toBe(p)
    expect(p.plusDays(0)).toBe(p)
  })

  it('rejects estimated units without a field', () => {
    expect(() => Period.ZERO.plus(1, Unit.WEEKS)).toThrow(UnsupportedUnitError)
    expect(() => Period.ZERO.minus(1, Unit.DECADES)).toThrow(UnsupportedUnitError)
  })

  it('subtracts the most negative amount without negating it', () => {
    const p = Period.ofTime(0, 0, 0, -1).minus(LONG_MIN, Unit.NANOS)
    expect(p.timeNanos).toBe(LONG_MAX)
    expect(() => Period.ZERO.minus(LONG_MIN, Unit.NANOS)).toThrow(ArithmeticOverflowError)
  })

  it('fails when a date field leaves 32 bits', () => {
    expect(() => Period.ofDate(0, 0, INT_MAX).plusDays(1)).toThrow(ArithmeticOverflowError)
    expect(() => Period.ZERO.minusYears(2n ** 31n + 1n)).toThrow(ArithmeticOverflowError)
  })
})

// ============================================================================
// 3. SCALING
// ============================================================================

describe('multipliedBy / negated', () => {
  it('scales every field', () => {
    expect(Period.of(1, 2, 3, 4, 5, 6).multipliedBy(2).toString()).toBe('P2Y4M6DT8H10M12S')
  })

  it('short-cuts zero and one', () => {
    const p = Period.ofDate(1, 2, 3)
    expect(p.multipliedBy(1)).toBe(p)
    expect(Period.ZERO.multipliedBy(5)).toBe(Period.ZERO)
    expect(p.multipliedBy(0)).toBe(Period.ZERO)
  })

  it('negates each field', () => {
    expect(Period.of(1, -2, 3, 0, 0, -1).negated().toString()).toBe('P-1Y2M-3DT1S')
  })

  it('fails to negate the most negative field', () => {
    expect(() => Period.ofDate(INT_MIN, 0, 0).negated()).toThrow(ArithmeticOverflowError)
  })
})

// ============================================================================
// 4. NORMALIZATION
// ============================================================================

describe('Normalization', () => {
  it('moves whole days out of the time part', () => {
    expect(Period.ofTime(49, 0, 0).normalizeHoursToDays().toString()).toBe('P2DT1H')
    expect(Period.ofTime(-25, 0, 0).normalizeHoursToDays().toString()).toBe('P-1DT-1H')
  })

  it('folds days into hours', () => {
    expect(Period.of(0, 0, 2, 1, 0, 0).normalizeDaysToHours().toString()).toBe('PT49H')
  })

  it('moves whole years out of months', () => {
    expect(Period.ofDate(1, 25, 0).normalizeMonthsISO().toString()).toBe('P3Y1M')
    expect(Period.ofDate(0, -13, 0).normalizeMonthsISO().toString()).toBe('P-1Y-1M')
  })

  it('returns the same instance when nothing moves', () => {
    const time = Period.ofTime(23, 0, 0)
    expect(time.normalizeHoursToDays()).toBe(time)
    expect(time.normalizeDaysToHours()).toBe(time)
    const months = Period.ofDate(1, 11, 0)
    expect(months.normalizeMonthsISO()).toBe(months)
  })
})

// ============================================================================
// 5. CONVERSION
// ============================================================================

describe('Conversion', () => {
  it('splits date and time parts', () => {
    const p = Period.of(1, 2, 3, 4, 5, 6)
    expect(p.toDateOnly().toString()).toBe('P1Y2M3D')
    expect(p.toTimeOnly().toString()).toBe('PT4H5M6S')
    expect(Period.ofDate(0, 0, 1).toTimeOnly()).toBe(Period.ZERO)
  })

  it('converts the time part to a duration', () => {
    expect(Period.ofTime(1, 0, 0, 5).toDuration().seconds).toBe(3600n)
    expect(Period.ofTime(1, 0, 0, 5).toDuration().nanos).toBe(5)
  })

  it('refuses a duration when calendar fields are set', () => {
    expect(() => Period.ofDate(0, 0, 1).toDuration()).toThrow(HasCalendarUnitsError)
    expect(() => Period.ofDate(0, 0, 1).toDuration()).toThrow(
      'Unable to convert period to duration as years/months/days are present: P1D',
    )
  })
})

// ============================================================================
// 6. APPLYING TO DATES & TIMES
// ============================================================================

describe('addTo / subtractFrom', () => {
  it('resolves months before days', () => {
    const date = LocalDate.of(2012, 1, 31).plusPeriod(Period.ofDate(0, 1, 1))
    expect(date.toString()).toBe('2012-03-01')
  })

  it('subtracts in the same order', () => {
    const date = LocalDate.of(2012, 3, 31).minusPeriod(Period.ofDate(0, 1, 1))
    expect(date.toString()).toBe('2012-02-28')
  })

  it('carries time into the date of a date-time', () => {
    const start = LocalDateTime.of(2012, 6, 30, 22, 0)
    expect(start.plusPeriod(Period.of(0, 0, 1, 3, 0, 0)).toString()).toBe('2012-07-02T01:00')
  })

  it('applies time periods to times of day', () => {
    expect(LocalTime.of(10, 0).plusPeriod(Period.ofTime(3, 0, 0)).toString()).toBe('13:00')
    expect(() => LocalTime.of(10, 0).plusPeriod(Period.ofDate(1, 0, 0))).toThrow(UnsupportedUnitError)
  })

  it('applies date periods to year-months', () => {
    expect(Period.ofDate(1, 2, 0).addTo(YearMonth.of(2012, 6)).toString()).toBe('2013-08')
  })

  it('leaves the target untouched for zero', () => {
    const date = LocalDate.of(2012, 6, 30)
    expect(Period.ZERO.addTo(date)).toBe(date)
  })
})
