/**
 * Period
 *
 * An immutable amount of calendar and clock time: years, months and days,
 * plus one signed nanosecond count for the time of day part. Hours,
 * minutes, seconds and sub-second nanos are derived from that count, never
 * stored, so the time part can't be accounted for twice.
 *
 * Every period whose four fields are zero is `Period.ZERO` itself.
 * Nothing normalizes across fields unless asked to: 11 months plus
 * 1 month is 12 months.
 */

import {
  LONG_MAX,
  LONG_MIN,
  MONTHS_PER_YEAR,
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MICRO,
  NANOS_PER_MILLI,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from './constants'
import { Duration } from './duration'
import {
  HasCalendarUnitsError,
  UnsupportedUnitError,
  requireValue,
  type NullInputError,
  type ParseError,
} from './errors'
import { type PeriodFields, formatPeriod, parsePeriodFields } from './period-format'
import { type Result, Ok, unwrap } from './result'
import {
  type Amount,
  checkInt,
  toLong,
  safeAddInt,
  safeAddLong,
  safeMultiplyInt,
  safeMultiplyLong,
  safeSubtractInt,
  safeSubtractLong,
  safeToInt,
  truncDivInt,
  truncModInt,
} from './safe-math'
import { Unit, isDurationEstimated, type UnitAdjustable } from './units'

export class Period implements PeriodFields {
  static readonly ZERO = new Period(0, 0, 0, 0n)

  private constructor(
    readonly years: number,
    readonly months: number,
    readonly days: number,
    readonly timeNanos: bigint,
  ) {}

  /** All construction goes through here so that zero is always the singleton. */
  private static create(years: number, months: number, days: number, timeNanos: bigint): Period {
    if (years === 0 && months === 0 && days === 0 && timeNanos === 0n) {
      return Period.ZERO
    }
    // + 0 folds -0 into 0
    return new Period(years + 0, months + 0, days + 0, timeNanos)
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  static of(
    years: number,
    months: number,
    days: number,
    hours: number,
    minutes: number,
    seconds: number,
    nanos: Amount = 0,
  ): Period {
    checkInt(years, 'years')
    checkInt(months, 'months')
    checkInt(days, 'days')
    return Period.create(years, months, days, timeToNanos(hours, minutes, seconds, nanos))
  }

  static ofDate(years: number, months: number, days: number): Period {
    return Period.of(years, months, days, 0, 0, 0)
  }

  static ofTime(hours: number, minutes: number, seconds: number, nanos: Amount = 0): Period {
    return Period.of(0, 0, 0, hours, minutes, seconds, nanos)
  }

  /**
   * A period of an amount of one unit. Micros, millis and half-days are
   * converted exactly to nanoseconds; units with no fixed relation to the
   * stored fields, such as weeks, are rejected.
   */
  static ofUnit(amount: Amount, unit: Unit): Period {
    return Period.ZERO.plus(amount, unit)
  }

  /** A time-only period of the exact length of a duration. */
  static ofDuration(duration: Duration): Period {
    requireValue(duration, 'duration')
    return Period.create(0, 0, 0, duration.toNanos())
  }

  /** Parses the `PnYnMnDTnHnMnS` form produced by toString. */
  static parse(text: string): Period {
    return unwrap(parsePeriod(text))
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get hours(): number {
    return Number(this.timeNanos / NANOS_PER_HOUR)
  }

  /** Minutes within the hour, signed like the time part. */
  get minutes(): number {
    return Number((this.timeNanos / NANOS_PER_MINUTE) % 60n)
  }

  /** Seconds within the minute, signed like the time part. */
  get seconds(): number {
    return Number((this.timeNanos / NANOS_PER_SECOND) % 60n)
  }

  get nanosWithinSecond(): number {
    return Number(this.timeNanos % NANOS_PER_SECOND)
  }

  isZero(): boolean {
    return this === Period.ZERO
  }

  /** True when no field is negative and at least one is positive. */
  isPositive(): boolean {
    return (
      this.years >= 0 && this.months >= 0 && this.days >= 0 && this.timeNanos >= 0n &&
      !this.isZero()
    )
  }

  // ==========================================================================
  // Field Replacement
  // ==========================================================================

  withYears(years: number): Period {
    if (checkInt(years, 'years') === this.years) return this
    return Period.create(years, this.months, this.days, this.timeNanos)
  }

  withMonths(months: number): Period {
    if (checkInt(months, 'months') === this.months) return this
    return Period.create(this.years, months, this.days, this.timeNanos)
  }

  withDays(days: number): Period {
    if (checkInt(days, 'days') === this.days) return this
    return Period.create(this.years, this.months, days, this.timeNanos)
  }

  withTimeNanos(nanos: Amount): Period {
    const value = toLong(nanos)
    if (value === this.timeNanos) return this
    return Period.create(this.years, this.months, this.days, value)
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  /** Field-wise sum with another period, or `amount` of `unit` added. */
  plus(other: Period): Period
  plus(amount: Amount, unit: Unit): Period
  plus(amountOrPeriod: Period | Amount, unit?: Unit): Period {
    if (amountOrPeriod instanceof Period) {
      const other = amountOrPeriod
      return Period.create(
        safeAddInt(this.years, other.years),
        safeAddInt(this.months, other.months),
        safeAddInt(this.days, other.days),
        safeAddLong(this.timeNanos, other.timeNanos),
      )
    }
    return this.plusUnit(toLong(amountOrPeriod), requireValue(unit, 'unit'))
  }

  /** Field-wise difference with another period, or `amount` of `unit` subtracted. */
  minus(other: Period): Period
  minus(amount: Amount, unit: Unit): Period
  minus(amountOrPeriod: Period | Amount, unit?: Unit): Period {
    if (amountOrPeriod instanceof Period) {
      const other = amountOrPeriod
      return Period.create(
        safeSubtractInt(this.years, other.years),
        safeSubtractInt(this.months, other.months),
        safeSubtractInt(this.days, other.days),
        safeSubtractLong(this.timeNanos, other.timeNanos),
      )
    }
    const amount = toLong(amountOrPeriod)
    const u = requireValue(unit, 'unit')
    return amount === LONG_MIN ? this.plusUnit(LONG_MAX, u).plusUnit(1n, u) : this.plusUnit(-amount, u)
  }

  private plusUnit(amount: bigint, unit: Unit): Period {
    if (isDurationEstimated(unit) && unit !== Unit.DAYS && unit !== Unit.MONTHS && unit !== Unit.YEARS) {
      throw new UnsupportedUnitError(unit)
    }
    if (amount === 0n) return this
    switch (unit) {
      case Unit.NANOS:
        return this.plusNanos(amount)
      case Unit.MICROS:
        return this.plusNanos(safeMultiplyLong(amount, NANOS_PER_MICRO))
      case Unit.MILLIS:
        return this.plusNanos(safeMultiplyLong(amount, NANOS_PER_MILLI))
      case Unit.SECONDS:
        return this.plusSeconds(amount)
      case Unit.MINUTES:
        return this.plusMinutes(amount)
      case Unit.HOURS:
        return this.plusHours(amount)
      case Unit.HALF_DAYS:
        return this.plusNanos(safeMultiplyLong(amount, 12n * NANOS_PER_HOUR))
      case Unit.DAYS:
        return this.plusDays(amount)
      case Unit.MONTHS:
        return this.plusMonths(amount)
      case Unit.YEARS:
        return this.plusYears(amount)
      default:
        throw new UnsupportedUnitError(unit)
    }
  }

  plusYears(amount: Amount): Period {
    const value = toLong(amount)
    if (value === 0n) return this
    return Period.create(safeToInt(safeAddLong(BigInt(this.years), value)), this.months, this.days, this.timeNanos)
  }

  plusMonths(amount: Amount): Period {
    const value = toLong(amount)
    if (value === 0n) return this
    return Period.create(this.years, safeToInt(safeAddLong(BigInt(this.months), value)), this.days, this.timeNanos)
  }

  plusDays(amount: Amount): Period {
    const value = toLong(amount)
    if (value === 0n) return this
    return Period.create(this.years, this.months, safeToInt(safeAddLong(BigInt(this.days), value)), this.timeNanos)
  }

  plusHours(amount: Amount): Period {
    return this.plusNanos(safeMultiplyLong(toLong(amount), NANOS_PER_HOUR))
  }

  plusMinutes(amount: Amount): Period {
    return this.plusNanos(safeMultiplyLong(toLong(amount), NANOS_PER_MINUTE))
  }

  plusSeconds(amount: Amount): Period {
    return this.plusNanos(safeMultiplyLong(toLong(amount), NANOS_PER_SECOND))
  }

  plusNanos(amount: Amount): Period {
    const value = toLong(amount)
    if (value === 0n) return this
    return Period.create(this.years, this.months, this.days, safeAddLong(this.timeNanos, value))
  }

  minusYears(amount: Amount): Period {
    return this.minus(amount, Unit.YEARS)
  }

  minusMonths(amount: Amount): Period {
    return this.minus(amount, Unit.MONTHS)
  }

  minusDays(amount: Amount): Period {
    return this.minus(amount, Unit.DAYS)
  }

  minusHours(amount: Amount): Period {
    return this.minus(amount, Unit.HOURS)
  }

  minusMinutes(amount: Amount): Period {
    return this.minus(amount, Unit.MINUTES)
  }

  minusSeconds(amount: Amount): Period {
    return this.minus(amount, Unit.SECONDS)
  }

  minusNanos(amount: Amount): Period {
    return this.minus(amount, Unit.NANOS)
  }

  multipliedBy(scalar: number): Period {
    checkInt(scalar, 'scalar')
    if (this === Period.ZERO || scalar === 1) return this
    return Period.create(
      safeMultiplyInt(this.years, scalar),
      safeMultiplyInt(this.months, scalar),
      safeMultiplyInt(this.days, scalar),
      safeMultiplyLong(this.timeNanos, BigInt(scalar)),
    )
  }

  negated(): Period {
    return this.multipliedBy(-1)
  }

  // ==========================================================================
  // Normalization
  // ==========================================================================

  /** Moves whole 24-hour spans of the time part into days. */
  normalizeHoursToDays(): Period {
    const splitDays = this.timeNanos / NANOS_PER_DAY
    if (splitDays === 0n) return this
    return Period.create(
      this.years,
      this.months,
      safeAddInt(this.days, safeToInt(splitDays)),
      this.timeNanos % NANOS_PER_DAY,
    )
  }

  /** Folds days into the time part as 24 hours each. */
  normalizeDaysToHours(): Period {
    if (this.days === 0) return this
    return Period.create(
      this.years,
      this.months,
      0,
      safeAddLong(safeMultiplyLong(BigInt(this.days), NANOS_PER_DAY), this.timeNanos),
    )
  }

  /** Moves whole 12-month spans into years. */
  normalizeMonthsISO(): Period {
    const splitYears = truncDivInt(this.months, MONTHS_PER_YEAR)
    if (splitYears === 0) return this
    const months = truncModInt(this.months, MONTHS_PER_YEAR)
    return Period.create(safeAddInt(this.years, splitYears), months, this.days, this.timeNanos)
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  toDateOnly(): Period {
    if (this.timeNanos === 0n) return this
    return Period.create(this.years, this.months, this.days, 0n)
  }

  toTimeOnly(): Period {
    if (this.years === 0 && this.months === 0 && this.days === 0) return this
    return Period.create(0, 0, 0, this.timeNanos)
  }

  /** The exact duration of the time part; fails if any calendar field is set. */
  toDuration(): Duration {
    if (this.years !== 0 || this.months !== 0 || this.days !== 0) {
      throw new HasCalendarUnitsError(
        `Unable to convert period to duration as years/months/days are present: ${this.toString()}`,
      )
    }
    return Duration.ofNanos(this.timeNanos)
  }

  // ==========================================================================
  // Applying to Dates
  // ==========================================================================

  /**
   * Adds this period to a date or time: years, then months, then days,
   * then nanoseconds, skipping zero fields. Months always resolve before
   * days, so 2012-01-31 plus P1M1D is 2012-03-01.
   */
  addTo<T extends UnitAdjustable<T>>(temporal: T): T {
    let result = requireValue(temporal, 'temporal')
    if (this.years !== 0) result = result.plus(this.years, Unit.YEARS)
    if (this.months !== 0) result = result.plus(this.months, Unit.MONTHS)
    if (this.days !== 0) result = result.plus(this.days, Unit.DAYS)
    if (this.timeNanos !== 0n) result = result.plus(this.timeNanos, Unit.NANOS)
    return result
  }

  /** Subtracts this period in the same field order as addTo. */
  subtractFrom<T extends UnitAdjustable<T>>(temporal: T): T {
    let result = requireValue(temporal, 'temporal')
    if (this.years !== 0) result = result.minus(this.years, Unit.YEARS)
    if (this.months !== 0) result = result.minus(this.months, Unit.MONTHS)
    if (this.days !== 0) result = result.minus(this.days, Unit.DAYS)
    if (this.timeNanos !== 0n) result = result.minus(this.timeNanos, Unit.NANOS)
    return result
  }

  // ==========================================================================
  // Equality & Text
  // ==========================================================================

  equals(other: Period): boolean {
    return (
      this === other ||
      (this.years === other.years &&
        this.months === other.months &&
        this.days === other.days &&
        this.timeNanos === other.timeNanos)
    )
  }

  /** ISO-8601 form such as `P6Y3M1DT12H`; zero is `PT0S`. */
  toString(): string {
    return formatPeriod(this)
  }
}

// ============================================================================
// Helpers
// ============================================================================

function timeToNanos(hours: number, minutes: number, seconds: number, nanos: Amount): bigint {
  const totalSeconds = safeAddLong(
    safeAddLong(
      safeMultiplyLong(BigInt(checkInt(hours, 'hours')), BigInt(SECONDS_PER_HOUR)),
      safeMultiplyLong(BigInt(checkInt(minutes, 'minutes')), BigInt(SECONDS_PER_MINUTE)),
    ),
    BigInt(checkInt(seconds, 'seconds')),
  )
  return safeAddLong(safeMultiplyLong(totalSeconds, NANOS_PER_SECOND), toLong(nanos))
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parses period text, reporting malformed text as a ParseError carrying
 * the offset of the failure and absent text as a NullInputError.
 */
export function parsePeriod(text: string | null | undefined): Result<Period, ParseError | NullInputError> {
  const parsed = parsePeriodFields(text)
  if (!parsed.ok) return parsed
  const { years, months, days, timeNanos } = parsed.value
  return Ok(Period.of(years, months, days, 0, 0, 0, timeNanos))
}
