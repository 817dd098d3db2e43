/**
 * LocalTime
 *
 * A time of day to nanosecond precision, 00:00 to 23:59:59.999999999.
 * Arithmetic wraps around midnight.
 */

import type { Chronology } from './chrono/chronology'
import { IsoChronology } from './chrono/iso-chronology'
import {
  LONG_MAX,
  LONG_MIN,
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from './constants'
import { InvalidValueError, UnsupportedFieldError, UnsupportedUnitError, type ParseError } from './errors'
import { Field, ValueRange, fieldRange, isTimeField, type TemporalAccessor } from './fields'
import type { Period } from './period'
import { type Result, Ok, unwrap } from './result'
import { type Amount, toLong, floorModLong } from './safe-math'
import { formatTimeParts, parseTimeParts } from './time-date'
import { Unit, isTimeUnit, unitDuration, type UnitAdjustable } from './units'

export class LocalTime implements TemporalAccessor, UnitAdjustable<LocalTime> {
  static readonly MIDNIGHT = new LocalTime(0, 0, 0, 0)
  static readonly NOON = new LocalTime(12, 0, 0, 0)
  static readonly MIN = LocalTime.MIDNIGHT
  static readonly MAX = new LocalTime(23, 59, 59, 999_999_999)

  private constructor(
    readonly hour: number,
    readonly minute: number,
    readonly second: number,
    readonly nano: number,
  ) {}

  // ========== Factories ==========

  static of(hour: number, minute: number, second = 0, nanoOfSecond = 0): LocalTime {
    fieldRange(Field.HOUR_OF_DAY).checkValidValue(hour, Field.HOUR_OF_DAY)
    fieldRange(Field.MINUTE_OF_HOUR).checkValidValue(minute, Field.MINUTE_OF_HOUR)
    fieldRange(Field.SECOND_OF_MINUTE).checkValidValue(second, Field.SECOND_OF_MINUTE)
    fieldRange(Field.NANO_OF_SECOND).checkValidValue(nanoOfSecond, Field.NANO_OF_SECOND)
    if (![hour, minute, second, nanoOfSecond].every(Number.isInteger)) {
      throw new InvalidValueError(`Time fields must be integers: ${hour}:${minute}:${second}.${nanoOfSecond}`)
    }
    return new LocalTime(hour, minute, second, nanoOfSecond)
  }

  static ofNanoOfDay(nanoOfDay: Amount): LocalTime {
    const nod = toLong(nanoOfDay)
    if (nod < 0n || nod >= NANOS_PER_DAY) {
      throw new InvalidValueError(`Invalid value for nanoOfDay (valid values ${fieldRange(Field.NANO_OF_DAY).toString()}): ${nod}`)
    }
    const hour = nod / NANOS_PER_HOUR
    const minute = (nod / NANOS_PER_MINUTE) % 60n
    const second = (nod / NANOS_PER_SECOND) % 60n
    const nano = nod % NANOS_PER_SECOND
    return new LocalTime(Number(hour), Number(minute), Number(second), Number(nano))
  }

  static parse(text: string): LocalTime {
    return unwrap(parseLocalTime(text))
  }

  // ========== Queries ==========

  get chronology(): Chronology {
    return IsoChronology
  }

  toNanoOfDay(): bigint {
    return (
      BigInt(this.hour) * NANOS_PER_HOUR +
      BigInt(this.minute) * NANOS_PER_MINUTE +
      BigInt(this.second) * NANOS_PER_SECOND +
      BigInt(this.nano)
    )
  }

  toSecondOfDay(): number {
    return this.hour * SECONDS_PER_HOUR + this.minute * SECONDS_PER_MINUTE + this.second
  }

  get(field: Field): number {
    switch (field) {
      case Field.HOUR_OF_DAY:
        return this.hour
      case Field.MINUTE_OF_HOUR:
        return this.minute
      case Field.SECOND_OF_MINUTE:
        return this.second
      case Field.NANO_OF_SECOND:
        return this.nano
      case Field.NANO_OF_DAY:
        return Number(this.toNanoOfDay())
      default:
        throw new UnsupportedFieldError(field)
    }
  }

  range(field: Field): ValueRange {
    if (!isTimeField(field)) throw new UnsupportedFieldError(field)
    return fieldRange(field)
  }

  // ========== Arithmetic ==========

  plus(amount: Amount, unit: Unit): LocalTime {
    if (!isTimeUnit(unit)) throw new UnsupportedUnitError(unit)
    const value = toLong(amount)
    if (value === 0n) return this
    const length = unitDuration(unit)
    const unitNanos = length.seconds * NANOS_PER_SECOND + length.nanos
    // Every time unit divides a day, so only the remainder of a day's worth matters
    const steps = value % (NANOS_PER_DAY / unitNanos)
    return LocalTime.ofNanoOfDay(floorModLong(this.toNanoOfDay() + steps * unitNanos, NANOS_PER_DAY))
  }

  minus(amount: Amount, unit: Unit): LocalTime {
    const value = toLong(amount)
    return value === LONG_MIN ? this.plus(LONG_MAX, unit).plus(1n, unit) : this.plus(-value, unit)
  }

  plusHours(hours: Amount): LocalTime {
    return this.plus(hours, Unit.HOURS)
  }

  plusMinutes(minutes: Amount): LocalTime {
    return this.plus(minutes, Unit.MINUTES)
  }

  plusSeconds(seconds: Amount): LocalTime {
    return this.plus(seconds, Unit.SECONDS)
  }

  plusNanos(nanos: Amount): LocalTime {
    return this.plus(nanos, Unit.NANOS)
  }

  plusPeriod(period: Period): LocalTime {
    return period.addTo<LocalTime>(this)
  }

  minusPeriod(period: Period): LocalTime {
    return period.subtractFrom<LocalTime>(this)
  }

  // ========== Comparison ==========

  compareTo(other: LocalTime): number {
    const a = this.toNanoOfDay()
    const b = other.toNanoOfDay()
    return a < b ? -1 : a > b ? 1 : 0
  }

  isBefore(other: LocalTime): boolean {
    return this.compareTo(other) < 0
  }

  isAfter(other: LocalTime): boolean {
    return this.compareTo(other) > 0
  }

  equals(other: LocalTime): boolean {
    return this.compareTo(other) === 0
  }

  toString(): string {
    return formatTimeParts(this.hour, this.minute, this.second, this.nano)
  }
}

// ============================================================================
// Parsing
// ============================================================================

/** Parses `HH:MM`, `HH:MM:SS` or `HH:MM:SS.fffffffff`. */
export function parseLocalTime(text: string): Result<LocalTime, ParseError> {
  const parsed = parseTimeParts(text)
  if (!parsed.ok) return parsed
  const { hour, minute, second, nano } = parsed.value
  return Ok(LocalTime.of(hour, minute, second, nano))
}
