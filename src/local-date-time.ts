/**
 * LocalDateTime
 *
 * An ISO date paired with a time of day. Time arithmetic carries whole
 * days into the date.
 */

import type { Chronology } from './chrono/chronology'
import { IsoChronology } from './chrono/iso-chronology'
import { LONG_MAX, LONG_MIN, NANOS_PER_DAY, NANOS_PER_SECOND } from './constants'
import { ParseError } from './errors'
import { type Field, type ValueRange, isTimeField, type TemporalAccessor } from './fields'
import { LocalDate, parseLocalDate } from './local-date'
import { LocalTime, parseLocalTime } from './local-time'
import type { Period } from './period'
import { type Result, Ok, Err, unwrap } from './result'
import { type Amount, toLong, floorDivLong, floorModLong } from './safe-math'
import { Unit, isTimeUnit, unitDuration, type UnitAdjustable } from './units'

export class LocalDateTime implements TemporalAccessor, UnitAdjustable<LocalDateTime> {
  private constructor(
    readonly date: LocalDate,
    readonly time: LocalTime,
  ) {}

  static of(date: LocalDate, time: LocalTime): LocalDateTime
  static of(year: number, month: number, day: number, hour?: number, minute?: number, second?: number, nano?: number): LocalDateTime
  static of(
    a: LocalDate | number,
    b: LocalTime | number,
    day = 1,
    hour = 0,
    minute = 0,
    second = 0,
    nano = 0,
  ): LocalDateTime {
    if (a instanceof LocalDate && b instanceof LocalTime) return new LocalDateTime(a, b)
    if (typeof a === 'number' && typeof b === 'number') {
      return new LocalDateTime(LocalDate.of(a, b, day), LocalTime.of(hour, minute, second, nano))
    }
    throw new TypeError('LocalDateTime.of expects a date and a time, or numeric fields')
  }

  static parse(text: string): LocalDateTime {
    return unwrap(parseLocalDateTime(text))
  }

  get chronology(): Chronology {
    return IsoChronology
  }

  get(field: Field): number {
    return isTimeField(field) ? this.time.get(field) : this.date.get(field)
  }

  range(field: Field): ValueRange {
    return isTimeField(field) ? this.time.range(field) : this.date.range(field)
  }

  // ========== Arithmetic ==========

  plus(amount: Amount, unit: Unit): LocalDateTime {
    if (!isTimeUnit(unit)) return this.with(this.date.plus(amount, unit), this.time)
    const value = toLong(amount)
    if (value === 0n) return this
    const length = unitDuration(unit)
    const total = value * (length.seconds * NANOS_PER_SECOND + length.nanos) + this.time.toNanoOfDay()
    const date = this.date.plusDays(floorDivLong(total, NANOS_PER_DAY))
    return this.with(date, LocalTime.ofNanoOfDay(floorModLong(total, NANOS_PER_DAY)))
  }

  minus(amount: Amount, unit: Unit): LocalDateTime {
    const value = toLong(amount)
    return value === LONG_MIN ? this.plus(LONG_MAX, unit).plus(1n, unit) : this.plus(-value, unit)
  }

  plusPeriod(period: Period): LocalDateTime {
    return period.addTo<LocalDateTime>(this)
  }

  minusPeriod(period: Period): LocalDateTime {
    return period.subtractFrom<LocalDateTime>(this)
  }

  private with(date: LocalDate, time: LocalTime): LocalDateTime {
    if (date === this.date && time === this.time) return this
    return new LocalDateTime(date, time)
  }

  // ========== Comparison ==========

  compareTo(other: LocalDateTime): number {
    return this.date.compareTo(other.date) || this.time.compareTo(other.time)
  }

  equals(other: LocalDateTime): boolean {
    return this.compareTo(other) === 0
  }

  toString(): string {
    return `${this.date.toString()}T${this.time.toString()}`
  }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseLocalDateTime(text: string): Result<LocalDateTime, ParseError> {
  const tIdx = text.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${text}'`, text, 0))

  const dateResult = parseLocalDate(text.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${text}'`, text, dateResult.error.errorIndex))

  const timeResult = parseLocalTime(text.substring(tIdx + 1))
  if (!timeResult.ok) {
    return Err(new ParseError(`Invalid datetime: '${text}'`, text, tIdx + 1 + timeResult.error.errorIndex))
  }

  return Ok(LocalDateTime.of(dateResult.value, timeResult.value))
}
