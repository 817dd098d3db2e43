/**
 * Duration
 *
 * An exact amount of time in seconds and nanoseconds, with no calendar
 * meaning. `nanos` is always 0-999,999,999; the sign lives in `seconds`.
 */

import { NANOS_PER_SECOND } from './constants'
import { UnsupportedUnitError } from './errors'
import {
  type Amount,
  toLong,
  safeAddLong,
  safeMultiplyLong,
  safeNegateLong,
  floorDivLong,
  floorModLong,
} from './safe-math'
import { Unit, isDurationEstimated, unitDuration } from './units'

export class Duration {
  static readonly ZERO = new Duration(0n, 0)

  private constructor(
    readonly seconds: bigint,
    readonly nanos: number,
  ) {}

  private static create(seconds: bigint, nanos: number): Duration {
    if (seconds === 0n && nanos === 0) return Duration.ZERO
    return new Duration(seconds, nanos)
  }

  // ========== Factories ==========

  /**
   * A duration of `seconds` adjusted by `nanoAdjustment` nanoseconds, which
   * may be of either sign and any magnitude.
   */
  static ofSeconds(seconds: Amount, nanoAdjustment: Amount = 0): Duration {
    const adjustment = toLong(nanoAdjustment)
    const secs = safeAddLong(toLong(seconds), floorDivLong(adjustment, NANOS_PER_SECOND))
    const nos = Number(floorModLong(adjustment, NANOS_PER_SECOND))
    return Duration.create(secs, nos)
  }

  static ofNanos(nanos: Amount): Duration {
    return Duration.ofSeconds(0, nanos)
  }

  /**
   * A duration of an amount of an exact unit. Days count as 24 hours;
   * longer units have no exact length and are rejected.
   */
  static of(amount: Amount, unit: Unit): Duration {
    if (isDurationEstimated(unit) && unit !== Unit.DAYS) {
      throw new UnsupportedUnitError(unit, `Unit must not have an estimated duration: ${unit}`)
    }
    const value = toLong(amount)
    const length = unitDuration(unit)
    if (length.seconds === 0n) {
      return Duration.ofNanos(safeMultiplyLong(value, length.nanos))
    }
    return Duration.ofSeconds(safeMultiplyLong(value, length.seconds))
  }

  // ========== Queries ==========

  isZero(): boolean {
    return this === Duration.ZERO
  }

  isNegative(): boolean {
    return this.seconds < 0n
  }

  /** Total length in nanoseconds; throws if it exceeds 64 bits. */
  toNanos(): bigint {
    return safeAddLong(safeMultiplyLong(this.seconds, NANOS_PER_SECOND), BigInt(this.nanos))
  }

  // ========== Arithmetic ==========

  plus(other: Duration): Duration {
    return Duration.ofSeconds(safeAddLong(this.seconds, other.seconds), this.nanos + other.nanos)
  }

  negated(): Duration {
    return Duration.ofSeconds(safeNegateLong(this.seconds), -this.nanos)
  }

  equals(other: Duration): boolean {
    return this.seconds === other.seconds && this.nanos === other.nanos
  }

  compareTo(other: Duration): number {
    if (this.seconds !== other.seconds) return this.seconds < other.seconds ? -1 : 1
    return this.nanos - other.nanos
  }

  /** ISO-8601 seconds form, e.g. `PT3600S`, `PT-0.5S`. */
  toString(): string {
    if (this.nanos === 0) return `PT${this.seconds}S`
    let whole: string
    let fraction: number
    if (this.seconds < 0n) {
      whole = this.seconds === -1n ? '-0' : `${this.seconds + 1n}`
      fraction = 1_000_000_000 - this.nanos
    } else {
      whole = `${this.seconds}`
      fraction = this.nanos
    }
    const digits = `${fraction}`.padStart(9, '0').replace(/0+$/, '')
    return `PT${whole}.${digits}S`
  }
}
