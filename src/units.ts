/**
 * Period Units
 *
 * The closed set of units that amounts of time are measured in, with their
 * durations. Day and longer units are estimated: a calendar day is not
 * always 24 hours, nor a month any fixed number of days.
 */

import type { Amount } from './safe-math'

// ============================================================================
// Units
// ============================================================================

export const Unit = {
  NANOS: 'nanos',
  MICROS: 'micros',
  MILLIS: 'millis',
  SECONDS: 'seconds',
  MINUTES: 'minutes',
  HOURS: 'hours',
  HALF_DAYS: 'halfDays',
  DAYS: 'days',
  WEEKS: 'weeks',
  MONTHS: 'months',
  YEARS: 'years',
  DECADES: 'decades',
  CENTURIES: 'centuries',
  MILLENNIA: 'millennia',
  ERAS: 'eras',
  FOREVER: 'forever',
} as const

export type Unit = (typeof Unit)[keyof typeof Unit]

type UnitInfo = {
  /** Length in seconds; estimated for day and longer units. */
  seconds: bigint
  /** Sub-second part of the length. */
  nanos: bigint
  estimated: boolean
}

// 365.2425 days per year, averaged over the 400-year Gregorian cycle
const YEAR_SECONDS = 31556952n

const UNIT_INFO: Record<Unit, UnitInfo> = {
  nanos: { seconds: 0n, nanos: 1n, estimated: false },
  micros: { seconds: 0n, nanos: 1_000n, estimated: false },
  millis: { seconds: 0n, nanos: 1_000_000n, estimated: false },
  seconds: { seconds: 1n, nanos: 0n, estimated: false },
  minutes: { seconds: 60n, nanos: 0n, estimated: false },
  hours: { seconds: 3600n, nanos: 0n, estimated: false },
  halfDays: { seconds: 43200n, nanos: 0n, estimated: false },
  days: { seconds: 86400n, nanos: 0n, estimated: true },
  weeks: { seconds: 7n * 86400n, nanos: 0n, estimated: true },
  months: { seconds: YEAR_SECONDS / 12n, nanos: 0n, estimated: true },
  years: { seconds: YEAR_SECONDS, nanos: 0n, estimated: true },
  decades: { seconds: YEAR_SECONDS * 10n, nanos: 0n, estimated: true },
  centuries: { seconds: YEAR_SECONDS * 100n, nanos: 0n, estimated: true },
  millennia: { seconds: YEAR_SECONDS * 1000n, nanos: 0n, estimated: true },
  eras: { seconds: YEAR_SECONDS * 1_000_000_000n, nanos: 0n, estimated: true },
  forever: { seconds: 2n ** 63n - 1n, nanos: 999_999_999n, estimated: true },
}

const TIME_UNITS: readonly Unit[] = [
  Unit.NANOS, Unit.MICROS, Unit.MILLIS, Unit.SECONDS,
  Unit.MINUTES, Unit.HOURS, Unit.HALF_DAYS,
]

const DATE_UNITS: readonly Unit[] = [
  Unit.DAYS, Unit.WEEKS, Unit.MONTHS, Unit.YEARS,
  Unit.DECADES, Unit.CENTURIES, Unit.MILLENNIA, Unit.ERAS,
]

export function isUnit(value: unknown): value is Unit {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(UNIT_INFO, value)
}

/** Duration of one unit in seconds and nanoseconds. */
export function unitDuration(unit: Unit): { seconds: bigint; nanos: bigint } {
  const info = UNIT_INFO[unit]
  return { seconds: info.seconds, nanos: info.nanos }
}

export function isDurationEstimated(unit: Unit): boolean {
  return UNIT_INFO[unit].estimated
}

export function isTimeUnit(unit: Unit): boolean {
  return TIME_UNITS.includes(unit)
}

export function isDateUnit(unit: Unit): boolean {
  return DATE_UNITS.includes(unit)
}

// ============================================================================
// Adjustable
// ============================================================================

/**
 * A value that can be moved by an amount of a unit.
 * Period.addTo and Period.subtractFrom call back into this.
 */
export interface UnitAdjustable<T> {
  plus(amount: Amount, unit: Unit): T
  minus(amount: Amount, unit: Unit): T
}
