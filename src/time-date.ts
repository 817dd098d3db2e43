/**
 * ISO Calendar Math
 *
 * Pure functions for the proleptic Gregorian calendar: leap years, month
 * lengths, epoch-day conversion, and date/time text parsing.
 * Epoch-day conversion counts whole 400-year cycles so that it holds for
 * every year from -999,999,999 to 999,999,999 without month-length special cases.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'
import { floorDivInt, floorModInt } from './safe-math'

export type DateParts = { year: number; month: number; day: number }

export type TimeParts = { hour: number; minute: number; second: number; nano: number }

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

/** Year as ISO-8601 text: four digits minimum, sign when negative or beyond 9999. */
export function formatYear(year: number): string {
  const abs = Math.abs(year)
  if (abs < 1000) return (year < 0 ? '-' : '') + pad4(abs)
  return (year > 9999 ? '+' : '') + year
}

// ============================================================================
// Epoch Day (for date arithmetic)
// ============================================================================

// Days from 0000-03-01 to 1970-01-01
const DAYS_0000_TO_1970 = 719468
const DAYS_PER_CYCLE = 146097

/**
 * Days since 1970-01-01 of an ISO date. Years are counted from March so the
 * leap day falls at the end of each counted year.
 */
export function dateToEpochDay(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year
  const era = floorDivInt(y, 400)
  const yoe = y - era * 400
  const doy = Math.floor((153 * (month > 2 ? month - 3 : month + 9) + 2) / 5) + day - 1
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy
  return era * DAYS_PER_CYCLE + doe - DAYS_0000_TO_1970
}

export function epochDayToDate(epochDay: number): DateParts {
  const z = epochDay + DAYS_0000_TO_1970
  const era = floorDivInt(z, DAYS_PER_CYCLE)
  const doe = z - era * DAYS_PER_CYCLE
  const yoe = Math.floor(
    (doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) - Math.floor(doe / 146096)) / 365,
  )
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100))
  const mp = Math.floor((5 * doy + 2) / 153)
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1
  const month = mp < 10 ? mp + 3 : mp - 9
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0)
  return { year, month, day }
}

/** ISO day-of-week, 1 (Monday) to 7 (Sunday). */
export function dayOfWeekOf(epochDay: number): number {
  return floorModInt(epochDay + 3, 7) + 1
}

export function dayOfYearOf(year: number, month: number, day: number): number {
  return dateToEpochDay(year, month, day) - dateToEpochDay(year, 1, 1) + 1
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDateParts(str: string): Result<DateParts, ParseError> {
  const match = /^([+-]?\d{4,10})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`, str, 0))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`, str, str.lastIndexOf('-') - 2))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`, str, str.length - 2))

  return Ok({ year, month, day })
}

export function parseTimeParts(str: string): Result<TimeParts, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`, str, 0))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0
  const nano = match[4] ? parseInt(match[4].padEnd(9, '0'), 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`, str, 0))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`, str, 3))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`, str, 6))

  return Ok({ hour, minute, second, nano })
}

// ============================================================================
// Formatting
// ============================================================================

export function formatDateParts(year: number, month: number, day: number): string {
  return `${formatYear(year)}-${pad2(month)}-${pad2(day)}`
}

/** `HH:MM`, `HH:MM:SS`, or with a fraction in groups of three digits. */
export function formatTimeParts(hour: number, minute: number, second: number, nano: number): string {
  let text = `${pad2(hour)}:${pad2(minute)}`
  if (second === 0 && nano === 0) return text
  text += `:${pad2(second)}`
  if (nano === 0) return text
  if (nano % 1_000_000 === 0) return text + '.' + `${nano / 1_000_000 + 1000}`.substring(1)
  if (nano % 1000 === 0) return text + '.' + `${nano / 1000 + 1_000_000}`.substring(1)
  return text + '.' + `${nano + 1_000_000_000}`.substring(1)
}
