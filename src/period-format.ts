/**
 * Period Text Codec
 *
 * Formats and parses the ISO-8601 period form `PnYnMnDTnHnMnS`.
 *
 * Each component carries its own sign, and a leading sign before `P`
 * negates the whole period. Seconds may carry a fraction of up to nine
 * digits after `.` or `,`. Designators are case-insensitive and must
 * appear in order. Weeks (`W`) are not part of this form.
 */

import { INT_MAX, INT_MIN, LONG_MAX, LONG_MIN, NANOS_PER_HOUR, NANOS_PER_MINUTE, NANOS_PER_SECOND } from './constants'
import { NullInputError, ParseError } from './errors'
import { type Result, Ok, Err } from './result'

/** The stored fields of a period. */
export interface PeriodFields {
  readonly years: number
  readonly months: number
  readonly days: number
  readonly timeNanos: bigint
}

// ============================================================================
// Formatting
// ============================================================================

export function formatPeriod(period: PeriodFields): string {
  const { years, months, days, timeNanos } = period
  if (years === 0 && months === 0 && days === 0 && timeNanos === 0n) return 'PT0S'

  let text = 'P'
  if (years !== 0) text += `${years}Y`
  if (months !== 0) text += `${months}M`
  if (days !== 0) text += `${days}D`
  if (timeNanos === 0n) return text

  text += 'T'
  const hours = timeNanos / NANOS_PER_HOUR
  const minutes = (timeNanos / NANOS_PER_MINUTE) % 60n
  const secondNanos = timeNanos % NANOS_PER_MINUTE
  if (hours !== 0n) text += `${hours}H`
  if (minutes !== 0n) text += `${minutes}M`
  if (secondNanos !== 0n) text += formatSeconds(secondNanos)
  return text
}

/** Seconds with a fraction; the sign of the whole remainder leads. */
function formatSeconds(secondNanos: bigint): string {
  const secondPart = secondNanos / NANOS_PER_SECOND
  const nanoPart = secondNanos % NANOS_PER_SECOND
  if (nanoPart === 0n) return `${secondPart}S`

  const sign = secondNanos < 0n ? '-' : ''
  const whole = secondPart < 0n ? -secondPart : secondPart
  const fraction = `${nanoPart < 0n ? -nanoPart : nanoPart}`.padStart(9, '0').replace(/0+$/, '')
  return `${sign}${whole}.${fraction}S`
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_DESIGNATORS = ['Y', 'M', 'D'] as const
const TIME_DESIGNATORS = ['H', 'M', 'S'] as const

const TIME_FACTORS: Record<(typeof TIME_DESIGNATORS)[number], bigint> = {
  H: NANOS_PER_HOUR,
  M: NANOS_PER_MINUTE,
  S: NANOS_PER_SECOND,
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9'
}

function isSign(ch: string | undefined): boolean {
  return ch === '+' || ch === '-'
}

/**
 * Parses period text into its stored fields.
 * A ParseError's `errorIndex` is the offset of the offending character.
 */
export function parsePeriodFields(
  text: string | null | undefined,
): Result<PeriodFields, ParseError | NullInputError> {
  if (text === null || text === undefined) {
    return Err(new NullInputError('Text to parse must not be null'))
  }
  const input: string = text
  const fail = (reason: string, index: number) =>
    Err(new ParseError(`Text cannot be parsed to a Period (${reason}): '${input}'`, input, index))

  if (text.length === 0) return fail('empty text', 0)

  let pos = 0
  let negate = false
  if (isSign(text[pos])) {
    negate = text[pos] === '-'
    pos++
  }
  if (text[pos]?.toUpperCase() !== 'P') return fail("expected 'P'", pos)
  pos++

  const date = { Y: 0n, M: 0n, D: 0n }
  const dateStarts = { Y: 0, M: 0, D: 0 }
  let timeNanos = 0n
  let timeStart = -1
  let lastIndex = -1
  let components = 0
  let timeComponents = 0

  while (pos < text.length) {
    if (text[pos]?.toUpperCase() === 'T') {
      if (timeStart >= 0) return fail("duplicate 'T'", pos)
      timeStart = pos
      lastIndex = -1
      pos++
      continue
    }

    const start = pos
    let sign = 1n
    if (isSign(text[pos])) {
      sign = text[pos] === '-' ? -1n : 1n
      pos++
      if (isSign(text[pos])) return fail('double sign', pos)
    }

    const digitsStart = pos
    while (isDigit(text[pos])) pos++
    if (pos === digitsStart) return fail('missing number', pos)
    const whole = BigInt(text.slice(digitsStart, pos))

    let fraction = 0n
    let separator = -1
    if (text[pos] === '.' || text[pos] === ',') {
      separator = pos
      pos++
      const fractionStart = pos
      while (isDigit(text[pos])) pos++
      const digits = pos - fractionStart
      if (digits === 0) return fail('missing fraction digits', pos)
      if (digits > 9) return fail('more than nine fraction digits', fractionStart + 9)
      fraction = BigInt(text.slice(fractionStart, pos).padEnd(9, '0'))
    }

    const letter = text[pos]
    if (letter === undefined) return fail('missing designator', pos)
    const designator = letter.toUpperCase()

    if (timeStart < 0) {
      const index = DATE_DESIGNATORS.findIndex(d => d === designator)
      const key = DATE_DESIGNATORS[index]
      if (key === undefined) return fail(`unexpected '${letter}'`, pos)
      if (index <= lastIndex) return fail(`'${letter}' out of order`, pos)
      if (separator >= 0) return fail('fraction allowed on seconds only', separator)
      lastIndex = index
      date[key] = sign * whole
      dateStarts[key] = start
    } else {
      const index = TIME_DESIGNATORS.findIndex(d => d === designator)
      const key = TIME_DESIGNATORS[index]
      if (key === undefined) return fail(`unexpected '${letter}'`, pos)
      if (index <= lastIndex) return fail(`'${letter}' out of order`, pos)
      if (separator >= 0 && key !== 'S') return fail('fraction allowed on seconds only', separator)
      lastIndex = index
      timeNanos += sign * (whole * TIME_FACTORS[key] + fraction)
      timeComponents++
    }
    components++
    pos++
  }

  if (timeStart >= 0 && timeComponents === 0) return fail("no component after 'T'", text.length)
  if (components === 0) return fail('no components', text.length)

  const factor = negate ? -1n : 1n
  for (const key of DATE_DESIGNATORS) {
    const value = date[key] * factor
    if (value < BigInt(INT_MIN) || value > BigInt(INT_MAX)) {
      return fail(`'${key}' value out of range`, dateStarts[key])
    }
  }
  timeNanos *= factor
  if (timeNanos < LONG_MIN || timeNanos > LONG_MAX) {
    return fail('time value out of range', timeStart)
  }

  return Ok({
    years: Number(date.Y * factor),
    months: Number(date.M * factor),
    days: Number(date.D * factor),
    timeNanos,
  })
}
