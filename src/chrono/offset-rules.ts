/**
 * Rules for calendars that differ from ISO only by a fixed year offset and
 * a two-era split at their year 1.
 */

import type { CalendarRules } from './chrono-date'
import { MAX_YEAR, MIN_YEAR } from '../constants'
import { InvalidValueError } from '../errors'
import { Field, ValueRange } from '../fields'
import type { LocalDate } from '../local-date'

type OffsetRulesConfig = {
  id: string
  /** Added to an ISO year to give the calendar's proleptic year. */
  yearOffset: number
  /** Names of the era before year 1 (value 0) and from year 1 (value 1). */
  eraNames: readonly [string, string]
}

export function createOffsetRules(config: OffsetRulesConfig): CalendarRules {
  const { id, yearOffset, eraNames } = config
  const minYear = MIN_YEAR + yearOffset
  const maxYear = MAX_YEAR + yearOffset
  // Largest year-of-era in each era; which one is smaller depends on the offset's sign
  const beforeEraMax = -minYear + 1

  const prolepticYear = (iso: LocalDate): number => iso.year + yearOffset

  return {
    id,
    eraRange: ValueRange.of(0, 1),
    yearRange: ValueRange.of(minYear, maxYear),
    yearOfEraRange: ValueRange.of(1, Math.min(beforeEraMax, maxYear), Math.max(beforeEraMax, maxYear)),

    prolepticYear,

    isoYear(year: number): number {
      return year - yearOffset
    },

    era(iso: LocalDate): number {
      return prolepticYear(iso) >= 1 ? 1 : 0
    },

    yearOfEra(iso: LocalDate): number {
      const year = prolepticYear(iso)
      return year >= 1 ? year : 1 - year
    },

    isoYearOfEra(era: number, yearOfEra: number): number {
      if (era !== 0 && era !== 1) {
        throw new InvalidValueError(`Invalid era for ${id}: ${era}`)
      }
      if (!Number.isInteger(yearOfEra) || yearOfEra < 1) {
        throw new InvalidValueError(`Invalid value for ${Field.YEAR_OF_ERA}: ${yearOfEra}`)
      }
      return (era === 1 ? yearOfEra : 1 - yearOfEra) - yearOffset
    },

    yearOfEraRangeAt(iso: LocalDate): ValueRange {
      return prolepticYear(iso) <= 0 ? ValueRange.of(1, beforeEraMax) : ValueRange.of(1, maxYear)
    },

    eraName(era: number): string {
      const name = era === 0 || era === 1 ? eraNames[era] : undefined
      if (name === undefined) throw new InvalidValueError(`Invalid era for ${id}: ${era}`)
      return name
    },

    checkDate(): void {},
  }
}
