/**
 * Japanese Imperial Calendar
 *
 * Years are ISO years; eras begin on an emperor's accession and restart
 * year-of-era at 1 that day, so year-of-era is not contiguous across eras.
 * Dates before the calendar's Gregorian adoption on 1873-01-01 are rejected.
 */

import { CalendarSystem, type CalendarRules } from './chrono-date'
import { MAX_YEAR } from '../constants'
import { InvalidValueError } from '../errors'
import { Field, ValueRange } from '../fields'
import { LocalDate } from '../local-date'

export const JapaneseEra = {
  MEIJI: -1,
  TAISHO: 0,
  SHOWA: 1,
  HEISEI: 2,
  REIWA: 3,
} as const

export type JapaneseEra = (typeof JapaneseEra)[keyof typeof JapaneseEra]

type EraDefinition = { value: JapaneseEra; name: string; since: LocalDate }

const ERAS: readonly EraDefinition[] = [
  { value: JapaneseEra.MEIJI, name: 'MEIJI', since: LocalDate.of(1868, 1, 1) },
  { value: JapaneseEra.TAISHO, name: 'TAISHO', since: LocalDate.of(1912, 7, 30) },
  { value: JapaneseEra.SHOWA, name: 'SHOWA', since: LocalDate.of(1926, 12, 25) },
  { value: JapaneseEra.HEISEI, name: 'HEISEI', since: LocalDate.of(1989, 1, 8) },
  { value: JapaneseEra.REIWA, name: 'REIWA', since: LocalDate.of(2019, 5, 1) },
]

const MIN_DATE = LocalDate.of(1873, 1, 1)

function eraDefinition(era: number): EraDefinition {
  const found = ERAS.find(e => e.value === era)
  if (!found) throw new InvalidValueError(`Invalid Japanese era: ${era}`)
  return found
}

function eraAt(iso: LocalDate): EraDefinition {
  let current = eraDefinition(JapaneseEra.MEIJI)
  for (const era of ERAS) {
    if (!era.since.isAfter(iso)) current = era
  }
  return current
}

function lastYearOfEra(era: EraDefinition): number {
  const next = ERAS.find(e => e.value === era.value + 1)
  return next ? next.since.year - era.since.year + 1 : MAX_YEAR - era.since.year + 1
}

const japaneseRules: CalendarRules = {
  id: 'Japanese',
  eraRange: ValueRange.of(JapaneseEra.MEIJI, JapaneseEra.REIWA),
  yearRange: ValueRange.of(MIN_DATE.year, MAX_YEAR),
  yearOfEraRange: ValueRange.of(1, MAX_YEAR - MIN_DATE.year + 1),

  prolepticYear: iso => iso.year,
  isoYear: year => year,
  era: iso => eraAt(iso).value,

  yearOfEra(iso: LocalDate): number {
    return iso.year - eraAt(iso).since.year + 1
  },

  isoYearOfEra(era: number, yearOfEra: number): number {
    const definition = eraDefinition(era)
    if (!Number.isInteger(yearOfEra) || yearOfEra < 1 || yearOfEra > lastYearOfEra(definition)) {
      throw new InvalidValueError(`Invalid value for ${Field.YEAR_OF_ERA} in ${definition.name}: ${yearOfEra}`)
    }
    return definition.since.year + yearOfEra - 1
  },

  yearOfEraRangeAt(iso: LocalDate): ValueRange {
    return ValueRange.of(1, lastYearOfEra(eraAt(iso)))
  },

  eraName: era => eraDefinition(era).name,

  checkDate(iso: LocalDate): void {
    if (iso.isBefore(MIN_DATE)) {
      throw new InvalidValueError(`Japanese calendar dates start at ${MIN_DATE.toString()}: ${iso.toString()}`)
    }
  },
}

export const JapaneseChronology = new CalendarSystem(japaneseRules)
