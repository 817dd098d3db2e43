/**
 * Lookup of the built-in chronologies by id.
 */

import type { Chronology } from './chronology'
import { IsoChronology } from './iso-chronology'
import { JapaneseChronology } from './japanese'
import { MinguoChronology } from './minguo'
import { ThaiBuddhistChronology } from './thai-buddhist'
import { InvalidValueError } from '../errors'

const CHRONOLOGIES: ReadonlyMap<string, Chronology> = new Map(
  [IsoChronology, JapaneseChronology, MinguoChronology, ThaiBuddhistChronology].map((c): [string, Chronology] => [c.id, c]),
)

export function chronologyById(id: string): Chronology {
  const found = CHRONOLOGIES.get(id)
  if (!found) throw new InvalidValueError(`Unknown chronology: ${id}`)
  return found
}

export function availableChronologies(): string[] {
  return [...CHRONOLOGIES.keys()].sort()
}
