/**
 * The ISO-8601 calendar: proleptic Gregorian, eras BCE (0) and CE (1).
 */

import type { Chronology } from './chronology'
import { fieldRange } from '../fields'
import { isLeapYear } from '../time-date'

export const IsoChronology: Chronology = {
  id: 'ISO',
  isLeapYear,
  range: fieldRange,
}
