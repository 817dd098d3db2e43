/**
 * Chronology
 *
 * A calendar system: its identity, leap-year rule and the ranges it
 * assigns to each field.
 */

import type { Field, ValueRange } from '../fields'

export interface Chronology {
  /** Stable identifier, e.g. 'ISO' or 'Japanese'. Two values share a calendar iff their ids match. */
  readonly id: string
  isLeapYear(prolepticYear: number): boolean
  range(field: Field): ValueRange
}
