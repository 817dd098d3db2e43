/**
 * Thai Buddhist calendar: year 1 is ISO -542, so 2555 is ISO 2012.
 */

import { CalendarSystem } from './chrono-date'
import { createOffsetRules } from './offset-rules'

export const ThaiBuddhistEra = {
  BEFORE_BE: 0,
  BUDDHIST: 1,
} as const

export type ThaiBuddhistEra = (typeof ThaiBuddhistEra)[keyof typeof ThaiBuddhistEra]

export const ThaiBuddhistChronology = new CalendarSystem(
  createOffsetRules({ id: 'ThaiBuddhist', yearOffset: 543, eraNames: ['BEFORE_BE', 'BUDDHIST'] }),
)
