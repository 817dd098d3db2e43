/**
 * Minguo (Republic of China) calendar: year 1 is ISO 1912.
 */

import { CalendarSystem } from './chrono-date'
import { createOffsetRules } from './offset-rules'

export const MinguoEra = {
  BEFORE_ROC: 0,
  ROC: 1,
} as const

export type MinguoEra = (typeof MinguoEra)[keyof typeof MinguoEra]

export const MinguoChronology = new CalendarSystem(
  createOffsetRules({ id: 'Minguo', yearOffset: -1911, eraNames: ['BEFORE_ROC', 'ROC'] }),
)
