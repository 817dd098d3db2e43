/**
 * calendrical
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CalendricalError, CalendricalErrorCode,
  ArithmeticOverflowError, InvalidValueError,
  UnsupportedUnitError, UnsupportedFieldError,
  ChronologyMismatchError, NoValidFieldsError,
  HasCalendarUnitsError, ParseError, NullInputError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Safe arithmetic
export type { Amount } from './safe-math'
export {
  safeAddInt, safeSubtractInt, safeMultiplyInt, safeNegateInt,
  safeAddLong, safeSubtractLong, safeMultiplyLong, safeNegateLong,
  safeIncrementLong, safeDecrementLong,
  safeToInt, toLong,
  floorDivInt, floorModInt, floorDivLong, floorModLong,
  truncDivInt, truncModInt,
} from './safe-math'
export {
  INT_MIN, INT_MAX, LONG_MIN, LONG_MAX,
  NANOS_PER_SECOND, NANOS_PER_MINUTE, NANOS_PER_HOUR, NANOS_PER_DAY,
  SECONDS_PER_DAY, MIN_YEAR, MAX_YEAR,
} from './constants'

// Fields & units
export type { TemporalAccessor } from './fields'
export { Field, ValueRange, fieldRange, isFieldSupported } from './fields'
export type { UnitAdjustable } from './units'
export { Unit, unitDuration, isDurationEstimated, isTimeUnit, isDateUnit } from './units'

// ISO value types
export { Duration } from './duration'
export { Month } from './month'
export type { MonthName } from './month'
export { LocalDate, parseLocalDate } from './local-date'
export { LocalTime, parseLocalTime } from './local-time'
export { LocalDateTime, parseLocalDateTime } from './local-date-time'
export { YearMonth } from './year-month'
export { isLeapYear, daysInMonth, daysInYear } from './time-date'

// Chronologies
export type { Chronology } from './chrono/chronology'
export { IsoChronology } from './chrono/iso-chronology'
export type { CalendarRules } from './chrono/chrono-date'
export { CalendarSystem, ChronoDate } from './chrono/chrono-date'
export { createOffsetRules } from './chrono/offset-rules'
export { JapaneseChronology, JapaneseEra } from './chrono/japanese'
export { MinguoChronology, MinguoEra } from './chrono/minguo'
export { ThaiBuddhistChronology, ThaiBuddhistEra } from './chrono/thai-buddhist'
export { chronologyById, availableChronologies } from './chrono/registry'

// Period
export { Period, parsePeriod } from './period'
export type { PeriodFields } from './period-format'
export { formatPeriod, parsePeriodFields } from './period-format'
export type { MonthArithmeticDate, NanoOfDayTime } from './period-between'
export { periodBetween, periodBetweenDates, periodBetweenTimes } from './period-between'
