/**
 * Integer bounds and time-unit conversion factors shared across the library.
 */

// ============================================================================
// Integer Bounds
// ============================================================================

export const INT_MIN = -2147483648
export const INT_MAX = 2147483647

export const LONG_MIN = -(2n ** 63n)
export const LONG_MAX = 2n ** 63n - 1n

// ============================================================================
// Time Conversion
// ============================================================================

export const SECONDS_PER_MINUTE = 60
export const SECONDS_PER_HOUR = 3600
export const SECONDS_PER_DAY = 86400
export const MONTHS_PER_YEAR = 12

export const NANOS_PER_MICRO = 1_000n
export const NANOS_PER_MILLI = 1_000_000n
export const NANOS_PER_SECOND = 1_000_000_000n
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE
export const NANOS_PER_DAY = 24n * NANOS_PER_HOUR

// ============================================================================
// Calendar Bounds
// ============================================================================

export const MIN_YEAR = -999_999_999
export const MAX_YEAR = 999_999_999
