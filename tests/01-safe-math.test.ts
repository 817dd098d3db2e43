/**
 * Segment 01: Safe Arithmetic Tests
 *
 * Overflow-checked 32-bit and 64-bit integer operations and floor division.
 * Every operation must return the exact result or throw ArithmeticOverflowError.
 */

import { describe, it, expect } from 'vitest'
import {
  safeAddInt,
  safeSubtractInt,
  safeMultiplyInt,
  safeNegateInt,
  safeAddLong,
  safeSubtractLong,
  safeMultiplyLong,
  safeNegateLong,
  safeIncrementLong,
  safeDecrementLong,
  safeToInt,
  toLong,
  checkInt,
  floorDivInt,
  floorModInt,
  floorDivLong,
  floorModLong,
  truncDivInt,
  truncModInt,
} from '../src/safe-math'
import { INT_MAX, INT_MIN, LONG_MAX, LONG_MIN } from '../src/constants'
import { ArithmeticOverflowError, InvalidValueError } from '../src/errors'

// ============================================================================
// 1. 32-BIT OPERATIONS
// ============================================================================

describe('32-bit operations', () => {
  describe('safeAddInt', () => {
    it('adds within range', () => {
      expect(safeAddInt(2, 3)).toBe(5)
      expect(safeAddInt(-5, 3)).toBe(-2)
    })

    it('reaches the bounds exactly', () => {
      expect(safeAddInt(INT_MAX - 1, 1)).toBe(INT_MAX)
      expect(safeAddInt(INT_MIN + 1, -1)).toBe(INT_MIN)
    })

    it('throws past the maximum', () => {
      expect(() => safeAddInt(INT_MAX, 1)).toThrow(ArithmeticOverflowError)
    })

    it('throws past the minimum', () => {
      expect(() => safeAddInt(INT_MIN, -1)).toThrow(ArithmeticOverflowError)
    })

    it('never overflows for operands of opposite sign', () => {
      expect(safeAddInt(INT_MAX, INT_MIN)).toBe(-1)
    })

    it('rejects operands outside 32 bits instead of wrapping', () => {
      expect(() => safeAddInt(2 ** 31, 0)).toThrow(ArithmeticOverflowError)
      expect(() => safeAddInt(0, -(2 ** 31) - 1)).toThrow(ArithmeticOverflowError)
      expect(() => safeAddInt(1.5, 1)).toThrow('Operands of int addition must be 32-bit integers: 1.5, 1')
    })
  })

  describe('safeSubtractInt', () => {
    it('subtracts within range', () => {
      expect(safeSubtractInt(10, 3)).toBe(7)
      expect(safeSubtractInt(-1, INT_MIN)).toBe(INT_MAX)
    })

    it('throws below the minimum', () => {
      expect(() => safeSubtractInt(INT_MIN, 1)).toThrow(ArithmeticOverflowError)
    })

    it('throws when subtracting the minimum from zero', () => {
      expect(() => safeSubtractInt(0, INT_MIN)).toThrow(ArithmeticOverflowError)
    })

    it('rejects operands outside 32 bits instead of wrapping', () => {
      expect(() => safeSubtractInt(2 ** 31, 1)).toThrow(ArithmeticOverflowError)
    })
  })

  describe('safeMultiplyInt', () => {
    it('multiplies within range', () => {
      expect(safeMultiplyInt(-65536, 32768)).toBe(INT_MIN)
      expect(safeMultiplyInt(7, -6)).toBe(-42)
    })

    it('throws when the product exceeds 32 bits', () => {
      expect(() => safeMultiplyInt(65536, 32768)).toThrow(ArithmeticOverflowError)
      expect(() => safeMultiplyInt(INT_MIN, -1)).toThrow(ArithmeticOverflowError)
    })
  })

  describe('safeNegateInt', () => {
    it('negates', () => {
      expect(safeNegateInt(5)).toBe(-5)
      expect(safeNegateInt(INT_MAX)).toBe(INT_MIN + 1)
    })

    it('returns positive zero for zero', () => {
      expect(safeNegateInt(0)).toBe(0)
    })

    it('throws for the minimum', () => {
      expect(() => safeNegateInt(INT_MIN)).toThrow(ArithmeticOverflowError)
    })
  })
})

// ============================================================================
// 2. 64-BIT OPERATIONS
// ============================================================================

describe('64-bit operations', () => {
  describe('safeAddLong', () => {
    it('adds within range', () => {
      expect(safeAddLong(LONG_MIN, LONG_MAX)).toBe(-1n)
      expect(safeAddLong(LONG_MAX - 1n, 1n)).toBe(LONG_MAX)
    })

    it('throws past either bound', () => {
      expect(() => safeAddLong(LONG_MAX, 1n)).toThrow(ArithmeticOverflowError)
      expect(() => safeAddLong(LONG_MIN, -1n)).toThrow(ArithmeticOverflowError)
    })
  })

  describe('safeSubtractLong', () => {
    it('subtracts within range', () => {
      expect(safeSubtractLong(0n, LONG_MAX)).toBe(LONG_MIN + 1n)
    })

    it('throws past either bound', () => {
      expect(() => safeSubtractLong(LONG_MIN, 1n)).toThrow(ArithmeticOverflowError)
      expect(() => safeSubtractLong(0n, LONG_MIN)).toThrow(ArithmeticOverflowError)
    })
  })

  describe('safeMultiplyLong', () => {
    it('handles the identity and zero cases', () => {
      expect(safeMultiplyLong(LONG_MIN, 1n)).toBe(LONG_MIN)
      expect(safeMultiplyLong(1n, LONG_MAX)).toBe(LONG_MAX)
      expect(safeMultiplyLong(LONG_MIN, 0n)).toBe(0n)
    })

    it('multiplies within range', () => {
      expect(safeMultiplyLong(3n, -4n)).toBe(-12n)
      expect(safeMultiplyLong(-(2n ** 32n), 2n ** 31n)).toBe(LONG_MIN)
    })

    it('throws for the minimum times minus one', () => {
      expect(() => safeMultiplyLong(LONG_MIN, -1n)).toThrow(ArithmeticOverflowError)
      expect(() => safeMultiplyLong(-1n, LONG_MIN)).toThrow(ArithmeticOverflowError)
    })

    it('throws when the product exceeds 64 bits', () => {
      expect(() => safeMultiplyLong(LONG_MAX, 2n)).toThrow(ArithmeticOverflowError)
      expect(() => safeMultiplyLong(2n ** 32n, 2n ** 31n)).toThrow(ArithmeticOverflowError)
    })
  })

  describe('safeNegateLong', () => {
    it('negates', () => {
      expect(safeNegateLong(LONG_MAX)).toBe(LONG_MIN + 1n)
    })

    it('throws for the minimum', () => {
      expect(() => safeNegateLong(LONG_MIN)).toThrow(ArithmeticOverflowError)
    })
  })

  describe('increment and decrement', () => {
    it('steps by one', () => {
      expect(safeIncrementLong(41n)).toBe(42n)
      expect(safeDecrementLong(0n)).toBe(-1n)
    })

    it('throws at the bounds', () => {
      expect(() => safeIncrementLong(LONG_MAX)).toThrow(ArithmeticOverflowError)
      expect(() => safeDecrementLong(LONG_MIN)).toThrow(ArithmeticOverflowError)
    })
  })
})

// ============================================================================
// 3. CONVERSION
// ============================================================================

describe('Conversion', () => {
  it('safeToInt narrows values inside 32 bits', () => {
    expect(safeToInt(-2147483648n)).toBe(INT_MIN)
    expect(safeToInt(12)).toBe(12)
  })

  it('safeToInt throws outside 32 bits', () => {
    expect(() => safeToInt(2147483648n)).toThrow(ArithmeticOverflowError)
    expect(() => safeToInt(-2147483649)).toThrow(ArithmeticOverflowError)
  })

  it('safeToInt rejects fractions', () => {
    expect(() => safeToInt(1.5)).toThrow(InvalidValueError)
  })

  it('toLong widens integral numbers', () => {
    expect(toLong(42)).toBe(42n)
    expect(toLong(-7n)).toBe(-7n)
  })

  it('toLong rejects fractions and values beyond 64 bits', () => {
    expect(() => toLong(1.5)).toThrow(InvalidValueError)
    expect(() => toLong(Number.NaN)).toThrow(InvalidValueError)
    expect(() => toLong(2 ** 63)).toThrow(ArithmeticOverflowError)
    expect(() => toLong(LONG_MAX + 1n)).toThrow(ArithmeticOverflowError)
  })

  it('checkInt names the argument', () => {
    expect(() => checkInt(0.5, 'days')).toThrow('days must be an integer: 0.5')
  })
})

// ============================================================================
// 4. FLOOR DIVISION
// ============================================================================

describe('Floor division', () => {
  it('rounds toward negative infinity for numbers', () => {
    expect(floorDivInt(-1, 4)).toBe(-1)
    expect(floorModInt(-1, 4)).toBe(3)
    expect(floorDivInt(7, -2)).toBe(-4)
    expect(floorModInt(7, -2)).toBe(-1)
    expect(floorDivInt(8, 4)).toBe(2)
    expect(floorModInt(8, 4)).toBe(0)
  })

  it('rounds toward negative infinity for bigints', () => {
    expect(floorDivLong(-1n, 4n)).toBe(-1n)
    expect(floorModLong(-1n, 4n)).toBe(3n)
    expect(floorDivLong(-8n, 4n)).toBe(-2n)
    expect(floorModLong(-8n, 4n)).toBe(0n)
    expect(floorDivLong(9n, 4n)).toBe(2n)
    expect(floorModLong(9n, 4n)).toBe(1n)
  })

  it('never produces negative zero', () => {
    expect(floorDivInt(0, -4)).toBe(0)
    expect(floorModInt(-8, 4)).toBe(0)
    expect(floorDivInt(-8, 4)).toBe(-2)
  })

  it('throws on a zero divisor', () => {
    expect(() => floorDivInt(5, 0)).toThrow(ArithmeticOverflowError)
    expect(() => floorModInt(5, 0)).toThrow('Division by zero')
    expect(() => floorDivLong(5n, 0n)).toThrow(ArithmeticOverflowError)
    expect(() => floorModLong(5n, 0n)).toThrow(ArithmeticOverflowError)
    expect(() => truncDivInt(5, 0)).toThrow(ArithmeticOverflowError)
  })
})

// ============================================================================
// 5. TRUNCATING DIVISION
// ============================================================================

describe('Truncating division', () => {
  it('rounds toward zero', () => {
    expect(truncDivInt(-17, 12)).toBe(-1)
    expect(truncModInt(-17, 12)).toBe(-5)
    expect(truncDivInt(17, 12)).toBe(1)
    expect(truncModInt(17, 12)).toBe(5)
  })

  it('never produces negative zero', () => {
    expect(truncDivInt(-3, 7)).toBe(0)
    expect(truncModInt(-12, 12)).toBe(0)
  })
})
