/**
 * Safe Arithmetic
 *
 * Overflow-checked integer operations. 32-bit values are integral `number`s,
 * 64-bit values are `bigint`s. Every function returns the exact result or
 * throws ArithmeticOverflowError; nothing wraps silently.
 */

import { INT_MIN, INT_MAX, LONG_MIN, LONG_MAX } from './constants'
import { ArithmeticOverflowError, InvalidValueError } from './errors'

/** A 64-bit amount as accepted by public APIs. */
export type Amount = number | bigint

// ============================================================================
// Conversion
// ============================================================================

export function isInt(value: number): boolean {
  return Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX
}

export function isLong(value: bigint): boolean {
  return value >= LONG_MIN && value <= LONG_MAX
}

/**
 * Widens an amount to a 64-bit bigint.
 * A `number` must be an integer; both forms must fit in 64 bits.
 */
export function toLong(amount: Amount): bigint {
  if (typeof amount === 'number') {
    if (!Number.isInteger(amount)) {
      throw new InvalidValueError(`Amount must be an integer: ${amount}`)
    }
    amount = BigInt(amount)
  }
  if (!isLong(amount)) {
    throw new ArithmeticOverflowError(`Value exceeds 64-bit range: ${amount}`)
  }
  return amount
}

/**
 * Narrows a value to 32 bits.
 */
export function safeToInt(value: Amount): number {
  if (typeof value === 'bigint') {
    if (value < BigInt(INT_MIN) || value > BigInt(INT_MAX)) {
      throw new ArithmeticOverflowError(`Value exceeds 32-bit range: ${value}`)
    }
    return Number(value)
  }
  if (!Number.isInteger(value)) {
    throw new InvalidValueError(`Value must be an integer: ${value}`)
  }
  if (value < INT_MIN || value > INT_MAX) {
    throw new ArithmeticOverflowError(`Value exceeds 32-bit range: ${value}`)
  }
  return value
}

/**
 * Requires an integral 32-bit argument, without converting.
 */
export function checkInt(value: number, name: string): number {
  if (!Number.isInteger(value)) {
    throw new InvalidValueError(`${name} must be an integer: ${value}`)
  }
  if (value < INT_MIN || value > INT_MAX) {
    throw new ArithmeticOverflowError(`${name} exceeds 32-bit range: ${value}`)
  }
  return value
}

// ============================================================================
// 32-bit
// ============================================================================

function requireIntOperands(a: number, b: number, operation: string): void {
  if (!isInt(a) || !isInt(b)) {
    throw new ArithmeticOverflowError(`Operands of int ${operation} must be 32-bit integers: ${a}, ${b}`)
  }
}

export function safeAddInt(a: number, b: number): number {
  requireIntOperands(a, b, 'addition')
  const sum = (a + b) | 0
  // Overflow iff both operands share a sign that the result does not
  if (((a ^ sum) & (b ^ sum)) < 0) {
    throw new ArithmeticOverflowError(`Addition overflows an int: ${a} + ${b}`)
  }
  return sum
}

export function safeSubtractInt(a: number, b: number): number {
  requireIntOperands(a, b, 'subtraction')
  const diff = (a - b) | 0
  // Overflow iff the operands differ in sign and the result's sign differs from a
  if (((a ^ b) & (a ^ diff)) < 0) {
    throw new ArithmeticOverflowError(`Subtraction overflows an int: ${a} - ${b}`)
  }
  return diff
}

export function safeMultiplyInt(a: number, b: number): number {
  requireIntOperands(a, b, 'multiplication')
  const product = BigInt(a) * BigInt(b)
  if (product < BigInt(INT_MIN) || product > BigInt(INT_MAX)) {
    throw new ArithmeticOverflowError(`Multiplication overflows an int: ${a} * ${b}`)
  }
  return Number(product)
}

export function safeNegateInt(a: number): number {
  if (!isInt(a)) {
    throw new ArithmeticOverflowError(`Operand of int negation must be a 32-bit integer: ${a}`)
  }
  if (a === INT_MIN) {
    throw new ArithmeticOverflowError(`Int overflow: -(${a})`)
  }
  return -a | 0
}

// ============================================================================
// 64-bit
// ============================================================================

export function safeAddLong(a: bigint, b: bigint): bigint {
  const sum = BigInt.asIntN(64, a + b)
  if (((a ^ sum) & (b ^ sum)) < 0n) {
    throw new ArithmeticOverflowError(`Addition overflows a long: ${a} + ${b}`)
  }
  return sum
}

export function safeSubtractLong(a: bigint, b: bigint): bigint {
  const diff = BigInt.asIntN(64, a - b)
  if (((a ^ b) & (a ^ diff)) < 0n) {
    throw new ArithmeticOverflowError(`Subtraction overflows a long: ${a} - ${b}`)
  }
  return diff
}

export function safeMultiplyLong(a: bigint, b: bigint): bigint {
  if (b === 1n) return a
  if (a === 1n) return b
  if (a === 0n || b === 0n) return 0n
  if (b === -1n) return safeNegateLong(a)
  if (a === -1n) return safeNegateLong(b)
  const product = BigInt.asIntN(64, a * b)
  if (product / b !== a || (a === LONG_MIN && b === -1n)) {
    throw new ArithmeticOverflowError(`Multiplication overflows a long: ${a} * ${b}`)
  }
  return product
}

export function safeNegateLong(a: bigint): bigint {
  if (a === LONG_MIN) {
    throw new ArithmeticOverflowError(`Long overflow: -(${a})`)
  }
  return -a
}

export function safeIncrementLong(a: bigint): bigint {
  return safeAddLong(a, 1n)
}

export function safeDecrementLong(a: bigint): bigint {
  return safeSubtractLong(a, 1n)
}

// ============================================================================
// Floor Division
// ============================================================================

function requireDivisor(b: number | bigint): void {
  if (b === 0 || b === 0n) {
    throw new ArithmeticOverflowError('Division by zero')
  }
}

/** Remainder with the sign of `b`. Never -0. */
export function floorModInt(a: number, b: number): number {
  requireDivisor(b)
  const r = a % b
  return r !== 0 && (r < 0) !== (b < 0) ? r + b : r + 0
}

/** Quotient rounded toward negative infinity. Never -0. */
export function floorDivInt(a: number, b: number): number {
  return (a - floorModInt(a, b)) / b + 0
}

export function floorDivLong(a: bigint, b: bigint): bigint {
  requireDivisor(b)
  const q = a / b
  // bigint division truncates; step down when signs differ and it was inexact
  if ((a % b !== 0n) && ((a < 0n) !== (b < 0n))) return q - 1n
  return q
}

export function floorModLong(a: bigint, b: bigint): bigint {
  return a - floorDivLong(a, b) * b
}

// ============================================================================
// Truncating Division
// ============================================================================

/** Quotient rounded toward zero. Never -0, unlike Math.trunc. */
export function truncDivInt(a: number, b: number): number {
  requireDivisor(b)
  return (a - (a % b)) / b
}

/** Remainder with the sign of `a`. Never -0, unlike `%`. */
export function truncModInt(a: number, b: number): number {
  return a - truncDivInt(a, b) * b
}
