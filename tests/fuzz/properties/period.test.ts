/**
 * Property tests for Period arithmetic and text.
 *
 * Tests the laws for:
 * - Text round-trip
 * - Additive inverse and identity
 * - Zero singleton
 * - Field independence (no carry)
 * - Normalization preserving totals
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { periodGen, boundaryPeriodGen } from '../generators'
import { Period } from '../../../src/period'
import { NANOS_PER_DAY } from '../../../src/constants'

// ============================================================================
// Text
// ============================================================================

describe('Period text', () => {
  it('parse(toString(p)) equals p', () => {
    fc.assert(
      fc.property(boundaryPeriodGen(), (p) => {
        expect(Period.parse(p.toString()).equals(p)).toBe(true)
      })
    )
  })

  it('toString always starts with P and never leaves a bare T', () => {
    fc.assert(
      fc.property(periodGen(), (p) => {
        const text = p.toString()
        expect(text.startsWith('P')).toBe(true)
        expect(text.endsWith('T')).toBe(false)
      })
    )
  })
})

// ============================================================================
// Arithmetic Laws
// ============================================================================

describe('Period arithmetic', () => {
  it('(p + q) - q equals p', () => {
    fc.assert(
      fc.property(periodGen(), periodGen(), (p, q) => {
        expect(p.plus(q).minus(q).equals(p)).toBe(true)
      })
    )
  })

  it('p - p is the zero singleton', () => {
    fc.assert(
      fc.property(boundaryPeriodGen(), (p) => {
        expect(p.minus(p)).toBe(Period.ZERO)
      })
    )
  })

  it('adding zero changes nothing', () => {
    fc.assert(
      fc.property(periodGen(), (p) => {
        expect(p.plus(Period.ZERO).equals(p)).toBe(true)
      })
    )
  })

  it('negating twice is the identity', () => {
    fc.assert(
      fc.property(periodGen(), (p) => {
        expect(p.negated().negated().equals(p)).toBe(true)
      })
    )
  })

  it('month sums never carry into years', () => {
    fc.assert(
      fc.property(fc.integer({ min: -100_000, max: 100_000 }), fc.integer({ min: -100_000, max: 100_000 }), (m, n) => {
        const sum = Period.ofDate(0, m, 0).plus(Period.ofDate(0, n, 0))
        expect(sum.years).toBe(0)
        expect(sum.months).toBe(m + n)
      })
    )
  })

  it('isZero holds exactly when every field is zero', () => {
    fc.assert(
      fc.property(boundaryPeriodGen(), (p) => {
        const allZero = p.years === 0 && p.months === 0 && p.days === 0 && p.timeNanos === 0n
        expect(p.isZero()).toBe(allZero)
      })
    )
  })
})

// ============================================================================
// Normalization
// ============================================================================

describe('Period normalization', () => {
  it('normalizeMonthsISO keeps the total month count', () => {
    fc.assert(
      fc.property(periodGen(), (p) => {
        const n = p.normalizeMonthsISO()
        expect(n.years * 12 + n.months).toBe(p.years * 12 + p.months)
        expect(Math.abs(n.months)).toBeLessThan(12)
      })
    )
  })

  it('normalizeHoursToDays keeps the total time', () => {
    fc.assert(
      fc.property(periodGen(), (p) => {
        const n = p.normalizeHoursToDays()
        expect(BigInt(n.days) * NANOS_PER_DAY + n.timeNanos).toBe(BigInt(p.days) * NANOS_PER_DAY + p.timeNanos)
        expect(n.timeNanos < NANOS_PER_DAY && n.timeNanos > -NANOS_PER_DAY).toBe(true)
      })
    )
  })
})
