/**
 * Rational Arithmetic Backends
 *
 * Both backends compute the exact reduced result first. The arbitrary
 * precision backend admits every result; the bounded backend admits only
 * results whose numerator and denominator fit a signed 64-bit integer and
 * turns anything wider into an overflow curse.
 *
 * A faulting operation always yields the policy value 0/1.
 */

import type {
  CombineOperator,
  Curse,
  Faultable,
  NumericBackend,
} from '@cursevm/types'
import { parseRational } from './parse'
import { Rational } from './rational'

export const BOUNDED_LIMITS = {
  MIN: -(2n ** 63n),
  MAX: 2n ** 63n - 1n,
} as const

export interface RationalArithmetic {
  readonly backend: NumericBackend

  add(left: Rational, right: Rational): Faultable<Rational>
  subtract(left: Rational, right: Rational): Faultable<Rational>
  multiply(left: Rational, right: Rational): Faultable<Rational>
  /** Division by a zero-valued divisor is a division-by-zero curse */
  divide(left: Rational, right: Rational): Faultable<Rational>
  negate(value: Rational): Faultable<Rational>
  combine(
    operator: CombineOperator,
    left: Rational,
    right: Rational,
  ): Faultable<Rational>
  fromInteger(value: bigint | number): Faultable<Rational>
  /** Parse a number token; malformed text is an input-parse curse */
  parse(token: string): Faultable<Rational>
}

export function policyValue(curse: Curse): Faultable<Rational> {
  return [Rational.ZERO, curse]
}

abstract class BaseArithmetic implements RationalArithmetic {
  abstract readonly backend: NumericBackend

  /**
   * Decide whether an exact result is representable under this backend
   */
  protected abstract admit(
    value: Rational,
    operation: string,
  ): Faultable<Rational>

  add(left: Rational, right: Rational): Faultable<Rational> {
    return this.admit(left.add(right), 'add')
  }

  subtract(left: Rational, right: Rational): Faultable<Rational> {
    return this.admit(left.subtract(right), 'sub')
  }

  multiply(left: Rational, right: Rational): Faultable<Rational> {
    return this.admit(left.multiply(right), 'mul')
  }

  divide(left: Rational, right: Rational): Faultable<Rational> {
    const inverse = right.reciprocal()
    if (inverse === null) {
      return policyValue({
        kind: 'division-by-zero',
        details: { dividend: left.toString() },
      })
    }
    return this.admit(left.multiply(inverse), 'div')
  }

  negate(value: Rational): Faultable<Rational> {
    return this.admit(value.negate(), 'negate')
  }

  combine(
    operator: CombineOperator,
    left: Rational,
    right: Rational,
  ): Faultable<Rational> {
    switch (operator) {
      case 'add':
        return this.add(left, right)
      case 'sub':
        return this.subtract(left, right)
      case 'mul':
        return this.multiply(left, right)
      case 'div':
        return this.divide(left, right)
      default: {
        const _exhaustive: never = operator
        throw new Error(`Unknown operator: ${String(_exhaustive)}`)
      }
    }
  }

  fromInteger(value: bigint | number): Faultable<Rational> {
    return this.admit(Rational.fromInteger(value), 'fromInteger')
  }

  parse(token: string): Faultable<Rational> {
    const value = parseRational(token)
    if (value === null) {
      return policyValue({ kind: 'input-parse', details: { token } })
    }
    return this.admit(value, 'parse')
  }
}

/**
 * Unbounded numerator and denominator: never overflows
 */
export class ArbitraryArithmetic extends BaseArithmetic {
  readonly backend = 'arbitrary' as const

  protected admit(value: Rational): Faultable<Rational> {
    return [value, null]
  }
}

/**
 * Numerator in [-2^63, 2^63 - 1], denominator in [1, 2^63 - 1]
 */
export class BoundedArithmetic extends BaseArithmetic {
  readonly backend = 'bounded' as const

  static fits(value: Rational): boolean {
    return (
      value.numerator >= BOUNDED_LIMITS.MIN &&
      value.numerator <= BOUNDED_LIMITS.MAX &&
      value.denominator <= BOUNDED_LIMITS.MAX
    )
  }

  protected admit(value: Rational, operation: string): Faultable<Rational> {
    if (BoundedArithmetic.fits(value)) {
      return [value, null]
    }
    return policyValue({
      kind: 'overflow',
      details: { operation, result: value.toString() },
    })
  }
}

export function createArithmetic(backend: NumericBackend): RationalArithmetic {
  return backend === 'bounded'
    ? new BoundedArithmetic()
    : new ArbitraryArithmetic()
}
