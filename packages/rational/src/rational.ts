/**
 * Exact Rational Value
 *
 * Signed numerator over a positive denominator, always kept in lowest terms:
 * gcd(|numerator|, denominator) = 1, denominator > 0, and zero is 0/1.
 *
 * Values are immutable; every operation returns a new value. Comparison is by
 * cross-multiplication, there is no floating point conversion anywhere.
 */

import type { Sign } from '@cursevm/types'

function abs(value: bigint): bigint {
  return value < 0n ? -value : value
}

export function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a)
  let y = abs(b)
  while (y !== 0n) {
    const t = x % y
    x = y
    y = t
  }
  return x
}

function signOf(value: bigint): Sign {
  if (value > 0n) return 1
  if (value < 0n) return -1
  return 0
}

export class Rational {
  static readonly ZERO = new Rational(0n, 1n)
  static readonly ONE = new Rational(1n, 1n)

  readonly numerator: bigint
  readonly denominator: bigint

  private constructor(numerator: bigint, denominator: bigint) {
    this.numerator = numerator
    this.denominator = denominator
  }

  /**
   * Build a reduced value from any numerator/denominator pair
   * @throws RangeError when the denominator is zero
   */
  static of(numerator: bigint, denominator: bigint = 1n): Rational {
    if (denominator === 0n) {
      throw new RangeError('Rational denominator must be non-zero')
    }
    if (numerator === 0n) {
      return Rational.ZERO
    }
    const divisor = gcd(numerator, denominator)
    const sign = denominator < 0n ? -1n : 1n
    return new Rational(
      (sign * numerator) / divisor,
      (sign * denominator) / divisor,
    )
  }

  static fromInteger(value: bigint | number): Rational {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new RangeError(`Not a safe integer: ${value}`)
    }
    return Rational.of(BigInt(value), 1n)
  }

  get sign(): Sign {
    return signOf(this.numerator)
  }

  isZero(): boolean {
    return this.numerator === 0n
  }

  isInteger(): boolean {
    return this.denominator === 1n
  }

  /** The integer value when exact, otherwise null */
  toInteger(): bigint | null {
    return this.isInteger() ? this.numerator : null
  }

  add(other: Rational): Rational {
    return Rational.of(
      this.numerator * other.denominator + other.numerator * this.denominator,
      this.denominator * other.denominator,
    )
  }

  subtract(other: Rational): Rational {
    return Rational.of(
      this.numerator * other.denominator - other.numerator * this.denominator,
      this.denominator * other.denominator,
    )
  }

  multiply(other: Rational): Rational {
    return Rational.of(
      this.numerator * other.numerator,
      this.denominator * other.denominator,
    )
  }

  negate(): Rational {
    return this.isZero() ? this : new Rational(-this.numerator, this.denominator)
  }

  /** Multiplicative inverse; null for zero */
  reciprocal(): Rational | null {
    if (this.isZero()) {
      return null
    }
    return Rational.of(this.denominator, this.numerator)
  }

  compare(other: Rational): Sign {
    return signOf(
      this.numerator * other.denominator - other.numerator * this.denominator,
    )
  }

  equals(other: Rational): boolean {
    return this.compare(other) === 0
  }

  /** Decimal text: "n" for integers, "n/d" otherwise */
  toString(): string {
    return this.isInteger()
      ? this.numerator.toString()
      : `${this.numerator}/${this.denominator}`
  }
}
