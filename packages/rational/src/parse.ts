import { Rational } from './rational'

const INTEGER = /^([+-]?)(\d+)$/
const FRACTION = /^([+-]?)(\d+)\/(\d+)$/
const DECIMAL = /^([+-]?)(\d*)\.(\d*)$/

/**
 * Parse a number token into an exact value.
 *
 * Accepted forms: `12`, `-12`, `3/4`, `-3/4`, `1.25`, `.5`, `5.`
 * Returns null for anything else, including a zero denominator.
 */
export function parseRational(token: string): Rational | null {
  const text = token.trim()

  const integer = INTEGER.exec(text)
  if (integer) {
    const [, sign, digits] = integer
    return Rational.of(applySign(sign, BigInt(digits ?? '0')))
  }

  const fraction = FRACTION.exec(text)
  if (fraction) {
    const [, sign, numerator, denominator] = fraction
    const den = BigInt(denominator ?? '0')
    if (den === 0n) {
      return null
    }
    return Rational.of(applySign(sign, BigInt(numerator ?? '0')), den)
  }

  const decimal = DECIMAL.exec(text)
  if (decimal) {
    const [, sign, whole = '', fractional = ''] = decimal
    if (whole.length === 0 && fractional.length === 0) {
      return null
    }
    const scale = 10n ** BigInt(fractional.length)
    const digits = BigInt(`${whole}${fractional}` || '0')
    return Rational.of(applySign(sign, digits), scale)
  }

  return null
}

function applySign(sign: string | undefined, value: bigint): bigint {
  return sign === '-' ? -value : value
}
