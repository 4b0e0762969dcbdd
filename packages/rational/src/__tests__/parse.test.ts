import { describe, expect, it } from 'vitest'
import { parseRational } from '../parse'

describe('parseRational', () => {
  it.each([
    ['42', '42'],
    ['-42', '-42'],
    ['+7', '7'],
    ['6/8', '3/4'],
    ['-6/8', '-3/4'],
    ['1.25', '5/4'],
    ['-.5', '-1/2'],
    ['5.', '5'],
    ['  12  ', '12'],
  ])('should parse %s as %s', (token, expected) => {
    expect(parseRational(token)?.toString()).toBe(expected)
  })

  it.each(['', '.', 'abc', '1/0', '1/-2', '--1', '1e5', '0x10', '1 2'])(
    'should reject %j',
    (token) => {
      expect(parseRational(token)).toBeNull()
    },
  )
})
