import { describe, expect, it } from 'vitest'
import { CurseCounter } from '../curse-counter'

describe('CurseCounter', () => {
  it('should start at zero', () => {
    const counter = new CurseCounter()

    expect(counter.value).toBe(0n)
    expect(counter.summary()).toEqual({})
  })

  it('should grow by one per curse and tally by kind', () => {
    const counter = new CurseCounter()
    counter.raise({ kind: 'empty-stack' })
    counter.raise({ kind: 'division-by-zero', details: { dividend: '7' } })
    counter.raise({ kind: 'empty-stack' })

    expect(counter.value).toBe(3n)
    expect(counter.countOf('empty-stack')).toBe(2n)
    expect(counter.countOf('overflow')).toBe(0n)
    expect(counter.summary()).toEqual({
      'empty-stack': 2n,
      'division-by-zero': 1n,
    })
  })
})
