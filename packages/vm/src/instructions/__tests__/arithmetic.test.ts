/**
 * COMBINE Instruction Tests
 * Chaining across stacks, soft faults and bounded overflow
 */

import { BOUNDED_LIMITS, Rational } from '@cursevm/rational'
import { describe, expect, it } from 'vitest'
import { createTestContext, execute, fill, int } from './test-helper'

describe('COMBINE Instructions', () => {
  it('should chain add across three stacks', async () => {
    const { context, state } = createTestContext(
      { type: 'COMBINE', operator: 'add' },
      3,
    )
    fill(state, 1, int(2))
    fill(state, 2, int(3))
    fill(state, 3, int(5))

    const update = await execute(context)

    expect(update).toEqual({ type: 'advance' })
    expect(state.stacks.snapshot()).toEqual({ 1: [], 2: [], 3: ['5', '10'] })
    expect(state.curses.value).toBe(0n)
  })

  it('should subtract the top of stack 2 from the top of stack 1', async () => {
    const { context, state } = createTestContext(
      { type: 'COMBINE', operator: 'sub' },
      2,
    )
    fill(state, 1, Rational.of(1n, 2n))
    fill(state, 2, Rational.of(1n, 3n))

    await execute(context)

    expect(state.stacks.snapshot()).toEqual({ 1: [], 2: ['1/3', '1/6'] })
  })

  it('should substitute 0 for an empty left operand', async () => {
    const { context, state } = createTestContext(
      { type: 'COMBINE', operator: 'div' },
      2,
    )
    fill(state, 2, int(7))

    await execute(context)

    expect(state.stacks.snapshot()).toEqual({ 1: [], 2: ['7', '0'] })
    expect(state.curses.value).toBe(1n)
    expect(state.curses.countOf('empty-stack')).toBe(1n)
  })

  it('should curse division by zero and push 0', async () => {
    const { context, state } = createTestContext(
      { type: 'COMBINE', operator: 'div' },
      2,
    )
    fill(state, 1, int(7))
    fill(state, 2, int(0))

    await execute(context)

    expect(state.stacks.snapshot()).toEqual({ 1: [], 2: ['0', '0'] })
    expect(state.curses.value).toBe(1n)
    expect(state.curses.countOf('division-by-zero')).toBe(1n)
  })

  it('should curse every faulting step of one chain', async () => {
    const { context, state } = createTestContext(
      { type: 'COMBINE', operator: 'mul' },
      3,
    )
    fill(state, 3, int(4))

    await execute(context)

    // stack 1 and stack 2 are both empty
    expect(state.stacks.snapshot()).toEqual({ 1: [], 2: [], 3: ['4', '0'] })
    expect(state.curses.value).toBe(2n)
  })

  it.each([0, 1])('should do nothing with span %i', async (span) => {
    const { context, state } = createTestContext(
      { type: 'COMBINE', operator: 'add' },
      span,
    )
    fill(state, 1, int(3))

    await execute(context)

    expect(state.stacks.snapshot()).toEqual({ 1: ['3'] })
    expect(state.curses.value).toBe(0n)
  })

  describe('overflow', () => {
    const max = Rational.of(BOUNDED_LIMITS.MAX)

    it('should curse and push 0 under the bounded backend', async () => {
      const { context, state } = createTestContext(
        { type: 'COMBINE', operator: 'mul' },
        2,
        { backend: 'bounded' },
      )
      fill(state, 1, max)
      fill(state, 2, int(2))

      await execute(context)

      expect(state.stacks.snapshot()).toEqual({ 1: [], 2: ['2', '0'] })
      expect(state.curses.countOf('overflow')).toBe(1n)
    })

    it('should keep the exact result under the arbitrary backend', async () => {
      const { context, state } = createTestContext(
        { type: 'COMBINE', operator: 'mul' },
        2,
        { backend: 'arbitrary' },
      )
      fill(state, 1, max)
      fill(state, 2, int(2))

      await execute(context)

      expect(state.stacks.snapshot()).toEqual({
        1: [],
        2: ['2', '18446744073709551614'],
      })
      expect(state.curses.value).toBe(0n)
    })
  })
})
