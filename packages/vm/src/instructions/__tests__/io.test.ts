/**
 * I/O Instruction Tests
 */

import { Rational } from '@cursevm/rational'
import { describe, expect, it } from 'vitest'
import { createTestContext, execute, fill, int } from './test-helper'

describe('I/O Instructions', () => {
  describe('OUTPUT_NUMBER', () => {
    it.each([
      [int(-5), '-5'],
      [Rational.of(3n, 4n), '3/4'],
      [Rational.of(-6n, 4n), '-3/2'],
    ])('should write %s', async (value, text) => {
      const { context, state, io } = createTestContext(
        { type: 'OUTPUT_NUMBER' },
        1,
      )
      fill(state, 1, value)

      await execute(context)

      expect(io.output).toBe(text)
      expect(state.stacks.depth(1)).toBe(0)
    })

    it('should write 0 and curse on an empty stack', async () => {
      const { context, state, io } = createTestContext(
        { type: 'OUTPUT_NUMBER' },
        2,
      )

      await execute(context)

      expect(io.output).toBe('0')
      expect(state.curses.value).toBe(1n)
    })
  })

  describe('OUTPUT_CHAR', () => {
    it('should write the code point', async () => {
      const { context, state, io } = createTestContext(
        { type: 'OUTPUT_CHAR' },
        1,
      )
      fill(state, 1, int(0x1f600), int(72))

      await execute(context)
      await execute(context)

      expect(io.output).toBe('H\u{1F600}')
      expect(state.curses.value).toBe(0n)
    })

    it.each([
      ['a fraction', Rational.of(1n, 2n)],
      ['a negative value', int(-1)],
      ['a surrogate', int(0xd800)],
      ['a value past U+10FFFF', int(0x110000)],
    ])('should reject %s', async (_label, value) => {
      const { context, state, io } = createTestContext(
        { type: 'OUTPUT_CHAR' },
        1,
      )
      fill(state, 1, value)

      await execute(context)

      expect(io.output).toBe('')
      expect(state.curses.value).toBe(1n)
      expect(state.curses.countOf('invalid-codepoint')).toBe(1n)
    })

    it('should write nothing and curse once on an empty stack', async () => {
      const { context, state, io } = createTestContext(
        { type: 'OUTPUT_CHAR' },
        1,
      )

      await execute(context)

      expect(io.output).toBe('')
      expect(state.curses.value).toBe(1n)
      expect(state.curses.countOf('empty-stack')).toBe(1n)
    })
  })

  describe('INPUT_NUMBER', () => {
    it('should read tokens until end of input', async () => {
      const { context, state } = createTestContext({ type: 'INPUT_NUMBER' }, 1, {
        input: ' 42\n1/3  x',
      })

      await execute(context)
      await execute(context)
      expect(state.curses.value).toBe(0n)

      await execute(context)
      expect(state.curses.countOf('input-parse')).toBe(1n)

      await execute(context)
      expect(state.curses.countOf('end-of-input')).toBe(1n)

      expect(state.stacks.snapshot()).toEqual({ 1: ['42', '1/3', '0', '0'] })
      expect(state.curses.value).toBe(2n)
    })

    it('should curse a token wider than the bounded backend', async () => {
      const { context, state } = createTestContext({ type: 'INPUT_NUMBER' }, 1, {
        input: '9223372036854775808',
        backend: 'bounded',
      })

      await execute(context)

      expect(state.stacks.snapshot()).toEqual({ 1: ['0'] })
      expect(state.curses.countOf('overflow')).toBe(1n)
    })
  })

  describe('INPUT_CHAR', () => {
    it('should push code points until end of input', async () => {
      const { context, state } = createTestContext({ type: 'INPUT_CHAR' }, 2, {
        input: 'Aé',
      })

      await execute(context)
      await execute(context)
      await execute(context)

      expect(state.stacks.snapshot()).toEqual({ 2: ['65', '233', '0'] })
      expect(state.curses.value).toBe(1n)
      expect(state.curses.countOf('end-of-input')).toBe(1n)
    })
  })
})
