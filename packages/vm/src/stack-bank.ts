/**
 * Stack Bank
 *
 * Sparse map of independently addressable value stacks. A stack springs into
 * existence, empty, the first time its index is referenced and lives until the
 * run ends. Popping or peeking an empty stack yields the policy value 0/1
 * together with an empty-stack curse instead of failing.
 */

import { Rational } from '@cursevm/rational'
import type { Faultable, Sign } from '@cursevm/types'
import { FIRST_STACK_INDEX } from './config'

export class StackBank {
  private readonly stacks = new Map<number, Rational[]>()

  push(index: number, value: Rational): void {
    this.stack(index).push(value)
  }

  pop(index: number): Faultable<Rational> {
    const value = this.stack(index).pop()
    if (value === undefined) {
      return [Rational.ZERO, { kind: 'empty-stack', details: { index } }]
    }
    return [value, null]
  }

  peek(index: number): Faultable<Rational> {
    const stack = this.stack(index)
    const value = stack[stack.length - 1]
    if (value === undefined) {
      return [Rational.ZERO, { kind: 'empty-stack', details: { index } }]
    }
    return [value, null]
  }

  peekSign(index: number): Faultable<Sign> {
    const [value, curse] = this.peek(index)
    return [value.sign, curse]
  }

  depth(index: number): number {
    return this.stacks.get(index)?.length ?? 0
  }

  /** Indices referenced so far, ascending */
  indices(): number[] {
    return [...this.stacks.keys()].sort((a, b) => a - b)
  }

  /** Stack contents bottom to top, as text */
  snapshot(): Record<number, string[]> {
    const result: Record<number, string[]> = {}
    for (const index of this.indices()) {
      result[index] = (this.stacks.get(index) ?? []).map((value) =>
        value.toString(),
      )
    }
    return result
  }

  private stack(index: number): Rational[] {
    if (!Number.isSafeInteger(index) || index < FIRST_STACK_INDEX) {
      throw new RangeError(`Invalid stack index: ${index}`)
    }
    let stack = this.stacks.get(index)
    if (!stack) {
      stack = []
      this.stacks.set(index, stack)
    }
    return stack
  }
}
