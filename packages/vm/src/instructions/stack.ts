/**
 * Stack Instructions
 *
 * PUSH, DUPLICATE_SPREAD
 */

import { ADVANCE } from '@cursevm/types'
import { BaseInstruction, type InstructionContext } from './base'

/**
 * PUSH
 * Pushes the magnitude onto each of stacks 1..=span. Never curses.
 */
export class PUSHInstruction extends BaseInstruction {
  readonly name = 'PUSH'
  readonly opKind = { type: 'PUSH' } as const
  readonly mnemonic = 'push'
  readonly operands = ['span', 'magnitude'] as const
  protected readonly minimumSpan = 0

  execute(context: InstructionContext) {
    const value = this.literal(context.instruction)
    for (let index = 1; index <= context.instruction.span; index++) {
      this.push(context, index, value)
    }
    return ADVANCE
  }
}

/**
 * DUPLICATE_SPREAD
 * Copies the top of stack 1 onto stacks 2..=span.
 * An empty stack 1 curses once and spreads 0/1.
 */
export class DUPLICATE_SPREADInstruction extends BaseInstruction {
  readonly name = 'DUPLICATE_SPREAD'
  readonly opKind = { type: 'DUPLICATE_SPREAD' } as const
  readonly mnemonic = 'dup'

  execute(context: InstructionContext) {
    const value = this.peek(context, 1)
    for (let index = 2; index <= context.instruction.span; index++) {
      this.push(context, index, value)
    }
    return ADVANCE
  }
}
