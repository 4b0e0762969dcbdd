/**
 * Control Flow Instructions
 *
 * JUMP_IF_NONPOSITIVE, JUMP_ALWAYS, TERMINATE
 */

import type { PointerUpdate } from '@cursevm/types'
import { ADVANCE, HALT } from '@cursevm/types'
import { BaseInstruction, type InstructionContext } from './base'

function jumpTo(target: number): PointerUpdate {
  return { type: 'jump', target }
}

/**
 * JUMP_IF_NONPOSITIVE
 * Jumps to magnitude when the top of stack span is <= 0.
 * An empty stack reads as sign 0 (jump taken) and curses once.
 */
export class JUMP_IF_NONPOSITIVEInstruction extends BaseInstruction {
  readonly name = 'JUMP_IF_NONPOSITIVE'
  readonly opKind = { type: 'JUMP_IF_NONPOSITIVE' } as const
  readonly mnemonic = 'jnp'
  readonly operands = ['span', 'magnitude'] as const

  execute(context: InstructionContext) {
    const { span, magnitude } = context.instruction
    const sign = this.settle(context, context.state.stacks.peekSign(span))
    if (sign <= 0) {
      context.log('JUMP_IF_NONPOSITIVE: Jump taken', { sign, target: magnitude })
      return jumpTo(magnitude)
    }
    return ADVANCE
  }
}

/**
 * JUMP_ALWAYS
 * Unconditional jump to magnitude
 */
export class JUMP_ALWAYSInstruction extends BaseInstruction {
  readonly name = 'JUMP_ALWAYS'
  readonly opKind = { type: 'JUMP_ALWAYS' } as const
  readonly mnemonic = 'jmp'
  readonly operands = ['magnitude'] as const
  protected readonly minimumSpan = 0

  execute(context: InstructionContext) {
    return jumpTo(context.instruction.magnitude)
  }
}

/**
 * TERMINATE
 * Halts the run successfully
 */
export class TERMINATEInstruction extends BaseInstruction {
  readonly name = 'TERMINATE'
  readonly opKind = { type: 'TERMINATE' } as const
  readonly mnemonic = 'halt'
  readonly operands = [] as const
  protected readonly minimumSpan = 0

  execute(_context: InstructionContext) {
    return HALT
  }
}
