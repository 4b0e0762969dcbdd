/**
 * Arithmetic Instructions
 *
 * COMBINE(add | sub | mul | div)
 */

import type { CombineOperator } from '@cursevm/types'
import { ADVANCE } from '@cursevm/types'
import { BaseInstruction, type InstructionContext } from './base'

/**
 * COMBINE instruction, one handler per operator
 *
 * Chains left to right across stacks 1..=span. Step i takes its left operand
 * from the top of stack i and its right operand from the top of stack i + 1;
 * the partial result lands on stack i + 1 and is the left operand of step
 * i + 1. Operands of stacks 1..span-1 are consumed, the operand of the last
 * stack stays in place under the accumulated result:
 *
 *   add, span 3:  [2] [3] [5]  ->  [] [] [5, 10]
 *
 * Each empty pop/peek, division by zero or bounded overflow curses once and
 * substitutes 0/1 for that step only.
 */
export class COMBINEInstruction extends BaseInstruction {
  readonly name: string
  readonly opKind: { type: 'COMBINE'; operator: CombineOperator }
  readonly mnemonic: CombineOperator
  protected readonly minimumSpan = 0

  constructor(readonly operator: CombineOperator) {
    super()
    this.name = `COMBINE(${operator})`
    this.opKind = { type: 'COMBINE', operator }
    this.mnemonic = operator
  }

  execute(context: InstructionContext) {
    const { span } = context.instruction
    if (span < 2) {
      context.log(`${this.name}: nothing to combine`, { span })
      return ADVANCE
    }

    let accumulator = this.pop(context, 1)
    for (let index = 2; index <= span; index++) {
      const right =
        index === span ? this.peek(context, index) : this.pop(context, index)
      accumulator = this.settle(
        context,
        context.arithmetic.combine(this.operator, accumulator, right),
      )
    }
    this.push(context, span, accumulator)

    return ADVANCE
  }
}

export const COMBINE_OPERATORS: readonly CombineOperator[] = [
  'add',
  'sub',
  'mul',
  'div',
]
