/**
 * Queue Transfer Instructions
 *
 * TRANSFER_TO_QUEUE, TRANSFER_FROM_QUEUE
 */

import { ADVANCE } from '@cursevm/types'
import { BaseInstruction, type InstructionContext } from './base'

/**
 * TRANSFER_TO_QUEUE
 * Pops stack span and enqueues the value (0/1 with a curse when empty)
 */
export class TRANSFER_TO_QUEUEInstruction extends BaseInstruction {
  readonly name = 'TRANSFER_TO_QUEUE'
  readonly opKind = { type: 'TRANSFER_TO_QUEUE' } as const
  readonly mnemonic = 'enqueue'

  execute(context: InstructionContext) {
    const value = this.pop(context, context.instruction.span)
    context.state.queue.enqueue(value)
    return ADVANCE
  }
}

/**
 * TRANSFER_FROM_QUEUE
 * Dequeues and pushes onto stack span (0/1 with a curse when empty)
 */
export class TRANSFER_FROM_QUEUEInstruction extends BaseInstruction {
  readonly name = 'TRANSFER_FROM_QUEUE'
  readonly opKind = { type: 'TRANSFER_FROM_QUEUE' } as const
  readonly mnemonic = 'dequeue'

  execute(context: InstructionContext) {
    const value = this.settle(context, context.state.queue.dequeue())
    this.push(context, context.instruction.span, value)
    return ADVANCE
  }
}
