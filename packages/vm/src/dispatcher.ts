import type { Instruction, PointerUpdate } from '@cursevm/types'
import type { InstructionContext } from './instructions/base'
import { type InstructionRegistry, opKindName } from './instructions/registry'

/**
 * Execute one instruction against the machine state
 *
 * @returns the pointer update: advance, jump or halt
 * @throws Error when no handler is registered for the op kind
 */
export async function dispatch(
  registry: InstructionRegistry,
  instruction: Instruction,
  context: InstructionContext,
): Promise<PointerUpdate> {
  const handler = registry.getHandler(instruction.opcode)
  if (!handler) {
    throw new Error(
      `Instruction handler not found: ${opKindName(instruction.opcode)}`,
    )
  }
  return handler.execute(context)
}
