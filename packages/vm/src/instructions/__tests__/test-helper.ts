/**
 * Helpers for executing a single instruction against a fresh machine state
 */

import { createArithmetic, Rational } from '@cursevm/rational'
import type {
  Instruction,
  NumericBackend,
  OpKind,
  PointerUpdate,
} from '@cursevm/types'
import { dispatch } from '../../dispatcher'
import { BufferIOAdapter } from '../../io/buffer-io'
import { createMachineState, type MachineState } from '../../machine-state'
import type { InstructionContext } from '../base'
import { InstructionRegistry } from '../registry'

export interface TestContextOptions {
  magnitude?: number
  input?: string
  backend?: NumericBackend
}

export interface TestContext {
  context: InstructionContext
  state: MachineState
  io: BufferIOAdapter
}

export function createTestContext(
  opcode: OpKind,
  span: number,
  options: TestContextOptions = {},
): TestContext {
  const state = createMachineState()
  const io = new BufferIOAdapter(options.input ?? '')
  const instruction: Instruction = {
    opcode,
    span,
    magnitude: options.magnitude ?? 0,
    originIndex: 0,
  }
  const context: InstructionContext = {
    instruction,
    pointer: 0,
    state,
    arithmetic: createArithmetic(options.backend ?? 'arbitrary'),
    io,
    raise: (curse) => state.curses.raise(curse),
    log: () => {},
  }
  return { context, state, io }
}

export function execute(context: InstructionContext): Promise<PointerUpdate> {
  return dispatch(InstructionRegistry.getInstance(), context.instruction, context)
}

/**
 * Push values bottom to top onto a stack
 */
export function fill(
  state: MachineState,
  index: number,
  ...values: Rational[]
): void {
  for (const value of values) {
    state.stacks.push(index, value)
  }
}

export const int = (value: bigint | number): Rational =>
  Rational.fromInteger(value)
