/**
 * Base Instruction System
 *
 * Defines the handler interface, the execution context and the abstract base
 * class every instruction handler extends.
 */

import { Rational, type RationalArithmetic } from '@cursevm/rational'
import type {
  Curse,
  Faultable,
  Instruction,
  IOAdapter,
  OpKind,
  PointerUpdate,
  ProgramIssue,
} from '@cursevm/types'
import { PROGRAM_ERRORS } from '@cursevm/types'
import type { MachineState } from '../machine-state'

/**
 * Instruction execution context
 * Handlers mutate the machine state through its primitives only
 */
export interface InstructionContext {
  readonly instruction: Instruction
  /** index of the instruction being executed */
  readonly pointer: number
  readonly state: MachineState
  readonly arithmetic: RationalArithmetic
  readonly io: IOAdapter
  /** Count a recoverable fault */
  raise(curse: Curse): void
  log(message: string, data?: Record<string, unknown>): void
}

export type InstructionResult = PointerUpdate | Promise<PointerUpdate>

export type OperandName = 'span' | 'magnitude'

/**
 * Base interface for all instruction handlers
 */
export interface InstructionHandler {
  /** registry key, e.g. PUSH or COMBINE(add) */
  readonly name: string
  readonly opKind: OpKind
  /** assembly mnemonic */
  readonly mnemonic: string
  /** operands written in assembly, in order */
  readonly operands: readonly OperandName[]

  /**
   * Execute the instruction against the context
   * @returns how the instruction pointer moves next
   */
  execute(context: InstructionContext): InstructionResult

  /**
   * Validate instruction fields this handler depends on
   */
  validate(instruction: Instruction, index: number): ProgramIssue | null

  /**
   * Disassemble instruction to assembly text
   */
  disassemble(instruction: Instruction): string
}

/**
 * Abstract base class for instructions
 */
export abstract class BaseInstruction implements InstructionHandler {
  abstract readonly name: string
  abstract readonly opKind: OpKind
  abstract readonly mnemonic: string
  readonly operands: readonly OperandName[] = ['span']

  /** smallest span the instruction accepts */
  protected readonly minimumSpan: number = 1

  abstract execute(context: InstructionContext): InstructionResult

  validate(instruction: Instruction, index: number): ProgramIssue | null {
    if (instruction.span < this.minimumSpan) {
      return {
        code: PROGRAM_ERRORS.SPAN_REQUIRED,
        index,
        message: `${this.name} needs span >= ${this.minimumSpan}, got ${instruction.span}`,
      }
    }
    return null
  }

  disassemble(instruction: Instruction): string {
    const operands = this.operands.map((operand) =>
      operand === 'span' ? instruction.span : instruction.magnitude,
    )
    return [this.mnemonic, ...operands].join(' ')
  }

  /**
   * Unwrap a faultable result, counting its curse when present
   */
  protected settle<T>(context: InstructionContext, result: Faultable<T>): T {
    const [value, curse] = result
    if (curse) {
      context.raise(curse)
    }
    return value
  }

  protected pop(context: InstructionContext, index: number): Rational {
    return this.settle(context, context.state.stacks.pop(index))
  }

  protected peek(context: InstructionContext, index: number): Rational {
    return this.settle(context, context.state.stacks.peek(index))
  }

  protected push(
    context: InstructionContext,
    index: number,
    value: Rational,
  ): void {
    context.state.stacks.push(index, value)
  }

  protected literal(instruction: Instruction): Rational {
    return Rational.fromInteger(instruction.magnitude)
  }
}
