/**
 * Virtual Machine Types
 *
 * Shared types for the instruction stream, the dispatcher contract, the
 * I/O boundary and the result of a run.
 */

/** Arithmetic operator carried by a COMBINE instruction */
export type CombineOperator = 'add' | 'sub' | 'mul' | 'div'

/**
 * Closed set of operation kinds.
 * COMBINE is the only parameterised kind; every other variant is a bare tag.
 */
export type OpKind =
  | { type: 'PUSH' }
  | { type: 'COMBINE'; operator: CombineOperator }
  | { type: 'TRANSFER_TO_QUEUE' }
  | { type: 'TRANSFER_FROM_QUEUE' }
  | { type: 'DUPLICATE_SPREAD' }
  | { type: 'JUMP_IF_NONPOSITIVE' }
  | { type: 'JUMP_ALWAYS' }
  | { type: 'OUTPUT_NUMBER' }
  | { type: 'OUTPUT_CHAR' }
  | { type: 'INPUT_NUMBER' }
  | { type: 'INPUT_CHAR' }
  | { type: 'TERMINATE' }

export type OpType = OpKind['type']

/**
 * Decoded instruction. Produced once by a loader and never mutated.
 */
export interface Instruction {
  readonly opcode: OpKind
  /** number of consecutive stacks addressed, starting at stack 1 */
  readonly span: number
  /** literal value or absolute jump target */
  readonly magnitude: number
  /** position in the source the instruction was decoded from (diagnostics only) */
  readonly originIndex: number
}

/** Ordered, 0-indexed instruction sequence */
export interface Program {
  readonly instructions: readonly Instruction[]
  readonly length: number
}

/**
 * Pointer update returned by dispatching one instruction
 */
export type PointerUpdate =
  | { type: 'advance' }
  | { type: 'jump'; target: number }
  | { type: 'halt' }

export const ADVANCE: Readonly<PointerUpdate> = Object.freeze({
  type: 'advance',
})
export const HALT: Readonly<PointerUpdate> = Object.freeze({ type: 'halt' })

/** Recoverable fault kinds */
export type CurseKind =
  | 'empty-stack'
  | 'empty-queue'
  | 'division-by-zero'
  | 'overflow'
  | 'invalid-codepoint'
  | 'input-parse'
  | 'end-of-input'

export interface Curse {
  kind: CurseKind
  details?: Record<string, unknown>
}

/**
 * Result of a primitive that can fault: the value (the policy value when
 * faulted) and the curse raised, if any.
 */
export type Faultable<T> = readonly [value: T, curse: Curse | null]

export type Sign = -1 | 0 | 1

/** Arithmetic backend selection */
export type NumericBackend = 'bounded' | 'arbitrary'

/**
 * Byte/character I/O boundary consumed by the engine.
 * Reads resolve to null at end of input.
 */
export interface IOAdapter {
  /** Next whitespace-delimited number token */
  readNumber(): Promise<string | null>
  /** Next Unicode code point */
  readCodepoint(): Promise<number | null>
  writeText(text: string): void
  writeCodepoint(codepoint: number): void
}

export type AbortReason = 'invalid-jump-target'

export type RunResult =
  | { status: 'completed'; curses: bigint }
  | {
      status: 'aborted'
      reason: AbortReason
      /** index of the instruction that issued the jump */
      at: number
      target: number
      curses: bigint
    }

export type RunStatus = 'running' | 'halted' | 'aborted'
