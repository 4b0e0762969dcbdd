/**
 * Interpreter
 *
 * Fetch, dispatch, apply the pointer update, repeat. A run ends when the
 * pointer reaches the end of the program, a TERMINATE executes, or a jump
 * targets an index outside [0, length]. The last one is the only fatal
 * condition; every other fault is a curse and execution carries on.
 */

import { logger } from '@cursevm/core'
import { createArithmetic, type RationalArithmetic } from '@cursevm/rational'
import type {
  Curse,
  CurseKind,
  Instruction,
  IOAdapter,
  NumericBackend,
  PointerUpdate,
  Program,
  RunResult,
  RunStatus,
} from '@cursevm/types'
import { FATAL_ERRORS } from '@cursevm/types'
import { DEFAULT_VM_CONFIG } from './config'
import { dispatch } from './dispatcher'
import type { InstructionContext } from './instructions/base'
import { InstructionRegistry } from './instructions/registry'
import {
  createMachineState,
  type MachineSnapshot,
  type MachineState,
  snapshotMachineState,
} from './machine-state'

export interface InterpreterOptions {
  io: IOAdapter
  numericBackend?: NumericBackend
  /** record one trace entry per executed instruction */
  trace?: boolean
  registry?: InstructionRegistry
}

export interface TraceEntry {
  step: number
  pointer: number
  originIndex: number
  instruction: string
  update: Readonly<PointerUpdate>
  /** curses raised by this step, in order */
  curses: CurseKind[]
  totalCurses: bigint
}

export interface InterpreterState {
  pointer: number
  status: RunStatus
  steps: number
  snapshot: MachineSnapshot
  result: RunResult | null
}

export class Interpreter {
  protected readonly program: Program
  protected readonly io: IOAdapter
  protected readonly arithmetic: RationalArithmetic
  protected readonly registry: InstructionRegistry
  protected readonly traceEnabled: boolean

  protected state: MachineState = createMachineState()
  protected pointer = 0
  protected status: RunStatus = 'running'
  protected result: RunResult | null = null
  /** Step counter for execution traces (per run) */
  protected executionStep = 0
  protected executionLogs: TraceEntry[] = []

  constructor(program: Program, options: InterpreterOptions) {
    this.program = program
    this.io = options.io
    this.arithmetic = createArithmetic(
      options.numericBackend ?? DEFAULT_VM_CONFIG.numericBackend,
    )
    this.registry = options.registry ?? InstructionRegistry.getInstance()
    this.traceEnabled = options.trace ?? DEFAULT_VM_CONFIG.trace
  }

  /**
   * Execute until halt or abort
   */
  public async run(): Promise<RunResult> {
    logger.debug('Run: start', {
      length: this.program.length,
      backend: this.arithmetic.backend,
    })

    for (;;) {
      const result = await this.step()
      if (result) {
        return result
      }
    }
  }

  /**
   * Execute a single instruction
   * @returns the run result once the run has ended, null while still running
   */
  public async step(): Promise<RunResult | null> {
    if (this.result) {
      return this.result
    }

    const instruction = this.program.instructions[this.pointer]
    if (!instruction) {
      return this.complete()
    }

    const pointerBefore = this.pointer
    const raised: CurseKind[] = []
    const context = this.createContext(instruction, raised)

    const update = await dispatch(this.registry, instruction, context)
    this.executionStep++

    if (this.traceEnabled) {
      this.executionLogs.push({
        step: this.executionStep,
        pointer: pointerBefore,
        originIndex: instruction.originIndex,
        instruction: this.disassemble(instruction),
        update: Object.freeze({ ...update }),
        curses: raised,
        totalCurses: this.state.curses.value,
      })
    }

    return this.apply(update, pointerBefore)
  }

  /**
   * Get current state
   */
  public getState(): InterpreterState {
    return {
      pointer: this.pointer,
      status: this.status,
      steps: this.executionStep,
      snapshot: snapshotMachineState(this.state),
      result: this.result,
    }
  }

  public getTrace(): TraceEntry[] {
    return [...this.executionLogs]
  }

  /**
   * Curse tally per kind for the current run
   */
  public getCurseSummary(): Partial<Record<CurseKind, bigint>> {
    return this.state.curses.summary()
  }

  /**
   * Reset to initial state, keeping the program and options
   */
  public reset(): void {
    this.state = createMachineState()
    this.pointer = 0
    this.status = 'running'
    this.result = null
    this.executionStep = 0
    this.executionLogs = []
  }

  private createContext(
    instruction: Instruction,
    raised: CurseKind[],
  ): InstructionContext {
    const pointer = this.pointer
    return {
      instruction,
      pointer,
      state: this.state,
      arithmetic: this.arithmetic,
      io: this.io,
      raise: (curse: Curse) => {
        this.state.curses.raise(curse)
        raised.push(curse.kind)
      },
      log: (message: string, data?: Record<string, unknown>) => {
        logger.debug(message, { pointer, ...data })
      },
    }
  }

  private apply(
    update: PointerUpdate,
    pointerBefore: number,
  ): RunResult | null {
    switch (update.type) {
      case 'advance':
        this.pointer = pointerBefore + 1
        break
      case 'halt':
        return this.complete()
      case 'jump':
        if (update.target < 0 || update.target > this.program.length) {
          return this.abort(pointerBefore, update.target)
        }
        this.pointer = update.target
        break
    }

    return this.pointer >= this.program.length ? this.complete() : null
  }

  private complete(): RunResult {
    const result: RunResult = {
      status: 'completed',
      curses: this.state.curses.value,
    }
    this.status = 'halted'
    this.result = result
    logger.debug('Run: completed', {
      steps: this.executionStep,
      curses: result.curses.toString(),
    })
    return result
  }

  private abort(at: number, target: number): RunResult {
    const result: RunResult = {
      status: 'aborted',
      reason: FATAL_ERRORS.INVALID_JUMP_TARGET,
      at,
      target,
      curses: this.state.curses.value,
    }
    this.status = 'aborted'
    this.result = result
    logger.error('Run: jump target out of range', {
      at,
      target,
      length: this.program.length,
    })
    return result
  }

  private disassemble(instruction: Instruction): string {
    const handler = this.registry.getHandler(instruction.opcode)
    return handler ? handler.disassemble(instruction) : instruction.opcode.type
  }
}

/**
 * Run a program to completion on a fresh interpreter
 */
export function runProgram(
  program: Program,
  options: InterpreterOptions,
): Promise<RunResult> {
  return new Interpreter(program, options).run()
}
