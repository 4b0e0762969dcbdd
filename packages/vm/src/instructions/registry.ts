/**
 * Instruction Registry
 *
 * Central registry of every instruction handler, keyed by op kind name and by
 * assembly mnemonic. Acts as the dispatch table for the interpreter.
 */

import type { OpKind } from '@cursevm/types'
import { COMBINE_OPERATORS, COMBINEInstruction } from './arithmetic'
import type { InstructionHandler } from './base'
import {
  JUMP_ALWAYSInstruction,
  JUMP_IF_NONPOSITIVEInstruction,
  TERMINATEInstruction,
} from './control-flow'
import {
  INPUT_CHARInstruction,
  INPUT_NUMBERInstruction,
  OUTPUT_CHARInstruction,
  OUTPUT_NUMBERInstruction,
} from './io'
import {
  TRANSFER_FROM_QUEUEInstruction,
  TRANSFER_TO_QUEUEInstruction,
} from './queue'
import { DUPLICATE_SPREADInstruction, PUSHInstruction } from './stack'

/**
 * Registry key of an op kind: the type tag, with the operator for COMBINE
 */
export function opKindName(opKind: OpKind): string {
  return opKind.type === 'COMBINE'
    ? `COMBINE(${opKind.operator})`
    : opKind.type
}

export class InstructionRegistry {
  private static instance: InstructionRegistry | null = null

  private readonly handlers = new Map<string, InstructionHandler>()
  private readonly mnemonics = new Map<string, InstructionHandler>()

  static getInstance(): InstructionRegistry {
    if (!InstructionRegistry.instance) {
      InstructionRegistry.instance = new InstructionRegistry()
    }
    return InstructionRegistry.instance
  }

  constructor() {
    this.registerAllInstructions()
  }

  private registerAllInstructions(): void {
    // Stack instructions
    this.register(new PUSHInstruction())
    this.register(new DUPLICATE_SPREADInstruction())

    // Arithmetic instructions
    for (const operator of COMBINE_OPERATORS) {
      this.register(new COMBINEInstruction(operator))
    }

    // Queue instructions
    this.register(new TRANSFER_TO_QUEUEInstruction())
    this.register(new TRANSFER_FROM_QUEUEInstruction())

    // Control flow instructions
    this.register(new JUMP_IF_NONPOSITIVEInstruction())
    this.register(new JUMP_ALWAYSInstruction())
    this.register(new TERMINATEInstruction())

    // I/O instructions
    this.register(new OUTPUT_NUMBERInstruction())
    this.register(new OUTPUT_CHARInstruction())
    this.register(new INPUT_NUMBERInstruction())
    this.register(new INPUT_CHARInstruction())
  }

  /**
   * Register an instruction handler
   */
  register(handler: InstructionHandler): void {
    this.handlers.set(handler.name, handler)
    this.mnemonics.set(handler.mnemonic, handler)
  }

  /**
   * Get instruction handler by op kind
   */
  getHandler(opKind: OpKind): InstructionHandler | undefined {
    return this.handlers.get(opKindName(opKind))
  }

  /**
   * Get instruction handler by assembly mnemonic (case-insensitive)
   */
  getByMnemonic(mnemonic: string): InstructionHandler | undefined {
    return this.mnemonics.get(mnemonic.toLowerCase())
  }

  /**
   * Get all registered handlers
   */
  getAllHandlers(): InstructionHandler[] {
    return Array.from(this.handlers.values())
  }
}
