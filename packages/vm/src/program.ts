/**
 * Program Construction
 *
 * Validates decoded instructions and freezes them into an immutable program.
 * Every check happens here, so a constructed program never carries an
 * instruction the dispatcher cannot execute.
 */

import type {
  Instruction,
  OpKind,
  Program,
  ProgramIssue,
  Safe,
} from '@cursevm/types'
import {
  PROGRAM_ERRORS,
  ProgramError,
  safeError,
  safeResult,
} from '@cursevm/types'
import { InstructionRegistry, opKindName } from './instructions/registry'

export interface InstructionInput {
  opcode: OpKind
  span: number
  magnitude?: number
  originIndex?: number
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

export function createProgram(
  inputs: readonly InstructionInput[],
  registry: InstructionRegistry = InstructionRegistry.getInstance(),
): Safe<Program, ProgramError> {
  const issues: ProgramIssue[] = []
  const instructions: Instruction[] = []

  inputs.forEach((input, position) => {
    const instruction: Instruction = Object.freeze({
      opcode: Object.freeze({ ...input.opcode }),
      span: input.span,
      magnitude: input.magnitude ?? 0,
      originIndex: input.originIndex ?? position,
    })
    const index = Number.isSafeInteger(instruction.originIndex)
      ? instruction.originIndex
      : position
    const reported = issues.length

    if (!isNonNegativeInteger(instruction.span)) {
      issues.push({
        code: PROGRAM_ERRORS.INVALID_SPAN,
        index,
        message: `span must be a non-negative integer, got ${instruction.span}`,
      })
    }
    if (!isNonNegativeInteger(instruction.magnitude)) {
      issues.push({
        code: PROGRAM_ERRORS.INVALID_MAGNITUDE,
        index,
        message: `magnitude must be a non-negative integer, got ${instruction.magnitude}`,
      })
    }
    if (!Number.isSafeInteger(instruction.originIndex)) {
      issues.push({
        code: PROGRAM_ERRORS.INVALID_ORIGIN_INDEX,
        index,
        message: `origin index must be an integer, got ${instruction.originIndex}`,
      })
    }

    const handler = registry.getHandler(instruction.opcode)
    if (!handler) {
      issues.push({
        code: PROGRAM_ERRORS.UNKNOWN_MNEMONIC,
        index,
        message: `no handler for ${opKindName(instruction.opcode)}`,
      })
    } else if (issues.length === reported) {
      const issue = handler.validate(instruction, index)
      if (issue) issues.push(issue)
    }

    instructions.push(instruction)
  })

  if (issues.length > 0) {
    return safeError(new ProgramError(issues))
  }

  return safeResult(
    Object.freeze({
      instructions: Object.freeze(instructions),
      length: instructions.length,
    }),
  )
}
