/**
 * Assembly Text Format
 *
 * One instruction per line, `mnemonic [span] [magnitude]` with the operands
 * each instruction declares. `#` starts a comment and blank lines are skipped.
 * The 0-based source line becomes the instruction's origin index.
 */

import type { Program, ProgramIssue, Safe } from '@cursevm/types'
import { PROGRAM_ERRORS, ProgramError, safeError } from '@cursevm/types'
import type { OperandName } from './instructions/base'
import { InstructionRegistry } from './instructions/registry'
import { createProgram, type InstructionInput } from './program'

const OPERAND = /^\d+$/

function stripComment(line: string): string {
  const hash = line.indexOf('#')
  return (hash === -1 ? line : line.slice(0, hash)).trim()
}

export function parseAssembly(
  source: string,
  registry: InstructionRegistry = InstructionRegistry.getInstance(),
): Safe<Program, ProgramError> {
  const issues: ProgramIssue[] = []
  const inputs: InstructionInput[] = []

  source.split(/\r?\n/).forEach((raw, line) => {
    const text = stripComment(raw)
    if (text.length === 0) {
      return
    }

    const [mnemonic = '', ...operands] = text.split(/\s+/)
    const handler = registry.getByMnemonic(mnemonic)
    if (!handler) {
      issues.push({
        code: PROGRAM_ERRORS.UNKNOWN_MNEMONIC,
        index: line,
        message: `unknown mnemonic '${mnemonic}'`,
      })
      return
    }

    if (operands.length < handler.operands.length) {
      issues.push({
        code: PROGRAM_ERRORS.MISSING_OPERAND,
        index: line,
        message: `${handler.mnemonic} expects ${handler.operands.join(', ')}`,
      })
      return
    }
    if (operands.length > handler.operands.length) {
      issues.push({
        code: PROGRAM_ERRORS.UNEXPECTED_OPERAND,
        index: line,
        message: `${handler.mnemonic} takes ${handler.operands.length} operand(s), got ${operands.length}`,
      })
      return
    }

    const values: Record<OperandName, number> = { span: 0, magnitude: 0 }
    for (const [position, name] of handler.operands.entries()) {
      const token = operands[position] ?? ''
      const value = Number(token)
      if (!OPERAND.test(token) || !Number.isSafeInteger(value)) {
        issues.push({
          code: PROGRAM_ERRORS.INVALID_OPERAND,
          index: line,
          message: `${name} must be a non-negative integer, got '${token}'`,
        })
        return
      }
      values[name] = value
    }

    inputs.push({
      opcode: handler.opKind,
      span: values.span,
      magnitude: values.magnitude,
      originIndex: line,
    })
  })

  if (issues.length > 0) {
    return safeError(new ProgramError(issues))
  }
  return createProgram(inputs, registry)
}

/**
 * Render a program back to assembly text, one instruction per line
 */
export function disassembleProgram(
  program: Program,
  registry: InstructionRegistry = InstructionRegistry.getInstance(),
): string[] {
  return program.instructions.map((instruction) => {
    const handler = registry.getHandler(instruction.opcode)
    if (!handler) {
      throw new Error(`Instruction handler not found: ${instruction.opcode.type}`)
    }
    return handler.disassemble(instruction)
  })
}
