/**
 * Program Loader
 *
 * Reads a program file from disk. `.json` files are JSON listings validated
 * with zod, anything else is assembly text.
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import type {
  OpKind,
  OpType,
  Program,
  ProgramIssue,
  Safe,
  SafePromise,
} from '@cursevm/types'
import {
  PROGRAM_ERRORS,
  ProgramError,
  safeError,
  safeResult,
  safeTry,
} from '@cursevm/types'
import {
  createProgram,
  type InstructionInput,
  InstructionRegistry,
  parseAssembly,
} from '@cursevm/vm'
import { z } from 'zod'

const PLAIN_OPS = [
  'PUSH',
  'TRANSFER_TO_QUEUE',
  'TRANSFER_FROM_QUEUE',
  'DUPLICATE_SPREAD',
  'JUMP_IF_NONPOSITIVE',
  'JUMP_ALWAYS',
  'OUTPUT_NUMBER',
  'OUTPUT_CHAR',
  'INPUT_NUMBER',
  'INPUT_CHAR',
  'TERMINATE',
] as const satisfies readonly Exclude<OpType, 'COMBINE'>[]

const operandSchema = z.number().int().nonnegative()

const instructionFields = {
  span: operandSchema,
  magnitude: operandSchema.default(0),
  originIndex: z.number().int().optional(),
}

export const listingInstructionSchema = z.union([
  z.object({
    op: z.literal('COMBINE'),
    operator: z.enum(['add', 'sub', 'mul', 'div']),
    ...instructionFields,
  }),
  z.object({
    op: z.enum(PLAIN_OPS),
    ...instructionFields,
  }),
])

export const listingSchema = z.object({
  instructions: z.array(listingInstructionSchema),
})

export type ListingInstruction = z.infer<typeof listingInstructionSchema>
export type Listing = z.infer<typeof listingSchema>

function toOpKind(instruction: ListingInstruction): OpKind {
  return instruction.op === 'COMBINE'
    ? { type: 'COMBINE', operator: instruction.operator }
    : { type: instruction.op }
}

function listingIssue(path: (string | number)[], message: string): ProgramIssue {
  const [, index] = path
  return {
    code: PROGRAM_ERRORS.INVALID_LISTING,
    index: typeof index === 'number' ? index : 0,
    message: path.length > 0 ? `${path.join('.')}: ${message}` : message,
  }
}

function parseJson(text: string): Safe<unknown> {
  try {
    const value: unknown = JSON.parse(text)
    return safeResult(value)
  } catch (error) {
    return safeError(error instanceof Error ? error : new Error(String(error)))
  }
}

/**
 * Parse a JSON listing into a validated program
 */
export function parseListing(
  text: string,
  registry: InstructionRegistry = InstructionRegistry.getInstance(),
): Safe<Program, ProgramError> {
  const [jsonError, json] = parseJson(text)
  if (jsonError) {
    return safeError(new ProgramError([listingIssue([], jsonError.message)]))
  }

  const parsed = listingSchema.safeParse(json)
  if (!parsed.success) {
    return safeError(
      new ProgramError(
        parsed.error.issues.map((issue) =>
          listingIssue(issue.path, issue.message),
        ),
      ),
    )
  }

  const inputs: InstructionInput[] = parsed.data.instructions.map(
    (instruction) => ({
      opcode: toOpKind(instruction),
      span: instruction.span,
      magnitude: instruction.magnitude,
      originIndex: instruction.originIndex,
    }),
  )
  return createProgram(inputs, registry)
}

/**
 * Load a program file, choosing the format by extension
 */
export async function loadProgram(path: string): SafePromise<Program> {
  const [readError, text] = await safeTry(() => readFile(path, 'utf8'))
  if (readError) {
    return safeError(readError)
  }

  return extname(path).toLowerCase() === '.json'
    ? parseListing(text)
    : parseAssembly(text)
}
