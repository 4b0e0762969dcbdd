/**
 * Error Constants
 *
 * Centralized definitions of the error codes used when a program is rejected
 * before it runs, and of the fatal run conditions.
 */

/**
 * Program validation / loading error codes
 */
export const PROGRAM_ERRORS = {
  INVALID_SPAN: 'invalid_span',
  INVALID_MAGNITUDE: 'invalid_magnitude',
  SPAN_REQUIRED: 'span_required',
  INVALID_ORIGIN_INDEX: 'invalid_origin_index',
  UNKNOWN_MNEMONIC: 'unknown_mnemonic',
  MISSING_OPERAND: 'missing_operand',
  UNEXPECTED_OPERAND: 'unexpected_operand',
  INVALID_OPERAND: 'invalid_operand',
  INVALID_LISTING: 'invalid_listing',
} as const

export type ProgramErrorCode =
  (typeof PROGRAM_ERRORS)[keyof typeof PROGRAM_ERRORS]

/**
 * Fatal run conditions
 */
export const FATAL_ERRORS = {
  INVALID_JUMP_TARGET: 'invalid-jump-target',
} as const

export interface ProgramIssue {
  code: ProgramErrorCode
  /** instruction position, or source line for text listings */
  index: number
  message: string
}

/**
 * Raised (as a Safe error) when a program cannot be constructed
 */
export class ProgramError extends Error {
  readonly issues: ProgramIssue[]

  constructor(issues: ProgramIssue[]) {
    super(
      issues
        .map((issue) => `#${issue.index}: ${issue.message} (${issue.code})`)
        .join('\n'),
    )
    this.name = 'ProgramError'
    this.issues = issues
  }
}
