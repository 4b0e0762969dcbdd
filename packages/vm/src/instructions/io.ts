/**
 * I/O Instructions
 *
 * OUTPUT_NUMBER, OUTPUT_CHAR, INPUT_NUMBER, INPUT_CHAR
 *
 * Every curse here substitutes a policy value: output of "0" for an empty
 * OUTPUT_NUMBER, no output for a rejected OUTPUT_CHAR, and 0/1 pushed for a
 * failed read.
 */

import { Rational } from '@cursevm/rational'
import { ADVANCE } from '@cursevm/types'
import { isScalarValue } from '../config'
import { BaseInstruction, type InstructionContext } from './base'

/**
 * OUTPUT_NUMBER
 * Pops stack span and writes its decimal text
 */
export class OUTPUT_NUMBERInstruction extends BaseInstruction {
  readonly name = 'OUTPUT_NUMBER'
  readonly opKind = { type: 'OUTPUT_NUMBER' } as const
  readonly mnemonic = 'outn'

  execute(context: InstructionContext) {
    const value = this.pop(context, context.instruction.span)
    context.io.writeText(value.toString())
    return ADVANCE
  }
}

/**
 * OUTPUT_CHAR
 * Pops stack span and writes it as one code point when it is a Unicode scalar value
 */
export class OUTPUT_CHARInstruction extends BaseInstruction {
  readonly name = 'OUTPUT_CHAR'
  readonly opKind = { type: 'OUTPUT_CHAR' } as const
  readonly mnemonic = 'outc'

  execute(context: InstructionContext) {
    const [value, curse] = context.state.stacks.pop(context.instruction.span)
    if (curse) {
      context.raise(curse)
      return ADVANCE
    }

    const codepoint = value.toInteger()
    if (codepoint === null || !isScalarValue(codepoint)) {
      context.raise({
        kind: 'invalid-codepoint',
        details: { value: value.toString() },
      })
      return ADVANCE
    }

    context.io.writeCodepoint(Number(codepoint))
    return ADVANCE
  }
}

/**
 * INPUT_NUMBER
 * Reads one number token and pushes it onto stack span.
 * End of input and unparsable tokens both curse exactly once.
 */
export class INPUT_NUMBERInstruction extends BaseInstruction {
  readonly name = 'INPUT_NUMBER'
  readonly opKind = { type: 'INPUT_NUMBER' } as const
  readonly mnemonic = 'inn'

  async execute(context: InstructionContext) {
    const token = await context.io.readNumber()
    if (token === null) {
      context.raise({ kind: 'end-of-input' })
      this.push(context, context.instruction.span, Rational.ZERO)
      return ADVANCE
    }

    const value = this.settle(context, context.arithmetic.parse(token))
    this.push(context, context.instruction.span, value)
    return ADVANCE
  }
}

/**
 * INPUT_CHAR
 * Reads one code point and pushes its integer value onto stack span
 */
export class INPUT_CHARInstruction extends BaseInstruction {
  readonly name = 'INPUT_CHAR'
  readonly opKind = { type: 'INPUT_CHAR' } as const
  readonly mnemonic = 'inc'

  async execute(context: InstructionContext) {
    const codepoint = await context.io.readCodepoint()
    if (codepoint === null) {
      context.raise({ kind: 'end-of-input' })
      this.push(context, context.instruction.span, Rational.ZERO)
      return ADVANCE
    }

    this.push(context, context.instruction.span, Rational.fromInteger(codepoint))
    return ADVANCE
  }
}
