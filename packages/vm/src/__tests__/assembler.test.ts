import { PROGRAM_ERRORS } from '@cursevm/types'
import { describe, expect, it } from 'vitest'
import { disassembleProgram, parseAssembly } from '../assembler'

describe('Assembly', () => {
  it('should parse instructions, skipping comments and blank lines', () => {
    const source = [
      '# add two numbers',
      'PUSH 2 5',
      '',
      'add 2   # sum lands on stack 2',
      'jmp 0',
      'halt',
    ].join('\n')

    const [error, program] = parseAssembly(source)

    expect(error).toBeUndefined()
    expect(program?.instructions).toEqual([
      { opcode: { type: 'PUSH' }, span: 2, magnitude: 5, originIndex: 1 },
      {
        opcode: { type: 'COMBINE', operator: 'add' },
        span: 2,
        magnitude: 0,
        originIndex: 3,
      },
      { opcode: { type: 'JUMP_ALWAYS' }, span: 0, magnitude: 0, originIndex: 4 },
      { opcode: { type: 'TERMINATE' }, span: 0, magnitude: 0, originIndex: 5 },
    ])
  })

  it('should accept CRLF line endings', () => {
    const [, program] = parseAssembly('push 1 1\r\noutn 1\r\n')

    expect(program?.length).toBe(2)
  })

  it('should report every malformed line with its line index', () => {
    const source = [
      'foo 1',
      'push 1',
      'halt 1',
      'push 1 -1',
      'dup 0',
      'outn x',
    ].join('\n')

    const [error] = parseAssembly(source)

    expect(error?.issues.map((issue) => [issue.index, issue.code])).toEqual([
      [0, PROGRAM_ERRORS.UNKNOWN_MNEMONIC],
      [1, PROGRAM_ERRORS.MISSING_OPERAND],
      [2, PROGRAM_ERRORS.UNEXPECTED_OPERAND],
      [3, PROGRAM_ERRORS.INVALID_OPERAND],
      [5, PROGRAM_ERRORS.INVALID_OPERAND],
    ])
  })

  it('should report span checks once the text parses', () => {
    const [error] = parseAssembly('push 1 1\ndup 0')

    expect(error?.issues).toEqual([
      {
        code: PROGRAM_ERRORS.SPAN_REQUIRED,
        index: 1,
        message: 'DUPLICATE_SPREAD needs span >= 1, got 0',
      },
    ])
  })

  it('should disassemble back to canonical text', () => {
    const [, program] = parseAssembly(
      ['PUSH 1 5', 'Div 3', 'jnp 2 0', 'jmp 0', 'inc 4', 'halt'].join('\n'),
    )
    if (!program) throw new Error('program did not assemble')

    expect(disassembleProgram(program)).toEqual([
      'push 1 5',
      'div 3',
      'jnp 2 0',
      'jmp 0',
      'inc 4',
      'halt',
    ])
  })
})
