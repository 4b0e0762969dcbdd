/**
 * CLI Command Tests
 * Runs fixture programs against in-memory streams
 */

import { PassThrough, Readable, Writable } from 'node:stream'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { createCli } from '../cli'
import { executeDisasmCommand } from '../commands/disasm'
import {
  createRunCommand,
  EXIT_CODES,
  executeRunCommand,
  type RunOptions,
} from '../commands/run'

const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url))

function sink() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { stream, text: () => chunks.join('') }
}

async function run(file: string, options: RunOptions = {}, input = '') {
  const stdout = sink()
  const stderr = sink()
  const code = await executeRunCommand(fixture(file), options, {
    stdin: Readable.from(input.length > 0 ? [input] : []),
    stdout: stdout.stream,
    stderr: stderr.stream,
  })
  return { code, stdout: stdout.text(), stderr: stderr.text() }
}

describe('CLI', () => {
  it('should register the run and disasm commands', () => {
    expect(createCli().commands.map((command) => command.name())).toEqual([
      'run',
      'disasm',
    ])
  })

  it('should expose the run options', () => {
    expect(createRunCommand().options.map((option) => option.long)).toEqual([
      '--backend',
      '--max-steps',
      '--trace',
      '--report',
    ])
  })

  describe('run', () => {
    it('should run assembly text to completion', async () => {
      const { code, stdout } = await run('countdown.asm')

      expect(code).toBe(EXIT_CODES.COMPLETED)
      expect(stdout).toBe('321')
    })

    it('should read program input from stdin', async () => {
      const { code, stdout } = await run('sum.json', {}, '1/2 0.25\n')

      expect(code).toBe(EXIT_CODES.COMPLETED)
      expect(stdout).toBe('3/4')
    })

    it('should let go of stdin when input is still open', async () => {
      const stdin = new PassThrough()
      stdin.write('a')
      const stdout = sink()

      const code = await executeRunCommand(fixture('echo-char.asm'), {}, {
        stdin,
        stdout: stdout.stream,
        stderr: sink().stream,
      })

      expect(code).toBe(EXIT_CODES.COMPLETED)
      expect(stdout.text()).toBe('a')
      expect(stdin.destroyed).toBe(true)
    })

    it('should exit with the abort code on a bad jump', async () => {
      const { code } = await run('bad-jump.asm')

      expect(code).toBe(EXIT_CODES.ABORTED)
    })

    it('should exit with the load error code', async () => {
      expect((await run('missing.asm')).code).toBe(EXIT_CODES.LOAD_ERROR)
      expect((await run('invalid.json')).code).toBe(EXIT_CODES.LOAD_ERROR)
    })

    it('should stop when the step budget runs out', async () => {
      const { code, stdout, stderr } = await run('countdown.asm', {
        maxSteps: 5,
        report: true,
      })

      expect(code).toBe(EXIT_CODES.BUDGET_EXHAUSTED)
      expect(stdout).toBe('3')
      expect(JSON.parse(stderr)).toEqual({
        status: 'budget-exhausted',
        curses: '0',
        tally: {},
      })
    })

    it('should report the curse tally', async () => {
      const { stderr } = await run('sum.json', { report: true }, '1/0')

      // 1/0 does not parse, then input ends
      expect(JSON.parse(stderr)).toEqual({
        status: 'completed',
        curses: '2',
        tally: { 'input-parse': '1', 'end-of-input': '1' },
      })
    })

    it('should write the trace as JSON lines', async () => {
      const { stderr } = await run('sum.json', { trace: true }, '1 2')

      const lines = stderr.trimEnd().split('\n')
      expect(lines).toHaveLength(4)
      expect(JSON.parse(lines[2] ?? '')).toEqual({
        step: 3,
        pointer: 2,
        originIndex: 2,
        instruction: 'add 2',
        update: { type: 'advance' },
        curses: [],
        totalCurses: '0',
      })
    })
  })

  describe('disasm', () => {
    it('should print one instruction per line', async () => {
      const stdout = sink()

      const code = await executeDisasmCommand(fixture('sum.json'), stdout.stream)

      expect(code).toBe(EXIT_CODES.COMPLETED)
      expect(stdout.text()).toBe('inn 1\ninn 2\nadd 2\noutn 2\n')
    })
  })
})
