import type { Writable } from 'node:stream'
import { logger } from '@cursevm/core'
import { disassembleProgram } from '@cursevm/vm'
import { Command } from 'commander'
import { loadProgram } from '../program-loader'
import { EXIT_CODES } from './run'

export function createDisasmCommand(): Command {
  return new Command('disasm')
    .description('Print a program as assembly text, one instruction per line')
    .argument('<file>', 'program file')
    .action(async (file: string) => {
      process.exitCode = await executeDisasmCommand(file)
    })
}

export async function executeDisasmCommand(
  file: string,
  stdout: Writable = process.stdout,
): Promise<number> {
  const [loadError, program] = await loadProgram(file)
  if (loadError) {
    logger.error('Failed to load program', { file, error: loadError.message })
    return EXIT_CODES.LOAD_ERROR
  }

  for (const line of disassembleProgram(program)) {
    stdout.write(`${line}\n`)
  }
  return EXIT_CODES.COMPLETED
}
