import { Command } from 'commander'
import { createDisasmCommand } from './commands/disasm'
import { createRunCommand } from './commands/run'

export { EXIT_CODES, executeRunCommand } from './commands/run'
export { executeDisasmCommand } from './commands/disasm'
export { loadProgram, parseListing } from './program-loader'

export function createCli(): Command {
  return new Command('cursevm')
    .description('Interpreter for curse-counting stack programs')
    .version('0.1.0')
    .addCommand(createRunCommand())
    .addCommand(createDisasmCommand())
}
