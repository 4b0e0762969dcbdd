import type { Readable, Writable } from 'node:stream'
import { logger } from '@cursevm/core'
import type { RunResult } from '@cursevm/types'
import {
  Interpreter,
  loadVmConfig,
  NUMERIC_BACKENDS,
  StreamIOAdapter,
} from '@cursevm/vm'
import { Command, Option } from 'commander'
import { z } from 'zod'
import { loadProgram } from '../program-loader'

export const EXIT_CODES = {
  COMPLETED: 0,
  LOAD_ERROR: 1,
  ABORTED: 2,
  BUDGET_EXHAUSTED: 3,
} as const

export const runOptionsSchema = z.object({
  backend: z.enum(NUMERIC_BACKENDS).optional(),
  maxSteps: z.coerce.number().int().nonnegative().optional(),
  trace: z.boolean().optional(),
  report: z.boolean().optional(),
})

export type RunOptions = z.infer<typeof runOptionsSchema>

export interface RunStreams {
  stdin: Readable
  stdout: Writable
  stderr: Writable
}

export function createRunCommand(): Command {
  const command: Command = new Command('run')
    .description('Run a program (assembly text, or a .json listing)')
    .argument('<file>', 'program file')
    .addOption(
      new Option('--backend <backend>', 'numeric backend').choices(
        NUMERIC_BACKENDS,
      ),
    )
    .option('--max-steps <n>', 'stop after executing n instructions')
    .option('--trace', 'write one JSON line per executed instruction to stderr')
    .option('--report', 'write the curse tally to stderr when the run ends')
    .action(async (file: string, rawOptions: unknown) => {
      const parsed = runOptionsSchema.safeParse(rawOptions)
      if (!parsed.success) {
        return command.error(
          `Invalid options: ${parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join(', ')}`,
        )
      }
      process.exitCode = await executeRunCommand(file, parsed.data)
    })

  return command
}

function toJsonLine(value: unknown): string {
  return `${JSON.stringify(value, (_key, item: unknown) =>
    typeof item === 'bigint' ? item.toString() : item,
  )}\n`
}

/**
 * Load and run a program against the given streams
 * @returns the process exit code
 */
export async function executeRunCommand(
  file: string,
  options: RunOptions,
  streams: RunStreams = process,
): Promise<number> {
  const [loadError, program] = await loadProgram(file)
  if (loadError) {
    logger.error('Failed to load program', { file, error: loadError.message })
    return EXIT_CODES.LOAD_ERROR
  }

  const config = loadVmConfig()
  const io = new StreamIOAdapter(streams.stdin, streams.stdout)
  const interpreter = new Interpreter(program, {
    io,
    numericBackend: options.backend ?? config.numericBackend,
    trace: options.trace ?? config.trace,
  })

  logger.debug('Running program', {
    file,
    length: program.length,
    backend: options.backend ?? config.numericBackend,
    maxSteps: options.maxSteps,
  })

  let result: RunResult | null = null
  try {
    if (options.maxSteps === undefined) {
      result = await interpreter.run()
    } else {
      for (let steps = 0; result === null && steps < options.maxSteps; steps++) {
        result = await interpreter.step()
      }
    }
  } finally {
    await io.flush()
    // an open async iterator keeps stdin referenced
    await io.close()
  }

  if (options.trace ?? config.trace) {
    for (const entry of interpreter.getTrace()) {
      streams.stderr.write(toJsonLine(entry))
    }
  }

  if (options.report) {
    streams.stderr.write(
      toJsonLine({
        status: result?.status ?? 'budget-exhausted',
        curses: interpreter.getState().snapshot.curses,
        tally: interpreter.getCurseSummary(),
      }),
    )
  }

  if (result === null) {
    logger.warn('Step budget exhausted', { maxSteps: options.maxSteps })
    return EXIT_CODES.BUDGET_EXHAUSTED
  }
  return result.status === 'completed'
    ? EXIT_CODES.COMPLETED
    : EXIT_CODES.ABORTED
}
