#!/usr/bin/env tsx

import { loadBaseEnv, logger } from '@cursevm/core'
import { createCli } from './cli'

// Initialize logger
logger.init(loadBaseEnv().LOG_LEVEL)

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed', {
      error: error instanceof Error ? error.message : String(error),
    })
    process.exitCode = 1
  })
