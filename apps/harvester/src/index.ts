#!/usr/bin/env node

/**
 * Harvester Service
 * Entry point for migrations, pipeline runs, calibration and match review
 */

import 'dotenv/config'
import { createPgStore, createPool, runMigrations } from '@dealcheck/db'
import { runCommand } from './cli/commands'
import { loadHarvesterEnv } from './config/env'
import { rootLogger } from './config/logger'

const log = rootLogger

async function main(): Promise<number> {
  const env = loadHarvesterEnv()
  const pool = createPool()

  try {
    return await runCommand(process.argv.slice(2), {
      store: createPgStore(pool),
      env,
      migrate: () => runMigrations(pool),
      print: (text) => console.log(text),
    })
  } finally {
    await pool.end()
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error('HARVESTER_COMMAND_FAILED', {}, error)
    process.exit(1)
  })
