// Load environment variables first, before any other imports
import 'dotenv/config'

import { createPgStore, createPool } from '@dealcheck/db'
import { createApp, DEFAULT_ALLOWED_ORIGINS } from './app'
import { loadApiEnv } from './config/env'
import { loggers } from './config/logger'

const log = loggers.server

const env = loadApiEnv()
const pool = createPool()

const app = createApp({
  store: createPgStore(pool),
  allowedOrigins: env.FRONTEND_URL ? [...DEFAULT_ALLOWED_ORIGINS, env.FRONTEND_URL] : DEFAULT_ALLOWED_ORIGINS,
})

const server = app.listen(env.PORT, () => {
  log.info('SERVER_LISTENING', { port: env.PORT })
})

async function shutdown(signal: string): Promise<void> {
  log.info('SERVER_SHUTDOWN', { signal })
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()))
  })
  await pool.end()
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('SERVER_SHUTDOWN_FAILED', { signal }, error)
        process.exit(1)
      })
  })
}
