/**
 * Express App Configuration (without server startup)
 *
 * `createApp` is used by index.ts and by the supertest suites; the
 * server.listen() call lives in index.ts.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import type { DealcheckStore } from '@dealcheck/db'
import { requestContextMiddleware } from './middleware/request-context'
import { errorLoggerMiddleware, requestLoggerMiddleware } from './middleware/request-logger'
import { createDealsRouter } from './routes/deals'
import { createStatusRouter } from './routes/status'

export const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:3000']

export interface AppOptions {
  store: DealcheckStore
  /** Browser origins allowed by CORS; requests without an Origin header always pass */
  allowedOrigins?: string[]
}

function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return 500
}

export function createApp(options: AppOptions): Express {
  const allowedOrigins = options.allowedOrigins ?? DEFAULT_ALLOWED_ORIGINS
  const app = express()

  app.use(helmet())

  // Must be early in the chain so every log entry carries the requestId
  app.use(requestContextMiddleware)
  app.use(requestLoggerMiddleware)

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true)
        } else {
          callback(null, false)
        }
      },
    })
  )

  app.use(express.json())

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.use('/api/deals', createDealsRouter(options.store))
  app.use('/api/status', createStatusRouter(options.store))

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' })
  })

  app.use(errorLoggerMiddleware)

  // Final error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const statusCode = errorStatus(err)
    res.status(statusCode).json({
      error: statusCode >= 500 || !(err instanceof Error) ? 'Something went wrong!' : err.message,
    })
  })

  return app
}
