/**
 * Request logging
 *
 * One HTTP_REQUEST entry per request when the response finishes, and one
 * REQUEST_FAILED entry for errors reaching the error handler.
 */

import type { Request, Response, NextFunction } from 'express'
import { loggers } from '../config/logger'

const log = loggers.http

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now()

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startedAt,
    }
    if (res.statusCode >= 500) log.error('HTTP_REQUEST', meta)
    else if (res.statusCode >= 400) log.warn('HTTP_REQUEST', meta)
    else log.info('HTTP_REQUEST', meta)
  })

  next()
}

export function errorLoggerMiddleware(err: unknown, req: Request, _res: Response, next: NextFunction): void {
  log.error('REQUEST_FAILED', { method: req.method, path: req.path }, err)
  next(err)
}
