/**
 * Request Context Middleware
 *
 * Provides request correlation via AsyncLocalStorage.
 * All log entries within a request will include the requestId.
 *
 * - X-Request-ID header is used if present (for distributed tracing)
 * - Otherwise, a new UUID is generated
 * - The requestId is also added to the response header
 */

import type { Request, Response, NextFunction } from 'express'
import { randomUUID } from 'node:crypto'
import { withRequestContext } from '@dealcheck/logger'

const MAX_REQUEST_ID_LENGTH = 128

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id']
  const requestId =
    typeof header === 'string' && header.length > 0 && header.length <= MAX_REQUEST_ID_LENGTH ? header : randomUUID()

  res.setHeader('X-Request-ID', requestId)

  withRequestContext({ requestId }, () => {
    next()
  })
}
