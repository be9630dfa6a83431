/**
 * API Logger Configuration
 */

import { createLogger } from '@dealcheck/logger'

const rootLogger = createLogger('api')

export const loggers = {
  server: rootLogger.child('server'),
  http: rootLogger.child('http'),
  deals: rootLogger.child('deals'),
  status: rootLogger.child('status'),
}

export { rootLogger }
