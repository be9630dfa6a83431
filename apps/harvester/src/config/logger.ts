/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@dealcheck/logger'

// Root logger for harvester service
const rootLogger = createLogger('harvester')

// Pre-configured child loggers for harvester components
export const logger = {
  pipeline: rootLogger.child('pipeline'),
  sources: rootLogger.child('sources'),
  resolver: rootLogger.child('resolver'),
  pricehistory: rootLogger.child('pricehistory'),
  writer: rootLogger.child('writer'),
  calibration: rootLogger.child('calibration'),
}

// Export root logger for custom child creation
export { rootLogger }
