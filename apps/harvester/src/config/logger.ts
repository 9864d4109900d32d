/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@statline/logger'

// Root logger for the harvester service
export const logger = createLogger('harvester')

export const loggers = {
  registry: logger.child('registry'),
  fetch: logger.child('fetch'),
  cli: logger.child('cli'),
}
