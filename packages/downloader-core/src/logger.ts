/**
 * Core logger utility
 * Uses the plain Node.js entry of electron-log
 */

import log from 'electron-log/node'

export default log

export const logger = log

// Predefined scoped loggers
export const scopedLoggers = {
  download: log.scope('download'),
  process: log.scope('process'),
  cookies: log.scope('cookies'),
  installer: log.scope('installer'),
  locator: log.scope('locator'),
  system: log.scope('system'),
  settings: log.scope('settings')
}
