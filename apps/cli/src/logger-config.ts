import path from 'node:path'
import log from 'electron-log/node'

/**
 * Configure electron-log
 * Set log levels, file location and uncaught error handling
 */
export function configureLogger(logDir: string) {
  // Development: show all logs
  // Production: show info level and above only
  const isDev = process.env.NODE_ENV === 'development'
  // Console output belongs to the download log; diagnostics go to the file
  log.transports.console.level = isDev ? 'silly' : false
  log.transports.file.level = isDev ? 'silly' : 'info'

  // Set maximum log file size (10MB)
  log.transports.file.maxSize = 10 * 1024 * 1024
  log.transports.file.resolvePathFn = () => path.join(logDir, 'cli.log')

  // Catch unhandled errors and rejected promises, log them only
  log.errorHandler.startCatching({
    showDialog: false,
    onError: (options) => {
      log.error('Unhandled error caught by electron-log:', options.error)
      log.error('Versions:', options.versions)
    }
  })

  log.info('Log file location:', log.transports.file.getFile().path)
}
