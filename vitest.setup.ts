import log from 'electron-log/node'

// Keep test runs from writing log files into the user's profile
log.transports.file.level = false
log.transports.console.level = false
