import type { LogLevel, LogSink } from '@streamgrab/downloader-core'

const LEVEL_PREFIX: Record<LogLevel, string> = {
  info: '',
  success: '✔ ',
  warning: 'warning: ',
  error: 'error: '
}

export const formatLogLine = (text: string, level: LogLevel | null): string =>
  level ? `${LEVEL_PREFIX[level]}${text}` : text

interface TextWriter {
  write(text: string): unknown
}

export interface ConsoleSinkStreams {
  stdout: TextWriter
  stderr: TextWriter
}

/** Tool output and info go to stdout; warnings and errors to stderr. */
export const createConsoleSink = (
  streams: ConsoleSinkStreams = { stdout: process.stdout, stderr: process.stderr }
): LogSink => {
  return (text, level) => {
    const target = level === 'warning' || level === 'error' ? streams.stderr : streams.stdout
    target.write(`${formatLogLine(text, level)}\n`)
  }
}
