import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import yazl from 'yazl'
import type { LogLevel, LogSink } from '../src/types'

export const createTempDir = (): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), 'streamgrab-test-'))

export const removeDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true })
}

export const cookieLine = (domain: string, name: string, value: string): string =>
  [domain, 'TRUE', '/', 'FALSE', '0', name, value].join('\t')

export interface CollectedLog {
  text: string
  level: LogLevel | null
}

export const collectLogs = (): { sink: LogSink; logs: CollectedLog[] } => {
  const logs: CollectedLog[] = []
  return {
    logs,
    sink: (text, level) => {
      logs.push({ text, level })
    }
  }
}

export const createZipBuffer = (entries: Record<string, string>): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const zip = new yazl.ZipFile()
    for (const [name, content] of Object.entries(entries)) {
      zip.addBuffer(Buffer.from(content), name)
    }
    zip.end()

    const chunks: Buffer[] = []
    zip.outputStream
      .on('data', (chunk: Buffer) => chunks.push(chunk))
      .on('end', () => resolve(Buffer.concat(chunks)))
      .on('error', reject)
  })
