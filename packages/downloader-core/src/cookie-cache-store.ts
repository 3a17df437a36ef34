import crypto from 'node:crypto'
import fs from 'node:fs'
import fsPromises from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { scopedLoggers } from './logger'
import { CookieCacheEntrySchema, PersistedCookieCacheSchema } from './schemas'

export type CookieCacheEntry = z.infer<typeof CookieCacheEntrySchema>

type PersistedCookieCache = z.infer<typeof PersistedCookieCacheSchema>

const STORAGE_VERSION = 1
const KEY_FILE_NAME = 'cookie-cache.key'
const IV_LENGTH = 12
const TAG_LENGTH = 16
const KEY_LENGTH = 32

const EntriesSchema = z.array(CookieCacheEntrySchema)

/**
 * Disk persistence for matched cookie headers. Entries are encrypted with
 * aes-256-gcm under a random key kept beside the cache file.
 */
export class CookieCacheStore {
  private readonly keyPath: string
  private key: Buffer | null = null
  private writeChain: Promise<void> = Promise.resolve()

  constructor(private readonly filePath: string) {
    this.keyPath = path.join(path.dirname(filePath), KEY_FILE_NAME)
  }

  load(): CookieCacheEntry[] {
    if (!fs.existsSync(this.filePath)) {
      return []
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8')
      const payload = PersistedCookieCacheSchema.safeParse(JSON.parse(raw))
      if (!payload.success) {
        scopedLoggers.cookies.warn('Ignoring cookie cache with unexpected shape:', this.filePath)
        return []
      }
      const decrypted = this.decrypt(payload.data.encryptedEntries)
      const entries = EntriesSchema.safeParse(JSON.parse(decrypted))
      return entries.success ? entries.data : []
    } catch (error) {
      scopedLoggers.cookies.warn('Failed to load cookie cache:', error)
      return []
    }
  }

  /**
   * Queues a write of the given snapshot. Writes run one at a time, in the
   * order they were requested.
   */
  save(entries: CookieCacheEntry[]): Promise<void> {
    const snapshot = entries.map((entry) => ({ ...entry }))
    this.writeChain = this.writeChain.then(() => this.write(snapshot))
    return this.writeChain
  }

  flush(): Promise<void> {
    return this.writeChain
  }

  private async write(entries: CookieCacheEntry[]): Promise<void> {
    const payload: PersistedCookieCache = {
      version: STORAGE_VERSION,
      updatedAt: Date.now(),
      encryptedEntries: this.encrypt(JSON.stringify(entries))
    }
    const tempPath = `${this.filePath}.tmp`

    try {
      await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true })
      await fsPromises.writeFile(tempPath, JSON.stringify(payload), { encoding: 'utf-8', mode: 0o600 })
      await fsPromises.rename(tempPath, this.filePath)
    } catch (error) {
      scopedLoggers.cookies.warn('Failed to store cookie cache:', error)
    }
  }

  private loadKey(): Buffer {
    if (this.key) {
      return this.key
    }

    try {
      if (fs.existsSync(this.keyPath)) {
        const stored = Buffer.from(fs.readFileSync(this.keyPath, 'utf-8'), 'base64')
        if (stored.length === KEY_LENGTH) {
          this.key = stored
          return stored
        }
      }
    } catch (error) {
      scopedLoggers.cookies.warn('Failed to read cookie cache key:', error)
    }

    const key = crypto.randomBytes(KEY_LENGTH)
    try {
      fs.mkdirSync(path.dirname(this.keyPath), { recursive: true })
      fs.writeFileSync(this.keyPath, key.toString('base64'), { mode: 0o600 })
    } catch (error) {
      scopedLoggers.cookies.warn('Failed to store cookie cache key:', error)
    }
    this.key = key
    return key
  }

  private encrypt(text: string): string {
    const iv = crypto.randomBytes(IV_LENGTH)
    const cipher = crypto.createCipheriv('aes-256-gcm', this.loadKey(), iv)
    const encrypted = Buffer.concat([cipher.update(text, 'utf8'), cipher.final()])
    const tag = cipher.getAuthTag()
    return Buffer.concat([iv, tag, encrypted]).toString('base64')
  }

  private decrypt(payload: string): string {
    const buffer = Buffer.from(payload, 'base64')
    const iv = buffer.subarray(0, IV_LENGTH)
    const tag = buffer.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH)
    const encrypted = buffer.subarray(IV_LENGTH + TAG_LENGTH)
    const decipher = crypto.createDecipheriv('aes-256-gcm', this.loadKey(), iv)
    decipher.setAuthTag(tag)
    return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8')
  }
}
