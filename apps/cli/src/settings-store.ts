import { mkdir, readFile, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import {
  type AppSettings,
  AppSettingsSchema,
  DownloaderError,
  scopedLoggers
} from '@streamgrab/downloader-core'

export type SettingKey = keyof AppSettings

export const defaultSettings: AppSettings = AppSettingsSchema.parse({
  language: 'en',
  theme: 'system',
  downloadDir: path.join(os.homedir(), 'Downloads'),
  cookiePath: '',
  cookieSource: 'none',
  threadCount: 8,
  engine: 'native',
  region: 'global'
})

const SettingKeySchema = AppSettingsSchema.keyof()

export const parseSettingKey = (key: string): SettingKey => {
  const result = SettingKeySchema.safeParse(key)
  if (!result.success) {
    throw new DownloaderError(
      'InvalidInput',
      `Unknown setting "${key}". Known settings: ${SettingKeySchema.options.join(', ')}`
    )
  }
  return result.data
}

/**
 * Turns a command-line value into a settings patch, validated against the
 * settings schema.
 */
export const parseSettingValue = (key: SettingKey, raw: string): Partial<AppSettings> => {
  const value: unknown = key === 'threadCount' ? Number(raw.trim()) : raw.trim()
  const result = AppSettingsSchema.partial().safeParse({ [key]: value })
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ')
    throw new DownloaderError('InvalidInput', `Invalid value for ${key}: ${detail}`)
  }
  return result.data
}

export class SettingsStore {
  private settings = defaultSettings
  private initialized = false

  constructor(private readonly filePath: string) {}

  private async ensureInitialized(): Promise<void> {
    if (this.initialized) {
      return
    }

    this.initialized = true

    try {
      const raw = await readFile(this.filePath, 'utf-8')
      const parsed: unknown = JSON.parse(raw)
      // Missing keys take their defaults
      const merged =
        typeof parsed === 'object' && parsed !== null ? { ...defaultSettings, ...parsed } : parsed
      const result = AppSettingsSchema.safeParse(merged)
      if (result.success) {
        this.settings = result.data
      } else {
        scopedLoggers.settings.warn('Ignoring invalid settings file:', this.filePath)
      }
    } catch {
      this.settings = defaultSettings
    }
  }

  async get(): Promise<AppSettings> {
    await this.ensureInitialized()
    return this.settings
  }

  async set(nextSettings: AppSettings): Promise<AppSettings> {
    await this.ensureInitialized()
    const validated = AppSettingsSchema.parse(nextSettings)
    await mkdir(path.dirname(this.filePath), { recursive: true })
    await writeFile(this.filePath, JSON.stringify(validated, null, 2), 'utf-8')
    this.settings = validated
    scopedLoggers.settings.info('Settings saved:', this.filePath)
    return this.settings
  }

  async update(patch: Partial<AppSettings>): Promise<AppSettings> {
    const current = await this.get()
    return this.set({ ...current, ...patch })
  }
}
