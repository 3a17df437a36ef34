import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { DownloaderError } from '@streamgrab/downloader-core'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  SettingsStore,
  defaultSettings,
  parseSettingKey,
  parseSettingValue
} from '../src/settings-store'

describe('SettingsStore', () => {
  let dir: string
  let settingsFile: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamgrab-cli-test-'))
    settingsFile = path.join(dir, 'config', 'settings.json')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('starts from the defaults when no file exists', async () => {
    const settings = await new SettingsStore(settingsFile).get()

    expect(settings).toEqual({
      language: 'en',
      theme: 'system',
      downloadDir: path.join(os.homedir(), 'Downloads'),
      cookiePath: '',
      cookieSource: 'none',
      threadCount: 8,
      engine: 'native',
      region: 'global'
    })
  })

  it('persists updates for the next process', async () => {
    await new SettingsStore(settingsFile).update({ engine: 'stream', threadCount: 16 })

    const reloaded = await new SettingsStore(settingsFile).get()

    expect(reloaded).toEqual({ ...defaultSettings, engine: 'stream', threadCount: 16 })
    expect(JSON.parse(fs.readFileSync(settingsFile, 'utf-8'))).toEqual(reloaded)
  })

  it('fills keys missing from an older file', async () => {
    fs.mkdirSync(path.dirname(settingsFile), { recursive: true })
    fs.writeFileSync(settingsFile, JSON.stringify({ downloadDir: '/media/videos' }))

    await expect(new SettingsStore(settingsFile).get()).resolves.toEqual({
      ...defaultSettings,
      downloadDir: '/media/videos'
    })
  })

  it('falls back to the defaults for unreadable or invalid files', async () => {
    fs.mkdirSync(path.dirname(settingsFile), { recursive: true })

    fs.writeFileSync(settingsFile, '{ not json')
    await expect(new SettingsStore(settingsFile).get()).resolves.toEqual(defaultSettings)

    fs.writeFileSync(settingsFile, JSON.stringify({ threadCount: 0 }))
    await expect(new SettingsStore(settingsFile).get()).resolves.toEqual(defaultSettings)
  })

  it('rejects invalid settings on save', async () => {
    const store = new SettingsStore(settingsFile)

    await expect(store.update({ threadCount: 500 })).rejects.toThrow()
    expect(fs.existsSync(settingsFile)).toBe(false)
  })
})

describe('parseSettingKey', () => {
  it('accepts known keys only', () => {
    expect(parseSettingKey('engine')).toBe('engine')
    expect(() => parseSettingKey('proxy')).toThrow(
      'Unknown setting "proxy". Known settings: language, theme, downloadDir, cookiePath, cookieSource, threadCount, engine, region'
    )
  })
})

describe('parseSettingValue', () => {
  it('converts and validates command-line values', () => {
    expect(parseSettingValue('threadCount', ' 16 ')).toEqual({ threadCount: 16 })
    expect(parseSettingValue('engine', 'stream')).toEqual({ engine: 'stream' })
    expect(parseSettingValue('cookieSource', 'firefox:work')).toEqual({
      cookieSource: 'firefox:work'
    })
  })

  it('rejects values the schema does not allow', () => {
    expect(() => parseSettingValue('threadCount', 'many')).toThrow(DownloaderError)
    expect(() => parseSettingValue('region', 'mars')).toThrow(/^Invalid value for region: /)
  })
})
