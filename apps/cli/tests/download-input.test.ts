import path from 'node:path'
import type { AppSettings } from '@streamgrab/downloader-core'
import { describe, expect, it } from 'vitest'
import { mergeDownloadInput, parseThreadCount } from '../src/download-input'
import { defaultSettings } from '../src/settings-store'

const URL = 'https://example.com/watch?v=1'

const savedSettings: AppSettings = {
  ...defaultSettings,
  downloadDir: '/saved/downloads',
  cookieSource: 'file',
  cookiePath: '/saved/cookies.txt',
  engine: 'accelerated',
  threadCount: 4
}

describe('mergeDownloadInput', () => {
  it('uses the saved settings when no flags are given', () => {
    expect(mergeDownloadInput(URL, {}, savedSettings)).toEqual({
      input: {
        url: URL,
        engine: 'accelerated',
        downloadDir: path.resolve('/saved/downloads'),
        threadCount: 4,
        cookieSource: { type: 'file' },
        cookiePath: '/saved/cookies.txt'
      },
      remember: {}
    })
  })

  it('lets flags win and remembers directory and cookie choices', () => {
    const merged = mergeDownloadInput(
      URL,
      { engine: 'stream', dir: '/media/new', threads: 12, cookiesFromBrowser: 'firefox:work' },
      savedSettings
    )

    expect(merged.input).toEqual({
      url: URL,
      engine: 'stream',
      downloadDir: path.resolve('/media/new'),
      threadCount: 12,
      cookieSource: { type: 'browser', browser: 'firefox', profile: 'work' },
      cookiePath: undefined
    })
    expect(merged.remember).toEqual({
      downloadDir: path.resolve('/media/new'),
      cookieSource: 'firefox:work'
    })
  })

  it('turns cookies off with --no-cookies', () => {
    const merged = mergeDownloadInput(URL, { cookies: false }, savedSettings)

    expect(merged.input.cookieSource).toEqual({ type: 'none' })
    expect(merged.input.cookiePath).toBeUndefined()
    expect(merged.remember).toEqual({ cookieSource: 'none' })
  })

  it('resolves a cookie file relative to the working directory', () => {
    const merged = mergeDownloadInput(URL, { cookies: 'cookies.txt' }, defaultSettings)

    expect(merged.input.cookieSource).toEqual({ type: 'file' })
    expect(merged.input.cookiePath).toBe(path.resolve('cookies.txt'))
    expect(merged.remember).toEqual({
      cookieSource: 'file',
      cookiePath: path.resolve('cookies.txt')
    })
  })

  it('reads a saved browser choice', () => {
    const merged = mergeDownloadInput(URL, {}, { ...defaultSettings, cookieSource: 'chrome' })

    expect(merged.input.cookieSource).toEqual({ type: 'browser', browser: 'chrome' })
    expect(merged.input.cookiePath).toBeUndefined()
  })

  it('falls back to no cookies when the saved browser is not available here', () => {
    const merged = mergeDownloadInput(URL, {}, { ...defaultSettings, cookieSource: 'safari' }, 'linux')

    expect(merged.input.cookieSource).toEqual({ type: 'none' })
    expect(merged.remember).toEqual({})
  })

  it('rejects an unknown engine', () => {
    expect(() => mergeDownloadInput(URL, { engine: 'turbo' }, defaultSettings)).toThrow(
      'Unknown engine "turbo". Use one of: native, accelerated, stream'
    )
  })
})

describe('parseThreadCount', () => {
  it('accepts positive integers only', () => {
    expect(parseThreadCount('8')).toBe(8)
    expect(() => parseThreadCount('0')).toThrow('Thread count must be a positive integer, got "0".')
    expect(() => parseThreadCount('2.5')).toThrow()
  })
})
