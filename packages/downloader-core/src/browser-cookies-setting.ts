import type { CookieSource, SupportedPlatform } from './types'

export const SUPPORTED_BROWSERS = ['chrome', 'edge', 'safari', 'firefox'] as const

export type SupportedBrowser = (typeof SUPPORTED_BROWSERS)[number]

const BROWSERS_BY_PLATFORM: Record<SupportedPlatform, readonly SupportedBrowser[]> = {
  darwin: ['safari', 'chrome', 'firefox'],
  win32: ['chrome', 'edge', 'firefox'],
  linux: ['chrome', 'firefox']
}

/** Browsers whose cookie stores the download tools can read on `platform`. */
export const supportedBrowsers = (platform: SupportedPlatform): readonly SupportedBrowser[] =>
  BROWSERS_BY_PLATFORM[platform]

export const isSupportedBrowser = (browser: string, platform: SupportedPlatform): boolean =>
  supportedBrowsers(platform).some((supported) => supported === browser.trim().toLowerCase())

export interface BrowserCookiesSetting {
  browser: string
  profile: string
}

const normalizeProfileInput = (value: string): string => value.trim().replace(/^['"]|['"]$/g, '')

export const parseBrowserCookiesSetting = (value: string | undefined): BrowserCookiesSetting => {
  if (!value || value === 'none') {
    return { browser: 'none', profile: '' }
  }

  const separatorIndex = value.indexOf(':')
  if (separatorIndex === -1) {
    return { browser: value.trim(), profile: '' }
  }

  const browser = value.slice(0, separatorIndex).trim()
  const profile = normalizeProfileInput(value.slice(separatorIndex + 1))
  return { browser: browser || 'none', profile }
}

export const buildBrowserCookiesSetting = (browser: string, profile: string): string => {
  const trimmedBrowser = browser.trim()
  if (!trimmedBrowser || trimmedBrowser === 'none') {
    return 'none'
  }

  const trimmedProfile = normalizeProfileInput(profile)
  return trimmedProfile ? `${trimmedBrowser}:${trimmedProfile}` : trimmedBrowser
}

/**
 * Maps the persisted string form (`none`, `file`, `chrome`, `firefox:work`)
 * onto a `CookieSource`.
 */
export const parseCookieSourceSetting = (value: string | undefined): CookieSource => {
  const trimmed = value?.trim() ?? ''
  if (trimmed === 'file') {
    return { type: 'file' }
  }

  const { browser, profile } = parseBrowserCookiesSetting(trimmed)
  if (browser === 'none') {
    return { type: 'none' }
  }
  return profile ? { type: 'browser', browser, profile } : { type: 'browser', browser }
}

export const buildCookieSourceSetting = (source: CookieSource): string => {
  switch (source.type) {
    case 'none':
      return 'none'
    case 'file':
      return 'file'
    case 'browser':
      return buildBrowserCookiesSetting(source.browser, source.profile ?? '')
  }
}

/**
 * Drops a saved browser source the current platform cannot read, so settings
 * carried over from another machine fall back to no cookies.
 */
export const sanitizeCookieSource = (
  source: CookieSource,
  platform: SupportedPlatform
): CookieSource =>
  source.type === 'browser' && !isSupportedBrowser(source.browser, platform) ? { type: 'none' } : source
