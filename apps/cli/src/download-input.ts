import os from 'node:os'
import path from 'node:path'
import {
  type AppSettings,
  type CookieSource,
  DownloadEngineSchema,
  type DownloadOptionsInput,
  DownloaderError,
  type SupportedPlatform,
  buildCookieSourceSetting,
  parseCookieSourceSetting,
  resolvePathWithHome,
  sanitizeCookieSource,
  toSupportedPlatform
} from '@streamgrab/downloader-core'

export interface DownloadFlags {
  engine?: string
  dir?: string
  threads?: number
  /** A cookie file path, or `false` for `--no-cookies`. */
  cookies?: string | false
  cookiesFromBrowser?: string
}

export interface MergedDownload {
  input: DownloadOptionsInput
  /** Settings worth keeping for the next run. Empty when nothing changed. */
  remember: Partial<AppSettings>
}

const resolveCookieChoice = (
  flags: DownloadFlags,
  settings: AppSettings,
  platform: SupportedPlatform
): { source: CookieSource; cookiePath?: string; explicit: boolean } => {
  if (flags.cookies === false) {
    return { source: { type: 'none' }, explicit: true }
  }
  if (typeof flags.cookies === 'string') {
    const cookiePath = resolvePathWithHome(flags.cookies)
    return { source: { type: 'file' }, cookiePath: cookiePath && path.resolve(cookiePath), explicit: true }
  }
  if (flags.cookiesFromBrowser) {
    return { source: parseCookieSourceSetting(flags.cookiesFromBrowser), explicit: true }
  }

  // Settings copied from another machine may name a browser this one lacks
  const source = sanitizeCookieSource(parseCookieSourceSetting(settings.cookieSource), platform)
  return {
    source,
    cookiePath: source.type === 'file' ? resolvePathWithHome(settings.cookiePath) : undefined,
    explicit: false
  }
}

/**
 * Layers command-line flags over the saved settings.
 */
export const mergeDownloadInput = (
  url: string,
  flags: DownloadFlags,
  settings: AppSettings,
  platform: SupportedPlatform = toSupportedPlatform()
): MergedDownload => {
  const engine = DownloadEngineSchema.safeParse(flags.engine ?? settings.engine)
  if (!engine.success) {
    throw new DownloaderError(
      'InvalidInput',
      `Unknown engine "${flags.engine}". Use one of: ${DownloadEngineSchema.options.join(', ')}`
    )
  }

  const flagDir = resolvePathWithHome(flags.dir)
  const downloadDir = path.resolve(
    flagDir ?? resolvePathWithHome(settings.downloadDir) ?? path.join(os.homedir(), 'Downloads')
  )
  const cookies = resolveCookieChoice(flags, settings, platform)

  const remember: Partial<AppSettings> = {}
  if (flagDir) {
    remember.downloadDir = downloadDir
  }
  if (cookies.explicit) {
    remember.cookieSource = buildCookieSourceSetting(cookies.source)
    if (cookies.cookiePath) {
      remember.cookiePath = cookies.cookiePath
    }
  }

  return {
    input: {
      url,
      engine: engine.data,
      downloadDir,
      threadCount: flags.threads ?? settings.threadCount,
      cookieSource: cookies.source,
      cookiePath: cookies.cookiePath
    },
    remember
  }
}

export const parseThreadCount = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new DownloaderError('InvalidInput', `Thread count must be a positive integer, got "${value}".`)
  }
  return parsed
}
