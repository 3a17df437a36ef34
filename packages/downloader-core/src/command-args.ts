import path from 'node:path'
import { DEFAULT_COOKIE_MAX_LENGTH } from './config'
import { CookieResolver, extractHost } from './cookie-resolver'
import { DownloaderError } from './errors'
import type { CommandAdvisory, CommandPlan, CookieSource, DownloadOptions, ToolPaths } from './types'

const YT_DLP_BASE_ARGS = ['--merge-output-format', 'mp4', '--retries', '10', '-f', 'bv+ba/b']
const ARIA2_CHUNK_SIZE = '1M'
const COOKIE_HEADER_PREFIX = 'Cookie: '
const REDACTED = '<redacted>'

export interface CommandBuilderDeps {
  cookieResolver?: CookieResolver
  cookieMaxLength?: number
}

let sharedCookieResolver: CookieResolver | null = null

const getSharedCookieResolver = (): CookieResolver => {
  if (!sharedCookieResolver) {
    sharedCookieResolver = new CookieResolver()
  }
  return sharedCookieResolver
}

const requireTool = (toolPath: string | undefined, label: string): string => {
  const trimmed = toolPath?.trim()
  if (!trimmed) {
    throw new DownloaderError('ToolUnavailable', `${label} is not installed or could not be located.`)
  }
  return trimmed
}

export const formatBrowserCookieArg = (source: Extract<CookieSource, { type: 'browser' }>): string => {
  const profile = source.profile?.trim()
  return profile ? `${source.browser}:${profile}` : source.browser
}

const buildYtDlpCommand = (options: DownloadOptions, toolPaths: ToolPaths): CommandPlan => {
  const executable = requireTool(toolPaths.ytDlp, 'yt-dlp')
  const args = ['-P', options.downloadDir, ...YT_DLP_BASE_ARGS]
  const advisories: CommandAdvisory[] = []

  if (toolPaths.ffmpeg) {
    args.push('--ffmpeg-location', path.dirname(toolPaths.ffmpeg))
  }

  const source = options.cookieSource
  if (source.type === 'browser') {
    const browserArg = formatBrowserCookieArg(source)
    args.push('--cookies-from-browser', browserArg)
    advisories.push({ level: 'info', message: `Using cookies from browser: ${browserArg}` })
  } else if (source.type === 'file' && options.cookiePath) {
    args.push('--cookies', options.cookiePath)
    advisories.push({ level: 'info', message: `Using cookie file: ${options.cookiePath}` })
  }

  if (options.engine === 'accelerated') {
    const aria2c = requireTool(toolPaths.aria2c, 'aria2c')
    args.push(
      '--downloader',
      aria2c,
      '--downloader-args',
      `aria2c:-x ${options.threadCount} -k ${ARIA2_CHUNK_SIZE}`
    )
  }

  args.push(options.url)
  return { executable, args, advisories, secretArgIndexes: [] }
}

const buildStreamCommand = (
  options: DownloadOptions,
  toolPaths: ToolPaths,
  deps: CommandBuilderDeps
): CommandPlan => {
  const executable = requireTool(toolPaths.streamTool, 'N_m3u8DL-RE')
  const args = [
    options.url,
    '--save-dir',
    options.downloadDir,
    '--thread-count',
    String(options.threadCount),
    '--auto-select',
    '--no-log'
  ]
  const advisories: CommandAdvisory[] = []
  const secretArgIndexes: number[] = []

  if (toolPaths.ffmpeg) {
    args.push('--ffmpeg-binary-path', toolPaths.ffmpeg)
  }

  const source = options.cookieSource
  if (source.type === 'browser') {
    advisories.push({
      level: 'warning',
      message: 'The stream engine cannot read browser cookies; continuing without cookies.'
    })
  } else if (source.type === 'file' && options.cookiePath) {
    const resolver = deps.cookieResolver ?? getSharedCookieResolver()
    const resolution = resolver.resolveDetailed(
      options.cookiePath,
      options.url,
      deps.cookieMaxLength ?? DEFAULT_COOKIE_MAX_LENGTH
    )
    if (resolution.header) {
      args.push('--header')
      secretArgIndexes.push(args.length)
      args.push(`${COOKIE_HEADER_PREFIX}${resolution.header}`)
      advisories.push({
        level: 'info',
        message: `Loaded ${resolution.matched} cookies for ${extractHost(options.url)}.`
      })
      if (resolution.truncated) {
        advisories.push({
          level: 'warning',
          message: `Cookie header truncated to ${resolution.header.length} characters.`
        })
      }
    } else {
      advisories.push({
        level: 'warning',
        message: `No cookies in ${options.cookiePath} match this site; continuing without cookies.`
      })
    }
  }

  return { executable, args, advisories, secretArgIndexes }
}

/**
 * Builds the argument vector for the selected engine. Throws `InvalidInput`
 * for an empty URL and `ToolUnavailable` when the engine's executable is
 * unknown.
 */
export const buildCommand = (
  options: DownloadOptions,
  toolPaths: ToolPaths,
  deps: CommandBuilderDeps = {}
): CommandPlan => {
  if (!options.url.trim()) {
    throw new DownloaderError('InvalidInput', 'URL is required.')
  }

  return options.engine === 'stream'
    ? buildStreamCommand(options, toolPaths, deps)
    : buildYtDlpCommand(options, toolPaths)
}

const quoteArg = (arg: string): string => {
  if (arg === '') {
    return '""'
  }
  if (/[\s"'\\]/.test(arg)) {
    return `"${arg.replace(/(["\\])/g, '\\$1')}"`
  }
  return arg
}

const redactArg = (arg: string): string =>
  arg.startsWith(COOKIE_HEADER_PREFIX) ? `${COOKIE_HEADER_PREFIX}${REDACTED}` : REDACTED

/** Display form of a command; credential-bearing arguments are masked. */
export const formatCommand = (plan: CommandPlan): string => {
  const secrets = new Set(plan.secretArgIndexes)
  const args = plan.args.map((arg, index) => quoteArg(secrets.has(index) ? redactArg(arg) : arg))
  return [quoteArg(plan.executable), ...args].join(' ')
}
