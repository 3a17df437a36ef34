import os from 'node:os'
import path from 'node:path'
import type { ExecutionEnvironment, SupportedArch, SupportedPlatform } from './types'

const HOMEBREW_BIN_DIRS = ['/opt/homebrew/bin', '/usr/local/bin'] as const

export const DEFAULT_COOKIE_MAX_LENGTH = 6000
export const COOKIE_CACHE_MAX_ENTRIES = 64
export const DEFAULT_MIRROR_PREFIX = 'https://ghproxy.net/'
export const GITHUB_API_BASE = 'https://api.github.com'
export const INSTALLER_USER_AGENT = 'streamgrab-installer/0.1'

export interface AppPaths {
  configDir: string
  toolDir: string
  settingsFile: string
  cookieCacheFile: string
}

const trim = (value?: string | null): string => value?.trim() ?? ''

export const resolvePathWithHome = (rawPath?: string | null): string | undefined => {
  const trimmed = trim(rawPath)
  if (!trimmed) {
    return undefined
  }

  if (trimmed === '~') {
    return os.homedir()
  }

  if (trimmed.startsWith('~/') || trimmed.startsWith('~\\')) {
    return path.join(os.homedir(), trimmed.slice(2))
  }

  return trimmed
}

export const resolveAppPaths = (env: NodeJS.ProcessEnv = process.env): AppPaths => {
  const configDir =
    resolvePathWithHome(env.STREAMGRAB_HOME) ?? path.join(os.homedir(), '.streamgrab')
  const toolDir = resolvePathWithHome(env.STREAMGRAB_TOOL_DIR) ?? path.join(configDir, 'bin')
  return {
    configDir,
    toolDir,
    settingsFile: path.join(configDir, 'settings.json'),
    cookieCacheFile: path.join(configDir, 'cookie-cache.json')
  }
}

export const toSupportedPlatform = (value: NodeJS.Platform = process.platform): SupportedPlatform => {
  if (value === 'win32' || value === 'darwin') {
    return value
  }
  return 'linux'
}

export const toSupportedArch = (value: string = process.arch): SupportedArch =>
  value === 'arm64' || value === 'aarch64' ? 'arm64' : 'x64'

export const binaryFileName = (baseName: string, platform: SupportedPlatform): string =>
  platform === 'win32' ? `${baseName}.exe` : baseName

export interface ExecutionEnvironmentOptions {
  baseEnv?: NodeJS.ProcessEnv
  platform?: SupportedPlatform
  toolDir?: string
}

/**
 * Builds the environment handed to every child process: the tool directory
 * first on PATH and, on macOS, the Homebrew directories a GUI launch misses.
 */
export const createExecutionEnvironment = (
  options: ExecutionEnvironmentOptions = {}
): ExecutionEnvironment => {
  const platform = options.platform ?? toSupportedPlatform()
  const env: NodeJS.ProcessEnv = { ...(options.baseEnv ?? process.env) }
  const delimiter = platform === 'win32' ? ';' : ':'
  // Windows keeps the variable as "Path"
  const pathKey = Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'PATH'
  const entries = (env[pathKey] ?? '').split(delimiter).filter((entry) => entry !== '')

  if (options.toolDir && !entries.includes(options.toolDir)) {
    entries.unshift(options.toolDir)
  }

  if (platform === 'darwin') {
    for (const dir of HOMEBREW_BIN_DIRS) {
      if (!entries.includes(dir)) {
        entries.push(dir)
      }
    }
  }

  env[pathKey] = entries.join(delimiter)
  return { platform, env }
}
