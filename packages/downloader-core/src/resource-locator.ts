import net from 'node:net'
import { DEFAULT_MIRROR_PREFIX, GITHUB_API_BASE, INSTALLER_USER_AGENT } from './config'
import { scopedLoggers } from './logger'
import { ReleaseAssetSchema, ReleaseIndexSchema } from './schemas'
import { TOOL_CATALOG, type ToolDefinition } from './tool-catalog'
import type { Region, ReleaseAsset, SupportedArch, SupportedPlatform, ToolName } from './types'

const PLATFORM_ALIASES: Record<SupportedPlatform, string[]> = {
  win32: ['win', 'windows', 'win32', 'win64'],
  darwin: ['mac', 'macos', 'darwin', 'osx'],
  linux: ['linux']
}

const ARCH_ALIASES: Record<SupportedArch, string[]> = {
  x64: ['x64', 'x86_64', 'amd64', '64bit'],
  arm64: ['arm64', 'aarch64']
}

const PLATFORMS: readonly SupportedPlatform[] = ['win32', 'darwin', 'linux']
const ARCHES: readonly SupportedArch[] = ['x64', 'arm64']

const THIRTY_TWO_BIT_KEYWORDS = ['armv7l', 'armhf', 'ia32', 'i386', 'i686', '32bit']

const NON_BINARY_SUFFIXES = ['.sha256', '.sha512', '.md5', '.sig', '.asc', 'sums', '.txt', '.json']

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

/**
 * Whole-word containment where only letters count as word characters, so
 * `win` matches `win64` and `tool-win-x64` but not `darwin`.
 */
export const containsKeyword = (name: string, keyword: string): boolean =>
  new RegExp(`(^|[^a-z])${escapeRegExp(keyword.toLowerCase())}([^a-z]|$)`).test(name.toLowerCase())

const conflictingKeywords = (platform: SupportedPlatform, arch: SupportedArch): string[] => {
  const platforms = PLATFORMS.filter((candidate) => candidate !== platform)
    .flatMap((candidate) => PLATFORM_ALIASES[candidate])
  const arches = ARCHES.filter((candidate) => candidate !== arch)
    .flatMap((candidate) => ARCH_ALIASES[candidate])
  return [...platforms, ...arches, ...THIRTY_TWO_BIT_KEYWORDS]
}

const isDisqualified = (
  assetName: string,
  tool: ToolDefinition,
  conflicts: string[]
): boolean => {
  const lowered = assetName.toLowerCase()
  if (NON_BINARY_SUFFIXES.some((suffix) => lowered.endsWith(suffix))) {
    return true
  }
  if ((tool.exclude ?? []).some((keyword) => lowered.includes(keyword.toLowerCase()))) {
    return true
  }
  return conflicts.some((keyword) => containsKeyword(lowered, keyword))
}

/**
 * Picks the release asset for a platform. Strict keyword rules win over the
 * alias-based relaxed match; in both passes the first qualifying asset in
 * index order is taken.
 */
export const selectAsset = (
  assets: readonly ReleaseAsset[],
  tool: ToolDefinition,
  platform: SupportedPlatform,
  arch: SupportedArch
): ReleaseAsset | null => {
  const conflicts = conflictingKeywords(platform, arch)
  const candidates = assets.filter((asset) => !isDisqualified(asset.name, tool, conflicts))

  const strictKeywords = tool.strict[`${platform}-${arch}`]
  if (strictKeywords && strictKeywords.length > 0) {
    const strictMatch = candidates.find((asset) => {
      const lowered = asset.name.toLowerCase()
      return strictKeywords.every((keyword) => lowered.includes(keyword.toLowerCase()))
    })
    if (strictMatch) {
      return strictMatch
    }
  }

  const relaxedMatch = candidates.find(
    (asset) =>
      PLATFORM_ALIASES[platform].some((alias) => containsKeyword(asset.name, alias)) &&
      ARCH_ALIASES[arch].some((alias) => containsKeyword(asset.name, alias))
  )
  return relaxedMatch ?? null
}

export interface ResourceLocatorOptions {
  region?: Region
  mirrorPrefix?: string
  apiBaseUrl?: string
  fetch?: typeof fetch
}

export class ResourceLocator {
  readonly region: Region
  private readonly mirrorPrefix: string
  private readonly apiBaseUrl: string
  private readonly fetchImpl: typeof fetch

  constructor(options: ResourceLocatorOptions = {}) {
    this.region = options.region ?? 'global'
    this.mirrorPrefix = options.mirrorPrefix ?? DEFAULT_MIRROR_PREFIX
    this.apiBaseUrl = (options.apiBaseUrl ?? GITHUB_API_BASE).replace(/\/+$/, '')
    this.fetchImpl = options.fetch ?? fetch
  }

  /**
   * Fetches the latest release of the tool's upstream repository. Entries
   * that do not look like assets are skipped; a failed request yields null.
   */
  async fetchReleaseAssets(tool: ToolDefinition): Promise<ReleaseAsset[] | null> {
    const url = `${this.apiBaseUrl}/repos/${tool.repo}/releases/latest`
    try {
      const response = await this.fetchImpl(url, {
        headers: {
          Accept: 'application/vnd.github+json',
          'User-Agent': INSTALLER_USER_AGENT
        }
      })
      if (!response.ok) {
        throw new Error(`Release index request failed (${response.status})`)
      }

      const index = ReleaseIndexSchema.safeParse(await response.json())
      if (!index.success) {
        throw new Error('Release index has no asset list')
      }

      const assets: ReleaseAsset[] = []
      for (const rawAsset of index.data.assets) {
        const parsed = ReleaseAssetSchema.safeParse(rawAsset)
        if (!parsed.success) {
          continue
        }
        assets.push({
          name: parsed.data.name,
          url: parsed.data.browser_download_url,
          size: parsed.data.size,
          digest: parsed.data.digest ?? undefined
        })
      }
      scopedLoggers.locator.debug(
        `Release ${index.data.tag_name ?? 'latest'} of ${tool.repo} lists ${assets.length} assets`
      )
      return assets
    } catch (error) {
      scopedLoggers.locator.warn('Failed to fetch release index:', url, error)
      return null
    }
  }

  async resolveAsset(
    tool: ToolName | ToolDefinition,
    platform: SupportedPlatform,
    arch: SupportedArch
  ): Promise<ReleaseAsset | null> {
    const definition = typeof tool === 'string' ? TOOL_CATALOG[tool] : tool
    const assets = await this.fetchReleaseAssets(definition)
    if (!assets) {
      return null
    }

    const asset = selectAsset(assets, definition, platform, arch)
    if (!asset) {
      scopedLoggers.locator.info(`No ${definition.name} asset for ${platform}-${arch}`)
      return null
    }
    return { ...asset, url: this.applyRegion(asset.url) }
  }

  /** Same as `resolveAsset`, reduced to the URL; empty when unavailable. */
  async resolveAssetUrl(
    tool: ToolName | ToolDefinition,
    platform: SupportedPlatform,
    arch: SupportedArch
  ): Promise<string> {
    const asset = await this.resolveAsset(tool, platform, arch)
    return asset?.url ?? ''
  }

  applyRegion(url: string): string {
    if (!url || this.region !== 'cn' || url.startsWith(this.mirrorPrefix)) {
      return url
    }
    return `${this.mirrorPrefix}${url}`
  }
}

export interface RegionProbeOptions {
  host?: string
  port?: number
  timeoutMs?: number
}

/**
 * Guesses whether the network needs the download mirror by opening a TCP
 * connection to a public DNS resolver.
 */
export const detectRegion = (options: RegionProbeOptions = {}): Promise<Region> => {
  const { host = '8.8.8.8', port = 53, timeoutMs = 2000 } = options
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port })
    const finish = (region: Region): void => {
      socket.destroy()
      resolve(region)
    }
    socket.setTimeout(timeoutMs, () => finish('cn'))
    socket.once('connect', () => finish('global'))
    socket.once('error', (error) => {
      scopedLoggers.locator.debug('Region probe failed:', error.message)
      finish('cn')
    })
  })
}
