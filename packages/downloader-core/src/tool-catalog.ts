import type { SupportedArch, SupportedPlatform, ToolName } from './types'

export type PlatformKey = `${SupportedPlatform}-${SupportedArch}`

export interface ToolDefinition {
  name: string
  /** Executable name without the Windows `.exe` suffix. */
  binaryName: string
  /** GitHub `owner/repo` publishing the release assets. */
  repo: string
  /** Keywords an asset name must all contain to be an exact pick. */
  strict: Partial<Record<PlatformKey, string[]>>
  /** Substrings that disqualify an asset for this tool. */
  exclude?: string[]
}

export const MANAGED_TOOLS: readonly ToolName[] = ['yt-dlp', 'ffmpeg', 'aria2', 'N_m3u8DL-RE']

export const TOOL_CATALOG: Record<ToolName, ToolDefinition> = {
  'yt-dlp': {
    name: 'yt-dlp',
    binaryName: 'yt-dlp',
    repo: 'yt-dlp/yt-dlp',
    strict: {
      'win32-x64': ['yt-dlp.exe'],
      'win32-arm64': ['yt-dlp_arm64.exe'],
      'darwin-x64': ['yt-dlp_macos'],
      'darwin-arm64': ['yt-dlp_macos'],
      'linux-x64': ['yt-dlp_linux'],
      'linux-arm64': ['yt-dlp_linux_aarch64']
    },
    exclude: ['.zip', 'legacy']
  },
  // Static single-binary builds, published raw or gzipped per platform
  ffmpeg: {
    name: 'ffmpeg',
    binaryName: 'ffmpeg',
    repo: 'eugeneware/ffmpeg-static',
    strict: {
      'win32-x64': ['ffmpeg-win32-x64'],
      'darwin-x64': ['ffmpeg-darwin-x64'],
      'darwin-arm64': ['ffmpeg-darwin-arm64'],
      'linux-x64': ['ffmpeg-linux-x64'],
      'linux-arm64': ['ffmpeg-linux-arm64']
    },
    exclude: ['ffprobe', 'readme', 'license']
  },
  // Upstream only publishes Windows builds; other platforms resolve to nothing
  aria2: {
    name: 'aria2',
    binaryName: 'aria2c',
    repo: 'aria2/aria2',
    strict: {
      'win32-x64': ['win-64bit', '.zip']
    },
    exclude: ['android']
  },
  'N_m3u8DL-RE': {
    name: 'N_m3u8DL-RE',
    binaryName: 'N_m3u8DL-RE',
    repo: 'nilaoda/N_m3u8DL-RE',
    strict: {
      'win32-x64': ['win-x64', '.zip'],
      'win32-arm64': ['win-arm64', '.zip'],
      'darwin-x64': ['osx-x64', '.tar.gz'],
      'darwin-arm64': ['osx-arm64', '.tar.gz'],
      'linux-x64': ['linux-x64', '.tar.gz'],
      'linux-arm64': ['linux-arm64', '.tar.gz']
    },
    exclude: ['musl']
  }
}

export const isManagedTool = (value: string): value is ToolName =>
  MANAGED_TOOLS.some((tool) => tool === value)
