import type { DownloaderError } from './errors'

export type DownloadEngine = 'native' | 'accelerated' | 'stream'

export type CookieSource =
  | { type: 'none' }
  | { type: 'browser'; browser: string; profile?: string }
  | { type: 'file' }

export interface DownloadOptions {
  readonly url: string
  readonly engine: DownloadEngine
  readonly downloadDir: string
  readonly threadCount: number
  readonly cookieSource: CookieSource
  readonly cookiePath?: string
}

export interface DownloadOptionsInput {
  url: string
  engine?: DownloadEngine
  downloadDir: string
  threadCount?: number
  cookieSource?: CookieSource
  cookiePath?: string
}

/** Level attached to a log sink message. */
export type LogLevel = 'info' | 'warning' | 'error' | 'success'

/**
 * Caller-supplied sink for user-visible log text. A `null` level marks raw
 * tool output that is forwarded as-is. The core may call it from any async
 * task; UI layers are responsible for moving the text onto their own event
 * loop.
 */
export type LogSink = (text: string, level: LogLevel | null) => void

export type CompletionCallback = (success: boolean, exitCode: number | null) => void

export type ToolName = 'yt-dlp' | 'ffmpeg' | 'aria2' | 'N_m3u8DL-RE'

export type SupportedPlatform = 'win32' | 'darwin' | 'linux'

export type SupportedArch = 'x64' | 'arm64'

export type Region = 'global' | 'cn'

export interface ToolPaths {
  ytDlp?: string
  ffmpeg?: string
  aria2c?: string
  streamTool?: string
}

export interface CommandAdvisory {
  level: Exclude<LogLevel, 'error'>
  message: string
}

export interface CommandPlan {
  executable: string
  args: string[]
  advisories: CommandAdvisory[]
  /** Indexes into `args` whose values carry credentials. */
  secretArgIndexes: number[]
}

export type ProcessStatus = 'idle' | 'starting' | 'running' | 'completed' | 'failed' | 'cancelled'

export interface ProcessOutcome {
  status: Extract<ProcessStatus, 'completed' | 'failed' | 'cancelled'>
  success: boolean
  exitCode: number | null
  signal: NodeJS.Signals | null
  errorDetected: boolean
  error?: DownloaderError
}

export interface DownloadResult {
  success: boolean
  exitCode: number | null
  status: ProcessOutcome['status']
}

export interface DownloadController {
  /** Requests cancellation. Safe to call at any time, any number of times. */
  stop(): void
  isRunning(): boolean
  readonly done: Promise<DownloadResult>
}

export interface ReleaseAsset {
  name: string
  url: string
  size?: number
  digest?: string
}

export interface InstallerStatus {
  tools: Record<ToolName, boolean>
  toolDir: string
}

export interface ExecutionEnvironment {
  platform: SupportedPlatform
  env: NodeJS.ProcessEnv
}
