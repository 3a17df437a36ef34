import crypto from 'node:crypto'
import fs from 'node:fs'
import fsPromises from 'node:fs/promises'
import path from 'node:path'
import { setTimeout as delay } from 'node:timers/promises'
import { extractBinary, detectArtifactKind, readArtifactHeader } from './archive'
import { INSTALLER_USER_AGENT, binaryFileName, toSupportedArch, toSupportedPlatform } from './config'
import { DownloaderError, isDownloaderError } from './errors'
import { scopedLoggers } from './logger'
import type { ResourceLocator } from './resource-locator'
import { MANAGED_TOOLS, TOOL_CATALOG } from './tool-catalog'
import type {
  InstallerStatus,
  LogLevel,
  LogSink,
  ReleaseAsset,
  SupportedArch,
  SupportedPlatform,
  ToolName
} from './types'

const DEFAULT_RETRIES = 3
const DEFAULT_RETRY_DELAY_MS = 1000
const DEFAULT_PROGRESS_INTERVAL_MS = 500

/**
 * Cancellation handle for an install pass. The flag is checked before every
 * chunk read; the signal aborts the in-flight request.
 */
export class InstallController {
  private readonly abortController = new AbortController()
  private task: Promise<boolean> | null = null
  private running = false

  stop(): void {
    if (!this.abortController.signal.aborted) {
      this.abortController.abort()
    }
  }

  shouldStop(): boolean {
    return this.abortController.signal.aborted
  }

  get signal(): AbortSignal {
    return this.abortController.signal
  }

  isRunning(): boolean {
    return this.running
  }

  /** Result of the tracked pass; false when nothing was tracked. */
  get done(): Promise<boolean> {
    return this.task ?? Promise.resolve(false)
  }

  track(task: Promise<boolean>): void {
    this.running = true
    this.task = task.finally(() => {
      this.running = false
    })
  }
}

export interface DependencyInstallerOptions {
  toolDir: string
  locator: ResourceLocator
  logSink?: LogSink
  platform?: SupportedPlatform
  arch?: SupportedArch
  fetch?: typeof fetch
  tools?: readonly ToolName[]
  retries?: number
  retryDelayMs?: number
  progressIntervalMs?: number
}

const parseSha256Digest = (digest?: string): string | null => {
  const match = digest?.trim().match(/^sha256:([a-f0-9]{64})$/i)
  return match?.[1] ? match[1].toLowerCase() : null
}

const formatKilobytes = (bytes: number): string => `${Math.floor(bytes / 1024)} KB`

const removeQuietly = async (filePath: string): Promise<void> => {
  try {
    await fsPromises.rm(filePath, { force: true })
  } catch (error) {
    scopedLoggers.installer.warn('Failed to remove temporary file:', filePath, error)
  }
}

export class DependencyInstaller {
  readonly toolDir: string
  private readonly locator: ResourceLocator
  private readonly logSink?: LogSink
  private readonly platform: SupportedPlatform
  private readonly arch: SupportedArch
  private readonly fetchImpl: typeof fetch
  private readonly tools: readonly ToolName[]
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly progressIntervalMs: number

  constructor(options: DependencyInstallerOptions) {
    this.toolDir = options.toolDir
    this.locator = options.locator
    this.logSink = options.logSink
    this.platform = options.platform ?? toSupportedPlatform()
    this.arch = options.arch ?? toSupportedArch()
    this.fetchImpl = options.fetch ?? fetch
    this.tools = options.tools ?? MANAGED_TOOLS
    this.retries = Math.max(options.retries ?? DEFAULT_RETRIES, 1)
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.progressIntervalMs = options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS
  }

  binaryPath(tool: ToolName): string {
    return path.join(this.toolDir, binaryFileName(TOOL_CATALOG[tool].binaryName, this.platform))
  }

  checkStatus(): InstallerStatus {
    const has = (tool: ToolName): boolean => fs.existsSync(this.binaryPath(tool))
    return {
      tools: {
        'yt-dlp': has('yt-dlp'),
        ffmpeg: has('ffmpeg'),
        aria2: has('aria2'),
        'N_m3u8DL-RE': has('N_m3u8DL-RE')
      },
      toolDir: this.toolDir
    }
  }

  /** Makes sure one tool is present in the tool directory. Never throws. */
  async ensure(tool: ToolName, controller?: InstallController): Promise<boolean> {
    const target = this.binaryPath(tool)
    if (fs.existsSync(target)) {
      this.emit(`${tool} found: ${target}`, 'success')
      return true
    }
    if (controller?.shouldStop()) {
      this.emit(`${tool} installation cancelled.`, 'warning')
      return false
    }

    const asset = await this.locator.resolveAsset(tool, this.platform, this.arch)
    if (!asset) {
      this.emit(`No ${tool} build is available for ${this.platform}-${this.arch}.`, 'warning')
      return false
    }

    const artifactPath = `${target}.download`
    const partPath = `${artifactPath}.part`
    const tmpPath = `${target}.tmp`

    try {
      await fsPromises.mkdir(this.toolDir, { recursive: true })
      this.emit(`Downloading ${tool}: ${asset.url}`, 'info')
      const downloaded = await this.downloadWithRetries(asset, artifactPath, tool, controller)
      if (!downloaded) {
        return false
      }

      const kind = detectArtifactKind(await readArtifactHeader(artifactPath), asset.name)
      scopedLoggers.installer.info(`Installing ${tool} from ${kind} artifact ${asset.name}`)
      const result = await extractBinary(artifactPath, kind, {
        binaryFileName: path.basename(target),
        platform: this.platform,
        binaryTarget: tmpPath,
        fallbackDir: path.join(this.toolDir, tool)
      })
      if (result.mode === 'all') {
        this.emit(
          `Extracted ${result.entries} files of ${tool} into ${result.directory}, but none of them is ${path.basename(target)}.`,
          'warning'
        )
        return false
      }

      if (this.platform !== 'win32') {
        await fsPromises.chmod(tmpPath, 0o755)
      }
      await fsPromises.rename(tmpPath, target)
      this.emit(`${tool} installed: ${target}`, 'success')
      return true
    } catch (error) {
      scopedLoggers.installer.error(`Failed to install ${tool}:`, error)
      const message = error instanceof Error ? error.message : String(error)
      this.emit(`Failed to install ${tool}: ${message}`, 'error')
      return false
    } finally {
      await removeQuietly(partPath)
      await removeQuietly(artifactPath)
      await removeQuietly(tmpPath)
    }
  }

  /**
   * Runs `ensure` for every managed tool, in order. A tool that cannot be
   * installed does not stop the others.
   */
  async ensureAll(controller?: InstallController): Promise<boolean> {
    const missing: ToolName[] = []
    for (const tool of this.tools) {
      if (controller?.shouldStop()) {
        this.emit('Installation cancelled.', 'warning')
        return false
      }
      const installed = await this.ensure(tool, controller)
      if (!installed) {
        missing.push(tool)
      }
    }

    if (missing.length === 0) {
      this.emit('All dependencies are ready.', 'success')
      return true
    }
    this.emit(`Some dependencies are not available: ${missing.join(', ')}`, 'warning')
    return false
  }

  /** Starts `ensureAll` in the background and hands back its controller. */
  ensureAllTracked(): InstallController {
    const controller = new InstallController()
    controller.track(this.ensureAll(controller))
    return controller
  }

  private async downloadWithRetries(
    asset: ReleaseAsset,
    destination: string,
    label: string,
    controller?: InstallController
  ): Promise<boolean> {
    for (let attempt = 0; attempt < this.retries; attempt += 1) {
      if (controller?.shouldStop()) {
        this.emit(`${label} download cancelled.`, 'warning')
        return false
      }

      try {
        await this.downloadOnce(asset, destination, label, controller)
        return true
      } catch (error) {
        await removeQuietly(`${destination}.part`)
        if (controller?.shouldStop() || (isDownloaderError(error) && error.kind === 'Cancelled')) {
          this.emit(`${label} download cancelled.`, 'warning')
          return false
        }

        const message = error instanceof Error ? error.message : String(error)
        scopedLoggers.installer.warn(`Download attempt ${attempt + 1} for ${label} failed:`, error)
        this.emit(`${label} download attempt ${attempt + 1}/${this.retries} failed: ${message}`, 'warning')

        if (attempt < this.retries - 1 && !(await this.waitBeforeRetry(attempt, controller))) {
          this.emit(`${label} download cancelled.`, 'warning')
          return false
        }
      }
    }

    this.emit(`${label} download failed after ${this.retries} attempts.`, 'error')
    return false
  }

  private async waitBeforeRetry(attempt: number, controller?: InstallController): Promise<boolean> {
    try {
      await delay(this.retryDelayMs * (1 + attempt), undefined, { signal: controller?.signal })
      return true
    } catch (error) {
      scopedLoggers.installer.debug('Retry wait interrupted:', error)
      return false
    }
  }

  private async downloadOnce(
    asset: ReleaseAsset,
    destination: string,
    label: string,
    controller?: InstallController
  ): Promise<void> {
    const partPath = `${destination}.part`
    const response = await this.fetchImpl(asset.url, {
      headers: { 'User-Agent': INSTALLER_USER_AGENT },
      signal: controller?.signal
    })
    if (!response.ok || !response.body) {
      throw new DownloaderError('NetworkFailure', `HTTP ${response.status} for ${asset.url}`)
    }

    const contentLength = Number(response.headers.get('content-length'))
    const expectedSize = contentLength > 0 ? contentLength : asset.size
    const hash = crypto.createHash('sha256')
    const startedAt = Date.now()
    let received = 0
    let lastProgressAt = 0

    const file = await fsPromises.open(partPath, 'w')
    const reader = response.body.getReader()
    try {
      while (true) {
        if (controller?.shouldStop()) {
          await reader
            .cancel()
            .catch((error: unknown) =>
              scopedLoggers.installer.debug('Failed to cancel response body:', error)
            )
          throw new DownloaderError('Cancelled', `${label} download cancelled.`)
        }

        const { done, value } = await reader.read()
        if (done) {
          break
        }
        await file.write(value)
        hash.update(value)
        received += value.byteLength

        const now = Date.now()
        if (now - lastProgressAt >= this.progressIntervalMs) {
          lastProgressAt = now
          this.emit(this.formatProgress(label, received, expectedSize, now - startedAt), 'info')
        }
      }
    } finally {
      await file.close()
    }

    if (expectedSize !== undefined && received !== expectedSize) {
      throw new DownloaderError(
        'NetworkFailure',
        `Size mismatch for ${asset.name}: expected ${expectedSize} bytes, received ${received}`
      )
    }
    const expectedDigest = parseSha256Digest(asset.digest)
    if (expectedDigest && expectedDigest !== hash.digest('hex')) {
      throw new DownloaderError('NetworkFailure', `Checksum mismatch for ${asset.name}`)
    }

    await fsPromises.rename(partPath, destination)
    this.emit(`${label} downloaded (${formatKilobytes(received)}).`, 'info')
  }

  private formatProgress(
    label: string,
    received: number,
    total: number | undefined,
    elapsedMs: number
  ): string {
    const speed = received / 1024 / Math.max(elapsedMs / 1000, 0.1)
    if (!total) {
      return `${label}: ${formatKilobytes(received)} at ${speed.toFixed(1)} KB/s`
    }
    const percent = ((received * 100) / total).toFixed(1)
    return `${label}: ${percent}% (${formatKilobytes(received)}) at ${speed.toFixed(1)} KB/s`
  }

  private emit(text: string, level: LogLevel): void {
    if (!this.logSink) {
      scopedLoggers.installer.info(text)
      return
    }
    try {
      this.logSink(text, level)
    } catch (error) {
      scopedLoggers.installer.warn('Log sink threw:', error)
    }
  }
}
