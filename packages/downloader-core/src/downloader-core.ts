import fsPromises from 'node:fs/promises'
import { isSupportedBrowser, supportedBrowsers } from './browser-cookies-setting'
import { buildCommand, formatCommand } from './command-args'
import { createExecutionEnvironment, resolveAppPaths, toSupportedPlatform } from './config'
import { CookieResolver } from './cookie-resolver'
import { DownloaderError, toDownloaderError } from './errors'
import { scopedLoggers } from './logger'
import { ProcessSupervisor } from './process-supervisor'
import { DownloadOptionsSchema } from './schemas'
import { resolveToolPaths } from './tool-paths'
import type {
  CompletionCallback,
  DownloadController,
  DownloadOptions,
  DownloadOptionsInput,
  DownloadResult,
  ExecutionEnvironment,
  LogLevel,
  LogSink,
  ProcessOutcome,
  SupportedPlatform,
  ToolPaths
} from './types'

export interface DownloaderCoreOptions {
  /** Fixed executable paths. When omitted they are looked up on every run. */
  toolPaths?: ToolPaths
  toolDir?: string
  environment?: ExecutionEnvironment
  cookieResolver?: CookieResolver
  cookieMaxLength?: number
  platform?: SupportedPlatform
}

type Emit = (text: string, level: LogLevel | null) => void

export const REPAIR_TIP = 'Tip: if this keeps happening, reinstall the download tools.'

const FAILED_RESULT: DownloadResult = { success: false, exitCode: null, status: 'failed' }
const STOPPED_RESULT: DownloadResult = { success: false, exitCode: null, status: 'cancelled' }

/**
 * Validates caller input into immutable download options. Throws
 * `InvalidInput` listing every problem, including a browser whose cookies
 * cannot be read on `platform`.
 */
export const createDownloadOptions = (
  input: DownloadOptionsInput,
  platform: SupportedPlatform = toSupportedPlatform()
): DownloadOptions => {
  const parsed = DownloadOptionsSchema.safeParse(input)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message
    )
    throw new DownloaderError('InvalidInput', `Invalid download options: ${problems.join('; ')}`)
  }
  const { cookieSource } = parsed.data
  if (cookieSource.type === 'browser' && !isSupportedBrowser(cookieSource.browser, platform)) {
    throw new DownloaderError(
      'InvalidInput',
      `Invalid download options: cookieSource.browser: Browser "${cookieSource.browser}" is not supported on ${platform}. Use one of: ${supportedBrowsers(platform).join(', ')}`
    )
  }
  return Object.freeze({
    ...parsed.data,
    cookieSource: Object.freeze({ ...parsed.data.cookieSource })
  })
}

const createEmitter = (logSink: LogSink): Emit => (text, level) => {
  try {
    logSink(text, level)
  } catch (error) {
    scopedLoggers.download.warn('Log sink threw:', error)
  }
}

export class DownloaderCore {
  readonly environment: ExecutionEnvironment
  private readonly platform: SupportedPlatform
  private readonly toolDir: string
  private readonly toolPaths?: ToolPaths
  private readonly cookieResolver: CookieResolver
  private readonly cookieMaxLength?: number

  constructor(options: DownloaderCoreOptions = {}) {
    this.platform = options.environment?.platform ?? options.platform ?? toSupportedPlatform()
    this.toolDir = options.toolDir ?? resolveAppPaths().toolDir
    this.environment =
      options.environment ??
      createExecutionEnvironment({ platform: this.platform, toolDir: this.toolDir })
    this.toolPaths = options.toolPaths
    this.cookieResolver = options.cookieResolver ?? new CookieResolver()
    this.cookieMaxLength = options.cookieMaxLength
  }

  getToolPaths(): ToolPaths {
    return this.toolPaths ?? resolveToolPaths(this.toolDir, this.environment)
  }

  /**
   * Runs one download to completion. Every problem is reported through the
   * sink and folded into the result; the promise never rejects.
   */
  runBlocking(input: DownloadOptionsInput, logSink: LogSink): Promise<DownloadResult> {
    const supervisor = new ProcessSupervisor({ platform: this.platform })
    return this.execute(input, createEmitter(logSink), supervisor, () => false)
  }

  /**
   * Starts a download in the background. `onDone` fires exactly once, after
   * the returned controller's `done` settles.
   */
  runTracked(
    input: DownloadOptionsInput,
    logSink: LogSink,
    onDone: CompletionCallback
  ): DownloadController {
    const supervisor = new ProcessSupervisor({ platform: this.platform })
    let running = true
    let stopRequested = false

    const done = this.execute(input, createEmitter(logSink), supervisor, () => stopRequested).then(
      (result) => {
        running = false
        try {
          onDone(result.success, result.exitCode)
        } catch (error) {
          scopedLoggers.download.warn('Completion callback threw:', error)
        }
        return result
      }
    )

    return {
      stop: () => {
        stopRequested = true
        supervisor.stop()
      },
      isRunning: () => running,
      done
    }
  }

  private async execute(
    input: DownloadOptionsInput,
    emit: Emit,
    supervisor: ProcessSupervisor,
    shouldStop: () => boolean
  ): Promise<DownloadResult> {
    try {
      const options = createDownloadOptions(input, this.platform)
      const plan = buildCommand(options, this.getToolPaths(), {
        cookieResolver: this.cookieResolver,
        cookieMaxLength: this.cookieMaxLength
      })
      for (const advisory of plan.advisories) {
        emit(advisory.message, advisory.level)
      }

      await fsPromises.mkdir(options.downloadDir, { recursive: true })
      emit(`Execute: ${formatCommand(plan)}`, 'info')
      scopedLoggers.download.info('Starting download:', options.engine, options.url)

      if (shouldStop()) {
        emit('Download stopped.', 'warning')
        return { ...STOPPED_RESULT }
      }

      const outcome = await supervisor.start(plan, {
        env: this.environment.env,
        cwd: options.downloadDir,
        onLine: (line) => emit(line, null)
      })
      return this.report(outcome, emit)
    } catch (error) {
      const failure = toDownloaderError(error, 'RuntimeFailure')
      scopedLoggers.download.error(`Download failed (${failure.kind}):`, failure.message)
      if (failure.kind === 'ToolUnavailable') {
        emit(failure.message, 'warning')
        emit(REPAIR_TIP, 'info')
      } else {
        emit(failure.message, 'error')
      }
      return { ...FAILED_RESULT }
    }
  }

  private report(outcome: ProcessOutcome, emit: Emit): DownloadResult {
    const result: DownloadResult = {
      success: outcome.success,
      exitCode: outcome.exitCode,
      status: outcome.status
    }

    switch (outcome.status) {
      case 'completed':
        emit('Download completed.', 'success')
        break
      case 'cancelled':
        emit('Download stopped.', 'warning')
        break
      case 'failed':
        emit(outcome.error?.message ?? 'Download failed.', 'error')
        if (outcome.errorDetected || outcome.error?.kind === 'ProcessSpawnFailure') {
          emit(REPAIR_TIP, 'info')
        }
        break
    }
    return result
  }
}
