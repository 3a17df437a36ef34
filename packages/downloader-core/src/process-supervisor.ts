import { type ChildProcess, spawn } from 'node:child_process'
import crypto from 'node:crypto'
import { once } from 'node:events'
import net from 'node:net'
import os from 'node:os'
import path from 'node:path'
import readline from 'node:readline'
import { toSupportedPlatform } from './config'
import { DownloaderError } from './errors'
import { scopedLoggers } from './logger'
import type { ProcessOutcome, ProcessStatus, SupportedPlatform } from './types'

export interface SupervisorCommand {
  executable: string
  args: readonly string[]
}

export interface SupervisorStartOptions {
  /** Receives stdout and stderr lines in the order the process wrote them. */
  onLine?: (line: string) => void
  env?: NodeJS.ProcessEnv
  cwd?: string
}

export interface ProcessSupervisorOptions {
  platform?: SupportedPlatform
  /** Time between the stop signal and the forced kill. */
  killGraceMs?: number
}

// Advisory only: a match marks the run as failed even on exit code 0
export const ERROR_LINE_PATTERNS = ['error', '403', 'not found', 'failed', 'exception'] as const

const DEFAULT_KILL_GRACE_MS = 5000

export const isErrorLine = (line: string): boolean => {
  const lowered = line.toLowerCase()
  return ERROR_LINE_PATTERNS.some((pattern) => lowered.includes(pattern))
}

const isNoSuchProcess = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ESRCH'

export interface OutputChannel {
  /** Handed to the child as both fd 1 and fd 2. */
  writer: net.Socket
  /** Parent end of the channel. */
  reader: net.Socket
}

const channelAddress = (): string => {
  const name = `streamgrab-${process.pid}-${crypto.randomBytes(6).toString('hex')}`
  return process.platform === 'win32'
    ? `\\\\.\\pipe\\${name}`
    : path.join(os.tmpdir(), `${name}.sock`)
}

/**
 * Opens a local socket pair. Giving the same socket to the child as stdout
 * and stderr merges both streams in write order, like `2>&1`.
 */
export const openOutputChannel = async (): Promise<OutputChannel> => {
  const server = net.createServer()
  const accepted = new Promise<net.Socket>((resolve) => {
    server.once('connection', resolve)
  })
  const address = channelAddress()

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(address, () => resolve())
    })
    const writer = net.createConnection(address)
    await new Promise<void>((resolve, reject) => {
      writer.once('connect', () => resolve())
      writer.once('error', reject)
    })
    return { writer, reader: await accepted }
  } finally {
    // Removes the socket file; established connections stay open
    server.close()
  }
}

/**
 * Owns at most one child process at a time and reports how it ended.
 */
export class ProcessSupervisor {
  private readonly platform: SupportedPlatform
  private readonly killGraceMs: number
  private child: ChildProcess | null = null
  private state: ProcessStatus = 'idle'
  private stopRequested = false
  private onTerminate: (() => void) | null = null

  constructor(options: ProcessSupervisorOptions = {}) {
    this.platform = options.platform ?? toSupportedPlatform()
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS
  }

  get status(): ProcessStatus {
    return this.state
  }

  isRunning(): boolean {
    return this.state === 'starting' || this.state === 'running'
  }

  /**
   * Spawns the command and resolves once it has exited and its output is
   * drained. After `stop()` it resolves as soon as the process exits, even
   * if orphaned descendants still hold the output open. Only rejects when a
   * process is already running.
   */
  start(command: SupervisorCommand, options: SupervisorStartOptions = {}): Promise<ProcessOutcome> {
    if (this.isRunning()) {
      return Promise.reject(new Error('A process is already running.'))
    }

    this.stopRequested = false
    this.state = 'starting'
    return this.run(command, options)
  }

  /** Terminates the running process and its descendants. No-op when idle. */
  stop(): void {
    if (!this.isRunning() || this.stopRequested) {
      return
    }
    this.stopRequested = true
    const child = this.child
    if (child && this.state === 'running') {
      this.terminate(child)
    }
  }

  private async run(
    command: SupervisorCommand,
    options: SupervisorStartOptions
  ): Promise<ProcessOutcome> {
    let channel: OutputChannel
    try {
      channel = await openOutputChannel()
    } catch (error) {
      return this.finish(command, this.spawnFailure(command, error))
    }

    if (this.stopRequested) {
      channel.writer.destroy()
      channel.reader.destroy()
      return this.finish(command, {
        status: 'cancelled',
        success: false,
        exitCode: null,
        signal: null,
        errorDetected: false
      })
    }

    return new Promise<ProcessOutcome>((resolve) => {
      let settled = false
      let spawned = false
      let errorDetected = false
      let killTimer: NodeJS.Timeout | undefined

      const { writer, reader } = channel
      reader.on('error', (error) => {
        scopedLoggers.process.warn('Output channel error:', error)
      })
      const lines = readline.createInterface({ input: reader, crlfDelay: Infinity })
      const drained = once(lines, 'close')
      lines.on('line', (line) => {
        if (isErrorLine(line)) {
          errorDetected = true
        }
        try {
          options.onLine?.(line)
        } catch (error) {
          scopedLoggers.process.warn('Line handler threw:', error)
        }
      })

      const settle = (outcome: ProcessOutcome): void => {
        if (settled) {
          return
        }
        settled = true
        if (!this.stopRequested) {
          clearTimeout(killTimer)
        }
        lines.close()
        reader.destroy()
        resolve(this.finish(command, outcome))
      }

      let child: ChildProcess
      try {
        child = spawn(command.executable, [...command.args], {
          env: options.env,
          cwd: options.cwd,
          stdio: ['ignore', writer, writer],
          // Own process group, so stop() reaches the tool's helpers too
          detached: this.platform !== 'win32',
          windowsHide: true
        })
      } catch (error) {
        writer.destroy()
        settle(this.spawnFailure(command, error))
        return
      }
      // The child holds its own copies of the socket
      writer.destroy()
      this.child = child

      child.once('spawn', () => {
        spawned = true
        this.state = 'running'
        scopedLoggers.process.info(`Started ${command.executable} (pid ${child.pid ?? 'unknown'})`)
        if (this.stopRequested) {
          this.terminate(child)
        }
      })

      child.once('error', (error) => {
        if (!spawned) {
          settle(this.spawnFailure(command, error))
          return
        }
        scopedLoggers.process.warn('Child process error:', error)
      })

      child.once('exit', (code, signal) => {
        if (this.stopRequested) {
          settle({ status: 'cancelled', success: false, exitCode: code, signal, errorDetected })
          return
        }
        const finishRun = (): void => {
          if (this.stopRequested) {
            settle({ status: 'cancelled', success: false, exitCode: code, signal, errorDetected })
            return
          }
          const success = code === 0 && !errorDetected
          settle({
            status: success ? 'completed' : 'failed',
            success,
            exitCode: code,
            signal,
            errorDetected,
            error: success
              ? undefined
              : new DownloaderError(
                  'RuntimeFailure',
                  code === 0
                    ? `${command.executable} reported errors in its output.`
                    : `${command.executable} exited with code ${code ?? signal ?? 'unknown'}.`
                )
          })
        }
        void drained.then(finishRun, finishRun)
      })

      // Escalation for tools that ignore SIGTERM. Runs even after the child
      // exited, since descendants may still be alive in its group.
      this.onTerminate = () => {
        if (killTimer === undefined && this.platform !== 'win32') {
          killTimer = setTimeout(() => this.signalTree(child, 'SIGKILL'), this.killGraceMs)
          killTimer.unref()
        }
      }
    })
  }

  private spawnFailure(command: SupervisorCommand, error: unknown): ProcessOutcome {
    return {
      status: 'failed',
      success: false,
      exitCode: null,
      signal: null,
      errorDetected: false,
      error: new DownloaderError(
        'ProcessSpawnFailure',
        `Failed to start ${command.executable}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
    }
  }

  private finish(command: SupervisorCommand, outcome: ProcessOutcome): ProcessOutcome {
    this.child = null
    this.onTerminate = null
    this.state = outcome.status
    scopedLoggers.process.info(
      `${command.executable} finished: ${outcome.status} (code ${outcome.exitCode ?? 'none'})`
    )
    return outcome
  }

  private terminate(child: ChildProcess): void {
    if (this.platform === 'win32' && child.pid !== undefined) {
      const killer = spawn('taskkill', ['/F', '/T', '/PID', String(child.pid)], { windowsHide: true })
      killer.once('error', (error) => {
        scopedLoggers.process.warn('taskkill failed, falling back to kill():', error)
        child.kill()
      })
      return
    }
    this.signalTree(child, 'SIGTERM')
    this.onTerminate?.()
  }

  private signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid !== undefined && this.platform !== 'win32') {
      try {
        // Negative pid addresses the whole process group
        process.kill(-child.pid, signal)
        return
      } catch (error) {
        if (isNoSuchProcess(error)) {
          return
        }
        scopedLoggers.process.warn(`Could not signal process group ${child.pid}:`, error)
      }
    }
    child.kill(signal)
  }
}
