import { describe, expect, it } from 'vitest'
import { ProcessSupervisor, isErrorLine } from '../src/process-supervisor'

const nodeScript = (script: string) => ({ executable: process.execPath, args: ['-e', script] })

describe('isErrorLine', () => {
  it('matches the error keywords case-insensitively', () => {
    expect(isErrorLine('ERROR: Unable to extract')).toBe(true)
    expect(isErrorLine('HTTP Error 403: Forbidden')).toBe(true)
    expect(isErrorLine('Requested format is not available, Not Found')).toBe(true)
    expect(isErrorLine('[download]  42.0% of 10.00MiB')).toBe(false)
  })
})

describe('ProcessSupervisor', () => {
  it('forwards every line and completes on exit code 0', async () => {
    const supervisor = new ProcessSupervisor()
    const lines: string[] = []

    const outcome = await supervisor.start(
      nodeScript("console.log('first'); console.log('second'); console.error('progress 50%')"),
      { onLine: (line) => lines.push(line) }
    )

    expect(outcome).toEqual({
      status: 'completed',
      success: true,
      exitCode: 0,
      signal: null,
      errorDetected: false,
      error: undefined
    })
    expect(lines).toEqual(['first', 'second', 'progress 50%'])
    expect(supervisor.status).toBe('completed')
    expect(supervisor.isRunning()).toBe(false)
  })

  it('keeps stdout and stderr lines in the order they were written', async () => {
    const supervisor = new ProcessSupervisor()
    const lines: string[] = []

    await supervisor.start(
      nodeScript(
        "const fs = require('node:fs'); for (let i = 0; i < 200; i++) fs.writeSync(i % 3 === 0 ? 2 : 1, 'line ' + i + '\\n')"
      ),
      { onLine: (line) => lines.push(line) }
    )

    expect(lines).toEqual(Array.from({ length: 200 }, (_, i) => `line ${i}`))
  })

  it('fails on a non-zero exit code', async () => {
    const supervisor = new ProcessSupervisor()

    const outcome = await supervisor.start(nodeScript('process.exit(3)'))

    expect(outcome.status).toBe('failed')
    expect(outcome.exitCode).toBe(3)
    expect(outcome.errorDetected).toBe(false)
    expect(outcome.error).toMatchObject({
      kind: 'RuntimeFailure',
      message: `${process.execPath} exited with code 3.`
    })
  })

  it('fails when the output reports an error despite exit code 0', async () => {
    const supervisor = new ProcessSupervisor()

    const outcome = await supervisor.start(
      nodeScript("console.error('ERROR: unable to download video data: HTTP Error 403')")
    )

    expect(outcome).toMatchObject({
      status: 'failed',
      success: false,
      exitCode: 0,
      errorDetected: true,
      error: { kind: 'RuntimeFailure', message: `${process.execPath} reported errors in its output.` }
    })
  })

  it('reports a spawn failure for a missing executable', async () => {
    const supervisor = new ProcessSupervisor()
    const executable = '/nonexistent/streamgrab-missing-tool'

    const outcome = await supervisor.start({ executable, args: [] })

    expect(outcome.status).toBe('failed')
    expect(outcome.exitCode).toBeNull()
    expect(outcome.error?.kind).toBe('ProcessSpawnFailure')
    expect(outcome.error?.message.startsWith(`Failed to start ${executable}: `)).toBe(true)
    expect(supervisor.isRunning()).toBe(false)
  })

  it('cancels a running process on stop', async () => {
    const supervisor = new ProcessSupervisor()

    const outcome = await supervisor.start(
      nodeScript("console.log('ready'); setInterval(() => {}, 1000)"),
      {
        onLine: (line) => {
          if (line === 'ready') {
            supervisor.stop()
          }
        }
      }
    )

    expect(outcome).toMatchObject({ status: 'cancelled', success: false, errorDetected: false })
    if (process.platform !== 'win32') {
      expect(outcome.signal).toBe('SIGTERM')
    }
    expect(supervisor.status).toBe('cancelled')
  })

  it.skipIf(process.platform === 'win32')(
    'stops descendants that share the output without waiting for them',
    async () => {
      const supervisor = new ProcessSupervisor()
      const script = [
        "const { spawn } = require('node:child_process')",
        "spawn(process.execPath, ['-e', 'setTimeout(() => {}, 8000)'], { stdio: 'inherit' })",
        "console.log('ready')",
        'setInterval(() => {}, 1000)'
      ].join('; ')
      const startedAt = Date.now()

      const outcome = await supervisor.start(nodeScript(script), {
        onLine: (line) => {
          if (line === 'ready') {
            supervisor.stop()
          }
        }
      })

      expect(outcome.status).toBe('cancelled')
      expect(Date.now() - startedAt).toBeLessThan(3000)
    }
  )

  it.skipIf(process.platform === 'win32')(
    'returns after stop when a descendant ignores the stop signal',
    async () => {
      const supervisor = new ProcessSupervisor({ killGraceMs: 200 })
      const script = [
        "const { spawn } = require('node:child_process')",
        "spawn(process.execPath, ['-e', \"process.on('SIGTERM', () => {}); setTimeout(() => {}, 8000)\"], { stdio: 'inherit' })",
        "setTimeout(() => console.log('ready'), 300)",
        'setInterval(() => {}, 1000)'
      ].join('; ')
      const startedAt = Date.now()

      const outcome = await supervisor.start(nodeScript(script), {
        onLine: (line) => {
          if (line === 'ready') {
            supervisor.stop()
          }
        }
      })

      expect(outcome.status).toBe('cancelled')
      expect(Date.now() - startedAt).toBeLessThan(3000)
    }
  )

  it('falls back to kill() when taskkill cannot run', async () => {
    // On non-Windows hosts taskkill is missing, so only the fallback can stop the child
    const supervisor = new ProcessSupervisor({ platform: 'win32' })

    const outcome = await supervisor.start(
      nodeScript("console.log('ready'); setInterval(() => {}, 1000)"),
      {
        onLine: (line) => {
          if (line === 'ready') {
            supervisor.stop()
          }
        }
      }
    )

    expect(outcome.status).toBe('cancelled')
  })

  it('cancels without spawning when stopped while starting', async () => {
    const supervisor = new ProcessSupervisor()
    const lines: string[] = []

    const pending = supervisor.start(nodeScript("console.log('should not run')"), {
      onLine: (line) => lines.push(line)
    })
    expect(supervisor.status).toBe('starting')
    supervisor.stop()

    await expect(pending).resolves.toEqual({
      status: 'cancelled',
      success: false,
      exitCode: null,
      signal: null,
      errorDetected: false
    })
    expect(lines).toEqual([])
    expect(supervisor.isRunning()).toBe(false)
  })

  it('runs one process at a time', async () => {
    const supervisor = new ProcessSupervisor()
    let markReady: () => void = () => {}
    const ready = new Promise<void>((resolve) => {
      markReady = resolve
    })

    const first = supervisor.start(nodeScript("console.log('ready'); setInterval(() => {}, 1000)"), {
      onLine: (line) => {
        if (line === 'ready') {
          markReady()
        }
      }
    })
    await ready

    await expect(supervisor.start(nodeScript('0'))).rejects.toThrow('A process is already running.')

    supervisor.stop()
    await expect(first).resolves.toMatchObject({ status: 'cancelled' })
  })

  it('ignores stop when idle', () => {
    const supervisor = new ProcessSupervisor()

    supervisor.stop()

    expect(supervisor.status).toBe('idle')
  })
})
