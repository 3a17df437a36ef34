import { execSync } from 'node:child_process'
import fs from 'node:fs'
import path from 'node:path'
import { binaryFileName } from './config'
import { scopedLoggers } from './logger'
import { TOOL_CATALOG } from './tool-catalog'
import type { ExecutionEnvironment, ToolName, ToolPaths } from './types'

// Explicit overrides, checked before the tool directory
const TOOL_PATH_ENV_KEYS: Record<ToolName, string> = {
  'yt-dlp': 'YTDLP_PATH',
  ffmpeg: 'FFMPEG_PATH',
  aria2: 'ARIA2C_PATH',
  'N_m3u8DL-RE': 'N_M3U8DL_RE_PATH'
}

const isFile = (candidate: string): boolean => {
  try {
    return fs.statSync(candidate).isFile()
  } catch {
    return false
  }
}

const lookupOnPath = (fileName: string, environment: ExecutionEnvironment): string | undefined => {
  const command = environment.platform === 'win32' ? `where ${fileName}` : `which ${fileName}`
  try {
    const output = execSync(command, {
      env: environment.env,
      stdio: ['ignore', 'pipe', 'ignore'],
      windowsHide: true
    })
      .toString()
      .split(/\r?\n/)[0]
      ?.trim()
    if (output && isFile(output)) {
      return output
    }
  } catch {
    // Not on PATH
  }
  return undefined
}

/**
 * Locates one managed tool: environment override, then the tool directory,
 * then the PATH of the execution environment.
 */
export const findToolBinary = (
  tool: ToolName,
  toolDir: string,
  environment: ExecutionEnvironment
): string | undefined => {
  const override = environment.env[TOOL_PATH_ENV_KEYS[tool]]?.trim()
  if (override && isFile(override)) {
    scopedLoggers.system.debug(`Using ${tool} from ${TOOL_PATH_ENV_KEYS[tool]}:`, override)
    return override
  }

  const fileName = binaryFileName(TOOL_CATALOG[tool].binaryName, environment.platform)
  const managed = path.join(toolDir, fileName)
  if (isFile(managed)) {
    return managed
  }

  const system = lookupOnPath(fileName, environment)
  if (system) {
    scopedLoggers.system.debug(`Using system ${tool}:`, system)
  }
  return system
}

export const resolveToolPaths = (toolDir: string, environment: ExecutionEnvironment): ToolPaths => ({
  ytDlp: findToolBinary('yt-dlp', toolDir, environment),
  ffmpeg: findToolBinary('ffmpeg', toolDir, environment),
  aria2c: findToolBinary('aria2', toolDir, environment),
  streamTool: findToolBinary('N_m3u8DL-RE', toolDir, environment)
})
