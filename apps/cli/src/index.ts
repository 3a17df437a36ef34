import path from 'node:path'
import {
  CookieCacheStore,
  CookieResolver,
  DependencyInstaller,
  DownloaderCore,
  MANAGED_TOOLS,
  type Region,
  RegionSchema,
  ResourceLocator,
  type ToolName,
  createExecutionEnvironment,
  detectRegion,
  findToolBinary,
  isManagedTool,
  listHelperLinks,
  resolveAppPaths,
  scopedLoggers
} from '@streamgrab/downloader-core'
import { Command, InvalidArgumentError, Option } from 'commander'
import { createConsoleSink } from './console-sink'
import { type DownloadFlags, mergeDownloadInput, parseThreadCount } from './download-input'
import { configureLogger } from './logger-config'
import { SettingsStore, parseSettingKey, parseSettingValue } from './settings-store'

const paths = resolveAppPaths()
const settingsStore = new SettingsStore(paths.settingsFile)
const sink = createConsoleSink()

// Conventional exit status after SIGINT
const EXIT_INTERRUPTED = 130

const toThreadCount = (value: string): number => {
  try {
    return parseThreadCount(value)
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error))
  }
}

const toToolName = (value: string, previous: ToolName[] = []): ToolName[] => {
  if (!isManagedTool(value)) {
    throw new InvalidArgumentError(`Unknown tool. Use one of: ${MANAGED_TOOLS.join(', ')}`)
  }
  return [...previous, value]
}

/** Calls `stop` on the first Ctrl+C until `task` settles. */
const stopOnInterrupt = async <T>(task: { stop(): void; done: Promise<T> }): Promise<T> => {
  const onInterrupt = () => {
    sink('Stopping...', 'warning')
    task.stop()
  }
  process.once('SIGINT', onInterrupt)
  try {
    return await task.done
  } finally {
    process.off('SIGINT', onInterrupt)
  }
}

const resolveRegion = async (requested: string | undefined): Promise<Region> => {
  if (requested === 'auto') {
    const region = await detectRegion()
    sink(`Detected download region: ${region}`, 'info')
    return region
  }
  if (requested) {
    return RegionSchema.parse(requested)
  }
  return (await settingsStore.get()).region
}

const program = new Command()

program
  .name('streamgrab')
  .description('Download media with yt-dlp, aria2 or N_m3u8DL-RE and keep those tools installed')
  .version('0.1.0')
  .hook('preAction', () => {
    configureLogger(path.join(paths.configDir, 'logs'))
  })

program
  .command('download')
  .description('Download a URL with the selected engine')
  .argument('<url>', 'media page or playlist URL')
  .addOption(
    new Option('-e, --engine <engine>', 'download engine').choices([
      'native',
      'accelerated',
      'stream'
    ])
  )
  .option('-d, --dir <directory>', 'download directory (remembered)')
  .option('-t, --threads <count>', 'connections for the accelerated and stream engines', toThreadCount)
  .option('--cookies <file>', 'Netscape cookie file (remembered)')
  .option('--cookies-from-browser <browser>', 'read cookies from a browser, e.g. firefox:profile')
  .option('--no-cookies', 'do not send any cookies')
  .action(async (url: string, flags: DownloadFlags) => {
    const settings = await settingsStore.get()
    const { input, remember } = mergeDownloadInput(url, flags, settings)
    if (Object.keys(remember).length > 0) {
      await settingsStore.update(remember)
    }

    const core = new DownloaderCore({
      toolDir: paths.toolDir,
      cookieResolver: new CookieResolver({ store: new CookieCacheStore(paths.cookieCacheFile) })
    })
    const controller = core.runTracked(input, sink, (success, exitCode) => {
      scopedLoggers.download.info(`Download finished: success=${success} exitCode=${exitCode}`)
    })
    const result = await stopOnInterrupt(controller)

    if (result.status === 'cancelled') {
      process.exitCode = EXIT_INTERRUPTED
    } else {
      process.exitCode = result.success ? 0 : result.exitCode || 1
    }
  })

const deps = program.command('deps').description('Manage the download tools')

deps
  .command('status')
  .description('Show where each tool is found')
  .action(() => {
    const environment = createExecutionEnvironment({ toolDir: paths.toolDir })
    sink(`Tool directory: ${paths.toolDir}`, 'info')
    for (const tool of MANAGED_TOOLS) {
      const location = findToolBinary(tool, paths.toolDir, environment)
      if (location) {
        sink(`${tool}: ${location}`, 'success')
      } else {
        sink(`${tool}: not installed`, 'warning')
      }
    }
  })

deps
  .command('install')
  .description('Download missing tools into the tool directory')
  .addOption(
    new Option('--region <region>', 'release mirror region').choices(['global', 'cn', 'auto'])
  )
  .option('--only <tool>', 'install only this tool (repeatable)', toToolName)
  .action(async (options: { region?: string; only?: ToolName[] }) => {
    const region = await resolveRegion(options.region)
    const installer = new DependencyInstaller({
      toolDir: paths.toolDir,
      locator: new ResourceLocator({ region }),
      logSink: sink,
      tools: options.only
    })
    const ready = await stopOnInterrupt(installer.ensureAllTracked())
    process.exitCode = ready ? 0 : 1
  })

program
  .command('links')
  .description('Show where to get the browser helper extensions')
  .addOption(new Option('--region <region>', 'link mirror region').choices(['global', 'cn', 'auto']))
  .action(async (options: { region?: string }) => {
    const region = await resolveRegion(options.region)
    for (const helper of listHelperLinks(region)) {
      sink(`${helper.name}: ${helper.description}`, 'info')
      sink(`  ${helper.url}`, 'info')
    }
  })

const config = program.command('config').description('Read or change saved settings')

config
  .command('show')
  .description('Print the saved settings')
  .action(async () => {
    const settings = await settingsStore.get()
    process.stdout.write(`${JSON.stringify({ ...settings, settingsFile: paths.settingsFile }, null, 2)}\n`)
  })

config
  .command('set')
  .description('Change one saved setting')
  .argument('<key>', 'setting name')
  .argument('<value>', 'new value')
  .action(async (key: string, value: string) => {
    const settingKey = parseSettingKey(key)
    await settingsStore.update(parseSettingValue(settingKey, value))
    sink(`${settingKey} saved.`, 'success')
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  scopedLoggers.system.error('Command failed:', error)
  sink(message, 'error')
  process.exitCode = 1
})
