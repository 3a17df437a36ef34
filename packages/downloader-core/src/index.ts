export type { ArtifactKind, ExtractResult } from './archive'
export { detectArtifactKind, isSafeEntryPath, pickBinaryEntry } from './archive'
export type { BrowserCookiesSetting, SupportedBrowser } from './browser-cookies-setting'
export {
  SUPPORTED_BROWSERS,
  buildBrowserCookiesSetting,
  buildCookieSourceSetting,
  isSupportedBrowser,
  parseBrowserCookiesSetting,
  parseCookieSourceSetting,
  sanitizeCookieSource,
  supportedBrowsers
} from './browser-cookies-setting'
export type { CommandBuilderDeps } from './command-args'
export { buildCommand, formatCommand } from './command-args'
export type { AppPaths, ExecutionEnvironmentOptions } from './config'
export {
  DEFAULT_COOKIE_MAX_LENGTH,
  binaryFileName,
  createExecutionEnvironment,
  resolveAppPaths,
  resolvePathWithHome,
  toSupportedArch,
  toSupportedPlatform
} from './config'
export type { CookieCacheEntry } from './cookie-cache-store'
export { CookieCacheStore } from './cookie-cache-store'
export type { CookieResolution, CookieResolverOptions } from './cookie-resolver'
export { CookieResolver, collectCookiePairs, extractHost, matchesCookieDomain } from './cookie-resolver'
export type { DependencyInstallerOptions } from './dependency-installer'
export { DependencyInstaller, InstallController } from './dependency-installer'
export type { DownloaderCoreOptions } from './downloader-core'
export { DownloaderCore, REPAIR_TIP, createDownloadOptions } from './downloader-core'
export type { DownloaderErrorKind } from './errors'
export { DownloaderError, isDownloaderError, toDownloaderError } from './errors'
export type { HelperLink, HelperName } from './helper-links'
export { HELPER_NAMES, isHelperName, listHelperLinks, resolveHelperUrl } from './helper-links'
export { default as log, scopedLoggers } from './logger'
export type {
  OutputChannel,
  ProcessSupervisorOptions,
  SupervisorCommand,
  SupervisorStartOptions
} from './process-supervisor'
export { ProcessSupervisor, isErrorLine } from './process-supervisor'
export type { RegionProbeOptions, ResourceLocatorOptions } from './resource-locator'
export { ResourceLocator, detectRegion, selectAsset } from './resource-locator'
export type { AppSettings } from './schemas'
export {
  AppSettingsSchema,
  CookieSourceSchema,
  DownloadEngineSchema,
  DownloadOptionsSchema,
  RegionSchema
} from './schemas'
export type { ToolDefinition } from './tool-catalog'
export { MANAGED_TOOLS, TOOL_CATALOG, isManagedTool } from './tool-catalog'
export { findToolBinary, resolveToolPaths } from './tool-paths'
export type * from './types'
