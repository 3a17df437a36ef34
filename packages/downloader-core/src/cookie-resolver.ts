import fs from 'node:fs'
import { COOKIE_CACHE_MAX_ENTRIES, DEFAULT_COOKIE_MAX_LENGTH } from './config'
import type { CookieCacheEntry, CookieCacheStore } from './cookie-cache-store'
import { scopedLoggers } from './logger'

export interface CookieResolution {
  header: string
  matched: number
  truncated: boolean
}

export interface CookieResolverOptions {
  maxEntries?: number
  /** Persists matched headers between runs. */
  store?: CookieCacheStore
  readFile?: (filePath: string) => Buffer
}

const EMPTY_RESOLUTION: CookieResolution = { header: '', matched: 0, truncated: false }
const MIN_COOKIE_FIELDS = 7

const defaultReadFile = (filePath: string): Buffer => fs.readFileSync(filePath)

const cacheKey = (filePath: string, mtimeMs: number, host: string, maxLength: number): string =>
  JSON.stringify([filePath, mtimeMs, host, maxLength])

export const extractHost = (targetUrl: string): string => {
  try {
    return new URL(targetUrl.trim()).hostname.toLowerCase()
  } catch {
    return ''
  }
}

/**
 * Bidirectional substring match between a cookie domain and the target host.
 * Loose on purpose so subdomain cookies are never missed; it also pairs
 * unrelated hosts such as `a.com` and `notreallya.com`.
 */
export const matchesCookieDomain = (domainField: string, host: string): boolean => {
  const domain = domainField.trim().toLowerCase()
  if (!domain || !host) {
    return false
  }
  const bare = domain.replace(/^\.+|\.+$/g, '')
  return (bare !== '' && host.includes(bare)) || domain.includes(host)
}

/**
 * Collects `name=value` pairs for `host` from Netscape cookie export text,
 * in file order.
 */
export const collectCookiePairs = (content: string, host: string): string[] => {
  const pairs: string[] = []
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line || line.startsWith('#')) {
      continue
    }
    const fields = line.split('\t')
    if (fields.length < MIN_COOKIE_FIELDS) {
      continue
    }
    const [domain, , , , , name, value] = fields
    if (matchesCookieDomain(domain, host)) {
      pairs.push(`${name}=${value}`)
    }
  }
  return pairs
}

export class CookieResolver {
  private readonly cache = new Map<string, CookieCacheEntry>()
  private readonly maxEntries: number
  private readonly store?: CookieCacheStore
  private readonly readFile: (filePath: string) => Buffer
  private restored = false

  constructor(options: CookieResolverOptions = {}) {
    this.maxEntries = Math.max(options.maxEntries ?? COOKIE_CACHE_MAX_ENTRIES, 1)
    this.store = options.store
    this.readFile = options.readFile ?? defaultReadFile
  }

  /**
   * Returns the `Cookie` header value for `targetUrl` built from the cookie
   * export at `filePath`, or an empty string when nothing applies.
   */
  resolve(filePath: string, targetUrl: string, maxLength = DEFAULT_COOKIE_MAX_LENGTH): string {
    return this.resolveDetailed(filePath, targetUrl, maxLength).header
  }

  resolveDetailed(
    filePath: string,
    targetUrl: string,
    maxLength = DEFAULT_COOKIE_MAX_LENGTH
  ): CookieResolution {
    const host = extractHost(targetUrl)
    if (!host || !filePath) {
      return EMPTY_RESOLUTION
    }

    let mtimeMs: number
    try {
      const stats = fs.statSync(filePath)
      if (!stats.isFile()) {
        return EMPTY_RESOLUTION
      }
      mtimeMs = stats.mtimeMs
    } catch {
      return EMPTY_RESOLUTION
    }

    this.restoreFromStore()
    this.dropStaleEntries(filePath, mtimeMs)

    const key = cacheKey(filePath, mtimeMs, host, maxLength)
    const cached = this.cache.get(key)
    if (cached) {
      this.cache.delete(key)
      this.cache.set(key, cached)
      return { header: cached.header, matched: cached.matched, truncated: cached.truncated }
    }

    let content: string
    try {
      // Invalid UTF-8 sequences are dropped rather than replaced
      content = this.readFile(filePath).toString('utf8').replace(/\uFFFD/g, '')
    } catch (error) {
      scopedLoggers.cookies.warn('Failed to read cookie file:', filePath, error)
      return EMPTY_RESOLUTION
    }

    const pairs = collectCookiePairs(content, host)
    const joined = pairs.join('; ')
    const truncated = joined.length > maxLength
    const entry: CookieCacheEntry = {
      filePath,
      mtimeMs,
      host,
      maxLength,
      header: truncated ? joined.slice(0, maxLength) : joined,
      matched: pairs.length,
      truncated
    }
    scopedLoggers.cookies.debug(`Matched ${pairs.length} cookies for ${host}`)
    this.remember(key, entry)
    return { header: entry.header, matched: entry.matched, truncated: entry.truncated }
  }

  get size(): number {
    return this.cache.size
  }

  clear(): void {
    this.cache.clear()
    this.persist()
  }

  /** Resolves once every queued cache write has reached the disk. */
  flush(): Promise<void> {
    return this.store?.flush() ?? Promise.resolve()
  }

  private remember(key: string, entry: CookieCacheEntry): void {
    this.cache.set(key, entry)
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next()
      if (oldest.done) {
        break
      }
      this.cache.delete(oldest.value)
    }
    this.persist()
  }

  private dropStaleEntries(filePath: string, mtimeMs: number): void {
    let dropped = false
    for (const [key, entry] of this.cache) {
      if (entry.filePath === filePath && entry.mtimeMs !== mtimeMs) {
        this.cache.delete(key)
        dropped = true
      }
    }
    if (dropped) {
      this.persist()
    }
  }

  private restoreFromStore(): void {
    if (this.restored || !this.store) {
      return
    }
    this.restored = true
    for (const entry of this.store.load().slice(-this.maxEntries)) {
      this.cache.set(cacheKey(entry.filePath, entry.mtimeMs, entry.host, entry.maxLength), entry)
    }
  }

  private persist(): void {
    if (!this.store) {
      return
    }
    void this.store.save([...this.cache.values()])
  }
}
