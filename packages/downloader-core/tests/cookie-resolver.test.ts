import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CookieCacheStore } from '../src/cookie-cache-store'
import { CookieResolver, collectCookiePairs, matchesCookieDomain } from '../src/cookie-resolver'
import { cookieLine, createTempDir, removeDir } from './helpers'

describe('CookieResolver', () => {
  let dir: string
  let cookieFile: string

  beforeEach(() => {
    dir = createTempDir()
    cookieFile = path.join(dir, 'cookies.txt')
  })

  afterEach(() => {
    removeDir(dir)
  })

  it('builds a header from matching cookies', () => {
    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'abc123')}\n`)
    const resolver = new CookieResolver()

    expect(resolver.resolve(cookieFile, 'https://sub.example.com/video')).toBe('sid=abc123')
  })

  it('skips comments, blank lines and short records and keeps file order', () => {
    fs.writeFileSync(
      cookieFile,
      [
        '# Netscape HTTP Cookie File',
        '',
        'broken\tline',
        cookieLine('.example.com', 'a', '1'),
        cookieLine('other.org', 'b', '2'),
        cookieLine('www.example.com', 'c', '3')
      ].join('\n')
    )
    const resolver = new CookieResolver()

    expect(resolver.resolve(cookieFile, 'https://www.example.com/')).toBe('a=1; c=3')
  })

  it('returns an empty string when nothing applies', () => {
    fs.writeFileSync(cookieFile, `${cookieLine('other.org', 'b', '2')}\n`)
    const resolver = new CookieResolver()

    expect(resolver.resolve(cookieFile, 'https://example.com/')).toBe('')
    expect(resolver.resolve(path.join(dir, 'missing.txt'), 'https://example.com/')).toBe('')
    expect(resolver.resolve(cookieFile, 'not a url')).toBe('')
    expect(resolver.resolve(cookieFile, 'file:///tmp/video.mp4')).toBe('')
  })

  it('drops invalid UTF-8 sequences', () => {
    fs.writeFileSync(
      cookieFile,
      Buffer.concat([
        Buffer.from(cookieLine('.example.com', 'sid', 'ab')),
        Buffer.from([0xff]),
        Buffer.from('c\n')
      ])
    )
    const resolver = new CookieResolver()

    expect(resolver.resolve(cookieFile, 'https://example.com/')).toBe('sid=abc')
  })

  it('truncates to maxLength characters', () => {
    fs.writeFileSync(
      cookieFile,
      [cookieLine('.example.com', 'a', '1'), cookieLine('.example.com', 'b', '2')].join('\n')
    )
    const resolver = new CookieResolver()

    expect(resolver.resolveDetailed(cookieFile, 'https://example.com/', 8)).toEqual({
      header: 'a=1; b=2',
      matched: 2,
      truncated: false
    })
    expect(resolver.resolveDetailed(cookieFile, 'https://example.com/', 7)).toEqual({
      header: 'a=1; b=',
      matched: 2,
      truncated: true
    })
    expect(resolver.resolveDetailed(cookieFile, 'https://example.com/', 5)).toEqual({
      header: 'a=1; ',
      matched: 2,
      truncated: true
    })
  })

  it('reads an unchanged file only once', () => {
    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'abc123')}\n`)
    const readFile = vi.fn((filePath: string) => fs.readFileSync(filePath))
    const resolver = new CookieResolver({ readFile })

    expect(resolver.resolve(cookieFile, 'https://example.com/a')).toBe('sid=abc123')
    expect(resolver.resolve(cookieFile, 'https://example.com/b')).toBe('sid=abc123')
    expect(readFile).toHaveBeenCalledTimes(1)
  })

  it('invalidates entries when the file modification time changes', () => {
    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'old')}\n`)
    const readFile = vi.fn((filePath: string) => fs.readFileSync(filePath))
    const resolver = new CookieResolver({ readFile })
    expect(resolver.resolve(cookieFile, 'https://example.com/')).toBe('sid=old')

    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'new')}\n`)
    const past = new Date('2020-01-01T00:00:00Z')
    fs.utimesSync(cookieFile, past, past)

    expect(resolver.resolve(cookieFile, 'https://example.com/')).toBe('sid=new')
    expect(readFile).toHaveBeenCalledTimes(2)
    expect(resolver.size).toBe(1)
  })

  it('evicts the least recently used entry beyond capacity', () => {
    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'abc123')}\n`)
    const resolver = new CookieResolver({ maxEntries: 2 })

    resolver.resolve(cookieFile, 'https://a.example.com/')
    resolver.resolve(cookieFile, 'https://b.example.com/')
    resolver.resolve(cookieFile, 'https://c.example.com/')

    expect(resolver.size).toBe(2)
  })

  it('restores persisted entries without reading the cookie file again', async () => {
    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'abc123')}\n`)
    const cacheFile = path.join(dir, 'state', 'cookie-cache.json')

    const first = new CookieResolver({ store: new CookieCacheStore(cacheFile) })
    expect(first.resolve(cookieFile, 'https://example.com/')).toBe('sid=abc123')
    await first.flush()

    const stored = fs.readFileSync(cacheFile, 'utf-8')
    expect(stored).not.toContain('abc123')
    expect(JSON.parse(stored)).toMatchObject({ version: 1 })

    const readFile = vi.fn((filePath: string) => fs.readFileSync(filePath))
    const second = new CookieResolver({ store: new CookieCacheStore(cacheFile), readFile })
    expect(second.resolve(cookieFile, 'https://example.com/')).toBe('sid=abc123')
    expect(readFile).not.toHaveBeenCalled()
  })

  it('ignores a cache file that cannot be decrypted', async () => {
    fs.writeFileSync(cookieFile, `${cookieLine('.example.com', 'sid', 'abc123')}\n`)
    const cacheFile = path.join(dir, 'cookie-cache.json')
    fs.writeFileSync(
      cacheFile,
      JSON.stringify({ version: 1, updatedAt: 0, encryptedEntries: 'bm90IGVuY3J5cHRlZA==' })
    )

    const store = new CookieCacheStore(cacheFile)
    expect(store.load()).toEqual([])

    const resolver = new CookieResolver({ store })
    expect(resolver.resolve(cookieFile, 'https://example.com/')).toBe('sid=abc123')
    await resolver.flush()
  })
})

describe('matchesCookieDomain', () => {
  it('matches subdomains and parent domains in both directions', () => {
    expect(matchesCookieDomain('.example.com', 'sub.example.com')).toBe(true)
    expect(matchesCookieDomain('www.example.com', 'example.com')).toBe(true)
    expect(matchesCookieDomain('.EXAMPLE.com', 'example.com')).toBe(true)
    expect(matchesCookieDomain('other.org', 'example.com')).toBe(false)
  })

  it('also pairs unrelated hosts that share a suffix', () => {
    expect(matchesCookieDomain('a.com', 'notreallya.com')).toBe(true)
  })
})

describe('collectCookiePairs', () => {
  it('takes the name and value from the sixth and seventh fields', () => {
    const content = `${cookieLine('.example.com', 'token', 'x=y')}\textra\n`
    expect(collectCookiePairs(content, 'example.com')).toEqual(['token=x=y'])
  })
})
