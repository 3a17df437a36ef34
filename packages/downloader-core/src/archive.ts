import fs from 'node:fs'
import fsPromises from 'node:fs/promises'
import path from 'node:path'
import type { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import zlib from 'node:zlib'
import * as tar from 'tar'
import yauzl, { type Entry, type ZipFile } from 'yauzl'
import type { SupportedPlatform } from './types'

export type ArtifactKind = 'zip' | 'tar' | 'gzip' | 'raw'

export interface ExtractBinaryOptions {
  /** Expected executable file name, including `.exe` on Windows. */
  binaryFileName: string
  platform: SupportedPlatform
  /** Where the chosen executable is written. */
  binaryTarget: string
  /** Receives the whole archive when no executable can be picked. */
  fallbackDir: string
}

export type ExtractResult =
  | { mode: 'binary'; entry: string }
  | { mode: 'all'; directory: string; entries: number }

const HEADER_LENGTH = 512
const TAR_MAGIC_OFFSET = 257

export const readArtifactHeader = async (filePath: string): Promise<Buffer> => {
  const handle = await fsPromises.open(filePath, 'r')
  try {
    const buffer = Buffer.alloc(HEADER_LENGTH)
    const { bytesRead } = await handle.read(buffer, 0, HEADER_LENGTH, 0)
    return buffer.subarray(0, bytesRead)
  } finally {
    await handle.close()
  }
}

export const detectArtifactKind = (header: Buffer, assetName: string): ArtifactKind => {
  const name = assetName.toLowerCase()
  if (header.length >= 4 && header[0] === 0x50 && header[1] === 0x4b) {
    return 'zip'
  }
  if (header.length >= 2 && header[0] === 0x1f && header[1] === 0x8b) {
    return name.endsWith('.tar.gz') || name.endsWith('.tgz') ? 'tar' : 'gzip'
  }
  if (header.toString('latin1', TAR_MAGIC_OFFSET, TAR_MAGIC_OFFSET + 5) === 'ustar') {
    return 'tar'
  }
  return 'raw'
}

/** Rejects absolute paths, drive letters and `..` segments. */
export const isSafeEntryPath = (entryName: string): boolean => {
  if (!entryName || entryName.startsWith('/') || entryName.startsWith('\\')) {
    return false
  }
  if (/^[a-zA-Z]:/.test(entryName)) {
    return false
  }
  return !entryName.split(/[\\/]+/).some((segment) => segment === '..')
}

const entryBaseName = (entryName: string): string => {
  const segments = entryName.split(/[\\/]+/).filter((segment) => segment !== '')
  return segments[segments.length - 1] ?? ''
}

/**
 * Picks the executable among archive entries: exact basename first, then the
 * first `.exe` on Windows or the first extension-less file elsewhere.
 */
export const pickBinaryEntry = (
  entryNames: readonly string[],
  binaryFileName: string,
  platform: SupportedPlatform
): string | null => {
  const candidates = entryNames.filter((name) => isSafeEntryPath(name) && entryBaseName(name))
  const expected = binaryFileName.toLowerCase()
  const exact = candidates.find((name) => entryBaseName(name).toLowerCase() === expected)
  if (exact) {
    return exact
  }

  const fallback = candidates.find((name) => {
    const base = entryBaseName(name)
    return platform === 'win32' ? base.toLowerCase().endsWith('.exe') : !base.includes('.')
  })
  return fallback ?? null
}

const openZip = (archivePath: string): Promise<ZipFile> =>
  new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, autoClose: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error(`Unable to open zip archive: ${archivePath}`))
        return
      }
      resolve(zipfile)
    })
  })

const openZipEntryStream = (zipfile: ZipFile, entry: Entry): Promise<Readable> =>
  new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`Unable to read zip entry: ${entry.fileName}`))
        return
      }
      resolve(stream)
    })
  })

/**
 * Walks the zip entries in order. `resolveTarget` maps an entry to the path
 * it is written to, or null to skip it. Returns the names of all file entries.
 */
const walkZip = async (
  archivePath: string,
  resolveTarget: (entryName: string) => string | null
): Promise<string[]> => {
  const zipfile = await openZip(archivePath)
  const names: string[] = []

  await new Promise<void>((resolve, reject) => {
    zipfile.on('error', reject)
    zipfile.on('end', () => resolve())
    zipfile.on('entry', (entry: Entry) => {
      if (entry.fileName.endsWith('/')) {
        zipfile.readEntry()
        return
      }
      names.push(entry.fileName)
      const target = resolveTarget(entry.fileName)
      if (!target) {
        zipfile.readEntry()
        return
      }
      fsPromises
        .mkdir(path.dirname(target), { recursive: true })
        .then(() => openZipEntryStream(zipfile, entry))
        .then((stream) => pipeline(stream, fs.createWriteStream(target)))
        .then(() => zipfile.readEntry())
        .catch((error: unknown) => {
          zipfile.close()
          reject(error)
        })
    })
    zipfile.readEntry()
  })

  return names
}

const listTarEntries = async (archivePath: string): Promise<string[]> => {
  const names: string[] = []
  await tar.t({
    file: archivePath,
    onReadEntry: (entry) => {
      if (entry.type === 'File' || entry.type === 'OldFile') {
        names.push(entry.path)
      }
    }
  })
  return names
}

const extractZip = async (
  archivePath: string,
  options: ExtractBinaryOptions
): Promise<ExtractResult> => {
  const names = await walkZip(archivePath, () => null)
  const chosen = pickBinaryEntry(names, options.binaryFileName, options.platform)
  if (chosen) {
    await walkZip(archivePath, (name) => (name === chosen ? options.binaryTarget : null))
    return { mode: 'binary', entry: chosen }
  }

  const written = await walkZip(archivePath, (name) =>
    isSafeEntryPath(name) ? path.join(options.fallbackDir, name) : null
  )
  return { mode: 'all', directory: options.fallbackDir, entries: written.filter(isSafeEntryPath).length }
}

const extractTar = async (
  archivePath: string,
  options: ExtractBinaryOptions
): Promise<ExtractResult> => {
  const names = await listTarEntries(archivePath)
  const chosen = pickBinaryEntry(names, options.binaryFileName, options.platform)

  if (chosen) {
    await fsPromises.mkdir(path.dirname(options.binaryTarget), { recursive: true })
    const stagingDir = await fsPromises.mkdtemp(`${options.binaryTarget}.extract-`)
    try {
      await tar.x({
        file: archivePath,
        cwd: stagingDir,
        filter: (entryPath) => entryPath === chosen
      })
      await fsPromises.copyFile(path.join(stagingDir, chosen), options.binaryTarget)
    } finally {
      await fsPromises.rm(stagingDir, { recursive: true, force: true })
    }
    return { mode: 'binary', entry: chosen }
  }

  await fsPromises.mkdir(options.fallbackDir, { recursive: true })
  await tar.x({
    file: archivePath,
    cwd: options.fallbackDir,
    filter: (entryPath) => isSafeEntryPath(entryPath)
  })
  return {
    mode: 'all',
    directory: options.fallbackDir,
    entries: names.filter(isSafeEntryPath).length
  }
}

const gunzipTo = async (archivePath: string, target: string): Promise<void> => {
  await fsPromises.mkdir(path.dirname(target), { recursive: true })
  await pipeline(fs.createReadStream(archivePath), zlib.createGunzip(), fs.createWriteStream(target))
}

/**
 * Turns a downloaded artifact into the executable at `binaryTarget`. Raw
 * artifacts are copied as-is.
 */
export const extractBinary = async (
  artifactPath: string,
  kind: ArtifactKind,
  options: ExtractBinaryOptions
): Promise<ExtractResult> => {
  switch (kind) {
    case 'zip':
      return extractZip(artifactPath, options)
    case 'tar':
      return extractTar(artifactPath, options)
    case 'gzip':
      await gunzipTo(artifactPath, options.binaryTarget)
      return { mode: 'binary', entry: path.basename(artifactPath) }
    case 'raw':
      await fsPromises.mkdir(path.dirname(options.binaryTarget), { recursive: true })
      await fsPromises.copyFile(artifactPath, options.binaryTarget)
      return { mode: 'binary', entry: path.basename(artifactPath) }
  }
}
