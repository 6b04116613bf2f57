import { createReadStream, createWriteStream } from 'node:fs'
import {
  chmod,
  lstat,
  mkdir,
  mkdtemp,
  readdir,
  rename,
  rm,
  symlink,
} from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path'
import { pipeline } from 'node:stream/promises'
import type { Readable } from 'node:stream'
import { extract as tarExtract, ReadEntry } from 'tar'
import lzma from 'lzma-native'
import yauzl from 'yauzl'
import type { Entry, ZipFile } from 'yauzl'
import { ArchiveError, describeError } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('extract')

export type ArchiveKind = 'tar.gz' | 'tar.xz' | 'zip'

/**
 * What part of an archive lands in the destination:
 * - `single-file`: the first entry whose base name is `fileName`, written
 *   to `<destination>/<fileName>`.
 * - `full-tree`: everything, minus the wrapping top-level directory.
 * - `sub-tree`: only what sits below the first path component named
 *   `segment`, re-rooted at the destination.
 */
export type ExtractShape =
  | { kind: 'single-file'; fileName: string }
  | { kind: 'full-tree' }
  | { kind: 'sub-tree'; segment: string }

export type ExtractOptions = {
  archivePath: string
  archiveKind: ArchiveKind
  destination: string
  shape: ExtractShape
}

export function getArchiveType(filename: string): ArchiveKind | 'unknown' {
  const lower = filename.toLowerCase()
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) {
    return 'tar.gz'
  }
  if (lower.endsWith('.tar.xz') || lower.endsWith('.txz')) {
    return 'tar.xz'
  }
  if (lower.endsWith('.zip')) {
    return 'zip'
  }
  return 'unknown'
}

export function archiveKindFromName(filename: string): ArchiveKind {
  const kind = getArchiveType(filename)
  if (kind === 'unknown') {
    throw new ArchiveError(
      'UNSUPPORTED_FORMAT',
      `Unsupported archive format for ${filename}. ` +
        `Supported formats: .tar.gz, .tgz, .tar.xz, .txz, .zip`,
      { context: { filename } },
    )
  }
  return kind
}

function splitEntryPath(entryPath: string): string[] {
  return entryPath
    .replace(/\\/g, '/')
    .split('/')
    .filter((part) => part !== '' && part !== '.')
}

/**
 * Maps an archive entry path onto its path below the destination, or null
 * when the entry is not part of `shape`.
 *
 * Full-tree drops the first component of every multi-component path. A file
 * sitting at the archive root has no wrapper to drop and is kept as is; a
 * directory at the root is the wrapper itself and is skipped.
 */
export function mapEntryPath(
  shape: ExtractShape,
  entryPath: string,
  isDirectory: boolean,
): string | null {
  const parts = splitEntryPath(entryPath)
  if (parts.length === 0) return null

  switch (shape.kind) {
    case 'single-file': {
      if (isDirectory) return null
      return parts[parts.length - 1] === shape.fileName ? shape.fileName : null
    }
    case 'full-tree': {
      if (parts.length === 1) {
        return isDirectory ? null : parts.join('/')
      }
      return parts.slice(1).join('/')
    }
    case 'sub-tree': {
      const index = parts.indexOf(shape.segment)
      if (index === -1) return null
      const rest = parts.slice(index + 1)
      return rest.length > 0 ? rest.join('/') : null
    }
  }
}

export async function makeExecutable(filePath: string): Promise<void> {
  if (process.platform !== 'win32') {
    await chmod(filePath, 0o755)
  }
}

type TreeItem = { path: string; isDirectory: boolean }

async function listTree(root: string, prefix = ''): Promise<TreeItem[]> {
  const items: TreeItem[] = []
  const entries = await readdir(join(root, prefix), { withFileTypes: true })

  for (const entry of entries) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name
    if (entry.isDirectory()) {
      items.push({ path, isDirectory: true })
      items.push(...(await listTree(root, path)))
    } else {
      items.push({ path, isDirectory: false })
    }
  }

  return items
}

async function decompressXz(
  archivePath: string,
): Promise<{ path: string; dispose: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'shellnest-xz-'))
  const dispose = () => rm(dir, { recursive: true, force: true })
  const tarPath = join(dir, 'archive.tar')

  try {
    await pipeline(
      createReadStream(archivePath),
      lzma.createDecompressor(),
      createWriteStream(tarPath),
    )
  } catch (error) {
    await dispose()
    throw new ArchiveError(
      'CORRUPT',
      `The downloaded archive is corrupted or in an unexpected format: ${describeError(error)}`,
      { context: { archivePath }, cause: error },
    )
  }

  return { path: tarPath, dispose }
}

type TarEntryLike = ReadEntry | { isDirectory(): boolean; isFile(): boolean }

function isTarDirectory(entry: TarEntryLike): boolean {
  return entry instanceof ReadEntry
    ? entry.type === 'Directory'
    : entry.isDirectory()
}

function isTarFile(entry: TarEntryLike): boolean {
  return entry instanceof ReadEntry
    ? entry.type === 'File' || entry.type === 'OldFile'
    : entry.isFile()
}

/**
 * tar entries are unpacked into a staging directory next to the output and
 * then moved into place, so path mapping never depends on tar's own
 * `strip` rules.
 */
async function extractTar(
  tarPath: string,
  destination: string,
  shape: ExtractShape,
): Promise<void> {
  await mkdir(destination, { recursive: true })
  const staging = await mkdtemp(join(destination, '.extract-'))
  const picked: string[] = []
  let badArchive = false

  try {
    try {
      await tarExtract({
        file: tarPath,
        cwd: staging,
        filter: (path, entry) => {
          if (shape.kind !== 'single-file') {
            return mapEntryPath(shape, path, isTarDirectory(entry)) !== null
          }
          if (picked.length > 0 || !isTarFile(entry)) return false
          if (mapEntryPath(shape, path, false) === null) return false
          picked.push(path)
          return true
        },
        onwarn: (code, message) => {
          if (code === 'TAR_BAD_ARCHIVE') {
            badArchive = true
          }
          log.debug({ code, message: describeError(message) }, 'tar warning')
        },
      })
    } catch (error) {
      throw new ArchiveError(
        'CORRUPT',
        `The downloaded archive is corrupted or in an unexpected format: ${describeError(error)}`,
        { context: { archivePath: tarPath }, cause: error },
      )
    }

    if (badArchive) {
      throw new ArchiveError(
        'CORRUPT',
        'The downloaded archive is corrupted or in an unexpected format.',
        { context: { archivePath: tarPath } },
      )
    }

    if (shape.kind === 'single-file') {
      const [entryPath] = picked
      if (entryPath === undefined) {
        throw entryNotFound(shape.fileName)
      }
      await rename(join(staging, entryPath), join(destination, shape.fileName))
      return
    }

    for (const item of await listTree(staging)) {
      const mapped = mapEntryPath(shape, item.path, item.isDirectory)
      if (mapped === null) continue

      const target = join(destination, mapped)
      if (item.isDirectory) {
        await mkdir(target, { recursive: true })
      } else {
        await mkdir(dirname(target), { recursive: true })
        await rename(join(staging, item.path), target)
      }
    }
  } finally {
    await rm(staging, { recursive: true, force: true })
  }
}

function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error(`Could not open ${archivePath}`))
        return
      }
      resolve(zipfile)
    })
  })
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`Could not read ${entry.fileName}`))
        return
      }
      resolve(stream)
    })
  })
}

/**
 * Visits zip entries in order until `visit` returns false or the central
 * directory is exhausted.
 */
async function walkZip(
  archivePath: string,
  visit: (entry: Entry, zipfile: ZipFile) => Promise<boolean>,
): Promise<void> {
  const zipfile = await openZip(archivePath)

  try {
    await new Promise<void>((resolve, reject) => {
      zipfile.on('error', reject)
      zipfile.on('end', () => resolve())
      zipfile.on('entry', (entry: Entry) => {
        visit(entry, zipfile).then(
          (more) => {
            if (more) {
              zipfile.readEntry()
            } else {
              resolve()
            }
          },
          reject,
        )
      })
      zipfile.readEntry()
    })
  } finally {
    zipfile.close()
  }
}

const S_IFMT = 0o170000
const S_IFLNK = 0o120000

/** True when `path` is `root` or lies beneath it. */
function isWithin(root: string, path: string): boolean {
  const rel = relative(root, path)
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)
}

async function isSymlink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink()
  } catch {
    return false
  }
}

function unsafeEntry(entryName: string, detail: string): ArchiveError {
  return new ArchiveError(
    'CORRUPT',
    `Archive entry '${entryName}' ${detail}`,
    { context: { entry: entryName } },
  )
}

/** `dir` and each of its parents below `root` must be a real directory. */
async function assertNoLinkedDir(
  root: string,
  dir: string,
  entryName: string,
): Promise<void> {
  let current = dir
  while (current !== root && isWithin(root, current)) {
    if (await isSymlink(current)) {
      throw unsafeEntry(entryName, 'is written through a symlink')
    }
    current = dirname(current)
  }
}

async function writeZipEntry(
  zipfile: ZipFile,
  entry: Entry,
  root: string,
  target: string,
): Promise<void> {
  const attributes = entry.externalFileAttributes >>> 16
  await assertNoLinkedDir(root, dirname(target), entry.fileName)
  await mkdir(dirname(target), { recursive: true })
  const stream = await openEntryStream(zipfile, entry)

  if ((attributes & S_IFMT) === S_IFLNK) {
    const chunks: Buffer[] = []
    for await (const chunk of stream) {
      chunks.push(Buffer.from(chunk))
    }
    const linkTarget = Buffer.concat(chunks).toString('utf-8')
    if (!isWithin(root, resolve(dirname(target), linkTarget))) {
      throw unsafeEntry(entry.fileName, 'links outside the extraction directory')
    }
    await rm(target, { force: true })
    await symlink(linkTarget, target)
    return
  }

  await pipeline(stream, createWriteStream(target))

  const mode = attributes & 0o7777
  if (mode !== 0 && process.platform !== 'win32') {
    await chmod(target, mode)
  }
}

async function extractZip(
  archivePath: string,
  destination: string,
  shape: ExtractShape,
): Promise<void> {
  await mkdir(destination, { recursive: true })
  const root = resolve(destination)
  let written = 0

  try {
    await walkZip(archivePath, async (entry, zipfile) => {
      const isDirectory = entry.fileName.endsWith('/')
      const mapped = mapEntryPath(shape, entry.fileName, isDirectory)
      if (mapped === null) return true

      const target = join(root, mapped)
      if (!isWithin(root, target)) {
        throw unsafeEntry(entry.fileName, 'resolves outside the extraction directory')
      }
      log.trace({ entry: entry.fileName, target }, 'Unpacking archive entry')
      if (isDirectory) {
        await assertNoLinkedDir(root, target, entry.fileName)
        await mkdir(target, { recursive: true })
      } else {
        await writeZipEntry(zipfile, entry, root, target)
      }
      written++

      return shape.kind !== 'single-file'
    })
  } catch (error) {
    if (error instanceof ArchiveError) throw error
    throw new ArchiveError(
      'CORRUPT',
      `The downloaded archive is corrupted or in an unexpected format: ${describeError(error)}`,
      { context: { archivePath }, cause: error },
    )
  }

  if (shape.kind === 'single-file' && written === 0) {
    throw entryNotFound(shape.fileName)
  }
}

function entryNotFound(fileName: string): ArchiveError {
  return new ArchiveError(
    'ENTRY_NOT_FOUND',
    `Could not find '${fileName}' in the downloaded archive.`,
    { context: { fileName } },
  )
}

export async function extractArchive(options: ExtractOptions): Promise<void> {
  const { archivePath, archiveKind, destination, shape } = options
  log.debug({ archivePath, archiveKind, destination, shape }, 'Extracting archive')

  switch (archiveKind) {
    case 'tar.gz':
      return extractTar(archivePath, destination, shape)
    case 'tar.xz': {
      const decompressed = await decompressXz(archivePath)
      try {
        return await extractTar(decompressed.path, destination, shape)
      } finally {
        await decompressed.dispose()
      }
    }
    case 'zip':
      return extractZip(archivePath, destination, shape)
  }
}
