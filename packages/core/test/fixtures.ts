import { createReadStream, createWriteStream } from 'node:fs'
import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import lzma from 'lzma-native'
import { create as tarCreate } from 'tar'
import yazl from 'yazl'

/**
 * A file when `content` is set, a directory otherwise. `linkTo` makes a
 * symlink entry and is only honoured by `createZip`.
 */
export type FixtureEntry = {
  path: string
  content?: string
  mode?: number
  linkTo?: string
}

export function makeTempDir(prefix = 'shellnest-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true })
}

async function stageEntries(entries: FixtureEntry[]): Promise<{ dir: string; roots: string[] }> {
  const dir = await makeTempDir('shellnest-stage-')
  const roots = new Set<string>()

  for (const entry of entries) {
    const target = join(dir, entry.path)
    const [root] = entry.path.split('/')
    if (root) roots.add(root)

    if (entry.content === undefined) {
      await mkdir(target, { recursive: true })
      continue
    }
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, entry.content)
    await chmod(target, entry.mode ?? 0o644)
  }

  return { dir, roots: [...roots] }
}

async function createTar(file: string, entries: FixtureEntry[], gzip: boolean): Promise<void> {
  const staged = await stageEntries(entries)
  try {
    await tarCreate({ file, cwd: staged.dir, gzip, portable: true }, staged.roots)
  } finally {
    await removeDir(staged.dir)
  }
}

export async function createTarGz(file: string, entries: FixtureEntry[]): Promise<string> {
  await createTar(file, entries, true)
  return file
}

export async function createTarXz(file: string, entries: FixtureEntry[]): Promise<string> {
  const tarFile = `${file}.plain.tar`
  await createTar(tarFile, entries, false)
  try {
    await pipeline(createReadStream(tarFile), lzma.createCompressor(), createWriteStream(file))
  } finally {
    await rm(tarFile, { force: true })
  }
  return file
}

export async function createZip(file: string, entries: FixtureEntry[]): Promise<string> {
  const zip = new yazl.ZipFile()
  for (const entry of entries) {
    if (entry.linkTo !== undefined) {
      zip.addBuffer(Buffer.from(entry.linkTo), entry.path, { mode: 0o120777 })
    } else if (entry.content === undefined) {
      zip.addEmptyDirectory(entry.path)
    } else {
      zip.addBuffer(Buffer.from(entry.content), entry.path, {
        mode: 0o100000 | (entry.mode ?? 0o644),
      })
    }
  }
  zip.end()
  await pipeline(zip.outputStream, createWriteStream(file))
  return file
}
