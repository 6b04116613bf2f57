import { constants } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import { delimiter, join } from 'node:path'

export type SearchOptions = {
  /** Defaults to `PATH` of the current process. */
  searchPath?: string
  /** Paths that never count as a hit, e.g. the environment's own bin/. */
  exclude?: string[]
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path)
    if (!stats.isFile()) return false
    if (process.platform !== 'win32') {
      await access(path, constants.X_OK)
    }
    return true
  } catch {
    return false
  }
}

function candidateNames(name: string): string[] {
  if (process.platform !== 'win32') return [name]
  const extensions = (process.env['PATHEXT'] || '.EXE;.CMD;.BAT;.COM')
    .split(';')
    .filter(Boolean)
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)]
}

/**
 * Looks up `name` the way a shell would: the first executable regular file
 * in the directories of the search path, in order.
 */
export async function findExecutable(
  name: string,
  options: SearchOptions = {},
): Promise<string | null> {
  const searchPath = options.searchPath ?? process.env['PATH'] ?? ''
  const excluded = new Set(options.exclude ?? [])

  for (const dir of searchPath.split(delimiter)) {
    if (!dir || excluded.has(dir)) continue
    for (const candidate of candidateNames(name)) {
      const fullPath = join(dir, candidate)
      if (await isExecutableFile(fullPath)) {
        return fullPath
      }
    }
  }

  return null
}
