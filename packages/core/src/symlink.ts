import { stat, symlink } from 'node:fs/promises'
import { dirname, isAbsolute, relative, resolve } from 'node:path'
import { SymlinkError, describeError } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('symlink')

/**
 * Path of `original` as seen from the directory holding `link`, or null
 * when the two live on different roots (e.g. separate Windows drives).
 */
export function relativeLinkTarget(original: string, link: string): string | null {
  const target = relative(dirname(resolve(link)), resolve(original))
  if (target === '' || isAbsolute(target)) {
    return null
  }
  return target
}

/**
 * Links `link` to `original` through a relative path, so the environment
 * keeps working after it is moved as a whole.
 */
export async function createSymlink(original: string, link: string): Promise<void> {
  const target = relativeLinkTarget(original, link)
  if (target === null) {
    throw new SymlinkError(
      `Failed to calculate relative path for symlink from ${link} to ${original}`,
      { original, link },
    )
  }

  log.debug({ original, link, target }, 'Calculated relative path for symlink')

  let type: 'file' | 'dir' = 'file'
  if (process.platform === 'win32') {
    const stats = await stat(original).catch(() => null)
    type = stats?.isDirectory() ? 'dir' : 'file'
  }

  try {
    await symlink(target, link, type)
  } catch (error) {
    throw new SymlinkError(`Failed to create symlink ${link}: ${describeError(error)}`, {
      original,
      link,
      cause: error,
    })
  }
}
