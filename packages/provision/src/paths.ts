import { lstat, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { executableExtension, type HostOs } from '@shellnest/core'
import type { EnvironmentPaths, ToolSpec } from './types.js'

export function environmentPaths(root: string): EnvironmentPaths {
  return {
    root,
    bin: join(root, 'bin'),
    config: join(root, 'config'),
    data: join(root, 'data'),
  }
}

export function binaryFileName(tool: ToolSpec, os: HostOs): string {
  return `${tool.binaryName}${executableExtension(os)}`
}

export function installRoot(tool: ToolSpec, root: string): string {
  return join(root, tool.installDir ?? tool.id)
}

export function binaryInArchive(tool: ToolSpec, os: HostOs): string | null {
  if (tool.pathInArchive === undefined) return null
  const ext = executableExtension(os)
  return ext && !tool.pathInArchive.endsWith(ext)
    ? `${tool.pathInArchive}${ext}`
    : tool.pathInArchive
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

/** True for a symlink whose target is gone. */
export async function isDanglingLink(path: string): Promise<boolean> {
  try {
    const stats = await lstat(path)
    return stats.isSymbolicLink() && !(await pathExists(path))
  } catch {
    return false
  }
}
