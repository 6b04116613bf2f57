import { homedir } from 'node:os'
import { join } from 'node:path'

export const USER_AGENT = 'shellnest/0.1.0'
export const DEFAULT_API_BASE = 'https://api.github.com'
export const DEFAULT_ENV_DIR = '~/.local_shell'

export type Settings = {
  apiBase: string
  githubToken?: string
  logLevel: string
  userConfigDir: string
}

type Env = Record<string, string | undefined>

export function getApiBase(env: Env = process.env): string {
  const base = env['SHELLNEST_API_BASE'] || DEFAULT_API_BASE
  return base.replace(/\/+$/, '')
}

export function getUserConfigDir(env: Env = process.env): string {
  // XDG Base Directory Specification on Unix
  if (process.platform !== 'win32' && env['XDG_CONFIG_HOME']) {
    return env['XDG_CONFIG_HOME']
  }

  if (process.platform === 'win32') {
    return env['APPDATA'] || join(homedir(), 'AppData', 'Roaming')
  }

  return join(homedir(), '.config')
}

export function expandHome(path: string): string {
  if (path === '~') {
    return homedir()
  }
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homedir(), path.slice(2))
  }
  return path
}

export function loadSettings(env: Env = process.env): Settings {
  return {
    apiBase: getApiBase(env),
    githubToken: env['GITHUB_TOKEN'] || undefined,
    logLevel: env['SHELLNEST_LOG_LEVEL'] || 'silent',
    userConfigDir: getUserConfigDir(env),
  }
}
