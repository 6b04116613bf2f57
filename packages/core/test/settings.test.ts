import { homedir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { createLogger, levelForVerbosity, setLevel, setVerbosity } from '../src/logger.js'
import {
  DEFAULT_API_BASE,
  expandHome,
  getApiBase,
  loadSettings,
} from '../src/settings.js'

describe('settings', () => {
  it('reads the api base without trailing slashes', () => {
    expect(getApiBase({})).toBe(DEFAULT_API_BASE)
    expect(getApiBase({ SHELLNEST_API_BASE: 'https://ghe.example.test/api/v3/' })).toBe(
      'https://ghe.example.test/api/v3',
    )
  })

  it('loads defaults', () => {
    const settings = loadSettings({ GITHUB_TOKEN: '' })
    expect(settings.apiBase).toBe(DEFAULT_API_BASE)
    expect(settings.githubToken).toBeUndefined()
    expect(settings.logLevel).toBe('silent')
  })

  it('picks up the token and log level', () => {
    const settings = loadSettings({ GITHUB_TOKEN: 'test-secret', SHELLNEST_LOG_LEVEL: 'debug' })
    expect(settings.githubToken).toBe('test-secret')
    expect(settings.logLevel).toBe('debug')
  })

  it('honours XDG_CONFIG_HOME', () => {
    expect(loadSettings({ XDG_CONFIG_HOME: '/tmp/xdg' }).userConfigDir).toBe('/tmp/xdg')
    expect(loadSettings({}).userConfigDir).toBe(join(homedir(), '.config'))
  })

  it('expands the home directory', () => {
    expect(expandHome('~')).toBe(homedir())
    expect(expandHome('~/.local_shell')).toBe(join(homedir(), '.local_shell'))
    expect(expandHome('/opt/env')).toBe('/opt/env')
  })
})

describe('logger', () => {
  afterEach(() => {
    setLevel('silent')
  })

  it('maps verbosity to levels', () => {
    expect([0, 1, 2, 3, 5].map(levelForVerbosity)).toEqual(['silent', 'info', 'debug', 'trace', 'trace'])
  })

  it('updates component loggers created earlier', () => {
    const log = createLogger('test')
    setVerbosity(2)
    expect(log.level).toBe('debug')
  })
})
