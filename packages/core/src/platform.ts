import { UnsupportedPlatformError } from './errors.js'
import { createLogger } from './logger.js'
import { runCommand } from './process.js'

const log = createLogger('platform')

export type HostOs = 'linux' | 'android' | 'macos' | 'windows'

export type GlibcVersion = {
  major: number
  minor: number
}

export type HostTarget = {
  os: HostOs
  arch: string
  glibc: GlibcVersion | null
}

export const SUPPORTED_OS: HostOs[] = ['linux', 'android', 'macos', 'windows']

const ARCH_ALIASES: Partial<Record<string, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i686',
  arm: 'armv7',
}

export function detectOs(platform: string = process.platform): HostOs {
  switch (platform) {
    case 'linux':
      return 'linux'
    case 'android':
      return 'android'
    case 'darwin':
      return 'macos'
    case 'win32':
      return 'windows'
    default:
      throw new UnsupportedPlatformError({ platform, arch: process.arch })
  }
}

export function normalizeArch(arch: string = process.arch): string {
  return ARCH_ALIASES[arch] ?? arch
}

export function executableExtension(os: HostOs): string {
  return os === 'windows' ? '.exe' : ''
}

export function compareGlibc(a: GlibcVersion, b: GlibcVersion): number {
  return a.major !== b.major ? a.major - b.major : a.minor - b.minor
}

/**
 * Pulls the glibc version out of `ldd --version`. The version is the last
 * `major.minor` pair on the first line, e.g. "ldd (GNU libc) 2.35".
 */
export function parseGlibcVersion(output: string): GlibcVersion | null {
  const firstLine = output.split('\n')[0] ?? ''
  const matches = [...firstLine.matchAll(/(\d+)\.(\d+)/g)]
  const last = matches[matches.length - 1]
  if (!last || last[1] === undefined || last[2] === undefined) {
    return null
  }
  return { major: Number(last[1]), minor: Number(last[2]) }
}

export async function probeGlibcVersion(): Promise<GlibcVersion | null> {
  try {
    const { stdout } = await runCommand('ldd', ['--version'])
    const version = parseGlibcVersion(stdout)
    if (version) {
      log.debug(version, 'Detected glibc version')
    }
    return version
  } catch (error) {
    // musl's ldd prints its banner to stderr and exits non-zero
    log.debug({ err: error }, 'Could not determine glibc version')
    return null
  }
}

/**
 * Describes the running host once per run. The result is passed explicitly
 * to the release resolver instead of being read from globals there.
 */
export async function detectHost(
  options: {
    platform?: string
    arch?: string
    probeGlibc?: () => Promise<GlibcVersion | null>
  } = {},
): Promise<HostTarget> {
  const os = detectOs(options.platform)
  const arch = normalizeArch(options.arch)
  const probe = options.probeGlibc ?? probeGlibcVersion
  const glibc = os === 'linux' ? await probe() : null

  if (os === 'linux' && !glibc) {
    log.warn('Could not determine glibc version. Defaulting to musl for safety.')
  }

  return { os, arch, glibc }
}
