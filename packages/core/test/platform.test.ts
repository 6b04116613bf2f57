import { describe, expect, it, vi } from 'vitest'
import { UnsupportedPlatformError } from '../src/errors.js'
import {
  compareGlibc,
  detectHost,
  detectOs,
  executableExtension,
  normalizeArch,
  parseGlibcVersion,
} from '../src/platform.js'

describe('detectOs', () => {
  it('maps node platforms', () => {
    expect(detectOs('linux')).toBe('linux')
    expect(detectOs('android')).toBe('android')
    expect(detectOs('darwin')).toBe('macos')
    expect(detectOs('win32')).toBe('windows')
  })

  it('rejects other platforms', () => {
    expect(() => detectOs('freebsd')).toThrowError(UnsupportedPlatformError)
  })
})

describe('normalizeArch', () => {
  it('uses release naming', () => {
    expect(normalizeArch('x64')).toBe('x86_64')
    expect(normalizeArch('arm64')).toBe('aarch64')
    expect(normalizeArch('ia32')).toBe('i686')
    expect(normalizeArch('riscv64')).toBe('riscv64')
  })
})

describe('glibc', () => {
  it('parses the last version on the first line', () => {
    expect(
      parseGlibcVersion('ldd (Ubuntu GLIBC 2.35-0ubuntu3.8) 2.35\nCopyright (C) 2022 Free Software Foundation, Inc.'),
    ).toEqual({ major: 2, minor: 35 })
    expect(parseGlibcVersion('ldd (GNU libc) 2.39')).toEqual({ major: 2, minor: 39 })
  })

  it('returns null for musl output', () => {
    expect(parseGlibcVersion('musl libc (x86_64)\nVersion 1.2.4')).toBeNull()
  })

  it('compares versions', () => {
    expect(compareGlibc({ major: 2, minor: 35 }, { major: 2, minor: 35 })).toBe(0)
    expect(compareGlibc({ major: 2, minor: 31 }, { major: 2, minor: 35 })).toBeLessThan(0)
    expect(compareGlibc({ major: 3, minor: 0 }, { major: 2, minor: 35 })).toBeGreaterThan(0)
  })
})

describe('detectHost', () => {
  it('probes glibc on linux', async () => {
    const probeGlibc = vi.fn(async () => ({ major: 2, minor: 31 }))

    await expect(detectHost({ platform: 'linux', arch: 'x64', probeGlibc })).resolves.toEqual({
      os: 'linux',
      arch: 'x86_64',
      glibc: { major: 2, minor: 31 },
    })
    expect(probeGlibc).toHaveBeenCalledTimes(1)
  })

  it('skips the probe elsewhere', async () => {
    const probeGlibc = vi.fn(async () => ({ major: 2, minor: 31 }))

    await expect(detectHost({ platform: 'darwin', arch: 'arm64', probeGlibc })).resolves.toEqual({
      os: 'macos',
      arch: 'aarch64',
      glibc: null,
    })
    expect(probeGlibc).not.toHaveBeenCalled()
  })

  it('adds .exe only on windows', () => {
    expect(executableExtension('windows')).toBe('.exe')
    expect(executableExtension('linux')).toBe('')
  })
})
