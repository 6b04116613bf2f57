import { mkdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { vi, type Mock } from 'vitest'
import { silentProgressFactory, type HostTarget, type HttpClient } from '@shellnest/core'
import type { ProvisionContext } from '../src/types.js'
import { createTarGz, createTarXz, createZip } from '../../core/test/fixtures.js'

export const API = 'https://api.example.test'
const DOWNLOADS = 'https://downloads.example.test'

export const HOST: HostTarget = { os: 'linux', arch: 'x86_64', glibc: { major: 2, minor: 39 } }

export type FakeAsset = { name: string; file?: string }

/** The first release listed for a repo is its latest. */
export type FakeRelease = {
  repo: string
  tag: string
  assets: FakeAsset[]
  tarball?: string
}

export function assetUrl(repo: string, tag: string, name: string): string {
  return `${DOWNLOADS}/${repo}/${tag}/${name}`
}

export function tarballUrl(repo: string, tag: string): string {
  return `${API}/repos/${repo}/tarball/${tag}`
}

/**
 * An in-process stand-in for the release API and its download host.
 * Unknown urls answer 404.
 */
export function fakeReleaseApi(releases: FakeRelease[]): Mock<HttpClient> {
  const routes = new Map<string, () => Promise<Response>>()
  const serveFile = (file: string) => async () => new Response(await readFile(file))

  for (const release of releases) {
    const { repo, tag } = release
    const payload = JSON.stringify({
      tag_name: tag,
      tarball_url: release.tarball ? tarballUrl(repo, tag) : null,
      assets: release.assets.map((asset) => ({
        name: asset.name,
        browser_download_url: assetUrl(repo, tag, asset.name),
      })),
    })
    const metadata = async () => new Response(payload, { headers: { 'content-type': 'application/json' } })

    const latest = `${API}/repos/${repo}/releases/latest`
    if (!routes.has(latest)) {
      routes.set(latest, metadata)
    }
    routes.set(`${API}/repos/${repo}/releases/tags/${encodeURIComponent(tag)}`, metadata)

    for (const asset of release.assets) {
      if (asset.file) {
        routes.set(assetUrl(repo, tag, asset.name), serveFile(asset.file))
      }
    }
    if (release.tarball) {
      routes.set(tarballUrl(repo, tag), serveFile(release.tarball))
    }
  }

  return vi.fn<HttpClient>(async (url) => {
    const route = routes.get(url)
    return route ? route() : new Response('Not Found', { status: 404, statusText: 'Not Found' })
  })
}

export async function makeContext(
  dir: string,
  client: HttpClient,
  overrides: Partial<ProvisionContext> = {},
): Promise<ProvisionContext> {
  const searchPath = join(dir, 'path')
  await mkdir(searchPath, { recursive: true })
  return {
    root: join(dir, 'env'),
    client,
    host: HOST,
    apiBase: API,
    searchPath,
    userConfigDir: join(dir, 'config-home'),
    progress: silentProgressFactory,
    retry: { sleep: async () => {} },
    ...overrides,
  }
}

export type Catalogue = {
  fish: FakeRelease
  starship: FakeRelease
  zoxide: FakeRelease
  atuin: FakeRelease
  ripgrep: FakeRelease
  helix: FakeRelease
}

/**
 * One linux x86_64 release per tool, laid out the way each project ships
 * its archives.
 */
export async function buildCatalogue(dir: string): Promise<Catalogue> {
  await mkdir(dir, { recursive: true })
  const file = (name: string) => join(dir, name)

  const fishArchive = await createTarXz(file('fish-4.0.1-linux-x86_64.tar.xz'), [
    { path: 'fish', content: 'fish-binary', mode: 0o755 },
  ])
  const fishSource = await createTarGz(file('fish-source.tar.gz'), [
    { path: 'fish-shell-fish-shell-1a2b3c4/share/functions/ll.fish', content: 'function ll' },
    { path: 'fish-shell-fish-shell-1a2b3c4/doc/README', content: 'readme' },
  ])
  const starshipArchive = await createTarGz(file('starship-x86_64-unknown-linux-gnu.tar.gz'), [
    { path: 'starship', content: 'starship-binary', mode: 0o755 },
  ])
  const zoxideArchive = await createTarGz(file('zoxide-0.9.6-x86_64-unknown-linux-musl.tar.gz'), [
    { path: 'zoxide', content: 'zoxide-binary', mode: 0o755 },
    { path: 'man/man1/zoxide.1', content: 'manual' },
  ])
  const atuinArchive = await createTarGz(file('atuin-x86_64-unknown-linux-gnu.tar.gz'), [
    { path: 'atuin-x86_64-unknown-linux-gnu/atuin', content: 'atuin-binary', mode: 0o755 },
  ])
  const ripgrepArchive = await createTarGz(file('ripgrep-14.1.1-x86_64-unknown-linux-musl.tar.gz'), [
    { path: 'ripgrep-14.1.1-x86_64-unknown-linux-musl/rg', content: 'rg-binary', mode: 0o755 },
    { path: 'ripgrep-14.1.1-x86_64-unknown-linux-musl/doc/rg.1', content: 'manual' },
  ])
  const helixEntries = (wrapper: string) => [
    { path: `${wrapper}/hx`, content: 'hx-binary', mode: 0o755 },
    { path: `${wrapper}/runtime/themes/base.toml`, content: 'base-theme' },
  ]
  const helixArchive = await createTarXz(
    file('helix-25.01.1-x86_64-linux.tar.xz'),
    helixEntries('helix-25.01.1-x86_64-linux'),
  )
  const helixMac = await createZip(
    file('helix-25.01.1-aarch64-macos.zip'),
    helixEntries('helix-25.01.1-aarch64-macos'),
  )

  return {
    fish: {
      repo: 'fish-shell/fish-shell',
      tag: '4.0.1',
      assets: [
        { name: 'fish-4.0.1.tar.xz' },
        { name: 'fish-4.0.1-linux-aarch64.tar.xz' },
        { name: 'fish-4.0.1-linux-x86_64.tar.xz', file: fishArchive },
      ],
      tarball: fishSource,
    },
    starship: {
      repo: 'starship/starship',
      tag: 'v1.22.1',
      assets: [
        { name: 'starship-x86_64-unknown-linux-gnu.tar.gz.sha256' },
        { name: 'starship-x86_64-unknown-linux-gnu.tar.gz', file: starshipArchive },
        { name: 'starship-x86_64-unknown-linux-musl.tar.gz' },
      ],
    },
    zoxide: {
      repo: 'ajeetdsouza/zoxide',
      tag: 'v0.9.6',
      assets: [
        { name: 'zoxide-0.9.6-aarch64-unknown-linux-musl.tar.gz' },
        { name: 'zoxide-0.9.6-x86_64-unknown-linux-musl.tar.gz', file: zoxideArchive },
      ],
    },
    atuin: {
      repo: 'atuinsh/atuin',
      tag: 'v18.4.0',
      assets: [
        { name: 'atuin-x86_64-unknown-linux-gnu.tar.gz', file: atuinArchive },
        { name: 'atuin-x86_64-unknown-linux-musl.tar.gz' },
      ],
    },
    ripgrep: {
      repo: 'BurntSushi/ripgrep',
      tag: '14.1.1',
      assets: [
        { name: 'ripgrep-14.1.1-x86_64-unknown-linux-musl.tar.gz.sha256' },
        { name: 'ripgrep-14.1.1-x86_64-unknown-linux-musl.tar.gz', file: ripgrepArchive },
      ],
    },
    helix: {
      repo: 'helix-editor/helix',
      tag: '25.01.1',
      assets: [
        { name: 'helix-25.01.1-aarch64-macos.zip', file: helixMac },
        { name: 'helix-25.01.1-x86_64-linux.tar.xz', file: helixArchive },
      ],
    },
  }
}

export function releasesOf(catalogue: Catalogue): FakeRelease[] {
  return [
    catalogue.fish,
    catalogue.starship,
    catalogue.zoxide,
    catalogue.atuin,
    catalogue.ripgrep,
    catalogue.helix,
  ]
}
