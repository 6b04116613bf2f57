import { z } from 'zod'
import {
  ApiShapeError,
  AssetNotFoundError,
  describeError,
  NetworkError,
  UnsupportedPlatformError,
} from './errors.js'
import { request, type HttpClient } from './download.js'
import type { ArchiveKind } from './extract.js'
import { createLogger } from './logger.js'
import { compareGlibc, type GlibcVersion, type HostOs, type HostTarget } from './platform.js'
import { withRetry, type RetryOptions } from './retry.js'

const log = createLogger('release')

const releaseSchema = z.object({
  tag_name: z.string(),
  tarball_url: z.string().nullish(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string(),
    }),
  ),
})

export type ReleaseAsset = {
  url: string
  name: string
}

export type Release = {
  tagName: string
  tarballUrl: string | null
  assets: ReleaseAsset[]
}

/** `'latest'` or an exact release tag. */
export type ReleaseSpecifier = 'latest' | { tag: string }

/**
 * Per-tool knobs for asset matching. Everything else is derived from the
 * host.
 */
export type MatchRules = {
  /** Tool name; only the part after the last `/` is matched. */
  name: string
  /** glibc a gnu build needs; below it musl is tried first. */
  minGlibc?: GlibcVersion
  /** The tool ships one `linux` build with no libc suffix. */
  genericLinux?: boolean
  extensions?: Partial<Record<HostOs, ArchiveKind>>
}

export type FetchReleaseOptions = {
  client: HttpClient
  apiBase: string
  repo: string
  release?: ReleaseSpecifier
  token?: string
  retry?: RetryOptions
}

export const DEFAULT_MIN_GLIBC: GlibcVersion = { major: 2, minor: 35 }

export function releaseUrl(
  apiBase: string,
  repo: string,
  release: ReleaseSpecifier = 'latest',
): string {
  return release === 'latest'
    ? `${apiBase}/repos/${repo}/releases/latest`
    : `${apiBase}/repos/${repo}/releases/tags/${encodeURIComponent(release.tag)}`
}

export function parseRelease(payload: unknown, repo: string): Release {
  const parsed = releaseSchema.safeParse(payload)
  if (!parsed.success) {
    throw new ApiShapeError(
      `Unexpected release metadata for ${repo}. The API response may have changed.`,
      { repo, issues: parsed.error.issues.map((issue) => issue.message) },
    )
  }

  return {
    tagName: parsed.data.tag_name,
    tarballUrl: parsed.data.tarball_url ?? null,
    assets: parsed.data.assets.map((asset) => ({
      name: asset.name,
      url: asset.browser_download_url,
    })),
  }
}

/**
 * Fetches release metadata. The request and the body read are retried; a
 * payload that does not look like a release fails straight away.
 */
export async function fetchRelease(options: FetchReleaseOptions): Promise<Release> {
  const { client, apiBase, repo, release = 'latest', token } = options
  const url = releaseUrl(apiBase, repo, release)

  const payload = await withRetry(
    async (): Promise<unknown> => {
      log.debug({ url }, 'Fetching release from API')
      const response = await request(client, url, {
        headers: {
          Accept: 'application/vnd.github+json',
          ...(token ? { Authorization: `Bearer ${token}` } : {}),
        },
      })
      let body: string
      try {
        body = await response.text()
      } catch (error) {
        throw new NetworkError(
          `Connection lost while reading release ${repo}: ${describeError(error)}`,
          { url, transient: true, cause: error },
        )
      }
      try {
        return JSON.parse(body)
      } catch (error) {
        throw new ApiShapeError(`Failed to parse JSON response for ${repo}`, {
          repo,
          url,
          reason: error instanceof Error ? error.message : String(error),
        })
      }
    },
    { label: `release ${repo}`, ...options.retry },
  )

  return parseRelease(payload, repo)
}

function prefersGnu(host: HostTarget, minGlibc: GlibcVersion): boolean {
  if (!host.glibc) return false
  return compareGlibc(host.glibc, minGlibc) >= 0
}

/**
 * OS tokens to look for in asset names, most specific first.
 */
export function osTargets(rules: MatchRules, host: HostTarget): string[] {
  switch (host.os) {
    case 'linux': {
      if (rules.genericLinux) return ['linux']
      return prefersGnu(host, rules.minGlibc ?? DEFAULT_MIN_GLIBC)
        ? ['unknown-linux-gnu', 'unknown-linux-musl']
        : ['unknown-linux-musl', 'unknown-linux-gnu']
    }
    case 'android':
      return rules.genericLinux
        ? ['linux']
        : ['unknown-linux-musl', 'unknown-linux-gnu']
    case 'macos':
      return ['apple-darwin']
    case 'windows':
      return ['pc-windows-msvc']
    default:
      throw new UnsupportedPlatformError({ platform: host.os, arch: host.arch })
  }
}

export function assetExtension(rules: MatchRules, os: HostOs): ArchiveKind {
  if (os === 'windows') return 'zip'
  return rules.extensions?.[os] ?? 'tar.gz'
}

export function baseName(name: string): string {
  return name.split('/').pop() || name
}

/**
 * Picks the first asset whose lowercased name contains the tool name, the
 * CPU architecture and an OS token, and ends in the archive extension. Tokens are tried
 * in priority order and all assets are scanned for each. This follows
 * common release naming conventions and is not driven by any manifest.
 */
export function matchAsset(
  assets: ReleaseAsset[],
  rules: MatchRules,
  host: HostTarget,
): ReleaseAsset | null {
  const extension = assetExtension(rules, host.os)
  const name = baseName(rules.name).toLowerCase()

  for (const target of osTargets(rules, host)) {
    const fragments = [name, host.arch, target].map((f) => f.toLowerCase())
    log.trace({ fragments, extension }, 'Searching for asset')

    const asset = assets.find((candidate) => {
      const lower = candidate.name.toLowerCase()
      // a suffix, so `<asset>.tar.gz.sha256` side files never match
      return (
        lower.endsWith(`.${extension}`) &&
        fragments.every((fragment) => lower.includes(fragment))
      )
    })
    if (asset) {
      log.debug({ asset: asset.name }, 'Found matching release asset')
      return asset
    }
  }

  return null
}

export async function findReleaseAsset(
  options: FetchReleaseOptions & { rules: MatchRules; host: HostTarget },
): Promise<{ asset: ReleaseAsset; release: Release }> {
  const { rules, host } = options
  // fail fast on hosts we have no tokens for, before any request
  osTargets(rules, host)

  const release = await fetchRelease(options)
  log.debug(
    { repo: options.repo, tag: release.tagName, assets: release.assets.length },
    'Found release assets',
  )

  const asset = matchAsset(release.assets, rules, host)
  if (!asset) {
    throw new AssetNotFoundError({ tool: rules.name, os: host.os, arch: host.arch })
  }
  return { asset, release }
}
