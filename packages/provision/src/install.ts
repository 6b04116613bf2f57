import { join } from 'node:path'
import {
  archiveKindFromName,
  createSymlink,
  downloadToTemp,
  extractArchive,
  findReleaseAsset,
  createLogger,
  makeExecutable,
  type ExtractShape,
  type MatchRules,
  type ProgressReporter,
  type Release,
  type ReleaseAsset,
  type ReleaseSpecifier,
} from '@shellnest/core'
import {
  binaryFileName,
  binaryInArchive,
  environmentPaths,
  installRoot,
} from './paths.js'
import type { ProvisionContext, ToolSpec } from './types.js'

const log = createLogger('install')

export function matchRulesFor(tool: ToolSpec): MatchRules {
  return {
    name: tool.id,
    minGlibc: tool.minGlibc,
    genericLinux: tool.genericLinux,
    extensions: tool.extensions,
  }
}

export function resolveAsset(
  tool: ToolSpec,
  ctx: ProvisionContext,
  release: ReleaseSpecifier = 'latest',
): Promise<{ asset: ReleaseAsset; release: Release }> {
  return findReleaseAsset({
    client: ctx.client,
    apiBase: ctx.apiBase,
    repo: tool.repo,
    release,
    token: ctx.githubToken,
    retry: ctx.retry,
    rules: matchRulesFor(tool),
    host: ctx.host,
  })
}

/**
 * Downloads `url` and unpacks the `shape` part of it into `destination`.
 * The archive kind comes from `assetName` and is checked before the
 * download starts.
 */
export async function fetchAndExtract(options: {
  url: string
  assetName: string
  destination: string
  shape: ExtractShape
  ctx: ProvisionContext
  progress: ProgressReporter
}): Promise<void> {
  const { url, assetName, destination, shape, ctx, progress } = options
  const archiveKind = archiveKindFromName(assetName)

  const download = await downloadToTemp({
    url,
    assetName,
    client: ctx.client,
    progress,
    retry: ctx.retry,
  })

  try {
    progress.setMessage(`Extracting ${assetName}`)
    await extractArchive({
      archivePath: download.path,
      archiveKind,
      destination,
      shape,
    })
  } finally {
    await download.dispose()
  }
}

/**
 * Installs the latest release of `tool` into the environment: the lone
 * binary straight into bin/, or the whole archive into the tool's install
 * directory with a link from bin/.
 */
export async function installFromRelease(
  tool: ToolSpec,
  ctx: ProvisionContext,
  progress: ProgressReporter,
): Promise<{ asset: ReleaseAsset; release: Release }> {
  const { os } = ctx.host
  const { bin } = environmentPaths(ctx.root)
  const fileName = binaryFileName(tool, os)

  progress.setMessage(`Resolving ${tool.id} release...`)
  const resolved = await resolveAsset(tool, ctx)
  const { asset } = resolved
  log.info({ tool: tool.id, asset: asset.name, tag: resolved.release.tagName }, 'Resolved release asset')

  const inArchive = binaryInArchive(tool, os)
  if (inArchive === null) {
    await fetchAndExtract({
      url: asset.url,
      assetName: asset.name,
      destination: bin,
      shape: { kind: 'single-file', fileName },
      ctx,
      progress,
    })
    await makeExecutable(join(bin, fileName))
    return resolved
  }

  const target = installRoot(tool, ctx.root)
  await fetchAndExtract({
    url: asset.url,
    assetName: asset.name,
    destination: target,
    shape: { kind: 'full-tree' },
    ctx,
    progress,
  })
  const binary = join(target, inArchive)
  await makeExecutable(binary)
  await createSymlink(binary, join(bin, fileName))

  return resolved
}
