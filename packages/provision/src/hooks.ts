import { join } from 'node:path'
import {
  ApiShapeError,
  createLogger,
  parseVersion,
  readVersionOutput,
  type ProgressReporter,
  type Release,
} from '@shellnest/core'
import { fetchAndExtract, resolveAsset } from './install.js'
import { installRoot, pathExists } from './paths.js'
import type { ProvisionContext, ToolSpec, ToolVariant } from './types.js'

const log = createLogger('hooks')

export type ToolHooks = {
  afterSystemLink: (
    tool: ToolSpec,
    ctx: ProvisionContext,
    systemPath: string,
    progress: ProgressReporter,
  ) => Promise<void>
  afterRemoteInstall: (
    tool: ToolSpec,
    ctx: ProvisionContext,
    release: Release,
    progress: ProgressReporter,
  ) => Promise<void>
}

const noop = async (): Promise<void> => {}

const simpleHooks: ToolHooks = {
  afterSystemLink: noop,
  afterRemoteInstall: noop,
}

function auxDataHooks(segment: string): ToolHooks {
  return {
    afterSystemLink: noop,
    afterRemoteInstall: async (tool, ctx, release, progress) => {
      const dataDir = join(installRoot(tool, ctx.root), segment)
      if (await pathExists(dataDir)) {
        log.debug({ tool: tool.id, dataDir }, 'Archive already carries its data directory')
        return
      }
      if (!release.tarballUrl) {
        throw new ApiShapeError(
          `Release ${release.tagName} of ${tool.repo} has no source tarball`,
          { repo: tool.repo, tag: release.tagName },
        )
      }

      log.info({ tool: tool.id, tag: release.tagName }, `Fetching ${segment}/ from the source tarball`)
      progress.setMessage(`Fetching ${tool.id} ${segment} data...`)
      await fetchAndExtract({
        url: release.tarballUrl,
        assetName: `${tool.id}-${release.tagName}-source.tar.gz`,
        destination: dataDir,
        shape: { kind: 'sub-tree', segment },
        ctx,
        progress,
      })
    },
  }
}

function runtimeHooks(
  variant: Extract<ToolVariant, { kind: 'version-locked-runtime' }>,
): ToolHooks {
  return {
    afterRemoteInstall: noop,
    afterSystemLink: async (tool, ctx, systemPath, progress) => {
      const userRuntime = variant.userRuntimeDir(ctx.userConfigDir)
      if (await pathExists(userRuntime)) {
        log.debug({ tool: tool.id, userRuntime }, 'Using the user runtime directory')
        return
      }

      const output = await readVersionOutput(systemPath, variant.versionArgs)
      const tag = parseVersion(output, variant.versionPattern)
      log.info({ tool: tool.id, tag }, 'Fetching runtime for the system binary')
      progress.setMessage(`Fetching ${tool.id} ${tag} ${variant.segment}...`)

      const { asset } = await resolveAsset(tool, ctx, { tag })
      await fetchAndExtract({
        url: asset.url,
        assetName: asset.name,
        destination: join(installRoot(tool, ctx.root), variant.segment),
        shape: { kind: 'sub-tree', segment: variant.segment },
        ctx,
        progress,
      })
    },
  }
}

export function hooksFor(variant: ToolVariant): ToolHooks {
  switch (variant.kind) {
    case 'simple':
      return simpleHooks
    case 'requires-aux-data':
      return auxDataHooks(variant.segment)
    case 'version-locked-runtime':
      return runtimeHooks(variant)
  }
}
