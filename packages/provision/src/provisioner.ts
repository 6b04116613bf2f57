import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { createSymlink, findExecutable, logger } from '@shellnest/core'
import { ToolProvisionError } from './errors.js'
import { hooksFor } from './hooks.js'
import { installFromRelease } from './install.js'
import {
  binaryFileName,
  environmentPaths,
  isDanglingLink,
  pathExists,
} from './paths.js'
import type { ProvisionContext, ProvisionOutcome, ToolSpec } from './types.js'

/**
 * Brings one tool into the environment. The first state that applies wins:
 *
 * 1. `bin/<binary>` is already there: nothing to do.
 * 2. The binary is on the search path: link to it, then run the variant's
 *    system-link hook. A failing hook fails the tool.
 * 3. Otherwise install the latest release, then run the variant's
 *    post-install hook.
 *
 * Errors are rethrown as {@link ToolProvisionError}.
 */
export async function provisionTool(
  tool: ToolSpec,
  ctx: ProvisionContext,
): Promise<ProvisionOutcome> {
  const log = logger.child({ tool: tool.id })
  const progress = ctx.progress(tool.id)
  const hooks = hooksFor(tool.variant)
  const { bin } = environmentPaths(ctx.root)
  const fileName = binaryFileName(tool, ctx.host.os)
  const link = join(bin, fileName)

  try {
    if (await isDanglingLink(link)) {
      log.warn({ link }, 'Removing broken link')
      await rm(link, { force: true })
    }

    if (await pathExists(link)) {
      log.info({ path: link }, 'Already provisioned')
      progress.finish(`${tool.id} is already provisioned`)
      return { kind: 'already-present', tool: tool.id, path: link }
    }

    const systemPath = await findExecutable(fileName, {
      searchPath: ctx.searchPath,
      exclude: [bin],
    })
    if (systemPath) {
      log.info({ systemPath }, 'Found on the system, linking')
      progress.setMessage(`Found ${tool.binaryName} at ${systemPath}, linking...`)
      await createSymlink(systemPath, link)
      await hooks.afterSystemLink(tool, ctx, systemPath, progress)
      progress.finish(`${tool.id} linked from ${systemPath}`)
      return { kind: 'symlinked-from-system', tool: tool.id, systemPath }
    }

    log.info('Not found on the system, installing from release')
    const { asset, release } = await installFromRelease(tool, ctx, progress)
    await hooks.afterRemoteInstall(tool, ctx, release, progress)
    progress.finish(`${tool.id} ${release.tagName} installed`)
    return {
      kind: 'installed-from-release',
      tool: tool.id,
      asset: asset.name,
      tag: release.tagName,
    }
  } catch (error) {
    const wrapped = new ToolProvisionError(tool.id, error)
    log.error({ err: wrapped }, 'Provisioning failed')
    progress.abandon(`${tool.id} failed`)
    throw wrapped
  }
}
