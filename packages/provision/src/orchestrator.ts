import { mkdir, rm } from 'node:fs/promises'
import { createLogger, describeError } from '@shellnest/core'
import { generateConfigs } from './configs.js'
import { ProvisioningFailedError, RollbackFailedError } from './errors.js'
import { environmentPaths } from './paths.js'
import { provisionTool } from './provisioner.js'
import { TOOLS } from './tools/index.js'
import type { ProvisionContext, ProvisionOutcome, ToolSpec } from './types.js'

const log = createLogger('orchestrator')

export type RunReport = {
  root: string
  outcomes: ProvisionOutcome[]
}

export type SetupOptions = {
  tools?: readonly ToolSpec[]
  /** Runs once every tool succeeded. Defaults to {@link generateConfigs}. */
  configure?: (root: string) => Promise<void>
  /** Removes the root after a failure. Defaults to {@link rollback}. */
  cleanup?: (root: string) => Promise<void>
}

export async function createSkeleton(root: string): Promise<void> {
  const paths = environmentPaths(root)
  for (const dir of [paths.root, paths.bin, paths.config, paths.data]) {
    await mkdir(dir, { recursive: true })
  }
}

/**
 * Runs every tool concurrently and waits for all of them, failed or not.
 * The result has one outcome per tool, in the order given.
 */
export async function provisionAll(
  tools: readonly ToolSpec[],
  ctx: ProvisionContext,
): Promise<ProvisionOutcome[]> {
  const settled = await Promise.allSettled(
    tools.map((tool) => provisionTool(tool, ctx)),
  )

  return settled.map((result, index): ProvisionOutcome => {
    if (result.status === 'fulfilled') {
      return result.value
    }
    const reason: unknown = result.reason
    return {
      kind: 'failed',
      tool: tools[index]?.id ?? 'unknown',
      error: reason instanceof Error ? reason : new Error(describeError(reason)),
    }
  })
}

export async function rollback(root: string): Promise<void> {
  log.warn({ root }, 'Removing environment directory')
  await rm(root, { recursive: true, force: true })
}

/**
 * Provisions a whole environment, all or nothing: when any tool or the
 * configuration step fails, the environment root is deleted before the
 * error is rethrown.
 */
export async function setupEnvironment(
  ctx: ProvisionContext,
  options: SetupOptions = {},
): Promise<RunReport> {
  const { tools = TOOLS, configure = generateConfigs, cleanup = rollback } = options
  const { root } = ctx

  try {
    await createSkeleton(root)
    const outcomes = await provisionAll(tools, ctx)

    const failed = outcomes.find((outcome) => outcome.kind === 'failed')
    if (failed?.kind === 'failed') {
      throw new ProvisioningFailedError(failed.error, outcomes)
    }

    await configure(root)
    log.info({ root, tools: outcomes.length }, 'Environment ready')
    return { root, outcomes }
  } catch (error) {
    try {
      await cleanup(root)
    } catch (cleanupError) {
      throw new RollbackFailedError(root, error, cleanupError)
    }
    throw error
  }
}
