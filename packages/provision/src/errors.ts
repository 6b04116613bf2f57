import { ShellnestError, describeError } from '@shellnest/core'
import type { ProvisionOutcome } from './types.js'

/**
 * Wraps whatever stopped a single tool, naming the tool in front of the
 * underlying message.
 */
export class ToolProvisionError extends ShellnestError {
  readonly tool: string

  constructor(tool: string, cause: unknown) {
    super(
      cause instanceof ShellnestError ? cause.code : 'PROVISIONING_FAILED',
      `Failed to provision tool '${tool}': ${describeError(cause)}`,
      { context: { tool }, cause },
    )
    this.name = 'ToolProvisionError'
    this.tool = tool
  }
}

/**
 * The run as a whole failed and the environment was removed. `outcomes`
 * holds one entry per tool, including the siblings that succeeded.
 */
export class ProvisioningFailedError extends ShellnestError {
  readonly outcomes: ProvisionOutcome[]

  constructor(cause: Error, outcomes: ProvisionOutcome[]) {
    const failed = outcomes.filter((outcome) => outcome.kind === 'failed')
    super('PROVISIONING_FAILED', cause.message, {
      context: { failed: failed.map((outcome) => outcome.tool) },
      cause,
    })
    this.name = 'ProvisioningFailedError'
    this.outcomes = outcomes
  }
}

/** Removing the environment after a failure failed too. */
export class RollbackFailedError extends ShellnestError {
  readonly root: string
  readonly original: unknown

  constructor(root: string, original: unknown, cause: unknown) {
    super(
      'PROVISIONING_FAILED',
      `Failed to clean up environment directory during error recovery: ${describeError(cause)}`,
      { context: { root, original: describeError(original) }, cause },
    )
    this.name = 'RollbackFailedError'
    this.root = root
    this.original = original
  }
}
