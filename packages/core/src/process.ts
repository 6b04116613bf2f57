import { execa, ExecaError } from 'execa'
import { ProcessError } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('process')

export type CommandOutput = {
  stdout: string
  stderr: string
}

/**
 * Runs a command to completion. execa drains stdout and stderr while the
 * child is running, so a child that writes more than a pipe buffer holds
 * cannot stall waiting for us.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: { env?: Record<string, string | undefined> } = {},
): Promise<CommandOutput> {
  const display = [command, ...args].join(' ')
  log.trace({ command: display }, 'Running command')

  try {
    const result = await execa(command, args, {
      env: options.env,
      stdin: 'ignore',
    })
    return { stdout: result.stdout, stderr: result.stderr }
  } catch (error) {
    const stderr =
      error instanceof ExecaError && typeof error.stderr === 'string'
        ? error.stderr
        : undefined
    throw new ProcessError(`The external command '${display}' failed to execute.`, {
      command: display,
      stderr,
      cause: error,
    })
  }
}

export async function readVersionOutput(
  binaryPath: string,
  args: string[] = ['--version'],
): Promise<string> {
  const { stdout } = await runCommand(binaryPath, args)
  return stdout
}

/**
 * Returns the first capture group of `pattern` in `output`.
 */
export function parseVersion(output: string, pattern: RegExp): string {
  const match = output.match(pattern)
  const version = match?.[1]
  if (!version) {
    throw new ProcessError(
      `Failed to parse a version from output: '${output.trim()}'`,
      { command: pattern.source },
    )
  }
  return version
}
