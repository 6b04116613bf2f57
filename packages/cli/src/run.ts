import { resolve } from 'node:path'
import { Command } from 'commander'
import {
  DEFAULT_ENV_DIR,
  describeError,
  detectHost,
  expandHome,
  loadSettings,
  setLevel,
  setVerbosity,
  type HostTarget,
  type HttpClient,
} from '@shellnest/core'
import {
  RollbackFailedError,
  setupEnvironment,
  type ProvisionContext,
  type RunReport,
  type SetupOptions,
} from '@shellnest/provision'
import { colors, createConsoleProgress, type Writer } from './progress.js'

export type CliDependencies = {
  client?: HttpClient
  env?: Record<string, string | undefined>
  host?: () => Promise<HostTarget>
  searchPath?: string
  stdout?: Writer
  stderr?: Writer
  setup?: SetupOptions
}

type CliOptions = { verbose: number }

function describeOutcome(report: RunReport): string[] {
  return report.outcomes.map((outcome) => {
    switch (outcome.kind) {
      case 'already-present':
        return `  ${outcome.tool}: already present`
      case 'symlinked-from-system':
        return `  ${outcome.tool}: linked to ${outcome.systemPath}`
      case 'installed-from-release':
        return `  ${outcome.tool}: installed ${outcome.tag} (${outcome.asset})`
      case 'failed':
        return `  ${outcome.tool}: failed`
    }
  })
}

async function provision(
  dest: string,
  options: CliOptions,
  deps: CliDependencies,
): Promise<number> {
  const out = deps.stdout ?? ((text: string) => process.stdout.write(text))
  const err = deps.stderr ?? ((text: string) => process.stderr.write(text))
  const settings = loadSettings(deps.env)

  if (options.verbose > 0) {
    setVerbosity(options.verbose)
  } else {
    setLevel(settings.logLevel)
  }

  const root = resolve(expandHome(dest))

  try {
    const host = await (deps.host ?? detectHost)()
    const ctx: ProvisionContext = {
      root,
      client: deps.client ?? fetch,
      host,
      apiBase: settings.apiBase,
      githubToken: settings.githubToken,
      searchPath: deps.searchPath,
      userConfigDir: settings.userConfigDir,
      progress: createConsoleProgress(err),
    }

    out(`${colors.cyan}▶${colors.reset} Setting up shell environment in ${root}\n`)
    const report = await setupEnvironment(ctx, deps.setup)

    out(`\n${colors.green}✓${colors.reset} Environment ready:\n`)
    out(`${describeOutcome(report).join('\n')}\n`)
    out(`\nTo activate your new shell environment, run:\n`)
    out(`  source ${root}/activate.sh\n`)
    return 0
  } catch (error) {
    err(`\n${colors.red}Fatal:${colors.reset} ${describeError(error)}\n`)
    if (!(error instanceof RollbackFailedError)) {
      err(`${colors.dim}Cleaned up ${root}.${colors.reset}\n`)
    }
    return 1
  }
}

export function buildProgram(
  deps: CliDependencies,
  onExit: (code: number) => void,
): Command {
  return new Command()
    .name('shellnest')
    .description('Provision an isolated shell environment (fish, starship, atuin, zoxide, ripgrep, helix)')
    .version('0.1.0')
    .argument('[dest]', 'Environment directory', DEFAULT_ENV_DIR)
    .option(
      '-v, --verbose',
      'Increase log verbosity (-v info, -vv debug, -vvv trace)',
      (_value: string, previous: number) => previous + 1,
      0,
    )
    .action(async (dest: string, options: CliOptions) => {
      onExit(await provision(dest, options, deps))
    })
}

/**
 * Parses `argv` (as found in `process.argv`) and runs the CLI. Resolves to
 * the process exit code.
 */
export async function run(
  argv: string[],
  deps: CliDependencies = {},
): Promise<number> {
  let exitCode = 0
  const program = buildProgram(deps, (code) => {
    exitCode = code
  })
  await program.parseAsync(argv)
  return exitCode
}
