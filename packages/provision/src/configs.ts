import { chmod, mkdir, writeFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { createLogger } from '@shellnest/core'
import { environmentPaths } from './paths.js'

const log = createLogger('configs')

// Resolves its own directory, so the environment can be moved.
const ACTIVATE_SCRIPT = `#!/bin/sh

ENV_DIR=$(cd "$(dirname "$0")" && pwd -P)

export PATH="$ENV_DIR/bin:$PATH"
export STARSHIP_CONFIG="$ENV_DIR/config/starship.toml"
export ATUIN_CONFIG_DIR="$ENV_DIR/config/atuin"
export HELIX_CONFIG="$ENV_DIR/config/helix/config.toml"
export FISH_HOME="$ENV_DIR/fish_runtime"
if [ -d "$ENV_DIR/helix/runtime" ]; then
  export HELIX_RUNTIME="$ENV_DIR/helix/runtime"
fi

exec "$ENV_DIR/bin/fish" -l -C "source '$ENV_DIR/config/fish/config.fish'"
`

const FISH_CONFIG = `# Prompt
starship init fish | source

# Shell history
atuin init fish | source

# Directory jumper
zoxide init fish | source

echo "Welcome to your isolated shell environment!"
echo "Type 'exit' to return to your regular shell."
`

const STARSHIP_CONFIG = `# Inserts a blank line between shell prompts
add_newline = true

[character]
success_symbol = "[➜](bold green)"
error_symbol = "[➜](bold red)"
`

const HELIX_CONFIG = `theme = "default"

[editor]
line-number = "relative"
mouse = true
`

function atuinConfig(dataDir: string): string {
  return `# History stays inside the environment.
db_path = "${join(dataDir, 'atuin', 'history.db')}"
sync_frequency = "5m"
sync_address = "https://api.atuin.sh"
`
}

export type ConfigFile = {
  path: string
  content: string
  mode?: number
}

/**
 * Every file the generator writes, with paths inside `root`.
 */
export function configFiles(root: string): ConfigFile[] {
  const paths = environmentPaths(resolve(root))
  return [
    { path: join(paths.root, 'activate.sh'), content: ACTIVATE_SCRIPT, mode: 0o755 },
    { path: join(paths.config, 'fish', 'config.fish'), content: FISH_CONFIG },
    { path: join(paths.config, 'starship.toml'), content: STARSHIP_CONFIG },
    { path: join(paths.config, 'atuin', 'config.toml'), content: atuinConfig(paths.data) },
    { path: join(paths.config, 'helix', 'config.toml'), content: HELIX_CONFIG },
  ]
}

export async function generateConfigs(root: string): Promise<void> {
  await mkdir(join(resolve(root), 'data', 'atuin'), { recursive: true })

  for (const file of configFiles(root)) {
    await mkdir(dirname(file.path), { recursive: true })
    await writeFile(file.path, file.content)
    if (file.mode !== undefined) {
      await chmod(file.path, file.mode)
    }
    log.debug({ path: file.path }, 'Wrote config file')
  }
}
