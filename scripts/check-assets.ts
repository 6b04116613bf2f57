#!/usr/bin/env tsx
/**
 * Check which release asset every tool resolves to on each platform
 *
 * Fetches the latest release of each tool once and runs the matcher for a
 * set of host targets, so naming changes upstream show up before users hit
 * them. Needs network access.
 *
 * Usage:
 *   npm run check-assets
 *   npm run check-assets -- --tool helix
 *   npm run check-assets -- --platform linux-aarch64
 */

import {
  describeError,
  fetchRelease,
  loadSettings,
  matchAsset,
  type HostTarget,
} from '@shellnest/core'
import { matchRulesFor, TOOLS, type ToolSpec } from '@shellnest/provision'

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

type Platform = { label: string; host: HostTarget }

const PLATFORMS: Platform[] = [
  { label: 'linux-x86_64 (glibc 2.39)', host: { os: 'linux', arch: 'x86_64', glibc: { major: 2, minor: 39 } } },
  { label: 'linux-x86_64 (glibc 2.31)', host: { os: 'linux', arch: 'x86_64', glibc: { major: 2, minor: 31 } } },
  { label: 'linux-aarch64 (musl)', host: { os: 'linux', arch: 'aarch64', glibc: null } },
  { label: 'android-aarch64', host: { os: 'android', arch: 'aarch64', glibc: null } },
  { label: 'macos-x86_64', host: { os: 'macos', arch: 'x86_64', glibc: null } },
  { label: 'macos-aarch64', host: { os: 'macos', arch: 'aarch64', glibc: null } },
  { label: 'windows-x86_64', host: { os: 'windows', arch: 'x86_64', glibc: null } },
]

function parseArgs(): { tool: string | null; platform: string | null } {
  const args = process.argv.slice(2)
  let tool: string | null = null
  let platform: string | null = null

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--tool':
        tool = args[++i] ?? null
        break
      case '--platform':
        platform = args[++i] ?? null
        break
      case '--help':
      case '-h':
        console.log(`
Usage: npm run check-assets -- [options]

Options:
  --tool <id>          Only check one tool (e.g., ripgrep)
  --platform <prefix>  Only check platforms whose label starts with prefix
  --help               Show this help
`)
        process.exit(0)
    }
  }

  return { tool, platform }
}

async function checkTool(tool: ToolSpec, platforms: Platform[]): Promise<number> {
  const settings = loadSettings()
  console.log(`\n${colors.cyan}▶${colors.reset} ${tool.id} ${colors.dim}(${tool.repo})${colors.reset}`)

  const release = await fetchRelease({
    client: fetch,
    apiBase: settings.apiBase,
    repo: tool.repo,
    token: settings.githubToken,
  })
  console.log(`  ${colors.dim}latest: ${release.tagName}, ${release.assets.length} assets${colors.reset}`)

  let missing = 0
  for (const { label, host } of platforms) {
    const asset = matchAsset(release.assets, matchRulesFor(tool), host)
    if (asset) {
      console.log(`  ${colors.green}✓${colors.reset} ${label.padEnd(28)} ${asset.name}`)
    } else {
      missing++
      console.log(`  ${colors.yellow}⚠${colors.reset} ${label.padEnd(28)} no match`)
    }
  }
  return missing
}

async function main() {
  const { tool, platform } = parseArgs()

  const tools = tool ? TOOLS.filter((t) => t.id === tool) : TOOLS
  if (tools.length === 0) {
    console.error(`Unknown tool '${tool}'. Known tools: ${TOOLS.map((t) => t.id).join(', ')}`)
    process.exit(1)
  }
  const platforms = platform
    ? PLATFORMS.filter((p) => p.label.startsWith(platform))
    : PLATFORMS

  let missing = 0
  let failed = 0
  for (const spec of tools) {
    try {
      missing += await checkTool(spec, platforms)
    } catch (error) {
      failed++
      console.error(`  ${colors.red}✗${colors.reset} ${describeError(error)}`)
    }
  }

  console.log(`\n${missing} unmatched platform(s), ${failed} failed lookup(s)`)
  if (failed > 0) {
    process.exit(1)
  }
}

main().catch((error) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
