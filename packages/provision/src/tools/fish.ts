import type { ToolSpec } from '../types.js'

export const fish = Object.freeze<ToolSpec>({
  id: 'fish',
  repo: 'fish-shell/fish-shell',
  binaryName: 'fish',
  pathInArchive: 'fish',
  installDir: 'fish_runtime',
  genericLinux: true,
  extensions: { linux: 'tar.xz', android: 'tar.xz', macos: 'tar.xz' },
  // macOS archives ship without share/ (completions, functions)
  variant: { kind: 'requires-aux-data', segment: 'share' },
})
