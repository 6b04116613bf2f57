import { join } from 'node:path'
import type { ToolSpec } from '../types.js'

export const helix = Object.freeze<ToolSpec>({
  id: 'helix',
  repo: 'helix-editor/helix',
  binaryName: 'hx',
  pathInArchive: 'hx',
  genericLinux: true,
  extensions: { linux: 'tar.xz', android: 'tar.xz', macos: 'zip' },
  variant: {
    kind: 'version-locked-runtime',
    segment: 'runtime',
    versionArgs: ['--version'],
    // "helix 24.07 (...)", "helix 25.01.1 (...)"
    versionPattern: /helix (\d+\.\d+(?:\.\d+)?)/,
    userRuntimeDir: (userConfigDir: string) => join(userConfigDir, 'helix', 'runtime'),
  },
})
