import type { ToolSpec } from '../types.js'

export const ripgrep = Object.freeze<ToolSpec>({
  id: 'ripgrep',
  repo: 'BurntSushi/ripgrep',
  binaryName: 'rg',
  variant: { kind: 'simple' },
})
