import type { ToolSpec } from '../types.js'

export const zoxide = Object.freeze<ToolSpec>({
  id: 'zoxide',
  repo: 'ajeetdsouza/zoxide',
  binaryName: 'zoxide',
  variant: { kind: 'simple' },
})
