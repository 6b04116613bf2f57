import type { ToolSpec } from '../types.js'

export const starship = Object.freeze<ToolSpec>({
  id: 'starship',
  repo: 'starship/starship',
  binaryName: 'starship',
  variant: { kind: 'simple' },
})
