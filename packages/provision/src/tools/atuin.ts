import type { ToolSpec } from '../types.js'

export const atuin = Object.freeze<ToolSpec>({
  id: 'atuin',
  repo: 'atuinsh/atuin',
  binaryName: 'atuin',
  // the gnu build links against glibc 2.35
  minGlibc: { major: 2, minor: 35 },
  variant: { kind: 'simple' },
})
