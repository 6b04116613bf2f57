import type { ToolSpec } from '../types.js'
import { atuin } from './atuin.js'
import { fish } from './fish.js'
import { helix } from './helix.js'
import { ripgrep } from './ripgrep.js'
import { starship } from './starship.js'
import { zoxide } from './zoxide.js'

export { atuin, fish, helix, ripgrep, starship, zoxide }

/** Every tool an environment gets, in display order. */
export const TOOLS: readonly ToolSpec[] = Object.freeze([
  fish,
  starship,
  zoxide,
  atuin,
  ripgrep,
  helix,
])
