import { destination, pino } from 'pino'
import type { LevelWithSilent, Logger } from 'pino'

export type { Logger }

export const logger: Logger = pino(
  {
    name: 'shellnest',
    level: process.env['SHELLNEST_LOG_LEVEL'] ?? 'silent',
  },
  destination(2),
)

/**
 * Maps a `-v` count onto a pino level. Logs stay off by default so the
 * progress output is the only thing on the terminal.
 */
export function levelForVerbosity(verbosity: number): LevelWithSilent {
  if (verbosity <= 0) return 'silent'
  if (verbosity === 1) return 'info'
  if (verbosity === 2) return 'debug'
  return 'trace'
}

// Children copy the level they were created with; keep the module-level
// ones around so a later level change reaches them.
const components = new Set<Logger>()

export function createLogger(component: string): Logger {
  const child = logger.child({ component })
  components.add(child)
  return child
}

export function setLevel(level: string): void {
  logger.level = level
  for (const child of components) {
    child.level = level
  }
}

export function setVerbosity(verbosity: number): void {
  setLevel(levelForVerbosity(verbosity))
}
