import {
  formatBytes,
  type ProgressFactory,
  type ProgressReporter,
} from '@shellnest/core'

export const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

export type Writer = (text: string) => void

/**
 * One line per event, prefixed with the tool, so concurrent tasks can share
 * a terminal. Downloads report in 25% steps.
 */
export function createConsoleProgress(write: Writer): ProgressFactory {
  return (label: string): ProgressReporter => {
    const prefix = `${colors.dim}[${label}]${colors.reset} `
    let length = 0
    let position = 0
    let lastStep = -1
    let message = ''

    const report = () => {
      if (length <= 0) return
      const percent = Math.min(100, Math.floor((position / length) * 100))
      const step = Math.floor(percent / 25)
      if (step === lastStep) return
      lastStep = step
      write(
        `${prefix}${message} ${percent}% (${formatBytes(position)}/${formatBytes(length)})\n`,
      )
    }

    return {
      setMessage(next) {
        if (next === message) return
        message = next
        write(`${prefix}${next}\n`)
      },
      setLength(next) {
        length = next
        lastStep = -1
      },
      setPosition(next) {
        position = next
        report()
      },
      increment(delta) {
        position += delta
        report()
      },
      finish(done) {
        write(`${prefix}${colors.green}✓${colors.reset} ${done ?? message}\n`)
      },
      abandon(reason) {
        write(`${prefix}${colors.red}✗${colors.reset} ${reason ?? message}\n`)
      },
    }
  }
}
