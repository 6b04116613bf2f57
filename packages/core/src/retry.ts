import { isTransient } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('retry')

export type RetryPolicy = {
  attempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
}

export type RetryOptions = Partial<RetryPolicy> & {
  shouldRetry?: (error: unknown) => boolean
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  label?: string
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Exponential backoff with full jitter: attempt n waits a random slice of
 * min(maxDelay, baseDelay * 2^(n-1)).
 */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * 2 ** Math.max(0, attempt - 1),
  )
  return Math.floor(ceiling * random())
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    attempts = DEFAULT_RETRY_POLICY.attempts,
    baseDelayMs = DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_POLICY.maxDelayMs,
    shouldRetry = isTransient,
    sleep = defaultSleep,
    random = Math.random,
    label = 'operation',
  } = options

  let attempt = 1
  while (true) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error
      }
      const delay = backoffDelay(attempt, { baseDelayMs, maxDelayMs }, random)
      log.debug({ label, attempt, delay, err: error }, 'Retrying after failure')
      await sleep(delay)
      attempt++
    }
  }
}
