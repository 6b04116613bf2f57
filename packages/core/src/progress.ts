/**
 * Progress sink used by the downloader and the provisioner. The core only
 * calls into it; rendering lives with whoever supplies the implementation.
 */
export interface ProgressReporter {
  setMessage(message: string): void
  setLength(total: number): void
  setPosition(position: number): void
  increment(delta: number): void
  finish(message?: string): void
  abandon(message?: string): void
}

export type ProgressFactory = (label: string) => ProgressReporter

export const silentProgress: ProgressReporter = {
  setMessage() {},
  setLength() {},
  setPosition() {},
  increment() {},
  finish() {},
  abandon() {},
}

export const silentProgressFactory: ProgressFactory = () => silentProgress

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}
