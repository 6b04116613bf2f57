export type ShellnestErrorCode =
  | 'NETWORK'
  | 'API_SHAPE'
  | 'ASSET_NOT_FOUND'
  | 'UNSUPPORTED_PLATFORM'
  | 'ARCHIVE'
  | 'SYMLINK'
  | 'PROCESS'
  | 'PROVISIONING_FAILED'

export type ErrorContext = Record<string, unknown>

export class ShellnestError extends Error {
  readonly code: ShellnestErrorCode
  readonly context: ErrorContext

  constructor(
    code: ShellnestErrorCode,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'ShellnestError'
    this.code = code
    this.context = options.context ?? {}
  }
}

/**
 * Raised for failed requests. `transient` marks failures worth another
 * attempt: the request never completed, or the server answered 5xx / 429.
 */
export class NetworkError extends ShellnestError {
  readonly transient: boolean
  readonly status?: number

  constructor(
    message: string,
    options: {
      url: string
      transient: boolean
      status?: number
      cause?: unknown
    },
  ) {
    super('NETWORK', message, {
      context: { url: options.url, status: options.status },
      cause: options.cause,
    })
    this.name = 'NetworkError'
    this.transient = options.transient
    this.status = options.status
  }
}

export class ApiShapeError extends ShellnestError {
  constructor(message: string, context: ErrorContext = {}) {
    super('API_SHAPE', message, { context })
    this.name = 'ApiShapeError'
  }
}

export class AssetNotFoundError extends ShellnestError {
  constructor(options: { tool: string; os: string; arch: string }) {
    super(
      'ASSET_NOT_FOUND',
      `Could not find a compatible release asset for '${options.tool}' on your platform (${options.os} ${options.arch}).`,
      { context: options },
    )
    this.name = 'AssetNotFoundError'
  }
}

export class UnsupportedPlatformError extends ShellnestError {
  constructor(options: { platform: string; arch: string }) {
    super(
      'UNSUPPORTED_PLATFORM',
      `Unsupported platform: ${options.platform}-${options.arch}. ` +
        `Supported operating systems: linux, android, macos, windows`,
      { context: options },
    )
    this.name = 'UnsupportedPlatformError'
  }
}

export type ArchiveErrorReason =
  | 'UNSUPPORTED_FORMAT'
  | 'ENTRY_NOT_FOUND'
  | 'CORRUPT'

export class ArchiveError extends ShellnestError {
  readonly reason: ArchiveErrorReason

  constructor(
    reason: ArchiveErrorReason,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {},
  ) {
    super('ARCHIVE', message, options)
    this.name = 'ArchiveError'
    this.reason = reason
  }
}

export class SymlinkError extends ShellnestError {
  constructor(
    message: string,
    options: { original: string; link: string; cause?: unknown },
  ) {
    super('SYMLINK', message, {
      context: { original: options.original, link: options.link },
      cause: options.cause,
    })
    this.name = 'SymlinkError'
  }
}

export class ProcessError extends ShellnestError {
  constructor(
    message: string,
    options: { command: string; stderr?: string; cause?: unknown },
  ) {
    super('PROCESS', message, {
      context: { command: options.command, stderr: options.stderr },
      cause: options.cause,
    })
    this.name = 'ProcessError'
  }
}

export function isTransient(error: unknown): boolean {
  return error instanceof NetworkError && error.transient
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
