import type {
  ArchiveKind,
  GlibcVersion,
  HostOs,
  HostTarget,
  HttpClient,
  ProgressFactory,
  RetryOptions,
} from '@shellnest/core'

/**
 * How a tool deviates from plain "link it or download it".
 *
 * - `simple`: nothing extra.
 * - `requires-aux-data`: some platform archives leave out a data directory
 *   (`<installDir>/<segment>`); after a remote install it is taken from the
 *   release's source tarball instead.
 * - `version-locked-runtime`: when the binary comes from the system and the
 *   user has no runtime directory of their own, the runtime matching the
 *   system binary's exact version is fetched into `<installDir>/<segment>`.
 */
export type ToolVariant =
  | { kind: 'simple' }
  | { kind: 'requires-aux-data'; segment: string }
  | {
      kind: 'version-locked-runtime'
      segment: string
      versionArgs: string[]
      versionPattern: RegExp
      userRuntimeDir: (userConfigDir: string) => string
    }

export type ToolSpec = Readonly<{
  id: string
  /** `owner/name` of the repository hosting the releases. */
  repo: string
  binaryName: string
  /**
   * Binary path inside the release archive, relative to its wrapping
   * directory. When set the whole archive is unpacked into `installDir`;
   * otherwise only the binary is pulled into bin/.
   */
  pathInArchive?: string
  /** Defaults to the tool id. */
  installDir?: string
  minGlibc?: GlibcVersion
  genericLinux?: boolean
  extensions?: Partial<Record<HostOs, ArchiveKind>>
  variant: ToolVariant
}>

/**
 * Shared, read-only state handed to every provisioning task.
 */
export type ProvisionContext = {
  root: string
  client: HttpClient
  host: HostTarget
  apiBase: string
  githubToken?: string
  /** Search path for system tools; defaults to the process PATH. */
  searchPath?: string
  userConfigDir: string
  progress: ProgressFactory
  retry?: RetryOptions
}

export type ProvisionOutcome =
  | { kind: 'already-present'; tool: string; path: string }
  | { kind: 'symlinked-from-system'; tool: string; systemPath: string }
  | { kind: 'installed-from-release'; tool: string; asset: string; tag: string }
  | { kind: 'failed'; tool: string; error: Error }

export type EnvironmentPaths = {
  root: string
  bin: string
  config: string
  data: string
}
