// Errors
export {
  type ShellnestErrorCode,
  type ErrorContext,
  type ArchiveErrorReason,
  ShellnestError,
  NetworkError,
  ApiShapeError,
  AssetNotFoundError,
  UnsupportedPlatformError,
  ArchiveError,
  SymlinkError,
  ProcessError,
  isTransient,
  describeError,
} from './errors.js'

// Logging and settings
export {
  type Logger,
  logger,
  createLogger,
  levelForVerbosity,
  setLevel,
  setVerbosity,
} from './logger.js'
export {
  type Settings,
  USER_AGENT,
  DEFAULT_API_BASE,
  DEFAULT_ENV_DIR,
  getApiBase,
  getUserConfigDir,
  expandHome,
  loadSettings,
} from './settings.js'

// Platform detection
export {
  type HostOs,
  type HostTarget,
  type GlibcVersion,
  SUPPORTED_OS,
  detectOs,
  detectHost,
  normalizeArch,
  executableExtension,
  compareGlibc,
  parseGlibcVersion,
  probeGlibcVersion,
} from './platform.js'

// Processes and search path
export {
  type CommandOutput,
  runCommand,
  readVersionOutput,
  parseVersion,
} from './process.js'
export { type SearchOptions, findExecutable } from './search-path.js'

// Progress and retry
export {
  type ProgressReporter,
  type ProgressFactory,
  silentProgress,
  silentProgressFactory,
  formatBytes,
} from './progress.js'
export {
  type RetryPolicy,
  type RetryOptions,
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  withRetry,
} from './retry.js'

// Download utilities
export {
  type HttpClient,
  type RequestOptions,
  type DownloadHandle,
  type DownloadOptions,
  request,
  downloadToTemp,
} from './download.js'

// Release resolution
export {
  type Release,
  type ReleaseAsset,
  type ReleaseSpecifier,
  type MatchRules,
  type FetchReleaseOptions,
  DEFAULT_MIN_GLIBC,
  releaseUrl,
  parseRelease,
  fetchRelease,
  osTargets,
  assetExtension,
  baseName,
  matchAsset,
  findReleaseAsset,
} from './release.js'

// Extract utilities
export {
  type ArchiveKind,
  type ExtractShape,
  type ExtractOptions,
  getArchiveType,
  archiveKindFromName,
  mapEntryPath,
  extractArchive,
  makeExecutable,
} from './extract.js'

// Symlinks
export { relativeLinkTarget, createSymlink } from './symlink.js'
