// Types
export type {
  ToolSpec,
  ToolVariant,
  ProvisionContext,
  ProvisionOutcome,
  EnvironmentPaths,
} from './types.js'

// Tool catalogue
export {
  TOOLS,
  atuin,
  fish,
  helix,
  ripgrep,
  starship,
  zoxide,
} from './tools/index.js'

// Errors
export {
  ToolProvisionError,
  ProvisioningFailedError,
  RollbackFailedError,
} from './errors.js'

// Provisioning
export {
  environmentPaths,
  binaryFileName,
  binaryInArchive,
  installRoot,
} from './paths.js'
export { type ToolHooks, hooksFor } from './hooks.js'
export {
  matchRulesFor,
  resolveAsset,
  fetchAndExtract,
  installFromRelease,
} from './install.js'
export { provisionTool } from './provisioner.js'
export {
  type RunReport,
  type SetupOptions,
  createSkeleton,
  provisionAll,
  rollback,
  setupEnvironment,
} from './orchestrator.js'

// Configuration files
export { type ConfigFile, configFiles, generateConfigs } from './configs.js'
