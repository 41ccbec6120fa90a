/**
 * keel - dependency-aware reconciliation engine
 *
 * Main library exports for programmatic usage
 */

// Engine
export { KeelEngine, createEngine, createStateStore } from './engine.js'
export type { EngineOptions, RunOptions, PlanOptions } from './engine.js'

// Domain
export * from './domain/index.js'

// Config
export type {
  EngineConfig,
  EngineConfigInput,
  StateConfig,
  StateDriver,
  RetryConfig,
  WaitConfig,
  LockConfig
} from './types.js'

export {
  loadConfig,
  findConfigDir,
  configExists,
  createDefaultConfig,
  expandEnvVars,
  toExecutorSettings,
  DEFAULT_CONFIG
} from './lib/config-loader.js'
export type { LoadConfigOptions, LoadedConfig } from './lib/config-loader.js'

// State drivers
export { FilesystemStateStore } from './lib/fs-state-store.js'
export { S3dbStateStore } from './lib/s3db-state-store.js'
export type { S3dbStateStoreOptions } from './lib/s3db-state-store.js'

// Logging
export { createLogger, silentLogger } from './lib/logger.js'
export type { Logger, LoggerOptions } from './lib/logger.js'

// Errors
export {
  KeelError,
  GraphError,
  CycleError,
  UnresolvedReferenceError,
  DuplicateResourceError,
  UnknownResourceTypeError,
  PlanError,
  PreventDestroyError,
  ProviderError,
  WaitTimeoutError,
  StateError,
  LockContentionError,
  StateCorruptionError,
  StalePlanError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  isKeelError,
  isGraphError,
  isPlanError,
  isProviderError,
  isStateError,
  isConfigError,
  formatErrorForCli,
  wrapError
} from './lib/errors.js'
export type { ProviderOperation, LockHolder } from './lib/errors.js'
