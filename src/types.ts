/**
 * keel - Configuration Types
 *
 * Shape of `.keel/config.yaml`. Keys are snake_case as written in YAML.
 */

// ============================================================================
// State Backend
// ============================================================================

export type StateDriver = 'memory' | 'filesystem' | 's3db'

export interface StateConfig {
  driver: StateDriver
  /** Directory for the filesystem driver, relative to the config directory */
  path?: string
  /** s3db.js connection string, e.g. s3://KEY:SECRET@bucket/prefix */
  connection_string?: string
  /** s3db.js passphrase for encrypted fields */
  passphrase?: string
}

// ============================================================================
// Execution
// ============================================================================

export interface RetryConfig {
  max_attempts: number
  delay_ms: number
  backoff_multiplier: number
  max_delay_ms: number
}

export interface WaitConfig {
  timeout_ms: number
  initial_delay_ms: number
  max_delay_ms: number
  backoff_multiplier: number
}

export interface LockConfig {
  enabled: boolean
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface EngineConfig {
  version: '1'
  /** Inherit from another config file, relative to this one */
  extends?: string
  /** Actions in flight at once within a wave */
  parallelism: number
  retry: RetryConfig
  wait: WaitConfig
  state: StateConfig
  lock: LockConfig
  /** Where plan artifacts are written, relative to the config directory */
  plan_artifacts_dir: string
  verbose: boolean
}

/** Partial config as found in a single YAML file */
export interface EngineConfigInput {
  version?: '1'
  extends?: string
  parallelism?: number
  retry?: Partial<RetryConfig>
  wait?: Partial<WaitConfig>
  state?: Partial<StateConfig>
  lock?: Partial<LockConfig>
  plan_artifacts_dir?: string
  verbose?: boolean
}
