/**
 * keel Engine
 *
 * Config-driven entry point: loads .keel/config.yaml, builds the logger and
 * the configured state store once, and exposes plan / apply / refresh over
 * a set of providers.
 *
 * @example
 * ```ts
 * const engine = createEngine({ providers: [bucketProvider, dnsProvider] })
 * const { plan } = await engine.plan(resources)
 * const { report } = await engine.apply(resources)
 * ```
 */

import { randomUUID } from 'node:crypto'
import type { ReportEntry, ResourceDeclaration, RunReport, StateRecord, Plan } from './domain/types.js'
import { ProviderRegistry } from './domain/provider.js'
import type { ResourceProvider } from './domain/provider.js'
import { InMemoryStateStore } from './domain/state.js'
import type { StateStore } from './domain/state.js'
import { readPlanArtifact } from './domain/plan.js'
import {
  applySavedPlan,
  reconcile,
  refreshState,
  withStateStore
} from './domain/reconcile.js'
import type { ReconcileResult, RefreshResult } from './domain/reconcile.js'
import type { ExecutorSettings } from './domain/apply.js'
import { loadConfig, resolveConfigPath, toExecutorSettings } from './lib/config-loader.js'
import { InvalidConfigError } from './lib/errors.js'
import { FilesystemStateStore } from './lib/fs-state-store.js'
import { createLogger } from './lib/logger.js'
import type { Logger } from './lib/logger.js'
import { S3dbStateStore } from './lib/s3db-state-store.js'
import type { EngineConfig } from './types.js'

export interface EngineOptions {
  providers: ProviderRegistry | ResourceProvider[]
  /** Use this config instead of loading .keel/config.yaml */
  config?: EngineConfig
  /** Directory config-relative paths resolve against */
  configDir?: string | null
  /** Where to start searching for .keel/ (default: cwd) */
  startDir?: string
  /** Overrides the store described by the config */
  store?: StateStore
  logger?: Logger
  env?: Record<string, string | undefined>
}

export interface RunOptions {
  signal?: AbortSignal
  /** Re-read recorded instances before planning */
  refresh?: boolean
  runId?: string
  onProgress?: (entry: ReportEntry, completed: number, total: number) => void
}

export interface PlanOptions {
  refresh?: boolean
  /** Persist the plan as JSON + Markdown under plan_artifacts_dir */
  writeArtifact?: boolean
  now?: Date
}

/**
 * Instantiate the state driver a config describes.
 */
export function createStateStore(
  config: EngineConfig,
  configDir: string | null,
  logger: Logger
): StateStore {
  const { state } = config

  switch (state.driver) {
    case 'memory':
      return new InMemoryStateStore()

    case 'filesystem':
      return new FilesystemStateStore(resolveConfigPath(configDir, state.path ?? 'state'), logger)

    case 's3db':
      if (!state.connection_string) {
        throw new InvalidConfigError('state.connection_string is required for the s3db driver')
      }
      return new S3dbStateStore({
        connectionString: state.connection_string,
        passphrase: state.passphrase,
        logger
      })
  }
}

export class KeelEngine {
  readonly config: EngineConfig
  readonly configDir: string | null
  readonly providers: ProviderRegistry
  readonly store: StateStore
  readonly logger: Logger

  constructor(options: EngineOptions) {
    if (options.config) {
      this.config = options.config
      this.configDir = options.configDir ?? null
    } else {
      const loaded = loadConfig({ startDir: options.startDir, env: options.env })
      this.config = loaded.config
      this.configDir = loaded.configDir
    }

    this.logger = options.logger ?? createLogger({ verbose: this.config.verbose })
    this.providers = options.providers instanceof ProviderRegistry
      ? options.providers
      : new ProviderRegistry(options.providers)
    this.store = options.store ?? createStateStore(this.config, this.configDir, this.logger)
  }

  private get settings(): ExecutorSettings {
    return toExecutorSettings(this.config)
  }

  private get artifactDir(): string {
    return resolveConfigPath(this.configDir, this.config.plan_artifacts_dir)
  }

  /**
   * Compute a plan without executing it.
   */
  plan(resources: ResourceDeclaration[], options: PlanOptions = {}): Promise<ReconcileResult> {
    return reconcile({
      resources,
      providers: this.providers,
      store: this.store,
      settings: this.settings,
      logger: this.logger,
      lock: this.config.lock.enabled,
      planOnly: true,
      refresh: options.refresh,
      now: options.now,
      ...(options.writeArtifact ? { artifactDir: this.artifactDir } : {})
    })
  }

  /**
   * Plan and execute in one locked run.
   */
  apply(resources: ResourceDeclaration[], options: RunOptions = {}): Promise<ReconcileResult> {
    return reconcile({
      resources,
      providers: this.providers,
      store: this.store,
      settings: this.settings,
      logger: this.logger,
      lock: this.config.lock.enabled,
      ...options
    })
  }

  /**
   * Execute a saved plan, given directly or as an artifact path.
   */
  applyPlan(
    plan: Plan | string,
    resources: ResourceDeclaration[],
    options: Omit<RunOptions, 'refresh'> = {}
  ): Promise<RunReport> {
    return applySavedPlan({
      plan: typeof plan === 'string' ? readPlanArtifact(plan) : plan,
      resources,
      providers: this.providers,
      store: this.store,
      settings: this.settings,
      logger: this.logger,
      lock: this.config.lock.enabled,
      ...options
    })
  }

  /**
   * Re-read every recorded instance and mark drift.
   */
  refresh(runId?: string): Promise<RefreshResult> {
    return withStateStore(this.store, this.config.lock.enabled, runId ?? randomUUID(), () =>
      refreshState({
        store: this.store,
        providers: this.providers,
        settings: this.settings,
        logger: this.logger
      }))
  }

  /**
   * Every state record, sorted by id.
   */
  state(): Promise<StateRecord[]> {
    return withStateStore(this.store, false, 'read', () => this.store.list())
  }
}

export function createEngine(options: EngineOptions): KeelEngine {
  return new KeelEngine(options)
}
