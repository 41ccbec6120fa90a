/**
 * keel Reconcile Workflow
 *
 * declare → graph → (refresh) → plan → apply, under one advisory lock.
 */

import { randomUUID } from 'node:crypto'
import { isDeepStrictEqual } from 'node:util'
import { StalePlanError, isProviderError, toProviderError } from '../lib/errors.js'
import { silentLogger } from '../lib/logger.js'
import type { Logger } from '../lib/logger.js'
import { withRetry } from '../lib/timeout.js'
import { executePlan, resolveExecutorSettings } from './apply.js'
import type { ExecutorSettingsInput } from './apply.js'
import { buildGraph } from './graph.js'
import { computePlan, isPlanStale, writePlanArtifact } from './plan.js'
import type { PlanArtifactPaths } from './plan.js'
import type { ProviderRegistry } from './provider.js'
import { declareResource } from './resource.js'
import type { LockHandle, StateStore } from './state.js'
import type {
  Graph,
  Plan,
  ReportEntry,
  ResourceDeclaration,
  ResourceId,
  RunReport
} from './types.js'

// ============================================================================
// Refresh
// ============================================================================

export interface RefreshOptions {
  store: StateStore
  providers: ProviderRegistry
  settings?: ExecutorSettingsInput
  logger?: Logger
}

export interface RefreshResult {
  checked: number
  /** Records whose instance no longer exists */
  missing: ResourceId[]
  /** Records whose attributes differ from the provider */
  drifted: ResourceId[]
}

/**
 * Re-read every recorded instance from its provider.
 *
 * - instance gone → record dropped, so the next plan creates it again
 *   (kept and tainted when it still tracks deposed instances)
 * - attributes differ → record marked drifted, so the next plan updates it
 *
 * Versions are left alone: refresh observes, it does not apply.
 */
export async function refreshState(options: RefreshOptions): Promise<RefreshResult> {
  const { store, providers, logger = silentLogger } = options
  const { retry } = resolveExecutorSettings(options.settings)
  const result: RefreshResult = { checked: 0, missing: [], drifted: [] }

  for (const record of await store.list()) {
    const provider = providers.get(record.type)
    if (!provider) {
      logger.warn(`Refresh: no provider for "${record.type}", skipping ${record.id}`)
      continue
    }

    const observed = await withRetry(
      async () => {
        try {
          return await provider.read(record.instanceId, { resourceId: record.id, logger })
        } catch (error) {
          throw toProviderError(error, record.id, 'read')
        }
      },
      { ...retry, shouldRetry: error => isProviderError(error) && error.retryable }
    )
    result.checked++

    if (!observed) {
      logger.warn(`Refresh: ${record.id} (${record.instanceId}) no longer exists`)
      result.missing.push(record.id)
      await store.update(record.id, current => {
        if (!current || current.instanceId !== record.instanceId) return current
        return current.deposed.length > 0 ? { ...current, tainted: true } : undefined
      })
      continue
    }

    const drifted = Object.keys(record.attributes).filter(key =>
      Object.hasOwn(observed.attributes, key) &&
      !isDeepStrictEqual(observed.attributes[key], record.attributes[key]))

    if (drifted.length > 0) {
      logger.info(`Refresh: ${record.id} drifted on ${drifted.join(', ')}`)
      result.drifted.push(record.id)
    }

    await store.update(record.id, current => current && {
      ...current,
      outputs: { ...current.outputs, ...observed.outputs },
      drifted
    })
  }

  return result
}

// ============================================================================
// Reconcile
// ============================================================================

export interface ReconcileOptions {
  resources: ResourceDeclaration[]
  providers: ProviderRegistry
  store: StateStore
  settings?: ExecutorSettingsInput
  signal?: AbortSignal
  logger?: Logger
  runId?: string
  /** Re-read recorded instances before planning (default: false) */
  refresh?: boolean
  /** Compute the plan without executing it */
  planOnly?: boolean
  /** Take the store's advisory lock (default: true) */
  lock?: boolean
  /** Write the plan as JSON + Markdown into this directory */
  artifactDir?: string
  onProgress?: (entry: ReportEntry, completed: number, total: number) => void
  now?: Date
}

export interface ReconcileResult {
  plan: Plan
  /** null for plan-only runs */
  report: RunReport | null
  refresh?: RefreshResult
  artifact?: PlanArtifactPaths
}

/**
 * Converge the world toward the declared resources.
 *
 * Graph errors surface before the store is opened, so a malformed
 * declaration never causes a side effect.
 */
export async function reconcile(options: ReconcileOptions): Promise<ReconcileResult> {
  const {
    providers,
    store,
    logger = silentLogger,
    runId = randomUUID(),
    refresh = false,
    planOnly = false,
    lock = true
  } = options

  const graph = buildGraph(options.resources.map(declareResource), { schemas: providers.schemas() })

  // Plan-only runs write nothing unless they refresh
  return withStateStore(store, lock && (!planOnly || refresh), runId, async () => {
    const refreshed = refresh
      ? await refreshState({ store, providers, settings: options.settings, logger })
      : undefined

    const plan = computePlan({
      graph,
      records: await store.list(),
      schemas: providers.schemas(),
      now: options.now
    })
    logger.info(
      `Plan ${plan.id}: ${plan.summary.toCreate} to create, ${plan.summary.toUpdate} to update, ` +
      `${plan.summary.toReplace} to replace, ${plan.summary.toDelete} to delete, ${plan.summary.unchanged} unchanged`
    )

    const artifact = options.artifactDir
      ? writePlanArtifact(plan, options.artifactDir, providers.schemas())
      : undefined

    const report = planOnly
      ? null
      : await execute(plan, graph, options, runId, logger)

    return {
      plan,
      report,
      ...(refreshed ? { refresh: refreshed } : {}),
      ...(artifact ? { artifact } : {})
    }
  })
}

export interface ApplySavedPlanOptions extends Omit<ReconcileOptions, 'refresh' | 'planOnly' | 'artifactDir' | 'now'> {
  plan: Plan
}

/**
 * Execute a previously computed plan.
 *
 * @throws StalePlanError when the state changed since the plan was computed
 */
export async function applySavedPlan(options: ApplySavedPlanOptions): Promise<RunReport> {
  const { plan, providers, store, logger = silentLogger, runId = randomUUID(), lock = true } = options

  const graph = buildGraph(options.resources.map(declareResource), { schemas: providers.schemas() })

  return withStateStore(store, lock, runId, async () => {
    if (isPlanStale(plan, await store.list())) {
      throw new StalePlanError(plan.id)
    }
    return execute(plan, graph, options, runId, logger)
  })
}

function execute(
  plan: Plan,
  graph: Graph,
  options: Pick<ReconcileOptions, 'providers' | 'store' | 'settings' | 'signal' | 'onProgress'>,
  runId: string,
  logger: Logger
): Promise<RunReport> {
  return executePlan({
    plan,
    graph,
    providers: options.providers,
    store: options.store,
    settings: options.settings,
    signal: options.signal,
    onProgress: options.onProgress,
    logger,
    runId,
    lock: false
  })
}

/**
 * open → lock → work → release → close, releasing on every path.
 */
export async function withStateStore<T>(
  store: StateStore,
  lock: boolean,
  runId: string,
  work: () => Promise<T>
): Promise<T> {
  if (store.open) {
    await store.open()
  }
  let handle: LockHandle | undefined
  try {
    if (lock && store.lock) {
      handle = await store.lock(runId)
    }
    return await work()
  } finally {
    if (handle) {
      await handle.release()
    }
    if (store.close) {
      await store.close()
    }
  }
}
