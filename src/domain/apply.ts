/**
 * keel Plan Execution Engine
 *
 * Executes a Plan wave by wave against the providers, recording every
 * confirmed side effect in the state store before anything depending on it
 * starts. A failed action blocks the actions that depend on it; independent
 * branches keep going.
 */

import { randomUUID } from 'node:crypto'
import { runBatch } from '../lib/batch-runner.js'
import {
  KeelError,
  WaitTimeoutError,
  isProviderError,
  toProviderError,
  wrapError
} from '../lib/errors.js'
import type { ProviderOperation } from '../lib/errors.js'
import { silentLogger } from '../lib/logger.js'
import type { Logger } from '../lib/logger.js'
import { pollUntil, withRetry } from '../lib/timeout.js'
import type { ProviderContext, ProviderRegistry, ResourceProvider } from './provider.js'
import { collectReferences, resolveAttributes } from './resource.js'
import { readRecordOutput } from './state.js'
import type { StateStore } from './state.js'
import type {
  Graph,
  NodeStatus,
  Plan,
  PlanAction,
  ReportEntry,
  ResolvedAttributes,
  ResourceId,
  ResourceNode,
  RunReport,
  StateRecord
} from './types.js'
import { emptyRunSummary } from './types.js'

// ============================================================================
// Types
// ============================================================================

export interface RetrySettings {
  /** Attempts per provider operation, first call included */
  maxAttempts: number
  delayMs: number
  backoffMultiplier: number
  maxDelayMs: number
}

export interface WaitSettings {
  /** Default deadline for a WaitCondition */
  timeoutMs: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export interface ExecutorSettings {
  /** Actions in flight at once within a wave */
  parallelism: number
  retry: RetrySettings
  wait: WaitSettings
}

export const DEFAULT_EXECUTOR_SETTINGS: ExecutorSettings = {
  parallelism: 10,
  retry: {
    maxAttempts: 3,
    delayMs: 500,
    backoffMultiplier: 2,
    maxDelayMs: 30000
  },
  wait: {
    timeoutMs: 600000,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2
  }
}

export interface ExecutorSettingsInput {
  parallelism?: number
  retry?: Partial<RetrySettings>
  wait?: Partial<WaitSettings>
}

export function resolveExecutorSettings(input: ExecutorSettingsInput = {}): ExecutorSettings {
  return {
    parallelism: Math.max(1, Math.floor(input.parallelism ?? DEFAULT_EXECUTOR_SETTINGS.parallelism)),
    retry: { ...DEFAULT_EXECUTOR_SETTINGS.retry, ...input.retry },
    wait: { ...DEFAULT_EXECUTOR_SETTINGS.wait, ...input.wait }
  }
}

export interface ExecutePlanOptions {
  plan: Plan
  /** Graph the plan was computed from; supplies desired attributes */
  graph: Graph
  providers: ProviderRegistry
  store: StateStore
  settings?: ExecutorSettingsInput
  /** Aborting stops new actions from starting; in-flight ones finish */
  signal?: AbortSignal
  logger?: Logger
  runId?: string
  /** Take the store's advisory lock for the run (default: true) */
  lock?: boolean
  onProgress?: (entry: ReportEntry, completed: number, total: number) => void
}

// ============================================================================
// Plan Execution
// ============================================================================

/**
 * Execute a plan.
 *
 * Per wave:
 * - an action whose prerequisite failed or was blocked is blocked
 * - an action whose prerequisite was cancelled is cancelled
 * - the rest run with bounded parallelism; retryable provider errors are
 *   retried with exponential backoff
 *
 * Never throws for a per-action failure; the report carries it.
 *
 * @throws LockContentionError when another run holds the lock
 */
export async function executePlan(options: ExecutePlanOptions): Promise<RunReport> {
  const {
    plan,
    graph,
    providers,
    store,
    signal,
    logger = silentLogger,
    runId = randomUUID(),
    lock = true,
    onProgress
  } = options
  const settings = resolveExecutorSettings(options.settings)
  const startedAt = new Date()
  const total = plan.waves.reduce((n, wave) => n + wave.length, 0)

  const handle = lock && store.lock ? await store.lock(runId) : undefined
  const entries: ReportEntry[] = []
  const statuses = new Map<string, NodeStatus>()

  const record = (entry: ReportEntry): void => {
    entries.push(entry)
    statuses.set(entry.actionId, entry.status)
    onProgress?.(entry, entries.length, total)
  }

  try {
    logger.info(`Run ${runId}: executing ${plan.id} (${total} actions in ${plan.waves.length} waves)`)

    for (const wave of plan.waves) {
      const runnable: PlanAction[] = []

      for (const action of wave) {
        const prior = action.dependsOn.map(id => statuses.get(id))
        if (prior.some(s => s === 'failed' || s === 'blocked')) {
          logger.warn(`${action.id}: blocked by a failed prerequisite`)
          record(skippedEntry(action, 'blocked'))
        } else if (prior.some(s => s !== 'applied' && s !== 'no-op')) {
          record(skippedEntry(action, 'cancelled'))
        } else {
          runnable.push(action)
        }
      }

      const result = await runBatch(
        runnable,
        action => runAction(action, { graph, providers, store, settings, logger }),
        { concurrency: settings.parallelism, signal }
      )

      for (const op of result.operations) {
        if (op.result) {
          record(op.result)
        } else if (op.skipped) {
          record(skippedEntry(op.item, 'cancelled'))
        } else {
          record(failedEntry(op.item, op.error, 0, op.duration))
        }
      }
    }
  } finally {
    if (handle) {
      await handle.release()
    }
  }

  const summary = emptyRunSummary()
  for (const entry of entries) {
    switch (entry.status) {
      case 'applied': summary.applied++; break
      case 'no-op': summary.noop++; break
      case 'failed': summary.failed++; break
      case 'blocked': summary.blocked++; break
      case 'cancelled': summary.cancelled++; break
    }
  }

  const finishedAt = new Date()
  const report: RunReport = {
    runId,
    planId: plan.id,
    success: summary.failed + summary.blocked + summary.cancelled === 0,
    cancelled: summary.cancelled > 0,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    entries,
    summary
  }

  logger.info(
    `Run ${runId}: ${summary.applied} applied, ${summary.noop} unchanged, ` +
    `${summary.failed} failed, ${summary.blocked} blocked, ${summary.cancelled} cancelled`
  )
  return report
}

// ============================================================================
// Individual Action Execution
// ============================================================================

interface ActionContext {
  graph: Graph
  providers: ProviderRegistry
  store: StateStore
  settings: ExecutorSettings
  logger: Logger
}

async function runAction(action: PlanAction, run: ActionContext): Promise<ReportEntry> {
  const start = Date.now()
  let attempts = 0
  const counted = <T>(fn: () => Promise<T>) => (attempt: number): Promise<T> => {
    attempts = attempt
    return fn()
  }

  try {
    if (action.step === 'none') {
      return entryFor(action, 'no-op', 0, Date.now() - start)
    }

    const provider = run.providers.require(action.type, action.resourceId)
    const ctx: ProviderContext = { resourceId: action.resourceId, logger: run.logger }

    switch (action.step) {
      case 'create':
      case 'update': {
        const node = run.graph.byId.get(action.resourceId)
        if (!node) {
          throw new KeelError(`${action.resourceId} is not part of the graph`, 'UNKNOWN_RESOURCE', {
            suggestion: 'Execute the plan with the graph it was computed from',
            context: { actionId: action.id }
          })
        }
        const current = await run.store.get(node.id)
        const desired = await resolveForApply(node, run.store)

        if (action.step === 'create') {
          const created = await callProvider(
            counted(() => provider.create(desired, ctx)), action, 'create', run
          )
          await run.store.update(node.id, existing =>
            createdRecord(node, run.graph, existing, created.id, desired, created.outputs ?? {}))
          await settle(node, provider, created.id, ctx, run)
        } else {
          if (!current) {
            throw new KeelError(`${node.id} has no state record to update`, 'STATE_MISSING', {
              suggestion: 'Compute a new plan',
              context: { actionId: action.id }
            })
          }
          const values = keepIgnored(desired, current, node)
          const updated = await callProvider(
            counted(() => provider.update(current.instanceId, values, ctx)), action, 'update', run
          )
          await run.store.update(node.id, existing =>
            updatedRecord(node, run.graph, existing ?? current, values, updated.outputs ?? {}))
          await settle(node, provider, current.instanceId, ctx, run)
        }
        break
      }

      case 'destroy': {
        const current = await run.store.get(action.resourceId)
        const instanceId = action.instanceId ?? current?.instanceId
        if (!current || instanceId === undefined) {
          run.logger.debug(`${action.id}: already absent from state`)
          break
        }
        await callProvider(counted(() => provider.delete(instanceId, ctx)), action, 'delete', run)
        await run.store.update(action.resourceId, existing =>
          existing && existing.instanceId === instanceId ? undefined : existing)
        break
      }

      case 'destroy-deposed': {
        const instanceId = action.instanceId
        if (instanceId === undefined) {
          throw new KeelError(`${action.id} names no instance`, 'INVALID_ACTION')
        }
        // The replacement may have come back under the same id; that instance is live
        const current = await run.store.get(action.resourceId)
        if (!current?.deposed.some(d => d.instanceId === instanceId)) {
          run.logger.info(`${action.id}: ${instanceId} is no longer deposed, nothing to retire`)
          break
        }
        await callProvider(counted(() => provider.delete(instanceId, ctx)), action, 'delete', run)
        await run.store.update(action.resourceId, existing => existing && {
          ...existing,
          deposed: existing.deposed.filter(d => d.instanceId !== instanceId),
          version: existing.version + 1,
          updatedAt: new Date().toISOString()
        })
        break
      }
    }

    run.logger.debug(`${action.id}: applied`)
    return entryFor(action, 'applied', attempts, Date.now() - start)
  } catch (error) {
    run.logger.error(`${action.id}: ${error instanceof Error ? error.message : String(error)}`)
    return failedEntry(action, error, attempts, Date.now() - start)
  }
}

/**
 * Invoke a provider operation with retries. Only ProviderErrors marked
 * retryable are retried.
 */
function callProvider<T>(
  fn: (attempt: number) => Promise<T>,
  action: PlanAction,
  operation: ProviderOperation,
  run: ActionContext
): Promise<T> {
  return withRetry(
    async attempt => {
      try {
        return await fn(attempt)
      } catch (error) {
        throw toProviderError(error, action.resourceId, operation)
      }
    },
    {
      ...run.settings.retry,
      shouldRetry: error => isProviderError(error) && error.retryable,
      onRetry: (attempt, error, delayMs) => {
        const message = error instanceof Error ? error.message : String(error)
        run.logger.warn(`${action.id}: attempt ${attempt} failed (${message}), retrying in ${delayMs}ms`)
      }
    }
  )
}

/**
 * Resolve references against what the store holds right now: every
 * producer has finished by the time its dependents run.
 */
async function resolveForApply(node: ResourceNode, store: StateStore): Promise<ResolvedAttributes> {
  const producers = new Map<ResourceId, StateRecord>()
  for (const { reference } of collectReferences(node.attributes)) {
    if (producers.has(reference.resource)) continue
    const record = await store.get(reference.resource)
    if (record) producers.set(reference.resource, record)
  }

  const { values, unknown } = resolveAttributes(node.attributes, reference => {
    const producer = producers.get(reference.resource)
    const value = producer ? readRecordOutput(producer, reference.output) : undefined
    return value === undefined ? { known: false } : { known: true, value }
  })

  if (unknown.length > 0) {
    throw new KeelError(
      `${node.id}: referenced outputs are not available for ${unknown.join(', ')}`,
      'UNRESOLVED_OUTPUT',
      {
        suggestion: 'Check that the referenced resources were applied and report these outputs',
        context: { resourceId: node.id, attributes: unknown }
      }
    )
  }
  return values
}

/**
 * Ignored attributes keep their last applied value.
 */
function keepIgnored(desired: ResolvedAttributes, current: StateRecord, node: ResourceNode): ResolvedAttributes {
  const values = { ...desired }
  for (const key of node.lifecycle.ignoreChanges) {
    if (Object.hasOwn(current.attributes, key)) {
      values[key] = current.attributes[key]
    }
  }
  return values
}

/**
 * Block until the node's WaitCondition holds. On timeout or a failed check
 * the record is tainted so the next plan replaces the instance.
 */
async function settle(
  node: ResourceNode,
  provider: ResourceProvider,
  instanceId: string,
  ctx: ProviderContext,
  run: ActionContext
): Promise<void> {
  const condition = node.wait
  if (!condition) return

  try {
    if (!provider.wait) {
      throw new KeelError(
        `Provider for "${node.type}" cannot evaluate wait condition "${condition.name}"`,
        'WAIT_UNSUPPORTED',
        { context: { resourceId: node.id, condition: condition.name } }
      )
    }
    const check = provider.wait.bind(provider)
    const timeoutMs = condition.timeoutMs ?? run.settings.wait.timeoutMs

    const result = await pollUntil(
      async () => {
        try {
          return await check(instanceId, condition, ctx)
        } catch (error) {
          throw toProviderError(error, node.id, 'wait')
        }
      },
      {
        timeoutMs,
        initialDelayMs: run.settings.wait.initialDelayMs,
        maxDelayMs: run.settings.wait.maxDelayMs,
        backoffMultiplier: run.settings.wait.backoffMultiplier,
        operation: `${node.id} wait "${condition.name}"`,
        onPoll: (attempt, nextDelayMs) =>
          run.logger.debug(`${node.id}: waiting for "${condition.name}" (check ${attempt}, next in ${nextDelayMs}ms)`)
      }
    )
    if (!result.satisfied) {
      throw new WaitTimeoutError(node.id, condition.name, timeoutMs)
    }
  } catch (error) {
    await run.store.update(node.id, existing => existing && {
      ...existing,
      tainted: true,
      updatedAt: new Date().toISOString()
    })
    throw error
  }
}

// ============================================================================
// Records
// ============================================================================

function createdRecord(
  node: ResourceNode,
  graph: Graph,
  existing: StateRecord | undefined,
  instanceId: string,
  attributes: ResolvedAttributes,
  outputs: ResolvedAttributes
): StateRecord {
  const now = new Date().toISOString()
  const deposed = [...(existing?.deposed ?? [])]
  // Create-before-destroy: the previous instance stays around until retired
  if (existing && existing.instanceId !== instanceId) {
    deposed.push({
      instanceId: existing.instanceId,
      attributes: existing.attributes,
      outputs: existing.outputs,
      deposedAt: now
    })
  }

  return {
    id: node.id,
    type: node.type,
    instanceId,
    attributes,
    outputs,
    dependencies: [...(graph.dependencies.get(node.id) ?? [])],
    lifecycle: node.lifecycle,
    version: (existing?.version ?? 0) + 1,
    tainted: false,
    drifted: [],
    deposed,
    updatedAt: now
  }
}

function updatedRecord(
  node: ResourceNode,
  graph: Graph,
  existing: StateRecord,
  attributes: ResolvedAttributes,
  outputs: ResolvedAttributes
): StateRecord {
  return {
    ...existing,
    attributes,
    outputs: { ...existing.outputs, ...outputs },
    dependencies: [...(graph.dependencies.get(node.id) ?? [])],
    lifecycle: node.lifecycle,
    version: existing.version + 1,
    tainted: false,
    drifted: [],
    updatedAt: new Date().toISOString()
  }
}

// ============================================================================
// Report Entries
// ============================================================================

function entryFor(action: PlanAction, status: NodeStatus, attempts: number, durationMs: number): ReportEntry {
  return {
    actionId: action.id,
    resourceId: action.resourceId,
    op: action.op,
    step: action.step,
    wave: action.wave,
    status,
    attempts,
    durationMs
  }
}

function skippedEntry(action: PlanAction, status: 'blocked' | 'cancelled'): ReportEntry {
  return entryFor(action, status, 0, 0)
}

function failedEntry(action: PlanAction, error: unknown, attempts: number, durationMs: number): ReportEntry {
  const err = wrapError(error, 'ACTION_FAILED')
  return {
    ...entryFor(action, 'failed', attempts, durationMs),
    error: {
      code: err.code,
      message: err.message,
      ...(isProviderError(err) ? { retryable: err.retryable } : {})
    }
  }
}

// ============================================================================
// Report Formatting
// ============================================================================

const STATUS_ICONS: Record<NodeStatus, string> = {
  applied: '✓',
  'no-op': '=',
  failed: '✗',
  blocked: '⊘',
  cancelled: '-'
}

/**
 * Human-readable run summary
 */
export function formatRunReport(report: RunReport, verbose: boolean = false): string {
  const lines: string[] = []

  lines.push('')
  lines.push(`Run ${report.runId} (${report.success ? 'succeeded' : 'did not converge'}):`)
  lines.push(`  Applied:   ${report.summary.applied}`)
  lines.push(`  Unchanged: ${report.summary.noop}`)
  lines.push(`  Failed:    ${report.summary.failed}`)
  lines.push(`  Blocked:   ${report.summary.blocked}`)
  lines.push(`  Cancelled: ${report.summary.cancelled}`)
  lines.push('')

  if (report.summary.failed > 0) {
    lines.push('Failures:')
    for (const entry of report.entries) {
      if (entry.error) {
        lines.push(`  ${STATUS_ICONS.failed} ${entry.actionId}: ${entry.error.message}`)
      }
    }
    lines.push('')
  }

  if (verbose) {
    lines.push('Details:')
    for (const entry of report.entries) {
      const retries = entry.attempts > 1 ? `, ${entry.attempts} attempts` : ''
      lines.push(`  ${STATUS_ICONS[entry.status]} ${entry.actionId} [wave ${entry.wave + 1}${retries}]`)
    }
  }

  return lines.join('\n')
}

/**
 * Run report as JSON
 */
export function formatRunReportJson(report: RunReport): object {
  return {
    runId: report.runId,
    planId: report.planId,
    success: report.success,
    cancelled: report.cancelled,
    durationMs: report.durationMs,
    summary: report.summary,
    entries: report.entries.map(entry => ({
      action: entry.actionId,
      status: entry.status,
      attempts: entry.attempts,
      error: entry.error?.message
    }))
  }
}
