/**
 * keel Plan Computation Engine
 *
 * Diffs the desired graph against recorded state and orders the resulting
 * actions into waves. Pure: no provider calls, no writes. Plans can be
 * persisted as JSON + Markdown artifacts for review and a later apply.
 */

import fs from 'node:fs'
import path from 'node:path'
import { isDeepStrictEqual } from 'node:util'
import { CycleError, KeelError, PreventDestroyError, UnknownResourceTypeError } from '../lib/errors.js'
import { topologicalOrder } from './graph.js'
import { resolveAttributes } from './resource.js'
import type { Resolution } from './resource.js'
import { planSchema } from './schemas.js'
import { readRecordOutput, stateFingerprint } from './state.js'
import type {
  ActionOp,
  ActionStep,
  AttributeDiff,
  Graph,
  JsonValue,
  Plan,
  PlanAction,
  Reference,
  ResolvedAttributes,
  ResourceChange,
  ResourceId,
  ResourceNode,
  ResourceSchema,
  StateRecord
} from './types.js'
import { emptyPlanSummary } from './types.js'

// ============================================================================
// Plan Computation
// ============================================================================

export interface ComputePlanOptions {
  graph: Graph
  /** Every record in the store */
  records: StateRecord[]
  schemas: ReadonlyMap<string, ResourceSchema>
  now?: Date
}

interface Decision {
  node: ResourceNode
  record?: StateRecord
  op: ActionOp
  reason: string
  diffs: AttributeDiff[]
  values: ResolvedAttributes
}

/**
 * Compute a plan.
 *
 * Algorithm:
 * 1. Walk the graph dependencies-first, resolving references against the
 *    decisions already made (an output of a resource being created or
 *    replaced is unknown until apply)
 * 2. Per node: no record → create; tainted record or immutable
 *    change → replace; other attribute change or drift → update;
 *    otherwise no-op
 * 3. Records with no declared node → delete
 * 4. Expand each decision into steps, link them, layer them into waves
 *
 * @throws PreventDestroyError when a protected resource would be destroyed
 * @throws CycleError when deletes and replaces cannot be ordered
 */
export function computePlan(options: ComputePlanOptions): Plan {
  const { graph, records, schemas, now = new Date() } = options
  const recordMap = new Map(records.map(r => [r.id, r]))
  const decisions = new Map<ResourceId, Decision>()

  for (const node of topologicalOrder(graph)) {
    const schema = schemas.get(node.type)
    if (!schema) {
      throw new UnknownResourceTypeError(node.type, node.id)
    }
    const { values, unknown } = resolveAttributes(
      node.attributes,
      reference => resolveAtPlanTime(reference, decisions, recordMap)
    )
    decisions.set(node.id, decide(node, schema, recordMap.get(node.id), values, unknown))
  }

  const orphans = records
    .filter(r => !graph.byId.has(r.id))
    .sort((a, b) => a.id.localeCompare(b.id))

  for (const orphan of orphans) {
    if (orphan.lifecycle.preventDestroy) {
      throw new PreventDestroyError(orphan.id, 'delete')
    }
  }
  for (const decision of decisions.values()) {
    if (decision.op === 'replace' && decision.node.lifecycle.preventDestroy) {
      throw new PreventDestroyError(decision.node.id, 'replace')
    }
  }

  const changes: ResourceChange[] = []
  const summary = emptyPlanSummary()

  for (const node of graph.nodes) {
    const decision = mustGet(decisions, node.id)
    changes.push({
      resourceId: node.id,
      type: node.type,
      op: decision.op,
      reason: decision.reason,
      diffs: decision.diffs
    })
    for (const deposed of decision.record?.deposed ?? []) {
      changes.push(deposedChange(node.id, node.type, deposed.instanceId))
    }
  }
  for (const orphan of orphans) {
    for (const deposed of orphan.deposed) {
      changes.push(deposedChange(orphan.id, orphan.type, deposed.instanceId))
    }
    changes.push({
      resourceId: orphan.id,
      type: orphan.type,
      op: 'delete',
      reason: 'no longer declared',
      diffs: Object.entries(orphan.attributes).map(([key, before]) => ({
        key,
        before,
        known: true,
        immutable: false
      }))
    })
  }

  for (const change of changes) {
    switch (change.op) {
      case 'create': summary.toCreate++; break
      case 'update': summary.toUpdate++; break
      case 'replace': summary.toReplace++; break
      case 'delete': summary.toDelete++; break
      case 'no-op': summary.unchanged++; break
    }
  }

  const fingerprint = stateFingerprint(records)

  return {
    id: generatePlanId(now, fingerprint),
    createdAt: now.toISOString(),
    stateFingerprint: fingerprint,
    changes,
    waves: buildActions(graph, decisions, orphans).layer(),
    summary
  }
}

/**
 * True when applying the plan would change nothing.
 */
export function isEmptyPlan(plan: Plan): boolean {
  return plan.waves.every(wave => wave.every(action => action.op === 'no-op'))
}

/**
 * Actions in execution order.
 */
export function planActions(plan: Plan): PlanAction[] {
  return plan.waves.flat()
}

// ============================================================================
// Diff Algorithm
// ============================================================================

function resolveAtPlanTime(
  reference: Reference,
  decisions: Map<ResourceId, Decision>,
  records: Map<ResourceId, StateRecord>
): Resolution {
  const target = decisions.get(reference.resource)
  if (!target || target.op === 'create' || target.op === 'replace') {
    return { known: false }
  }

  // An update keeps the instance id; any other output of it may change
  if (target.op === 'update' && reference.output !== 'id') {
    return Object.hasOwn(target.node.attributes, reference.output) && Object.hasOwn(target.values, reference.output)
      ? { known: true, value: target.values[reference.output] }
      : { known: false }
  }

  const record = records.get(reference.resource)
  const value = record ? readRecordOutput(record, reference.output) : undefined
  return value === undefined ? { known: false } : { known: true, value }
}

function decide(
  node: ResourceNode,
  schema: ResourceSchema,
  record: StateRecord | undefined,
  values: ResolvedAttributes,
  unknown: string[]
): Decision {
  const declared = Object.keys(node.attributes)

  if (!record) {
    return {
      node,
      op: 'create',
      reason: 'not present in state',
      values,
      diffs: declared.map(key => unknown.includes(key)
        ? { key, known: false, immutable: schema.immutable.includes(key) }
        : { key, after: values[key], known: true, immutable: schema.immutable.includes(key) })
    }
  }

  const diffs = diffAttributes(declared, record.attributes, values, unknown, schema, node.lifecycle.ignoreChanges)
  const base = { node, record, values, diffs }

  if (record.tainted) {
    return { ...base, op: 'replace', reason: 'tainted by an earlier run that did not converge' }
  }

  const forcing = diffs.filter(d => d.immutable).map(d => d.key)
  if (forcing.length > 0) {
    return { ...base, op: 'replace', reason: `immutable attribute changed: ${forcing.join(', ')}` }
  }
  if (diffs.length > 0) {
    return { ...base, op: 'update', reason: `attributes changed: ${diffs.map(d => d.key).join(', ')}` }
  }

  const drifted = record.drifted.filter(key => !node.lifecycle.ignoreChanges.includes(key))
  if (drifted.length > 0) {
    return { ...base, op: 'update', reason: `drift detected: ${drifted.join(', ')}` }
  }

  return { ...base, op: 'no-op', reason: 'up to date' }
}

/**
 * Declared keys first in declaration order, then keys that were removed.
 * An attribute with an unknown value always counts as changed.
 */
function diffAttributes(
  declared: string[],
  before: ResolvedAttributes,
  after: ResolvedAttributes,
  unknown: string[],
  schema: ResourceSchema,
  ignore: string[]
): AttributeDiff[] {
  const diffs: AttributeDiff[] = []
  const immutable = (key: string): boolean => schema.immutable.includes(key)
  const previous = (key: string): { before?: JsonValue } =>
    Object.hasOwn(before, key) ? { before: before[key] } : {}

  for (const key of declared) {
    if (ignore.includes(key)) continue
    if (unknown.includes(key)) {
      diffs.push({ key, ...previous(key), known: false, immutable: immutable(key) })
    } else if (!Object.hasOwn(before, key) || !isDeepStrictEqual(before[key], after[key])) {
      diffs.push({ key, ...previous(key), after: after[key], known: true, immutable: immutable(key) })
    }
  }

  for (const key of Object.keys(before)) {
    if (declared.includes(key) || ignore.includes(key)) continue
    diffs.push({ key, before: before[key], known: true, immutable: immutable(key) })
  }

  return diffs
}

function deposedChange(resourceId: ResourceId, type: string, instanceId: string): ResourceChange {
  return {
    resourceId,
    type,
    op: 'delete',
    reason: `deposed instance ${instanceId} left by an earlier replace`,
    diffs: []
  }
}

// ============================================================================
// Action Graph
// ============================================================================

type ActionSpec = Omit<PlanAction, 'wave' | 'dependsOn'>

class ActionGraph {
  private actions: ActionSpec[] = []
  private index = new Map<string, number>()
  private preds = new Map<string, Set<string>>()
  private succs = new Map<string, Set<string>>()

  add(action: ActionSpec): string {
    this.index.set(action.id, this.actions.length)
    this.actions.push(action)
    this.preds.set(action.id, new Set())
    this.succs.set(action.id, new Set())
    return action.id
  }

  link(before: string, after: string): void {
    if (before === after) return
    this.preds.get(after)?.add(before)
    this.succs.get(before)?.add(after)
  }

  /**
   * Kahn's algorithm, one wave per layer: wave = 1 + max(wave of
   * predecessors). Ties keep insertion order.
   */
  layer(): PlanAction[][] {
    const position = (id: string): number => this.index.get(id) ?? 0
    const remaining = new Map([...this.preds].map(([id, set]) => [id, set.size]))
    const waves: PlanAction[][] = []
    let current = this.actions.filter(a => remaining.get(a.id) === 0).map(a => a.id)
    let placed = 0

    while (current.length > 0) {
      const wave = waves.length
      waves.push(current.map(id => {
        const action = this.actions[position(id)]
        return {
          ...action,
          wave,
          dependsOn: [...(this.preds.get(id) ?? [])].sort((a, b) => position(a) - position(b))
        }
      }))
      placed += current.length

      const next: string[] = []
      for (const id of current) {
        for (const succ of this.succs.get(id) ?? []) {
          const left = (remaining.get(succ) ?? 0) - 1
          remaining.set(succ, left)
          if (left === 0) next.push(succ)
        }
      }
      current = next.sort((a, b) => position(a) - position(b))
    }

    if (placed < this.actions.length) {
      throw new CycleError(this.actions.filter(a => (remaining.get(a.id) ?? 0) > 0).map(a => a.id))
    }
    return waves
  }
}

/**
 * Expand decisions into executable steps and order them:
 * - an apply waits for the applies of its dependencies
 * - a destroy waits for everything still using the instance it removes
 * - deposed instances are cleaned up before their resource is destroyed
 */
function buildActions(
  graph: Graph,
  decisions: Map<ResourceId, Decision>,
  orphans: StateRecord[]
): ActionGraph {
  const actions = new ActionGraph()
  /** Action a dependent must wait for */
  const applyOf = new Map<ResourceId, string>()
  /** Actions removing the current instance of a resource */
  const destroysOf = new Map<ResourceId, string[]>()
  /** Create-before-destroy cleanup of the replaced instance */
  const retireOf = new Map<ResourceId, string>()
  const deposedOf = new Map<ResourceId, string[]>()

  const push = (map: Map<ResourceId, string[]>, id: ResourceId, action: string): void => {
    map.set(id, [...(map.get(id) ?? []), action])
  }

  const addDeposed = (record: StateRecord): void => {
    for (const deposed of record.deposed) {
      push(deposedOf, record.id, actions.add({
        id: `${record.id}#destroy-deposed:${deposed.instanceId}`,
        resourceId: record.id,
        type: record.type,
        op: 'delete',
        step: 'destroy-deposed',
        reason: `deposed instance ${deposed.instanceId} left by an earlier replace`,
        instanceId: deposed.instanceId
      }))
    }
  }

  for (const node of graph.nodes) {
    const { op, reason, record } = mustGet(decisions, node.id)
    const base = { resourceId: node.id, type: node.type, op, reason }
    const step = (s: ActionStep): string => `${node.id}#${s}`

    if (op === 'replace' && record) {
      const instanceId = record.instanceId
      if (node.lifecycle.createBeforeDestroy) {
        const create = actions.add({ ...base, id: step('create'), step: 'create', instanceId })
        const retire = actions.add({
          ...base,
          id: `${node.id}#destroy-deposed:${instanceId}`,
          step: 'destroy-deposed',
          instanceId
        })
        actions.link(create, retire)
        applyOf.set(node.id, create)
        retireOf.set(node.id, retire)
      } else {
        const destroy = actions.add({ ...base, id: step('destroy'), step: 'destroy', instanceId })
        const create = actions.add({ ...base, id: step('create'), step: 'create' })
        actions.link(destroy, create)
        applyOf.set(node.id, create)
        push(destroysOf, node.id, destroy)
      }
    } else if (op === 'create' || op === 'replace') {
      applyOf.set(node.id, actions.add({ ...base, id: step('create'), step: 'create' }))
    } else if (op === 'update') {
      applyOf.set(node.id, actions.add({
        ...base,
        id: step('update'),
        step: 'update',
        ...(record ? { instanceId: record.instanceId } : {})
      }))
    } else {
      applyOf.set(node.id, actions.add({ ...base, id: step('none'), step: 'none' }))
    }

    if (record) addDeposed(record)
  }

  for (const orphan of orphans) {
    addDeposed(orphan)
    push(destroysOf, orphan.id, actions.add({
      id: `${orphan.id}#destroy`,
      resourceId: orphan.id,
      type: orphan.type,
      op: 'delete',
      step: 'destroy',
      reason: 'no longer declared',
      instanceId: orphan.instanceId
    }))
  }

  // Applies follow the applies of their dependencies
  for (const node of graph.nodes) {
    const apply = mustGet(applyOf, node.id)
    for (const dep of graph.dependencies.get(node.id) ?? []) {
      actions.link(mustGet(applyOf, dep), apply)
    }
  }

  // A replaced instance is retired once every dependent moved to the new one
  for (const node of graph.nodes) {
    const retired = [
      ...(retireOf.has(node.id) ? [mustGet(retireOf, node.id)] : []),
      ...(deposedOf.get(node.id) ?? [])
    ]
    for (const retire of retired) {
      for (const user of graph.dependents.get(node.id) ?? []) {
        actions.link(mustGet(applyOf, user), retire)
      }
    }
  }

  for (const orphan of orphans) {
    const destroys = destroysOf.get(orphan.id) ?? []
    for (const target of orphan.dependencies) {
      // Orphans go before anything they were built on is removed
      const removals = [
        ...(destroysOf.get(target) ?? []),
        ...(deposedOf.get(target) ?? []),
        ...(retireOf.has(target) ? [mustGet(retireOf, target)] : [])
      ]
      for (const removal of removals) {
        for (const destroy of destroys) {
          actions.link(destroy, removal)
        }
      }
    }
  }

  for (const [id, destroys] of destroysOf) {
    for (const destroy of destroys) {
      for (const deposed of deposedOf.get(id) ?? []) {
        actions.link(deposed, destroy)
      }
      if (graph.byId.has(id)) continue
      // Declared resources still recorded as using an orphan move off it first
      for (const node of graph.nodes) {
        const record = decisions.get(node.id)?.record
        if (record?.dependencies.includes(id)) {
          actions.link(mustGet(applyOf, node.id), destroy)
        }
      }
    }
  }

  return actions
}

function mustGet<K, V>(map: Map<K, V>, key: K): V {
  const value = map.get(key)
  if (value === undefined) {
    throw new KeelError(`Internal planner error: missing entry for ${String(key)}`, 'PLANNER_INTERNAL')
  }
  return value
}

// ============================================================================
// Plan Artifact I/O
// ============================================================================

export interface PlanArtifactPaths {
  json: string
  markdown: string
}

/**
 * Write plan artifact to filesystem (JSON + Markdown).
 *
 * Values of attributes a schema marks sensitive are masked in the persisted
 * artifact.
 */
export function writePlanArtifact(
  plan: Plan,
  outputDir?: string,
  schemas: ReadonlyMap<string, ResourceSchema> = new Map()
): PlanArtifactPaths {
  const dir = outputDir || path.resolve('.keel', 'plans')
  fs.mkdirSync(dir, { recursive: true })

  const safeId = plan.id.replace(/[^a-zA-Z0-9._-]/g, '-')
  const jsonPath = path.join(dir, `${safeId}.json`)
  const mdPath = path.join(dir, `${safeId}.md`)

  const maskedPlan = maskPlanValues(plan, schemas)

  fs.writeFileSync(jsonPath, JSON.stringify(maskedPlan, null, 2) + '\n')
  fs.writeFileSync(mdPath, buildPlanMarkdown(maskedPlan) + '\n')

  return { json: jsonPath, markdown: mdPath }
}

/**
 * Read and validate a plan artifact.
 */
export function readPlanArtifact(filePath: string): Plan {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (error) {
    throw new KeelError(`Cannot read plan artifact ${filePath}`, 'INVALID_PLAN_ARTIFACT', {
      context: { filePath },
      cause: error
    })
  }

  const result = planSchema.safeParse(raw)
  if (!result.success) {
    throw new KeelError(
      `Invalid plan artifact ${filePath}: ${result.error.issues[0].message}`,
      'INVALID_PLAN_ARTIFACT',
      { context: { filePath }, cause: result.error }
    )
  }
  return result.data
}

/**
 * Most recent plan artifact in a directory, or null when there is none.
 */
export function readLatestPlan(artifactDir?: string): Plan | null {
  const dir = artifactDir || path.resolve('.keel', 'plans')
  if (!fs.existsSync(dir)) return null

  const files = fs.readdirSync(dir)
    .filter(f => f.startsWith('plan-') && f.endsWith('.json'))
    .sort()
    .reverse()

  if (files.length === 0) return null
  return readPlanArtifact(path.join(dir, files[0]))
}

/**
 * A plan is stale once the records it was computed against have changed.
 */
export function isPlanStale(plan: Plan, records: StateRecord[]): boolean {
  return stateFingerprint(records) !== plan.stateFingerprint
}

/**
 * Deterministic for a given time and state: `plan-<timestamp>-<fingerprint>`
 */
function generatePlanId(date: Date, fingerprint: string): string {
  const ts = date.toISOString().replace(/[:.]/g, '-')
  return `plan-${ts}-${fingerprint.slice(0, 8)}`
}

function maskPlanValues(plan: Plan, schemas: ReadonlyMap<string, ResourceSchema>): Plan {
  return {
    ...plan,
    changes: plan.changes.map(c => {
      const sensitive = schemas.get(c.type)?.sensitive ?? []
      return {
        ...c,
        diffs: c.diffs.map(d => sensitive.includes(d.key)
          ? {
              ...d,
              ...(d.before !== undefined ? { before: maskValue(d.before) } : {}),
              ...(d.after !== undefined ? { after: maskValue(d.after) } : {})
            }
          : d)
      }
    })
  }
}

export function maskValue(value: JsonValue): string {
  if (typeof value !== 'string') return '****'
  if (value.length <= 4) return '****'
  return value.slice(0, 2) + '****' + value.slice(-2)
}

const OP_ICONS: Record<ActionOp, string> = {
  create: '+',
  update: '~',
  replace: '-/+',
  delete: '-',
  'no-op': ' '
}

function formatDiffValue(value: JsonValue | undefined, known: boolean): string {
  if (!known) return '(known after apply)'
  if (value === undefined) return '(none)'
  return JSON.stringify(value)
}

/**
 * Build markdown representation of a plan.
 */
export function buildPlanMarkdown(plan: Plan): string {
  const lines: string[] = []

  lines.push('# keel Plan')
  lines.push('')
  lines.push(`- **ID:** ${plan.id}`)
  lines.push(`- **Created:** ${plan.createdAt}`)
  lines.push(`- **State fingerprint:** ${plan.stateFingerprint.slice(0, 12)}`)
  lines.push('')

  lines.push('## Summary')
  lines.push('')
  lines.push(`| Metric | Count |`)
  lines.push(`|--------|-------|`)
  lines.push(`| To create | ${plan.summary.toCreate} |`)
  lines.push(`| To update | ${plan.summary.toUpdate} |`)
  lines.push(`| To replace | ${plan.summary.toReplace} |`)
  lines.push(`| To delete | ${plan.summary.toDelete} |`)
  lines.push(`| Unchanged | ${plan.summary.unchanged} |`)
  lines.push('')

  const changes = plan.changes.filter(c => c.op !== 'no-op')
  if (changes.length > 0) {
    lines.push('## Changes')
    lines.push('')
    for (const change of changes) {
      lines.push(`- \`${OP_ICONS[change.op]}\` **${change.resourceId}** (${change.op}): ${change.reason}`)
      if (change.op === 'delete') continue
      for (const diff of change.diffs) {
        const marker = diff.immutable && change.op === 'replace' ? ' (forces replacement)' : ''
        lines.push(
          `  - \`${diff.key}\`: ${formatDiffValue(diff.before, true)} → ` +
          `${formatDiffValue(diff.after, diff.known)}${marker}`
        )
      }
    }
    lines.push('')
  }

  if (plan.waves.length > 0) {
    lines.push('## Waves')
    lines.push('')
    plan.waves.forEach((wave, i) => {
      lines.push(`### Wave ${i + 1}`)
      lines.push('')
      for (const action of wave) {
        lines.push(`- ${action.id}`)
      }
      lines.push('')
    })
  }

  return lines.join('\n').trimEnd()
}
