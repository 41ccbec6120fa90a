/**
 * keel Domain Types
 *
 * Resource model, graph, plan, state and run report shapes shared by the
 * graph builder, planner, executor and state stores.
 */

// ============================================================================
// Values
// ============================================================================

/** `"<type>.<name>"`, unique within a graph */
export type ResourceId = string

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/**
 * Pointer to another resource's output, resolved by the engine.
 * `output` is `id`, an output declared by the target type, or one of the
 * target's own declared attributes.
 */
export interface Reference {
  readonly kind: 'reference'
  readonly resource: ResourceId
  readonly output: string
}

export type AttributeValue =
  | JsonPrimitive
  | Reference
  | AttributeValue[]
  | { [key: string]: AttributeValue }

export type Attributes = Record<string, AttributeValue>
export type ResolvedAttributes = Record<string, JsonValue>

// ============================================================================
// Resource Model
// ============================================================================

export interface LifecyclePolicy {
  /** Replace by creating the new instance before destroying the old one */
  createBeforeDestroy: boolean
  /** Refuse to plan a delete of this resource */
  preventDestroy: boolean
  /** Attributes whose changes never trigger an update */
  ignoreChanges: string[]
}

/**
 * Predicate a resource must satisfy after create/update before its dependents
 * may proceed, evaluated through the provider's `wait`.
 */
export interface WaitCondition {
  name: string
  description?: string
  /** Overrides the engine-wide wait timeout */
  timeoutMs?: number
}

export interface ResourceNode {
  id: ResourceId
  type: string
  name: string
  attributes: Attributes
  dependsOn: ResourceId[]
  lifecycle: LifecyclePolicy
  wait?: WaitCondition
}

/** Input accepted by `declareResource` */
export interface ResourceDeclaration {
  type: string
  name: string
  attributes?: Attributes
  dependsOn?: ResourceId[]
  lifecycle?: Partial<LifecyclePolicy>
  wait?: WaitCondition
}

/**
 * What a provider declares about a resource type
 */
export interface ResourceSchema {
  type: string
  /** Computed outputs other resources may reference (`id` is implicit) */
  outputs: string[]
  /** Attributes whose change forces a replace */
  immutable: string[]
  /** Attributes masked in plan artifacts */
  sensitive: string[]
}

// ============================================================================
// Graph
// ============================================================================

export type EdgeKind = 'explicit' | 'reference'

/** `from` is the producer, `to` the resource that depends on it */
export interface Edge {
  from: ResourceId
  to: ResourceId
  kind: EdgeKind
  /** Attribute holding the reference (reference edges only) */
  attribute?: string
}

export interface Graph {
  /** Declaration order */
  nodes: ResourceNode[]
  byId: Map<ResourceId, ResourceNode>
  edges: Edge[]
  /** id → resources it depends on, deduplicated, declaration order */
  dependencies: Map<ResourceId, ResourceId[]>
  /** id → resources depending on it, deduplicated, declaration order */
  dependents: Map<ResourceId, ResourceId[]>
}

// ============================================================================
// State
// ============================================================================

export interface DeposedInstance {
  instanceId: string
  attributes: ResolvedAttributes
  outputs: ResolvedAttributes
  deposedAt: string
}

export interface StateRecord {
  id: ResourceId
  type: string
  /** Provider-assigned identity of the live instance */
  instanceId: string
  /** Resolved attributes last applied */
  attributes: ResolvedAttributes
  /** Outputs observed from the provider */
  outputs: ResolvedAttributes
  /** Dependencies at the time of the last apply (orders deletes) */
  dependencies: ResourceId[]
  lifecycle: LifecyclePolicy
  /** Increments on every successful write by the executor */
  version: number
  /** Instance exists but never became ready; the next plan replaces it */
  tainted: boolean
  /** Attributes found to differ from the provider on the last refresh */
  drifted: string[]
  /** Old instances awaiting destroy after a create-before-destroy replace */
  deposed: DeposedInstance[]
  updatedAt: string
}

// ============================================================================
// Plan
// ============================================================================

export type ActionOp = 'create' | 'update' | 'delete' | 'replace' | 'no-op'

/**
 * Primitive the executor performs for an action. A `replace` is always two
 * steps: `create` + `destroy-deposed` (create before destroy) or
 * `destroy` + `create` (destroy before create).
 */
export type ActionStep = 'create' | 'update' | 'destroy' | 'destroy-deposed' | 'none'

export interface AttributeDiff {
  key: string
  before?: JsonValue
  after?: JsonValue
  /** false when the new value depends on an output not known until apply */
  known: boolean
  immutable: boolean
}

export interface ResourceChange {
  resourceId: ResourceId
  type: string
  op: ActionOp
  reason: string
  diffs: AttributeDiff[]
}

export interface PlanAction {
  /** `<resourceId>#<step>`, or `<resourceId>#destroy-deposed:<instanceId>` */
  id: string
  resourceId: ResourceId
  type: string
  op: ActionOp
  step: ActionStep
  reason: string
  /** 0-based execution wave */
  wave: number
  /** Action ids that must be terminal-successful first */
  dependsOn: string[]
  /** Existing instance targeted by update / destroy steps */
  instanceId?: string
}

export interface PlanSummary {
  toCreate: number
  toUpdate: number
  toReplace: number
  toDelete: number
  unchanged: number
}

export interface Plan {
  id: string
  createdAt: string
  /** Fingerprint of the state the plan was computed against */
  stateFingerprint: string
  changes: ResourceChange[]
  waves: PlanAction[][]
  summary: PlanSummary
}

// ============================================================================
// Run Report
// ============================================================================

export type NodeStatus = 'applied' | 'no-op' | 'failed' | 'blocked' | 'cancelled'

export interface ReportEntry {
  actionId: string
  resourceId: ResourceId
  op: ActionOp
  step: ActionStep
  wave: number
  status: NodeStatus
  /** Provider invocations of the main operation (retries included) */
  attempts: number
  durationMs: number
  error?: {
    code: string
    message: string
    retryable?: boolean
  }
}

export interface RunSummary {
  applied: number
  noop: number
  failed: number
  blocked: number
  cancelled: number
}

export interface RunReport {
  runId: string
  planId: string
  /** Every entry ended applied or no-op */
  success: boolean
  cancelled: boolean
  startedAt: string
  finishedAt: string
  durationMs: number
  entries: ReportEntry[]
  summary: RunSummary
}

// ============================================================================
// Factories
// ============================================================================

export function defaultLifecycle(): LifecyclePolicy {
  return { createBeforeDestroy: false, preventDestroy: false, ignoreChanges: [] }
}

export function emptyPlanSummary(): PlanSummary {
  return { toCreate: 0, toUpdate: 0, toReplace: 0, toDelete: 0, unchanged: 0 }
}

export function emptyRunSummary(): RunSummary {
  return { applied: 0, noop: 0, failed: 0, blocked: 0, cancelled: 0 }
}
