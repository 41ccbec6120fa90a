/**
 * keel Domain Layer
 *
 * - types: resource model, graph, plan, state and run report shapes
 * - resource / graph: declarations, references, dependency graph
 * - plan / apply: diffing, wave ordering, execution
 * - state / provider: the two boundaries the engine talks through
 * - reconcile: the end-to-end run
 */

// Types
export type {
  ResourceId,
  JsonPrimitive,
  JsonValue,
  Reference,
  AttributeValue,
  Attributes,
  ResolvedAttributes,
  LifecyclePolicy,
  WaitCondition,
  ResourceNode,
  ResourceDeclaration,
  ResourceSchema,
  EdgeKind,
  Edge,
  Graph,
  DeposedInstance,
  StateRecord,
  ActionOp,
  ActionStep,
  AttributeDiff,
  ResourceChange,
  PlanAction,
  PlanSummary,
  Plan,
  NodeStatus,
  ReportEntry,
  RunSummary,
  RunReport
} from './types.js'

export { defaultLifecycle, emptyPlanSummary, emptyRunSummary } from './types.js'

// Resources
export {
  resourceId,
  parseResourceId,
  ref,
  isReference,
  collectReferences,
  resolveValue,
  resolveAttributes,
  declareResource
} from './resource.js'
export type { FoundReference, Resolution, ReferenceResolver } from './resource.js'

// Graph
export { buildGraph, topologicalOrder, transitiveDependents } from './graph.js'
export type { BuildGraphOptions } from './graph.js'

// Plan
export {
  computePlan,
  isEmptyPlan,
  planActions,
  writePlanArtifact,
  readPlanArtifact,
  readLatestPlan,
  isPlanStale,
  buildPlanMarkdown,
  maskValue
} from './plan.js'
export type { ComputePlanOptions, PlanArtifactPaths } from './plan.js'

// Apply
export {
  executePlan,
  resolveExecutorSettings,
  formatRunReport,
  formatRunReportJson,
  DEFAULT_EXECUTOR_SETTINGS
} from './apply.js'
export type {
  ExecutePlanOptions,
  ExecutorSettings,
  ExecutorSettingsInput,
  RetrySettings,
  WaitSettings
} from './apply.js'

// State
export {
  BaseStateStore,
  InMemoryStateStore,
  KeyedMutex,
  readRecordOutput,
  canonicalJson,
  stateFingerprint
} from './state.js'
export type { StateStore, LockHandle, RecordUpdater } from './state.js'
export { parseStateRecord, parseLockHolder, stateRecordSchema, planSchema } from './schemas.js'

// Providers
export { ProviderRegistry, defineSchema } from './provider.js'
export type {
  ResourceProvider,
  ProviderContext,
  CreateResult,
  UpdateResult,
  ObservedResource
} from './provider.js'

// Reconcile
export { reconcile, refreshState, applySavedPlan, withStateStore } from './reconcile.js'
export type {
  ReconcileOptions,
  ReconcileResult,
  RefreshOptions,
  RefreshResult,
  ApplySavedPlanOptions
} from './reconcile.js'
