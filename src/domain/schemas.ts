/**
 * Runtime validation of persisted state records and plan artifacts.
 */

import { z } from 'zod'
import { StateCorruptionError } from '../lib/errors.js'
import type { LockHolder } from '../lib/errors.js'
import type {
  JsonValue,
  LifecyclePolicy,
  Plan,
  PlanAction,
  ResourceChange,
  StateRecord
} from './types.js'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
)

const attributesSchema = z.record(jsonValueSchema)

export const lifecycleSchema: z.ZodType<LifecyclePolicy, z.ZodTypeDef, unknown> = z.object({
  createBeforeDestroy: z.boolean().default(false),
  preventDestroy: z.boolean().default(false),
  ignoreChanges: z.array(z.string()).default([])
})

export const stateRecordSchema: z.ZodType<StateRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  instanceId: z.string().min(1),
  attributes: attributesSchema,
  outputs: attributesSchema.default({}),
  dependencies: z.array(z.string()).default([]),
  lifecycle: lifecycleSchema,
  version: z.number().int().nonnegative(),
  tainted: z.boolean().default(false),
  drifted: z.array(z.string()).default([]),
  deposed: z.array(z.object({
    instanceId: z.string().min(1),
    attributes: attributesSchema,
    outputs: attributesSchema,
    deposedAt: z.string()
  })).default([]),
  updatedAt: z.string()
})

const opSchema = z.enum(['create', 'update', 'delete', 'replace', 'no-op'])

const planActionSchema: z.ZodType<PlanAction, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  resourceId: z.string(),
  type: z.string(),
  op: opSchema,
  step: z.enum(['create', 'update', 'destroy', 'destroy-deposed', 'none']),
  reason: z.string(),
  wave: z.number().int().nonnegative(),
  dependsOn: z.array(z.string()),
  instanceId: z.string().optional()
})

const resourceChangeSchema: z.ZodType<ResourceChange, z.ZodTypeDef, unknown> = z.object({
  resourceId: z.string(),
  type: z.string(),
  op: opSchema,
  reason: z.string(),
  diffs: z.array(z.object({
    key: z.string(),
    before: jsonValueSchema.optional(),
    after: jsonValueSchema.optional(),
    known: z.boolean(),
    immutable: z.boolean()
  }))
})

export const planSchema: z.ZodType<Plan, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  createdAt: z.string(),
  stateFingerprint: z.string(),
  changes: z.array(resourceChangeSchema),
  waves: z.array(z.array(planActionSchema)),
  summary: z.object({
    toCreate: z.number(),
    toUpdate: z.number(),
    toReplace: z.number(),
    toDelete: z.number(),
    unchanged: z.number()
  })
})

/**
 * Validate a record read back from a durable medium.
 */
export function parseStateRecord(raw: unknown, id: string): StateRecord {
  const result = stateRecordSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new StateCorruptionError(id, `${where}${issue.message}`, result.error)
  }
  if (result.data.id !== id) {
    throw new StateCorruptionError(id, `record is stored under ${id} but names ${result.data.id}`)
  }
  return result.data
}

export const lockHolderSchema: z.ZodType<LockHolder, z.ZodTypeDef, unknown> = z.object({
  runId: z.string().min(1),
  acquiredAt: z.string(),
  pid: z.number().int().optional()
})

/**
 * Lock holder read back from a lock file or row, null when unreadable.
 */
export function parseLockHolder(raw: unknown): LockHolder | null {
  const result = lockHolderSchema.safeParse(raw)
  return result.success ? result.data : null
}
