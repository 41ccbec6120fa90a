/**
 * keel Domain State Layer
 *
 * The StateStore is the only writer of durable state. Every driver gets
 * per-record atomic read-modify-write from BaseStateStore; cross-record
 * atomicity is not provided. A run-scoped advisory lock keeps two apply
 * runs off the same records.
 */

import { createHash } from 'node:crypto'
import { LockContentionError } from '../lib/errors.js'
import type { LockHolder } from '../lib/errors.js'
import type { JsonValue, ResourceId, StateRecord } from './types.js'

// ============================================================================
// Store Contract
// ============================================================================

export interface LockHandle {
  runId: string
  release(): Promise<void>
}

export type RecordUpdater = (current: StateRecord | undefined) => StateRecord | undefined

export interface StateStore {
  /** Called once at run start */
  open?(): Promise<void>
  /** Called once at run end; flushes pending writes */
  close?(): Promise<void>
  get(id: ResourceId): Promise<StateRecord | undefined>
  put(id: ResourceId, record: StateRecord): Promise<void>
  delete(id: ResourceId): Promise<void>
  list(): Promise<StateRecord[]>
  /**
   * Atomic read-modify-write of a single record. Returning undefined
   * from the updater deletes the record.
   */
  update(id: ResourceId, updater: RecordUpdater): Promise<StateRecord | undefined>
  /** Advisory lock for a whole apply run; throws LockContentionError when held */
  lock?(runId: string): Promise<LockHandle>
}

// ============================================================================
// Keyed Mutex
// ============================================================================

/**
 * Serializes async sections per key. Sections for different keys run freely.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(section)
    const tail = result.then(() => undefined, () => undefined)
    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })
    return result
  }
}

/**
 * Shared get/put/delete/update semantics over three storage primitives.
 */
export abstract class BaseStateStore implements StateStore {
  protected readonly mutex = new KeyedMutex()

  protected abstract readRecord(id: ResourceId): Promise<StateRecord | undefined>
  protected abstract writeRecord(id: ResourceId, record: StateRecord): Promise<void>
  protected abstract removeRecord(id: ResourceId): Promise<void>
  abstract list(): Promise<StateRecord[]>

  get(id: ResourceId): Promise<StateRecord | undefined> {
    return this.readRecord(id)
  }

  put(id: ResourceId, record: StateRecord): Promise<void> {
    return this.mutex.run(id, () => this.writeRecord(id, record))
  }

  delete(id: ResourceId): Promise<void> {
    return this.mutex.run(id, () => this.removeRecord(id))
  }

  update(id: ResourceId, updater: RecordUpdater): Promise<StateRecord | undefined> {
    return this.mutex.run(id, async () => {
      const next = updater(await this.readRecord(id))
      if (next) {
        await this.writeRecord(id, next)
      } else {
        await this.removeRecord(id)
      }
      return next
    })
  }
}

// ============================================================================
// In-Memory Driver
// ============================================================================

/**
 * Process-local store. Records are cloned on the way in and out so callers
 * never share mutable state with the store.
 */
export class InMemoryStateStore extends BaseStateStore {
  private records = new Map<ResourceId, StateRecord>()
  private holder: LockHolder | null = null

  constructor(initial: StateRecord[] = []) {
    super()
    for (const record of initial) {
      this.records.set(record.id, structuredClone(record))
    }
  }

  protected async readRecord(id: ResourceId): Promise<StateRecord | undefined> {
    const record = this.records.get(id)
    return record ? structuredClone(record) : undefined
  }

  protected async writeRecord(id: ResourceId, record: StateRecord): Promise<void> {
    this.records.set(id, structuredClone(record))
  }

  protected async removeRecord(id: ResourceId): Promise<void> {
    this.records.delete(id)
  }

  async list(): Promise<StateRecord[]> {
    return [...this.records.values()]
      .map(record => structuredClone(record))
      .sort((a, b) => a.id.localeCompare(b.id))
  }

  async lock(runId: string): Promise<LockHandle> {
    if (this.holder) {
      throw new LockContentionError(this.holder)
    }
    this.holder = { runId, acquiredAt: new Date().toISOString(), pid: process.pid }
    return {
      runId,
      release: async () => {
        if (this.holder?.runId === runId) {
          this.holder = null
        }
      }
    }
  }
}

// ============================================================================
// Record Helpers
// ============================================================================

/**
 * Value of `output` for a recorded resource: `id` is the instance id, then
 * computed outputs, then applied attributes.
 */
export function readRecordOutput(record: StateRecord, output: string): JsonValue | undefined {
  if (output === 'id') return record.instanceId
  if (Object.hasOwn(record.outputs, output)) return record.outputs[output]
  if (Object.hasOwn(record.attributes, output)) return record.attributes[output]
  return undefined
}

/**
 * JSON with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v !== null && typeof v === 'object' && !Array.isArray(v)) {
      return Object.fromEntries(Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
    }
    return v
  })
}

/**
 * Stable hash of a record set, independent of listing order.
 */
export function stateFingerprint(records: StateRecord[]): string {
  const sorted = [...records].sort((a, b) => a.id.localeCompare(b.id))
  return createHash('sha256').update(canonicalJson(sorted)).digest('hex')
}
