/**
 * s3db.js State Store
 *
 * Keeps state records in an S3-compatible bucket through s3db.js:
 * - `keel_state`: one row per record, the record serialized in `payload`
 * - `keel_locks`: the apply lock row
 *
 * Row ids are the base64url of the resource id, since resource ids may hold
 * characters object keys do not.
 */

import { S3db } from 's3db.js'
import type { Resource } from 's3db.js'
import { z } from 'zod'
import { BaseStateStore } from '../domain/state.js'
import type { LockHandle } from '../domain/state.js'
import { parseLockHolder, parseStateRecord } from '../domain/schemas.js'
import type { ResourceId, StateRecord } from '../domain/types.js'
import { LockContentionError, StateCorruptionError, StateError } from './errors.js'
import type { LockHolder } from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'

const LOCK_ID = 'apply'

export interface S3dbStateStoreOptions {
  /** s3://KEY:SECRET@bucket/prefix, http://... for MinIO */
  connectionString: string
  passphrase?: string
  logger?: Logger
  /** Default: keel_state */
  resourceName?: string
  /** Default: keel_locks */
  lockResourceName?: string
}

const rowSchema = z.object({
  id: z.string(),
  payload: z.string()
})

export function encodeKey(id: ResourceId): string {
  return Buffer.from(id, 'utf-8').toString('base64url')
}

export function decodeKey(key: string): ResourceId {
  return Buffer.from(key, 'base64url').toString('utf-8')
}

/**
 * Mask credentials in a connection string for logs
 */
function maskConnectionString(url: string): string {
  return url.replace(/:([^:@/]+)@/, ':***@')
}

export class S3dbStateStore extends BaseStateStore {
  private db: S3db | null = null
  private records: Resource | null = null
  private locks: Resource | null = null
  private readonly logger: Logger

  constructor(private readonly options: S3dbStateStoreOptions) {
    super()
    this.logger = options.logger ?? silentLogger
  }

  async open(): Promise<void> {
    if (this.db) return

    this.logger.debug(`State: connecting to ${maskConnectionString(this.options.connectionString)}`)
    const db = new S3db({
      connectionString: this.options.connectionString,
      passphrase: this.options.passphrase,
      logLevel: 'silent'
    })
    await db.connect()

    this.records = await db.createResource({
      name: this.options.resourceName ?? 'keel_state',
      attributes: {
        payload: 'string|required'
      },
      behavior: 'body-overflow',
      timestamps: true
    })
    this.locks = await db.createResource({
      name: this.options.lockResourceName ?? 'keel_locks',
      attributes: {
        runId: 'string|required',
        acquiredAt: 'string|required',
        pid: 'number|optional'
      },
      timestamps: true
    })
    this.db = db
  }

  async close(): Promise<void> {
    const db = this.db
    this.db = null
    this.records = null
    this.locks = null
    if (db) {
      await db.disconnect()
    }
  }

  private resource(which: 'records' | 'locks'): Resource {
    const resource = which === 'records' ? this.records : this.locks
    if (!resource) {
      throw new StateError('s3db state store is not open', 'STATE_NOT_OPEN', {
        suggestion: 'Call open() before using the store'
      })
    }
    return resource
  }

  private parseRow(row: unknown, fallbackId: ResourceId): StateRecord {
    const parsed = rowSchema.safeParse(row)
    if (!parsed.success) {
      throw new StateCorruptionError(fallbackId, 'row has no payload', parsed.error)
    }

    const id = decodeKey(parsed.data.id)
    let raw: unknown
    try {
      raw = JSON.parse(parsed.data.payload)
    } catch (error) {
      throw new StateCorruptionError(id, 'payload is not valid JSON', error)
    }
    return parseStateRecord(raw, id)
  }

  protected async readRecord(id: ResourceId): Promise<StateRecord | undefined> {
    const row = await this.resource('records').getOrNull(encodeKey(id))
    return row ? this.parseRow(row, id) : undefined
  }

  protected async writeRecord(id: ResourceId, record: StateRecord): Promise<void> {
    const resource = this.resource('records')
    const key = encodeKey(id)
    const payload = JSON.stringify(record)

    const existing = await resource.getOrNull(key)
    if (existing) {
      await resource.update(key, { payload })
    } else {
      await resource.insert({ id: key, payload })
    }
    this.logger.debug(`State: wrote ${id} (v${record.version})`)
  }

  protected async removeRecord(id: ResourceId): Promise<void> {
    const resource = this.resource('records')
    const key = encodeKey(id)
    if (await resource.getOrNull(key)) {
      await resource.delete(key)
      this.logger.debug(`State: removed ${id}`)
    }
  }

  async list(): Promise<StateRecord[]> {
    const rows = await this.resource('records').list({})
    return rows
      .map(row => this.parseRow(row, '<unknown>'))
      .sort((a, b) => a.id.localeCompare(b.id))
  }

  /**
   * Advisory only: read-then-insert leaves a window in which two runs can
   * both see the lock free.
   */
  async lock(runId: string): Promise<LockHandle> {
    const locks = this.resource('locks')
    const existing = await locks.getOrNull(LOCK_ID)
    if (existing) {
      throw new LockContentionError(parseLockHolder(existing))
    }

    const holder: LockHolder = { runId, acquiredAt: new Date().toISOString(), pid: process.pid }
    await locks.insert({ id: LOCK_ID, ...holder })
    this.logger.debug(`State: lock acquired by ${runId}`)

    return {
      runId,
      release: async () => {
        const current = parseLockHolder(await locks.getOrNull(LOCK_ID))
        if (current?.runId === runId) {
          await locks.delete(LOCK_ID)
          this.logger.debug(`State: lock released by ${runId}`)
        }
      }
    }
  }
}
