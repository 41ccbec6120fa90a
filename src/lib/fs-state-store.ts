/**
 * Filesystem State Store
 *
 * One JSON file per record under `<dir>/resources/`, written to a temp file
 * and renamed into place. The apply lock is `<dir>/apply.lock`, created
 * exclusively.
 *
 * Layout:
 *   <dir>/
 *   ├── apply.lock
 *   └── resources/
 *       ├── bucket.site.json
 *       └── dns_record.www.json
 */

import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import { BaseStateStore } from '../domain/state.js'
import type { LockHandle } from '../domain/state.js'
import { parseLockHolder, parseStateRecord } from '../domain/schemas.js'
import type { ResourceId, StateRecord } from '../domain/types.js'
import { LockContentionError, StateCorruptionError } from './errors.js'
import type { LockHolder } from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'

const RESOURCES_DIR = 'resources'
const LOCK_FILE = 'apply.lock'

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined
}

export class FilesystemStateStore extends BaseStateStore {
  private readonly resourcesDir: string
  private readonly lockPath: string

  constructor(
    readonly dir: string,
    private readonly logger: Logger = silentLogger
  ) {
    super()
    this.resourcesDir = path.join(dir, RESOURCES_DIR)
    this.lockPath = path.join(dir, LOCK_FILE)
  }

  async open(): Promise<void> {
    await fs.mkdir(this.resourcesDir, { recursive: true })
  }

  private recordPath(id: ResourceId): string {
    return path.join(this.resourcesDir, `${encodeURIComponent(id)}.json`)
  }

  protected async readRecord(id: ResourceId): Promise<StateRecord | undefined> {
    let content: string
    try {
      content = await fs.readFile(this.recordPath(id), 'utf-8')
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return undefined
      throw error
    }

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (error) {
      throw new StateCorruptionError(id, 'not valid JSON', error)
    }
    return parseStateRecord(raw, id)
  }

  protected async writeRecord(id: ResourceId, record: StateRecord): Promise<void> {
    const target = this.recordPath(id)
    const tmp = `${target}.${randomUUID()}.tmp`
    await fs.mkdir(this.resourcesDir, { recursive: true })
    await fs.writeFile(tmp, JSON.stringify(record, null, 2) + '\n')
    await fs.rename(tmp, target)
    this.logger.debug(`State: wrote ${id} (v${record.version})`)
  }

  protected async removeRecord(id: ResourceId): Promise<void> {
    await fs.rm(this.recordPath(id), { force: true })
    this.logger.debug(`State: removed ${id}`)
  }

  async list(): Promise<StateRecord[]> {
    let files: string[]
    try {
      files = await fs.readdir(this.resourcesDir)
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return []
      throw error
    }

    const records: StateRecord[] = []
    for (const file of files.filter(f => f.endsWith('.json')).sort()) {
      const record = await this.readRecord(decodeURIComponent(file.slice(0, -'.json'.length)))
      if (record) records.push(record)
    }
    return records.sort((a, b) => a.id.localeCompare(b.id))
  }

  async lock(runId: string): Promise<LockHandle> {
    const holder: LockHolder = { runId, acquiredAt: new Date().toISOString(), pid: process.pid }
    await fs.mkdir(this.dir, { recursive: true })

    try {
      await fs.writeFile(this.lockPath, JSON.stringify(holder) + '\n', { flag: 'wx' })
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') throw error
      throw new LockContentionError(await this.readHolder())
    }
    this.logger.debug(`State: lock acquired by ${runId}`)

    return {
      runId,
      release: async () => {
        const current = await this.readHolder()
        if (current?.runId === runId) {
          await fs.rm(this.lockPath, { force: true })
          this.logger.debug(`State: lock released by ${runId}`)
        }
      }
    }
  }

  private async readHolder(): Promise<LockHolder | null> {
    try {
      return parseLockHolder(JSON.parse(await fs.readFile(this.lockPath, 'utf-8')))
    } catch (error) {
      if (errorCode(error) === 'ENOENT' || error instanceof SyntaxError) return null
      throw error
    }
  }
}
