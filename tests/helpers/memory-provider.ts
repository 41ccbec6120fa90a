/**
 * A provider backed by a Map, for cases FakeCloud does not model:
 * ids chosen from the desired attributes, computed outputs, custom waits.
 */

import { defineSchema } from '../../src/domain/provider.js'
import type {
  CreateResult,
  ObservedResource,
  ProviderContext,
  ResourceProvider,
  UpdateResult
} from '../../src/domain/provider.js'
import type { ResolvedAttributes, ResourceSchema, WaitCondition } from '../../src/domain/types.js'

export interface MemoryProviderOptions {
  outputs?: string[]
  immutable?: string[]
  /** Instance id for a create; defaults to `<type>-<n>` */
  idOf?: (desired: ResolvedAttributes) => string
  outputsOf?: (desired: ResolvedAttributes) => ResolvedAttributes
  wait?: (id: string) => Promise<boolean>
}

export class MemoryProvider implements ResourceProvider {
  readonly schema: ResourceSchema
  readonly live = new Map<string, ResolvedAttributes>()
  /** `<op> <instance id>` per mutating call */
  readonly calls: string[] = []
  readonly wait?: (id: string, condition: WaitCondition, ctx: ProviderContext) => Promise<boolean>

  private seq = 0

  constructor(type: string, private readonly options: MemoryProviderOptions = {}) {
    this.schema = defineSchema(type, { outputs: options.outputs, immutable: options.immutable })
    const check = options.wait
    if (check) {
      this.wait = id => check(id)
    }
  }

  async create(desired: ResolvedAttributes): Promise<CreateResult> {
    const id = this.options.idOf?.(desired) ?? `${this.schema.type}-${++this.seq}`
    this.calls.push(`create ${id}`)
    this.live.set(id, { ...desired })
    return { id, outputs: this.options.outputsOf?.(desired) ?? {} }
  }

  async read(id: string): Promise<ObservedResource | null> {
    const attributes = this.live.get(id)
    return attributes ? { id, attributes: { ...attributes } } : null
  }

  async update(id: string, desired: ResolvedAttributes): Promise<UpdateResult> {
    this.calls.push(`update ${id}`)
    this.live.set(id, { ...desired })
    return { outputs: this.options.outputsOf?.(desired) ?? {} }
  }

  async delete(id: string): Promise<void> {
    this.calls.push(`delete ${id}`)
    this.live.delete(id)
  }
}
