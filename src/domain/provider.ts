/**
 * Provider Interface
 *
 * The boundary to external APIs. Every resource type (bucket, policy,
 * certificate, DNS record, CDN distribution, ...) is driven through the same
 * capability surface; the planner and executor never look past it.
 *
 * Providers report failure by throwing. A ProviderError with `retryable: true`
 * is retried by the executor; anything else fails the resource.
 */

import { KeelError, UnknownResourceTypeError } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import type { ResolvedAttributes, ResourceId, ResourceSchema, WaitCondition } from './types.js'

export interface ProviderContext {
  resourceId: ResourceId
  logger: Logger
}

export interface CreateResult {
  /** Provider-assigned instance id */
  id: string
  outputs?: ResolvedAttributes
}

export interface UpdateResult {
  outputs?: ResolvedAttributes
}

export interface ObservedResource {
  id: string
  /** Current values of the resource's input attributes */
  attributes: ResolvedAttributes
  outputs?: ResolvedAttributes
}

export interface ResourceProvider {
  readonly schema: ResourceSchema
  create(desired: ResolvedAttributes, ctx: ProviderContext): Promise<CreateResult>
  /** null when the instance no longer exists */
  read(id: string, ctx: ProviderContext): Promise<ObservedResource | null>
  update(id: string, desired: ResolvedAttributes, ctx: ProviderContext): Promise<UpdateResult>
  /** Resolves once the provider confirmed the delete; a missing instance counts as deleted */
  delete(id: string, ctx: ProviderContext): Promise<void>
  /** Evaluate a WaitCondition once; polling is the executor's job */
  wait?(id: string, condition: WaitCondition, ctx: ProviderContext): Promise<boolean>
}

/**
 * Build a schema with empty defaults.
 */
export function defineSchema(
  type: string,
  options: Partial<Omit<ResourceSchema, 'type'>> = {}
): ResourceSchema {
  return {
    type,
    outputs: [...(options.outputs ?? [])],
    immutable: [...(options.immutable ?? [])],
    sensitive: [...(options.sensitive ?? [])]
  }
}

/**
 * Providers by resource type
 */
export class ProviderRegistry {
  private providers = new Map<string, ResourceProvider>()

  constructor(providers: ResourceProvider[] = []) {
    for (const provider of providers) {
      this.register(provider)
    }
  }

  register(provider: ResourceProvider): this {
    const { type } = provider.schema
    if (this.providers.has(type)) {
      throw new KeelError(`Provider for "${type}" is already registered`, 'DUPLICATE_PROVIDER', {
        context: { type }
      })
    }
    this.providers.set(type, provider)
    return this
  }

  has(type: string): boolean {
    return this.providers.has(type)
  }

  get(type: string): ResourceProvider | undefined {
    return this.providers.get(type)
  }

  /**
   * @throws UnknownResourceTypeError when no provider handles `type`
   */
  require(type: string, resource?: ResourceId): ResourceProvider {
    const provider = this.providers.get(type)
    if (!provider) {
      throw new UnknownResourceTypeError(type, resource)
    }
    return provider
  }

  types(): string[] {
    return [...this.providers.keys()]
  }

  schemas(): Map<string, ResourceSchema> {
    return new Map([...this.providers].map(([type, provider]) => [type, provider.schema]))
  }
}
