/**
 * Resource declarations and attribute references.
 *
 * References are resolved by the engine, never evaluated as expressions:
 * a resolver only maps `(resource, output)` to a value or to "unknown".
 */

import { GraphError } from '../lib/errors.js'
import type {
  AttributeValue,
  Attributes,
  JsonValue,
  Reference,
  ResolvedAttributes,
  ResourceDeclaration,
  ResourceId,
  ResourceNode
} from './types.js'
import { defaultLifecycle } from './types.js'

// ============================================================================
// Identity
// ============================================================================

export function resourceId(type: string, name: string): ResourceId {
  return `${type}.${name}`
}

/**
 * Split `"<type>.<name>"`. Types never contain dots; names may.
 */
export function parseResourceId(id: ResourceId): { type: string; name: string } {
  const dot = id.indexOf('.')
  if (dot <= 0 || dot === id.length - 1) {
    throw new GraphError(`Invalid resource id "${id}"`, 'INVALID_RESOURCE_ID', {
      suggestion: 'Resource ids have the form <type>.<name>',
      context: { id }
    })
  }
  return { type: id.slice(0, dot), name: id.slice(dot + 1) }
}

// ============================================================================
// References
// ============================================================================

export function ref(resource: ResourceId, output: string = 'id'): Reference {
  return { kind: 'reference', resource, output }
}

export function isReference(value: unknown): value is Reference {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  return 'kind' in value && value.kind === 'reference' &&
    'resource' in value && typeof value.resource === 'string' &&
    'output' in value && typeof value.output === 'string'
}

export interface FoundReference {
  /** Top-level attribute holding the reference */
  attribute: string
  /** Dotted path to the reference inside the attribute */
  path: string
  reference: Reference
}

/**
 * Find every reference in an attribute set, nested ones included.
 */
export function collectReferences(attributes: Attributes): FoundReference[] {
  const found: FoundReference[] = []

  const walk = (attribute: string, path: string, value: AttributeValue): void => {
    if (isReference(value)) {
      found.push({ attribute, path, reference: value })
    } else if (Array.isArray(value)) {
      value.forEach((item, i) => walk(attribute, `${path}[${i}]`, item))
    } else if (value !== null && typeof value === 'object') {
      for (const [key, item] of Object.entries(value)) {
        walk(attribute, `${path}.${key}`, item)
      }
    }
  }

  for (const [key, value] of Object.entries(attributes)) {
    walk(key, key, value)
  }
  return found
}

export type Resolution = { known: true; value: JsonValue } | { known: false }

export type ReferenceResolver = (reference: Reference) => Resolution

export function resolveValue(value: AttributeValue, resolver: ReferenceResolver): Resolution {
  if (isReference(value)) {
    return resolver(value)
  }

  if (Array.isArray(value)) {
    const items: JsonValue[] = []
    for (const item of value) {
      const resolved = resolveValue(item, resolver)
      if (!resolved.known) return resolved
      items.push(resolved.value)
    }
    return { known: true, value: items }
  }

  if (value !== null && typeof value === 'object') {
    const fields: { [key: string]: JsonValue } = {}
    for (const [key, item] of Object.entries(value)) {
      const resolved = resolveValue(item, resolver)
      if (!resolved.known) return resolved
      fields[key] = resolved.value
    }
    return { known: true, value: fields }
  }

  return { known: true, value }
}

/**
 * Resolve every attribute. Attributes depending on an unknown output are
 * left out of `values` and listed in `unknown`.
 */
export function resolveAttributes(
  attributes: Attributes,
  resolver: ReferenceResolver
): { values: ResolvedAttributes; unknown: string[] } {
  const values: ResolvedAttributes = {}
  const unknown: string[] = []

  for (const [key, value] of Object.entries(attributes)) {
    const resolved = resolveValue(value, resolver)
    if (resolved.known) {
      values[key] = resolved.value
    } else {
      unknown.push(key)
    }
  }

  return { values, unknown }
}

// ============================================================================
// Declarations
// ============================================================================

/**
 * Normalize a declaration into a ResourceNode with defaults filled in.
 */
export function declareResource(declaration: ResourceDeclaration): ResourceNode {
  const { type, name } = declaration
  if (!type || type.includes('.')) {
    throw new GraphError(`Invalid resource type "${type}"`, 'INVALID_RESOURCE_TYPE', {
      suggestion: 'Resource types are non-empty and contain no dots',
      context: { type, name }
    })
  }
  if (!name) {
    throw new GraphError(`Resource of type "${type}" has no name`, 'INVALID_RESOURCE_NAME', {
      context: { type }
    })
  }

  const lifecycle = { ...defaultLifecycle(), ...declaration.lifecycle }

  return {
    id: resourceId(type, name),
    type,
    name,
    attributes: { ...declaration.attributes },
    dependsOn: [...new Set(declaration.dependsOn ?? [])],
    lifecycle: { ...lifecycle, ignoreChanges: [...lifecycle.ignoreChanges] },
    ...(declaration.wait ? { wait: { ...declaration.wait } } : {})
  }
}
