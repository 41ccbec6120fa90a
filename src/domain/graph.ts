/**
 * keel Dependency Graph Builder
 *
 * Turns resource declarations into a DAG of explicit and reference edges.
 * Pure: no state, no providers, no side effects.
 */

import {
  CycleError,
  DuplicateResourceError,
  UnknownResourceTypeError,
  UnresolvedReferenceError
} from '../lib/errors.js'
import { collectReferences } from './resource.js'
import type { Edge, Graph, ResourceId, ResourceNode, ResourceSchema } from './types.js'

export interface BuildGraphOptions {
  /** Schemas by resource type; every declared type must have one */
  schemas: ReadonlyMap<string, ResourceSchema>
}

/**
 * Build and validate the resource graph.
 *
 * @throws DuplicateResourceError when two nodes share an identity
 * @throws UnknownResourceTypeError when a type has no schema
 * @throws UnresolvedReferenceError when a dependency or reference points nowhere
 * @throws CycleError when the edges are not acyclic
 */
export function buildGraph(nodes: ResourceNode[], options: BuildGraphOptions): Graph {
  const { schemas } = options
  const byId = new Map<ResourceId, ResourceNode>()
  const order = new Map<ResourceId, number>()

  for (const node of nodes) {
    if (byId.has(node.id)) {
      throw new DuplicateResourceError(node.id)
    }
    if (!schemas.has(node.type)) {
      throw new UnknownResourceTypeError(node.type, node.id)
    }
    byId.set(node.id, node)
    order.set(node.id, order.size)
  }

  const edges: Edge[] = []

  for (const node of nodes) {
    for (const dep of node.dependsOn) {
      if (!byId.has(dep)) {
        throw new UnresolvedReferenceError(node.id, 'dependsOn', dep, 'id')
      }
      edges.push({ from: dep, to: node.id, kind: 'explicit' })
    }

    for (const { attribute, reference } of collectReferences(node.attributes)) {
      const target = byId.get(reference.resource)
      if (!target || !hasOutput(target, schemas, reference.output)) {
        throw new UnresolvedReferenceError(node.id, attribute, reference.resource, reference.output)
      }
      edges.push({ from: target.id, to: node.id, kind: 'reference', attribute })
    }
  }

  const byOrder = (a: ResourceId, b: ResourceId): number =>
    (order.get(a) ?? 0) - (order.get(b) ?? 0)

  const dependencies = new Map<ResourceId, ResourceId[]>()
  const dependents = new Map<ResourceId, ResourceId[]>()
  for (const node of nodes) {
    const deps = new Set(edges.filter(e => e.to === node.id).map(e => e.from))
    const users = new Set(edges.filter(e => e.from === node.id).map(e => e.to))
    dependencies.set(node.id, [...deps].sort(byOrder))
    dependents.set(node.id, [...users].sort(byOrder))
  }

  const graph: Graph = { nodes: [...nodes], byId, edges, dependencies, dependents }
  assertAcyclic(graph)
  return graph
}

/**
 * A reference may target `id`, a computed output of the target's type, or
 * one of the target's own declared attributes.
 */
function hasOutput(
  target: ResourceNode,
  schemas: ReadonlyMap<string, ResourceSchema>,
  output: string
): boolean {
  if (output === 'id') return true
  if (schemas.get(target.type)?.outputs.includes(output)) return true
  return Object.hasOwn(target.attributes, output)
}

// ============================================================================
// Cycle Detection
// ============================================================================

type Color = 'unvisited' | 'in-progress' | 'done'

/**
 * Depth-first traversal with three-color marking; a dependency that is
 * still in progress closes a cycle.
 */
function assertAcyclic(graph: Graph): void {
  const color = new Map<ResourceId, Color>()
  const stack: ResourceId[] = []

  const visit = (id: ResourceId): void => {
    color.set(id, 'in-progress')
    stack.push(id)

    for (const dep of graph.dependencies.get(id) ?? []) {
      const state = color.get(dep) ?? 'unvisited'
      if (state === 'in-progress') {
        throw new CycleError([...stack.slice(stack.indexOf(dep)), dep])
      }
      if (state === 'unvisited') {
        visit(dep)
      }
    }

    stack.pop()
    color.set(id, 'done')
  }

  for (const node of graph.nodes) {
    if (!color.has(node.id)) {
      visit(node.id)
    }
  }
}

// ============================================================================
// Traversal Helpers
// ============================================================================

/**
 * Dependencies before dependents, declaration order among independent nodes.
 */
export function topologicalOrder(graph: Graph): ResourceNode[] {
  const remaining = new Map<ResourceId, number>()
  for (const node of graph.nodes) {
    remaining.set(node.id, graph.dependencies.get(node.id)?.length ?? 0)
  }

  const result: ResourceNode[] = []
  const done = new Set<ResourceId>()

  while (result.length < graph.nodes.length) {
    const next = graph.nodes.find(n => !done.has(n.id) && remaining.get(n.id) === 0)
    if (!next) {
      // Unreachable for graphs returned by buildGraph
      throw new CycleError(graph.nodes.filter(n => !done.has(n.id)).map(n => n.id))
    }
    done.add(next.id)
    result.push(next)
    for (const user of graph.dependents.get(next.id) ?? []) {
      remaining.set(user, (remaining.get(user) ?? 0) - 1)
    }
  }

  return result
}

/**
 * Every resource depending on `id`, directly or transitively.
 */
export function transitiveDependents(graph: Graph, id: ResourceId): ResourceId[] {
  const seen = new Set<ResourceId>()
  const queue = [...(graph.dependents.get(id) ?? [])]

  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined || seen.has(current)) continue
    seen.add(current)
    queue.push(...(graph.dependents.get(current) ?? []))
  }

  return graph.nodes.filter(n => seen.has(n.id)).map(n => n.id)
}
