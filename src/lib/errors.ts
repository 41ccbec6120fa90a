/**
 * keel Error Hierarchy
 *
 * Typed error classes for graph, provider, state and configuration failures.
 *
 * Hierarchy:
 *   KeelError (base)
 *   ├── GraphError (malformed declaration, fatal before any side effect)
 *   │   ├── CycleError
 *   │   ├── UnresolvedReferenceError
 *   │   ├── DuplicateResourceError
 *   │   └── UnknownResourceTypeError
 *   ├── PlanError
 *   │   └── PreventDestroyError
 *   ├── ProviderError (per-operation, isolated to one resource)
 *   ├── WaitTimeoutError (WaitCondition never satisfied)
 *   ├── StateError (state store failures)
 *   │   ├── LockContentionError
 *   │   ├── StateCorruptionError
 *   │   └── StalePlanError
 *   └── ConfigError (configuration issues)
 *       ├── ConfigNotFoundError
 *       └── InvalidConfigError
 */

interface KeelErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all keel errors
 */
export class KeelError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: KeelErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'KeelError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Graph Errors
// =============================================================================

/**
 * Base class for errors raised while building the resource graph
 */
export class GraphError extends KeelError {
  constructor(message: string, code: string, options?: KeelErrorOptions) {
    super(message, code, options)
    this.name = 'GraphError'
  }
}

/**
 * Thrown when the dependency edges contain a cycle
 */
export class CycleError extends GraphError {
  /** Resources on the cycle, first element repeated at the end */
  readonly participants: string[]

  constructor(participants: string[]) {
    super(
      `Dependency cycle detected: ${participants.join(' -> ')}`,
      'DEPENDENCY_CYCLE',
      {
        suggestion: 'Remove one of the explicit dependencies or references on the cycle',
        context: { participants }
      }
    )
    this.name = 'CycleError'
    this.participants = participants
  }
}

/**
 * Thrown when an attribute references a resource or output that does not exist
 */
export class UnresolvedReferenceError extends GraphError {
  readonly node: string
  readonly attribute: string
  readonly target: string
  readonly output: string

  constructor(node: string, attribute: string, target: string, output: string) {
    super(
      `Attribute "${attribute}" of ${node} references unknown output ${target}.${output}`,
      'UNRESOLVED_REFERENCE',
      {
        suggestion: `Declare ${target} or reference one of its declared outputs`,
        context: { node, attribute, target, output }
      }
    )
    this.name = 'UnresolvedReferenceError'
    this.node = node
    this.attribute = attribute
    this.target = target
    this.output = output
  }
}

/**
 * Thrown when two declarations share the same identity
 */
export class DuplicateResourceError extends GraphError {
  constructor(id: string) {
    super(
      `Resource ${id} is declared more than once`,
      'DUPLICATE_RESOURCE',
      {
        suggestion: 'Resource identities (type + name) must be unique',
        context: { id }
      }
    )
    this.name = 'DuplicateResourceError'
  }
}

/**
 * Thrown when no provider is registered for a declared resource type
 */
export class UnknownResourceTypeError extends GraphError {
  constructor(type: string, resource?: string) {
    super(
      resource
        ? `No provider registered for type "${type}" (used by ${resource})`
        : `No provider registered for type "${type}"`,
      'UNKNOWN_RESOURCE_TYPE',
      {
        suggestion: `Register a provider for "${type}" before planning`,
        context: { type, resource }
      }
    )
    this.name = 'UnknownResourceTypeError'
  }
}

// =============================================================================
// Plan Errors
// =============================================================================

/**
 * Base class for errors raised while computing a plan
 */
export class PlanError extends KeelError {
  constructor(message: string, code: string, options?: KeelErrorOptions) {
    super(message, code, options)
    this.name = 'PlanError'
  }
}

/**
 * Thrown when a plan would destroy a resource whose lifecycle forbids it
 */
export class PreventDestroyError extends PlanError {
  constructor(id: string, op: 'delete' | 'replace') {
    super(
      `Plan would ${op} ${id}, which has preventDestroy set`,
      'PREVENT_DESTROY',
      {
        suggestion: op === 'delete'
          ? `Keep ${id} declared, or clear preventDestroy and apply before removing it`
          : `Revert the change to the immutable attributes of ${id}, or clear preventDestroy`,
        context: { id, op }
      }
    )
    this.name = 'PreventDestroyError'
  }
}

// =============================================================================
// Provider Errors
// =============================================================================

export type ProviderOperation = 'create' | 'read' | 'update' | 'delete' | 'wait'

/**
 * Failure of a single provider call.
 *
 * Treated as permanent unless `retryable` is set by the provider.
 */
export class ProviderError extends KeelError {
  readonly resourceId: string
  readonly operation: ProviderOperation
  readonly retryable: boolean

  constructor(
    message: string,
    options: {
      resourceId: string
      operation: ProviderOperation
      retryable?: boolean
      code?: string
      cause?: unknown
    }
  ) {
    super(message, options.code ?? 'PROVIDER_ERROR', {
      context: {
        resourceId: options.resourceId,
        operation: options.operation,
        retryable: options.retryable ?? false
      },
      cause: options.cause
    })
    this.name = 'ProviderError'
    this.resourceId = options.resourceId
    this.operation = options.operation
    this.retryable = options.retryable ?? false
  }
}

/**
 * Thrown when a WaitCondition did not become true before its deadline
 */
export class WaitTimeoutError extends KeelError {
  readonly resourceId: string
  readonly condition: string
  readonly timeoutMs: number

  constructor(resourceId: string, condition: string, timeoutMs: number) {
    super(
      `${resourceId} did not satisfy "${condition}" within ${timeoutMs}ms`,
      'WAIT_TIMEOUT',
      {
        suggestion: 'Check the resource in its provider, or raise wait.timeoutMs',
        context: { resourceId, condition, timeoutMs }
      }
    )
    this.name = 'WaitTimeoutError'
    this.resourceId = resourceId
    this.condition = condition
    this.timeoutMs = timeoutMs
  }
}

// =============================================================================
// State Errors
// =============================================================================

/**
 * Base class for state store errors
 */
export class StateError extends KeelError {
  constructor(message: string, code: string, options?: KeelErrorOptions) {
    super(message, code, options)
    this.name = 'StateError'
  }
}

export interface LockHolder {
  runId: string
  acquiredAt: string
  pid?: number
}

/**
 * Thrown when another apply run holds the advisory lock
 */
export class LockContentionError extends StateError {
  readonly holder: LockHolder | null

  constructor(holder: LockHolder | null) {
    super(
      holder
        ? `State is locked by run ${holder.runId} (since ${holder.acquiredAt})`
        : 'State is locked by another run',
      'LOCK_CONTENTION',
      {
        suggestion: 'Wait for the other run to finish, or remove a stale lock manually',
        context: holder ? { ...holder } : undefined
      }
    )
    this.name = 'LockContentionError'
    this.holder = holder
  }
}

/**
 * Thrown when a persisted state record cannot be parsed
 */
export class StateCorruptionError extends StateError {
  constructor(id: string, reason: string, cause?: unknown) {
    super(
      `State record for ${id} is corrupt: ${reason}`,
      'STATE_CORRUPT',
      {
        suggestion: 'Restore the record from a backup or remove it and re-import the resource',
        context: { id, reason },
        cause
      }
    )
    this.name = 'StateCorruptionError'
  }
}

/**
 * Thrown when a saved plan no longer matches the current state
 */
export class StalePlanError extends StateError {
  constructor(planId: string) {
    super(
      `Plan ${planId} is stale: state changed since it was computed`,
      'STALE_PLAN',
      {
        suggestion: 'Compute a new plan',
        context: { planId }
      }
    )
    this.name = 'StalePlanError'
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Base class for configuration-related errors
 */
export class ConfigError extends KeelError {
  constructor(message: string, code: string, options?: KeelErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when .keel/config.yaml is not found
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath?: string) {
    super(
      searchedPath
        ? `Config file not found: ${searchedPath}`
        : 'No .keel/config.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create .keel/config.yaml or pass the configuration programmatically',
        context: searchedPath ? { searchedPath } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .keel/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isKeelError(error: unknown): error is KeelError {
  return error instanceof KeelError
}

export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError
}

export function isPlanError(error: unknown): error is PlanError {
  return error instanceof PlanError
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isKeelError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a KeelError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): KeelError {
  if (isKeelError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new KeelError(error.message, defaultCode, { cause: error })
  }
  return new KeelError(String(error), defaultCode)
}

/**
 * Normalize anything a provider throws into a ProviderError.
 * Non-ProviderErrors are permanent.
 */
export function toProviderError(
  error: unknown,
  resourceId: string,
  operation: ProviderOperation
): ProviderError {
  if (isProviderError(error)) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ProviderError(message, { resourceId, operation, cause: error })
}
