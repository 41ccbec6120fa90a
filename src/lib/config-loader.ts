/**
 * keel Config Loader
 *
 * Loads and merges configuration from .keel/config.yaml files
 * with support for inheritance via "extends" field.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import type { ExecutorSettings } from '../domain/apply.js'
import type { EngineConfig, EngineConfigInput } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError } from './errors.js'

export const CONFIG_DIR = '.keel'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

type Env = Record<string, string | undefined>

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: Env = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }

  return value
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: EngineConfig = {
  version: '1',
  parallelism: 10,
  retry: {
    max_attempts: 3,
    delay_ms: 500,
    backoff_multiplier: 2,
    max_delay_ms: 30000
  },
  wait: {
    timeout_ms: 600000,
    initial_delay_ms: 1000,
    max_delay_ms: 30000,
    backoff_multiplier: 2
  },
  state: {
    driver: 'filesystem',
    path: 'state'
  },
  lock: {
    enabled: true
  },
  plan_artifacts_dir: 'plans',
  verbose: false
}

// ============================================================================
// Validation
// ============================================================================

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()
const multiplier = z.coerce.number().min(1)

const retrySchema = z.object({
  max_attempts: positiveInt,
  delay_ms: nonNegativeInt,
  backoff_multiplier: multiplier,
  max_delay_ms: nonNegativeInt
})

const waitSchema = z.object({
  timeout_ms: nonNegativeInt,
  initial_delay_ms: nonNegativeInt,
  max_delay_ms: nonNegativeInt,
  backoff_multiplier: multiplier
})

const stateSchema = z.object({
  driver: z.enum(['memory', 'filesystem', 's3db']),
  path: z.string().min(1).optional(),
  connection_string: z.string().min(1).optional(),
  passphrase: z.string().optional()
})

const configInputSchema: z.ZodType<EngineConfigInput, z.ZodTypeDef, unknown> = z.object({
  version: z.literal('1').optional(),
  extends: z.string().optional(),
  parallelism: positiveInt.optional(),
  retry: retrySchema.partial().optional(),
  wait: waitSchema.partial().optional(),
  state: stateSchema.partial().optional(),
  lock: z.object({ enabled: z.boolean() }).partial().optional(),
  plan_artifacts_dir: z.string().min(1).optional(),
  verbose: z.boolean().optional()
}).strict()

const engineConfigSchema: z.ZodType<EngineConfig, z.ZodTypeDef, unknown> = z.object({
  version: z.literal('1'),
  parallelism: positiveInt,
  retry: retrySchema,
  wait: waitSchema,
  state: stateSchema.refine(
    state => state.driver !== 's3db' || state.connection_string !== undefined,
    { message: 'connection_string is required for the s3db driver', path: ['connection_string'] }
  ),
  lock: z.object({ enabled: z.boolean() }),
  plan_artifacts_dir: z.string().min(1),
  verbose: z.boolean()
})

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
  return `${where}${issue.message}`
}

/**
 * Validate one parsed config file.
 */
export function parseConfigInput(raw: unknown, configPath?: string): EngineConfigInput {
  const result = configInputSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new InvalidConfigError(firstIssue(result.error), configPath, result.error)
  }
  return result.data
}

/**
 * Validate a fully merged config.
 */
export function parseEngineConfig(raw: unknown, configPath?: string): EngineConfig {
  const result = engineConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidConfigError(firstIssue(result.error), configPath, result.error)
  }
  return result.data
}

// ============================================================================
// Discovery & Loading
// ============================================================================

/**
 * Find the .keel directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    const configFile = path.join(configDir, CONFIG_FILE)

    if (fs.existsSync(configFile)) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, env: Env, required: boolean = true): EngineConfigInput {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    throw new InvalidConfigError(
      error instanceof Error ? error.message : String(error),
      configPath,
      error
    )
  }

  // Expand environment variables in all string values
  return parseConfigInput(expandEnvVarsInValue(parsed, env), configPath)
}

/**
 * Deep merge two config objects
 */
export function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Deep merge objects
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support. Later files win; the result is
 * still partial until merged over DEFAULT_CONFIG.
 */
function loadConfigWithExtends(
  configPath: string,
  env: Env,
  visited: Set<string> = new Set(),
  depth: number = 0
): Record<string, unknown> {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new InvalidConfigError(`Config inheritance depth exceeded (max ${MAX_EXTENDS_DEPTH})`, configPath)
  }

  const absolutePath = path.resolve(configPath)

  if (visited.has(absolutePath)) {
    throw new InvalidConfigError(`Circular config inheritance detected: ${absolutePath}`, configPath)
  }

  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath, env)

  if (parent) {
    const extendsPath = path.resolve(path.dirname(absolutePath), parent)
    // Merge: parent <- current
    return deepMerge(loadConfigWithExtends(extendsPath, env, visited, depth + 1), config)
  }

  return { ...config }
}

export interface LoadConfigOptions {
  /** Directory to start searching from (default: cwd) */
  startDir?: string
  /** Explicit config file; skips the upward search */
  configPath?: string
  env?: Env
}

export interface LoadedConfig {
  config: EngineConfig
  /** Directory holding config.yaml, null when running on defaults */
  configDir: string | null
}

/**
 * Load configuration from the nearest .keel/config.yaml
 * Also merges config.local.yaml if it exists (for credentials/overrides)
 * and applies KEEL_PARALLELISM / KEEL_VERBOSE last.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env
  const configDir = options.configPath
    ? path.dirname(path.resolve(options.configPath))
    : findConfigDir(options.startDir)

  let merged = deepMerge(DEFAULT_CONFIG, {})
  let configPath: string | undefined

  if (configDir) {
    configPath = options.configPath ?? path.join(configDir, CONFIG_FILE)
    merged = deepMerge(merged, loadConfigWithExtends(configPath, env))

    // Load and merge local config (for secrets that shouldn't be committed)
    const localConfig = loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), env, false)
    if (Object.keys(localConfig).length > 0) {
      merged = deepMerge(merged, localConfig)
    }
  }

  merged = deepMerge(merged, envOverrides(env))
  return { config: parseEngineConfig(merged, configPath), configDir }
}

function envOverrides(env: Env): EngineConfigInput {
  return parseConfigInput({
    ...(env.KEEL_PARALLELISM ? { parallelism: env.KEEL_PARALLELISM } : {}),
    ...(env.KEEL_VERBOSE ? { verbose: env.KEEL_VERBOSE === '1' || env.KEEL_VERBOSE === 'true' } : {})
  }, 'environment')
}

/**
 * Check if a config directory exists
 */
export function configExists(startDir?: string): boolean {
  return findConfigDir(startDir) !== null
}

/**
 * Resolve a config-relative path
 */
export function resolveConfigPath(configDir: string | null, target: string): string {
  return path.resolve(configDir ?? path.resolve(CONFIG_DIR), target)
}

/**
 * Executor settings described by a config
 */
export function toExecutorSettings(config: EngineConfig): ExecutorSettings {
  return {
    parallelism: config.parallelism,
    retry: {
      maxAttempts: config.retry.max_attempts,
      delayMs: config.retry.delay_ms,
      backoffMultiplier: config.retry.backoff_multiplier,
      maxDelayMs: config.retry.max_delay_ms
    },
    wait: {
      timeoutMs: config.wait.timeout_ms,
      initialDelayMs: config.wait.initial_delay_ms,
      maxDelayMs: config.wait.max_delay_ms,
      backoffMultiplier: config.wait.backoff_multiplier
    }
  }
}

/**
 * Create a default config file
 */
export function createDefaultConfig(configDir: string): string {
  fs.mkdirSync(configDir, { recursive: true })

  const configPath = path.join(configDir, CONFIG_FILE)
  const yamlContent = `# keel Configuration

version: "1"

# Actions in flight at once within a wave
parallelism: 10

# Retries for provider errors marked retryable
retry:
  max_attempts: 3
  delay_ms: 500
  backoff_multiplier: 2

# Polling of wait conditions (certificate issued, DNS propagated, ...)
wait:
  timeout_ms: 600000
  initial_delay_ms: 1000

# State backend
# Supports: \${VAR}, \${VAR:-default}, $VAR
state:
  driver: filesystem   # memory | filesystem | s3db
  path: state
  # driver: s3db
  # connection_string: \${KEEL_STATE_URL}

lock:
  enabled: true

plan_artifacts_dir: plans

# TIP: put credentials in .keel/config.local.yaml (gitignored)
`

  fs.writeFileSync(configPath, yamlContent)
  return configPath
}
