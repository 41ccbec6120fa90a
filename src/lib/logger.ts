/**
 * Console logger
 *
 * Everything goes to stderr so report output on stdout stays clean.
 */

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  /** Print debug lines (default: KEEL_VERBOSE=1|true) */
  verbose?: boolean
  /** Mute everything except errors */
  silent?: boolean
  prefix?: string
}

export function isVerboseEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.KEEL_VERBOSE === '1' || env.KEEL_VERBOSE === 'true'
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? isVerboseEnv()
  const silent = options.silent ?? false
  const prefix = options.prefix ?? '[keel]'

  return {
    debug(message) {
      if (!silent && verbose) {
        console.error(`${prefix} ${message}`)
      }
    },
    info(message) {
      if (!silent) {
        console.error(`${prefix} ${message}`)
      }
    },
    warn(message) {
      if (!silent) {
        console.error(`${prefix} WARN: ${message}`)
      }
    },
    error(message) {
      console.error(`${prefix} ERROR: ${message}`)
    }
  }
}

/** Logger that drops everything; default for library calls without one */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
}
