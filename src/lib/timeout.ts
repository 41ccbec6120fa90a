/**
 * Timeout, retry and polling utilities for async operations
 *
 * Provider calls and convergence checks run against slow, eventually-consistent
 * APIs; these helpers bound how long and how often keel waits on them.
 */

/**
 * Non-blocking sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export interface RetryOptions {
  maxAttempts?: number
  delayMs?: number
  backoffMultiplier?: number
  /** Upper bound for a single backoff delay */
  maxDelayMs?: number
  /** Return false to fail immediately without further attempts */
  shouldRetry?: (error: unknown, attempt: number) => boolean
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
}

/**
 * Delay before the retry that follows `attempt` (1-based): delayMs, delayMs*m, delayMs*m², ...
 */
export function backoffDelay(
  attempt: number,
  delayMs: number,
  backoffMultiplier: number,
  maxDelayMs: number = Number.POSITIVE_INFINITY
): number {
  return Math.min(delayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs)
}

/**
 * Retry an async operation with exponential backoff
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => provider.create(desired, ctx),
 *   { maxAttempts: 3, delayMs: 500, shouldRetry: err => isProviderError(err) && err.retryable }
 * )
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    maxDelayMs,
    shouldRetry = () => true,
    onRetry
  } = options

  let lastError: unknown = new Error('withRetry failed with unknown error')

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      lastError = error

      if (attempt === maxAttempts || !shouldRetry(error, attempt)) {
        break
      }

      const delay = backoffDelay(attempt, delayMs, backoffMultiplier, maxDelayMs)
      if (onRetry) {
        onRetry(attempt, error, delay)
      }
      await sleep(delay)
    }
  }

  throw lastError
}

/**
 * Raised by withTimeout when the deadline passes first
 */
export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`)
    this.name = 'TimeoutError'
  }
}

/**
 * Wrap a promise with a timeout
 *
 * @example
 * ```ts
 * const observed = await withTimeout(provider.read(id, ctx), 30000, 'read bucket.site')
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}

export interface PollOptions {
  timeoutMs: number
  initialDelayMs?: number
  maxDelayMs?: number
  backoffMultiplier?: number
  /** Names the check in timeout errors */
  operation?: string
  onPoll?: (attempt: number, nextDelayMs: number) => void
}

export interface PollResult {
  satisfied: boolean
  attempts: number
  elapsedMs: number
}

/**
 * Poll a predicate with exponential backoff until it returns true or the deadline passes.
 *
 * The predicate is always evaluated at least once, and once more right at the deadline.
 * Each evaluation is bounded by the time left; one still pending at the deadline
 * counts as unsatisfied. Errors thrown by the predicate propagate.
 */
export async function pollUntil(
  check: (attempt: number) => Promise<boolean>,
  options: PollOptions
): Promise<PollResult> {
  const {
    timeoutMs,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    operation = 'poll',
    onPoll
  } = options

  const start = Date.now()
  let delay = initialDelayMs
  let attempts = 0

  for (;;) {
    attempts++
    const left = Math.max(0, timeoutMs - (Date.now() - start))
    let satisfied: boolean
    try {
      satisfied = await withTimeout(check(attempts), left, operation)
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { satisfied: false, attempts, elapsedMs: Date.now() - start }
      }
      throw error
    }
    if (satisfied) {
      return { satisfied: true, attempts, elapsedMs: Date.now() - start }
    }

    const remaining = timeoutMs - (Date.now() - start)
    if (remaining <= 0) {
      return { satisfied: false, attempts, elapsedMs: Date.now() - start }
    }

    const wait = Math.min(delay, remaining)
    if (onPoll) {
      onPoll(attempts, wait)
    }
    await sleep(wait)
    delay = Math.min(delay * backoffMultiplier, maxDelayMs)
  }
}
