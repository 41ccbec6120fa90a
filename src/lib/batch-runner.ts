/**
 * Batch Runner
 *
 * Run an async operation over a list of items with bounded concurrency.
 * Items not yet started when the signal aborts are reported as skipped
 * and never invoked.
 */

import pLimit from 'p-limit'

export interface BatchOperation<I, T> {
  item: I
  index: number
  result?: T
  error?: Error
  /** Never started (aborted) */
  skipped: boolean
  duration: number
}

export interface BatchResult<I, T> {
  total: number
  successful: number
  failed: number
  skipped: number
  /** One entry per item, in input order */
  operations: BatchOperation<I, T>[]
}

export type OperationFn<I, T> = (item: I, index: number) => Promise<T>

export interface RunBatchOptions<I> {
  concurrency?: number
  signal?: AbortSignal
  onProgress?: (completed: number, total: number, current: I) => void
}

/**
 * Run an operation across items
 */
export async function runBatch<I, T>(
  items: I[],
  operation: OperationFn<I, T>,
  options: RunBatchOptions<I> = {}
): Promise<BatchResult<I, T>> {
  const {
    concurrency = 1,
    signal,
    onProgress
  } = options

  const operations: BatchOperation<I, T>[] = items.map((item, index) => ({
    item,
    index,
    skipped: true,
    duration: 0
  }))
  let successful = 0
  let failed = 0
  let completed = 0

  const runOperation = async (item: I, index: number): Promise<void> => {
    if (signal?.aborted) {
      return
    }

    const op = operations[index]
    op.skipped = false
    const startTime = Date.now()

    try {
      op.result = await operation(item, index)
      successful++
    } catch (err) {
      op.error = err instanceof Error ? err : new Error(String(err))
      failed++
    } finally {
      op.duration = Date.now() - startTime
      completed++
      if (onProgress) {
        onProgress(completed, items.length, item)
      }
    }
  }

  if (concurrency <= 1) {
    for (let i = 0; i < items.length; i++) {
      await runOperation(items[i], i)
    }
  } else {
    const limit = pLimit(concurrency)
    await Promise.all(items.map((item, index) => limit(() => runOperation(item, index))))
  }

  return {
    total: items.length,
    successful,
    failed,
    skipped: operations.filter(op => op.skipped).length,
    operations
  }
}
