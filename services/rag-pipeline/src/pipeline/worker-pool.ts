/**
 * WorkerPool - Concurrent Task Execution Pool
 *
 * Runs one task per input item on at most N workers.
 *
 * Key features:
 * - Bounded concurrency: Never exceed N parallel executions
 * - Error isolation: A failed or timed-out task becomes a failure result
 *   through onFailure and does not affect the others
 * - Fatal errors: When isFatal matches, no further items are claimed, the
 *   running tasks finish, and the error is rethrown
 * - Results come back in input order
 */

import { ServiceUnavailableError, errorMessage } from '../errors.js'

/**
 * WorkerPool configuration
 */
export interface WorkerPoolConfig {
  /** Number of concurrent workers (default: 3) */
  concurrency?: number
  /** Task execution timeout in minutes (default: 10) */
  taskTimeoutMinutes?: number
}

export interface ExecuteAllOptions<TItem, TResult> {
  /** The signal is aborted when the task times out */
  run: (item: TItem, index: number, signal: AbortSignal) => Promise<TResult>
  /** Turns a thrown error or a timeout into a result */
  onFailure: (item: TItem, index: number, error: unknown) => TResult
  /** Errors that abort the whole run instead of failing one task */
  isFatal?: (error: unknown) => boolean
  /** Used in log lines */
  describe?: (item: TItem, index: number) => string
}

/**
 * Worker status statistics
 */
export interface WorkerStats {
  busy: number
  idle: number
  total: number
}

interface WorkerState {
  id: number
  busy: boolean
}

export class WorkerPool {
  private workers: WorkerState[] = []
  private concurrency: number
  private taskTimeoutMs: number

  constructor(config: WorkerPoolConfig = {}) {
    this.concurrency = Math.max(1, config.concurrency ?? 3)
    this.taskTimeoutMs = (config.taskTimeoutMinutes ?? 10) * 60 * 1000

    for (let i = 0; i < this.concurrency; i++) {
      this.workers.push({ id: i, busy: false })
    }
  }

  getWorkerStats(): WorkerStats {
    const busy = this.workers.filter((w) => w.busy).length
    return {
      busy,
      idle: this.concurrency - busy,
      total: this.concurrency,
    }
  }

  /**
   * Execute every item with N concurrent workers
   *
   * Loop:
   * 1. Find an available worker
   * 2. Claim the next item
   * 3. Start execution (non-blocking)
   * 4. Repeat until no items are left, then wait for running tasks
   */
  async executeAll<TItem, TResult>(
    items: TItem[],
    options: ExecuteAllOptions<TItem, TResult>
  ): Promise<TResult[]> {
    const results = new Map<number, TResult>()
    const runningPromises = new Map<number, Promise<void>>()
    const describe = options.describe ?? ((_item: TItem, index: number) => `#${index}`)
    const fatalErrors: unknown[] = []
    let nextIndex = 0

    const waitForRunningTasks = async (): Promise<void> => {
      if (runningPromises.size > 0) {
        const { busy, idle } = this.getWorkerStats()
        console.log(
          `[WorkerPool] Waiting for ${runningPromises.size} running task(s) to complete... ` +
            `(workers: ${busy} busy, ${idle} idle)`
        )
        await Promise.all(runningPromises.values())
      }
    }

    console.log(
      `[WorkerPool] Starting execution of ${items.length} task(s) with ${this.concurrency} workers`
    )

    while (fatalErrors.length === 0 && nextIndex < items.length) {
      // 1. Find available worker
      const availableWorker = this.workers.find((w) => !w.busy)
      if (!availableWorker) {
        await Promise.race(runningPromises.values())
        continue
      }

      // 2. Claim next item
      const index = nextIndex++
      const item = items[index]
      availableWorker.busy = true

      const { busy, idle } = this.getWorkerStats()
      console.log(
        `[WorkerPool] Worker ${availableWorker.id} claiming ${describe(item, index)} ` +
          `(workers: ${busy} busy, ${idle} idle)`
      )

      // 3. Execute in background
      const promise = this.executeWithTimeout(item, index, options)
        .then((result) => {
          results.set(index, result)
        })
        .catch((error: unknown) => {
          if (options.isFatal?.(error)) {
            fatalErrors.push(error)
            console.error(
              `[WorkerPool] Worker ${availableWorker.id} hit a fatal error on ${describe(item, index)}: ` +
                errorMessage(error)
            )
            return
          }
          console.error(
            `[WorkerPool] Worker ${availableWorker.id} error on ${describe(item, index)}: ` +
              errorMessage(error)
          )
          results.set(index, options.onFailure(item, index, error))
        })
        .finally(() => {
          availableWorker.busy = false
          runningPromises.delete(index)
        })

      runningPromises.set(index, promise)
    }

    await waitForRunningTasks()

    if (fatalErrors.length > 0) {
      throw fatalErrors[0]
    }

    console.log(`[WorkerPool] Execution complete: ${results.size} task(s) finished`)

    const ordered: TResult[] = []
    items.forEach((item, index) => {
      ordered.push(
        results.get(index) ?? options.onFailure(item, index, new Error('Task produced no result'))
      )
    })
    return ordered
  }

  /**
   * Run a single task with timeout protection. On timeout the task's signal
   * is aborted and the task rejects with ServiceUnavailableError.
   */
  private async executeWithTimeout<TItem, TResult>(
    item: TItem,
    index: number,
    options: ExecuteAllOptions<TItem, TResult>
  ): Promise<TResult> {
    const controller = new AbortController()
    let timeoutId: ReturnType<typeof setTimeout> | null = null

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort()
        reject(
          new ServiceUnavailableError(
            `Task execution timeout after ${this.taskTimeoutMs / 1000 / 60} minutes`
          )
        )
      }, this.taskTimeoutMs)
    })

    try {
      return await Promise.race([options.run(item, index, controller.signal), timeoutPromise])
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId)
      }
    }
  }
}
