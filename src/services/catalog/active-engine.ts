import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { EngineClosedError } from './errors.js'

export type EngineTask<R> = () => Promise<R>

interface QueuedTask {
  run: () => Promise<void>
}

/**
 * Single-worker task queue.
 *
 * Any number of callers may submit concurrently; tasks run one at a time
 * in FIFO order and each caller gets a promise for its own task's result.
 */
export class ActiveEngine {
  private readonly log: FastifyBaseLogger

  /** Tasks waiting for the worker */
  private queue: QueuedTask[] = []

  /** Whether the worker loop is running */
  private isProcessing = false

  private closed = false

  private drainWaiters: Array<() => void> = []

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'ENGINE')
  }

  get pending(): number {
    return this.queue.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  submit<R>(task: EngineTask<R>): Promise<R> {
    if (this.closed) {
      return Promise.reject(new EngineClosedError())
    }

    return new Promise<R>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task())
          } catch (error) {
            reject(error instanceof Error ? error : new Error(String(error)))
          }
        },
      })

      if (!this.isProcessing) {
        void this.processQueue()
      }
    })
  }

  /**
   * Refuses new tasks, lets the queued ones finish and resolves once the
   * worker is idle.
   */
  async close(): Promise<void> {
    this.closed = true
    if (!this.isProcessing && this.queue.length === 0) {
      return
    }
    this.log.debug(`Draining ${this.queue.length} queued tasks before close`)
    await new Promise<void>((resolve) => this.drainWaiters.push(resolve))
  }

  private async processQueue(): Promise<void> {
    this.isProcessing = true

    while (this.queue.length > 0) {
      const task = this.queue.shift()
      if (!task) continue
      await task.run()
    }

    this.isProcessing = false

    const waiters = this.drainWaiters
    this.drainWaiters = []
    for (const resolve of waiters) resolve()
  }
}
