/**
 * Thread Pool - fixed-size executor for scale tasks
 *
 * - `threads` slots pull tasks from one FIFO queue, so tasks start in
 *   submission order and at most `threads` run at once
 * - each running task is dispatched to a TaskRunner (Piscina worker
 *   threads by default)
 * - optional bounded queue: a full queue rejects at submission time
 * - lifecycle: active -> shutting-down -> terminated
 *
 * Task failures only reach the task's own handle; the pool keeps running.
 */

import { EventEmitter } from 'events'
import { ConfigurationError, RejectedSubmissionError } from '../../../shared/errors'
import type { PoolState, PoolStats, RasterImage, ScaleTask } from '../../../shared/types'
import { createTaskHandle, type TaskHandle, type TaskSettler } from './handle'
import { PiscinaRunner, type TaskRunner } from './runner'

/**
 * Everything the scaler façade needs from a pool. Implement this to plug in
 * a pool with a different sizing, queueing or rejection policy.
 */
export interface ScalePool<TImage = RasterImage> {
  readonly threads: number
  readonly state: PoolState
  /** Queue a task; throws RejectedSubmissionError if it cannot be accepted */
  submit(task: ScaleTask<TImage>): TaskHandle<TImage>
  isShutdown(): boolean
  isTerminated(): boolean
  /** Stop accepting tasks; queued and running tasks still finish */
  shutdown(): void
  /** Stop accepting tasks, cancel queued ones, abort running ones (best effort) */
  shutdownNow(): ScaleTask<TImage>[]
  /** Resolves true once terminated, false if `timeoutMs` elapses first */
  awaitTermination(timeoutMs?: number): Promise<boolean>
  getStats(): PoolStats
}

export interface ThreadPoolOptions<TImage = RasterImage> {
  threads: number
  runner: TaskRunner<TImage>
  /** Max tasks waiting for a free slot (default: unbounded) */
  maxQueue?: number
}

interface QueueEntry<TImage> {
  task: ScaleTask<TImage>
  settler: TaskSettler<TImage>
}

export function validateThreadCount(threads: number): void {
  if (!Number.isInteger(threads) || threads <= 0) {
    throw new ConfigurationError(`Thread count is ${threads}, but it must be an integer > 0`, {
      setting: 'threadCount',
      value: threads,
    })
  }
}

export function validateMaxQueue(maxQueue: number): void {
  if (maxQueue !== Infinity && (!Number.isInteger(maxQueue) || maxQueue <= 0)) {
    throw new ConfigurationError(`Max queue is ${maxQueue}, but it must be an integer > 0`, {
      setting: 'maxQueue',
      value: maxQueue,
    })
  }
}

export class ThreadPool<TImage = RasterImage> extends EventEmitter implements ScalePool<TImage> {
  readonly threads: number
  readonly maxQueue: number
  private readonly runner: TaskRunner<TImage>
  private readonly queue: QueueEntry<TImage>[] = []
  private readonly inFlight = new Set<AbortController>()
  private currentState: PoolState = 'active'
  private active = 0

  // Metrics
  private completed = 0
  private failed = 0
  private cancelled = 0
  private totalDuration = 0

  constructor(options: ThreadPoolOptions<TImage>) {
    super()
    validateThreadCount(options.threads)
    validateMaxQueue(options.maxQueue ?? Infinity)
    this.threads = options.threads
    this.maxQueue = options.maxQueue ?? Infinity
    this.runner = options.runner
  }

  get state(): PoolState {
    return this.currentState
  }

  submit(task: ScaleTask<TImage>): TaskHandle<TImage> {
    if (this.currentState !== 'active') {
      throw new RejectedSubmissionError(`Pool is ${this.currentState}; task ${task.id} rejected`, {
        reason: 'shutdown',
      })
    }
    if (this.active >= this.threads && this.queue.length >= this.maxQueue) {
      throw new RejectedSubmissionError(
        `Queue is full (${this.queue.length}/${this.maxQueue}); task ${task.id} rejected`,
        { reason: 'queue-full', queueSize: this.queue.length, maxQueue: this.maxQueue }
      )
    }

    const { handle, settler } = createTaskHandle<TImage>(task.id, () => this.dequeue(entry))
    const entry: QueueEntry<TImage> = { task, settler }
    this.queue.push(entry)
    this.drain()
    return handle
  }

  isShutdown(): boolean {
    return this.currentState !== 'active'
  }

  isTerminated(): boolean {
    return this.currentState === 'terminated'
  }

  shutdown(): void {
    if (this.currentState !== 'active') return
    this.currentState = 'shutting-down'
    console.info(
      `[ThreadPool] Shutting down: ${this.active} running, ${this.queue.length} queued`
    )
    this.checkTermination()
  }

  shutdownNow(): ScaleTask<TImage>[] {
    if (this.currentState === 'terminated') return []
    this.currentState = 'shutting-down'

    const pending = [...this.queue]
    for (const entry of pending) {
      entry.settler.cancel()
    }
    for (const controller of this.inFlight) {
      controller.abort()
    }

    console.info(
      `[ThreadPool] Shut down now: ${pending.length} queued cancelled, ${this.active} running aborted`
    )
    this.checkTermination()
    return pending.map((entry) => entry.task)
  }

  awaitTermination(timeoutMs?: number): Promise<boolean> {
    if (this.currentState === 'terminated') return Promise.resolve(true)

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined
      const onTerminated = (): void => {
        if (timer) clearTimeout(timer)
        resolve(true)
      }
      this.once('terminated', onTerminated)
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.off('terminated', onTerminated)
          resolve(false)
        }, timeoutMs)
      }
    })
  }

  getStats(): PoolStats {
    const settled = this.completed + this.failed
    return {
      state: this.currentState,
      threads: this.threads,
      activeTasks: this.active,
      queuedTasks: this.queue.length,
      completedTasks: this.completed,
      failedTasks: this.failed,
      cancelledTasks: this.cancelled,
      averageDuration: settled > 0 ? this.totalDuration / settled : 0,
    }
  }

  private dequeue(entry: QueueEntry<TImage>): boolean {
    const index = this.queue.indexOf(entry)
    if (index === -1) return false
    this.queue.splice(index, 1)
    this.cancelled++
    this.checkTermination()
    return true
  }

  private drain(): void {
    while (this.active < this.threads && this.queue.length > 0) {
      const entry = this.queue.shift()
      if (!entry || !entry.settler.start()) continue
      this.active++
      void this.execute(entry)
    }
  }

  private async execute(entry: QueueEntry<TImage>): Promise<void> {
    const controller = new AbortController()
    this.inFlight.add(controller)
    const start = performance.now()

    try {
      const value = await this.runner.run(entry.task, controller.signal)
      this.completed++
      entry.settler.fulfill(value)
    } catch (error) {
      this.failed++
      entry.settler.reject(error)
    } finally {
      this.totalDuration += performance.now() - start
      this.inFlight.delete(controller)
      this.active--
      this.drain()
      this.checkTermination()
    }
  }

  private checkTermination(): void {
    if (this.currentState !== 'shutting-down') return
    if (this.active > 0 || this.queue.length > 0) return

    this.currentState = 'terminated'
    console.info('[ThreadPool] Terminated')
    this.emit('terminated')
    void this.releaseRunner()
  }

  private async releaseRunner(): Promise<void> {
    try {
      await this.runner.destroy()
    } catch (error) {
      console.warn('[ThreadPool] Failed to release runner:', error)
    }
  }
}

export interface FixedThreadPoolOptions {
  threads: number
  scalerModule: string
  maxQueue?: number
  minThreads?: number
  idleTimeout?: number
  workerFile?: string
}

/**
 * Fixed-size pool running tasks on Piscina worker threads
 */
export function createFixedThreadPool<TImage = RasterImage>(
  options: FixedThreadPoolOptions
): ThreadPool<TImage> {
  validateThreadCount(options.threads)
  validateMaxQueue(options.maxQueue ?? Infinity)
  const pool = new ThreadPool<TImage>({
    threads: options.threads,
    maxQueue: options.maxQueue,
    runner: new PiscinaRunner<TImage>({
      threads: options.threads,
      scalerModule: options.scalerModule,
      minThreads: options.minThreads,
      idleTimeout: options.idleTimeout,
      workerFile: options.workerFile,
    }),
  })
  console.info(`[ThreadPool] Initialized: ${options.threads} threads`)
  return pool
}
