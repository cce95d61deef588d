/**
 * Async Scaler - non-blocking façade over a synchronous scaling routine
 *
 * Every resize is captured as a task and queued on a fixed-size pool, so a
 * busy process never runs more than `threadCount` scale operations at once.
 * Callers get a TaskHandle back immediately and decide themselves whether
 * and how long to wait on it.
 *
 * Pool lifecycle:
 * - the pool is created on the first submission, not at construction
 * - before every submission the pool is checked; a pool that is shutting
 *   down or terminated is replaced by a fresh one. Shutting the pool down
 *   therefore does not stop later submissions.
 * - the owner must call shutdown()/shutdownNow() before the process exits;
 *   worker threads are not released automatically
 * - awaitTermination() also waits for replaced pools that were still
 *   finishing accepted tasks
 */

import type { PoolStats, RasterImage, ScaleOptions, ScaleTask } from '../../../shared/types'
import { ConfigurationError } from '../../../shared/errors'
import { ENV_VARS, resolveScalePoolConfig } from '../config'
import type { TaskHandle } from '../workers/handle'
import {
  createFixedThreadPool,
  validateMaxQueue,
  validateThreadCount,
  type ScalePool,
} from '../workers/pool'
import { createScaleTask } from './tasks'

export type PoolFactory<TImage = RasterImage> = (threadCount: number) => ScalePool<TImage>

export interface AsyncScalerOptions<TImage = RasterImage> {
  /** Size of every pool this scaler creates (default: 2) */
  threadCount?: number
  /** Bound on queued tasks for the default pool (default: unbounded) */
  maxQueue?: number
  /** Module the default pool's worker threads load the scaling routine from */
  scalerModule?: string
  /** Builds replacement pools; defaults to a Piscina-backed ThreadPool */
  poolFactory?: PoolFactory<TImage>
}

const DEFAULT_THREAD_COUNT = 2

export class AsyncScaler<TImage = RasterImage> {
  readonly threadCount: number
  private readonly poolFactory: PoolFactory<TImage>
  private pool: ScalePool<TImage> | undefined
  /** Replaced pools that had not terminated yet */
  private readonly retired = new Set<ScalePool<TImage>>()
  private nextTaskId = 1

  constructor(options: AsyncScalerOptions<TImage> = {}) {
    const threadCount = options.threadCount ?? DEFAULT_THREAD_COUNT
    const maxQueue = options.maxQueue ?? Infinity
    validateThreadCount(threadCount)
    validateMaxQueue(maxQueue)

    this.threadCount = threadCount
    this.poolFactory = options.poolFactory ?? defaultPoolFactory<TImage>(maxQueue, options.scalerModule)
  }

  /**
   * Current pool, or undefined before the first submission.
   *
   * The owner is responsible for shutting it down before exit: shutdown()
   * lets queued work finish, shutdownNow() cancels it.
   */
  getPool(): ScalePool<TImage> | undefined {
    return this.pool
  }

  /**
   * Use a caller-supplied pool from now on. It is still checked before
   * every submission and replaced with a default pool once unusable.
   */
  setPool(pool: ScalePool<TImage>): void {
    this.pool = pool
    console.info(`[AsyncScaler] Custom pool set: ${pool.threads} threads`)
  }

  /**
   * Return a pool that accepts work, creating or replacing it if needed.
   *
   * The check and the swap run without yielding to the event loop, so
   * concurrent submitters always see the same replacement. A replaced pool
   * is dropped, not drained: tasks it already accepted still finish on it.
   */
  ensureUsablePool(): ScalePool<TImage> {
    const current = this.pool
    if (current && !current.isShutdown() && !current.isTerminated()) {
      return current
    }

    const replacement = this.poolFactory(this.threadCount)
    this.pool = replacement
    if (current && !current.isTerminated()) {
      this.retired.add(current)
    }
    if (current) {
      console.info(`[AsyncScaler] Pool was ${current.state}, replaced with ${this.threadCount} threads`)
    } else {
      console.info(`[AsyncScaler] Pool created: ${this.threadCount} threads`)
    }
    return replacement
  }

  /**
   * Queue a resize of `source`.
   *
   * Errors raised by the scaling routine (bad arguments included) are only
   * seen through the returned handle. Only a pool refusing the task throws
   * here (RejectedSubmissionError).
   */
  resize(source: TImage, options: ScaleOptions = {}): TaskHandle<TImage> {
    const pool = this.ensureUsablePool()
    const task = createScaleTask(this.nextTaskId++, source, options)
    return pool.submit(task)
  }

  shutdown(): void {
    this.pool?.shutdown()
  }

  shutdownNow(): ScaleTask<TImage>[] {
    return this.pool?.shutdownNow() ?? []
  }

  /**
   * Wait up to `timeoutMs` for the current pool, and any replaced pool still
   * draining, to finish their tasks. True when there is no pool.
   */
  async awaitTermination(timeoutMs?: number): Promise<boolean> {
    const pools = [...this.retired]
    if (this.pool) pools.push(this.pool)

    const results = await Promise.all(pools.map((pool) => pool.awaitTermination(timeoutMs)))
    for (const pool of this.retired) {
      if (pool.isTerminated()) this.retired.delete(pool)
    }
    return results.every(Boolean)
  }

  getStats(): PoolStats | null {
    return this.pool?.getStats() ?? null
  }
}

function defaultPoolFactory<TImage>(maxQueue: number, scalerModule: string | undefined): PoolFactory<TImage> {
  if (!scalerModule) {
    throw new ConfigurationError(
      `No scaler module configured: set ${ENV_VARS.scalerModule}, pass scalerModule or supply a poolFactory`,
      { setting: 'scalerModule', value: scalerModule }
    )
  }
  const workerModule = scalerModule
  return (threadCount) =>
    createFixedThreadPool<TImage>({ threads: threadCount, maxQueue, scalerModule: workerModule })
}

/**
 * Build a scaler from defaults, the SCALE_POOL_* environment and `overrides`
 */
export function createAsyncScaler<TImage = RasterImage>(
  overrides: AsyncScalerOptions<TImage> = {},
  env: NodeJS.ProcessEnv = process.env
): AsyncScaler<TImage> {
  const config = resolveScalePoolConfig(env, {
    threadCount: overrides.threadCount,
    maxQueue: overrides.maxQueue,
    scalerModule: overrides.scalerModule,
  })
  return new AsyncScaler<TImage>({ ...overrides, ...config })
}
