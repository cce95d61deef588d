/**
 * Task Runners - execution backends a ThreadPool dispatches to
 *
 * - PiscinaRunner: runs each task on a worker thread (scale.worker)
 * - InlineRunner: runs the scaling function on the calling thread; useful
 *   when the routine cannot be loaded in a worker
 *
 * The pool decides when a task runs; a runner only decides where.
 */

import Piscina from 'piscina'
import { join } from 'path'
import { setImmediate as nextTurn } from 'timers/promises'
import type { RasterImage, ScaleFunction, ScaleTask } from '../../../shared/types'

export interface TaskRunner<TImage = RasterImage> {
  /**
   * Execute one task. `signal` is aborted by `shutdownNow()`; honouring it
   * is best effort.
   */
  run(task: ScaleTask<TImage>, signal: AbortSignal): Promise<TImage>
  /** Release threads and other resources. Called once the pool terminates. */
  destroy(): Promise<void>
}

/**
 * Data handed to every worker thread at startup
 */
export interface ScaleWorkerData {
  /** Module exporting the scaling routine (`default` or `scale`) */
  scalerModule: string
}

export interface PiscinaRunnerOptions {
  threads: number
  scalerModule: string
  /** Compiled worker entry; defaults to scale.worker.js beside this file */
  workerFile?: string
  /** Threads kept alive while idle (default: 1, capped at `threads`) */
  minThreads?: number
  /** Idle time after which a thread above `minThreads` is reclaimed (ms) */
  idleTimeout?: number
}

const DEFAULT_MIN_THREADS = 1
const DEFAULT_IDLE_TIMEOUT = 30000

export class PiscinaRunner<TImage = RasterImage> implements TaskRunner<TImage> {
  private readonly piscina: Piscina

  constructor(options: PiscinaRunnerOptions) {
    const workerData: ScaleWorkerData = { scalerModule: options.scalerModule }

    // The owning pool never dispatches more than `threads` tasks, so
    // Piscina's own queue stays empty.
    this.piscina = new Piscina({
      filename: options.workerFile ?? join(__dirname, 'scale.worker.js'),
      minThreads: Math.min(options.minThreads ?? DEFAULT_MIN_THREADS, options.threads),
      maxThreads: options.threads,
      idleTimeout: options.idleTimeout ?? DEFAULT_IDLE_TIMEOUT,
      workerData,
    })
  }

  /** Worker threads currently alive */
  get liveThreads(): number {
    return this.piscina.threads.length
  }

  run(task: ScaleTask<TImage>, signal: AbortSignal): Promise<TImage> {
    return this.piscina.run({ task }, { signal })
  }

  async destroy(): Promise<void> {
    await this.piscina.destroy()
  }
}

export class InlineRunner<TImage = RasterImage> implements TaskRunner<TImage> {
  constructor(private readonly scale: ScaleFunction<TImage>) {}

  async run(task: ScaleTask<TImage>): Promise<TImage> {
    // Never run the routine inside submit()
    await nextTurn()
    return this.scale(task.source, task.options)
  }

  async destroy(): Promise<void> {
    // Nothing to release
  }
}
