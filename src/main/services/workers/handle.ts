/**
 * Task Handle - caller-facing view of one submitted task
 *
 * A handle is returned synchronously by every submission. The outcome of the
 * task (value, error or cancellation) is only observed through it:
 * - poll with `state` / `isDone()`
 * - wait with `get()`, optionally bounded by a timeout
 * - `cancel()` a task that has not started yet
 *
 * The pool drives the handle through its `TaskSettler` counterpart.
 */

import { TaskCancelledError, TaskTimeoutError, err, ok, type Result } from '../../../shared/errors'
import type { TaskState } from '../../../shared/types'

type Outcome<T> =
  | { kind: 'fulfilled'; value: T }
  | { kind: 'rejected'; error: unknown }
  | { kind: 'cancelled' }

interface Waiter<T> {
  resolve: (value: T) => void
  reject: (error: unknown) => void
  timer?: ReturnType<typeof setTimeout>
}

export interface WaitOptions {
  /** Give up waiting after this many ms; the task keeps its place */
  timeoutMs?: number
}

/**
 * Pool-side controls for a handle
 */
export interface TaskSettler<T> {
  /** Move to running. False if the handle was cancelled first. */
  start(): boolean
  fulfill(value: T): void
  reject(error: unknown): void
  /** Cancel on the pool's behalf (shutdownNow). False once started. */
  cancel(): boolean
}

/** @internal */
export class HandleCore<T> {
  state: TaskState = 'pending'
  outcome: Outcome<T> | null = null
  readonly waiters = new Set<Waiter<T>>()

  constructor(
    readonly taskId: number,
    private readonly onCancel: () => boolean
  ) {}

  start(): boolean {
    if (this.state !== 'pending') return false
    this.state = 'running'
    return true
  }

  tryCancel(): boolean {
    if (this.state !== 'pending') return false
    if (!this.onCancel()) return false
    this.finish({ kind: 'cancelled' })
    return true
  }

  finish(outcome: Outcome<T>): void {
    if (this.outcome) return
    this.outcome = outcome
    this.state = outcome.kind
    for (const waiter of this.waiters) {
      this.deliver(waiter, outcome)
    }
    this.waiters.clear()
  }

  deliver(waiter: Waiter<T>, outcome: Outcome<T>): void {
    if (waiter.timer) clearTimeout(waiter.timer)
    switch (outcome.kind) {
      case 'fulfilled':
        waiter.resolve(outcome.value)
        break
      case 'rejected':
        waiter.reject(outcome.error)
        break
      case 'cancelled':
        waiter.reject(new TaskCancelledError(`Task ${this.taskId} was cancelled`, { taskId: this.taskId }))
        break
    }
  }
}

export class TaskHandle<T> {
  private readonly core: HandleCore<T>

  constructor(core: HandleCore<T>) {
    this.core = core
  }

  get taskId(): number {
    return this.core.taskId
  }

  get state(): TaskState {
    return this.core.state
  }

  isDone(): boolean {
    return this.core.outcome !== null
  }

  isCancelled(): boolean {
    return this.core.state === 'cancelled'
  }

  /**
   * Remove the task from the queue if it has not started.
   *
   * Returns false when the task is already running or finished; the
   * outcome is left untouched in that case.
   */
  cancel(): boolean {
    return this.core.tryCancel()
  }

  /**
   * Wait for the outcome. Rejects with the task's own error, with
   * TaskCancelledError, or with TaskTimeoutError when `timeoutMs` elapses
   * first (the handle stays pending and can be waited on again).
   */
  get(options: WaitOptions = {}): Promise<T> {
    const { outcome } = this.core
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve, reject }
      if (outcome) {
        this.core.deliver(waiter, outcome)
        return
      }
      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs
        waiter.timer = setTimeout(() => {
          this.core.waiters.delete(waiter)
          reject(
            new TaskTimeoutError(`Task ${this.core.taskId} did not finish within ${timeoutMs}ms`, {
              taskId: this.core.taskId,
              timeoutMs,
            })
          )
        }, timeoutMs)
      }
      this.core.waiters.add(waiter)
    })
  }

  /**
   * Like `get()` but never rejects
   */
  async result(options: WaitOptions = {}): Promise<Result<T, unknown>> {
    try {
      return ok(await this.get(options))
    } catch (error) {
      return err(error)
    }
  }
}

/**
 * Create a handle together with the controls the pool uses to settle it.
 * `onCancel` must dequeue the task and return true, or return false if it
 * can no longer be removed.
 */
export function createTaskHandle<T>(
  taskId: number,
  onCancel: () => boolean
): { handle: TaskHandle<T>; settler: TaskSettler<T> } {
  const core = new HandleCore<T>(taskId, onCancel)
  return {
    handle: new TaskHandle(core),
    settler: {
      start: () => core.start(),
      fulfill: (value) => core.finish({ kind: 'fulfilled', value }),
      reject: (error) => core.finish({ kind: 'rejected', error }),
      cancel: () => core.tryCancel(),
    },
  }
}
