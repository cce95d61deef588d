/**
 * Worker Pool Services - fixed-size executor for scale tasks
 *
 * ThreadPool owns the FIFO queue and the concurrency limit; a TaskRunner
 * executes each task (Piscina worker threads, or inline).
 */

export { ThreadPool, createFixedThreadPool, validateThreadCount, validateMaxQueue } from './pool'
export type { ScalePool, ThreadPoolOptions, FixedThreadPoolOptions } from './pool'
export { TaskHandle, createTaskHandle } from './handle'
export type { TaskSettler, WaitOptions } from './handle'
export { PiscinaRunner, InlineRunner } from './runner'
export type { TaskRunner, PiscinaRunnerOptions, ScaleWorkerData } from './runner'
