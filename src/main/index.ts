/**
 * Bounded asynchronous image scaling.
 *
 * @example
 * const scaler = createAsyncScaler({ threadCount: 4, scalerModule: require.resolve('./scale') })
 * const handle = scaler.resize(image, { method: 'quality', targetSize: 320 })
 * const thumbnail = await handle.get({ timeoutMs: 5000 })
 * scaler.shutdown()
 */

export { AsyncScaler, createAsyncScaler, getAsyncScaler, createScaleTask } from './services/scaler'
export type { AsyncScalerOptions, PoolFactory } from './services/scaler'
export {
  ThreadPool,
  createFixedThreadPool,
  TaskHandle,
  PiscinaRunner,
  InlineRunner,
} from './services/workers'
export type {
  ScalePool,
  ThreadPoolOptions,
  FixedThreadPoolOptions,
  TaskRunner,
  PiscinaRunnerOptions,
  WaitOptions,
} from './services/workers'
export { resolveScalePoolConfig, DEFAULT_CONFIG, ENV_VARS } from './services/config'
export type { ScalePoolConfig } from './services/config'
export * from '../shared/errors'
export * from '../shared/types'
