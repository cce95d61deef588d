export { AsyncScaler, createAsyncScaler } from './async-scaler'
export type { AsyncScalerOptions, PoolFactory } from './async-scaler'
export { getAsyncScaler } from './default'
export { createScaleTask } from './tasks'
