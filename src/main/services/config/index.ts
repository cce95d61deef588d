/**
 * Scale pool configuration: defaults < SCALE_POOL_* env < overrides
 */

// Types
export * from './types'

// Resolver
export { readEnvConfig, resolveScalePoolConfig } from './resolver'
