/**
 * Configuration Types for the scale pool
 *
 * Resolution order (lowest to highest):
 * 1. Defaults - DEFAULT_CONFIG below
 * 2. Environment - SCALE_POOL_* variables, read once at startup
 * 3. Overrides - values passed to resolveScalePoolConfig()
 */

import { z } from 'zod'

// ============================================================================
// ENVIRONMENT
// ============================================================================

export const ENV_VARS = {
  threadCount: 'SCALE_POOL_THREAD_COUNT',
  maxQueue: 'SCALE_POOL_MAX_QUEUE',
  scalerModule: 'SCALE_POOL_SCALER_MODULE',
} as const

export type ConfigSetting = keyof typeof ENV_VARS

// `KEY=` in a .env file leaves the variable unset
const blankAsUnset = (value: unknown): unknown => (value === '' ? undefined : value)

export const EnvConfigSchema = z.object({
  [ENV_VARS.threadCount]: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  [ENV_VARS.maxQueue]: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  [ENV_VARS.scalerModule]: z.preprocess(blankAsUnset, z.string().min(1).optional()),
})

// ============================================================================
// RESOLVED CONFIG
// ============================================================================

export const ScalePoolConfigSchema = z.object({
  /** Worker threads, i.e. max simultaneous scale operations */
  threadCount: z.number().int().positive(),
  /** Max tasks waiting for a thread; Infinity never rejects */
  maxQueue: z.union([z.number().int().positive(), z.literal(Infinity)]),
  /** Module the worker threads load the scaling routine from */
  scalerModule: z.string().min(1).optional(),
})

export type ScalePoolConfig = z.infer<typeof ScalePoolConfigSchema>

export const DEFAULT_CONFIG: ScalePoolConfig = {
  threadCount: 2,
  maxQueue: Infinity,
}
