/**
 * Scale Pool Configuration Resolver
 *
 * Merges defaults, SCALE_POOL_* environment variables and programmatic
 * overrides, then validates the result. Any invalid value is fatal: it
 * throws ConfigurationError and no pool is ever built from it.
 */

import type { ZodError } from 'zod'
import { ConfigurationError } from '../../../shared/errors'
import {
  DEFAULT_CONFIG,
  ENV_VARS,
  EnvConfigSchema,
  ScalePoolConfigSchema,
  type ConfigSetting,
  type ScalePoolConfig,
} from './types'

const SETTING_BY_ENV: Record<string, ConfigSetting> = {
  [ENV_VARS.threadCount]: 'threadCount',
  [ENV_VARS.maxQueue]: 'maxQueue',
  [ENV_VARS.scalerModule]: 'scalerModule',
}

function toConfigurationError(
  error: ZodError,
  source: 'environment' | 'config',
  input: Record<string, unknown>
): ConfigurationError {
  const issue = error.issues[0]
  const key = String(issue?.path[0] ?? 'unknown')
  const setting = source === 'environment' ? SETTING_BY_ENV[key] ?? key : key
  const value = input[key]
  const label = source === 'environment' ? `Environment variable ${key}` : `Config value ${key}`

  return new ConfigurationError(
    `${label} is set to ${JSON.stringify(value)}: ${issue?.message ?? 'invalid value'}`,
    { setting, value, cause: error }
  )
}

/**
 * Read the SCALE_POOL_* variables from `env`
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<ScalePoolConfig> {
  const raw = {
    [ENV_VARS.threadCount]: env[ENV_VARS.threadCount],
    [ENV_VARS.maxQueue]: env[ENV_VARS.maxQueue],
    [ENV_VARS.scalerModule]: env[ENV_VARS.scalerModule],
  }
  const parsed = EnvConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, 'environment', raw)
  }

  return {
    threadCount: parsed.data[ENV_VARS.threadCount],
    maxQueue: parsed.data[ENV_VARS.maxQueue],
    scalerModule: parsed.data[ENV_VARS.scalerModule],
  }
}

/**
 * Resolve the effective configuration.
 *
 * Overrides win over the environment, which wins over DEFAULT_CONFIG.
 */
export function resolveScalePoolConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ScalePoolConfig> = {}
): ScalePoolConfig {
  const fromEnv = readEnvConfig(env)
  const merged = {
    threadCount: overrides.threadCount ?? fromEnv.threadCount ?? DEFAULT_CONFIG.threadCount,
    maxQueue: overrides.maxQueue ?? fromEnv.maxQueue ?? DEFAULT_CONFIG.maxQueue,
    scalerModule: overrides.scalerModule ?? fromEnv.scalerModule ?? DEFAULT_CONFIG.scalerModule,
  }

  const parsed = ScalePoolConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, 'config', merged)
  }
  return parsed.data
}
