/**
 * Default Scaler Tests
 *
 * The process-wide scaler reads its configuration once; each test loads a
 * fresh copy of the module.
 *
 * @module default.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const mockLoadDotenv = vi.hoisted(() => vi.fn())

vi.mock('dotenv', () => ({
  config: mockLoadDotenv,
}))

describe('getAsyncScaler', () => {
  const getDefaultModule = async () => {
    vi.resetModules()
    return import('../default')
  }

  beforeEach(() => {
    vi.stubEnv('SCALE_POOL_THREAD_COUNT', '3')
    vi.stubEnv('SCALE_POOL_SCALER_MODULE', '/srv/scalers/lanczos.js')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('should build one scaler from the environment', async () => {
    const { getAsyncScaler } = await getDefaultModule()

    const scaler = getAsyncScaler()

    expect(scaler.threadCount).toBe(3)
    expect(getAsyncScaler()).toBe(scaler)
    expect(mockLoadDotenv).toHaveBeenCalledTimes(1)
  })

  it('should not create a pool until the first submission', async () => {
    const { getAsyncScaler } = await getDefaultModule()

    expect(getAsyncScaler().getPool()).toBeUndefined()
  })

  it('should fail once on an invalid thread count and keep failing without re-reading', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.stubEnv('SCALE_POOL_THREAD_COUNT', '0')
    const { getAsyncScaler } = await getDefaultModule()

    let first: unknown
    try {
      getAsyncScaler()
    } catch (error) {
      first = error
    }
    vi.stubEnv('SCALE_POOL_THREAD_COUNT', '4')

    expect(first).toMatchObject({ name: 'ConfigurationError', setting: 'threadCount' })
    expect(() => getAsyncScaler()).toThrow(first instanceof Error ? first.message : 'unreachable')
    expect(mockLoadDotenv).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('[AsyncScaler] Initialization failed:')
    )
  })
})
