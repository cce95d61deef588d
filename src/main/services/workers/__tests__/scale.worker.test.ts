/**
 * Scale Worker Tests
 *
 * Runs the worker entry in-process: workerData is mocked to point at a
 * fixture scaler module.
 *
 * @module scale.worker.test
 */

import { describe, it, expect, vi } from 'vitest'
import { join } from 'path'
import type { RasterImage } from '../../../../shared/types'
import { createScaleTask } from '../../scaler/tasks'

vi.mock('worker_threads', async () => {
  const path = await import('path')
  return {
    workerData: { scalerModule: path.join(__dirname, 'fixtures', 'fake-scaler.ts') },
  }
})

import runScaleTask, { createScaleHandler, loadScaleFunction, pickScaleFunction } from '../scale.worker'

const FIXTURE = join(__dirname, 'fixtures', 'fake-scaler.ts')

const image: RasterImage = {
  width: 4,
  height: 2,
  channels: 3,
  data: new Uint8Array(24),
}

describe('scale.worker', () => {
  // ===========================================================================
  // MODULE RESOLUTION
  // ===========================================================================
  describe('pickScaleFunction', () => {
    const scale = (source: RasterImage) => source

    it('should accept a module that is itself a function', () => {
      expect(pickScaleFunction(scale, 'm')).toBe(scale)
    })

    it('should prefer a named scale export', () => {
      expect(pickScaleFunction({ scale, default: () => image }, 'm')).toBe(scale)
    })

    it('should fall back to the default export', () => {
      expect(pickScaleFunction({ default: scale }, 'm')).toBe(scale)
      expect(pickScaleFunction({ default: { scale } }, 'm')).toBe(scale)
    })

    it('should reject a module without a scale function', () => {
      expect(() => pickScaleFunction({ resize: 'nope' }, 'bad-module')).toThrow(
        "Scaler module 'bad-module' does not export a scale function"
      )
      expect(() => pickScaleFunction(null, 'null-module')).toThrow(TypeError)
    })
  })

  describe('loadScaleFunction', () => {
    it('should load the scale export from a module path', async () => {
      const scale = await loadScaleFunction(FIXTURE)

      expect(scale(image, { targetSize: 16 })).toMatchObject({ width: 16, height: 16, channels: 3 })
    })
  })

  // ===========================================================================
  // TASK HANDLING
  // ===========================================================================
  describe('createScaleHandler', () => {
    it('should call the scaling routine with the task source and options', () => {
      const scale = vi.fn((source: RasterImage) => ({ ...source, width: 1 }))
      const handler = createScaleHandler(scale)
      const task = createScaleTask(3, image, { method: 'speed', targetSize: 1 })

      expect(handler({ task })).toMatchObject({ width: 1 })
      expect(scale).toHaveBeenCalledWith(image, task.options)
    })
  })

  describe('default export', () => {
    it('should scale with the module named in workerData', async () => {
      const task = createScaleTask(1, image, { targetSize: 8 })

      await expect(runScaleTask({ task })).resolves.toMatchObject({ width: 8, height: 8 })
    })

    it('should surface argument errors from the routine', async () => {
      const task = createScaleTask(2, image, { targetSize: 0 })

      await expect(runScaleTask({ task })).rejects.toThrow('targetSize must be > 0, got 0')
    })
  })
})
