/**
 * Worker thread entry for PiscinaRunner.
 *
 * Loads the scaling routine named in workerData once per thread and calls it
 * for every task the pool sends.
 */

import { workerData } from 'worker_threads'
import type { RasterImage, ScaleFunction, ScaleTask } from '../../../shared/types'
import type { ScaleWorkerData } from './runner'

export interface ScaleWorkerMessage<TImage = RasterImage> {
  task: ScaleTask<TImage>
}

function isScaleFunction(value: unknown): value is ScaleFunction<RasterImage> {
  return typeof value === 'function'
}

function isWorkerData(value: unknown): value is ScaleWorkerData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'scalerModule' in value &&
    typeof value.scalerModule === 'string'
  )
}

/**
 * Find the scaling routine in a loaded module: a function export, a `scale`
 * export, or a `default` export that is either of those.
 */
export function pickScaleFunction(mod: unknown, specifier: string): ScaleFunction<RasterImage> {
  if (isScaleFunction(mod)) return mod
  if (typeof mod === 'object' && mod !== null) {
    if ('scale' in mod && isScaleFunction(mod.scale)) return mod.scale
    if ('default' in mod && mod.default !== mod) {
      return pickScaleFunction(mod.default, specifier)
    }
  }
  throw new TypeError(`Scaler module '${specifier}' does not export a scale function`)
}

export async function loadScaleFunction(specifier: string): Promise<ScaleFunction<RasterImage>> {
  const mod: unknown = await import(specifier)
  return pickScaleFunction(mod, specifier)
}

/**
 * Build the per-task handler around a resolved scaling routine
 */
export function createScaleHandler(
  scale: ScaleFunction<RasterImage>
): (message: ScaleWorkerMessage) => RasterImage {
  return ({ task }) => scale(task.source, task.options)
}

let handler: Promise<(message: ScaleWorkerMessage) => RasterImage> | undefined

export default async function runScaleTask(message: ScaleWorkerMessage): Promise<RasterImage> {
  if (!handler) {
    if (!isWorkerData(workerData)) {
      throw new TypeError('scale.worker started without a scalerModule in workerData')
    }
    handler = loadScaleFunction(workerData.scalerModule).then(createScaleHandler)
  }
  const handle = await handler
  return handle(message)
}
