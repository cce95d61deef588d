import type { ImageOp, RasterImage, ScaleOptions, ScaleTask } from '../../../shared/types'

function freezeOps(ops: readonly ImageOp[]): readonly ImageOp[] {
  return Object.freeze(
    ops.map((op) =>
      Object.freeze(op.params ? { name: op.name, params: Object.freeze({ ...op.params }) } : { name: op.name })
    )
  )
}

/**
 * Capture one resize as an immutable task record. The options (and the op
 * list) are copied, so later changes by the caller do not reach the task.
 */
export function createScaleTask<TImage = RasterImage>(
  id: number,
  source: TImage,
  options: ScaleOptions
): ScaleTask<TImage> {
  const { ops, ...sizing } = options
  const frozenOptions: Readonly<ScaleOptions> = Object.freeze(
    ops ? { ...sizing, ops: freezeOps(ops) } : { ...sizing }
  )
  const task: ScaleTask<TImage> = { id, kind: 'resize', source, options: frozenOptions }
  return Object.freeze(task)
}
