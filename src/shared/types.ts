// Shared types for scale requests, tasks and pool statistics

// ============================================================================
// IMAGES
// ============================================================================

/**
 * Decoded pixel buffer. Crosses thread boundaries by structured clone, so it
 * must stay plain data.
 */
export interface RasterImage {
  width: number
  height: number
  /** Samples per pixel (3 = RGB, 4 = RGBA) */
  channels: number
  data: Uint8Array
}

// ============================================================================
// SCALE OPTIONS
// ============================================================================

/**
 * Speed/quality trade-off the scaling routine should use
 */
export type ScaleMethod = 'automatic' | 'speed' | 'balanced' | 'quality' | 'ultra-quality'

/**
 * Which target dimension is honoured when the aspect ratio is kept
 */
export type ResizeMode = 'automatic' | 'fit-exact' | 'fit-to-width' | 'fit-to-height'

/**
 * Post-processing step applied after scaling, in list order.
 * Plain data so it can be sent to a worker thread.
 */
export interface ImageOp {
  name: string
  params?: Record<string, unknown>
}

/**
 * Everything a single resize needs besides the source image.
 *
 * Either `targetSize` (bounding box for both dimensions) or
 * `targetWidth`/`targetHeight` is given; the scaling routine decides what a
 * missing or conflicting combination means.
 */
export interface ScaleOptions {
  method?: ScaleMethod
  mode?: ResizeMode
  targetSize?: number
  targetWidth?: number
  targetHeight?: number
  ops?: readonly ImageOp[]
}

/**
 * The external, synchronous scaling routine
 */
export type ScaleFunction<TImage = RasterImage> = (
  source: TImage,
  options: Readonly<ScaleOptions>
) => TImage

// ============================================================================
// TASKS
// ============================================================================

/**
 * One deferred resize. Frozen once built.
 */
export interface ScaleTask<TImage = RasterImage> {
  readonly id: number
  readonly kind: 'resize'
  readonly source: TImage
  readonly options: Readonly<ScaleOptions>
}

export type TaskState = 'pending' | 'running' | 'fulfilled' | 'rejected' | 'cancelled'

export type PoolState = 'active' | 'shutting-down' | 'terminated'

// ============================================================================
// STATISTICS
// ============================================================================

export interface PoolStats {
  state: PoolState
  threads: number
  activeTasks: number
  queuedTasks: number
  completedTasks: number
  failedTasks: number
  cancelledTasks: number
  averageDuration: number
}
