/**
 * Frame Source / Sink Interfaces
 *
 * Boundary between the dithering engine and wherever frames come from
 * or go to. The pipeline only depends on these interfaces.
 *
 * @module types/frame-io
 */

import type { Raster } from './domain.js'

/**
 * Produces fixed-size rasters, one per call, in playback order.
 */
export interface FrameSource {
  /** Number of frames available, if known up front */
  readonly frameCount: number | undefined

  /**
   * Reads the next frame
   *
   * @returns Next raster, or null once the source is exhausted
   */
  next(): Promise<Raster | null>
}

/**
 * Accepts processed rasters, one per call.
 */
export interface FrameSink {
  /**
   * Persists one frame
   *
   * @param raster - Dithered raster
   * @param index - Zero-based frame index
   * @returns Location the frame was written to
   */
  write(raster: Raster, index: number): Promise<string>
}
