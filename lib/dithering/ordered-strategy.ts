/**
 * Ordered (Bayer Matrix) Dithering Strategy
 *
 * Implements ordered dithering using Bayer threshold matrix.
 * Faster than error diffusion but lower quality (visible patterns).
 *
 * Algorithm Overview:
 * Uses pre-computed Bayer matrix to threshold pixels deterministically.
 * Each pixel position maps to a threshold value in the repeating matrix.
 * Creates regular crosshatch/checkerboard patterns.
 *
 * @module lib/dithering/ordered-strategy
 */

import { BLACK, WHITE } from '../../const.js'
import type { Raster } from '../../types/domain.js'
import type {
  DitheringStrategy,
  DitheringStrategyOptions,
} from '../../types/dithering-strategy.js'
import { getThresholdMatrix } from './kernels.js'
import { nearestColor } from './palette-matcher.js'

/**
 * Ordered (Bayer matrix) dithering
 *
 * Fast with visible patterns. Pixels are independent of each other, so rows
 * could be processed in any order.
 */
export class OrderedStrategy implements DitheringStrategy {
  /**
   * Applies ordered dithering with a size 2, 4 or 8 Bayer matrix.
   *
   * In color mode the threshold is only used for two-color palettes (mean
   * of the channels against the threshold). Any other palette size falls
   * back to plain nearest-color matching.
   */
  call(raster: Raster, options: DitheringStrategyOptions): Raster {
    const { width, height, channels } = raster
    const { mode, palette, matrixSize } = options
    const matrix = getThresholdMatrix(matrixSize)
    const data = new Uint8Array(raster.data.length)

    for (let y = 0; y < height; y++) {
      const row = matrix[y % matrixSize]!
      for (let x = 0; x < width; x++) {
        const threshold = row[x % matrixSize]! * 255
        const base = (y * width + x) * channels

        if (mode === 'grayscale') {
          data[base] = raster.data[base]! > threshold ? WHITE : BLACK
          continue
        }

        const pixel = raster.data.subarray(base, base + 3)
        const color =
          palette.length === 2
            ? (pixel[0]! + pixel[1]! + pixel[2]!) / 3 > threshold
              ? palette[1]!
              : palette[0]!
            : nearestColor(pixel, palette)
        data.set(color, base)
      }
    }

    return { width, height, channels, data }
  }
}
