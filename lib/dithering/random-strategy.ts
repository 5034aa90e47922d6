/**
 * Random Threshold Dithering Strategy
 *
 * Algorithm Overview:
 * Every pixel is compared against its own randomly perturbed threshold.
 * Grayscale: threshold = 128 + U(-variance, variance).
 * Color: add U(-variance, variance) noise to each channel, clamp to 0-255,
 * then snap to the nearest palette color.
 *
 * Produces film-grain-like noise with no visible structure. Output is only
 * reproducible when the caller injects a seeded random source.
 *
 * @module lib/dithering/random-strategy
 */

import { BLACK, GRAYSCALE_THRESHOLD, WHITE } from '../../const.js'
import type { Raster } from '../../types/domain.js'
import type {
  DitheringStrategy,
  DitheringStrategyOptions,
} from '../../types/dithering-strategy.js'
import { uniform } from '../random.js'
import { nearestColor } from './palette-matcher.js'

const clampChannel = (v: number): number => (v < 0 ? 0 : v > 255 ? 255 : v)

/**
 * Randomized-threshold dithering
 */
export class RandomStrategy implements DitheringStrategy {
  call(raster: Raster, options: DitheringStrategyOptions): Raster {
    const { width, height, channels } = raster
    const { mode, palette, thresholdVariance: variance, random } = options
    const data = new Uint8Array(raster.data.length)
    const pixelCount = width * height

    if (mode === 'grayscale') {
      for (let i = 0; i < pixelCount; i++) {
        const threshold =
          GRAYSCALE_THRESHOLD + uniform(random, -variance, variance)
        data[i] = raster.data[i]! > threshold ? WHITE : BLACK
      }
      return { width, height, channels, data }
    }

    const noisy = new Float64Array(3)
    for (let i = 0; i < pixelCount; i++) {
      const base = i * 3
      for (let c = 0; c < 3; c++) {
        noisy[c] = clampChannel(
          raster.data[base + c]! + uniform(random, -variance, variance),
        )
      }
      data.set(nearestColor(noisy, palette), base)
    }

    return { width, height, channels, data }
  }
}
