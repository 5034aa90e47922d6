/**
 * Error Diffusion Dithering Strategy
 *
 * One engine for Floyd-Steinberg, Atkinson and Jarvis-Judice-Ninke; only the
 * kernel differs between them.
 *
 * Algorithm Overview:
 * Pixels are visited in row-major order on a float working copy. Each pixel
 * is quantized (128-threshold in grayscale, nearest palette color in color
 * mode), the quantized value is written back, and the scaled error
 * `(value - quantized) * ditherStrength` is added to the kernel's neighbours.
 * Neighbours outside the raster are skipped and their share is lost.
 *
 * Each pixel depends on error written by earlier pixels, so the scan is
 * strictly sequential.
 *
 * @module lib/dithering/error-diffusion-strategy
 */

import type { Raster } from '../../types/domain.js'
import type {
  DitheringStrategy,
  DitheringStrategyOptions,
} from '../../types/dithering-strategy.js'
import type { DiffusionKernel } from './kernels.js'
import { createQuantizer } from './quantizer.js'

/**
 * Clamps a float working buffer to [0, 255] and truncates to bytes.
 */
export function toByteRaster(
  source: Raster,
  accumulator: Float32Array,
): Raster {
  const data = new Uint8Array(accumulator.length)
  for (let i = 0; i < accumulator.length; i++) {
    const v = accumulator[i]!
    data[i] = v < 0 ? 0 : v > 255 ? 255 : Math.trunc(v)
  }
  return {
    width: source.width,
    height: source.height,
    channels: source.channels,
    data,
  }
}

/**
 * Kernel-parameterized error diffusion
 *
 * Best quality for photographic content; no visible repeating pattern.
 */
export class ErrorDiffusionStrategy implements DitheringStrategy {
  readonly #kernel: DiffusionKernel

  constructor(kernel: DiffusionKernel) {
    this.#kernel = kernel
  }

  /**
   * Applies error diffusion with this strategy's kernel.
   *
   * @param raster - Input raster (1 channel in grayscale, 3 in color mode)
   * @param options - Resolved dithering configuration
   * @returns Quantized raster
   */
  call(raster: Raster, options: DitheringStrategyOptions): Raster {
    const { width, height, channels } = raster
    const { offsets } = this.#kernel
    const strength = options.ditherStrength
    const quantize = createQuantizer(options.mode, options.palette)

    // Error accumulator: owned by this call only
    const accumulator = Float32Array.from(raster.data)
    const current = new Float32Array(channels)
    const error = new Float64Array(channels)

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const base = (y * width + x) * channels

        for (let c = 0; c < channels; c++) {
          current[c] = accumulator[base + c]!
        }

        const quantized = quantize(current)

        for (let c = 0; c < channels; c++) {
          const q = quantized[c]!
          accumulator[base + c] = q
          error[c] = (current[c]! - q) * strength
        }

        for (const [dy, dx, weight] of offsets) {
          const ny = y + dy
          const nx = x + dx
          if (ny >= height || nx < 0 || nx >= width) continue

          const target = (ny * width + nx) * channels
          for (let c = 0; c < channels; c++) {
            accumulator[target + c] = accumulator[target + c]! + error[c]! * weight
          }
        }
      }
    }

    return toByteRaster(raster, accumulator)
  }
}
