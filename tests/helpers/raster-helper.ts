/**
 * Raster Helper Utilities
 *
 * Synthetic rasters and palette checks for engine tests (no ImageMagick).
 *
 * @module tests/helpers/raster-helper
 */

import { createRaster } from '../../lib/raster.js'
import type { Palette, RandomSource, Raster } from '../../types/domain.js'

// =============================================================================
// SYNTHETIC RASTERS
// =============================================================================

/**
 * Horizontal grayscale ramp from 0 (left) to 255 (right)
 */
export function createGradientRaster(width: number, height: number): Raster {
  const data = new Uint8Array(width * height)
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data[y * width + x] = Math.round((x * 255) / Math.max(1, width - 1))
    }
  }
  return createRaster(width, height, 1, data)
}

/**
 * RGB ramp: red grows left to right, green top to bottom, blue is fixed
 */
export function createColorGradientRaster(
  width: number,
  height: number,
  blue: number = 96,
): Raster {
  const data = new Uint8Array(width * height * 3)
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 3
      data[i] = Math.round((x * 255) / Math.max(1, width - 1))
      data[i + 1] = Math.round((y * 255) / Math.max(1, height - 1))
      data[i + 2] = blue
    }
  }
  return createRaster(width, height, 3, data)
}

/**
 * Raster with every sample set to `value`
 */
export function createUniformRaster(
  width: number,
  height: number,
  channels: 1 | 3,
  value: number,
): Raster {
  return createRaster(
    width,
    height,
    channels,
    new Uint8Array(width * height * channels).fill(value),
  )
}

// =============================================================================
// PALETTE CHECKS
// =============================================================================

/**
 * Distinct pixel values as strings ('0', '255' or '255,0,0')
 */
export function uniquePixels(raster: Raster): Set<string> {
  const values = new Set<string>()
  for (let i = 0; i < raster.data.length; i += raster.channels) {
    values.add(
      Array.from(raster.data.subarray(i, i + raster.channels)).join(','),
    )
  }
  return values
}

/**
 * True when every pixel is exactly one of the palette colors
 */
export function isWithinPalette(raster: Raster, palette: Palette): boolean {
  const allowed = new Set(palette.map((color) => color.join(',')))
  return [...uniquePixels(raster)].every((pixel) => allowed.has(pixel))
}

/**
 * True when every sample is 0 or 255
 */
export function isBlackAndWhite(raster: Raster): boolean {
  return raster.data.every((v) => v === 0 || v === 255)
}

// =============================================================================
// RANDOM SOURCES
// =============================================================================

/**
 * Random source that always returns the same value
 */
export function constantRandom(value: number): RandomSource {
  return () => value
}

/**
 * Random source that counts how often it was drawn
 */
export function countingRandom(value: number = 0.5): {
  random: RandomSource
  calls: () => number
} {
  let count = 0
  return {
    random: () => {
      count++
      return value
    },
    calls: () => count,
  }
}
