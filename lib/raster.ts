/**
 * Raster construction and inspection helpers
 *
 * @module lib/raster
 */

import { InvalidArgumentError } from '../error.js'
import type { ChannelCount, Raster, Rgb } from '../types/domain.js'

/**
 * Checks dimensions and buffer length, throwing InvalidArgumentError on mismatch.
 */
export function assertRaster(raster: Raster): void {
  const { width, height, channels, data } = raster

  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidArgumentError(
      `Raster width must be a positive integer, got ${width}`,
      'width',
    )
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new InvalidArgumentError(
      `Raster height must be a positive integer, got ${height}`,
      'height',
    )
  }
  if (channels !== 1 && channels !== 3) {
    throw new InvalidArgumentError(
      `Raster must have 1 or 3 channels, got ${String(channels)}`,
      'channels',
    )
  }

  const expected = width * height * channels
  if (data.length !== expected) {
    throw new InvalidArgumentError(
      `Raster data has ${data.length} samples, expected ${expected} (${width}x${height}x${channels})`,
      'data',
    )
  }
}

/**
 * Creates a raster, zero-filled unless data is supplied.
 */
export function createRaster(
  width: number,
  height: number,
  channels: ChannelCount,
  data?: Uint8Array,
): Raster {
  const raster: Raster = {
    width,
    height,
    channels,
    data: data ?? new Uint8Array(width * height * channels),
  }
  assertRaster(raster)
  return raster
}

/**
 * Builds a single-channel raster from rows of intensities.
 *
 * @example rasterFromRows([[100, 150], [200, 50]])
 */
export function rasterFromRows(rows: readonly (readonly number[])[]): Raster {
  const height = rows.length
  const width = rows[0]?.length ?? 0
  const data = new Uint8Array(width * height)

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidArgumentError(
        `Row ${y} has ${row.length} values, expected ${width}`,
        'rows',
      )
    }
    data.set(row, y * width)
  })

  return createRaster(width, height, 1, data)
}

/**
 * Builds a three-channel raster from rows of RGB tuples.
 */
export function rasterFromPixels(rows: readonly (readonly Rgb[])[]): Raster {
  const height = rows.length
  const width = rows[0]?.length ?? 0
  const data = new Uint8Array(width * height * 3)

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidArgumentError(
        `Row ${y} has ${row.length} pixels, expected ${width}`,
        'rows',
      )
    }
    row.forEach((pixel, x) => data.set(pixel, (y * width + x) * 3))
  })

  return createRaster(width, height, 3, data)
}

/**
 * Returns the samples of one pixel (length 1 or 3).
 */
export function getPixel(raster: Raster, x: number, y: number): number[] {
  const offset = (y * raster.width + x) * raster.channels
  return Array.from(raster.data.subarray(offset, offset + raster.channels))
}

/**
 * Converts a single-channel raster back to nested rows.
 */
export function rasterToRows(raster: Raster): number[][] {
  const rows: number[][] = []
  for (let y = 0; y < raster.height; y++) {
    const start = y * raster.width * raster.channels
    rows.push(
      Array.from(
        raster.data.subarray(start, start + raster.width * raster.channels),
      ),
    )
  }
  return rows
}
