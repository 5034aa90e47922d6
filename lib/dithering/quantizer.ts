/**
 * Per-pixel quantizers shared by the dithering strategies
 *
 * @module lib/dithering/quantizer
 */

import { BLACK, GRAYSCALE_THRESHOLD, WHITE } from '../../const.js'
import type { Palette } from '../../types/domain.js'
import type { DitheringMode } from '../../types/dithering-strategy.js'
import { nearestColor } from './palette-matcher.js'

/**
 * Maps a working pixel value (1 or 3 samples, possibly out of range)
 * to its output samples.
 */
export type Quantizer = (value: ArrayLike<number>) => ArrayLike<number>

const BLACK_PIXEL: readonly number[] = [BLACK]
const WHITE_PIXEL: readonly number[] = [WHITE]

/**
 * Grayscale threshold: strictly above 128 becomes white.
 */
export function thresholdGray(value: number): number {
  return value > GRAYSCALE_THRESHOLD ? WHITE : BLACK
}

/**
 * Creates the quantizer for a mode: 128-threshold in grayscale,
 * nearest palette color in color mode.
 */
export function createQuantizer(
  mode: DitheringMode,
  palette: Palette,
): Quantizer {
  if (mode === 'grayscale') {
    return (value) =>
      thresholdGray(value[0] ?? 0) === WHITE ? WHITE_PIXEL : BLACK_PIXEL
  }
  return (value) => nearestColor(value, palette)
}
