/**
 * Nearest-color palette matching
 *
 * Euclidean distance in RGB space. Squared distances are compared directly
 * since the argmin is the same. Ties resolve to the earliest palette entry.
 *
 * @module lib/dithering/palette-matcher
 */

import { InvalidArgumentError } from '../../error.js'
import type { Palette, Rgb } from '../../types/domain.js'

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i

/**
 * Index of the palette entry closest to `color`.
 *
 * @param color - Three components; may lie outside 0-255
 */
export function nearestColorIndex(
  color: ArrayLike<number>,
  palette: Palette,
): number {
  if (palette.length === 0) {
    throw new InvalidArgumentError('Palette must not be empty', 'palette')
  }

  const r = color[0] ?? 0
  const g = color[1] ?? 0
  const b = color[2] ?? 0

  let bestIndex = 0
  let bestDistance = Infinity

  for (let i = 0; i < palette.length; i++) {
    const [pr, pg, pb] = palette[i]!
    const dr = r - pr
    const dg = g - pg
    const db = b - pb
    const distance = dr * dr + dg * dg + db * db
    if (distance < bestDistance) {
      bestDistance = distance
      bestIndex = i
    }
  }

  return bestIndex
}

/**
 * Palette entry closest to `color`.
 */
export function nearestColor(color: ArrayLike<number>, palette: Palette): Rgb {
  return palette[nearestColorIndex(color, palette)]!
}

/**
 * Parses a '#RRGGBB' color string
 */
export function parseHexColor(hex: string): Rgb {
  const match = HEX_COLOR.exec(hex.trim())
  if (!match) {
    throw new InvalidArgumentError(
      `Invalid color "${hex}" (expected #RRGGBB)`,
      'palette',
    )
  }
  return [
    parseInt(match[1]!, 16),
    parseInt(match[2]!, 16),
    parseInt(match[3]!, 16),
  ]
}

/**
 * Formats a color as '#RRGGBB' (uppercase)
 */
export function toHexColor([r, g, b]: Rgb): string {
  return `#${[r, g, b]
    .map((c) => c.toString(16).padStart(2, '0'))
    .join('')
    .toUpperCase()}`
}
