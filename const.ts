/**
 * Configuration constants for Frame Dither
 * @module const
 */

import type {
  DitheringMethod,
  MatrixSize,
  Palette,
  PaletteConfig,
  PaletteName,
} from './types/domain.js'

// =============================================================================
// DITHERING DEFAULTS
// =============================================================================

/**
 * Grayscale quantization cutoff: values strictly above become white
 */
export const GRAYSCALE_THRESHOLD: number = 128

/** Black and white output levels for grayscale mode */
export const BLACK: number = 0
export const WHITE: number = 255

/** Default fraction of quantization error diffused */
export const DEFAULT_DITHER_STRENGTH: number = 1.0

/** Default Bayer matrix size for ordered dithering */
export const DEFAULT_MATRIX_SIZE: MatrixSize = 4

/** Default half-width of the random threshold perturbation */
export const DEFAULT_THRESHOLD_VARIANCE: number = 50

/**
 * Valid Bayer matrix sizes
 */
export const VALID_MATRIX_SIZES: readonly MatrixSize[] = [2, 4, 8] as const

/**
 * Default color palette: black, white, red, green, blue, yellow, magenta, cyan.
 * Applied by the dispatcher when color mode is requested without a palette.
 */
export const DEFAULT_PALETTE: Palette = [
  [0, 0, 0],
  [255, 255, 255],
  [255, 0, 0],
  [0, 255, 0],
  [0, 0, 255],
  [255, 255, 0],
  [255, 0, 255],
  [0, 255, 255],
]

/**
 * Named palette definitions - SINGLE SOURCE OF TRUTH
 *
 * Add new palettes here and they become selectable through the PALETTE
 * option. Colors are '#RRGGBB' strings in palette order (order matters for
 * nearest-color ties and for two-color ordered dithering).
 */
export const PALETTES: Record<PaletteName, PaletteConfig> = {
  bw: {
    label: 'Black & White',
    colors: ['#000000', '#FFFFFF'],
  },
  'default-8': {
    label: '8-color (RGB + CMY + B/W)',
    colors: [
      '#000000',
      '#FFFFFF',
      '#FF0000',
      '#00FF00',
      '#0000FF',
      '#FFFF00',
      '#FF00FF',
      '#00FFFF',
    ],
  },
  'color-6a': {
    label: '6-color',
    colors: ['#000000', '#FFFFFF', '#FF0000', '#00FF00', '#0000FF', '#FFFF00'],
  },
  'color-7a': {
    label: '7-color (Orange)',
    colors: [
      '#000000',
      '#FFFFFF',
      '#FF0000',
      '#00FF00',
      '#0000FF',
      '#FFFF00',
      '#FF8C00',
    ],
  },
  'color-7b': {
    label: '7-color (Cyan)',
    colors: [
      '#000000',
      '#FFFFFF',
      '#FF0000',
      '#00FF00',
      '#0000FF',
      '#FFFF00',
      '#00FFFF',
    ],
  },
  'color-8a': {
    label: '8-color (Cyan + Orange)',
    colors: [
      '#000000',
      '#FFFFFF',
      '#FF0000',
      '#00FF00',
      '#0000FF',
      '#FFFF00',
      '#00FFFF',
      '#FF8C00',
    ],
  },
}

/** Palette used when none is configured */
export const DEFAULT_PALETTE_NAME: PaletteName = 'default-8'

// =============================================================================
// FRAME PIPELINE DEFAULTS
// =============================================================================

/** Default dithering method */
export const DEFAULT_METHOD: DitheringMethod = 'floyd_steinberg'

/** Default output directory for dithered frames */
export const DEFAULT_OUTPUT_DIR: string = 'frames'

/** Default target frame width in pixels (portrait video) */
export const DEFAULT_FRAME_WIDTH: number = 540

/** Default target frame height in pixels (portrait video) */
export const DEFAULT_FRAME_HEIGHT: number = 960

/** Default maximum number of frames processed per run */
export const DEFAULT_MAX_FRAMES: number = 720

/** Default frame rate used in the ffmpeg reassembly hint */
export const DEFAULT_FPS: number = 30

/**
 * Output file name pattern: frame_0000.png, frame_0001.png, ...
 */
export const FRAME_FILE_PREFIX: string = 'frame_'
export const FRAME_INDEX_DIGITS: number = 4

/**
 * Regular expression pattern for readable source frame extensions
 */
export const FRAME_FILE_PATTERN: RegExp =
  /\.(png|jpe?g|bmp|tiff?|webp|gif|ppm|pgm)$/i

/**
 * Options files searched in order when no environment config is present
 */
export const OPTIONS_FILE_CANDIDATES: readonly string[] = [
  './dither-options.json',
  '/data/options.json',
] as const
