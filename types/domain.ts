/**
 * Domain Types for Frame Dither
 *
 * Core type definitions used throughout the application.
 * All modules should import types from this file.
 *
 * @module types/domain
 */

// =============================================================================
// RASTERS
// =============================================================================

/** Samples per pixel: 1 = grayscale intensity, 3 = RGB */
export type ChannelCount = 1 | 3

/**
 * 8-bit raster, row-major with interleaved channels.
 *
 * `data.length` is always `width * height * channels`.
 */
export interface Raster {
  width: number
  height: number
  channels: ChannelCount
  data: Uint8Array
}

/** Target frame dimensions */
export interface FrameSize {
  width: number
  height: number
}

// =============================================================================
// PALETTES
// =============================================================================

/** RGB color tuple, each component 0-255 */
export type Rgb = readonly [number, number, number]

/** Ordered, non-empty list of distinct colors */
export type Palette = readonly Rgb[]

/** Named palettes shipped with the tool */
export type PaletteName =
  | 'bw'
  | 'default-8' // black, white, red, green, blue, yellow, magenta, cyan
  | 'color-6a' // 6-color: R, G, B, Y, Black, White
  | 'color-7a' // 7-color with Orange
  | 'color-7b' // 7-color with Cyan (instead of Orange)
  | 'color-8a' // 8-color (both Cyan + Orange)

/** Named palette entry */
export interface PaletteConfig {
  label: string
  colors: string[]
}

// =============================================================================
// DITHERING
// =============================================================================

/** Dithering algorithm methods */
export type DitheringMethod =
  | 'floyd_steinberg'
  | 'atkinson'
  | 'jarvis_judice_ninke'
  | 'ordered'
  | 'random'

/** Methods that propagate quantization error to neighbours */
export type ErrorDiffusionMethod = Extract<
  DitheringMethod,
  'floyd_steinberg' | 'atkinson' | 'jarvis_judice_ninke'
>

/** Valid Bayer matrix sizes for ordered dithering */
export type MatrixSize = 2 | 4 | 8

/** Uniform random number generator returning values in [0, 1) */
export type RandomSource = () => number

/**
 * Per-call dithering parameters.
 *
 * Each method reads only the parameters that apply to it; the rest are ignored.
 */
export interface DitheringParams {
  /** Fraction of quantization error to diffuse, 0.0-1.0 (error diffusion only) */
  ditherStrength?: number
  /** Bayer matrix size (ordered only) */
  matrixSize?: MatrixSize
  /** Half-width of the uniform threshold perturbation (random only) */
  thresholdVariance?: number
  /** Output palette (color mode only, defaults to the 8-color set) */
  palette?: Palette
  /** Seed for a reproducible random source (random only) */
  seed?: number
  /** Injected random source (random only, takes precedence over seed) */
  random?: RandomSource
}

// =============================================================================
// FRAME PROCESSING
// =============================================================================

/** Progress event emitted after each written frame */
export interface FrameProgress {
  /** Zero-based index of the frame just written */
  index: number
  /** Frames written so far */
  written: number
  /** Upper bound on frames to write (min of source size and maxFrames) */
  total: number
  /** Path the frame was written to */
  outputPath: string
}

/** Fully resolved runtime configuration */
export interface FrameDitherConfig {
  inputDir: string
  outputDir: string
  method: DitheringMethod
  size: FrameSize
  maxFrames: number
  isColor: boolean
  params: DitheringParams
  fps: number
  debugLogging: boolean
}
