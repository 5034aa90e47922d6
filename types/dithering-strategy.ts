/**
 * Dithering Strategy Interface
 *
 * Common interface for all dithering algorithm implementations.
 * Uses Strategy pattern for swappable dithering algorithms.
 *
 * @module types/dithering-strategy
 */

import type {
  MatrixSize,
  Palette,
  RandomSource,
  Raster,
} from './domain.js'

/** Dithering mode determining color handling */
export type DitheringMode = 'grayscale' | 'color'

/**
 * Options passed to dithering strategies.
 *
 * Always fully resolved by the dispatcher; strategies never apply defaults.
 */
export interface DitheringStrategyOptions {
  /** Processing mode: grayscale or color */
  mode: DitheringMode

  /** Output palette for color mode (ignored in grayscale mode) */
  palette: Palette

  /** Fraction of quantization error diffused (0.0-1.0) */
  ditherStrength: number

  /** Bayer matrix size for ordered dithering */
  matrixSize: MatrixSize

  /** Half-width of the uniform threshold perturbation */
  thresholdVariance: number

  /** Uniform random source in [0, 1) */
  random: RandomSource
}

/**
 * Interface for dithering strategy implementations
 *
 * All strategies are stateless and reusable.
 */
export interface DitheringStrategy {
  /**
   * Applies dithering algorithm to a raster
   *
   * @param raster - Input raster (never modified)
   * @param options - Resolved dithering configuration
   * @returns New raster with the same dimensions, restricted to the palette
   */
  call(raster: Raster, options: DitheringStrategyOptions): Raster
}
