/**
 * Dithering Module - Frame Quantization Engine
 *
 * Public entry point of the engine. Validates a request, fills in defaults
 * and routes it to one of the dithering strategies. Every call is a pure
 * function of its inputs (plus the random source for 'random'): the input
 * raster is never modified and nothing is shared between calls.
 *
 * @module lib/dithering
 */

import {
  DEFAULT_DITHER_STRENGTH,
  DEFAULT_MATRIX_SIZE,
  DEFAULT_PALETTE,
  DEFAULT_THRESHOLD_VARIANCE,
  VALID_MATRIX_SIZES,
} from '../const.js'
import { InvalidArgumentError } from '../error.js'
import {
  ErrorDiffusionStrategy,
} from './dithering/error-diffusion-strategy.js'
import {
  ATKINSON_KERNEL,
  FLOYD_STEINBERG_KERNEL,
  JARVIS_JUDICE_NINKE_KERNEL,
} from './dithering/kernels.js'
import { OrderedStrategy } from './dithering/ordered-strategy.js'
import { RandomStrategy } from './dithering/random-strategy.js'
import { assertRaster } from './raster.js'
import { createSeededRandom, defaultRandom } from './random.js'
import type {
  DitheringMethod,
  DitheringParams,
  ErrorDiffusionMethod,
  MatrixSize,
  Palette,
  RandomSource,
  Raster,
} from '../types/domain.js'
import type {
  DitheringStrategy,
  DitheringStrategyOptions,
} from '../types/dithering-strategy.js'
import { ditheringLogger } from './logger.js'

const log = ditheringLogger()

// =============================================================================
// PUBLIC CONSTANTS
// =============================================================================

/** Supported dithering methods */
export const SUPPORTED_METHODS: readonly DitheringMethod[] = [
  'floyd_steinberg',
  'atkinson',
  'jarvis_judice_ninke',
  'ordered',
  'random',
] as const

/** Methods that read ditherStrength */
export const ERROR_DIFFUSION_METHODS: readonly ErrorDiffusionMethod[] = [
  'floyd_steinberg',
  'atkinson',
  'jarvis_judice_ninke',
] as const

/**
 * Checks if a value names a supported dithering method
 */
export function isDitheringMethod(value: unknown): value is DitheringMethod {
  return (
    typeof value === 'string' &&
    (SUPPORTED_METHODS as readonly string[]).includes(value)
  )
}

/**
 * Checks if a method diffuses error (and therefore reads ditherStrength)
 */
export function isErrorDiffusionMethod(
  method: DitheringMethod,
): method is ErrorDiffusionMethod {
  return (ERROR_DIFFUSION_METHODS as readonly string[]).includes(method)
}

// =============================================================================
// DITHERING STRATEGY REGISTRY
// =============================================================================

/** Strategy registry mapping method names to strategy instances */
const DITHERING_STRATEGIES: Record<DitheringMethod, DitheringStrategy> = {
  floyd_steinberg: new ErrorDiffusionStrategy(FLOYD_STEINBERG_KERNEL),
  atkinson: new ErrorDiffusionStrategy(ATKINSON_KERNEL),
  jarvis_judice_ninke: new ErrorDiffusionStrategy(JARVIS_JUDICE_NINKE_KERNEL),
  ordered: new OrderedStrategy(),
  random: new RandomStrategy(),
}

/**
 * Gets dithering strategy for a given method name.
 *
 * @throws InvalidArgumentError for unknown methods
 */
export function getStrategy(method: string): DitheringStrategy {
  if (!isDitheringMethod(method)) {
    throw new InvalidArgumentError(
      `Unknown dithering method: ${method} (expected one of ${SUPPORTED_METHODS.join(', ')})`,
      'method',
    )
  }
  return DITHERING_STRATEGIES[method]
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validates a palette: non-empty, distinct entries of three integers 0-255.
 */
export function validatePalette(palette: Palette): Palette {
  if (palette.length === 0) {
    throw new InvalidArgumentError('Palette must not be empty', 'palette')
  }

  const seen = new Set<string>()
  palette.forEach((color, index) => {
    if (
      color.length !== 3 ||
      !color.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)
    ) {
      throw new InvalidArgumentError(
        `Palette entry ${index} must be three integers in 0-255, got [${color.join(', ')}]`,
        'palette',
      )
    }
    const key = color.join(',')
    if (seen.has(key)) {
      throw new InvalidArgumentError(
        `Palette entry ${index} duplicates an earlier color [${key}]`,
        'palette',
      )
    }
    seen.add(key)
  })

  return palette
}

function validateDitherStrength(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(
      `ditherStrength must be between 0.0 and 1.0, got ${value}`,
      'ditherStrength',
    )
  }
  return value
}

function validateMatrixSize(value: number): MatrixSize {
  const size = VALID_MATRIX_SIZES.find((s) => s === value)
  if (size === undefined) {
    throw new InvalidArgumentError(
      `matrixSize must be one of ${VALID_MATRIX_SIZES.join(', ')}, got ${value}`,
      'matrixSize',
    )
  }
  return size
}

function validateThresholdVariance(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(
      `thresholdVariance must be a non-negative number, got ${value}`,
      'thresholdVariance',
    )
  }
  return value
}

function resolveRandom(params: DitheringParams): RandomSource {
  if (params.random) return params.random
  if (params.seed !== undefined) {
    if (!Number.isInteger(params.seed)) {
      throw new InvalidArgumentError(
        `seed must be an integer, got ${params.seed}`,
        'seed',
      )
    }
    return createSeededRandom(params.seed)
  }
  return defaultRandom
}

/**
 * Validates parameters for one method and returns fully resolved strategy
 * options with defaults applied.
 *
 * Only the parameters the method reads are validated; others are ignored.
 */
export function validateDitheringOptions(
  method: string,
  isColor: boolean,
  params: DitheringParams = {},
): DitheringStrategyOptions {
  if (!isDitheringMethod(method)) {
    throw new InvalidArgumentError(
      `Unknown dithering method: ${method} (expected one of ${SUPPORTED_METHODS.join(', ')})`,
      'method',
    )
  }

  return {
    mode: isColor ? 'color' : 'grayscale',
    palette: isColor ? validatePalette(params.palette ?? DEFAULT_PALETTE) : [],
    ditherStrength: isErrorDiffusionMethod(method)
      ? validateDitherStrength(params.ditherStrength ?? DEFAULT_DITHER_STRENGTH)
      : DEFAULT_DITHER_STRENGTH,
    matrixSize:
      method === 'ordered'
        ? validateMatrixSize(params.matrixSize ?? DEFAULT_MATRIX_SIZE)
        : DEFAULT_MATRIX_SIZE,
    thresholdVariance:
      method === 'random'
        ? validateThresholdVariance(
            params.thresholdVariance ?? DEFAULT_THRESHOLD_VARIANCE,
          )
        : DEFAULT_THRESHOLD_VARIANCE,
    random: method === 'random' ? resolveRandom(params) : defaultRandom,
  }
}

/**
 * Rejects rasters whose channel count does not match the mode.
 * Single-channel rasters in color mode (and vice versa) are not converted.
 */
function assertRasterMatchesMode(raster: Raster, isColor: boolean): void {
  assertRaster(raster)
  const expected = isColor ? 3 : 1
  if (raster.channels !== expected) {
    throw new InvalidArgumentError(
      `${isColor ? 'Color' : 'Grayscale'} mode requires a ${expected}-channel raster, got ${raster.channels} channel(s)`,
      'raster',
    )
  }
}

// =============================================================================
// DITHERING PIPELINE
// =============================================================================

/**
 * Main entry point: dithers one raster with the named method.
 *
 * @param raster - 1-channel raster (grayscale) or 3-channel raster (color)
 * @param method - One of {@link SUPPORTED_METHODS}
 * @param isColor - Quantize to `params.palette` instead of {0, 255}
 * @param params - Method parameters; missing values take defaults
 * @returns New raster with identical dimensions, restricted to the palette
 * @throws InvalidArgumentError for unknown methods, out-of-range parameters,
 *   invalid palettes or rasters that do not match the mode
 */
export function applyDithering(
  raster: Raster,
  method: string,
  isColor: boolean = false,
  params: DitheringParams = {},
): Raster {
  const options = validateDitheringOptions(method, isColor, params)
  assertRasterMatchesMode(raster, isColor)

  const strategy = getStrategy(method)
  log.debug`Dithering ${raster.width}x${raster.height} ${options.mode} raster with ${method}`

  return strategy.call(raster, options)
}
