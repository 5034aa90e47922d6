/**
 * Unit tests for the dithering dispatcher
 *
 * Covers method routing, parameter validation and mode checks. Algorithm
 * output is covered per method in the neighbouring test files.
 *
 * @module tests/unit/dithering
 */

import { describe, it, expect } from 'vitest'
import {
  applyDithering,
  ERROR_DIFFUSION_METHODS,
  getStrategy,
  isDitheringMethod,
  isErrorDiffusionMethod,
  SUPPORTED_METHODS,
  validateDitheringOptions,
  validatePalette,
} from '../../lib/dithering.js'
import { ErrorDiffusionStrategy } from '../../lib/dithering/error-diffusion-strategy.js'
import { OrderedStrategy } from '../../lib/dithering/ordered-strategy.js'
import { RandomStrategy } from '../../lib/dithering/random-strategy.js'
import { defaultRandom } from '../../lib/random.js'
import { rasterFromRows } from '../../lib/raster.js'
import { DEFAULT_PALETTE, VALID_MATRIX_SIZES } from '../../const.js'
import { InvalidArgumentError } from '../../error.js'
import type {
  DitheringParams,
  MatrixSize,
  Palette,
  Raster,
} from '../../types/domain.js'
import {
  createColorGradientRaster,
  createGradientRaster,
  isBlackAndWhite,
  isWithinPalette,
} from '../helpers/raster-helper.js'

/** Captures the thrown InvalidArgumentError for inspection */
function catchInvalidArgument(fn: () => unknown): InvalidArgumentError {
  try {
    fn()
  } catch (err) {
    if (err instanceof InvalidArgumentError) return err
    throw err
  }
  throw new Error('Expected InvalidArgumentError to be thrown')
}

// =============================================================================
// Constants and guards
// =============================================================================

describe('SUPPORTED_METHODS', () => {
  it('lists the five methods', () => {
    expect(SUPPORTED_METHODS).toEqual([
      'floyd_steinberg',
      'atkinson',
      'jarvis_judice_ninke',
      'ordered',
      'random',
    ])
  })

  it('marks the error-diffusion subset', () => {
    expect(ERROR_DIFFUSION_METHODS).toEqual([
      'floyd_steinberg',
      'atkinson',
      'jarvis_judice_ninke',
    ])
    expect(isErrorDiffusionMethod('atkinson')).toBe(true)
    expect(isErrorDiffusionMethod('ordered')).toBe(false)
  })
})

describe('isDitheringMethod', () => {
  it('accepts supported names only', () => {
    expect(isDitheringMethod('random')).toBe(true)
    expect(isDitheringMethod('floyd-steinberg')).toBe(false)
    expect(isDitheringMethod('FLOYD_STEINBERG')).toBe(false)
    expect(isDitheringMethod(undefined)).toBe(false)
  })
})

describe('getStrategy', () => {
  it('routes methods to their strategies', () => {
    expect(getStrategy('floyd_steinberg')).toBeInstanceOf(ErrorDiffusionStrategy)
    expect(getStrategy('jarvis_judice_ninke')).toBeInstanceOf(ErrorDiffusionStrategy)
    expect(getStrategy('ordered')).toBeInstanceOf(OrderedStrategy)
    expect(getStrategy('random')).toBeInstanceOf(RandomStrategy)
  })

  it('throws for unknown methods', () => {
    const err = catchInvalidArgument(() => getStrategy('threshold'))
    expect(err.parameter).toBe('method')
    expect(err.message).toContain('threshold')
  })
})

// =============================================================================
// validateDitheringOptions
// =============================================================================

describe('validateDitheringOptions', () => {
  it('fills in defaults', () => {
    const options = validateDitheringOptions('floyd_steinberg', false)
    expect(options).toEqual({
      mode: 'grayscale',
      palette: [],
      ditherStrength: 1,
      matrixSize: 4,
      thresholdVariance: 50,
      random: defaultRandom,
    })
  })

  it('applies the default palette in color mode', () => {
    const options = validateDitheringOptions('atkinson', true)
    expect(options.mode).toBe('color')
    expect(options.palette).toEqual(DEFAULT_PALETTE)
  })

  it('keeps a supplied palette', () => {
    const palette: Palette = [
      [0, 0, 0],
      [255, 255, 255],
    ]
    expect(validateDitheringOptions('ordered', true, { palette }).palette).toBe(
      palette,
    )
  })

  it('rejects unknown methods', () => {
    const err = catchInvalidArgument(() =>
      validateDitheringOptions('bayer', false),
    )
    expect(err.parameter).toBe('method')
  })

  it.each([-0.1, 1.1, Number.NaN])(
    'rejects ditherStrength %s for error diffusion',
    (ditherStrength) => {
      const err = catchInvalidArgument(() =>
        validateDitheringOptions('floyd_steinberg', false, { ditherStrength }),
      )
      expect(err.parameter).toBe('ditherStrength')
    },
  )

  it('accepts ditherStrength at both bounds', () => {
    expect(
      validateDitheringOptions('atkinson', false, { ditherStrength: 0 })
        .ditherStrength,
    ).toBe(0)
    expect(
      validateDitheringOptions('atkinson', false, { ditherStrength: 1 })
        .ditherStrength,
    ).toBe(1)
  })

  it('rejects matrix sizes other than 2, 4 or 8', () => {
    // NOTE: cast to exercise the runtime check with an untyped value
    const matrixSize = 3 as MatrixSize
    const err = catchInvalidArgument(() =>
      validateDitheringOptions('ordered', false, { matrixSize }),
    )
    expect(err.parameter).toBe('matrixSize')
  })

  it('rejects negative thresholdVariance', () => {
    const err = catchInvalidArgument(() =>
      validateDitheringOptions('random', false, { thresholdVariance: -1 }),
    )
    expect(err.parameter).toBe('thresholdVariance')
  })

  it('ignores parameters the method does not read', () => {
    // NOTE: cast to exercise the runtime check with an untyped value
    const matrixSize = 3 as MatrixSize
    const options = validateDitheringOptions('floyd_steinberg', false, {
      matrixSize,
      thresholdVariance: -5,
      ditherStrength: 0.5,
    })
    expect(options.matrixSize).toBe(4)
    expect(options.thresholdVariance).toBe(50)
    expect(options.ditherStrength).toBe(0.5)

    const ordered = validateDitheringOptions('ordered', false, {
      ditherStrength: 7,
    })
    expect(ordered.ditherStrength).toBe(1)
  })

  it('does not validate the palette in grayscale mode', () => {
    expect(
      validateDitheringOptions('ordered', false, { palette: [] }).palette,
    ).toEqual([])
  })
})

describe('validatePalette', () => {
  it('returns valid palettes unchanged', () => {
    expect(validatePalette(DEFAULT_PALETTE)).toBe(DEFAULT_PALETTE)
  })

  it('rejects empty palettes', () => {
    expect(catchInvalidArgument(() => validatePalette([])).parameter).toBe(
      'palette',
    )
  })

  it('rejects out-of-range and fractional components', () => {
    expect(() => validatePalette([[0, 0, 256]])).toThrow(InvalidArgumentError)
    expect(() => validatePalette([[0, -1, 0]])).toThrow(InvalidArgumentError)
    expect(() => validatePalette([[0.5, 0, 0]])).toThrow(InvalidArgumentError)
  })

  it('rejects duplicate colors', () => {
    const err = catchInvalidArgument(() =>
      validatePalette([
        [1, 2, 3],
        [4, 5, 6],
        [1, 2, 3],
      ]),
    )
    expect(err.message).toBe(
      'Palette entry 2 duplicates an earlier color [1,2,3]',
    )
  })
})

// =============================================================================
// applyDithering
// =============================================================================

describe('applyDithering', () => {
  describe.each(SUPPORTED_METHODS)('%s', (method) => {
    it('preserves dimensions and produces pure black and white', () => {
      const input = createGradientRaster(23, 11)
      const result = applyDithering(input, method, false, { seed: 3 })
      expect(result.width).toBe(23)
      expect(result.height).toBe(11)
      expect(result.channels).toBe(1)
      expect(result.data.length).toBe(23 * 11)
      expect(isBlackAndWhite(result)).toBe(true)
    })

    it('restricts color output to the palette', () => {
      const palette: Palette = [
        [0, 0, 0],
        [255, 255, 255],
        [255, 0, 0],
        [0, 0, 255],
      ]
      const result = applyDithering(createColorGradientRaster(17, 9), method, true, {
        palette,
        seed: 3,
      })
      expect(result.channels).toBe(3)
      expect(result.data.length).toBe(17 * 9 * 3)
      expect(isWithinPalette(result, palette)).toBe(true)
    })

    it('uses the default palette when none is given', () => {
      const result = applyDithering(createColorGradientRaster(10, 10), method, true, {
        seed: 3,
      })
      expect(isWithinPalette(result, DEFAULT_PALETTE)).toBe(true)
    })

    it('returns a new raster', () => {
      const input = createGradientRaster(4, 4)
      expect(applyDithering(input, method, false, { seed: 3 })).not.toBe(input)
    })
  })

  describe.each(SUPPORTED_METHODS)('%s on tiny rasters', (method) => {
    const variants: DitheringParams[] =
      method === 'ordered'
        ? VALID_MATRIX_SIZES.map((matrixSize) => ({ matrixSize }))
        : [{ seed: 11 }]

    it.each([
      [1, 1],
      [2, 2],
    ])('keeps a %ix%i grayscale raster in shape and black and white', (width, height) => {
      for (const params of variants) {
        const result = applyDithering(createGradientRaster(width, height), method, false, params)
        expect(result.width).toBe(width)
        expect(result.height).toBe(height)
        expect(result.channels).toBe(1)
        expect(result.data.length).toBe(width * height)
        expect(isBlackAndWhite(result)).toBe(true)
      }
    })

    it.each([
      [1, 1],
      [2, 2],
    ])('keeps a %ix%i color raster in shape and in the palette', (width, height) => {
      for (const params of variants) {
        const result = applyDithering(
          createColorGradientRaster(width, height),
          method,
          true,
          params,
        )
        expect(result.width).toBe(width)
        expect(result.height).toBe(height)
        expect(result.channels).toBe(3)
        expect(result.data.length).toBe(width * height * 3)
        expect(isWithinPalette(result, DEFAULT_PALETTE)).toBe(true)
      }
    })
  })

  it('rejects unknown methods before touching the raster', () => {
    const err = catchInvalidArgument(() =>
      applyDithering(createGradientRaster(2, 2), 'sierra'),
    )
    expect(err.parameter).toBe('method')
  })

  it('rejects 3-channel rasters in grayscale mode', () => {
    const err = catchInvalidArgument(() =>
      applyDithering(createColorGradientRaster(2, 2), 'ordered', false),
    )
    expect(err.parameter).toBe('raster')
  })

  it('rejects 1-channel rasters in color mode', () => {
    const err = catchInvalidArgument(() =>
      applyDithering(createGradientRaster(2, 2), 'ordered', true),
    )
    expect(err.message).toBe(
      'Color mode requires a 3-channel raster, got 1 channel(s)',
    )
  })

  it('rejects rasters whose buffer does not match their size', () => {
    const broken: Raster = {
      width: 3,
      height: 3,
      channels: 1,
      data: new Uint8Array(8),
    }
    const err = catchInvalidArgument(() => applyDithering(broken, 'atkinson'))
    expect(err.parameter).toBe('data')
  })

  it('rejects invalid palettes in color mode', () => {
    const err = catchInvalidArgument(() =>
      applyDithering(createColorGradientRaster(2, 2), 'random', true, {
        palette: [],
      }),
    )
    expect(err.parameter).toBe('palette')
  })

  it('treats a one-color palette as a constant fill', () => {
    const palette: Palette = [[12, 34, 56]]
    const result = applyDithering(createColorGradientRaster(5, 5), 'floyd_steinberg', true, {
      palette,
    })
    expect(isWithinPalette(result, palette)).toBe(true)
  })

  it('leaves pure black and white grayscale frames unchanged', () => {
    const input = rasterFromRows([
      [0, 255, 0],
      [255, 0, 255],
    ])
    for (const method of SUPPORTED_METHODS) {
      const result = applyDithering(input, method, false, { thresholdVariance: 0 })
      expect(Array.from(result.data)).toEqual([0, 255, 0, 255, 0, 255])
    }
  })
})
