/**
 * Error-diffusion kernels and Bayer threshold matrices
 *
 * Kernel offsets are `[dy, dx, weight]` relative to the current pixel, with
 * `dy = +1` meaning the row below. Offsets only ever point forward in scan
 * order (same row to the right, or a later row).
 *
 * @module lib/dithering/kernels
 */

import type { MatrixSize } from '../../types/domain.js'

/** Error distribution offset: [dy, dx, weight] */
export type KernelOffset = readonly [dy: number, dx: number, weight: number]

/**
 * Error distribution kernel for an error-diffusion dithering algorithm.
 */
export interface DiffusionKernel {
  readonly name: string
  readonly offsets: readonly KernelOffset[]
}

/**
 * Floyd-Steinberg:
 *
 *          [*]   7/16
 *   3/16   5/16  1/16
 */
export const FLOYD_STEINBERG_KERNEL: DiffusionKernel = {
  name: 'Floyd-Steinberg',
  offsets: [
    [0, 1, 7 / 16],
    [1, -1, 3 / 16],
    [1, 0, 5 / 16],
    [1, 1, 1 / 16],
  ],
}

/**
 * Atkinson: six neighbours at 1/8 each. Only 6/8 of the error is passed on;
 * the remaining 2/8 is dropped, which keeps highlights and shadows crisp.
 *
 *          [*]  1/8  1/8
 *   1/8    1/8  1/8
 *          1/8
 */
export const ATKINSON_KERNEL: DiffusionKernel = {
  name: 'Atkinson',
  offsets: [
    [0, 1, 1 / 8],
    [0, 2, 1 / 8],
    [1, -1, 1 / 8],
    [1, 0, 1 / 8],
    [1, 1, 1 / 8],
    [2, 0, 1 / 8],
  ],
}

/**
 * Jarvis-Judice-Ninke (denominator 48):
 *
 *               [*]   7    5
 *     3    5     7    5    3
 *     1    3     5    3    1
 */
export const JARVIS_JUDICE_NINKE_KERNEL: DiffusionKernel = {
  name: 'Jarvis-Judice-Ninke',
  offsets: [
    [0, 1, 7 / 48],
    [0, 2, 5 / 48],
    [1, -2, 3 / 48],
    [1, -1, 5 / 48],
    [1, 0, 7 / 48],
    [1, 1, 5 / 48],
    [1, 2, 3 / 48],
    [2, -2, 1 / 48],
    [2, -1, 3 / 48],
    [2, 0, 5 / 48],
    [2, 1, 3 / 48],
    [2, 2, 1 / 48],
  ],
}

// =============================================================================
// BAYER MATRICES
// =============================================================================

/** Canonical integer Bayer matrices (values 0 .. n²-1) */
export const BAYER_MATRICES: Record<MatrixSize, readonly (readonly number[])[]> =
  {
    2: [
      [0, 2],
      [3, 1],
    ],
    4: [
      [0, 8, 2, 10],
      [12, 4, 14, 6],
      [3, 11, 1, 9],
      [15, 7, 13, 5],
    ],
    8: [
      [0, 32, 8, 40, 2, 34, 10, 42],
      [48, 16, 56, 24, 50, 18, 58, 26],
      [12, 44, 4, 36, 14, 46, 6, 38],
      [60, 28, 52, 20, 62, 30, 54, 22],
      [3, 35, 11, 43, 1, 33, 9, 41],
      [51, 19, 59, 27, 49, 17, 57, 25],
      [15, 47, 7, 39, 13, 45, 5, 37],
      [63, 31, 55, 23, 61, 29, 53, 21],
    ],
  }

/**
 * Bayer matrix normalized to [0, 1) by dividing by size².
 */
export function getThresholdMatrix(
  size: MatrixSize,
): readonly (readonly number[])[] {
  const cells = size * size
  return BAYER_MATRICES[size].map((row) => row.map((value) => value / cells))
}
