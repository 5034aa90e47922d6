/**
 * Random sources for randomized-threshold dithering
 *
 * @module lib/random
 */

import type { RandomSource } from '../types/domain.js'

/** Non-reproducible default */
export const defaultRandom: RandomSource = Math.random

/**
 * Deterministic xorshift32 generator. Equal seeds give equal sequences.
 * A zero seed is remapped since xorshift never leaves the all-zero state.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0 || 0x9e3779b9
  return () => {
    state ^= state << 13
    state ^= state >>> 17
    state ^= state << 5
    return (state >>> 0) / 0x100000000
  }
}

/**
 * Uniform value in [min, max)
 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random()
}
