/**
 * Pure helper functions for configuration logic
 * Extracted from config.ts for testability
 *
 * @module lib/config-helpers
 */

import { existsSync, readFileSync } from 'fs'

import { PALETTES } from '../const.js'
import { ConfigError, OptionsParseError } from '../error.js'
import type { Palette, PaletteName } from '../types/domain.js'
import { parseHexColor } from './dithering/palette-matcher.js'

/**
 * Options file interface (snake_case keys, all optional)
 */
export interface Options {
  input_dir?: string
  output_dir?: string
  method?: string
  width?: number
  height?: number
  max_frames?: number
  color?: boolean
  dither_strength?: number
  matrix_size?: number
  threshold_variance?: number
  /** Named palette or '#RRGGBB' list (string or array) */
  palette?: string | string[]
  seed?: number
  fps?: number
  debug_logging?: boolean
}

/**
 * Environment variables recognized as configuration
 */
export const ENV_KEYS = [
  'INPUT_DIR',
  'OUTPUT_DIR',
  'DITHER_METHOD',
  'FRAME_WIDTH',
  'FRAME_HEIGHT',
  'MAX_FRAMES',
  'COLOR_MODE',
  'DITHER_STRENGTH',
  'MATRIX_SIZE',
  'THRESHOLD_VARIANCE',
  'PALETTE',
  'RANDOM_SEED',
  'OUTPUT_FPS',
  'DEBUG_LOGGING',
] as const

/** Expected JSON type of each known option key */
const OPTION_TYPES: Record<keyof Options, 'string' | 'number' | 'boolean' | 'palette'> = {
  input_dir: 'string',
  output_dir: 'string',
  method: 'string',
  width: 'number',
  height: 'number',
  max_frames: 'number',
  color: 'boolean',
  dither_strength: 'number',
  matrix_size: 'number',
  threshold_variance: 'number',
  palette: 'palette',
  seed: 'number',
  fps: 'number',
  debug_logging: 'boolean',
}

const jsonTypeOf = (value: unknown): string =>
  value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value

/**
 * Checks the JSON type of every known key; unknown keys are ignored.
 * @throws Error naming the first mistyped key
 */
export function validateOptions(parsed: Record<string, unknown>): Options {
  for (const [key, expected] of Object.entries(OPTION_TYPES)) {
    const value = parsed[key]
    if (value === undefined) continue

    const valid =
      expected === 'palette'
        ? typeof value === 'string' ||
          (Array.isArray(value) && value.every((c) => typeof c === 'string'))
        : typeof value === expected
    if (!valid) {
      const wanted =
        expected === 'palette' ? 'a string or an array of strings' : `a ${expected}`
      throw new Error(`"${key}" must be ${wanted}, got ${jsonTypeOf(value)}`)
    }
  }
  return parsed as Options
}

/**
 * Safely parse options JSON file
 * @param filePath - Path to the options JSON file
 * @returns Parsed options object
 * @throws OptionsParseError if file cannot be read, parsed or has mistyped keys
 */
export function parseOptionsFile(filePath: string): Options {
  try {
    const content = readFileSync(filePath, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Options file must contain a JSON object')
    }
    return validateOptions(Object.fromEntries(Object.entries(parsed)))
  } catch (err) {
    throw new OptionsParseError(
      filePath,
      err instanceof Error ? err : new Error(String(err)),
    )
  }
}

/**
 * Find first existing options file
 * @param candidates - Paths in priority order
 * @param exists - File existence check (injectable for tests)
 */
export function findOptionsFile(
  candidates: readonly string[],
  exists: (path: string) => boolean = existsSync,
): string | undefined {
  return candidates.find((path) => exists(path))
}

/**
 * Check if running with environment variable configuration
 * @param env - Environment variables object (defaults to process.env)
 * @returns true if any recognized configuration env var is set
 */
export function hasEnvConfig(
  env: Record<string, string | undefined> = process.env,
): boolean {
  return ENV_KEYS.some((key) => Boolean(env[key]))
}

/**
 * Parse boolean from environment variable string
 * @param value - String value from env var
 * @param defaultValue - Default if undefined
 * @returns Parsed boolean value
 */
export function parseEnvBoolean(
  value: string | undefined,
  defaultValue: boolean,
): boolean {
  if (value === undefined) return defaultValue
  return value === 'true' || value === '1'
}

/**
 * Parse number from environment variable string
 * @param name - Variable name, used in the error message
 * @param value - String value from env var
 * @returns Parsed number, or undefined when unset or empty
 * @throws ConfigError when the value is not a number
 */
export function parseEnvNumber(
  name: string,
  value: string | undefined,
): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`)
  }
  return parsed
}

/**
 * Checks if a string names a built-in palette
 */
export function isPaletteName(value: string): value is PaletteName {
  return Object.keys(PALETTES).includes(value)
}

/**
 * Resolves a palette option into RGB tuples.
 *
 * Accepts a palette name ('bw', 'default-8', ...), a comma-separated
 * '#RRGGBB' list, or an array of '#RRGGBB' strings.
 *
 * @throws ConfigError for unknown names or malformed colors
 */
export function resolvePalette(value: string | readonly string[]): Palette {
  const name = typeof value === 'string' ? value.trim() : ''
  if (isPaletteName(name)) {
    return PALETTES[name].colors.map(parseHexColor)
  }

  const colors = (typeof value === 'string' ? value.split(',') : [...value])
    .map((c) => c.trim())
    .filter((c) => c.length > 0)

  if (colors.length === 0) {
    throw new ConfigError('Palette must list at least one color')
  }

  try {
    return colors.map(parseHexColor)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    const named = Object.entries(PALETTES)
      .map(([name, { label }]) => `${name} (${label})`)
      .join(', ')
    throw new ConfigError(
      `Unknown palette "${String(value)}": ${message}. Use one of ${named} or a #RRGGBB list`,
    )
  }
}
