/**
 * Runtime configuration for Frame Dither
 *
 * Sources, highest precedence first:
 * 1. Environment variables (INPUT_DIR, DITHER_METHOD, ...)
 * 2. First positional CLI argument (input directory only)
 * 3. Options file (./dither-options.json, then /data/options.json)
 * 4. Defaults from const.ts
 *
 * @module config
 */

import {
  DEFAULT_FPS,
  DEFAULT_FRAME_HEIGHT,
  DEFAULT_FRAME_WIDTH,
  DEFAULT_MAX_FRAMES,
  DEFAULT_METHOD,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PALETTE_NAME,
  OPTIONS_FILE_CANDIDATES,
  VALID_MATRIX_SIZES,
} from './const.js'
import { ConfigError } from './error.js'
import {
  findOptionsFile,
  parseEnvBoolean,
  parseEnvNumber,
  parseOptionsFile,
  resolvePalette,
  type Options,
} from './lib/config-helpers.js'
import { isDitheringMethod, isErrorDiffusionMethod } from './lib/dithering.js'
import type {
  DitheringMethod,
  DitheringParams,
  FrameDitherConfig,
} from './types/domain.js'

/** Inputs for {@link loadConfig}; all injectable for tests */
export interface LoadConfigInput {
  env?: Record<string, string | undefined>
  argv?: readonly string[]
  /** Explicit options file; skips the candidate search when set */
  optionsFile?: string
  exists?: (path: string) => boolean
}

/** Resolved configuration plus where it came from */
export interface LoadedConfig {
  config: FrameDitherConfig
  optionsFile: string | undefined
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

function resolveMethod(value: string): DitheringMethod {
  if (!isDitheringMethod(value)) {
    throw new ConfigError(
      `Unknown dithering method "${value}" (expected floyd_steinberg, atkinson, jarvis_judice_ninke, ordered or random)`,
    )
  }
  return value
}

/**
 * Builds the parameters the chosen method reads. Other parameters are left
 * out, as only one method runs per invocation.
 */
function buildParams(
  method: DitheringMethod,
  isColor: boolean,
  values: {
    ditherStrength: number | undefined
    matrixSize: number | undefined
    thresholdVariance: number | undefined
    palette: string | readonly string[]
    seed: number | undefined
  },
): DitheringParams {
  const params: DitheringParams = {}

  if (isErrorDiffusionMethod(method) && values.ditherStrength !== undefined) {
    params.ditherStrength = values.ditherStrength
  }
  if (method === 'ordered' && values.matrixSize !== undefined) {
    const size = VALID_MATRIX_SIZES.find((s) => s === values.matrixSize)
    if (size === undefined) {
      throw new ConfigError(
        `MATRIX_SIZE must be one of ${VALID_MATRIX_SIZES.join(', ')}, got ${values.matrixSize}`,
      )
    }
    params.matrixSize = size
  }
  if (method === 'random') {
    if (values.thresholdVariance !== undefined) {
      params.thresholdVariance = values.thresholdVariance
    }
    if (values.seed !== undefined) {
      params.seed = values.seed
    }
  }
  if (isColor) {
    params.palette = resolvePalette(values.palette)
  }

  return params
}

/**
 * Loads and validates configuration.
 *
 * @throws ConfigError when no input directory is configured or a value is malformed
 * @throws OptionsParseError when the options file is unreadable
 */
export function loadConfig(input: LoadConfigInput = {}): LoadedConfig {
  const env = input.env ?? process.env
  const argv = input.argv ?? process.argv.slice(2)

  const optionsFile =
    input.optionsFile ?? findOptionsFile(OPTIONS_FILE_CANDIDATES, input.exists)
  const file: Options = optionsFile ? parseOptionsFile(optionsFile) : {}

  const inputDir = env['INPUT_DIR'] ?? argv[0] ?? file.input_dir
  if (!inputDir) {
    throw new ConfigError(
      'No input directory configured. Pass it as the first argument, set INPUT_DIR, or add input_dir to dither-options.json',
    )
  }

  const method = resolveMethod(
    env['DITHER_METHOD'] ?? file.method ?? DEFAULT_METHOD,
  )
  const isColor = parseEnvBoolean(env['COLOR_MODE'], file.color ?? false)

  const width = requirePositiveInteger(
    'FRAME_WIDTH',
    parseEnvNumber('FRAME_WIDTH', env['FRAME_WIDTH']) ??
      file.width ??
      DEFAULT_FRAME_WIDTH,
  )
  const height = requirePositiveInteger(
    'FRAME_HEIGHT',
    parseEnvNumber('FRAME_HEIGHT', env['FRAME_HEIGHT']) ??
      file.height ??
      DEFAULT_FRAME_HEIGHT,
  )
  const maxFrames = requirePositiveInteger(
    'MAX_FRAMES',
    parseEnvNumber('MAX_FRAMES', env['MAX_FRAMES']) ??
      file.max_frames ??
      DEFAULT_MAX_FRAMES,
  )
  const fps = requirePositiveInteger(
    'OUTPUT_FPS',
    parseEnvNumber('OUTPUT_FPS', env['OUTPUT_FPS']) ?? file.fps ?? DEFAULT_FPS,
  )

  const params = buildParams(method, isColor, {
    ditherStrength:
      parseEnvNumber('DITHER_STRENGTH', env['DITHER_STRENGTH']) ??
      file.dither_strength,
    matrixSize:
      parseEnvNumber('MATRIX_SIZE', env['MATRIX_SIZE']) ?? file.matrix_size,
    thresholdVariance:
      parseEnvNumber('THRESHOLD_VARIANCE', env['THRESHOLD_VARIANCE']) ??
      file.threshold_variance,
    palette: env['PALETTE'] ?? file.palette ?? DEFAULT_PALETTE_NAME,
    seed: parseEnvNumber('RANDOM_SEED', env['RANDOM_SEED']) ?? file.seed,
  })

  return {
    optionsFile,
    config: {
      inputDir,
      outputDir: env['OUTPUT_DIR'] ?? file.output_dir ?? DEFAULT_OUTPUT_DIR,
      method,
      size: { width, height },
      maxFrames,
      isColor,
      params,
      fps,
      debugLogging: parseEnvBoolean(
        env['DEBUG_LOGGING'],
        file.debug_logging ?? false,
      ),
    },
  }
}
