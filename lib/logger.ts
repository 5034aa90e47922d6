/**
 * Logging setup built on LogTape
 *
 * Every area of the tool gets its own child category under `frame-dither`
 * so debug output can be filtered per area. Loggers are cheap to obtain and
 * stay silent until {@link initializeLogging} has run (tests never call it).
 *
 * @module lib/logger
 */

import {
  configure,
  getConsoleSink,
  getLogger,
  type Logger,
} from '@logtape/logtape'

const ROOT_CATEGORY = 'frame-dither'

/**
 * Configures the console sink. Call once, before anything logs.
 *
 * @param debug - Lower the threshold from info to debug
 */
export async function initializeLogging(debug: boolean = false): Promise<void> {
  await configure({
    reset: true,
    sinks: { console: getConsoleSink() },
    loggers: [
      {
        category: [ROOT_CATEGORY],
        lowestLevel: debug ? 'debug' : 'info',
        sinks: ['console'],
      },
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
      },
    ],
  })
}

export const appLogger = (): Logger => getLogger([ROOT_CATEGORY, 'app'])

export const configLogger = (): Logger => getLogger([ROOT_CATEGORY, 'config'])

export const ditheringLogger = (): Logger =>
  getLogger([ROOT_CATEGORY, 'dithering'])

export const framesLogger = (): Logger => getLogger([ROOT_CATEGORY, 'frames'])

export const pipelineLogger = (): Logger =>
  getLogger([ROOT_CATEGORY, 'pipeline'])
