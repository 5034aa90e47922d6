/**
 * Main Application Entry Point
 *
 * Dithers a directory of still frames and writes frame_NNNN.png files:
 * - Loads configuration (env vars → positional arg → options file → defaults)
 * - Opens the image sequence and the PNG output directory
 * - Runs every frame through the dithering engine, one at a time
 * - Prints the ffmpeg command that reassembles the frames into a video
 *
 * Usage: node dist/main.js <input-dir>
 *
 * @module main
 */

import { loadConfig } from './config.js'
import { ConfigError, OptionsParseError } from './error.js'
import { hasEnvConfig } from './lib/config-helpers.js'
import { toHexColor } from './lib/dithering/palette-matcher.js'
import { buildFfmpegCommand, FramePipeline } from './lib/frame-pipeline.js'
import { ImageSequenceSource } from './lib/frames/image-sequence-source.js'
import { PngFrameSink } from './lib/frames/png-frame-sink.js'
import { appLogger, configLogger, initializeLogging } from './lib/logger.js'
import type { LoadedConfig } from './config.js'

/**
 * Loads configuration with clear error messaging
 */
function loadConfigSafe(): LoadedConfig {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof OptionsParseError) {
      console.error(`[Startup] FATAL: ${err.message}`)
      console.error(`[Startup] Error: ${err.cause.message}`)
    } else if (err instanceof ConfigError) {
      console.error(`[Startup] FATAL: ${err.message}`)
    } else {
      const message = err instanceof Error ? err.message : String(err)
      console.error(`[Startup] FATAL: Unexpected error loading config: ${message}`)
    }
    process.exit(1)
  }
}

const { config, optionsFile } = loadConfigSafe()

// Initialize logging before anything else logs
await initializeLogging(config.debugLogging)
const log = appLogger()
const configLog = configLogger()

if (hasEnvConfig(process.env)) {
  configLog.info`Using environment variables`
}
if (optionsFile) {
  configLog.info`Using ${optionsFile}`
}

log.info`Input directory: ${config.inputDir}`
log.info`Output directory: ${config.outputDir}`
log.info`Dithering method: ${config.method}`
log.info`Target dimensions: ${config.size.width}x${config.size.height}`
log.info`Max frames: ${config.maxFrames}`
log.info`Color mode: ${config.isColor ? 'Color' : 'Grayscale'}`
if (config.params.palette) {
  log.info`Palette: ${config.params.palette.map(toHexColor).join(', ')}`
}

try {
  const source = await ImageSequenceSource.open(config.inputDir, {
    ...config.size,
    channels: config.isColor ? 3 : 1,
  })
  const sink = new PngFrameSink(config.outputDir)
  const pipeline = new FramePipeline(source, sink)

  const result = await pipeline.call({
    method: config.method,
    isColor: config.isColor,
    params: config.params,
    maxFrames: config.maxFrames,
    onProgress: ({ written, total }) => {
      if (written % 50 === 0 || written === total) {
        log.info`Progress: ${written}/${total} frames`
      }
    },
  })

  log.info`Done! Exported ${result.framesWritten} frames to ${config.outputDir}`
  log.info`Create a video from the frames with: ${buildFfmpegCommand({
    outputDir: config.outputDir,
    fps: config.fps,
    method: config.method,
    isColor: config.isColor,
  })}`
} catch (err) {
  const message = err instanceof Error ? err.message : String(err)
  log.fatal`Frame processing failed: ${message}`
  process.exitCode = 1
}
