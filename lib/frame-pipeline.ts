/**
 * Frame Pipeline - Source → Dither Engine → Sink
 *
 * Frames are handled strictly one at a time: each is read, dithered and
 * written before the next one is pulled from the source.
 *
 * @module lib/frame-pipeline
 */

import { applyDithering, validateDitheringOptions } from './dithering.js'
import { createSeededRandom } from './random.js'
import type {
  DitheringMethod,
  DitheringParams,
  FrameProgress,
} from '../types/domain.js'
import type { FrameSink, FrameSource } from '../types/frame-io.js'
import { pipelineLogger } from './logger.js'

const log = pipelineLogger()

/** Options for one pipeline run */
export interface FramePipelineOptions {
  method: DitheringMethod
  isColor: boolean
  params?: DitheringParams
  /** Stop after this many frames even if the source has more */
  maxFrames: number
  onProgress?: (progress: FrameProgress) => void
}

/** Result from a pipeline run */
export interface FramePipelineResult {
  framesWritten: number
  outputs: string[]
  durationMs: number
}

/**
 * Drives frames from a source through the dithering engine into a sink.
 */
export class FramePipeline {
  #source: FrameSource
  #sink: FrameSink

  constructor(source: FrameSource, sink: FrameSink) {
    this.#source = source
    this.#sink = sink
  }

  /** Processes frames until the source runs dry or maxFrames is reached */
  async call(options: FramePipelineOptions): Promise<FramePipelineResult> {
    const { method, isColor, params = {}, maxFrames, onProgress } = options
    const startTime = Date.now()

    // Fail before touching any frame if the parameters are bad
    validateDitheringOptions(method, isColor, params)

    // One seeded source per run; each frame continues its sequence
    const frameParams: DitheringParams =
      method === 'random' && params.seed !== undefined && !params.random
        ? { ...params, random: createSeededRandom(params.seed) }
        : params

    const available = this.#source.frameCount
    const total =
      available === undefined ? maxFrames : Math.min(available, maxFrames)
    log.info`Processing up to ${total} frames using ${method} dithering (${isColor ? 'color' : 'grayscale'})`

    const outputs: string[] = []
    while (outputs.length < maxFrames) {
      const frame = await this.#source.next()
      if (!frame) break

      const index = outputs.length
      const dithered = applyDithering(frame, method, isColor, frameParams)
      const outputPath = await this.#sink.write(dithered, index)
      outputs.push(outputPath)

      log.debug`Frame ${index + 1}/${total} → ${outputPath}`
      onProgress?.({ index, written: outputs.length, total, outputPath })
    }

    const durationMs = Date.now() - startTime
    log.info`Exported ${outputs.length} frames in ${durationMs}ms`

    return { framesWritten: outputs.length, outputs, durationMs }
  }
}

/** Inputs for the ffmpeg reassembly hint */
export interface FfmpegCommandOptions {
  outputDir: string
  fps: number
  method: DitheringMethod
  isColor: boolean
}

/**
 * Builds the ffmpeg command that turns the written frames back into a video.
 */
export function buildFfmpegCommand({
  outputDir,
  fps,
  method,
  isColor,
}: FfmpegCommandOptions): string {
  const suffix = `_${method}_${isColor ? 'color' : 'bw'}`
  return `ffmpeg -r ${fps} -i ${outputDir}/frame_%04d.png -c:v libx264 -pix_fmt yuv420p output_dithered${suffix}.mp4`
}
