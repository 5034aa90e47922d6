/**
 * PNG Frame Sink
 *
 * Writes frame_0000.png, frame_0001.png, ... into an output directory,
 * ready for `ffmpeg -i frame_%04d.png`.
 *
 * @module lib/frames/png-frame-sink
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { FRAME_FILE_PREFIX, FRAME_INDEX_DIGITS } from '../../const.js'
import type { Raster } from '../../types/domain.js'
import type { FrameSink } from '../../types/frame-io.js'
import { encodeFrame } from './frame-codec.js'

/**
 * Output file name for a zero-based frame index
 */
export function frameFileName(index: number): string {
  return `${FRAME_FILE_PREFIX}${String(index).padStart(FRAME_INDEX_DIGITS, '0')}.png`
}

export class PngFrameSink implements FrameSink {
  readonly #outputDir: string
  #directoryReady: Promise<string | undefined> | undefined

  constructor(outputDir: string) {
    this.#outputDir = outputDir
  }

  get outputDir(): string {
    return this.#outputDir
  }

  async write(raster: Raster, index: number): Promise<string> {
    if (!this.#directoryReady) {
      this.#directoryReady = mkdir(this.#outputDir, { recursive: true })
    }
    await this.#directoryReady

    const path = join(this.#outputDir, frameFileName(index))
    const png = await encodeFrame(raster, { target: path })
    await writeFile(path, png)
    return path
  }
}
