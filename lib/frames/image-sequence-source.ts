/**
 * Image Sequence Frame Source
 *
 * Reads a directory of still frames (for example the output of
 * `ffmpeg -i clip.mp4 frames/%04d.png`) in natural filename order.
 *
 * @module lib/frames/image-sequence-source
 */

import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { FRAME_FILE_PATTERN } from '../../const.js'
import { ConfigError, FrameDecodeError } from '../../error.js'
import type { ChannelCount, FrameSize, Raster } from '../../types/domain.js'
import type { FrameSource } from '../../types/frame-io.js'
import { framesLogger } from '../logger.js'
import { decodeFrame } from './frame-codec.js'

const log = framesLogger()

/** Options for opening an image sequence */
export interface ImageSequenceOptions extends FrameSize {
  channels: ChannelCount
}

/**
 * Sorts file names so that frame2.png comes before frame10.png
 */
export function sortFrameFiles(names: readonly string[]): string[] {
  return names
    .filter((name) => FRAME_FILE_PATTERN.test(name))
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
}

/**
 * Frame source over the image files of one directory.
 */
export class ImageSequenceSource implements FrameSource {
  readonly #directory: string
  readonly #files: readonly string[]
  readonly #options: ImageSequenceOptions
  #cursor: number = 0

  private constructor(
    directory: string,
    files: readonly string[],
    options: ImageSequenceOptions,
  ) {
    this.#directory = directory
    this.#files = files
    this.#options = options
  }

  /**
   * Lists the directory and prepares a source over its image files.
   *
   * @throws ConfigError if the directory cannot be read or holds no images
   */
  static async open(
    directory: string,
    options: ImageSequenceOptions,
  ): Promise<ImageSequenceSource> {
    let entries: string[]
    try {
      entries = await readdir(directory)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Cannot read input directory ${directory}: ${message}`)
    }

    const files = sortFrameFiles(entries)
    if (files.length === 0) {
      throw new ConfigError(`No image frames found in ${directory}`)
    }

    log.info`Found ${files.length} frames in ${directory}`
    return new ImageSequenceSource(directory, files, options)
  }

  get frameCount(): number {
    return this.#files.length
  }

  async next(): Promise<Raster | null> {
    const file = this.#files[this.#cursor]
    if (file === undefined) return null
    this.#cursor++

    const path = join(this.#directory, file)
    let buffer: Buffer
    try {
      buffer = await readFile(path)
    } catch (err) {
      throw new FrameDecodeError(path, err instanceof Error ? err : new Error(String(err)))
    }
    return decodeFrame(buffer, { ...this.#options, source: path })
  }
}
