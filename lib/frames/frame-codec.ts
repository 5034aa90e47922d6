/**
 * Frame Codec - ImageMagick-backed raster decoding and encoding
 *
 * Decoding resizes any ImageMagick-readable image to the exact target size
 * and streams it out as raw 8-bit gray or RGB samples. Encoding wraps a
 * raster in a Netpbm header (PGM/PPM) and lets ImageMagick write PNG.
 *
 * NOTE: Requires ImageMagick on PATH. Nothing else in the engine does.
 *
 * @module lib/frames/frame-codec
 */

import gmLib, { type State } from 'gm'

import { FrameDecodeError, FrameEncodeError } from '../../error.js'
import type { ChannelCount, FrameSize, Raster } from '../../types/domain.js'
import { createRaster } from '../raster.js'
import { framesLogger } from '../logger.js'

const gm = gmLib.subClass({ imageMagick: true })

const log = framesLogger()

// =============================================================================
// STREAM UTILITIES
// =============================================================================

/** Options for streaming gm image to buffer */
interface StreamOptions {
  format: string
}

/**
 * Streams a gm image to a Buffer with consistent error handling.
 */
export function streamToBuffer(
  image: State,
  { format }: StreamOptions,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []

    image.stream(format, (err, stdout, stderr) => {
      if (err) {
        reject(err)
        return
      }

      stdout.on('data', (chunk: Buffer) => chunks.push(chunk))

      stdout.on('end', () => {
        const buffer = Buffer.concat(chunks)
        if (buffer.length === 0) {
          reject(new Error(`ImageMagick produced empty ${format} output`))
        } else {
          resolve(buffer)
        }
      })

      stdout.on('error', (err: Error) => reject(err))

      stderr.on('data', (data: Buffer) => {
        log.warning`ImageMagick stderr: ${data.toString()}`
      })
    })
  })
}

const toError = (err: unknown): Error =>
  err instanceof Error ? err : new Error(String(err))

// =============================================================================
// DECODING
// =============================================================================

/** Options for decoding a source frame */
export interface DecodeFrameOptions extends FrameSize {
  channels: ChannelCount
  /** Label used in errors and logs (usually the file path) */
  source?: string
}

/**
 * Decodes an encoded image into a raster of exactly `width` x `height`.
 *
 * Aspect ratio is not preserved (the frame is stretched to fit). Grayscale
 * uses Rec.601 luma; transparency is flattened onto white.
 */
export async function decodeFrame(
  imageBuffer: Buffer,
  options: DecodeFrameOptions,
): Promise<Raster> {
  const { width, height, channels, source = 'buffer' } = options

  let image: State = gm(imageBuffer)
    .selectFrame(0)
    .resize(width, height, '!')
    .out('-background', 'white', '-alpha', 'remove')

  image =
    channels === 1
      ? image.out('-grayscale', 'Rec601Luma')
      : image.colorspace('sRGB')

  image = image.bitdepth(8)

  let raw: Buffer
  try {
    raw = await streamToBuffer(image, {
      format: channels === 1 ? 'gray' : 'rgb',
    })
  } catch (err) {
    throw new FrameDecodeError(source, toError(err))
  }

  const expected = width * height * channels
  if (raw.length !== expected) {
    throw new FrameDecodeError(
      source,
      new Error(`expected ${expected} bytes of raw samples, got ${raw.length}`),
    )
  }

  return createRaster(width, height, channels, new Uint8Array(raw))
}

// =============================================================================
// ENCODING
// =============================================================================

/**
 * Wraps raster samples in a binary PGM (P5) or PPM (P6) container.
 */
export function toNetpbm(raster: Raster): Buffer {
  const magic = raster.channels === 1 ? 'P5' : 'P6'
  const header = Buffer.from(
    `${magic}\n${raster.width} ${raster.height}\n255\n`,
    'ascii',
  )
  return Buffer.concat([header, raster.data])
}

/**
 * True when every sample is 0 or 255 (grayscale dithering output)
 */
export function isBilevel(raster: Raster): boolean {
  return raster.data.every((v) => v === 0 || v === 255)
}

/**
 * Encodes a raster as PNG. Bilevel grayscale rasters are written at 1 bit
 * per pixel.
 */
export async function encodeFrame(
  raster: Raster,
  { target = 'buffer', compressionLevel = 9 } = {},
): Promise<Buffer> {
  let image: State = gm(toNetpbm(raster)).strip()

  if (raster.channels === 1) {
    const bitDepth = isBilevel(raster) ? 1 : 8
    image = image.out('-type', 'Grayscale').out('-depth', String(bitDepth))
    log.debug`Writing ${bitDepth}-bit grayscale PNG for ${target}`
  }

  image = image
    .define(`png:compression-level=${compressionLevel}`)
    .define('png:exclude-chunks=date,time')

  try {
    return await streamToBuffer(image, { format: 'png' })
  } catch (err) {
    throw new FrameEncodeError(target, toError(err))
  }
}
