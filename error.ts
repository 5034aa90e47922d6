/**
 * Error types for Frame Dither
 *
 * @module error
 */

/**
 * Thrown when a caller passes an unknown method, an out-of-range parameter,
 * an empty palette or a raster that does not match the requested mode.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly parameter?: string,
  ) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Error thrown when options file parsing fails
 */
export class OptionsParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly cause: Error,
  ) {
    super(`Failed to parse config file: ${filePath}`)
    this.name = 'OptionsParseError'
  }
}

/**
 * Thrown when the resolved configuration is unusable (missing input, bad values)
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when ImageMagick cannot decode a source frame
 */
export class FrameDecodeError extends Error {
  constructor(
    public readonly source: string,
    public readonly cause: Error,
  ) {
    super(`Failed to decode frame ${source}: ${cause.message}`)
    this.name = 'FrameDecodeError'
  }
}

/**
 * Thrown when ImageMagick cannot encode an output frame
 */
export class FrameEncodeError extends Error {
  constructor(
    public readonly target: string,
    public readonly cause: Error,
  ) {
    super(`Failed to encode frame ${target}: ${cause.message}`)
    this.name = 'FrameEncodeError'
  }
}
