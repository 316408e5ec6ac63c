/**
 * Error types raised by the pipeline.
 * Nothing is retried: any of these aborts the run.
 */

export class PointillistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid options or inputs, raised before any geometry work starts
 */
export class ConfigurationError extends PointillistError {}

/**
 * A palette file that cannot be read as name/hex pairs
 */
export class PaletteFormatError extends ConfigurationError {}

/**
 * Loading or filtering left no colors to work with
 */
export class EmptyPaletteError extends ConfigurationError {
  constructor(message = 'Palette is empty after loading/filtering.') {
    super(message);
  }
}

/**
 * A required runtime capability (image decoding) is not installed
 */
export class MissingDependencyError extends PointillistError {}
