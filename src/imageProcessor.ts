/**
 * Image Processing Module
 *
 * Pixel buffer helpers, grid sizing and palette-constrained
 * Floyd-Steinberg dithering.
 */

import type {
  Color,
  DitherResult,
  IdentifierGrid,
  Palette,
  PixelBuffer,
} from './types';
import { ConfigurationError } from './errors';
import { findNearestEntry } from './palette';

const CHANNELS = 3;

/**
 * Floyd-Steinberg neighbors as [dx, dy, weight]
 */
const DIFFUSION_KERNEL: ReadonlyArray<readonly [number, number, number]> = [
  [1, 0, 7 / 16],
  [-1, 1, 3 / 16],
  [0, 1, 5 / 16],
  [1, 1, 1 / 16],
];

/**
 * Creates a black RGB buffer, or wraps existing RGB bytes
 */
export function createPixelBuffer(width: number, height: number, data?: ArrayLike<number>): PixelBuffer {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new ConfigurationError(`Invalid image dimensions: ${width}x${height}`);
  }
  const size = width * height * CHANNELS;
  if (data && data.length !== size) {
    throw new ConfigurationError(
      `Pixel data has ${data.length} bytes, expected ${size} for ${width}x${height} RGB`
    );
  }
  const buffer = new Uint8ClampedArray(size);
  if (data) buffer.set(data);
  return { width, height, data: buffer };
}

export function clonePixelBuffer(buffer: PixelBuffer): PixelBuffer {
  return { width: buffer.width, height: buffer.height, data: new Uint8ClampedArray(buffer.data) };
}

export function getPixel(buffer: PixelBuffer, x: number, y: number): Color {
  const i = (y * buffer.width + x) * CHANNELS;
  return { r: buffer.data[i], g: buffer.data[i + 1], b: buffer.data[i + 2] };
}

export function setPixel(buffer: PixelBuffer, x: number, y: number, color: Color): void {
  const i = (y * buffer.width + x) * CHANNELS;
  buffer.data[i] = color.r;
  buffer.data[i + 1] = color.g;
  buffer.data[i + 2] = color.b;
}

/**
 * Pixel dimensions such that one pixel column equals one dot column.
 * Height follows the source aspect ratio; both are at least 1.
 */
export function computeTargetDimensions(
  sourceWidth: number,
  sourceHeight: number,
  widthMm: number,
  spacingMm: number
): { width: number; height: number } {
  if (widthMm <= 0 || spacingMm <= 0) {
    throw new ConfigurationError('Print width and dot spacing must be positive');
  }
  const width = Math.max(1, Math.round(widthMm / spacingMm));
  const aspect = sourceHeight / sourceWidth;
  const height = Math.max(1, Math.round(width * aspect));
  return { width, height };
}

/** Truncates toward zero, then clamps into a byte */
function toChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.trunc(value)));
}

/**
 * Adds a weighted share of the quantization error to one neighbor.
 * Neighbors outside the buffer are skipped and their share is lost.
 */
function diffuseError(
  buffer: PixelBuffer,
  x: number,
  y: number,
  error: Color,
  weight: number
): void {
  if (x < 0 || x >= buffer.width || y < 0 || y >= buffer.height) return;

  const current = getPixel(buffer, x, y);
  setPixel(buffer, x, y, {
    r: toChannel(current.r + error.r * weight),
    g: toChannel(current.g + error.g * weight),
    b: toChannel(current.b + error.b * weight),
  });
}

/**
 * Quantizes an image to a palette with Floyd-Steinberg error diffusion.
 *
 * Pixels are visited row by row, left to right. The working copy is
 * mutated in place so each pixel is matched after the error of its
 * already-visited neighbors has been added. The input buffer is left as is.
 *
 * @returns The quantized image and the palette entry name chosen per pixel
 */
export function ditherToPalette(source: PixelBuffer, palette: Palette): DitherResult {
  if (palette.length === 0) {
    throw new ConfigurationError('Cannot dither against an empty palette');
  }

  const image = clonePixelBuffer(source);
  const { width, height } = image;
  const grid: IdentifierGrid = [];

  for (let y = 0; y < height; y++) {
    const row: string[] = [];
    for (let x = 0; x < width; x++) {
      const old = getPixel(image, x, y);
      const match = findNearestEntry(old, palette);

      setPixel(image, x, y, match.color);
      row.push(match.name);

      const error: Color = {
        r: old.r - match.color.r,
        g: old.g - match.color.g,
        b: old.b - match.color.b,
      };
      for (const [dx, dy, weight] of DIFFUSION_KERNEL) {
        diffuseError(image, x + dx, y + dy, error, weight);
      }
    }
    grid.push(row);
  }

  return { image, grid };
}

/**
 * Number of pixels assigned to each palette name
 */
export function countColors(grid: IdentifierGrid): Map<string, number> {
  const counts = new Map<string, number>();
  for (const row of grid) {
    for (const name of row) {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }
  return counts;
}
