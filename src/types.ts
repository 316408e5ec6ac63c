/**
 * Type definitions for the pointillist dot pipeline
 */

import type { Triangle } from 'three';

/**
 * An 8-bit RGB color
 */
export interface Color {
  r: number;
  g: number;
  b: number;
}

/**
 * A named reference color that pixels are snapped to
 */
export interface PaletteEntry {
  name: string;
  color: Color;
  /** Upper-case `#RRGGBB` */
  hex: string;
}

/**
 * Ordered, non-empty list of entries with case-insensitively unique names
 */
export type Palette = readonly PaletteEntry[];

/**
 * Row-major RGB raster, 3 bytes per pixel.
 * Mutated in place while dithering.
 */
export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

/**
 * Palette entry name per pixel, indexed as grid[y][x]
 */
export type IdentifierGrid = string[][];

/**
 * A dot center in millimeters
 */
export interface Point2D {
  x: number;
  y: number;
}

/**
 * Dot centers per palette entry name.
 * Keys follow palette order, points follow scan order (top-to-bottom, left-to-right).
 */
export type CoordinateSet = Map<string, Point2D[]>;

/**
 * One printable part: the base slab or a single color's dots
 */
export interface Mesh {
  name: string;
  triangles: Triangle[];
}

/**
 * Result of Floyd-Steinberg quantization
 */
export interface DitherResult {
  /** Quantized copy of the input; every pixel equals a palette color */
  image: PixelBuffer;
  /** Same shape as the image */
  grid: IdentifierGrid;
}

/**
 * Result of laying an identifier grid on the hex lattice
 */
export interface HexGridResult {
  coordinates: CoordinateSet;
  /** Dots dropped because their center overhangs the print width */
  trimmed: number;
}

/**
 * Physical extent actually used by the emitted dots
 */
export interface Extents {
  widthMm: number;
  heightMm: number;
}
