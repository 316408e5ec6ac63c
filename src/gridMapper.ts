/**
 * Maps an identifier grid onto a staggered hexagonal dot lattice in millimeters.
 *
 * Rows are spacing * sqrt(3)/2 apart and odd rows shift right by half a
 * spacing. Dots whose center passes the nominal print width minus one
 * radius are dropped, not clamped, which trims the ragged edge of the
 * shifted rows back to a rectangle.
 */

import type {
  CoordinateSet,
  Extents,
  HexGridResult,
  IdentifierGrid,
  Palette,
  PixelBuffer,
  Point2D,
} from './types';
import { ConfigurationError } from './errors';
import { createPixelBuffer, setPixel } from './imageProcessor';

const WHITE = { r: 255, g: 255, b: 255 };

/** Rounding slack so even-row edge dots are never trimmed */
const TRIM_TOLERANCE_MM = 1e-9;

/**
 * Center-to-center distance between rows
 */
export function verticalPitch(spacingMm: number): number {
  return spacingMm * Math.sqrt(3) / 2;
}

/**
 * Horizontal shift applied to row `y`
 */
export function rowOffset(y: number, spacingMm: number): number {
  return y % 2 === 1 ? spacingMm / 2 : 0;
}

/**
 * Nominal print width for a grid `gridWidth` dots wide
 */
export function widthLimit(gridWidth: number, spacingMm: number, dotDiameterMm: number): number {
  return (gridWidth - 1) * spacingMm + dotDiameterMm;
}

function assertPositive(spacingMm: number, dotDiameterMm: number): void {
  if (!(spacingMm > 0) || !(dotDiameterMm > 0)) {
    throw new ConfigurationError(
      `Dot spacing and diameter must be positive (got spacing=${spacingMm}, diameter=${dotDiameterMm})`
    );
  }
}

/**
 * Places one dot center per grid cell on the hex lattice.
 *
 * Every palette entry gets a (possibly empty) point list, keyed in palette
 * order; points are appended in scan order.
 */
export function mapToHexGrid(
  grid: IdentifierGrid,
  palette: Palette,
  spacingMm: number,
  dotDiameterMm: number
): HexGridResult {
  assertPositive(spacingMm, dotDiameterMm);

  const coordinates: CoordinateSet = new Map(palette.map((entry): [string, Point2D[]] => [entry.name, []]));
  const height = grid.length;
  const width = grid[0]?.length ?? 0;
  const pitch = verticalPitch(spacingMm);
  const radius = dotDiameterMm / 2;
  const maxCenterX = widthLimit(width, spacingMm, dotDiameterMm) - radius + TRIM_TOLERANCE_MM;
  let trimmed = 0;

  for (let y = 0; y < height; y++) {
    const offset = rowOffset(y, spacingMm);
    const yMm = radius + y * pitch;

    for (let x = 0; x < width; x++) {
      const xMm = radius + x * spacingMm + offset;
      if (xMm > maxCenterX) {
        trimmed++;
        continue;
      }

      const name = grid[y][x];
      const points = coordinates.get(name);
      if (!points) {
        throw new ConfigurationError(`Grid cell (${x}, ${y}) names "${name}", which is not in the palette`);
      }
      points.push({ x: xMm, y: yMm });
    }
  }

  return { coordinates, trimmed };
}

/**
 * Size of the area the dots actually occupy.
 * Width never drops below the nominal print width; height is 0 without dots.
 */
export function computeExtents(
  coordinates: CoordinateSet,
  gridWidth: number,
  spacingMm: number,
  dotDiameterMm: number
): Extents {
  const radius = dotDiameterMm / 2;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const points of coordinates.values()) {
    for (const { x, y } of points) {
      maxX = Math.max(maxX, x);
      maxY = Math.max(maxY, y);
    }
  }

  if (maxX === -Infinity) {
    return { widthMm: widthLimit(gridWidth, spacingMm, dotDiameterMm), heightMm: 0 };
  }

  return {
    widthMm: Math.max(widthLimit(gridWidth, spacingMm, dotDiameterMm), maxX + radius),
    heightMm: maxY + radius,
  };
}

/**
 * Rasterizes one color's dots back onto the pixel grid as a white-on-black mask
 */
export function buildColorMask(
  points: readonly Point2D[],
  width: number,
  height: number,
  spacingMm: number,
  dotDiameterMm: number
): PixelBuffer {
  assertPositive(spacingMm, dotDiameterMm);

  const mask = createPixelBuffer(width, height);
  const radius = dotDiameterMm / 2;
  const pitch = verticalPitch(spacingMm);
  const clamp = (value: number, max: number) => Math.min(max, Math.max(0, value));

  for (const point of points) {
    const py = clamp(Math.round((point.y - radius) / pitch), height - 1);
    const px = clamp(Math.round((point.x - radius - rowOffset(py, spacingMm)) / spacingMm), width - 1);
    setPixel(mask, px, py, WHITE);
  }

  return mask;
}
