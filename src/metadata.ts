/**
 * Metadata record written next to the artifacts for reproducibility
 */

import type { CoordinateSet, Extents, Palette } from './types';
import type { PipelineOptions } from './config';
import type { PartBounds, PartStats } from './meshGenerator';

export interface Coverage {
  totalDots: number;
  dotAreaMm2: number;
  coverageAreaMm2: number;
  coverageFraction: number;
  coveragePercent: number;
}

export interface RunMetadata {
  image: string;
  paletteFile: string;
  selectedColors: string[] | 'all';
  widthMm: number;
  spacingMm: number;
  dotDiameterMm: number;
  dotHeightMm: number;
  baseThicknessMm: number;
  segments: number;
  computeNormals: boolean;
  pixelDimensions: { width: number; height: number };
  grid: {
    type: 'hex_staggered';
    verticalPitchMm: number;
    widthMm: number;
    heightMm: number;
    trimmedDots: number;
  };
  coverage: Coverage;
  dotCounts: Record<string, number>;
  palette: Array<{ name: string; hex: string; rgb: [number, number, number] }>;
  stlFiles: Record<string, string>;
  triangleCounts: Record<string, number>;
  partBounds: Record<string, PartBounds | null>;
}

/**
 * Share of the used area covered by dots.
 * A zero-sized area counts as 1 mm².
 */
export function computeCoverage(
  totalDots: number,
  dotDiameterMm: number,
  widthMm: number,
  heightMm: number
): Coverage {
  const dotAreaMm2 = Math.PI * (dotDiameterMm / 2) ** 2;
  const usedArea = widthMm > 0 && heightMm > 0 ? widthMm * heightMm : 1;
  const coverageAreaMm2 = totalDots * dotAreaMm2;
  const coverageFraction = coverageAreaMm2 / usedArea;

  return {
    totalDots,
    dotAreaMm2,
    coverageAreaMm2,
    coverageFraction,
    coveragePercent: coverageFraction * 100,
  };
}

export interface MetadataInput {
  options: PipelineOptions;
  palette: Palette;
  pixelDimensions: { width: number; height: number };
  coordinates: CoordinateSet;
  extents: Extents;
  verticalPitchMm: number;
  trimmedDots: number;
  stlFiles: Map<string, string>;
  partStats: Map<string, PartStats>;
}

export function buildMetadata(input: MetadataInput): RunMetadata {
  const { options, palette, coordinates, extents } = input;

  const dotCounts: Record<string, number> = {};
  let totalDots = 0;
  for (const [name, points] of coordinates) {
    dotCounts[name] = points.length;
    totalDots += points.length;
  }

  const triangleCounts: Record<string, number> = {};
  const partBounds: Record<string, PartBounds | null> = {};
  for (const [part, stats] of input.partStats) {
    triangleCounts[part] = stats.triangles;
    partBounds[part] = stats.bounds;
  }

  return {
    image: options.imagePath,
    paletteFile: options.palettePath,
    selectedColors: options.colors.length > 0 ? [...options.colors] : 'all',
    widthMm: options.widthMm,
    spacingMm: options.spacingMm,
    dotDiameterMm: options.dotDiameterMm,
    dotHeightMm: options.dotHeightMm,
    baseThicknessMm: options.baseThicknessMm,
    segments: options.segments,
    computeNormals: options.computeNormals,
    pixelDimensions: input.pixelDimensions,
    grid: {
      type: 'hex_staggered',
      verticalPitchMm: input.verticalPitchMm,
      widthMm: extents.widthMm,
      heightMm: extents.heightMm,
      trimmedDots: input.trimmedDots,
    },
    coverage: computeCoverage(totalDots, options.dotDiameterMm, extents.widthMm, extents.heightMm),
    dotCounts,
    palette: palette.map(({ name, hex, color }) => ({ name, hex, rgb: [color.r, color.g, color.b] })),
    stlFiles: Object.fromEntries(input.stlFiles),
    triangleCounts,
    partBounds,
  };
}
