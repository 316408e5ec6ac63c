/**
 * SVG export of the dot layout, in millimeters, for CAD/slicer import
 */

import type { CoordinateSet, Palette } from './types';
import { findBackgroundColor } from './palette';
import { slugify } from './slug';

export interface SvgOptions {
  dotDiameterMm: number;
  /** Used width, from computeExtents */
  widthMm: number;
  /** Used height, from computeExtents */
  heightMm: number;
  /** Palette entry painted behind the dots; black when absent */
  backgroundName: string;
}

const fmt = (value: number) => value.toFixed(3);

/**
 * Builds the SVG document: a background rectangle, then one group of
 * circles per color that has dots, in palette order.
 */
export function buildSvg(coordinates: CoordinateSet, palette: Palette, options: SvgOptions): string {
  const { dotDiameterMm, widthMm, heightMm, backgroundName } = options;
  const radius = fmt(dotDiameterMm / 2);
  const width = fmt(widthMm);
  const height = fmt(heightMm);

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}mm" height="${height}mm" viewBox="0 0 ${width} ${height}">`,
    `<rect x="0" y="0" width="${width}" height="${height}" fill="${findBackgroundColor(palette, backgroundName)}" />`,
  ];

  for (const entry of palette) {
    const points = coordinates.get(entry.name) ?? [];
    if (points.length === 0) continue;

    lines.push(`<g id="${slugify(entry.name)}" fill="${entry.hex}">`);
    for (const { x, y } of points) {
      lines.push(`<circle cx="${fmt(x)}" cy="${fmt(y)}" r="${radius}" />`);
    }
    lines.push('</g>');
  }

  lines.push('</svg>');
  return lines.join('\n');
}
