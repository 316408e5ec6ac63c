/**
 * End-to-end run: palette -> image -> dither -> hex grid -> SVG/STL/masks/metadata
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseOptions, type PipelineOptionsInput } from './config';
import { loadPalette } from './palette';
import { createSharpBackend, prepareImage, type ImageBackend } from './imageIO';
import { countColors, ditherToPalette } from './imageProcessor';
import { buildColorMask, computeExtents, mapToHexGrid, verticalPitch } from './gridMapper';
import { buildSvg } from './svgExporter';
import { generateMeshes, getMeshStats } from './meshGenerator';
import { writeAsciiStl } from './exporter';
import { buildMetadata, type RunMetadata } from './metadata';
import { slugify } from './slug';

/**
 * Runs the whole pipeline and writes every artifact into `outDir`.
 *
 * @param backend - Imaging backend; sharp is loaded when omitted
 * @returns The metadata record that was written to metadata.json
 */
export async function runPipeline(
  input: PipelineOptionsInput,
  backend?: ImageBackend
): Promise<RunMetadata> {
  const options = parseOptions(input);
  const { outDir, spacingMm, dotDiameterMm } = options;

  const palette = await loadPalette(options.palettePath, options.colors);
  console.log(`Palette: ${palette.map((entry) => `${entry.name} ${entry.hex}`).join(', ')}`);

  const images = backend ?? await createSharpBackend();
  await fs.mkdir(outDir, { recursive: true });

  const resized = await prepareImage(images, options.imagePath, options.widthMm, spacingMm);
  console.log(`Grid: ${resized.width}x${resized.height} dots at ${spacingMm}mm spacing`);

  const { image: dithered, grid } = ditherToPalette(resized, palette);
  await images.writePng(dithered, path.join(outDir, 'dithered.png'));
  for (const [name, count] of countColors(grid)) {
    console.log(`  ${name}: ${count} pixels`);
  }

  const { coordinates, trimmed } = mapToHexGrid(grid, palette, spacingMm, dotDiameterMm);
  if (trimmed > 0) {
    console.warn(`Trimmed ${trimmed} staggered-row dots that overhang the ${options.widthMm}mm print width`);
  }

  for (const [name, points] of coordinates) {
    const mask = buildColorMask(points, resized.width, resized.height, spacingMm, dotDiameterMm);
    await images.writePng(mask, path.join(outDir, `mask_${slugify(name)}.png`));
  }

  const extents = computeExtents(coordinates, resized.width, spacingMm, dotDiameterMm);
  console.log(`Used area: ${extents.widthMm.toFixed(3)}mm x ${extents.heightMm.toFixed(3)}mm`);

  const svg = buildSvg(coordinates, palette, {
    dotDiameterMm,
    widthMm: extents.widthMm,
    heightMm: extents.heightMm,
    backgroundName: options.backgroundName,
  });
  await fs.writeFile(path.join(outDir, 'dots.svg'), svg, 'utf-8');

  const meshes = generateMeshes({
    coordinates,
    widthMm: extents.widthMm,
    heightMm: extents.heightMm,
    dotDiameterMm,
    dotHeightMm: options.dotHeightMm,
    baseThicknessMm: options.baseThicknessMm,
    segments: options.segments,
  });

  const stlFiles = new Map<string, string>();
  for (const mesh of [meshes.base, ...meshes.colors.values()]) {
    const fileName = `${mesh.name}.stl`;
    await writeAsciiStl(mesh, path.join(outDir, fileName), { computeNormals: options.computeNormals });
    stlFiles.set(mesh.name, fileName);
  }
  console.log(`Wrote ${stlFiles.size} STL parts to ${outDir}`);

  const metadata = buildMetadata({
    options,
    palette,
    pixelDimensions: { width: resized.width, height: resized.height },
    coordinates,
    extents,
    verticalPitchMm: verticalPitch(spacingMm),
    trimmedDots: trimmed,
    stlFiles,
    partStats: getMeshStats(meshes),
  });
  await fs.writeFile(path.join(outDir, 'metadata.json'), JSON.stringify(metadata, null, 2), 'utf-8');

  return metadata;
}
