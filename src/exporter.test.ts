import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as THREE from 'three';
import { asciiStlChunks, toAsciiStl, writeAsciiStl } from './exporter';
import { buildSvg } from './svgExporter';
import { addCylinder } from './meshGenerator';
import { createPalette } from './palette';
import { slugify } from './slug';
import type { Mesh, Point2D } from './types';

const SINGLE_FACET: Mesh = {
  name: 'tri',
  triangles: [
    new THREE.Triangle(
      new THREE.Vector3(0, 0, 0),
      new THREE.Vector3(1, 0, 0),
      new THREE.Vector3(0, 1, 0)
    ),
  ],
};

describe('ASCII STL export', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('should write a named solid with placeholder normals and 6-decimal vertices', () => {
    expect(toAsciiStl(SINGLE_FACET)).toBe(
      'solid tri\n' +
      'facet normal 0 0 0\n' +
      '  outer loop\n' +
      '    vertex 0.000000 0.000000 0.000000\n' +
      '    vertex 1.000000 0.000000 0.000000\n' +
      '    vertex 0.000000 1.000000 0.000000\n' +
      '  endloop\n' +
      'endfacet\n' +
      'endsolid tri\n'
    );
  });

  it('should write computed normals when asked', () => {
    const lines = toAsciiStl(SINGLE_FACET, { computeNormals: true }).split('\n');

    expect(lines[1]).toBe('facet normal 0.000000 0.000000 1.000000');
  });

  it('should round coordinates to micrometers', () => {
    const mesh: Mesh = {
      name: 'dot',
      triangles: [
        new THREE.Triangle(
          new THREE.Vector3(0.4000004, 1.23456789, 0.6),
          new THREE.Vector3(1, 0, 0),
          new THREE.Vector3(0, 1, 0)
        ),
      ],
    };

    expect(toAsciiStl(mesh).split('\n')[3]).toBe('    vertex 0.400000 1.234568 0.600000');
  });

  it('should yield one chunk per facet between the solid header and footer', () => {
    const triangles: THREE.Triangle[] = [];
    addCylinder(triangles, 0.4, 0.4, 0.4, 0.6, 1.0, 6);

    const chunks = Array.from(asciiStlChunks({ name: 'sky-blue', triangles }));

    expect(chunks).toHaveLength(24 + 2);
    expect(chunks[0]).toBe('solid sky-blue\n');
    expect(chunks[chunks.length - 1]).toBe('endsolid sky-blue\n');
  });

  it('should stream the same text to disk', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stl-'));
    const filePath = path.join(tempDir, 'tri.stl');

    await writeAsciiStl(SINGLE_FACET, filePath);

    expect(await fs.readFile(filePath, 'utf-8')).toBe(toAsciiStl(SINGLE_FACET));
  });

  it('should refuse to write an empty mesh', async () => {
    await expect(writeAsciiStl({ name: 'empty', triangles: [] }, 'unused.stl')).rejects.toThrow('has no triangles');
  });
});

describe('SVG export', () => {
  const palette = createPalette([
    { name: 'Scarlet Red', hex: '#c8292f' },
    { name: 'Sky Blue', hex: '#6FB1E0' },
    { name: 'Charcoal', hex: '#2B2B2B' },
  ]);

  it('should draw a background and one group of circles per color with dots', () => {
    const coordinates = new Map<string, Point2D[]>([
      ['Scarlet Red', [{ x: 0.5, y: 0.5 }, { x: 1.0, y: 1.3660254 }]],
      ['Sky Blue', []],
      ['Charcoal', [{ x: 1.5, y: 0.5 }]],
    ]);

    const svg = buildSvg(coordinates, palette, {
      dotDiameterMm: 1,
      widthMm: 2,
      heightMm: 1.8660254,
      backgroundName: 'charcoal',
    });

    expect(svg.split('\n')).toEqual([
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<svg xmlns="http://www.w3.org/2000/svg" width="2.000mm" height="1.866mm" viewBox="0 0 2.000 1.866">',
      '<rect x="0" y="0" width="2.000" height="1.866" fill="#2B2B2B" />',
      '<g id="scarlet-red" fill="#C8292F">',
      '<circle cx="0.500" cy="0.500" r="0.500" />',
      '<circle cx="1.000" cy="1.366" r="0.500" />',
      '</g>',
      '<g id="charcoal" fill="#2B2B2B">',
      '<circle cx="1.500" cy="0.500" r="0.500" />',
      '</g>',
      '</svg>',
    ]);
  });

  it('should fall back to a black background', () => {
    const svg = buildSvg(new Map(), palette, {
      dotDiameterMm: 0.8,
      widthMm: 10,
      heightMm: 0,
      backgroundName: 'Midnight',
    });

    expect(svg.split('\n')[2]).toBe('<rect x="0" y="0" width="10.000" height="0.000" fill="#000000" />');
  });
});

describe('Slugs', () => {
  it('should lowercase and hyphenate names', () => {
    expect(slugify('Sky Blue')).toBe('sky-blue');
    expect(slugify('  Bambu PLA: Matte/Ivory  ')).toBe('bambu-pla-matte-ivory');
    expect(slugify('--Already-Slugged--')).toBe('already-slugged');
  });

  it('should be idempotent', () => {
    for (const name of ['Sky Blue', 'Scarlet Red', 'Lemon_Yellow #2', 'charcoal', 'Über Grün']) {
      expect(slugify(slugify(name))).toBe(slugify(name));
    }
  });
});
