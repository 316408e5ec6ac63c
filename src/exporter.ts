import * as fs from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { Mesh } from './types';
import { computeFacetNormal } from './meshGenerator';

export interface StlOptions {
  /**
   * Write unit facet normals from each facet's winding.
   * Off by default: facets get a `0 0 0` placeholder and slicers recompute them.
   */
  computeNormals?: boolean;
}

/**
 * Formats a coordinate with micrometer precision (6 decimal places, mm units)
 */
function formatCoordinate(value: number): string {
  return value.toFixed(6);
}

/**
 * Yields an ASCII STL document for one named solid, one facet per chunk
 */
export function* asciiStlChunks(mesh: Mesh, options: StlOptions = {}): Generator<string> {
  const { computeNormals = false } = options;

  yield `solid ${mesh.name}\n`;

  for (const facet of mesh.triangles) {
    let normal = '0 0 0';
    if (computeNormals) {
      const n = computeFacetNormal(facet);
      normal = `${formatCoordinate(n.x)} ${formatCoordinate(n.y)} ${formatCoordinate(n.z)}`;
    }

    const lines = [`facet normal ${normal}`, '  outer loop'];
    for (const v of [facet.a, facet.b, facet.c]) {
      lines.push(`    vertex ${formatCoordinate(v.x)} ${formatCoordinate(v.y)} ${formatCoordinate(v.z)}`);
    }
    lines.push('  endloop', 'endfacet');
    yield lines.join('\n') + '\n';
  }

  yield `endsolid ${mesh.name}\n`;
}

/**
 * Serializes a mesh to an ASCII STL string
 */
export function toAsciiStl(mesh: Mesh, options: StlOptions = {}): string {
  return Array.from(asciiStlChunks(mesh, options)).join('');
}

/**
 * Streams a mesh to an ASCII STL file.
 * Large dot assemblies are written facet by facet instead of built as one string.
 */
export async function writeAsciiStl(mesh: Mesh, filePath: string, options: StlOptions = {}): Promise<void> {
  if (mesh.triangles.length === 0) {
    throw new Error(`STL export failed: mesh "${mesh.name}" has no triangles`);
  }

  await pipeline(
    Readable.from(asciiStlChunks(mesh, options)),
    fs.createWriteStream(filePath, { encoding: 'ascii' })
  );
}
